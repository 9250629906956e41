/**
 * Structured logging for the collector
 *
 * Entries are single-line JSON objects so CloudWatch (or any line-based
 * shipper) can filter on logType and event.
 */

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export type CollectorEvent =
  | 'COLLECTOR_STARTED'
  | 'COLLECTOR_STOPPING'
  | 'COLLECTOR_STOPPED'
  | 'TICK_STARTED'
  | 'TICK_COMPLETED'
  | 'TICK_SKIPPED'
  | 'TICK_FAILED'
  | 'PIPELINE_STATE'
  | 'ASSET_SKIPPED'
  | 'ASSET_FAILED'
  | 'DATA_QUALITY'
  | 'RETRY_SCHEDULED'
  | 'VOLATILITY_STORED'
  | 'SPOT_STORED';

export function logCollectorEvent(
  level: LogLevel,
  event: CollectorEvent,
  fields: Record<string, unknown> = {}
): void {
  const entry = JSON.stringify({
    logType: 'STABLECOIN_COLLECTOR',
    level,
    event,
    timestamp: new Date().toISOString(),
    ...fields,
  });

  switch (level) {
    case 'ERROR':
      console.error(entry);
      break;
    case 'WARN':
      console.warn(entry);
      break;
    default:
      console.log(entry);
  }
}
