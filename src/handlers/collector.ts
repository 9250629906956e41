import { ScheduledEvent, ScheduledHandler } from 'aws-lambda';
import { loadCollectorConfig } from '../config/collector-config';
import { Collector, createCollector } from '../services/collector-factory';
import { TickSummary } from '../types/collector';

/**
 * Scheduled Lambda entry points. EventBridge rules take the place of the
 * cron tasks and each invocation runs exactly one tick. The collector is
 * built on first use and reused while the container stays warm so rate
 * limiter state carries across invocations.
 */

let collector: Collector | undefined;

function getCollector(): Collector {
  if (!collector) {
    collector = createCollector(loadCollectorConfig());
  }
  return collector;
}

/**
 * Reset the cached collector (tests)
 */
export function resetCollector(): void {
  collector = undefined;
}

/**
 * Throws when every attempted asset failed so the invocation shows up as
 * an error; partial failures are only logged
 */
function assertTickUseful(summary: TickSummary | null): void {
  if (summary && summary.failed.length > 0 && summary.succeeded.length === 0) {
    const kinds = Array.from(new Set(summary.failed.map((f) => f.kind))).join(', ');
    throw new Error(`${summary.pipeline} tick failed for every asset (${kinds})`);
  }
}

export const volatilityTick: ScheduledHandler = async (event: ScheduledEvent) => {
  const firedAt = Date.parse(event.time);
  const now = Number.isNaN(firedAt) ? new Date() : new Date(firedAt);
  const summary = await getCollector().scheduler.runVolatilityTick(now);
  assertTickUseful(summary);
};

export const spotTick: ScheduledHandler = async () => {
  const summary = await getCollector().scheduler.runSpotTick();
  assertTickUseful(summary);
};
