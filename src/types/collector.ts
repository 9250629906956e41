/**
 * Collector pipeline types
 */

export type PipelineKind = 'VOLATILITY' | 'SPOT';

export type PipelineState = 'IDLE' | 'FETCHING' | 'COMPUTING' | 'PERSISTING' | 'FAILED';

export type CollectorErrorKind =
  | 'TRANSPORT'
  | 'RATE_LIMITED'
  | 'UPSTREAM'
  | 'FETCH_FAILED'
  | 'ABORTED'
  | 'MALFORMED_RESPONSE'
  | 'INSUFFICIENT_DATA'
  | 'PERSISTENCE'
  | 'CONFIGURATION'
  | 'UNKNOWN';

export interface AssetFailure {
  assetId: string;
  kind: CollectorErrorKind;
  stage: PipelineState;
  message: string;
}

export interface TickSummary {
  pipeline: PipelineKind;
  startedAt: string;
  finishedAt: string;
  succeeded: string[];
  failed: AssetFailure[];
  skipped: string[];
}
