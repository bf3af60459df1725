export interface ISequencerConfig {
  maxAttempts: number;
  storeTimeoutMs: number;
  reconcileBatchSize: number;
  monitorSampleSize: number;
  monitorIntervalMs: number;
  driftThreshold: number;
  startupDelayMs: number;
}
