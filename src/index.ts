export { DriftSyncClient } from './driftSyncClient.js';
export { EventEmitter } from './eventEmitter.js';
export { Estimator } from './estimator.js';
export { SlidingWindow } from './slidingWindow.js';
export { Monitor } from './monitor.js';
export { TransportChannel } from './transportChannel.js';
export type { Datagram } from './transportChannel.js';
export { RequestScheduler } from './requestScheduler.js';
export { ResponseProcessor } from './responseProcessor.js';
export type { ResponseProcessorOptions } from './responseProcessor.js';
export { Logger, createLogger } from './logger.js';
export type { LogSink } from './logger.js';
export { monotonicMicros } from './localClock.js';
export { suggestPlaybackRate } from './playbackRate.js';
export {
  PACKET_LENGTH,
  PROTOCOL_MAGIC,
  FLAG_REPLY,
  encodeRequest,
  encodeReply,
  decodePacket,
  decodeReply,
} from './codec.js';
export {
  calculateMean,
  calculateMedian,
  calculateClockRate,
  calculateDiscrepancy,
  projectGlobalTime,
  clamp,
} from './timeMath.js';
export {
  SCALE_US,
  SCALE_MS,
  SCALE_S,
  DEFAULT_PORT,
  DEFAULT_INTERVAL_MS,
  MAX_SAMPLES,
  OUTLIER_THRESHOLD_US,
} from './constants.js';
export type {
  AccuracyOptions,
  AccuracyReport,
  ClientState,
  DatagramSocket,
  DecodeFailure,
  DecodeResult,
  DriftSyncConfig,
  DriftSyncEventMap,
  IntegrationResult,
  LocalClock,
  Sample,
  SyncPacket,
  SyncStatistics,
} from './types.js';
