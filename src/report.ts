import type { AccuracyReport, SyncStatistics } from './types.js';

/** Values printed by the console reporter, already in milliseconds. */
export interface ReportSnapshot {
  globalTime: number;
  offset: number;
  clockRate: number;
  playbackRate: number;
  medianRoundTripTime: number;
  statistics: SyncStatistics;
  accuracy: AccuracyReport;
}

/** Renders the five-line status block, followed by a blank line. */
export function formatReport(snapshot: ReportSnapshot): string {
  const { statistics: stats, accuracy } = snapshot;
  const lost = stats.sentRequests - stats.receivedSamples;
  return [
    `global ${snapshot.globalTime.toFixed(3)} ms offset ${snapshot.offset.toFixed(3)} ms`,
    `clock rate ${snapshot.clockRate.toFixed(9)} ${snapshot.playbackRate.toFixed(9)}`,
    `median round trip time ${snapshot.medianRoundTripTime.toFixed(3)} ms`,
    `sent ${stats.sentRequests} lost ${lost} rejected ${stats.rejectedSamples}`,
    `accuracy min ${accuracy.min.toFixed(3)} ms average ${accuracy.average.toFixed(3)} ms max ${accuracy.max.toFixed(3)} ms`,
    '',
  ].join('\n');
}
