import { describe, it, expect } from 'vitest';
import { formatReport } from '../report.js';

describe('formatReport', () => {
  it('renders the status block with fixed precision', () => {
    const text = formatReport({
      globalTime: 1234.5,
      offset: 100,
      clockRate: 1.0000001,
      playbackRate: 1,
      medianRoundTripTime: 0.25,
      statistics: { sentRequests: 10, receivedSamples: 8, rejectedSamples: 1 },
      accuracy: { min: 0.001, average: 0.012, max: 0.05 },
    });

    expect(text.split('\n')).toEqual([
      'global 1234.500 ms offset 100.000 ms',
      'clock rate 1.000000100 1.000000000',
      'median round trip time 0.250 ms',
      'sent 10 lost 2 rejected 1',
      'accuracy min 0.001 ms average 0.012 ms max 0.050 ms',
      '',
    ]);
  });
});
