import { formatFrameSummary, summarizeFrame } from './frameSummary';

describe('frame summaries', () => {
  it('counts the points and NaN gaps of each row', () => {
    const summary = summarizeFrame({
      buffers: [Float64Array.from([1, NaN, 3]), Float64Array.from([NaN, NaN, 6])],
      pulseId: 1234,
      syncedPointCount: 3,
      offset: -3,
    });

    expect(summary).toEqual({ points: 3, missing: [1, 2], pulseId: 1234, offset: -3 });
    expect(formatFrameSummary(summary)).toBe('pulse 1234 | 3 pts (offset -3) | missing 1/2');
  });

  it('labels frames without beam', () => {
    const summary = summarizeFrame({
      buffers: [new Float64Array(0), new Float64Array(0)],
      pulseId: 600,
      syncedPointCount: 0,
      offset: NaN,
    });

    expect(formatFrameSummary(summary)).toBe('pulse 600 | 0 pts (no beam) | missing 0/0');
  });
});
