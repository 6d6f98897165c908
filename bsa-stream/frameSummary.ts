import { AlignedFrame, PulseId } from './types';

export interface FrameSummary {
  points: number;
  missing: [number, number];
  pulseId: PulseId;
  offset: number;
}

function countMissing(row: Float64Array): number {
  let missing = 0;
  for (const value of row) {
    if (Number.isNaN(value)) missing++;
  }
  return missing;
}

export function summarizeFrame(frame: AlignedFrame): FrameSummary {
  return {
    points: frame.syncedPointCount,
    missing: [countMissing(frame.buffers[0]), countMissing(frame.buffers[1])],
    pulseId: frame.pulseId,
    offset: frame.offset,
  };
}

// One console line per refresh, e.g. "pulse 1234 | 2797 pts (offset -3) | missing 0/2"
export function formatFrameSummary(summary: FrameSummary): string {
  const offset = Number.isNaN(summary.offset) ? 'no beam' : `offset ${summary.offset}`;
  return `pulse ${summary.pulseId} | ${summary.points} pts (${offset}) | missing ${summary.missing[0]}/${summary.missing[1]}`;
}
