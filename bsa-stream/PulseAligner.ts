/**
 * Pulse Aligner
 *
 * Lines up two BSA buffers whose newest elements carry different pulse IDs:
 * - Converts the pulse ID delta into a shot offset at the current rate
 * - Resolves 14-bit counter rollover by comparing the raw shot delta against
 *   the delta shifted by one buffer modulus and keeping the smaller
 * - Slices both buffers down to the overlapping window
 */

import { AlignedFrame, RateTiming, StreamSnapshot } from './types';

type AlignmentTiming = Pick<RateTiming, 'ticksPerSample' | 'bufferModulus'>;

export class PulseAligner {
  /**
   * Signed shot offset for a pulse ID delta `dp = pB - pA`.
   * > 0 means A lags B, < 0 means B lags A. NaN when there is no beam.
   */
  static resolveShotOffset(dp: number, ticksPerSample: number, bufferModulus: number): number {
    if (!Number.isFinite(ticksPerSample) || !Number.isFinite(bufferModulus)) {
      return NaN;
    }

    const rawShotDelta = Math.trunc(dp / ticksPerSample);
    if (rawShotDelta === 0) return 0;

    // when the raw delta equals the buffer modulus the rollover delta is 0
    const rolloverShotDelta = rawShotDelta - Math.sign(rawShotDelta) * bufferModulus;

    return Math.abs(rolloverShotDelta) < Math.abs(rawShotDelta) ? rolloverShotDelta : rawShotDelta;
  }

  /**
   * Aligns snapshot B against snapshot A.
   * Degenerate inputs (no beam, offset past the buffer length) give two empty rows.
   */
  static align(a: StreamSnapshot, b: StreamSnapshot, timing: AlignmentTiming): AlignedFrame {
    const length = Math.min(a.buffer.length, b.buffer.length);
    const dp = b.pulseId - a.pulseId;

    if (dp === 0) {
      return { buffers: [a.buffer, b.buffer], pulseId: a.pulseId, syncedPointCount: length, offset: 0 };
    }

    const offset = this.resolveShotOffset(dp, timing.ticksPerSample, timing.bufferModulus);
    const fallbackPulseId = Math.min(a.pulseId, b.pulseId);

    if (Number.isNaN(offset)) {
      return this.emptyFrame(fallbackPulseId, offset);
    }
    if (offset === 0) {
      return { buffers: [a.buffer, b.buffer], pulseId: fallbackPulseId, syncedPointCount: length, offset };
    }

    const syncedPointCount = length - Math.abs(offset);
    if (syncedPointCount <= 0) {
      return this.emptyFrame(fallbackPulseId, offset);
    }

    // the lagging stream's newest element is the newest point both streams share
    if (offset > 0) {
      return {
        buffers: [a.buffer.slice(offset, offset + syncedPointCount), b.buffer.slice(0, syncedPointCount)],
        pulseId: a.pulseId,
        syncedPointCount,
        offset,
      };
    }

    return {
      buffers: [a.buffer.slice(0, syncedPointCount), b.buffer.slice(-offset, -offset + syncedPointCount)],
      pulseId: b.pulseId,
      syncedPointCount,
      offset,
    };
  }

  private static emptyFrame(pulseId: number, offset: number): AlignedFrame {
    return {
      buffers: [new Float64Array(0), new Float64Array(0)],
      pulseId,
      syncedPointCount: 0,
      offset,
    };
  }
}
