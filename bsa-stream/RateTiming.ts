/**
 * Derived timing constants for a BSA sample rate.
 */

import { FIDUCIAL_RATE_HZ, PULSE_ID_MODULUS } from './constants';
import { RateTiming } from './types';

export const NO_BEAM_TIMING: Readonly<RateTiming> = Object.freeze({
  sampleRate: NaN,
  sampleSpacing: NaN,
  ticksPerSample: NaN,
  bufferModulus: NaN,
});

export function hasBeam(rate: number | null | undefined): rate is number {
  return typeof rate === 'number' && Number.isFinite(rate) && rate > 0;
}

/**
 * Clamps the external rate to the facility max and recomputes
 * spacing, ticks per sample and the pulse ID buffer modulus.
 * Zero, negative or missing rates mean no beam: everything is NaN.
 */
export function computeRateTiming(rate: number | null | undefined, maxRate: number): RateTiming {
  if (!hasBeam(rate)) {
    return { ...NO_BEAM_TIMING };
  }

  const sampleRate = Math.min(rate, maxRate);
  const ticksPerSample = FIDUCIAL_RATE_HZ / sampleRate;

  return {
    sampleRate,
    sampleSpacing: 1.0 / sampleRate,
    ticksPerSample,
    bufferModulus: Math.floor(PULSE_ID_MODULUS / ticksPerSample),
  };
}
