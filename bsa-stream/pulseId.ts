/**
 * Pulse ID arithmetic.
 * All helpers work modulo 2^14 and tolerate NaN inputs (no beam) by returning NaN.
 */

import { PULSE_ID_MASK, PULSE_ID_MODULUS } from './constants';
import { PulseId } from './types';

// Pulse ID lives in the lower 14 bits of the nanoseconds field
export function nsToPulseId(nanoseconds: number): PulseId {
  return nanoseconds & PULSE_ID_MASK;
}

// Maps any (possibly negative or fractional) tick count into [0, 2^14)
export function wrapPulseId(ticks: number): number {
  return ((ticks % PULSE_ID_MODULUS) + PULSE_ID_MODULUS) % PULSE_ID_MODULUS;
}

/**
 * Signed distance from `from` to `to` in ticks, in [-2^13, 2^13).
 * A counter that wrapped between the two reads yields a small positive delta
 * instead of a large negative one.
 */
export function pulseIdDelta(from: number, to: number): number {
  const half = PULSE_ID_MODULUS / 2;
  return wrapPulseId(to - from + half) - half;
}
