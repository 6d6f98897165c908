/**
 * BSA Stream Constants
 *
 * Pulse IDs are the low 14 bits of the nanoseconds field of a BSA timestamp,
 * ticking at the 360Hz fiducial rate.
 */

export const PULSE_ID_BITS = 14;
export const PULSE_ID_MASK = 0x3fff;
export const PULSE_ID_MODULUS = 2 ** PULSE_ID_BITS;

// Fiducial (pulse ID tick) rate
export const FIDUCIAL_RATE_HZ = 360.0;

// Length of every BSA history buffer
export const BSA_BUFFER_LENGTH = 2800;

// History edef suffix buckets, selected from the current sample rate
export enum HistorySuffix {
  ONE_HERTZ = '1H',
  TEN_HERTZ = 'TH',
  HIGH_HERTZ = 'HH',
  BEAM_RATE = 'BR'
}

export const HISTORY_RATE_THRESHOLD_HZ = 10.0;

// Refresh loop defaults
export const DEFAULT_REFRESH_INTERVAL_MS = 1000;
export const MIN_REFRESH_INTERVAL_MS = 50;
