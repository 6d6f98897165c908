/**
 * Type definitions for BSA stream buffers
 */

import { Beamline } from './beamlines';

// 14-bit pulse counter, [0, 2^14)
export type PulseId = number;

// Beam-synchronous pulses per second; NaN when there is no beam
export type SampleRateHz = number;

// ─────────────────────────────────────────────────────────────────
// Channel source (subscription transport boundary)
// ─────────────────────────────────────────────────────────────────

// Live scalar update, as delivered by the subscription layer
export interface ChannelUpdate {
  value: number;
  nanoseconds: number;
}

// One-shot read; waveforms (history buffers) carry an array value
export interface ChannelReading {
  value: number | readonly number[];
  nanoseconds: number;
}

export interface ChannelSubscription {
  readonly address: string;
  unsubscribe(): void;
}

export type ChannelUpdateCallback = (update: ChannelUpdate) => void;

export interface ChannelSource {
  get(address: string): Promise<ChannelReading>;
  // Resolves once the channel is connected; updates flow until unsubscribe()
  subscribe(address: string, onUpdate: ChannelUpdateCallback): Promise<ChannelSubscription>;
}

// ─────────────────────────────────────────────────────────────────
// Stream configuration and reads
// ─────────────────────────────────────────────────────────────────

export interface StreamConfig {
  channel: string;
  beamline: Beamline | string;
}

export interface StreamOptions {
  // Suppress the missed-pulse log line (the event is still emitted)
  quiet?: boolean;
}

export interface DualStreamConfig {
  ch1: string;
  ch2: string;
  beamline: Beamline | string;
}

// Derived from the sample rate on every rate change
export interface RateTiming {
  sampleRate: SampleRateHz;
  sampleSpacing: number;
  ticksPerSample: number;
  bufferModulus: number;
}

export interface StreamSnapshot {
  buffer: Float64Array;
  pulseId: PulseId;
}

export interface AlignedFrame {
  // [channel 1 row, channel 2 row], equal length
  buffers: [Float64Array, Float64Array];
  // Lagging stream's newest pulse ID; equals min(pA, pB) unless a rollover separates them
  pulseId: PulseId;
  syncedPointCount: number;
  // Signed shot offset: > 0 means channel 1 lags channel 2
  offset: number;
}

// ─────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────

export interface MissedPulseEvent {
  channel: string;
  missed: number;
  previousPulseId: PulseId;
  newPulseId: PulseId;
}

export interface StreamEvents {
  ready: { channel: string; beamline: Beamline; pulseId: PulseId };
  initFailed: { channel: string; beamline: string; error: Error };
  missedPulses: MissedPulseEvent;
  rateChanged: RateTiming;
}

export interface DualStreamEvents {
  missedPulses: MissedPulseEvent;
  initFailed: { channel: string; beamline: string; error: Error };
}
