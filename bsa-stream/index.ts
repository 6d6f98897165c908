/**
 * BSA Stream Module - Public API
 *
 * Real-time beam-synchronous acquisition buffers: one ring buffer per
 * channel, plus pulse-ID alignment of two channels for correlation.
 */

export { StreamBuffer } from './StreamBuffer';
export { DualStreamBuffer } from './DualStreamBuffer';
export { PulseAligner } from './PulseAligner';
export { RingBuffer } from './RingBuffer';
export { SnapshotPoller } from './SnapshotPoller';
export { InMemoryChannelSource } from './adapters/InMemoryChannelSource';

export {
  Beamline,
  Facility,
  BEAMLINES,
  DEFAULT_CHANNELS,
  FACILITY_MAX_RATE_HZ,
  facilityMaxRate,
  historyChannel,
  isBeamline,
  resolveBeamline,
  selectHistorySuffix
} from './beamlines';

export {
  BSA_BUFFER_LENGTH,
  FIDUCIAL_RATE_HZ,
  PULSE_ID_MODULUS,
  HistorySuffix
} from './constants';

export { ConfigurationError, StreamInitError } from './errors';
export { nsToPulseId, pulseIdDelta, wrapPulseId } from './pulseId';
export { computeRateTiming } from './RateTiming';
export { loadStreamConfig } from './config';
export { summarizeFrame, formatFrameSummary } from './frameSummary';

export type { BeamlineConfig } from './beamlines';
export type { WatchConfig } from './config';
export type { FrameSummary } from './frameSummary';
export type { SnapshotPollerEvents } from './SnapshotPoller';
export type {
  AlignedFrame,
  ChannelReading,
  ChannelSource,
  ChannelSubscription,
  ChannelUpdate,
  DualStreamConfig,
  MissedPulseEvent,
  PulseId,
  RateTiming,
  StreamConfig,
  StreamOptions,
  StreamSnapshot
} from './types';
