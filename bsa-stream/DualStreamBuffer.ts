/**
 * Dual BSA Stream Buffer
 *
 * Paired, synchronized BSA data for ch1 & ch2 on one beamline.
 * Streams with two underlying StreamBuffers and synchronizes on request, so
 * up to 2800 points of aligned data are available at any time.
 */

import { StreamLogger } from '../shared/StreamLogger';
import { TypedEventEmitter } from '../shared/TypedEventEmitter';
import { Beamline, resolveBeamline } from './beamlines';
import { PulseAligner } from './PulseAligner';
import { StreamBuffer, validateChannel } from './StreamBuffer';
import {
  AlignedFrame,
  ChannelSource,
  DualStreamConfig,
  DualStreamEvents,
  PulseId,
  StreamOptions,
} from './types';

const CATEGORY = 'BSA_DUAL_STREAM';

export class DualStreamBuffer extends TypedEventEmitter<DualStreamEvents> {
  private streamA: StreamBuffer;
  private streamB: StreamBuffer;
  private lastSyncedPulseId: PulseId = -1;
  private lastSyncedPointCount = -1;

  constructor(config: DualStreamConfig, private readonly source: ChannelSource, private readonly options: StreamOptions = {}) {
    super();
    const [streamA, streamB] = this.createStreams(config);
    this.streamA = streamA;
    this.streamB = streamB;
  }

  static async open(config: DualStreamConfig, source: ChannelSource, options: StreamOptions = {}): Promise<DualStreamBuffer> {
    const dual = new DualStreamBuffer(config, source, options);
    await dual.initialize(true);
    return dual;
  }

  /**
   * Initialize both streams. Resolves true only when both came up.
   * With raiseOnFailure, a failing stream stops its sibling before the error propagates.
   */
  async initialize(raiseOnFailure: boolean = false): Promise<boolean> {
    try {
      const results = await Promise.all([
        this.streamA.initialize(raiseOnFailure),
        this.streamB.initialize(raiseOnFailure),
      ]);
      return results.every(Boolean);
    } catch (error) {
      StreamLogger.error(CATEGORY, `${this.beamline} dual stream init with [${this.ch1}, ${this.ch2}] failed`);
      this.stop();
      throw error;
    }
  }

  /**
   * Validate the change, stop both streams and rebuild them.
   * @throws ConfigurationError synchronously, before anything is torn down
   */
  reconfigure(changes: Partial<DualStreamConfig>, raiseOnFailure: boolean = false): Promise<boolean> {
    const next: DualStreamConfig = {
      ch1: changes.ch1 ?? this.ch1,
      ch2: changes.ch2 ?? this.ch2,
      beamline: changes.beamline ?? this.beamline,
    };
    // validate everything before tearing down the running streams
    validateChannel(next.ch1);
    validateChannel(next.ch2);
    resolveBeamline(next.beamline);

    this.stop();
    [this.streamA, this.streamB] = this.createStreams(next);
    return this.initialize(raiseOnFailure);
  }

  /**
   * Aligned [ch1, ch2] rows (equal length, <= 2800) and the newest pulse ID they share.
   * Takes the two snapshots independently, so they can be up to one update apart.
   */
  align(): AlignedFrame {
    const a = this.streamA.snapshot();
    const b = this.streamB.snapshot();
    const frame = PulseAligner.align(a, b, this.streamA.rateTiming);

    this.lastSyncedPulseId = frame.pulseId;
    this.lastSyncedPointCount = frame.syncedPointCount;
    return frame;
  }

  stop(): void {
    this.streamA.stop();
    this.streamB.stop();
  }

  get ch1(): string {
    return this.streamA.channel;
  }

  get ch2(): string {
    return this.streamB.channel;
  }

  get beamline(): Beamline {
    return this.streamA.beamline;
  }

  get latestSyncedPulseId(): PulseId {
    return this.lastSyncedPulseId;
  }

  get syncedPointCount(): number {
    return this.lastSyncedPointCount;
  }

  // Rate-derived quantities are shared by both channels; they come from ch1's stream
  get sampleRate(): number {
    return this.streamA.sampleRate;
  }

  get sampleSpacing(): number {
    return this.streamA.sampleSpacing;
  }

  get ticksPerSample(): number {
    return this.streamA.ticksPerSample;
  }

  get bufferModulus(): number {
    return this.streamA.bufferModulus;
  }

  get isReady(): boolean {
    return this.streamA.isReady && this.streamB.isReady;
  }

  private createStreams(config: DualStreamConfig): [StreamBuffer, StreamBuffer] {
    const streams: [StreamBuffer, StreamBuffer] = [
      new StreamBuffer({ channel: config.ch1, beamline: config.beamline }, this.source, this.options),
      new StreamBuffer({ channel: config.ch2, beamline: config.beamline }, this.source, this.options),
    ];
    for (const stream of streams) {
      stream.on('missedPulses', (event) => this.emit('missedPulses', event));
      stream.on('initFailed', (event) => this.emit('initFailed', event));
    }
    return streams;
  }
}
