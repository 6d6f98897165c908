/**
 * BSA Stream Buffer
 *
 * Streams one BSA channel in real time into a 2800-point ring buffer:
 * 1. Seed the buffer from the channel's history edef
 * 2. Append each live update, padding missed pulses with NaN
 * 3. Track the beam rate to keep ticks-per-sample current
 *
 * Example:
 *   const stream = await StreamBuffer.open({ channel: 'BLEN:LI21:265:AIMAX', beamline: 'NC_HXR' }, source);
 *   const { buffer, pulseId } = stream.snapshot();
 */

import { StreamLogger } from '../shared/StreamLogger';
import { TypedEventEmitter } from '../shared/TypedEventEmitter';
import { Beamline, BEAMLINES, facilityMaxRate, historyChannel, resolveBeamline } from './beamlines';
import { BSA_BUFFER_LENGTH } from './constants';
import { ConfigurationError, StreamInitError, describeError } from './errors';
import { nsToPulseId, pulseIdDelta, wrapPulseId } from './pulseId';
import { computeRateTiming, hasBeam, NO_BEAM_TIMING } from './RateTiming';
import { RingBuffer } from './RingBuffer';
import {
  ChannelSource,
  ChannelSubscription,
  PulseId,
  RateTiming,
  StreamConfig,
  StreamEvents,
  StreamOptions,
  StreamSnapshot,
} from './types';

const CATEGORY = 'BSA_STREAM';

interface ResolvedStreamConfig {
  channel: string;
  beamline: Beamline;
}

export function validateChannel(channel: string): string {
  const trimmed = channel.trim();
  if (trimmed.length === 0) {
    throw new ConfigurationError('Channel address must not be empty');
  }
  return trimmed;
}

export class StreamBuffer extends TypedEventEmitter<StreamEvents> {
  private config: ResolvedStreamConfig;
  private readonly ring = new RingBuffer(BSA_BUFFER_LENGTH);
  private timing: RateTiming = { ...NO_BEAM_TIMING };
  private pLatest: PulseId = 0;
  private pPrevious: PulseId = NaN;
  private ready = false;
  private readonly quiet: boolean;

  private valueSubscription: ChannelSubscription | null = null;
  private rateSubscription: ChannelSubscription | null = null;

  // Bumped by every (re)initialization and by stop(); callbacks from older generations are dropped
  private generation = 0;
  // Bumped only by stop(); an init queued before a stop never runs
  private stopCount = 0;
  // Serializes (re)initializations
  private initLock: Promise<unknown> = Promise.resolve();

  /**
   * @throws ConfigurationError for an unknown beamline or empty channel
   */
  constructor(config: StreamConfig, private readonly source: ChannelSource, options: StreamOptions = {}) {
    super();
    this.config = {
      channel: validateChannel(config.channel),
      beamline: resolveBeamline(config.beamline).beamline,
    };
    this.quiet = options.quiet ?? false;
  }

  /**
   * Build and initialize a stream; initialization failures are thrown as StreamInitError.
   */
  static async open(config: StreamConfig, source: ChannelSource, options: StreamOptions = {}): Promise<StreamBuffer> {
    const stream = new StreamBuffer(config, source, options);
    await stream.initialize(true);
    return stream;
  }

  /**
   * (Re)initialize from the current configuration.
   * With raiseOnFailure=false a failure leaves the stream disabled and resolves false,
   * which allows intermediate invalid channel/beamline combos during reconfiguration.
   * Resolves false without subscribing when stop() is called before the init runs.
   */
  initialize(raiseOnFailure: boolean = false): Promise<boolean> {
    const stopsAtRequest = this.stopCount;
    const run = this.initLock.then(() => this.runInit(raiseOnFailure, stopsAtRequest));
    // failures reach the caller through `run`; the lock only orders the next init
    this.initLock = run.catch(() => undefined);
    return run;
  }

  /**
   * Validate a configuration change, then tear down and rebuild the stream.
   * @throws ConfigurationError synchronously, before anything is torn down
   */
  reconfigure(changes: Partial<StreamConfig>, raiseOnFailure: boolean = false): Promise<boolean> {
    const next: ResolvedStreamConfig = {
      channel: changes.channel !== undefined ? validateChannel(changes.channel) : this.config.channel,
      beamline: changes.beamline !== undefined ? resolveBeamline(changes.beamline).beamline : this.config.beamline,
    };
    this.config = next;
    return this.initialize(raiseOnFailure);
  }

  /**
   * Copy of the 2800-point buffer (oldest first) and the pulse ID of its newest element.
   */
  snapshot(): StreamSnapshot {
    return { buffer: this.ring.toArray(), pulseId: this.pLatest };
  }

  /**
   * Append a live update. Runs on the subscription delivery path, so nothing is thrown.
   */
  onValueUpdate(value: number, nanoseconds: number): void {
    try {
      if (!this.ready || !hasBeam(this.timing.sampleRate)) return;

      const { ticksPerSample } = this.timing;
      const newId = nsToPulseId(nanoseconds);
      const expectedId = wrapPulseId(this.pLatest + ticksPerSample);
      const missed = Math.trunc(pulseIdDelta(expectedId, newId) / ticksPerSample);

      if (missed > 0) {
        this.ring.shiftWithGap(missed);
        this.reportMissedPulses(missed, newId);
      }

      // buffer and pulse IDs change together, inside one synchronous block
      this.ring.push(value);
      this.pPrevious = this.pLatest;
      this.pLatest = newId;
    } catch (error) {
      StreamLogger.error(CATEGORY, `${this.config.channel} update dropped`, error);
    }
  }

  /**
   * Track the beam rate. Never touches the buffer.
   */
  onRateUpdate(value: number | null | undefined): void {
    this.timing = computeRateTiming(value, facilityMaxRate(this.config.beamline));
    StreamLogger.debug(CATEGORY, `${this.config.beamline} rate ${this.timing.sampleRate}Hz`);
    this.emit('rateChanged', { ...this.timing });
  }

  /**
   * Detach from the value and rate channels. Idempotent.
   */
  stop(): void {
    this.stopCount++;
    this.generation++;
    this.ready = false;
    this.detach();
  }

  get channel(): string {
    return this.config.channel;
  }

  get beamline(): Beamline {
    return this.config.beamline;
  }

  get sampleRate(): number {
    return this.timing.sampleRate;
  }

  get sampleSpacing(): number {
    return this.timing.sampleSpacing;
  }

  get ticksPerSample(): number {
    return this.timing.ticksPerSample;
  }

  get bufferModulus(): number {
    return this.timing.bufferModulus;
  }

  get rateTiming(): RateTiming {
    return { ...this.timing };
  }

  get latestPulseId(): PulseId {
    return this.pLatest;
  }

  get previousPulseId(): PulseId {
    return this.pPrevious;
  }

  get isReady(): boolean {
    return this.ready;
  }

  private async runInit(raiseOnFailure: boolean, stopsAtRequest: number): Promise<boolean> {
    if (this.stopCount !== stopsAtRequest) {
      StreamLogger.debug(CATEGORY, `${this.config.channel} init cancelled by stop()`);
      return false;
    }
    const generation = ++this.generation;
    const { channel, beamline } = this.config;
    const { rateSource } = BEAMLINES[beamline];

    this.ready = false;
    this.detach();

    let rateSubscription: ChannelSubscription | null = null;
    let valueSubscription: ChannelSubscription | null = null;
    const release = (): void => {
      rateSubscription?.unsubscribe();
      valueSubscription?.unsubscribe();
    };

    try {
      rateSubscription = await this.source.subscribe(rateSource, (update) => {
        if (generation === this.generation) this.onRateUpdate(update.value);
      });

      // use whatever the fastest-populating edef is for the current beam rate
      const rate = await this.source.get(rateSource);
      if (typeof rate.value !== 'number') {
        throw new Error(`Rate source ${rateSource} returned a waveform`);
      }
      if (generation !== this.generation) {
        release();
        return false;
      }
      this.onRateUpdate(rate.value);

      const historyAddress = historyChannel(channel, beamline, this.timing.sampleRate);
      const history = await this.source.get(historyAddress);
      if (typeof history.value === 'number' || history.value.length !== BSA_BUFFER_LENGTH) {
        const got = typeof history.value === 'number' ? 'a scalar' : `${history.value.length} points`;
        throw new Error(`History buffer ${historyAddress} has ${got}, expected ${BSA_BUFFER_LENGTH} points`);
      }
      if (generation !== this.generation) {
        release();
        return false;
      }

      // initial population from the history buffer, then connect the live stream
      this.ring.load(history.value);
      this.pLatest = nsToPulseId(history.nanoseconds);
      this.pPrevious = wrapPulseId(this.pLatest - this.timing.ticksPerSample);
      this.ready = true;

      valueSubscription = await this.source.subscribe(channel, (update) => {
        if (generation === this.generation) this.onValueUpdate(update.value, update.nanoseconds);
      });
      if (generation !== this.generation) {
        release();
        return false;
      }

      this.rateSubscription = rateSubscription;
      this.valueSubscription = valueSubscription;

      StreamLogger.info(CATEGORY, `✅ ${beamline} ${channel} streaming from ${historyAddress} (pulse ID ${this.pLatest})`);
      this.emit('ready', { channel, beamline, pulseId: this.pLatest });
      return true;
    } catch (error) {
      release();
      if (generation === this.generation) {
        this.ready = false;
      }

      const initError = new StreamInitError(
        `${beamline} stream init for ${channel} failed: ${describeError(error)}`,
        channel,
        beamline,
        { cause: error }
      );

      if (raiseOnFailure) {
        StreamLogger.error(CATEGORY, initError.message);
        throw initError;
      }

      StreamLogger.warn(CATEGORY, `Invalid stream definition: ${beamline} ${channel}`, describeError(error));
      this.emit('initFailed', { channel, beamline, error: initError });
      return false;
    }
  }

  private reportMissedPulses(missed: number, newId: PulseId): void {
    const event = {
      channel: this.config.channel,
      missed,
      previousPulseId: this.pLatest,
      newPulseId: newId,
    };
    if (!this.quiet) {
      StreamLogger.info(CATEGORY, `${event.channel} missed ${missed} pulses: ${event.previousPulseId}->${newId}`);
    }
    this.emit('missedPulses', event);
  }

  private detach(): void {
    this.valueSubscription?.unsubscribe();
    this.rateSubscription?.unsubscribe();
    this.valueSubscription = null;
    this.rateSubscription = null;
  }
}
