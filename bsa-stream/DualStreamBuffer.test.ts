import { InMemoryChannelSource } from './adapters/InMemoryChannelSource';
import { Beamline, BEAMLINES } from './beamlines';
import { BSA_BUFFER_LENGTH } from './constants';
import { ConfigurationError, StreamInitError } from './errors';
import { DualStreamBuffer } from './DualStreamBuffer';
import { DualStreamConfig, MissedPulseEvent } from './types';

const CH1 = 'BLEN:LI21:265:AIMAX';
const CH2 = 'GDET:FEE1:241:ENRC';
const CH3 = 'BPMS:LTUH:250:X';
const RATE_PV = BEAMLINES[Beamline.NC_HXR].rateSource;
const CONFIG: DualStreamConfig = { ch1: CH1, ch2: CH2, beamline: Beamline.NC_HXR };

function ns(pulseId: number): number {
  return (123 << 14) | pulseId;
}

function ramp(start: number): number[] {
  return Array.from({ length: BSA_BUFFER_LENGTH }, (_, i) => start + i);
}

describe('DualStreamBuffer', () => {
  let source: InMemoryChannelSource;

  beforeEach(() => {
    source = new InMemoryChannelSource();
    source.setValue(RATE_PV, 60);
    source.setWaveform(`${CH1}HSTCUHTH`, ramp(0), ns(600));
    source.setWaveform(`${CH2}HSTCUHTH`, ramp(10000), ns(600));
    source.setWaveform(`${CH3}HSTCUHTH`, ramp(20000), ns(600));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns full buffers when both streams share a pulse ID', async () => {
    const dual = await DualStreamBuffer.open(CONFIG, source);
    const frame = dual.align();

    expect(Array.from(frame.buffers[0])).toEqual(ramp(0));
    expect(Array.from(frame.buffers[1])).toEqual(ramp(10000));
    expect(frame.pulseId).toBe(600);
    expect(dual.latestSyncedPulseId).toBe(600);
    expect(dual.syncedPointCount).toBe(2800);
  });

  it('starts with no synced frame', () => {
    const dual = new DualStreamBuffer(CONFIG, source);

    expect(dual.latestSyncedPulseId).toBe(-1);
    expect(dual.syncedPointCount).toBe(-1);
    expect(dual.isReady).toBe(false);
  });

  it('trims the leading stream to the pulses both have seen', async () => {
    const dual = await DualStreamBuffer.open(CONFIG, source);
    for (let i = 1; i <= 3; i++) {
      source.publish(CH2, -i, ns(600 + 6 * i));
    }

    const frame = dual.align();

    expect(frame.offset).toBe(3);
    expect(frame.pulseId).toBe(600);
    expect(frame.syncedPointCount).toBe(2797);
    expect(frame.buffers[0][0]).toBe(3);
    expect(frame.buffers[0][2796]).toBe(2799);
    expect(frame.buffers[1][0]).toBe(10003);
    expect(frame.buffers[1][2796]).toBe(12799);
    expect(dual.syncedPointCount).toBe(2797);
  });

  it('returns empty rows when the beam drops while the streams disagree', async () => {
    const dual = await DualStreamBuffer.open(CONFIG, source);
    source.publish(CH1, -1, ns(606));
    source.publish(RATE_PV, 0);

    const frame = dual.align();

    expect(frame.syncedPointCount).toBe(0);
    expect(frame.buffers[0]).toHaveLength(0);
    expect(frame.pulseId).toBe(600);
    expect(dual.sampleRate).toBeNaN();
  });

  it('shares the rate-derived timing', async () => {
    const dual = await DualStreamBuffer.open(CONFIG, source);

    expect(dual.isReady).toBe(true);
    expect(dual.sampleRate).toBe(60);
    expect(dual.sampleSpacing).toBe(1 / 60);
    expect(dual.ticksPerSample).toBe(6);
    expect(dual.bufferModulus).toBe(2730);
    expect(source.subscriberCount(RATE_PV)).toBe(2);
  });

  it('forwards missed pulses from either channel', async () => {
    const dual = await DualStreamBuffer.open(CONFIG, source, { quiet: true });
    const events: MissedPulseEvent[] = [];
    dual.on('missedPulses', (event) => events.push(event));

    source.publish(CH2, -1, ns(618));

    expect(events).toEqual([{ channel: CH2, missed: 2, previousPulseId: 600, newPulseId: 618 }]);
  });

  it('stops the sibling when one channel fails to initialize', async () => {
    source.failOn(CH2);

    await expect(DualStreamBuffer.open(CONFIG, source)).rejects.toBeInstanceOf(StreamInitError);
    // let the sibling's init settle
    await new Promise((resolve) => setImmediate(resolve));
    expect(source.subscriberCount(CH1)).toBe(0);
    expect(source.subscriberCount(RATE_PV)).toBe(0);
  });

  it('resolves false and forwards initFailed when not raising', async () => {
    source.failOn(CH2);
    const dual = new DualStreamBuffer(CONFIG, source);
    const onFailed = jest.fn();
    dual.on('initFailed', onFailed);

    await expect(dual.initialize()).resolves.toBe(false);
    expect(onFailed).toHaveBeenCalledTimes(1);
    expect(onFailed.mock.calls[0][0].channel).toBe(CH2);
    expect(dual.isReady).toBe(false);
  });

  it('rebuilds both streams on reconfigure', async () => {
    const dual = await DualStreamBuffer.open(CONFIG, source);

    await expect(dual.reconfigure({ ch2: CH3 }, true)).resolves.toBe(true);

    expect(dual.ch1).toBe(CH1);
    expect(dual.ch2).toBe(CH3);
    expect(source.subscriberCount(CH2)).toBe(0);
    expect(source.subscriberCount(CH3)).toBe(1);
    expect(source.subscriberCount(CH1)).toBe(1);
    expect(dual.align().buffers[1][0]).toBe(20000);
  });

  it('keeps the running streams when a reconfiguration is invalid', async () => {
    const dual = await DualStreamBuffer.open(CONFIG, source);

    expect(() => dual.reconfigure({ beamline: 'LCLS' })).toThrow(ConfigurationError);
    expect(() => dual.reconfigure({ ch1: '' })).toThrow(ConfigurationError);
    expect(dual.isReady).toBe(true);
    expect(source.subscriberCount(CH1)).toBe(1);
  });

  it('cancels a pending reconfiguration when stopped', async () => {
    const dual = await DualStreamBuffer.open(CONFIG, source);

    const pending = dual.reconfigure({ ch2: CH3 });
    dual.stop();

    await expect(pending).resolves.toBe(false);
    source.publish(CH3, -1, ns(606));
    expect(dual.isReady).toBe(false);
    expect(source.subscriberCount(CH1)).toBe(0);
    expect(source.subscriberCount(CH2)).toBe(0);
    expect(source.subscriberCount(CH3)).toBe(0);
    expect(source.subscriberCount(RATE_PV)).toBe(0);
  });

  it('releases every subscription on stop', async () => {
    const dual = await DualStreamBuffer.open(CONFIG, source);
    dual.stop();

    expect(source.subscriberCount(CH1)).toBe(0);
    expect(source.subscriberCount(CH2)).toBe(0);
    expect(source.subscriberCount(RATE_PV)).toBe(0);
  });
});
