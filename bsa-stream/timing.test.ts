import { Beamline, facilityMaxRate, historyChannel, resolveBeamline, selectHistorySuffix } from './beamlines';
import { HistorySuffix } from './constants';
import { ConfigurationError } from './errors';
import { nsToPulseId, pulseIdDelta, wrapPulseId } from './pulseId';
import { computeRateTiming, hasBeam } from './RateTiming';

describe('pulse IDs', () => {
  it('takes the low 14 bits of the nanoseconds field', () => {
    expect(nsToPulseId(0x12345678)).toBe(0x1678);
    expect(nsToPulseId((123 << 14) | 600)).toBe(600);
    expect(nsToPulseId(999_999_999)).toBe(999_999_999 & 0x3fff);
  });

  it('wraps into [0, 16384)', () => {
    expect(wrapPulseId(-6)).toBe(16378);
    expect(wrapPulseId(16390)).toBe(6);
    expect(wrapPulseId(42)).toBe(42);
  });

  it('measures the shortest signed distance across rollover', () => {
    expect(pulseIdDelta(100, 118)).toBe(18);
    expect(pulseIdDelta(16380, 2)).toBe(6);
    expect(pulseIdDelta(2, 16380)).toBe(-6);
  });
});

describe('computeRateTiming', () => {
  it('derives spacing, ticks and modulus from the rate', () => {
    expect(computeRateTiming(60, 120)).toEqual({
      sampleRate: 60,
      sampleSpacing: 1 / 60,
      ticksPerSample: 6,
      bufferModulus: 2730,
    });
  });

  it('clamps to the facility max rate', () => {
    const timing = computeRateTiming(1000, 120);
    expect(timing.sampleRate).toBe(120);
    expect(timing.ticksPerSample).toBe(3);
    expect(timing.bufferModulus).toBe(5461);
  });

  it('handles fractional ticks per sample at the superconducting max rate', () => {
    const timing = computeRateTiming(102, 102);
    expect(timing.ticksPerSample).toBeCloseTo(3.5294, 4);
    expect(timing.bufferModulus).toBe(4642);
  });

  it.each([0, -5, NaN, null, undefined])('treats rate %p as no beam', (rate) => {
    const timing = computeRateTiming(rate, 120);
    expect(hasBeam(rate)).toBe(false);
    expect(timing.sampleRate).toBeNaN();
    expect(timing.sampleSpacing).toBeNaN();
    expect(timing.ticksPerSample).toBeNaN();
    expect(timing.bufferModulus).toBeNaN();
  });
});

describe('beamlines', () => {
  it('resolves known names and rejects unknown ones', () => {
    expect(resolveBeamline('SC_SXR').rateSource).toBe('TPG:SYS0:1:DST04:RATE_RBV');
    expect(() => resolveBeamline('LCLS')).toThrow(ConfigurationError);
    expect(() => resolveBeamline('LCLS')).toThrow('LCLS is not a valid beamline');
  });

  it('looks up the facility max rate', () => {
    expect(facilityMaxRate(Beamline.NC_SXR)).toBe(120);
    expect(facilityMaxRate(Beamline.SC_BSYD)).toBe(102);
    expect(facilityMaxRate(Beamline.F2)).toBe(30);
  });

  it('picks the history suffix from the rate bucket', () => {
    expect(selectHistorySuffix(5, Beamline.NC_HXR)).toBe(HistorySuffix.ONE_HERTZ);
    expect(selectHistorySuffix(NaN, Beamline.SC_HXR)).toBe(HistorySuffix.ONE_HERTZ);
    expect(selectHistorySuffix(10, Beamline.F2)).toBe(HistorySuffix.TEN_HERTZ);
    expect(selectHistorySuffix(60, Beamline.NC_HXR)).toBe(HistorySuffix.TEN_HERTZ);
    expect(selectHistorySuffix(120, Beamline.NC_HXR)).toBe(HistorySuffix.BEAM_RATE);
    expect(selectHistorySuffix(102, Beamline.SC_SXR)).toBe(HistorySuffix.HIGH_HERTZ);
    expect(selectHistorySuffix(30, Beamline.F2)).toBe(HistorySuffix.BEAM_RATE);
  });

  it('builds history channel names', () => {
    expect(historyChannel('BLEN:LI21:265:AIMAX', Beamline.NC_HXR, 60)).toBe('BLEN:LI21:265:AIMAXHSTCUHTH');
    expect(historyChannel('BPMS:BC1B:125:X', Beamline.SC_BSYD, 102)).toBe('BPMS:BC1B:125:XHSTSCDHH');
    expect(historyChannel('BPMS:IN10:221:X', Beamline.F2, 1)).toBe('BPMS:IN10:221:XHST1H');
  });
});
