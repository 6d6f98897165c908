/**
 * Static beamline table: rate source, history naming and facility limits.
 */

import { HistorySuffix, HISTORY_RATE_THRESHOLD_HZ } from './constants';
import { ConfigurationError } from './errors';

export enum Beamline {
  NC_SXR = 'NC_SXR',
  NC_HXR = 'NC_HXR',
  SC_BSYD = 'SC_BSYD',
  SC_SXR = 'SC_SXR',
  SC_HXR = 'SC_HXR',
  F2 = 'F2'
}

export enum Facility {
  NC = 'NC',
  SC = 'SC',
  F2 = 'F2'
}

export interface BeamlineConfig {
  beamline: Beamline;
  facility: Facility;
  rateSource: string;
  historyPrefix: string;
}

// Fastest rate the BSA history buffers populate at, per facility
export const FACILITY_MAX_RATE_HZ: Record<Facility, number> = {
  [Facility.NC]: 120.0,
  [Facility.SC]: 102.0,
  [Facility.F2]: 30.0,
};

export const BEAMLINES: Record<Beamline, BeamlineConfig> = {
  [Beamline.NC_SXR]: {
    beamline: Beamline.NC_SXR,
    facility: Facility.NC,
    rateSource: 'EVNT:SYS0:1:NC_SOFTRATE',
    historyPrefix: 'HSTCUS',
  },
  [Beamline.NC_HXR]: {
    beamline: Beamline.NC_HXR,
    facility: Facility.NC,
    rateSource: 'EVNT:SYS0:1:NC_HARDRATE',
    historyPrefix: 'HSTCUH',
  },
  [Beamline.SC_BSYD]: {
    beamline: Beamline.SC_BSYD,
    facility: Facility.SC,
    rateSource: 'TPG:SYS0:1:DST02:RATE_RBV',
    historyPrefix: 'HSTSCD',
  },
  [Beamline.SC_SXR]: {
    beamline: Beamline.SC_SXR,
    facility: Facility.SC,
    rateSource: 'TPG:SYS0:1:DST04:RATE_RBV',
    historyPrefix: 'HSTSCS',
  },
  [Beamline.SC_HXR]: {
    beamline: Beamline.SC_HXR,
    facility: Facility.SC,
    rateSource: 'TPG:SYS0:1:DST03:RATE_RBV',
    historyPrefix: 'HSTSCH',
  },
  [Beamline.F2]: {
    beamline: Beamline.F2,
    facility: Facility.F2,
    rateSource: 'EVNT:SYS1:1:BEAMRATE',
    historyPrefix: 'HST',
  },
};

// Channel pair a correlation view opens with on each beamline
export const DEFAULT_CHANNELS: Record<Beamline, readonly [string, string]> = {
  [Beamline.NC_SXR]: ['BLEN:LI21:265:AIMAX', 'EM1K0:GMD:HPS:milliJoulesPerPulse'],
  [Beamline.NC_HXR]: ['BLEN:LI21:265:AIMAX', 'GDET:FEE1:241:ENRC'],
  [Beamline.SC_BSYD]: ['BPMS:BC1B:125:X', 'BPMS:BC1B:440:X'],
  [Beamline.SC_SXR]: ['BLEN:BC1B:850:1:BLEN', 'EM1K0:GMD:HPS:milliJoulesPerPulse'],
  [Beamline.SC_HXR]: ['BLEN:BC1B:850:1:BLEN', 'BLEN:BC2B:950:1:BLEN'],
  [Beamline.F2]: ['BPMS:IN10:221:X', 'BPMS:IN10:221:TMIT'],
};

const BEAMLINE_VALUES: ReadonlySet<string> = new Set(Object.values(Beamline));

export function isBeamline(value: string): value is Beamline {
  return BEAMLINE_VALUES.has(value);
}

/**
 * Validates a beamline name and returns its table entry.
 * @throws ConfigurationError for names outside the enum
 */
export function resolveBeamline(value: string): BeamlineConfig {
  if (!isBeamline(value)) {
    throw new ConfigurationError(`${value} is not a valid beamline`);
  }
  return BEAMLINES[value];
}

export function facilityMaxRate(beamline: Beamline): number {
  return FACILITY_MAX_RATE_HZ[BEAMLINES[beamline].facility];
}

/**
 * Picks the fastest-populating history edef for the current sample rate.
 */
export function selectHistorySuffix(sampleRate: number, beamline: Beamline): HistorySuffix {
  const { facility } = BEAMLINES[beamline];
  const maxRate = FACILITY_MAX_RATE_HZ[facility];

  if (!(sampleRate >= HISTORY_RATE_THRESHOLD_HZ)) {
    return HistorySuffix.ONE_HERTZ;
  }
  if (sampleRate < maxRate) {
    return HistorySuffix.TEN_HERTZ;
  }
  return facility === Facility.SC ? HistorySuffix.HIGH_HERTZ : HistorySuffix.BEAM_RATE;
}

export function historyChannel(channel: string, beamline: Beamline, sampleRate: number): string {
  return `${channel}${BEAMLINES[beamline].historyPrefix}${selectHistorySuffix(sampleRate, beamline)}`;
}
