import { Beamline, DEFAULT_CHANNELS, resolveBeamline } from './beamlines';
import { DEFAULT_REFRESH_INTERVAL_MS, MIN_REFRESH_INTERVAL_MS } from './constants';
import { ConfigurationError } from './errors';
import { DualStreamConfig } from './types';

export const DEFAULT_PVWS_URL = 'ws://localhost:8080/pvws/pv';
export const DEFAULT_BEAMLINE = Beamline.NC_HXR;

export interface WatchConfig extends DualStreamConfig {
  beamline: Beamline;
  pvwsUrl: string;
  refreshIntervalMs: number;
  quiet: boolean;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Builds the correlation watcher configuration from environment variables:
 * PVWS_URL, BSA_BEAMLINE, BSA_CH1, BSA_CH2, BSA_REFRESH_MS, BSA_QUIET.
 * Channels default to the beamline's standard pair.
 */
export function loadStreamConfig(env: Env = process.env): WatchConfig {
  const { beamline } = resolveBeamline(readString(env, 'BSA_BEAMLINE') ?? DEFAULT_BEAMLINE);
  const [defaultCh1, defaultCh2] = DEFAULT_CHANNELS[beamline];

  const pvwsUrl = readString(env, 'PVWS_URL') ?? DEFAULT_PVWS_URL;
  if (!/^wss?:\/\//.test(pvwsUrl)) {
    throw new ConfigurationError(`PVWS_URL must be a ws:// or wss:// URL, got ${pvwsUrl}`);
  }

  const refreshRaw = readString(env, 'BSA_REFRESH_MS');
  const refreshIntervalMs = refreshRaw === undefined ? DEFAULT_REFRESH_INTERVAL_MS : Number(refreshRaw);
  if (!Number.isFinite(refreshIntervalMs) || refreshIntervalMs < MIN_REFRESH_INTERVAL_MS) {
    throw new ConfigurationError(`BSA_REFRESH_MS must be a number >= ${MIN_REFRESH_INTERVAL_MS}, got ${refreshRaw}`);
  }

  return {
    beamline,
    ch1: readString(env, 'BSA_CH1') ?? defaultCh1,
    ch2: readString(env, 'BSA_CH2') ?? defaultCh2,
    pvwsUrl,
    refreshIntervalMs,
    quiet: readString(env, 'BSA_QUIET') === '1',
  };
}
