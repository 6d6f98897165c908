/**
 * Streams two BSA channels and prints one aligned-frame summary per refresh.
 *
 * Run with: npx tsx scripts/watch-correlation.ts [--simulate]
 * Configuration comes from PVWS_URL, BSA_BEAMLINE, BSA_CH1, BSA_CH2, BSA_REFRESH_MS
 * and BSA_QUIET, read from the environment or .env.local at the project root.
 */

import { config as loadEnv } from 'dotenv';
import { resolve } from 'path';
import {
  BEAMLINES,
  BSA_BUFFER_LENGTH,
  DualStreamBuffer,
  FIDUCIAL_RATE_HZ,
  InMemoryChannelSource,
  PULSE_ID_MODULUS,
  SnapshotPoller,
  formatFrameSummary,
  historyChannel,
  loadStreamConfig,
  summarizeFrame,
} from '../bsa-stream';
import type { ChannelSource, WatchConfig } from '../bsa-stream';
import { PvwsChannelSource } from '../pvws-client';
import { StreamLogger } from '../shared/StreamLogger';

const SIMULATED_RATE_HZ = 10;
const SIMULATED_DROP_PROBABILITY = 0.02;

interface Simulation {
  source: InMemoryChannelSource;
  stop(): void;
}

/**
 * Seeds an in-memory source with a rate, both history buffers and a live
 * pulse train that occasionally drops a pulse on one channel.
 */
function startSimulation(config: WatchConfig): Simulation {
  const source = new InMemoryChannelSource();
  const ticksPerSample = FIDUCIAL_RATE_HZ / SIMULATED_RATE_HZ;
  let pulseId = 0;

  source.setValue(BEAMLINES[config.beamline].rateSource, SIMULATED_RATE_HZ);
  for (const channel of [config.ch1, config.ch2]) {
    const history = Array.from({ length: BSA_BUFFER_LENGTH }, (_, i) => Math.sin(i / 20));
    source.setWaveform(historyChannel(channel, config.beamline, SIMULATED_RATE_HZ), history, pulseId);
  }

  const timer = setInterval(() => {
    pulseId = (pulseId + ticksPerSample) % PULSE_ID_MODULUS;
    const signal = Math.sin(Date.now() / 1000);
    source.publish(config.ch1, signal + Math.random() * 0.1, pulseId);
    if (Math.random() > SIMULATED_DROP_PROBABILITY) {
      source.publish(config.ch2, 2 * signal + Math.random() * 0.1, pulseId);
    }
  }, 1000 / SIMULATED_RATE_HZ);

  return { source, stop: () => clearInterval(timer) };
}

async function main(): Promise<void> {
  loadEnv({ path: resolve(__dirname, '..', '.env.local') });
  const config = loadStreamConfig(process.env);
  const simulate = process.argv.includes('--simulate');

  let source: ChannelSource;
  let shutdownSource: () => void;
  if (simulate) {
    const simulation = startSimulation(config);
    source = simulation.source;
    shutdownSource = simulation.stop;
  } else {
    const pvws = new PvwsChannelSource(config.pvwsUrl);
    await pvws.connect();
    source = pvws;
    shutdownSource = () => pvws.close();
  }

  StreamLogger.info('WATCH', `${config.beamline}: ${config.ch1} vs ${config.ch2}${simulate ? ' (simulated)' : ''}`);
  const dual = await DualStreamBuffer.open(
    { ch1: config.ch1, ch2: config.ch2, beamline: config.beamline },
    source,
    { quiet: config.quiet }
  );

  const poller = new SnapshotPoller(() => dual.align(), config.refreshIntervalMs);
  poller.on('frame', (frame) => console.log(formatFrameSummary(summarizeFrame(frame))));
  poller.start();

  process.once('SIGINT', () => {
    poller.stop();
    dual.stop();
    shutdownSource();
    StreamLogger.info('WATCH', 'Stopped');
  });
}

main().catch((error: unknown) => {
  StreamLogger.error('WATCH', 'Failed to start', error);
  process.exitCode = 1;
});
