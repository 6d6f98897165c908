/**
 * PV Web Socket Channel Source
 *
 * ChannelSource over a PVWS gateway:
 * - One gateway subscription per PV, shared by every local holder
 * - The latest reading per PV is merged from partial updates
 * - Subscriptions are re-sent after a reconnect
 */

import {
  ChannelReading,
  ChannelSource,
  ChannelSubscription,
  ChannelUpdateCallback,
} from '../bsa-stream/types';
import { StreamLogger } from '../shared/StreamLogger';
import { PvwsTransport, TransportOptions } from './transport/PvwsTransport';
import { PvwsUpdate } from './types/messages';
import { BackoffPolicy, CONNECTION, connectWithBackoff } from './utils';

const CATEGORY = 'PVWS';

export interface PvwsChannelSourceOptions {
  // How long get/subscribe wait for the first update of a PV
  requestTimeoutMs?: number;
  // Initial connect attempts; reconnects after a drop are configured on the transport
  connectBackoff?: BackoffPolicy;
  transport?: TransportOptions;
}

interface PendingRead {
  resolve: (reading: ChannelReading) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
}

interface PvState {
  reading: ChannelReading | null;
  listeners: Set<ChannelUpdateCallback>;
  pending: Set<PendingRead>;
  holders: number;
}

export class PvwsChannelSource implements ChannelSource {
  private readonly transport: PvwsTransport;
  private readonly pvs = new Map<string, PvState>();
  private readonly requestTimeoutMs: number;
  private readonly connectBackoff: BackoffPolicy;
  private connecting: Promise<void> | null = null;

  constructor(readonly url: string, options: PvwsChannelSourceOptions = {}) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? CONNECTION.REQUEST_TIMEOUT;
    this.connectBackoff = options.connectBackoff ?? {};
    this.transport = new PvwsTransport(url, options.transport);
    this.transport.on('update', (update) => this.handleUpdate(update));
    this.transport.on('connected', ({ reconnect }) => {
      if (reconnect) this.resubscribeAll();
    });
  }

  /**
   * Connect once; concurrent callers share the same attempt.
   */
  connect(): Promise<void> {
    if (this.transport.isConnected()) return Promise.resolve();
    if (!this.connecting) {
      this.connecting = connectWithBackoff(this.url, () => this.transport.connect(), this.connectBackoff).finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  /**
   * Close the gateway connection and fail every read still waiting.
   */
  close(): void {
    this.transport.disconnect();
    for (const [address, state] of this.pvs) {
      this.failPending(state, new Error(`Connection closed before ${address} updated`));
    }
    this.pvs.clear();
  }

  async get(address: string): Promise<ChannelReading> {
    await this.connect();
    const state = this.acquire(address);
    try {
      return await this.firstReading(address, state);
    } finally {
      this.release(address);
    }
  }

  /**
   * Live scalar updates received after the returned promise resolves; the
   * current value that confirms the connection is not replayed.
   */
  async subscribe(address: string, onUpdate: ChannelUpdateCallback): Promise<ChannelSubscription> {
    await this.connect();
    const state = this.acquire(address);
    try {
      await this.firstReading(address, state);
    } catch (error) {
      this.release(address);
      throw error;
    }
    state.listeners.add(onUpdate);

    let active = true;
    return {
      address,
      unsubscribe: () => {
        if (!active) return;
        active = false;
        state.listeners.delete(onUpdate);
        this.release(address);
      },
    };
  }

  get connected(): boolean {
    return this.transport.isConnected();
  }

  private acquire(address: string): PvState {
    let state = this.pvs.get(address);
    if (!state) {
      state = { reading: null, listeners: new Set(), pending: new Set(), holders: 0 };
      this.pvs.set(address, state);
      this.transport.send({ type: 'subscribe', pvs: [address] });
    }
    state.holders++;
    return state;
  }

  private release(address: string): void {
    const state = this.pvs.get(address);
    if (!state) return;
    state.holders--;
    if (state.holders > 0) return;

    this.pvs.delete(address);
    this.failPending(state, new Error(`Subscription to ${address} released`));
    this.transport.send({ type: 'clear', pvs: [address] });
  }

  private firstReading(address: string, state: PvState): Promise<ChannelReading> {
    if (state.reading) return Promise.resolve(state.reading);

    return new Promise((resolve, reject) => {
      const pending: PendingRead = {
        resolve,
        reject,
        timeout: setTimeout(() => {
          state.pending.delete(pending);
          reject(new Error(`Timed out after ${this.requestTimeoutMs}ms waiting for ${address}`));
        }, this.requestTimeoutMs),
      };
      state.pending.add(pending);
    });
  }

  private handleUpdate(update: PvwsUpdate): void {
    const state = this.pvs.get(update.pv);
    if (!state) return;

    const value = update.value ?? state.reading?.value;
    if (value === undefined) return;
    const reading: ChannelReading = {
      value,
      nanoseconds: update.nanos ?? state.reading?.nanoseconds ?? 0,
    };
    state.reading = reading;

    for (const pending of state.pending) {
      clearTimeout(pending.timeout);
      pending.resolve(reading);
    }
    state.pending.clear();

    if (typeof reading.value !== 'number') return;
    const scalar = { value: reading.value, nanoseconds: reading.nanoseconds };
    for (const listener of [...state.listeners]) {
      try {
        listener(scalar);
      } catch (error) {
        StreamLogger.error(CATEGORY, `Listener for ${update.pv} threw`, error);
      }
    }
  }

  private resubscribeAll(): void {
    const addresses = [...this.pvs.keys()];
    if (addresses.length === 0) return;
    StreamLogger.info(CATEGORY, `Re-subscribing ${addresses.length} PVs after reconnect`);
    this.transport.send({ type: 'subscribe', pvs: addresses });
  }

  private failPending(state: PvState, error: Error): void {
    for (const pending of state.pending) {
      clearTimeout(pending.timeout);
      pending.reject(error);
    }
    state.pending.clear();
  }
}
