/**
 * In-Memory Channel Source
 *
 * In-process ChannelSource: readings are set directly and updates are
 * delivered synchronously to subscribers. Backs the tests and the
 * simulated mode of the correlation watcher.
 */

import {
  ChannelReading,
  ChannelSource,
  ChannelSubscription,
  ChannelUpdateCallback,
} from '../types';

export class InMemoryChannelSource implements ChannelSource {
  private readings = new Map<string, ChannelReading>();
  private subscribers = new Map<string, Set<ChannelUpdateCallback>>();
  private failures = new Map<string, Error>();

  setValue(address: string, value: number, nanoseconds: number = 0): void {
    this.readings.set(address, { value, nanoseconds });
  }

  setWaveform(address: string, values: readonly number[], nanoseconds: number = 0): void {
    this.readings.set(address, { value: [...values], nanoseconds });
  }

  /**
   * Store the reading and deliver it to every live subscriber
   */
  publish(address: string, value: number, nanoseconds: number = 0): void {
    this.setValue(address, value, nanoseconds);
    const callbacks = this.subscribers.get(address);
    if (!callbacks) return;
    for (const callback of [...callbacks]) {
      callback({ value, nanoseconds });
    }
  }

  // Make get/subscribe on `address` reject until clearFailure()
  failOn(address: string, error: Error = new Error(`Channel ${address} failed to connect`)): void {
    this.failures.set(address, error);
  }

  clearFailure(address: string): void {
    this.failures.delete(address);
  }

  subscriberCount(address: string): number {
    return this.subscribers.get(address)?.size ?? 0;
  }

  async get(address: string): Promise<ChannelReading> {
    const failure = this.failures.get(address);
    if (failure) throw failure;

    const reading = this.readings.get(address);
    if (!reading) {
      throw new Error(`Channel ${address} not found`);
    }
    return typeof reading.value === 'number'
      ? { ...reading }
      : { value: [...reading.value], nanoseconds: reading.nanoseconds };
  }

  async subscribe(address: string, onUpdate: ChannelUpdateCallback): Promise<ChannelSubscription> {
    const failure = this.failures.get(address);
    if (failure) throw failure;

    let callbacks = this.subscribers.get(address);
    if (!callbacks) {
      callbacks = new Set();
      this.subscribers.set(address, callbacks);
    }
    callbacks.add(onUpdate);

    return {
      address,
      unsubscribe: () => {
        const current = this.subscribers.get(address);
        if (!current) return;
        current.delete(onUpdate);
        if (current.size === 0) this.subscribers.delete(address);
      },
    };
  }
}
