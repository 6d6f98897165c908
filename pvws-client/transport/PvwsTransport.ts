import { RawData, WebSocket } from 'ws';
import { StreamLogger } from '../../shared/StreamLogger';
import { TypedEventEmitter } from '../../shared/TypedEventEmitter';
import { MessageCodec } from '../protocol/MessageCodec';
import { PvwsClientMessage, PvwsEvents } from '../types/messages';
import { CONNECTION, RETRY, backoffDelay } from '../utils';

const CATEGORY = 'PVWS';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting';

export interface TransportOptions {
  reconnectDelay?: number;
  maxReconnectAttempts?: number;
}

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

// Low-level gateway transport with auto-reconnect
export class PvwsTransport extends TypedEventEmitter<PvwsEvents> {
  private ws: WebSocket | null = null;
  private state: ConnectionState = 'disconnected';
  private reconnectAttempts = 0;
  private reconnectTimeout: NodeJS.Timeout | null = null;
  // Set after the first successful open, cleared by disconnect()
  private shouldReconnect = false;
  private options: Required<TransportOptions>;

  constructor(private readonly url: string, options: TransportOptions = {}) {
    super();
    this.options = {
      reconnectDelay: options.reconnectDelay ?? RETRY.BASE_DELAY,
      maxReconnectAttempts: options.maxReconnectAttempts ?? CONNECTION.MAX_RECONNECT_ATTEMPTS,
    };
  }

  // Connect to the gateway
  async connect(): Promise<void> {
    if (this.isConnected()) return;
    if (this.state !== 'disconnected') {
      throw new Error(`Already ${this.state}`);
    }
    await this.open(false);
  }

  // Disconnect and stop reconnecting
  disconnect(): void {
    this.shouldReconnect = false;
    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }
    if (this.ws) {
      const socket = this.ws;
      this.ws = null;
      socket.close(1000, 'Client disconnect');
    }
    this.state = 'disconnected';
  }

  // Fire-and-forget send; returns false when not connected
  send(message: PvwsClientMessage): boolean {
    if (!this.ws || !this.isConnected()) {
      return false;
    }
    try {
      this.ws.send(MessageCodec.encode(message));
      return true;
    } catch (error) {
      StreamLogger.error(CATEGORY, `Failed to send ${message.type}`, error);
      return false;
    }
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected' && this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  private open(reconnect: boolean): Promise<void> {
    this.state = reconnect ? 'reconnecting' : 'connecting';

    return new Promise((resolve, reject) => {
      const socket = new WebSocket(this.url);
      this.ws = socket;
      let opened = false;

      socket.on('open', () => {
        opened = true;
        this.state = 'connected';
        this.reconnectAttempts = 0;
        this.shouldReconnect = true;
        StreamLogger.info(CATEGORY, `Connected to ${this.url}`);
        this.emit('connected', { reconnect });
        resolve();
      });
      socket.on('message', (data) => {
        if (this.ws === socket) this.handleMessage(data);
      });
      socket.on('error', (error) => {
        if (!opened) {
          reject(error);
          return;
        }
        this.emit('error', error);
      });
      socket.on('close', (code, reason) => {
        if (this.ws !== socket) return;
        this.handleClose(code, reason.toString('utf8'));
      });
    });
  }

  private handleMessage(data: RawData): void {
    // HOT PATH: one frame per pulse per channel, no logging on success
    try {
      const update = MessageCodec.decode(rawToString(data));
      if (update) {
        this.emit('update', update);
      }
    } catch (error) {
      const normalized = error instanceof Error ? error : new Error(String(error));
      StreamLogger.warn(CATEGORY, `Dropped gateway frame: ${normalized.message}`);
      this.emit('error', normalized);
    }
  }

  private handleClose(code: number, reason: string): void {
    this.ws = null;
    this.state = 'disconnected';
    this.emit('disconnected', { code, reason });
    this.attemptReconnect();
  }

  private attemptReconnect(): void {
    if (!this.shouldReconnect) return;
    if (this.reconnectAttempts >= this.options.maxReconnectAttempts) {
      StreamLogger.error(CATEGORY, `Giving up on ${this.url} after ${this.reconnectAttempts} reconnect attempts`);
      this.shouldReconnect = false;
      return;
    }

    const delay = backoffDelay(this.reconnectAttempts, { baseDelayMs: this.options.reconnectDelay });
    this.reconnectAttempts++;
    this.state = 'reconnecting';
    this.reconnectTimeout = setTimeout(() => {
      this.reconnectTimeout = null;
      // a failed attempt closes its socket, which schedules the next one
      this.open(true).catch((error: unknown) => {
        StreamLogger.warn(CATEGORY, `Reconnect attempt ${this.reconnectAttempts} failed`, error);
      });
    }, delay);
  }
}
