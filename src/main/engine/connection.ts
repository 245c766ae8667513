// WebSocket client for the CamillaDSP control API

import WebSocket from 'ws';
import { EventEmitter } from 'events';
import { EngineError, SchemaError, errorMessage } from '../errors';
import type { PipelineDescription } from '../pipeline/types';
import { decodeDescription, encodeDescription } from '../pipeline/wire';
import type { DspEngine } from './types';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 31234;
export const DEFAULT_REQUEST_TIMEOUT = 5000;

export interface CamillaConnectionOptions {
  host?: string;
  port?: number;
  /** Per-request timeout in ms */
  requestTimeout?: number;
}

interface PendingRequest {
  command: string;
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
  settled: boolean;
}

function rawToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf-8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  return Buffer.from(data).toString('utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function parseConfig(command: string, value: unknown): unknown {
  if (typeof value !== 'string') {
    throw new EngineError(`${command} returned no config`, command);
  }
  try {
    return JSON.parse(value);
  } catch (error) {
    throw new EngineError(`${command} returned an unreadable config: ${errorMessage(error)}`, command, { cause: error });
  }
}

/**
 * Connection to a running CamillaDSP instance.
 *
 * Commands go out as `"Command"` or `{ "Command": arg }`; the engine answers
 * each with `{ "Command": { "result": "Ok" | "Error", "value": ... } }` in
 * the order they were sent. Replies carry no request id, so a reply that
 * times out or arrives out of order resets the link; every request still
 * pending fails and 'disconnected' is emitted.
 *
 * Emits 'connected', 'disconnected' and 'error'.
 */
export class CamillaConnection extends EventEmitter implements DspEngine {
  private socket: WebSocket | null = null;
  private pending: PendingRequest[] = [];
  private readonly host: string;
  private readonly port: number;
  private readonly requestTimeout: number;

  constructor(options: CamillaConnectionOptions = {}) {
    super();
    this.host = options.host ?? DEFAULT_HOST;
    this.port = options.port ?? DEFAULT_PORT;
    this.requestTimeout = options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT;
  }

  get url(): string {
    return `ws://${this.host}:${this.port}`;
  }

  connect(): Promise<void> {
    if (this.socket) {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const socket = new WebSocket(this.url);
      let opened = false;

      socket.on('open', () => {
        opened = true;
        this.socket = socket;
        this.emit('connected');
        resolve();
      });

      socket.on('message', (data: WebSocket.RawData) => {
        if (this.socket === socket) {
          this.handleMessage(socket, rawToString(data));
        }
      });

      socket.on('error', (error: Error) => {
        if (!opened) {
          reject(new EngineError(`Cannot reach engine at ${this.url}: ${error.message}`, undefined, { cause: error }));
          return;
        }
        this.emitError(error);
      });

      socket.on('close', () => {
        if (!opened) {
          reject(new EngineError(`Engine at ${this.url} closed the connection`));
          return;
        }
        if (this.socket === socket) {
          this.detach(new EngineError('Engine connection closed'));
        }
      });
    });
  }

  disconnect(): void {
    const socket = this.socket;
    if (!socket) {
      return;
    }
    this.detach(new EngineError('Engine connection closed'));
    try {
      socket.close();
    } catch (error) {
      this.emitError(error);
    }
  }

  isConnected(): boolean {
    return this.socket !== null && this.socket.readyState === WebSocket.OPEN;
  }

  // ==========================================================================
  // DspEngine
  // ==========================================================================

  async validate(description: PipelineDescription): Promise<PipelineDescription> {
    const value = await this.request('ValidateConfigJson', JSON.stringify(encodeDescription(description)));
    return decodeDescription(parseConfig('ValidateConfigJson', value));
  }

  async setLiveConfig(description: PipelineDescription): Promise<void> {
    await this.request('SetConfigJson', JSON.stringify(encodeDescription(description)));
  }

  async getLiveConfig(): Promise<PipelineDescription> {
    return decodeDescription(parseConfig('GetConfigJson', await this.request('GetConfigJson')));
  }

  async getVolume(): Promise<number> {
    const value = await this.request('GetVolume');
    if (typeof value !== 'number') {
      throw new EngineError(`GetVolume returned ${JSON.stringify(value)}`, 'GetVolume');
    }
    return value;
  }

  async setVolume(volume: number): Promise<void> {
    await this.request('SetVolume', volume);
  }

  async getMute(): Promise<boolean> {
    const value = await this.request('GetMute');
    if (typeof value !== 'boolean') {
      throw new EngineError(`GetMute returned ${JSON.stringify(value)}`, 'GetMute');
    }
    return value;
  }

  async setMute(muted: boolean): Promise<void> {
    await this.request('SetMute', muted);
  }

  async setConfigName(path: string): Promise<void> {
    await this.request('SetConfigName', path);
  }

  async reload(): Promise<void> {
    await this.request('Reload');
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  private request(command: string, arg?: unknown): Promise<unknown> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new EngineError(`Not connected to engine (${command})`, command));
    }

    return new Promise((resolve, reject) => {
      const entry: PendingRequest = {
        command,
        resolve,
        reject,
        settled: false,
        timer: setTimeout(() => {
          this.settle(entry, () => reject(new EngineError(`${command} timed out after ${this.requestTimeout}ms`, command)));
          this.reset(socket, `${command} timed out`);
        }, this.requestTimeout),
      };
      this.pending.push(entry);

      const message = arg === undefined ? JSON.stringify(command) : JSON.stringify({ [command]: arg });
      socket.send(message, error => {
        if (error) {
          // Never reached the engine, so no reply will follow
          this.pending = this.pending.filter(other => other !== entry);
          this.settle(entry, () => reject(new EngineError(`${command} could not be sent: ${error.message}`, command)));
        }
      });
    });
  }

  private settle(entry: PendingRequest, finish: () => void): void {
    clearTimeout(entry.timer);
    if (!entry.settled) {
      entry.settled = true;
      finish();
    }
  }

  private handleMessage(socket: WebSocket, text: string): void {
    let reply: unknown;
    try {
      reply = JSON.parse(text);
    } catch (error) {
      this.emitError(new EngineError(`Unreadable reply from engine: ${errorMessage(error)}`));
      return;
    }

    if (!isRecord(reply)) {
      this.emitError(new EngineError(`Unexpected reply from engine: ${text}`));
      return;
    }

    const [command] = Object.keys(reply);
    const entry = this.pending.shift();
    if (!entry) {
      this.emitError(new EngineError(`Reply without a request: ${command}`, command));
      return;
    }

    const body = reply[command];
    if (command !== entry.command || !isRecord(body)) {
      this.settle(entry, () => entry.reject(new EngineError(`Expected a ${entry.command} reply, got ${text}`, entry.command)));
      this.reset(socket, 'reply out of order');
      return;
    }

    if (body.result === 'Ok') {
      this.settle(entry, () => entry.resolve(body.value));
      return;
    }

    const detail = typeof body.value === 'string' ? body.value : JSON.stringify(body.value ?? body.result);
    const error = command.startsWith('Validate')
      ? new SchemaError(`Engine rejected config: ${detail}`, [detail])
      : new EngineError(`${command} failed: ${detail}`, command);
    this.settle(entry, () => entry.reject(error));
  }

  private detach(error: EngineError): void {
    this.socket = null;
    this.failPending(error);
    this.emit('disconnected');
  }

  /** Drop a link whose replies can no longer be matched to requests */
  private reset(socket: WebSocket, reason: string): void {
    if (this.socket !== socket) {
      return;
    }
    this.detach(new EngineError(`Engine connection reset: ${reason}`));
    socket.terminate();
  }

  private failPending(error: EngineError): void {
    const pending = this.pending;
    this.pending = [];
    for (const entry of pending) {
      this.settle(entry, () => entry.reject(error));
    }
  }

  private emitError(error: unknown): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }
}
