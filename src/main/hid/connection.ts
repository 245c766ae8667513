import * as HID from 'node-hid';
import { EventEmitter } from 'events';
import { REPEATABLE_ACTIONS } from '../control/actions';
import type { ControlAction } from '../control/actions';
import { DEFAULT_KEY_BINDINGS, KeyBindings, resolveAction } from './keybindings';
import {
  createReceiverState,
  isSameState,
  parseInputReport,
  KeyPressEvent,
  ReceiverProfile,
  ReceiverState,
  UNKNOWN_RECEIVER_PROFILE,
} from './protocol';

type ReportLayout = Pick<ReceiverProfile, 'keyboardReportId' | 'consumerReportId'>;

export interface KeyRepeat {
  /** Hold time before the first repeat, in ms */
  delay: number;
  /** Time between repeats in ms; 0 turns repeating off */
  interval: number;
}

export const DEFAULT_KEY_REPEAT: KeyRepeat = { delay: 500, interval: 100 };

/**
 * Connection to an IR receiver's key interfaces.
 *
 * Emits 'key' for every newly pressed key, 'action' for keys with a
 * binding, and 'connected', 'disconnected' and 'error'. While a key bound
 * to a volume or balance action stays held, its action repeats.
 */
export class RemoteConnection extends EventEmitter {
  private devices: HID.HID[] = [];
  private state: ReceiverState = createReceiverState();
  private repeatTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly bindings: KeyBindings = DEFAULT_KEY_BINDINGS,
    private readonly layout: ReportLayout = UNKNOWN_RECEIVER_PROFILE,
    private readonly repeat: KeyRepeat = DEFAULT_KEY_REPEAT
  ) {
    super();
  }

  /**
   * Open every interface path of one receiver. Returns false when none
   * could be opened.
   */
  connect(paths: string[]): boolean {
    for (const path of paths) {
      try {
        const device = new HID.HID(path);
        device.on('data', (data: Buffer) => {
          this.handleData(data);
        });
        device.on('error', (error: Error) => {
          this.emit('error', error);
          this.disconnect();
        });
        this.devices.push(device);
      } catch (error) {
        this.emit('error', error);
      }
    }

    if (this.devices.length === 0) {
      return false;
    }
    this.emit('connected');
    return true;
  }

  disconnect(): void {
    this.stopRepeat();
    if (this.devices.length === 0) {
      return;
    }
    for (const device of this.devices) {
      try {
        device.close();
      } catch (error) {
        this.emit('error', error);
      }
    }
    this.devices = [];
    this.state = createReceiverState();
    this.emit('disconnected');
  }

  isConnected(): boolean {
    return this.devices.length > 0;
  }

  /** Feed one raw input report, as delivered by the device */
  handleData(data: Buffer): void {
    const parsed = parseInputReport(data, this.state, this.layout);
    if (!parsed) {
      return;
    }
    // Receivers resend the held keys; only a change ends a repeat
    if (!isSameState(parsed.state, this.state)) {
      this.stopRepeat();
    }
    this.state = parsed.state;

    for (const event of parsed.events) {
      this.emit('key', event);
      const action = resolveAction(event, this.bindings);
      if (action) {
        this.emit('action', action);
        if (REPEATABLE_ACTIONS.includes(action)) {
          this.startRepeat(action);
        }
      }
    }
  }

  private startRepeat(action: ControlAction): void {
    this.stopRepeat();
    if (this.repeat.interval <= 0) {
      return;
    }
    this.repeatTimer = setTimeout(() => {
      this.repeatTimer = setInterval(() => {
        this.emit('action', action);
      }, this.repeat.interval);
      this.emit('action', action);
    }, this.repeat.delay);
  }

  private stopRepeat(): void {
    if (this.repeatTimer) {
      clearInterval(this.repeatTimer);
      this.repeatTimer = null;
    }
  }
}

export interface RemoteConnection {
  on(event: 'key', listener: (event: KeyPressEvent) => void): this;
  on(event: 'action', listener: (action: ControlAction) => void): this;
  on(event: 'connected' | 'disconnected', listener: () => void): this;
  on(event: 'error', listener: (error: unknown) => void): this;
}
