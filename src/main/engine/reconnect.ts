// Retry loop for a dropped engine link

import { errorMessage } from '../errors';
import { debug } from '../log';

const log = debug('engine');

export interface Reconnectable {
  connect(): Promise<void>;
  disconnect(): void;
}

/**
 * Calls `connect()` every `interval` ms until it succeeds, then stops and
 * runs `onRestored`. Attempts never overlap, and `start()` on a running
 * loop does nothing.
 */
export class Reconnector {
  private timer: NodeJS.Timeout | null = null;
  private connecting = false;

  constructor(
    private readonly target: Reconnectable,
    private readonly interval: number,
    private readonly onRestored: () => void = () => {}
  ) {}

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.tryConnect().catch((error: unknown) => {
        log.error('reconnect failed:', errorMessage(error));
      });
    }, this.interval);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  private async tryConnect(): Promise<void> {
    if (this.connecting) {
      return;
    }
    this.connecting = true;
    try {
      await this.target.connect();
    } catch (error) {
      log('reconnect failed:', errorMessage(error));
      return;
    } finally {
      this.connecting = false;
    }

    if (!this.timer) {
      // Stopped while connecting
      this.target.disconnect();
      return;
    }
    this.stop();
    this.onRestored();
  }
}
