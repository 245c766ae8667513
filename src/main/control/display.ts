// Display collaborator: what the control layer shows and the mute blink task

import { errorMessage } from '../errors';
import { debug } from '../log';

const log = debug('display');

export const BLINK_PERIOD = 500;

/**
 * Volume as shown on screen: one decimal, right-aligned to five characters
 */
export function formatVolume(volume: number): string {
  return volume.toFixed(1).padStart(5);
}

export interface Display {
  showSelection(topologyLabel: string, sourceLabel: string): void;
  /** Already formatted, see formatVolume */
  showVolume(text: string): void;
  setVolumeVisible(visible: boolean): void;
  showError(message: string): void;
  /** Blink the volume until `isMuted` reports false */
  startMuteBlink(isMuted: () => Promise<boolean>): void;
  /** Cancel timers owned by the display */
  close(): void;
}

/**
 * Cancellable periodic task: every period it polls the mute condition,
 * toggles volume visibility while muted, and stops (visible again) on the
 * first unmuted poll.
 */
export class MuteBlinker {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private visible = true;

  constructor(
    private readonly setVisible: (visible: boolean) => void,
    private readonly period = BLINK_PERIOD
  ) {}

  isRunning(): boolean {
    return this.running;
  }

  start(isMuted: () => Promise<boolean>): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.schedule(isMuted);
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.running) {
      this.running = false;
      this.setVisibility(true);
    }
  }

  private schedule(isMuted: () => Promise<boolean>): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick(isMuted).catch(error => {
        log.error('mute blink failed:', errorMessage(error));
        this.stop();
      });
    }, this.period);
  }

  private async tick(isMuted: () => Promise<boolean>): Promise<void> {
    const muted = await isMuted();
    if (!this.running) {
      return;
    }
    if (!muted) {
      this.stop();
      return;
    }
    this.setVisibility(!this.visible);
    this.schedule(isMuted);
  }

  private setVisibility(visible: boolean): void {
    this.visible = visible;
    this.setVisible(visible);
  }
}

export interface DisplaySnapshot {
  topologyLabel: string;
  sourceLabel: string;
  volume: string;
  volumeVisible: boolean;
  error: string | null;
}

/**
 * Headless display that keeps the current screen contents and logs changes
 */
export class ConsoleDisplay implements Display {
  private snapshot: DisplaySnapshot = {
    topologyLabel: '',
    sourceLabel: '',
    volume: '',
    volumeVisible: true,
    error: null,
  };
  private readonly blinker: MuteBlinker;

  constructor(blinkPeriod = BLINK_PERIOD) {
    this.blinker = new MuteBlinker(visible => this.setVolumeVisible(visible), blinkPeriod);
  }

  getSnapshot(): DisplaySnapshot {
    return { ...this.snapshot };
  }

  showSelection(topologyLabel: string, sourceLabel: string): void {
    this.snapshot = { ...this.snapshot, topologyLabel, sourceLabel, error: null };
    log(`${sourceLabel} | ${topologyLabel}`);
  }

  showVolume(text: string): void {
    this.snapshot = { ...this.snapshot, volume: text, error: null };
    log(`${text} dB`);
  }

  setVolumeVisible(visible: boolean): void {
    this.snapshot = { ...this.snapshot, volumeVisible: visible };
  }

  showError(message: string): void {
    this.snapshot = { ...this.snapshot, error: message };
    log.error(message);
  }

  startMuteBlink(isMuted: () => Promise<boolean>): void {
    if (!this.blinker.isRunning()) {
      log('muted');
    }
    this.blinker.start(isMuted);
  }

  close(): void {
    this.blinker.stop();
  }
}
