import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConsoleDisplay, MuteBlinker, formatVolume } from '../display';

describe('formatVolume', () => {
  it('shows one decimal right-aligned to five characters', () => {
    expect(formatVolume(0)).toBe('  0.0');
    expect(formatVolume(-3)).toBe(' -3.0');
    expect(formatVolume(-12.5)).toBe('-12.5');
    expect(formatVolume(-99.5)).toBe('-99.5');
  });
});

describe('MuteBlinker', () => {
  let visibility: boolean[];
  let blinker: MuteBlinker;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    visibility = [];
    blinker = new MuteBlinker(visible => visibility.push(visible), 500);
  });

  afterEach(() => {
    blinker.stop();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('toggles visibility every period while muted', async () => {
    blinker.start(async () => true);

    await vi.advanceTimersByTimeAsync(499);
    expect(visibility).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    expect(visibility).toEqual([false]);

    await vi.advanceTimersByTimeAsync(1000);
    expect(visibility).toEqual([false, true, false]);
    expect(blinker.isRunning()).toBe(true);
  });

  it('stops visible on the first unmuted poll', async () => {
    let muted = true;
    const isMuted = vi.fn(async () => muted);
    blinker.start(isMuted);

    await vi.advanceTimersByTimeAsync(500);
    muted = false;
    await vi.advanceTimersByTimeAsync(500);

    expect(visibility).toEqual([false, true]);
    expect(blinker.isRunning()).toBe(false);

    await vi.advanceTimersByTimeAsync(2000);
    expect(isMuted).toHaveBeenCalledTimes(2);
  });

  it('restores visibility when stopped', async () => {
    blinker.start(async () => true);
    await vi.advanceTimersByTimeAsync(500);

    blinker.stop();
    await vi.advanceTimersByTimeAsync(2000);

    expect(visibility).toEqual([false, true]);
  });

  it('runs a single task however often it is started', async () => {
    const isMuted = vi.fn(async () => true);
    blinker.start(isMuted);
    blinker.start(isMuted);

    await vi.advanceTimersByTimeAsync(500);

    expect(isMuted).toHaveBeenCalledTimes(1);
  });

  it('ignores a poll that resolves after it was stopped', async () => {
    let answer: (muted: boolean) => void = () => {};
    blinker.start(() => new Promise<boolean>(resolve => {
      answer = resolve;
    }));
    expect(visibility).toEqual([]);

    await vi.advanceTimersByTimeAsync(500);
    blinker.stop();
    answer(true);
    await vi.advanceTimersByTimeAsync(1000);

    // Only the restore from stop(), no toggle from the late poll
    expect(visibility).toEqual([true]);
    expect(blinker.isRunning()).toBe(false);
  });

  it('stops when the mute poll fails', async () => {
    blinker.start(async () => {
      throw new Error('engine gone');
    });

    await vi.advanceTimersByTimeAsync(500);

    expect(blinker.isRunning()).toBe(false);
    expect(visibility).toEqual([true]);
    expect(console.error).toHaveBeenCalledWith('[display]', 'mute blink failed:', 'engine gone');
  });
});

describe('ConsoleDisplay', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps the latest selection and volume', () => {
    const display = new ConsoleDisplay();
    display.showSelection('2.1 DRC', 'Stream');
    display.showVolume(' -3.0');

    expect(display.getSnapshot()).toEqual({
      topologyLabel: '2.1 DRC',
      sourceLabel: 'Stream',
      volume: ' -3.0',
      volumeVisible: true,
      error: null,
    });
    expect(console.log).toHaveBeenCalledWith('[display]', 'Stream | 2.1 DRC');
    expect(console.log).toHaveBeenCalledWith('[display]', ' -3.0 dB');
  });

  it('clears an error on the next update', () => {
    const display = new ConsoleDisplay();
    display.showError('volumeUp: GetVolume timed out');
    expect(display.getSnapshot().error).toBe('volumeUp: GetVolume timed out');

    display.showSelection('2.0', 'Phono');
    expect(display.getSnapshot().error).toBeNull();
  });

  it('blinks the volume while muted and shows it again on close', async () => {
    vi.useFakeTimers();
    const display = new ConsoleDisplay(100);

    display.startMuteBlink(async () => true);
    await vi.advanceTimersByTimeAsync(100);
    expect(display.getSnapshot().volumeVisible).toBe(false);

    display.close();
    expect(display.getSnapshot().volumeVisible).toBe(true);
    vi.useRealTimers();
  });
});
