// Live control state machine: applies remote actions to the running engine

import type { SelectionLoader } from '../engine/files';
import type { DspEngine } from '../engine/types';
import { BalanceUnavailableError, InvariantViolation, errorMessage } from '../errors';
import { debug } from '../log';
import type { Catalog } from '../pipeline/catalog';
import { balanceFilterName } from '../pipeline/synthesizer';
import type { GainFilter, PipelineDescription } from '../pipeline/types';
import type { ControlAction, PassThroughAction } from './actions';
import { Display, formatVolume } from './display';

const log = debug('control');

export const VOLUME_STEP = 0.5;
export const MIN_VOLUME = -99.5;
export const MAX_VOLUME = 0.0;

export type BalanceSide = 'left' | 'right';

export interface ControllerOptions {
  /** dB per volume or balance step */
  volumeStep?: number;
  /** Lowest volume a step may reach */
  minVolume?: number;
  /** Highest volume a step may reach */
  maxVolume?: number;
  /** Receives actions that have no effect here (transport, navigation) */
  onPassThrough?: (action: PassThroughAction) => void;
  /** Replaces pushing the catalog description, e.g. with configFileLoader */
  loadSelection?: SelectionLoader;
}

export interface Selection {
  topologyLabel: string;
  sourceLabel: string;
}

/**
 * Next balance gains for one step towards `side`.
 * Only one side is ever attenuated: an attenuated side first eases back to
 * 0 dB before the opposite side starts dropping.
 */
export function nextBalance(
  side: BalanceSide,
  gains: readonly [number, number],
  step: number,
  floor = MIN_VOLUME
): [number, number] {
  const [gain0, gain1] = gains;
  if (side === 'left') {
    return gain0 === 0.0
      ? [0.0, Math.max(floor, gain1 - step)]
      : [Math.min(0.0, gain0 + step), 0.0];
  }
  return gain1 === 0.0
    ? [Math.max(floor, gain0 - step), 0.0]
    : [0.0, Math.min(0.0, gain1 + step)];
}

function findBalanceFilter(description: PipelineDescription, index: number): GainFilter {
  const name = balanceFilterName(index);
  const filter = Object.hasOwn(description.filters, name) ? description.filters[name] : undefined;
  if (!filter || filter.kind !== 'gain') {
    throw new BalanceUnavailableError(`The live pipeline has no "${name}" gain filter`);
  }
  return filter;
}

/**
 * LiveController - the single writer to the live engine.
 *
 * Tracks the selected topology and source as positions in the menu lists,
 * runs one action at a time in arrival order, and keeps the display in sync.
 * Volume and mute are never cached; every read goes to the engine.
 */
export class LiveController {
  private topologyIndex = 0;
  private sourceIndex = 0;
  private queue: Promise<void> = Promise.resolve();
  private started = false;
  private readonly volumeStep: number;
  private readonly minVolume: number;
  private readonly maxVolume: number;
  private readonly onPassThrough: ((action: PassThroughAction) => void) | undefined;
  private readonly loader: SelectionLoader | undefined;

  constructor(
    private readonly catalog: Catalog,
    private readonly engine: DspEngine,
    private readonly display: Display,
    options: ControllerOptions = {}
  ) {
    this.volumeStep = options.volumeStep ?? VOLUME_STEP;
    this.minVolume = options.minVolume ?? MIN_VOLUME;
    this.maxVolume = options.maxVolume ?? MAX_VOLUME;
    this.onPassThrough = options.onPassThrough;
    this.loader = options.loadSelection;
  }

  getSelection(): Selection {
    const { topologies, sources } = this.catalog.menu;
    return {
      topologyLabel: topologies[this.topologyIndex].label,
      sourceLabel: sources[this.sourceIndex].label,
    };
  }

  /**
   * Push the first menu entry live and show the initial state
   */
  start(): Promise<void> {
    this.started = true;
    return this.enqueue(async () => {
      await this.loadSelection(0, 0);
      await this.refreshVolume();
      if (await this.engine.getMute()) {
        this.startBlink();
      }
    });
  }

  /**
   * Queue an action. Resolves once it and everything queued before it ran;
   * rejects with the action's error, which is also shown on the display.
   */
  dispatch(action: ControlAction): Promise<void> {
    if (!this.started) {
      return Promise.reject(new InvariantViolation(`Action "${action}" before the controller started`));
    }
    return this.enqueue(async () => {
      try {
        await this.run(action);
      } catch (error) {
        this.display.showError(`${action}: ${errorMessage(error)}`);
        throw error;
      }
    });
  }

  /**
   * Queued read of the engine mute flag, so a poll never interleaves with a write
   */
  isMuted(): Promise<boolean> {
    return this.enqueue(() => this.engine.getMute());
  }

  /** Resolves when every action queued so far has finished */
  idle(): Promise<void> {
    return this.queue;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async run(action: ControlAction): Promise<void> {
    switch (action) {
      case 'volumeUp':
        return this.stepVolume(+1);
      case 'volumeDown':
        return this.stepVolume(-1);
      case 'muteToggle':
        return this.toggleMute();
      case 'topologyNext':
        return this.stepMenu('topology', +1);
      case 'topologyPrev':
        return this.stepMenu('topology', -1);
      case 'sourceNext':
        return this.stepMenu('source', +1);
      case 'sourcePrev':
        return this.stepMenu('source', -1);
      case 'balanceLeft':
        return this.shiftBalance('left');
      case 'balanceRight':
        return this.shiftBalance('right');
      case 'trackPlay':
      case 'trackNext':
      case 'trackPrev':
      case 'trackStop':
      case 'menu':
      case 'navUp':
      case 'navDown':
      case 'navSelect':
      case 'navExit':
        log(action);
        this.onPassThrough?.(action);
        return;
      default: {
        const unhandled: never = action;
        throw new InvariantViolation(`Unhandled action: ${String(unhandled)}`);
      }
    }
  }

  private async refreshVolume(): Promise<void> {
    this.display.showVolume(formatVolume(await this.engine.getVolume()));
  }

  private async stepVolume(direction: 1 | -1): Promise<void> {
    const volume = await this.engine.getVolume();
    const next = volume + direction * this.volumeStep;
    if (next >= this.minVolume && next <= this.maxVolume) {
      await this.engine.setVolume(next);
    }
    await this.refreshVolume();
  }

  private async toggleMute(): Promise<void> {
    const muted = await this.engine.getMute();
    await this.engine.setMute(!muted);
    if (await this.engine.getMute()) {
      this.startBlink();
    }
  }

  private startBlink(): void {
    this.display.startMuteBlink(() => this.isMuted());
  }

  private async stepMenu(menu: 'topology' | 'source', step: 1 | -1): Promise<void> {
    const { topologies, sources } = this.catalog.menu;
    let topologyIndex = this.topologyIndex;
    let sourceIndex = this.sourceIndex;
    if (menu === 'topology') {
      topologyIndex = (topologyIndex + step + topologies.length) % topologies.length;
    } else {
      sourceIndex = (sourceIndex + step + sources.length) % sources.length;
    }
    await this.loadSelection(topologyIndex, sourceIndex);
  }

  /**
   * Push a catalog entry live. The tracked position only moves once the
   * engine accepted it; any live balance change is replaced.
   */
  private async loadSelection(topologyIndex: number, sourceIndex: number): Promise<void> {
    const topologyLabel = this.catalog.menu.topologies[topologyIndex].label;
    const sourceLabel = this.catalog.menu.sources[sourceIndex].label;
    const description = this.catalog.lookup(topologyLabel, sourceLabel);

    if (this.loader) {
      await this.loader(this.engine, topologyLabel, sourceLabel);
    } else {
      await this.engine.setLiveConfig(description);
    }
    this.topologyIndex = topologyIndex;
    this.sourceIndex = sourceIndex;
    log('loaded', topologyLabel, sourceLabel);
    this.display.showSelection(topologyLabel, sourceLabel);
  }

  private async shiftBalance(side: BalanceSide): Promise<void> {
    const live = await this.engine.getLiveConfig();
    const left = findBalanceFilter(live, 0);
    const right = findBalanceFilter(live, 1);
    const [gain0, gain1] = nextBalance(side, [left.gain, right.gain], this.volumeStep, this.minVolume);

    live.filters[balanceFilterName(0)] = { ...left, gain: gain0 };
    live.filters[balanceFilterName(1)] = { ...right, gain: gain1 };
    await this.engine.setLiveConfig(live);
    log('balance', gain0, gain1);
  }
}
