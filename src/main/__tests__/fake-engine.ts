import type { DspEngine } from '../engine/types';
import { EngineError, SchemaError } from '../errors';
import type { PipelineDescription } from '../pipeline/types';

type Command = keyof DspEngine;

/**
 * In-memory engine: keeps a live description, volume and mute flag, and
 * records every call in order.
 */
export class FakeEngine implements DspEngine {
  live: PipelineDescription | null = null;
  volume = 0.0;
  muted = false;
  configName: string | null = null;
  reloads = 0;
  calls: Command[] = [];
  /** Returns a problem to reject validation with, or null to accept */
  validator: (description: PipelineDescription) => string | null = () => null;
  private failures = new Map<Command, Error>();
  private gates = new Map<Command, Promise<void>>();

  /** Make the next call of `command` reject */
  failNext(command: Command, error: Error = new EngineError(`${command} failed`, command)): void {
    this.failures.set(command, error);
  }

  /** Hold calls of `command` until the returned function is called */
  hold(command: Command): () => void {
    let release = () => {};
    this.gates.set(command, new Promise<void>(resolve => {
      release = resolve;
    }));
    return () => {
      this.gates.delete(command);
      release();
    };
  }

  private async enter(command: Command): Promise<void> {
    this.calls.push(command);
    const gate = this.gates.get(command);
    if (gate) {
      await gate;
    }
    const failure = this.failures.get(command);
    if (failure) {
      this.failures.delete(command);
      throw failure;
    }
  }

  async validate(description: PipelineDescription): Promise<PipelineDescription> {
    await this.enter('validate');
    const problem = this.validator(description);
    if (problem) {
      throw new SchemaError(problem, [problem]);
    }
    return structuredClone(description);
  }

  async setLiveConfig(description: PipelineDescription): Promise<void> {
    await this.enter('setLiveConfig');
    this.live = structuredClone(description);
  }

  async getLiveConfig(): Promise<PipelineDescription> {
    await this.enter('getLiveConfig');
    if (!this.live) {
      throw new EngineError('No live config', 'getLiveConfig');
    }
    return structuredClone(this.live);
  }

  async getVolume(): Promise<number> {
    await this.enter('getVolume');
    return this.volume;
  }

  async setVolume(volume: number): Promise<void> {
    await this.enter('setVolume');
    this.volume = volume;
  }

  async getMute(): Promise<boolean> {
    await this.enter('getMute');
    return this.muted;
  }

  async setMute(muted: boolean): Promise<void> {
    await this.enter('setMute');
    this.muted = muted;
  }

  async setConfigName(path: string): Promise<void> {
    await this.enter('setConfigName');
    this.configName = path;
  }

  async reload(): Promise<void> {
    await this.enter('reload');
    this.reloads++;
  }
}
