// Narrow interface to a running DSP engine

import type { PipelineDescription } from '../pipeline/types';

/**
 * Operations the control layer needs from the engine.
 * Reads and writes reject with EngineError on transport failures;
 * `validate` rejects with SchemaError when the engine refuses a description.
 */
export interface DspEngine {
  /** Validate a description; resolves with the engine's normalized copy */
  validate(description: PipelineDescription): Promise<PipelineDescription>;
  /** Replace the whole live pipeline */
  setLiveConfig(description: PipelineDescription): Promise<void>;
  getLiveConfig(): Promise<PipelineDescription>;
  /** Main volume in dB */
  getVolume(): Promise<number>;
  setVolume(volume: number): Promise<void>;
  getMute(): Promise<boolean>;
  setMute(muted: boolean): Promise<void>;
  /** Point the engine at a config file; takes effect on the next reload */
  setConfigName(path: string): Promise<void>;
  /** Re-read the named config file */
  reload(): Promise<void>;
}
