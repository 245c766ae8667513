// Pipeline description types for the CamillaDSP engine

/** Index of one audio channel within a device or mixer stage */
export type ChannelIndex = number;

/**
 * One contribution of a source channel into a destination channel
 */
export interface MixRule {
  sourceChannel: ChannelIndex;
  /** Gain in dB */
  gain: number;
  inverted: boolean;
  muted: boolean;
}

/**
 * Everything feeding a single mixer output channel.
 * `sources` is empty only when the destination is muted.
 */
export interface DestinationMapping {
  destination: ChannelIndex;
  muted: boolean;
  sources: MixRule[];
}

// ============================================================================
// Selection
// ============================================================================

/** Speaker layouts: true mono, stereo, stereo + one sub, stereo + two subs */
export type Topology = 'Mono' | '2.0' | '2.1' | '2.2';

/** 'stream' reads the loopback device, 'direct' reads the playback hardware's inputs */
export type InputSource = 'stream' | 'direct';

export type CorrectionMode = 'none' | 'drc';

export const TOPOLOGIES: readonly Topology[] = ['Mono', '2.0', '2.1', '2.2'];

export const SUBWOOFER_COUNT: Readonly<Record<Topology, number>> = {
  'Mono': 0,
  '2.0': 0,
  '2.1': 1,
  '2.2': 2,
};

/**
 * One synthesizable combination
 */
export interface PipelineChoice {
  topology: Topology;
  source: InputSource;
  correction: CorrectionMode;
  /** Label used in the mixer name; defaults to the source kind */
  sourceLabel?: string;
}

/**
 * Hardware and tuning parameters shared by every synthesized pipeline
 */
export interface HardwareParams {
  playbackDevice: string;
  playbackChannels: number;
  /** Loopback device the streamed source is captured from */
  loopbackDevice: string;
  sampleFormat: SampleFormat;
  sampleRate: number;
  /** Crossover frequency in Hz */
  crossoverFrequency: number;
  /** Satellite delay in ms, aligning them with the subwoofer path */
  mainsDelay: number;
  /** Wav file holding one correction impulse per satellite channel */
  correctionFilterPath: string;
  /** Provision `balance0`/`balance1` gain filters on the satellite inputs */
  balance: boolean;
}

// ============================================================================
// Description tree
// ============================================================================

export type SampleFormat = 'S16LE' | 'S24LE' | 'S24LE3' | 'S32LE' | 'FLOAT32LE' | 'FLOAT64LE';

/**
 * Synthesized devices are always `Alsa`. A live description may carry any
 * backend the engine supports, with its own fields kept in `extra`.
 */
export interface CaptureDevice {
  type: string;
  /** Absent for backends that read a file or stdin */
  device?: string;
  channels: number;
  format: SampleFormat;
  retryOnError?: boolean;
  avoidBlockingRead?: boolean;
  /** Engine fields not modelled here, written back unchanged */
  extra: Record<string, unknown>;
}

export interface PlaybackDevice {
  type: string;
  device?: string;
  channels: number;
  format: SampleFormat;
  extra: Record<string, unknown>;
}

export interface DeviceBlock {
  samplerate: number;
  chunksize: number;
  queuelimit: number;
  silenceThreshold: number;
  silenceTimeout: number;
  targetLevel: number;
  adjustPeriod: number;
  enableRateAdjust: boolean;
  enableResampling: boolean;
  resamplerType: string;
  captureSamplerate: number;
  capture: CaptureDevice;
  playback: PlaybackDevice;
  extra: Record<string, unknown>;
}

export interface MixerBlock {
  channels: { in: number; out: number };
  mapping: DestinationMapping[];
}

export interface VolumeFilter {
  kind: 'volume';
  /** Ramp time in ms */
  rampTime: number;
}

export interface ConvolutionFilter {
  kind: 'convolution';
  filename: string;
  channel: number;
}

export interface CrossoverFilter {
  kind: 'crossover';
  pass: 'lowpass' | 'highpass';
  freq: number;
  order: number;
}

export interface DelayFilter {
  kind: 'delay';
  delay: number;
  unit: 'ms' | 'samples';
  subsample: boolean;
}

export interface GainFilter {
  kind: 'gain';
  gain: number;
  inverted: boolean;
}

/**
 * An engine filter this program does not model, kept as-is so a live
 * description can be read and written back unchanged.
 */
export interface OtherFilter {
  kind: 'other';
  type: string;
  parameters: Record<string, unknown>;
}

export type FilterDefinition =
  | VolumeFilter
  | ConvolutionFilter
  | CrossoverFilter
  | DelayFilter
  | GainFilter
  | OtherFilter;

export interface FilterStep {
  kind: 'filter';
  channel: ChannelIndex;
  names: string[];
}

export interface MixerStep {
  kind: 'mixer';
  name: string;
}

export type PipelineStep = FilterStep | MixerStep;

export interface PipelineDescription {
  devices: DeviceBlock;
  mixers: Record<string, MixerBlock>;
  filters: Record<string, FilterDefinition>;
  pipeline: PipelineStep[];
}
