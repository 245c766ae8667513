// Pipeline synthesis: turns a (topology, source, correction) choice into a
// complete CamillaDSP pipeline description

import { buildMapping } from './mapping';
import {
  ChannelIndex,
  DeviceBlock,
  FilterDefinition,
  FilterStep,
  HardwareParams,
  InputSource,
  PipelineChoice,
  PipelineDescription,
  PipelineStep,
  SUBWOOFER_COUNT,
} from './types';

export const VOLUME_FILTER = 'volume';
export const LOWPASS_FILTER = 'lowpass';
export const HIGHPASS_FILTER = 'highpass';
export const DELAY_FILTER = 'delay';

export const VOLUME_RAMP_TIME = 200.0;
export const CROSSOVER_ORDER = 8;
export const MONO_DOWNMIX_GAIN = -6.0;

/** Destinations of the two satellite speakers */
const SATELLITE_DESTINATIONS: readonly ChannelIndex[] = [0, 1];

/** Channels carrying the program material on a direct capture, past the playback passthrough pair */
const DIRECT_INPUT_OFFSET = 2;

const LOOPBACK_CHANNELS = 2;

export function correctionFilterName(index: number): string {
  return `drc_${index}`;
}

export function balanceFilterName(index: number): string {
  return `balance${index}`;
}

export function mixerName(sourceLabel: string, topology: string): string {
  return `${sourceLabel}-${topology}`;
}

interface CaptureParams {
  device: string;
  channels: number;
  inputChannels: ChannelIndex[];
}

function captureParams(source: InputSource, hardware: HardwareParams): CaptureParams {
  const base = [0, 1];
  if (source === 'direct') {
    return {
      device: hardware.playbackDevice,
      channels: hardware.playbackChannels,
      inputChannels: base.map(i => i + DIRECT_INPUT_OFFSET),
    };
  }
  return {
    device: hardware.loopbackDevice,
    channels: LOOPBACK_CHANNELS,
    inputChannels: base,
  };
}

function deviceBlock(capture: CaptureParams, hardware: HardwareParams): DeviceBlock {
  return {
    samplerate: hardware.sampleRate,
    chunksize: 8192,
    queuelimit: 4,
    silenceThreshold: 0.0,
    silenceTimeout: 0.0,
    targetLevel: 0,
    adjustPeriod: 10.0,
    enableRateAdjust: true,
    enableResampling: false,
    resamplerType: 'BalancedAsync',
    captureSamplerate: 0,
    capture: {
      type: 'Alsa',
      device: capture.device,
      channels: capture.channels,
      format: hardware.sampleFormat,
      retryOnError: false,
      avoidBlockingRead: false,
      extra: {},
    },
    playback: {
      type: 'Alsa',
      device: hardware.playbackDevice,
      channels: hardware.playbackChannels,
      format: hardware.sampleFormat,
      extra: {},
    },
    extra: {},
  };
}

/**
 * Synthesize the pipeline description for one menu combination.
 * Pure: the same choice and hardware always give an identical description.
 */
export function synthesize(choice: PipelineChoice, hardware: HardwareParams): PipelineDescription {
  const capture = captureParams(choice.source, hardware);
  const filters: Record<string, FilterDefinition> = {
    [VOLUME_FILTER]: { kind: 'volume', rampTime: VOLUME_RAMP_TIME },
  };

  const inputSteps = capture.inputChannels.map((channel): FilterStep => ({
    kind: 'filter',
    channel,
    names: [VOLUME_FILTER],
  }));

  if (choice.correction === 'drc') {
    inputSteps.forEach((step, i) => {
      const name = correctionFilterName(i);
      filters[name] = { kind: 'convolution', filename: hardware.correctionFilterPath, channel: i };
      step.names.push(name);
    });
  }

  if (hardware.balance) {
    inputSteps.forEach((step, i) => {
      const name = balanceFilterName(i);
      filters[name] = { kind: 'gain', gain: 0.0, inverted: false };
      step.names.push(name);
    });
  }

  const mapping = choice.topology === 'Mono'
    ? buildMapping(SATELLITE_DESTINATIONS, capture.inputChannels, true, MONO_DOWNMIX_GAIN)
    : buildMapping(SATELLITE_DESTINATIONS, capture.inputChannels, false);

  const name = mixerName(choice.sourceLabel ?? choice.source, choice.topology);
  const pipeline: PipelineStep[] = [...inputSteps, { kind: 'mixer', name }];

  const subwoofers = SUBWOOFER_COUNT[choice.topology];
  if (subwoofers > 0) {
    const subDestinations = SATELLITE_DESTINATIONS
      .map(i => i + SATELLITE_DESTINATIONS.length)
      .slice(0, subwoofers);

    // A single sub gets a mono sum of both inputs, a pair follows the inputs 1:1
    mapping.push(...buildMapping(subDestinations, capture.inputChannels, subwoofers === 1));

    filters[LOWPASS_FILTER] = {
      kind: 'crossover',
      pass: 'lowpass',
      freq: hardware.crossoverFrequency,
      order: CROSSOVER_ORDER,
    };
    filters[HIGHPASS_FILTER] = {
      kind: 'crossover',
      pass: 'highpass',
      freq: hardware.crossoverFrequency,
      order: CROSSOVER_ORDER,
    };
    filters[DELAY_FILTER] = {
      kind: 'delay',
      delay: hardware.mainsDelay,
      unit: 'ms',
      subsample: false,
    };

    for (const channel of SATELLITE_DESTINATIONS) {
      pipeline.push({ kind: 'filter', channel, names: [HIGHPASS_FILTER, DELAY_FILTER] });
    }
    for (const channel of subDestinations) {
      pipeline.push({ kind: 'filter', channel, names: [LOWPASS_FILTER] });
    }
  }

  return {
    devices: deviceBlock(capture, hardware),
    mixers: {
      [name]: {
        channels: { in: capture.channels, out: hardware.playbackChannels },
        mapping,
      },
    },
    filters,
    pipeline,
  };
}

/**
 * List local consistency problems of a description: unknown filter or mixer
 * references, and channels outside the counts of their stage.
 * An empty list means the description is internally consistent.
 */
export function describeProblems(description: PipelineDescription): string[] {
  const problems: string[] = [];
  // Channels seen by a step: capture channels until a mixer, then its outputs.
  // Null once an unknown mixer hides the stage width.
  let width: number | null = description.devices.capture.channels;

  description.pipeline.forEach((step, index) => {
    if (step.kind === 'mixer') {
      if (!Object.hasOwn(description.mixers, step.name)) {
        problems.push(`pipeline[${index}]: unknown mixer "${step.name}"`);
        width = null;
        return;
      }
      const mixer = description.mixers[step.name];
      if (width !== null && mixer.channels.in !== width) {
        problems.push(`mixer "${step.name}": takes ${mixer.channels.in} channels, stage carries ${width}`);
      }
      for (const mapping of mixer.mapping) {
        if (mapping.destination < 0 || mapping.destination >= mixer.channels.out) {
          problems.push(`mixer "${step.name}": destination ${mapping.destination} out of range`);
        }
        if (!mapping.muted && mapping.sources.length === 0) {
          problems.push(`mixer "${step.name}": destination ${mapping.destination} has no sources`);
        }
        for (const source of mapping.sources) {
          if (source.sourceChannel < 0 || source.sourceChannel >= mixer.channels.in) {
            problems.push(`mixer "${step.name}": source ${source.sourceChannel} out of range`);
          }
        }
      }
      width = mixer.channels.out;
      return;
    }

    if (width !== null && (step.channel < 0 || step.channel >= width)) {
      problems.push(`pipeline[${index}]: channel ${step.channel} out of range (${width} channels)`);
    }
    for (const name of step.names) {
      if (!Object.hasOwn(description.filters, name)) {
        problems.push(`pipeline[${index}]: unknown filter "${name}"`);
      }
    }
  });

  if (width !== null && width !== description.devices.playback.channels) {
    problems.push(`pipeline ends with ${width} channels, playback takes ${description.devices.playback.channels}`);
  }

  return problems;
}
