// Conversion between the typed pipeline description and the engine's
// JSON config document. Every engine naming quirk lives in this file.

import { SchemaError } from '../errors';
import {
  CaptureDevice,
  DestinationMapping,
  DeviceBlock,
  FilterDefinition,
  MixerBlock,
  MixRule,
  PipelineDescription,
  PipelineStep,
  PlaybackDevice,
  SampleFormat,
} from './types';

/** Engine config document, as sent over the wire */
export type WireDocument = Record<string, unknown>;

type WireObject = Record<string, unknown>;

const SAMPLE_FORMATS: readonly SampleFormat[] = ['S16LE', 'S24LE', 'S24LE3', 'S32LE', 'FLOAT32LE', 'FLOAT64LE'];

// ============================================================================
// Encoding
// ============================================================================

function encodeCapture(capture: CaptureDevice): WireObject {
  return {
    ...capture.extra,
    type: capture.type,
    channels: capture.channels,
    ...(capture.device === undefined ? {} : { device: capture.device }),
    format: capture.format,
    ...(capture.retryOnError === undefined ? {} : { retry_on_error: capture.retryOnError }),
    ...(capture.avoidBlockingRead === undefined ? {} : { avoid_blocking_read: capture.avoidBlockingRead }),
  };
}

function encodePlayback(playback: PlaybackDevice): WireObject {
  return {
    ...playback.extra,
    type: playback.type,
    channels: playback.channels,
    ...(playback.device === undefined ? {} : { device: playback.device }),
    format: playback.format,
  };
}

function encodeDevices(devices: DeviceBlock): WireObject {
  return {
    ...devices.extra,
    samplerate: devices.samplerate,
    chunksize: devices.chunksize,
    queuelimit: devices.queuelimit,
    silence_threshold: devices.silenceThreshold,
    silence_timeout: devices.silenceTimeout,
    target_level: devices.targetLevel,
    adjust_period: devices.adjustPeriod,
    enable_rate_adjust: devices.enableRateAdjust,
    enable_resampling: devices.enableResampling,
    resampler_type: devices.resamplerType,
    capture_samplerate: devices.captureSamplerate,
    capture: encodeCapture(devices.capture),
    playback: encodePlayback(devices.playback),
  };
}

function encodeMapping(mapping: DestinationMapping): WireObject {
  return {
    dest: mapping.destination,
    mute: mapping.muted,
    sources: mapping.sources.map(source => ({
      channel: source.sourceChannel,
      gain: source.gain,
      inverted: source.inverted,
      mute: source.muted,
    })),
  };
}

function encodeFilter(filter: FilterDefinition): WireObject {
  switch (filter.kind) {
    case 'volume':
      return { type: 'Volume', parameters: { ramp_time: filter.rampTime } };
    case 'convolution':
      return { type: 'Conv', parameters: { type: 'Wav', filename: filter.filename, channel: filter.channel } };
    case 'crossover':
      return {
        type: 'BiquadCombo',
        parameters: {
          type: filter.pass === 'lowpass' ? 'LinkwitzRileyLowpass' : 'LinkwitzRileyHighpass',
          freq: filter.freq,
          order: filter.order,
        },
      };
    case 'delay':
      return { type: 'Delay', parameters: { delay: filter.delay, unit: filter.unit, subsample: filter.subsample } };
    case 'gain':
      return { type: 'Gain', parameters: { gain: filter.gain, inverted: filter.inverted } };
    case 'other':
      return { type: filter.type, parameters: { ...filter.parameters } };
  }
}

function encodeStep(step: PipelineStep): WireObject {
  return step.kind === 'mixer'
    ? { type: 'Mixer', name: step.name }
    : { type: 'Filter', channel: step.channel, names: [...step.names] };
}

function mapRecord<T, U>(record: Record<string, T>, fn: (value: T, key: string) => U): Record<string, U> {
  const result: Record<string, U> = {};
  for (const [key, value] of Object.entries(record)) {
    result[key] = fn(value, key);
  }
  return result;
}

/**
 * Convert a typed description into the engine's config document
 */
export function encodeDescription(description: PipelineDescription): WireDocument {
  return {
    devices: encodeDevices(description.devices),
    mixers: mapRecord(description.mixers, mixer => ({
      channels: { in: mixer.channels.in, out: mixer.channels.out },
      mapping: mixer.mapping.map(encodeMapping),
    })),
    filters: mapRecord(description.filters, encodeFilter),
    pipeline: description.pipeline.map(encodeStep),
  };
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Cursor over an untrusted value that remembers its path for error messages
 */
class Reader {
  constructor(private readonly value: unknown, readonly path: string) {}

  private fail(expected: string): never {
    throw new SchemaError(`${this.path}: expected ${expected}`, [this.path]);
  }

  object(): WireObject {
    const value = this.value;
    if (value === null || typeof value !== 'object' || Array.isArray(value)) {
      return this.fail('an object');
    }
    const result: WireObject = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = entry;
    }
    return result;
  }

  field(key: string): Reader {
    return new Reader(this.object()[key], `${this.path}.${key}`);
  }

  /** Field that may be absent or null, e.g. an engine default that was omitted */
  optional(key: string): Reader | null {
    const value = this.object()[key];
    return value === undefined || value === null ? null : new Reader(value, `${this.path}.${key}`);
  }

  entries(): Reader[] {
    return Object.entries(this.object()).map(([key, value]) => new Reader(value, `${this.path}.${key}`));
  }

  keys(): string[] {
    return Object.keys(this.object());
  }

  /** Fields other than `known`, passed through untouched */
  rest(known: readonly string[]): WireObject {
    const result: WireObject = {};
    for (const [key, value] of Object.entries(this.object())) {
      if (!known.includes(key)) {
        result[key] = value;
      }
    }
    return result;
  }

  items(): Reader[] {
    if (!Array.isArray(this.value)) {
      return this.fail('an array');
    }
    return this.value.map((item: unknown, i) => new Reader(item, `${this.path}[${i}]`));
  }

  number(): number {
    return typeof this.value === 'number' && Number.isFinite(this.value) ? this.value : this.fail('a number');
  }

  channel(): number {
    const value = this.number();
    return Number.isInteger(value) && value >= 0 ? value : this.fail('a channel index');
  }

  boolean(): boolean {
    return typeof this.value === 'boolean' ? this.value : this.fail('a boolean');
  }

  string(): string {
    return typeof this.value === 'string' ? this.value : this.fail('a string');
  }

  oneOf<T extends string>(options: readonly T[]): T {
    const value = this.string();
    const match = options.find(option => option === value);
    return match ?? this.fail(`one of ${options.join(', ')}`);
  }
}

function numberOr(reader: Reader, key: string, fallback: number): number {
  return reader.optional(key)?.number() ?? fallback;
}

function booleanOr(reader: Reader, key: string, fallback: boolean): boolean {
  return reader.optional(key)?.boolean() ?? fallback;
}

const CAPTURE_FIELDS = ['type', 'device', 'channels', 'format', 'retry_on_error', 'avoid_blocking_read'];
const PLAYBACK_FIELDS = ['type', 'device', 'channels', 'format'];
const DEVICE_FIELDS = [
  'samplerate',
  'chunksize',
  'queuelimit',
  'silence_threshold',
  'silence_timeout',
  'target_level',
  'adjust_period',
  'enable_rate_adjust',
  'enable_resampling',
  'resampler_type',
  'capture_samplerate',
  'capture',
  'playback',
];

function decodeCapture(reader: Reader): CaptureDevice {
  return {
    type: reader.field('type').string(),
    device: reader.optional('device')?.string(),
    channels: reader.field('channels').number(),
    format: reader.field('format').oneOf(SAMPLE_FORMATS),
    retryOnError: reader.optional('retry_on_error')?.boolean(),
    avoidBlockingRead: reader.optional('avoid_blocking_read')?.boolean(),
    extra: reader.rest(CAPTURE_FIELDS),
  };
}

function decodePlayback(reader: Reader): PlaybackDevice {
  return {
    type: reader.field('type').string(),
    device: reader.optional('device')?.string(),
    channels: reader.field('channels').number(),
    format: reader.field('format').oneOf(SAMPLE_FORMATS),
    extra: reader.rest(PLAYBACK_FIELDS),
  };
}

function decodeDevices(reader: Reader): DeviceBlock {
  return {
    samplerate: reader.field('samplerate').number(),
    chunksize: reader.field('chunksize').number(),
    queuelimit: numberOr(reader, 'queuelimit', 4),
    silenceThreshold: numberOr(reader, 'silence_threshold', 0),
    silenceTimeout: numberOr(reader, 'silence_timeout', 0),
    targetLevel: numberOr(reader, 'target_level', 0),
    adjustPeriod: numberOr(reader, 'adjust_period', 10),
    enableRateAdjust: booleanOr(reader, 'enable_rate_adjust', false),
    enableResampling: booleanOr(reader, 'enable_resampling', false),
    resamplerType: reader.optional('resampler_type')?.string() ?? 'BalancedAsync',
    captureSamplerate: numberOr(reader, 'capture_samplerate', 0),
    capture: decodeCapture(reader.field('capture')),
    playback: decodePlayback(reader.field('playback')),
    extra: reader.rest(DEVICE_FIELDS),
  };
}

function decodeRule(reader: Reader): MixRule {
  return {
    sourceChannel: reader.field('channel').channel(),
    gain: numberOr(reader, 'gain', 0),
    inverted: booleanOr(reader, 'inverted', false),
    muted: booleanOr(reader, 'mute', false),
  };
}

function decodeMixer(reader: Reader): MixerBlock {
  const channels = reader.field('channels');
  return {
    channels: { in: channels.field('in').number(), out: channels.field('out').number() },
    mapping: reader.field('mapping').items().map(entry => ({
      destination: entry.field('dest').channel(),
      muted: booleanOr(entry, 'mute', false),
      sources: entry.field('sources').items().map(decodeRule),
    })),
  };
}

function decodeFilter(reader: Reader): FilterDefinition {
  const type = reader.field('type').string();
  const parameters = reader.field('parameters');

  switch (type) {
    case 'Volume':
      return { kind: 'volume', rampTime: numberOr(parameters, 'ramp_time', 200) };
    case 'Conv':
      if (parameters.optional('type')?.string() === 'Wav') {
        return {
          kind: 'convolution',
          filename: parameters.field('filename').string(),
          channel: numberOr(parameters, 'channel', 0),
        };
      }
      break;
    case 'BiquadCombo': {
      const combo = parameters.field('type').string();
      if (combo === 'LinkwitzRileyLowpass' || combo === 'LinkwitzRileyHighpass') {
        return {
          kind: 'crossover',
          pass: combo === 'LinkwitzRileyLowpass' ? 'lowpass' : 'highpass',
          freq: parameters.field('freq').number(),
          order: parameters.field('order').number(),
        };
      }
      break;
    }
    case 'Delay':
      return {
        kind: 'delay',
        delay: parameters.field('delay').number(),
        unit: parameters.optional('unit')?.oneOf(['ms', 'samples'] as const) ?? 'ms',
        subsample: booleanOr(parameters, 'subsample', false),
      };
    case 'Gain':
      return {
        kind: 'gain',
        gain: parameters.field('gain').number(),
        inverted: booleanOr(parameters, 'inverted', false),
      };
  }

  return { kind: 'other', type, parameters: parameters.object() };
}

function decodeStep(reader: Reader): PipelineStep {
  const type = reader.field('type').oneOf(['Filter', 'Mixer'] as const);
  if (type === 'Mixer') {
    return { kind: 'mixer', name: reader.field('name').string() };
  }
  return {
    kind: 'filter',
    channel: reader.field('channel').channel(),
    names: reader.field('names').items().map(name => name.string()),
  };
}

function decodeRecord<T>(reader: Reader | null, decode: (entry: Reader) => T): Record<string, T> {
  const result: Record<string, T> = {};
  if (!reader) {
    return result;
  }
  const keys = reader.keys();
  reader.entries().forEach((entry, i) => {
    result[keys[i]] = decode(entry);
  });
  return result;
}

/**
 * Narrow an engine config document into a typed description.
 * Throws SchemaError naming the first offending path.
 */
export function decodeDescription(value: unknown): PipelineDescription {
  const root = new Reader(value, 'config');
  return {
    devices: decodeDevices(root.field('devices')),
    mixers: decodeRecord(root.optional('mixers'), decodeMixer),
    filters: decodeRecord(root.optional('filters'), decodeFilter),
    pipeline: root.optional('pipeline')?.items().map(decodeStep) ?? [],
  };
}
