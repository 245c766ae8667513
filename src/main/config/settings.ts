// Remote settings: defaults plus an optional JSON file on disk

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { isControlAction, type ControlAction } from '../control/actions';
import { errorMessage } from '../errors';
import { parseBindingKey } from '../hid/keybindings';
import { debug } from '../log';
import { parseTopologyLabel, type MenuDefinition, type SourceOption } from '../pipeline/catalog';
import type { HardwareParams, InputSource } from '../pipeline/types';

const log = debug('settings');

export const SETTINGS_ENV = 'DSP_REMOTE_SETTINGS';

export const CONFIG_DIR = path.join(os.homedir(), '.config', 'dsp-remote');

export interface EngineSettings {
  host: string;
  port: number;
  /** Per-request timeout in ms */
  requestTimeout: number;
  /** Retry interval in ms after the engine connection drops */
  reconnectInterval: number;
}

export interface ControlSettings {
  /** dB per volume or balance step */
  volumeStep: number;
  minVolume: number;
  /** Mute blink period in ms */
  blinkPeriod: number;
  /** Receiver rescan interval in ms */
  scanInterval: number;
  /** Hold time in ms before a volume or balance key starts repeating */
  repeatDelay: number;
  /** Time between repeats in ms; 0 turns repeating off */
  repeatInterval: number;
  /** Load selections from prepared config files in configDir instead of the catalog */
  loadFromFiles: boolean;
}

export interface RemoteSettings {
  engine: EngineSettings;
  /** Topology labels such as '2.1 DRC', in menu order */
  topologies: string[];
  sources: SourceOption[];
  hardware: HardwareParams;
  control: ControlSettings;
  /** Directory of the per-combination config files used by the file loading path */
  configDir: string;
  /** Overrides for the default remote bindings; null unbinds a key */
  keyBindings: Record<string, ControlAction | null>;
}

export function createDefaultSettings(configDir: string = CONFIG_DIR): RemoteSettings {
  return {
    engine: {
      host: '127.0.0.1',
      port: 31234,
      requestTimeout: 5000,
      reconnectInterval: 3000,
    },
    topologies: ['2.1 DRC', '2.1', '2.0', 'Mono'],
    sources: [
      { label: 'Stream', source: 'stream' },
      { label: 'Phono', source: 'direct' },
    ],
    hardware: {
      playbackDevice: 'hw:CARD=M4,DEV=0',
      playbackChannels: 4,
      loopbackDevice: 'hw:Loopback,1',
      sampleFormat: 'S32LE',
      sampleRate: 44100,
      crossoverFrequency: 80,
      mainsDelay: 9.2,
      correctionFilterPath: path.join(configDir, 'filters', 'drc.wav'),
      balance: true,
    },
    control: {
      volumeStep: 0.5,
      minVolume: -99.5,
      blinkPeriod: 500,
      scanInterval: 3000,
      repeatDelay: 500,
      repeatInterval: 100,
      loadFromFiles: false,
    },
    configDir,
    keyBindings: {},
  };
}

/**
 * Get the settings file path
 */
export function getSettingsPath(): string {
  return process.env[SETTINGS_ENV] ?? path.join(CONFIG_DIR, 'settings.json');
}

/**
 * Load settings from disk.
 * Returns defaults if the file doesn't exist or is invalid.
 */
export function loadSettings(settingsPath: string = getSettingsPath()): RemoteSettings {
  try {
    if (fs.existsSync(settingsPath)) {
      const data = fs.readFileSync(settingsPath, 'utf-8');
      const parsed: unknown = JSON.parse(data);
      return mergeWithDefaults(parsed);
    }
    log(`no settings at ${settingsPath}, using defaults`);
  } catch (err) {
    log.error(`Failed to load settings from ${settingsPath}:`, errorMessage(err));
  }

  return createDefaultSettings();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function pickNumber(source: Record<string, unknown>, key: string, fallback: number): number {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function pickString(source: Record<string, unknown>, key: string, fallback: string): string {
  const value = source[key];
  return typeof value === 'string' && value.length > 0 ? value : fallback;
}

function pickBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = source[key];
  return typeof value === 'boolean' ? value : fallback;
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isRecord(value) ? value : {};
}

function mergeTopologies(value: unknown, fallback: string[]): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    return fallback;
  }
  const labels: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new Error(`topologies: expected labels, got ${JSON.stringify(item)}`);
    }
    // Throws on labels the synthesizer can't build
    parseTopologyLabel(item);
    labels.push(item);
  }
  return labels;
}

function mergeSources(value: unknown, fallback: SourceOption[]): SourceOption[] {
  if (!Array.isArray(value) || value.length === 0) {
    return fallback;
  }
  return value.map((item: unknown): SourceOption => {
    const label = isRecord(item) ? item.label : undefined;
    const kind = isRecord(item) ? item.source : undefined;
    if (typeof label !== 'string' || !isInputSource(kind)) {
      throw new Error(`sources: expected { label, source: "stream" | "direct" }, got ${JSON.stringify(item)}`);
    }
    return { label, source: kind };
  });
}

function isInputSource(value: unknown): value is InputSource {
  return value === 'stream' || value === 'direct';
}

function mergeKeyBindingOverrides(value: unknown): Record<string, ControlAction | null> {
  const result: Record<string, ControlAction | null> = {};
  if (!isRecord(value)) {
    return result;
  }
  for (const [key, action] of Object.entries(value)) {
    const normalized = parseBindingKey(key);
    if (normalized === null) {
      log.error(`ignoring binding ${key}: expected a key like keyboard:0x4b or consumer:0xe9`);
    } else if (action === null || (typeof action === 'string' && isControlAction(action))) {
      result[normalized] = action;
    } else {
      log.error(`ignoring binding ${key}: unknown action ${JSON.stringify(action)}`);
    }
  }
  return result;
}

/**
 * Merge loaded settings with defaults.
 * Missing or mistyped scalar fields fall back to their default; malformed
 * menus are rejected, since the catalog is built from them.
 */
export function mergeWithDefaults(loaded: unknown): RemoteSettings {
  const source: Record<string, unknown> = isRecord(loaded) ? loaded : {};
  const configDir = pickString(source, 'configDir', CONFIG_DIR);
  const defaults = createDefaultSettings(configDir);

  const engine = section(source, 'engine');
  const hardware = section(source, 'hardware');
  const control = section(source, 'control');
  const sampleFormat = hardware.sampleFormat;

  return {
    engine: {
      host: pickString(engine, 'host', defaults.engine.host),
      port: pickNumber(engine, 'port', defaults.engine.port),
      requestTimeout: pickNumber(engine, 'requestTimeout', defaults.engine.requestTimeout),
      reconnectInterval: pickNumber(engine, 'reconnectInterval', defaults.engine.reconnectInterval),
    },
    topologies: mergeTopologies(source.topologies, defaults.topologies),
    sources: mergeSources(source.sources, defaults.sources),
    hardware: {
      playbackDevice: pickString(hardware, 'playbackDevice', defaults.hardware.playbackDevice),
      playbackChannels: pickNumber(hardware, 'playbackChannels', defaults.hardware.playbackChannels),
      loopbackDevice: pickString(hardware, 'loopbackDevice', defaults.hardware.loopbackDevice),
      sampleFormat:
        sampleFormat === 'S16LE' || sampleFormat === 'S24LE' || sampleFormat === 'S24LE3'
        || sampleFormat === 'S32LE' || sampleFormat === 'FLOAT32LE' || sampleFormat === 'FLOAT64LE'
          ? sampleFormat
          : defaults.hardware.sampleFormat,
      sampleRate: pickNumber(hardware, 'sampleRate', defaults.hardware.sampleRate),
      crossoverFrequency: pickNumber(hardware, 'crossoverFrequency', defaults.hardware.crossoverFrequency),
      mainsDelay: pickNumber(hardware, 'mainsDelay', defaults.hardware.mainsDelay),
      correctionFilterPath: pickString(hardware, 'correctionFilterPath', defaults.hardware.correctionFilterPath),
      balance: pickBoolean(hardware, 'balance', defaults.hardware.balance),
    },
    control: {
      volumeStep: pickNumber(control, 'volumeStep', defaults.control.volumeStep),
      minVolume: pickNumber(control, 'minVolume', defaults.control.minVolume),
      blinkPeriod: pickNumber(control, 'blinkPeriod', defaults.control.blinkPeriod),
      scanInterval: pickNumber(control, 'scanInterval', defaults.control.scanInterval),
      repeatDelay: pickNumber(control, 'repeatDelay', defaults.control.repeatDelay),
      repeatInterval: pickNumber(control, 'repeatInterval', defaults.control.repeatInterval),
      loadFromFiles: pickBoolean(control, 'loadFromFiles', defaults.control.loadFromFiles),
    },
    configDir,
    keyBindings: mergeKeyBindingOverrides(source.keyBindings),
  };
}

/**
 * Menu definition the catalog is built from
 */
export function menuFromSettings(settings: RemoteSettings): MenuDefinition {
  return {
    topologies: settings.topologies.map(parseTopologyLabel),
    sources: settings.sources,
  };
}
