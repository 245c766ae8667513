// Remote button -> control action bindings

import type { ControlAction } from '../control/actions';
import type { KeyPressEvent, UsagePage } from './protocol';

export type KeyBindings = ReadonlyMap<string, ControlAction>;

export function bindingKey(page: UsagePage, usage: number): string {
  return `${page}:0x${usage.toString(16).padStart(2, '0')}`;
}

const BINDING_KEY_PATTERN = /^(keyboard|consumer):(?:0x)?([0-9a-f]{1,4})$/i;

/**
 * Normalize a user-written key such as `Consumer:E9` to its `bindingKey`
 * form, or null when it names no usage page and usage
 */
export function parseBindingKey(key: string): string | null {
  const match = BINDING_KEY_PATTERN.exec(key.trim());
  if (!match) {
    return null;
  }
  const page: UsagePage = match[1].toLowerCase() === 'keyboard' ? 'keyboard' : 'consumer';
  return bindingKey(page, parseInt(match[2], 16));
}

// Keyboard page (0x07) usages
const KEY_C = 0x06;
const KEY_BACKSPACE = 0x2a;
const KEY_COMMA = 0x36;
const KEY_PERIOD = 0x37;
const KEY_PAGE_UP = 0x4b;
const KEY_PAGE_DOWN = 0x4e;
const KEY_RIGHT = 0x4f;
const KEY_LEFT = 0x50;
const KEY_DOWN = 0x51;
const KEY_UP = 0x52;
const KEY_KEYPAD_ENTER = 0x58;

// Consumer page (0x0C) usages
const CONSUMER_PLAY = 0xb0;
const CONSUMER_NEXT_TRACK = 0xb5;
const CONSUMER_PREV_TRACK = 0xb6;
const CONSUMER_STOP = 0xb7;
const CONSUMER_PLAY_PAUSE = 0xcd;
const CONSUMER_MUTE = 0xe2;
const CONSUMER_VOLUME_UP = 0xe9;
const CONSUMER_VOLUME_DOWN = 0xea;

/**
 * Bindings for a Harmony-style remote learned onto the receiver.
 * Buttons without an entry (info, colour keys, digits, record) do nothing.
 */
export const DEFAULT_KEY_BINDINGS: KeyBindings = new Map<string, ControlAction>([
  [bindingKey('keyboard', KEY_BACKSPACE), 'navExit'],
  [bindingKey('keyboard', KEY_PAGE_UP), 'topologyNext'], // rocker next to Info
  [bindingKey('keyboard', KEY_PAGE_DOWN), 'topologyPrev'],
  [bindingKey('keyboard', KEY_UP), 'navUp'],
  [bindingKey('keyboard', KEY_DOWN), 'navDown'],
  [bindingKey('keyboard', KEY_LEFT), 'balanceLeft'],
  [bindingKey('keyboard', KEY_RIGHT), 'balanceRight'],
  [bindingKey('keyboard', KEY_KEYPAD_ENTER), 'navSelect'], // OK
  [bindingKey('keyboard', KEY_C), 'menu'],
  [bindingKey('keyboard', KEY_PERIOD), 'sourceNext'], // Ch+
  [bindingKey('keyboard', KEY_COMMA), 'sourcePrev'], // Ch-
  [bindingKey('consumer', CONSUMER_VOLUME_UP), 'volumeUp'],
  [bindingKey('consumer', CONSUMER_VOLUME_DOWN), 'volumeDown'],
  [bindingKey('consumer', CONSUMER_MUTE), 'muteToggle'],
  [bindingKey('consumer', CONSUMER_PLAY), 'trackPlay'],
  [bindingKey('consumer', CONSUMER_PLAY_PAUSE), 'trackPlay'],
  [bindingKey('consumer', CONSUMER_NEXT_TRACK), 'trackNext'],
  [bindingKey('consumer', CONSUMER_PREV_TRACK), 'trackPrev'],
  [bindingKey('consumer', CONSUMER_STOP), 'trackStop'],
]);

/**
 * Resolve a key press to its action, or null when the key is unbound
 */
export function resolveAction(event: KeyPressEvent, bindings: KeyBindings = DEFAULT_KEY_BINDINGS): ControlAction | null {
  return bindings.get(bindingKey(event.page, event.usage)) ?? null;
}

/**
 * Apply user overrides, keyed like `keyboard:0x4b` or `consumer:0xe9`.
 * A null action unbinds the key.
 */
export function mergeKeyBindings(
  overrides: Readonly<Record<string, ControlAction | null>>,
  base: KeyBindings = DEFAULT_KEY_BINDINGS
): KeyBindings {
  const merged = new Map(base);
  for (const [key, action] of Object.entries(overrides)) {
    if (action === null) {
      merged.delete(key);
    } else {
      merged.set(key, action);
    }
  }
  return merged;
}
