// IR receiver USB HID report decoding

// ============================================================================
// Device Registry
// ============================================================================

export interface ReceiverProfile {
  vendorId: number;
  productId: number;
  name: string;
  /** Report id carrying boot-keyboard style key arrays */
  keyboardReportId: number;
  /** Report id carrying a single 16-bit consumer-control usage */
  consumerReportId: number;
}

// Known receiver profiles - add new devices here as they're discovered
export const KNOWN_RECEIVERS: ReceiverProfile[] = [
  {
    vendorId: 0x20a0,
    productId: 0x0006,
    name: 'FLIRC',
    keyboardReportId: 0x01,
    consumerReportId: 0x02,
  },
];

// Heuristic patterns for detecting receivers that are not in the registry
export const DETECTION_HINTS = {
  vendorIds: [0x20a0],
  productPatterns: [/flirc/i, /ir receiver/i, /remote/i],
  manufacturerPatterns: [/flirc/i],
};

// Report layout assumed for unknown receivers
export const UNKNOWN_RECEIVER_PROFILE: Omit<ReceiverProfile, 'vendorId' | 'productId' | 'name'> = {
  keyboardReportId: 0x01,
  consumerReportId: 0x02,
};

// ============================================================================
// Protocol Constants
// ============================================================================

/** Keys a boot keyboard report can hold at once */
export const KEYBOARD_ROLLOVER = 6;

/** Keyboard report: id, modifiers, reserved, then the key array */
export const KEYBOARD_KEYS_OFFSET = 3;

/** Usage code for "no key" and for the rollover error marker */
const KEY_NONE = 0x00;
const KEY_ERROR_ROLLOVER = 0x01;

// ============================================================================
// Event Types
// ============================================================================

export type UsagePage = 'keyboard' | 'consumer';

export interface KeyPressEvent {
  type: 'key-press';
  page: UsagePage;
  usage: number;
}

/**
 * Keys currently held, per usage page; successive reports are diffed
 * against it so a held key fires once
 */
export interface ReceiverState {
  keyboard: number[];
  consumer: number[];
}

export function createReceiverState(): ReceiverState {
  return { keyboard: [], consumer: [] };
}

export function isSameState(a: ReceiverState, b: ReceiverState): boolean {
  const same = (x: number[], y: number[]) => x.length === y.length && x.every(usage => y.includes(usage));
  return same(a.keyboard, b.keyboard) && same(a.consumer, b.consumer);
}

export interface ParsedReport {
  events: KeyPressEvent[];
  state: ReceiverState;
}

// ============================================================================
// Packet Parsing
// ============================================================================

function pressedSince(previous: number[], current: number[], page: UsagePage): KeyPressEvent[] {
  return current
    .filter(usage => !previous.includes(usage))
    .map((usage): KeyPressEvent => ({ type: 'key-press', page, usage }));
}

/**
 * Decode one input report into newly pressed keys.
 * Returns null for reports that are too short or carry an unknown id.
 */
export function parseInputReport(
  data: Buffer,
  previous: ReceiverState,
  profile: Pick<ReceiverProfile, 'keyboardReportId' | 'consumerReportId'> = UNKNOWN_RECEIVER_PROFILE
): ParsedReport | null {
  if (data.length < 1) {
    return null;
  }

  const reportId = data[0];

  if (reportId === profile.keyboardReportId) {
    if (data.length < KEYBOARD_KEYS_OFFSET + 1) {
      return null;
    }
    const keys: number[] = [];
    const end = Math.min(data.length, KEYBOARD_KEYS_OFFSET + KEYBOARD_ROLLOVER);
    for (let i = KEYBOARD_KEYS_OFFSET; i < end; i++) {
      const usage = data[i];
      if (usage === KEY_ERROR_ROLLOVER) {
        // Phantom state: keep what was held before
        return { events: [], state: previous };
      }
      if (usage !== KEY_NONE && !keys.includes(usage)) {
        keys.push(usage);
      }
    }
    const state = { ...previous, keyboard: keys };
    return { events: pressedSince(previous.keyboard, keys, 'keyboard'), state };
  }

  if (reportId === profile.consumerReportId) {
    if (data.length < 3) {
      return null;
    }
    const usage = data.readUInt16LE(1);
    const keys = usage === KEY_NONE ? [] : [usage];
    const state = { ...previous, consumer: keys };
    return { events: pressedSince(previous.consumer, keys, 'consumer'), state };
  }

  return null;
}

// ============================================================================
// Device Profile Lookup
// ============================================================================

export function findReceiverProfile(vendorId: number, productId: number): ReceiverProfile | null {
  return KNOWN_RECEIVERS.find(
    d => d.vendorId === vendorId && d.productId === productId
  ) ?? null;
}

export function getReceiverProfileOrDefault(vendorId: number, productId: number, name?: string): ReceiverProfile {
  const known = findReceiverProfile(vendorId, productId);
  if (known) return known;

  return {
    vendorId,
    productId,
    name: name ?? `Unknown receiver (${vendorId.toString(16)}:${productId.toString(16)})`,
    ...UNKNOWN_RECEIVER_PROFILE,
  };
}
