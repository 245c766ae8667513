import * as HID from 'node-hid';
import { debug } from '../log';
import {
  KNOWN_RECEIVERS,
  DETECTION_HINTS,
  ReceiverProfile,
  getReceiverProfileOrDefault,
} from './protocol';

const log = debug('hid');

/** HID usage pages a receiver reports key presses on */
const GENERIC_DESKTOP_PAGE = 0x01;
const CONSUMER_PAGE = 0x0c;

export interface ReceiverDevice {
  path: string;
  vendorId: number;
  productId: number;
  serialNumber?: string;
  productName?: string;
  manufacturer?: string;
  usagePage?: number;
  profile: ReceiverProfile;
  isKnown: boolean;          // True if this is a known receiver
  isPotentialReceiver: boolean; // True if detected via heuristics
}

// Unknown receivers we've already logged this session
const reportedUnknownDevices = new Set<string>();

/**
 * Determines if a HID device might be an IR receiver based on heuristics.
 */
function isPotentialReceiver(device: HID.Device): boolean {
  if (!DETECTION_HINTS.vendorIds.includes(device.vendorId)) {
    return false;
  }
  const product = device.product;
  const manufacturer = device.manufacturer;
  return (
    (product !== undefined && DETECTION_HINTS.productPatterns.some(pattern => pattern.test(product))) ||
    (manufacturer !== undefined && DETECTION_HINTS.manufacturerPatterns.some(pattern => pattern.test(manufacturer)))
  );
}

function isKnownReceiver(device: HID.Device): boolean {
  return KNOWN_RECEIVERS.some(
    known => known.vendorId === device.vendorId && known.productId === device.productId
  );
}

/**
 * Receivers expose several interfaces; only the keyboard and consumer
 * control ones carry button presses. Platforms that don't report a usage
 * page keep every interface.
 */
function isKeyInterface(device: HID.Device): boolean {
  return device.usagePage === undefined
    || device.usagePage === GENERIC_DESKTOP_PAGE
    || device.usagePage === CONSUMER_PAGE;
}

/**
 * Scan for all receiver interfaces (known and potential)
 */
export async function scanForReceivers(): Promise<ReceiverDevice[]> {
  const hidDevices = await HID.devicesAsync();
  return processDevices(hidDevices);
}

/**
 * Process HID device list and return receiver interfaces
 */
export function processDevices(hidDevices: HID.Device[]): ReceiverDevice[] {
  const results: ReceiverDevice[] = [];
  const seenPaths = new Set<string>();

  for (const device of hidDevices) {
    if (!device.path || seenPaths.has(device.path)) continue;
    seenPaths.add(device.path);

    const isKnown = isKnownReceiver(device);
    const isPotential = !isKnown && isPotentialReceiver(device);
    if (!(isKnown || isPotential) || !isKeyInterface(device)) continue;

    results.push({
      path: device.path,
      vendorId: device.vendorId,
      productId: device.productId,
      serialNumber: device.serialNumber,
      productName: device.product,
      manufacturer: device.manufacturer,
      usagePage: device.usagePage,
      profile: getReceiverProfileOrDefault(device.vendorId, device.productId, device.product),
      isKnown,
      isPotentialReceiver: isPotential,
    });

    if (isPotential) {
      logUnknownDevice(device);
    }
  }

  return results;
}

/**
 * Log receivers detected via heuristics, once per vendor/product pair
 */
function logUnknownDevice(device: HID.Device): void {
  const key = `${device.vendorId}:${device.productId}`;
  if (reportedUnknownDevices.has(key)) return;
  reportedUnknownDevices.add(key);

  log('unknown receiver detected:', getDeviceFingerprint(device));
}

/**
 * Utility to generate a device fingerprint for debugging
 */
export function getDeviceFingerprint(
  device: Pick<HID.Device, 'vendorId' | 'productId' | 'manufacturer' | 'product'>
): string {
  return [
    `VID:0x${device.vendorId.toString(16).padStart(4, '0')}`,
    `PID:0x${device.productId.toString(16).padStart(4, '0')}`,
    device.manufacturer ?? 'Unknown Mfr',
    device.product ?? 'Unknown Product',
  ].join(' | ');
}
