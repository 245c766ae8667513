#!/usr/bin/env node
import { loadSettings, menuFromSettings, RemoteSettings } from './config/settings';
import { ControlAction } from './control/actions';
import { LiveController } from './control/controller';
import { ConsoleDisplay } from './control/display';
import { CamillaConnection, configFileLoader, Reconnector } from './engine';
import { InvariantViolation, errorMessage } from './errors';
import { getDeviceFingerprint, mergeKeyBindings, RemoteConnection, scanForReceivers } from './hid';
import { log, logError } from './log';
import { buildCatalog } from './pipeline';

let engine: CamillaConnection | null = null;
let engineRetry: Reconnector | null = null;
let remote: RemoteConnection | null = null;
let controller: LiveController | null = null;
let display: ConsoleDisplay | null = null;
let scanInterval: NodeJS.Timeout | null = null;
let isQuitting = false;

function handleAction(action: ControlAction): void {
  if (!controller) {
    return;
  }
  controller.dispatch(action).catch((error: unknown) => {
    logError(`${action} failed:`, errorMessage(error));
    if (error instanceof InvariantViolation) {
      // Menu and catalog disagree: nothing sensible left to do
      shutdown(1);
    }
  });
}

async function connectToReceiver(settings: RemoteSettings): Promise<void> {
  // If already connected, don't try again
  if (remote?.isConnected()) {
    return;
  }

  const receivers = await scanForReceivers();
  if (receivers.length === 0) {
    return;
  }

  // All interfaces of the first receiver found
  const first = receivers[0];
  const interfaces = receivers.filter(r => r.vendorId === first.vendorId && r.productId === first.productId);
  log(`Found ${first.profile.name}:`, interfaces.map(r => r.path).join(', '));
  if (!first.isKnown) {
    log('Receiver is not a known model:', getDeviceFingerprint({ ...first, product: first.productName }));
  }

  if (remote) {
    remote.disconnect();
    remote = null;
    await new Promise(resolve => setTimeout(resolve, 100));
  }

  const connection = new RemoteConnection(mergeKeyBindings(settings.keyBindings), first.profile, {
    delay: settings.control.repeatDelay,
    interval: settings.control.repeatInterval,
  });
  remote = connection;

  connection.on('connected', () => {
    log(`Connected to ${first.profile.name}`);
  });

  connection.on('disconnected', () => {
    log(`Disconnected from ${first.profile.name}`);
  });

  connection.on('action', handleAction);

  connection.on('error', (error: unknown) => {
    logError('Receiver error:', errorMessage(error));
  });

  if (!connection.connect(interfaces.map(r => r.path))) {
    logError(`Failed to open ${first.profile.name}`);
  }
}

function startReceiverScanning(settings: RemoteSettings): void {
  const scan = () => {
    connectToReceiver(settings).catch((error: unknown) => {
      logError('Receiver scan failed:', errorMessage(error));
    });
  };

  // Initial scan, then keep looking while disconnected
  scan();
  scanInterval = setInterval(() => {
    if (!remote || !remote.isConnected()) {
      scan();
    }
  }, settings.control.scanInterval);
}

async function main(): Promise<void> {
  const settings = loadSettings();

  const connection = new CamillaConnection(settings.engine);
  engine = connection;
  connection.on('error', (error: unknown) => {
    logError('Engine error:', errorMessage(error));
  });

  // Actions fail with EngineError while the link is down, then work again
  const retry = new Reconnector(connection, settings.engine.reconnectInterval, () => {
    log(`Reconnected to engine at ${connection.url}`);
  });
  engineRetry = retry;
  connection.on('disconnected', () => {
    if (isQuitting) {
      return;
    }
    logError('Engine connection lost');
    display?.showError('Engine connection lost');
    retry.start();
  });
  await connection.connect();
  log(`Connected to engine at ${connection.url}`);

  // Every selectable pipeline is checked before the remote does anything
  const catalog = await buildCatalog(menuFromSettings(settings), settings.hardware, connection);

  display = new ConsoleDisplay(settings.control.blinkPeriod);
  controller = new LiveController(catalog, connection, display, {
    volumeStep: settings.control.volumeStep,
    minVolume: settings.control.minVolume,
    loadSelection: settings.control.loadFromFiles ? configFileLoader(settings.configDir) : undefined,
  });
  await controller.start();

  startReceiverScanning(settings);
}

function cleanup(): void {
  if (engineRetry) {
    engineRetry.stop();
    engineRetry = null;
  }
  if (scanInterval) {
    clearInterval(scanInterval);
    scanInterval = null;
  }
  if (remote) {
    remote.disconnect();
    remote = null;
  }
  if (display) {
    display.close();
    display = null;
  }
  if (engine) {
    engine.disconnect();
    engine = null;
  }
  controller = null;
}

function shutdown(code: number): void {
  if (isQuitting) {
    return;
  }
  isQuitting = true;
  cleanup();
  process.exitCode = code;
}

process.on('SIGINT', () => shutdown(0));
process.on('SIGTERM', () => shutdown(0));

main().catch((error: unknown) => {
  logError('Startup failed:', errorMessage(error));
  shutdown(1);
});
