export { RemoteConnection } from './connection';
export { scanForReceivers, getDeviceFingerprint, type ReceiverDevice } from './scanner';
export {
  DEFAULT_KEY_BINDINGS,
  bindingKey,
  mergeKeyBindings,
  resolveAction,
  type KeyBindings,
} from './keybindings';
export { parseInputReport, type KeyPressEvent, type ReceiverProfile } from './protocol';
