export {
  DEFAULT_LIGHT_OPTIONS,
  DEFAULT_NOTIFY_UUID,
  DEFAULT_SERVICE_UUID,
  DEFAULT_WRITE_UUID,
  HexagonLight,
  type LightController,
} from './device';
export {
  buildCommand,
  checksum,
  Command,
  decodeNotification,
  encodeBrightness,
  encodeColor,
  encodePower,
  encodeScene,
  encodeSceneSpeed,
  encodeU16BE,
  parseNotification,
  rgbToHsv,
  type NotificationFrame,
} from './encoding';
export * from './errors';
export { SerialExecutor } from './executor';
export { listScenes, resolveSceneName } from './scenes';
export { Session, type SessionState } from './session';
export { expandUuid, normalizeAddress, normalizeUuid, type Transport, type WriteTarget } from './transport';
export { NobleTransport, type NobleCentral, type NobleLink } from './transport-noble';
export { NodeBleTransport, type NodeBleAdapter, type NodeBleLink } from './transport-nodeble';
export { createLight, releaseTransports } from './ble';
export { loadConfig, type Config } from './config';
export { MQTTBridge, type MQTTBridgeOptions } from './mqtt-bridge';
export type { BleBackend, DeviceConfig, DeviceState, LightOptions, Rgb, StateQuery } from './types';
