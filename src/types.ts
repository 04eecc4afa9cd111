export interface Rgb {
  r: number;
  g: number;
  b: number;
}

/**
 * Best-effort state decoded from a notification. A missing field means
 * "unknown", never "off" or "zero".
 */
export interface DeviceState {
  isOn?: boolean;
  brightnessPercent?: number; // 0-100
  raw?: Buffer;
}

export interface LightOptions {
  serviceUuid: string;
  writeUuid: string;
  notifyUuid: string;
  timeoutMs: number; // per connect attempt
  connectRetries: number;
  retryDelayMs: number; // backoff base, multiplied by the attempt number
}

export interface StateQuery {
  waitMs?: number; // Default: 2000
  requestSync?: boolean; // Default: true
}

export type BleBackend = 'noble' | 'node-ble';

export interface DeviceConfig {
  id: string;
  name: string;
  macAddress: string;
}

export interface MQTTCommand {
  state?: 'ON' | 'OFF';
  brightness?: number; // 0-255 (Home Assistant uses 0-255)
  color?: Rgb;
  effect?: string; // scene name
  effect_speed?: number; // 0-255
}

export interface MQTTState {
  state: 'ON' | 'OFF';
  brightness?: number; // 0-255
  effect?: string;
}
