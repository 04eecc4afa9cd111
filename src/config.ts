import type { BleBackend, DeviceConfig, LightOptions } from './types';

export interface Config {
  address?: string;
  backend: BleBackend;
  light: Partial<LightOptions>;
  devices: DeviceConfig[];
  mqtt: {
    brokerUrl: string;
    username?: string;
    password?: string;
    baseTopic: string;
  };
}

export function isBackend(value: string): value is BleBackend {
  return value === 'noble' || value === 'node-ble';
}

function isDeviceConfig(value: unknown): value is DeviceConfig {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'macAddress' in value &&
    typeof value.macAddress === 'string'
  );
}

function readCount(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Invalid ${name}: ${raw} (expected a non-negative integer)`);
  }
  return value;
}

function readDevices(env: NodeJS.ProcessEnv): DeviceConfig[] {
  const devicesJson = env.DEVICES || '[]';
  let parsed: unknown;

  try {
    parsed = JSON.parse(devicesJson);
  } catch (error) {
    console.error('[Config] Failed to parse DEVICES JSON:', error);
    console.error('[Config] Make sure DEVICES is a valid JSON array on a single line');
    throw new Error('Invalid DEVICES configuration. Must be a valid JSON array.');
  }

  if (!Array.isArray(parsed) || !parsed.every(isDeviceConfig)) {
    throw new Error('Invalid DEVICES configuration. Each entry needs string id, name and macAddress.');
  }
  return parsed;
}

/**
 * Read configuration from environment variables (a .env file is loaded
 * into the environment by the entry point).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const backend = env.BLE_BACKEND || 'noble';
  if (!isBackend(backend)) {
    throw new Error(`Invalid BLE_BACKEND: ${backend} (expected noble or node-ble)`);
  }

  const light: Partial<LightOptions> = {};
  const timeoutMs = readCount(env, 'LIGHT_TIMEOUT_MS');
  const connectRetries = readCount(env, 'LIGHT_CONNECT_RETRIES');
  const retryDelayMs = readCount(env, 'LIGHT_RETRY_DELAY_MS');
  if (timeoutMs !== undefined) light.timeoutMs = timeoutMs;
  if (connectRetries !== undefined) light.connectRetries = connectRetries;
  if (retryDelayMs !== undefined) light.retryDelayMs = retryDelayMs;

  return {
    address: env.HEXAGON_MAC || undefined,
    backend,
    light,
    devices: readDevices(env),
    mqtt: {
      brokerUrl: env.MQTT_BROKER_URL || 'mqtt://localhost:1883',
      username: env.MQTT_USERNAME,
      password: env.MQTT_PASSWORD,
      baseTopic: env.MQTT_BASE_TOPIC || 'hexagon',
    },
  };
}
