#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { createLight, releaseTransports } from './ble';
import { formatScenes, parseCliArgs, runCommand, USAGE, type CliOptions } from './cli';
import { loadConfig, type Config } from './config';
import type { LightController } from './device';
import { errorMessage, UsageError } from './errors';
import { MQTTBridge } from './mqtt-bridge';
import type { BleBackend } from './types';

dotenv.config();

const STATE_REFRESH_INTERVAL_MS = 30000;

async function runBridge(config: Config, backend: BleBackend): Promise<void> {
  console.log('[Main] Starting Hexagon MQTT bridge...');
  console.log(`[Main] Loaded ${config.devices.length} device(s)`);

  if (config.devices.length === 0) {
    throw new UsageError('No devices configured. Please set the DEVICES environment variable.');
  }

  const mqttBridge = new MQTTBridge(
    config.mqtt.brokerUrl,
    {
      username: config.mqtt.username,
      password: config.mqtt.password,
    },
    config.mqtt.baseTopic
  );

  await mqttBridge.connect();
  console.log('[Main] MQTT bridge connected');

  // One at a time: most adapters cannot scan while another connection is being set up
  const connected = new Map<string, LightController>();
  for (const deviceConfig of config.devices) {
    const light = createLight(deviceConfig.macAddress, backend, config.light);
    console.log(`[Main] Connecting to ${deviceConfig.name}...`);
    try {
      await light.connect();
    } catch (error) {
      console.error(`[Main] ✗ Failed to connect to ${deviceConfig.name}: ${errorMessage(error)}`);
      await light.disconnect();
      continue;
    }
    mqttBridge.registerDevice(light, deviceConfig);
    connected.set(deviceConfig.id, light);
    console.log(`[Main] ✓ Successfully connected to ${deviceConfig.name}`);
    await mqttBridge.refreshState(deviceConfig.id);
  }

  if (connected.size === 0) {
    mqttBridge.disconnect();
    throw new Error('No devices connected');
  }

  console.log(`[Main] Bridge running. ${connected.size} device(s) connected.`);

  let refreshing = false;
  const refreshTimer = setInterval(() => {
    if (refreshing) {
      return;
    }
    refreshing = true;
    void (async () => {
      for (const deviceId of connected.keys()) {
        await mqttBridge.refreshState(deviceId);
      }
    })().finally(() => {
      refreshing = false;
    });
  }, STATE_REFRESH_INTERVAL_MS);

  await new Promise<void>(resolve => {
    const shutdown = () => {
      console.log('[Main] Shutting down...');
      resolve();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

  clearInterval(refreshTimer);
  const results = await Promise.allSettled([...connected.values()].map(light => light.disconnect()));
  for (const result of results) {
    if (result.status === 'rejected') {
      console.warn(`[Main] Error during disconnect: ${errorMessage(result.reason)}`);
    }
  }
  mqttBridge.disconnect();
}

async function runSingle(options: CliOptions, config: Config, backend: BleBackend): Promise<void> {
  const address = options.mac ?? config.address;
  if (!address) {
    throw new UsageError('No lamp address: pass --mac or set HEXAGON_MAC');
  }

  const light = createLight(address, backend, config.light);
  try {
    await light.connect();
    await runCommand(light, options);
  } finally {
    await light.disconnect().catch((error: unknown) => {
      console.warn(`[Main] Error during disconnect: ${errorMessage(error)}`);
    });
  }
}

async function main(argv: string[]): Promise<number> {
  try {
    const options = parseCliArgs(argv);
    if (options.command.kind === 'scenes') {
      for (const line of formatScenes()) {
        console.log(line);
      }
      return 0;
    }

    const config = loadConfig();
    const backend = options.backend ?? config.backend;
    if (options.command.kind === 'bridge') {
      await runBridge(config, backend);
    } else {
      await runSingle(options, config, backend);
    }
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      console.error(USAGE);
      return 2;
    }
    console.error(`[Main] Fatal error: ${errorMessage(error)}`);
    return 1;
  }
}

main(process.argv.slice(2)).then(code => {
  releaseTransports();
  // noble keeps its HCI socket open; exit explicitly
  process.exit(code);
});
