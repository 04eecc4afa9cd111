import mqtt, { type IClientOptions, type MqttClient } from 'mqtt';
import type { LightController } from './device';
import type { DeviceConfig, DeviceState, MQTTCommand, MQTTState, Rgb } from './types';

export interface MQTTBridgeOptions {
  username?: string;
  password?: string;
  clientId?: string;
  stateWaitMs?: number; // how long to wait for a notification after a command
}

function isByte(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= 255;
}

function isRgb(value: unknown): value is Rgb {
  return (
    typeof value === 'object' &&
    value !== null &&
    'r' in value &&
    isByte(value.r) &&
    'g' in value &&
    isByte(value.g) &&
    'b' in value &&
    isByte(value.b)
  );
}

export function isMQTTCommand(value: unknown): value is MQTTCommand {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  if ('state' in value && value.state !== 'ON' && value.state !== 'OFF') return false;
  if ('brightness' in value && !isByte(value.brightness)) return false;
  if ('color' in value && !isRgb(value.color)) return false;
  if ('effect' in value && typeof value.effect !== 'string') return false;
  if ('effect_speed' in value && !isByte(value.effect_speed)) return false;
  return true;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class MQTTBridge {
  private client: MqttClient | null = null;
  private lights = new Map<string, LightController>();
  private lastPower = new Map<string, boolean>();
  private lastEffect = new Map<string, string>();
  private baseTopic: string;

  constructor(
    private brokerUrl: string,
    private brokerOptions?: MQTTBridgeOptions,
    baseTopic: string = 'hexagon'
  ) {
    this.baseTopic = baseTopic;
  }

  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const options: IClientOptions = {
        clientId: this.brokerOptions?.clientId || `hexagon-bridge-${Date.now()}`,
        reconnectPeriod: 5000,
        connectTimeout: 10000,
      };

      if (this.brokerOptions?.username) {
        options.username = this.brokerOptions.username;
      }
      if (this.brokerOptions?.password) {
        options.password = this.brokerOptions.password;
      }

      this.client = mqtt.connect(this.brokerUrl, options);

      this.client.on('connect', () => {
        console.log(`[MQTT] Connected to broker at ${this.brokerUrl}`);
        this.subscribeToCommands();
        resolve();
      });

      this.client.on('error', error => {
        console.error('[MQTT] Error:', error);
        reject(error);
      });

      this.client.on('message', (topic, payload) => {
        void this.handleMessage(topic, payload.toString());
      });

      this.client.on('reconnect', () => {
        console.log('[MQTT] Reconnecting...');
      });

      this.client.on('close', () => {
        console.log('[MQTT] Connection closed');
      });
    });
  }

  private subscribeToCommands(): void {
    const commandTopic = `${this.baseTopic}/+/set`;
    this.client?.subscribe(commandTopic, err => {
      if (err) {
        console.error(`[MQTT] Failed to subscribe to ${commandTopic}:`, err);
      } else {
        console.log(`[MQTT] Subscribed to ${commandTopic}`);
      }
    });
  }

  /** Handle one message from `<base>/<id>/set`. Never rejects; failures are logged. */
  async handleMessage(topic: string, payload: string): Promise<void> {
    const match = topic.match(new RegExp(`^${escapeRegExp(this.baseTopic)}/([^/]+)/set$`));
    if (!match) {
      return;
    }

    const deviceId = match[1];
    const light = this.lights.get(deviceId);
    if (!light) {
      console.warn(`[MQTT] Device ${deviceId} not found`);
      return;
    }

    let command: MQTTCommand;
    try {
      const parsed: unknown = JSON.parse(payload);
      if (!isMQTTCommand(parsed)) {
        throw new Error(`Unsupported command shape: ${payload}`);
      }
      command = parsed;
    } catch (error) {
      console.error(`[MQTT] Failed to parse command for ${deviceId}:`, error);
      return;
    }

    console.log(`[MQTT] Received command for ${deviceId}:`, command);
    try {
      await this.applyCommand(deviceId, light, command);
    } catch (error) {
      console.error(`[MQTT] Failed to apply command for ${deviceId}:`, error);
      return;
    }
    await this.refreshState(deviceId);
  }

  // Power first so a lamp switched on also takes the colour/brightness/effect that follow
  private async applyCommand(deviceId: string, light: LightController, command: MQTTCommand): Promise<void> {
    if (command.state !== undefined) {
      const on = command.state === 'ON';
      await (on ? light.turnOn() : light.turnOff());
      this.lastPower.set(deviceId, on);
    }

    if (command.color) {
      await light.setRgb(command.color.r, command.color.g, command.color.b);
      this.lastEffect.delete(deviceId);
    }

    if (command.brightness !== undefined) {
      // Home Assistant uses 0-255, the lamp 0-100
      await light.setBrightness(Math.round((command.brightness / 255) * 100));
    }

    if (command.effect !== undefined) {
      await light.setScene(command.effect, command.effect_speed);
      this.lastEffect.set(deviceId, command.effect);
    }
  }

  registerDevice(light: LightController, config: DeviceConfig): void {
    this.lights.set(config.id, light);
    console.log(`[MQTT] Registered device: ${config.name} (${config.id})`);
  }

  /** Read the lamp's state and publish it. Read failures are logged. */
  async refreshState(deviceId: string): Promise<void> {
    const light = this.lights.get(deviceId);
    if (!light) {
      return;
    }

    try {
      const state = await light.getState({ waitMs: this.brokerOptions?.stateWaitMs ?? 2000 });
      this.publishState(deviceId, state);
    } catch (error) {
      console.error(`[MQTT] Failed to read state for ${deviceId}:`, error);
    }
  }

  publishState(deviceId: string, state: DeviceState): void {
    if (!this.client) {
      console.warn(`[MQTT] Cannot publish state for ${deviceId}: MQTT client not initialized`);
      return;
    }

    if (!this.client.connected) {
      console.warn(`[MQTT] Cannot publish state for ${deviceId}: MQTT client not connected`);
      return;
    }

    // Lamps often stay silent; fall back to the last power we commanded
    const isOn = state.isOn ?? this.lastPower.get(deviceId) ?? false;
    const mqttState: MQTTState = {
      state: isOn ? 'ON' : 'OFF',
    };

    if (state.brightnessPercent !== undefined) {
      mqttState.brightness = Math.floor((state.brightnessPercent / 100) * 255);
    }

    const effect = this.lastEffect.get(deviceId);
    if (effect !== undefined) {
      mqttState.effect = effect;
    }

    const topic = `${this.baseTopic}/${deviceId}/state`;
    const payload = JSON.stringify(mqttState);

    console.log(`[MQTT] Publishing state for ${deviceId} to topic ${topic}:`, mqttState);

    this.client.publish(topic, payload, { retain: true, qos: 1 }, err => {
      if (err) {
        console.error(`[MQTT] Failed to publish state for ${deviceId}:`, err);
      } else {
        console.log(`[MQTT] Successfully published state for ${deviceId}`);
      }
    });
  }

  disconnect(): void {
    if (this.client) {
      this.client.end();
      this.client = null;
    }
  }
}
