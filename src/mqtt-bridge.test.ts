import mqtt from 'mqtt';
import { vi } from 'vitest';
import { createFakeLight } from './__fixtures__/fake-light';
import { UnknownSceneError } from './errors';
import { isMQTTCommand, MQTTBridge } from './mqtt-bridge';
import type { DeviceConfig, DeviceState } from './types';

type Listener = (...args: unknown[]) => void;

const mockMqttClient = vi.hoisted(() => ({
  on: vi.fn(),
  subscribe: vi.fn(),
  publish: vi.fn(),
  end: vi.fn(),
  connected: true,
}));

vi.mock('mqtt', () => {
  const connect = vi.fn(() => mockMqttClient);
  return {
    __esModule: true,
    default: { connect },
    connect,
  };
});

const deviceConfig: DeviceConfig = {
  id: 'desk',
  name: 'Desk Hexagon',
  macAddress: 'AA:BB:CC:DD:EE:FF',
};

function listenerFor(event: string): Listener | undefined {
  const call = mockMqttClient.on.mock.calls.find(([name]) => name === event);
  return call?.[1];
}

async function connectBridge(bridge: MQTTBridge): Promise<void> {
  mockMqttClient.on.mockImplementation((event: string, callback: Listener) => {
    if (event === 'connect') {
      setTimeout(() => callback(), 0);
    }
  });
  await bridge.connect();
}

function lastPublished(): { topic: string; payload: unknown; options: unknown } {
  const [topic, payload, options] = mockMqttClient.publish.mock.calls[mockMqttClient.publish.mock.calls.length - 1];
  return { topic, payload: JSON.parse(payload), options };
}

describe('MQTTBridge', () => {
  let bridge: MQTTBridge;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    mockMqttClient.connected = true;
    mockMqttClient.subscribe.mockImplementation((_topic: string, callback?: (err: Error | null) => void) => {
      callback?.(null);
    });
    mockMqttClient.publish.mockImplementation(
      (_topic: string, _payload: string, _options: unknown, callback?: (err?: Error) => void) => {
        callback?.();
      }
    );

    bridge = new MQTTBridge('mqtt://localhost:1883', { stateWaitMs: 0 });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Connection', () => {
    it('should connect to MQTT broker', async () => {
      await connectBridge(bridge);

      expect(mqtt.connect).toHaveBeenCalledWith(
        'mqtt://localhost:1883',
        expect.objectContaining({
          clientId: expect.stringMatching(/^hexagon-bridge-\d+$/),
          reconnectPeriod: 5000,
          connectTimeout: 10000,
        })
      );
    });

    it('should subscribe to command topics on connect', async () => {
      await connectBridge(bridge);

      expect(mockMqttClient.subscribe).toHaveBeenCalledWith('hexagon/+/set', expect.any(Function));
    });

    it('should use a custom base topic', async () => {
      await connectBridge(new MQTTBridge('mqtt://localhost:1883', undefined, 'lights'));

      expect(mockMqttClient.subscribe).toHaveBeenCalledWith('lights/+/set', expect.any(Function));
    });

    it('should handle connection errors', async () => {
      const error = new Error('Connection failed');
      mockMqttClient.on.mockImplementation((event: string, callback: Listener) => {
        if (event === 'error') {
          setTimeout(() => callback(error), 0);
        }
      });

      await expect(bridge.connect()).rejects.toThrow('Connection failed');
    });

    it('should use custom client ID and credentials if provided', async () => {
      await connectBridge(
        new MQTTBridge('mqtt://localhost:1883', { clientId: 'custom-id', username: 'user', password: 'test-secret' })
      );

      expect(mqtt.connect).toHaveBeenCalledWith(
        'mqtt://localhost:1883',
        expect.objectContaining({ clientId: 'custom-id', username: 'user', password: 'test-secret' })
      );
    });

    it('should end the client on disconnect', async () => {
      await connectBridge(bridge);
      bridge.disconnect();

      expect(mockMqttClient.end).toHaveBeenCalledTimes(1);
    });
  });

  describe('Command handling', () => {
    beforeEach(async () => {
      await connectBridge(bridge);
    });

    function register(state: DeviceState = {}) {
      const fake = createFakeLight(state);
      bridge.registerDevice(fake.light, deviceConfig);
      return fake;
    }

    it('should turn the lamp on and publish the commanded power', async () => {
      const { light } = register();

      await bridge.handleMessage('hexagon/desk/set', '{"state":"ON"}');

      expect(light.turnOn).toHaveBeenCalledTimes(1);
      expect(light.getState).toHaveBeenCalledWith({ waitMs: 0 });
      expect(lastPublished()).toEqual({
        topic: 'hexagon/desk/state',
        payload: { state: 'ON' },
        options: { retain: true, qos: 1 },
      });
    });

    it('should prefer the state reported by the lamp', async () => {
      register({ isOn: false, brightnessPercent: 50 });

      await bridge.handleMessage('hexagon/desk/set', '{"state":"ON"}');

      // 50% of 255 = 127.5, floored
      expect(lastPublished().payload).toEqual({ state: 'OFF', brightness: 127 });
    });

    it('should apply power, color, brightness and effect in that order', async () => {
      const { calls } = register();
      const command = {
        effect: 'rainbow',
        effect_speed: 40,
        brightness: 255,
        color: { r: 255, g: 0, b: 0 },
        state: 'ON',
      };

      await bridge.handleMessage('hexagon/desk/set', JSON.stringify(command));

      expect(calls).toEqual(['on', 'rgb 255 0 0', 'brightness 100', 'scene rainbow 40']);
      expect(lastPublished().payload).toEqual({ state: 'ON', effect: 'rainbow' });
    });

    it('should convert Home Assistant brightness to percent', async () => {
      const { light } = register();

      await bridge.handleMessage('hexagon/desk/set', '{"brightness":128}');

      expect(light.setBrightness).toHaveBeenCalledWith(50);
    });

    it('should drop the effect once a color is set', async () => {
      register();

      await bridge.handleMessage('hexagon/desk/set', '{"effect":"aurora"}');
      await bridge.handleMessage('hexagon/desk/set', '{"color":{"r":0,"g":0,"b":255}}');

      expect(lastPublished().payload).toEqual({ state: 'OFF' });
    });

    it('should ignore invalid JSON', async () => {
      const { calls } = register();

      await bridge.handleMessage('hexagon/desk/set', 'not json');

      expect(calls).toEqual([]);
      expect(mockMqttClient.publish).not.toHaveBeenCalled();
      expect(console.error).toHaveBeenCalled();
    });

    it('should ignore commands with out-of-range values', async () => {
      const { calls } = register();

      await bridge.handleMessage('hexagon/desk/set', '{"brightness":300}');

      expect(calls).toEqual([]);
      expect(mockMqttClient.publish).not.toHaveBeenCalled();
    });

    it('should ignore unknown devices', async () => {
      const { calls } = register();

      await bridge.handleMessage('hexagon/kitchen/set', '{"state":"ON"}');

      expect(calls).toEqual([]);
      expect(console.warn).toHaveBeenCalledWith('[MQTT] Device kitchen not found');
    });

    it('should ignore other topics', async () => {
      const { calls } = register();

      await bridge.handleMessage('other/desk/set', '{"state":"ON"}');
      await bridge.handleMessage('hexagon/desk/state', '{"state":"ON"}');

      expect(calls).toEqual([]);
    });

    it('should not publish when the command fails', async () => {
      const { light } = register();
      light.setScene.mockRejectedValueOnce(new UnknownSceneError('disco'));

      await bridge.handleMessage('hexagon/desk/set', '{"effect":"disco"}');

      expect(mockMqttClient.publish).not.toHaveBeenCalled();
      expect(console.error).toHaveBeenCalled();
    });

    it('should route broker messages to the lamp', async () => {
      const { light } = register();
      const onMessage = listenerFor('message');

      onMessage?.('hexagon/desk/set', Buffer.from('{"state":"OFF"}'));

      await vi.waitFor(() => expect(mockMqttClient.publish).toHaveBeenCalled());
      expect(light.turnOff).toHaveBeenCalledTimes(1);
    });
  });

  describe('State publishing', () => {
    it('should not publish before connecting', () => {
      bridge.publishState('desk', { isOn: true });

      expect(mockMqttClient.publish).not.toHaveBeenCalled();
    });

    it('should not publish while the broker is unreachable', async () => {
      await connectBridge(bridge);
      mockMqttClient.connected = false;

      bridge.publishState('desk', { isOn: true });

      expect(mockMqttClient.publish).not.toHaveBeenCalled();
    });

    it('should publish a full state', async () => {
      await connectBridge(bridge);

      bridge.publishState('desk', { isOn: true, brightnessPercent: 100 });

      expect(lastPublished().payload).toEqual({ state: 'ON', brightness: 255 });
    });

    it('should refresh a registered lamp', async () => {
      await connectBridge(bridge);
      const { light } = createFakeLight({ isOn: true });
      bridge.registerDevice(light, deviceConfig);

      await bridge.refreshState('desk');

      expect(lastPublished().payload).toEqual({ state: 'ON' });
    });

    it('should log a failed state read', async () => {
      await connectBridge(bridge);
      const { light } = createFakeLight();
      light.getState.mockRejectedValueOnce(new Error('timed out'));
      bridge.registerDevice(light, deviceConfig);

      await bridge.refreshState('desk');

      expect(mockMqttClient.publish).not.toHaveBeenCalled();
      expect(console.error).toHaveBeenCalled();
    });
  });
});

describe('isMQTTCommand', () => {
  it('should accept well-formed commands', () => {
    expect(isMQTTCommand({})).toBe(true);
    expect(isMQTTCommand({ state: 'OFF', brightness: 0, color: { r: 1, g: 2, b: 3 } })).toBe(true);
  });

  it('should reject malformed commands', () => {
    expect(isMQTTCommand(null)).toBe(false);
    expect(isMQTTCommand([])).toBe(false);
    expect(isMQTTCommand({ state: 'on' })).toBe(false);
    expect(isMQTTCommand({ color: { r: 1, g: 2 } })).toBe(false);
    expect(isMQTTCommand({ effect: 7 })).toBe(false);
    expect(isMQTTCommand({ effect_speed: -1 })).toBe(false);
  });
});
