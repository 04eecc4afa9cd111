import {
  buildCommand,
  clamp,
  Command,
  encodeBrightness,
  encodeColor,
  encodePower,
  encodeScene,
  encodeSceneSpeed,
} from './encoding';
import { SerialExecutor } from './executor';
import { resolveSceneName } from './scenes';
import { Session } from './session';
import type { Transport } from './transport';
import type { DeviceState, LightOptions, StateQuery } from './types';

export const DEFAULT_SERVICE_UUID = '0000fff0-0000-1000-8000-00805f9b34fb';
export const DEFAULT_WRITE_UUID = '0000fff3-0000-1000-8000-00805f9b34fb';
export const DEFAULT_NOTIFY_UUID = '0000fff4-0000-1000-8000-00805f9b34fb';

export const DEFAULT_LIGHT_OPTIONS: LightOptions = {
  serviceUuid: DEFAULT_SERVICE_UUID,
  writeUuid: DEFAULT_WRITE_UUID,
  notifyUuid: DEFAULT_NOTIFY_UUID,
  timeoutMs: 15000,
  connectRetries: 5,
  retryDelayMs: 700,
};

const CALL_MARGIN_MS = 5000;
const CONNECT_MARGIN_MS = 10000;

/** What the CLI and the MQTT bridge need from a lamp. */
export interface LightController {
  readonly address: string;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
  turnOn(): Promise<void>;
  turnOff(): Promise<void>;
  setRgb(r: number, g: number, b: number): Promise<void>;
  setBrightness(percent: number): Promise<void>;
  setScene(scene: number | string, speed?: number): Promise<void>;
  getState(query?: StateQuery): Promise<DeviceState>;
}

/**
 * Hexagon (MeRGBW) lamp.
 *
 *   const lamp = new HexagonLight('FF:FF:11:52:AB:BD', transport);
 *   await lamp.connect();
 *   await lamp.setRgb(255, 100, 50);
 *   await lamp.setBrightness(80);
 *   await lamp.disconnect();
 *
 * Every call is queued on the lamp's own executor, so calls made without
 * awaiting still reach the device in order.
 */
export class HexagonLight<H, C> implements LightController {
  private readonly options: LightOptions;
  private readonly session: Session<H, C>;
  private readonly executor: SerialExecutor;

  constructor(
    readonly address: string,
    transport: Transport<H, C>,
    options: Partial<LightOptions> = {}
  ) {
    this.options = { ...DEFAULT_LIGHT_OPTIONS, ...options };
    this.session = new Session(address, transport, this.options);
    this.executor = new SerialExecutor(`hexagon-light ${address}`);
  }

  /** Deadline for one call once connected. */
  get callTimeoutMs(): number {
    return this.options.timeoutMs + CALL_MARGIN_MS;
  }

  /** Deadline for connect(): every attempt timing out plus the whole backoff sequence. */
  get connectTimeoutMs(): number {
    const { timeoutMs, connectRetries, retryDelayMs } = this.options;
    const retries = Math.max(1, connectRetries);
    return timeoutMs * retries + (retryDelayMs * (retries * (retries + 1))) / 2 + CONNECT_MARGIN_MS;
  }

  async connect(): Promise<void> {
    this.executor.start();
    this.session.open();
    await this.executor.submit(() => this.session.connect(), this.connectTimeoutMs);
  }

  async disconnect(): Promise<void> {
    this.session.markClosing();
    try {
      if (this.executor.isRunning) {
        await this.submit(() => this.session.disconnect());
      }
    } finally {
      await this.executor.stop();
    }
  }

  isConnected(): boolean {
    return this.session.isConnected();
  }

  async turnOn(): Promise<void> {
    await this.send(buildCommand(Command.Power, encodePower(true)));
  }

  async turnOff(): Promise<void> {
    await this.send(buildCommand(Command.Power, encodePower(false)));
  }

  async setRgb(r: number, g: number, b: number): Promise<void> {
    await this.send(buildCommand(Command.Color, encodeColor(r, g, b)));
  }

  async setBrightness(percent: number): Promise<void> {
    const clamped = clamp(Math.trunc(percent), 0, 100);
    await this.send(buildCommand(Command.Brightness, encodeBrightness(clamped)));
  }

  /**
   * Select a built-in effect by index or name. The optional speed is a
   * separate frame written right after the scene, in the same operation.
   */
  async setScene(scene: number | string, speed?: number): Promise<void> {
    const index = typeof scene === 'number' ? Math.trunc(scene) : resolveSceneName(scene);
    const frames = [buildCommand(Command.Scene, encodeScene(index))];
    if (speed !== undefined) {
      frames.push(buildCommand(Command.SceneSpeed, encodeSceneSpeed(speed)));
    }

    await this.submit(async () => {
      for (const frame of frames) {
        await this.session.write(frame);
      }
    });
  }

  /**
   * Best-effort state via notifications. Many lamps only notify after a
   * change, so an unknown state (no fields) is a normal answer.
   */
  async getState({ waitMs = 2000, requestSync = true }: StateQuery = {}): Promise<DeviceState> {
    return this.session.awaitState(Math.max(0, waitMs), requestSync, operation => this.submit(operation));
  }

  private send(frame: Buffer): Promise<void> {
    return this.submit(() => this.session.write(frame));
  }

  private submit<T>(operation: () => Promise<T>): Promise<T> {
    return this.executor.submit(operation, this.callTimeoutMs);
  }
}
