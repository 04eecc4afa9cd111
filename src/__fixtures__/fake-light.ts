import { vi } from 'vitest';
import type { LightController } from '../device';
import type { DeviceState, StateQuery } from '../types';

/** LightController stand-in that records every lamp call in order. */
export function createFakeLight(state: DeviceState = {}) {
  const calls: string[] = [];
  const light = {
    address: 'AA:BB:CC:DD:EE:FF',
    connect: vi.fn(async () => {}),
    disconnect: vi.fn(async () => {}),
    isConnected: vi.fn(() => true),
    turnOn: vi.fn(async () => {
      calls.push('on');
    }),
    turnOff: vi.fn(async () => {
      calls.push('off');
    }),
    setRgb: vi.fn(async (r: number, g: number, b: number) => {
      calls.push(`rgb ${r} ${g} ${b}`);
    }),
    setBrightness: vi.fn(async (percent: number) => {
      calls.push(`brightness ${percent}`);
    }),
    setScene: vi.fn(async (scene: number | string, speed?: number) => {
      calls.push(`scene ${scene} ${speed}`);
    }),
    getState: vi.fn(async (_query?: StateQuery): Promise<DeviceState> => state),
  } satisfies LightController;

  return { light, calls };
}
