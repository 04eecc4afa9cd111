/**
 * MeRGBW protocol encoding/decoding
 * Frame format: 55 [cmd] [seq] [len] [payload] [checksum]
 *   - seq is always ff (the lamp does not sequence commands)
 *   - len is the total frame length, checksum included
 *   - checksum = ff - (sum of all preceding bytes & ff), so a valid frame sums to ff
 */

import { EncodingError } from './errors';
import type { DeviceState } from './types';

export const FRAME_HEADER = 0x55;
export const SYNC_HEADER = 0x56;

const UNSEQUENCED = 0xff;
const FRAME_OVERHEAD = 5;
const MAX_FRAME_LENGTH = 0xff;
const MIN_NOTIFICATION_LENGTH = 6;

export const Command = {
  SyncRequest: 0x00,
  Power: 0x01,
  Color: 0x03,
  Brightness: 0x05,
  Scene: 0x06,
  SceneSpeed: 0x0f,
} as const;

export type Command = (typeof Command)[keyof typeof Command];

export function clamp(value: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, value));
}

function byteSum(bytes: Uint8Array, end: number = bytes.length): number {
  let sum = 0;
  for (let i = 0; i < end; i++) sum += bytes[i];
  return sum;
}

export function checksum(sumWithoutChecksum: number): number {
  return (0xff - (sumWithoutChecksum & 0xff)) & 0xff;
}

export function buildCommand(cmd: number, payload: Uint8Array = Buffer.alloc(0)): Buffer {
  const length = FRAME_OVERHEAD + payload.length;
  if (length > MAX_FRAME_LENGTH) {
    throw new EncodingError(`Command too long: ${length} bytes`);
  }

  const frame = Buffer.alloc(length);
  frame[0] = FRAME_HEADER;
  frame[1] = cmd & 0xff;
  frame[2] = UNSEQUENCED;
  frame[3] = length;
  frame.set(payload, 4);
  frame[length - 1] = checksum(byteSum(frame, length - 1));
  return frame;
}

export function encodeU16BE(value: number): Buffer {
  const v = value & 0xffff;
  return Buffer.from([(v >> 8) & 0xff, v & 0xff]);
}

export function encodePower(on: boolean): Buffer {
  return Buffer.from([on ? 0x01 : 0x00]);
}

/**
 * RGB to HSV with every component in [0, 1], hue wrapping at 1.
 */
export function rgbToHsv(r: number, g: number, b: number): { h: number; s: number; v: number } {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  if (max === min) {
    return { h: 0, s: 0, v: max };
  }

  const delta = max - min;
  const rc = (max - r) / delta;
  const gc = (max - g) / delta;
  const bc = (max - b) / delta;

  let h: number;
  if (r === max) {
    h = bc - gc;
  } else if (g === max) {
    h = 2 + rc - bc;
  } else {
    h = 4 + gc - rc;
  }
  h /= 6;
  h -= Math.floor(h);

  return { h, s: delta / max, v: max };
}

// The lamp takes hue + saturation only; brightness has its own command.
export function encodeColor(r: number, g: number, b: number): Buffer {
  const channel = (c: number) => clamp(Math.trunc(c), 0, 255) / 255;
  const { h, s } = rgbToHsv(channel(r), channel(g), channel(b));

  const hueDegrees = Math.floor(h * 360) % 360;
  const saturation = clamp(Math.round(s * 1000), 0, 1000);
  return Buffer.concat([encodeU16BE(hueDegrees), encodeU16BE(saturation)]);
}

// Same scale the vendor app uses: 0% -> 50, 100% -> 1050
export function encodeBrightness(percent: number): Buffer {
  return encodeU16BE(clamp((percent + 5) * 10, 0, 0xffff));
}

export function encodeScene(index: number): Buffer {
  return encodeU16BE(clamp(index, 0, 0xffff));
}

export function encodeSceneSpeed(speed: number): Buffer {
  return Buffer.from([clamp(Math.trunc(speed), 0, 0xff)]);
}

export type NotificationFrame =
  | { variant: 'status'; isOn: boolean; brightnessPercent?: number }
  | { variant: 'sync'; isOn: boolean; brightnessPercent?: number }
  | { variant: 'invalid'; reason: 'empty' | 'short' | 'checksum' | 'length' | 'header' };

function percentInRange(value: number): number | undefined {
  return value >= 0 && value <= 100 ? value : undefined;
}

/**
 * Classify a notification. Firmwares answer either with a 55 frame (same
 * layout as commands) or with a longer 56 sync frame; anything else is
 * reported as invalid rather than guessed at.
 */
export function decodeNotification(data: Uint8Array): NotificationFrame {
  if (data.length === 0) {
    return { variant: 'invalid', reason: 'empty' };
  }
  if (data.length < MIN_NOTIFICATION_LENGTH) {
    return { variant: 'invalid', reason: 'short' };
  }
  if ((byteSum(data) & 0xff) !== 0xff) {
    return { variant: 'invalid', reason: 'checksum' };
  }

  switch (data[0]) {
    case FRAME_HEADER: {
      if (data[3] !== data.length) {
        return { variant: 'invalid', reason: 'length' };
      }
      // payload[0] is the power flag, payload[1] the brightness offset by 5
      const brightnessPercent = data.length >= 7 ? percentInRange(data[5] - 5) : undefined;
      return { variant: 'status', isOn: data[4] !== 0, brightnessPercent };
    }

    case SYNC_HEADER: {
      // TG609-class: power at [4], brightness u16 at [5..7) in the 0x05 command scale
      let brightnessPercent: number | undefined;
      if (data.length >= 8) {
        const value = (data[5] << 8) | data[6];
        brightnessPercent = percentInRange(Math.floor(value / 10) - 5);
      }
      return { variant: 'sync', isOn: data[4] !== 0, brightnessPercent };
    }

    default:
      return { variant: 'invalid', reason: 'header' };
  }
}

export function parseNotification(data: Uint8Array): DeviceState {
  if (data.length === 0) {
    return {};
  }

  const raw = Buffer.from(data);
  const frame = decodeNotification(raw);
  if (frame.variant === 'invalid') {
    return { raw };
  }

  const state: DeviceState = { isOn: frame.isOn, raw };
  if (frame.brightnessPercent !== undefined) {
    state.brightnessPercent = frame.brightnessPercent;
  }
  return state;
}
