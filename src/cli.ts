import { isBackend } from './config';
import type { LightController } from './device';
import { UsageError } from './errors';
import { listScenes } from './scenes';
import type { BleBackend, DeviceState, Rgb } from './types';

export const USAGE = `Usage: hexagon-light [--mac ADDR] [--wait SECONDS] [--backend noble|node-ble] <command>

Commands:
  on                          Turn on
  off                         Turn off
  status                      Best-effort: read state from notifications
  scenes                      Print known scene names
  rgb R G B                   Set RGB color
  brightness PERCENT          Set brightness percent (0-100)
  scene INDEX|NAME [--speed N]
                              Set built-in scene/effect by index or name
  set [--power on|off|keep] [--rgb R G B] [--brightness P] [--scene S] [--scene-speed N]
                              Set multiple properties in one run
  bridge                      Run the MQTT bridge for the lamps in DEVICES`;

export type PowerChoice = 'on' | 'off' | 'keep';

export type CliCommand =
  | { kind: 'on' }
  | { kind: 'off' }
  | { kind: 'status' }
  | { kind: 'scenes' }
  | { kind: 'bridge' }
  | { kind: 'rgb'; rgb: Rgb }
  | { kind: 'brightness'; percent: number }
  | { kind: 'scene'; scene: number | string; speed?: number }
  | {
      kind: 'set';
      power: PowerChoice;
      rgb?: Rgb;
      brightness?: number;
      scene?: number | string;
      sceneSpeed?: number;
    };

export interface CliOptions {
  mac?: string;
  waitSeconds: number;
  backend?: BleBackend;
  command: CliCommand;
}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined) {
    throw new UsageError(`${flag} needs a value`);
  }
  return value;
}

function parseInteger(value: string, label: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new UsageError(`${label} must be an integer, got ${JSON.stringify(value)}`);
  }
  return Number(value);
}

function parseRgb(args: string[], start: number): Rgb {
  const [r, g, b] = [0, 1, 2].map(offset => parseInteger(takeValue(args, start + offset, 'rgb'), 'rgb'));
  return { r, g, b };
}

// Digits only means an index; anything else is looked up by name later
function parseScene(value: string): number | string {
  const trimmed = value.trim();
  return /^\d+$/.test(trimmed) ? Number(trimmed) : trimmed;
}

function expectNoArgs(kind: string, params: string[]): void {
  if (params.length > 0) {
    throw new UsageError(`${kind} takes no arguments, got: ${params.join(' ')}`);
  }
}

function parseSet(params: string[]): CliCommand {
  const command: Extract<CliCommand, { kind: 'set' }> = { kind: 'set', power: 'keep' };

  for (let i = 0; i < params.length; i++) {
    const flag = params[i];
    switch (flag) {
      case '--power': {
        const power = takeValue(params, ++i, flag);
        if (power !== 'on' && power !== 'off' && power !== 'keep') {
          throw new UsageError(`--power must be on, off or keep, got ${JSON.stringify(power)}`);
        }
        command.power = power;
        break;
      }
      case '--rgb':
        command.rgb = parseRgb(params, i + 1);
        i += 3;
        break;
      case '--brightness':
        command.brightness = parseInteger(takeValue(params, ++i, flag), 'brightness');
        break;
      case '--scene':
        command.scene = parseScene(takeValue(params, ++i, flag));
        break;
      case '--scene-speed':
        command.sceneSpeed = parseInteger(takeValue(params, ++i, flag), 'scene speed');
        break;
      default:
        throw new UsageError(`Unknown option for set: ${flag}`);
    }
  }
  return command;
}

function parseCommand(kind: string, params: string[]): CliCommand {
  switch (kind) {
    case 'on':
    case 'off':
    case 'status':
    case 'scenes':
    case 'bridge':
      expectNoArgs(kind, params);
      return { kind };

    case 'rgb':
      if (params.length !== 3) {
        throw new UsageError('rgb needs exactly three values: R G B');
      }
      return { kind, rgb: parseRgb(params, 0) };

    case 'brightness':
      if (params.length !== 1) {
        throw new UsageError('brightness needs one value: PERCENT');
      }
      return { kind, percent: parseInteger(params[0], 'brightness') };

    case 'scene': {
      const [scene, ...flags] = params;
      if (scene === undefined || scene.startsWith('--')) {
        throw new UsageError('scene needs an index or a name');
      }
      const command: Extract<CliCommand, { kind: 'scene' }> = { kind, scene: parseScene(scene) };
      if (flags.length > 0) {
        if (flags[0] !== '--speed' || flags.length !== 2) {
          throw new UsageError(`Unexpected arguments for scene: ${flags.join(' ')}`);
        }
        command.speed = parseInteger(flags[1], 'speed');
      }
      return command;
    }

    case 'set':
      return parseSet(params);

    default:
      throw new UsageError(`Unknown command: ${kind}`);
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  let mac: string | undefined;
  let waitSeconds = 0;
  let backend: BleBackend | undefined;
  const rest: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--mac':
        mac = takeValue(argv, ++i, arg);
        break;
      case '--wait': {
        const value = takeValue(argv, ++i, arg);
        waitSeconds = Number(value);
        if (!Number.isFinite(waitSeconds) || waitSeconds < 0) {
          throw new UsageError(`--wait must be a non-negative number, got ${JSON.stringify(value)}`);
        }
        break;
      }
      case '--backend': {
        const value = takeValue(argv, ++i, arg);
        if (!isBackend(value)) {
          throw new UsageError(`--backend must be noble or node-ble, got ${JSON.stringify(value)}`);
        }
        backend = value;
        break;
      }
      default:
        rest.push(arg);
    }
  }

  const [kind, ...params] = rest;
  if (kind === undefined) {
    throw new UsageError('Missing command');
  }
  return { mac, waitSeconds, backend, command: parseCommand(kind, params) };
}

export function formatState(state: DeviceState): string {
  const isOn = state.isOn ?? 'unknown';
  const brightness = state.brightnessPercent ?? 'unknown';
  const raw = state.raw ? state.raw.toString('hex') : '';
  return `is_on=${isOn} brightness=${brightness} raw=${raw}`;
}

export function formatScenes(): string[] {
  return listScenes().map(([name, index]) => `${name}=${index}`);
}

/**
 * Run one lamp command on a connected light. `scenes` and `bridge` don't
 * talk to a single lamp and are handled by the entry point.
 */
export async function runCommand(
  light: LightController,
  { command, waitSeconds }: CliOptions,
  print: (line: string) => void = console.log
): Promise<void> {
  switch (command.kind) {
    case 'on':
      await light.turnOn();
      break;
    case 'off':
      await light.turnOff();
      break;
    case 'status':
      print(formatState(await light.getState({ waitMs: 2000 })));
      return;
    case 'rgb':
      await light.setRgb(command.rgb.r, command.rgb.g, command.rgb.b);
      break;
    case 'brightness':
      await light.setBrightness(command.percent);
      break;
    case 'scene':
      await light.setScene(command.scene, command.speed);
      break;
    case 'set':
      if (command.power === 'on') {
        await light.turnOn();
      } else if (command.power === 'off') {
        await light.turnOff();
      }
      if (command.rgb) {
        await light.setRgb(command.rgb.r, command.rgb.g, command.rgb.b);
      }
      if (command.brightness !== undefined) {
        await light.setBrightness(command.brightness);
      }
      if (command.scene !== undefined) {
        await light.setScene(command.scene, command.sceneSpeed);
      }
      break;
    case 'scenes':
    case 'bridge':
      throw new UsageError(`${command.kind} is not a lamp command`);
  }

  if (waitSeconds > 0) {
    print(formatState(await light.getState({ waitMs: waitSeconds * 1000 })));
  }
}
