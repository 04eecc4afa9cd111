import { createFakeLight } from './__fixtures__/fake-light';
import { formatScenes, formatState, parseCliArgs, runCommand } from './cli';
import { UsageError } from './errors';

describe('parseCliArgs', () => {
  it('should parse a bare command with defaults', () => {
    expect(parseCliArgs(['on'])).toEqual({
      mac: undefined,
      waitSeconds: 0,
      backend: undefined,
      command: { kind: 'on' },
    });
  });

  it('should parse global options before the command', () => {
    const options = parseCliArgs(['--mac', 'AA:BB:CC:DD:EE:FF', '--wait', '1.5', 'rgb', '255', '0', '10']);

    expect(options.mac).toBe('AA:BB:CC:DD:EE:FF');
    expect(options.waitSeconds).toBe(1.5);
    expect(options.command).toEqual({ kind: 'rgb', rgb: { r: 255, g: 0, b: 10 } });
  });

  it('should accept global options after the command', () => {
    expect(parseCliArgs(['status', '--backend', 'node-ble']).backend).toBe('node-ble');
  });

  it('should parse brightness', () => {
    expect(parseCliArgs(['brightness', '40']).command).toEqual({ kind: 'brightness', percent: 40 });
  });

  describe('scene', () => {
    it('should treat digits as an index', () => {
      expect(parseCliArgs(['scene', '26']).command).toEqual({ kind: 'scene', scene: 26 });
    });

    it('should treat anything else as a name', () => {
      expect(parseCliArgs(['scene', 'green-jade', '--speed', '40']).command).toEqual({
        kind: 'scene',
        scene: 'green-jade',
        speed: 40,
      });
    });

    it('should reject a missing scene', () => {
      expect(() => parseCliArgs(['scene'])).toThrow('scene needs an index or a name');
    });
  });

  describe('set', () => {
    it('should keep power by default', () => {
      expect(parseCliArgs(['set']).command).toEqual({ kind: 'set', power: 'keep' });
    });

    it('should parse every option', () => {
      const args = ['set', '--power', 'on', '--rgb', '1', '2', '3', '--brightness', '40'];
      args.push('--scene', 'aurora', '--scene-speed', '10');

      expect(parseCliArgs(args).command).toEqual({
        kind: 'set',
        power: 'on',
        rgb: { r: 1, g: 2, b: 3 },
        brightness: 40,
        scene: 'aurora',
        sceneSpeed: 10,
      });
    });

    it('should reject an unknown power choice', () => {
      expect(() => parseCliArgs(['set', '--power', 'maybe'])).toThrow('--power must be on, off or keep, got "maybe"');
    });

    it('should reject unknown options', () => {
      expect(() => parseCliArgs(['set', '--hue', '10'])).toThrow('Unknown option for set: --hue');
    });
  });

  it('should reject bad input with UsageError', () => {
    const bad = [
      [],
      ['dance'],
      ['on', 'now'],
      ['rgb', '1', '2'],
      ['brightness', 'high'],
      ['--wait', '-1', 'on'],
      ['--backend', 'bluez', 'on'],
      ['--mac'],
    ];
    for (const argv of bad) {
      expect(() => parseCliArgs(argv)).toThrow(UsageError);
    }
  });

  it('should explain what went wrong', () => {
    expect(() => parseCliArgs([])).toThrow('Missing command');
    expect(() => parseCliArgs(['dance'])).toThrow('Unknown command: dance');
    expect(() => parseCliArgs(['brightness', 'high'])).toThrow('brightness must be an integer, got "high"');
    expect(() => parseCliArgs(['--mac'])).toThrow('--mac needs a value');
  });
});

describe('formatState', () => {
  it('should print unknown fields as unknown', () => {
    expect(formatState({})).toBe('is_on=unknown brightness=unknown raw=');
  });

  it('should print known fields and the raw frame in hex', () => {
    const line = formatState({ isOn: true, brightnessPercent: 14, raw: Buffer.from([0x55, 0x01]) });
    expect(line).toBe('is_on=true brightness=14 raw=5501');
  });

  it('should print a known off state', () => {
    expect(formatState({ isOn: false })).toBe('is_on=false brightness=unknown raw=');
  });
});

describe('formatScenes', () => {
  it('should print one name=index line per scene', () => {
    const lines = formatScenes();
    expect(lines).toHaveLength(18);
    expect(lines[0]).toBe('accumulation=16');
  });
});

describe('runCommand', () => {
  it('should apply set options in order and skip power when kept', async () => {
    const { light, calls } = createFakeLight();

    await runCommand(light, parseCliArgs(['set', '--brightness', '40', '--rgb', '1', '2', '3']), () => {});

    expect(calls).toEqual(['rgb 1 2 3', 'brightness 40']);
  });

  it('should switch power before the other set options', async () => {
    const { light, calls } = createFakeLight();

    await runCommand(light, parseCliArgs(['set', '--scene', '26', '--scene-speed', '5', '--power', 'off']), () => {});

    expect(calls).toEqual(['off', 'scene 26 5']);
  });

  it('should pass a scene and speed through', async () => {
    const { light } = createFakeLight();

    await runCommand(light, parseCliArgs(['scene', 'rainbow', '--speed', '100']), () => {});

    expect(light.setScene).toHaveBeenCalledWith('rainbow', 100);
  });

  it('should print the state for status', async () => {
    const { light } = createFakeLight({ isOn: false });
    const lines: string[] = [];

    await runCommand(light, parseCliArgs(['status']), line => lines.push(line));

    expect(light.getState).toHaveBeenCalledWith({ waitMs: 2000 });
    expect(lines).toEqual(['is_on=false brightness=unknown raw=']);
  });

  it('should read the state after a command when asked to wait', async () => {
    const { light } = createFakeLight({ brightnessPercent: 30 });
    const lines: string[] = [];

    await runCommand(light, parseCliArgs(['--wait', '1.5', 'on']), line => lines.push(line));

    expect(light.turnOn).toHaveBeenCalledTimes(1);
    expect(light.getState).toHaveBeenCalledWith({ waitMs: 1500 });
    expect(lines).toEqual(['is_on=unknown brightness=30 raw=']);
  });

  it('should not read the state without --wait', async () => {
    const { light } = createFakeLight();

    await runCommand(light, parseCliArgs(['off']), () => {});

    expect(light.turnOff).toHaveBeenCalledTimes(1);
    expect(light.getState).not.toHaveBeenCalled();
  });

  it('should refuse commands that do not drive a lamp', async () => {
    const { light } = createFakeLight();

    await expect(runCommand(light, parseCliArgs(['scenes']), () => {})).rejects.toBeInstanceOf(UsageError);
  });
});
