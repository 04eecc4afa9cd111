import { UnknownSceneError } from './errors';

// Built-in effects of TG609-class lamps, keyed by lowercase hyphenated name
const SCENES_TG609: ReadonlyMap<string, number> = new Map([
  ['symphony', 2],
  ['energy', 3],
  ['jump', 4],
  ['vitality', 7],
  ['forest', 13],
  ['accumulation', 16],
  ['chase', 23],
  ['rainbow', 26],
  ['melody', 32],
  ['ephemeral', 35],
  ['space-time', 45],
  ['neon-lights', 48],
  ['flow', 55],
  ['aurora', 59],
  ['green-jade', 71],
  ['running', 91],
  ['pink-light', 109],
  ['alarm', 113],
]);

/**
 * Look up a scene index by name. Case is ignored, and `-`, `_` and spaces
 * are interchangeable: "Green-Jade", "green_jade" and "green jade" match.
 */
export function resolveSceneName(name: string): number {
  const key = name.trim().toLowerCase().replace(/\s+/g, '_');
  for (const candidate of [key.replace(/_/g, '-'), key.replace(/-/g, '_')]) {
    const index = SCENES_TG609.get(candidate);
    if (index !== undefined) {
      return index;
    }
  }
  throw new UnknownSceneError(name);
}

export function listScenes(): Array<[name: string, index: number]> {
  return [...SCENES_TG609.entries()].sort(([a], [b]) => a.localeCompare(b));
}
