/**
 * Observed property registry
 *
 * Static table of every player property the engine watches: its value kind,
 * which actions a change raises, and whether it feeds the summary or body.
 * The registry index is the stable property id used for observe/unobserve.
 */

import type { OsdAction } from './action-set';

/**
 * `choice` covers options whose JSON form depends on the value: yes/no come
 * back as flags, counts as integers, anything else as a string. They are
 * stored in their option-string form ("yes", "no", "5", "inf").
 */
export type PropertyKind = 'string' | 'choice' | 'flag' | 'int' | 'double' | 'node';

export interface ObservedPropertySpec {
  kind: PropertyKind;
  actions: readonly OsdAction[];
  /** Escape markup in string values while the server supports markup */
  escape?: boolean;
  /** Raise actions only when the new value is truthy */
  onlyIfTruthy?: boolean;
  affectsSummary?: boolean;
  affectsBody?: boolean;
}

const REGISTRY = {
  'app-name': { kind: 'string', actions: ['update'] },
  'brightness': { kind: 'int', actions: ['queue-capture'] },
  'chapter': { kind: 'int', actions: ['update'], affectsBody: true },
  'chapters': { kind: 'int', actions: ['update'], affectsBody: true },
  'contrast': { kind: 'int', actions: ['queue-capture'] },
  'current-tracks/video/image': { kind: 'flag', actions: [] },
  'duration': { kind: 'int', actions: ['update'], affectsBody: true },
  'edition': { kind: 'int', actions: ['update'], affectsBody: true },
  'editions': { kind: 'int', actions: ['update'], affectsBody: true },
  'eof-reached': { kind: 'flag', actions: ['reset'], onlyIfTruthy: true, affectsBody: true },
  'focused': { kind: 'flag', actions: ['close'], onlyIfTruthy: true },
  'gamma': { kind: 'int', actions: ['queue-capture'] },
  'hue': { kind: 'int', actions: ['queue-capture'] },
  'idle-active': { kind: 'flag', actions: ['update', 'check-image'] },
  'image-display-duration': { kind: 'double', actions: ['update'], affectsBody: true },
  'keep-open': { kind: 'choice', actions: ['reset'], affectsBody: true },
  'lavfi-complex': { kind: 'string', actions: ['update', 'check-image'] },
  'loop-file': { kind: 'choice', actions: ['reset'], affectsBody: true },
  'media-title': { kind: 'string', actions: ['update'], affectsSummary: true },
  'metadata': { kind: 'node', actions: ['reset', 'check-image'], affectsSummary: true, affectsBody: true },
  'mouse-pos': { kind: 'node', actions: [] },
  'msg-level': { kind: 'node', actions: [] },
  'mute': { kind: 'flag', actions: ['update'], affectsBody: true },
  'options/script-opts': { kind: 'node', actions: [] },
  'pause': { kind: 'flag', actions: ['update'], affectsBody: true },
  'paused-for-cache': { kind: 'flag', actions: ['update'], affectsBody: true },
  'percent-pos': { kind: 'double', actions: [] },
  'play-direction': { kind: 'string', actions: ['update'], affectsBody: true },
  'playlist-count': { kind: 'int', actions: ['update'], affectsBody: true },
  'playlist-pos': { kind: 'int', actions: ['update'], affectsBody: true },
  'saturation': { kind: 'int', actions: ['queue-capture'] },
  'seeking': { kind: 'flag', actions: ['update'], affectsBody: true },
  'speed': { kind: 'double', actions: ['update'], affectsBody: true },
  'sub-text': { kind: 'string', actions: ['update'], escape: true, affectsBody: true },
  'sub-visibility': { kind: 'flag', actions: ['update'], affectsBody: true },
  'time-pos': { kind: 'int', actions: ['update'], affectsBody: true },
  // published by a companion image-detection script
  'user-data/detect-image/detected': { kind: 'flag', actions: ['update'], affectsBody: true },
  'vid': { kind: 'int', actions: ['update', 'check-image'] },
  'volume': { kind: 'int', actions: ['update'], affectsBody: true }
} satisfies Record<string, ObservedPropertySpec>;

export type PropertyName = keyof typeof REGISTRY;

export interface ObservedPropertyEntry {
  id: number;
  name: PropertyName;
  spec: ObservedPropertySpec;
}

function isPropertyName(name: string): name is PropertyName {
  return Object.prototype.hasOwnProperty.call(REGISTRY, name);
}

export const OBSERVED_PROPERTIES: readonly ObservedPropertyEntry[] = Object.keys(REGISTRY)
  .filter(isPropertyName)
  .map((name, id) => ({ id, name, spec: REGISTRY[name] }));

const ENTRIES_BY_NAME = new Map<PropertyName, ObservedPropertyEntry>(
  OBSERVED_PROPERTIES.map(entry => [entry.name, entry])
);

export function getPropertySpec(name: PropertyName): ObservedPropertySpec {
  return REGISTRY[name];
}

export function getPropertyId(name: PropertyName): number {
  const entry = ENTRIES_BY_NAME.get(name);
  if (!entry) {
    throw new Error(`Unregistered property: ${name}`);
  }
  return entry.id;
}

/**
 * Boundary lookup: resolve a wire name (or numeric id) to a registered property.
 */
export function resolveProperty(nameOrId: string | number): PropertyName | undefined {
  if (typeof nameOrId === 'number') {
    return OBSERVED_PROPERTIES[nameOrId]?.name;
  }
  return isPropertyName(nameOrId) ? nameOrId : undefined;
}
