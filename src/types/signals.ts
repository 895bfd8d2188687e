/**
 * Signals - Every unit of asynchronous input the engine consumes
 *
 * Transports (IPC socket, capture completion, POSIX signals, the expiry
 * timer) translate what they receive into one of these and push it into the
 * SignalChannel. The engine never runs inside a transport callback.
 */

import type { PropertyName } from '../lib/observed-properties';

/** JSON value as delivered by the player for `node` properties */
export type NodeValue =
  | string
  | number
  | boolean
  | null
  | NodeValue[]
  | { [key: string]: NodeValue };

export function isNodeMap(node: NodeValue | undefined): node is { [key: string]: NodeValue } {
  return typeof node === 'object' && node !== null && !Array.isArray(node);
}

/** Raw RGBA frame as produced by the capture backend */
export interface RawFrame {
  data: Uint8Array;
  width: number;
  height: number;
  /** Bytes per row, >= width * 4 */
  stride: number;
}

export type PlayerEvent = 'video-reconfig' | 'seek';

export type Signal =
  | { kind: 'property-change'; name: PropertyName; value: NodeValue | undefined }
  | { kind: 'timer-expired' }
  | { kind: 'capture-ready'; requestId: number; frame: RawFrame }
  | { kind: 'capture-failed'; requestId: number; reason: string }
  | { kind: 'text-expanded'; requestId: number; text: string | null }
  | { kind: 'player-event'; event: PlayerEvent }
  | { kind: 'client-message'; args: string[] }
  | { kind: 'config-reload-requested' }
  | { kind: 'shutdown'; reason: string };
