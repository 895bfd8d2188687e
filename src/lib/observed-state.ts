/**
 * Observed-State Table - Last known value of every watched property
 *
 * Single source of truth for player state. update() records a value and
 * reports which actions and which text invalidations the change implies;
 * it never touches the notification backend.
 *
 * Value kinds are fixed by the registry. A value of the wrong JSON type
 * (e.g. vid=false when no video track is selected) is stored as absent.
 */

import type { NodeValue } from '../types/signals';
import type { OsdAction } from './action-set';
import { escapeMarkup } from './markup';
import { getPropertySpec, type PropertyKind, type PropertyName } from './observed-properties';

export type PropertyValue = string | number | boolean | NodeValue;

export interface PropertyRead {
  present: boolean;
  value: PropertyValue | undefined;
}

export interface UpdateResult {
  actions: OsdAction[];
  summaryDirty: boolean;
  bodyDirty: boolean;
}

export class ObservedStateTable {
  private readonly values = new Map<PropertyName, PropertyValue>();
  private markupEnabled = false;

  /**
   * Escaping applies to values stored after this call; the engine
   * re-subscribes on capability changes so earlier values are re-delivered.
   */
  setMarkupEnabled(enabled: boolean): void {
    this.markupEnabled = enabled;
  }

  update(name: PropertyName, raw: NodeValue | undefined): UpdateResult {
    const spec = getPropertySpec(name);
    let value = coerce(spec.kind, raw);

    if (typeof value === 'string' && spec.escape) {
      value = escapeMarkup(value, this.markupEnabled);
    }

    if (value === undefined) {
      this.values.delete(name);
    } else {
      this.values.set(name, value);
    }

    const fire = !spec.onlyIfTruthy || this.isTruthy(name);

    return {
      actions: fire ? [...spec.actions] : [],
      summaryDirty: spec.affectsSummary === true,
      bodyDirty: spec.affectsBody === true
    };
  }

  read(name: PropertyName): PropertyRead {
    const value = this.values.get(name);
    return { present: value !== undefined, value };
  }

  isAvailable(name: PropertyName): boolean {
    return this.values.has(name);
  }

  isTruthy(name: PropertyName): boolean {
    const value = this.values.get(name);
    switch (typeof value) {
      case 'undefined': return false;
      case 'string': return value !== '';
      case 'boolean': return value;
      case 'number': return value !== 0;
      default: return value !== null;
    }
  }

  string(name: PropertyName): string | undefined {
    const value = this.values.get(name);
    return typeof value === 'string' ? value : undefined;
  }

  /** Absent flags read as false */
  flag(name: PropertyName): boolean {
    return this.values.get(name) === true;
  }

  number(name: PropertyName): number | undefined {
    const value = this.values.get(name);
    return typeof value === 'number' ? value : undefined;
  }

  node(name: PropertyName): NodeValue | undefined {
    return this.values.get(name);
  }
}

function coerce(kind: PropertyKind, raw: NodeValue | undefined): PropertyValue | undefined {
  if (raw === undefined || raw === null) return undefined;

  switch (kind) {
    case 'string':
      return typeof raw === 'string' ? raw : undefined;
    case 'choice':
      if (typeof raw === 'boolean') return raw ? 'yes' : 'no';
      if (typeof raw === 'number') return String(raw);
      return typeof raw === 'string' ? raw : undefined;
    case 'flag':
      return typeof raw === 'boolean' ? raw : undefined;
    case 'int':
      return typeof raw === 'number' && Number.isFinite(raw) ? Math.trunc(raw) : undefined;
    case 'double':
      return typeof raw === 'number' ? raw : undefined;
    case 'node':
      return raw;
  }
}

export default ObservedStateTable;
