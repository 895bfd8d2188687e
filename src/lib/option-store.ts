/**
 * Option Store - Layered OSD options with change diffing
 *
 * GENERATIONS:
 * - defaults: factory values, frozen
 * - base:     defaults + <script-opts dir>/<client>.conf
 * - active:   base + runtime overlay (player's script-opts, "<client>-<key>")
 *
 * Every generation is a fresh frozen object; a reference taken before a
 * reload stays a valid "before" snapshot for diff(). Re-deriving active from
 * the same base and overlay is idempotent.
 *
 * Bad values are reported and the previous value (default or file value)
 * is kept. Unknown enum values fall back to the option's default.
 */

import { existsSync, readFileSync } from 'fs';
import { isNodeMap, type NodeValue } from '../types/signals';
import {
  DEFAULT_OPTIONS,
  OPTION_SPECS,
  type OptionKey,
  type OptionSpec,
  type OptionTrigger,
  type OsdOptions,
  findOptionSpec,
  isScalingAlgorithm,
  isUrgency
} from '../types/options';
import type { Logger } from './logger';

export interface OptionChange {
  key: OptionKey;
  trigger: OptionTrigger;
}

export interface OptionLine {
  lineNumber: number;
  key: string;
  value: string;
}

export interface OptionStoreConfig {
  clientName: string;
  logger: Logger;
  /** Option file; null disables the file layer */
  configPath: string | null;
}

const INTEGER = /^\s*[+-]?\d+$/;

export class OptionStore {
  private readonly clientName: string;
  private readonly logger: Logger;
  private readonly configPath: string | null;

  private base: Readonly<OsdOptions> = DEFAULT_OPTIONS;
  private active: Readonly<OsdOptions> = DEFAULT_OPTIONS;
  private overlay: NodeValue | undefined;

  constructor(config: OptionStoreConfig) {
    this.clientName = config.clientName;
    this.logger = config.logger;
    this.configPath = config.configPath;
  }

  getBase(): Readonly<OsdOptions> {
    return this.base;
  }

  getActive(): Readonly<OsdOptions> {
    return this.active;
  }

  /**
   * Rebuild base from defaults and the option file, then re-apply the stored
   * overlay. Returns the changes between the previous and new active set.
   */
  reload(): OptionChange[] {
    const before = this.active;
    const draft: OsdOptions = { ...DEFAULT_OPTIONS };

    for (const line of this.readFileLines()) {
      this.setOption(draft, line.key, line.value, `script-opts/${this.clientName}.conf:${line.lineNumber}`);
    }

    this.base = Object.freeze(draft);
    this.active = this.deriveActive();
    return OptionStore.diff(before, this.active);
  }

  /**
   * Replace the runtime overlay (the player's script-opts map) and re-derive
   * the active set from base.
   */
  applyRuntimeOverlay(overlay: NodeValue | undefined): OptionChange[] {
    const before = this.active;
    this.overlay = overlay;
    this.active = this.deriveActive();
    return OptionStore.diff(before, this.active);
  }

  // -------------------------------------------------------------------------
  // Pure helpers
  // -------------------------------------------------------------------------

  /**
   * Compare two generations key by key. Never mutates either side.
   * Result order follows the option table.
   */
  static diff(before: Readonly<OsdOptions>, after: Readonly<OsdOptions>): OptionChange[] {
    const changes: OptionChange[] = [];
    for (const spec of OPTION_SPECS) {
      if (before[spec.key] !== after[spec.key]) {
        changes.push({ key: spec.key, trigger: spec.trigger });
      }
    }
    return changes;
  }

  /**
   * Split option file text into key/value lines. Comment lines (#) and lines
   * without '=' are skipped; the value is everything after the first '='.
   */
  static parseLines(text: string): OptionLine[] {
    const lines = text.split('\n');
    if (lines[lines.length - 1] === '') {
      lines.pop();
    }

    const result: OptionLine[] = [];
    lines.forEach((raw, index) => {
      const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
      if (line === '' || line.startsWith('#')) return;

      const eq = line.indexOf('=');
      if (eq === -1) return;

      result.push({ lineNumber: index + 1, key: line.slice(0, eq), value: line.slice(eq + 1) });
    });
    return result;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private deriveActive(): Readonly<OsdOptions> {
    const draft: OsdOptions = { ...this.base };

    if (isNodeMap(this.overlay)) {
      const prefix = `${this.clientName}-`;
      for (const [key, value] of Object.entries(this.overlay)) {
        if (typeof value !== 'string' || !key.startsWith(prefix)) continue;
        this.setOption(draft, key.slice(prefix.length), value, 'script-opts');
      }
    }

    return Object.freeze(draft);
  }

  private readFileLines(): OptionLine[] {
    if (!this.configPath || !existsSync(this.configPath)) {
      return [];
    }

    try {
      return OptionStore.parseLines(readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      this.logger.error(`failed to read ${this.configPath}`, error);
      return [];
    }
  }

  private setOption(target: OsdOptions, key: string, value: string, source: string): void {
    this.logger.verbose(`${source} setting option '${key}' to '${value}'`);

    const spec = findOptionSpec(key);
    if (!spec) {
      this.logger.error(`${source} unknown key '${key}', ignoring`);
      return;
    }

    applyValue(target, spec, value, message => this.logger.error(`${source} ${message}`));
  }
}

type Report = (message: string) => void;

function applyValue(target: OsdOptions, spec: OptionSpec, value: string, report: Report): void {
  switch (spec.type) {
    case 'int': {
      const parsed = INTEGER.test(value) ? Number(value) : NaN;
      if (!Number.isSafeInteger(parsed) || parsed < spec.min) {
        report(`invalid number '${value}' for key '${spec.fileKey}' (minimum ${spec.min}), keeping previous value`);
        return;
      }
      target[spec.key] = parsed;
      return;
    }

    case 'bool':
      if (value === 'yes') {
        target[spec.key] = true;
      } else if (value === 'no') {
        target[spec.key] = false;
      } else {
        report(`invalid boolean '${value}' for key '${spec.fileKey}' (expected yes/no), keeping previous value`);
      }
      return;

    case 'string':
      target[spec.key] = value;
      return;

    case 'enum':
      applyEnum(target, spec.key, value, report);
      return;
  }
}

function applyEnum(target: OsdOptions, key: 'urgency' | 'thumbnailScaling', value: string, report: Report): void {
  if (key === 'urgency') {
    if (isUrgency(value)) {
      target.urgency = value;
    } else {
      report(`unknown notification urgency '${value}', setting to '${DEFAULT_OPTIONS.urgency}'`);
      target.urgency = DEFAULT_OPTIONS.urgency;
    }
    return;
  }

  if (isScalingAlgorithm(value)) {
    target.thumbnailScaling = value;
  } else {
    report(`unknown thumbnail scaling option '${value}', setting to '${DEFAULT_OPTIONS.thumbnailScaling}'`);
    target.thumbnailScaling = DEFAULT_OPTIONS.thumbnailScaling;
  }
}

export default OptionStore;
