/**
 * Logger - Level-gated diagnostics for the daemon
 *
 * OUTPUT:
 * - stderr: "<client>: <LEVEL>: <message>" (what mpv users expect from a script)
 * - optional log file: "[<iso time>] [PID:<pid>] [<LEVEL>] <message>"
 *
 * The level follows the player's msg-level property at runtime, so errors
 * stay visible by default and verbose/debug output appears only on request.
 *
 * ROTATION: the log file is truncated once it grows past 100KB.
 */

import { appendFileSync, existsSync, mkdirSync, statSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { NodeValue } from '../types/signals';
import { LOG_LEVEL_RANK, type LogLevel, parseMsgLevel } from './msg-level';

export type LogWriter = (line: string) => void;

export interface LoggerOptions {
  clientName: string;
  level?: LogLevel;
  logFile?: string | null;
  /** Defaults to process.stderr */
  write?: LogWriter;
}

const MAX_LOG_SIZE = 100 * 1024;

type EmittingLevel = Exclude<LogLevel, 'quiet'>;

const LEVEL_LABEL: Record<EmittingLevel, string> = {
  error: 'ERROR',
  verbose: 'VERBOSE',
  debug: 'DEBUG'
};

export class Logger {
  private level: LogLevel;
  private readonly clientName: string;
  private readonly logFile: string | null;
  private readonly write: LogWriter;

  constructor(options: LoggerOptions) {
    this.clientName = options.clientName;
    this.level = options.level ?? 'error';
    this.logFile = options.logFile ?? null;
    this.write = options.write ?? (line => { process.stderr.write(`${line}\n`); });
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Re-derive the level from the player's msg-level value.
   */
  applyMsgLevel(msgLevel: NodeValue | undefined): void {
    this.level = parseMsgLevel(msgLevel, this.clientName);
  }

  isEnabled(level: EmittingLevel): boolean {
    return LOG_LEVEL_RANK[level] <= LOG_LEVEL_RANK[this.level];
  }

  error(message: string, error?: unknown): void {
    const detail = error === undefined
      ? ''
      : error instanceof Error ? error.message : String(error);
    this.emit('error', detail ? `${message}: ${detail}` : message);
  }

  verbose(message: string): void {
    this.emit('verbose', message);
  }

  debug(message: string): void {
    this.emit('debug', message);
  }

  private emit(level: EmittingLevel, message: string): void {
    if (!this.isEnabled(level)) return;

    this.write(`${this.clientName}: ${LEVEL_LABEL[level]}: ${message}`);

    if (this.logFile) {
      this.appendToFile(level, message);
    }
  }

  private appendToFile(level: EmittingLevel, message: string): void {
    if (!this.logFile) return;

    try {
      const dir = dirname(this.logFile);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true, mode: 0o700 });
      }

      try {
        if (statSync(this.logFile).size > MAX_LOG_SIZE) {
          writeFileSync(this.logFile, `[LOG ROTATED at ${new Date().toISOString()}]\n`);
        }
      } catch {
        // Not created yet
      }

      const line = `[${new Date().toISOString()}] [PID:${process.pid}] [${LEVEL_LABEL[level]}] ${message}\n`;
      appendFileSync(this.logFile, line, { mode: 0o600 });
    } catch (error) {
      this.write(`${this.clientName}: ERROR: log file write failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

export default Logger;
