/**
 * Tests for Logger and msg-level parsing
 */

import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import { Logger } from '../src/lib/logger';
import { parseMsgLevel } from '../src/lib/msg-level';
import { createTestLogger } from './helpers/fakes';

describe('parseMsgLevel', () => {
  test('defaults to error without a value', () => {
    expect(parseMsgLevel(null, 'osd')).toBe('error');
    expect(parseMsgLevel('', 'osd')).toBe('error');
  });

  test('maps player levels', () => {
    expect(parseMsgLevel('osd=no', 'osd')).toBe('quiet');
    expect(parseMsgLevel('osd=v', 'osd')).toBe('verbose');
    expect(parseMsgLevel('osd=debug', 'osd')).toBe('debug');
    expect(parseMsgLevel('osd=trace', 'osd')).toBe('debug');
    expect(parseMsgLevel('osd=warn', 'osd')).toBe('error');
  });

  test('"all" applies to every client', () => {
    expect(parseMsgLevel('all=v', 'osd')).toBe('verbose');
  });

  test('last matching pair wins', () => {
    expect(parseMsgLevel('all=v,osd=debug', 'osd')).toBe('debug');
    expect(parseMsgLevel('osd=debug,all=no', 'osd')).toBe('quiet');
  });

  test('ignores other modules and malformed tokens', () => {
    expect(parseMsgLevel('cplayer=debug,osd', 'osd')).toBe('error');
  });

  test('accepts the map form sent over JSON IPC', () => {
    expect(parseMsgLevel({ all: 'v', osd: 'debug' }, 'osd')).toBe('debug');
    expect(parseMsgLevel({ osd: 'debug', all: 'no' }, 'osd')).toBe('quiet');
    expect(parseMsgLevel({ cplayer: 'debug', osd: 5 }, 'osd')).toBe('error');
    expect(parseMsgLevel({}, 'osd')).toBe('error');
  });
});

describe('Logger', () => {
  test('errors are visible by default', () => {
    const { logger, lines } = createTestLogger('error');

    logger.error('boom', new Error('detail'));
    logger.verbose('hidden');
    logger.debug('hidden');

    expect(lines).toEqual(['osd: ERROR: boom: detail']);
  });

  test('non-Error details are stringified', () => {
    const { logger, lines } = createTestLogger('error');
    logger.error('failed', 42);
    expect(lines).toEqual(['osd: ERROR: failed: 42']);
  });

  test('follows msg-level at runtime', () => {
    const { logger, lines } = createTestLogger('error');

    logger.applyMsgLevel('all=v');
    logger.verbose('shown');
    logger.debug('hidden');

    expect(logger.getLevel()).toBe('verbose');
    expect(lines).toEqual(['osd: VERBOSE: shown']);
  });

  test('quiet suppresses errors', () => {
    const { logger, lines } = createTestLogger('quiet');
    logger.error('nothing');
    expect(lines).toEqual([]);
  });

  describe('log file', () => {
    const TEST_DIR = join(tmpdir(), `osd-logger-test-${process.pid}-${Date.now()}`);
    const LOG_FILE = join(TEST_DIR, 'nested', 'daemon.log');

    beforeEach(() => {
      mkdirSync(TEST_DIR, { recursive: true });
    });

    afterEach(() => {
      rmSync(TEST_DIR, { recursive: true, force: true });
    });

    test('appends timestamped lines, creating the directory', () => {
      const logger = new Logger({ clientName: 'osd', logFile: LOG_FILE, write: () => undefined });

      logger.error('first');
      logger.error('second');

      expect(existsSync(LOG_FILE)).toBe(true);
      const lines = readFileSync(LOG_FILE, 'utf-8').trimEnd().split('\n');
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[PID:\d+\] \[ERROR\] first$/);
      expect(lines[1]).toMatch(/\[ERROR\] second$/);
    });

    test('suppressed levels are not written', () => {
      const logger = new Logger({ clientName: 'osd', logFile: LOG_FILE, write: () => undefined });
      logger.debug('not written');
      expect(existsSync(LOG_FILE)).toBe(false);
    });
  });
});
