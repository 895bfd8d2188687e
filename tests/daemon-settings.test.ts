/**
 * Tests for daemon settings - YAML file, CLI flags and their merge
 */

import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import {
  CliUsageError,
  defaultSettings,
  defaultSettingsPath,
  expandHome,
  loadDaemonSettings,
  optionFilePath,
  parseCliArgs,
  resolveSettings
} from '../src/config/daemon-settings';

const HOME = join(tmpdir(), `osd-settings-test-${process.pid}-${Date.now()}`);
const SETTINGS = join(HOME, 'settings.yaml');

beforeEach(() => {
  mkdirSync(HOME, { recursive: true });
});

afterEach(() => {
  rmSync(HOME, { recursive: true, force: true });
});

// ===========================================================================
// Settings file
// ===========================================================================

describe('loadDaemonSettings', () => {
  test('missing file gives the defaults quietly', () => {
    const result = loadDaemonSettings(SETTINGS, HOME);

    expect(result.warnings).toEqual([]);
    expect(result.settings).toEqual({
      socket: '/tmp/mpvsocket',
      clientName: 'notification_osd',
      scriptOptsDir: join(HOME, '.config', 'mpv', 'script-opts'),
      cacheDir: join(HOME, '.cache', 'mpv-osd-notifier'),
      logFile: null
    });
  });

  test('values override defaults with ~ expanded', () => {
    writeFileSync(SETTINGS, [
      'socket: ~/mpv.sock',
      'clientName: osd2',
      'cacheDir: /var/tmp/osd',
      'logFile: ~/osd.log'
    ].join('\n'));

    const { settings, warnings } = loadDaemonSettings(SETTINGS, HOME);

    expect(warnings).toEqual([]);
    expect(settings.socket).toBe(join(HOME, 'mpv.sock'));
    expect(settings.clientName).toBe('osd2');
    expect(settings.cacheDir).toBe('/var/tmp/osd');
    expect(settings.logFile).toBe(join(HOME, 'osd.log'));
    expect(settings.scriptOptsDir).toBe(defaultSettings(HOME).scriptOptsDir);
  });

  test('bad values warn and keep their defaults', () => {
    writeFileSync(SETTINGS, [
      'socket: ""',
      'clientName: "bad name"',
      'logFile: 12',
      'colour: blue'
    ].join('\n'));

    const { settings, warnings } = loadDaemonSettings(SETTINGS, HOME);

    expect(warnings).toEqual([
      `${SETTINGS}: socket must be a non-empty string`,
      `${SETTINGS}: clientName must contain only letters, digits and underscores`,
      `${SETTINGS}: logFile must be a path or null`,
      `${SETTINGS}: unknown key 'colour'`
    ]);
    expect(settings).toEqual(defaultSettings(HOME));
  });

  test('logFile false disables logging to a file', () => {
    writeFileSync(SETTINGS, 'logFile: false\n');
    expect(loadDaemonSettings(SETTINGS, HOME).settings.logFile).toBeNull();
  });

  test('non-mapping and malformed documents', () => {
    writeFileSync(SETTINGS, '- a\n- b\n');
    expect(loadDaemonSettings(SETTINGS, HOME).warnings).toEqual([`${SETTINGS}: expected a mapping at the top level`]);

    writeFileSync(SETTINGS, 'socket: [unclosed\n');
    const { warnings } = loadDaemonSettings(SETTINGS, HOME);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].startsWith(`${SETTINGS}: `)).toBe(true);
  });

  test('an empty file is fine', () => {
    writeFileSync(SETTINGS, '');
    expect(loadDaemonSettings(SETTINGS, HOME)).toEqual({ settings: defaultSettings(HOME), warnings: [] });
  });
});

// ===========================================================================
// CLI
// ===========================================================================

describe('parseCliArgs', () => {
  test('both flag forms', () => {
    expect(parseCliArgs(['--socket', '/tmp/a', '--client-name=osd', '--settings=~/s.yaml'])).toEqual({
      help: false,
      socket: '/tmp/a',
      clientName: 'osd',
      settingsPath: '~/s.yaml'
    });
  });

  test('help', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
    expect(parseCliArgs([]).help).toBe(false);
  });

  test('usage errors', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow(new CliUsageError("unknown argument '--verbose'"));
    expect(() => parseCliArgs(['--socket'])).toThrow(new CliUsageError('--socket needs a value'));
    expect(() => parseCliArgs(['--settings='])).toThrow(new CliUsageError('--settings needs a value'));
    expect(() => parseCliArgs(['--client-name', 'a-b']))
      .toThrow(new CliUsageError('--client-name must contain only letters, digits and underscores'));
  });
});

// ===========================================================================
// Merge
// ===========================================================================

describe('resolveSettings', () => {
  test('reads the default path under home', () => {
    const path = defaultSettingsPath(HOME);
    mkdirSync(join(HOME, '.config', 'mpv-osd-notifier'), { recursive: true });
    writeFileSync(path, 'socket: /tmp/from-file\n');

    expect(resolveSettings({ help: false }, HOME).settings.socket).toBe('/tmp/from-file');
  });

  test('CLI flags win over the file', () => {
    writeFileSync(SETTINGS, 'socket: /tmp/from-file\nclientName: filename\n');

    const { settings } = resolveSettings({ help: false, settingsPath: '~/settings.yaml', socket: '~/cli.sock', clientName: 'cli' }, HOME);

    expect(settings.socket).toBe(join(HOME, 'cli.sock'));
    expect(settings.clientName).toBe('cli');
    expect(optionFilePath(settings)).toBe(join(HOME, '.config', 'mpv', 'script-opts', 'cli.conf'));
  });

  test('expandHome only touches a leading ~', () => {
    expect(expandHome('~', HOME)).toBe(HOME);
    expect(expandHome('/a/~/b', HOME)).toBe('/a/~/b');
  });
});
