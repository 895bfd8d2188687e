/**
 * Daemon Settings - Where to connect, what to call ourselves, where to write
 *
 * File: ~/.config/mpv-osd-notifier/settings.yaml (all keys optional)
 *
 *   socket: /tmp/mpvsocket          # mpv --input-ipc-server path
 *   clientName: notification_osd    # option file name and overlay prefix
 *   scriptOptsDir: ~/.config/mpv/script-opts
 *   cacheDir: ~/.cache/mpv-osd-notifier
 *   logFile: ~/.cache/mpv-osd-notifier/daemon.log
 *
 * CLI flags (--socket, --client-name, --settings) override the file.
 * OSD behaviour itself lives in <scriptOptsDir>/<clientName>.conf.
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';

export interface DaemonSettings {
  socket: string;
  clientName: string;
  scriptOptsDir: string;
  cacheDir: string;
  /** null disables the log file */
  logFile: string | null;
}

export interface SettingsResult {
  settings: DaemonSettings;
  /** Problems found while reading; the affected keys keep their defaults */
  warnings: string[];
}

export interface CliArgs {
  socket?: string;
  clientName?: string;
  settingsPath?: string;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function defaultSettingsPath(home: string = homedir()): string {
  return join(home, '.config', 'mpv-osd-notifier', 'settings.yaml');
}

export function defaultSettings(home: string = homedir()): DaemonSettings {
  return {
    socket: '/tmp/mpvsocket',
    clientName: 'notification_osd',
    scriptOptsDir: join(home, '.config', 'mpv', 'script-opts'),
    cacheDir: join(home, '.cache', 'mpv-osd-notifier'),
    logFile: null
  };
}

/** Expand a leading ~ to the home directory */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

const PATH_KEYS = ['socket', 'scriptOptsDir', 'cacheDir'] as const;
const CLIENT_NAME_PATTERN = /^[A-Za-z0-9_]+$/;

/**
 * Read the settings file. A missing file yields the defaults without
 * warnings; an unreadable or malformed one yields the defaults with one.
 */
export function loadDaemonSettings(path: string, home: string = homedir()): SettingsResult {
  const settings = defaultSettings(home);
  const warnings: string[] = [];

  if (!existsSync(path)) {
    return { settings, warnings };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, 'utf-8'));
  } catch (error) {
    warnings.push(`${path}: ${error instanceof Error ? error.message : String(error)}`);
    return { settings, warnings };
  }

  if (parsed === null || parsed === undefined) {
    return { settings, warnings };
  }

  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    warnings.push(`${path}: expected a mapping at the top level`);
    return { settings, warnings };
  }

  for (const [key, value] of Object.entries(parsed)) {
    if (key === 'logFile') {
      if (value === null || value === false || value === '') {
        settings.logFile = null;
      } else if (typeof value === 'string') {
        settings.logFile = expandHome(value, home);
      } else {
        warnings.push(`${path}: logFile must be a path or null`);
      }
      continue;
    }

    if (key === 'clientName') {
      if (typeof value === 'string' && CLIENT_NAME_PATTERN.test(value)) {
        settings.clientName = value;
      } else {
        warnings.push(`${path}: clientName must contain only letters, digits and underscores`);
      }
      continue;
    }

    const pathKey = PATH_KEYS.find(candidate => candidate === key);
    if (!pathKey) {
      warnings.push(`${path}: unknown key '${key}'`);
      continue;
    }

    if (typeof value === 'string' && value !== '') {
      settings[pathKey] = expandHome(value, home);
    } else {
      warnings.push(`${path}: ${key} must be a non-empty string`);
    }
  }

  return { settings, warnings };
}

/**
 * Parse --socket, --client-name and --settings, each as "--flag value" or
 * "--flag=value".
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const result: CliArgs = { help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      result.help = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else if (flag === '--socket' || flag === '--client-name' || flag === '--settings') {
      value = argv[++i];
    }

    switch (flag) {
      case '--socket':
        result.socket = requireValue(flag, value);
        break;
      case '--client-name':
        result.clientName = requireValue(flag, value);
        if (!CLIENT_NAME_PATTERN.test(result.clientName)) {
          throw new CliUsageError(`${flag} must contain only letters, digits and underscores`);
        }
        break;
      case '--settings':
        result.settingsPath = requireValue(flag, value);
        break;
      default:
        throw new CliUsageError(`unknown argument '${arg}'`);
    }
  }

  return result;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value === '') {
    throw new CliUsageError(`${flag} needs a value`);
  }
  return value;
}

/**
 * Settings file first, then CLI overrides.
 */
export function resolveSettings(args: CliArgs, home: string = homedir()): SettingsResult {
  const path = args.settingsPath ? expandHome(args.settingsPath, home) : defaultSettingsPath(home);
  const result = loadDaemonSettings(path, home);

  if (args.socket) result.settings.socket = expandHome(args.socket, home);
  if (args.clientName) result.settings.clientName = args.clientName;

  return result;
}

export function optionFilePath(settings: DaemonSettings): string {
  return join(settings.scriptOptsDir, `${settings.clientName}.conf`);
}
