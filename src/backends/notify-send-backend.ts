/**
 * notify-send Backend - freedesktop notifications through command-line tools
 *
 * MECHANISM:
 * - show:  notify-send --print-id [--replace-id=<id>] ... -- <summary> <body>
 *          The printed id is kept on the handle so later shows replace the
 *          same notification instead of stacking new ones.
 * - close: gdbus call ... org.freedesktop.Notifications.CloseNotification <id>
 * - caps:  gdbus call ... org.freedesktop.Notifications.GetCapabilities
 *
 * Thumbnails travel as PNG files via the image-path hint. The file is only
 * re-encoded when the image's revision changes.
 *
 * Commands run through an injectable runner so tests never spawn processes.
 */

import { execFileSync } from 'child_process';
import { existsSync, mkdirSync, unlinkSync, writeFileSync } from 'fs';
import { join } from 'path';
import { PNG } from 'pngjs';
import type { NotificationHandle, PresentationBackend, ThumbnailImage } from '../types/backends';
import { BackendError } from '../types/backends';
import type { Urgency } from '../types/options';
import type { Logger } from '../lib/logger';

export type CommandRunner = (file: string, args: string[]) => string;

export const defaultCommandRunner: CommandRunner = (file, args) =>
  execFileSync(file, args, { encoding: 'utf-8', timeout: 5000, stdio: ['ignore', 'pipe', 'pipe'] });

const DBUS_TARGET = [
  '--session',
  '--dest', 'org.freedesktop.Notifications',
  '--object-path', '/org/freedesktop/Notifications'
];

export interface NotifySendBackendOptions {
  logger: Logger;
  /** Where thumbnail PNGs are written */
  cacheDir: string;
  runner?: CommandRunner;
}

/**
 * Parse gdbus output such as "(['body', 'body-markup', 'icon-static'],)".
 */
export function parseCapabilities(output: string): Set<string> {
  const caps = new Set<string>();
  for (const match of output.matchAll(/'([^']*)'/g)) {
    caps.add(match[1]);
  }
  return caps;
}

/**
 * Copy a possibly padded RGBA buffer into a tightly packed PNG.
 */
export function encodeThumbnailPng(image: ThumbnailImage): Buffer {
  const png = new PNG({ width: image.width, height: image.height });
  const rowBytes = image.width * 4;
  for (let y = 0; y < image.height; y++) {
    const src = image.data.subarray(y * image.stride, y * image.stride + rowBytes);
    png.data.set(src, y * rowBytes);
  }
  return PNG.sync.write(png);
}

export class NotifySendBackend implements PresentationBackend {
  private readonly logger: Logger;
  private readonly cacheDir: string;
  private readonly runner: CommandRunner;

  private initialized = false;
  private appName = 'mpv';
  private appIcon: string | null = null;

  private imagePath: string | null = null;
  private writtenImage: ThumbnailImage | null = null;
  private writtenRevision = -1;

  constructor(options: NotifySendBackendOptions) {
    this.logger = options.logger;
    this.cacheDir = options.cacheDir;
    this.runner = options.runner ?? defaultCommandRunner;
  }

  init(appName: string): void {
    try {
      this.runner('notify-send', ['--version']);
    } catch (error) {
      throw new BackendError('init', `notify-send unavailable: ${errorMessage(error)}`, { cause: error });
    }
    this.appName = appName;
    this.initialized = true;
  }

  uninit(): void {
    this.initialized = false;
    this.removeImageFile();
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  queryServerCapabilities(): Set<string> {
    try {
      const output = this.runner('gdbus', [
        'call', ...DBUS_TARGET,
        '--method', 'org.freedesktop.Notifications.GetCapabilities'
      ]);
      return parseCapabilities(output);
    } catch (error) {
      throw new BackendError('capabilities', errorMessage(error), { cause: error });
    }
  }

  setAppName(name: string): void {
    this.appName = name;
  }

  setAppIcon(icon: string | null): void {
    this.appIcon = icon;
  }

  create(summary: string, body: string): NotificationHandle {
    return {
      summary,
      body,
      urgency: 'low',
      category: null,
      progress: null,
      image: null,
      serverId: null
    };
  }

  update(handle: NotificationHandle, summary: string, body: string): void {
    handle.summary = summary;
    handle.body = body;
  }

  setUrgency(handle: NotificationHandle, urgency: Urgency): void {
    handle.urgency = urgency;
  }

  setCategory(handle: NotificationHandle, category: string | null): void {
    handle.category = category;
  }

  setProgressHint(handle: NotificationHandle, value: number | null): void {
    handle.progress = value;
  }

  setImage(handle: NotificationHandle, image: ThumbnailImage | null): void {
    handle.image = image;
  }

  show(handle: NotificationHandle): void {
    let output: string;
    try {
      output = this.runner('notify-send', this.buildShowArgs(handle));
    } catch (error) {
      throw new BackendError('show', errorMessage(error), { cause: error });
    }

    const id = Number.parseInt(output.trim(), 10);
    if (Number.isInteger(id) && id > 0) {
      handle.serverId = id;
    }
  }

  close(handle: NotificationHandle): void {
    if (handle.serverId === null) return;

    try {
      this.runner('gdbus', [
        'call', ...DBUS_TARGET,
        '--method', 'org.freedesktop.Notifications.CloseNotification',
        String(handle.serverId)
      ]);
    } catch (error) {
      throw new BackendError('close', errorMessage(error), { cause: error });
    }
  }

  buildShowArgs(handle: NotificationHandle): string[] {
    const args = [
      '--print-id',
      `--app-name=${this.appName}`,
      `--urgency=${handle.urgency}`,
      // Closing is driven by our own timer
      '--expire-time=0'
    ];

    if (handle.serverId !== null) args.push(`--replace-id=${handle.serverId}`);
    if (this.appIcon) args.push(`--icon=${this.appIcon}`);
    if (handle.category) args.push(`--category=${handle.category}`);
    if (handle.progress !== null) args.push(`--hint=int:value:${handle.progress}`);

    const imagePath = handle.image ? this.writeImage(handle.image) : null;
    if (imagePath) args.push(`--hint=string:image-path:${imagePath}`);

    args.push('--', handle.summary, handle.body);
    return args;
  }

  private writeImage(image: ThumbnailImage): string | null {
    if (this.imagePath && this.writtenImage === image && this.writtenRevision === image.revision) {
      return this.imagePath;
    }

    const path = join(this.cacheDir, `thumbnail-${process.pid}.png`);
    try {
      if (!existsSync(this.cacheDir)) {
        mkdirSync(this.cacheDir, { recursive: true, mode: 0o700 });
      }
      writeFileSync(path, encodeThumbnailPng(image), { mode: 0o600 });
    } catch (error) {
      this.logger.error('failed to write thumbnail', error);
      return null;
    }

    this.imagePath = path;
    this.writtenImage = image;
    this.writtenRevision = image.revision;
    return path;
  }

  private removeImageFile(): void {
    if (!this.imagePath) return;
    try {
      if (existsSync(this.imagePath)) unlinkSync(this.imagePath);
    } catch (error) {
      this.logger.verbose(`could not remove ${this.imagePath}: ${errorMessage(error)}`);
    }
    this.imagePath = null;
    this.writtenImage = null;
    this.writtenRevision = -1;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export default NotifySendBackend;
