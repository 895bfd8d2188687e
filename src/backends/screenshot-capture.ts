/**
 * Screenshot Capture - Raw frames via the player's screenshot-to-file command
 *
 * The player writes a PNG into the cache directory; it is decoded back into
 * an RGBA frame (stride = width * 4) and delivered as capture-ready. Any
 * failure becomes capture-failed. The engine decides which result counts.
 */

import { existsSync, mkdirSync, unlinkSync } from 'fs';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { PNG } from 'pngjs';
import type { CaptureBackend } from '../types/backends';
import type { RawFrame } from '../types/signals';
import type { Logger } from '../lib/logger';
import type { SignalChannel } from '../lib/signal-channel';

export interface ScreenshotSource {
  screenshotToFile(path: string, flags: string): Promise<void>;
}

export interface ScreenshotCaptureOptions {
  source: ScreenshotSource;
  channel: SignalChannel;
  logger: Logger;
  cacheDir: string;
}

/**
 * Decode PNG bytes into an RGBA frame. pngjs always yields 8-bit RGBA.
 */
export function decodePngFrame(bytes: Buffer): RawFrame {
  const png = PNG.sync.read(bytes);
  return {
    data: new Uint8Array(png.data.buffer, png.data.byteOffset, png.data.length),
    width: png.width,
    height: png.height,
    stride: png.width * 4
  };
}

export class ScreenshotCapture implements CaptureBackend {
  private readonly source: ScreenshotSource;
  private readonly channel: SignalChannel;
  private readonly logger: Logger;
  private readonly cacheDir: string;

  constructor(options: ScreenshotCaptureOptions) {
    this.source = options.source;
    this.channel = options.channel;
    this.logger = options.logger;
    this.cacheDir = options.cacheDir;
  }

  requestCapture(requestId: number, flags: string): void {
    void this.capture(requestId, flags);
  }

  private async capture(requestId: number, flags: string): Promise<void> {
    const path = join(this.cacheDir, `capture-${process.pid}-${requestId}.png`);

    try {
      if (!existsSync(this.cacheDir)) {
        mkdirSync(this.cacheDir, { recursive: true, mode: 0o700 });
      }

      await this.source.screenshotToFile(path, flags);
      const frame = decodePngFrame(await readFile(path));
      this.channel.push({ kind: 'capture-ready', requestId, frame });
    } catch (error) {
      this.channel.push({
        kind: 'capture-failed',
        requestId,
        reason: error instanceof Error ? error.message : String(error)
      });
    } finally {
      this.removeFile(path);
    }
  }

  private removeFile(path: string): void {
    if (!existsSync(path)) return;
    try {
      unlinkSync(path);
    } catch (error) {
      this.logger.verbose(`could not remove ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

export default ScreenshotCapture;
