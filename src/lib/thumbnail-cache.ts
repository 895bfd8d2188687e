/**
 * Thumbnail Cache - Reusable rescale pipeline for captured frames
 *
 * PURPOSE: Convert raw RGBA frames into a small RGBA thumbnail without
 * reallocating the destination buffer or rebuilding the scaler for every
 * frame of the same shape.
 *
 * CONTEXT: a tagged variant. 'empty' owns nothing; 'active' owns the
 * destination buffer, the scaler (null on the copy path) and the image
 * wrapper handed to the presentation backend. Building and destroying are
 * all-or-nothing, so a half-built pipeline never exists.
 *
 * REUSE RULE: same source width/height, target size, algorithm and mode, and
 * either scaling is active (a stride-only change is absorbed by updating
 * the stored stride) or the stride is unchanged.
 */

import type { ThumbnailImage } from '../types/backends';
import type { ScalingAlgorithm } from '../types/options';
import type { Logger } from './logger';
import { Scaler } from './scaler';

/** Largest image the notification bus accepts (128 MiB message limit) */
export const MAX_IMAGE_SIZE = 127 * 1024 * 1024;

export interface ActiveThumbnailContext {
  kind: 'active';
  srcWidth: number;
  srcHeight: number;
  srcStride: number;
  dstWidth: number;
  dstHeight: number;
  dstStride: number;
  target: number;
  algorithm: ScalingAlgorithm;
  disableScaling: boolean;
  buffer: Uint8Array;
  /** null on the copy path */
  scaler: Scaler | null;
  image: ThumbnailImage;
}

export type ThumbnailContext = { kind: 'empty' } | ActiveThumbnailContext;

export interface ProcessResult {
  processed: boolean;
  /** Wall-clock duration of the scale/copy when measured, µs */
  elapsedMicros: number | null;
}

export interface ThumbnailCacheOptions {
  logger: Logger;
  /** High resolution clock in ms */
  now?: () => number;
}

const EMPTY: ThumbnailContext = { kind: 'empty' };

/**
 * Aspect-preserving size whose longer side equals target; each side >= 1.
 */
export function computeDestinationSize(srcWidth: number, srcHeight: number, target: number): { width: number; height: number } {
  const ratio = Math.min(target / srcWidth, target / srcHeight);
  return {
    width: Math.max(1, Math.trunc(srcWidth * ratio)),
    height: Math.max(1, Math.trunc(srcHeight * ratio))
  };
}

export class ThumbnailCache {
  private context: ThumbnailContext = EMPTY;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: ThumbnailCacheOptions) {
    this.logger = options.logger;
    this.now = options.now ?? (() => performance.now());
  }

  getContext(): Readonly<ThumbnailContext> {
    return this.context;
  }

  /** Image wrapper of the active context, null when empty */
  getImage(): ThumbnailImage | null {
    return this.context.kind === 'active' ? this.context.image : null;
  }

  /**
   * Make sure an active context matches the frame shape and settings.
   * Returns false when no usable context could be built.
   */
  ensureContext(
    srcWidth: number,
    srcHeight: number,
    srcStride: number,
    target: number,
    algorithm: ScalingAlgorithm,
    disableScaling: boolean
  ): boolean {
    const current = this.context;

    if (current.kind === 'active'
      && current.srcWidth === srcWidth
      && current.srcHeight === srcHeight
      && current.target === target
      && current.algorithm === algorithm
      && current.disableScaling === disableScaling
      && (!disableScaling || current.srcStride === srcStride)) {
      current.srcStride = srcStride;
      return true;
    }

    this.destroy();

    if (srcWidth < 1 || srcHeight < 1 || srcStride < srcWidth * 4) {
      this.logger.error(`invalid frame geometry ${srcWidth}x${srcHeight} stride ${srcStride}`);
      return false;
    }

    let dstWidth = srcWidth;
    let dstHeight = srcHeight;
    let dstStride = srcStride;

    if (!disableScaling) {
      const size = computeDestinationSize(srcWidth, srcHeight, target);
      dstWidth = size.width;
      dstHeight = size.height;
      dstStride = dstWidth * 4;
    }

    if (dstStride * dstHeight > MAX_IMAGE_SIZE) {
      this.logger.error('thumbnail output resolution is too large, disabling thumbnails');
      return false;
    }

    let buffer: Uint8Array;
    let scaler: Scaler | null;
    try {
      buffer = new Uint8Array(dstStride * dstHeight);
      scaler = disableScaling ? null : new Scaler(srcWidth, srcHeight, dstWidth, dstHeight, algorithm);
    } catch (error) {
      this.logger.error('failed to allocate thumbnail context', error);
      return false;
    }

    this.context = {
      kind: 'active',
      srcWidth,
      srcHeight,
      srcStride,
      dstWidth,
      dstHeight,
      dstStride,
      target,
      algorithm,
      disableScaling,
      buffer,
      scaler,
      image: { width: dstWidth, height: dstHeight, stride: dstStride, data: buffer, revision: 0 }
    };

    this.logger.verbose('configured thumbnail context');
    return true;
  }

  /**
   * Scale (or copy) a frame into the destination buffer.
   */
  process(data: Uint8Array, measure = false): ProcessResult {
    const ctx = this.context;
    if (ctx.kind === 'empty') {
      return { processed: false, elapsedMicros: null };
    }

    const required = ctx.scaler
      ? ctx.srcStride * (ctx.srcHeight - 1) + ctx.srcWidth * 4
      : ctx.buffer.length;
    if (data.length < required) {
      this.logger.error(`frame buffer too short (${data.length} < ${required} bytes)`);
      return { processed: false, elapsedMicros: null };
    }

    const start = measure ? this.now() : 0;

    if (ctx.scaler) {
      ctx.scaler.scale(data, ctx.srcStride, ctx.buffer, ctx.dstStride);
    } else {
      ctx.buffer.set(data.subarray(0, ctx.buffer.length));
    }

    ctx.image.revision++;

    return {
      processed: true,
      elapsedMicros: measure ? Math.round((this.now() - start) * 1000) : null
    };
  }

  /** Release the active context; no-op when already empty */
  destroy(): void {
    if (this.context.kind === 'empty') return;
    this.context = EMPTY;
    this.logger.verbose('destroyed thumbnail context');
  }
}

export default ThumbnailCache;
