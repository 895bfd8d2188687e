/**
 * Scaler - Separable RGBA resampler with precomputed filter tables
 *
 * Built once per (source size, destination size, algorithm) and reused for
 * every frame of that shape. Each axis gets a table of source indices and
 * normalized weights; scale() runs a horizontal pass into a float
 * intermediate and a vertical pass into the destination.
 *
 * The source stride is passed per call, so frames whose rows are padded
 * differently reuse the same tables.
 */

import type { ScalingAlgorithm } from '../types/options';

interface Kernel {
  support: number;
  /** Widen the kernel when downscaling */
  antialias: boolean;
  weight(x: number): number;
}

const KERNELS: Record<ScalingAlgorithm, Kernel> = {
  'fast-bilinear': { support: 1, antialias: false, weight: triangle },
  'bilinear': { support: 1, antialias: true, weight: triangle },
  'bicubic': { support: 2, antialias: true, weight: catmullRom },
  'lanczos': { support: 3, antialias: true, weight: lanczos3 }
};

function triangle(x: number): number {
  const ax = Math.abs(x);
  return ax < 1 ? 1 - ax : 0;
}

function catmullRom(x: number): number {
  const ax = Math.abs(x);
  if (ax < 1) return 1.5 * ax * ax * ax - 2.5 * ax * ax + 1;
  if (ax < 2) return -0.5 * ax * ax * ax + 2.5 * ax * ax - 4 * ax + 2;
  return 0;
}

function lanczos3(x: number): number {
  if (x === 0) return 1;
  const ax = Math.abs(x);
  if (ax >= 3) return 0;
  const px = Math.PI * x;
  return (3 * Math.sin(px) * Math.sin(px / 3)) / (px * px);
}

export interface FilterTable {
  taps: number;
  /** dstSize * taps source indices, clamped to the source */
  indices: Int32Array;
  /** dstSize * taps weights, each row summing to 1 */
  weights: Float32Array;
}

export function buildFilterTable(srcSize: number, dstSize: number, algorithm: ScalingAlgorithm): FilterTable {
  const kernel = KERNELS[algorithm];
  const ratio = srcSize / dstSize;
  const filterScale = kernel.antialias ? Math.max(1, ratio) : 1;
  const radius = kernel.support * filterScale;
  const taps = Math.ceil(radius * 2) + 1;

  const indices = new Int32Array(dstSize * taps);
  const weights = new Float32Array(dstSize * taps);

  for (let i = 0; i < dstSize; i++) {
    const center = (i + 0.5) * ratio - 0.5;
    const left = Math.floor(center - radius) + 1;
    const row = i * taps;
    let sum = 0;

    for (let t = 0; t < taps; t++) {
      const src = left + t;
      const w = kernel.weight((src - center) / filterScale);
      indices[row + t] = Math.min(srcSize - 1, Math.max(0, src));
      weights[row + t] = w;
      sum += w;
    }

    if (sum === 0) {
      // Degenerate row: fall back to nearest neighbour
      weights.fill(0, row, row + taps);
      indices[row] = Math.min(srcSize - 1, Math.max(0, Math.round(center)));
      weights[row] = 1;
    } else {
      for (let t = 0; t < taps; t++) {
        weights[row + t] /= sum;
      }
    }
  }

  return { taps, indices, weights };
}

export class Scaler {
  readonly srcWidth: number;
  readonly srcHeight: number;
  readonly dstWidth: number;
  readonly dstHeight: number;
  readonly algorithm: ScalingAlgorithm;

  private readonly horizontal: FilterTable;
  private readonly vertical: FilterTable;
  private readonly intermediate: Float32Array;

  constructor(srcWidth: number, srcHeight: number, dstWidth: number, dstHeight: number, algorithm: ScalingAlgorithm) {
    this.srcWidth = srcWidth;
    this.srcHeight = srcHeight;
    this.dstWidth = dstWidth;
    this.dstHeight = dstHeight;
    this.algorithm = algorithm;

    this.horizontal = buildFilterTable(srcWidth, dstWidth, algorithm);
    this.vertical = buildFilterTable(srcHeight, dstHeight, algorithm);
    this.intermediate = new Float32Array(srcHeight * dstWidth * 4);
  }

  scale(src: Uint8Array, srcStride: number, dst: Uint8Array, dstStride: number): void {
    const { taps: hTaps, indices: hIdx, weights: hW } = this.horizontal;
    const { taps: vTaps, indices: vIdx, weights: vW } = this.vertical;
    const mid = this.intermediate;
    const midStride = this.dstWidth * 4;

    // Horizontal: srcHeight rows of dstWidth pixels
    for (let y = 0; y < this.srcHeight; y++) {
      const srcRow = y * srcStride;
      const midRow = y * midStride;

      for (let x = 0; x < this.dstWidth; x++) {
        const base = x * hTaps;
        let r = 0, g = 0, b = 0, a = 0;

        for (let t = 0; t < hTaps; t++) {
          const w = hW[base + t];
          if (w === 0) continue;
          const p = srcRow + hIdx[base + t] * 4;
          r += src[p] * w;
          g += src[p + 1] * w;
          b += src[p + 2] * w;
          a += src[p + 3] * w;
        }

        const o = midRow + x * 4;
        mid[o] = r;
        mid[o + 1] = g;
        mid[o + 2] = b;
        mid[o + 3] = a;
      }
    }

    // Vertical: dstHeight rows
    for (let y = 0; y < this.dstHeight; y++) {
      const base = y * vTaps;
      const dstRow = y * dstStride;

      for (let x = 0; x < midStride; x++) {
        let acc = 0;
        for (let t = 0; t < vTaps; t++) {
          const w = vW[base + t];
          if (w === 0) continue;
          acc += mid[vIdx[base + t] * midStride + x] * w;
        }
        dst[dstRow + x] = clampByte(acc);
      }
    }
  }
}

function clampByte(value: number): number {
  const rounded = Math.round(value);
  return rounded < 0 ? 0 : rounded > 255 ? 255 : rounded;
}

export default Scaler;
