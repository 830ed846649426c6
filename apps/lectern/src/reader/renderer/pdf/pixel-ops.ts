/**
 * RGBA pixel helpers for the image path.
 *
 * Buffers are 8-bit RGBA, row-major, no padding. Inputs are never mutated;
 * every helper returns a fresh buffer.
 */

import type { PixelRect } from './viewport-controller';

export interface RgbaImage {
  readonly width: number;
  readonly height: number;
  readonly pixels: Uint8Array;
}

export function rgbaByteLength(width: number, height: number): number {
  return width * height * 4;
}

/**
 * Copy `rect` out of `source`. The rect must lie inside the image.
 */
export function cropRgba(source: RgbaImage, rect: PixelRect): RgbaImage {
  if (rect.x === 0 && rect.y === 0 && rect.width === source.width && rect.height === source.height) {
    return { width: source.width, height: source.height, pixels: source.pixels.slice() };
  }

  const out = new Uint8Array(rgbaByteLength(rect.width, rect.height));
  const srcStride = source.width * 4;
  const rowBytes = rect.width * 4;

  for (let y = 0; y < rect.height; y++) {
    const start = (rect.y + y) * srcStride + rect.x * 4;
    out.set(source.pixels.subarray(start, start + rowBytes), y * rowBytes);
  }

  return { width: rect.width, height: rect.height, pixels: out };
}

/**
 * Resize with a triangle (bilinear) filter. Used for transmission downscale
 * and by the half-block sink to sample cells.
 */
export function resizeRgba(source: RgbaImage, width: number, height: number): RgbaImage {
  const w = Math.max(1, Math.floor(width));
  const h = Math.max(1, Math.floor(height));
  if (w === source.width && h === source.height) {
    return { width: w, height: h, pixels: source.pixels.slice() };
  }

  const out = new Uint8Array(rgbaByteLength(w, h));
  const src = source.pixels;
  const sw = source.width;
  const sh = source.height;
  const scaleX = sw / w;
  const scaleY = sh / h;

  for (let y = 0; y < h; y++) {
    const fy = Math.min(sh - 1, Math.max(0, (y + 0.5) * scaleY - 0.5));
    const y0 = Math.floor(fy);
    const y1 = Math.min(sh - 1, y0 + 1);
    const ty = fy - y0;

    for (let x = 0; x < w; x++) {
      const fx = Math.min(sw - 1, Math.max(0, (x + 0.5) * scaleX - 0.5));
      const x0 = Math.floor(fx);
      const x1 = Math.min(sw - 1, x0 + 1);
      const tx = fx - x0;

      const i00 = (y0 * sw + x0) * 4;
      const i01 = (y0 * sw + x1) * 4;
      const i10 = (y1 * sw + x0) * 4;
      const i11 = (y1 * sw + x1) * 4;
      const o = (y * w + x) * 4;

      for (let c = 0; c < 4; c++) {
        const top = src[i00 + c] * (1 - tx) + src[i01 + c] * tx;
        const bottom = src[i10 + c] * (1 - tx) + src[i11 + c] * tx;
        out[o + c] = Math.round(top * (1 - ty) + bottom * ty);
      }
    }
  }

  return { width: w, height: h, pixels: out };
}

/**
 * Expand single-channel gray samples (with optional alpha) to RGBA.
 */
export function grayToRgba(samples: Uint8Array, width: number, height: number, hasAlpha: boolean): Uint8Array {
  const n = width * height;
  const stride = hasAlpha ? 2 : 1;
  const out = new Uint8Array(n * 4);
  for (let i = 0; i < n; i++) {
    const g = samples[i * stride];
    out[i * 4] = g;
    out[i * 4 + 1] = g;
    out[i * 4 + 2] = g;
    out[i * 4 + 3] = hasAlpha ? samples[i * stride + 1] : 255;
  }
  return out;
}

/**
 * Expand RGB samples to RGBA with opaque alpha.
 */
export function rgbToRgba(samples: Uint8Array, width: number, height: number): Uint8Array {
  const n = width * height;
  const out = new Uint8Array(n * 4);
  for (let i = 0; i < n; i++) {
    out[i * 4] = samples[i * 3];
    out[i * 4 + 1] = samples[i * 3 + 1];
    out[i * 4 + 2] = samples[i * 3 + 2];
    out[i * 4 + 3] = 255;
  }
  return out;
}
