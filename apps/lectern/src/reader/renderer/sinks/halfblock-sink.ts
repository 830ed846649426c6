/**
 * Half-block fallback sink.
 *
 * Each cell shows two vertical samples: `▀` with the upper sample as
 * foreground and the lower as background, in 24-bit color. Works in any
 * truecolor terminal without a graphics protocol.
 */

import { resizeRgba } from '../pdf/pixel-ops';
import {
  type CellRect,
  type OutputStream,
  type PixelBuffer,
  type ProtocolSink,
  RESET_SGR,
  moveCursor,
} from './protocol-sink';

const UPPER_HALF = '▀';

type Rgb = readonly [number, number, number];

/** Alpha-composite onto white. */
function sample(pixels: Uint8Array, index: number): Rgb {
  const a = pixels[index + 3] / 255;
  const blend = (c: number) => Math.round(c * a + 255 * (1 - a));
  return [blend(pixels[index]), blend(pixels[index + 1]), blend(pixels[index + 2])];
}

function sameColor(a: Rgb, b: Rgb): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2];
}

function fg([r, g, b]: Rgb): string {
  return `\x1b[38;2;${r};${g};${b}m`;
}

function bg([r, g, b]: Rgb): string {
  return `\x1b[48;2;${r};${g};${b}m`;
}

/**
 * Render `buffer` as `rows` lines of `cols` half-block cells.
 */
export function halfBlockRows(buffer: PixelBuffer, cols: number, rows: number): string[] {
  const scaled = resizeRgba(buffer, cols, rows * 2);
  const lines: string[] = [];

  for (let row = 0; row < rows; row++) {
    let line = '';
    for (let col = 0; col < cols; col++) {
      const top = sample(scaled.pixels, ((row * 2) * cols + col) * 4);
      const bottom = sample(scaled.pixels, ((row * 2 + 1) * cols + col) * 4);
      line += sameColor(top, bottom) ? `${bg(top)} ` : `${fg(top)}${bg(bottom)}${UPPER_HALF}`;
    }
    lines.push(line + RESET_SGR);
  }

  return lines;
}

export class HalfBlockSink implements ProtocolSink {
  readonly kind = 'halfblock';
  private lastPlacement: CellRect | null = null;

  constructor(private readonly output: OutputStream) {}

  /** Every emit redraws; there is nothing to re-place. */
  emit(buffer: PixelBuffer, placement: CellRect, _contentKey?: string): void {
    const lines = halfBlockRows(buffer, placement.cols, placement.rows);
    let out = '';
    lines.forEach((line, i) => {
      out += moveCursor(placement.row + i, placement.col) + line;
    });
    this.output.write(out);
    this.lastPlacement = placement;
  }

  clear(): void {
    const placement = this.lastPlacement;
    if (!placement) return;
    let out = RESET_SGR;
    for (let i = 0; i < placement.rows; i++) {
      out += moveCursor(placement.row + i, placement.col) + ' '.repeat(placement.cols);
    }
    this.output.write(out);
    this.lastPlacement = null;
  }
}
