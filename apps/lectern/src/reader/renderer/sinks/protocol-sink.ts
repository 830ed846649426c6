/**
 * Protocol sinks turn a cropped page buffer into terminal output.
 *
 * A sink is chosen once per session (see capability.ts) and used by
 * reference afterwards. Sinks write escape sequences to an output stream;
 * they never read input and never decide geometry. The buffer they receive
 * is already cropped and downscaled, and the cell rect says where it goes.
 */

import type { PixelBuffer } from '../pdf/document-session';
import type { CellRect, CellSize } from '../pdf/viewport-controller';
import type { HalfBlockSink } from './halfblock-sink';
import type { KittySink } from './kitty-sink';

export type { CellRect, CellSize, PixelBuffer };

/** Anything with a `write` that takes a string; process.stdout qualifies. */
export interface OutputStream {
  write(chunk: string): unknown;
}

export type SinkKind = 'kitty' | 'halfblock';

export interface ProtocolSink {
  readonly kind: SinkKind;
  /**
   * Draw `buffer` into `placement`. When `contentKey` equals the key of the
   * previous emit, a sink may re-place what it already sent.
   */
  emit(buffer: PixelBuffer, placement: CellRect, contentKey?: string): void;
  /** Remove whatever the last emit drew. */
  clear(): void;
}

export type ActiveSink = KittySink | HalfBlockSink;

/** CSI cursor position; rows and columns are 0-based here, 1-based on the wire. */
export function moveCursor(row: number, col: number): string {
  return `\x1b[${row + 1};${col + 1}H`;
}

export const SAVE_CURSOR = '\x1b7';
export const RESTORE_CURSOR = '\x1b8';
export const RESET_SGR = '\x1b[0m';
