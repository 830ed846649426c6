/**
 * Kitty graphics protocol sink.
 *
 * Sends raw RGBA (f=32) base64-encoded in 4096-byte chunks and lets the
 * terminal scale it into the target cells (c/r). One image id and one
 * placement id are reused for the whole session, so each transmit or
 * placement replaces the previous one.
 */

import {
  type CellRect,
  type OutputStream,
  type PixelBuffer,
  type ProtocolSink,
  RESTORE_CURSOR,
  SAVE_CURSOR,
  moveCursor,
} from './protocol-sink';

export const KITTY_CHUNK_SIZE = 4096;

export interface KittySinkOptions {
  /** Stable image id; defaults to 1 */
  imageId?: number;
  /** Stable placement id; defaults to 1 */
  placementId?: number;
  /** Wrap every command in tmux passthrough */
  tmux?: boolean;
}

/**
 * Wrap an escape sequence for tmux: ESC bytes inside are doubled.
 */
export function tmuxPassthrough(sequence: string): string {
  return `\x1bPtmux;${sequence.replaceAll('\x1b', '\x1b\x1b')}\x1b\\`;
}

/**
 * Build the APC commands that transmit and display `buffer` at c×r cells.
 */
export function kittyTransmitCommands(
  buffer: PixelBuffer,
  placement: CellRect,
  imageId: number,
  placementId = 1
): string[] {
  const payload = Buffer.from(buffer.pixels.buffer, buffer.pixels.byteOffset, buffer.pixels.byteLength).toString(
    'base64'
  );
  const header = `a=T,f=32,s=${buffer.width},v=${buffer.height},c=${placement.cols},r=${placement.rows},i=${imageId},p=${placementId},q=2,C=1`;

  const commands: string[] = [];
  for (let offset = 0; offset < payload.length || offset === 0; offset += KITTY_CHUNK_SIZE) {
    const chunk = payload.slice(offset, offset + KITTY_CHUNK_SIZE);
    const more = offset + KITTY_CHUNK_SIZE < payload.length ? 1 : 0;
    const keys = offset === 0 ? `${header},m=${more}` : `m=${more}`;
    commands.push(`\x1b_G${keys};${chunk}\x1b\\`);
  }
  return commands;
}

export function kittyPlaceCommand(placement: CellRect, imageId: number, placementId = 1): string {
  return `\x1b_Ga=p,i=${imageId},p=${placementId},c=${placement.cols},r=${placement.rows},q=2,C=1\x1b\\`;
}

export function kittyDeleteCommand(imageId: number): string {
  return `\x1b_Ga=d,d=I,i=${imageId},q=2\x1b\\`;
}

export class KittySink implements ProtocolSink {
  readonly kind = 'kitty';
  readonly imageId: number;
  readonly placementId: number;
  private readonly tmux: boolean;
  private lastContentKey: string | null = null;
  private visible = false;

  constructor(
    private readonly output: OutputStream,
    options: KittySinkOptions = {}
  ) {
    this.imageId = options.imageId ?? 1;
    this.placementId = options.placementId ?? 1;
    this.tmux = options.tmux ?? false;
  }

  private wrap(command: string): string {
    return this.tmux ? tmuxPassthrough(command) : command;
  }

  emit(buffer: PixelBuffer, placement: CellRect, contentKey?: string): void {
    const reuse = contentKey !== undefined && contentKey === this.lastContentKey && this.visible;

    let out = SAVE_CURSOR + moveCursor(placement.row, placement.col);
    if (reuse) {
      out += this.wrap(kittyPlaceCommand(placement, this.imageId, this.placementId));
    } else {
      for (const command of kittyTransmitCommands(buffer, placement, this.imageId, this.placementId)) {
        out += this.wrap(command);
      }
    }
    out += RESTORE_CURSOR;

    this.output.write(out);
    this.lastContentKey = contentKey ?? null;
    this.visible = true;
  }

  clear(): void {
    if (!this.visible) return;
    this.output.write(this.wrap(kittyDeleteCommand(this.imageId)));
    this.visible = false;
    this.lastContentKey = null;
  }
}
