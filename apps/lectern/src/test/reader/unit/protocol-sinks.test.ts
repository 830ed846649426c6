/**
 * Unit tests for the kitty and half-block sinks
 */

import { describe, it, expect } from 'vitest';
import { HalfBlockSink, halfBlockRows } from '@/reader/renderer/sinks/halfblock-sink';
import {
  KITTY_CHUNK_SIZE,
  KittySink,
  kittyTransmitCommands,
  tmuxPassthrough,
} from '@/reader/renderer/sinks/kitty-sink';
import { CollectingOutput } from '../fixtures/collecting-output';
import { solidRgba } from '../fixtures/fake-document-backend';

const ESC = '\x1b';
const PLACEMENT = { col: 2, row: 1, cols: 3, rows: 2 };
const ONE_PIXEL = { width: 1, height: 1, pixels: new Uint8Array([1, 2, 3, 4]) };

describe('kittyTransmitCommands', () => {
  it('should send a small image in one command', () => {
    expect(kittyTransmitCommands(ONE_PIXEL, PLACEMENT, 7)).toEqual([
      `${ESC}_Ga=T,f=32,s=1,v=1,c=3,r=2,i=7,p=1,q=2,C=1,m=0;AQIDBA==${ESC}\\`,
    ]);
  });

  it('should split the payload into 4096-byte chunks', () => {
    // 6144 bytes → 8192 base64 characters
    const buffer = { width: 1536, height: 1, pixels: new Uint8Array(6144) };
    const commands = kittyTransmitCommands(buffer, { col: 0, row: 0, cols: 1, rows: 1 }, 1);

    expect(commands).toHaveLength(2);
    expect(commands[0].startsWith(`${ESC}_Ga=T,f=32,s=1536,v=1,c=1,r=1,i=1,p=1,q=2,C=1,m=1;`)).toBe(true);
    expect(commands[1].startsWith(`${ESC}_Gm=0;`)).toBe(true);
    for (const command of commands) {
      const payload = command.slice(command.indexOf(';') + 1, -2);
      expect(payload).toHaveLength(KITTY_CHUNK_SIZE);
    }
  });
});

describe('tmuxPassthrough', () => {
  it('should double every escape inside the wrapper', () => {
    expect(tmuxPassthrough(`${ESC}_Gx${ESC}\\`)).toBe(`${ESC}Ptmux;${ESC}${ESC}_Gx${ESC}${ESC}\\${ESC}\\`);
  });
});

describe('KittySink', () => {
  it('should transmit at the placement and restore the cursor', () => {
    const output = new CollectingOutput();
    new KittySink(output).emit(ONE_PIXEL, PLACEMENT, 'k1');

    expect(output.chunks).toEqual([
      `${ESC}7${ESC}[2;3H${ESC}_Ga=T,f=32,s=1,v=1,c=3,r=2,i=1,p=1,q=2,C=1,m=0;AQIDBA==${ESC}\\${ESC}8`,
    ]);
  });

  it('should re-place instead of retransmitting unchanged content', () => {
    const output = new CollectingOutput();
    const sink = new KittySink(output);
    sink.emit(ONE_PIXEL, PLACEMENT, 'k1');
    sink.emit(ONE_PIXEL, PLACEMENT, 'k1');

    expect(output.chunks[1]).toBe(`${ESC}7${ESC}[2;3H${ESC}_Ga=p,i=1,p=1,c=3,r=2,q=2,C=1${ESC}\\${ESC}8`);
  });

  it('should retransmit after a clear', () => {
    const output = new CollectingOutput();
    const sink = new KittySink(output);
    sink.emit(ONE_PIXEL, PLACEMENT, 'k1');
    sink.clear();
    sink.clear();
    sink.emit(ONE_PIXEL, PLACEMENT, 'k1');

    expect(output.chunks).toHaveLength(3);
    expect(output.chunks[1]).toBe(`${ESC}_Ga=d,d=I,i=1,q=2${ESC}\\`);
    expect(output.chunks[2]).toContain('a=T');
  });

  it('should wrap commands for tmux', () => {
    const output = new CollectingOutput();
    const sink = new KittySink(output, { tmux: true, imageId: 3 });
    sink.emit(ONE_PIXEL, PLACEMENT);
    sink.clear();

    expect(output.chunks[1]).toBe(`${ESC}Ptmux;${ESC}${ESC}_Ga=d,d=I,i=3,q=2${ESC}${ESC}\\${ESC}\\`);
  });
});

describe('halfBlockRows', () => {
  it('should draw the upper sample as foreground and the lower as background', () => {
    const pixels = new Uint8Array([255, 0, 0, 255, 0, 0, 255, 255]);

    expect(halfBlockRows({ width: 1, height: 2, pixels }, 1, 1)).toEqual([
      `${ESC}[38;2;255;0;0m${ESC}[48;2;0;0;255m▀${ESC}[0m`,
    ]);
  });

  it('should use a background-colored space when both samples match', () => {
    const pixels = solidRgba(1, 2, [0, 255, 0, 255]);

    expect(halfBlockRows({ width: 1, height: 2, pixels }, 1, 1)).toEqual([`${ESC}[48;2;0;255;0m ${ESC}[0m`]);
  });

  it('should composite transparent pixels onto white', () => {
    const pixels = solidRgba(2, 4, [0, 0, 0, 0]);

    expect(halfBlockRows({ width: 2, height: 4, pixels }, 2, 2)).toEqual([
      `${ESC}[48;2;255;255;255m ${ESC}[48;2;255;255;255m ${ESC}[0m`,
      `${ESC}[48;2;255;255;255m ${ESC}[48;2;255;255;255m ${ESC}[0m`,
    ]);
  });
});

describe('HalfBlockSink', () => {
  it('should position each row and blank it on clear', () => {
    const output = new CollectingOutput();
    const sink = new HalfBlockSink(output);
    const pixels = solidRgba(1, 2, [0, 255, 0, 255]);

    sink.emit({ width: 1, height: 2, pixels }, { col: 4, row: 2, cols: 1, rows: 1 });
    sink.clear();
    sink.clear();

    expect(output.chunks).toEqual([`${ESC}[3;5H${ESC}[48;2;0;255;0m ${ESC}[0m`, `${ESC}[0m${ESC}[3;5H `]);
  });
});
