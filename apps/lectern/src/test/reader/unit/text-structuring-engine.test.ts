/**
 * Unit tests for TextStructuringEngine
 */

import { describe, it, expect, vi } from 'vitest';
import { TextStructuringEngine, type TextSource } from '@/reader/renderer/text/text-structuring-engine';
import { reflowParagraphs } from '@/reader/renderer/text/paragraphs';
import type { TextOp } from '@/reader/renderer/text/types';
import { lineOps } from '../fixtures/fake-document-backend';

function chapterPage(n: number): TextOp[] {
  return lineOps(
    'Field Notes',
    `Section ${n} opens with a sentence that`,
    'continues on the next line.',
    '',
    `Page ${n} ends here.`
  );
}

function source(pages: TextOp[][], failing: number[] = []) {
  const calls: number[] = [];
  const textSource: TextSource = {
    pageCount: pages.length,
    positionedTextOps: vi.fn(async (pageIndex: number) => {
      calls.push(pageIndex);
      if (failing.includes(pageIndex)) throw new Error('bad font program');
      return pages[pageIndex];
    }),
  };
  return { textSource, calls };
}

describe('TextStructuringEngine', () => {
  const pages = [chapterPage(0), chapterPage(1), chapterPage(2), []];

  it('should return raw lines including running heads', async () => {
    const { textSource } = source(pages);
    const engine = new TextStructuringEngine(textSource);

    const layout = await engine.layoutPage(1, 'raw', 80);

    expect(layout).toEqual({
      kind: 'lines',
      pageIndex: 1,
      lines: ['Field Notes', 'Section 1 opens with a sentence that', 'continues on the next line.', '', 'Page 1 ends here.'],
    });
  });

  it('should strip running heads and keep line breaks in wrap mode', async () => {
    const { textSource } = source(pages);
    const engine = new TextStructuringEngine(textSource);

    const layout = await engine.layoutPage(1, 'wrap', 80);

    expect(layout.kind === 'lines' ? layout.lines : []).toEqual([
      'Section 1 opens with a sentence that',
      'continues on the next line.',
      '',
      'Page 1 ends here.',
    ]);
  });

  it('should reflow paragraphs and wrap them to the width', async () => {
    const { textSource } = source(pages);
    const engine = new TextStructuringEngine(textSource);

    const layout = await engine.layoutPage(2, 'reflow', 40);

    expect(layout.kind === 'lines' ? layout.lines : []).toEqual([
      'Section 2 opens with a sentence that',
      'continues on the next line.',
      '',
      'Page 2 ends here.',
    ]);
  });

  it('should keep structured text stable under a second reflow', async () => {
    const { textSource } = source(pages);
    const engine = new TextStructuringEngine(textSource);

    const result = await engine.structurePage(0);
    if (result.kind !== 'text') throw new Error('expected text');

    expect(result.page.reflowedParagraphs).toEqual([
      'Section 0 opens with a sentence that continues on the next line.',
      'Page 0 ends here.',
    ]);
    expect(reflowParagraphs(result.page.reflowedParagraphs)).toEqual(result.page.reflowedParagraphs);
  });

  it('should extract each page once per generation', async () => {
    const { textSource, calls } = source(pages);
    const engine = new TextStructuringEngine(textSource);

    await engine.layoutPage(1, 'reflow', 80);
    await engine.layoutPage(1, 'wrap', 30);
    await engine.layoutPage(1, 'raw', 80);

    expect([...calls].sort()).toEqual([0, 1, 2, 3]);

    engine.setGeneration(1);
    await engine.layoutPage(1, 'raw', 80);

    expect(calls.filter((page) => page === 1)).toHaveLength(2);
  });

  it('should share one extraction between concurrent requests', async () => {
    const { textSource, calls } = source(pages);
    const engine = new TextStructuringEngine(textSource);

    await Promise.all([engine.getRawLines(2), engine.getRawLines(2), engine.getRawLines(2)]);

    expect(calls).toEqual([2]);
  });

  it('should report pages without text as empty', async () => {
    const { textSource } = source(pages);
    const engine = new TextStructuringEngine(textSource);

    expect(await engine.layoutPage(3, 'reflow', 80)).toEqual({ kind: 'empty', pageIndex: 3, reason: 'no-extractable-text' });
    expect(await engine.layoutPage(3, 'raw', 80)).toEqual({ kind: 'empty', pageIndex: 3, reason: 'no-extractable-text' });
  });

  it('should build the furniture profile without a failing sample page', async () => {
    const { textSource } = source(pages, [0]);
    const engine = new TextStructuringEngine(textSource);

    const profile = await engine.getFurnitureProfile();

    expect(profile.sampledPages).toBe(2);
    expect([...profile.top]).toEqual(['Field Notes']);
    await expect(engine.layoutPage(0, 'wrap', 80)).rejects.toThrow('bad font program');
  });

  it('should leave running heads in place when trimming is off', async () => {
    const { textSource } = source(pages);
    const engine = new TextStructuringEngine(textSource, { trimHeadersFooters: false });

    const layout = await engine.layoutPage(1, 'wrap', 80);

    expect(layout.kind === 'lines' ? layout.lines[0] : '').toBe('Field Notes');
  });
});
