/**
 * Text Structuring Engine
 *
 * Turns a page's positioned draw operations into display lines:
 *
 *   ops → tokenize → strip furniture → reflow paragraphs → wrap to width
 *
 * Structuring is cached per (generation, page) and deduplicated while in
 * flight; wrapping is recomputed per call since it depends on frame width.
 * The furniture profile is computed once per generation from the first K
 * pages and shared by all pages.
 *
 * @example
 * ```typescript
 * const engine = new TextStructuringEngine(source, { mode: 'reflow' });
 * const layout = await engine.layoutPage(3, 'reflow', 80);
 * if (layout.kind === 'lines') draw(layout.lines);
 * ```
 */

import type { Logger } from 'pino';
import type { TextConfig, TextDisplayMode } from '../../../config/viewer-config';
import { componentLogger } from '../../../logging/logger';
import { detectPageFurniture, stripPageFurniture } from './furniture';
import { reflowParagraphs } from './paragraphs';
import { hasExtractableText, tokenizeTextOps } from './tokenizer';
import type { FurnitureProfile, StructuredPage, TextOp, TextPageResult } from './types';
import { wrapParagraphs, wrapPreservingLines } from './wrap';

/**
 * Where the engine gets page text from. The document session implements this
 * on top of the worker; tests pass literal op lists.
 */
export interface TextSource {
  readonly pageCount: number;
  positionedTextOps(pageIndex: number): Promise<TextOp[]>;
}

export type TextLayout =
  | { kind: 'lines'; pageIndex: number; lines: string[] }
  | { kind: 'empty'; pageIndex: number; reason: 'no-extractable-text' };

export type TextEngineOptions = Pick<
  TextConfig,
  'furnitureSampleDepth' | 'furnitureMajority' | 'wordSpaceThreshold' | 'lineBreakTolerance' | 'trimHeadersFooters'
> & {
  logger?: Logger;
};

export const DEFAULT_TEXT_ENGINE_OPTIONS: TextEngineOptions = {
  furnitureSampleDepth: 5,
  furnitureMajority: 0.5,
  wordSpaceThreshold: -200,
  lineBreakTolerance: 2,
  trimHeadersFooters: true,
};

export class TextStructuringEngine {
  private generation = 0;
  private readonly options: TextEngineOptions;
  private readonly log: Logger;

  /** Tokenized lines per page (step 1 only) */
  private rawLines = new Map<number, string[]>();
  private rawInFlight = new Map<number, Promise<string[]>>();

  /** Fully structured pages */
  private pages = new Map<number, TextPageResult>();
  private pagesInFlight = new Map<number, Promise<TextPageResult>>();

  private furniture: Promise<FurnitureProfile> | null = null;

  constructor(
    private readonly source: TextSource,
    options: Partial<TextEngineOptions> = {}
  ) {
    this.options = { ...DEFAULT_TEXT_ENGINE_OPTIONS, ...options };
    this.log = componentLogger('TextStructuringEngine', options.logger);
  }

  /**
   * Drop everything structured under older generations.
   */
  setGeneration(generation: number): void {
    if (generation === this.generation) return;
    this.generation = generation;
    this.rawLines.clear();
    this.rawInFlight.clear();
    this.pages.clear();
    this.pagesInFlight.clear();
    this.furniture = null;
  }

  getGeneration(): number {
    return this.generation;
  }

  /**
   * Step 1 only, for raw display mode and furniture sampling.
   */
  async getRawLines(pageIndex: number): Promise<string[]> {
    const cached = this.rawLines.get(pageIndex);
    if (cached) return cached;

    const inFlight = this.rawInFlight.get(pageIndex);
    if (inFlight) return inFlight;

    const generation = this.generation;
    const promise = this.source.positionedTextOps(pageIndex).then((ops) =>
      tokenizeTextOps(ops, {
        wordSpaceThreshold: this.options.wordSpaceThreshold,
        lineBreakTolerance: this.options.lineBreakTolerance,
      })
    );
    this.rawInFlight.set(pageIndex, promise);

    try {
      const lines = await promise;
      if (generation === this.generation) {
        this.rawLines.set(pageIndex, lines);
      }
      return lines;
    } finally {
      if (this.rawInFlight.get(pageIndex) === promise) {
        this.rawInFlight.delete(pageIndex);
      }
    }
  }

  /**
   * Furniture profile sampled from the first K pages of the current generation.
   */
  getFurnitureProfile(): Promise<FurnitureProfile> {
    if (!this.furniture) {
      const depth = Math.min(this.options.furnitureSampleDepth, this.source.pageCount);
      const sample = Array.from({ length: depth }, (_, i) =>
        // A page that fails to extract doesn't vote.
        this.getRawLines(i).catch((error: unknown): string[] => {
          this.log.warn({ page: i, err: error }, 'furniture sample page failed');
          return [];
        })
      );
      const profile = Promise.all(sample).then((pages) => {
        const detected = detectPageFurniture(pages, {
          sampleDepth: this.options.furnitureSampleDepth,
          majority: this.options.furnitureMajority,
        });
        this.log.debug(
          { top: [...detected.top], bottom: [...detected.bottom], sampled: detected.sampledPages },
          'furniture profile'
        );
        return detected;
      });
      this.furniture = profile;
    }
    return this.furniture;
  }

  /**
   * Steps 1–4: cached per page and generation.
   */
  async structurePage(pageIndex: number): Promise<TextPageResult> {
    const cached = this.pages.get(pageIndex);
    if (cached) return cached;

    const inFlight = this.pagesInFlight.get(pageIndex);
    if (inFlight) return inFlight;

    const generation = this.generation;
    const promise = this.structurePageInternal(pageIndex, generation);
    this.pagesInFlight.set(pageIndex, promise);

    try {
      const result = await promise;
      if (generation === this.generation) {
        this.pages.set(pageIndex, result);
      }
      return result;
    } finally {
      if (this.pagesInFlight.get(pageIndex) === promise) {
        this.pagesInFlight.delete(pageIndex);
      }
    }
  }

  private async structurePageInternal(pageIndex: number, generation: number): Promise<TextPageResult> {
    const rawLines = await this.getRawLines(pageIndex);
    if (!hasExtractableText(rawLines)) {
      return { kind: 'empty', pageIndex, reason: 'no-extractable-text' };
    }

    let bodyLines = rawLines;
    if (this.options.trimHeadersFooters) {
      bodyLines = stripPageFurniture(rawLines, await this.getFurnitureProfile());
    }

    const page: StructuredPage = {
      pageIndex,
      generation,
      rawLines,
      bodyLines,
      reflowedParagraphs: reflowParagraphs(bodyLines),
    };
    return { kind: 'text', page };
  }

  /**
   * Display lines for a page in the given mode, wrapped to `width` cells.
   */
  async layoutPage(pageIndex: number, mode: TextDisplayMode, width: number): Promise<TextLayout> {
    if (mode === 'raw') {
      const lines = await this.getRawLines(pageIndex);
      if (!hasExtractableText(lines)) {
        return { kind: 'empty', pageIndex, reason: 'no-extractable-text' };
      }
      return { kind: 'lines', pageIndex, lines };
    }

    const result = await this.structurePage(pageIndex);
    if (result.kind === 'empty') return result;

    const lines =
      mode === 'wrap'
        ? wrapPreservingLines(result.page.bodyLines, width)
        : wrapParagraphs(result.page.reflowedParagraphs, width);
    return { kind: 'lines', pageIndex, lines };
  }
}
