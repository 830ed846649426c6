/**
 * Text structuring types.
 *
 * A page's text arrives as the ordered draw operations the content stream
 * performed, not as lines. Coordinates are in points with y growing
 * downward (the worker flips PDF space before emitting).
 */

export type TextOp =
  /** A run of glyphs drawn at the current position */
  | { kind: 'text'; text: string }
  /** Cursor translation relative to the previous origin */
  | { kind: 'move'; dx: number; dy: number }
  /** Horizontal spacing adjustment in thousandths of an em; negative = gap */
  | { kind: 'adjust'; amount: number }
  /** Explicit line end */
  | { kind: 'newline' };

export interface TokenizeOptions {
  /** Adjustments below this value are word spaces (default -200) */
  wordSpaceThreshold: number;
  /** Downward moves beyond this many points end the line (default 2) */
  lineBreakTolerance: number;
}

export interface FurnitureOptions {
  /** Number of leading pages to sample (K) */
  sampleDepth: number;
  /** A line is furniture when it recurs on more than this fraction of sampled pages */
  majority: number;
}

export interface FurnitureProfile {
  top: ReadonlySet<string>;
  bottom: ReadonlySet<string>;
  sampledPages: number;
}

export interface StructuredPage {
  pageIndex: number;
  generation: number;
  /** Tokenized lines, before furniture suppression */
  rawLines: string[];
  /** Lines after furniture suppression */
  bodyLines: string[];
  reflowedParagraphs: string[];
}

export type TextPageResult =
  | { kind: 'text'; page: StructuredPage }
  | { kind: 'empty'; pageIndex: number; reason: 'no-extractable-text' };
