/**
 * Text tokenizer: positioned draw operations → raw lines.
 *
 * Adjacent fragments are concatenated as-is. A space is only inserted when
 * the content stream encodes a visual gap through a spacing adjustment, which
 * is how most PDF producers separate words inside a single TJ array.
 */

import type { TextOp, TokenizeOptions } from './types';

export const DEFAULT_TOKENIZE_OPTIONS: TokenizeOptions = {
  wordSpaceThreshold: -200,
  lineBreakTolerance: 2,
};

export function tokenizeTextOps(
  ops: readonly TextOp[],
  options: TokenizeOptions = DEFAULT_TOKENIZE_OPTIONS
): string[] {
  const lines: string[] = [];
  let current = '';

  const pushLine = () => {
    lines.push(current.trimEnd());
    current = '';
  };

  for (const op of ops) {
    switch (op.kind) {
      case 'text':
        current += op.text;
        break;

      case 'adjust':
        if (op.amount < options.wordSpaceThreshold && current.length > 0 && !/\s$/.test(current)) {
          current += ' ';
        }
        break;

      case 'move':
        // Only downward motion breaks; upward moves are superscripts and
        // column returns that the newline op already accounted for.
        if (op.dy > options.lineBreakTolerance && current.trim().length > 0) {
          pushLine();
        }
        break;

      case 'newline':
        pushLine();
        break;
    }
  }

  if (current.trim().length > 0) {
    pushLine();
  }

  return lines;
}

/**
 * True when a page yielded nothing but whitespace.
 */
export function hasExtractableText(lines: readonly string[]): boolean {
  return lines.some((line) => line.trim().length > 0);
}
