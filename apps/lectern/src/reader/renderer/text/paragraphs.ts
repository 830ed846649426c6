/**
 * Paragraph reconstruction.
 *
 * Rejoins lines that the page layout broke mid-sentence and removes
 * end-of-line hyphenation. Blank lines are hard paragraph breaks.
 */

// Sentence end, optionally followed by closing quotes/brackets.
const SENTENCE_END = /[.!?…]["'”’)\]»]*$/u;
const HYPHENATED_END = /\p{L}-$/u;
const STARTS_WITH_LETTER = /^\p{L}/u;
const STARTS_LOWERCASE = /^\p{Ll}/u;

export function endsSentence(line: string): boolean {
  return SENTENCE_END.test(line);
}

/**
 * `exam-` + `ple` → `example`.
 */
export function shouldDehyphenate(line: string, next: string): boolean {
  return HYPHENATED_END.test(line) && STARTS_WITH_LETTER.test(next);
}

export function shouldJoin(line: string, next: string): boolean {
  return !endsSentence(line) && STARTS_LOWERCASE.test(next);
}

/**
 * Join raw lines into paragraphs.
 *
 * Each returned string is one paragraph on a single line. Joining only
 * looks at the immediately following line; a blank line between two lines
 * always separates them.
 */
export function reflowParagraphs(lines: readonly string[]): string[] {
  const paragraphs: string[] = [];
  let current: string | null = null;

  const flush = () => {
    if (current !== null && current.length > 0) {
      paragraphs.push(current);
    }
    current = null;
  };

  for (const rawLine of lines) {
    const line = rawLine.trim();

    if (line.length === 0) {
      flush();
      continue;
    }

    if (current === null) {
      current = line;
      continue;
    }

    if (shouldDehyphenate(current, line)) {
      current = current.slice(0, -1) + line;
    } else if (shouldJoin(current, line)) {
      current = `${current} ${line}`;
    } else {
      flush();
      current = line;
    }
  }

  flush();
  return paragraphs;
}
