/**
 * Word wrapping for the text frame.
 *
 * Wrapping is cheap and recomputed on every width change; it never touches
 * the structured paragraphs it is given.
 */

const COMBINING_MARK = /\p{M}/u;
// CJK ideographs, Hangul, fullwidth forms: two cells each.
const WIDE_CHAR = /[\u1100-\u115F\u2E80-\u303E\u3041-\u33FF\u3400-\u4DBF\u4E00-\u9FFF\uA000-\uA4CF\uAC00-\uD7A3\uF900-\uFAFF\uFE30-\uFE4F\uFF00-\uFF60\uFFE0-\uFFE6]/u;

function charWidth(ch: string): number {
  if (COMBINING_MARK.test(ch)) return 0;
  return WIDE_CHAR.test(ch) ? 2 : 1;
}

/**
 * Terminal cell width of a string.
 */
export function displayWidth(text: string): number {
  let width = 0;
  for (const ch of text) width += charWidth(ch);
  return width;
}

/**
 * Greedy word wrap. Words wider than the frame are split by character.
 * Always returns at least one (possibly empty) line.
 */
export function wrapText(text: string, maxWidth: number): string[] {
  if (maxWidth <= 0) return [text];

  const lines: string[] = [];
  let current = '';
  let currentWidth = 0;

  for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
    const wordWidth = displayWidth(word);
    const sepWidth = current.length === 0 ? 0 : 1;

    if (currentWidth + sepWidth + wordWidth <= maxWidth) {
      if (current.length > 0) {
        current += ' ';
        currentWidth += 1;
      }
      current += word;
      currentWidth += wordWidth;
      continue;
    }

    if (current.length > 0) {
      lines.push(current);
      current = '';
      currentWidth = 0;
    }

    if (wordWidth <= maxWidth) {
      current = word;
      currentWidth = wordWidth;
      continue;
    }

    let chunk = '';
    let chunkWidth = 0;
    for (const ch of word) {
      const w = charWidth(ch);
      if (chunkWidth + w > maxWidth && chunk.length > 0) {
        lines.push(chunk);
        chunk = '';
        chunkWidth = 0;
      }
      chunk += ch;
      chunkWidth += w;
    }
    if (chunk.length > 0) lines.push(chunk);
  }

  if (current.length > 0) lines.push(current);
  return lines.length > 0 ? lines : [''];
}

/** Tables and code: a tab or a run of spaces means the layout matters. */
export function looksPreformatted(line: string): boolean {
  return line.includes('\t') || line.includes('  ');
}

function trimTrailingBlank(lines: string[]): string[] {
  while (lines.length > 0 && lines[lines.length - 1].length === 0) {
    lines.pop();
  }
  return lines;
}

/**
 * Wrap each line on its own, keeping blank lines and preformatted lines.
 */
export function wrapPreservingLines(lines: readonly string[], maxWidth: number): string[] {
  if (maxWidth <= 0) return [...lines];

  const out: string[] = [];
  for (const line of lines) {
    if (line.trim().length === 0) {
      out.push('');
    } else if (looksPreformatted(line)) {
      out.push(line);
    } else {
      out.push(...wrapText(line, maxWidth));
    }
  }
  return trimTrailingBlank(out);
}

/**
 * Wrap reflowed paragraphs, separated by a single blank line.
 */
export function wrapParagraphs(paragraphs: readonly string[], maxWidth: number): string[] {
  const out: string[] = [];
  for (const paragraph of paragraphs) {
    const text = paragraph.trim();
    if (text.length === 0) continue;
    if (out.length > 0) out.push('');
    out.push(...(maxWidth <= 0 ? [text] : wrapText(text, maxWidth)));
  }
  return out;
}

/**
 * Boxed placeholder shown for pages without extractable text.
 */
export function nonTextPlaceholder(width: number, height: number, label: string): string[] {
  const w = Math.max(10, width);
  const h = Math.max(5, height);
  const innerW = w - 2;
  const innerH = h - 2;

  let text = label.trim() || 'image/chart';
  const chars = Array.from(text);
  if (chars.length > innerW) text = chars.slice(0, innerW).join('');
  const labelLen = Array.from(text).length;
  const padLeft = Math.floor((innerW - labelLen) / 2);
  const padRight = innerW - labelLen - padLeft;

  const rows = [`┌${'─'.repeat(innerW)}┐`];
  for (let y = 0; y < innerH; y++) {
    const body = y === Math.floor(innerH / 2) ? `${'░'.repeat(padLeft)}${text}${'░'.repeat(padRight)}` : '░'.repeat(innerW);
    rows.push(`│${body}│`);
  }
  rows.push(`└${'─'.repeat(innerW)}┘`);
  return rows;
}
