/**
 * Page furniture detection.
 *
 * Running heads and footers repeat verbatim at the same edge of most pages.
 * The first and last non-blank line of each sampled page are counted per
 * edge; a string that occurs on more than `majority` of the sampled pages is
 * stripped from that edge everywhere. Top and bottom are independent.
 */

import type { FurnitureOptions, FurnitureProfile } from './types';

export const DEFAULT_FURNITURE_OPTIONS: FurnitureOptions = {
  sampleDepth: 5,
  majority: 0.5,
};

/** Below this many sampled pages nothing is classified. */
const MIN_SAMPLED_PAGES = 2;

const EMPTY_PROFILE: FurnitureProfile = { top: new Set(), bottom: new Set(), sampledPages: 0 };

function firstContentIndex(lines: readonly string[]): number {
  return lines.findIndex((line) => line.trim().length > 0);
}

function lastContentIndex(lines: readonly string[]): number {
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].trim().length > 0) return i;
  }
  return -1;
}

function countPages(counts: Map<string, number>, line: string | undefined): void {
  if (line === undefined) return;
  const key = line.trim();
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function recurring(counts: Map<string, number>, sampled: number, majority: number): Set<string> {
  const out = new Set<string>();
  for (const [line, count] of counts) {
    if (count / sampled > majority) out.add(line);
  }
  return out;
}

/**
 * Build the furniture profile from the first `sampleDepth` pages.
 * Pages without any text are skipped and do not count as samples.
 */
export function detectPageFurniture(
  pages: ReadonlyArray<readonly string[]>,
  options: FurnitureOptions = DEFAULT_FURNITURE_OPTIONS
): FurnitureProfile {
  const topCounts = new Map<string, number>();
  const bottomCounts = new Map<string, number>();
  let sampled = 0;

  for (const lines of pages.slice(0, options.sampleDepth)) {
    const first = firstContentIndex(lines);
    if (first < 0) continue;
    sampled++;
    countPages(topCounts, lines[first]);
    countPages(bottomCounts, lines[lastContentIndex(lines)]);
  }

  if (sampled < MIN_SAMPLED_PAGES) {
    return EMPTY_PROFILE;
  }

  return {
    top: recurring(topCounts, sampled, options.majority),
    bottom: recurring(bottomCounts, sampled, options.majority),
    sampledPages: sampled,
  };
}

/**
 * Remove furniture from the top and bottom positions of one page.
 * Only the first and last non-blank lines are candidates.
 */
export function stripPageFurniture(lines: readonly string[], profile: FurnitureProfile): string[] {
  const out = [...lines];
  if (profile.top.size === 0 && profile.bottom.size === 0) return out;

  const last = lastContentIndex(out);
  if (last >= 0 && profile.bottom.has(out[last].trim())) {
    out.splice(last, 1);
  }

  const first = firstContentIndex(out);
  if (first >= 0 && profile.top.has(out[first].trim())) {
    out.splice(first, 1);
  }

  return out;
}
