/**
 * Unit tests for paragraph reconstruction
 */

import { describe, it, expect } from 'vitest';
import { endsSentence, reflowParagraphs, shouldDehyphenate, shouldJoin } from '@/reader/renderer/text/paragraphs';

describe('line joining rules', () => {
  it('should recognise sentence ends with trailing quotes', () => {
    expect(endsSentence('He left.')).toBe(true);
    expect(endsSentence('"Why?"')).toBe(true);
    expect(endsSentence('(see above)')).toBe(false);
  });

  it('should dehyphenate only between letters', () => {
    expect(shouldDehyphenate('exam-', 'ple')).toBe(true);
    expect(shouldDehyphenate('1990-', '1995')).toBe(false);
  });

  it('should join only onto a lowercase continuation', () => {
    expect(shouldJoin('the quick brown', 'fox jumps')).toBe(true);
    expect(shouldJoin('the quick brown', 'Fox jumps')).toBe(false);
    expect(shouldJoin('It ended.', 'then more')).toBe(false);
  });
});

describe('reflowParagraphs', () => {
  it('should join broken lines and remove end-of-line hyphens', () => {
    const lines = ['The method is an exam-', 'ple of how lines', 'continue.', 'A new sentence starts here.'];

    expect(reflowParagraphs(lines)).toEqual([
      'The method is an example of how lines continue.',
      'A new sentence starts here.',
    ]);
  });

  it('should join a hyphenated word and keep sentences apart', () => {
    expect(reflowParagraphs(['exam-', 'ple text'])).toEqual(['example text']);
    expect(reflowParagraphs(['end.', 'Next sentence'])).toEqual(['end.', 'Next sentence']);
  });

  it('should never join across a blank line', () => {
    const lines = ['this line has no period', '', 'and this one is lowercase'];

    expect(reflowParagraphs(lines)).toEqual(['this line has no period', 'and this one is lowercase']);
  });

  it('should return nothing for blank input', () => {
    expect(reflowParagraphs(['', '  '])).toEqual([]);
  });

  it('should be stable when applied to its own output', () => {
    const lines = ['Results were mixed', 'across all runs.', '', 'Table 2', 'shows the de-', 'tails.'];
    const once = reflowParagraphs(lines);

    expect(once).toEqual(['Results were mixed across all runs.', 'Table 2 shows the details.']);
    expect(reflowParagraphs(once)).toEqual(once);
  });

  it('should rejoin wrapped lines that continue in lowercase', () => {
    expect(reflowParagraphs(['we walked along', 'the shore at dusk.'])).toEqual(['we walked along the shore at dusk.']);
  });

  it('should keep a wrapped line apart when the next one starts with a capital', () => {
    expect(reflowParagraphs(['I met', 'Bob and Alice there.'])).toEqual(['I met', 'Bob and Alice there.']);
  });
});
