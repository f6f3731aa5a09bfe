import { describe, it, expect } from 'vitest';
import { TextChunker } from '../../src/utils/chunking.js';
import { ValidationError } from '../../src/utils/errors.js';

function words(count: number): string {
  return Array.from({ length: count }, (_, i) => `w${i}`).join(' ');
}

describe('TextChunker', () => {
  const chunker = new TextChunker({ maxChunkSize: 1000, overlap: 100 });

  it.each([
    [0, 0],
    [1, 1],
    [900, 1],
    [901, 2],
    [1000, 2],
    [1801, 3],
    [5000, 6],
  ])('splits %i words into %i chunks', (count, expected) => {
    expect(chunker.chunk(words(count))).toHaveLength(expected);
    expect(TextChunker.expectedChunkCount(count, { maxChunkSize: 1000, overlap: 100 })).toBe(expected);
  });

  it('overlaps consecutive windows by the configured number of words', () => {
    const small = new TextChunker({ maxChunkSize: 4, overlap: 1 });
    expect(small.chunk('a b c d e f g')).toEqual(['a b c d', 'd e f g', 'g']);
  });

  it('collapses any whitespace run to a single space', () => {
    const small = new TextChunker({ maxChunkSize: 10, overlap: 0 });
    expect(small.chunk('  one\ttwo\n\nthree   four ')).toEqual(['one two three four']);
  });

  it('returns no chunks for blank text', () => {
    expect(chunker.chunk(' \n\t ')).toEqual([]);
  });

  it('is deterministic', () => {
    const text = words(2500);
    expect(chunker.chunk(text)).toEqual(chunker.chunk(text));
  });

  it.each([
    [{ maxChunkSize: 0, overlap: 0 }],
    [{ maxChunkSize: 10, overlap: -1 }],
    [{ maxChunkSize: 10, overlap: 10 }],
    [{ maxChunkSize: 1.5, overlap: 0 }],
  ])('rejects invalid options %o', options => {
    expect(() => new TextChunker(options)).toThrow(ValidationError);
  });

  it('returns a copy of its options', () => {
    const options = chunker.getOptions();
    options.maxChunkSize = 5;
    expect(chunker.getOptions()).toEqual({ maxChunkSize: 1000, overlap: 100 });
  });
});
