import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  SqliteVectorIndex,
  cosineDistance,
  decodeVector,
  encodeVector,
} from '../../src/services/vector-index.js';
import type { DatabaseService } from '../../src/services/database.js';
import { ValidationError } from '../../src/utils/errors.js';
import { createMemoryDatabase } from './helpers.js';

function entry(key: string, vector: number[]) {
  return {
    key,
    vector,
    metadata: { document_id: 1, chunk_index: 0, filename: `${key}.txt`, filepath: `/library/${key}.txt` },
    content: `content of ${key}`,
  };
}

describe('cosineDistance', () => {
  it.each([
    [[1, 0], [1, 0], 0],
    [[1, 0], [0, 1], 1],
    [[1, 0], [-1, 0], 2],
    [[0, 0], [1, 0], 1],
  ])('distance between %j and %j is %d', (a, b, expected) => {
    expect(cosineDistance(a, b)).toBeCloseTo(expected, 10);
  });

  it('ignores magnitude', () => {
    expect(cosineDistance([2, 4], [1, 2])).toBeCloseTo(0, 10);
  });
});

describe('vector encoding', () => {
  it('stores four bytes per component', () => {
    const blob = encodeVector([0.5, -1, 2]);
    expect(blob.byteLength).toBe(12);
    expect(Array.from(decodeVector(blob))).toEqual([0.5, -1, 2]);
  });
});

describe('SqliteVectorIndex', () => {
  let db: DatabaseService;
  let index: SqliteVectorIndex;

  beforeEach(() => {
    db = createMemoryDatabase();
    index = new SqliteVectorIndex(db);
  });

  afterEach(() => {
    db.close();
  });

  it('returns nearest entries first', () => {
    index.upsert(entry('a', [1, 0]));
    index.upsert(entry('b', [0, 1]));
    index.upsert(entry('c', [1, 1]));

    const matches = index.query([1, 0], 3);
    expect(matches.map(match => match.key)).toEqual(['a', 'c', 'b']);
    expect(matches[0]?.distance).toBeCloseTo(0, 6);
    expect(matches[0]?.content).toBe('content of a');
    expect(matches[0]?.metadata).toEqual({
      document_id: 1,
      chunk_index: 0,
      filename: 'a.txt',
      filepath: '/library/a.txt',
    });
  });

  it('keeps insertion order for equal distances and honours k', () => {
    index.upsert(entry('first', [0, 1]));
    index.upsert(entry('second', [0, 2]));
    index.upsert(entry('third', [1, 0]));

    expect(index.query([0, 1], 2).map(match => match.key)).toEqual(['first', 'second']);
    expect(index.query([0, 1], 0)).toEqual([]);
  });

  it('restricts the scan to allowed keys', () => {
    index.upsert(entry('a', [1, 0]));
    index.upsert(entry('b', [0, 1]));

    expect(index.query([1, 0], 5, ['b']).map(match => match.key)).toEqual(['b']);
    expect(index.query([1, 0], 5, [])).toEqual([]);
  });

  it('replaces an entry stored under the same key', () => {
    index.upsert(entry('a', [1, 0]));
    index.upsert({ ...entry('a', [0, 1]), content: 'replaced' });

    expect(index.count()).toBe(1);
    expect(index.query([0, 1], 1)[0]?.content).toBe('replaced');
  });

  it('rejects empty vectors and mismatched query dimensions', () => {
    expect(() => index.upsert(entry('empty', []))).toThrow(ValidationError);

    index.upsert(entry('a', [1, 0]));
    expect(() => index.query([1, 0, 0], 1)).toThrow(ValidationError);
  });

  it('deletes, lists and clears keys', () => {
    index.upsert(entry('a', [1, 0]));
    index.upsert(entry('b', [0, 1]));
    index.upsert(entry('c', [1, 1]));

    expect(index.keys()).toEqual(['a', 'b', 'c']);
    expect(index.delete(['b', 'missing'])).toBe(1);
    expect(index.delete([])).toBe(0);
    expect(index.keys()).toEqual(['a', 'c']);

    index.clear();
    expect(index.count()).toBe(0);
  });
});
