import { describe, it, expect } from 'vitest';
import {
  SimilarityClusterer,
  buildCountVectors,
  cosineSimilarity,
  similarityMatrix,
} from '../api/_lib/services/similarityClusterer';
import { rec, scoreAll, testConfig } from './helpers';

const config = testConfig();

const scored = scoreAll([
  rec('09:00', 'eng1', 'thermal spike on panel A'),
  rec('09:01', 'eng2', 'thermal spike on panel B'),
  rec('09:02', 'eng3', 'Login error in auth service'),
  rec('09:03', 'eng4', 'lunch at noon'),
]);

function clustersAt(similarityThreshold: number) {
  return new SimilarityClusterer({ similarityThreshold, stopwords: config.stopwords }).cluster(scored);
}

describe('buildCountVectors', () => {
  it('counts terms over a shared vocabulary', () => {
    const { vocabulary, vectors } = buildCountVectors(['spike spike panel', 'panel drift'], new Set());
    expect([...vocabulary.entries()]).toEqual([['spike', 0], ['panel', 1], ['drift', 2]]);
    expect([...vectors[0].entries()]).toEqual([[0, 2], [1, 1]]);
    expect([...vectors[1].entries()]).toEqual([[1, 1], [2, 1]]);
  });
});

describe('cosineSimilarity', () => {
  it('is symmetric and bounded', () => {
    const { vectors } = buildCountVectors(['spike spike panel', 'panel drift', ''], new Set());
    const ab = cosineSimilarity(vectors[0], vectors[1]);
    expect(ab).toBe(cosineSimilarity(vectors[1], vectors[0]));
    expect(ab).toBeCloseTo(1 / Math.sqrt(10), 10);
    expect(cosineSimilarity(vectors[0], vectors[2])).toBe(0);

    const matrix = similarityMatrix(vectors);
    expect(matrix[0][1]).toBe(matrix[1][0]);
    expect(matrix[0][0]).toBe(1);
    expect(matrix[2][2]).toBe(0);
  });
});

describe('SimilarityClusterer', () => {
  it('groups similar risk messages into disjoint components', () => {
    expect(clustersAt(0.3)).toEqual([
      { id: 0, memberIndices: [0, 1] },
      { id: 1, memberIndices: [2] },
    ]);
  });

  it('never links messages with no shared terms, even at threshold 0', () => {
    expect(clustersAt(0)).toEqual(clustersAt(0.3));
  });

  it('splits clusters as the threshold rises', () => {
    expect(clustersAt(0.9).map(c => c.memberIndices)).toEqual([[0], [1], [2]]);

    const counts = [0, 0.3, 0.5, 0.8, 0.9, 1].map(t => clustersAt(t).length);
    for (let i = 1; i < counts.length; i++) {
      expect(counts[i]).toBeGreaterThanOrEqual(counts[i - 1]);
    }
  });

  it('excludes messages without risk keywords', () => {
    const members = clustersAt(0.3).flatMap(c => c.memberIndices);
    expect(members).not.toContain(3);
    expect(new Set(members).size).toBe(members.length);
  });

  it('returns nothing for empty input', () => {
    expect(new SimilarityClusterer(config).cluster([])).toEqual([]);
  });
});
