// api/_lib/services/similarityClusterer.ts
import type { ScoredMessage } from '../types/riskTypes';
import { tokenizeAndFilter } from '../utils/tokenize';
import type { RiskConfig } from './riskConfig';

type SparseVector = Map<number, number>;

export interface SimilarityComponent {
  id: number;
  /** Message indices, ascending (index order is timestamp order). */
  memberIndices: number[];
}

/**
 * Count vectors over a vocabulary built from the given texts only.
 */
export function buildCountVectors(texts: readonly string[], stopwords: ReadonlySet<string>): { vocabulary: Map<string, number>; vectors: SparseVector[] } {
  const vocabulary = new Map<string, number>();
  const vectors = texts.map(text => {
    const vector: SparseVector = new Map();
    for (const term of tokenizeAndFilter(text, stopwords)) {
      let column = vocabulary.get(term);
      if (column === undefined) {
        column = vocabulary.size;
        vocabulary.set(term, column);
      }
      vector.set(column, (vector.get(column) ?? 0) + 1);
    }
    return vector;
  });
  return { vocabulary, vectors };
}

function norm(v: SparseVector): number {
  let s = 0;
  for (const c of v.values()) s += c * c;
  return Math.sqrt(s);
}

/** Cosine similarity of two sparse count vectors; 0 when either is empty. */
export function cosineSimilarity(a: SparseVector, b: SparseVector): number {
  const na = norm(a);
  const nb = norm(b);
  if (na === 0 || nb === 0) return 0;
  // Iterate the smaller vector; the product is order-independent
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [column, count] of small) {
    const other = large.get(column);
    if (other !== undefined) dot += count * other;
  }
  return dot / (na * nb);
}

/** Full symmetric matrix; the diagonal is 1 for non-empty vectors. */
export function similarityMatrix(vectors: readonly SparseVector[]): number[][] {
  const n = vectors.length;
  const matrix = Array.from({ length: n }, () => new Array<number>(n).fill(0));
  for (let i = 0; i < n; i++) {
    matrix[i][i] = vectors[i].size > 0 ? 1 : 0;
    for (let j = i + 1; j < n; j++) {
      const s = cosineSimilarity(vectors[i], vectors[j]);
      matrix[i][j] = s;
      matrix[j][i] = s;
    }
  }
  return matrix;
}

class UnionFind {
  private parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(x: number): number {
    let root = x;
    while (this.parent[root] !== root) root = this.parent[root];
    // path compression
    while (this.parent[x] !== root) {
      const next = this.parent[x];
      this.parent[x] = root;
      x = next;
    }
    return root;
  }

  union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return;
    // Smaller root wins so the representative does not depend on edge order
    if (ra < rb) this.parent[rb] = ra;
    else this.parent[ra] = rb;
  }
}

/**
 * Groups risk-keyword messages into disjoint topic clusters: connected components
 * of the graph linking every pair whose cosine similarity is at or above the threshold.
 */
export class SimilarityClusterer {
  constructor(private readonly config: Pick<RiskConfig, 'similarityThreshold' | 'stopwords'>) {}

  cluster(messages: readonly ScoredMessage[]): SimilarityComponent[] {
    const candidates = messages
      .filter(m => m.containsRiskWord)
      .sort((a, b) => a.index - b.index);
    if (candidates.length === 0) return [];

    const { vectors } = buildCountVectors(candidates.map(m => m.text), this.config.stopwords);
    const matrix = similarityMatrix(vectors);
    const uf = new UnionFind(candidates.length);

    for (let i = 0; i < candidates.length; i++) {
      for (let j = i + 1; j < candidates.length; j++) {
        if (matrix[i][j] >= this.config.similarityThreshold && matrix[i][j] > 0) uf.union(i, j);
      }
    }

    const groups = new Map<number, number[]>();
    candidates.forEach((m, i) => {
      const root = uf.find(i);
      const group = groups.get(root);
      if (group) group.push(m.index);
      else groups.set(root, [m.index]);
    });

    return [...groups.values()]
      .sort((a, b) => a[0] - b[0])
      .map((memberIndices, id) => ({ id, memberIndices }));
  }
}
