// api/_lib/utils/ahoCorasick.ts
// Aho-Corasick automaton over word tokens for multi-phrase matching

export interface PatternMatch<T> {
  pattern: string;
  start: number;
  end: number;
  data: T;
}

class AhoCorasickNode<T> {
  children = new Map<string, AhoCorasickNode<T>>();
  failure: AhoCorasickNode<T> | null = null;
  output: Array<{ pattern: string; length: number; data: T }> = [];
}

export class AhoCorasickAutomaton<T> {
  private root = new AhoCorasickNode<T>();
  private built = false;
  private patternCount = 0;

  /**
   * Add a pattern given as its token sequence
   */
  addPattern(tokens: string[], data: T): void {
    if (tokens.length === 0) return;
    let node = this.root;

    for (const token of tokens) {
      let next = node.children.get(token);
      if (!next) {
        next = new AhoCorasickNode<T>();
        node.children.set(token, next);
      }
      node = next;
    }

    node.output.push({ pattern: tokens.join(' '), length: tokens.length, data });
    this.built = false; // Mark as needing rebuild
    this.patternCount++;
  }

  /**
   * Build failure links (automatically called by search if needed)
   */
  private build(): void {
    if (this.built) return;

    // Build failure links using BFS
    const queue: AhoCorasickNode<T>[] = [];

    for (const child of this.root.children.values()) {
      child.failure = this.root;
      queue.push(child);
    }

    for (let head = 0; head < queue.length; head++) {
      const currentNode = queue[head];

      for (const [token, childNode] of currentNode.children) {
        queue.push(childNode);

        // Longest proper suffix that is also a prefix
        let failureNode = currentNode.failure;
        while (failureNode !== null && !failureNode.children.has(token)) {
          failureNode = failureNode.failure;
        }

        const target = failureNode?.children.get(token) ?? this.root;
        childNode.failure = target;
        // Inherit output patterns from failure node (suffix matches)
        if (target !== this.root) childNode.output.push(...target.output);
      }
    }

    this.built = true;
  }

  /**
   * Search for all pattern matches in the given token sequence
   */
  search(tokens: string[]): PatternMatch<T>[] {
    this.build();

    const results: PatternMatch<T>[] = [];
    let currentNode = this.root;

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];

      // Follow failure links until we find a match or reach root
      while (currentNode !== this.root && !currentNode.children.has(token)) {
        currentNode = currentNode.failure ?? this.root;
      }

      const next = currentNode.children.get(token);
      if (!next) continue;
      currentNode = next;

      // Report all patterns that end at this position
      for (const match of currentNode.output) {
        results.push({
          pattern: match.pattern,
          start: i - match.length + 1,
          end: i,
          data: match.data,
        });
      }
    }

    return results;
  }

  getStats() {
    return {
      patternCount: this.patternCount,
      isBuilt: this.built,
      hasPatterns: this.patternCount > 0,
    };
  }
}
