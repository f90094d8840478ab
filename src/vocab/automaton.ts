/**
 * Aho-Corasick automaton over UTF-16 code units.
 *
 * Reports every occurrence of every keyword, including overlapping and
 * nested ones, in a single pass over the text.
 */

export interface AutomatonHit<T> {
  start: number;
  end: number;
  value: T;
}

interface TrieNode<T> {
  next: Map<string, TrieNode<T>>;
  fail: TrieNode<T> | undefined;
  outputs: Array<{ length: number; value: T }>;
}

function createNode<T>(): TrieNode<T> {
  return { next: new Map(), fail: undefined, outputs: [] };
}

export class AhoCorasickAutomaton<T> {
  private readonly root: TrieNode<T> = createNode<T>();
  readonly size: number;

  constructor(keywords: ReadonlyArray<{ text: string; value: T }>) {
    let size = 0;
    for (const keyword of keywords) {
      if (keyword.text.length === 0) continue;
      this.insert(keyword.text, keyword.value);
      size++;
    }
    this.size = size;
    this.link();
  }

  private insert(text: string, value: T): void {
    let node = this.root;
    for (let i = 0; i < text.length; i++) {
      const char = text.charAt(i);
      let child = node.next.get(char);
      if (!child) {
        child = createNode<T>();
        node.next.set(char, child);
      }
      node = child;
    }
    node.outputs.push({ length: text.length, value });
  }

  /**
   * Breadth-first pass setting failure links and merging suffix outputs.
   */
  private link(): void {
    const queue: Array<TrieNode<T>> = [];
    for (const child of this.root.next.values()) {
      child.fail = this.root;
      queue.push(child);
    }

    for (let head = 0; head < queue.length; head++) {
      const node = queue[head];
      if (!node) break;
      for (const [char, child] of node.next) {
        let fallback = node.fail;
        while (fallback && !fallback.next.has(char)) {
          fallback = fallback.fail;
        }
        const target = fallback?.next.get(char) ?? this.root;
        child.fail = target;
        child.outputs = [...child.outputs, ...target.outputs];
        queue.push(child);
      }
    }
  }

  search(text: string): Array<AutomatonHit<T>> {
    const hits: Array<AutomatonHit<T>> = [];
    let node = this.root;

    for (let i = 0; i < text.length; i++) {
      const char = text.charAt(i);
      while (node !== this.root && !node.next.has(char)) {
        node = node.fail ?? this.root;
      }
      node = node.next.get(char) ?? this.root;

      for (const output of node.outputs) {
        hits.push({ start: i + 1 - output.length, end: i + 1, value: output.value });
      }
    }

    return hits;
  }
}
