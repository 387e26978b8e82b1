/**
 * Compact radix trie mapping strings to values
 *
 * Edges carry strings; a node with no value and a single child is merged
 * into that child, so shared prefixes are stored once.
 */

class RadixNode<T> {
  edge: string;
  value: T | undefined;
  children = new Map<string, RadixNode<T>>();

  constructor(edge: string, value?: T) {
    this.edge = edge;
    this.value = value;
  }
}

function commonPrefixLength(a: string, b: string): number {
  const max = Math.min(a.length, b.length);
  let i = 0;
  while (i < max && a.charCodeAt(i) === b.charCodeAt(i)) {
    i++;
  }
  return i;
}

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class RadixTrie<T> {
  #root = new RadixNode<T>("");
  #size = 0;

  /** Number of keys holding a value */
  get size(): number {
    return this.#size;
  }

  get(key: string): T | undefined {
    return this.#find(key)?.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Set the value for a key, splitting an edge when the key diverges inside it
   */
  set(key: string, value: T): void {
    let node = this.#root;
    let rest = key;

    for (;;) {
      if (rest.length === 0) {
        if (node.value === undefined) {
          this.#size++;
        }
        node.value = value;
        return;
      }

      const child = node.children.get(rest.charAt(0));
      if (!child) {
        node.children.set(rest.charAt(0), new RadixNode(rest, value));
        this.#size++;
        return;
      }

      const common = commonPrefixLength(child.edge, rest);
      if (common < child.edge.length) {
        const middle = new RadixNode<T>(child.edge.slice(0, common));
        child.edge = child.edge.slice(common);
        middle.children.set(child.edge.charAt(0), child);
        node.children.set(middle.edge.charAt(0), middle);
        node = middle;
      } else {
        node = child;
      }
      rest = rest.slice(common);
    }
  }

  /**
   * Remove a key, pruning empty leaves and merging single-child chains
   * @returns true when the key was present
   */
  delete(key: string): boolean {
    const path: RadixNode<T>[] = [this.#root];
    let node = this.#root;
    let rest = key;

    while (rest.length > 0) {
      const child = node.children.get(rest.charAt(0));
      if (!child || !rest.startsWith(child.edge)) {
        return false;
      }
      rest = rest.slice(child.edge.length);
      node = child;
      path.push(node);
    }

    if (node.value === undefined) {
      return false;
    }

    node.value = undefined;
    this.#size--;

    // Walk back up: drop empty leaves, merge pass-through nodes
    for (let i = path.length - 1; i > 0; i--) {
      const current = path[i];
      const parent = path[i - 1];
      if (!current || !parent) break;

      if (current.value === undefined && current.children.size === 0) {
        parent.children.delete(current.edge.charAt(0));
      } else if (current.value === undefined && current.children.size === 1) {
        this.#mergeWithOnlyChild(current);
      } else {
        break;
      }
    }

    return true;
  }

  /**
   * Entries whose key starts with the prefix, in key order
   */
  entriesWithPrefix(prefix: string): Array<[string, T]> {
    let node = this.#root;
    let consumed = "";
    let rest = prefix;

    while (rest.length > 0) {
      const child = node.children.get(rest.charAt(0));
      if (!child) {
        return [];
      }

      const common = commonPrefixLength(child.edge, rest);
      if (common === rest.length) {
        // Prefix ends on or inside this edge
        const out: Array<[string, T]> = [];
        this.#collect(child, consumed + child.edge, out);
        return out;
      }
      if (common < child.edge.length) {
        return [];
      }

      consumed += child.edge;
      rest = rest.slice(common);
      node = child;
    }

    const out: Array<[string, T]> = [];
    this.#collect(node, consumed, out);
    return out;
  }

  /**
   * All entries in key order
   */
  entries(): Array<[string, T]> {
    return this.entriesWithPrefix("");
  }

  /**
   * Number of nodes, root included
   */
  nodeCount(): number {
    let count = 0;
    const stack = [this.#root];
    for (let node = stack.pop(); node; node = stack.pop()) {
      count++;
      stack.push(...node.children.values());
    }
    return count;
  }

  clear(): void {
    this.#root = new RadixNode<T>("");
    this.#size = 0;
  }

  #find(key: string): RadixNode<T> | undefined {
    let node = this.#root;
    let rest = key;

    while (rest.length > 0) {
      const child = node.children.get(rest.charAt(0));
      if (!child || !rest.startsWith(child.edge)) {
        return undefined;
      }
      rest = rest.slice(child.edge.length);
      node = child;
    }

    return node;
  }

  #mergeWithOnlyChild(node: RadixNode<T>): void {
    for (const only of node.children.values()) {
      node.edge += only.edge;
      node.value = only.value;
      node.children = only.children;
    }
  }

  #collect(node: RadixNode<T>, key: string, out: Array<[string, T]>): void {
    if (node.value !== undefined) {
      out.push([key, node.value]);
    }

    const labels = [...node.children.keys()].sort(compareKeys);
    for (const label of labels) {
      const child = node.children.get(label);
      if (child) {
        this.#collect(child, key + child.edge, out);
      }
    }
  }
}
