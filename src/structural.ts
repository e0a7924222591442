/**
 * Structural identity for immutable AST values.
 *
 * Every node computes a canonical `key` string once at construction; equality
 * and hashing derive from it, so independently built but identical nodes are
 * interchangeable as map keys.
 */

export interface Structural {
  /** Canonical encoding of the node's data */
  readonly key: string;
}

/**
 * 32-bit FNV-1a hash of a string.
 */
export function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function structurallyEqual(a: Structural, b: Structural): boolean {
  return a === b || a.key === b.key;
}

// ---------------------------------------------------------------------------
// COLLECTIONS
// ---------------------------------------------------------------------------

/**
 * Map keyed by structural identity. Iteration follows insertion order of the
 * first structurally equal key.
 */
export class NodeMap<K extends Structural, V> {
  private readonly entriesByKey = new Map<string, [K, V]>();

  constructor(entries: Iterable<readonly [K, V]> = []) {
    for (const [node, value] of entries) {
      this.set(node, value);
    }
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  get(node: K): V | undefined {
    return this.entriesByKey.get(node.key)?.[1];
  }

  has(node: K): boolean {
    return this.entriesByKey.has(node.key);
  }

  set(node: K, value: V): this {
    const existing = this.entriesByKey.get(node.key);
    this.entriesByKey.set(node.key, [existing ? existing[0] : node, value]);
    return this;
  }

  delete(node: K): boolean {
    return this.entriesByKey.delete(node.key);
  }

  *keys(): IterableIterator<K> {
    for (const [node] of this.entriesByKey.values()) yield node;
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entriesByKey.values()) yield value;
  }

  *entries(): IterableIterator<[K, V]> {
    for (const [node, value] of this.entriesByKey.values()) yield [node, value];
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }
}

/**
 * Set with structural membership.
 */
export class NodeSet<K extends Structural> {
  private readonly items = new Map<string, K>();

  constructor(items: Iterable<K> = []) {
    for (const item of items) this.add(item);
  }

  get size(): number {
    return this.items.size;
  }

  add(item: K): this {
    if (!this.items.has(item.key)) this.items.set(item.key, item);
    return this;
  }

  has(item: K): boolean {
    return this.items.has(item.key);
  }

  isSubsetOf(other: NodeSet<K>): boolean {
    for (const item of this) {
      if (!other.has(item)) return false;
    }
    return true;
  }

  [Symbol.iterator](): IterableIterator<K> {
    return this.items.values();
  }

  toArray(): K[] {
    return [...this.items.values()];
  }
}
