/**
 * Registry — get-or-create map behind the blueprint cache.
 *
 * `getOrCreate` runs lookup, build and insert synchronously, so no other
 * caller can observe the key between a miss and its insertion. A build that
 * throws inserts nothing.
 */

// ============================================================================
// Registry Interface
// ============================================================================

export interface Registry<K, V> {
  get(key: K): V | undefined
  has(key: K): boolean

  /** Return the value stored under `key`, building and storing it on a miss. */
  getOrCreate(key: K, build: (key: K) => V): V

  values(): IterableIterator<V>
  readonly size: number
}

// ============================================================================
// Registry Implementation
// ============================================================================

export class InMemoryRegistry<K, V> implements Registry<K, V> {
  private readonly entries = new Map<K, V>()

  get size(): number {
    return this.entries.size
  }

  get(key: K): V | undefined {
    return this.entries.get(key)
  }

  has(key: K): boolean {
    return this.entries.has(key)
  }

  getOrCreate(key: K, build: (key: K) => V): V {
    const existing = this.entries.get(key)
    if (existing !== undefined) return existing

    const created = build(key)
    this.entries.set(key, created)
    return created
  }

  values(): IterableIterator<V> {
    return this.entries.values()
  }
}
