import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { EntryStore } from "../../ports/entry-store"

export class MapStore implements EntryStore {
  private readonly map = new Map<CacheKey, CacheEntry>()

  get(key: CacheKey): CacheEntry | undefined {
    return this.map.get(key)
  }

  set(key: CacheKey, entry: CacheEntry): void {
    this.map.set(key, entry)
  }

  delete(key: CacheKey): boolean {
    return this.map.delete(key)
  }

  clear(): void {
    this.map.clear()
  }

  keys(): CacheKey[] {
    return [...this.map.keys()]
  }

  size(): number {
    return this.map.size
  }
}
