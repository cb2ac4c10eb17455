/*
 * EntryStore
 * ----------
 * Keyed map of registrations used by Locator.
 *
 *  - Insert-if-absent: `add()` never replaces an existing entry and reports
 *    whether it inserted.
 *  - Removal is explicit (`remove()`); the locator decides when an entry is
 *    removed outright and when it only drops its instance (fenix).
 *  - Insertion order is preserved for diagnostics (`keys()`).
 */
import type { Key, KeyId } from './key.js';

/**
 * A single registration.
 *
 *  - key: the slot this entry occupies
 *  - builder: lazy/factory builder; absent for instances put directly
 *  - instance: materialized value (FLAG_HAS_INSTANCE set when present)
 *  - flags: kind bits plus state flags, see flags.ts
 */
export type Entry = {
  key: Key;
  builder?: () => unknown;
  instance?: unknown;
  flags: number;
};

export class EntryStore {
  private readonly entries = new Map<KeyId, Entry>();

  get size(): number {
    return this.entries.size;
  }

  get(id: KeyId): Entry | undefined {
    return this.entries.get(id);
  }

  has(id: KeyId): boolean {
    return this.entries.has(id);
  }

  /**
   * Register `entry` unless its key is taken.
   *
   * @returns true if the entry was inserted, false if the key already existed
   */
  add(entry: Entry): boolean {
    if (this.entries.has(entry.key.id)) return false;
    this.entries.set(entry.key.id, entry);
    return true;
  }

  /**
   * Remove the entry for `id`.
   *
   * @returns the removed entry, or undefined if nothing was registered
   */
  remove(id: KeyId): Entry | undefined {
    const entry = this.entries.get(id);
    if (entry) this.entries.delete(id);
    return entry;
  }

  *values(): IterableIterator<Entry> {
    yield* this.entries.values();
  }

  clear(): void {
    this.entries.clear();
  }
}
