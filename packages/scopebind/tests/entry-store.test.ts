import { describe, expect, it } from 'vitest';

import { EntryStore, type Entry } from '../src/core/entry-store.js';
import { FLAG_HAS_INSTANCE, KIND_SINGLETON } from '../src/core/flags.js';
import { keyOf } from '../src/core/key.js';
import { token } from '../src/core/token.js';

const createEntry = (label: string, overrides: Partial<Entry> = {}): Entry => ({
  key: keyOf(token(label)),
  instance: { label },
  flags: KIND_SINGLETON | FLAG_HAS_INSTANCE,
  ...overrides,
});

describe('EntryStore', () => {
  it('registers and retrieves entries by key id', () => {
    const store = new EntryStore();
    const entry = createEntry('Alpha');

    expect(store.add(entry)).toBe(true);
    expect(store.size).toBe(1);
    expect(store.get(entry.key.id)).toBe(entry);
    expect(store.has(entry.key.id)).toBe(true);
  });

  it('never replaces an existing entry', () => {
    const store = new EntryStore();
    const first = createEntry('Alpha');
    const second: Entry = { ...first, instance: { label: 'other' } };

    store.add(first);

    expect(store.add(second)).toBe(false);
    expect(store.get(first.key.id)).toBe(first);
  });

  it('removes entries and reports what was removed', () => {
    const store = new EntryStore();
    const entry = createEntry('Alpha');
    store.add(entry);

    expect(store.remove(entry.key.id)).toBe(entry);
    expect(store.remove(entry.key.id)).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it('iterates in insertion order and clears', () => {
    const store = new EntryStore();
    const a = createEntry('A');
    const b = createEntry('B');
    store.add(a);
    store.add(b);

    expect(Array.from(store.values())).toEqual([a, b]);

    store.clear();
    expect(store.size).toBe(0);
  });
});
