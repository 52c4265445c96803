import { describe, it, expect, vi } from 'vitest';
import { LocalCollection } from './LocalCollection';
import { beginOptimistic, insertChange, patchChange, removeChange } from './optimistic';

interface Item {
  id: string;
  label: string;
}

function seeded(): LocalCollection<Item> {
  const collection = new LocalCollection<Item>();
  collection.replaceAll([
    { id: 'a', label: 'A' },
    { id: 'b', label: 'B' },
  ]);
  return collection;
}

describe('LocalCollection', () => {
  it('should prepend new records and replace existing ones in place', () => {
    const collection = seeded();
    collection.upsert({ id: 'c', label: 'C' }, true);
    collection.upsert({ id: 'a', label: 'A2' });

    expect(collection.values().map((item) => item.label)).toEqual(['C', 'A2', 'B']);
    expect(collection.get('c')?.optimistic).toBe(true);
  });

  it('should swap a placeholder for the confirmed record', () => {
    const collection = seeded();
    collection.upsert({ id: 'tmp-1', label: 'draft' }, true);
    collection.replace('tmp-1', { id: 'f1', label: 'saved' });

    expect(collection.values().map((item) => item.id)).toEqual(['f1', 'a', 'b']);
    expect(collection.get('f1')?.optimistic).toBe(false);
  });

  it('should insert at a clamped position', () => {
    const collection = seeded();
    collection.insertAt(1, { id: 'c', label: 'C' });
    collection.insertAt(9, { id: 'd', label: 'D' });

    expect(collection.values().map((item) => item.id)).toEqual(['a', 'c', 'b', 'd']);
    expect(collection.indexOf('b')).toBe(2);
    expect(collection.indexOf('z')).toBe(-1);
  });

  it('should notify subscribers until they unsubscribe', () => {
    const collection = seeded();
    const listener = vi.fn();
    const unsubscribe = collection.subscribe(listener);

    collection.remove('a');
    unsubscribe();
    collection.remove('b');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0]).toEqual([{ value: { id: 'b', label: 'B' }, optimistic: false }]);
  });
});

describe('beginOptimistic', () => {
  it('should apply the mutation at once and reconcile on commit', () => {
    const collection = seeded();
    const tx = beginOptimistic(collection, insertChange<Item>({ id: 'tmp', label: 'pending' }));

    expect(collection.get('tmp')?.optimistic).toBe(true);
    tx.commit({ id: 'c', label: 'C' });

    expect(tx.state).toBe('committed');
    expect(collection.values().map((item) => item.id)).toEqual(['c', 'a', 'b']);
  });

  it('should put a removed record back at its old position on rollback', () => {
    const collection = seeded();
    const before = collection.snapshot();
    const tx = beginOptimistic(collection, removeChange<Item>('a'));

    expect(collection.size).toBe(1);
    tx.rollback();

    expect(collection.snapshot()).toEqual(before);
    expect(tx.state).toBe('rolled-back');
  });

  it('should undo only its own insert when other changes landed meanwhile', () => {
    const collection = seeded();
    const create = beginOptimistic(collection, insertChange<Item>({ id: 'tmp', label: 'pending' }));
    const remove = beginOptimistic(collection, removeChange<Item>('b'));

    remove.commit(undefined);
    create.rollback();

    expect(collection.values().map((item) => item.id)).toEqual(['a']);
  });

  it('should keep a refreshed record when a patch is rolled back', () => {
    const collection = seeded();
    const tx = beginOptimistic(collection, patchChange<Item>('a', (held) => ({ ...held, label: 'edited' })));
    expect(collection.get('a')).toEqual({ value: { id: 'a', label: 'edited' }, optimistic: true });

    collection.replaceAll([
      { id: 'a', label: 'from server' },
      { id: 'b', label: 'B' },
    ]);
    tx.rollback();

    expect(collection.get('a')).toEqual({ value: { id: 'a', label: 'from server' }, optimistic: false });
  });

  it('should restore the prior record while its placeholder is still held', () => {
    const collection = seeded();
    const tx = beginOptimistic(collection, patchChange<Item>('b', (held) => ({ ...held, label: 'edited' })));

    tx.rollback();

    expect(collection.values()).toEqual([
      { id: 'a', label: 'A' },
      { id: 'b', label: 'B' },
    ]);
    expect(collection.get('b')?.optimistic).toBe(false);
  });

  it('should refuse to settle twice', () => {
    const tx = beginOptimistic(seeded(), removeChange<Item>('z'));
    tx.rollback();
    expect(() => tx.commit(undefined)).toThrow('Optimistic transaction already rolled-back');
  });
});
