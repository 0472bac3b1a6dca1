import { MemoryRecordStore } from './memory_record_store';

type Unit = { id: string; name: string; tags: string[] };

describe('MemoryRecordStore', () => {
  it('should return null for a missing id', async () => {
    const store = new MemoryRecordStore<Unit>();
    expect(await store.get('missing')).toBeNull();
    expect(await store.exists('missing')).toBe(false);
  });

  it('should list ids in insertion order', async () => {
    const store = new MemoryRecordStore<Unit>();
    await store.putMany([
      { id: 'b', value: { id: 'b', name: 'B', tags: [] } },
      { id: 'a', value: { id: 'a', name: 'A', tags: [] } },
      { id: 'c', value: { id: 'c', name: 'C', tags: [] } },
    ]);

    expect(await store.list()).toEqual(['b', 'a', 'c']);
    expect(store.size()).toBe(3);
  });

  it('should accept initial entries as an ordered array', async () => {
    const store = new MemoryRecordStore<Unit>({
      initial: [
        { id: 'z', value: { id: 'z', name: 'Z', tags: [] } },
        { id: 'y', value: { id: 'y', name: 'Y', tags: [] } },
      ],
    });

    expect(await store.list()).toEqual(['z', 'y']);
  });

  it('should isolate stored values from caller mutation', async () => {
    const store = new MemoryRecordStore<Unit>();
    const unit: Unit = { id: 'a', name: 'A', tags: ['x'] };
    await store.put('a', unit);
    unit.tags.push('y');

    const read = await store.get('a');
    expect(read?.tags).toEqual(['x']);

    read?.tags.push('z');
    expect((await store.get('a'))?.tags).toEqual(['x']);
  });

  it('should share references when deepClone is disabled', async () => {
    const store = new MemoryRecordStore<Unit>({ deepClone: false });
    const unit: Unit = { id: 'a', name: 'A', tags: [] };
    await store.put('a', unit);

    expect(await store.get('a')).toBe(unit);
  });

  it('should delete and clear records', async () => {
    const store = new MemoryRecordStore<Unit>();
    await store.put('a', { id: 'a', name: 'A', tags: [] });
    await store.put('b', { id: 'b', name: 'B', tags: [] });

    await store.delete('a');
    expect(await store.list()).toEqual(['b']);

    store.clear();
    expect(store.size()).toBe(0);
  });
});
