import { describe, expect, it } from 'vitest';
import { MemoryFieldStore } from '../persistence/field-store';
import { injectIntoStore } from '../persistence/property-injector';
import { collect } from './collector';
import { readFromStores } from './reader';
import { createEmptyRecord } from './record';

function storedScene(name: string): MemoryFieldStore {
  const record = createEmptyRecord();
  record.core.assetName = name;
  record.core.triCount = 12;
  const store = new MemoryFieldStore();
  injectIntoStore(store, collect(record));
  return store;
}

describe('readFromStores', () => {
  it('reads the stored scene document', () => {
    const record = createEmptyRecord();

    const result = readFromStores(record, { sceneStore: storedScene('Stored') });

    expect(record.core.assetName).toBe('Stored');
    expect(record.core.triCount).toBe(12);
    expect(result.mapped).toEqual(['asset_name', 'asset_format', 'tri_count', 'access_level', 'attribution_required']);
    expect(result.raw).toEqual({});
  });

  it('maps object aliases and reports the rest', () => {
    const record = createEmptyRecord();
    const objectStore = new MemoryFieldStore({ Title: 'Object', foo: 'bar', _private: 1 });

    const result = readFromStores(record, { sceneStore: new MemoryFieldStore(), objectStore });

    expect(record.core.assetName).toBe('Object');
    expect(result.mapped).toEqual(['asset_name']);
    expect(result.raw).toEqual({ foo: 'bar' });
  });

  it('lets object properties override the stored document', () => {
    const record = createEmptyRecord();
    const objectStore = new MemoryFieldStore({ name: 'Object' });

    readFromStores(record, { sceneStore: storedScene('Stored'), objectStore });

    expect(record.core.assetName).toBe('Object');
    expect(record.core.triCount).toBe(12);
  });

  it('applies an object metadata block over loose aliases', () => {
    const record = createEmptyRecord();
    const objectStore = new MemoryFieldStore({
      title: 'Loose',
      metro_metadata: { name: 'Block', lodLevels: 2 },
    });

    const result = readFromStores(record, { sceneStore: new MemoryFieldStore(), objectStore });

    expect(record.core.assetName).toBe('Block');
    expect(record.technical.lodLevels).toBe(2);
    expect(result.mapped).toEqual(['asset_name', 'lod_levels']);
  });

  it('reports loose scene properties without applying aliases', () => {
    const record = createEmptyRecord();
    const sceneStore = storedScene('Stored');
    sceneStore.set('title', 'Loose');
    sceneStore.set('custom', 'x');
    sceneStore.set('_internal', true);

    const result = readFromStores(record, { sceneStore });

    expect(record.core.assetName).toBe('Stored');
    expect(result.raw).toEqual({ custom: 'x' });
  });

  it('leaves the record alone when nothing is stored', () => {
    const record = createEmptyRecord();

    expect(readFromStores(record, { sceneStore: new MemoryFieldStore() })).toEqual({ mapped: [], raw: {} });
    expect(record).toEqual(createEmptyRecord());
  });
});
