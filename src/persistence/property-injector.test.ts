import { describe, expect, it } from 'vitest';
import { collect } from '../metadata/collector';
import { createEmptyRecord } from '../metadata/record';
import { MemoryFieldStore } from './field-store';
import { injectIntoStore, readStoredDocument, toNativeValue } from './property-injector';

function namedRecord() {
  const record = createEmptyRecord();
  record.core.assetName = 'Cube';
  record.core.tags = 'a, b';
  record.technical.boundingBoxX = 2;
  return record;
}

describe('toNativeValue', () => {
  it('keeps scalars and homogeneous lists', () => {
    expect(toNativeValue('a', 2)).toBe('a');
    expect(toNativeValue(3, 2)).toBe(3);
    expect(toNativeValue(false, 2)).toBe(false);
    expect(toNativeValue(['a', 'b'], 2)).toEqual(['a', 'b']);
    expect(toNativeValue([], 2)).toEqual([]);
  });

  it('refuses values the host cannot hold', () => {
    expect(toNativeValue(null, 2)).toBeUndefined();
    expect(toNativeValue(Number.NaN, 2)).toBeUndefined();
    expect(toNativeValue([1, 'a'], 2)).toBeUndefined();
    expect(toNativeValue([{ a: 1 }], 2)).toBeUndefined();
  });

  it('limits object nesting to the given depth', () => {
    expect(toNativeValue({ a: { b: 1 } }, 2)).toEqual({ a: { b: 1 } });
    expect(toNativeValue({ a: { b: { c: 1 } } }, 2)).toBeUndefined();
  });
});

describe('injectIntoStore', () => {
  it('stores a native structure and a JSON backup', () => {
    const store = new MemoryFieldStore();
    const doc = collect(namedRecord());

    const result = injectIntoStore(store, doc);

    expect(result.native).toBe(true);
    expect(store.get('metro_metadata')).toEqual(doc);
    expect(store.get('metro_metadata_json')).toBe(JSON.stringify(doc, null, 2));
    expect(result.json).toBe(JSON.stringify(doc, null, 2));
  });

  it('falls back to a JSON string when a value is too deep', () => {
    const record = namedRecord();
    record.technical.processingParameters = '{"steps":{"decimate":{"ratio":0.5}}}';
    const store = new MemoryFieldStore();
    const doc = collect(record);

    const result = injectIntoStore(store, doc);

    expect(result.native).toBe(false);
    expect(store.get('metro_metadata')).toBe(JSON.stringify(doc, null, 2));
    expect(store.get('metro_metadata_json')).toBe(JSON.stringify(doc, null, 2));
  });

  it('falls back to a JSON string for mixed lists', () => {
    const record = namedRecord();
    record.technical.processingParameters = '[1, "two"]';

    const result = injectIntoStore(new MemoryFieldStore(), collect(record));

    expect(result.native).toBe(false);
  });

  it('honors a deeper native depth', () => {
    const record = namedRecord();
    record.technical.processingParameters = '{"steps":{"decimate":{"ratio":0.5}}}';

    const result = injectIntoStore(new MemoryFieldStore(), collect(record), { nativeDepth: 4 });

    expect(result.native).toBe(true);
  });
});

describe('readStoredDocument', () => {
  it('reads a native document back', () => {
    const store = new MemoryFieldStore();
    const doc = collect(namedRecord());
    injectIntoStore(store, doc);

    expect(readStoredDocument(store)).toEqual(doc);
  });

  it('reads a JSON string primary back', () => {
    const store = new MemoryFieldStore();
    const doc = collect(namedRecord());
    injectIntoStore(store, doc, { nativeDepth: 1 });

    expect(typeof store.get('metro_metadata')).toBe('string');
    expect(readStoredDocument(store)).toEqual(doc);
  });

  it('uses the backup when the primary is unreadable', () => {
    const store = new MemoryFieldStore({
      metro_metadata: 'oops',
      metro_metadata_json: '{"name":"Backup"}',
    });

    expect(readStoredDocument(store)).toEqual({ name: 'Backup' });
  });

  it('returns null when nothing is stored', () => {
    expect(readStoredDocument(new MemoryFieldStore())).toBeNull();
    expect(readStoredDocument(new MemoryFieldStore({ metro_metadata: 'oops' }))).toBeNull();
  });
});
