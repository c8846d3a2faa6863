import { describe, expect, it } from 'vitest';
import { createEmptyRecord } from './record';
import { validate, validateTags } from './validator';

describe('validate', () => {
  it('accepts a default record', () => {
    expect(validate(createEmptyRecord())).toEqual([]);
  });

  it('requires a name when asked', () => {
    expect(validate(createEmptyRecord(), { requireName: true })).toEqual([
      { field: 'name', message: 'Name is required' },
    ]);
  });

  it('reports exactly one issue for a 101-character name', () => {
    const record = createEmptyRecord();
    record.core.assetName = 'n'.repeat(101);

    expect(validate(record)).toEqual([{ field: 'name', message: 'Name too long (101/100 characters)' }]);
  });

  it('reports exactly one issue for a 501-character description', () => {
    const record = createEmptyRecord();
    record.core.description = 'd'.repeat(501);

    expect(validate(record)).toEqual([
      { field: 'description', message: 'Description too long (501/500 characters)' },
    ]);
  });

  it('reports exactly one issue for 21 one-character tags', () => {
    const record = createEmptyRecord();
    record.core.tags = Array.from({ length: 21 }, (_, i) => String.fromCharCode(97 + i)).join(',');

    expect(validate(record)).toEqual([{ field: 'tags', message: 'Too many tags (21/20)' }]);
  });

  it('reports each failing field once', () => {
    const record = createEmptyRecord();
    record.core.assetName = 'n'.repeat(101);
    record.core.description = 'd'.repeat(501);

    expect(validate(record).map(issue => issue.field)).toEqual(['name', 'description']);
  });

  it('accepts values at the limits', () => {
    const record = createEmptyRecord();
    record.core.assetName = 'n'.repeat(100);
    record.core.description = 'd'.repeat(500);
    record.core.tags = Array.from({ length: 20 }, (_, i) => `t${i}`).join(', ');

    expect(validate(record, { requireName: true })).toEqual([]);
  });

  it('rejects a malformed lineage id', () => {
    const record = createEmptyRecord();
    record.lineage.lineageId = 'not-a-uuid';

    expect(validate(record)).toEqual([
      { field: 'lineageId', message: 'Lineage ID must be a valid UUID v4' },
    ]);
  });

  it('accepts a v4 lineage id in any case', () => {
    const record = createEmptyRecord();
    record.lineage.lineageId = '123E4567-E89B-42D3-A456-426614174000';

    expect(validate(record)).toEqual([]);
  });

  it('rejects a UUID of another version', () => {
    const record = createEmptyRecord();
    record.lineage.lineageId = '123e4567-e89b-12d3-a456-426614174000';

    expect(validate(record)).toHaveLength(1);
  });
});

describe('validateTags', () => {
  it('counts tags after dropping empty entries', () => {
    expect(validateTags('a,, b, ,c')).toBeNull();
  });

  it('rejects more than twenty tags', () => {
    const tags = Array.from({ length: 21 }, (_, i) => `t${i}`).join(', ');
    expect(validateTags(tags)).toBe('Too many tags (21/20)');
  });

  it('names the first overlong tag, truncated', () => {
    const tags = `ok, ${'x'.repeat(51)}, ${'y'.repeat(60)}`;
    expect(validateTags(tags)).toBe(`Tag '${'x'.repeat(17)}...' too long (51/50 chars)`);
  });
});
