import { describe, expect, it } from 'vitest';
import { apply, applyDocument, ingest, isMappableKey, keysTriedFor } from './applier';
import { collect } from './collector';
import { cloneRecord, createEmptyRecord } from './record';

describe('apply', () => {
  it('prefers name over title', () => {
    const record = createEmptyRecord();

    expect(apply(record, { title: 'B', name: 'A' })).toEqual(['asset_name']);
    expect(record.core.assetName).toBe('A');
  });

  it('prefers the internal key over the API key', () => {
    const record = createEmptyRecord();
    apply(record, { tri_count: 8, triCount: 12 });

    expect(record.core.triCount).toBe(8);
  });

  it('skips empty values and tries the next key', () => {
    const record = createEmptyRecord();
    apply(record, { name: '', title: 'T' });

    expect(record.core.assetName).toBe('T');
  });

  it('descends into nested API objects', () => {
    const record = createEmptyRecord();
    const mapped = apply(record, {
      boundingBox: { x: 1, y: 2.5, z: '3' },
      materialProperties: { materialCount: 2, hasTextures: true, supportsPBR: 0 },
      visualizationCapabilities: { supportsVR: true },
      theme: { scheme: 'heritage' },
    });

    expect(record.technical).toMatchObject({
      boundingBoxX: 1,
      boundingBoxY: 2.5,
      boundingBoxZ: 3,
      materialCount: 2,
      hasTextures: true,
      supportsPbr: false,
    });
    expect(record.project.supportsVr).toBe(true);
    expect(record.project.themeScheme).toBe('heritage');
    expect(mapped).toEqual([
      'bounding_box_x',
      'bounding_box_y',
      'bounding_box_z',
      'material_count',
      'has_textures',
      'supports_pbr',
      'theme_scheme',
      'supports_vr',
    ]);
  });

  it('reads a literal dotted key before descending', () => {
    const record = createEmptyRecord();
    apply(record, { 'boundingBox.x': 4, boundingBox: { x: 9 } });

    expect(record.technical.boundingBoxX).toBe(4);
  });

  it('joins lists into the record form', () => {
    const record = createEmptyRecord();
    apply(record, { keywords: ['bronze', 'museum'], geoRestrictions: ['EU'] });

    expect(record.core.tags).toBe('bronze, museum');
    expect(record.project.geoRestrictions).toBe('EU');
  });

  it('stringifies scalars and objects for text fields', () => {
    const record = createEmptyRecord();
    apply(record, { name: 42, processingParameters: { decimate: 0.5 } });

    expect(record.core.assetName).toBe('42');
    expect(record.technical.processingParameters).toBe('{"decimate":0.5}');
  });
});

describe('applyDocument', () => {
  it('reports values it cannot coerce and falls through to the next key', () => {
    const record = createEmptyRecord();
    const outcome = applyDocument(record, { tri_count: 'many', triCount: '12' });

    expect(record.core.triCount).toBe(12);
    expect(outcome).toEqual({ mapped: ['tri_count'], rejected: { tri_count: 'many' } });
  });

  it('rejects negative counts and unknown enum values', () => {
    const record = createEmptyRecord();
    const outcome = applyDocument(record, { triCount: -5, format: 'xyz', license: 'MIT' });

    expect(record.core.triCount).toBe(0);
    expect(record.core.assetFormat).toBe('glb');
    expect(record.access.license).toBe('MIT');
    expect(outcome).toEqual({ mapped: ['license'], rejected: { triCount: -5, format: 'xyz' } });
  });

  it('rejects fractional integer counts given as text', () => {
    const record = createEmptyRecord();
    const outcome = applyDocument(record, { vertexCount: '12.5' });

    expect(record.technical.vertexCount).toBe(0);
    expect(outcome.rejected).toEqual({ vertexCount: '12.5' });
  });
});

describe('ingest', () => {
  it('splits mapped fields from unrecognized keys', () => {
    const record = createEmptyRecord();

    expect(ingest(record, { foo: 1, title: 'X' })).toEqual({ mapped: ['asset_name'], raw: { foo: 1 } });
    expect(record.core.assetName).toBe('X');
  });

  it('accepts JSON text', () => {
    const record = createEmptyRecord();
    ingest(record, '{"tags":["x","y"]}');

    expect(record.core.tags).toBe('x, y');
  });

  it('ignores data that is not an object', () => {
    const record = createEmptyRecord();

    expect(ingest(record, 'not json')).toEqual({ mapped: [], raw: {} });
    expect(ingest(record, 42)).toEqual({ mapped: [], raw: {} });
    expect(ingest(record, null)).toEqual({ mapped: [], raw: {} });
    expect(ingest(record, ['name'])).toEqual({ mapped: [], raw: {} });
    expect(record).toEqual(createEmptyRecord());
  });

  it('matches case-variant aliases', () => {
    const record = createEmptyRecord();
    ingest(record, { Title: 'X', Keywords: 'a, b' });

    expect(record.core.assetName).toBe('X');
    expect(record.core.tags).toBe('a, b');
  });

  it('lets the canonical spelling win over a case variant', () => {
    const record = createEmptyRecord();
    ingest(record, { Title: 'Variant', title: 'Canonical' });

    expect(record.core.assetName).toBe('Canonical');
  });

  it('keeps the alias precedence for case variants', () => {
    const record = createEmptyRecord();
    ingest(record, { name: 'A', Title: 'B' });

    expect(record.core.assetName).toBe('A');
  });

  it('lets the nested metadata block win over loose keys', () => {
    const record = createEmptyRecord();
    const result = ingest(record, { name: 'Loose', metro_metadata: { name: 'Nested' } });

    expect(record.core.assetName).toBe('Nested');
    expect(result.raw).toEqual({});
  });

  it('unwraps a nested block given as JSON text', () => {
    const record = createEmptyRecord();
    ingest(record, { metro_metadata: '{"name":"N","lodLevels":3}' });

    expect(record.core.assetName).toBe('N');
    expect(record.technical.lodLevels).toBe(3);
  });

  it('reports rejected values as unrecognized', () => {
    const record = createEmptyRecord();

    expect(ingest(record, { triCount: -5, extra: true })).toEqual({
      mapped: [],
      raw: { extra: true, triCount: -5 },
    });
  });
});

describe('round trip', () => {
  it('collect then apply reproduces the record and the document', () => {
    const record = createEmptyRecord();
    record.core.assetName = 'Bronze Head';
    record.core.description = 'Photogrammetry scan';
    record.core.assetFormat = 'gltf';
    record.core.triCount = 1200;
    record.core.tags = 'bronze, museum';
    record.core.useCase = 'UC2';
    record.provenance.tool = 'Scanner 3';
    record.provenance.sourceData = 'scan-a.ply, scan-b.ply';
    record.access.accessLevel = 'consortium';
    record.access.license = 'CC-BY-4.0';
    record.access.attributionRequired = true;
    record.lineage.lineageId = '123e4567-e89b-42d3-a456-426614174000';
    record.lineage.derivedFromAsset = 'asset-1';
    record.technical.vertexCount = 640;
    record.technical.boundingBoxX = 1.5;
    record.technical.boundingBoxY = 2.25;
    record.technical.boundingBoxZ = 0.125;
    record.technical.materialCount = 2;
    record.technical.hasTextures = true;
    record.technical.lodLevels = 3;
    record.technical.scientificDomain = 'archaeology';
    record.technical.sourceDataFormat = 'ply';
    record.technical.processingParameters = '{"decimate":0.5}';
    record.project.projectPhase = 'development';
    record.project.themeScheme = 'heritage';
    record.project.themeCode = 'H-01';
    record.project.supportsVr = true;
    record.project.usageConstraints = 'Display only';
    record.project.usageGuidelinesViewer = 'model-viewer';
    record.project.usageGuidelinesNotes = 'Use studio lighting';
    record.project.deploymentNotes = 'CDN';
    record.project.geoRestrictions = 'EU, US';
    record.project.accessScope = 'partners';

    const doc = collect(record);
    const restored = createEmptyRecord();
    apply(restored, doc);

    expect(restored).toEqual(record);
    expect(collect(restored)).toEqual(doc);
  });
});

describe('idempotence', () => {
  it('leaves a record in non-canonical form unchanged', () => {
    const record = createEmptyRecord();
    record.core.assetName = 'Relief';
    record.core.tags = 'a,b';
    record.project.geoRestrictions = 'EU,,US';
    record.technical.processingParameters = '{"a": 1}';
    record.technical.boundingBoxX = 1.23456;
    record.technical.boundingBoxY = 0.5;
    const before = cloneRecord(record);

    apply(record, collect(record));

    expect(record).toEqual(before);
  });

  it('still replaces values that differ', () => {
    const record = createEmptyRecord();
    record.core.tags = 'a,b';
    record.technical.processingParameters = '{"a": 1}';
    record.technical.boundingBoxX = 1.23456;

    apply(record, { tags: ['c'], processingParameters: { a: 2 }, boundingBox: { x: 2 } });

    expect(record.core.tags).toBe('c');
    expect(record.technical.processingParameters).toBe('{"a":2}');
    expect(record.technical.boundingBoxX).toBe(2);
  });
});

describe('snapshots', () => {
  it('leaves a cloned record untouched by later imports', () => {
    const record = createEmptyRecord();
    const snapshot = cloneRecord(record);

    apply(record, { name: 'Changed', lodLevels: 2 });

    expect(snapshot).toEqual(createEmptyRecord());
    expect(record.core.assetName).toBe('Changed');
  });
});

describe('key tables', () => {
  it('tries the internal key first', () => {
    expect(keysTriedFor('asset_name')).toEqual(['asset_name', 'name', 'title']);
    expect(keysTriedFor('vertex_count')).toEqual(['vertex_count', 'qualityMetrics.vertexCount', 'vertexCount']);
  });

  it('knows every key a rule reads', () => {
    expect(isMappableKey('generatedWith')).toBe(true);
    expect(isMappableKey('triangleCount')).toBe(true);
    expect(isMappableKey('foo')).toBe(false);
  });
});
