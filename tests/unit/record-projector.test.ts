/**
 * Unit tests for RecordProjector and its extraction functions
 */

import { describe, it, expect } from 'vitest';
import {
  RecordProjector,
  buildMetadata,
  buildNumericRestricts,
  buildRestricts,
  buildText,
  parseTimestamp,
} from '../../src/services/record-projector.js';
import type { SkippedUnit } from '../../src/lib/errors.js';
import type { SourceRecord } from '../../src/models/source-record.js';

describe('parseTimestamp', () => {
  it('takes numbers as epoch seconds', () => {
    expect(parseTimestamp(1700000000)).toBe(1700000000);
    expect(parseTimestamp(1700000000.9)).toBe(1700000000);
  });

  it('parses YYYY-MM-DD HH:MM:SS as UTC', () => {
    expect(parseTimestamp('2024-01-01 12:00:00')).toBe(1704110400);
  });

  it('parses YYYY-MM-DDTHH:MM:SS as UTC', () => {
    expect(parseTimestamp('2024-01-01T12:00:00')).toBe(1704110400);
  });

  it('parses DD/MM/YYYY HH:MM', () => {
    expect(parseTimestamp('31/12/2023 23:59')).toBe(1704067140);
  });

  it('converts Date values', () => {
    expect(parseTimestamp(new Date(Date.UTC(2024, 0, 1, 12)))).toBe(1704110400);
  });

  it.each(['not-a-date', '31/02/2024 10:00', '2024-13-01 00:00:00', '2024-01-01 25:00:00', '2024-01-01'])(
    'returns null for %s',
    (text) => {
      expect(parseTimestamp(text)).toBeNull();
    }
  );

  it('returns null for absent values', () => {
    expect(parseTimestamp(null)).toBeNull();
    expect(parseTimestamp(undefined)).toBeNull();
    expect(parseTimestamp('')).toBeNull();
  });
});

describe('buildText', () => {
  it('skips empty fields', () => {
    expect(buildText({ title: 'Hello', desc: '' }, ['title', 'desc'])).toBe('Hello');
  });

  it('joins fields with newlines in configured order', () => {
    expect(buildText({ a: 'first', b: 'second', c: 3 }, ['c', 'a', 'b'])).toBe('3\nfirst\nsecond');
  });

  it('joins array items with spaces', () => {
    expect(buildText({ tags: ['red', null, 'blue'], title: 'Shirt' }, ['title', 'tags'])).toBe('Shirt\nred blue');
  });

  it('ignores missing fields', () => {
    expect(buildText({ title: 'Only' }, ['missing', 'title'])).toBe('Only');
  });
});

describe('buildMetadata', () => {
  const record: SourceRecord = {
    id: 'r1',
    title: 'Lamp',
    price: 19.5,
    note: null,
    seen: new Date(Date.UTC(2024, 0, 1)),
    count: 12n,
  };

  it('copies only configured fields that exist', () => {
    expect(buildMetadata(record, ['title', 'price', 'absent'])).toEqual({ title: 'Lamp', price: 19.5 });
  });

  it('keeps present null values', () => {
    expect(buildMetadata(record, ['note'])).toEqual({ note: null });
  });

  it('converts dates and bigints to JSON-friendly values', () => {
    expect(buildMetadata(record, ['seen', 'count'])).toEqual({
      seen: '2024-01-01T00:00:00.000Z',
      count: 12,
    });
  });

  it('returns identical output on repeated calls', () => {
    const fields = ['title', 'price', 'note'];
    expect(buildMetadata(record, fields)).toEqual(buildMetadata(record, fields));
  });
});

describe('buildRestricts', () => {
  it('emits one allow token for scalar fields', () => {
    expect(buildRestricts({ color: 'red', size: 42 }, ['color', 'size'])).toEqual([
      { namespace: 'color', allow: ['red'], deny: [] },
      { namespace: 'size', allow: ['42'], deny: [] },
    ]);
  });

  it('stringifies non-empty array elements', () => {
    expect(buildRestricts({ tags: ['a', '', null, 7] }, ['tags'])).toEqual([
      { namespace: 'tags', allow: ['a', '7'], deny: [] },
    ]);
  });

  it('skips fields that produce no tokens', () => {
    expect(buildRestricts({ tags: [null, ''], color: '' }, ['tags', 'color', 'missing'])).toEqual([]);
  });

  it('returns identical output on repeated calls', () => {
    const record = { tags: ['x', 'y'] };
    expect(buildRestricts(record, ['tags'])).toEqual(buildRestricts(record, ['tags']));
  });
});

describe('buildNumericRestricts', () => {
  it('classifies integers and floats', () => {
    expect(buildNumericRestricts({ qty: 3, price: 9.99, rank: '7' }, ['qty', 'price', 'rank'], [])).toEqual([
      { namespace: 'qty', valueInt: 3 },
      { namespace: 'price', valueFloat: 9.99 },
      { namespace: 'rank', valueInt: 7 },
    ]);
  });

  it('parses timestamp fields', () => {
    expect(
      buildNumericRestricts({ created_at: '2024-01-01 12:00:00' }, ['created_at'], ['created_at'])
    ).toEqual([{ namespace: 'created_at', valueInt: 1704110400 }]);
  });

  it('skips unparseable timestamps and reports them', () => {
    const skipped: SkippedUnit[] = [];
    const restricts = buildNumericRestricts(
      { created_at: 'yesterday', qty: 1 },
      ['created_at', 'qty'],
      ['created_at'],
      (unit) => skipped.push(unit)
    );

    expect(restricts).toEqual([{ namespace: 'qty', valueInt: 1 }]);
    expect(skipped).toEqual([{ stage: 'project', reason: 'created_at: unparseable timestamp' }]);
  });

  it('skips null, empty and non-numeric values', () => {
    expect(buildNumericRestricts({ a: null, b: '', c: 'abc', d: '   ' }, ['a', 'b', 'c', 'd'], [])).toEqual([]);
  });
});

describe('RecordProjector', () => {
  const projector = new RecordProjector({
    textFields: ['title', 'body'],
    metadataFields: ['title'],
    restrictsFields: ['category'],
    numericRestrictsFields: ['price', 'created_at'],
    timestampFields: ['created_at'],
  });

  it('projects every part of a record', () => {
    const projected = projector.project({
      id: 42,
      title: 'Desk',
      body: 'Oak desk',
      category: 'furniture',
      price: 120,
      created_at: 'garbage',
    });

    expect(projected).toEqual({
      id: '42',
      text: 'Desk\nOak desk',
      metadata: { title: 'Desk' },
      restricts: [{ namespace: 'category', allow: ['furniture'], deny: [] }],
      numericRestricts: [{ namespace: 'price', valueInt: 120 }],
      skipped: [{ stage: 'project', reason: 'created_at: unparseable timestamp' }],
    });
  });

  it('reports a missing id as null', () => {
    expect(projector.project({ title: 'No id' }).id).toBeNull();
    expect(projector.project({ id: '', title: 'Blank id' }).id).toBeNull();
  });
});
