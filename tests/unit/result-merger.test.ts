/**
 * Unit tests for neighbor normalization and metadata backfill
 */

import { describe, it, expect } from 'vitest';
import {
  ResultMerger,
  applyBackfill,
  buildMetadataIndex,
  collectMissingIds,
  decodeNeighbor,
  normalizeNeighbor,
} from '../../src/services/result-merger.js';
import { CollaboratorFailure, InputError } from '../../src/lib/errors.js';
import { InMemoryBlobStore } from '../helpers/pipeline-test-helper.js';

function lines(...records: unknown[]): string {
  return records.map((r) => (typeof r === 'string' ? r : JSON.stringify(r))).join('\n') + '\n';
}

describe('decodeNeighbor', () => {
  it('normalizes a nested neighbor without metadata', () => {
    const raw = decodeNeighbor({ distance: 0.5, datapoint: { datapoint_id: 'x' } })._unsafeUnwrap();
    expect(normalizeNeighbor(raw)).toEqual({ id: 'x', score: 0.5, metadata: null });
  });

  it('reads nested metadata from embedding_metadata or metadata', () => {
    expect(
      decodeNeighbor({ datapoint: { datapoint_id: 'a', embedding_metadata: { t: 1 } } })._unsafeUnwrap()
    ).toEqual({ kind: 'nested', id: 'a', metadata: { t: 1 }, score: null });
    expect(decodeNeighbor({ datapoint: { id: 'b', metadata: { t: 2 } } })._unsafeUnwrap()).toEqual({
      kind: 'nested',
      id: 'b',
      metadata: { t: 2 },
      score: null,
    });
  });

  it('prefers the nested id over the flat one', () => {
    expect(decodeNeighbor({ id: 'flat', datapoint: { datapoint_id: 'nested' } })._unsafeUnwrap().id).toBe('nested');
  });

  it('decodes a flat neighbor', () => {
    expect(decodeNeighbor({ id: 'y', score: 0.9 })._unsafeUnwrap()).toEqual({ kind: 'flat', id: 'y', score: 0.9 });
  });

  it('stringifies numeric ids', () => {
    expect(decodeNeighbor({ id: 12 })._unsafeUnwrap().id).toBe('12');
  });

  it('prefers distance over score', () => {
    expect(decodeNeighbor({ id: 'z', distance: 0.1, score: 0.7 })._unsafeUnwrap().score).toBe(0.1);
  });

  it('treats a missing score as null', () => {
    expect(normalizeNeighbor(decodeNeighbor({ id: 'z' })._unsafeUnwrap())).toEqual({
      id: 'z',
      score: null,
      metadata: null,
    });
  });

  it('rejects a non-numeric score', () => {
    const error = decodeNeighbor({ id: 'z', distance: 'near' })._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(InputError);
    expect(error.field).toBe('distance');
  });

  it.each([42, null, [], { foo: 1 }, { datapoint: {} }])('rejects unrecognized shape %j', (value) => {
    expect(decodeNeighbor(value).isErr()).toBe(true);
  });
});

describe('collectMissingIds', () => {
  it('collects ids with null or empty metadata', () => {
    const ids = collectMissingIds([
      { id: 'a', score: 1, metadata: null },
      { id: 'b', score: 1, metadata: {} },
      { id: 'c', score: 1, metadata: { t: 1 } },
    ]);
    expect([...ids].sort()).toEqual(['a', 'b']);
  });
});

describe('applyBackfill', () => {
  it('never overwrites present metadata', () => {
    const { results, backfilled } = applyBackfill(
      [
        { id: 'a', score: 1, metadata: { title: 'original' } },
        { id: 'b', score: 0.5, metadata: null },
      ],
      new Map([
        ['a', { title: 'replacement' }],
        ['b', { title: 'found' }],
      ])
    );

    expect(results).toEqual([
      { id: 'a', score: 1, metadata: { title: 'original' } },
      { id: 'b', score: 0.5, metadata: { title: 'found' } },
    ]);
    expect(backfilled).toBe(1);
  });

  it('leaves unmatched ids with null metadata', () => {
    const { results, backfilled } = applyBackfill([{ id: 'q', score: null, metadata: null }], new Map());
    expect(results).toEqual([{ id: 'q', score: null, metadata: null }]);
    expect(backfilled).toBe(0);
  });
});

describe('buildMetadataIndex', () => {
  it('stops opening shards once every id is found', async () => {
    const store = new InMemoryBlobStore({
      'meta/a.json': lines({ id: 'x', embedding_metadata: { n: 1 } }),
      'meta/b.json': lines({ id: 'y', embedding_metadata: { n: 2 } }),
      'meta/c.json': lines({ id: 'z', embedding_metadata: { n: 3 } }),
    });

    const report = (await buildMetadataIndex(store, 'meta', new Set(['x'])))._unsafeUnwrap();

    expect(report.found).toEqual(new Map([['x', { n: 1 }]]));
    expect(store.opened).toEqual(['meta/a.json']);
    expect(report.shardsScanned).toBe(1);
  });

  it('keeps the first match for an id', async () => {
    const store = new InMemoryBlobStore({
      'meta/a.json': lines({ id: 'x', metadata: { v: 'first' } }, { id: 'x', metadata: { v: 'second' } }),
    });

    const report = (await buildMetadataIndex(store, 'meta', new Set(['x', 'missing'])))._unsafeUnwrap();
    expect(report.found.get('x')).toEqual({ v: 'first' });
  });

  it('skips malformed lines and non-object records', async () => {
    const store = new InMemoryBlobStore({
      'meta/a.json': lines('{broken', '[1,2]', '', { id: 'x', metadata: { ok: true } }),
    });

    const report = (await buildMetadataIndex(store, 'meta', new Set(['x'])))._unsafeUnwrap();

    expect(report.found.get('x')).toEqual({ ok: true });
    expect(report.skipped).toHaveLength(2);
    expect(report.skipped[0]?.location).toBe('meta/a.json:1');
    expect(report.skipped[0]?.reason.startsWith('malformed JSON')).toBe(true);
    expect(report.skipped[1]).toEqual({
      stage: 'backfill',
      reason: 'expected an object, got array',
      location: 'meta/a.json:2',
    });
  });

  it('cancels parallel shard scans once the ids are satisfied', async () => {
    const noise = Array.from({ length: 1000 }, () => 'not json').join('\n');
    const store = new InMemoryBlobStore({
      'meta/a.json': lines({ id: 'x', metadata: { n: 1 } }),
      'meta/b.json': noise,
    });

    const report = (await buildMetadataIndex(store, 'meta', new Set(['x']), { concurrency: 2 }))._unsafeUnwrap();

    expect(report.found.get('x')).toEqual({ n: 1 });
    expect(report.skipped.length).toBeLessThan(1000);
  });

  it('does nothing when the external signal is already aborted', async () => {
    const store = new InMemoryBlobStore({ 'meta/a.json': lines({ id: 'x', metadata: { n: 1 } }) });
    const controller = new AbortController();
    controller.abort();

    const report = (
      await buildMetadataIndex(store, 'meta', new Set(['x']), { signal: controller.signal })
    )._unsafeUnwrap();

    expect(report.found.size).toBe(0);
    expect(store.opened).toEqual([]);
  });

  it('propagates store failures as collaborator failures', async () => {
    const store = new InMemoryBlobStore({ 'meta/a.json': lines({ id: 'x', metadata: { n: 1 } }) });
    store.failingKeys.add('meta/a.json');

    const error = (await buildMetadataIndex(store, 'meta', new Set(['x'])))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(CollaboratorFailure);
    expect(error.stage).toBe('backfill');
    expect(error.message).toBe('read meta/a.json failed: read failed: meta/a.json');
  });

  it('returns nothing for an empty prefix', async () => {
    const report = (await buildMetadataIndex(new InMemoryBlobStore(), 'meta', new Set(['x'])))._unsafeUnwrap();
    expect(report.found.size).toBe(0);
    expect(report.shardsScanned).toBe(0);
  });
});

describe('ResultMerger', () => {
  const store = new InMemoryBlobStore({
    'meta/part-00000.json': lines(
      { id: 'a', embedding_metadata: { title: 'other' } },
      { id: 'b', embedding_metadata: { title: 'B' } },
      'not json',
      { id: 'c', metadata: { title: 'C' } }
    ),
  });

  it('normalizes and backfills a mixed neighbor list', async () => {
    const merger = new ResultMerger(store);
    const report = (
      await merger.merge(
        [
          { distance: 0.9, datapoint: { datapoint_id: 'a', embedding_metadata: { title: 'keep' } } },
          { id: 'b', score: 0.8 },
          { distance: 0.7, datapoint: { datapoint_id: 'c' } },
          { id: 'd', distance: 0.1 },
        ],
        'meta'
      )
    )._unsafeUnwrap();

    expect(report.results).toEqual([
      { id: 'a', score: 0.9, metadata: { title: 'keep' } },
      { id: 'b', score: 0.8, metadata: { title: 'B' } },
      { id: 'c', score: 0.7, metadata: { title: 'C' } },
      { id: 'd', score: 0.1, metadata: null },
    ]);
    expect(report.backfilled).toBe(2);
    expect(report.skipped).toHaveLength(1);
    expect(report.skipped[0]?.location).toBe('meta/part-00000.json:3');
  });

  it('skips the backfill without a prefix', async () => {
    const report = (await new ResultMerger(store).merge([{ id: 'b' }]))._unsafeUnwrap();
    expect(report).toEqual({ results: [{ id: 'b', score: null, metadata: null }], backfilled: 0, skipped: [] });
  });

  it('fails the whole merge on an unrecognized neighbor', async () => {
    const result = await new ResultMerger(null).merge([{ id: 'ok' }, { unexpected: true }]);
    expect(result._unsafeUnwrapErr()).toBeInstanceOf(InputError);
  });
});
