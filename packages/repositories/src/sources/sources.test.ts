// Tests for record sources and the source registry

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DecodeError, UnsupportedSourceError } from '@flatlog/protocol';
import type { RecordResult } from '../interfaces/index.js';
import { InMemoryRecordSource, NdjsonRecordSource, createDefaultSourceRegistry } from './index.js';

const LINES = [
  '{"channel":"/a","typeId":"T","receivedTime":"1000","value":{"x":1,"b":{"$bytes":"AQID"}}}',
  'not json',
  '{"channel":"/b","typeId":"T","receivedTime":-5,"value":{}}',
  '{"channel":"/b","typeId":"T","receivedTime":6,"value":{"y":"s"}}',
];

async function collect(results: AsyncIterable<RecordResult>): Promise<RecordResult[]> {
  const items: RecordResult[] = [];
  for await (const item of results) {
    items.push(item);
  }
  return items;
}

describe('NdjsonRecordSource', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'flatlog-sources-'));
    path = join(dir, 'run.ndjson');
    await writeFile(path, LINES.join('\n') + '\n');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should decode records and report bad lines without stopping', async () => {
    const items = await collect(new NdjsonRecordSource(path).records());

    expect(items.map((item) => item.ok)).toEqual([true, false, false, true]);

    const first = items[0];
    expect(first.ok && first.record).toEqual({
      channel: '/a',
      typeId: 'T',
      receivedTime: 1000n,
      value: { x: 1, b: new Uint8Array([1, 2, 3]) },
    });
  });

  it('should carry the byte offset, line and channel of a bad line', async () => {
    const items = await collect(new NdjsonRecordSource(path).records());
    const errors = items.flatMap((item) => (item.ok ? [] : [item.error]));

    expect(errors[0]).toBeInstanceOf(DecodeError);
    expect(errors[0].offset).toBe(Buffer.byteLength(LINES[0]) + 1);
    expect(errors[0].line).toBe(2);
    expect(errors[0].channel).toBeUndefined();
    expect(errors[0].message).toBe(`Invalid JSON at line 2 (offset ${Buffer.byteLength(LINES[0]) + 1})`);

    expect(errors[1].channel).toBe('/b');
    expect(errors[1].line).toBe(3);
  });

  it('should restrict to the requested channels but keep channel-less errors', async () => {
    const items = await collect(new NdjsonRecordSource(path).records({ channels: ['/a'] }));

    expect(items).toHaveLength(2);
    expect(items[0].ok).toBe(true);
    expect(items[1].ok).toBe(false);
  });

  it('should restart from the first record on each call', async () => {
    const source = new NdjsonRecordSource(path);

    expect(await collect(source.records())).toHaveLength(4);
    expect(await collect(source.records())).toHaveLength(4);
  });
});

describe('InMemoryRecordSource', () => {
  it('should yield records and errors in order', async () => {
    const error = new DecodeError('bad', { channel: '/b' });
    const source = new InMemoryRecordSource('mem', [
      { channel: '/a', typeId: 'T', receivedTime: 1n, value: null },
      error,
    ]);

    const items = await collect(source.records({ channels: ['/a'] }));

    expect(items).toEqual([
      { ok: true, record: { channel: '/a', typeId: 'T', receivedTime: 1n, value: null } },
    ]);
  });
});

describe('RecordSourceRegistry', () => {
  it('should open ndjson and jsonl files regardless of case', async () => {
    const registry = createDefaultSourceRegistry();

    expect(registry.extensions()).toEqual(['.jsonl', '.ndjson']);
    expect(await registry.open('/logs/run.JSONL')).toBeInstanceOf(NdjsonRecordSource);
  });

  it('should reject files without a registered source', async () => {
    const registry = createDefaultSourceRegistry();

    await expect(registry.open('/logs/run.bag')).rejects.toBeInstanceOf(UnsupportedSourceError);
  });

  it('should accept custom factories', async () => {
    const registry = createDefaultSourceRegistry();
    registry.register('log', (p) => new InMemoryRecordSource(p, []));

    expect(registry.has('.log')).toBe(true);
    expect((await registry.open('x.log')).path).toBe('x.log');
    expect(registry.unregister('.log')).toBe(true);
  });
});
