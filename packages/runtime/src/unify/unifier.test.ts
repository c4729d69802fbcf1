// Tests for schema unification

import { describe, it, expect } from 'vitest';
import {
  BASELINE_SCHEMA,
  ChannelBufferOverflowError,
  JsonText,
  type FlatCell,
  type FlatRow,
} from '@flatlog/protocol';
import { SchemaUnifier, projectCell, resolveColumnType, unify } from './unifier.js';

// --- Test Fixtures ---

function row(fields: Record<string, FlatCell>, seconds = 1.5): FlatRow {
  return new Map<string, FlatCell>([
    ['topic', '/test'],
    ['timestamp', seconds],
    ['msgtype', 'test/msg/Sample'],
    ['header_timestamp', null],
    ...Object.entries(fields),
  ]);
}

// Body cells of each projected row (baseline columns dropped)
function bodies(rows: unknown[][]): unknown[][] {
  return rows.map((cells) => cells.slice(4));
}

describe('unify', () => {
  it('should return the baseline schema for an empty channel', () => {
    const result = unify([]);

    expect(result.schema).toEqual(BASELINE_SCHEMA);
    expect(result.rows).toEqual([]);
    expect(result.conflicts).toEqual([]);
    expect(Object.isFrozen(result.schema)).toBe(true);
  });

  it('should keep a single observed kind as the column type', () => {
    const result = unify([row({ a: 1, b: true, c: 'x' }), row({ a: 2, b: false, c: 'y' })]);

    expect(result.schema.slice(4)).toEqual([
      { name: 'a', type: 'int64', nullable: false },
      { name: 'b', type: 'bool', nullable: false },
      { name: 'c', type: 'string', nullable: false },
    ]);
    expect(result.conflicts).toEqual([]);
  });

  it('should widen int and float to float64', () => {
    const result = unify([row({ v: 1 }), row({ v: 2.5 })]);

    expect(result.schema[4]).toEqual({ name: 'v', type: 'float64', nullable: false });
    expect(bodies(result.rows)).toEqual([[1], [2.5]]);
    expect(result.conflicts).toEqual([{ column: 'v', observed: ['int', 'float'], resolved: 'float64' }]);
  });

  it('should widen the whole column to string when a late string appears', () => {
    const result = unify([row({ v: 1 }), row({ v: 2 }), row({ v: 'abc' })]);

    expect(result.schema[4]).toEqual({ name: 'v', type: 'string', nullable: false });
    expect(bodies(result.rows)).toEqual([['1'], ['2'], ['abc']]);
    expect(result.conflicts).toEqual([{ column: 'v', observed: ['int', 'string'], resolved: 'string' }]);
  });

  it('should fill fields missing from a row with null', () => {
    const result = unify([row({ a: 1 }), row({ b: 'x' })]);

    expect(result.schema.slice(4)).toEqual([
      { name: 'a', type: 'int64', nullable: true },
      { name: 'b', type: 'string', nullable: true },
    ]);
    expect(bodies(result.rows)).toEqual([
      [1, null],
      [null, 'x'],
    ]);
  });

  it('should order columns by first appearance', () => {
    const result = unify([row({ z: 1 }), row({ a: 1, z: 2 }), row({ m: 1 })]);

    expect(result.schema.map((column) => column.name)).toEqual([
      'topic',
      'timestamp',
      'msgtype',
      'header_timestamp',
      'z',
      'a',
      'm',
    ]);
  });

  it('should type an all-null column as nullable string', () => {
    const result = unify([row({ a: null }), row({ a: null })]);

    expect(result.schema[4]).toEqual({ name: 'a', type: 'string', nullable: true });
    expect(bodies(result.rows)).toEqual([[null], [null]]);
  });

  it('should keep integral timestamps in the float64 baseline column', () => {
    const result = unify([row({}, 1), row({}, 2)]);

    expect(result.schema[1]).toEqual({ name: 'timestamp', type: 'float64', nullable: false });
    expect(result.conflicts).toEqual([]);
  });

  it('should encode bytes as base64 in a widened string column', () => {
    const result = unify([row({ v: new Uint8Array([104, 105]) }), row({ v: 'text' })]);

    expect(result.schema[4].type).toBe('string');
    expect(bodies(result.rows)).toEqual([['aGk='], ['text']]);
  });

  it('should carry json_text cells as text', () => {
    const result = unify([row({ v: new JsonText('[1,2,3,4,5,6]') })]);

    expect(result.schema[4]).toEqual({ name: 'v', type: 'json_text', nullable: false });
    expect(bodies(result.rows)).toEqual([['[1,2,3,4,5,6]']]);
  });

  it('should keep integers beyond the safe range as bigint', () => {
    const result = unify([row({ v: 2n ** 60n }), row({ v: 7n })]);

    expect(result.schema[4].type).toBe('int64');
    expect(bodies(result.rows)).toEqual([[1152921504606846976n], [7]]);
  });
});

describe('SchemaUnifier', () => {
  it('should fail the channel once the row limit is exceeded', () => {
    const unifier = new SchemaUnifier({ channel: '/busy', maxRows: 2 });
    unifier.add(row({}));
    unifier.add(row({}));

    expect(unifier.size).toBe(2);
    expect(() => unifier.add(row({}))).toThrow(ChannelBufferOverflowError);
    expect(() => unifier.add(row({}))).toThrow('Channel /busy exceeds the row buffer limit of 2 records');
  });
});

describe('resolveColumnType', () => {
  it('should widen mixtures other than int and float to string', () => {
    expect(resolveColumnType(new Set())).toBe('string');
    expect(resolveColumnType(new Set(['bool']))).toBe('bool');
    expect(resolveColumnType(new Set(['int', 'float']))).toBe('float64');
    expect(resolveColumnType(new Set(['bool', 'int']))).toBe('string');
    expect(resolveColumnType(new Set(['int', 'float', 'string']))).toBe('string');
  });
});

describe('projectCell', () => {
  it('should convert cells to the column type', () => {
    expect(projectCell(undefined, 'int64')).toBeNull();
    expect(projectCell(5n, 'int64')).toBe(5);
    expect(projectCell(5n, 'float64')).toBe(5);
    expect(projectCell(true, 'string')).toBe('true');
    expect(projectCell(1.25, 'string')).toBe('1.25');
  });
});
