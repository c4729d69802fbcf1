import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { QueryError, ValidationError, type ProjectedRow, type TableSchema } from '@flatlog/protocol';
import { SqliteQueryEngine, quoteIdentifier } from './query-engine.js';

const SCHEMA: TableSchema = [
  { name: 'id', type: 'int64', nullable: false },
  { name: 'name', type: 'string', nullable: true },
  { name: 'ok', type: 'bool', nullable: false },
  { name: 'blob', type: 'bytes', nullable: true },
];

const ROWS: ProjectedRow[] = [
  [1, 'a', true, new Uint8Array([1, 2])],
  [2, null, false, null],
  [3, 'c', true, null],
];

async function* asyncRows(rows: ProjectedRow[]): AsyncGenerator<ProjectedRow> {
  yield* rows;
}

describe('SqliteQueryEngine', () => {
  let engine: SqliteQueryEngine;

  beforeEach(async () => {
    engine = new SqliteQueryEngine();
    await engine.registerTable('t1', SCHEMA, asyncRows(ROWS));
  });

  afterEach(() => {
    engine.close();
  });

  describe('registerTable', () => {
    it('should load rows from sync and async iterables', async () => {
      expect(await engine.registerTable('t2', SCHEMA, ROWS)).toBe(3);
      expect(engine.tables()).toEqual(['t1', 't2']);
    });

    it('should load more rows than one insert batch', async () => {
      const many: ProjectedRow[] = Array.from({ length: 2500 }, (_, i) => [i, null, false, null]);
      expect(await engine.registerTable('many', SCHEMA, many)).toBe(2500);

      expect([...engine.query('SELECT COUNT(*) FROM many')]).toEqual([[2500]]);
    });

    it('should drop a table whose rows fail to load', async () => {
      async function* failing(): AsyncGenerator<ProjectedRow> {
        yield [1, 'a', true, null];
        throw new Error('truncated artifact');
      }

      await expect(engine.registerTable('broken', SCHEMA, failing())).rejects.toThrow('truncated artifact');

      expect(engine.tables()).toEqual(['t1']);
      expect(() => engine.query('SELECT * FROM broken')).toThrow(QueryError);
    });

    it('should reject a table without columns', async () => {
      await expect(engine.registerTable('empty', [], [])).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('query', () => {
    it('should return columns and rows', () => {
      const cursor = engine.query('SELECT id, name FROM t1 WHERE ok = 1 ORDER BY id');

      expect(cursor.columns).toEqual([
        { name: 'id', declaredType: 'BIGINT' },
        { name: 'name', declaredType: 'TEXT' },
      ]);
      expect([...cursor]).toEqual([
        [1, 'a'],
        [3, 'c'],
      ]);
    });

    it('should return blobs as bytes and nulls as null', () => {
      const rows = [...engine.query('SELECT blob FROM t1 ORDER BY id')];

      expect(rows[0][0]).toEqual(Buffer.from([1, 2]));
      expect(rows[1]).toEqual([null]);
    });

    it('should report expression columns without a declared type', () => {
      const cursor = engine.query('SELECT COUNT(*) AS n FROM t1');

      expect(cursor.columns).toEqual([{ name: 'n', declaredType: null }]);
      expect([...cursor]).toEqual([[3]]);
    });

    it('should return integers beyond 2^53 exactly', async () => {
      const schema: TableSchema = [{ name: 'v', type: 'int64', nullable: false }];
      await engine.registerTable('big', schema, [[9007199254740993n], [-9007199254740993n], [42]]);

      const rows = [...engine.query('SELECT v, typeof(v) FROM big ORDER BY rowid')];

      expect(rows).toEqual([
        [9007199254740993n, 'integer'],
        [-9007199254740993n, 'integer'],
        [42, 'integer'],
      ]);
    });

    it('should stop yielding after close', () => {
      const cursor = engine.query('SELECT id FROM t1 ORDER BY id');

      expect(cursor.next()).toEqual({ done: false, value: [1] });
      cursor.close();
      expect(cursor.next()).toEqual({ done: true, value: undefined });
    });

    it('should not restart once exhausted', () => {
      const cursor = engine.query('SELECT id FROM t1');

      expect([...cursor]).toHaveLength(3);
      expect([...cursor]).toEqual([]);
    });

    it('should reject statements that modify data', () => {
      expect(() => engine.query('DELETE FROM t1')).toThrow(QueryError);
      expect(() => engine.query('DROP TABLE t1')).toThrow(QueryError);
      expect([...engine.query('SELECT COUNT(*) FROM t1')]).toEqual([[3]]);
    });

    it('should pass the engine message through for invalid SQL', () => {
      let caught: unknown;
      try {
        engine.query('SELEC id FROM t1');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(QueryError);
      if (!(caught instanceof QueryError)) return;
      expect(caught.message).toContain('syntax error');
      expect(caught.sql).toBe('SELEC id FROM t1');
      expect(caught.code).toBe('QUERY_ERROR');
    });

    it('should report unknown tables', () => {
      expect(() => engine.query('SELECT * FROM missing')).toThrow('no such table: missing');
    });
  });

  describe('quoteIdentifier', () => {
    it('should double embedded quotes', () => {
      expect(quoteIdentifier('a"b')).toBe('"a""b"');
    });
  });
});
