// Tests for the flatlog command tree

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { createCapturingLogger } from '@flatlog/runtime';
import { run, type CliIo } from './program.js';

// --- Test Fixtures ---

const IMU_LINES = [
  { channel: '/imu/data', typeId: 'test/msg/ImuSample', receivedTime: 1_000_000_000, value: { accel_x: 1.0 } },
  { channel: '/imu/data', typeId: 'test/msg/ImuSample', receivedTime: 1_500_000_000, value: { accel_x: -0.5 } },
  { channel: '/imu/data', typeId: 'test/msg/ImuSample', receivedTime: 2_000_000_000, value: {} },
].map((record) => JSON.stringify(record));

function createIo(env: Record<string, string | undefined> = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const logTarget = createCapturingLogger();
  const io: CliIo = {
    out: (text) => {
      out.push(text);
    },
    err: (text) => {
      err.push(text);
    },
    env,
    logTarget,
  };
  return {
    io,
    logs: logTarget.entries,
    stdout: () => out.join(''),
    stderr: () => err.join(''),
  };
}

describe('flatlog', () => {
  let dir: string;
  let root: string;
  let input: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'flatlog-cli-'));
    root = path.join(dir, 'catalog');
    input = path.join(dir, 'run.ndjson');
    await fs.writeFile(input, IMU_LINES.join('\n') + '\n');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function initAndConvert(): Promise<void> {
    expect(await run(['init', root], createIo().io)).toBe(0);
    expect(await run(['convert', input, '--catalog', root, '--format', 'csv'], createIo().io)).toBe(0);
  }

  describe('init', () => {
    it('should create a catalog once', async () => {
      const first = createIo();
      expect(await run(['init', root], first.io)).toBe(0);
      expect(first.stdout()).toBe(`Initialized catalog at ${root}\n`);

      const second = createIo();
      expect(await run(['init', root], second.io)).toBe(1);
      expect(second.stderr()).toBe(`error: Catalog already exists at ${root} (use force to recreate it)\n`);

      expect(await run(['init', root, '--force'], createIo().io)).toBe(0);
    });

    it('should fall back to FLATLOG_CATALOG', async () => {
      const { io, stdout } = createIo({ FLATLOG_CATALOG: root });

      expect(await run(['init'], io)).toBe(0);
      expect(stdout()).toBe(`Initialized catalog at ${root}\n`);
    });

    it('should fail without any catalog path', async () => {
      const { io, stderr } = createIo();

      expect(await run(['init'], io)).toBe(1);
      expect(stderr()).toBe('error: No catalog given (pass a catalog path or set FLATLOG_CATALOG)\n');
    });
  });

  describe('convert', () => {
    it('should report each table and its artifacts', async () => {
      await run(['init', root], createIo().io);
      const { io, stdout, logs } = createIo();

      const code = await run(['convert', input, '--catalog', root, '--format', 'csv'], io);

      expect(code).toBe(0);
      expect(stdout()).toBe(
        `run_imu_data: 3 rows -> ${path.join(dir, 'run_imu_data.csv')}, ${path.join(root, 'tables', 'run_imu_data.csv')}\n` +
          'Converted 1 of 1 table\n'
      );
      expect(logs.filter((entry) => entry.message === 'Converted table')).toHaveLength(1);
    });

    it('should honour --log-level', async () => {
      const { io, logs } = createIo();

      expect(await run(['--log-level', 'warn', 'convert', input, '--format', 'csv'], io)).toBe(0);
      expect(logs).toEqual([]);
    });

    it('should exit 1 when an input fails', async () => {
      const { io, stdout } = createIo();
      const missing = path.join(dir, 'missing.ndjson');

      const code = await run(['convert', input, missing, '--format', 'json'], io);

      expect(code).toBe(1);
      expect(stdout().split('\n')[0].startsWith(`${missing}: failed: `)).toBe(true);
      expect(await fs.readFile(path.join(dir, 'run_imu_data.json'), 'utf8')).toContain('"accel_x": -0.5');
    });

    it('should reject an unknown format', async () => {
      const { io, stderr } = createIo();

      expect(await run(['convert', input, '--format', 'parquet'], io)).toBe(1);
      expect(stderr()).toContain("'parquet' is invalid");
    });

    it('should spread arrays up to --array-slots', async () => {
      const samples = path.join(dir, 'samples.ndjson');
      await fs.writeFile(
        samples,
        JSON.stringify({ channel: '/s', typeId: 'test/msg/S', receivedTime: 1, value: { v: [1, 2, 3] } }) + '\n'
      );

      expect(await run(['convert', samples, '--format', 'csv', '--array-slots', '3'], createIo().io)).toBe(0);
      const header = (await fs.readFile(path.join(dir, 'samples_s.csv'), 'utf8')).split('\n')[0];
      expect(header).toBe('topic,timestamp,msgtype,header_timestamp,v.0,v.1,v.2');
    });

    it('should fail on an invalid environment', async () => {
      const { io, stderr } = createIo({ FLATLOG_LOG_LEVEL: 'loud' });

      expect(await run(['convert', input], io)).toBe(1);
      expect(stderr()).toMatch(/^error: Invalid configuration: FLATLOG_LOG_LEVEL: /);
    });
  });

  describe('info', () => {
    it('should summarize a record log', async () => {
      const { io, stdout } = createIo();

      expect(await run(['info', input], io)).toBe(0);
      expect(stdout().split('\n')).toEqual([
        `File: ${input}`,
        'Messages: 3',
        'Start: 1970-01-01T00:00:01.000Z',
        'End: 1970-01-01T00:00:02.000Z',
        'Duration: 1.000 s',
        '',
        'topic      type                count',
        '---------  ------------------  -----',
        '/imu/data  test/msg/ImuSample  3',
        '',
      ]);
    });

    it('should print JSON with --json', async () => {
      const { io, stdout } = createIo();

      expect(await run(['info', input, '--json'], io)).toBe(0);
      expect(JSON.parse(stdout())).toMatchObject({ messageCount: 3, startTime: '1000000000', endTime: '2000000000' });
    });
  });

  describe('query', () => {
    it('should print rows as a table', async () => {
      await initAndConvert();
      const { io, stdout } = createIo();

      const code = await run(['query', root, 'SELECT accel_x FROM run_imu_data ORDER BY timestamp'], io);

      expect(code).toBe(0);
      expect(stdout()).toBe('accel_x\n-------\n1\n-0.5\nNULL\n(3 rows)\n');
    });

    it('should print rows as JSON objects', async () => {
      await initAndConvert();
      const { io, stdout } = createIo();

      await run(['query', root, 'SELECT topic, accel_x FROM run_imu_data ORDER BY timestamp', '--json'], io);

      expect(JSON.parse(stdout())).toEqual([
        { topic: '/imu/data', accel_x: 1 },
        { topic: '/imu/data', accel_x: -0.5 },
        { topic: '/imu/data', accel_x: null },
      ]);
    });

    it('should refuse statements that modify data', async () => {
      await initAndConvert();
      const { io, stderr } = createIo();

      expect(await run(['query', root, 'DELETE FROM run_imu_data'], io)).toBe(1);
      expect(stderr()).toBe('error: Statement does not return rows; only read-only queries are allowed\n');
    });
  });

  describe('tables, describe and drop', () => {
    it('should list registered tables', async () => {
      await initAndConvert();
      const { io, stdout } = createIo();

      expect(await run(['tables', root], io)).toBe(0);
      const lines = stdout().split('\n');
      expect(lines[0].split(/\s+/)).toEqual(['name', 'rows', 'format', 'source']);
      expect(lines[2].split(/\s+/).slice(0, 3)).toEqual(['run_imu_data', '3', 'csv']);
    });

    it('should say when there are no tables', async () => {
      await run(['init', root], createIo().io);
      const { io, stdout } = createIo();

      await run(['tables', root], io);

      expect(stdout()).toBe('No tables\n');
    });

    it('should describe a table schema', async () => {
      await initAndConvert();
      const { io, stdout } = createIo();

      expect(await run(['describe', root, 'run_imu_data'], io)).toBe(0);
      const lines = stdout().split('\n');
      expect(lines.slice(0, 5)).toEqual([
        'Table: run_imu_data',
        `Source: ${input}`,
        `Path: ${path.join(root, 'tables', 'run_imu_data.csv')}`,
        'Format: csv',
        'Rows: 3',
      ]);
      expect(lines.slice(8, 15)).toEqual([
        'name              type     nullable',
        '----------------  -------  --------',
        'topic             string   no',
        'timestamp         float64  no',
        'msgtype           string   no',
        'header_timestamp  float64  yes',
        'accel_x           float64  yes',
      ]);
    });

    it('should drop a table and its artifact', async () => {
      await initAndConvert();
      const dropped = createIo();

      expect(await run(['drop', root, 'run_imu_data'], dropped.io)).toBe(0);
      expect(dropped.stdout()).toBe('Dropped table run_imu_data (artifact deleted)\n');

      const after = createIo();
      expect(await run(['describe', root, 'run_imu_data'], after.io)).toBe(1);
      expect(after.stderr()).toBe('error: Table not found: run_imu_data\n');
    });

    it('should reject a directory without a catalog', async () => {
      const { io, stderr } = createIo();

      expect(await run(['tables', dir], io)).toBe(1);
      expect(stderr()).toBe(`error: No catalog found at ${dir}\n`);
    });
  });

  it('should print the version', async () => {
    const { io, stdout } = createIo();

    expect(await run(['--version'], io)).toBe(0);
    expect(stdout()).toBe('0.1.0\n');
  });
});
