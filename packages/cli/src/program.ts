/**
 * flatlog CLI (Commander-based)
 *
 *   flatlog convert <inputs...>       - Flatten record logs into tables
 *   flatlog info <input>              - Summarize a record log
 *   flatlog init [catalog]            - Create a catalog
 *   flatlog query <catalog> <sql>     - Run a read-only SQL query
 *   flatlog tables [catalog]          - List registered tables
 *   flatlog describe <catalog> <tbl>  - Show a table's entry and schema
 *   flatlog drop <catalog> <tbl>      - Remove a table from a catalog
 *
 * Commands print results on stdout and log on stderr. The exit code is 1
 * on any fatal error and when any input or table of a conversion failed.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import {
  FlatlogError,
  TABLE_FORMATS,
  isTableFormat,
  nanosToIso,
  type CatalogEntry,
  type TableFormat,
} from '@flatlog/protocol';
import { createDefaultSourceRegistry } from '@flatlog/repositories';
import {
  DEFAULT_TABLE_FORMAT,
  convertFiles,
  describeTable,
  dropTable,
  initCatalog,
  isLogLevel,
  listTables,
  loadConfig,
  createLogger,
  queryCatalog,
  stderrLogger,
  summarizeSource,
  type ConversionReport,
  type FlatlogConfig,
  type Logger,
  type LogLevel,
  type SourceSummary,
} from '@flatlog/runtime';
import { formatCell, formatJson, formatTable, plural } from './output.js';

const pkg = {
  name: 'flatlog',
  version: '0.1.0',
  description: 'Flatten recorded robot-sensor event logs into typed tables and query them with SQL',
};

/**
 * Where the CLI reads its environment and writes its output
 */
export type CliIo = {
  /** Command output (stdout) */
  out: (text: string) => void;
  /** Diagnostics (stderr) */
  err: (text: string) => void;
  env: Record<string, string | undefined>;
  /** Destination of log messages (default: stderr) */
  logTarget?: Logger;
};

export const processIo: CliIo = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
  env: process.env,
};

type GlobalOptions = {
  logLevel?: LogLevel;
};

type ConvertCommandOptions = {
  format: TableFormat;
  topics?: string[];
  output?: string;
  catalog?: string;
  overwrite?: boolean;
  merge?: boolean;
  arraySlots?: number;
  inlineBytes?: number;
  maxRows?: number;
};

type RunState = {
  exitCode: number;
};

// ============================================================================
// Argument parsers
// ============================================================================

function parseFormat(value: string): TableFormat {
  if (!isTableFormat(value)) {
    throw new InvalidArgumentError(`Expected one of: ${TABLE_FORMATS.join(', ')}.`);
  }
  return value;
}

function parseCount(value: string): number {
  const count = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(count)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return count;
}

function parseTopics(value: string): string[] {
  return value
    .split(',')
    .map((topic) => topic.trim())
    .filter((topic) => topic.length > 0);
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('Expected one of: debug, info, warn, error, silent.');
  }
  return value;
}

// ============================================================================
// Rendering
// ============================================================================

function renderReport(report: ConversionReport): string[] {
  const lines: string[] = [];
  for (const input of report.inputs) {
    if (input.error) {
      lines.push(`${input.path}: failed: ${input.error.message}`);
    } else if (input.skipped > 0) {
      lines.push(`${input.path}: skipped ${plural(input.skipped, 'undecodable record')}`);
    }
  }
  for (const table of report.tables) {
    if (table.error) {
      lines.push(`${table.tableName}: failed: ${table.error.message}`);
      continue;
    }
    const skipped = table.skipped > 0 ? `, ${table.skipped} skipped` : '';
    lines.push(`${table.tableName}: ${plural(table.rowCount, 'row')}${skipped} -> ${table.artifacts.join(', ')}`);
  }
  const converted = report.tables.filter((table) => !table.error).length;
  lines.push(`Converted ${converted} of ${plural(report.tables.length, 'table')}`);
  return lines;
}

function renderSummary(summary: SourceSummary): string[] {
  const lines = [`File: ${summary.path}`, `Messages: ${summary.messageCount}`];
  if (summary.skipped > 0) {
    lines.push(`Skipped: ${summary.skipped}`);
  }
  if (summary.startTime !== null && summary.endTime !== null) {
    lines.push(
      `Start: ${nanosToIso(summary.startTime)}`,
      `End: ${nanosToIso(summary.endTime)}`,
      `Duration: ${summary.durationSeconds.toFixed(3)} s`
    );
  }
  lines.push(
    '',
    formatTable(
      ['topic', 'type', 'count'],
      summary.topics.map((topic) => [topic.channel, topic.typeIds.join(', '), String(topic.count)])
    )
  );
  return lines;
}

function renderEntry(entry: CatalogEntry): string[] {
  return [
    `Table: ${entry.tableName}`,
    `Source: ${entry.sourceFile}`,
    `Path: ${entry.physicalPath}`,
    `Format: ${entry.format}`,
    `Rows: ${entry.rowCount}`,
    `Created: ${entry.createdAt}`,
    `Fingerprint: ${entry.schemaFingerprint}`,
    '',
    formatTable(
      ['name', 'type', 'nullable'],
      entry.schema.map((column) => [column.name, column.type, column.nullable ? 'yes' : 'no'])
    ),
  ];
}

// ============================================================================
// Program
// ============================================================================

/**
 * Build the flatlog command tree.
 * Commands report a failed conversion through state.exitCode and throw on fatal errors.
 */
export function createProgram(io: CliIo, state: RunState = { exitCode: 0 }): Command {
  const println = (text = '') => io.out(`${text}\n`);

  const program = new Command()
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version, '-v, --version', 'Show version number')
    .option('--log-level <level>', 'Log level (debug, info, warn, error, silent)', parseLogLevel)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text),
      writeErr: (text) => io.err(text),
    });

  // Configuration is read per command so a bad variable only fails commands that run
  const context = (): { config: FlatlogConfig; logger: Logger } => {
    const config = loadConfig(io.env);
    const level = program.opts<GlobalOptions>().logLevel ?? config.logLevel;
    return { config, logger: createLogger({ level, target: io.logTarget ?? stderrLogger }) };
  };

  const catalogRoot = (given: string | undefined, config: FlatlogConfig): string => {
    const root = given ?? config.catalogRoot;
    if (!root) {
      throw new FlatlogError('NO_CATALOG', 'No catalog given (pass a catalog path or set FLATLOG_CATALOG)');
    }
    return root;
  };

  program
    .command('convert')
    .description('Flatten record logs into one table per channel')
    .argument('<inputs...>', 'Record log files (.ndjson, .jsonl)')
    .option('-f, --format <format>', `Table format (${TABLE_FORMATS.join(', ')})`, parseFormat, DEFAULT_TABLE_FORMAT)
    .option('-t, --topics <topics>', 'Comma-separated channels to convert (default: all)', parseTopics)
    .option('-o, --output <path>', 'Output file (single table) or directory')
    .option('-c, --catalog <path>', 'Copy tables into this catalog and register them')
    .option('--overwrite', 'Replace tables already registered under the same name')
    .option('--merge', 'Unify each channel across all inputs into one table')
    .option('--array-slots <n>', 'Longest array spread into numbered columns', parseCount)
    .option('--inline-bytes <n>', 'Longest byte field kept inline', parseCount)
    .option('--max-rows <n>', 'Rows buffered per channel before it fails', parseCount)
    .action(async (inputs: string[], options: ConvertCommandOptions) => {
      const { config, logger } = context();
      const report = await convertFiles({
        inputs,
        format: options.format,
        topics: options.topics,
        output: options.output,
        catalog: options.catalog ?? config.catalogRoot,
        overwrite: options.overwrite ?? false,
        merge: options.merge ?? false,
        arraySlotLimit: options.arraySlots ?? config.arraySlotLimit,
        inlineBytesLimit: options.inlineBytes ?? config.inlineBytesLimit,
        maxRowsPerChannel: options.maxRows ?? config.maxRowsPerChannel,
        logger,
      });
      for (const line of renderReport(report)) {
        println(line);
      }
      if (report.failures > 0) {
        state.exitCode = 1;
      }
    });

  program
    .command('info')
    .description('Summarize the channels and time range of a record log')
    .argument('<input>', 'Record log file')
    .option('--json', 'Print the summary as JSON')
    .action(async (input: string, options: { json?: boolean }) => {
      const { logger } = context();
      const source = await createDefaultSourceRegistry().open(input);
      const summary = await summarizeSource(source, { logger });
      if (options.json) {
        println(formatJson(summary));
        return;
      }
      for (const line of renderSummary(summary)) {
        println(line);
      }
    });

  program
    .command('init')
    .description('Create a catalog')
    .argument('[catalog]', 'Catalog directory (default: FLATLOG_CATALOG)')
    .option('--force', 'Delete an existing catalog first')
    .action(async (given: string | undefined, options: { force?: boolean }) => {
      const { config, logger } = context();
      const root = catalogRoot(given, config);
      const catalog = await initCatalog(root, { force: options.force ?? false, logger });
      await catalog.close();
      println(`Initialized catalog at ${root}`);
    });

  program
    .command('query')
    .description('Run a read-only SQL query over every table in a catalog')
    .argument('<catalog>', 'Catalog directory')
    .argument('<sql>', 'SQL statement')
    .option('--json', 'Print rows as JSON objects')
    .action(async (root: string, sql: string, options: { json?: boolean }) => {
      const { logger } = context();
      const cursor = await queryCatalog(root, sql, { logger });
      const names = cursor.columns.map((column) => column.name);
      const rows = Array.from(cursor);

      if (options.json) {
        println(formatJson(rows.map((row) => Object.fromEntries(names.map((name, i) => [name, row[i]])))));
        return;
      }
      println(formatTable(names, rows.map((row) => row.map(formatCell))));
      println(`(${plural(rows.length, 'row')})`);
    });

  program
    .command('tables')
    .description('List the tables registered in a catalog')
    .argument('[catalog]', 'Catalog directory (default: FLATLOG_CATALOG)')
    .option('--json', 'Print entries as JSON')
    .action(async (given: string | undefined, options: { json?: boolean }) => {
      const { config, logger } = context();
      const entries = await listTables(catalogRoot(given, config), undefined, { logger });
      if (options.json) {
        println(formatJson(entries));
        return;
      }
      if (entries.length === 0) {
        println('No tables');
        return;
      }
      println(
        formatTable(
          ['name', 'rows', 'format', 'source'],
          entries.map((entry) => [entry.tableName, String(entry.rowCount), entry.format, entry.sourceFile])
        )
      );
    });

  program
    .command('describe')
    .description("Show a table's catalog entry and schema")
    .argument('<catalog>', 'Catalog directory')
    .argument('<table>', 'Table name')
    .option('--json', 'Print the entry as JSON')
    .action(async (root: string, tableName: string, options: { json?: boolean }) => {
      const { logger } = context();
      const entry = await describeTable(root, tableName, { logger });
      if (options.json) {
        println(formatJson(entry));
        return;
      }
      for (const line of renderEntry(entry)) {
        println(line);
      }
    });

  program
    .command('drop')
    .description('Remove a table from a catalog')
    .argument('<catalog>', 'Catalog directory')
    .argument('<table>', 'Table name')
    .action(async (root: string, tableName: string) => {
      const { logger } = context();
      const { entry, artifactDeleted } = await dropTable(root, tableName, { logger });
      println(
        artifactDeleted
          ? `Dropped table ${entry.tableName} (artifact deleted)`
          : `Dropped table ${entry.tableName} (artifact kept at ${entry.physicalPath})`
      );
    });

  return program;
}

/**
 * Run the CLI once.
 * @param argv - arguments after the executable and script, e.g. ['tables', './catalog']
 * @returns The process exit code
 */
export async function run(argv: readonly string[], io: CliIo = processIo): Promise<number> {
  const state: RunState = { exitCode: 0 };
  const program = createProgram(io, state);

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    // Commander has already printed its own usage errors, help and version
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    io.err(`error: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
  return state.exitCode;
}
