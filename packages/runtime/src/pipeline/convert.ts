// Conversion pipeline - record sources to table artifacts and catalog entries
//
// Each input file converts independently (concurrently, failures isolated).
// With merge, the same channel across all inputs becomes one table.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
  FlatlogError,
  NameConflictError,
  TABLE_FORMAT_EXTENSIONS,
  formatFromPath,
  toTableName,
  type CatalogEntry,
  type FlatRow,
  type MaterializedTable,
  type SchemaConflict,
  type TableFormat,
} from '@flatlog/protocol';
import {
  createDefaultSourceRegistry,
  getTableWriter,
  type RecordSource,
  type RecordSourceRegistry,
  type TableWriter,
} from '@flatlog/repositories';
import { DEFAULT_MAX_ROWS_PER_CHANNEL } from '../config.js';
import { flattenRecord, type FlattenOptions } from '../flatten/flattener.js';
import { silentLogger, type Logger } from '../logging.js';
import { finishTable } from '../materialize/materializer.js';
import { SchemaUnifier } from '../unify/unifier.js';
import { openCatalog, type Catalog } from '../catalog/catalog.js';

export const DEFAULT_TABLE_FORMAT: TableFormat = 'arrow';

export type ConvertOptions = FlattenOptions & {
  /** Only convert these channels (all when omitted) */
  topics?: readonly string[];
  /** Rows buffered per channel before that channel fails (default 1,000,000) */
  maxRowsPerChannel?: number;
  logger?: Logger;
};

/**
 * Outcome of converting one channel
 */
export type ChannelConversion = {
  channel: string;
  /** Type ids seen on the channel, in first-seen order */
  typeIds: string[];
  /** Records flattened into the table */
  converted: number;
  /** Records that could not be decoded, or arrived after the channel failed */
  skipped: number;
  /** The table, unless the channel failed */
  table?: MaterializedTable;
  error?: Error;
};

class ChannelAccumulator {
  readonly typeIds: string[] = [];
  converted = 0;
  skipped = 0;
  error?: Error;
  private unifier?: SchemaUnifier;

  constructor(
    readonly channel: string,
    maxRows: number
  ) {
    this.unifier = new SchemaUnifier({ channel, maxRows });
  }

  add(typeId: string, row: FlatRow): void {
    if (!this.unifier) {
      this.skipped++;
      return;
    }
    if (!this.typeIds.includes(typeId)) {
      this.typeIds.push(typeId);
    }
    try {
      this.unifier.add(row);
      this.converted++;
    } catch (error) {
      this.error = error instanceof Error ? error : new Error(String(error));
      // Release the buffered rows; the channel cannot produce a table any more
      this.unifier = undefined;
      this.skipped++;
    }
  }

  finish(logger: Logger): ChannelConversion {
    const base = {
      channel: this.channel,
      typeIds: this.typeIds,
      converted: this.converted,
      skipped: this.skipped,
    };
    if (!this.unifier) {
      return { ...base, error: this.error };
    }
    return { ...base, table: finishTable(this.channel, this.unifier, logger) };
  }
}

type Accumulation = {
  channels: Map<string, ChannelAccumulator>;
  /** Undecodable records whose channel is unknown */
  unattributed: number;
};

async function accumulate(
  source: RecordSource,
  options: ConvertOptions,
  into: Accumulation = { channels: new Map(), unattributed: 0 }
): Promise<Accumulation> {
  const logger = options.logger ?? silentLogger;
  const maxRows = options.maxRowsPerChannel ?? DEFAULT_MAX_ROWS_PER_CHANNEL;

  const channelFor = (channel: string): ChannelAccumulator => {
    let acc = into.channels.get(channel);
    if (!acc) {
      acc = new ChannelAccumulator(channel, maxRows);
      into.channels.set(channel, acc);
    }
    return acc;
  };

  // Requested channels without records still produce a baseline-only table
  for (const topic of options.topics ?? []) {
    channelFor(topic);
  }

  for await (const result of source.records({ channels: options.topics })) {
    if (!result.ok) {
      const { error } = result;
      logger.warn('Skipping undecodable record', {
        source: source.path,
        channel: error.channel,
        offset: error.offset,
        line: error.line,
        error: error.message,
      });
      if (error.channel !== undefined) {
        channelFor(error.channel).skipped++;
      } else {
        into.unattributed++;
      }
      continue;
    }

    const { record } = result;
    const acc = channelFor(record.channel);
    const hadError = acc.error !== undefined;
    acc.add(record.typeId, flattenRecord(record, options));
    if (!hadError && acc.error) {
      logger.error('Channel failed', { channel: record.channel, error: acc.error.message });
    }
  }

  return into;
}

function finishAll(accumulation: Accumulation, logger: Logger): ChannelConversion[] {
  return Array.from(accumulation.channels.values(), (acc) => acc.finish(logger));
}

/**
 * Convert a record source into one table per channel.
 * Decode failures are counted per channel and never stop the conversion.
 */
export async function convertRecords(source: RecordSource, options: ConvertOptions = {}): Promise<ChannelConversion[]> {
  return finishAll(await accumulate(source, options), options.logger ?? silentLogger);
}

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

export type ConvertFilesOptions = ConvertOptions & {
  inputs: readonly string[];
  /** Table format (default: arrow) */
  format?: TableFormat;
  /**
   * A file path with the format's extension (single table only), or a directory.
   * Defaults to each input's directory.
   */
  output?: string;
  /** Catalog root; tables are copied into it and registered */
  catalog?: string;
  /** Replace tables already registered under the same name */
  overwrite?: boolean;
  /** Unify each channel across all inputs into one table */
  merge?: boolean;
  sources?: RecordSourceRegistry;
};

/**
 * Outcome of one table in a conversion run
 */
export type TableReport = {
  tableName: string;
  channel: string;
  sourceFiles: string[];
  typeIds: string[];
  converted: number;
  skipped: number;
  rowCount: number;
  conflicts: SchemaConflict[];
  /** Artifacts written (output file and/or catalog copy) */
  artifacts: string[];
  entry?: CatalogEntry;
  error?: Error;
};

/**
 * Outcome of reading one input file
 */
export type InputReport = {
  path: string;
  /** Undecodable records whose channel could not be determined */
  skipped: number;
  error?: Error;
};

export type ConversionReport = {
  format: TableFormat;
  inputs: InputReport[];
  tables: TableReport[];
  /** Inputs and tables that failed */
  failures: number;
};

type PlannedTable = {
  tableName: string;
  sourceFiles: string[];
  /** Directory used when output is not a single file */
  defaultDir: string;
  conversion: ChannelConversion;
};

function fileStem(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

async function readInput(
  inputPath: string,
  options: ConvertFilesOptions,
  registry: RecordSourceRegistry,
  into?: Accumulation
): Promise<Accumulation> {
  const source = await registry.open(inputPath);
  await fs.access(inputPath);
  return accumulate(source, options, into);
}

/**
 * Decide where a table's artifact goes when not converting into a catalog.
 */
function outputPathFor(
  table: PlannedTable,
  format: TableFormat,
  output: string | undefined,
  singleFile: boolean
): string {
  const extension = TABLE_FORMAT_EXTENSIONS[format];
  if (output && singleFile) {
    return output;
  }
  return path.join(output ?? table.defaultDir, `${table.tableName}${extension}`);
}

/**
 * Convert record files into table artifacts, optionally registering them in a catalog.
 *
 * @example
 * ```typescript
 * const report = await convertFiles({
 *   inputs: ['run_01.ndjson'],
 *   format: 'csv',
 *   catalog: './catalog',
 * });
 * ```
 */
export async function convertFiles(options: ConvertFilesOptions): Promise<ConversionReport> {
  const logger = options.logger ?? silentLogger;
  const format = options.format ?? DEFAULT_TABLE_FORMAT;
  const registry = options.sources ?? createDefaultSourceRegistry();
  const writer = getTableWriter(format);

  const inputs: InputReport[] = [];
  const planned: PlannedTable[] = [];

  if (options.merge) {
    const shared: Accumulation = { channels: new Map(), unattributed: 0 };
    const readable: string[] = [];
    for (const inputPath of options.inputs) {
      const before = shared.unattributed;
      try {
        await readInput(inputPath, options, registry, shared);
        readable.push(inputPath);
        inputs.push({ path: inputPath, skipped: shared.unattributed - before });
      } catch (reason) {
        const error = toError(reason);
        logger.error('Failed to read input', { path: inputPath, error: error.message });
        inputs.push({ path: inputPath, skipped: shared.unattributed - before, error });
      }
    }
    const stemParts = readable.length === 1 ? [fileStem(readable[0])] : [];
    for (const conversion of finishAll(shared, logger)) {
      planned.push({
        tableName: toTableName(...stemParts, conversion.channel),
        sourceFiles: readable,
        defaultDir: path.dirname(readable[0] ?? '.'),
        conversion,
      });
    }
  } else {
    const settled = await Promise.allSettled(
      options.inputs.map((inputPath) => readInput(inputPath, options, registry))
    );
    settled.forEach((outcome, i) => {
      const inputPath = options.inputs[i];
      if (outcome.status === 'rejected') {
        const error = toError(outcome.reason);
        logger.error('Failed to read input', { path: inputPath, error: error.message });
        inputs.push({ path: inputPath, skipped: 0, error });
        return;
      }
      inputs.push({ path: inputPath, skipped: outcome.value.unattributed });
      for (const conversion of finishAll(outcome.value, logger)) {
        planned.push({
          tableName: toTableName(fileStem(inputPath), conversion.channel),
          sourceFiles: [inputPath],
          defaultDir: path.dirname(inputPath),
          conversion,
        });
      }
    });
  }

  const singleFile =
    options.output !== undefined &&
    formatFromPath(options.output) === format &&
    planned.filter((table) => table.conversion.table).length === 1;

  let catalog: Catalog | undefined;
  const tables: TableReport[] = [];
  try {
    if (options.catalog) {
      catalog = await openCatalog(options.catalog, { logger });
    }
    const context: WriteContext = {
      format,
      writer,
      logger,
      output: options.output,
      singleFile,
      overwrite: options.overwrite ?? false,
      catalog,
    };
    const seen = new Set<string>();
    for (const table of planned) {
      if (seen.has(table.tableName)) {
        // Two channels (or inputs) sanitized to the same name; keep the first
        tables.push(failedReport(table, new NameConflictError(table.tableName)));
        continue;
      }
      seen.add(table.tableName);
      tables.push(await writeTable(table, context));
    }
  } finally {
    await catalog?.close();
  }

  const failures =
    inputs.filter((input) => input.error).length + tables.filter((table) => table.error).length;
  return { format, inputs, tables, failures };
}

function baseReport(planned: PlannedTable): TableReport {
  const { conversion } = planned;
  return {
    tableName: planned.tableName,
    channel: conversion.channel,
    sourceFiles: planned.sourceFiles,
    typeIds: conversion.typeIds,
    converted: conversion.converted,
    skipped: conversion.skipped,
    rowCount: conversion.table?.rows.length ?? 0,
    conflicts: conversion.table?.conflicts ?? [],
    artifacts: [],
  };
}

function failedReport(planned: PlannedTable, error: Error): TableReport {
  return { ...baseReport(planned), error };
}

type WriteContext = {
  format: TableFormat;
  writer: TableWriter;
  logger: Logger;
  output?: string;
  singleFile: boolean;
  overwrite: boolean;
  catalog?: Catalog;
};

async function writeTable(
  planned: PlannedTable,
  context: WriteContext
): Promise<TableReport> {
  const { conversion, tableName } = planned;
  const report = baseReport(planned);

  const table = conversion.table;
  if (!table) {
    return { ...report, error: conversion.error ?? new FlatlogError('CONVERSION_FAILED', 'Channel failed') };
  }

  try {
    const { catalog, writer, format } = context;

    // Fail before writing anything when the name is taken; register() still checks atomically
    if (catalog && !context.overwrite && (await catalog.exists(tableName))) {
      throw new NameConflictError(tableName);
    }

    const target = outputPathFor(planned, format, context.output, context.singleFile);
    await writer.write(table, target);
    report.artifacts.push(target);

    if (catalog) {
      // Staged under a unique name so a registration that loses never touches the winner's file
      const physicalPath = catalog.tablePath(tableName, format);
      const stagedPath = catalog.stagingPath(tableName, format);
      await writer.write(table, stagedPath);
      report.entry = await catalog.register({
        tableName,
        physicalPath,
        stagedPath,
        schema: table.schema,
        rowCount: table.rows.length,
        sourceFile: planned.sourceFiles.join(','),
        format,
        overwrite: context.overwrite,
      });
      report.artifacts.push(physicalPath);
    }

    context.logger.info('Converted table', {
      tableName,
      channel: conversion.channel,
      rows: table.rows.length,
      skipped: conversion.skipped,
      artifacts: report.artifacts,
    });
    return report;
  } catch (reason) {
    const error = toError(reason);
    context.logger.error('Failed to write table', { tableName, error: error.message });
    return { ...report, error };
  }
}
