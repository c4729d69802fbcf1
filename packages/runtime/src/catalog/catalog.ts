// Catalog registrar and query facade
//
// Layout under a catalog root:
//   catalog.db  - metadata store (one row per registered table)
//   tables/     - artifacts written into the catalog by conversions
//
// Queries load every registered artifact into a private in-memory engine,
// so SQL never touches the metadata store or the files on disk.

import { createHash, randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
  CatalogAlreadyExistsError,
  NameConflictError,
  TABLE_FORMAT_EXTENSIONS,
  TABLE_NAME_PATTERN,
  TableNotFoundError,
  UnknownCatalogError,
  ValidationError,
  catalogTablePath,
  metadataStorePath,
  tablesDirPath,
  validateTableSchema,
  type CatalogEntry,
  type TableFormat,
  type TableSchema,
} from '@flatlog/protocol';
import {
  SqliteQueryEngine,
  createSqliteCatalogRepository,
  getTableReader,
  pathExists,
  type CatalogEntryFilter,
  type CatalogRepository,
  type QueryCursor,
  type QueryEngine,
  type RegisterEntryResult,
  type ResultColumn,
  type ResultRow,
} from '@flatlog/repositories';
import { silentLogger, type Logger } from '../logging.js';

export type CatalogOptions = {
  logger?: Logger;
};

export type InitCatalogOptions = CatalogOptions & {
  /** Delete an existing metadata store and tables directory first */
  force?: boolean;
};

/**
 * A table to register
 */
export type RegisterTableInput = {
  tableName: string;
  physicalPath: string;
  schema: TableSchema;
  rowCount: number;
  sourceFile: string;
  format: TableFormat;
  /** Replace an existing entry with the same name (default: false) */
  overwrite?: boolean;
  /**
   * Artifact already written to a staging path (see Catalog.stagingPath).
   * It is moved to physicalPath once the entry is registered and deleted
   * when registration fails.
   */
  stagedPath?: string;
};

export type DropTableResult = {
  entry: CatalogEntry;
  /** Whether the artifact was deleted (only artifacts under tables/ are) */
  artifactDeleted: boolean;
};

type AcceptedRegistration = Exclude<RegisterEntryResult, { status: 'conflict' }>;

/**
 * sha256 over the schema's canonical JSON
 */
export function schemaFingerprint(schema: TableSchema): string {
  const canonical = JSON.stringify(
    schema.map((column) => ({ name: column.name, type: column.type, nullable: column.nullable }))
  );
  return createHash('sha256').update(canonical).digest('hex');
}

function isInside(dir: string, filePath: string): boolean {
  const relative = path.relative(path.resolve(dir), path.resolve(filePath));
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

/**
 * A cursor that owns its engine: closing or exhausting the cursor closes the engine.
 */
class EngineCursor implements QueryCursor {
  constructor(
    private readonly inner: QueryCursor,
    private readonly engine: QueryEngine
  ) {}

  get columns(): readonly ResultColumn[] {
    return this.inner.columns;
  }

  next(): IteratorResult<ResultRow> {
    let result: IteratorResult<ResultRow>;
    try {
      result = this.inner.next();
    } catch (error) {
      this.close();
      throw error;
    }
    if (result.done) {
      this.close();
    }
    return result;
  }

  return(): IteratorResult<ResultRow> {
    this.close();
    return { done: true, value: undefined };
  }

  close(): void {
    this.inner.close();
    this.engine.close();
  }

  [Symbol.iterator](): QueryCursor {
    return this;
  }
}

/**
 * An open catalog: its root directory and metadata repository.
 */
export class Catalog {
  private readonly logger: Logger;

  constructor(
    readonly root: string,
    private readonly repository: CatalogRepository,
    options: CatalogOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  get tablesDir(): string {
    return tablesDirPath(this.root);
  }

  /**
   * Where a conversion into this catalog writes a table's artifact
   */
  tablePath(tableName: string, format: TableFormat): string {
    return catalogTablePath(this.root, tableName, format);
  }

  /**
   * A fresh path under tables/ to write an artifact before it is registered
   */
  stagingPath(tableName: string, format: TableFormat): string {
    return path.join(this.tablesDir, `.${tableName}.${randomUUID()}.staged${TABLE_FORMAT_EXTENSIONS[format]}`);
  }

  /**
   * Register a table.
   *
   * @throws ValidationError for an invalid name or schema
   * @throws NameConflictError when the name is taken and overwrite is not set
   */
  async register(input: RegisterTableInput): Promise<CatalogEntry> {
    let result: AcceptedRegistration;
    try {
      result = await this.registerEntry(input);
    } catch (error) {
      if (input.stagedPath) {
        await fs.rm(input.stagedPath, { force: true });
      }
      throw error;
    }

    if (input.stagedPath) {
      await fs.rename(input.stagedPath, input.physicalPath);
    }

    if (result.status === 'replaced') {
      const stale = result.previous.physicalPath;
      if (stale !== result.entry.physicalPath && isInside(this.tablesDir, stale)) {
        await fs.rm(stale, { force: true });
        this.logger.debug('Removed replaced artifact', { tableName: input.tableName, physicalPath: stale });
      }
    }

    this.logger.info(result.status === 'replaced' ? 'Replaced table' : 'Registered table', {
      tableName: result.entry.tableName,
      rowCount: result.entry.rowCount,
      physicalPath: result.entry.physicalPath,
    });
    return result.entry;
  }

  private async registerEntry(
    input: RegisterTableInput
  ): Promise<AcceptedRegistration> {
    if (!TABLE_NAME_PATTERN.test(input.tableName)) {
      throw new ValidationError(`Invalid table name: ${input.tableName}`, { field: 'tableName' });
    }
    const validation = validateTableSchema(input.schema);
    if (!validation.valid) {
      throw new ValidationError(`Invalid schema for table ${input.tableName}`, {
        field: 'schema',
        details: { errors: validation.errors },
      });
    }

    const result = await this.repository.register(
      {
        tableName: input.tableName,
        sourceFile: input.sourceFile,
        physicalPath: input.physicalPath,
        format: input.format,
        schema: input.schema,
        schemaFingerprint: schemaFingerprint(input.schema),
        rowCount: input.rowCount,
      },
      { overwrite: input.overwrite ?? false }
    );

    if (result.status === 'conflict') {
      throw new NameConflictError(input.tableName);
    }
    return result;
  }

  async exists(tableName: string): Promise<boolean> {
    return (await this.repository.get(tableName)) !== null;
  }

  async list(filter?: CatalogEntryFilter): Promise<CatalogEntry[]> {
    return this.repository.list(filter);
  }

  /**
   * @throws TableNotFoundError when the table is not registered
   */
  async describe(tableName: string): Promise<CatalogEntry> {
    const entry = await this.repository.get(tableName);
    if (!entry) {
      throw new TableNotFoundError(tableName);
    }
    return entry;
  }

  /**
   * Remove a table's entry. Its artifact is deleted only when it lives under tables/.
   *
   * @throws TableNotFoundError when the table is not registered
   */
  async drop(tableName: string): Promise<DropTableResult> {
    const entry = await this.describe(tableName);
    await this.repository.delete(tableName);

    const artifactDeleted = isInside(this.tablesDir, entry.physicalPath);
    if (artifactDeleted) {
      await fs.rm(entry.physicalPath, { force: true });
    }

    this.logger.info('Dropped table', { tableName, artifactDeleted });
    return { entry, artifactDeleted };
  }

  /**
   * Load every registered table into a fresh engine and start a read-only query.
   * Entries whose artifact is missing or unreadable are skipped with a warning.
   *
   * @throws QueryError when the engine rejects the SQL
   */
  async query(sql: string): Promise<QueryCursor> {
    const engine = new SqliteQueryEngine();
    try {
      for (const entry of await this.repository.list()) {
        if (!(await pathExists(entry.physicalPath))) {
          this.logger.warn('Skipping table with missing artifact', {
            tableName: entry.tableName,
            physicalPath: entry.physicalPath,
          });
          continue;
        }
        try {
          const loaded = await engine.registerTable(
            entry.tableName,
            entry.schema,
            getTableReader(entry.format).read(entry.physicalPath, entry.schema)
          );
          this.logger.debug('Loaded table', { tableName: entry.tableName, rows: loaded });
        } catch (error) {
          this.logger.warn('Skipping table that failed to load', {
            tableName: entry.tableName,
            physicalPath: entry.physicalPath,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
      return new EngineCursor(engine.query(sql), engine);
    } catch (error) {
      engine.close();
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.repository.close();
  }
}

/**
 * Create a catalog at root.
 *
 * @throws CatalogAlreadyExistsError when a metadata store exists and force is not set
 */
export async function initCatalog(root: string, options: InitCatalogOptions = {}): Promise<Catalog> {
  const storePath = metadataStorePath(root);

  if (await pathExists(storePath)) {
    if (!options.force) {
      throw new CatalogAlreadyExistsError(root);
    }
    for (const file of [storePath, `${storePath}-wal`, `${storePath}-shm`]) {
      await fs.rm(file, { force: true });
    }
    await fs.rm(tablesDirPath(root), { recursive: true, force: true });
    options.logger?.info('Removed existing catalog', { root });
  }

  await fs.mkdir(tablesDirPath(root), { recursive: true });
  const catalog = new Catalog(root, createSqliteCatalogRepository({ filename: storePath }), options);
  options.logger?.info('Initialized catalog', { root });
  return catalog;
}

/**
 * Open an existing catalog.
 *
 * @throws UnknownCatalogError when root has no metadata store
 */
export async function openCatalog(root: string, options: CatalogOptions = {}): Promise<Catalog> {
  const storePath = metadataStorePath(root);
  if (!(await pathExists(storePath))) {
    throw new UnknownCatalogError(root);
  }
  return new Catalog(root, createSqliteCatalogRepository({ filename: storePath, fileMustExist: true }), options);
}

async function withCatalog<T>(
  root: string,
  options: CatalogOptions,
  fn: (catalog: Catalog) => Promise<T>
): Promise<T> {
  const catalog = await openCatalog(root, options);
  try {
    return await fn(catalog);
  } finally {
    await catalog.close();
  }
}

export function registerTable(
  root: string,
  input: RegisterTableInput,
  options: CatalogOptions = {}
): Promise<CatalogEntry> {
  return withCatalog(root, options, (catalog) => catalog.register(input));
}

export function listTables(
  root: string,
  filter?: CatalogEntryFilter,
  options: CatalogOptions = {}
): Promise<CatalogEntry[]> {
  return withCatalog(root, options, (catalog) => catalog.list(filter));
}

export function describeTable(root: string, tableName: string, options: CatalogOptions = {}): Promise<CatalogEntry> {
  return withCatalog(root, options, (catalog) => catalog.describe(tableName));
}

export function dropTable(root: string, tableName: string, options: CatalogOptions = {}): Promise<DropTableResult> {
  return withCatalog(root, options, (catalog) => catalog.drop(tableName));
}

/**
 * Run a read-only query over every table in the catalog at root.
 * The metadata store is closed before the cursor is returned; close the cursor when done.
 *
 * @throws UnknownCatalogError when root has no metadata store
 * @throws QueryError when the engine rejects the SQL
 */
export function queryCatalog(root: string, sql: string, options: CatalogOptions = {}): Promise<QueryCursor> {
  return withCatalog(root, options, (catalog) => catalog.query(sql));
}
