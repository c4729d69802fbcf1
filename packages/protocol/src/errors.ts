// Error types shared by every flatlog package

/**
 * Base class for all flatlog errors.
 * Provides structured error information for debugging and logging.
 */
export class FlatlogError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FlatlogError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends FlatlogError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * One record could not be decoded.
 * Reported per record; the rest of the channel and file keep converting.
 */
export class DecodeError extends FlatlogError {
  readonly channel?: string;
  readonly offset?: number;
  readonly line?: number;

  constructor(
    message: string,
    options: { channel?: string; offset?: number; line?: number; cause?: unknown } = {}
  ) {
    const where = [
      options.channel ? `channel ${options.channel}` : undefined,
      options.offset !== undefined ? `offset ${options.offset}` : undefined,
    ]
      .filter(Boolean)
      .join(', ');
    super('DECODE_ERROR', where ? `${message} (${where})` : message, { cause: options.cause });
    this.name = 'DecodeError';
    this.channel = options.channel;
    this.offset = options.offset;
    this.line = options.line;
  }
}

/**
 * A table name is already registered and overwrite was not requested.
 */
export class NameConflictError extends FlatlogError {
  readonly tableName: string;

  constructor(tableName: string) {
    super('NAME_CONFLICT', `Table already registered: ${tableName} (use overwrite to replace it)`);
    this.name = 'NameConflictError';
    this.tableName = tableName;
  }
}

/**
 * A catalog already exists where one was to be created.
 */
export class CatalogAlreadyExistsError extends FlatlogError {
  readonly catalogRoot: string;

  constructor(catalogRoot: string) {
    super('ALREADY_EXISTS', `Catalog already exists at ${catalogRoot} (use force to recreate it)`);
    this.name = 'CatalogAlreadyExistsError';
    this.catalogRoot = catalogRoot;
  }
}

/**
 * No catalog metadata store exists at the given root.
 */
export class UnknownCatalogError extends FlatlogError {
  readonly catalogRoot: string;

  constructor(catalogRoot: string) {
    super('UNKNOWN_CATALOG', `No catalog found at ${catalogRoot}`);
    this.name = 'UnknownCatalogError';
    this.catalogRoot = catalogRoot;
  }
}

/**
 * A table is not registered in the catalog.
 */
export class TableNotFoundError extends FlatlogError {
  readonly tableName: string;

  constructor(tableName: string) {
    super('TABLE_NOT_FOUND', `Table not found: ${tableName}`);
    this.name = 'TableNotFoundError';
    this.tableName = tableName;
  }
}

/**
 * The query engine rejected or failed to run a statement.
 * The message is the engine's diagnostic, unchanged.
 */
export class QueryError extends FlatlogError {
  readonly sql: string;

  constructor(message: string, sql: string, cause?: unknown) {
    super('QUERY_ERROR', message, { cause });
    this.name = 'QueryError';
    this.sql = sql;
  }
}

/**
 * No table writer or reader exists for a format.
 */
export class UnsupportedFormatError extends FlatlogError {
  readonly format: string;

  constructor(format: string) {
    super('UNSUPPORTED_FORMAT', `Unsupported table format: ${format}`);
    this.name = 'UnsupportedFormatError';
    this.format = format;
  }
}

/**
 * No record source is registered for an input file.
 */
export class UnsupportedSourceError extends FlatlogError {
  readonly path: string;

  constructor(path: string, supported: string[]) {
    super(
      'UNSUPPORTED_SOURCE',
      `No record source for ${path} (supported extensions: ${supported.join(', ')})`
    );
    this.name = 'UnsupportedSourceError';
    this.path = path;
  }
}

/**
 * A channel has more records than the configured row buffer allows.
 * Fails that channel only.
 */
export class ChannelBufferOverflowError extends FlatlogError {
  readonly channel: string;
  readonly limit: number;

  constructor(channel: string, limit: number) {
    super(
      'CHANNEL_BUFFER_OVERFLOW',
      `Channel ${channel} exceeds the row buffer limit of ${limit} records`
    );
    this.name = 'ChannelBufferOverflowError';
    this.channel = channel;
    this.limit = limit;
  }
}

/**
 * Invalid configuration values.
 */
export class ConfigError extends FlatlogError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
