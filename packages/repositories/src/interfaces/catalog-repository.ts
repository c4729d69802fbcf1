import type { CatalogEntry, TableFormat, Timestamp } from '@flatlog/protocol';

/**
 * Input for registering a table.
 * createdAt defaults to now.
 */
export type RegisterEntryInput = Omit<CatalogEntry, 'createdAt'> & {
  createdAt?: Timestamp;
};

/**
 * Options for registering a table
 */
export type RegisterEntryOptions = {
  /**
   * Replace an existing entry with the same name (default: false)
   */
  overwrite?: boolean;
};

/**
 * Outcome of a registration.
 * A conflict leaves the existing entry untouched and returns it.
 */
export type RegisterEntryResult =
  | { status: 'created'; entry: CatalogEntry }
  | { status: 'replaced'; entry: CatalogEntry; previous: CatalogEntry }
  | { status: 'conflict'; existing: CatalogEntry };

/**
 * Filter for listing catalog entries
 */
export type CatalogEntryFilter = {
  format?: TableFormat;
  sourceFile?: string;
  /** Only names starting with this prefix */
  namePrefix?: string;
};

/**
 * Repository interface for the catalog metadata store.
 *
 * Holds the current set of CatalogEntry values keyed by table name.
 * register() checks for an existing name and writes in one atomic step:
 * a reader sees either the old entry or the new one, never a mix.
 */
export interface CatalogRepository {
  /**
   * Register a table, or report a conflict when the name is taken
   * and overwrite was not requested.
   */
  register(input: RegisterEntryInput, options?: RegisterEntryOptions): Promise<RegisterEntryResult>;

  /**
   * Get an entry by table name
   * @returns CatalogEntry or null if not found
   */
  get(tableName: string): Promise<CatalogEntry | null>;

  /**
   * List entries, ordered by table name
   */
  list(filter?: CatalogEntryFilter): Promise<CatalogEntry[]>;

  /**
   * Remove an entry.
   * @returns true if an entry was removed, false if none existed
   */
  delete(tableName: string): Promise<boolean>;

  /**
   * Count registered tables
   */
  count(): Promise<number>;

  /**
   * Release the underlying store
   */
  close(): Promise<void>;
}
