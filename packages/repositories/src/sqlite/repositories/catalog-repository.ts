import { eq, and, asc, count } from 'drizzle-orm';
import type { CatalogEntry } from '@flatlog/protocol';
import type { Client, Database } from '../db.js';
import { catalogEntries } from '../schema/index.js';
import type {
  CatalogRepository,
  CatalogEntryFilter,
  RegisterEntryInput,
  RegisterEntryOptions,
  RegisterEntryResult,
} from '../../interfaces/index.js';

export class SqliteCatalogRepository implements CatalogRepository {
  constructor(
    private db: Database,
    private client: Client
  ) {}

  async register(
    input: RegisterEntryInput,
    options: RegisterEntryOptions = {}
  ): Promise<RegisterEntryResult> {
    const values: typeof catalogEntries.$inferInsert = {
      tableName: input.tableName,
      sourceFile: input.sourceFile,
      physicalPath: input.physicalPath,
      format: input.format,
      schema: input.schema,
      schemaFingerprint: input.schemaFingerprint,
      rowCount: input.rowCount,
      createdAt: input.createdAt ?? new Date().toISOString(),
    };

    // IMMEDIATE takes the write lock before the existence check, so two writers
    // cannot both see the name as free
    return this.db.transaction(
      (tx): RegisterEntryResult => {
        const existing = tx
          .select()
          .from(catalogEntries)
          .where(eq(catalogEntries.tableName, input.tableName))
          .get();

        if (existing && !options.overwrite) {
          return { status: 'conflict', existing: this.rowToEntry(existing) };
        }

        const [row] = tx
          .insert(catalogEntries)
          .values(values)
          .onConflictDoUpdate({
            target: catalogEntries.tableName,
            set: {
              sourceFile: values.sourceFile,
              physicalPath: values.physicalPath,
              format: values.format,
              schema: values.schema,
              schemaFingerprint: values.schemaFingerprint,
              rowCount: values.rowCount,
              createdAt: values.createdAt,
            },
          })
          .returning()
          .all();

        const entry = this.rowToEntry(row);
        return existing
          ? { status: 'replaced', entry, previous: this.rowToEntry(existing) }
          : { status: 'created', entry };
      },
      { behavior: 'immediate' }
    );
  }

  async get(tableName: string): Promise<CatalogEntry | null> {
    const row = this.db
      .select()
      .from(catalogEntries)
      .where(eq(catalogEntries.tableName, tableName))
      .get();
    return row ? this.rowToEntry(row) : null;
  }

  async list(filter?: CatalogEntryFilter): Promise<CatalogEntry[]> {
    const conditions = [];

    if (filter?.format) {
      conditions.push(eq(catalogEntries.format, filter.format));
    }

    if (filter?.sourceFile) {
      conditions.push(eq(catalogEntries.sourceFile, filter.sourceFile));
    }

    const rows = this.db
      .select()
      .from(catalogEntries)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(asc(catalogEntries.tableName))
      .all();

    // Prefix matching stays out of SQL: LIKE treats "_" in table names as a wildcard
    const prefix = filter?.namePrefix;
    return rows
      .filter((row) => !prefix || row.tableName.startsWith(prefix))
      .map((row) => this.rowToEntry(row));
  }

  async delete(tableName: string): Promise<boolean> {
    const result = this.db
      .delete(catalogEntries)
      .where(eq(catalogEntries.tableName, tableName))
      .run();
    return result.changes > 0;
  }

  async count(): Promise<number> {
    const row = this.db.select({ value: count() }).from(catalogEntries).get();
    return row?.value ?? 0;
  }

  async close(): Promise<void> {
    if (this.client.open) {
      this.client.close();
    }
  }

  private rowToEntry(row: typeof catalogEntries.$inferSelect): CatalogEntry {
    return {
      tableName: row.tableName,
      sourceFile: row.sourceFile,
      physicalPath: row.physicalPath,
      format: row.format,
      schema: row.schema,
      schemaFingerprint: row.schemaFingerprint,
      rowCount: row.rowCount,
      createdAt: row.createdAt,
    };
  }
}
