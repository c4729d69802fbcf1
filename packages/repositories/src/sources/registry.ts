// Record source registry: file extension -> source factory

import * as path from 'node:path';
import { UnsupportedSourceError } from '@flatlog/protocol';
import type { RecordSource, RecordSourceFactory } from '../interfaces/index.js';
import { NdjsonRecordSource } from './ndjson.js';

/**
 * Maps file extensions to record source factories.
 * Extensions are matched case-insensitively and include the leading dot.
 */
export class RecordSourceRegistry {
  private factories = new Map<string, RecordSourceFactory>();

  /**
   * Register a factory for an extension, replacing any existing one
   */
  register(extension: string, factory: RecordSourceFactory): void {
    this.factories.set(normalizeExtension(extension), factory);
  }

  /**
   * Remove the factory for an extension
   * @returns true if a factory was removed
   */
  unregister(extension: string): boolean {
    return this.factories.delete(normalizeExtension(extension));
  }

  has(extension: string): boolean {
    return this.factories.has(normalizeExtension(extension));
  }

  /**
   * Registered extensions, sorted
   */
  extensions(): string[] {
    return Array.from(this.factories.keys()).sort();
  }

  /**
   * Open a record source for a file path.
   * @throws UnsupportedSourceError if no factory handles the file's extension
   */
  async open(filePath: string): Promise<RecordSource> {
    const factory = this.factories.get(normalizeExtension(path.extname(filePath)));
    if (!factory) {
      throw new UnsupportedSourceError(filePath, this.extensions());
    }
    return factory(filePath);
  }
}

function normalizeExtension(extension: string): string {
  const lower = extension.toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

/**
 * Create a registry with the built-in sources (.ndjson and .jsonl record logs)
 */
export function createDefaultSourceRegistry(): RecordSourceRegistry {
  const registry = new RecordSourceRegistry();
  const ndjson: RecordSourceFactory = (filePath) => new NdjsonRecordSource(filePath);
  registry.register('.ndjson', ndjson);
  registry.register('.jsonl', ndjson);
  return registry;
}
