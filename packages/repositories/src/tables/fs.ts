// Filesystem helpers shared by the table writers and readers

import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Write a file, creating its parent directory and replacing any existing file.
 * The content goes to a temporary sibling first and is renamed into place,
 * so readers see either the old file or the complete new one.
 * @returns Number of bytes written
 */
export async function writeArtifact(filePath: string, content: string | Uint8Array): Promise<number> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${randomUUID()}.tmp`);
  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
  return typeof content === 'string' ? Buffer.byteLength(content, 'utf-8') : content.byteLength;
}

/**
 * Check whether a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
