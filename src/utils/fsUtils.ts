/**
 * Filesystem Utilities
 * Synchronous helpers for finding schemas and writing generated output
 */

import * as fs from 'fs';
import * as path from 'path';
import { globSync } from 'glob';
import { DEFAULT_CONFIG } from './constants';

/**
 * Check if a regular file exists.
 * @param filePath - The absolute path to check
 */
export function fileExists(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Read a UTF-8 file, or undefined when there is none
 */
export function readFileIfExists(filePath: string): string | undefined {
  return fileExists(filePath) ? fs.readFileSync(filePath, 'utf-8') : undefined;
}

/**
 * Write a UTF-8 string to a file, creating parent directories as needed.
 */
export function writeFile(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf-8');
}

/**
 * Delete a file. A file that is already gone is not an error.
 */
export function deleteFile(filePath: string): void {
  fs.rmSync(filePath, { force: true });
}

/**
 * Expand files, directories and glob patterns into schema files.
 * Directories contribute every nested schema; explicit files are taken as
 * given. The result is sorted and free of duplicates.
 */
export function expandSchemaPaths(inputs: string[], cwd: string = process.cwd()): string[] {
  const found = new Set<string>();
  const isSchema = (file: string) => path.extname(file) === DEFAULT_CONFIG.SCHEMA_EXTENSION;

  for (const input of inputs) {
    const resolved = path.resolve(cwd, input);
    const stats = fs.statSync(resolved, { throwIfNoEntry: false });

    if (stats?.isDirectory()) {
      const pattern = `**/*${DEFAULT_CONFIG.SCHEMA_EXTENSION}`;
      globSync(pattern, { cwd: resolved, nodir: true, absolute: true }).forEach(file => found.add(file));
    } else if (stats?.isFile()) {
      found.add(resolved);
    } else {
      // Not a path on disk, so treat it as a glob pattern
      globSync(input, { cwd, nodir: true, absolute: true })
        .filter(isSchema)
        .forEach(file => found.add(file));
    }
  }

  return Array.from(found).sort();
}
