/**
 * Schema file access
 * The loader only touches files through a SchemaSource, so compilation can
 * run against the real file system or an in-memory set of files.
 */

import * as fs from 'fs';
import * as path from 'path';
import { GOOGLE_WELL_KNOWN_TEST_FILE } from '../utils/constants';

export interface SchemaSource {
  /** True when a regular file exists at the absolute path */
  exists(absolutePath: string): boolean;
  /** Canonical path of an existing file (symlinks resolved) */
  realpath(absolutePath: string): string;
  readFile(absolutePath: string): string;
}

export class NodeSchemaSource implements SchemaSource {
  exists(absolutePath: string): boolean {
    try {
      return fs.statSync(absolutePath).isFile();
    } catch {
      return false;
    }
  }

  realpath(absolutePath: string): string {
    return fs.realpathSync(absolutePath);
  }

  readFile(absolutePath: string): string {
    return fs.readFileSync(absolutePath, 'utf-8');
  }
}

/**
 * Files held in memory, keyed by absolute path. Relative keys are resolved
 * against `root`.
 */
export class InMemorySchemaSource implements SchemaSource {
  private readonly files = new Map<string, string>();

  constructor(files: Record<string, string> = {}, private readonly root: string = '/schemas') {
    for (const [name, content] of Object.entries(files)) {
      this.set(name, content);
    }
  }

  set(name: string, content: string): void {
    this.files.set(path.resolve(this.root, name), content);
  }

  exists(absolutePath: string): boolean {
    return this.files.has(path.resolve(absolutePath));
  }

  realpath(absolutePath: string): string {
    return path.resolve(absolutePath);
  }

  readFile(absolutePath: string): string {
    const content = this.files.get(path.resolve(absolutePath));
    if (content === undefined) {
      throw new Error(`ENOENT: no such file '${absolutePath}'`);
    }
    return content;
  }
}

/**
 * Directory of the well-known type schemas shipped with the package
 * (resources/google/protobuf/*.proto). Same relative location from src/ and dist/.
 */
export function getBundledSchemaDirectory(): string | undefined {
  const candidate = path.resolve(__dirname, '..', '..', 'resources');
  return fs.existsSync(path.join(candidate, GOOGLE_WELL_KNOWN_TEST_FILE)) ? candidate : undefined;
}
