/**
 * Schema Loader
 * Loads the transitive import closure of a set of entry schemas
 */

import * as path from 'path';
import { URI } from 'vscode-uri';
import { ImportStatement, Location, ProtoFile } from './ast';
import { ParseOptions, ProtoParser } from './parser';
import { NodeSchemaSource, SchemaSource, getBundledSchemaDirectory } from './schemaSource';
import { ImportCycleError, SchemaLoadError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ResolvedImport {
  statement: ImportStatement;
  /** Canonical URI of the imported file */
  uri: string;
}

export interface LoadedFile {
  /** Canonical identity: file URI of the real path */
  uri: string;
  /** Path the file is imported by, relative to its search path (always `/`-separated) */
  importName: string;
  ast: ProtoFile;
  imports: ResolvedImport[];
}

export interface SchemaSet {
  /** Every file of the closure, dependencies before dependents */
  files: LoadedFile[];
  /** URIs of the entry schemas, in the order given */
  entries: string[];
  byUri: Map<string, LoadedFile>;
}

export interface LoaderOptions extends Partial<ParseOptions> {
  /** Ordered search directories; the first one containing an import wins */
  includePaths?: string[];
  source?: SchemaSource;
  /**
   * Directory searched after the include paths (well-known types).
   * `null` disables it.
   */
  bundledDirectory?: string | null;
}

interface Candidate {
  absolutePath: string;
  source: SchemaSource;
}

export class SchemaLoader {
  private readonly source: SchemaSource;
  private readonly bundledSource = new NodeSchemaSource();
  private readonly bundledDirectory: string | undefined;
  private readonly parser: ProtoParser;
  private readonly includePaths: string[];
  private searchPaths: string[] = [];

  private loaded = new Map<string, LoadedFile>();
  private order: LoadedFile[] = [];
  // DFS stack of files currently being loaded
  private visiting: Array<{ uri: string; importName: string }> = [];

  constructor(options: LoaderOptions = {}) {
    this.source = options.source ?? new NodeSchemaSource();
    this.bundledDirectory = options.bundledDirectory === null
      ? undefined
      : options.bundledDirectory ?? getBundledSchemaDirectory();
    this.parser = new ProtoParser(options);
    this.includePaths = (options.includePaths ?? []).map(p => path.resolve(p));
  }

  /**
   * Load the entries and everything they import. Fails on the first missing
   * file, parse error or import cycle.
   */
  load(entryPaths: string[]): SchemaSet {
    this.loaded = new Map();
    this.order = [];
    this.visiting = [];

    const absoluteEntries = entryPaths.map(p => path.resolve(p));
    // Without explicit search paths each entry's directory acts as one
    this.searchPaths = this.includePaths.length > 0
      ? this.includePaths
      : [...new Set(absoluteEntries.map(p => path.dirname(p)))];

    const entries: string[] = [];
    for (const [i, absolutePath] of absoluteEntries.entries()) {
      if (!this.source.exists(absolutePath)) {
        throw new SchemaLoadError(`File not found: ${entryPaths[i]}`, entryPaths[i]);
      }
      const importName = this.importNameOf(absolutePath, entryPaths[i]);
      entries.push(this.visit({ absolutePath, source: this.source }, importName).uri);
    }

    logger.debug(`Loaded ${this.order.length} schema file(s) from ${entries.length} entr${entries.length === 1 ? 'y' : 'ies'}`);
    return { files: this.order, entries, byUri: this.loaded };
  }

  private importNameOf(absolutePath: string, given: string): string {
    for (const dir of this.searchPaths) {
      const relative = path.relative(dir, absolutePath);
      if (relative && !relative.startsWith('..') && !path.isAbsolute(relative)) {
        return relative.split(path.sep).join('/');
      }
    }
    throw new SchemaLoadError(
      `File does not reside within any include path: ${given}`,
      given
    );
  }

  private findImport(importPath: string): Candidate | undefined {
    for (const dir of this.searchPaths) {
      const absolutePath = path.resolve(dir, importPath);
      if (this.source.exists(absolutePath)) {
        return { absolutePath, source: this.source };
      }
    }
    if (this.bundledDirectory) {
      const absolutePath = path.resolve(this.bundledDirectory, importPath);
      if (this.bundledSource.exists(absolutePath)) {
        return { absolutePath, source: this.bundledSource };
      }
    }
    return undefined;
  }

  private visit(candidate: Candidate, importName: string, via?: Location): LoadedFile {
    const uri = URI.file(candidate.source.realpath(candidate.absolutePath)).toString();

    const cycleStart = this.visiting.findIndex(entry => entry.uri === uri);
    if (cycleStart >= 0) {
      const chain = [...this.visiting.slice(cycleStart).map(entry => entry.importName), importName];
      throw new ImportCycleError(chain, via);
    }

    const existing = this.loaded.get(uri);
    if (existing) {
      return existing;
    }

    let text: string;
    try {
      text = candidate.source.readFile(candidate.absolutePath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SchemaLoadError(`Cannot read ${importName}: ${reason}`, importName, via);
    }

    const start = Date.now();
    const ast = this.parser.parse(text, uri);
    logger.verboseWithContext('Parsed schema', { uri, operation: 'parse', duration: Date.now() - start });

    if (!ast.syntax) {
      logger.warn(`${importName}: no syntax statement, assuming proto3`);
    }

    this.visiting.push({ uri, importName });
    const imports: ResolvedImport[] = [];
    for (const statement of ast.imports) {
      const location = { uri, range: statement.range };
      const found = this.findImport(statement.path);
      if (!found) {
        throw new SchemaLoadError(
          `Import "${statement.path}" was not found in any include path`,
          statement.path,
          location
        );
      }
      const child = this.visit(found, statement.path, location);
      imports.push({ statement, uri: child.uri });
    }
    this.visiting.pop();

    const file: LoadedFile = { uri, importName, ast, imports };
    this.loaded.set(uri, file);
    this.order.push(file);
    return file;
  }
}

/**
 * Load a schema set with a fresh loader
 */
export function loadSchemas(entryPaths: string[], options: LoaderOptions = {}): SchemaSet {
  return new SchemaLoader(options).load(entryPaths);
}
