/**
 * Tests for the schema loader
 */

import { loadSchemas, LoaderOptions } from '../loader';
import { InMemorySchemaSource } from '../schemaSource';
import { ImportCycleError, SchemaLoadError } from '../../utils/errors';
import { logger, LogLevel } from '../../utils/logger';

const HEADER = 'syntax = "proto3";\n';

function load(files: Record<string, string>, entries: string[], options: LoaderOptions = {}) {
  return loadSchemas(entries, {
    source: new InMemorySchemaSource(files),
    includePaths: ['/schemas'],
    bundledDirectory: null,
    ...options
  });
}

function loadError(files: Record<string, string>, entries: string[], options: LoaderOptions = {}): Error {
  try {
    load(files, entries, options);
  } catch (error) {
    if (error instanceof Error) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected loading to fail');
}

describe('SchemaLoader', () => {
  let lines: string[];

  beforeEach(() => {
    lines = [];
    logger.initialize(LogLevel.WARN, false, line => lines.push(line));
  });

  afterAll(() => {
    logger.initialize();
  });

  it('should load the import closure with dependencies first', () => {
    const set = load({
      'a.proto': `${HEADER}import "b.proto";`,
      'b.proto': `${HEADER}import "c.proto";`,
      'c.proto': HEADER
    }, ['/schemas/a.proto']);

    expect(set.files.map(f => f.importName)).toEqual(['c.proto', 'b.proto', 'a.proto']);
    expect(set.entries).toEqual(['file:///schemas/a.proto']);
    expect(set.byUri.get('file:///schemas/b.proto')?.imports.map(i => i.uri)).toEqual(['file:///schemas/c.proto']);
  });

  it('should load a shared dependency once', () => {
    const set = load({
      'top.proto': `${HEADER}import "left.proto";\nimport "right.proto";`,
      'left.proto': `${HEADER}import "base/shared.proto";`,
      'right.proto': `${HEADER}import "base/shared.proto";`,
      'base/shared.proto': HEADER
    }, ['/schemas/top.proto', '/schemas/right.proto']);

    expect(set.files.map(f => f.importName)).toEqual(['base/shared.proto', 'left.proto', 'right.proto', 'top.proto']);
    expect(set.entries).toEqual(['file:///schemas/top.proto', 'file:///schemas/right.proto']);
  });

  it('should search include paths in order', () => {
    const set = loadSchemas(['/first/main.proto'], {
      source: new InMemorySchemaSource({
        '/first/main.proto': `${HEADER}import "common.proto";`,
        '/first/common.proto': HEADER,
        '/second/common.proto': HEADER
      }),
      includePaths: ['/second', '/first'],
      bundledDirectory: null
    });

    expect(set.files.map(f => f.uri)).toEqual(['file:///second/common.proto', 'file:///first/main.proto']);
  });

  it('should use the entry directory when no include path is given', () => {
    const set = load({
      'api/service.proto': `${HEADER}import "types.proto";`,
      'api/types.proto': HEADER
    }, ['/schemas/api/service.proto'], { includePaths: [] });

    expect(set.files.map(f => f.importName)).toEqual(['types.proto', 'service.proto']);
  });

  it('should report a missing import at the import statement', () => {
    const error = loadError({ 'a.proto': `${HEADER}import "missing.proto";` }, ['/schemas/a.proto']);

    expect(error).toBeInstanceOf(SchemaLoadError);
    expect(error.message).toBe('Import "missing.proto" was not found in any include path');
    expect(error).toMatchObject({
      importPath: 'missing.proto',
      location: {
        uri: 'file:///schemas/a.proto',
        range: { start: { line: 1, character: 0 }, end: { line: 1, character: 23 } }
      }
    });
  });

  it('should report missing entries and entries outside the include paths', () => {
    expect(loadError({}, ['/schemas/nope.proto']).message).toBe('File not found: /schemas/nope.proto');
    expect(loadError({ '/other/a.proto': HEADER }, ['/other/a.proto']).message).toBe(
      'File does not reside within any include path: /other/a.proto'
    );
  });

  it('should detect import cycles', () => {
    const error = loadError({
      'a.proto': `${HEADER}import "b.proto";`,
      'b.proto': `${HEADER}import "a.proto";`
    }, ['/schemas/a.proto']);

    expect(error).toBeInstanceOf(ImportCycleError);
    expect(error.message).toBe('Import cycle detected: a.proto -> b.proto -> a.proto');
  });

  it('should fall back to the bundled well-known types', () => {
    const files = { 'event.proto': `${HEADER}import "google/protobuf/timestamp.proto";` };

    const set = load(files, ['/schemas/event.proto'], { bundledDirectory: undefined });
    expect(set.files[0].importName).toBe('google/protobuf/timestamp.proto');
    expect(set.files[0].uri).toMatch(/\/resources\/google\/protobuf\/timestamp\.proto$/);

    expect(loadError(files, ['/schemas/event.proto']).message).toBe(
      'Import "google/protobuf/timestamp.proto" was not found in any include path'
    );
  });

  it('should warn about files without a syntax statement', () => {
    load({ 'bare.proto': 'message A {}' }, ['/schemas/bare.proto']);
    expect(lines).toEqual(['[warn] bare.proto: no syntax statement, assuming proto3']);
  });
});
