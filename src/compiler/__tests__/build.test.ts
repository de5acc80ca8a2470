/**
 * Tests for writing generated files to disk
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SchemaError } from '../../utils/errors';
import { LogLevel, logger } from '../../utils/logger';
import { CompilerOptions, DEFAULT_OPTIONS } from '../../utils/types';
import { runBuild } from '../build';

describe('runBuild', () => {
  let dir: string;
  let protoDir: string;
  let outDir: string;
  let options: CompilerOptions;
  let logLines: string[];

  const writeSchema = (name: string, content: string): string => {
    const file = path.join(protoDir, name);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
    return file;
  };

  const listFiles = (root: string): string[] =>
    fs.existsSync(root)
      ? fs.readdirSync(root, { recursive: true, encoding: 'utf-8' })
        .filter(name => fs.statSync(path.join(root, name)).isFile())
        .sort()
      : [];

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'wirecraft-build-'));
    protoDir = path.join(dir, 'protos');
    outDir = path.join(dir, 'out');
    options = { ...DEFAULT_OPTIONS, includePaths: [protoDir], outputDirectory: outDir };
    logLines = [];
    logger.initialize(LogLevel.INFO, false, line => logLines.push(line));
  });

  afterEach(() => {
    logger.initialize();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should write one file per schema under the output directory', () => {
    const entry = writeSchema('shop/item.proto', 'syntax = "proto3"; package shop; message Item { string sku = 1; }');

    const result = runBuild([entry], options);

    const target = path.join(outDir, 'shop', 'item.ts');
    expect(result).toEqual({ written: [target], unchanged: [] });
    expect(fs.readFileSync(target, 'utf-8')).toContain('export interface Item {');
    expect(listFiles(outDir)).toEqual([path.join('shop', 'item.ts')]);
    expect(logLines).toHaveLength(1);
    expect(logLines[0]).toMatch(/^\[info\] Generated 1 file\(s\), 0 unchanged, in \d+ms$/);
  });

  it('should leave files with unchanged content alone', () => {
    const entry = writeSchema('item.proto', 'syntax = "proto3"; message Item {}');
    runBuild([entry], options);
    const target = path.join(outDir, 'item.ts');
    const firstWrite = fs.statSync(target).mtimeMs;

    const result = runBuild([entry], options);

    expect(result).toEqual({ written: [], unchanged: [target] });
    expect(fs.statSync(target).mtimeMs).toBe(firstWrite);
  });

  it('should rewrite files whose schema changed', () => {
    const entry = writeSchema('item.proto', 'syntax = "proto3"; message Item {}');
    runBuild([entry], options);
    writeSchema('item.proto', 'syntax = "proto3"; message Item { int32 count = 1; }');

    const result = runBuild([entry], options);

    expect(result.written).toEqual([path.join(outDir, 'item.ts')]);
    expect(fs.readFileSync(path.join(outDir, 'item.ts'), 'utf-8')).toContain('count: number;');
  });

  it('should write nothing when any schema fails to compile', () => {
    const good = writeSchema('good.proto', 'syntax = "proto3"; message Good {}');
    const bad = writeSchema('bad.proto', 'syntax = "proto3"; message Bad { int32 a = 1; int32 b = 1; }');

    expect(() => runBuild([good, bad], options)).toThrow(SchemaError);
    expect(listFiles(outDir)).toEqual([]);
  });

  it('should restore replaced files when a later rename fails', () => {
    const first = writeSchema('a.proto', 'syntax = "proto3"; message A {}');
    const second = writeSchema('b.proto', 'syntax = "proto3"; message B {}');
    fs.mkdirSync(outDir, { recursive: true });
    fs.writeFileSync(path.join(outDir, 'a.ts'), '// previous output\n');
    // A non-empty directory where b.ts belongs makes its rename fail
    fs.mkdirSync(path.join(outDir, 'b.ts'));
    fs.writeFileSync(path.join(outDir, 'b.ts', 'keep.txt'), 'keep');

    expect(() => runBuild([first, second], options)).toThrow();
    expect(fs.readFileSync(path.join(outDir, 'a.ts'), 'utf-8')).toBe('// previous output\n');
    expect(listFiles(outDir)).toEqual(['a.ts', path.join('b.ts', 'keep.txt')]);
    expect(logLines).toHaveLength(1);
    expect(logLines[0]).toMatch(/^\[error\] Writing generated files failed \| Operation: build \| Error: EISDIR/);
  });
});
