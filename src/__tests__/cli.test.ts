/**
 * Tests for the command line entry point
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { main } from '../cli';
import { LogLevel, logger } from '../utils/logger';

describe('cli', () => {
  let dir: string;
  let stdout: jest.SpyInstance;
  let stderr: jest.SpyInstance;
  let logLines: string[];

  const writeSchema = (name: string, content: string): void => {
    const file = path.join(dir, 'protos', name);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  };

  const generated = (name: string): string => fs.readFileSync(path.join(dir, 'gen', name), 'utf-8');

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'wirecraft-cli-'));
    stdout = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    logLines = [];
    logger.initialize(LogLevel.INFO, false, line => logLines.push(line));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    logger.initialize();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should print help and exit with 0', () => {
    expect(main(['--help'], dir)).toBe(0);
    expect(stdout).toHaveBeenCalledTimes(1);
    expect(String(stdout.mock.calls[0][0])).toContain('wirecraft [options] <schemas|dirs|globs...>');
  });

  it('should compile a directory of schemas', () => {
    writeSchema('shop/item.proto', 'syntax = "proto3"; package shop; message Item { string sku = 1; }');

    expect(main(['-I', 'protos', '--out', 'gen', 'protos'], dir)).toBe(0);
    expect(generated(path.join('shop', 'item.ts'))).toContain('export interface Item {');
    expect(stderr).not.toHaveBeenCalled();
  });

  it('should honour the client and server switches', () => {
    writeSchema('svc.proto', 'syntax = "proto3"; message M {} service S { rpc Do(M) returns (M); }');

    expect(main(['-I', 'protos', '--out', 'gen', '--no_build_client', '--build_server', 'protos/svc.proto'], dir)).toBe(0);
    const content = generated('svc.ts');
    expect(content).not.toContain('export class SClient');
    expect(content).toContain('export interface SServer');
  });

  it('should fail when no schemas are named', () => {
    expect(main([], dir)).toBe(1);
    expect(stderr).toHaveBeenCalledWith('error[config-error]: No schema files, directories or globs specified');
  });

  it('should fail when a pattern matches nothing', () => {
    expect(main(['nothing/*.proto'], dir)).toBe(1);
    expect(stderr).toHaveBeenCalledWith('error[config-error]: No schema files found in: nothing/*.proto');
  });

  it('should reject an unknown diagnostics format', () => {
    expect(main(['--diagnostics-format', 'xml', 'a.proto'], dir)).toBe(1);
    expect(stderr).toHaveBeenCalledWith(
      'error[config-error]: Invalid diagnostics format "xml". Must be "text" or "json".'
    );
  });

  it('should reject an unknown log level', () => {
    expect(main(['--log-level', 'loud', 'a.proto'], dir)).toBe(1);
    expect(stderr).toHaveBeenCalledWith(
      'error[config-error]: Invalid log level "loud". Must be one of error, warn, info, debug, verbose.'
    );
  });

  it('should report schema errors with their location and write nothing', () => {
    writeSchema('bad.proto', 'syntax = "proto3";\nmessage Bad {\n  int32 a = 0;\n}\n');

    expect(main(['-I', 'protos', '--out', 'gen', 'protos'], dir)).toBe(1);
    const report = String(stderr.mock.calls[0][0]).split('\n');
    expect(report[0]).toBe(
      `${path.join(fs.realpathSync(dir), 'protos', 'bad.proto')}:3:9: error[schema-error]: ` +
        'Field number 0 of "Bad.a" is out of range [1, 536870911]'
    );
    expect(report[1]).toBe('    int32 a = 0;');
    expect(fs.existsSync(path.join(dir, 'gen'))).toBe(false);
  });

  it('should print JSON diagnostics on stdout', () => {
    writeSchema('bad.proto', 'syntax = "proto3";\nmessage Bad {\n  int32 a = 0;\n}\n');

    expect(main(['-I', 'protos', '--diagnostics-format', 'json', 'protos'], dir)).toBe(1);
    expect(stderr).not.toHaveBeenCalled();
    const diagnostics: unknown = JSON.parse(String(stdout.mock.calls[0][0]));
    expect(diagnostics).toEqual([
      {
        uri: expect.stringMatching(/\/protos\/bad\.proto$/),
        diagnostic: {
          severity: 1,
          range: { start: { line: 2, character: 8 }, end: { line: 2, character: 9 } },
          message: 'Field number 0 of "Bad.a" is out of range [1, 536870911]',
          code: 'schema-error',
          source: 'wirecraft'
        }
      }
    ]);
  });
});
