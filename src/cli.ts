#!/usr/bin/env node
/**
 * wirecraft command line
 */

import { parseArgs } from 'util';
import { runBuild } from './compiler/build';
import { ConfigManager, LOG_LEVEL_MAP, isLogLevelName } from './utils/configManager';
import { formatCompilerError, toFileDiagnostic } from './utils/diagnostics';
import { ConfigError } from './utils/errors';
import { expandSchemaPaths } from './utils/fsUtils';
import { LogLevel, logger } from './utils/logger';
import { CompilerOptions, DiagnosticsFormat } from './utils/types';

const HELP_TEXT = `
wirecraft - proto3 schema compiler for TypeScript message codecs and RPC bindings

Usage:
  wirecraft [options] <schemas|dirs|globs...>

Options:
  -I, --proto_path <dir>                  Import search directory (repeatable; first match wins)
  --out <dir>                             Output directory (default: generated)
  --build_server                          Also emit server interfaces and bind functions
  --build_client                          Emit client classes (default)
  --no_build_client                       Do not emit client classes
  --experimental_allow_proto3_optional    Accept "optional" on scalar and enum fields
  --runtime_module <specifier>            Module generated code imports the runtime from
  --config <file>                         Config file (default: ./wirecraft.config.json when present)
  --log-level <level>                     error, warn, info, debug or verbose
  --verbose                               Same as --log-level verbose
  --diagnostics-format <format>           text or json (default: text)
  -h, --help                              Show this help

Examples:
  # Compile every schema under protos/, importing relative to it
  wirecraft -I protos protos/ --out src/generated

  # Server scaffolding with explicit presence
  wirecraft -I protos --build_server --experimental_allow_proto3_optional "protos/**/*.proto"
`;

/**
 * Run the compiler with command line arguments and return the exit code
 */
export function main(argv: string[], cwd: string = process.cwd()): number {
  let diagnosticsFormat: DiagnosticsFormat = 'text';

  try {
    const { values, positionals } = parseArgs({
      args: argv,
      options: {
        proto_path: { type: 'string', short: 'I', multiple: true },
        out: { type: 'string' },
        build_server: { type: 'boolean' },
        build_client: { type: 'boolean' },
        no_build_client: { type: 'boolean' },
        experimental_allow_proto3_optional: { type: 'boolean' },
        runtime_module: { type: 'string' },
        config: { type: 'string' },
        'log-level': { type: 'string' },
        verbose: { type: 'boolean' },
        'diagnostics-format': { type: 'string' },
        help: { type: 'boolean', short: 'h' }
      },
      allowPositionals: true
    });

    if (values.help) {
      console.log(HELP_TEXT);
      return 0;
    }

    const format = values['diagnostics-format'];
    if (format !== undefined) {
      if (format !== 'text' && format !== 'json') {
        throw new ConfigError(`Invalid diagnostics format "${format}". Must be "text" or "json".`);
      }
      diagnosticsFormat = format;
    }

    const overrides: Partial<CompilerOptions> = {
      includePaths: values.proto_path,
      outputDirectory: values.out,
      buildServer: values.build_server,
      buildClient: values.no_build_client ? false : values.build_client,
      allowExplicitOptionalPresence: values.experimental_allow_proto3_optional,
      runtimeModule: values.runtime_module
    };
    const level = values['log-level'];
    if (level !== undefined) {
      if (!isLogLevelName(level)) {
        throw new ConfigError(`Invalid log level "${level}". Must be one of ${Object.keys(LOG_LEVEL_MAP).join(', ')}.`);
      }
      overrides.logLevel = level;
    }
    if (values.verbose) {
      overrides.logLevel = 'verbose';
    }

    const options = new ConfigManager(cwd).resolve(overrides, values.config);
    logger.setLevel(LOG_LEVEL_MAP[options.logLevel]);
    logger.setVerboseLogging(options.logLevel === 'verbose');

    if (positionals.length === 0) {
      throw new ConfigError('No schema files, directories or globs specified');
    }
    const entries = expandSchemaPaths(positionals, cwd);
    if (entries.length === 0) {
      throw new ConfigError(`No schema files found in: ${positionals.join(', ')}`);
    }
    logger.debug(`Compiling ${entries.length} schema file(s)`);

    runBuild(entries, options);
    return 0;
  } catch (error) {
    report(error, diagnosticsFormat);
    return 1;
  }
}

function report(error: unknown, format: DiagnosticsFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify([toFileDiagnostic(error)], null, 2));
    return;
  }
  console.error(formatCompilerError(error));
  if (logger.getLevel() >= LogLevel.DEBUG && error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
