/**
 * Configuration Manager
 * Merges defaults, an optional config file and command line options
 */

import * as fs from 'fs';
import * as path from 'path';
import { URI } from 'vscode-uri';
import { Location } from '../core/ast';
import { DEFAULT_CONFIG } from './constants';
import { ConfigError } from './errors';
import { LogLevel, logger } from './logger';
import { CompilerOptions, DEFAULT_OPTIONS, LogLevelName } from './types';

/**
 * Map string log level to LogLevel enum
 */
export const LOG_LEVEL_MAP: Record<LogLevelName, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
  verbose: LogLevel.VERBOSE
};

export function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_MAP, value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function fileLocation(configPath: string): Location {
  const origin = { line: 0, character: 0 };
  return { uri: URI.file(configPath).toString(), range: { start: origin, end: origin } };
}

export class ConfigManager {
  constructor(private readonly cwd: string = process.cwd()) {}

  /**
   * Path of the config file to use: the explicit one, or the default file in
   * the working directory when it exists
   */
  findConfigFile(explicitPath?: string): string | undefined {
    if (explicitPath) {
      const resolved = path.resolve(this.cwd, explicitPath);
      if (!fs.existsSync(resolved)) {
        throw new ConfigError(`Config file not found: ${explicitPath}`);
      }
      return resolved;
    }
    const candidate = path.join(this.cwd, DEFAULT_CONFIG.CONFIG_FILE_NAME);
    return fs.existsSync(candidate) ? candidate : undefined;
  }

  /**
   * Read and validate a config file. Keys use the snake_case build names
   * (`build_server`, `output_directory`, ...); paths are resolved against
   * the file's directory.
   */
  readConfigFile(configPath: string): Partial<CompilerOptions> {
    const location = fileLocation(configPath);
    const baseDir = path.dirname(configPath);

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot read config file: ${reason}`, location);
    }
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new ConfigError('Config file must contain a JSON object', location);
    }

    const result: Partial<CompilerOptions> = {};
    const entries: Array<[string, unknown]> = Object.entries(raw);

    const expectBoolean = (key: string, value: unknown): boolean => {
      if (typeof value !== 'boolean') {
        throw new ConfigError(`"${key}" must be a boolean`, location);
      }
      return value;
    };
    const expectString = (key: string, value: unknown): string => {
      if (typeof value !== 'string' || value.trim() === '') {
        throw new ConfigError(`"${key}" must be a non-empty string`, location);
      }
      return value.trim();
    };

    for (const [key, value] of entries) {
      switch (key) {
        case 'include_paths':
          if (!isStringArray(value)) {
            throw new ConfigError('"include_paths" must be an array of strings', location);
          }
          result.includePaths = value.map(p => path.resolve(baseDir, p));
          break;
        case 'output_directory':
          result.outputDirectory = path.resolve(baseDir, expectString(key, value));
          break;
        case 'build_server':
          result.buildServer = expectBoolean(key, value);
          break;
        case 'build_client':
          result.buildClient = expectBoolean(key, value);
          break;
        case 'allow_explicit_optional_presence':
          result.allowExplicitOptionalPresence = expectBoolean(key, value);
          break;
        case 'runtime_module':
          result.runtimeModule = expectString(key, value);
          break;
        case 'log_level': {
          const level = expectString(key, value);
          if (!isLogLevelName(level)) {
            throw new ConfigError(
              `"log_level" must be one of ${Object.keys(LOG_LEVEL_MAP).join(', ')}`,
              location
            );
          }
          result.logLevel = level;
          break;
        }
        default:
          logger.warn(`Ignoring unknown config key "${key}" in ${configPath}`);
      }
    }

    logger.debug(`Loaded config from ${configPath}`);
    return result;
  }

  /**
   * Final options: defaults, then the config file, then `overrides`.
   * Relative paths in `overrides` resolve against the working directory.
   */
  resolve(overrides: Partial<CompilerOptions> = {}, configPath?: string): CompilerOptions {
    const file = this.findConfigFile(configPath);
    const fromFile = file ? this.readConfigFile(file) : {};

    const merged: CompilerOptions = { ...DEFAULT_OPTIONS, ...fromFile };
    if (overrides.includePaths && overrides.includePaths.length > 0) {
      merged.includePaths = overrides.includePaths.map(p => path.resolve(this.cwd, p));
    }
    if (overrides.outputDirectory !== undefined) {
      merged.outputDirectory = path.resolve(this.cwd, overrides.outputDirectory);
    }
    if (overrides.buildServer !== undefined) {
      merged.buildServer = overrides.buildServer;
    }
    if (overrides.buildClient !== undefined) {
      merged.buildClient = overrides.buildClient;
    }
    if (overrides.allowExplicitOptionalPresence !== undefined) {
      merged.allowExplicitOptionalPresence = overrides.allowExplicitOptionalPresence;
    }
    if (overrides.runtimeModule !== undefined) {
      merged.runtimeModule = overrides.runtimeModule;
    }
    if (overrides.logLevel !== undefined) {
      merged.logLevel = overrides.logLevel;
    }

    merged.outputDirectory = path.resolve(this.cwd, merged.outputDirectory);
    merged.includePaths = merged.includePaths.map(p => path.resolve(this.cwd, p));
    return merged;
  }
}
