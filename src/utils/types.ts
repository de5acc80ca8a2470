/**
 * Type definitions for the wirecraft compiler
 * Centralized location for shared option types
 */

import { DEFAULT_CONFIG } from './constants';

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug' | 'verbose';

export type DiagnosticsFormat = 'text' | 'json';

/**
 * Options fixed for one compiler run
 */
export interface CompilerOptions {
  /** Ordered import search directories; the first match wins */
  includePaths: string[];
  /** Destination directory of generated files */
  outputDirectory: string;
  /** Emit server interfaces and bind functions */
  buildServer: boolean;
  /** Emit client classes */
  buildClient: boolean;
  /** Accept `optional` on scalar and enum fields */
  allowExplicitOptionalPresence: boolean;
  /** Module specifier generated code imports the wire runtime from */
  runtimeModule: string;
  logLevel: LogLevelName;
}

/**
 * Default options
 */
export const DEFAULT_OPTIONS: CompilerOptions = {
  includePaths: [],
  outputDirectory: DEFAULT_CONFIG.OUTPUT_DIRECTORY,
  buildServer: false,
  buildClient: true,
  allowExplicitOptionalPresence: false,
  runtimeModule: DEFAULT_CONFIG.RUNTIME_MODULE,
  logLevel: 'info'
};
