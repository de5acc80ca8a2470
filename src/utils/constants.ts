/**
 * Constants for the wirecraft schema compiler
 * Centralized location for wire limits, error codes and defaults
 */

/**
 * Field number constraints
 */
export const FIELD_NUMBER = {
  /** Minimum valid field number */
  MIN: 1,
  /** Maximum valid field number (2^29 - 1) */
  MAX: 536870911,
  /** Implementation-reserved range start */
  RESERVED_RANGE_START: 19000,
  /** Implementation-reserved range end */
  RESERVED_RANGE_END: 19999
} as const;

/**
 * Enum value constraints (enum values are int32)
 */
export const ENUM_VALUE = {
  MIN: -2147483648,
  MAX: 2147483647
} as const;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  /** Module specifier generated code imports the wire runtime from */
  RUNTIME_MODULE: 'wirecraft/runtime',
  /** Config file looked up in the working directory */
  CONFIG_FILE_NAME: 'wirecraft.config.json',
  /** Default output directory */
  OUTPUT_DIRECTORY: 'generated',
  /** Extension of schema files picked up from directories */
  SCHEMA_EXTENSION: '.proto',
  /** Extension of generated files */
  GENERATED_EXTENSION: '.ts'
} as const;

/**
 * Header written at the top of every generated file
 */
export const GENERATED_HEADER = [
  '// Code generated by wirecraft. DO NOT EDIT.',
  '// source: '
] as const;

/**
 * Source label attached to diagnostics
 */
export const DIAGNOSTIC_SOURCE = 'wirecraft';

/**
 * Stable error codes, shared by thrown errors and emitted diagnostics
 */
export const ERROR_CODES = {
  SYNTAX_ERROR: 'syntax-error',
  LOAD_ERROR: 'load-error',
  UNRESOLVED_REFERENCE: 'unresolved-reference',
  DUPLICATE_DECLARATION: 'duplicate-declaration',
  IMPORT_CYCLE: 'import-cycle',
  SCHEMA_ERROR: 'schema-error',
  CONFIG_ERROR: 'config-error'
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

/**
 * Well-known proto shipped under resources/ and used to detect the bundled include path
 */
export const GOOGLE_WELL_KNOWN_TEST_FILE = 'google/protobuf/timestamp.proto';
