/**
 * Compiler error taxonomy
 * Every compile-phase failure is one of these, and all of them are fatal
 */

import { Location } from '../core/ast';
import { ERROR_CODES, ErrorCode } from './constants';

/**
 * Base class of all compile-phase errors.
 * `message` is the bare description; `toString()` prefixes the location.
 */
export abstract class CompilerError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, readonly location?: Location) {
    super(message);
    this.name = new.target.name;
  }

  /** Further locations worth reporting alongside the primary one */
  get relatedLocations(): Array<{ location: Location; message: string }> {
    return [];
  }

  toString(): string {
    if (!this.location) {
      return `${this.name}: ${this.message}`;
    }
    const { start } = this.location.range;
    return `${this.location.uri}:${start.line + 1}:${start.character + 1}: ${this.message}`;
  }
}

/**
 * Malformed schema text (the dialect's SyntaxError; named so it does not
 * shadow the JavaScript global)
 */
export class SchemaSyntaxError extends CompilerError {
  readonly code = ERROR_CODES.SYNTAX_ERROR;

  constructor(message: string, location: Location) {
    super(message, location);
  }
}

/**
 * A schema file could not be found or read
 */
export class SchemaLoadError extends CompilerError {
  readonly code = ERROR_CODES.LOAD_ERROR;

  constructor(message: string, readonly importPath: string, location?: Location) {
    super(message, location);
  }
}

/**
 * A type name that does not resolve to a declaration visible from the
 * referencing field or method
 */
export class UnresolvedReferenceError extends CompilerError {
  readonly code = ERROR_CODES.UNRESOLVED_REFERENCE;

  constructor(
    message: string,
    readonly typeName: string,
    readonly referrer: string,
    location: Location
  ) {
    super(message, location);
  }
}

/**
 * Two symbols sharing one fully qualified name
 */
export class DuplicateDeclarationError extends CompilerError {
  readonly code = ERROR_CODES.DUPLICATE_DECLARATION;

  constructor(
    message: string,
    readonly fullName: string,
    location: Location,
    readonly previous?: Location
  ) {
    super(message, location);
  }

  override get relatedLocations(): Array<{ location: Location; message: string }> {
    return this.previous ? [{ location: this.previous, message: `"${this.fullName}" first defined here` }] : [];
  }
}

/**
 * The import graph contains a cycle. `chain` starts and ends with the same file.
 */
export class ImportCycleError extends CompilerError {
  readonly code = ERROR_CODES.IMPORT_CYCLE;

  constructor(readonly chain: string[], location?: Location) {
    super(`Import cycle detected: ${chain.join(' -> ')}`, location);
  }
}

/**
 * Semantic schema violations: wire numbers, reserved names, modifier misuse
 */
export class SchemaError extends CompilerError {
  readonly code = ERROR_CODES.SCHEMA_ERROR;

  constructor(message: string, location: Location) {
    super(message, location);
  }
}

/**
 * Invalid compiler configuration, from a config file or the command line
 */
export class ConfigError extends CompilerError {
  readonly code = ERROR_CODES.CONFIG_ERROR;

  constructor(message: string, location?: Location) {
    super(message, location);
  }
}

export function isCompilerError(value: unknown): value is CompilerError {
  return value instanceof CompilerError;
}
