/**
 * wirecraft compiler API
 * The wire runtime used by generated code is exported from `wirecraft/runtime`.
 */

export * from './core/ast';
export { parseSchema, ProtoParser, ParseOptions } from './core/parser';
export { SchemaSource, NodeSchemaSource, InMemorySchemaSource, getBundledSchemaDirectory } from './core/schemaSource';
export { SchemaLoader, SchemaSet, LoadedFile, LoaderOptions, loadSchemas } from './core/loader';
export { ResolvedGraph, Declaration, MessageDecl, EnumDecl, ServiceDecl, TypeRef } from './core/graph';
export { SymbolResolver, resolveSchemas } from './core/resolver';
export { FieldModel, MessageModel, EnumModel, SchemaModel, Presence, buildFieldModels } from './core/fieldModel';
export * from './codegen';
export { compile, compileSchemas, CompileResult } from './compiler/compile';
export { runBuild, BuildResult } from './compiler/build';
export {
  CompilerError,
  SchemaSyntaxError,
  SchemaLoadError,
  UnresolvedReferenceError,
  DuplicateDeclarationError,
  ImportCycleError,
  SchemaError,
  ConfigError,
  isCompilerError
} from './utils/errors';
export { toDiagnostic, toFileDiagnostic, formatCompilerError, FileDiagnostic } from './utils/diagnostics';
export { ConfigManager } from './utils/configManager';
export { CompilerOptions, DEFAULT_OPTIONS } from './utils/types';
export { logger, Logger, LogLevel } from './utils/logger';
