/**
 * Compile pipeline
 * text -> syntax trees -> resolved graph -> field models -> generated modules
 */

import { GeneratedFile, generateFiles } from '../codegen/generator';
import { buildFieldModels } from '../core/fieldModel';
import { ResolvedGraph } from '../core/graph';
import { loadSchemas } from '../core/loader';
import { resolveSchemas } from '../core/resolver';
import { SchemaSource } from '../core/schemaSource';
import { logger } from '../utils/logger';
import { CompilerOptions, DEFAULT_OPTIONS } from '../utils/types';

export interface CompileResult {
  graph: ResolvedGraph;
  /** One file per schema of the import closure, dependencies first */
  files: GeneratedFile[];
}

/**
 * Compile entry schemas and their imports. Throws the first CompilerError
 * met; nothing is returned for a schema set with errors.
 */
export function compileSchemas(
  entryPaths: string[],
  options: Partial<CompilerOptions> = {},
  source?: SchemaSource
): CompileResult {
  const resolved: CompilerOptions = { ...DEFAULT_OPTIONS, ...options };
  const start = Date.now();

  const schemaSet = loadSchemas(entryPaths, {
    includePaths: resolved.includePaths,
    allowExplicitOptionalPresence: resolved.allowExplicitOptionalPresence,
    source
  });
  const graph = resolveSchemas(schemaSet);
  const models = buildFieldModels(graph);
  const files = generateFiles(models, {
    buildClient: resolved.buildClient,
    buildServer: resolved.buildServer,
    runtimeModule: resolved.runtimeModule
  });

  logger.verboseWithContext(`Compiled ${files.length} file(s)`, {
    operation: 'compile',
    duration: Date.now() - start
  });
  return { graph, files };
}

/**
 * Generated files for the entry schemas' import closure
 */
export function compile(
  entryPaths: string[],
  options: Partial<CompilerOptions> = {},
  source?: SchemaSource
): GeneratedFile[] {
  return compileSchemas(entryPaths, options, source).files;
}
