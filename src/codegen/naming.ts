/**
 * Generated identifiers for one output file
 */

import * as path from 'path';
import { Declaration, ResolvedFile, ResolvedGraph } from '../core/graph';
import { escapeIdentifier, moduleAlias, nestedTypeName, toLowerCamelCase } from '../shared/namingUtils';
import { SchemaError } from '../utils/errors';
import { DEFAULT_CONFIG } from '../utils/constants';

/**
 * Locals used inside generated function bodies; a declaration generated
 * under one of these names would be shadowed there
 */
const GENERATED_LOCALS = new Set([
  'reader', 'writer', 'message', 'tag', 'start', 'end', 'length', 'input', 'init', 'bytes',
  'key', 'value', 'entryEnd', 'entryTag', 'request', 'requests', 'responses', 'context',
  'options', 'implementation', 'element', 'chunk', 'oneof'
]);

/** Namespace the runtime is imported under */
export const RUNTIME_ALIAS = '$runtime';

/** Client members a method name must not take over */
const CLIENT_MEMBERS = new Set(['constructor', 'transport']);

/**
 * Output path of a schema's generated file: `a/b.proto` -> `a/b.ts`
 */
export function outputPathFor(importName: string): string {
  return importName.replace(/\.proto$/, '') + DEFAULT_CONFIG.GENERATED_EXTENSION;
}

/**
 * Module specifier for importing `target` from `from` (both import names)
 */
export function relativeModuleSpecifier(from: string, target: string): string {
  const relative = path.posix.relative(path.posix.dirname(from), target.replace(/\.proto$/, ''));
  return relative.startsWith('.') ? relative : `./${relative}`;
}

/**
 * Method name used on clients, server interfaces and definitions
 */
export function methodPropertyName(rpcName: string): string {
  const name = toLowerCamelCase(rpcName);
  return CLIENT_MEMBERS.has(name) ? `${name}_` : name;
}

export class FileNames {
  private readonly topLevel = new Map<string, string>();
  // Dependency URI -> namespace alias, unique within the file
  private readonly aliases = new Map<string, string>();

  constructor(private readonly graph: ResolvedGraph, private readonly file: ResolvedFile) {
    const taken = new Set([RUNTIME_ALIAS]);
    for (const uri of file.dependencies) {
      const base = moduleAlias(graph.file(uri)?.importName ?? uri);
      let alias = base;
      for (let n = 2; taken.has(alias); n++) {
        alias = `${base}_${n}`;
      }
      taken.add(alias);
      this.aliases.set(uri, alias);
    }
  }

  /**
   * Namespace a dependency's generated module is imported under
   */
  importAlias(uri: string): string {
    const alias = this.aliases.get(uri);
    if (alias === undefined) {
      throw new Error(`${uri} is not a dependency of ${this.file.importName}`);
    }
    return alias;
  }

  /**
   * Name of a message or enum declared in any file
   */
  localName(decl: Declaration): string {
    const name = nestedTypeName(decl.fullName, decl.package);
    return GENERATED_LOCALS.has(name) ? `${name}_` : name;
  }

  /**
   * Expression referring to a message or enum from this file, qualified by
   * the module alias when it is declared elsewhere
   */
  typeReference(index: number): string {
    const decl = this.graph.declarations[index];
    const name = this.localName(decl);
    if (decl.fileUri === this.file.uri) {
      return name;
    }
    return `${this.importAlias(decl.fileUri)}.${name}`;
  }

  /**
   * Reserve a top-level name, failing when two declarations would generate it
   */
  claim(name: string, owner: string, decl: Declaration): string {
    const previous = this.topLevel.get(name);
    if (previous !== undefined) {
      throw new SchemaError(
        `"${owner}" and "${previous}" both generate the name "${name}" in ${outputPathFor(this.file.importName)}`,
        decl.location
      );
    }
    this.topLevel.set(name, owner);
    return name;
  }

  serviceNames(serviceName: string): { definition: string; client: string; server: string; bind: string } {
    const base = escapeIdentifier(serviceName).replace(/_$/, '');
    return {
      definition: `${base}Definition`,
      client: `${base}Client`,
      server: `${base}Server`,
      bind: `bind${base}Server`
    };
  }
}
