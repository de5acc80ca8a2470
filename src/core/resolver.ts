/**
 * Symbol Resolver
 * Merges the declarations of a loaded schema set into one namespace and links
 * every type reference to exactly one declaration
 */

import {
  EnumDefinition,
  FieldDefinition,
  Location,
  MapFieldDefinition,
  MessageDefinition,
  Range,
  ServiceDefinition,
  isScalarType
} from './ast';
import {
  Declaration,
  EnumDecl,
  MessageDecl,
  ResolvedField,
  ResolvedFile,
  ResolvedGraph,
  ServiceDecl,
  TypeRef
} from './graph';
import { LoadedFile, SchemaSet } from './loader';
import { DuplicateDeclarationError, UnresolvedReferenceError } from '../utils/errors';
import { logger } from '../utils/logger';

type SymbolKind = 'package' | 'message' | 'enum' | 'enum_value' | 'service' | 'method' | 'field' | 'oneof';

interface SymbolEntry {
  kind: SymbolKind;
  fullName: string;
  fileUri: string;
  location: Location;
  /** Declaration index for messages, enums and services */
  declaration?: number;
}

const AGGREGATE_KINDS: ReadonlySet<SymbolKind> = new Set<SymbolKind>(['package', 'message', 'enum', 'service']);

/**
 * Two-pass resolver: `collect` registers every symbol of every file before
 * `link` resolves a single reference, so declaration order never matters.
 */
export class SymbolResolver {
  private symbols = new Map<string, SymbolEntry>();
  private declarations: Declaration[] = [];
  private files = new Map<string, LoadedFile>();
  private visibility = new Map<string, Set<string>>();

  resolve(schemaSet: SchemaSet): ResolvedGraph {
    this.symbols = new Map();
    this.declarations = [];
    this.files = schemaSet.byUri;
    this.visibility = new Map();

    const resolvedFiles: ResolvedFile[] = [];
    for (const file of schemaSet.files) {
      resolvedFiles.push(this.collectFile(file));
    }

    for (const resolved of resolvedFiles) {
      this.linkFile(resolved);
    }

    const byName = new Map<string, number>();
    for (const decl of this.declarations) {
      byName.set(decl.fullName, decl.index);
    }

    logger.debug(`Resolved ${this.declarations.length} declaration(s) across ${resolvedFiles.length} file(s)`);
    return new ResolvedGraph(resolvedFiles, this.declarations, byName);
  }

  // ---------------------------------------------------------------------------
  // Pass 1: collect
  // ---------------------------------------------------------------------------

  private register(entry: SymbolEntry): void {
    const previous = this.symbols.get(entry.fullName);
    if (previous) {
      // Packages may be declared by any number of files
      if (previous.kind === 'package' && entry.kind === 'package') {
        return;
      }
      const previousFile = this.files.get(previous.fileUri)?.importName ?? previous.fileUri;
      const note = entry.kind === 'enum_value' || previous.kind === 'enum_value'
        ? ' Enum values use C++ scoping: they are siblings of their enum, not children of it.'
        : '';
      throw new DuplicateDeclarationError(
        `"${entry.fullName}" is already defined in file "${previousFile}".${note}`,
        entry.fullName,
        entry.location,
        previous.location
      );
    }
    this.symbols.set(entry.fullName, entry);
  }

  private collectFile(file: LoadedFile): ResolvedFile {
    const pkg = file.ast.package?.name ?? '';
    const uri = file.uri;

    if (pkg) {
      const range = file.ast.package?.range ?? file.ast.range;
      const parts = pkg.split('.');
      for (let i = 1; i <= parts.length; i++) {
        this.register({
          kind: 'package',
          fullName: parts.slice(0, i).join('.'),
          fileUri: uri,
          location: { uri, range }
        });
      }
    }

    const resolved: ResolvedFile = {
      uri,
      importName: file.importName,
      package: pkg,
      ast: file.ast,
      declarations: [],
      dependencies: []
    };

    for (const message of file.ast.messages) {
      resolved.declarations.push(this.collectMessage(message, pkg, pkg, uri));
    }
    for (const enumDef of file.ast.enums) {
      resolved.declarations.push(this.collectEnum(enumDef, pkg, pkg, uri));
    }
    for (const service of file.ast.services) {
      resolved.declarations.push(this.collectService(service, pkg, uri));
    }

    // Keep schema order between messages, enums and services
    resolved.declarations.sort((a, b) => compareRanges(
      this.declarations[a].node.range,
      this.declarations[b].node.range
    ));

    return resolved;
  }

  private qualify(scope: string, name: string): string {
    return scope ? `${scope}.${name}` : name;
  }

  private collectMessage(
    message: MessageDefinition,
    scope: string,
    pkg: string,
    uri: string,
    parent?: number
  ): number {
    const fullName = this.qualify(scope, message.name);
    const location = { uri, range: message.nameRange };
    const index = this.declarations.length;

    const decl: MessageDecl = {
      kind: 'message',
      index,
      name: message.name,
      fullName,
      package: pkg,
      fileUri: uri,
      location,
      parent,
      node: message,
      fields: [],
      oneofs: [],
      nested: []
    };
    this.declarations.push(decl);
    this.register({ kind: 'message', fullName, fileUri: uri, location, declaration: index });

    for (const oneof of message.oneofs) {
      this.register({
        kind: 'oneof',
        fullName: `${fullName}.${oneof.name}`,
        fileUri: uri,
        location: { uri, range: oneof.nameRange }
      });
      decl.oneofs.push({ name: oneof.name, node: oneof, fields: oneof.fields.map(f => f.name) });
    }

    const fieldNodes: Array<FieldDefinition | MapFieldDefinition> = [...message.fields, ...message.maps];
    fieldNodes.sort((a, b) => compareRanges(a.range, b.range));
    for (const node of fieldNodes) {
      this.register({
        kind: 'field',
        fullName: `${fullName}.${node.name}`,
        fileUri: uri,
        location: { uri, range: node.nameRange }
      });
    }

    const nestedNodes: Array<MessageDefinition | EnumDefinition> = [...message.nestedMessages, ...message.nestedEnums];
    nestedNodes.sort((a, b) => compareRanges(a.range, b.range));
    for (const nested of nestedNodes) {
      decl.nested.push(nested.type === 'message'
        ? this.collectMessage(nested, fullName, pkg, uri, index)
        : this.collectEnum(nested, fullName, pkg, uri, index));
    }

    return index;
  }

  private collectEnum(
    enumDef: EnumDefinition,
    scope: string,
    pkg: string,
    uri: string,
    parent?: number
  ): number {
    const fullName = this.qualify(scope, enumDef.name);
    const location = { uri, range: enumDef.nameRange };
    const index = this.declarations.length;

    const decl: EnumDecl = {
      kind: 'enum',
      index,
      name: enumDef.name,
      fullName,
      package: pkg,
      fileUri: uri,
      location,
      parent,
      node: enumDef,
      values: enumDef.values
    };
    this.declarations.push(decl);
    this.register({ kind: 'enum', fullName, fileUri: uri, location, declaration: index });

    for (const value of enumDef.values) {
      this.register({
        kind: 'enum_value',
        fullName: this.qualify(scope, value.name),
        fileUri: uri,
        location: { uri, range: value.nameRange }
      });
    }

    return index;
  }

  private collectService(service: ServiceDefinition, pkg: string, uri: string): number {
    const fullName = this.qualify(pkg, service.name);
    const location = { uri, range: service.nameRange };
    const index = this.declarations.length;

    const decl: ServiceDecl = {
      kind: 'service',
      index,
      name: service.name,
      fullName,
      package: pkg,
      fileUri: uri,
      location,
      node: service,
      methods: []
    };
    this.declarations.push(decl);
    this.register({ kind: 'service', fullName, fileUri: uri, location, declaration: index });

    for (const rpc of service.rpcs) {
      this.register({
        kind: 'method',
        fullName: `${fullName}.${rpc.name}`,
        fileUri: uri,
        location: { uri, range: rpc.nameRange }
      });
    }

    return index;
  }

  // ---------------------------------------------------------------------------
  // Pass 2: link
  // ---------------------------------------------------------------------------

  private linkFile(file: ResolvedFile): void {
    const dependencies = new Set<string>();
    const visit = (index: number) => {
      const decl = this.declarations[index];
      if (decl.kind === 'message') {
        this.linkMessage(decl, dependencies);
        decl.nested.forEach(visit);
      } else if (decl.kind === 'service') {
        this.linkService(decl, dependencies);
      }
    };
    file.declarations.forEach(visit);

    dependencies.delete(file.uri);
    file.dependencies = [...dependencies].sort((a, b) => {
      const nameA = this.files.get(a)?.importName ?? a;
      const nameB = this.files.get(b)?.importName ?? b;
      return nameA < nameB ? -1 : nameA > nameB ? 1 : 0;
    });
  }

  private linkMessage(decl: MessageDecl, dependencies: Set<string>): void {
    const nodes: Array<FieldDefinition | MapFieldDefinition> = [...decl.node.fields, ...decl.node.maps];
    nodes.sort((a, b) => compareRanges(a.range, b.range));

    for (const node of nodes) {
      const fullName = `${decl.fullName}.${node.name}`;
      const location = { uri: decl.fileUri, range: node.nameRange };

      if (node.type === 'map') {
        const type = this.resolveFieldType(node.valueType, node.valueTypeRange, decl, fullName, dependencies);
        decl.fields.push({
          name: node.name,
          fullName,
          number: node.number,
          label: 'map',
          type,
          mapKeyType: node.keyType,
          options: node.options,
          node,
          location
        });
        continue;
      }

      const field: ResolvedField = {
        name: node.name,
        fullName,
        number: node.number,
        label: node.modifier ?? 'singular',
        type: this.resolveFieldType(node.fieldType, node.fieldTypeRange, decl, fullName, dependencies),
        options: node.options,
        node,
        location
      };
      if (node.oneof !== undefined) {
        field.oneof = node.oneof;
      }
      decl.fields.push(field);
    }
  }

  private resolveFieldType(
    typeName: string,
    range: Range,
    owner: MessageDecl,
    referrer: string,
    dependencies: Set<string>
  ): TypeRef {
    if (isScalarType(typeName)) {
      return { kind: 'scalar', scalar: typeName };
    }

    const location = { uri: owner.fileUri, range };
    const target = this.lookupVisible(typeName, owner.fullName, owner.fileUri, referrer, location);
    if (target.kind === 'message' || target.kind === 'enum') {
      dependencies.add(target.fileUri);
      return { kind: target.kind, index: target.index };
    }
    throw new UnresolvedReferenceError(
      `"${typeName}" is not a message or enum type (referenced by "${referrer}")`,
      typeName,
      referrer,
      location
    );
  }

  private linkService(decl: ServiceDecl, dependencies: Set<string>): void {
    for (const rpc of decl.node.rpcs) {
      const fullName = `${decl.fullName}.${rpc.name}`;
      const resolveMessage = (typeName: string, range: Range): number => {
        const location = { uri: decl.fileUri, range };
        const target = this.lookupVisible(typeName, decl.fullName, decl.fileUri, fullName, location);
        if (target.kind !== 'message') {
          throw new UnresolvedReferenceError(
            `"${typeName}" is not a message type (referenced by "${fullName}")`,
            typeName,
            fullName,
            location
          );
        }
        dependencies.add(target.fileUri);
        return target.index;
      };

      decl.methods.push({
        name: rpc.name,
        fullName,
        input: resolveMessage(rpc.requestType, rpc.requestTypeRange),
        output: resolveMessage(rpc.responseType, rpc.responseTypeRange),
        clientStreaming: rpc.requestStreaming,
        serverStreaming: rpc.responseStreaming,
        node: rpc,
        location: { uri: decl.fileUri, range: rpc.nameRange }
      });
    }
  }

  /**
   * Look a type name up from `scope` and check the result is visible from
   * `fileUri` (declared there, imported directly, or re-exported through
   * `import public`)
   */
  private lookupVisible(
    typeName: string,
    scope: string,
    fileUri: string,
    referrer: string,
    location: Location
  ): Declaration {
    const entry = this.lookup(typeName, scope);
    if (!entry) {
      throw new UnresolvedReferenceError(
        `"${typeName}" is not defined (referenced by "${referrer}")`,
        typeName,
        referrer,
        location
      );
    }
    if (entry.declaration === undefined) {
      throw new UnresolvedReferenceError(
        `"${typeName}" resolves to "${entry.fullName}", which is not a type (referenced by "${referrer}")`,
        typeName,
        referrer,
        location
      );
    }

    if (!this.visibleFrom(fileUri).has(entry.fileUri)) {
      const definedIn = this.files.get(entry.fileUri)?.importName ?? entry.fileUri;
      const referencing = this.files.get(fileUri)?.importName ?? fileUri;
      throw new UnresolvedReferenceError(
        `"${typeName}" seems to be defined in "${definedIn}", which is not imported by "${referencing}" ` +
        `(referenced by "${referrer}")`,
        typeName,
        referrer,
        location
      );
    }

    return this.declarations[entry.declaration];
  }

  /**
   * Scoped lookup: a leading dot means fully qualified; otherwise the first
   * component of the name is searched from the innermost scope outwards, and
   * the rest of a compound name is looked up inside the first aggregate found.
   */
  private lookup(typeName: string, scope: string): SymbolEntry | undefined {
    if (typeName.startsWith('.')) {
      return this.symbols.get(typeName.slice(1));
    }

    const dot = typeName.indexOf('.');
    const firstPart = dot < 0 ? typeName : typeName.slice(0, dot);
    const scopeParts = scope ? scope.split('.') : [];

    for (;;) {
      const candidate = this.qualify(scopeParts.join('.'), firstPart);
      const found = this.symbols.get(candidate);
      if (found) {
        if (dot >= 0) {
          if (AGGREGATE_KINDS.has(found.kind)) {
            return this.symbols.get(`${candidate}${typeName.slice(dot)}`);
          }
        } else if (found.declaration !== undefined && found.kind !== 'service') {
          return found;
        }
        // Not a type: keep searching outer scopes
      }
      if (scopeParts.length === 0) {
        return undefined;
      }
      scopeParts.pop();
    }
  }

  private visibleFrom(fileUri: string): Set<string> {
    const cached = this.visibility.get(fileUri);
    if (cached) {
      return cached;
    }

    const visible = new Set<string>([fileUri]);
    const addPublicClosure = (uri: string) => {
      if (visible.has(uri)) {
        return;
      }
      visible.add(uri);
      for (const imported of this.files.get(uri)?.imports ?? []) {
        if (imported.statement.modifier === 'public') {
          addPublicClosure(imported.uri);
        }
      }
    };
    for (const imported of this.files.get(fileUri)?.imports ?? []) {
      addPublicClosure(imported.uri);
    }

    this.visibility.set(fileUri, visible);
    return visible;
  }
}

function compareRanges(a: Range, b: Range): number {
  return a.start.line - b.start.line || a.start.character - b.start.character;
}

/**
 * Resolve a loaded schema set into a linked declaration graph
 */
export function resolveSchemas(schemaSet: SchemaSet): ResolvedGraph {
  return new SymbolResolver().resolve(schemaSet);
}
