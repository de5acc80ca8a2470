/**
 * Resolved declaration graph
 * Index-addressed table of every message, enum and service in the import
 * closure. References between declarations are indices into `declarations`,
 * so recursive messages need no back-pointers.
 */

import {
  EnumDefinition,
  EnumValue,
  FieldDefinition,
  FieldOption,
  Location,
  MapFieldDefinition,
  MessageDefinition,
  OneofDefinition,
  ProtoFile,
  RpcDefinition,
  ScalarType,
  ServiceDefinition
} from './ast';

export type TypeRef =
  | { kind: 'scalar'; scalar: ScalarType }
  | { kind: 'message'; index: number }
  | { kind: 'enum'; index: number };

/** How a field was declared */
export type FieldLabel = 'singular' | 'optional' | 'repeated' | 'map';

export interface ResolvedField {
  name: string;
  /** Full name of the field, used in error messages */
  fullName: string;
  number: number;
  label: FieldLabel;
  /** Element type; for maps, the value type */
  type: TypeRef;
  /** Declared key type of a map field, validated by the field model builder */
  mapKeyType?: string;
  /** Name of the oneof the field belongs to */
  oneof?: string;
  options: FieldOption[];
  node: FieldDefinition | MapFieldDefinition;
  location: Location;
}

export interface ResolvedOneof {
  name: string;
  node: OneofDefinition;
  /** Member field names in declaration order */
  fields: string[];
}

export interface ResolvedMethod {
  name: string;
  fullName: string;
  /** Index of the request message */
  input: number;
  /** Index of the response message */
  output: number;
  clientStreaming: boolean;
  serverStreaming: boolean;
  node: RpcDefinition;
  location: Location;
}

interface DeclarationBase {
  index: number;
  name: string;
  fullName: string;
  package: string;
  fileUri: string;
  location: Location;
  /** Index of the enclosing message for nested declarations */
  parent?: number;
}

export interface MessageDecl extends DeclarationBase {
  kind: 'message';
  node: MessageDefinition;
  /** Fields in declaration order, oneof members and map fields included */
  fields: ResolvedField[];
  oneofs: ResolvedOneof[];
  /** Indices of nested messages and enums, in declaration order */
  nested: number[];
}

export interface EnumDecl extends DeclarationBase {
  kind: 'enum';
  node: EnumDefinition;
  values: EnumValue[];
}

export interface ServiceDecl extends DeclarationBase {
  kind: 'service';
  node: ServiceDefinition;
  methods: ResolvedMethod[];
}

export type Declaration = MessageDecl | EnumDecl | ServiceDecl;

export interface ResolvedFile {
  uri: string;
  importName: string;
  package: string;
  ast: ProtoFile;
  /** Top-level declarations, in declaration order */
  declarations: number[];
  /** URIs of other files whose declarations this file references, ordered by import name */
  dependencies: string[];
}

export class ResolvedGraph {
  private readonly byUri = new Map<string, ResolvedFile>();

  constructor(
    readonly files: readonly ResolvedFile[],
    readonly declarations: readonly Declaration[],
    private readonly byName: ReadonlyMap<string, number>
  ) {
    for (const file of files) {
      this.byUri.set(file.uri, file);
    }
  }

  /**
   * Look up a declaration by fully qualified name (no leading dot)
   */
  get(fullName: string): Declaration | undefined {
    const index = this.byName.get(fullName.startsWith('.') ? fullName.slice(1) : fullName);
    return index === undefined ? undefined : this.declarations[index];
  }

  file(uri: string): ResolvedFile | undefined {
    return this.byUri.get(uri);
  }

  message(index: number): MessageDecl {
    const decl = this.declarations[index];
    if (decl?.kind !== 'message') {
      throw new Error(`Declaration ${index} is not a message`);
    }
    return decl;
  }

  enum(index: number): EnumDecl {
    const decl = this.declarations[index];
    if (decl?.kind !== 'enum') {
      throw new Error(`Declaration ${index} is not an enum`);
    }
    return decl;
  }

  /**
   * Every declaration of a file, nested ones included, in the order they
   * appear in the schema
   */
  declarationsIn(uri: string): Declaration[] {
    const file = this.byUri.get(uri);
    if (!file) {
      return [];
    }
    const result: Declaration[] = [];
    const walk = (index: number) => {
      const decl = this.declarations[index];
      result.push(decl);
      if (decl.kind === 'message') {
        decl.nested.forEach(walk);
      }
    };
    file.declarations.forEach(walk);
    return result;
  }
}
