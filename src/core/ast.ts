/**
 * Abstract Syntax Tree types for proto3 schema files
 */

export interface Position {
  line: number;
  character: number;
}

export interface Range {
  start: Position;
  end: Position;
}

export interface Location {
  uri: string;
  range: Range;
}

export interface ProtoNode {
  type: string;
  range: Range;
  comments?: string;
}

export type OptionValue = string | number | boolean;

export interface ProtoFile extends ProtoNode {
  type: 'file';
  uri: string;
  syntax?: SyntaxStatement;
  package?: PackageStatement;
  imports: ImportStatement[];
  options: OptionStatement[];
  messages: MessageDefinition[];
  enums: EnumDefinition[];
  services: ServiceDefinition[];
}

export interface SyntaxStatement extends ProtoNode {
  type: 'syntax';
  version: 'proto3';
}

export interface PackageStatement extends ProtoNode {
  type: 'package';
  name: string;
}

export interface ImportStatement extends ProtoNode {
  type: 'import';
  path: string;
  modifier?: 'weak' | 'public';
}

export interface OptionStatement extends ProtoNode {
  type: 'option';
  name: string;
  value: OptionValue;
}

export interface MessageDefinition extends ProtoNode {
  type: 'message';
  name: string;
  nameRange: Range;
  fields: FieldDefinition[];
  maps: MapFieldDefinition[];
  oneofs: OneofDefinition[];
  nestedMessages: MessageDefinition[];
  nestedEnums: EnumDefinition[];
  options: OptionStatement[];
  reserved: ReservedStatement[];
}

export type FieldModifier = 'optional' | 'repeated';

export interface FieldDefinition extends ProtoNode {
  type: 'field';
  modifier?: FieldModifier;
  fieldType: string;
  fieldTypeRange: Range;
  name: string;
  nameRange: Range;
  number: number;
  options: FieldOption[];
  /** Name of the enclosing oneof, when the field is a oneof member */
  oneof?: string;
}

export interface MapFieldDefinition extends ProtoNode {
  type: 'map';
  keyType: string;
  keyTypeRange: Range;
  valueType: string;
  valueTypeRange: Range;
  name: string;
  nameRange: Range;
  number: number;
  options: FieldOption[];
}

export interface FieldOption extends ProtoNode {
  type: 'field_option';
  name: string;
  value: OptionValue;
}

export interface OneofDefinition extends ProtoNode {
  type: 'oneof';
  name: string;
  nameRange: Range;
  fields: FieldDefinition[];
  options: OptionStatement[];
}

export interface EnumDefinition extends ProtoNode {
  type: 'enum';
  name: string;
  nameRange: Range;
  values: EnumValue[];
  options: OptionStatement[];
  reserved: ReservedStatement[];
}

export interface EnumValue extends ProtoNode {
  type: 'enum_value';
  name: string;
  nameRange: Range;
  number: number;
  options: FieldOption[];
}

export interface ServiceDefinition extends ProtoNode {
  type: 'service';
  name: string;
  nameRange: Range;
  rpcs: RpcDefinition[];
  options: OptionStatement[];
}

export interface RpcDefinition extends ProtoNode {
  type: 'rpc';
  name: string;
  nameRange: Range;
  requestType: string;
  requestTypeRange: Range;
  requestStreaming: boolean;
  responseType: string;
  responseTypeRange: Range;
  responseStreaming: boolean;
  options: OptionStatement[];
}

export interface ReservedStatement extends ProtoNode {
  type: 'reserved';
  ranges: ReservedRange[];
  names: string[];
}

/** Inclusive range; `end` is already expanded when the schema said `max` */
export interface ReservedRange {
  start: number;
  end: number;
}

// Built-in scalar types
export const SCALAR_TYPES = [
  'double',
  'float',
  'int32',
  'int64',
  'uint32',
  'uint64',
  'sint32',
  'sint64',
  'fixed32',
  'fixed64',
  'sfixed32',
  'sfixed64',
  'bool',
  'string',
  'bytes'
] as const;

export type ScalarType = typeof SCALAR_TYPES[number];

export const MAP_KEY_TYPES: readonly ScalarType[] = [
  'int32',
  'int64',
  'uint32',
  'uint64',
  'sint32',
  'sint64',
  'fixed32',
  'fixed64',
  'sfixed32',
  'sfixed64',
  'bool',
  'string'
];

export function isScalarType(name: string): name is ScalarType {
  return SCALAR_TYPES.some(type => type === name);
}

/**
 * Look up an option by name on a list of statements or field options
 */
export function findOption(
  options: ReadonlyArray<{ name: string; value: OptionValue }>,
  name: string
): OptionValue | undefined {
  for (let i = options.length - 1; i >= 0; i--) {
    if (options[i].name === name) {
      return options[i].value;
    }
  }
  return undefined;
}
