/**
 * Field Model Builder
 * Derives the wire-level model of every field, message and enum of a
 * resolved graph, rejecting schemas that cannot be encoded
 */

import { EnumValue, Location, MAP_KEY_TYPES, ScalarType, findOption, isScalarType } from './ast';
import { EnumDecl, MessageDecl, ResolvedField, ResolvedGraph, TypeRef } from './graph';
import { makeTag, WireType } from '../runtime/wire';
import { toLowerCamelCase } from '../shared/namingUtils';
import { ENUM_VALUE, FIELD_NUMBER } from '../utils/constants';
import { SchemaError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * How presence of a field is represented in the generated object
 * - implicit: plain value, absent equals the default and is never encoded
 * - wrapped: `optional` scalar/enum, `T | undefined`
 * - message: message-typed field, `T | undefined`
 * - repeated: `T[]`, absent decodes to `[]`
 * - map: `Map<K, V>`, absent decodes to an empty map
 * - oneof: member of a discriminated union property
 */
export type Presence = 'implicit' | 'wrapped' | 'message' | 'repeated' | 'map' | 'oneof';

export type DefaultValue = number | bigint | boolean | string | Uint8Array | undefined;

export interface FieldModel {
  name: string;
  fullName: string;
  /** lowerCamelCase property name in generated code */
  propertyName: string;
  number: number;
  /** Element type (map value type for maps) */
  type: TypeRef;
  /** Key scalar of map fields */
  mapKey?: ScalarType;
  presence: Presence;
  /** Wire type of one element as written unpacked */
  wireType: WireType;
  /** Tag written for one element (or the whole entry, for maps and packed fields) */
  tag: number;
  packed: boolean;
  /** True for repeated numeric, bool and enum fields, which decode both forms */
  packable: boolean;
  /** Oneof name for oneof members */
  oneof?: string;
  /** Default of the element type: what an implicit field reads as when absent */
  defaultValue: DefaultValue;
  comments?: string;
  location: Location;
}

export interface OneofModel {
  name: string;
  propertyName: string;
  /** Members in declaration order */
  fields: FieldModel[];
  comments?: string;
}

export interface MessageModel {
  index: number;
  decl: MessageDecl;
  /** Declaration order */
  fields: FieldModel[];
  /** Ascending field number: the encode order */
  fieldsByNumber: FieldModel[];
  oneofs: OneofModel[];
}

export interface EnumModel {
  index: number;
  decl: EnumDecl;
  values: EnumValue[];
  allowAlias: boolean;
}

/**
 * Wire type of an unpacked scalar element
 */
export function scalarWireType(scalar: ScalarType): WireType {
  switch (scalar) {
    case 'double':
    case 'fixed64':
    case 'sfixed64':
      return WireType.Bit64;
    case 'float':
    case 'fixed32':
    case 'sfixed32':
      return WireType.Bit32;
    case 'string':
    case 'bytes':
      return WireType.LengthDelimited;
    default:
      return WireType.Varint;
  }
}

export function scalarDefault(scalar: ScalarType): DefaultValue {
  switch (scalar) {
    case 'int64':
    case 'uint64':
    case 'sint64':
    case 'fixed64':
    case 'sfixed64':
      return BigInt(0);
    case 'bool':
      return false;
    case 'string':
      return '';
    case 'bytes':
      return new Uint8Array(0);
    default:
      return 0;
  }
}

function isPackableType(type: TypeRef): boolean {
  return type.kind === 'enum' || (type.kind === 'scalar' && type.scalar !== 'string' && type.scalar !== 'bytes');
}

export class SchemaModel {
  constructor(
    readonly graph: ResolvedGraph,
    private readonly messages: ReadonlyMap<number, MessageModel>,
    private readonly enums: ReadonlyMap<number, EnumModel>
  ) {}

  message(index: number): MessageModel {
    const model = this.messages.get(index);
    if (!model) {
      throw new Error(`No message model for declaration ${index}`);
    }
    return model;
  }

  enum(index: number): EnumModel {
    const model = this.enums.get(index);
    if (!model) {
      throw new Error(`No enum model for declaration ${index}`);
    }
    return model;
  }
}

export class FieldModelBuilder {
  build(graph: ResolvedGraph): SchemaModel {
    const messages = new Map<number, MessageModel>();
    const enums = new Map<number, EnumModel>();

    for (const decl of graph.declarations) {
      if (decl.kind === 'message') {
        messages.set(decl.index, this.buildMessage(decl));
      } else if (decl.kind === 'enum') {
        enums.set(decl.index, this.buildEnum(decl));
      }
    }

    logger.debug(`Built field models for ${messages.size} message(s) and ${enums.size} enum(s)`);
    return new SchemaModel(graph, messages, enums);
  }

  private buildMessage(decl: MessageDecl): MessageModel {
    const reservedRanges = decl.node.reserved.flatMap(r => r.ranges);
    const reservedNames = new Set(decl.node.reserved.flatMap(r => r.names));
    const byNumber = new Map<number, FieldModel>();
    const properties = new Map<string, string>();

    const claimProperty = (propertyName: string, owner: string, location: Location) => {
      const previous = properties.get(propertyName);
      if (previous !== undefined) {
        throw new SchemaError(
          `"${owner}" and "${previous}" in "${decl.fullName}" both generate the property "${propertyName}"`,
          location
        );
      }
      properties.set(propertyName, owner);
    };

    const fields: FieldModel[] = [];
    for (const field of decl.fields) {
      this.validateNumber(field, decl, reservedRanges);

      if (reservedNames.has(field.name)) {
        throw new SchemaError(`Field name "${field.name}" is reserved in "${decl.fullName}"`, field.location);
      }

      const previous = byNumber.get(field.number);
      if (previous) {
        throw new SchemaError(
          `Field number ${field.number} has already been used in "${decl.fullName}" by field "${previous.name}"`,
          field.location
        );
      }

      const model = this.buildField(field);
      byNumber.set(field.number, model);
      if (model.presence !== 'oneof') {
        claimProperty(model.propertyName, field.name, field.location);
      }
      fields.push(model);
    }

    const oneofs: OneofModel[] = decl.oneofs.map(oneof => {
      const propertyName = toLowerCamelCase(oneof.name);
      claimProperty(propertyName, oneof.name, { uri: decl.fileUri, range: oneof.node.nameRange });

      const members = fields.filter(f => f.oneof === oneof.name);
      // Members share one union, so their case names must differ
      const caseNames = new Map<string, string>();
      for (const member of members) {
        const clash = caseNames.get(member.propertyName);
        if (clash !== undefined) {
          throw new SchemaError(
            `Oneof "${oneof.name}" members "${member.name}" and "${clash}" both generate the case "${member.propertyName}"`,
            member.location
          );
        }
        caseNames.set(member.propertyName, member.name);
      }
      return { name: oneof.name, propertyName, fields: members, comments: oneof.node.comments };
    });

    const fieldsByNumber = [...fields].sort((a, b) => a.number - b.number);
    return { index: decl.index, decl, fields, fieldsByNumber, oneofs };
  }

  private validateNumber(field: ResolvedField, decl: MessageDecl, reservedRanges: Array<{ start: number; end: number }>): void {
    const n = field.number;
    if (n < FIELD_NUMBER.MIN || n > FIELD_NUMBER.MAX) {
      throw new SchemaError(
        `Field number ${n} of "${field.fullName}" is out of range [${FIELD_NUMBER.MIN}, ${FIELD_NUMBER.MAX}]`,
        field.location
      );
    }
    if (n >= FIELD_NUMBER.RESERVED_RANGE_START && n <= FIELD_NUMBER.RESERVED_RANGE_END) {
      throw new SchemaError(
        `Field number ${n} of "${field.fullName}" is in the implementation-reserved range ` +
        `(${FIELD_NUMBER.RESERVED_RANGE_START}-${FIELD_NUMBER.RESERVED_RANGE_END})`,
        field.location
      );
    }
    if (reservedRanges.some(r => n >= r.start && n <= r.end)) {
      throw new SchemaError(`Field number ${n} is reserved in "${decl.fullName}"`, field.location);
    }
  }

  private buildField(field: ResolvedField): FieldModel {
    const base = {
      name: field.name,
      fullName: field.fullName,
      propertyName: toLowerCamelCase(field.name),
      number: field.number,
      type: field.type,
      comments: field.node.comments,
      location: field.location
    };

    const packedOption = findOption(field.options, 'packed');

    if (field.label === 'map') {
      const keyType = field.mapKeyType ?? '';
      if (!isScalarType(keyType) || !MAP_KEY_TYPES.includes(keyType)) {
        throw new SchemaError(
          `Map key type of "${field.fullName}" must be an integral, bool or string scalar, not "${keyType}"`,
          field.location
        );
      }
      if (packedOption !== undefined) {
        throw new SchemaError(`[packed] cannot be set on map field "${field.fullName}"`, field.location);
      }
      return {
        ...base,
        mapKey: keyType,
        presence: 'map',
        wireType: WireType.LengthDelimited,
        tag: makeTag(field.number, WireType.LengthDelimited),
        packed: false,
        packable: false,
        defaultValue: undefined
      };
    }

    const elementWireType = field.type.kind === 'scalar'
      ? scalarWireType(field.type.scalar)
      : field.type.kind === 'enum' ? WireType.Varint : WireType.LengthDelimited;
    const defaultValue = field.type.kind === 'scalar'
      ? scalarDefault(field.type.scalar)
      : field.type.kind === 'enum' ? 0 : undefined;

    if (packedOption !== undefined && (field.label !== 'repeated' || !isPackableType(field.type))) {
      throw new SchemaError(
        `[packed] can only be specified for repeated numeric, bool or enum fields ("${field.fullName}")`,
        field.location
      );
    }

    if (field.label === 'repeated') {
      const packable = isPackableType(field.type);
      const packed = packable && packedOption !== false;
      return {
        ...base,
        presence: 'repeated',
        wireType: elementWireType,
        tag: makeTag(field.number, packed ? WireType.LengthDelimited : elementWireType),
        packed,
        packable,
        defaultValue
      };
    }

    let presence: Presence;
    if (field.oneof !== undefined) {
      presence = 'oneof';
    } else if (field.type.kind === 'message') {
      if (field.label === 'optional') {
        throw new SchemaError(
          `"optional" is not allowed on message-typed field "${field.fullName}": message fields always track presence`,
          field.location
        );
      }
      presence = 'message';
    } else {
      presence = field.label === 'optional' ? 'wrapped' : 'implicit';
    }

    return {
      ...base,
      presence,
      wireType: elementWireType,
      tag: makeTag(field.number, elementWireType),
      packed: false,
      packable: false,
      oneof: field.oneof,
      defaultValue
    };
  }

  private buildEnum(decl: EnumDecl): EnumModel {
    const location = (value: EnumValue): Location => ({ uri: decl.fileUri, range: value.nameRange });
    const allowAlias = findOption(decl.node.options, 'allow_alias') === true;
    const reservedRanges = decl.node.reserved.flatMap(r => r.ranges);
    const reservedNames = new Set(decl.node.reserved.flatMap(r => r.names));
    const seen = new Map<number, string>();

    for (const value of decl.values) {
      if (value.number < ENUM_VALUE.MIN || value.number > ENUM_VALUE.MAX) {
        throw new SchemaError(`Enum value ${decl.fullName}.${value.name} = ${value.number} is out of int32 range`, location(value));
      }
      if (reservedRanges.some(r => value.number >= r.start && value.number <= r.end)) {
        throw new SchemaError(`Enum value number ${value.number} is reserved in "${decl.fullName}"`, location(value));
      }
      if (reservedNames.has(value.name)) {
        throw new SchemaError(`Enum value name "${value.name}" is reserved in "${decl.fullName}"`, location(value));
      }
      const previous = seen.get(value.number);
      if (previous !== undefined && !allowAlias) {
        throw new SchemaError(
          `"${value.name}" uses the same number (${value.number}) as "${previous}" in "${decl.fullName}"; ` +
          'set "option allow_alias = true;" to allow aliases',
          location(value)
        );
      }
      if (previous === undefined) {
        seen.set(value.number, value.name);
      }
    }

    if (!seen.has(0)) {
      throw new SchemaError(
        `Enum "${decl.fullName}" must contain a value with number 0, used as its default`,
        decl.location
      );
    }

    return { index: decl.index, decl, values: decl.values, allowAlias };
  }
}

/**
 * Build field models for every message and enum in the graph
 */
export function buildFieldModels(graph: ResolvedGraph): SchemaModel {
  return new FieldModelBuilder().build(graph);
}
