/**
 * Scalar type mapping for generated code
 */

import { ScalarType } from '../core/ast';

export interface ScalarInfo {
  /** TypeScript type of the value */
  tsType: string;
  /** Reader and Writer method handling the type */
  method: string;
  /** Expression for the default value */
  defaultLiteral: string;
}

const SCALARS: Record<ScalarType, ScalarInfo> = {
  double: { tsType: 'number', method: 'double', defaultLiteral: '0' },
  float: { tsType: 'number', method: 'float', defaultLiteral: '0' },
  int32: { tsType: 'number', method: 'int32', defaultLiteral: '0' },
  uint32: { tsType: 'number', method: 'uint32', defaultLiteral: '0' },
  sint32: { tsType: 'number', method: 'sint32', defaultLiteral: '0' },
  fixed32: { tsType: 'number', method: 'fixed32', defaultLiteral: '0' },
  sfixed32: { tsType: 'number', method: 'sfixed32', defaultLiteral: '0' },
  int64: { tsType: 'bigint', method: 'int64', defaultLiteral: 'BigInt(0)' },
  uint64: { tsType: 'bigint', method: 'uint64', defaultLiteral: 'BigInt(0)' },
  sint64: { tsType: 'bigint', method: 'sint64', defaultLiteral: 'BigInt(0)' },
  fixed64: { tsType: 'bigint', method: 'fixed64', defaultLiteral: 'BigInt(0)' },
  sfixed64: { tsType: 'bigint', method: 'sfixed64', defaultLiteral: 'BigInt(0)' },
  bool: { tsType: 'boolean', method: 'bool', defaultLiteral: 'false' },
  string: { tsType: 'string', method: 'string', defaultLiteral: "''" },
  bytes: { tsType: 'Uint8Array', method: 'bytes', defaultLiteral: 'new Uint8Array(0)' }
};

export function scalarInfo(scalar: ScalarType): ScalarInfo {
  return SCALARS[scalar];
}

/**
 * Condition that holds when `expr` differs from the scalar's default, i.e.
 * when an implicit-presence field has to be written. Negative zero counts as
 * set for floating point types.
 */
export function nonDefaultCondition(scalar: ScalarType, expr: string): string {
  switch (scalar) {
    case 'double':
    case 'float':
      return `${expr} !== 0 || Object.is(${expr}, -0)`;
    case 'bool':
      return expr;
    case 'string':
      return `${expr} !== ''`;
    case 'bytes':
      return `${expr}.length !== 0`;
    default:
      return `${expr} !== ${SCALARS[scalar].defaultLiteral}`;
  }
}
