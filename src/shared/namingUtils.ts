/**
 * Naming conventions for generated code
 *
 * Schema style vs generated TypeScript:
 * - Messages/Enums/Services: PascalCase, nested names joined with `_` (Outer_Inner)
 * - Fields and oneofs: snake_case in the schema, lowerCamelCase properties
 * - RPCs: PascalCase in the schema, lowerCamelCase client methods and handlers
 * - Enum values: kept as declared
 */

import reservedIdentifiers from './reservedIdentifiers.json';

const RESERVED = new Set<string>([...reservedIdentifiers.keywords, ...reservedIdentifiers.globals]);

/**
 * Check if a name is a JavaScript/TypeScript keyword or a global that a
 * generated top-level declaration would shadow
 */
export function isReservedIdentifier(name: string): boolean {
  return RESERVED.has(name);
}

/**
 * Append `_` to names that clash with keywords or globals
 */
export function escapeIdentifier(name: string): string {
  return isReservedIdentifier(name) ? `${name}_` : name;
}

/**
 * Convert a snake_case schema name to lowerCamelCase.
 * Each underscore is dropped and capitalizes the letter after it; the first
 * character is lowercased (`user_name` -> `userName`, `Field_2` -> `field2`).
 */
export function toLowerCamelCase(name: string): string {
  let result = '';
  let capitalizeNext = false;
  for (const ch of name) {
    if (ch === '_') {
      capitalizeNext = true;
    } else if (capitalizeNext) {
      result += ch.toUpperCase();
      capitalizeNext = false;
    } else {
      result += ch;
    }
  }
  return result.charAt(0).toLowerCase() + result.slice(1);
}

/**
 * Generated name of a declaration: its path below the package joined with `_`
 */
export function nestedTypeName(fullName: string, pkg: string): string {
  const relative = pkg && fullName.startsWith(`${pkg}.`) ? fullName.slice(pkg.length + 1) : fullName;
  return escapeIdentifier(relative.split('.').join('_'));
}

/**
 * Module alias for an imported generated file: `google/protobuf/timestamp.proto`
 * becomes `$google_protobuf_timestamp`
 */
export function moduleAlias(importName: string): string {
  const stem = importName.replace(/\.proto$/, '');
  return `$${stem.replace(/[^A-Za-z0-9_]/g, '_')}`;
}
