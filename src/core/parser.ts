/**
 * Schema Parser
 * Parses proto3 schema text into an AST, failing fast on the first error
 */

import {
  ProtoFile,
  SyntaxStatement,
  PackageStatement,
  ImportStatement,
  OptionStatement,
  OptionValue,
  MessageDefinition,
  EnumDefinition,
  ServiceDefinition,
  FieldDefinition,
  FieldModifier,
  MapFieldDefinition,
  OneofDefinition,
  EnumValue,
  RpcDefinition,
  ReservedStatement,
  ReservedRange,
  Range,
  Position,
  FieldOption,
  ProtoNode
} from './ast';
import { ENUM_VALUE, FIELD_NUMBER } from '../utils/constants';
import { SchemaSyntaxError } from '../utils/errors';

type TokenType = 'identifier' | 'number' | 'string' | 'punctuation';

interface Token {
  type: TokenType;
  /** Decoded text: string literals are unquoted and unescaped */
  value: string;
  range: Range;
  comment?: string;
}

export interface ParseOptions {
  /** Accept the `optional` field label (explicit presence on scalar and enum fields) */
  allowExplicitOptionalPresence: boolean;
}

const DEFAULT_PARSE_OPTIONS: ParseOptions = {
  allowExplicitOptionalPresence: false
};

const PUNCTUATION = '{}[]()<>;=,:+-';

const INTEGER_LITERAL = /^[-+]?(0[xX][0-9a-fA-F]+|0[0-7]*|[1-9][0-9]*)$/;

/**
 * Parse an integer literal (decimal, hex or octal, optionally signed)
 */
export function parseIntegerLiteral(text: string): number | undefined {
  if (!INTEGER_LITERAL.test(text)) {
    return undefined;
  }
  const negative = text.startsWith('-');
  const digits = text.replace(/^[-+]/, '');
  let value: number;
  if (/^0[xX]/.test(digits)) {
    value = parseInt(digits.slice(2), 16);
  } else if (digits.length > 1 && digits.startsWith('0')) {
    value = parseInt(digits.slice(1), 8);
  } else {
    value = parseInt(digits, 10);
  }
  return negative ? -value : value;
}

export class ProtoParser {
  private tokens: Token[] = [];
  private pos = 0;
  private uri = '';
  private lines: string[] = [];
  private options: ParseOptions = DEFAULT_PARSE_OPTIONS;

  constructor(options: Partial<ParseOptions> = {}) {
    this.options = { ...DEFAULT_PARSE_OPTIONS, ...options };
  }

  parse(text: string, uri: string): ProtoFile {
    this.uri = uri;
    this.lines = text.split('\n');
    this.pos = 0;
    this.tokens = this.tokenize(text);

    const file: ProtoFile = {
      type: 'file',
      uri,
      imports: [],
      options: [],
      messages: [],
      enums: [],
      services: [],
      range: {
        start: { line: 0, character: 0 },
        end: this.endOfText()
      }
    };

    let statementCount = 0;
    while (!this.isAtEnd()) {
      this.parseTopLevel(file, statementCount === 0);
      statementCount++;
    }

    return file;
  }

  private endOfText(): Position {
    const lastLine = this.lines.length - 1;
    return { line: lastLine, character: this.lines[lastLine]?.length ?? 0 };
  }

  private error(message: string, range?: Range): SchemaSyntaxError {
    const at = range ?? { start: this.endOfText(), end: this.endOfText() };
    return new SchemaSyntaxError(message, { uri: this.uri, range: at });
  }

  private tokenize(text: string): Token[] {
    const tokens: Token[] = [];
    let line = 0;
    let character = 0;
    let i = 0;

    // Comment buffer for attaching to next token
    let pendingComment: string[] = [];

    const here = (): Position => ({ line, character });
    const advanceChar = () => {
      if (text[i] === '\n') {
        line++;
        character = 0;
      } else {
        character++;
      }
      i++;
    };

    while (i < text.length) {
      const start = here();
      const ch = text[i];

      // Skip whitespace
      if (/\s/.test(ch)) {
        advanceChar();
        continue;
      }

      // Single-line comment
      if (ch === '/' && text[i + 1] === '/') {
        const from = i;
        while (i < text.length && text[i] !== '\n') {
          advanceChar();
        }
        pendingComment.push(text.slice(from + 2, i).trim());
        continue;
      }

      // Multi-line comment
      if (ch === '/' && text[i + 1] === '*') {
        advanceChar();
        advanceChar();
        const from = i;
        while (i < text.length && !(text[i] === '*' && text[i + 1] === '/')) {
          advanceChar();
        }
        if (i >= text.length) {
          throw this.error('Unterminated block comment', { start, end: here() });
        }
        const commentContent = text.slice(from, i)
          .split('\n')
          .map(l => l.replace(/^\s*\*\s?/, '').trim())
          .join('\n')
          .trim();
        pendingComment.push(commentContent);
        advanceChar();
        advanceChar();
        continue;
      }

      // Store any accumulated comments with the next token
      const comment = pendingComment.length > 0 ? pendingComment.join('\n') : undefined;
      pendingComment = [];

      // String literal
      if (ch === '"' || ch === "'") {
        const quote = ch;
        advanceChar();
        let value = '';
        while (text[i] !== quote) {
          if (i >= text.length || text[i] === '\n') {
            throw this.error('Unterminated string literal', { start, end: here() });
          }
          if (text[i] === '\\') {
            const escapeStart = here();
            advanceChar();
            const [decoded, consumed] = this.readEscape(text, i, escapeStart);
            for (let k = 0; k < consumed; k++) {
              advanceChar();
            }
            value += decoded;
          } else {
            value += text[i];
            advanceChar();
          }
        }
        advanceChar(); // closing quote
        tokens.push({ type: 'string', value, range: { start, end: here() }, comment });
        continue;
      }

      // Number
      if (/[0-9]/.test(ch) || (ch === '.' && /[0-9]/.test(text[i + 1] ?? ''))) {
        const from = i;
        if (ch === '0' && (text[i + 1] === 'x' || text[i + 1] === 'X')) {
          advanceChar();
          advanceChar();
          while (i < text.length && /[0-9a-fA-F]/.test(text[i])) {
            advanceChar();
          }
        } else {
          while (i < text.length && /[0-9.]/.test(text[i])) {
            advanceChar();
          }
          // Handle exponent
          if (text[i] === 'e' || text[i] === 'E') {
            advanceChar();
            if (text[i] === '+' || text[i] === '-') {
              advanceChar();
            }
            while (i < text.length && /[0-9]/.test(text[i])) {
              advanceChar();
            }
          }
        }
        if (i < text.length && /[a-zA-Z_]/.test(text[i])) {
          throw this.error('Need space between number and identifier', { start, end: here() });
        }
        tokens.push({ type: 'number', value: text.slice(from, i), range: { start, end: here() }, comment });
        continue;
      }

      // Identifier, dotted name, or fully qualified name with a leading dot
      if (/[a-zA-Z_]/.test(ch) || (ch === '.' && /[a-zA-Z_]/.test(text[i + 1] ?? ''))) {
        const from = i;
        advanceChar();
        while (i < text.length && /[a-zA-Z0-9_.]/.test(text[i])) {
          advanceChar();
        }
        const value = text.slice(from, i);
        if (value.endsWith('.') || value.includes('..')) {
          throw this.error(`Invalid name "${value}"`, { start, end: here() });
        }
        tokens.push({ type: 'identifier', value, range: { start, end: here() }, comment });
        continue;
      }

      // Punctuation
      if (PUNCTUATION.includes(ch)) {
        advanceChar();
        tokens.push({ type: 'punctuation', value: ch, range: { start, end: here() }, comment });
        continue;
      }

      advanceChar();
      throw this.error(`Unexpected character "${ch}"`, { start, end: here() });
    }

    return tokens;
  }

  /**
   * Decode the escape sequence starting right after a backslash.
   * Returns the decoded text and how many source characters it used.
   */
  private readEscape(text: string, index: number, start: Position): [string, number] {
    const ch = text[index];
    const simple: Record<string, string> = {
      n: '\n', t: '\t', r: '\r', a: '\x07', b: '\b', f: '\f', v: '\v',
      '\\': '\\', "'": "'", '"': '"', '?': '?'
    };
    if (ch !== undefined && ch in simple) {
      return [simple[ch], 1];
    }
    if (ch === 'x' || ch === 'X') {
      const hex = /^[0-9a-fA-F]{1,2}/.exec(text.slice(index + 1));
      if (hex) {
        return [String.fromCharCode(parseInt(hex[0], 16)), 1 + hex[0].length];
      }
    }
    if (ch !== undefined && /[0-7]/.test(ch)) {
      const octal = /^[0-7]{1,3}/.exec(text.slice(index));
      if (octal) {
        return [String.fromCharCode(parseInt(octal[0], 8)), octal[0].length];
      }
    }
    if (ch === 'u' || ch === 'U') {
      const width = ch === 'u' ? 4 : 8;
      const digits = text.slice(index + 1, index + 1 + width);
      if (new RegExp(`^[0-9a-fA-F]{${width}}$`).test(digits)) {
        const codePoint = parseInt(digits, 16);
        if (codePoint <= 0x10ffff) {
          return [String.fromCodePoint(codePoint), 1 + width];
        }
      }
    }
    throw this.error('Invalid escape sequence in string literal', {
      start,
      end: { line: start.line, character: start.character + 2 }
    });
  }

  private isAtEnd(): boolean {
    return this.pos >= this.tokens.length;
  }

  private peek(offset = 0): Token | undefined {
    return this.tokens[this.pos + offset];
  }

  private advance(): Token {
    const token = this.tokens[this.pos];
    if (!token) {
      throw this.error('Unexpected end of input');
    }
    this.pos++;
    return token;
  }

  private describe(token: Token | undefined): string {
    if (!token) {
      return 'end of input';
    }
    return token.type === 'string' ? `string "${token.value}"` : `"${token.value}"`;
  }

  private expect(type: TokenType, value?: string, what?: string): Token {
    const token = this.peek();
    if (!token || token.type !== type || (value !== undefined && token.value !== value)) {
      const expected = what ?? (value !== undefined ? `"${value}"` : type);
      throw this.error(`Expected ${expected}, found ${this.describe(token)}`, token?.range);
    }
    this.pos++;
    return token;
  }

  private expectName(what: string): Token {
    const token = this.expect('identifier', undefined, what);
    if (token.value.includes('.')) {
      throw this.error(`Expected ${what}, found qualified name "${token.value}"`, token.range);
    }
    return token;
  }

  private expectInteger(what: string): { value: number; token: Token } {
    const sign = this.match('punctuation', '-') || this.match('punctuation', '+') ? this.advance() : undefined;
    const token = this.expect('number', undefined, what);
    const value = parseIntegerLiteral(`${sign?.value ?? ''}${token.value}`);
    if (value === undefined) {
      throw this.error(`Expected ${what}, found "${token.value}"`, token.range);
    }
    return { value, token };
  }

  private match(type: TokenType, value?: string): boolean {
    const token = this.peek();
    return token !== undefined && token.type === type && (value === undefined || token.value === value);
  }

  private attachComment(node: ProtoNode, token: Token): void {
    if (token.comment) {
      node.comments = token.comment;
    }
  }

  private span(start: Token, end: Token): Range {
    return { start: start.range.start, end: end.range.end };
  }

  private parseTopLevel(file: ProtoFile, isFirstStatement: boolean): void {
    const token = this.advance();
    this.pos--;

    if (token.type === 'punctuation' && token.value === ';') {
      this.advance();
      return;
    }

    if (token.type !== 'identifier') {
      throw this.error(`Expected top-level statement, found ${this.describe(token)}`, token.range);
    }

    switch (token.value) {
      case 'syntax':
        if (!isFirstStatement) {
          throw this.error('The syntax statement must be the first statement in the file', token.range);
        }
        file.syntax = this.parseSyntax();
        break;
      case 'edition':
        throw this.error('Editions are not supported; use syntax = "proto3"', token.range);
      case 'package':
        if (file.package) {
          throw this.error('Multiple package definitions', token.range);
        }
        file.package = this.parsePackage();
        break;
      case 'import':
        file.imports.push(this.parseImport());
        break;
      case 'option':
        file.options.push(this.parseOption());
        break;
      case 'message':
        file.messages.push(this.parseMessage());
        break;
      case 'enum':
        file.enums.push(this.parseEnum());
        break;
      case 'service':
        file.services.push(this.parseService());
        break;
      case 'extend':
        throw this.error('Extensions are not supported in this dialect', token.range);
      default:
        throw this.error(`Expected top-level statement, found ${this.describe(token)}`, token.range);
    }
  }

  private parseSyntax(): SyntaxStatement {
    const startToken = this.expect('identifier', 'syntax');
    this.expect('punctuation', '=');
    const versionToken = this.expect('string', undefined, 'syntax version string');
    const endToken = this.expect('punctuation', ';');

    if (versionToken.value !== 'proto3') {
      throw this.error(
        `Unsupported syntax "${versionToken.value}"; only "proto3" is accepted`,
        versionToken.range
      );
    }

    const node: SyntaxStatement = {
      type: 'syntax',
      version: 'proto3',
      range: this.span(startToken, endToken)
    };
    this.attachComment(node, startToken);
    return node;
  }

  private parsePackage(): PackageStatement {
    const startToken = this.expect('identifier', 'package');
    const nameToken = this.expect('identifier', undefined, 'package name');
    if (nameToken.value.startsWith('.')) {
      throw this.error(`Invalid package name "${nameToken.value}"`, nameToken.range);
    }
    const endToken = this.expect('punctuation', ';');

    const node: PackageStatement = {
      type: 'package',
      name: nameToken.value,
      range: this.span(startToken, endToken)
    };
    this.attachComment(node, startToken);
    return node;
  }

  private parseImport(): ImportStatement {
    const startToken = this.expect('identifier', 'import');
    let modifier: 'weak' | 'public' | undefined;

    if (this.match('identifier', 'weak') || this.match('identifier', 'public')) {
      modifier = this.advance().value === 'weak' ? 'weak' : 'public';
    }

    const pathToken = this.expect('string', undefined, 'import path string');
    const endToken = this.expect('punctuation', ';');

    const node: ImportStatement = {
      type: 'import',
      path: pathToken.value,
      modifier,
      range: this.span(startToken, endToken)
    };
    this.attachComment(node, startToken);
    return node;
  }

  /**
   * Option name: `ident(.ident)*` or `(full.name)(.ident)*`
   */
  private parseOptionName(): string {
    let name = '';
    if (this.match('punctuation', '(')) {
      this.advance();
      const inner = this.expect('identifier', undefined, 'option name');
      this.expect('punctuation', ')');
      name = `(${inner.value})`;
    } else {
      name = this.expect('identifier', undefined, 'option name').value;
    }

    // Sub-field paths after a parenthesised name arrive as ".name" identifiers
    while (this.match('identifier') && this.peek()?.value.startsWith('.')) {
      name += this.advance().value;
    }
    return name;
  }

  private parseOptionValue(): { value: OptionValue; end: Token } {
    if (this.match('punctuation', '{')) {
      return this.parseAggregateValue();
    }

    const sign = this.match('punctuation', '-') || this.match('punctuation', '+') ? this.advance() : undefined;
    const valueToken = this.advance();

    if (valueToken.type === 'string' && !sign) {
      let value = valueToken.value;
      let end = valueToken;
      // Adjacent string literals concatenate
      while (this.match('string')) {
        end = this.advance();
        value += end.value;
      }
      return { value, end };
    }
    if (valueToken.type === 'number') {
      const integer = parseIntegerLiteral(valueToken.value);
      const magnitude = integer ?? parseFloat(valueToken.value);
      return { value: sign?.value === '-' ? -magnitude : magnitude, end: valueToken };
    }
    if (valueToken.type === 'identifier') {
      if (valueToken.value === 'inf' || valueToken.value === 'nan') {
        const magnitude = valueToken.value === 'inf' ? Infinity : NaN;
        return { value: sign?.value === '-' ? -magnitude : magnitude, end: valueToken };
      }
      if (!sign && valueToken.value === 'true') {
        return { value: true, end: valueToken };
      }
      if (!sign && valueToken.value === 'false') {
        return { value: false, end: valueToken };
      }
      if (!sign) {
        return { value: valueToken.value, end: valueToken };
      }
    }
    throw this.error(`Expected option value, found ${this.describe(valueToken)}`, valueToken.range);
  }

  /**
   * Aggregate (text format) option values are kept as their source text
   */
  private parseAggregateValue(): { value: OptionValue; end: Token } {
    const open = this.expect('punctuation', '{');
    const parts: string[] = [];
    let depth = 1;
    let end = open;
    while (depth > 0) {
      end = this.advance();
      if (end.type === 'punctuation' && end.value === '{') {
        depth++;
      } else if (end.type === 'punctuation' && end.value === '}') {
        depth--;
        if (depth === 0) {
          break;
        }
      }
      parts.push(end.type === 'string' ? JSON.stringify(end.value) : end.value);
    }
    return { value: `{ ${parts.join(' ')} }`, end };
  }

  private parseOption(): OptionStatement {
    const startToken = this.expect('identifier', 'option');
    const name = this.parseOptionName();
    this.expect('punctuation', '=');
    const { value } = this.parseOptionValue();
    const endToken = this.expect('punctuation', ';');

    const node: OptionStatement = {
      type: 'option',
      name,
      value,
      range: this.span(startToken, endToken)
    };
    this.attachComment(node, startToken);
    return node;
  }

  private parseFieldOptions(): FieldOption[] {
    if (!this.match('punctuation', '[')) {
      return [];
    }

    this.advance();
    const options: FieldOption[] = [];

    for (;;) {
      const startToken = this.peek();
      const name = this.parseOptionName();
      this.expect('punctuation', '=');
      const { value, end } = this.parseOptionValue();

      if (name === 'default') {
        throw this.error('Explicit default values are not allowed in proto3', startToken?.range);
      }

      options.push({
        type: 'field_option',
        name,
        value,
        range: { start: startToken?.range.start ?? end.range.start, end: end.range.end }
      });

      if (this.match('punctuation', ',')) {
        this.advance();
        continue;
      }
      break;
    }

    this.expect('punctuation', ']');
    return options;
  }

  private parseMessage(): MessageDefinition {
    const startToken = this.expect('identifier', 'message');
    const nameToken = this.expectName('message name');
    this.expect('punctuation', '{');

    const message: MessageDefinition = {
      type: 'message',
      name: nameToken.value,
      nameRange: nameToken.range,
      fields: [],
      maps: [],
      oneofs: [],
      nestedMessages: [],
      nestedEnums: [],
      options: [],
      reserved: [],
      range: { start: startToken.range.start, end: startToken.range.end }
    };
    this.attachComment(message, startToken);

    while (!this.match('punctuation', '}')) {
      const token = this.advance();
      this.pos--;

      if (token.type === 'punctuation' && token.value === ';') {
        this.advance();
        continue;
      }
      if (token.type !== 'identifier') {
        throw this.error(`Expected message body element, found ${this.describe(token)}`, token.range);
      }

      switch (token.value) {
        case 'message':
          message.nestedMessages.push(this.parseMessage());
          break;
        case 'enum':
          message.nestedEnums.push(this.parseEnum());
          break;
        case 'oneof':
          message.oneofs.push(this.parseOneof(message));
          break;
        case 'option':
          message.options.push(this.parseOption());
          break;
        case 'reserved':
          message.reserved.push(this.parseReserved(FIELD_NUMBER.MAX));
          break;
        case 'extensions':
        case 'extend':
          throw this.error('Extensions are not supported in this dialect', token.range);
        case 'required':
          throw this.error('Required fields are not allowed in proto3', token.range);
        case 'map':
          if (this.peek(1)?.value === '<') {
            message.maps.push(this.parseMapField());
          } else {
            message.fields.push(this.parseField());
          }
          break;
        default:
          message.fields.push(this.parseField());
      }
    }

    const endToken = this.expect('punctuation', '}');
    message.range.end = endToken.range.end;

    return message;
  }

  private parseField(oneof?: string): FieldDefinition {
    const firstToken = this.advance();
    this.pos--;
    let modifier: FieldModifier | undefined;

    if (this.match('identifier', 'optional') || this.match('identifier', 'repeated')) {
      const labelToken = this.advance();
      if (oneof !== undefined) {
        throw this.error('Fields in oneofs must not have labels', labelToken.range);
      }
      if (labelToken.value === 'optional' && !this.options.allowExplicitOptionalPresence) {
        throw this.error(
          'Explicit "optional" labels are disallowed unless allowExplicitOptionalPresence is enabled ' +
          '(--experimental_allow_proto3_optional)',
          labelToken.range
        );
      }
      modifier = labelToken.value === 'optional' ? 'optional' : 'repeated';

      const next = this.peek();
      if (next?.type === 'identifier' && ['optional', 'repeated', 'required'].includes(next.value)) {
        throw this.error(`Unexpected second label "${next.value}"`, next.range);
      }
      if (next?.value === 'group') {
        throw this.error('Groups are not supported in proto3', next.range);
      }
      if (next?.value === 'map' && this.peek(1)?.value === '<') {
        throw this.error('Map fields cannot have labels', next.range);
      }
    }

    const typeToken = this.expect('identifier', undefined, 'field type');
    const nameToken = this.expectName('field name');
    this.expect('punctuation', '=');
    const { value: number } = this.expectInteger('field number');

    const options = this.parseFieldOptions();
    const endToken = this.expect('punctuation', ';');

    const node: FieldDefinition = {
      type: 'field',
      modifier,
      fieldType: typeToken.value,
      fieldTypeRange: typeToken.range,
      name: nameToken.value,
      nameRange: nameToken.range,
      number,
      options,
      oneof,
      range: this.span(firstToken, endToken)
    };
    this.attachComment(node, firstToken);
    return node;
  }

  private parseMapField(): MapFieldDefinition {
    const startToken = this.expect('identifier', 'map');
    this.expect('punctuation', '<');
    const keyTypeToken = this.expect('identifier', undefined, 'map key type');
    this.expect('punctuation', ',');
    const valueTypeToken = this.expect('identifier', undefined, 'map value type');
    if (valueTypeToken.value === 'map') {
      throw this.error('Map values cannot be maps', valueTypeToken.range);
    }
    this.expect('punctuation', '>');
    const nameToken = this.expectName('field name');
    this.expect('punctuation', '=');
    const { value: number } = this.expectInteger('field number');
    const options = this.parseFieldOptions();
    const endToken = this.expect('punctuation', ';');

    const node: MapFieldDefinition = {
      type: 'map',
      keyType: keyTypeToken.value,
      keyTypeRange: keyTypeToken.range,
      valueType: valueTypeToken.value,
      valueTypeRange: valueTypeToken.range,
      name: nameToken.value,
      nameRange: nameToken.range,
      number,
      options,
      range: this.span(startToken, endToken)
    };
    this.attachComment(node, startToken);
    return node;
  }

  private parseOneof(message: MessageDefinition): OneofDefinition {
    const startToken = this.expect('identifier', 'oneof');
    const nameToken = this.expectName('oneof name');
    this.expect('punctuation', '{');

    const oneof: OneofDefinition = {
      type: 'oneof',
      name: nameToken.value,
      nameRange: nameToken.range,
      fields: [],
      options: [],
      range: { start: startToken.range.start, end: startToken.range.end }
    };
    this.attachComment(oneof, startToken);

    while (!this.match('punctuation', '}')) {
      const token = this.advance();
      this.pos--;

      if (token.type === 'punctuation' && token.value === ';') {
        this.advance();
        continue;
      }
      if (token.value === 'option') {
        oneof.options.push(this.parseOption());
      } else if (token.value === 'map' && this.peek(1)?.value === '<') {
        throw this.error('Map fields are not allowed in oneofs', token.range);
      } else if (token.value === 'required') {
        throw this.error('Fields in oneofs must not have labels', token.range);
      } else if (token.type === 'identifier') {
        const field = this.parseField(oneof.name);
        oneof.fields.push(field);
        message.fields.push(field);
      } else {
        throw this.error(`Expected oneof field, found ${this.describe(token)}`, token.range);
      }
    }

    const endToken = this.expect('punctuation', '}');
    oneof.range.end = endToken.range.end;

    if (oneof.fields.length === 0) {
      throw this.error(`Oneof "${oneof.name}" must have at least one field`, oneof.nameRange);
    }

    return oneof;
  }

  private parseEnum(): EnumDefinition {
    const startToken = this.expect('identifier', 'enum');
    const nameToken = this.expectName('enum name');
    this.expect('punctuation', '{');

    const enumDef: EnumDefinition = {
      type: 'enum',
      name: nameToken.value,
      nameRange: nameToken.range,
      values: [],
      options: [],
      reserved: [],
      range: { start: startToken.range.start, end: startToken.range.end }
    };
    this.attachComment(enumDef, startToken);

    while (!this.match('punctuation', '}')) {
      const token = this.advance();
      this.pos--;

      if (token.type === 'punctuation' && token.value === ';') {
        this.advance();
      } else if (token.value === 'option') {
        enumDef.options.push(this.parseOption());
      } else if (token.value === 'reserved') {
        enumDef.reserved.push(this.parseReserved(ENUM_VALUE.MAX));
      } else if (token.type === 'identifier') {
        enumDef.values.push(this.parseEnumValue());
      } else {
        throw this.error(`Expected enum value, found ${this.describe(token)}`, token.range);
      }
    }

    const endToken = this.expect('punctuation', '}');
    enumDef.range.end = endToken.range.end;

    return enumDef;
  }

  private parseEnumValue(): EnumValue {
    const nameToken = this.expectName('enum value name');
    this.expect('punctuation', '=');
    const { value: number } = this.expectInteger('enum value number');
    const options = this.parseFieldOptions();
    const endToken = this.expect('punctuation', ';');

    const node: EnumValue = {
      type: 'enum_value',
      name: nameToken.value,
      nameRange: nameToken.range,
      number,
      options,
      range: this.span(nameToken, endToken)
    };
    this.attachComment(node, nameToken);
    return node;
  }

  private parseService(): ServiceDefinition {
    const startToken = this.expect('identifier', 'service');
    const nameToken = this.expectName('service name');
    this.expect('punctuation', '{');

    const service: ServiceDefinition = {
      type: 'service',
      name: nameToken.value,
      nameRange: nameToken.range,
      rpcs: [],
      options: [],
      range: { start: startToken.range.start, end: startToken.range.end }
    };
    this.attachComment(service, startToken);

    while (!this.match('punctuation', '}')) {
      const token = this.advance();
      this.pos--;

      if (token.type === 'punctuation' && token.value === ';') {
        this.advance();
      } else if (token.value === 'rpc') {
        service.rpcs.push(this.parseRpc());
      } else if (token.value === 'option') {
        service.options.push(this.parseOption());
      } else {
        throw this.error(`Expected "rpc" or "option", found ${this.describe(token)}`, token.range);
      }
    }

    const endToken = this.expect('punctuation', '}');
    service.range.end = endToken.range.end;

    return service;
  }

  private parseRpcType(): { streaming: boolean; token: Token } {
    this.expect('punctuation', '(');
    let streaming = false;
    // `stream` followed directly by ")" is a message named "stream"
    if (this.match('identifier', 'stream') && this.peek(1)?.type === 'identifier') {
      this.advance();
      streaming = true;
    }
    const token = this.expect('identifier', undefined, 'message type');
    this.expect('punctuation', ')');
    return { streaming, token };
  }

  private parseRpc(): RpcDefinition {
    const startToken = this.expect('identifier', 'rpc');
    const nameToken = this.expectName('method name');
    const request = this.parseRpcType();
    this.expect('identifier', 'returns');
    const response = this.parseRpcType();

    const rpc: RpcDefinition = {
      type: 'rpc',
      name: nameToken.value,
      nameRange: nameToken.range,
      requestType: request.token.value,
      requestTypeRange: request.token.range,
      requestStreaming: request.streaming,
      responseType: response.token.value,
      responseTypeRange: response.token.range,
      responseStreaming: response.streaming,
      options: [],
      range: { start: startToken.range.start, end: response.token.range.end }
    };
    this.attachComment(rpc, startToken);

    // Handle rpc body or semicolon
    if (this.match('punctuation', '{')) {
      this.advance();
      while (!this.match('punctuation', '}')) {
        if (this.match('identifier', 'option')) {
          rpc.options.push(this.parseOption());
        } else if (this.match('punctuation', ';')) {
          this.advance();
        } else {
          const token = this.peek();
          throw this.error(`Expected "option", found ${this.describe(token)}`, token?.range);
        }
      }
      const endToken = this.expect('punctuation', '}');
      rpc.range.end = endToken.range.end;
    } else {
      const endToken = this.expect('punctuation', ';');
      rpc.range.end = endToken.range.end;
    }

    return rpc;
  }

  private parseReserved(max: number): ReservedStatement {
    const startToken = this.expect('identifier', 'reserved');
    const ranges: ReservedRange[] = [];
    const names: string[] = [];

    for (;;) {
      if (this.match('string')) {
        names.push(this.advance().value);
      } else if (this.match('identifier') && this.peek()?.value !== 'max') {
        // Bare identifiers are accepted as reserved names
        names.push(this.expectName('reserved name').value);
      } else {
        const { value: startNum, token } = this.expectInteger('reserved number or name');
        let endNum = startNum;

        if (this.match('identifier', 'to')) {
          this.advance();
          if (this.match('identifier', 'max')) {
            this.advance();
            endNum = max;
          } else {
            endNum = this.expectInteger('range end').value;
          }
        }

        if (endNum < startNum) {
          throw this.error('Reserved range end must not be less than its start', token.range);
        }
        ranges.push({ start: startNum, end: endNum });
      }

      if (this.match('punctuation', ',')) {
        this.advance();
        continue;
      }
      break;
    }

    const endToken = this.expect('punctuation', ';');

    const node: ReservedStatement = {
      type: 'reserved',
      ranges,
      names,
      range: this.span(startToken, endToken)
    };
    this.attachComment(node, startToken);
    return node;
  }
}

/**
 * Parse schema text with the given options
 */
export function parseSchema(text: string, uri: string, options: Partial<ParseOptions> = {}): ProtoFile {
  return new ProtoParser(options).parse(text, uri);
}
