/**
 * Tests for the schema parser
 */

import { parseIntegerLiteral, ProtoParser } from '../parser';
import { FIELD_NUMBER } from '../../utils/constants';
import { SchemaSyntaxError } from '../../utils/errors';

const URI = 'file:///schemas/test.proto';

function parseError(text: string, parser = new ProtoParser()): SchemaSyntaxError {
  try {
    parser.parse(text, URI);
  } catch (error) {
    if (error instanceof SchemaSyntaxError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a syntax error');
}

describe('ProtoParser', () => {
  let parser: ProtoParser;

  beforeEach(() => {
    parser = new ProtoParser();
  });

  describe('parse', () => {
    it('should parse an empty file', () => {
      const file = parser.parse('', URI);
      expect(file.type).toBe('file');
      expect(file.syntax).toBeUndefined();
      expect(file.messages).toEqual([]);
    });

    it('should parse header statements', () => {
      const file = parser.parse(`syntax = "proto3";
package shop.v1;
import "common.proto";
import public "money.proto";
option (my.opt) = "tail";
`, URI);

      expect(file.syntax?.version).toBe('proto3');
      expect(file.package?.name).toBe('shop.v1');
      expect(file.imports.map(i => [i.path, i.modifier])).toEqual([
        ['common.proto', undefined],
        ['money.proto', 'public']
      ]);
      expect(file.options[0]).toMatchObject({ name: '(my.opt)', value: 'tail' });
    });

    it('should parse message bodies', () => {
      const file = parser.parse(`syntax = "proto3";
// An order line
message Line {
  string sku = 1;
  repeated int32 counts = 2 [packed = false];
  map<string, Line> children = 3;
  oneof choice {
    string name = 4;
    int64 id = 0x5;
  }
  reserved 8, 10 to 12, 20 to max;
  reserved "old";
  enum Kind { KIND_UNSPECIFIED = 0; KIND_BACK = -1; }
}
`, URI);

      const line = file.messages[0];
      expect(line.name).toBe('Line');
      expect(line.comments).toBe('An order line');
      expect(line.fields.map(f => [f.name, f.number])).toEqual([
        ['sku', 1],
        ['counts', 2],
        ['name', 4],
        ['id', 5]
      ]);
      expect(line.fields[1]).toMatchObject({ modifier: 'repeated', fieldType: 'int32' });
      expect(line.fields[1].options[0]).toMatchObject({ name: 'packed', value: false });
      expect(line.maps[0]).toMatchObject({ keyType: 'string', valueType: 'Line', name: 'children', number: 3 });
      expect(line.oneofs[0].fields.map(f => f.name)).toEqual(['name', 'id']);
      expect(line.fields[3].oneof).toBe('choice');
      expect(line.reserved[0].ranges).toEqual([
        { start: 8, end: 8 },
        { start: 10, end: 12 },
        { start: 20, end: FIELD_NUMBER.MAX }
      ]);
      expect(line.reserved[1].names).toEqual(['old']);
      expect(line.nestedEnums[0].values.map(v => v.number)).toEqual([0, -1]);
    });

    it('should parse services and streaming markers', () => {
      const file = parser.parse(`syntax = "proto3";
service Orders {
  rpc Get (Line) returns (Line);
  rpc Watch (Line) returns (stream Line) { option deprecated = true; }
  rpc Upload (stream .shop.v1.Line) returns (stream) {}
}
`, URI);

      const rpcs = file.services[0].rpcs;
      expect(rpcs.map(r => [r.name, r.requestStreaming, r.responseStreaming])).toEqual([
        ['Get', false, false],
        ['Watch', false, true],
        ['Upload', true, false]
      ]);
      expect(rpcs[1].options[0]).toMatchObject({ name: 'deprecated', value: true });
      expect(rpcs[2].requestType).toBe('.shop.v1.Line');
      expect(rpcs[2].responseType).toBe('stream');
    });

    it('should decode string escapes and concatenate adjacent literals', () => {
      const file = parser.parse(String.raw`option (my.opt) = "a\x41\101\n" 'b';`, URI);
      expect(file.options[0].value).toBe('aAA\nb');
    });

    it('should accept optional labels only when enabled', () => {
      const text = 'syntax = "proto3"; message A { optional int32 x = 1; }';
      expect(parseError(text).message).toBe(
        'Explicit "optional" labels are disallowed unless allowExplicitOptionalPresence is enabled ' +
        '(--experimental_allow_proto3_optional)'
      );

      const file = new ProtoParser({ allowExplicitOptionalPresence: true }).parse(text, URI);
      expect(file.messages[0].fields[0].modifier).toBe('optional');
    });
  });

  describe('errors', () => {
    it('should reject other syntax versions at the version string', () => {
      const error = parseError('syntax = "proto2";');
      expect(error.message).toBe('Unsupported syntax "proto2"; only "proto3" is accepted');
      expect(error.code).toBe('syntax-error');
      expect(error.location).toEqual({
        uri: URI,
        range: { start: { line: 0, character: 9 }, end: { line: 0, character: 17 } }
      });
    });

    it('should require syntax to come first', () => {
      expect(parseError('package a;\nsyntax = "proto3";').message).toBe(
        'The syntax statement must be the first statement in the file'
      );
    });

    it('should report the token found where another was expected', () => {
      const error = parseError('message A {\n  int32 x = 1\n}');
      expect(error.message).toBe('Expected ";", found "}"');
      expect(error.location?.range.start).toEqual({ line: 2, character: 0 });
    });

    it.each([
      ['message A { required int32 x = 1; }', 'Required fields are not allowed in proto3'],
      ['message A { int32 x = 1 [default = 5]; }', 'Explicit default values are not allowed in proto3'],
      ['extend Foo { int32 x = 1; }', 'Extensions are not supported in this dialect'],
      ['message A { oneof o {} }', 'Oneof "o" must have at least one field'],
      ['message A { oneof o { repeated int32 x = 1; } }', 'Fields in oneofs must not have labels'],
      ['message A { map<string, map<string, int32>> m = 1; }', 'Map values cannot be maps'],
      ['message A { reserved 5 to 2; }', 'Reserved range end must not be less than its start'],
      ['import "a.proto;', 'Unterminated string literal'],
      ['/* open', 'Unterminated block comment'],
      ['message A { int32 x = 1; } #', 'Unexpected character "#"'],
      ['message a.B {}', 'Expected message name, found qualified name "a.B"']
    ])('should reject %s', (text, message) => {
      expect(parseError(text).message).toBe(message);
    });
  });
});

describe('parseIntegerLiteral', () => {
  it('should read decimal, hex and octal literals', () => {
    expect(parseIntegerLiteral('42')).toBe(42);
    expect(parseIntegerLiteral('0x1F')).toBe(31);
    expect(parseIntegerLiteral('017')).toBe(15);
    expect(parseIntegerLiteral('-5')).toBe(-5);
    expect(parseIntegerLiteral('0')).toBe(0);
  });

  it('should reject anything else', () => {
    expect(parseIntegerLiteral('1.5')).toBeUndefined();
    expect(parseIntegerLiteral('09')).toBeUndefined();
    expect(parseIntegerLiteral('x')).toBeUndefined();
  });
});
