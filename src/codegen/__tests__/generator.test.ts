/**
 * Tests for per-file generation
 */

import { Project } from 'ts-morph';
import { codecOf, compileAndLoad, compileInMemory, findFile, hex } from '../../__tests__/generatedModules';

function importLines(content: string): string[] {
  return content.split('\n').filter(line => line.startsWith('import '));
}

describe('CodeGenerator', () => {
  const files = {
    'shop/order.proto': `syntax = "proto3";
package shop;
import "google/protobuf/timestamp.proto";
import "shop/money.proto";

// A placed order
message Order {
  option deprecated = true;
  message Line { Money price = 1; }
  enum State { STATE_UNSPECIFIED = 0; }
  repeated Line lines = 1;
  google.protobuf.Timestamp placed_at = 2;
}
`,
    'shop/money.proto': 'syntax = "proto3"; package shop; message Money { int64 cents = 1; }'
  };

  it('should write one file per schema of the closure', () => {
    const generated = compileInMemory(files, ['shop/order.proto']);
    expect(generated.map(f => [f.importName, f.outputPath])).toEqual([
      ['google/protobuf/timestamp.proto', 'google/protobuf/timestamp.ts'],
      ['shop/money.proto', 'shop/money.ts'],
      ['shop/order.proto', 'shop/order.ts']
    ]);
    expect(generated[2].sourceUri).toBe('file:///schemas/shop/order.proto');
  });

  it('should start every file with the generated header', () => {
    const { content } = findFile(compileInMemory(files, ['shop/order.proto']), 'shop/order.ts');
    expect(content.startsWith('// Code generated by wirecraft. DO NOT EDIT.\n// source: shop/order.proto\n\n')).toBe(true);
  });

  it('should import the runtime and each dependency once', () => {
    const { content } = findFile(compileInMemory(files, ['shop/order.proto']), 'shop/order.ts');
    expect(importLines(content)).toEqual([
      "import * as $runtime from 'wirecraft/runtime';",
      "import * as $google_protobuf_timestamp from '../google/protobuf/timestamp';",
      "import * as $shop_money from './money';"
    ]);
  });

  it('should give dependencies with colliding names distinct namespaces', () => {
    const colliding = {
      'a-b.proto': 'syntax = "proto3"; package ab1; message X { int32 v = 1; }',
      'a_b.proto': 'syntax = "proto3"; package ab2; message Y { string s = 1; }',
      'main.proto': 'syntax = "proto3"; import "a-b.proto"; import "a_b.proto"; message M { ab1.X x = 1; ab2.Y y = 2; }'
    };
    const { content } = findFile(compileInMemory(colliding, ['main.proto']), 'main.ts');
    expect(importLines(content)).toEqual([
      "import * as $runtime from 'wirecraft/runtime';",
      "import * as $a_b from './a-b';",
      "import * as $a_b_2 from './a_b';"
    ]);

    const codec = codecOf(compileAndLoad(colliding), 'main.ts', 'M');
    const message = codec.create({ x: { v: 1 }, y: { s: 'a' } });
    expect(hex(codec.toBinary(message))).toBe('0a 02 08 01 12 03 0a 01 61');
    expect(codec.fromBinary(codec.toBinary(message))).toEqual(message);
  });

  it('should import the runtime from the configured module', () => {
    const { content } = findFile(
      compileInMemory(files, ['shop/order.proto'], { runtimeModule: '../runtime' }),
      'shop/money.ts'
    );
    expect(importLines(content)).toEqual(["import * as $runtime from '../runtime';"]);
  });

  it('should not import the runtime into enum-only files', () => {
    const { content } = findFile(
      compileInMemory({ 'kinds.proto': 'syntax = "proto3"; enum Kind { KIND_UNSPECIFIED = 0; }' }),
      'kinds.ts'
    );
    expect(importLines(content)).toEqual([]);
  });

  it('should name nested declarations after their path and keep docs', () => {
    const { content } = findFile(compileInMemory(files, ['shop/order.proto']), 'shop/order.ts');
    const sourceFile = new Project({ useInMemoryFileSystem: true }).createSourceFile('order.ts', content);

    expect(sourceFile.getInterfaces().map(i => i.getName())).toEqual(['Order', 'Order_Line']);
    expect(sourceFile.getEnums().map(e => e.getName())).toEqual(['Order_State']);
    expect(sourceFile.getInterfaceOrThrow('Order').getProperties().map(p => [p.getName(), p.getTypeNode()?.getText()])).toEqual([
      ['lines', 'Order_Line[]'],
      ['placedAt', '$google_protobuf_timestamp.Timestamp'],
      ['$unknown', 'Uint8Array[]']
    ]);
    const docs = sourceFile.getInterfaceOrThrow('Order').getJsDocs().map(doc => doc.getInnerText());
    expect(docs).toHaveLength(1);
    expect(docs[0]).toContain('A placed order');
    expect(docs[0]).toContain('@deprecated');
  });

  it('should generate identical output for identical input', () => {
    const first = compileInMemory(files, ['shop/order.proto']).map(f => f.content);
    const second = compileInMemory(files, ['shop/order.proto']).map(f => f.content);
    expect(second).toEqual(first);
  });
});
