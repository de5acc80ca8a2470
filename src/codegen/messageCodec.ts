/**
 * Message Codec Generator
 * Emits, per message, an interface plus a codec object of the same name, and
 * per enum a TypeScript enum
 */

import { CodeBlockWriter, SourceFile, VariableDeclarationKind } from 'ts-morph';
import { findOption, ScalarType } from '../core/ast';
import { EnumModel, FieldModel, MessageModel, scalarWireType } from '../core/fieldModel';
import { makeTag, WireType } from '../runtime/wire';
import { FileNames } from './naming';
import { nonDefaultCondition, scalarInfo } from './scalars';

/**
 * Turn schema comments into doc comment text
 */
export function docText(comments: string | undefined, deprecated = false): string[] {
  const parts: string[] = [];
  if (comments) {
    parts.push(comments.replace(/\*\//g, '*\\/'));
  }
  if (deprecated) {
    parts.push('@deprecated');
  }
  return parts.length > 0 ? [parts.join('\n\n')] : [];
}

export class MessageCodecGenerator {
  constructor(private readonly names: FileNames) {}

  emitEnum(sourceFile: SourceFile, model: EnumModel): void {
    const name = this.names.claim(this.names.localName(model.decl), model.decl.fullName, model.decl);
    sourceFile.addEnum({
      name,
      isExported: true,
      docs: docText(model.decl.node.comments, findOption(model.decl.node.options, 'deprecated') === true),
      members: model.values.map(value => ({
        name: value.name,
        value: value.number,
        docs: docText(value.comments, findOption(value.options, 'deprecated') === true)
      }))
    });
  }

  emitMessage(sourceFile: SourceFile, model: MessageModel): void {
    const name = this.names.claim(this.names.localName(model.decl), model.decl.fullName, model.decl);
    const deprecated = findOption(model.decl.node.options, 'deprecated') === true;

    sourceFile.addInterface({
      name,
      isExported: true,
      docs: docText(model.decl.node.comments, deprecated),
      properties: [
        ...this.propertySignatures(model),
        {
          name: '$unknown',
          type: 'Uint8Array[]',
          hasQuestionToken: true,
          docs: ['Fields not in the schema, kept as raw wire bytes and written back after the known fields']
        }
      ]
    });

    sourceFile.addVariableStatement({
      declarationKind: VariableDeclarationKind.Const,
      isExported: true,
      declarations: [
        {
          name,
          type: `$runtime.MessageCodec<${name}>`,
          initializer: (writer: CodeBlockWriter) => {
            writer.inlineBlock(() => {
              this.writeCreate(writer, name, model);
              writer.write(',').newLine();
              this.writeEncode(writer, name, model);
              writer.write(',').newLine();
              this.writeDecode(writer, name, model);
              writer.write(',').newLine();
              writer.write(`toBinary(message: ${name}): Uint8Array `).inlineBlock(() => {
                writer.writeLine(`return ${name}.encode(message).finish();`);
              });
              writer.write(',').newLine();
              writer.write(`fromBinary(bytes: Uint8Array): ${name} `).inlineBlock(() => {
                writer.writeLine(`return ${name}.decode(bytes);`);
              });
              writer.newLine();
            });
          }
        }
      ]
    });
  }

  // ---------------------------------------------------------------------------
  // Types
  // ---------------------------------------------------------------------------

  private elementType(field: FieldModel): string {
    return field.type.kind === 'scalar'
      ? scalarInfo(field.type.scalar).tsType
      : this.names.typeReference(field.type.index);
  }

  private propertySignatures(model: MessageModel) {
    const properties: Array<{ name: string; type: string; hasQuestionToken: boolean; docs: string[] }> = [];
    const emittedOneofs = new Set<string>();

    for (const field of model.fields) {
      if (field.presence === 'oneof') {
        const oneof = model.oneofs.find(o => o.name === field.oneof);
        if (!oneof || emittedOneofs.has(oneof.name)) {
          continue;
        }
        emittedOneofs.add(oneof.name);
        const union = oneof.fields
          .map(member => `{ $case: '${member.propertyName}'; ${member.propertyName}: ${this.elementType(member)} }`)
          .join(' | ');
        properties.push({ name: oneof.propertyName, type: union, hasQuestionToken: true, docs: docText(oneof.comments) });
        continue;
      }

      const element = this.elementType(field);
      const deprecated = findOption(fieldOptions(model, field), 'deprecated') === true;
      const docs = docText(field.comments, deprecated);

      switch (field.presence) {
        case 'implicit':
          properties.push({ name: field.propertyName, type: element, hasQuestionToken: false, docs });
          break;
        case 'wrapped':
        case 'message':
          properties.push({ name: field.propertyName, type: element, hasQuestionToken: true, docs });
          break;
        case 'repeated':
          properties.push({ name: field.propertyName, type: `${element}[]`, hasQuestionToken: false, docs });
          break;
        case 'map': {
          const key = scalarInfo(field.mapKey ?? 'string').tsType;
          properties.push({ name: field.propertyName, type: `Map<${key}, ${element}>`, hasQuestionToken: false, docs });
          break;
        }
      }
    }
    return properties;
  }

  private defaultLiteral(field: FieldModel): string {
    return field.type.kind === 'scalar' ? scalarInfo(field.type.scalar).defaultLiteral : '0';
  }

  // ---------------------------------------------------------------------------
  // create
  // ---------------------------------------------------------------------------

  private writeCreate(writer: CodeBlockWriter, name: string, model: MessageModel): void {
    const defaults: string[] = [];
    for (const field of model.fields) {
      if (field.presence === 'implicit') {
        defaults.push(`${field.propertyName}: ${this.defaultLiteral(field)}`);
      } else if (field.presence === 'repeated') {
        defaults.push(`${field.propertyName}: []`);
      } else if (field.presence === 'map') {
        defaults.push(`${field.propertyName}: new Map()`);
      }
    }

    writer.write(`create(init?: Partial<${name}>): ${name} `).inlineBlock(() => {
      if (defaults.length === 0) {
        writer.writeLine('return { ...init };');
        return;
      }
      writer.write('return ').inlineBlock(() => {
        for (const entry of defaults) {
          writer.writeLine(`${entry},`);
        }
        writer.writeLine('...init');
      });
      writer.write(';').newLine();
    });
  }

  // ---------------------------------------------------------------------------
  // encode
  // ---------------------------------------------------------------------------

  /** Statement writing one element with its tag */
  private writeElement(field: FieldModel, expr: string, tag: number): string {
    if (field.type.kind === 'message') {
      return `${this.names.typeReference(field.type.index)}.encode(${expr}, writer.uint32(${tag}).fork()).ldelim();`;
    }
    const method = field.type.kind === 'scalar' ? scalarInfo(field.type.scalar).method : 'int32';
    return `writer.uint32(${tag}).${method}(${expr});`;
  }

  private elementMethod(field: FieldModel): string {
    return field.type.kind === 'scalar' ? scalarInfo(field.type.scalar).method : 'int32';
  }

  private writeEncode(writer: CodeBlockWriter, name: string, model: MessageModel): void {
    writer.write(`encode(message: ${name}, writer: $runtime.Writer = new $runtime.Writer()): $runtime.Writer `).inlineBlock(() => {
      for (const field of model.fieldsByNumber) {
        this.writeFieldEncode(writer, field, model);
      }
      writer.write('if (message.$unknown !== undefined)').block(() => {
        writer.write('for (const chunk of message.$unknown)').block(() => {
          writer.writeLine('writer.raw(chunk);');
        });
      });
      writer.writeLine('return writer;');
    });
  }

  private writeFieldEncode(writer: CodeBlockWriter, field: FieldModel, model: MessageModel): void {
    const access = `message.${field.propertyName}`;
    const elementTag = makeTag(field.number, field.wireType);

    switch (field.presence) {
      case 'implicit': {
        const condition = field.type.kind === 'scalar'
          ? nonDefaultCondition(field.type.scalar, access)
          : `${access} !== 0`;
        writer.write(`if (${condition})`).block(() => {
          writer.writeLine(this.writeElement(field, access, elementTag));
        });
        break;
      }
      case 'wrapped':
      case 'message':
        writer.write(`if (${access} !== undefined)`).block(() => {
          writer.writeLine(this.writeElement(field, access, elementTag));
        });
        break;
      case 'oneof': {
        const oneof = model.oneofs.find(o => o.name === field.oneof);
        const oneofAccess = `message.${oneof?.propertyName ?? field.oneof}`;
        writer.write(`if (${oneofAccess}?.$case === '${field.propertyName}')`).block(() => {
          writer.writeLine(this.writeElement(field, `${oneofAccess}.${field.propertyName}`, elementTag));
        });
        break;
      }
      case 'repeated':
        if (field.packed) {
          writer.write(`if (${access}.length > 0)`).block(() => {
            writer.writeLine(`writer.uint32(${field.tag}).fork();`);
            writer.write(`for (const element of ${access})`).block(() => {
              writer.writeLine(`writer.${this.elementMethod(field)}(element);`);
            });
            writer.writeLine('writer.ldelim();');
          });
        } else {
          writer.write(`for (const element of ${access})`).block(() => {
            writer.writeLine(this.writeElement(field, 'element', elementTag));
          });
        }
        break;
      case 'map': {
        const keyScalar: ScalarType = field.mapKey ?? 'string';
        const keyTag = makeTag(1, scalarWireType(keyScalar));
        const valueTag = makeTag(2, valueWireType(field));
        writer.write(`for (const [key, value] of ${access})`).block(() => {
          writer.writeLine(`writer.uint32(${field.tag}).fork();`);
          writer.writeLine(`writer.uint32(${keyTag}).${scalarInfo(keyScalar).method}(key);`);
          writer.writeLine(this.writeElement(field, 'value', valueTag));
          writer.writeLine('writer.ldelim();');
        });
        break;
      }
    }
  }

  // ---------------------------------------------------------------------------
  // decode
  // ---------------------------------------------------------------------------

  private readElement(field: FieldModel): string {
    if (field.type.kind === 'message') {
      return `reader.message(${this.names.typeReference(field.type.index)}.decode)`;
    }
    return `reader.${this.elementMethod(field)}()`;
  }

  private writeDecode(writer: CodeBlockWriter, name: string, model: MessageModel): void {
    writer.write(`decode(input: Uint8Array | $runtime.Reader, length?: number): ${name} `).inlineBlock(() => {
      writer.writeLine('const reader = input instanceof $runtime.Reader ? input : new $runtime.Reader(input);');
      writer.writeLine('const end = length === undefined ? reader.end : reader.pos + length;');
      writer.writeLine(`const message = ${name}.create();`);
      writer.write('while (reader.pos < end)').block(() => {
        writer.writeLine('const start = reader.pos;');
        writer.writeLine('const tag = reader.tag();');
        if (model.fieldsByNumber.length > 0) {
          writer.write('switch (tag)').block(() => {
            for (const field of model.fieldsByNumber) {
              this.writeFieldDecode(writer, field, model);
            }
          });
        }
        writer.writeLine('reader.skip(tag & 7, tag >>> 3);');
        writer.write('if (message.$unknown === undefined)').block(() => {
          writer.writeLine('message.$unknown = [];');
        });
        writer.writeLine('message.$unknown.push(reader.raw(start, reader.pos));');
      });
      writer.writeLine('$runtime.checkEnd(reader, end);');
      writer.writeLine('return message;');
    });
  }

  private writeFieldDecode(writer: CodeBlockWriter, field: FieldModel, model: MessageModel): void {
    const access = `message.${field.propertyName}`;
    const elementTag = makeTag(field.number, field.wireType);

    const writeCase = (tag: number, body: () => void) => {
      writer.writeLine(`case ${tag}:`);
      writer.indent(() => {
        body();
        writer.writeLine('continue;');
      });
    };

    switch (field.presence) {
      case 'implicit':
      case 'wrapped':
      case 'message':
        writeCase(elementTag, () => writer.writeLine(`${access} = ${this.readElement(field)};`));
        break;
      case 'oneof': {
        const oneof = model.oneofs.find(o => o.name === field.oneof);
        const property = oneof?.propertyName ?? field.oneof;
        writeCase(elementTag, () => writer.writeLine(
          `message.${property} = { $case: '${field.propertyName}', ${field.propertyName}: ${this.readElement(field)} };`
        ));
        break;
      }
      case 'repeated':
        writeCase(elementTag, () => writer.writeLine(`${access}.push(${this.readElement(field)});`));
        if (field.packable) {
          writeCase(makeTag(field.number, WireType.LengthDelimited), () => {
            writer.write(`for (const element of reader.packed(() => ${this.readElement(field)}))`).block(() => {
              writer.writeLine(`${access}.push(element);`);
            });
          });
        }
        break;
      case 'map':
        writeCase(field.tag, () => this.writeMapEntryDecode(writer, field, access));
        break;
    }
  }

  private writeMapEntryDecode(writer: CodeBlockWriter, field: FieldModel, access: string): void {
    const keyScalar: ScalarType = field.mapKey ?? 'string';
    const key = scalarInfo(keyScalar);
    const keyTag = makeTag(1, scalarWireType(keyScalar));
    const valueTag = makeTag(2, valueWireType(field));
    const valueType = this.elementType(field);

    writer.block(() => {
      writer.writeLine('const entryEnd = reader.fieldLength() + reader.pos;');
      writer.writeLine(`let key: ${key.tsType} = ${key.defaultLiteral};`);
      if (field.type.kind === 'message') {
        writer.writeLine(`let value: ${valueType} | undefined;`);
      } else {
        writer.writeLine(`let value: ${valueType} = ${this.defaultLiteral(field)};`);
      }
      writer.write('while (reader.pos < entryEnd)').block(() => {
        writer.writeLine('const entryTag = reader.tag();');
        writer.write(`if (entryTag === ${keyTag}) `).inlineBlock(() => {
          writer.writeLine(`key = reader.${key.method}();`);
        });
        writer.write(` else if (entryTag === ${valueTag}) `).inlineBlock(() => {
          writer.writeLine(`value = ${this.readElement(field)};`);
        });
        writer.write(' else').block(() => {
          writer.writeLine('reader.skip(entryTag & 7, entryTag >>> 3);');
        });
      });
      writer.writeLine('$runtime.checkEnd(reader, entryEnd);');
      if (field.type.kind === 'message') {
        writer.writeLine(`${access}.set(key, value ?? ${valueType}.create());`);
      } else {
        writer.writeLine(`${access}.set(key, value);`);
      }
    });
  }
}

function valueWireType(field: FieldModel): WireType {
  switch (field.type.kind) {
    case 'scalar':
      return scalarWireType(field.type.scalar);
    case 'enum':
      return WireType.Varint;
    default:
      return WireType.LengthDelimited;
  }
}

function fieldOptions(model: MessageModel, field: FieldModel) {
  return model.decl.fields.find(f => f.number === field.number)?.options ?? [];
}
