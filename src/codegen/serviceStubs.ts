/**
 * Service Stub Generator
 * Emits the definition table, client class, server interface and bind
 * function of a service
 */

import { CodeBlockWriter, Scope, SourceFile, VariableDeclarationKind } from 'ts-morph';
import { ResolvedMethod, ServiceDecl } from '../core/graph';
import { MethodKind } from '../runtime/rpc';
import { SchemaError } from '../utils/errors';
import { docText } from './messageCodec';
import { FileNames, methodPropertyName } from './naming';

export interface ServiceStubOptions {
  buildClient: boolean;
  buildServer: boolean;
}

interface MethodShape {
  method: ResolvedMethod;
  property: string;
  kind: MethodKind;
  input: string;
  output: string;
}

const SERVER_CONTRACT =
  'Unary handlers run at most once per call and may run concurrently with other calls. ' +
  'Streams are paced by the runtime: `send` stays pending while the peer is not ready. ' +
  'A cancelled call surfaces as CancelledError from the streams and aborts `context.signal`.';

function methodKind(method: ResolvedMethod): MethodKind {
  if (method.clientStreaming) {
    return method.serverStreaming ? 'bidi_streaming' : 'client_streaming';
  }
  return method.serverStreaming ? 'server_streaming' : 'unary';
}

export class ServiceStubGenerator {
  constructor(
    private readonly names: FileNames,
    private readonly options: ServiceStubOptions
  ) {}

  emitService(sourceFile: SourceFile, service: ServiceDecl): void {
    const names = this.names.serviceNames(service.name);
    const methods = this.methodShapes(service);

    this.names.claim(names.definition, service.fullName, service);
    this.emitDefinition(sourceFile, service, names.definition, methods);

    if (this.options.buildClient) {
      this.names.claim(names.client, service.fullName, service);
      this.emitClient(sourceFile, service, names.client, names.definition, methods);
    }

    if (this.options.buildServer) {
      this.names.claim(names.server, service.fullName, service);
      this.names.claim(names.bind, service.fullName, service);
      this.emitServer(sourceFile, service, names.server, methods);
      this.emitBind(sourceFile, service, names, methods);
    }
  }

  private methodShapes(service: ServiceDecl): MethodShape[] {
    const seen = new Map<string, string>();
    return service.methods.map(method => {
      const property = methodPropertyName(method.name);
      const previous = seen.get(property);
      if (previous !== undefined) {
        throw new SchemaError(
          `Methods "${previous}" and "${method.name}" of "${service.fullName}" both generate "${property}"`,
          method.location
        );
      }
      seen.set(property, method.name);
      return {
        method,
        property,
        kind: methodKind(method),
        input: this.names.typeReference(method.input),
        output: this.names.typeReference(method.output)
      };
    });
  }

  private emitDefinition(sourceFile: SourceFile, service: ServiceDecl, name: string, methods: MethodShape[]): void {
    sourceFile.addVariableStatement({
      declarationKind: VariableDeclarationKind.Const,
      isExported: true,
      docs: [`Method descriptors of ${service.fullName}`],
      declarations: [
        {
          name,
          initializer: (writer: CodeBlockWriter) => {
            writer.inlineBlock(() => {
              writer.writeLine(`name: '${service.fullName}',`);
              writer.write('methods: ').inlineBlock(() => {
                methods.forEach((shape, i) => {
                  const separator = i < methods.length - 1 ? ',' : '';
                  writer.writeLine(
                    `${shape.property}: $runtime.methodDescriptor('${service.fullName}', '${shape.method.name}', ` +
                    `'${shape.kind}', ${shape.input}, ${shape.output})${separator}`
                  );
                });
              });
              writer.newLine();
            });
          }
        }
      ]
    });
  }

  private emitClient(
    sourceFile: SourceFile,
    service: ServiceDecl,
    name: string,
    definition: string,
    methods: MethodShape[]
  ): void {
    sourceFile.addClass({
      name,
      isExported: true,
      docs: docText(service.node.comments),
      ctors: [
        {
          parameters: [
            { name: 'transport', type: '$runtime.ClientTransport', scope: Scope.Private, isReadonly: true }
          ]
        }
      ],
      methods: methods.map(shape => {
        const streamingRequest = shape.kind === 'client_streaming' || shape.kind === 'bidi_streaming';
        const streamingResponse = shape.kind === 'server_streaming' || shape.kind === 'bidi_streaming';
        const argument = streamingRequest ? 'requests' : 'request';
        const call = {
          unary: 'unary',
          client_streaming: 'clientStreaming',
          server_streaming: 'serverStreaming',
          bidi_streaming: 'bidiStreaming'
        }[shape.kind];
        return {
          name: shape.property,
          docs: docText(shape.method.node.comments),
          parameters: [
            { name: argument, type: streamingRequest ? `AsyncIterable<${shape.input}>` : shape.input },
            { name: 'options', type: '$runtime.CallOptions', hasQuestionToken: true }
          ],
          returnType: streamingResponse ? `AsyncIterable<${shape.output}>` : `Promise<${shape.output}>`,
          statements: `return this.transport.${call}(${definition}.methods.${shape.property}, ${argument}, options);`
        };
      })
    });
  }

  private emitServer(sourceFile: SourceFile, service: ServiceDecl, name: string, methods: MethodShape[]): void {
    sourceFile.addInterface({
      name,
      isExported: true,
      docs: docText([service.node.comments, SERVER_CONTRACT].filter(Boolean).join('\n\n')),
      methods: methods.map(shape => {
        const context = { name: 'context', type: '$runtime.ServerCallContext' };
        const docs = docText(shape.method.node.comments);
        switch (shape.kind) {
          case 'unary':
            return {
              name: shape.property,
              docs,
              parameters: [{ name: 'request', type: shape.input }, context],
              returnType: `Promise<${shape.output}>`
            };
          case 'client_streaming':
            return {
              name: shape.property,
              docs,
              parameters: [{ name: 'requests', type: `$runtime.RecvStream<${shape.input}>` }, context],
              returnType: `Promise<${shape.output}>`
            };
          case 'server_streaming':
            return {
              name: shape.property,
              docs,
              parameters: [
                { name: 'request', type: shape.input },
                { name: 'responses', type: `$runtime.SendStream<${shape.output}>` },
                context
              ],
              returnType: 'Promise<void>'
            };
          case 'bidi_streaming':
            return {
              name: shape.property,
              docs,
              parameters: [
                { name: 'requests', type: `$runtime.RecvStream<${shape.input}>` },
                { name: 'responses', type: `$runtime.SendStream<${shape.output}>` },
                context
              ],
              returnType: 'Promise<void>'
            };
        }
      })
    });
  }

  private emitBind(
    sourceFile: SourceFile,
    service: ServiceDecl,
    names: { definition: string; server: string; bind: string },
    methods: MethodShape[]
  ): void {
    sourceFile.addFunction({
      name: names.bind,
      isExported: true,
      docs: [`Bind one implementation of ${service.fullName} for registration on a server`],
      parameters: [{ name: 'implementation', type: names.server }],
      returnType: '$runtime.BoundService',
      statements: (writer: CodeBlockWriter) => {
        writer.writeLine(`return $runtime.bindService('${service.fullName}', [`);
        writer.indent(() => {
          methods.forEach((shape, i) => {
            const separator = i < methods.length - 1 ? ',' : '';
            const descriptor = `${names.definition}.methods.${shape.property}`;
            const target = `implementation.${shape.property}`;
            switch (shape.kind) {
              case 'unary':
                writer.writeLine(
                  `$runtime.unaryMethod(${descriptor}, (request, context) => ${target}(request, context))${separator}`
                );
                break;
              case 'client_streaming':
                writer.writeLine(
                  `$runtime.clientStreamingMethod(${descriptor}, (requests, context) => ${target}(requests, context))${separator}`
                );
                break;
              case 'server_streaming':
                writer.writeLine(
                  `$runtime.serverStreamingMethod(${descriptor}, (request, responses, context) => ` +
                  `${target}(request, responses, context))${separator}`
                );
                break;
              case 'bidi_streaming':
                writer.writeLine(
                  `$runtime.bidiStreamingMethod(${descriptor}, (requests, responses, context) => ` +
                  `${target}(requests, responses, context))${separator}`
                );
                break;
            }
          });
        });
        writer.writeLine(']);');
      }
    });
  }
}
