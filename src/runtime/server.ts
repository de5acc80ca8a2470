/**
 * Server-side dispatch
 * Generated `bind<Service>Server` functions turn a handler implementation
 * into a BoundService: a closed table of byte-level methods tagged by kind.
 */

import { MethodDescriptor, MethodKind, RecvStream, SendStream, ServerCallContext } from './rpc';
import { logger } from '../utils/logger';

export type BoundMethod =
  | {
    kind: 'unary';
    path: string;
    invoke(request: Uint8Array, context: ServerCallContext): Promise<Uint8Array>;
  }
  | {
    kind: 'client_streaming';
    path: string;
    invoke(requests: RecvStream<Uint8Array>, context: ServerCallContext): Promise<Uint8Array>;
  }
  | {
    kind: 'server_streaming';
    path: string;
    invoke(request: Uint8Array, responses: SendStream<Uint8Array>, context: ServerCallContext): Promise<void>;
  }
  | {
    kind: 'bidi_streaming';
    path: string;
    invoke(
      requests: RecvStream<Uint8Array>,
      responses: SendStream<Uint8Array>,
      context: ServerCallContext
    ): Promise<void>;
  };

export interface BoundService {
  /** Fully qualified service name */
  name: string;
  methods: readonly BoundMethod[];
}

async function* decodeStream<I, O>(
  requests: RecvStream<Uint8Array>,
  descriptor: MethodDescriptor<I, O>
): AsyncGenerator<I, void, undefined> {
  for await (const bytes of requests) {
    yield descriptor.requestCodec.fromBinary(bytes);
  }
}

function encodeSink<I, O>(responses: SendStream<Uint8Array>, descriptor: MethodDescriptor<I, O>): SendStream<O> {
  return {
    send: message => responses.send(descriptor.responseCodec.toBinary(message))
  };
}

export function unaryMethod<I, O>(
  descriptor: MethodDescriptor<I, O>,
  handler: (request: I, context: ServerCallContext) => Promise<O>
): BoundMethod {
  return {
    kind: 'unary',
    path: descriptor.path,
    invoke: async (request, context) =>
      descriptor.responseCodec.toBinary(await handler(descriptor.requestCodec.fromBinary(request), context))
  };
}

export function clientStreamingMethod<I, O>(
  descriptor: MethodDescriptor<I, O>,
  handler: (requests: RecvStream<I>, context: ServerCallContext) => Promise<O>
): BoundMethod {
  return {
    kind: 'client_streaming',
    path: descriptor.path,
    invoke: async (requests, context) =>
      descriptor.responseCodec.toBinary(await handler(decodeStream(requests, descriptor), context))
  };
}

export function serverStreamingMethod<I, O>(
  descriptor: MethodDescriptor<I, O>,
  handler: (request: I, responses: SendStream<O>, context: ServerCallContext) => Promise<void>
): BoundMethod {
  return {
    kind: 'server_streaming',
    path: descriptor.path,
    invoke: (request, responses, context) =>
      handler(descriptor.requestCodec.fromBinary(request), encodeSink(responses, descriptor), context)
  };
}

export function bidiStreamingMethod<I, O>(
  descriptor: MethodDescriptor<I, O>,
  handler: (requests: RecvStream<I>, responses: SendStream<O>, context: ServerCallContext) => Promise<void>
): BoundMethod {
  return {
    kind: 'bidi_streaming',
    path: descriptor.path,
    invoke: (requests, responses, context) =>
      handler(decodeStream(requests, descriptor), encodeSink(responses, descriptor), context)
  };
}

export function bindService(name: string, methods: BoundMethod[]): BoundService {
  return { name, methods };
}

/**
 * Registry of bound services, looked up by method path
 */
export class Server {
  private readonly services = new Set<string>();
  private readonly methods = new Map<string, BoundMethod>();

  /**
   * Register a bound service. A service can be bound to one implementation
   * only.
   */
  addService(service: BoundService): this {
    if (this.services.has(service.name)) {
      throw new Error(`Service "${service.name}" already has an implementation bound`);
    }
    this.services.add(service.name);
    for (const method of service.methods) {
      this.methods.set(method.path, method);
    }
    logger.debug(`Bound service ${service.name} (${service.methods.length} method(s))`);
    return this;
  }

  lookup(path: string): BoundMethod | undefined {
    return this.methods.get(path);
  }

  /** Paths of every bound method, with their kinds */
  listMethods(): Array<{ path: string; kind: MethodKind }> {
    return [...this.methods.values()].map(({ path, kind }) => ({ path, kind }));
  }
}
