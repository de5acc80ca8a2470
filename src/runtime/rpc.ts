/**
 * RPC surface shared by generated clients and servers
 */

import { MessageCodec } from './codec';

export type MethodKind = 'unary' | 'client_streaming' | 'server_streaming' | 'bidi_streaming';

export interface MethodDescriptor<I, O> {
  /** Fully qualified service name */
  service: string;
  /** Method name as declared in the schema */
  name: string;
  /** `/<package>.<Service>/<Method>` */
  path: string;
  kind: MethodKind;
  requestCodec: MessageCodec<I>;
  responseCodec: MessageCodec<O>;
}

export function methodDescriptor<I, O>(
  service: string,
  name: string,
  kind: MethodKind,
  requestCodec: MessageCodec<I>,
  responseCodec: MessageCodec<O>
): MethodDescriptor<I, O> {
  return { service, name, path: `/${service}/${name}`, kind, requestCodec, responseCodec };
}

export type Metadata = Record<string, string>;

export interface CallOptions {
  signal?: AbortSignal;
  metadata?: Metadata;
}

/**
 * Moves calls to a server. Framing and connection handling belong to the
 * implementation; generated clients only delegate here.
 */
export interface ClientTransport {
  unary<I, O>(method: MethodDescriptor<I, O>, request: I, options?: CallOptions): Promise<O>;
  clientStreaming<I, O>(method: MethodDescriptor<I, O>, requests: AsyncIterable<I>, options?: CallOptions): Promise<O>;
  serverStreaming<I, O>(method: MethodDescriptor<I, O>, request: I, options?: CallOptions): AsyncIterable<O>;
  bidiStreaming<I, O>(method: MethodDescriptor<I, O>, requests: AsyncIterable<I>, options?: CallOptions): AsyncIterable<O>;
}

/**
 * Incoming message stream. Iteration ends when the peer finishes sending and
 * throws CancelledError when the call is cancelled.
 */
export type RecvStream<T> = AsyncIterable<T>;

/**
 * Outgoing message stream. `send` resolves once the message is accepted and
 * stays pending while the peer is not ready for more.
 */
export interface SendStream<T> {
  send(message: T): Promise<void>;
}

export interface ServerCallContext {
  /** Aborted when the caller cancels */
  signal: AbortSignal;
  metadata: Metadata;
  /** Path of the method being served */
  method: string;
}
