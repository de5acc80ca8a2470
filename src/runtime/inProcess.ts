/**
 * In-process transport
 * Connects generated clients to a Server in the same process. Messages still
 * go through their codecs, so calls exercise the same bytes a network
 * transport would carry.
 */

import { Channel } from './channel';
import { CancelledError, RpcError, StatusCode, toRpcError } from './errors';
import { CallOptions, ClientTransport, MethodDescriptor, MethodKind, ServerCallContext } from './rpc';
import { BoundMethod, Server } from './server';

export interface InProcessTransportOptions {
  /** Buffered messages per stream direction before `send` waits */
  streamCapacity?: number;
}

type BoundMethodOf<K extends MethodKind> = Extract<BoundMethod, { kind: K }>;

interface Call {
  context: ServerCallContext;
  controller: AbortController;
  /** Detach from the caller's signal */
  dispose(): void;
}

function startCall(path: string, options: CallOptions = {}): Call {
  const controller = new AbortController();
  const callerSignal = options.signal;
  const onAbort = () => controller.abort();

  if (callerSignal?.aborted) {
    controller.abort();
  } else {
    callerSignal?.addEventListener('abort', onAbort, { once: true });
  }

  return {
    context: { signal: controller.signal, metadata: { ...options.metadata }, method: path },
    controller,
    dispose: () => callerSignal?.removeEventListener('abort', onAbort)
  };
}

/**
 * Settle with `work`, or reject with CancelledError as soon as the call is
 * aborted
 */
function untilCancelled<T>(signal: AbortSignal, work: Promise<T>): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new CancelledError());
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(toRpcError(error));
      }
    );
  });
}

async function* encodeStream<I, O>(
  requests: AsyncIterable<I>,
  method: MethodDescriptor<I, O>
): AsyncGenerator<Uint8Array, void, undefined> {
  for await (const request of requests) {
    yield method.requestCodec.toBinary(request);
  }
}

/**
 * Feed a client's request iterable into a channel the handler reads from.
 * Never rejects: failures end up on the channel.
 */
async function pump<I, O>(
  requests: AsyncIterable<I>,
  method: MethodDescriptor<I, O>,
  channel: Channel<Uint8Array>
): Promise<void> {
  try {
    for await (const bytes of encodeStream(requests, method)) {
      await channel.send(bytes);
    }
    channel.close();
  } catch (error) {
    channel.fail(toRpcError(error));
  }
}

export function createInProcessTransport(server: Server, options: InProcessTransportOptions = {}): ClientTransport {
  const capacity = options.streamCapacity ?? 16;

  function resolve<K extends MethodKind>(method: MethodDescriptor<unknown, unknown>, kind: K): BoundMethodOf<K>;
  function resolve(method: MethodDescriptor<unknown, unknown>, kind: MethodKind): BoundMethod {
    const bound = server.lookup(method.path);
    if (!bound) {
      throw new RpcError(StatusCode.UNIMPLEMENTED, `Method ${method.path} is not implemented`);
    }
    if (bound.kind !== kind) {
      throw new RpcError(
        StatusCode.INTERNAL,
        `Method ${method.path} is bound as ${bound.kind} but was called as ${kind}`
      );
    }
    return bound;
  }

  /**
   * Run a streaming handler writing into `responses`, and yield decoded
   * responses to the caller. Nothing starts before the first iteration;
   * leaving the loop early cancels the call.
   */
  async function* respond<I, O>(
    method: MethodDescriptor<I, O>,
    callOptions: CallOptions | undefined,
    run: (responses: Channel<Uint8Array>, call: Call) => Promise<void>
  ): AsyncGenerator<O, void, undefined> {
    const call = startCall(method.path, callOptions);
    const responses = new Channel<Uint8Array>(capacity);
    const onAbort = () => responses.fail(new CancelledError());
    call.context.signal.addEventListener('abort', onAbort, { once: true });

    void Promise.resolve().then(() => run(responses, call)).then(
      () => responses.close(),
      (error: unknown) => responses.fail(toRpcError(error))
    );

    let finished = false;
    try {
      for await (const bytes of responses) {
        yield method.responseCodec.fromBinary(bytes);
      }
      finished = true;
    } finally {
      call.context.signal.removeEventListener('abort', onAbort);
      if (!finished) {
        call.controller.abort();
      }
      call.dispose();
    }
  }

  return {
    async unary<I, O>(method: MethodDescriptor<I, O>, request: I, callOptions?: CallOptions): Promise<O> {
      const bound = resolve(method, 'unary');
      const call = startCall(method.path, callOptions);
      try {
        const bytes = method.requestCodec.toBinary(request);
        const response = await untilCancelled(call.context.signal, bound.invoke(bytes, call.context));
        return method.responseCodec.fromBinary(response);
      } finally {
        call.dispose();
      }
    },

    async clientStreaming<I, O>(
      method: MethodDescriptor<I, O>,
      requests: AsyncIterable<I>,
      callOptions?: CallOptions
    ): Promise<O> {
      const bound = resolve(method, 'client_streaming');
      const call = startCall(method.path, callOptions);
      const incoming = new Channel<Uint8Array>(capacity);
      try {
        void pump(requests, method, incoming);
        const response = await untilCancelled(call.context.signal, bound.invoke(incoming, call.context));
        incoming.fail(new CancelledError('Call completed'));
        return method.responseCodec.fromBinary(response);
      } catch (error) {
        incoming.fail(toRpcError(error));
        throw error;
      } finally {
        call.dispose();
      }
    },

    serverStreaming<I, O>(method: MethodDescriptor<I, O>, request: I, callOptions?: CallOptions): AsyncIterable<O> {
      return respond(method, callOptions, (responses, call) => {
        const bound = resolve(method, 'server_streaming');
        return bound.invoke(method.requestCodec.toBinary(request), responses, call.context);
      });
    },

    bidiStreaming<I, O>(
      method: MethodDescriptor<I, O>,
      requests: AsyncIterable<I>,
      callOptions?: CallOptions
    ): AsyncIterable<O> {
      return respond(method, callOptions, async (responses, call) => {
        const bound = resolve(method, 'bidi_streaming');
        const incoming = new Channel<Uint8Array>(capacity);
        void pump(requests, method, incoming);
        try {
          await bound.invoke(incoming, responses, call.context);
        } finally {
          incoming.fail(new CancelledError('Call completed'));
        }
      });
    }
  };
}
