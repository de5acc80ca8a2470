/**
 * Tests for server dispatch and the in-process transport
 */

import { MessageCodec } from '../codec';
import { CancelledError, RpcError, StatusCode } from '../errors';
import { createInProcessTransport } from '../inProcess';
import { Reader } from '../reader';
import { methodDescriptor, ServerCallContext } from '../rpc';
import {
  bidiStreamingMethod,
  bindService,
  clientStreamingMethod,
  Server,
  serverStreamingMethod,
  unaryMethod
} from '../server';
import { Writer } from '../writer';

interface Note {
  text: string;
}

const Note: MessageCodec<Note> = {
  create: init => ({ text: '', ...init }),
  encode(message, writer = new Writer()) {
    if (message.text !== '') {
      writer.uint32(10).string(message.text);
    }
    return writer;
  },
  decode(input, length) {
    const reader = input instanceof Reader ? input : new Reader(input);
    const end = length === undefined ? reader.end : reader.pos + length;
    const message = Note.create();
    while (reader.pos < end) {
      const tag = reader.tag();
      if (tag === 10) {
        message.text = reader.string();
      } else {
        reader.skip(tag & 7, tag >>> 3);
      }
    }
    return message;
  },
  toBinary: message => Note.encode(message).finish(),
  fromBinary: bytes => Note.decode(bytes)
};

const SERVICE = 'test.Notes';
const echo = methodDescriptor(SERVICE, 'Echo', 'unary', Note, Note);
const join = methodDescriptor(SERVICE, 'Join', 'client_streaming', Note, Note);
const repeat = methodDescriptor(SERVICE, 'Repeat', 'server_streaming', Note, Note);
const shout = methodDescriptor(SERVICE, 'Shout', 'bidi_streaming', Note, Note);
const missing = methodDescriptor(SERVICE, 'Missing', 'unary', Note, Note);

async function* notes(...texts: string[]): AsyncGenerator<Note> {
  for (const text of texts) {
    yield { text };
  }
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

describe('in-process transport', () => {
  let contexts: ServerCallContext[];
  let server: Server;

  beforeEach(() => {
    contexts = [];
    server = new Server().addService(
      bindService(SERVICE, [
        unaryMethod(echo, async (request, context) => {
          contexts.push(context);
          if (request.text === 'fail') {
            throw new Error('boom');
          }
          if (request.text === 'hang') {
            return new Promise<Note>(() => undefined);
          }
          return { text: `echo: ${request.text}` };
        }),
        clientStreamingMethod(join, async requests => {
          const parts: string[] = [];
          for await (const request of requests) {
            parts.push(request.text);
          }
          return { text: parts.join('+') };
        }),
        serverStreamingMethod(repeat, async (request, responses) => {
          for (let i = 1; i <= 3; i++) {
            await responses.send({ text: `${request.text}${i}` });
          }
        }),
        bidiStreamingMethod(shout, async (requests, responses) => {
          for await (const request of requests) {
            await responses.send({ text: request.text.toUpperCase() });
          }
        })
      ])
    );
  });

  it('should make unary calls through the codecs', async () => {
    const transport = createInProcessTransport(server);
    await expect(transport.unary(echo, { text: 'hi' }, { metadata: { user: 'test-user' } })).resolves.toEqual({
      text: 'echo: hi'
    });
    expect(contexts[0].method).toBe('/test.Notes/Echo');
    expect(contexts[0].metadata).toEqual({ user: 'test-user' });
  });

  it('should stream requests to a client-streaming handler', async () => {
    const transport = createInProcessTransport(server);
    await expect(transport.clientStreaming(join, notes('a', 'b', 'c'))).resolves.toEqual({ text: 'a+b+c' });
  });

  it('should stream responses from a server-streaming handler', async () => {
    const transport = createInProcessTransport(server);
    await expect(collect(transport.serverStreaming(repeat, { text: 'x' }))).resolves.toEqual([
      { text: 'x1' },
      { text: 'x2' },
      { text: 'x3' }
    ]);
  });

  it('should stream both ways', async () => {
    const transport = createInProcessTransport(server, { streamCapacity: 1 });
    await expect(collect(transport.bidiStreaming(shout, notes('one', 'two')))).resolves.toEqual([
      { text: 'ONE' },
      { text: 'TWO' }
    ]);
  });

  it('should report unbound methods as UNIMPLEMENTED', async () => {
    const transport = createInProcessTransport(server);
    await expect(transport.unary(missing, { text: '' })).rejects.toMatchObject({
      code: StatusCode.UNIMPLEMENTED,
      message: 'Method /test.Notes/Missing is not implemented'
    });
  });

  it('should report a call of the wrong kind as INTERNAL', async () => {
    const transport = createInProcessTransport(server);
    await expect(collect(transport.serverStreaming(echo, { text: '' }))).rejects.toMatchObject({
      code: StatusCode.INTERNAL
    });
  });

  it('should turn handler failures into RpcError', async () => {
    const transport = createInProcessTransport(server);
    const call = transport.unary(echo, { text: 'fail' });
    await expect(call).rejects.toBeInstanceOf(RpcError);
    await expect(call).rejects.toMatchObject({ code: StatusCode.UNKNOWN, message: 'boom' });
  });

  it('should cancel a unary call when the caller aborts', async () => {
    const transport = createInProcessTransport(server);
    const controller = new AbortController();
    const call = transport.unary(echo, { text: 'hang' }, { signal: controller.signal });
    await Promise.resolve();
    controller.abort();

    await expect(call).rejects.toBeInstanceOf(CancelledError);
    expect(contexts[0].signal.aborted).toBe(true);
  });

  it('should cancel the handler when the consumer stops reading', async () => {
    let context: ServerCallContext | undefined;
    let stopped: (error: unknown) => void = () => undefined;
    const handlerStopped = new Promise<unknown>(resolve => {
      stopped = resolve;
    });
    const endless = methodDescriptor('test.Endless', 'Count', 'server_streaming', Note, Note);
    server.addService(
      bindService('test.Endless', [
        serverStreamingMethod(endless, async (_request, responses, callContext) => {
          context = callContext;
          try {
            for (let i = 0; ; i++) {
              await responses.send({ text: String(i) });
            }
          } catch (error) {
            stopped(error);
          }
        })
      ])
    );

    const transport = createInProcessTransport(server, { streamCapacity: 2 });
    const received: string[] = [];
    for await (const note of transport.serverStreaming(endless, { text: '' })) {
      received.push(note.text);
      if (received.length === 2) {
        break;
      }
    }

    expect(received).toEqual(['0', '1']);
    await expect(handlerStopped).resolves.toBeInstanceOf(CancelledError);
    expect(context?.signal.aborted).toBe(true);
  });
});

describe('Server', () => {
  it('should bind a service once', () => {
    const server = new Server().addService(bindService(SERVICE, []));
    expect(() => server.addService(bindService(SERVICE, []))).toThrow(
      'Service "test.Notes" already has an implementation bound'
    );
  });

  it('should list bound methods with their kinds', () => {
    const server = new Server().addService(
      bindService(SERVICE, [
        unaryMethod(echo, async request => request),
        bidiStreamingMethod(shout, async () => undefined)
      ])
    );
    expect(server.listMethods()).toEqual([
      { path: '/test.Notes/Echo', kind: 'unary' },
      { path: '/test.Notes/Shout', kind: 'bidi_streaming' }
    ]);
  });
});
