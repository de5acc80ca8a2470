/**
 * Wire runtime imported by generated code
 */

export { WireType, makeTag, tagFieldNumber, tagWireType } from './wire';
export { Writer } from './writer';
export { Reader, RECURSION_LIMIT } from './reader';
export { MessageCodec, MessageOf, DecodeResult, tryDecode, checkEnd } from './codec';
export { DecodeError, RpcError, CancelledError, StatusCode, toRpcError } from './errors';
export {
  MethodKind,
  MethodDescriptor,
  methodDescriptor,
  Metadata,
  CallOptions,
  ClientTransport,
  RecvStream,
  SendStream,
  ServerCallContext
} from './rpc';
export { Channel } from './channel';
export {
  BoundMethod,
  BoundService,
  bindService,
  unaryMethod,
  clientStreamingMethod,
  serverStreamingMethod,
  bidiStreamingMethod,
  Server
} from './server';
export { createInProcessTransport, InProcessTransportOptions } from './inProcess';
