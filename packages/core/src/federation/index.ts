export { RpcResponse } from "./rpc.js"
export type { RpcRequest } from "./rpc.js"
export type { Transport } from "./transport.js"
export { LoopbackTransport, type DispatchFn } from "./loopback-transport.js"
export { Rpc, ErrUnknownTarget, ErrUnknownMethod, ErrTransportClosed } from "./rpc-errors.js"
