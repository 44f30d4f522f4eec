// Gateway Module - Main exports

export { ToolGateway } from './tool-gateway.js';
export type { ToolGatewayOptions, CallOptions } from './tool-gateway.js';
export { HttpToolTransport, healthUrlFor } from './http-transport.js';
export type { ToolTransport, TransportReply } from './http-transport.js';
export * from './protocol.js';
