/**
 * Listener Layer - Transport adapters terminating inbound exchanges
 */

export type {
  InboundTransport,
  ListenerCallbacks,
  ListenerInfo,
} from '@walletgate/core';
export {
  HttpListener,
  INVITATION_TEXT,
  INTERNAL_ERROR_TEXT,
  DEFAULT_MAX_MESSAGE_SIZE,
  type HttpListenerConfig,
} from './http-listener.js';
export { WebSocketListener, type WebSocketListenerConfig } from './websocket-listener.js';
export { encodePayload, mediaType, readInboundBody, type EncodedPayload } from './content.js';
