/**
 * Inbound Transport Interface
 *
 * Connection layer abstraction for receiving inbound exchanges.
 */

import type { InboundRequestHandler } from './service.js';

export interface ListenerInfo {
  type: string;
  host: string;
  port: number;
  url: string;
}

export interface ListenerCallbacks {
  onStarted?: (info: ListenerInfo) => void;
  onStopped?: (type: string) => void;
  onError?: (error: Error) => void;
}

/** Transport adapter terminating network exchanges */
export interface InboundTransport {
  readonly type: string;
  start(handler: InboundRequestHandler, callbacks?: ListenerCallbacks): Promise<ListenerInfo>;
  stop(): Promise<void>;
}
