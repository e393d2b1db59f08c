/**
 * Service Interfaces
 */

import type {
  ExchangeInfo,
  InboundBody,
  ParsedMessage,
  PeerInfo,
  ResponsePayload,
} from './exchange.js';
import type { ProcessingContext, TenantId, TenantStore } from './tenant.js';

// ========== Collaborators ==========

/** Maps inbound bytes to the candidate tenants that can unpack them */
export interface TenantResolver {
  resolve(body: InboundBody): Promise<TenantId[]>;
}

/** Opens tenant stores; throws for unknown or locked tenants */
export interface TenantStoreProvider {
  open(tenantId: TenantId): Promise<TenantStore>;
}

/** Per-exchange resource scope handed to the unpacker */
export interface ExchangeScope {
  readonly exchangeId: string;
  defer(cleanup: () => void | Promise<void>): void;
}

export interface MessageUnpacker {
  /**
   * Authenticate and decode an inbound body.
   * Throws MessageParseError when the body cannot be unpacked.
   */
  unpack(body: InboundBody, context: ProcessingContext, scope: ExchangeScope): Promise<ParsedMessage>;
}

export interface InboundEnvelope {
  exchangeId: string;
  message: ParsedMessage;
  context: ProcessingContext;
  acceptUndelivered: boolean;
  /** Whether a direct response is still awaited; false once the window closes */
  readonly canRespond: boolean;
  /** Hand a direct response back; false when the exchange no longer waits */
  reply(payload: ResponsePayload): boolean;
}

export interface MessageDispatcher {
  dispatch(envelope: InboundEnvelope): void | Promise<void>;
}

// ========== Inbound Handler ==========

export interface InboundRequest {
  body: InboundBody;
  peer: PeerInfo;
  /** Aborted when the transport connection drops */
  signal?: AbortSignal;
  responseTimeoutMs?: number;
}

export type InboundResult =
  | { outcome: 'accepted'; exchangeId: string }
  | { outcome: 'responded'; exchangeId: string; payload: ResponsePayload }
  | { outcome: 'rejected'; exchangeId: string; error: Error }
  | { outcome: 'failed'; exchangeId: string; error: Error };

export interface InboundServiceStatus {
  openExchanges: number;
  pendingResponses: number;
  cachedTenants: number;
  exchanges: ExchangeInfo[];
}

export interface InboundRequestHandler {
  handleInbound(request: InboundRequest): Promise<InboundResult>;
  notifyResponseReady(exchangeId: string, payload: ResponsePayload): boolean;
  getStatus(): InboundServiceStatus;
}
