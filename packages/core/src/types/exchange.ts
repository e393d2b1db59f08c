/**
 * Exchange Types
 *
 * One inbound request and its optional synchronous reply.
 */

export const WIRE_CONTENT_TYPE = 'application/ssi-agent-wire' as const;
export const JSON_CONTENT_TYPE = 'application/json' as const;

export type ExchangeState =
  | 'open'
  | 'context_resolved'
  | 'receiving'
  | 'awaiting_response'
  | 'responded'
  | 'no_response'
  | 'closed';

/** Raw inbound body: structured text for JSON content, bytes otherwise */
export type InboundBody = string | Uint8Array;

/** Direct-response payload, sent back as text or as wire bytes */
export type ResponsePayload = string | Uint8Array;

export interface PeerInfo {
  host?: string;
  remote?: string;
}

export interface MessageReceipt {
  directResponseRequested: boolean;
  threadId?: string;
  senderKey?: string;
  recipientKey?: string;
}

export interface ParsedMessage<T = unknown> {
  receipt: MessageReceipt;
  payload: T;
}

export interface ExchangeInfo {
  id: string;
  peer: PeerInfo;
  state: ExchangeState;
  tenantId: string | null;
  canRespond: boolean;
  acceptUndelivered: boolean;
  openedAt: string;
  closedAt?: string;
}

export function isBinaryPayload(payload: ResponsePayload): payload is Uint8Array {
  return typeof payload !== 'string';
}
