/**
 * Body and payload encoding shared by the inbound listeners.
 */

import {
  JSON_CONTENT_TYPE,
  WIRE_CONTENT_TYPE,
  isBinaryPayload,
  type InboundBody,
  type ResponsePayload,
} from '@walletgate/core';

/** Media type of a Content-Type header, without parameters, lowercased */
export function mediaType(contentType: string | undefined): string {
  return (contentType ?? '').split(';', 1)[0]?.trim().toLowerCase() ?? '';
}

/** JSON bodies are passed on as text, anything else as raw bytes */
export function readInboundBody(contentType: string | undefined, raw: Uint8Array): InboundBody {
  if (mediaType(contentType) === JSON_CONTENT_TYPE) {
    return Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength).toString('utf8');
  }
  return raw;
}

export interface EncodedPayload {
  contentType: typeof WIRE_CONTENT_TYPE | typeof JSON_CONTENT_TYPE;
  body: Buffer | string;
}

export function encodePayload(payload: ResponsePayload): EncodedPayload {
  if (isBinaryPayload(payload)) {
    return {
      contentType: WIRE_CONTENT_TYPE,
      body: Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength),
    };
  }
  return { contentType: JSON_CONTENT_TYPE, body: payload };
}
