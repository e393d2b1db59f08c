/**
 * In-process collaborators for the inbound tests.
 *
 * Test bodies are JSON objects: `direct` requests a direct response, `to`
 * lists the tenants the resolver reports, `reply`/`replyBytes` tell the
 * dispatcher what to answer with.
 */

import { vi } from 'vitest';
import {
  MessageParseError,
  type InboundBody,
  type InboundEnvelope,
  type ParsedMessage,
  type ResponsePayload,
  type TenantId,
  type TenantStore,
} from '@walletgate/core';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function decodeBody(body: InboundBody): string {
  return typeof body === 'string' ? body : Buffer.from(body).toString('utf8');
}

export function testMessage(fields: Record<string, unknown>): string {
  return JSON.stringify(fields);
}

function parseRecord(body: InboundBody): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(decodeBody(body));
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function createUnpacker() {
  return {
    unpack: vi.fn(async (body: InboundBody): Promise<ParsedMessage> => {
      const payload = parseRecord(body);
      if (!payload) {
        throw new MessageParseError('not a packed message');
      }
      return {
        receipt: { directResponseRequested: payload['direct'] === true },
        payload,
      };
    }),
  };
}

export function replyFromMessage(envelope: InboundEnvelope): ResponsePayload | null {
  const payload = envelope.message.payload;
  if (!isRecord(payload)) return null;
  const reply = payload['reply'];
  if (typeof reply === 'string') return reply;
  const bytes = payload['replyBytes'];
  if (Array.isArray(bytes)) {
    return Uint8Array.from(bytes.filter((n): n is number => typeof n === 'number'));
  }
  return null;
}

export function createDispatcher(respond: (envelope: InboundEnvelope) => ResponsePayload | null = replyFromMessage) {
  const envelopes: InboundEnvelope[] = [];
  const replies: boolean[] = [];
  const dispatcher = {
    dispatch: vi.fn((envelope: InboundEnvelope) => {
      envelopes.push(envelope);
      const payload = respond(envelope);
      if (payload !== null) {
        replies.push(envelope.reply(payload));
      }
    }),
  };
  return { dispatcher, envelopes, replies };
}

export function createResolver() {
  return {
    resolve: vi.fn(async (body: InboundBody): Promise<TenantId[]> => {
      const to = parseRecord(body)?.['to'];
      return Array.isArray(to) ? to.filter((t): t is string => typeof t === 'string') : [];
    }),
  };
}

export function createStoreProvider(known: TenantId[], delayMs = 0) {
  const closed: TenantId[] = [];
  const provider = {
    open: vi.fn(async (tenantId: TenantId): Promise<TenantStore> => {
      if (delayMs > 0) await sleep(delayMs);
      if (!known.includes(tenantId)) {
        throw new Error(`Unknown tenant ${tenantId}`);
      }
      return {
        tenantId,
        close: async () => {
          closed.push(tenantId);
        },
      };
    }),
  };
  return { provider, closed };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
