/**
 * WalletGate Inbound Service
 */

import {
  type ExchangeInfo,
  type InboundRequest,
  type InboundRequestHandler,
  type InboundResult,
  type InboundServiceStatus,
  type PeerInfo,
  type ProcessingContext,
  type ResponsePayload,
  createProcessingContext,
  isClientFault,
} from '@walletgate/core';
import {
  type InboundCollaborators,
  type InboundConfig,
  type InboundHooks,
  type ResolvedInboundConfig,
  resolveInboundConfig,
} from './config.js';
import { ContextSwitcher } from './context-switcher.js';
import { ResponseCorrelator } from './response-correlator.js';
import { ExchangeSession } from './session.js';
import { TenantContextCache } from './tenant-cache.js';

export interface InboundServiceOptions {
  collaborators: InboundCollaborators;
  config?: InboundConfig;
}

export interface OpenExchangeOptions {
  acceptUndelivered?: boolean;
}

export class InboundService implements InboundRequestHandler {
  readonly defaultContext: ProcessingContext;

  private config: ResolvedInboundConfig;
  private collaborators: InboundCollaborators;
  private hooks: InboundHooks;
  private correlator = new ResponseCorrelator();
  private tenantCache: TenantContextCache | null;
  private switcher: ContextSwitcher | null;
  private sessions = new Map<string, ExchangeSession>();

  constructor(options: InboundServiceOptions) {
    this.config = resolveInboundConfig(options.config);
    this.collaborators = options.collaborators;

    if (this.config.settings.tenantRouting && (!this.collaborators.resolver || !this.collaborators.storeProvider)) {
      throw new Error('Tenant routing requires both a tenant resolver and a tenant store provider');
    }

    const storeProvider = this.collaborators.storeProvider;
    this.tenantCache = storeProvider ? new TenantContextCache(storeProvider) : null;
    this.switcher = this.tenantCache ? new ContextSwitcher(this.tenantCache) : null;
    this.defaultContext = createProcessingContext(this.config.settings);

    this.hooks = {
      ...this.config.hooks,
      onExchangeClosed: (info) => {
        this.sessions.delete(info.id);
        this.config.hooks.onExchangeClosed?.(info);
      },
    };
  }

  /** Open an exchange bound to the default context */
  openExchange(peer: PeerInfo, options: OpenExchangeOptions = {}): ExchangeSession {
    const session = new ExchangeSession({
      peer,
      context: this.defaultContext,
      acceptUndelivered: options.acceptUndelivered,
      config: this.config,
      hooks: this.hooks,
      unpacker: this.collaborators.unpacker,
      dispatcher: this.collaborators.dispatcher,
      correlator: this.correlator,
      resolver: this.collaborators.resolver,
      switcher: this.switcher ?? undefined,
    });

    this.sessions.set(session.id, session);
    this.hooks.onExchangeOpened?.(session.getInfo());
    return session;
  }

  /** Run `fn` with a fresh exchange that is closed on every exit path */
  async withExchange<T>(
    peer: PeerInfo,
    fn: (session: ExchangeSession) => Promise<T>,
    options?: OpenExchangeOptions,
  ): Promise<T> {
    const session = this.openExchange(peer, options);
    try {
      return await fn(session);
    } finally {
      await session.close();
    }
  }

  async handleInbound(request: InboundRequest): Promise<InboundResult> {
    return this.withExchange<InboundResult>(request.peer, async (session) => {
      const exchangeId = session.id;
      const onAbort = () => session.cancel('transport connection closed');
      if (request.signal?.aborted) {
        onAbort();
      } else {
        request.signal?.addEventListener('abort', onAbort, { once: true });
      }

      try {
        await session.resolveTenant(request.body);
        const message = await session.receive(request.body);

        if (!message.receipt.directResponseRequested) {
          return { outcome: 'accepted', exchangeId };
        }

        const payload = await session.awaitResponse(request.responseTimeoutMs);
        // An empty reply is no reply
        return payload === null || payload.length === 0
          ? { outcome: 'accepted', exchangeId }
          : { outcome: 'responded', exchangeId, payload };
      } catch (error) {
        return this.toFailure(exchangeId, error);
      } finally {
        request.signal?.removeEventListener('abort', onAbort);
      }
    }, { acceptUndelivered: true });
  }

  notifyResponseReady(exchangeId: string, payload: ResponsePayload): boolean {
    return this.correlator.deliver(exchangeId, payload);
  }

  getStatus(): InboundServiceStatus {
    const exchanges: ExchangeInfo[] = Array.from(this.sessions.values()).map(s => s.getInfo());
    return {
      openExchanges: exchanges.length,
      pendingResponses: this.correlator.pendingCount,
      cachedTenants: this.tenantCache?.size ?? 0,
      exchanges,
    };
  }

  async shutdown(): Promise<void> {
    const sessions = Array.from(this.sessions.values());
    for (const session of sessions) {
      session.cancel('service shutting down');
    }
    await Promise.all(sessions.map(s => s.close()));
    await this.tenantCache?.closeAll();
  }

  private toFailure(exchangeId: string, error: unknown): InboundResult {
    const err = error instanceof Error ? error : new Error(String(error));

    if (isClientFault(err)) {
      console.warn(`[WalletGate:Exchange] Rejected ${exchangeId}: ${err.message}`);
      return { outcome: 'rejected', exchangeId, error: err };
    }

    console.error(`[WalletGate:Exchange] Exchange ${exchangeId} failed:`, err.message);
    this.hooks.onError?.(exchangeId, err);
    return { outcome: 'failed', exchangeId, error: err };
  }
}
