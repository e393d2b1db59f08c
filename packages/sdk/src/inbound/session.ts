/**
 * Exchange Session
 *
 * Lifecycle of one inbound exchange: tenant resolution, receipt, optional
 * direct-response wait and guaranteed teardown.
 */

import {
  type ExchangeEvent,
  type ExchangeInfo,
  type ExchangeScope,
  type ExchangeState,
  type InboundBody,
  type InboundEnvelope,
  type MessageDispatcher,
  type MessageReceipt,
  type MessageUnpacker,
  type ParsedMessage,
  type PeerInfo,
  type ProcessingContext,
  type ResponsePayload,
  type TenantId,
  type TenantResolver,
  ErrorCodes,
  ExchangeStateError,
  ExchangeStateMachine,
  TenantResolutionError,
  createExchangeInfo,
  generateExchangeId,
} from '@walletgate/core';
import { normalizeTimeout, type InboundHooks, type ResolvedInboundConfig } from './config.js';
import type { ContextSwitcher } from './context-switcher.js';
import type { ResponseCorrelator } from './response-correlator.js';
import { selectTenant } from './selection.js';

type Cleanup = () => void | Promise<void>;

export interface ExchangeSessionOptions {
  id?: string;
  peer: PeerInfo;
  /** Process-wide default context; replaced only by substitution */
  context: ProcessingContext;
  acceptUndelivered?: boolean;
  config: ResolvedInboundConfig;
  hooks?: InboundHooks;
  unpacker: MessageUnpacker;
  dispatcher: MessageDispatcher;
  correlator: ResponseCorrelator;
  resolver?: TenantResolver;
  switcher?: ContextSwitcher;
}

export class ExchangeSession implements ExchangeScope {
  readonly id: string;

  private config: ResolvedInboundConfig;
  private hooks: InboundHooks;
  private unpacker: MessageUnpacker;
  private dispatcher: MessageDispatcher;
  private correlator: ResponseCorrelator;
  private resolver?: TenantResolver;
  private switcher?: ContextSwitcher;

  private currentContext: ProcessingContext;
  private stateMachine = new ExchangeStateMachine();
  private info: ExchangeInfo;
  private receipt: MessageReceipt | null = null;
  private cleanups: Cleanup[] = [];
  private abortController = new AbortController();
  private closing: Promise<void> | null = null;

  constructor(options: ExchangeSessionOptions) {
    this.id = options.id ?? generateExchangeId();
    this.config = options.config;
    this.hooks = options.hooks ?? options.config.hooks;
    this.unpacker = options.unpacker;
    this.dispatcher = options.dispatcher;
    this.correlator = options.correlator;
    this.resolver = options.resolver;
    this.switcher = options.switcher;
    this.currentContext = options.context;
    this.info = createExchangeInfo({
      id: this.id,
      peer: options.peer,
      acceptUndelivered: options.acceptUndelivered ?? false,
    });
  }

  get exchangeId(): string {
    return this.id;
  }

  get context(): ProcessingContext {
    return this.currentContext;
  }

  get state(): ExchangeState {
    return this.stateMachine.getState();
  }

  get canRespond(): boolean {
    return this.info.canRespond;
  }

  get acceptUndelivered(): boolean {
    return this.info.acceptUndelivered;
  }

  get tenantId(): TenantId | null {
    return this.info.tenantId;
  }

  get isClosed(): boolean {
    return this.stateMachine.isTerminal();
  }

  getInfo(): ExchangeInfo {
    return { ...this.info, peer: { ...this.info.peer }, state: this.state };
  }

  /**
   * Bind the exchange to the tenant owning the message, when routing is
   * enabled. The tenant's store is opened only after a tenant is selected.
   */
  async resolveTenant(body: InboundBody): Promise<ProcessingContext> {
    if (this.state !== 'open') {
      throw new ExchangeStateError(`Cannot resolve tenant for exchange ${this.id} in state '${this.state}'`, this.id);
    }

    if (this.currentContext.settings.tenantRouting) {
      const tenantId = await this.selectTenant(body);

      if (tenantId !== null) {
        if (!this.switcher) {
          throw new TenantResolutionError('No tenant store provider configured', tenantId, undefined, this.id);
        }
        const scoped = await this.switcher.switchTo(this.currentContext, tenantId);
        this.assertNotClosed('tenant resolution');
        this.currentContext = scoped;
        this.info.tenantId = tenantId;
        this.hooks.onTenantResolved?.(this.id, tenantId);
      }
    }

    this.transition({ type: 'CONTEXT_RESOLVED' });
    return this.currentContext;
  }

  /**
   * Unpack the body with the exchange's context and hand it to the dispatcher.
   * Throws MessageParseError for bodies that cannot be authenticated.
   */
  async receive(body: InboundBody): Promise<ParsedMessage> {
    this.transition({ type: 'BEGIN_RECEIVE' });

    const message = await this.unpacker.unpack(body, this.currentContext, this);
    this.assertNotClosed('receive');

    this.receipt = message.receipt;
    const directResponse = message.receipt.directResponseRequested;
    if (directResponse) {
      this.correlator.register(this.id);
    } else {
      this.transition({ type: 'NO_RESPONSE' });
    }

    const info = this.info;
    this.dispatch({
      exchangeId: this.id,
      message,
      context: this.currentContext,
      acceptUndelivered: info.acceptUndelivered,
      get canRespond() {
        return directResponse && info.canRespond;
      },
      reply: (payload) => this.correlator.deliver(this.id, payload),
    });

    return message;
  }

  /**
   * Suspend until the dispatcher delivers a direct response, the timeout
   * elapses or the exchange is cancelled. The response window is closed on
   * return either way.
   */
  async awaitResponse(timeoutMs?: number): Promise<ResponsePayload | null> {
    if (this.state === 'awaiting_response') {
      throw new ExchangeStateError(
        `A response wait is already pending for exchange ${this.id}`,
        this.id,
        ErrorCodes.RESPONSE_WAIT_CONFLICT,
      );
    }
    if (this.state !== 'receiving' || !this.receipt?.directResponseRequested) {
      throw new ExchangeStateError(
        `Exchange ${this.id} is not waiting for a direct response (state '${this.state}')`,
        this.id,
      );
    }

    this.transition({ type: 'AWAIT_RESPONSE' });
    const timeout = normalizeTimeout(timeoutMs, this.config.responseTimeoutMs);

    let payload: ResponsePayload | null;
    try {
      payload = await this.correlator.wait(this.id, timeout, this.abortController.signal);
    } finally {
      this.closeResponseWindow();
      this.correlator.release(this.id);
    }

    if (this.isClosed) {
      return null;
    }

    if (payload === null) {
      const reason = this.abortController.signal.aborted ? 'cancelled' : `timed out after ${timeout}ms`;
      console.log(`[WalletGate:Exchange] No direct response for ${this.id} (${reason})`);
      this.transition({ type: 'NO_RESPONSE' });
    } else {
      this.transition({ type: 'RESPONSE_DELIVERED' });
    }
    return payload;
  }

  /** Abort a pending response wait, e.g. when the peer disconnects */
  cancel(reason = 'cancelled'): void {
    if (this.abortController.signal.aborted || this.isClosed) return;
    console.log(`[WalletGate:Exchange] Cancelling ${this.id}: ${reason}`);
    this.abortController.abort();
  }

  /** Register a resource to release when the exchange closes */
  defer(cleanup: Cleanup): void {
    if (this.closing) {
      throw new ExchangeStateError(`Exchange ${this.id} is already closed`, this.id);
    }
    this.cleanups.push(cleanup);
  }

  /** Idempotent; concurrent callers share one teardown */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.teardown();
    }
    return this.closing;
  }

  private async teardown(): Promise<void> {
    this.closeResponseWindow();
    this.correlator.release(this.id);
    this.transition({ type: 'CLOSE' });

    const cleanups = this.cleanups.splice(0).reverse();
    for (const cleanup of cleanups) {
      try {
        await cleanup();
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        console.warn(`[WalletGate:Exchange] Cleanup failed for ${this.id}:`, err.message);
        this.hooks.onError?.(this.id, err);
      }
    }

    this.info.closedAt = new Date().toISOString();
    this.hooks.onExchangeClosed?.(this.getInfo());
  }

  private async selectTenant(body: InboundBody): Promise<TenantId | null> {
    if (!this.resolver) {
      throw new TenantResolutionError('Tenant routing is enabled but no resolver is configured', undefined, undefined, this.id);
    }

    let candidates: TenantId[];
    try {
      candidates = await this.resolver.resolve(body);
    } catch (error) {
      if (error instanceof TenantResolutionError) throw error;
      throw new TenantResolutionError(
        error instanceof Error ? error.message : String(error),
        undefined,
        undefined,
        this.id,
      );
    }
    this.assertNotClosed('tenant resolution');

    const tenantId = selectTenant(candidates, this.config.tenantSelection, this.id);
    if (tenantId === null && this.config.unroutedPolicy === 'reject') {
      throw new TenantResolutionError(
        'No tenant claims the message',
        undefined,
        'Check that the recipient key belongs to a tenant of this node',
        this.id,
      );
    }
    return tenantId;
  }

  private dispatch(envelope: InboundEnvelope): void {
    Promise.resolve()
      .then(() => this.dispatcher.dispatch(envelope))
      .catch((error: unknown) => {
        const err = error instanceof Error ? error : new Error(String(error));
        console.error(`[WalletGate:Exchange] Dispatch failed for ${this.id}:`, err.message);
        this.hooks.onError?.(this.id, err);
      });
  }

  private closeResponseWindow(): void {
    if (!this.info.canRespond) return;
    this.info.canRespond = false;
    this.hooks.onResponseWindowClosed?.(this.id);
  }

  private assertNotClosed(step: string): void {
    if (this.isClosed) {
      throw new ExchangeStateError(`Exchange ${this.id} was closed during ${step}`, this.id);
    }
  }

  private transition(event: ExchangeEvent): void {
    const result = this.stateMachine.transition(event);
    if (!result.success) {
      throw new ExchangeStateError(
        `Cannot apply ${event.type} to exchange ${this.id}: ${result.error}`,
        this.id,
      );
    }
    this.info.state = result.newState;
  }
}
