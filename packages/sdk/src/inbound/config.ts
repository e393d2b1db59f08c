/**
 * WalletGate Inbound Configuration
 */

import type {
  ContextSettings,
  ExchangeInfo,
  MessageDispatcher,
  MessageUnpacker,
  TenantId,
  TenantResolver,
  TenantStoreProvider,
} from '@walletgate/core';

// ========== Tenant Routing ==========

/** Picks one tenant out of the resolver's candidates; null means none */
export type TenantSelector = (candidates: TenantId[]) => TenantId | null;

export type TenantSelectionPolicy = 'first' | 'sole' | TenantSelector;

/** What to do when routing is enabled but no tenant claims the message */
export type UnroutedPolicy = 'default' | 'reject';

// ========== Collaborators ==========

export interface InboundCollaborators {
  unpacker: MessageUnpacker;
  dispatcher: MessageDispatcher;
  /** Required when settings.tenantRouting is enabled */
  resolver?: TenantResolver;
  /** Required when settings.tenantRouting is enabled */
  storeProvider?: TenantStoreProvider;
}

// ========== Hooks ==========

export interface InboundHooks {
  onExchangeOpened?: (info: ExchangeInfo) => void;
  onTenantResolved?: (exchangeId: string, tenantId: TenantId) => void;
  onResponseWindowClosed?: (exchangeId: string) => void;
  onExchangeClosed?: (info: ExchangeInfo) => void;
  onError?: (exchangeId: string, error: Error) => void;
}

// ========== Config ==========

export interface InboundConfig {
  settings?: Partial<ContextSettings>;
  tenantSelection?: TenantSelectionPolicy;
  unroutedPolicy?: UnroutedPolicy;
  responseTimeoutMs?: number;
  hooks?: InboundHooks;
}

// ========== Defaults ==========

export const DEFAULT_SETTINGS = {
  tenantRouting: false,
} as const;

/** Longest delay a Node timer honours; larger values fire at once */
export const MAX_RESPONSE_TIMEOUT_MS = 2_147_483_647;

export const DEFAULT_EXCHANGE = {
  tenantSelection: 'first',
  unroutedPolicy: 'default',
  responseTimeoutMs: 30_000,
} as const;

// ========== Resolved ==========

export interface ResolvedInboundConfig {
  settings: ContextSettings;
  tenantSelection: TenantSelectionPolicy;
  unroutedPolicy: UnroutedPolicy;
  responseTimeoutMs: number;
  hooks: InboundHooks;
}

export function resolveInboundConfig(config: InboundConfig = {}): ResolvedInboundConfig {
  const label = config.settings?.label;
  return {
    settings: {
      tenantRouting: config.settings?.tenantRouting ?? DEFAULT_SETTINGS.tenantRouting,
      ...(label !== undefined ? { label } : {}),
    },
    tenantSelection: config.tenantSelection ?? DEFAULT_EXCHANGE.tenantSelection,
    unroutedPolicy: config.unroutedPolicy ?? DEFAULT_EXCHANGE.unroutedPolicy,
    responseTimeoutMs: normalizeTimeout(config.responseTimeoutMs, DEFAULT_EXCHANGE.responseTimeoutMs),
    hooks: config.hooks ?? {},
  };
}

/**
 * Unbounded or non-positive waits fall back to the given default; waits past
 * the timer limit are capped at MAX_RESPONSE_TIMEOUT_MS.
 */
export function normalizeTimeout(timeoutMs: number | undefined, fallbackMs: number): number {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return Math.min(fallbackMs, MAX_RESPONSE_TIMEOUT_MS);
  }
  return Math.min(timeoutMs, MAX_RESPONSE_TIMEOUT_MS);
}
