/**
 * @walletgate/sdk
 *
 * WalletGate SDK - Inbound exchange sessions, tenant routing and listeners
 */

// ============================================
// High-level API
// ============================================

export {
  startInboundDaemon,
  loadDaemonSettings,
  type DaemonSettings,
  type InboundDaemonOptions,
  type InboundDaemonInstance,
} from './daemon/index.js';

export {
  InboundService,
  type InboundServiceOptions,
  type InboundConfig,
  type InboundCollaborators,
  type InboundHooks,
  type TenantSelectionPolicy,
  type UnroutedPolicy,
} from './inbound/index.js';

// ============================================
// Low-level API
// ============================================

export {
  ExchangeSession,
  ResponseCorrelator,
  ContextSwitcher,
  TenantContextCache,
  selectTenant,
  resolveInboundConfig,
  type ExchangeSessionOptions,
  type ResolvedInboundConfig,
} from './inbound/index.js';

export {
  HttpListener,
  WebSocketListener,
  INVITATION_TEXT,
  INTERNAL_ERROR_TEXT,
  type HttpListenerConfig,
  type WebSocketListenerConfig,
} from './listener/index.js';

export { createListeners, toDaemonSettings, inboundEnvSchema, type InboundEnv } from './daemon/index.js';

// Re-export core types for convenience
export * from '@walletgate/core';
