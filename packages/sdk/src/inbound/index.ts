export { InboundService, type InboundServiceOptions, type OpenExchangeOptions } from './service.js';
export { ExchangeSession, type ExchangeSessionOptions } from './session.js';
export { ResponseCorrelator } from './response-correlator.js';
export { ContextSwitcher } from './context-switcher.js';
export { TenantContextCache } from './tenant-cache.js';
export { selectTenant } from './selection.js';
export {
  resolveInboundConfig,
  normalizeTimeout,
  DEFAULT_SETTINGS,
  DEFAULT_EXCHANGE,
  MAX_RESPONSE_TIMEOUT_MS,
  type InboundConfig,
  type ResolvedInboundConfig,
  type InboundCollaborators,
  type InboundHooks,
  type TenantSelectionPolicy,
  type TenantSelector,
  type UnroutedPolicy,
} from './config.js';
