/**
 * Tenant and Processing Context Types
 */

export type TenantId = string;

/** Handle on a tenant's opened store, owned by the wallet subsystem */
export interface TenantStore {
  readonly tenantId: TenantId;
  close?(): Promise<void>;
}

export interface TenantContext {
  readonly tenantId: TenantId;
  readonly store: TenantStore;
  readonly openedAt: string;
}

export interface ContextSettings {
  /** Resolve the owning tenant of every inbound message */
  readonly tenantRouting: boolean;
  readonly label?: string;
}

/**
 * Immutable per-exchange processing context.
 *
 * The process-wide default carries `tenant: null`. Tenant-scoped copies are
 * produced by substitution and share the default's settings.
 */
export interface ProcessingContext {
  readonly settings: Readonly<ContextSettings>;
  readonly tenant: TenantContext | null;
}

export function createProcessingContext(
  settings: ContextSettings,
  tenant: TenantContext | null = null,
): ProcessingContext {
  return Object.freeze({
    settings: Object.isFrozen(settings) ? settings : Object.freeze({ ...settings }),
    tenant,
  });
}

export function withTenant(base: ProcessingContext, tenant: TenantContext): ProcessingContext {
  return createProcessingContext(base.settings, tenant);
}
