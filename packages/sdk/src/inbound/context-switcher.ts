import {
  withTenant,
  type ProcessingContext,
  type TenantId,
} from '@walletgate/core';
import type { TenantContextCache } from './tenant-cache.js';

/**
 * Produces tenant-scoped copies of a processing context.
 *
 * The base context is never touched; the tenant's store is opened (once per
 * tenant) through the shared cache.
 */
export class ContextSwitcher {
  private cache: TenantContextCache;

  constructor(cache: TenantContextCache) {
    this.cache = cache;
  }

  async switchTo(base: ProcessingContext, tenantId: TenantId): Promise<ProcessingContext> {
    if (base.tenant?.tenantId === tenantId) {
      return base;
    }
    const tenant = await this.cache.acquire(tenantId);
    return withTenant(base, tenant);
  }
}
