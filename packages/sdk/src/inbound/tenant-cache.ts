/**
 * Tenant Context Cache
 *
 * Process-wide cache of opened tenant stores. Concurrent first opens of the
 * same tenant share one in-flight open; a failed open is evicted so the
 * next exchange can try again.
 */

import {
  TenantResolutionError,
  type TenantContext,
  type TenantId,
  type TenantStoreProvider,
} from '@walletgate/core';

export class TenantContextCache {
  private provider: TenantStoreProvider;
  private contexts = new Map<TenantId, Promise<TenantContext>>();

  constructor(provider: TenantStoreProvider) {
    this.provider = provider;
  }

  get size(): number {
    return this.contexts.size;
  }

  has(tenantId: TenantId): boolean {
    return this.contexts.has(tenantId);
  }

  acquire(tenantId: TenantId): Promise<TenantContext> {
    const cached = this.contexts.get(tenantId);
    if (cached) return cached;

    const opening: Promise<TenantContext> = this.open(tenantId).catch((error: unknown) => {
      if (this.contexts.get(tenantId) === opening) {
        this.contexts.delete(tenantId);
      }
      throw error;
    });
    this.contexts.set(tenantId, opening);
    return opening;
  }

  async closeAll(): Promise<void> {
    const entries = Array.from(this.contexts.entries());
    this.contexts.clear();

    for (const [tenantId, pending] of entries) {
      try {
        const context = await pending;
        await context.store.close?.();
      } catch (error) {
        console.warn(
          `[WalletGate:Tenants] Failed to close store for ${tenantId}:`,
          error instanceof Error ? error.message : error,
        );
      }
    }
  }

  private async open(tenantId: TenantId): Promise<TenantContext> {
    try {
      const store = await this.provider.open(tenantId);
      console.log(`[WalletGate:Tenants] Opened store for ${tenantId} (cached=${this.contexts.size})`);
      return Object.freeze({
        tenantId,
        store,
        openedAt: new Date().toISOString(),
      });
    } catch (error) {
      if (error instanceof TenantResolutionError) throw error;
      throw new TenantResolutionError(
        `Unable to open store: ${error instanceof Error ? error.message : String(error)}`,
        tenantId,
        'Check that the tenant exists and its store is unlocked',
      );
    }
  }
}
