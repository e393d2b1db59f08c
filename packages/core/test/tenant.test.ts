import { describe, it, expect } from 'vitest';
import { createProcessingContext, withTenant } from '../src/types/tenant.js';
import type { TenantContext } from '../src/types/tenant.js';

const tenant: TenantContext = {
  tenantId: 'tenant-a',
  store: { tenantId: 'tenant-a' },
  openedAt: '2026-01-01T00:00:00.000Z',
};

describe('createProcessingContext', () => {
  it('should freeze the context and a copy of its settings', () => {
    const settings = { tenantRouting: true, label: 'node' };
    const context = createProcessingContext(settings);

    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context.settings)).toBe(true);
    expect(context.settings).not.toBe(settings);
    expect(context.settings).toEqual({ tenantRouting: true, label: 'node' });
    expect(context.tenant).toBeNull();
  });
});

describe('withTenant', () => {
  it('should substitute a new context and leave the base untouched', () => {
    const base = createProcessingContext({ tenantRouting: true });
    const scoped = withTenant(base, tenant);

    expect(scoped).not.toBe(base);
    expect(scoped.tenant).toBe(tenant);
    expect(scoped.settings).toBe(base.settings);
    expect(base.tenant).toBeNull();
    expect(Object.isFrozen(scoped)).toBe(true);
  });
});
