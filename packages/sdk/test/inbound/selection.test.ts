import { describe, it, expect } from 'vitest';
import { TenantResolutionError } from '@walletgate/core';
import { selectTenant } from '../../src/inbound/selection.js';

describe('selectTenant', () => {
  it('should return null when there are no candidates', () => {
    expect(selectTenant([], 'first')).toBeNull();
    expect(selectTenant([], 'sole')).toBeNull();
  });

  it('should pick the first candidate by default policy', () => {
    expect(selectTenant(['alice', 'bob'], 'first')).toBe('alice');
  });

  it('should treat a repeated tenant as a single candidate', () => {
    expect(selectTenant(['alice', 'alice'], 'sole')).toBe('alice');
  });

  it('should refuse ambiguous messages under the sole policy', () => {
    let caught: unknown;
    try {
      selectTenant(['alice', 'bob', 'alice'], 'sole', 'exch_1');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(TenantResolutionError);
    expect(caught).toMatchObject({
      message: 'Tenant resolution failed: Message is addressed to 2 tenants',
      hint: 'Candidates: alice, bob',
      exchangeId: 'exch_1',
    });
  });

  it('should apply a custom selector to the deduplicated candidates', () => {
    const seen: string[][] = [];
    const selected = selectTenant(['alice', 'bob', 'bob'], (candidates) => {
      seen.push(candidates);
      return candidates[candidates.length - 1] ?? null;
    });

    expect(selected).toBe('bob');
    expect(seen).toEqual([['alice', 'bob']]);
  });

  it('should allow a selector to decline', () => {
    expect(selectTenant(['alice'], () => null)).toBeNull();
  });

  it('should reject a selector result outside the candidates', () => {
    expect(() => selectTenant(['alice'], () => 'mallory')).toThrow(
      "Tenant resolution failed: Selector returned 'mallory', which is not a candidate",
    );
  });
});
