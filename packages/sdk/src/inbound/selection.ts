import { TenantResolutionError, type TenantId } from '@walletgate/core';
import type { TenantSelectionPolicy } from './config.js';

/**
 * Apply the configured selection policy to the resolver's candidates.
 *
 * Returns null when there is no candidate to route to. Duplicates are
 * collapsed first, so one tenant listed twice is not ambiguous.
 */
export function selectTenant(
  candidates: TenantId[],
  policy: TenantSelectionPolicy,
  exchangeId?: string,
): TenantId | null {
  const unique = Array.from(new Set(candidates));
  if (unique.length === 0) return null;

  if (typeof policy === 'function') {
    const selected = policy(unique);
    if (selected !== null && !unique.includes(selected)) {
      throw new TenantResolutionError(
        `Selector returned '${selected}', which is not a candidate`,
        selected,
        `Candidates: ${unique.join(', ')}`,
        exchangeId,
      );
    }
    return selected;
  }

  if (policy === 'sole' && unique.length > 1) {
    throw new TenantResolutionError(
      `Message is addressed to ${unique.length} tenants`,
      undefined,
      `Candidates: ${unique.join(', ')}`,
      exchangeId,
    );
  }

  return unique[0] ?? null;
}
