/**
 * ID Generation Utilities
 */

import { randomUUID, randomBytes } from 'node:crypto';

export type IdLength = 'short' | 'medium' | 'long' | 'full';

export interface GenerateIdOptions {
  prefix?: string;
  length?: IdLength;
}

const HEX_CHARS: Record<IdLength, number> = {
  short: 8,
  medium: 12,
  long: 16,
  full: 32,
};

/**
 * Generate a random hex ID, optionally prefixed.
 *
 * @example
 * generateId() // "9f2c41d0b7e3"
 * generateId({ prefix: 'exch', length: 'long' }) // "exch_9f2c41d0b7e35a18"
 */
export function generateId(options: GenerateIdOptions = {}): string {
  const { prefix, length = 'medium' } = options;
  const chars = HEX_CHARS[length];

  const id = length === 'full'
    ? randomUUID().replace(/-/g, '')
    : randomBytes(Math.ceil(chars / 2)).toString('hex').slice(0, chars);

  return prefix ? `${prefix}_${id}` : id;
}

export function generateExchangeId(length: IdLength = 'long'): string {
  return generateId({ prefix: 'exch', length });
}

/** ID for a WebSocket connection carrying several exchanges */
export function generateSocketId(length: IdLength = 'short'): string {
  return generateId({ prefix: 'sock', length });
}
