/**
 * Environment configuration for the inbound daemon.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { MAX_RESPONSE_TIMEOUT_MS, type InboundConfig } from '../inbound/config.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const port = z.coerce.number().int().min(0).max(65535);

export const inboundEnvSchema = z.object({
  WALLETGATE_HOST: z.string().min(1).default('0.0.0.0'),
  WALLETGATE_PORT: port.default(8020),
  WALLETGATE_WS_PORT: port.optional(),
  WALLETGATE_TENANT_ROUTING: booleanFlag.default('false'),
  WALLETGATE_TENANT_SELECTION: z.enum(['first', 'sole']).default('first'),
  WALLETGATE_UNROUTED_POLICY: z.enum(['default', 'reject']).default('default'),
  WALLETGATE_RESPONSE_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_RESPONSE_TIMEOUT_MS).default(30_000),
  WALLETGATE_MAX_MESSAGE_SIZE: z.coerce.number().int().positive().optional(),
  WALLETGATE_LABEL: z.string().optional(),
});

export type InboundEnv = z.infer<typeof inboundEnvSchema>;

export interface DaemonSettings {
  host: string;
  port: number;
  wsPort?: number;
  maxMessageSize?: number;
  inbound: InboundConfig;
}

export interface LoadEnvOptions {
  /** dotenv file merged under the given environment */
  envFile?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Parse daemon settings from the environment.
 * Throws with every offending variable listed when validation fails.
 */
export function loadDaemonSettings(options: LoadEnvOptions = {}): DaemonSettings {
  const env: NodeJS.ProcessEnv = { ...(options.env ?? process.env) };

  if (options.envFile) {
    const loaded = loadDotenv({ path: options.envFile, processEnv: {} });
    if (loaded.error) {
      console.warn(`[WalletGate:Config] Could not read ${options.envFile}: ${loaded.error.message}`);
    } else {
      console.log(`[WalletGate:Config] Loaded from ${options.envFile}`);
      for (const [key, value] of Object.entries(loaded.parsed ?? {})) {
        if (env[key] === undefined) env[key] = value;
      }
    }
  }

  const parsed = inboundEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid WalletGate environment: ${issues}`);
  }

  return toDaemonSettings(parsed.data);
}

export function toDaemonSettings(env: InboundEnv): DaemonSettings {
  return {
    host: env.WALLETGATE_HOST,
    port: env.WALLETGATE_PORT,
    wsPort: env.WALLETGATE_WS_PORT,
    maxMessageSize: env.WALLETGATE_MAX_MESSAGE_SIZE,
    inbound: {
      settings: {
        tenantRouting: env.WALLETGATE_TENANT_ROUTING,
        label: env.WALLETGATE_LABEL,
      },
      tenantSelection: env.WALLETGATE_TENANT_SELECTION,
      unroutedPolicy: env.WALLETGATE_UNROUTED_POLICY,
      responseTimeoutMs: env.WALLETGATE_RESPONSE_TIMEOUT_MS,
    },
  };
}
