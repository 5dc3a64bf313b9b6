/**
 * Environment configuration, validated with zod.
 *
 * PORT                        (optional) HTTP port; default 3000
 * LOG_LEVEL                   (optional) pino level; default info
 * NODE_ENV                    (optional) development | test | production
 * SALE_OWNER                  (required) owner wallet (base58)
 * SALE_CUSTODY_ADDRESS        (required) custodial destination (base58)
 * SALE_TIER_LIMITS            (optional) cumulative limits "L1,L2,L3" in lamports
 * SALE_INDIVIDUAL_CAP         (optional) per-wallet cap for tiers 1 and 2
 * SALE_INCREMENT              (optional) initial contribution increment
 * SALE_MAX_INCREMENT          (optional) ceiling for proposed increments
 * SALE_INCREMENT_TIMELOCK_MS  (optional) propose → apply delay; default 48h
 * SALE_MAX_PAGE_SIZE          (optional) participant listing cap; default 100
 * SOLANA_RPC_URL              (optional) RPC endpoint
 * SALE_ESCROW_SECRET_KEY      (required to serve) escrow signer as a JSON array of
 *                             64 secret-key bytes
 */

import { Keypair, PublicKey } from '@solana/web3.js';
import { z } from 'zod';

import type { Amount, TierSchedule } from './sale/types';

export interface SaleConfig {
  port: number;
  logLevel: string;
  nodeEnv: 'development' | 'test' | 'production';
  owner: string;
  custodyAddress: string;
  tierLimits: TierSchedule;
  individualCap: Amount;
  increment: Amount;
  maxIncrement: Amount;
  incrementTimelockMs: number;
  maxPageSize: number;
  solanaRpcUrl: string;
  /** Null only when custody is supplied another way (tests) */
  escrow: Keypair | null;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const LAMPORTS_PER_SOL = 1_000_000_000n;

const lamports = z
  .string()
  .regex(/^\d+$/, 'must be a whole number of lamports')
  .transform(value => BigInt(value))
  .refine(value => value > 0n, 'must be positive');

const publicKey = z.string().refine(value => {
  try {
    new PublicKey(value);
    return true;
  } catch {
    return false;
  }
}, 'must be a base58 public key');

const tierLimits = z
  .string()
  .transform(value => value.split(',').map(part => part.trim()))
  .pipe(z.tuple([lamports, lamports, lamports]))
  .refine(([l1, l2, l3]) => l1 < l2 && l2 < l3, 'tier limits must be strictly increasing');

const BYTE_ARRAY = 'must be a JSON array of 64 secret-key bytes';

const escrowKey = z
  .string()
  .transform((value, ctx) => {
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: BYTE_ARRAY });
      return z.NEVER;
    }
  })
  .pipe(
    z
      .array(z.number().int().min(0).max(255), { invalid_type_error: BYTE_ARRAY })
      .length(64, BYTE_ARRAY)
  )
  .transform((bytes, ctx) => {
    try {
      return Keypair.fromSecretKey(Uint8Array.from(bytes));
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a valid ed25519 secret key' });
      return z.NEVER;
    }
  });

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  SALE_OWNER: publicKey,
  SALE_CUSTODY_ADDRESS: publicKey,
  SALE_TIER_LIMITS: tierLimits.default(
    [30n * LAMPORTS_PER_SOL, 80n * LAMPORTS_PER_SOL, 150n * LAMPORTS_PER_SOL].join(',')
  ),
  SALE_INDIVIDUAL_CAP: lamports.default((5n * LAMPORTS_PER_SOL).toString()),
  SALE_INCREMENT: lamports.default((LAMPORTS_PER_SOL / 10n).toString()),
  SALE_MAX_INCREMENT: lamports.default((10n * LAMPORTS_PER_SOL).toString()),
  SALE_INCREMENT_TIMELOCK_MS: z.coerce.number().int().min(0).default(48 * 60 * 60 * 1000),
  SALE_MAX_PAGE_SIZE: z.coerce.number().int().min(1).default(100),
  SOLANA_RPC_URL: z.string().url().default('https://api.devnet.solana.com'),
  SALE_ESCROW_SECRET_KEY: escrowKey.optional(),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SaleConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const data = parsed.data;
  if (data.SALE_INCREMENT > data.SALE_MAX_INCREMENT) {
    throw new ConfigError(['SALE_INCREMENT: must not exceed SALE_MAX_INCREMENT']);
  }

  return {
    port: data.PORT,
    logLevel: data.LOG_LEVEL,
    nodeEnv: data.NODE_ENV,
    owner: data.SALE_OWNER,
    custodyAddress: data.SALE_CUSTODY_ADDRESS,
    tierLimits: data.SALE_TIER_LIMITS,
    individualCap: data.SALE_INDIVIDUAL_CAP,
    increment: data.SALE_INCREMENT,
    maxIncrement: data.SALE_MAX_INCREMENT,
    incrementTimelockMs: data.SALE_INCREMENT_TIMELOCK_MS,
    maxPageSize: data.SALE_MAX_PAGE_SIZE,
    solanaRpcUrl: data.SOLANA_RPC_URL,
    escrow: data.SALE_ESCROW_SECRET_KEY ?? null,
  };
}
