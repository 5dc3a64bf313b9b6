import { Keypair } from '@solana/web3.js';
import { describe, it, expect } from 'vitest';

import { createSaleApp } from '../src/app';
import { ConfigError, loadConfig } from '../src/config';
import { wallet } from './helpers';

const REQUIRED = {
  SALE_OWNER: wallet(200),
  SALE_CUSTODY_ADDRESS: wallet(201),
};

function issuesOf(env: Record<string, string>): string[] {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  return [];
}

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig(REQUIRED);

    expect(config.port).toBe(3000);
    expect(config.tierLimits).toEqual([30_000_000_000n, 80_000_000_000n, 150_000_000_000n]);
    expect(config.individualCap).toBe(5_000_000_000n);
    expect(config.increment).toBe(100_000_000n);
    expect(config.maxIncrement).toBe(10_000_000_000n);
    expect(config.incrementTimelockMs).toBe(172_800_000);
    expect(config.maxPageSize).toBe(100);
    expect(config.escrow).toBeNull();
  });

  it('should parse explicit values', () => {
    const config = loadConfig({
      ...REQUIRED,
      PORT: '8080',
      SALE_TIER_LIMITS: '30, 80, 150',
      SALE_INCREMENT: '5',
      SALE_MAX_INCREMENT: '50',
    });

    expect(config.port).toBe(8080);
    expect(config.tierLimits).toEqual([30n, 80n, 150n]);
    expect(config.increment).toBe(5n);
  });

  it('should require the owner and custody addresses', () => {
    expect(issuesOf({})).toEqual([
      'SALE_OWNER: Required',
      'SALE_CUSTODY_ADDRESS: Required',
    ]);
    expect(issuesOf({ ...REQUIRED, SALE_OWNER: 'nope' })).toEqual([
      'SALE_OWNER: must be a base58 public key',
    ]);
  });

  it('should reject tier limits that are not strictly increasing', () => {
    expect(issuesOf({ ...REQUIRED, SALE_TIER_LIMITS: '30,30,150' })).toEqual([
      'SALE_TIER_LIMITS: tier limits must be strictly increasing',
    ]);
  });

  it('should reject an increment above the ceiling', () => {
    expect(issuesOf({ ...REQUIRED, SALE_INCREMENT: '200', SALE_MAX_INCREMENT: '100' })).toEqual([
      'SALE_INCREMENT: must not exceed SALE_MAX_INCREMENT',
    ]);
  });

  it('should rebuild the escrow keypair from its JSON byte array', () => {
    const keypair = Keypair.fromSeed(new Uint8Array(32).fill(9));

    const config = loadConfig({
      ...REQUIRED,
      SALE_ESCROW_SECRET_KEY: JSON.stringify(Array.from(keypair.secretKey)),
    });

    expect(config.escrow?.publicKey.toBase58()).toBe(keypair.publicKey.toBase58());
  });

  it('should report a malformed escrow key with the other issues', () => {
    expect(issuesOf({ SALE_OWNER: wallet(200), SALE_ESCROW_SECRET_KEY: 'not-json' })).toEqual([
      'SALE_CUSTODY_ADDRESS: Required',
      'SALE_ESCROW_SECRET_KEY: must be a JSON array of 64 secret-key bytes',
    ]);
    expect(issuesOf({ ...REQUIRED, SALE_ESCROW_SECRET_KEY: '{"key":1}' })).toEqual([
      'SALE_ESCROW_SECRET_KEY: must be a JSON array of 64 secret-key bytes',
    ]);
    expect(issuesOf({ ...REQUIRED, SALE_ESCROW_SECRET_KEY: '[1,2,3]' })).toEqual([
      'SALE_ESCROW_SECRET_KEY: must be a JSON array of 64 secret-key bytes',
    ]);
  });

  it('should refuse to serve without an escrow key', () => {
    expect(() => createSaleApp(loadConfig(REQUIRED))).toThrow(
      'Invalid configuration: SALE_ESCROW_SECRET_KEY: required to forward deposits to custody'
    );
  });
});
