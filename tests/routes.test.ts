import { describe, it, expect, beforeEach } from 'vitest';

import { createSaleApp } from '../src/app';
import type { SaleApp } from '../src/app';
import { loadConfig } from '../src/config';
import { makeNoopLogger } from '../src/logger';
import { FakeCustody, RecordingNotifier, wallet } from './helpers';

const OWNER = wallet(200);

function post(app: SaleApp['app'], path: string, body: unknown, caller?: string) {
  const headers: Record<string, string> = { 'content-type': 'application/json' };
  if (caller) headers['x-wallet-address'] = caller;
  return app.request(path, { method: 'POST', headers, body: JSON.stringify(body) });
}

describe('sale routes', () => {
  let sale: SaleApp;

  beforeEach(() => {
    const config = loadConfig({
      SALE_OWNER: OWNER,
      SALE_CUSTODY_ADDRESS: wallet(201),
      SALE_TIER_LIMITS: '30,80,150',
      SALE_INDIVIDUAL_CAP: '1000',
      SALE_INCREMENT: '1',
      SALE_MAX_INCREMENT: '100',
      SALE_MAX_PAGE_SIZE: '10',
      SALE_INCREMENT_TIMELOCK_MS: '1000',
    });
    sale = createSaleApp(config, {
      custody: new FakeCustody(),
      notifier: new RecordingNotifier(),
      logger: makeNoopLogger(),
    });
  });

  it('should record a deposit that straddles tiers', async () => {
    await post(sale.app, '/sale/deposit', { amount: '29' }, wallet(1));

    const res = await post(sale.app, '/sale/deposit', { amount: '5' }, wallet(2));
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.message).toBe('Deposit recorded in tier2');
    expect(body.outcome.bookings).toEqual([
      { tier: 1, amount: '1' },
      { tier: 2, amount: '4' },
    ]);
    expect(body.outcome.totalCollected).toBe('34');
    expect(body.transfer).toEqual({ destination: wallet(201), amount: '5', reference: 'tx-2' });
  });

  it('should report the sale status', async () => {
    await post(sale.app, '/sale/deposit', { amount: '40' }, wallet(1));

    const res = await sale.app.request('/sale/status');
    const body = await res.json();

    expect(body.status).toEqual({
      tierState: 'tier2',
      totalCollected: '40',
      tierLimits: ['30', '80', '150'],
      individualCap: '1000',
      increment: '1',
      pendingIncrement: null,
      maxPageSize: 10,
      participantCount: 1,
      paused: false,
      custodyDestination: wallet(201),
    });
  });

  it('should reject malformed deposit bodies', async () => {
    const res = await post(sale.app, '/sale/deposit', { amount: 5 }, wallet(1));
    const body = await res.json();

    expect(res.status).toBe(400);
    expect(body.error).toBe('Invalid request');
  });

  it('should map sale errors to their status codes', async () => {
    const res = await post(sale.app, '/sale/admin/reset', {}, wallet(1));

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      success: false,
      error: 'Only the sale owner may perform this action',
      code: 'Unauthorized',
    });
  });

  it('should refuse direct transfers', async () => {
    const res = await post(sale.app, '/sale/transfers', { amount: '10' }, wallet(1));
    const body = await res.json();

    expect(res.status).toBe(405);
    expect(body.code).toBe('UnsolicitedTransfer');
  });

  it('should page through participants', async () => {
    await post(sale.app, '/sale/deposit', { amount: '1' }, wallet(1));
    await post(sale.app, '/sale/deposit', { amount: '2' }, wallet(2));

    const res = await sale.app.request('/sale/participants?page=1&pageSize=1');
    const body = await res.json();

    expect(body.totalPages).toBe(2);
    expect(body.items).toEqual([
      { participant: wallet(1), record: { total: '1', perTier: ['1', '0', '0'] } },
    ]);

    const past = await sale.app.request('/sale/participants?page=3&pageSize=1');
    expect(past.status).toBe(400);
    expect((await past.json()).code).toBe('PaginationOutOfRange');
  });

  it('should return a participant record', async () => {
    await post(sale.app, '/sale/deposit', { amount: '3' }, wallet(4));

    const res = await sale.app.request(`/sale/participants/${wallet(4)}`);

    expect(await res.json()).toEqual({
      success: true,
      wallet: wallet(4),
      record: { total: '3', perTier: ['3', '0', '0'] },
    });
  });

  it('should run the increment timelock through the admin routes', async () => {
    const proposed = await post(sale.app, '/sale/admin/increment/propose', { value: '2' }, OWNER);
    expect(proposed.status).toBe(200);

    const applied = await post(sale.app, '/sale/admin/increment/apply', {}, OWNER);
    expect(applied.status).toBe(409);
    expect((await applied.json()).code).toBe('TimelockNotElapsed');
  });

  it('should update a tier limit', async () => {
    const res = await post(sale.app, '/sale/admin/tier-limit', { tier: 1, limit: '40' }, OWNER);

    expect(await res.json()).toEqual({
      success: true,
      change: { tier: 1, previousLimit: '30', newLimit: '40' },
    });
  });

  it('should answer unknown paths with 404', async () => {
    const res = await sale.app.request('/nope');

    expect(res.status).toBe(404);
  });
});
