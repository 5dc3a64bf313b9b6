/**
 * Sale API Routes
 *
 * Endpoints for deposits, ledger reads and owner administration.
 * The caller's wallet comes from the `x-wallet-address` header; amounts
 * travel as decimal strings of lamports.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';

import { SaleError } from '../sale/errors';
import type { SaleService } from '../sale/service';
import type {
  AcceptOutcome,
  ParticipantPage,
  ParticipantRecord,
} from '../sale/types';

const WALLET_HEADER = 'x-wallet-address';

const amountSchema = z
  .string()
  .regex(/^\d+$/, 'Amount must be a decimal string of lamports')
  .transform(value => BigInt(value));

const tierSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

// ============ Serialization ============

function serializeRecord(record: ParticipantRecord) {
  return {
    total: record.total.toString(),
    perTier: record.perTier.map(amount => amount.toString()),
  };
}

function serializeOutcome(outcome: AcceptOutcome) {
  return {
    participant: outcome.participant,
    amount: outcome.amount.toString(),
    bookings: outcome.bookings.map(b => ({ tier: b.tier, amount: b.amount.toString() })),
    unbooked: outcome.unbooked.toString(),
    record: serializeRecord(outcome.record),
    transitions: outcome.transitions,
    tierState: outcome.tierState,
    totalCollected: outcome.totalCollected.toString(),
    closedSale: outcome.closedSale,
  };
}

function serializePage(page: ParticipantPage) {
  return {
    page: page.page,
    pageSize: page.pageSize,
    totalPages: page.totalPages,
    totalParticipants: page.totalParticipants,
    items: page.items.map(item => ({
      participant: item.participant,
      record: serializeRecord(item.record),
    })),
  };
}

function fail(c: Context, error: unknown) {
  if (SaleError.isSaleError(error)) {
    return c.json({ success: false, error: error.message, code: error.code }, error.status);
  }
  throw error;
}

async function readBody<T extends z.ZodTypeAny>(c: Context, schema: T) {
  const body: unknown = await c.req.json().catch(() => null);
  return schema.safeParse(body);
}

// ============ Routes ============

export function createSaleRoutes(service: SaleService): Hono {
  const sale = new Hono();

  // ============ Reads ============

  sale.get('/status', async (c) => {
    const status = await service.getStatus();

    return c.json({
      success: true,
      status: {
        tierState: status.tierState,
        totalCollected: status.totalCollected.toString(),
        tierLimits: status.schedule.map(limit => limit.toString()),
        individualCap: status.individualCap.toString(),
        increment: status.increment.toString(),
        pendingIncrement: status.pendingIncrement
          ? {
              value: status.pendingIncrement.value.toString(),
              effectiveAt: status.pendingIncrement.effectiveAt.toISOString(),
            }
          : null,
        maxPageSize: status.maxPageSize,
        participantCount: status.participantCount,
        paused: status.paused,
        custodyDestination: status.custodyDestination,
      },
    });
  });

  sale.get('/participants', async (c) => {
    const schema = z.object({
      page: z.coerce.number().int().default(1),
      pageSize: z.coerce.number().int().optional(),
    });

    const parsed = schema.safeParse(c.req.query());
    if (!parsed.success) {
      return c.json({ success: false, error: 'Invalid pagination parameters' }, 400);
    }

    try {
      const page = await service.listParticipants(parsed.data.page, parsed.data.pageSize);
      return c.json({ success: true, ...serializePage(page) });
    } catch (error) {
      return fail(c, error);
    }
  });

  sale.get('/participants/:wallet', async (c) => {
    const wallet = c.req.param('wallet');

    try {
      const record = await service.getParticipant(wallet);
      return c.json({ success: true, wallet, record: serializeRecord(record) });
    } catch (error) {
      return fail(c, error);
    }
  });

  // ============ Deposits ============

  sale.post('/deposit', async (c) => {
    const parsed = await readBody(c, z.object({ amount: amountSchema }));
    if (!parsed.success) {
      return c.json({
        success: false,
        error: 'Invalid request',
        details: parsed.error.flatten(),
      }, 400);
    }

    try {
      const { outcome, receipt } = await service.deposit(
        c.req.header(WALLET_HEADER),
        parsed.data.amount
      );

      return c.json({
        success: true,
        message: outcome.closedSale
          ? 'Deposit recorded; the sale is now closed'
          : `Deposit recorded in ${outcome.tierState}`,
        outcome: serializeOutcome(outcome),
        transfer: {
          destination: receipt.destination,
          amount: receipt.amount.toString(),
          reference: receipt.reference,
        },
      });
    } catch (error) {
      return fail(c, error);
    }
  });

  sale.post('/transfers', async (c) => {
    const parsed = await readBody(c, z.object({ amount: amountSchema }));
    const amount = parsed.success ? parsed.data.amount : 0n;

    try {
      return await service.receive(c.req.header(WALLET_HEADER), amount);
    } catch (error) {
      return fail(c, error);
    }
  });

  // ============ Admin ============

  sale.post('/admin/reset', async (c) => {
    try {
      await service.reset(c.req.header(WALLET_HEADER));
      return c.json({ success: true, message: 'Ledger reset; tier 1 is open' });
    } catch (error) {
      return fail(c, error);
    }
  });

  sale.post('/admin/tier-limit', async (c) => {
    const parsed = await readBody(c, z.object({ tier: tierSchema, limit: amountSchema }));
    if (!parsed.success) {
      return c.json({ success: false, error: 'Invalid request' }, 400);
    }

    try {
      const change = await service.updateTierLimit(
        c.req.header(WALLET_HEADER),
        parsed.data.tier,
        parsed.data.limit
      );
      return c.json({
        success: true,
        change: {
          tier: change.tier,
          previousLimit: change.previousLimit.toString(),
          newLimit: change.newLimit.toString(),
        },
      });
    } catch (error) {
      return fail(c, error);
    }
  });

  sale.post('/admin/individual-cap', async (c) => {
    const parsed = await readBody(c, z.object({ cap: amountSchema }));
    if (!parsed.success) {
      return c.json({ success: false, error: 'Invalid request' }, 400);
    }

    try {
      await service.updateIndividualCap(c.req.header(WALLET_HEADER), parsed.data.cap);
      return c.json({ success: true, individualCap: parsed.data.cap.toString() });
    } catch (error) {
      return fail(c, error);
    }
  });

  sale.post('/admin/max-page-size', async (c) => {
    const parsed = await readBody(c, z.object({ maxPageSize: z.number().int() }));
    if (!parsed.success) {
      return c.json({ success: false, error: 'Invalid request' }, 400);
    }

    try {
      await service.updateMaxPageSize(c.req.header(WALLET_HEADER), parsed.data.maxPageSize);
      return c.json({ success: true, maxPageSize: parsed.data.maxPageSize });
    } catch (error) {
      return fail(c, error);
    }
  });

  sale.post('/admin/increment/propose', async (c) => {
    const parsed = await readBody(c, z.object({ value: amountSchema }));
    if (!parsed.success) {
      return c.json({ success: false, error: 'Invalid request' }, 400);
    }

    try {
      const pending = await service.proposeIncrement(c.req.header(WALLET_HEADER), parsed.data.value);
      return c.json({
        success: true,
        pending: {
          value: pending.value.toString(),
          effectiveAt: pending.effectiveAt.toISOString(),
        },
      });
    } catch (error) {
      return fail(c, error);
    }
  });

  sale.post('/admin/increment/apply', async (c) => {
    try {
      const increment = await service.applyIncrement(c.req.header(WALLET_HEADER));
      return c.json({ success: true, increment: increment.toString() });
    } catch (error) {
      return fail(c, error);
    }
  });

  sale.post('/admin/pause', async (c) => {
    try {
      await service.pause(c.req.header(WALLET_HEADER));
      return c.json({ success: true, paused: true });
    } catch (error) {
      return fail(c, error);
    }
  });

  sale.post('/admin/resume', async (c) => {
    try {
      await service.resume(c.req.header(WALLET_HEADER));
      return c.json({ success: true, paused: false });
    } catch (error) {
      return fail(c, error);
    }
  });

  return sale;
}
