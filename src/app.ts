/**
 * Application assembly: config → ledger, increment, custody, service → Hono app.
 */

import { Hono } from 'hono';

import { ConfigError } from './config';
import type { SaleConfig } from './config';
import { makeLogger } from './logger';
import type { Logger } from './logger';
import { createSaleRoutes } from './routes/sale';
import { SolanaCustodyGateway } from './sale/custody';
import type { CustodyGateway } from './sale/custody';
import { TierLedger } from './sale/ledger';
import { LoggingSaleNotifier } from './sale/notifier';
import type { SaleNotifier } from './sale/notifier';
import { SaleService } from './sale/service';
import { createIncrementParameter } from './sale/timelock';
import type { Clock } from './sale/timelock';

export interface SaleAppOverrides {
  custody?: CustodyGateway;
  notifier?: SaleNotifier;
  logger?: Logger;
  clock?: Clock;
}

export interface SaleApp {
  app: Hono;
  service: SaleService;
  logger: Logger;
}

function createCustody(config: SaleConfig): CustodyGateway {
  if (!config.escrow) {
    throw new ConfigError(['SALE_ESCROW_SECRET_KEY: required to forward deposits to custody']);
  }
  return new SolanaCustodyGateway({
    rpcUrl: config.solanaRpcUrl,
    destination: config.custodyAddress,
    escrow: config.escrow,
  });
}

export function createSaleApp(config: SaleConfig, overrides: SaleAppOverrides = {}): SaleApp {
  const logger = overrides.logger ?? makeLogger({ level: config.logLevel, nodeEnv: config.nodeEnv });

  const service = new SaleService({
    ledger: new TierLedger({
      schedule: config.tierLimits,
      individualCap: config.individualCap,
      maxPageSize: config.maxPageSize,
    }),
    increment: createIncrementParameter({
      initial: config.increment,
      ceiling: config.maxIncrement,
      clock: overrides.clock,
    }),
    custody: overrides.custody ?? createCustody(config),
    notifier: overrides.notifier ?? new LoggingSaleNotifier(logger),
    logger,
    owner: config.owner,
    incrementTimelockMs: config.incrementTimelockMs,
  });

  const app = new Hono();

  app.get('/health', (c) => c.json({ status: 'ok' }));
  app.route('/sale', createSaleRoutes(service));

  app.notFound((c) => c.json({ success: false, error: 'Not found' }, 404));
  app.onError((err, c) => {
    logger.error({ err, path: c.req.path }, 'unhandled error');
    return c.json({ success: false, error: 'Internal error' }, 500);
  });

  return { app, service, logger };
}
