import pino from 'pino';
import { describe, it, expect } from 'vitest';

import { LoggingSaleNotifier, serializeEvent } from '../src/sale';
import { wallet } from './helpers';

describe('serializeEvent', () => {
  it('should render amounts and dates as strings', () => {
    expect(
      serializeEvent({
        type: 'increment_change_proposed',
        value: 250n,
        effectiveAt: new Date(Date.UTC(2026, 0, 2)),
      })
    ).toEqual({
      type: 'increment_change_proposed',
      value: '250',
      effectiveAt: '2026-01-02T00:00:00.000Z',
    });
  });
});

describe('LoggingSaleNotifier', () => {
  it('should log one JSON line per event', () => {
    const lines: string[] = [];
    const logger = pino({ base: null, timestamp: false }, { write: (line: string) => lines.push(line) });

    new LoggingSaleNotifier(logger).notify({
      type: 'contribution_recorded',
      participant: wallet(1),
      amount: 5n,
      tier: 1,
    });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toEqual({
      level: 30,
      event: 'contribution_recorded',
      participant: wallet(1),
      amount: '5',
      tier: 1,
      msg: 'sale event',
    });
  });
});
