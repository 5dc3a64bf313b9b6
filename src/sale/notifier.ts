/**
 * Notification sink for sale events. The service emits only after a state
 * change has been committed.
 */

import type { Logger } from '../logger';
import type { SaleEvent } from './types';

export interface SaleNotifier {
  notify(event: SaleEvent): void;
}

export type SerializedSaleEvent = Record<string, string | number>;

/**
 * Flatten an event into JSON-safe fields (amounts as decimal strings)
 */
export function serializeEvent(event: SaleEvent): SerializedSaleEvent {
  const fields: SerializedSaleEvent = {};
  for (const [key, value] of Object.entries(event)) {
    if (typeof value === 'bigint') {
      fields[key] = value.toString();
    } else if (value instanceof Date) {
      fields[key] = value.toISOString();
    } else if (typeof value === 'string' || typeof value === 'number') {
      fields[key] = value;
    }
  }
  return fields;
}

export class LoggingSaleNotifier implements SaleNotifier {
  constructor(private readonly logger: Logger) {}

  notify(event: SaleEvent): void {
    const { type, ...fields } = serializeEvent(event);
    this.logger.info({ event: type, ...fields }, 'sale event');
  }
}
