/**
 * Sale Module
 *
 * Three-tier sale ledger, timelocked increment and the service around them.
 */

export * from './types';
export * from './errors';
export * from './ledger';
export * from './timelock';
export * from './guards';
export * from './custody';
export * from './notifier';
export * from './service';
