/**
 * Guards wrapped around the ledger by the sale service:
 * serialization, pausing and the owner check.
 */

import { PublicKey } from '@solana/web3.js';

import { SaleError } from './errors';
import type { Identity } from './types';

/** FIFO mutex for async operations */
export class Mutex {
  private locked = false;
  private queue: (() => void)[] = [];

  async acquire(): Promise<() => void> {
    return new Promise(resolve => {
      const tryAcquire = () => {
        if (!this.locked) {
          this.locked = true;
          resolve(() => this.release());
        } else {
          this.queue.push(tryAcquire);
        }
      };
      tryAcquire();
    });
  }

  /**
   * Run `task` with the lock held, releasing it however the task ends
   */
  async runExclusive<R>(task: () => R | Promise<R>): Promise<R> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  private release(): void {
    this.locked = false;
    // Waiters re-check the flag, so the next one takes the lock synchronously
    const next = this.queue.shift();
    if (next) next();
  }
}

export class PauseGate {
  private paused = false;

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
  }

  isPaused(): boolean {
    return this.paused;
  }

  assertOpen(): void {
    if (this.paused) {
      throw new SaleError('DepositsPaused', 'Deposits are paused');
    }
  }
}

export function assertOwner(owner: Identity, caller: Identity | undefined): void {
  if (!caller || caller !== owner) {
    throw new SaleError('Unauthorized', 'Only the sale owner may perform this action');
  }
}

/**
 * Reject anything that is not a base58 Solana public key
 */
export function assertIdentity(value: string | undefined): Identity {
  if (!value) {
    throw new SaleError('InvalidParticipant', 'Missing wallet address');
  }
  try {
    return new PublicKey(value).toBase58();
  } catch (error) {
    throw new SaleError('InvalidParticipant', `Invalid wallet address: ${value}`, { cause: error });
  }
}
