import { PublicKey } from '@solana/web3.js';

import { SaleError } from '../src/sale';
import type {
  Amount,
  CustodyGateway,
  Identity,
  SaleEvent,
  SaleNotifier,
  TransferReceipt,
} from '../src/sale';

/** Deterministic wallet address: 32 bytes of `n` */
export function wallet(n: number): Identity {
  return new PublicKey(new Uint8Array(32).fill(n)).toBase58();
}

/** Code of the SaleError thrown by `fn`, or undefined when it does not throw */
export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return SaleError.isSaleError(error) ? error.code : `non-sale error: ${String(error)}`;
  }
  return undefined;
}

export class FakeCustody implements CustodyGateway {
  readonly destination: Identity;
  readonly transfers: { amount: Amount; participant: Identity }[] = [];
  /** Per-call behavior; calls past the end succeed immediately */
  readonly script: (() => Promise<void>)[] = [];

  constructor(destination: Identity = wallet(201)) {
    this.destination = destination;
  }

  async transfer(amount: Amount, participant: Identity): Promise<TransferReceipt> {
    const step = this.script.shift();
    if (step) await step();
    this.transfers.push({ amount, participant });
    return { destination: this.destination, amount, reference: `tx-${this.transfers.length}` };
  }
}

export class RecordingNotifier implements SaleNotifier {
  readonly events: SaleEvent[] = [];

  notify(event: SaleEvent): void {
    this.events.push(event);
  }
}

export function manualClock(start = 0) {
  let now = start;
  return {
    now: () => now,
    set: (value: number) => {
      now = value;
    },
  };
}

/**
 * A custody step that stays open until the test settles it. `started`
 * resolves once the transfer has begun.
 */
export function heldTransfer() {
  let markStarted = () => {};
  let settle: (error?: Error) => void = () => {};
  const started = new Promise<void>(resolve => {
    markStarted = resolve;
  });
  const step = () =>
    new Promise<void>((resolve, reject) => {
      settle = error => (error ? reject(error) : resolve());
      markStarted();
    });
  return {
    step,
    started,
    succeed: () => settle(),
    fail: (error: Error) => settle(error),
  };
}
