/**
 * Timelocked Parameter
 *
 * A single configuration value that can only change through a two-step
 * protocol: propose a value, wait out the delay, then apply it.
 *
 *   idle ──propose──▶ pending(value, effectiveAt) ──apply (now ≥ effectiveAt)──▶ idle
 *
 * A new proposal overwrites the pending one. Readers only ever see the
 * active value.
 */

import { SaleError } from './errors';
import type { Amount } from './types';

// ============ Types ============

export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export interface PendingMutation<T> {
  value: T;
  effectiveAt: Date;
}

type TimelockState<T> =
  | { status: 'idle' }
  | { status: 'pending'; value: T; effectiveAt: number };

export interface TimelockedParameterOptions<T> {
  name: string;
  initial: T;
  /** Returns a rejection reason, or null when the value is acceptable */
  validate?: (value: T) => string | null;
  equals?: (a: T, b: T) => boolean;
  clock?: Clock;
}

// ============ Parameter ============

export class TimelockedParameter<T> {
  readonly name: string;
  private active: T;
  private state: TimelockState<T> = { status: 'idle' };
  private readonly validate: (value: T) => string | null;
  private readonly equals: (a: T, b: T) => boolean;
  private readonly clock: Clock;

  constructor(options: TimelockedParameterOptions<T>) {
    this.name = options.name;
    this.validate = options.validate ?? (() => null);
    this.equals = options.equals ?? Object.is;
    this.clock = options.clock ?? systemClock;

    const reason = this.validate(options.initial);
    if (reason) {
      throw new SaleError('InvalidProposal', `Initial ${this.name} rejected: ${reason}`);
    }
    this.active = options.initial;
  }

  current(): T {
    return this.active;
  }

  pending(): PendingMutation<T> | null {
    if (this.state.status === 'idle') return null;
    return { value: this.state.value, effectiveAt: new Date(this.state.effectiveAt) };
  }

  isPending(): boolean {
    return this.state.status === 'pending';
  }

  /**
   * Queue a new value that becomes applicable `delayMs` from now
   */
  propose(value: T, delayMs: number): PendingMutation<T> {
    if (!Number.isFinite(delayMs) || delayMs < 0) {
      throw new SaleError('InvalidProposal', `Delay for ${this.name} must be a non-negative duration`);
    }
    const reason = this.validate(value);
    if (reason) {
      throw new SaleError('InvalidProposal', `Proposed ${this.name} rejected: ${reason}`);
    }
    if (this.equals(value, this.active)) {
      throw new SaleError('InvalidProposal', `Proposed ${this.name} equals the active value`);
    }

    const effectiveAt = this.clock.now() + delayMs;
    this.state = { status: 'pending', value, effectiveAt };
    return { value, effectiveAt: new Date(effectiveAt) };
  }

  /**
   * Activate the pending value once its delay has elapsed
   */
  apply(): T {
    if (this.state.status === 'idle') {
      throw new SaleError('NoMutationPending', `No ${this.name} change is pending`);
    }
    if (this.clock.now() < this.state.effectiveAt) {
      throw new SaleError(
        'TimelockNotElapsed',
        `${this.name} change is not applicable before ${new Date(this.state.effectiveAt).toISOString()}`
      );
    }

    this.active = this.state.value;
    this.state = { status: 'idle' };
    return this.active;
  }
}

// ============ Contribution increment ============

export interface IncrementParameterOptions {
  initial: Amount;
  ceiling: Amount;
  clock?: Clock;
}

export function createIncrementParameter(
  options: IncrementParameterOptions
): TimelockedParameter<Amount> {
  return new TimelockedParameter<Amount>({
    name: 'contribution increment',
    initial: options.initial,
    clock: options.clock,
    validate: value => {
      if (value <= 0n) return 'must be positive';
      if (value > options.ceiling) return `must not exceed ${options.ceiling}`;
      return null;
    },
    equals: (a, b) => a === b,
  });
}
