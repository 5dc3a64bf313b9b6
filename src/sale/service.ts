/**
 * Sale Service
 *
 * Boundary around the tier ledger. Every public operation, reads included,
 * runs under one mutex, so deposits, owner actions and reads never
 * interleave, including across the asynchronous custody transfer.
 *
 * Deposit flow:
 *   pause gate → identity → increment check → ledger.accept
 *     → custody transfer (full amount) → notifications
 *
 * A failed transfer reverts the deposit through its undo entry.
 */

import type { Logger } from '../logger';
import type { CustodyGateway, TransferReceipt } from './custody';
import { SaleError } from './errors';
import { Mutex, PauseGate, assertIdentity, assertOwner } from './guards';
import type { TierLedger } from './ledger';
import type { SaleNotifier } from './notifier';
import type { PendingMutation, TimelockedParameter } from './timelock';
import type {
  AcceptOutcome,
  Amount,
  Identity,
  ParticipantPage,
  ParticipantRecord,
  SaleEvent,
  SaleTier,
  TierLimitChange,
  TierSchedule,
  TierState,
} from './types';

// ============ Types ============

export interface SaleServiceDeps {
  ledger: TierLedger;
  increment: TimelockedParameter<Amount>;
  custody: CustodyGateway;
  notifier: SaleNotifier;
  logger: Logger;
  owner: Identity;
  /** Delay applied to every increment proposal */
  incrementTimelockMs: number;
}

export interface DepositResult {
  outcome: AcceptOutcome;
  receipt: TransferReceipt;
}

export interface SaleStatus {
  tierState: TierState;
  totalCollected: Amount;
  schedule: TierSchedule;
  individualCap: Amount;
  increment: Amount;
  pendingIncrement: PendingMutation<Amount> | null;
  maxPageSize: number;
  participantCount: number;
  paused: boolean;
  custodyDestination: Identity;
}

// ============ Service ============

export class SaleService {
  private readonly mutex = new Mutex();
  private readonly gate = new PauseGate();

  constructor(private readonly deps: SaleServiceDeps) {}

  /**
   * Record a deposit and forward the whole amount to custody
   */
  async deposit(caller: string | undefined, amount: Amount): Promise<DepositResult> {
    return this.mutex.runExclusive(async () => {
      this.gate.assertOpen();
      const participant = assertIdentity(caller);
      const increment = this.deps.increment.current();

      if (amount <= 0n || amount % increment !== 0n) {
        throw new SaleError(
          'InvalidAmount',
          `Contribution must be a positive multiple of ${increment}`
        );
      }

      const { ledger } = this.deps;
      const undo = ledger.checkpoint(participant);
      const outcome = ledger.accept(participant, amount);

      let receipt: TransferReceipt;
      try {
        receipt = await this.deps.custody.transfer(amount, participant);
      } catch (error) {
        ledger.revert(undo);
        this.deps.logger.error(
          { err: error, participant, amount: amount.toString() },
          'custody transfer failed; deposit rolled back'
        );
        throw new SaleError('TransferFailed', 'Custody transfer did not complete', { cause: error });
      }

      for (const booking of outcome.bookings) {
        this.emit({
          type: 'contribution_recorded',
          participant,
          amount: booking.amount,
          tier: booking.tier,
        });
      }
      for (const transition of outcome.transitions) {
        this.emit({ type: 'tier_advanced', from: transition.from, to: transition.to });
      }
      if (outcome.unbooked > 0n) {
        this.deps.logger.warn(
          { participant, unbooked: outcome.unbooked.toString() },
          'deposit exceeded final tier capacity; excess forwarded without tier attribution'
        );
      }

      return { outcome, receipt };
    });
  }

  /**
   * Value sent without a deposit request is never credited
   */
  async receive(sender: string | undefined, amount: Amount): Promise<never> {
    this.deps.logger.warn(
      { sender: sender ?? null, amount: amount.toString() },
      'rejected unsolicited transfer'
    );
    throw new SaleError('UnsolicitedTransfer', 'Direct transfers are not accepted; use deposit');
  }

  // ============ Owner actions ============

  async reset(caller: string | undefined): Promise<void> {
    return this.mutex.runExclusive(() => {
      assertOwner(this.deps.owner, caller);
      this.deps.ledger.reset();
      this.deps.logger.info('ledger reset');
    });
  }

  async updateTierLimit(
    caller: string | undefined,
    tier: SaleTier,
    newLimit: Amount
  ): Promise<TierLimitChange> {
    return this.mutex.runExclusive(() => {
      assertOwner(this.deps.owner, caller);
      const change = this.deps.ledger.updateTierLimit(tier, newLimit);
      this.emit({ type: 'tier_limit_updated', ...change });
      return change;
    });
  }

  async updateIndividualCap(caller: string | undefined, cap: Amount): Promise<void> {
    return this.mutex.runExclusive(() => {
      assertOwner(this.deps.owner, caller);
      this.deps.ledger.updateIndividualCap(cap);
    });
  }

  async updateMaxPageSize(caller: string | undefined, maxPageSize: number): Promise<void> {
    return this.mutex.runExclusive(() => {
      assertOwner(this.deps.owner, caller);
      this.deps.ledger.updateMaxPageSize(maxPageSize);
    });
  }

  async proposeIncrement(
    caller: string | undefined,
    value: Amount
  ): Promise<PendingMutation<Amount>> {
    return this.mutex.runExclusive(() => {
      assertOwner(this.deps.owner, caller);
      const pending = this.deps.increment.propose(value, this.deps.incrementTimelockMs);
      this.emit({
        type: 'increment_change_proposed',
        value: pending.value,
        effectiveAt: pending.effectiveAt,
      });
      return pending;
    });
  }

  async applyIncrement(caller: string | undefined): Promise<Amount> {
    return this.mutex.runExclusive(() => {
      assertOwner(this.deps.owner, caller);
      const value = this.deps.increment.apply();
      this.deps.logger.info({ increment: value.toString() }, 'contribution increment applied');
      return value;
    });
  }

  async pause(caller: string | undefined): Promise<void> {
    return this.mutex.runExclusive(() => {
      assertOwner(this.deps.owner, caller);
      this.gate.pause();
    });
  }

  async resume(caller: string | undefined): Promise<void> {
    return this.mutex.runExclusive(() => {
      assertOwner(this.deps.owner, caller);
      this.gate.resume();
    });
  }

  // ============ Reads ============

  async getStatus(): Promise<SaleStatus> {
    return this.mutex.runExclusive(() => {
      const { ledger, increment, custody } = this.deps;
      return {
        tierState: ledger.getTierState(),
        totalCollected: ledger.getTotalCollected(),
        schedule: ledger.getSchedule(),
        individualCap: ledger.getIndividualCap(),
        increment: increment.current(),
        pendingIncrement: increment.pending(),
        maxPageSize: ledger.getMaxPageSize(),
        participantCount: ledger.getParticipantCount(),
        paused: this.gate.isPaused(),
        custodyDestination: custody.destination,
      };
    });
  }

  async getParticipant(participant: string | undefined): Promise<ParticipantRecord> {
    return this.mutex.runExclusive(() =>
      this.deps.ledger.getParticipant(assertIdentity(participant))
    );
  }

  /**
   * One page of participants. A missing page size means the configured maximum.
   */
  async listParticipants(page: number, pageSize?: number): Promise<ParticipantPage> {
    return this.mutex.runExclusive(() => {
      const { ledger } = this.deps;
      return ledger.listParticipants(page, pageSize ?? ledger.getMaxPageSize());
    });
  }

  private emit(event: SaleEvent): void {
    this.deps.notifier.notify(event);
  }
}
