/**
 * Tier Ledger
 *
 * Accounting core of the sale. Deposits fill the active tier up to its
 * cumulative limit and overflow into the next one:
 *
 *   tier1 (0, L1] → tier2 (L1, L2] → tier3 (L2, L3] → closed
 *
 * Tiers 1 and 2 enforce a per-participant cap; tier 3 does not. Once L3 is
 * reached the ledger is closed and every further deposit is rejected.
 *
 * The ledger is synchronous and does no I/O. Serialization of callers is
 * the job of the surrounding service.
 */

import { SaleError } from './errors';
import type {
  Amount,
  AcceptOutcome,
  Identity,
  ParticipantPage,
  ParticipantRecord,
  SaleTier,
  TierBooking,
  TierLimitChange,
  TierSchedule,
  TierState,
  TierTransition,
} from './types';
import { copyRecord, emptyRecord, tierIndex, tierOf } from './types';

// ============ Types ============

export interface TierLedgerOptions {
  schedule: TierSchedule;
  individualCap: Amount;
  maxPageSize: number;
}

/**
 * State needed to take back one accepted deposit: the participant's
 * record before it (null if the deposit indexed them) and the aggregates.
 */
export interface AcceptUndo {
  readonly participant: Identity;
  readonly record: ParticipantRecord | null;
  readonly totalCollected: Amount;
  readonly tierState: TierState;
}

// Position of each state in the tier progression
const TIER_ORDINAL: Record<TierState, number> = {
  tier1: 1,
  tier2: 2,
  tier3: 3,
  closed: 4,
};

const NEXT_STATE: Record<Exclude<TierState, 'closed'>, TierState> = {
  tier1: 'tier2',
  tier2: 'tier3',
  tier3: 'closed',
};

export function assertSchedule(schedule: TierSchedule): void {
  const [l1, l2, l3] = schedule;
  if (l1 <= 0n) {
    throw new SaleError('InvalidTierLimitUpdate', 'Tier limits must be positive');
  }
  if (!(l1 < l2 && l2 < l3)) {
    throw new SaleError(
      'InvalidTierLimitUpdate',
      `Tier limits must be strictly increasing (got ${l1}, ${l2}, ${l3})`
    );
  }
}

// ============ Ledger ============

export class TierLedger {
  private schedule: [Amount, Amount, Amount];
  private individualCap: Amount;
  private maxPageSize: number;
  private totalCollected: Amount = 0n;
  private tierState: TierState = 'tier1';
  private records: Map<Identity, ParticipantRecord> = new Map();
  private index: Identity[] = [];

  constructor(options: TierLedgerOptions) {
    assertSchedule(options.schedule);
    if (options.individualCap <= 0n) {
      throw new SaleError('InvalidAmount', 'Individual cap must be positive');
    }
    if (!Number.isInteger(options.maxPageSize) || options.maxPageSize < 1) {
      throw new SaleError('PaginationOutOfRange', 'Max page size must be a positive integer');
    }
    this.schedule = [options.schedule[0], options.schedule[1], options.schedule[2]];
    this.individualCap = options.individualCap;
    this.maxPageSize = options.maxPageSize;
  }

  /**
   * Accept a contribution and distribute it across tiers.
   * Either the whole call is rejected up front or it runs to completion.
   */
  accept(participant: Identity, amount: Amount): AcceptOutcome {
    if (amount <= 0n) {
      throw new SaleError('InvalidAmount', 'Contribution must be positive');
    }
    if (this.tierState === 'closed') {
      throw new SaleError('SaleClosed', 'Sale is closed');
    }

    const existing = this.records.get(participant);
    const priorTotal = existing?.total ?? 0n;

    // Cap applies to tiers 1 and 2 only, judged on the state before the call
    if (this.tierState !== 'tier3' && priorTotal + amount > this.individualCap) {
      throw new SaleError(
        'IndividualCapExceeded',
        `Contribution would take ${participant} to ${priorTotal + amount}, above the cap of ${this.individualCap}`
      );
    }

    const record = existing ?? emptyRecord();
    const bookings: TierBooking[] = [];
    const transitions: TierTransition[] = [];
    let remaining = amount;
    let closedSale = false;

    while (remaining > 0n && this.tierState !== 'closed') {
      const tier = tierOf(this.tierState);
      const limit = this.schedule[tierIndex(tier)];

      if (tier !== 3) {
        const headroom = limit - this.totalCollected;
        if (remaining <= headroom) {
          this.book(record, tier, remaining, bookings);
          remaining = 0n;
          if (this.totalCollected === limit) {
            transitions.push(this.advanceTier());
          }
        } else {
          this.book(record, tier, headroom, bookings);
          remaining -= headroom;
          transitions.push(this.advanceTier());
        }
        continue;
      }

      const finalHeadroom = limit - this.totalCollected;
      if (this.totalCollected + remaining >= limit) {
        this.book(record, tier, finalHeadroom, bookings);
        remaining -= finalHeadroom;
        transitions.push(this.advanceTier());
        closedSale = true;
      } else {
        this.book(record, tier, remaining, bookings);
        remaining = 0n;
      }
    }

    if (!existing && record.total > 0n) {
      this.records.set(participant, record);
      this.index.push(participant);
    }

    return {
      participant,
      amount,
      bookings,
      unbooked: remaining,
      record: copyRecord(record),
      transitions,
      tierState: this.tierState,
      totalCollected: this.totalCollected,
      closedSale,
    };
  }

  /**
   * Zero every record, empty the index and reopen tier 1
   */
  reset(): void {
    this.records.clear();
    this.index = [];
    this.totalCollected = 0n;
    this.tierState = 'tier1';
  }

  /**
   * Change the cumulative limit of a tier that has not been passed yet
   */
  updateTierLimit(tier: SaleTier, newLimit: Amount): TierLimitChange {
    if (newLimit <= 0n) {
      throw new SaleError('InvalidTierLimitUpdate', 'Tier limit must be positive');
    }
    if (TIER_ORDINAL[this.tierState] > tier) {
      throw new SaleError('InvalidTierLimitUpdate', `Tier ${tier} has already been passed`);
    }

    const [l1] = this.schedule;
    if (tier === 1 && newLimit < this.totalCollected) {
      throw new SaleError(
        'InvalidTierLimitUpdate',
        `Tier 1 limit ${newLimit} is below the ${this.totalCollected} already collected`
      );
    }
    if (tier === 2 && newLimit < this.totalCollected - l1) {
      throw new SaleError(
        'InvalidTierLimitUpdate',
        `Tier 2 limit ${newLimit} is below the ${this.totalCollected - l1} collected in tier 2`
      );
    }
    // The active tier must keep room for what it already holds; tier 3
    // needs strictly more, or it would be full without being closed
    if (TIER_ORDINAL[this.tierState] === tier) {
      const tooLow = tier === 3 ? newLimit <= this.totalCollected : newLimit < this.totalCollected;
      if (tooLow) {
        throw new SaleError(
          'InvalidTierLimitUpdate',
          `Tier ${tier} limit ${newLimit} does not cover the ${this.totalCollected} already collected`
        );
      }
    }

    const next: [Amount, Amount, Amount] = [this.schedule[0], this.schedule[1], this.schedule[2]];
    const idx = tierIndex(tier);
    const previousLimit = next[idx];
    next[idx] = newLimit;
    assertSchedule(next);

    this.schedule = next;
    return { tier, previousLimit, newLimit };
  }

  updateIndividualCap(cap: Amount): void {
    if (cap <= 0n) {
      throw new SaleError('InvalidAmount', 'Individual cap must be positive');
    }
    this.individualCap = cap;
  }

  updateMaxPageSize(maxPageSize: number): void {
    if (!Number.isInteger(maxPageSize) || maxPageSize < 1) {
      throw new SaleError('PaginationOutOfRange', 'Max page size must be a positive integer');
    }
    this.maxPageSize = maxPageSize;
  }

  // ============ Reads ============

  getTierState(): TierState {
    return this.tierState;
  }

  getTotalCollected(): Amount {
    return this.totalCollected;
  }

  getSchedule(): TierSchedule {
    return [this.schedule[0], this.schedule[1], this.schedule[2]];
  }

  getIndividualCap(): Amount {
    return this.individualCap;
  }

  getMaxPageSize(): number {
    return this.maxPageSize;
  }

  getParticipant(participant: Identity): ParticipantRecord {
    const record = this.records.get(participant);
    return record ? copyRecord(record) : emptyRecord();
  }

  getParticipantCount(): number {
    return this.index.length;
  }

  /**
   * Page through participants in first-contribution order (pages start at 1)
   */
  listParticipants(page: number, pageSize: number): ParticipantPage {
    if (!Number.isInteger(page) || page < 1) {
      throw new SaleError('PaginationOutOfRange', 'Page must be an integer of at least 1');
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > this.maxPageSize) {
      throw new SaleError(
        'PaginationOutOfRange',
        `Page size must be between 1 and ${this.maxPageSize}`
      );
    }

    const totalParticipants = this.index.length;
    const totalPages = Math.ceil(totalParticipants / pageSize);
    if (page > Math.max(totalPages, 1)) {
      throw new SaleError(
        'PaginationOutOfRange',
        `Page ${page} is past the last page (${totalPages})`
      );
    }

    const start = (page - 1) * pageSize;
    const items = this.index.slice(start, start + pageSize).map(participant => ({
      participant,
      record: this.getParticipant(participant),
    }));

    return { page, pageSize, totalPages, totalParticipants, items };
  }

  // ============ Rollback ============

  /**
   * Capture what `revert` needs to undo the next `accept` for this participant
   */
  checkpoint(participant: Identity): AcceptUndo {
    const record = this.records.get(participant);
    return {
      participant,
      record: record ? copyRecord(record) : null,
      totalCollected: this.totalCollected,
      tierState: this.tierState,
    };
  }

  /**
   * Take back the deposit accepted since `checkpoint`. Only valid while no
   * other mutation has run in between.
   */
  revert(undo: AcceptUndo): void {
    if (undo.record) {
      this.records.set(undo.participant, copyRecord(undo.record));
    } else if (this.records.delete(undo.participant)) {
      const at = this.index.lastIndexOf(undo.participant);
      if (at !== -1) this.index.splice(at, 1);
    }
    this.totalCollected = undo.totalCollected;
    this.tierState = undo.tierState;
  }

  // ============ Internals ============

  private book(
    record: ParticipantRecord,
    tier: SaleTier,
    amount: Amount,
    bookings: TierBooking[]
  ): void {
    // A tier that is already exactly full contributes an empty step
    if (amount <= 0n) return;
    this.totalCollected += amount;
    record.total += amount;
    record.perTier[tierIndex(tier)] += amount;
    bookings.push({ tier, amount });
  }

  private advanceTier(): TierTransition {
    if (this.tierState === 'closed') {
      throw new SaleError('SaleClosed', 'Sale is closed');
    }
    const from = tierOf(this.tierState);
    const to = NEXT_STATE[this.tierState];
    this.tierState = to;
    return { from, to };
  }
}
