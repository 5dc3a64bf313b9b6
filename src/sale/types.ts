/**
 * Sale Types
 *
 * Shared shapes for the three-tier sale: schedule, ledger state,
 * participant records and the outcome of an accepted deposit.
 * All amounts are integer base units (lamports).
 */

// ============ Primitives ============

export type Amount = bigint;

/** A participant or custodial identity (base58 public key) */
export type Identity = string;

export type SaleTier = 1 | 2 | 3;

export type TierState = 'tier1' | 'tier2' | 'tier3' | 'closed';

/** Cumulative capacity thresholds, L1 < L2 < L3 */
export type TierSchedule = readonly [Amount, Amount, Amount];

// ============ Records ============

export interface ParticipantRecord {
  total: Amount;
  perTier: [Amount, Amount, Amount];
}

export interface ParticipantEntry {
  participant: Identity;
  record: ParticipantRecord;
}

export interface ParticipantPage {
  page: number;
  pageSize: number;
  totalPages: number;
  totalParticipants: number;
  items: ParticipantEntry[];
}

// ============ Outcomes ============

export interface TierBooking {
  tier: SaleTier;
  amount: Amount;
}

export interface TierTransition {
  from: SaleTier;
  to: TierState;
}

export interface AcceptOutcome {
  participant: Identity;
  amount: Amount;
  bookings: TierBooking[];
  /** Part of the deposit past L3: attributed to no tier, still forwarded */
  unbooked: Amount;
  record: ParticipantRecord;
  transitions: TierTransition[];
  tierState: TierState;
  totalCollected: Amount;
  closedSale: boolean;
}

export interface TierLimitChange {
  tier: SaleTier;
  previousLimit: Amount;
  newLimit: Amount;
}

// ============ Notifications ============

export type SaleEvent =
  | { type: 'contribution_recorded'; participant: Identity; amount: Amount; tier: SaleTier }
  | { type: 'tier_advanced'; from: SaleTier; to: TierState }
  | { type: 'tier_limit_updated'; tier: SaleTier; previousLimit: Amount; newLimit: Amount }
  | { type: 'increment_change_proposed'; value: Amount; effectiveAt: Date };

// ============ Helpers ============

export function tierIndex(tier: SaleTier): 0 | 1 | 2 {
  switch (tier) {
    case 1:
      return 0;
    case 2:
      return 1;
    case 3:
      return 2;
  }
}

export function tierOf(state: Exclude<TierState, 'closed'>): SaleTier {
  switch (state) {
    case 'tier1':
      return 1;
    case 'tier2':
      return 2;
    case 'tier3':
      return 3;
  }
}

export function emptyRecord(): ParticipantRecord {
  return { total: 0n, perTier: [0n, 0n, 0n] };
}

export function copyRecord(record: ParticipantRecord): ParticipantRecord {
  return { total: record.total, perTier: [record.perTier[0], record.perTier[1], record.perTier[2]] };
}
