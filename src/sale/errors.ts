/**
 * SaleError — every rejection the sale can produce.
 *
 * Carries a stable `code` for callers and the HTTP `status` the routes
 * answer with. Failures are raised before any ledger mutation.
 */

export type SaleErrorCode =
  | 'InvalidAmount'
  | 'InvalidParticipant'
  | 'IndividualCapExceeded'
  | 'SaleClosed'
  | 'DepositsPaused'
  | 'Unauthorized'
  | 'InvalidTierLimitUpdate'
  | 'InvalidProposal'
  | 'NoMutationPending'
  | 'TimelockNotElapsed'
  | 'PaginationOutOfRange'
  | 'UnsolicitedTransfer'
  | 'TransferFailed';

export type SaleErrorStatus = 400 | 403 | 405 | 409 | 423 | 502;

export const ERROR_STATUS: Record<SaleErrorCode, SaleErrorStatus> = {
  InvalidAmount: 400,
  InvalidParticipant: 400,
  IndividualCapExceeded: 409,
  SaleClosed: 409,
  DepositsPaused: 423,
  Unauthorized: 403,
  InvalidTierLimitUpdate: 400,
  InvalidProposal: 400,
  NoMutationPending: 409,
  TimelockNotElapsed: 409,
  PaginationOutOfRange: 400,
  UnsolicitedTransfer: 405,
  TransferFailed: 502,
};

export class SaleError extends Error {
  readonly code: SaleErrorCode;
  readonly status: SaleErrorStatus;

  constructor(code: SaleErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SaleError';
    this.code = code;
    this.status = ERROR_STATUS[code];

    Object.setPrototypeOf(this, SaleError.prototype);
  }

  override toString(): string {
    return `SaleError(${this.code}): ${this.message}`;
  }

  static isSaleError(err: unknown): err is SaleError {
    return err instanceof SaleError;
  }
}
