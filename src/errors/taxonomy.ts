export const ErrorCode = {
  InvalidPayload: 'invalid_payload',
  InvalidAccount: 'invalid_account',
  InvalidAmount: 'invalid_amount',
  ArrayLengthMismatch: 'array_length_mismatch',
  DuplicateTarget: 'duplicate_target',
  InvalidAuctionParams: 'invalid_auction_params',
  InvalidBribeSplit: 'invalid_bribe_split',
  InvalidRange: 'invalid_range',
  AssetNotFound: 'asset_not_found',
  AssetExists: 'asset_exists',
  StrategyNotFound: 'strategy_not_found',
  RewardAssetExists: 'reward_asset_exists',
  RewardAssetNotRegistered: 'reward_asset_not_registered',
  RewardAmountTooSmall: 'reward_amount_too_small',
  Unauthorized: 'unauthorized',
  RateLimited: 'rate_limited',
  DeadlineExpired: 'deadline_expired',
  AlreadyVotedThisEpoch: 'already_voted_this_epoch',
  AlreadyResetThisEpoch: 'already_reset_this_epoch',
  AlreadyDead: 'already_dead',
  VotesActive: 'votes_active',
  EpochIdMismatch: 'epoch_id_mismatch',
  MaxPaymentExceeded: 'max_payment_exceeded',
  EmptyAssets: 'empty_assets',
  ZeroWeightAfterNormalization: 'zero_weight_after_normalization',
  NoWeight: 'no_weight',
  InsufficientBalance: 'insufficient_balance',
  InsufficientAllowance: 'insufficient_allowance',
  InsufficientStake: 'insufficient_stake',
  InternalError: 'internal_error',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export type ErrorCategory = 'input_validation' | 'temporal_guard' | 'economic_guard' | 'internal';

const temporalGuards: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  ErrorCode.DeadlineExpired,
  ErrorCode.AlreadyVotedThisEpoch,
  ErrorCode.AlreadyResetThisEpoch,
  ErrorCode.AlreadyDead,
  ErrorCode.VotesActive,
]);

/**
 * Economic guards protect against stale reads. Honest callers racing each
 * other hit these routinely and are expected to retry with fresh state.
 */
const economicGuards: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  ErrorCode.EpochIdMismatch,
  ErrorCode.MaxPaymentExceeded,
  ErrorCode.EmptyAssets,
  ErrorCode.ZeroWeightAfterNormalization,
  ErrorCode.NoWeight,
  ErrorCode.InsufficientBalance,
  ErrorCode.InsufficientAllowance,
  ErrorCode.InsufficientStake,
]);

export const errorCategory = (code: ErrorCode): ErrorCategory => {
  if (code === ErrorCode.InternalError) return 'internal';
  if (temporalGuards.has(code)) return 'temporal_guard';
  if (economicGuards.has(code)) return 'economic_guard';
  return 'input_validation';
};

const defaultStatus: Record<ErrorCategory, number> = {
  input_validation: 400,
  temporal_guard: 409,
  economic_guard: 409,
  internal: 500,
};

export class DomainError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DomainError';
  }

  get category(): ErrorCategory {
    return errorCategory(this.code);
  }
}

const statusOverrides: Partial<Record<ErrorCode, number>> = {
  [ErrorCode.Unauthorized]: 403,
  [ErrorCode.RateLimited]: 429,
  [ErrorCode.StrategyNotFound]: 404,
  [ErrorCode.AssetNotFound]: 404,
};

/** Builds a DomainError with the status code implied by the code's category. */
export const ledgerError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): DomainError => new DomainError(code, statusOverrides[code] ?? defaultStatus[errorCategory(code)], message, details);

export const toErrorEnvelope = (
  code: ErrorCode,
  message: string,
  details?: unknown,
): {
  error: {
    code: ErrorCode;
    category: ErrorCategory;
    message: string;
    details?: unknown;
  };
} => ({
  error: {
    code,
    category: errorCategory(code),
    message,
    ...(details === undefined ? {} : { details }),
  },
});
