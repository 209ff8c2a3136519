export type CrowdfundErrorKind =
  | 'InvalidParameters'
  | 'CampaignNotFound'
  | 'CampaignClosed'
  | 'DeadlinePassed'
  | 'ContributionOutOfBounds'
  | 'Unauthorized'
  | 'RefundsUnavailable'
  | 'NoContribution'
  | 'NoExcess'
  | 'WithdrawalLimitExceeded'
  | 'IntervalNotElapsed'
  | 'TransferFailed'
  | 'EnginePaused'
  | 'ReentrantCall';

const ERROR_CODES: Record<CrowdfundErrorKind, string> = {
  InvalidParameters: 'invalid-parameters',
  CampaignNotFound: 'campaign-not-found',
  CampaignClosed: 'campaign-closed',
  DeadlinePassed: 'deadline-passed',
  ContributionOutOfBounds: 'contribution-out-of-bounds',
  Unauthorized: 'unauthorized',
  RefundsUnavailable: 'refunds-unavailable',
  NoContribution: 'no-contribution',
  NoExcess: 'no-excess',
  WithdrawalLimitExceeded: 'withdrawal-limit-exceeded',
  IntervalNotElapsed: 'interval-not-elapsed',
  TransferFailed: 'transfer-failed',
  EnginePaused: 'engine-paused',
  ReentrantCall: 'reentrant-call',
};

/**
 * Typed engine failure. `message` is the kebab-case code so callers that only
 * look at `err.message` still see a stable identifier.
 */
export class CrowdfundError extends Error {
  readonly kind: CrowdfundErrorKind;
  readonly code: string;
  readonly detail?: string;

  constructor(kind: CrowdfundErrorKind, detail?: string) {
    super(ERROR_CODES[kind]);
    this.name = 'CrowdfundError';
    this.kind = kind;
    this.code = ERROR_CODES[kind];
    this.detail = detail;
  }
}

export function isCrowdfundError(err: unknown, kind?: CrowdfundErrorKind): err is CrowdfundError {
  return err instanceof CrowdfundError && (kind === undefined || err.kind === kind);
}

/**
 * The operation committed in memory (value may already have moved) but the
 * repository write failed. Retrying the operation would apply it twice.
 */
export class PersistenceError extends Error {
  readonly code = 'persistence-failed';
  readonly committed = true;

  constructor(readonly operation: string, cause: unknown) {
    super('persistence-failed', { cause });
    this.name = 'PersistenceError';
  }
}
