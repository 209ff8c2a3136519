import type { Request, Response } from 'express';
import { PersistenceError, isCrowdfundError, type CrowdfundErrorKind } from '../ledger/errors';
import type { AccountId, CampaignId } from '../ledger/types';

const STATUS_BY_KIND: Record<CrowdfundErrorKind, number> = {
  InvalidParameters: 400,
  ContributionOutOfBounds: 400,
  Unauthorized: 403,
  CampaignNotFound: 404,
  CampaignClosed: 409,
  DeadlinePassed: 409,
  RefundsUnavailable: 409,
  NoContribution: 409,
  NoExcess: 409,
  WithdrawalLimitExceeded: 409,
  IntervalNotElapsed: 409,
  ReentrantCall: 409,
  TransferFailed: 502,
  EnginePaused: 503,
};

/** Malformed request input. `message` is the field-specific code sent back as `error`. */
export class RequestError extends Error {
  constructor(code: string, readonly status = 400) {
    super(code);
    this.name = 'RequestError';
  }
}

export const CALLER_HEADER = 'x-account-id';

export function callerOf(req: Request): AccountId {
  const raw = req.header(CALLER_HEADER)?.trim() ?? '';
  if (!raw) {
    throw new RequestError('caller-required');
  }
  return raw;
}

export function parseCampaignId(raw: string | undefined): CampaignId {
  const value = (raw ?? '').trim();
  if (!/^\d+$/.test(value)) {
    throw new RequestError('campaign-id-invalid');
  }
  const id = Number(value);
  if (!Number.isSafeInteger(id)) {
    throw new RequestError('campaign-id-invalid');
  }
  return id;
}

export function sendError(res: Response, err: unknown) {
  if (err instanceof RequestError) {
    return res.status(err.status).json({ error: err.message });
  }
  if (isCrowdfundError(err)) {
    const body: { error: string; detail?: string } = { error: err.code };
    if (err.detail) body.detail = err.detail;
    return res.status(STATUS_BY_KIND[err.kind]).json(body);
  }
  if (err instanceof PersistenceError) {
    // Applied in memory but not saved.
    console.error(`[http] ${err.operation} applied but not persisted`, err.cause);
    return res.status(500).json({ error: err.code, committed: true });
  }
  console.error('[http] unexpected error', err);
  return res.status(500).json({ error: 'internal-error' });
}
