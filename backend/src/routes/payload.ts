import { NATIVE_ASSET, parseAssetKey, type FundingAsset } from '../ledger/types';
import type {
  CreateCampaignInput,
  MetadataUpdate,
  WithdrawalConfigInput,
  WithdrawalLimitInput,
} from '../services/CampaignService';
import { RequestError } from './http';

type Body = Record<string, unknown>;

function asBody(body: unknown): Body {
  if (body === null || typeof body !== 'object' || Array.isArray(body)) return {};
  return Object.fromEntries(Object.entries(body));
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && String(value).trim() !== '';
}

/** Base-unit amounts travel as decimal strings (numbers are accepted while they stay safe integers). */
export function parseAmount(body: unknown, field = 'amount'): bigint {
  const raw = asBody(body)[field];
  if (!isPresent(raw)) {
    throw new RequestError(`${field}-required`);
  }
  if (typeof raw === 'number') {
    if (!Number.isSafeInteger(raw) || raw < 0) {
      throw new RequestError(`${field}-invalid`);
    }
    return BigInt(raw);
  }
  const normalized = String(raw).trim();
  if (typeof raw !== 'string' || !/^\d+$/.test(normalized)) {
    throw new RequestError(`${field}-invalid`);
  }
  return BigInt(normalized);
}

export function parseInteger(body: unknown, field: string): number {
  const raw = asBody(body)[field];
  if (!isPresent(raw)) {
    throw new RequestError(`${field}-required`);
  }
  const value = typeof raw === 'number' ? raw : typeof raw === 'string' && /^-?\d+$/.test(raw.trim()) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(value)) {
    throw new RequestError(`${field}-invalid`);
  }
  return value;
}

export function parseOptionalInteger(body: unknown, field: string): number | undefined {
  return isPresent(asBody(body)[field]) ? parseInteger(body, field) : undefined;
}

export function parseBoolean(body: unknown, field: string): boolean {
  const raw = asBody(body)[field];
  if (typeof raw !== 'boolean') {
    throw new RequestError(`${field}-invalid`);
  }
  return raw;
}

function parseOptionalBoolean(body: unknown, field: string): boolean | undefined {
  return asBody(body)[field] === undefined ? undefined : parseBoolean(body, field);
}

export function parseString(body: unknown, field: string): string {
  const raw = asBody(body)[field];
  if (typeof raw !== 'string' || !raw.trim()) {
    throw new RequestError(`${field}-required`);
  }
  return raw.trim();
}

function parseOptionalString(body: unknown, field: string): string | undefined {
  const raw = asBody(body)[field];
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw !== 'string') {
    throw new RequestError(`${field}-invalid`);
  }
  return raw;
}

/** Accepts `"native"` or `"token:<id>"`. */
export function parseAsset(body: unknown, field = 'asset'): FundingAsset {
  const raw = asBody(body)[field];
  if (typeof raw !== 'string' || !raw.trim()) {
    throw new RequestError(`${field}-required`);
  }
  const asset = parseAssetKey(raw.trim());
  if (!asset) {
    throw new RequestError(`${field}-invalid`);
  }
  return asset;
}

/** Native when the field is absent. */
export function parseOptionalAsset(body: unknown, field = 'asset'): FundingAsset {
  return isPresent(asBody(body)[field]) ? parseAsset(body, field) : NATIVE_ASSET;
}

function parseLimit(raw: unknown): WithdrawalLimitInput | null | undefined {
  if (raw === undefined) return undefined;
  if (raw === null) return null;
  const limit: WithdrawalLimitInput = { ceiling: parseAmount(raw, 'ceiling') };
  const minIntervalMs = parseOptionalInteger(raw, 'minIntervalMs');
  if (minIntervalMs !== undefined) limit.minIntervalMs = minIntervalMs;
  return limit;
}

export function parseCreateCampaign(body: unknown): CreateCampaignInput {
  const record = asBody(body);
  const input: CreateCampaignInput = {
    goal: parseAmount(record, 'goal'),
    minContribution: parseAmount(record, 'minContribution'),
    maxContribution: parseAmount(record, 'maxContribution'),
    durationDays: parseInteger(record, 'durationDays'),
    title: parseString(record, 'title'),
    description: parseOptionalString(record, 'description'),
    mediaRef: parseOptionalString(record, 'mediaRef'),
    category: parseOptionalString(record, 'category'),
    allowPartialWithdrawals: parseOptionalBoolean(record, 'allowPartialWithdrawals'),
    withdrawalLimit: parseLimit(record.withdrawalLimit),
  };
  if (record.asset !== undefined) {
    input.asset = parseAsset(record);
  }
  return input;
}

export function parseMetadata(body: unknown): MetadataUpdate {
  return {
    title: parseOptionalString(body, 'title'),
    description: parseOptionalString(body, 'description'),
    mediaRef: parseOptionalString(body, 'mediaRef'),
    category: parseOptionalString(body, 'category'),
  };
}

export function parseWithdrawalConfig(body: unknown): WithdrawalConfigInput {
  const record = asBody(body);
  return {
    allowPartialWithdrawals: parseOptionalBoolean(record, 'allowPartialWithdrawals'),
    limit: parseLimit(record.limit),
  };
}
