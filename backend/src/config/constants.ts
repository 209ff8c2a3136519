const DEFAULT_PLATFORM_OWNER = 'platform-owner';
const DEFAULT_PLATFORM_FEE_BPS = 250;
const DEFAULT_MAX_PLATFORM_FEE_BPS = 1_000;
const DEFAULT_CANCEL_SWEEP_BATCH = 100;

export const BPS_DENOMINATOR = 10_000n;
export const DAY_MS = 86_400_000;

function parsePositiveIntegerEnv(raw: string | undefined, fallback: number): number {
  if (!raw || !raw.trim()) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0 || !Number.isInteger(parsed)) {
    return fallback;
  }
  return parsed;
}

function parseBpsEnv(raw: string | undefined, fallback: number): number {
  if (!raw || !raw.trim()) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > Number(BPS_DENOMINATOR)) {
    return fallback;
  }
  return parsed;
}

function parseListEnv(raw: string | undefined): string[] {
  return (raw || '')
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
}

export const MAX_PLATFORM_FEE_BPS = parseBpsEnv(
  process.env.MAX_PLATFORM_FEE_BPS,
  DEFAULT_MAX_PLATFORM_FEE_BPS,
);

export const PLATFORM_FEE_BPS = Math.min(
  parseBpsEnv(process.env.PLATFORM_FEE_BPS, DEFAULT_PLATFORM_FEE_BPS),
  MAX_PLATFORM_FEE_BPS,
);

export const PLATFORM_OWNER = process.env.PLATFORM_OWNER?.trim() || DEFAULT_PLATFORM_OWNER;

export const PLATFORM_FEE_RECIPIENT = process.env.PLATFORM_FEE_RECIPIENT?.trim() || PLATFORM_OWNER;

export const CANCEL_SWEEP_BATCH = parsePositiveIntegerEnv(
  process.env.CANCEL_SWEEP_BATCH,
  DEFAULT_CANCEL_SWEEP_BATCH,
);

export const ALLOWED_TOKENS = parseListEnv(process.env.ALLOWED_TOKENS);

export type PlatformConfig = {
  owner: string;
  feeRecipient: string;
  feeBps: number;
  maxFeeBps: number;
  cancelSweepBatch: number;
  allowedTokens: string[];
};

export function defaultPlatformConfig(): PlatformConfig {
  return {
    owner: PLATFORM_OWNER,
    feeRecipient: PLATFORM_FEE_RECIPIENT,
    feeBps: PLATFORM_FEE_BPS,
    maxFeeBps: MAX_PLATFORM_FEE_BPS,
    cancelSweepBatch: CANCEL_SWEEP_BATCH,
    allowedTokens: [...ALLOWED_TOKENS],
  };
}
