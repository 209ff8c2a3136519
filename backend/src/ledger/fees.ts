import { BPS_DENOMINATOR } from '../config/constants';
import { CrowdfundError } from './errors';

export type FeeSplit = {
  fee: bigint;
  net: bigint;
};

/** Floors the fee, so rounding dust always stays with the recipient. */
export function splitFee(gross: bigint, feeBps: number): FeeSplit {
  if (gross < 0n) {
    throw new CrowdfundError('InvalidParameters', 'gross-negative');
  }
  if (!Number.isInteger(feeBps) || feeBps < 0 || BigInt(feeBps) > BPS_DENOMINATOR) {
    throw new CrowdfundError('InvalidParameters', 'fee-bps-invalid');
  }
  const fee = (gross * BigInt(feeBps)) / BPS_DENOMINATOR;
  return { fee, net: gross - fee };
}
