import { ethers } from 'ethers';
import { ADDRESS_ZERO } from '../lib/constants';
import { ErrorCode, ValidationError } from '../lib/errors';

/**
 * Lower-cased form used for every map key
 */
export function normalizeAddress(address: string): string {
  if (!ethers.utils.isAddress(address)) {
    throw new ValidationError(ErrorCode.InvalidAddress, address);
  }
  return address.toLowerCase();
}

export function normalizeNonZeroAddress(address: string): string {
  const normalized = normalizeAddress(address);
  if (normalized === ADDRESS_ZERO) {
    throw new ValidationError(ErrorCode.ZeroAddress);
  }
  return normalized;
}
