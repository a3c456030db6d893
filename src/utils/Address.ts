/**
 * Account and asset identifier normalization.
 *
 * Every ledger key, registry key and event field goes through
 * normalizeAddress so mixed-case inputs resolve to the same position.
 */

import { config } from '../config/index.js';

/**
 * Normalize an identifier: trimmed, lowercased if normalization is enabled
 */
export function normalizeAddress(address: string): string {
  const trimmed = address.trim();

  if (config.addressNormalizeLowercase) {
    return trimmed.toLowerCase();
  }

  return trimmed;
}

/**
 * Check if two identifiers are equal after normalization
 */
export function addressesEqual(addr1: string, addr2: string): boolean {
  if (!addr1 || !addr2) return false;
  return normalizeAddress(addr1) === normalizeAddress(addr2);
}
