import { PublicKey } from '@solana/web3.js';
import { assertNonEmpty } from './invariant.js';

export type AddressInput = PublicKey | string;

/**
 * Wallet and account addresses are accepted as `PublicKey` or base58 text.
 * Text is passed through as-is; the service is the one that validates it.
 */
export function toAddress(value: AddressInput, fieldName = 'address'): string {
  if (value instanceof PublicKey) return value.toBase58();
  return assertNonEmpty(value, fieldName);
}

export function toAddressList(values: readonly AddressInput[], fieldName = 'addresses'): string[] {
  return values.map((value, i) => toAddress(value, `${fieldName}[${i}]`));
}
