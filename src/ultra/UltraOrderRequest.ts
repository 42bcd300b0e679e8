import type { QueryParams } from '../codec/wire.js';
import { toAddress, type AddressInput } from '../utils/encoding.js';
import { assertNonEmpty } from '../utils/invariant.js';
import { checkRange, toPositiveU64, type AmountInput } from '../utils/math.js';

export type UltraOrderParams = {
  readonly inputMint: string;
  readonly outputMint: string;
  readonly amount: bigint;
  /** Without a taker the service still quotes, but returns no transaction. */
  readonly taker?: string;
  readonly referralAccount?: string;
  readonly referralFee?: number;
  readonly excludeRouters?: readonly string[];
  readonly excludeDexes?: readonly string[];
};

export const MIN_REFERRAL_FEE_BPS = 50;
export const MAX_REFERRAL_FEE_BPS = 255;

/** Query for `GET /ultra/v1/order`. */
export class UltraOrderRequest {
  private constructor(readonly params: UltraOrderParams) {}

  static create(inputMint: string, outputMint: string, amount: AmountInput): UltraOrderRequest {
    return new UltraOrderRequest({
      inputMint: assertNonEmpty(inputMint, 'inputMint'),
      outputMint: assertNonEmpty(outputMint, 'outputMint'),
      amount: toPositiveU64(amount)
    });
  }

  withTaker(taker: AddressInput): UltraOrderRequest {
    return this.with({ taker: toAddress(taker, 'taker') });
  }

  withReferralAccount(referralAccount: AddressInput): UltraOrderRequest {
    return this.with({ referralAccount: toAddress(referralAccount, 'referralAccount') });
  }

  withReferralFee(referralFeeBps: number): UltraOrderRequest {
    return this.with({
      referralFee: checkRange(referralFeeBps, MIN_REFERRAL_FEE_BPS, MAX_REFERRAL_FEE_BPS, 'referralFee')
    });
  }

  /** Router ids as listed by `GET /ultra/v1/order/routers`. */
  withExcludeRouters(routers: readonly string[]): UltraOrderRequest {
    return this.with({ excludeRouters: [...routers] });
  }

  withExcludeDexes(dexes: readonly string[]): UltraOrderRequest {
    return this.with({ excludeDexes: [...dexes] });
  }

  toQueryParams(): QueryParams {
    const p = this.params;
    return {
      inputMint: p.inputMint,
      outputMint: p.outputMint,
      amount: p.amount,
      taker: p.taker,
      referralAccount: p.referralAccount,
      referralFee: p.referralFee,
      excludeRouters: p.excludeRouters,
      excludeDexes: p.excludeDexes
    };
  }

  private with(patch: Partial<UltraOrderParams>): UltraOrderRequest {
    return new UltraOrderRequest({ ...this.params, ...patch });
  }
}
