import type { QuoteResponse } from '../types/Quote.js';
import type { PrioritizationFeeLamports } from '../types/Swap.js';
import { toAddress, type AddressInput } from '../utils/encoding.js';
import { invariant } from '../utils/invariant.js';
import { toJsonInteger, type AmountInput } from '../utils/math.js';

export type SwapParams = {
  readonly userPublicKey: string;
  readonly wrapAndUnwrapSol?: boolean;
  readonly useSharedAccounts?: boolean;
  readonly feeAccount?: string;
  readonly trackingAccount?: string;
  readonly prioritizationFeeLamports?: PrioritizationFeeLamports;
  readonly asLegacyTransaction?: boolean;
  readonly destinationTokenAccount?: string;
  readonly dynamicComputeUnitLimit?: boolean;
  readonly skipUserAccountsRpcCalls?: boolean;
  readonly dynamicSlippage?: boolean;
  readonly computeUnitPriceMicroLamports?: number;
  readonly blockhashSlotsToExpiry?: number;
};

function checkPrioritizationFee(fee: PrioritizationFeeLamports): PrioritizationFeeLamports {
  if (fee === 'auto') return fee;
  if (typeof fee === 'number') {
    toJsonInteger(fee, 'prioritizationFeeLamports');
    return fee;
  }
  if ('jitoTipLamports' in fee) {
    toJsonInteger(fee.jitoTipLamports, 'jitoTipLamports');
    return { jitoTipLamports: fee.jitoTipLamports };
  }
  toJsonInteger(fee.priorityLevelWithMaxLamports.maxLamports, 'maxLamports');
  return { priorityLevelWithMaxLamports: { ...fee.priorityLevelWithMaxLamports } };
}

/**
 * Body for `POST /swap/v1/swap` and `POST /swap/v1/swap-instructions`.
 *
 * The quote is copied on the way in and on the way out, so neither the caller's
 * object nor the returned body can alter it. Quotes go stale quickly; fetching a
 * fresh one before building the swap is up to the caller.
 */
export class SwapRequest {
  private constructor(
    readonly params: SwapParams,
    private readonly quote: QuoteResponse
  ) {}

  static create(userPublicKey: AddressInput, quoteResponse: QuoteResponse): SwapRequest {
    return new SwapRequest(
      { userPublicKey: toAddress(userPublicKey, 'userPublicKey') },
      structuredClone(quoteResponse)
    );
  }

  get quoteResponse(): QuoteResponse {
    return structuredClone(this.quote);
  }

  withWrapAndUnwrapSol(wrapAndUnwrapSol: boolean): SwapRequest {
    return this.with({ wrapAndUnwrapSol });
  }

  withUseSharedAccounts(useSharedAccounts: boolean): SwapRequest {
    return this.with({ useSharedAccounts });
  }

  withFeeAccount(feeAccount: AddressInput): SwapRequest {
    return this.with({ feeAccount: toAddress(feeAccount, 'feeAccount') });
  }

  withTrackingAccount(trackingAccount: AddressInput): SwapRequest {
    return this.with({ trackingAccount: toAddress(trackingAccount, 'trackingAccount') });
  }

  withPrioritizationFeeLamports(fee: PrioritizationFeeLamports): SwapRequest {
    return this.with({ prioritizationFeeLamports: checkPrioritizationFee(fee) });
  }

  withAsLegacyTransaction(asLegacyTransaction: boolean): SwapRequest {
    return this.with({ asLegacyTransaction });
  }

  withDestinationTokenAccount(destinationTokenAccount: AddressInput): SwapRequest {
    return this.with({
      destinationTokenAccount: toAddress(destinationTokenAccount, 'destinationTokenAccount')
    });
  }

  withDynamicComputeUnitLimit(dynamicComputeUnitLimit: boolean): SwapRequest {
    return this.with({ dynamicComputeUnitLimit });
  }

  withSkipUserAccountsRpcCalls(skipUserAccountsRpcCalls: boolean): SwapRequest {
    return this.with({ skipUserAccountsRpcCalls });
  }

  withDynamicSlippage(dynamicSlippage: boolean): SwapRequest {
    return this.with({ dynamicSlippage });
  }

  withComputeUnitPriceMicroLamports(price: AmountInput): SwapRequest {
    return this.with({ computeUnitPriceMicroLamports: toJsonInteger(price, 'computeUnitPriceMicroLamports') });
  }

  withBlockhashSlotsToExpiry(slots: number): SwapRequest {
    invariant(Number.isInteger(slots) && slots > 0, 'blockhashSlotsToExpiry must be a positive integer', {
      value: slots
    });
    return this.with({ blockhashSlotsToExpiry: slots });
  }

  toBody(): object {
    const p = this.params;
    return {
      userPublicKey: p.userPublicKey,
      wrapAndUnwrapSol: p.wrapAndUnwrapSol,
      useSharedAccounts: p.useSharedAccounts,
      feeAccount: p.feeAccount,
      trackingAccount: p.trackingAccount,
      prioritizationFeeLamports: p.prioritizationFeeLamports,
      asLegacyTransaction: p.asLegacyTransaction,
      destinationTokenAccount: p.destinationTokenAccount,
      dynamicComputeUnitLimit: p.dynamicComputeUnitLimit,
      skipUserAccountsRpcCalls: p.skipUserAccountsRpcCalls,
      dynamicSlippage: p.dynamicSlippage,
      computeUnitPriceMicroLamports: p.computeUnitPriceMicroLamports,
      blockhashSlotsToExpiry: p.blockhashSlotsToExpiry,
      quoteResponse: structuredClone(this.quote)
    };
  }

  private with(patch: Partial<SwapParams>): SwapRequest {
    return new SwapRequest({ ...this.params, ...patch }, this.quote);
  }
}
