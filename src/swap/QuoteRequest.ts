import type { QueryParams } from '../codec/wire.js';
import type { SwapMode } from '../types/Quote.js';
import { assertNonEmpty } from '../utils/invariant.js';
import { checkBps, checkRange, toPositiveU64, type AmountInput } from '../utils/math.js';

export type QuoteParams = {
  readonly inputMint: string;
  readonly outputMint: string;
  /** Raw amount before decimals. Input amount for `ExactIn`, output amount for `ExactOut`. */
  readonly amount: bigint;
  readonly slippageBps?: number;
  readonly swapMode?: SwapMode;
  readonly dexes?: readonly string[];
  readonly excludeDexes?: readonly string[];
  readonly restrictIntermediateTokens?: boolean;
  readonly onlyDirectRoutes?: boolean;
  readonly asLegacyTransaction?: boolean;
  readonly platformFeeBps?: number;
  readonly maxAccounts?: number;
  readonly dynamicSlippage?: boolean;
};

/**
 * Query for `GET /swap/v1/quote`.
 *
 * ```ts
 * const request = QuoteRequest.create(SOL, USDC, 1_000_000_000n)
 *   .withSlippageBps(50)
 *   .withSwapMode('ExactIn');
 * ```
 */
export class QuoteRequest {
  private constructor(readonly params: QuoteParams) {}

  static create(inputMint: string, outputMint: string, amount: AmountInput): QuoteRequest {
    return new QuoteRequest({
      inputMint: assertNonEmpty(inputMint, 'inputMint'),
      outputMint: assertNonEmpty(outputMint, 'outputMint'),
      amount: toPositiveU64(amount)
    });
  }

  withSlippageBps(slippageBps: number): QuoteRequest {
    return this.with({ slippageBps: checkBps(slippageBps, 'slippageBps') });
  }

  withSwapMode(swapMode: SwapMode): QuoteRequest {
    return this.with({ swapMode });
  }

  /** Only route through these DEXes, by label (e.g. `Orca`, `Meteora+DLMM`). */
  withDexes(dexes: readonly string[]): QuoteRequest {
    return this.with({ dexes: [...dexes] });
  }

  withExcludeDexes(excludeDexes: readonly string[]): QuoteRequest {
    return this.with({ excludeDexes: [...excludeDexes] });
  }

  withRestrictIntermediateTokens(restrictIntermediateTokens: boolean): QuoteRequest {
    return this.with({ restrictIntermediateTokens });
  }

  withOnlyDirectRoutes(onlyDirectRoutes: boolean): QuoteRequest {
    return this.with({ onlyDirectRoutes });
  }

  withAsLegacyTransaction(asLegacyTransaction: boolean): QuoteRequest {
    return this.with({ asLegacyTransaction });
  }

  withPlatformFeeBps(platformFeeBps: number): QuoteRequest {
    return this.with({ platformFeeBps: checkBps(platformFeeBps, 'platformFeeBps') });
  }

  /** Rough cap on the accounts the route may touch; the largest a transaction can hold is 64. */
  withMaxAccounts(maxAccounts: number): QuoteRequest {
    return this.with({ maxAccounts: checkRange(maxAccounts, 1, 64, 'maxAccounts') });
  }

  withDynamicSlippage(dynamicSlippage: boolean): QuoteRequest {
    return this.with({ dynamicSlippage });
  }

  toQueryParams(): QueryParams {
    const p = this.params;
    return {
      inputMint: p.inputMint,
      outputMint: p.outputMint,
      amount: p.amount,
      slippageBps: p.slippageBps,
      swapMode: p.swapMode,
      dexes: p.dexes,
      excludeDexes: p.excludeDexes,
      restrictIntermediateTokens: p.restrictIntermediateTokens,
      onlyDirectRoutes: p.onlyDirectRoutes,
      asLegacyTransaction: p.asLegacyTransaction,
      platformFeeBps: p.platformFeeBps,
      maxAccounts: p.maxAccounts,
      dynamicSlippage: p.dynamicSlippage
    };
  }

  private with(patch: Partial<QuoteParams>): QuoteRequest {
    return new QuoteRequest({ ...this.params, ...patch });
  }
}
