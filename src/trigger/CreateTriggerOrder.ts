import type { ComputeUnitPrice } from '../types/Trigger.js';
import { toAddress, type AddressInput } from '../utils/encoding.js';
import { assertNonEmpty, invariant } from '../utils/invariant.js';
import { checkBps, toPositiveU64, type AmountInput } from '../utils/math.js';

export type CreateTriggerOrderParams = {
  readonly inputMint: string;
  readonly outputMint: string;
  readonly maker: string;
  readonly payer: string;
  /** Raw amount of `inputMint` the order sells. */
  readonly makingAmount: bigint;
  /** Raw amount of `outputMint` the order wants in return. */
  readonly takingAmount: bigint;
  /** Unix seconds. */
  readonly expiredAt?: string;
  readonly slippageBps?: number;
  readonly feeBps?: number;
  readonly computeUnitPrice?: ComputeUnitPrice;
  readonly feeAccount?: string;
  readonly wrapAndUnwrapSol?: boolean;
};

export function encodeComputeUnitPrice(price: ComputeUnitPrice | undefined): string | undefined {
  if (price === undefined || price === 'auto') return price;
  invariant(Number.isSafeInteger(price) && price >= 0, 'computeUnitPrice must be "auto" or a non-negative integer', {
    value: price
  });
  return String(price);
}

/** Body for `POST /trigger/v1/createOrder` (a limit order). */
export class CreateTriggerOrder {
  private constructor(readonly params: CreateTriggerOrderParams) {}

  static create(args: {
    inputMint: string;
    outputMint: string;
    maker: AddressInput;
    payer: AddressInput;
    makingAmount: AmountInput;
    takingAmount: AmountInput;
  }): CreateTriggerOrder {
    return new CreateTriggerOrder({
      inputMint: assertNonEmpty(args.inputMint, 'inputMint'),
      outputMint: assertNonEmpty(args.outputMint, 'outputMint'),
      maker: toAddress(args.maker, 'maker'),
      payer: toAddress(args.payer, 'payer'),
      makingAmount: toPositiveU64(args.makingAmount, 'makingAmount'),
      takingAmount: toPositiveU64(args.takingAmount, 'takingAmount')
    });
  }

  withExpiredAt(unixSeconds: number | string): CreateTriggerOrder {
    const value = String(unixSeconds);
    invariant(/^[0-9]+$/.test(value), 'expiredAt must be a unix timestamp in seconds', { value });
    return this.with({ expiredAt: value });
  }

  withSlippageBps(slippageBps: number): CreateTriggerOrder {
    return this.with({ slippageBps: checkBps(slippageBps, 'slippageBps') });
  }

  withFeeBps(feeBps: number): CreateTriggerOrder {
    return this.with({ feeBps: checkBps(feeBps, 'feeBps') });
  }

  withComputeUnitPrice(computeUnitPrice: ComputeUnitPrice): CreateTriggerOrder {
    encodeComputeUnitPrice(computeUnitPrice);
    return this.with({ computeUnitPrice });
  }

  withFeeAccount(feeAccount: AddressInput): CreateTriggerOrder {
    return this.with({ feeAccount: toAddress(feeAccount, 'feeAccount') });
  }

  withWrapAndUnwrapSol(wrapAndUnwrapSol: boolean): CreateTriggerOrder {
    return this.with({ wrapAndUnwrapSol });
  }

  toBody(): object {
    const p = this.params;
    return {
      inputMint: p.inputMint,
      outputMint: p.outputMint,
      maker: p.maker,
      payer: p.payer,
      params: {
        makingAmount: p.makingAmount.toString(),
        takingAmount: p.takingAmount.toString(),
        expiredAt: p.expiredAt,
        slippageBps: p.slippageBps?.toString(),
        feeBps: p.feeBps?.toString()
      },
      computeUnitPrice: encodeComputeUnitPrice(p.computeUnitPrice),
      feeAccount: p.feeAccount,
      wrapAndUnwrapSol: p.wrapAndUnwrapSol
    };
  }

  private with(patch: Partial<CreateTriggerOrderParams>): CreateTriggerOrder {
    return new CreateTriggerOrder({ ...this.params, ...patch });
  }
}
