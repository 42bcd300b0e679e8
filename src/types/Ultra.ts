import { z } from 'zod';
import { PlatformFeeSchema, RoutePlanStepSchema, SwapModeSchema } from './Quote.js';

export const SwapTypeSchema = z.enum(['aggregator', 'rfq', 'hashflow']);
export type SwapType = z.infer<typeof SwapTypeSchema>;

export const UltraOrderResponseSchema = z
  .object({
    inputMint: z.string(),
    outputMint: z.string(),
    inAmount: z.string(),
    outAmount: z.string(),
    /** Worst-case output after slippage and fees. */
    otherAmountThreshold: z.string(),
    swapMode: SwapModeSchema,
    slippageBps: z.number(),
    priceImpactPct: z.string(),
    routePlan: z.array(RoutePlanStepSchema),
    feeMint: z.string().optional(),
    feeBps: z.number(),
    prioritizationFeeLamports: z.number(),
    swapType: SwapTypeSchema,
    /** Unsigned base64 transaction; absent or null when no taker was given. */
    transaction: z.string().nullish(),
    gasless: z.boolean(),
    requestId: z.string(),
    totalTime: z.number(),
    taker: z.string().nullish(),
    quoteId: z.string().optional(),
    maker: z.string().optional(),
    platformFee: PlatformFeeSchema.nullish(),
    expireAt: z.union([z.string(), z.number()]).nullish()
  })
  .passthrough();
export type UltraOrderResponse = z.infer<typeof UltraOrderResponseSchema>;

export type UltraExecuteRequest = {
  /** Signed transaction, base64. */
  signedTransaction: string;
  requestId: string;
};

export const SwapEventSchema = z
  .object({
    inputMint: z.string(),
    inputAmount: z.string(),
    outputMint: z.string(),
    outputAmount: z.string()
  })
  .passthrough();

export const UltraExecuteResponseSchema = z
  .object({
    status: z.enum(['Success', 'Failed']),
    code: z.number(),
    signature: z.string().optional(),
    slot: z.union([z.string(), z.number()]).optional(),
    error: z.string().optional(),
    totalInputAmount: z.string().optional(),
    totalOutputAmount: z.string().optional(),
    inputAmountResult: z.string().optional(),
    outputAmountResult: z.string().optional(),
    swapEvents: z.array(SwapEventSchema).optional()
  })
  .passthrough();
export type UltraExecuteResponse = z.infer<typeof UltraExecuteResponseSchema>;

export const TokenBalanceSchema = z
  .object({
    amount: z.string(),
    uiAmount: z.number(),
    slot: z.number(),
    isFrozen: z.boolean()
  })
  .passthrough();
export type TokenBalance = z.infer<typeof TokenBalanceSchema>;

/** Keyed by mint address, with native SOL under `SOL`. */
export const TokenBalancesSchema = z.record(TokenBalanceSchema);
export type TokenBalances = z.infer<typeof TokenBalancesSchema>;

export const ShieldWarningSchema = z
  .object({
    type: z.string(),
    message: z.string(),
    severity: z.string()
  })
  .passthrough();
export type ShieldWarning = z.infer<typeof ShieldWarningSchema>;

export const ShieldSchema = z
  .object({
    warnings: z.record(z.array(ShieldWarningSchema))
  })
  .passthrough();
export type Shield = z.infer<typeof ShieldSchema>;

export const RouterSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    icon: z.string().optional()
  })
  .passthrough();
export type Router = z.infer<typeof RouterSchema>;

export const RoutersSchema = z.array(RouterSchema);
