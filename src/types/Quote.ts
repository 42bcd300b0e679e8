import { z } from 'zod';

export const SwapModeSchema = z.enum(['ExactIn', 'ExactOut']);
export type SwapMode = z.infer<typeof SwapModeSchema>;

export const PlatformFeeSchema = z
  .object({
    amount: z.string(),
    feeBps: z.number()
  })
  .passthrough();
export type PlatformFee = z.infer<typeof PlatformFeeSchema>;

/** One hop of a route. Amounts are raw integer amounts as decimal strings. */
export const SwapInfoSchema = z
  .object({
    ammKey: z.string(),
    label: z.string(),
    inputMint: z.string(),
    outputMint: z.string(),
    inAmount: z.string(),
    outAmount: z.string(),
    feeAmount: z.string().optional(),
    feeMint: z.string().optional()
  })
  .passthrough();
export type SwapInfo = z.infer<typeof SwapInfoSchema>;

export const RoutePlanStepSchema = z
  .object({
    swapInfo: SwapInfoSchema,
    percent: z.number(),
    bps: z.number().optional()
  })
  .passthrough();
export type RoutePlanStep = z.infer<typeof RoutePlanStepSchema>;

export const MostReliableAmmsQuoteReportSchema = z
  .object({
    info: z.record(z.string())
  })
  .passthrough();

export const QuoteResponseSchema = z
  .object({
    inputMint: z.string(),
    inAmount: z.string(),
    outputMint: z.string(),
    outAmount: z.string(),
    otherAmountThreshold: z.string(),
    swapMode: SwapModeSchema,
    slippageBps: z.number(),
    platformFee: PlatformFeeSchema.nullish(),
    priceImpactPct: z.string(),
    routePlan: z.array(RoutePlanStepSchema),
    contextSlot: z.number(),
    timeTaken: z.number(),

    // Diagnostics that depend on the server version; kept as raw JSON.
    scoreReport: z.unknown(),
    swapUsdValue: z.string().optional(),
    simplerRouteUsed: z.boolean().optional(),
    mostReliableAmmsQuoteReport: MostReliableAmmsQuoteReportSchema.optional(),
    useIncurredSlippageForQuoting: z.unknown()
  })
  .passthrough();
export type QuoteResponse = z.infer<typeof QuoteResponseSchema>;
