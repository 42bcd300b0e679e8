import { z } from 'zod';
import { OrderStatusSchema } from './Orders.js';

export type RecurringOrderType = 'time' | 'price';

/** `all` only exists as a filter when listing orders. */
export type RecurringOrderFilter = RecurringOrderType | 'all';

export const TimeParamsSchema = z.object({
  inAmount: z.number(),
  numberOfOrders: z.number(),
  /** Seconds between orders. */
  interval: z.number(),
  minPrice: z.number().optional(),
  maxPrice: z.number().optional(),
  startAt: z.number().optional()
});
export type TimeParams = z.infer<typeof TimeParamsSchema>;

export const PriceParamsSchema = z.object({
  depositAmount: z.number(),
  incrementUsdcValue: z.number(),
  interval: z.number(),
  startAt: z.number().optional()
});
export type PriceParams = z.infer<typeof PriceParamsSchema>;

/**
 * Schedule parameters travel untagged; the single `time` or `price` key picks the
 * variant. Decoding tries `time` first, then `price`.
 */
export const RecurringOrderParamsSchema = z.union([
  z.object({ time: TimeParamsSchema }),
  z.object({ price: PriceParamsSchema })
]);
export type RecurringOrderParams = z.infer<typeof RecurringOrderParamsSchema>;

export const CreateRecurringOrderBodySchema = z.object({
  user: z.string(),
  inputMint: z.string(),
  outputMint: z.string(),
  params: RecurringOrderParamsSchema
});
export type CreateRecurringOrderBody = z.infer<typeof CreateRecurringOrderBodySchema>;

export const RecurringTransactionResponseSchema = z
  .object({
    requestId: z.string(),
    /** Unsigned base64 transaction. */
    transaction: z.string()
  })
  .passthrough();
export type RecurringTransactionResponse = z.infer<typeof RecurringTransactionResponseSchema>;

export const RecurringOrdersResponseSchema = z
  .object({
    orderStatus: OrderStatusSchema,
    page: z.number(),
    totalPages: z.number(),
    user: z.string(),
    time: z.array(z.unknown()).optional(),
    price: z.array(z.unknown()).optional(),
    all: z.array(z.unknown()).optional()
  })
  .passthrough();
export type RecurringOrdersResponse = z.infer<typeof RecurringOrdersResponseSchema>;
