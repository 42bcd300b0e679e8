import { z } from 'zod';
import { OrderStatusSchema } from './Orders.js';

export type ComputeUnitPrice = 'auto' | number;

export const CreateTriggerOrderResponseSchema = z
  .object({
    /** Address of the order account the transaction creates. */
    order: z.string(),
    transaction: z.string(),
    requestId: z.string()
  })
  .passthrough();
export type CreateTriggerOrderResponse = z.infer<typeof CreateTriggerOrderResponseSchema>;

export const CancelTriggerOrderResponseSchema = z
  .object({
    transaction: z.string(),
    requestId: z.string()
  })
  .passthrough();
export type CancelTriggerOrderResponse = z.infer<typeof CancelTriggerOrderResponseSchema>;

export const CancelTriggerOrdersResponseSchema = z
  .object({
    transactions: z.array(z.string()),
    requestId: z.string()
  })
  .passthrough();
export type CancelTriggerOrdersResponse = z.infer<typeof CancelTriggerOrdersResponseSchema>;

export const TriggerOrderSchema = z
  .object({
    orderKey: z.string(),
    userPubkey: z.string().optional(),
    inputMint: z.string(),
    outputMint: z.string(),
    makingAmount: z.string(),
    takingAmount: z.string(),
    remainingMakingAmount: z.string().optional(),
    remainingTakingAmount: z.string().optional(),
    expiredAt: z.string().nullish(),
    createdAt: z.string().optional(),
    updatedAt: z.string().optional(),
    status: z.string(),
    trades: z.array(z.unknown()).optional()
  })
  .passthrough();
export type TriggerOrder = z.infer<typeof TriggerOrderSchema>;

export const TriggerOrdersResponseSchema = z
  .object({
    user: z.string(),
    orderStatus: OrderStatusSchema,
    orders: z.array(TriggerOrderSchema),
    totalPages: z.number(),
    page: z.number()
  })
  .passthrough();
export type TriggerOrdersResponse = z.infer<typeof TriggerOrdersResponseSchema>;
