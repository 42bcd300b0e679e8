import { z } from 'zod';
import { assertNonEmpty } from '../utils/invariant.js';

export const OrderStatusSchema = z.enum(['active', 'history']);
export type OrderStatus = z.infer<typeof OrderStatusSchema>;

/** Body for the trigger and recurring `execute` endpoints. */
export type ExecuteOrderRequest = {
  requestId: string;
  /** Signed transaction, base64. */
  signedTransaction: string;
};

export function toExecuteBody(request: ExecuteOrderRequest): ExecuteOrderRequest {
  return {
    requestId: assertNonEmpty(request.requestId, 'requestId'),
    signedTransaction: assertNonEmpty(request.signedTransaction, 'signedTransaction')
  };
}

export const ExecuteOrderResponseSchema = z
  .object({
    signature: z.string(),
    status: z.string(),
    code: z.number().optional(),
    error: z.string().optional()
  })
  .passthrough();
export type ExecuteOrderResponse = z.infer<typeof ExecuteOrderResponseSchema>;
