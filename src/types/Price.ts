import { z } from 'zod';

export const TokenPriceSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    /** Decimal string; parse it yourself if you need a number. */
    price: z.string(),
    extraInfo: z.unknown()
  })
  .passthrough();
export type TokenPrice = z.infer<typeof TokenPriceSchema>;

export const TokenPriceResponseSchema = z
  .object({
    // Unknown mints come back as null.
    data: z.record(TokenPriceSchema.nullable()),
    timeTaken: z.number()
  })
  .passthrough();
export type TokenPriceResponse = z.infer<typeof TokenPriceResponseSchema>;
