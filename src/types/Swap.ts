import { z } from 'zod';

export type PriorityLevel = 'medium' | 'high' | 'veryHigh';

export type PrioritizationFeeLamports =
  | 'auto'
  | number
  | {
      priorityLevelWithMaxLamports: {
        maxLamports: number;
        priorityLevel: PriorityLevel;
        global?: boolean;
      };
    }
  | { jitoTipLamports: number };

export const SwapResponseSchema = z
  .object({
    /** Unsigned, base64-encoded transaction. */
    swapTransaction: z.string(),
    lastValidBlockHeight: z.number(),
    prioritizationFeeLamports: z.number(),
    computeUnitLimit: z.number().optional(),
    prioritizationType: z.unknown(),
    dynamicSlippageReport: z.unknown(),
    simulationError: z.unknown()
  })
  .passthrough();
export type SwapResponse = z.infer<typeof SwapResponseSchema>;

export const AccountMetaSchema = z.object({
  pubkey: z.string(),
  isSigner: z.boolean(),
  isWritable: z.boolean()
});
export type AccountMeta = z.infer<typeof AccountMetaSchema>;

export const SerializedInstructionSchema = z.object({
  programId: z.string(),
  accounts: z.array(AccountMetaSchema),
  /** base64 */
  data: z.string()
});
export type SerializedInstruction = z.infer<typeof SerializedInstructionSchema>;

export const SwapInstructionsSchema = z
  .object({
    tokenLedgerInstruction: SerializedInstructionSchema.nullish(),
    computeBudgetInstructions: z.array(SerializedInstructionSchema),
    setupInstructions: z.array(SerializedInstructionSchema),
    swapInstruction: SerializedInstructionSchema,
    cleanupInstruction: SerializedInstructionSchema.nullish(),
    otherInstructions: z.array(SerializedInstructionSchema).optional(),
    addressLookupTableAddresses: z.array(z.string()),
    prioritizationFeeLamports: z.number().optional(),
    computeUnitLimit: z.number().optional()
  })
  .passthrough();
export type SwapInstructions = z.infer<typeof SwapInstructionsSchema>;

/** Program id → human readable DEX label. */
export const ProgramIdToLabelSchema = z.record(z.string());
export type ProgramIdToLabel = z.infer<typeof ProgramIdToLabelSchema>;
