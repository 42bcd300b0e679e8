import { PublicKey, TransactionInstruction, VersionedTransaction } from '@solana/web3.js';

import { JupiterError } from '../errors/JupiterError.js';
import type { SerializedInstruction } from '../types/Swap.js';

/** Decodes the base64 transactions the swap, ultra, trigger and recurring endpoints return. */
export function deserializeTransaction(base64: string): VersionedTransaction {
  try {
    return VersionedTransaction.deserialize(Buffer.from(base64, 'base64'));
  } catch (cause) {
    throw new JupiterError('DecodingError', 'Transaction is not a valid serialized transaction', {
      cause,
      details: { length: base64.length }
    });
  }
}

/** Base64 form accepted as `signedTransaction` by the execute endpoints. */
export function serializeTransaction(transaction: VersionedTransaction): string {
  return Buffer.from(transaction.serialize()).toString('base64');
}

export function toTransactionInstruction(ix: SerializedInstruction): TransactionInstruction {
  try {
    return new TransactionInstruction({
      programId: new PublicKey(ix.programId),
      keys: ix.accounts.map((account) => ({
        pubkey: new PublicKey(account.pubkey),
        isSigner: account.isSigner,
        isWritable: account.isWritable
      })),
      data: Buffer.from(ix.data, 'base64')
    });
  } catch (cause) {
    throw new JupiterError('DecodingError', 'Instruction contains an invalid public key', {
      cause,
      details: { programId: ix.programId }
    });
  }
}
