import { JupiterError } from '../errors/JupiterError.js';

export type AmountInput = bigint | number | string;

const U64_MAX = 18_446_744_073_709_551_615n;

export function toU64(value: AmountInput, fieldName = 'amount'): bigint {
  let parsed: bigint;
  if (typeof value === 'bigint') {
    parsed = value;
  } else if (typeof value === 'number') {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new JupiterError('ConfigurationError', `${fieldName} must be a non-negative safe integer`, {
        details: { value }
      });
    }
    parsed = BigInt(value);
  } else {
    if (!/^[0-9]+$/.test(value)) {
      throw new JupiterError('ConfigurationError', `${fieldName} string must be a base-10 integer`, {
        details: { value }
      });
    }
    parsed = BigInt(value);
  }

  if (parsed < 0n || parsed > U64_MAX) {
    throw new JupiterError('ConfigurationError', `${fieldName} does not fit in an unsigned 64-bit integer`, {
      details: { value: parsed.toString() }
    });
  }
  return parsed;
}

export function toPositiveU64(value: AmountInput, fieldName = 'amount'): bigint {
  const parsed = toU64(value, fieldName);
  if (parsed === 0n) {
    throw new JupiterError('ConfigurationError', `${fieldName} must be > 0`);
  }
  return parsed;
}

/**
 * JSON bodies carry u64 fields as numbers, so values past 2^53 - 1 cannot be sent
 * without losing precision.
 */
export function toJsonInteger(value: AmountInput, fieldName = 'amount'): number {
  const parsed = toU64(value, fieldName);
  if (parsed > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new JupiterError('ConfigurationError', `${fieldName} exceeds the largest integer a JSON body can carry`, {
      details: { value: parsed.toString() }
    });
  }
  return Number(parsed);
}

export function checkBps(bps: number, fieldName = 'bps', max = 10_000): number {
  if (!Number.isInteger(bps) || bps < 0 || bps > max) {
    throw new JupiterError('ConfigurationError', `${fieldName} must be an integer in [0, ${max}]`, {
      details: { value: bps }
    });
  }
  return bps;
}

export function checkRange(value: number, min: number, max: number, fieldName: string): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new JupiterError('ConfigurationError', `${fieldName} must be an integer in [${min}, ${max}]`, {
      details: { value }
    });
  }
  return value;
}
