import { JupiterError } from '../errors/JupiterError.js';

export function invariant(condition: unknown, message: string, details?: Record<string, unknown>): asserts condition {
  if (!condition) {
    throw new JupiterError('ConfigurationError', message, details !== undefined ? { details } : undefined);
  }
}

export function assertNonEmpty(value: string, fieldName: string): string {
  invariant(value.length > 0, `${fieldName} must be a non-empty string`);
  return value;
}

export function assertNonEmptyList(values: readonly string[], fieldName: string): readonly string[] {
  invariant(values.length > 0, `${fieldName} must contain at least one entry`);
  return values;
}
