import type { z } from 'zod';
import { JupiterError } from '../errors/JupiterError.js';

/** Schema whose input side is unconstrained, so it can be fed parsed JSON. */
export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

export function parseJson(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : String(cause);
    throw new JupiterError('DecodingError', message, { cause, details: { bodyLength: text.length } });
  }
}

export function decodeValue<T>(schema: ResponseSchema<T>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new JupiterError('DecodingError', formatIssues(result.error), { cause: result.error });
  }
  return result.data;
}

export function decodeJson<T>(schema: ResponseSchema<T>, text: string): T {
  return decodeValue(schema, parseJson(text));
}
