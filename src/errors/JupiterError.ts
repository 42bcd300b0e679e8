export type JupiterErrorCode =
  | 'TransportError'
  | 'ProtocolError'
  | 'DecodingError'
  | 'ConfigurationError';

/**
 * Every failure the client raises. `code` says which stage failed: the network
 * call, the HTTP status, decoding the body, or the caller's own input.
 */
export class JupiterError extends Error {
  readonly code: JupiterErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: JupiterErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'JupiterError';
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
  }
}

/**
 * Raised when the service answered with a non-2xx status.
 * `body` is the raw response text, or a placeholder when it could not be read.
 */
export class JupiterHttpError extends JupiterError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string, options?: { details?: Record<string, unknown> }) {
    super('ProtocolError', `API returned error status: ${status} - ${body}`, options);
    this.name = 'JupiterHttpError';
    this.status = status;
    this.body = body;
  }
}

export function isJupiterError(value: unknown): value is JupiterError {
  return value instanceof JupiterError;
}
