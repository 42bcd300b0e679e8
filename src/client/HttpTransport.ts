import axios, { isAxiosError, type AxiosInstance, type AxiosResponse } from 'axios';

import { decodeJson, type ResponseSchema } from '../codec/decode.js';
import { encodeJsonBody, toQueryString, type QueryParams } from '../codec/wire.js';
import { JupiterError, JupiterHttpError } from '../errors/JupiterError.js';
import { silentLogger, type JupiterLogger } from './JupiterLogger.js';

export const JUPITER_LITE_API_URL = 'https://lite-api.jup.ag';
export const JUPITER_API_URL = 'https://api.jup.ag';

export const UNREADABLE_BODY = 'Unable to get error details';

export type HttpTransportConfig = {
  /** Service root, e.g. {@link JUPITER_LITE_API_URL}. Paths such as `/swap/v1/quote` are appended to it. */
  baseUrl: string;

  /** Sent as `x-api-key` on every request. */
  apiKey?: string;

  /** Extra headers added to every request. */
  headers?: Record<string, string>;

  /** Per-request timeout; expiry surfaces as a `TransportError`. */
  timeoutMs?: number;

  /** Pre-configured axios instance to issue requests through. */
  http?: AxiosInstance;

  logger?: JupiterLogger;
};

type HttpMethod = 'GET' | 'POST';

type OutgoingRequest = {
  method: HttpMethod;
  path: string;
  url: string;
  headers: Record<string, string>;
  data?: string;
};

const HEADER_NAME = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const INVALID_HEADER_VALUE = /[^\t\x20-\x7e\x80-\xff]/;

function validateHeader(name: string, value: string): void {
  if (!HEADER_NAME.test(name)) {
    throw new JupiterError('ConfigurationError', `Invalid header name: ${JSON.stringify(name)}`);
  }
  if (INVALID_HEADER_VALUE.test(value)) {
    throw new JupiterError('ConfigurationError', `Invalid value for header ${name}`, {
      details: { header: name }
    });
  }
}

function normalizeBaseUrl(baseUrl: string): string {
  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch (cause) {
    throw new JupiterError('ConfigurationError', `Invalid base URL: ${JSON.stringify(baseUrl)}`, { cause });
  }
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new JupiterError('ConfigurationError', 'Base URL must use http or https', {
      details: { protocol: parsed.protocol }
    });
  }
  return parsed.toString().replace(/\/+$/, '');
}

function bodyText(data: unknown): string | undefined {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return undefined;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/**
 * Issues GET/POST calls against the service root and classifies the outcome.
 * Holds no per-call state; safe to share between concurrent calls.
 */
export class HttpTransport {
  readonly baseUrl: string;
  readonly http: AxiosInstance;
  readonly logger: JupiterLogger;

  private readonly defaultHeaders: Readonly<Record<string, string>>;
  private readonly timeoutMs: number | undefined;

  constructor(config: HttpTransportConfig) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.http = config.http ?? axios.create();
    this.logger = config.logger ?? silentLogger;

    if (config.timeoutMs !== undefined && (!Number.isInteger(config.timeoutMs) || config.timeoutMs < 0)) {
      throw new JupiterError('ConfigurationError', 'timeoutMs must be a non-negative integer', {
        details: { timeoutMs: config.timeoutMs }
      });
    }
    this.timeoutMs = config.timeoutMs;

    const headers: Record<string, string> = { ...(config.headers ?? {}) };
    if (config.apiKey !== undefined) {
      headers['x-api-key'] = config.apiKey;
    }
    for (const [name, value] of Object.entries(headers)) {
      validateHeader(name, value);
    }
    this.defaultHeaders = headers;
  }

  url(path: string, query?: QueryParams): string {
    const search = query !== undefined ? toQueryString(query) : '';
    return search.length > 0 ? `${this.baseUrl}${path}?${search}` : `${this.baseUrl}${path}`;
  }

  async get<T>(path: string, schema: ResponseSchema<T>, query?: QueryParams): Promise<T> {
    return this.send(
      {
        method: 'GET',
        path,
        url: this.url(path, query),
        headers: { ...this.defaultHeaders, Accept: 'application/json' }
      },
      schema
    );
  }

  async post<T>(path: string, schema: ResponseSchema<T>, body: object): Promise<T> {
    return this.send(
      {
        method: 'POST',
        path,
        url: this.url(path),
        headers: {
          ...this.defaultHeaders,
          Accept: 'application/json',
          'Content-Type': 'application/json'
        },
        data: encodeJsonBody(body)
      },
      schema
    );
  }

  private async send<T>(request: OutgoingRequest, schema: ResponseSchema<T>): Promise<T> {
    const context = { method: request.method, path: request.path };
    this.logger.debug('jupiter request', context);
    const startedAt = Date.now();

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.request<unknown>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.data,
        responseType: 'text',
        transformRequest: [(payload: unknown) => payload],
        transformResponse: [(payload: unknown) => payload],
        validateStatus: () => true,
        ...(this.timeoutMs !== undefined ? { timeout: this.timeoutMs } : {})
      });
    } catch (cause) {
      const error = this.classifyFailure(request, cause);
      this.logger.warn('jupiter request failed', { ...context, code: error.code, message: error.message });
      throw error;
    }

    const durationMs = Date.now() - startedAt;
    this.logger.debug('jupiter response', { ...context, status: response.status, durationMs });

    if (response.status < 200 || response.status >= 300) {
      const error = new JupiterHttpError(response.status, bodyText(response.data) ?? UNREADABLE_BODY, {
        details: context
      });
      this.logger.warn('jupiter request rejected', { ...context, status: error.status });
      throw error;
    }

    try {
      const text = bodyText(response.data);
      if (text === undefined) {
        throw new JupiterError('DecodingError', 'Response body is not text', { details: context });
      }
      return decodeJson(schema, text);
    } catch (error) {
      if (error instanceof JupiterError) {
        this.logger.warn('jupiter response could not be decoded', { ...context, message: error.message });
      }
      throw error;
    }
  }

  private classifyFailure(request: OutgoingRequest, cause: unknown): JupiterError {
    if (isAxiosError(cause) && cause.response !== undefined) {
      return new JupiterHttpError(cause.response.status, bodyText(cause.response.data) ?? UNREADABLE_BODY, {
        details: { method: request.method, path: request.path }
      });
    }

    return new JupiterError('TransportError', `Error sending request to ${request.path}: ${describeCause(cause)}`, {
      cause,
      details: {
        method: request.method,
        path: request.path,
        ...(isAxiosError(cause) && cause.code !== undefined ? { transportCode: cause.code } : {})
      }
    });
  }
}
