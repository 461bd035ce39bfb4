/**
 * HTTP client shared by every subsystem.
 *
 * Each request passes through the RequestSigner before it is sent, so services
 * never touch the credential store themselves. Responses are mapped onto the
 * SDK error taxonomy:
 * - fetch rejection, timeout or 5xx → NetworkError
 * - 401 → AuthenticationFailedError
 * - any other non-2xx → ServiceError
 */

import { z } from 'zod';

import { DEFAULT_REQUEST_TIMEOUT_MS } from '../config/constants.js';
import {
  AuthenticationFailedError,
  NetworkError,
  ServiceError,
} from '../errors/index.js';
import { logger } from '../utils/logging/logger.js';

import type { ServiceErrorBody } from '../errors/index.js';
import type { RequestSigner } from './requestSigner.js';
import type { FetchFunction, HttpMethod, OutboundRequest } from './types.js';

export interface HttpRequestOptions {
  method?: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, string | readonly string[] | undefined>;
  /** JSON body; sets Content-Type: application/json */
  json?: unknown;
  /** Form body; sets Content-Type: application/x-www-form-urlencoded */
  form?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  /** Parsed JSON body, or undefined for an empty body */
  body: unknown;
}

export interface HttpClientOptions {
  fetch?: FetchFunction;
  timeoutMs?: number;
}

const serviceErrorBodySchema = z
  .object({
    errorCode: z.string().optional(),
    errorMessage: z.string().optional(),
    numericErrorCode: z.number().optional(),
    messageVars: z.array(z.string()).optional(),
    challenge: z.string().optional(),
    metadata: z.record(z.unknown()).optional(),
  })
  .passthrough();

function parseErrorBody(body: unknown): ServiceErrorBody | undefined {
  const result = serviceErrorBodySchema.safeParse(body);
  return result.success ? result.data : undefined;
}

function buildUrl(url: string, query: HttpRequestOptions['query']): string {
  if (!query) return url;
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    if (typeof value === 'string') {
      target.searchParams.append(key, value);
    } else {
      for (const item of value) target.searchParams.append(key, item);
    }
  }
  return target.toString();
}

export class HttpClient {
  private readonly fetchImpl: FetchFunction;
  private readonly timeoutMs: number;

  constructor(
    private readonly signer: RequestSigner,
    options: HttpClientOptions = {}
  ) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  /**
   * Build the request exactly as it will be sent, signer included.
   */
  prepare(options: HttpRequestOptions): OutboundRequest {
    const headers: Record<string, string> = { ...options.headers };
    let body: string | undefined;

    if (options.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = new URLSearchParams(options.form).toString();
    } else if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    return this.signer.applyTo({
      method: options.method ?? 'GET',
      url: buildUrl(options.url, options.query),
      headers,
      body,
    });
  }

  /**
   * Send a request and return its parsed body.
   *
   * @throws NetworkError | AuthenticationFailedError | ServiceError
   */
  async send(options: HttpRequestOptions): Promise<HttpResponse> {
    const request = this.prepare(options);

    let response: Response;
    try {
      response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        redirect: 'manual',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`${request.method} ${request.url} failed: ${reason}`, { cause: error });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`${request.method} ${request.url} failed while reading the body: ${reason}`, {
        cause: error,
      });
    }

    let body: unknown;
    if (text.length > 0) {
      try {
        body = JSON.parse(text);
      } catch {
        // Plain-text bodies are kept as strings
        body = text;
      }
    }

    if (response.ok) {
      return { status: response.status, body };
    }

    const errorBody = parseErrorBody(body);
    const message = `${request.method} ${request.url} returned ${response.status}${
      errorBody?.errorMessage ? `: ${errorBody.errorMessage}` : ''
    }`;

    logger.debug(message, {
      component: 'HttpClient',
      status: response.status,
      errorCode: errorBody?.errorCode,
    });

    if (response.status >= 500) {
      throw new NetworkError(message, { statusCode: response.status, body: errorBody });
    }
    if (response.status === 401) {
      throw new AuthenticationFailedError(message, { statusCode: response.status, body: errorBody });
    }
    throw new ServiceError(message, { statusCode: response.status, body: errorBody });
  }

  /**
   * Send a request and decode its body.
   */
  async request<T>(options: HttpRequestOptions, decode: (body: unknown) => T): Promise<T> {
    const response = await this.send(options);
    return decode(response.body);
  }
}
