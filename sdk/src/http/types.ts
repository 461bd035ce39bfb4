export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * A request on its way out, before the transport sends it.
 * Header names keep the case they were given; lookups are case-insensitive.
 */
export interface OutboundRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string;
}

/**
 * A pre-send transformation. Returning null or undefined means "no usable
 * result": the signer then falls back to the original request.
 */
export type InterceptorAction = (request: OutboundRequest) => OutboundRequest | null | undefined;

/**
 * Anything with the shape of the global `fetch`.
 */
export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Find a header value regardless of the case of its name.
 */
export function getHeader(request: OutboundRequest, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(request.headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

export function hasHeader(request: OutboundRequest, name: string): boolean {
  return getHeader(request, name) !== undefined;
}

/**
 * Copy of the request with the given headers added (replacing same-named ones).
 */
export function withHeaders(request: OutboundRequest, headers: Record<string, string>): OutboundRequest {
  const replaced = new Set(Object.keys(headers).map((key) => key.toLowerCase()));
  const kept = Object.fromEntries(
    Object.entries(request.headers).filter(([key]) => !replaced.has(key.toLowerCase()))
  );
  return { ...request, headers: { ...kept, ...headers } };
}
