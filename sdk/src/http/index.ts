export { HttpClient } from './httpClient.js';
export type { HttpClientOptions, HttpRequestOptions, HttpResponse } from './httpClient.js';
export { RequestSigner, CORRELATION_HEADER } from './requestSigner.js';
export { getHeader, hasHeader, withHeaders } from './types.js';
export type { FetchFunction, HttpMethod, InterceptorAction, OutboundRequest } from './types.js';
