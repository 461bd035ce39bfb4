import { randomUUID } from 'crypto';

import { logger } from '../utils/logging/logger.js';
import { hasHeader, withHeaders } from './types.js';

import type { CredentialStore } from '../session/credentialStore.js';
import type { InterceptorAction, OutboundRequest } from './types.js';

export const CORRELATION_HEADER = 'X-Epic-Correlation-ID';

/**
 * Signs every outbound request with the current session.
 *
 * `applyTo` runs synchronously and only reads the credential store; it never
 * waits on the network.
 */
export class RequestSigner {
  private interceptors: readonly InterceptorAction[] = [];

  constructor(
    private readonly store: CredentialStore,
    private readonly userAgent: string
  ) {}

  addInterceptor(action: InterceptorAction): void {
    this.interceptors = [...this.interceptors, action];
  }

  removeInterceptor(action: InterceptorAction): boolean {
    const index = this.interceptors.indexOf(action);
    if (index === -1) {
      return false;
    }
    this.interceptors = [...this.interceptors.slice(0, index), ...this.interceptors.slice(index + 1)];
    return true;
  }

  interceptorCount(): number {
    return this.interceptors.length;
  }

  applyTo(request: OutboundRequest): OutboundRequest {
    const transformed = this.runInterceptors(request);

    const session = this.store.peek();
    if (hasHeader(transformed, 'authorization') || !session) {
      return transformed;
    }

    return withHeaders(transformed, {
      Authorization: `bearer ${session.accessToken}`,
      'User-Agent': this.userAgent,
      [CORRELATION_HEADER]: randomUUID(),
    });
  }

  private runInterceptors(original: OutboundRequest): OutboundRequest {
    // Snapshot: actions added or removed while this request is in flight
    // apply from the next request on.
    const chain = this.interceptors;
    let next: OutboundRequest | null | undefined = original;

    for (const action of chain) {
      try {
        next = action(next);
      } catch (error) {
        logger.warn(`Request interceptor threw, sending the original request: ${String(error)}`, {
          component: 'RequestSigner',
        });
        return original;
      }
      if (!next) {
        return original;
      }
    }

    return next;
  }
}
