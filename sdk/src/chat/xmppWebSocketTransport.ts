/**
 * XMPP over WebSocket chat transport.
 *
 * Handshake (one frame per step):
 *   open → features → SASL PLAIN auth → success → open → features → bind → presence
 *
 * An unexpected close schedules one reconnect attempt with the last credentials
 * when `reconnectOnError` is on.
 */

import { randomUUID } from 'crypto';
import WebSocket from 'ws';

import {
  DEFAULT_CHAT_DOMAIN,
  DEFAULT_ENDPOINTS,
  DEFAULT_RECONNECT_DELAY_MS,
} from '../config/constants.js';
import { TransportError } from '../errors/index.js';
import { ListenerManager } from '../utils/lifecycle/listenerManager.js';
import { TimerManager } from '../utils/lifecycle/timerManager.js';
import { logger } from '../utils/logging/logger.js';

import type { EventEmitter } from 'events';
import type { TimerHandle } from '../utils/lifecycle/timerManager.js';
import type { ChatTransport } from './types.js';

const FRAMING_NS = 'urn:ietf:params:xml:ns:xmpp-framing';
const SASL_NS = 'urn:ietf:params:xml:ns:xmpp-sasl';
const BIND_NS = 'urn:ietf:params:xml:ns:xmpp-bind';
const BIND_ID = 'bind_1';
const DEFAULT_CONNECT_TIMEOUT_MS = 15_000;

/**
 * The part of a `ws` WebSocket the transport uses.
 */
export interface WebSocketLike extends EventEmitter {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export type SocketFactory = (url: string) => WebSocketLike;

export interface XmppTransportOptions {
  url?: string;
  domain?: string;
  /** Platform tag placed in the resource, e.g. WIN */
  platform?: string;
  reconnectOnError?: boolean;
  reconnectDelayMs?: number;
  connectTimeoutMs?: number;
  createSocket?: SocketFactory;
}

type HandshakeStep = 'opening' | 'authenticating' | 'restarting' | 'binding';

interface PendingHandshake {
  step: HandshakeStep;
  resolve: () => void;
  reject: (error: Error) => void;
  timeout: TimerHandle;
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function frameToText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) {
    return Buffer.concat(data.filter((part): part is Buffer => Buffer.isBuffer(part))).toString('utf8');
  }
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return String(data);
}

export function saslPlain(accountId: string, accessToken: string): string {
  return Buffer.from(`\u0000${accountId}\u0000${accessToken}`).toString('base64');
}

export class XmppWebSocketTransport implements ChatTransport {
  private readonly url: string;
  private readonly domain: string;
  private readonly platform: string;
  private readonly reconnectOnError: boolean;
  private readonly reconnectDelayMs: number;
  private readonly connectTimeoutMs: number;
  private readonly createSocket: SocketFactory;

  private readonly timers = new TimerManager();
  private readonly listeners = new ListenerManager();
  private socket: WebSocketLike | undefined;
  private pending: PendingHandshake | undefined;
  private credentials: { accountId: string; accessToken: string } | undefined;
  private reconnectTimer: TimerHandle | undefined;
  private connected = false;
  private closed = false;
  private boundJid: string | undefined;

  constructor(options: XmppTransportOptions = {}) {
    this.url = options.url ?? DEFAULT_ENDPOINTS.chat;
    this.domain = options.domain ?? DEFAULT_CHAT_DOMAIN;
    this.platform = options.platform ?? 'WIN';
    this.reconnectOnError = options.reconnectOnError ?? true;
    this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.createSocket = options.createSocket ?? ((url) => new WebSocket(url, 'xmpp'));
  }

  /** Full JID bound by the server, once connected */
  get jid(): string | undefined {
    return this.boundJid;
  }

  isConnected(): boolean {
    return this.connected;
  }

  updateCredentials(accountId: string, accessToken: string): void {
    if (this.closed) {
      return;
    }
    this.credentials = { accountId, accessToken };
  }

  async connect(accountId: string, accessToken: string): Promise<void> {
    if (this.closed) {
      throw new TransportError('Chat transport has been closed');
    }
    if (this.socket) {
      await this.disconnect();
    }

    this.credentials = { accountId, accessToken };
    const socket = this.createSocket(this.url);
    this.socket = socket;

    await new Promise<void>((resolve, reject) => {
      const timeout = this.timers.setTimeout(() => {
        this.failHandshake(new TransportError(`Chat handshake timed out after ${this.connectTimeoutMs}ms`));
      }, this.connectTimeoutMs);
      this.pending = { step: 'opening', resolve, reject, timeout };

      this.listeners.on(socket, 'open', () => this.openStream());
      this.listeners.on(socket, 'message', (data) => this.handleFrame(frameToText(data)));
      this.listeners.on(socket, 'error', (error) => this.handleError(error));
      this.listeners.on(socket, 'close', (code) => this.handleClose(code));
    });

    logger.info('Chat transport connected', { component: 'XmppWebSocketTransport', accountId });
  }

  async disconnect(): Promise<void> {
    this.cancelReconnect();
    const socket = this.socket;
    if (!socket) {
      return;
    }
    if (this.pending) {
      this.failHandshake(new TransportError('Chat connection aborted by disconnect'));
      return;
    }

    this.detach();
    if (socket.readyState === WebSocket.OPEN) {
      socket.send(`<close xmlns="${FRAMING_NS}"/>`);
    }
    this.release(socket, 'disconnect');
    logger.debug('Chat transport disconnected', { component: 'XmppWebSocketTransport' });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    await this.disconnect();
    this.closed = true;
    this.credentials = undefined;
    this.timers.dispose();
    this.listeners.dispose();
  }

  private openStream(): void {
    this.send(`<open xmlns="${FRAMING_NS}" to="${escapeXml(this.domain)}" version="1.0"/>`);
  }

  private handleFrame(frame: string): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }

    switch (pending.step) {
      case 'opening':
        if (/<(stream:)?features/.test(frame)) {
          if (!frame.includes('PLAIN')) {
            this.failHandshake(new TransportError('Chat server does not offer SASL PLAIN'));
            return;
          }
          const credentials = this.credentials;
          if (!credentials) return;
          pending.step = 'authenticating';
          this.send(
            `<auth xmlns="${SASL_NS}" mechanism="PLAIN">${saslPlain(credentials.accountId, credentials.accessToken)}</auth>`
          );
        }
        return;

      case 'authenticating':
        if (frame.includes('<failure')) {
          this.failHandshake(new TransportError('Chat authentication rejected'));
        } else if (frame.includes('<success')) {
          pending.step = 'restarting';
          this.openStream();
        }
        return;

      case 'restarting':
        if (/<(stream:)?features/.test(frame)) {
          pending.step = 'binding';
          const resource = `V2:Fortnite:${this.platform}::${randomUUID().replace(/-/g, '').toUpperCase()}`;
          this.send(
            `<iq type="set" id="${BIND_ID}"><bind xmlns="${BIND_NS}"><resource>${escapeXml(resource)}</resource></bind></iq>`
          );
        }
        return;

      case 'binding':
        if (!frame.includes(`id="${BIND_ID}"`)) {
          return;
        }
        if (!frame.includes('type="result"')) {
          this.failHandshake(new TransportError('Chat resource binding rejected'));
          return;
        }
        this.boundJid = /<jid>([^<]+)<\/jid>/.exec(frame)?.[1];
        this.send('<presence/>');
        this.finishHandshake();
        return;
    }
  }

  private handleError(error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    if (this.pending) {
      this.failHandshake(new TransportError(`Chat connection failed: ${message}`, { cause: error }));
      return;
    }
    logger.warn(`Chat socket error: ${message}`, { component: 'XmppWebSocketTransport' });
  }

  private handleClose(code: unknown): void {
    if (this.pending) {
      this.failHandshake(new TransportError(`Chat connection closed during handshake (code ${String(code)})`));
      return;
    }

    const wasConnected = this.connected;
    this.detach();
    logger.warn(`Chat connection closed unexpectedly (code ${String(code)})`, {
      component: 'XmppWebSocketTransport',
    });

    if (wasConnected && this.reconnectOnError && !this.closed) {
      this.scheduleReconnect();
    }
  }

  private scheduleReconnect(): void {
    const credentials = this.credentials;
    if (!credentials || this.reconnectTimer !== undefined) {
      return;
    }

    this.reconnectTimer = this.timers.setTimeout(() => {
      this.reconnectTimer = undefined;
      // Read at fire time: a rotation may have replaced them meanwhile
      const latest = this.credentials ?? credentials;
      this.connect(latest.accountId, latest.accessToken).catch((error: unknown) => {
        logger.error('Chat reconnect failed', error, {
          component: 'XmppWebSocketTransport',
          accountId: latest.accountId,
        });
      });
    }, this.reconnectDelayMs, true);

    logger.info(`Reconnecting chat in ${this.reconnectDelayMs}ms`, { component: 'XmppWebSocketTransport' });
  }

  private cancelReconnect(): void {
    if (this.reconnectTimer !== undefined) {
      this.timers.clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
  }

  private finishHandshake(): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = undefined;
    this.timers.clearTimeout(pending.timeout);
    this.connected = true;
    pending.resolve();
  }

  private failHandshake(error: TransportError): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = undefined;
    this.timers.clearTimeout(pending.timeout);

    const socket = this.socket;
    this.detach();
    if (socket) {
      this.release(socket, 'handshake failed');
    }
    pending.reject(error);
  }

  /**
   * Close a socket the transport no longer listens to. ws emits 'error' when a
   * socket still connecting is closed, so one listener stays attached.
   */
  private release(socket: WebSocketLike, reason: string): void {
    socket.on('error', (error: unknown) => {
      logger.debug(`Discarded chat socket error: ${error instanceof Error ? error.message : String(error)}`, {
        component: 'XmppWebSocketTransport',
      });
    });
    socket.close(1000, reason);
  }

  private detach(): void {
    this.listeners.removeAll();
    this.socket = undefined;
    this.connected = false;
    this.boundJid = undefined;
  }

  private send(frame: string): void {
    this.socket?.send(frame);
  }
}
