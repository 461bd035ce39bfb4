export type { ChatTransport } from './types.js';
export { XmppWebSocketTransport, saslPlain } from './xmppWebSocketTransport.js';
export type { SocketFactory, WebSocketLike, XmppTransportOptions } from './xmppWebSocketTransport.js';
