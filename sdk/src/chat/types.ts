/**
 * Persistent chat/presence connection that must be re-established with the new
 * access token after each rotation.
 */
export interface ChatTransport {
  /**
   * Open the connection and authenticate. Resolves once the connection is
   * ready for traffic.
   *
   * @throws TransportError if the handshake fails or times out
   */
  connect(accountId: string, accessToken: string): Promise<void>;

  /** Close the current connection. The transport can connect again afterwards. */
  disconnect(): Promise<void>;

  /** Disconnect and release every resource. The transport cannot be reused. */
  close(): Promise<void>;

  isConnected(): boolean;

  /**
   * Replace the credentials an automatic reconnect will use. Called on rotation
   * while the connection is down, so a pending reconnect does not present a
   * revoked token.
   */
  updateCredentials(accountId: string, accessToken: string): void;
}
