export type SendOutcome =
  | { readonly kind: 'ok' }
  | { readonly kind: 'peer-closed' }
  | { readonly kind: 'transport-error'; readonly reason: string };

/** WebSocket close code for "unexpected condition on the server". */
export const CLOSE_CODE_INTERNAL_ERROR = 1011;

/**
 * An accepted, already-upgraded duplex connection. `send` reports failures
 * through its outcome instead of rejecting.
 */
export interface DuplexConnectionPort {
  isOpen(): boolean;
  send(text: string): Promise<SendOutcome>;
  close(code: number, reason: string): Promise<void>;
  /** Registers a listener fired once when the peer goes away. Returns an unsubscribe. */
  onClose(listener: () => void): () => void;
}
