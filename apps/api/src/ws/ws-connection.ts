import { WebSocket } from 'ws';
import type { DuplexConnectionPort, SendOutcome } from '@biostream/domain';

/** Adapts a server-side `ws` socket to the duplex connection port. */
export class WsConnection implements DuplexConnectionPort {
  constructor(private readonly socket: WebSocket) {}

  isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(text: string): Promise<SendOutcome> {
    if (!this.isOpen()) return Promise.resolve({ kind: 'peer-closed' });

    return new Promise<SendOutcome>((resolve) => {
      try {
        this.socket.send(text, (err) => {
          if (!err) {
            resolve({ kind: 'ok' });
          } else if (!this.isOpen()) {
            resolve({ kind: 'peer-closed' });
          } else {
            resolve({ kind: 'transport-error', reason: err.message });
          }
        });
      } catch (err) {
        resolve({
          kind: 'transport-error',
          reason: err instanceof Error ? err.message : String(err),
        });
      }
    });
  }

  async close(code: number, reason: string): Promise<void> {
    this.socket.close(code, reason);
  }

  onClose(listener: () => void): () => void {
    if (this.socket.readyState === WebSocket.CLOSED) {
      queueMicrotask(listener);
      return () => undefined;
    }
    this.socket.once('close', listener);
    return () => {
      this.socket.off('close', listener);
    };
  }
}
