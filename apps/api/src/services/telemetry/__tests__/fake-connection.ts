import type { DuplexConnectionPort, SendOutcome } from '@biostream/domain';

/** In-memory duplex connection that records traffic and scripts send outcomes. */
export class FakeConnection implements DuplexConnectionPort {
  readonly sent: string[] = [];
  readonly closes: Array<{ code: number; reason: string }> = [];
  /** Consumed one per send; an empty queue means every send succeeds. */
  readonly outcomes: SendOutcome[] = [];
  closeError: Error | null = null;
  onSend: ((text: string) => void) | null = null;

  private open = true;
  private readonly listeners = new Set<() => void>();

  isOpen(): boolean {
    return this.open;
  }

  async send(text: string): Promise<SendOutcome> {
    this.onSend?.(text);
    const outcome = this.outcomes.shift() ?? { kind: 'ok' };
    if (outcome.kind === 'ok') this.sent.push(text);
    return outcome;
  }

  async close(code: number, reason: string): Promise<void> {
    this.closes.push({ code, reason });
    if (this.closeError) throw this.closeError;
    this.open = false;
  }

  onClose(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  /** Simulates the client going away. */
  peerClose(): void {
    this.open = false;
    for (const listener of [...this.listeners]) listener();
  }
}
