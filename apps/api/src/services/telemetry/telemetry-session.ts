import { CLOSE_CODE_INTERNAL_ERROR } from '@biostream/domain';
import type {
  DuplexConnectionPort,
  MonotonicClockPort,
  RandomSourcePort,
  SessionEndReason,
  SessionResult,
  TelemetrySessionState,
} from '@biostream/domain';
import { generateSample } from './sample-generator.js';
import { delay } from './delay.js';
import type { Sleep } from './delay.js';

/** Fixed delay between ticks; ~10 samples per second. */
export const TICK_INTERVAL_MS = 100;

/** RFC 6455 caps a close frame's reason at 123 UTF-8 bytes. */
const MAX_CLOSE_REASON_BYTES = 123;

export interface TelemetrySessionOptions {
  clock: MonotonicClockPort;
  random: RandomSourcePort;
  intervalMs?: number;
  sleep?: Sleep;
  /** Used in log lines only. */
  label?: string;
}

/** Cuts `reason` to the close-frame limit without splitting a UTF-8 sequence. */
export function truncateCloseReason(reason: string): string {
  const bytes = Buffer.from(reason, 'utf8');
  if (bytes.length <= MAX_CLOSE_REASON_BYTES) return reason;

  let end = MAX_CLOSE_REASON_BYTES;
  // 0b10xxxxxx marks a continuation byte; back up to the character's lead byte.
  while (end > 0 && ((bytes[end] ?? 0) & 0xc0) === 0x80) end--;
  return bytes.subarray(0, end).toString('utf8');
}

function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

/**
 * Streams telemetry over one accepted connection until the peer leaves, a
 * send fails, or the session is stopped. Each connection gets its own
 * session; nothing here is shared between them.
 */
export class TelemetrySession {
  private _state: TelemetrySessionState = 'accepting';
  private readonly abort = new AbortController();
  private readonly intervalMs: number;
  private readonly sleep: Sleep;
  private readonly label: string;
  private samplesSent = 0;

  constructor(
    private readonly connection: DuplexConnectionPort,
    private readonly options: TelemetrySessionOptions,
  ) {
    this.intervalMs = options.intervalMs ?? TICK_INTERVAL_MS;
    this.sleep = options.sleep ?? delay;
    this.label = options.label ?? 'session';
  }

  get state(): TelemetrySessionState {
    return this._state;
  }

  /** Cancels the pending wait; the loop ends before the next tick. */
  stop(): void {
    this.abort.abort();
  }

  /** Runs the streaming loop. Never rejects. */
  async serve(): Promise<SessionResult> {
    const unsubscribe = this.connection.onClose(() => this.abort.abort());
    this._state = 'streaming';
    try {
      return await this.stream();
    } catch (err) {
      const detail = describeError(err);
      console.error(`[telemetry] ${this.label} internal error: ${detail}`);
      await this.closeWithReason(detail);
      return this.finish('internal-error', detail);
    } finally {
      unsubscribe();
      this._state = 'closed';
    }
  }

  private async stream(): Promise<SessionResult> {
    const { clock, random } = this.options;
    const epochMs = clock.nowMs();

    while (!this.abort.signal.aborted) {
      const ts = (clock.nowMs() - epochMs) / 1000;
      const sample = generateSample(ts, random);
      const outcome = await this.connection.send(JSON.stringify(sample));

      switch (outcome.kind) {
        case 'peer-closed':
          return this.finish('peer-closed');
        case 'transport-error':
          console.warn(`[telemetry] ${this.label} send failed: ${outcome.reason}`);
          await this.closeWithReason(outcome.reason);
          return this.finish('transport-error', outcome.reason);
        case 'ok':
          this.samplesSent++;
          break;
      }

      await this.sleep(this.intervalMs, this.abort.signal);
    }

    return this.finish(this.connection.isOpen() ? 'stopped' : 'peer-closed');
  }

  private async closeWithReason(reason: string): Promise<void> {
    this._state = 'closing';
    try {
      await this.connection.close(CLOSE_CODE_INTERNAL_ERROR, truncateCloseReason(reason));
    } catch (err) {
      console.warn(`[telemetry] ${this.label} close after failure also failed: ${describeError(err)}`);
    }
  }

  private finish(reason: SessionEndReason, detail?: string): SessionResult {
    this._state = 'closing';
    return detail === undefined
      ? { reason, samplesSent: this.samplesSent }
      : { reason, samplesSent: this.samplesSent, detail };
  }
}
