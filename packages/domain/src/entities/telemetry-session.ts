export type TelemetrySessionState = 'accepting' | 'streaming' | 'closing' | 'closed';

export type SessionEndReason =
  | 'peer-closed'
  | 'transport-error'
  | 'internal-error'
  | 'stopped';

export interface SessionResult {
  readonly reason: SessionEndReason;
  readonly samplesSent: number;
  /** Description sent with the close frame, for error endings. */
  readonly detail?: string;
}
