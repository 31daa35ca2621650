export interface MonotonicClockPort {
  /** Milliseconds from an arbitrary fixed origin; never goes backwards. */
  nowMs(): number;
}
