export interface MotionVector {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export type EegBand = 'alpha' | 'beta' | 'gamma' | 'theta' | 'delta';

export type EegBandPowers = Readonly<Record<EegBand, number>>;

/** Number of EMG channels carried by every sample. */
export const EMG_CHANNEL_COUNT = 8;

/**
 * One synthetic multimodal biometric reading. Created per tick, serialized,
 * sent and discarded.
 */
export interface TelemetrySample {
  /** Milliseconds since the session's reference epoch. */
  readonly timestamp: number;
  readonly heartRate: number;
  readonly oxygenSaturation: number;
  readonly lactateThreshold: number;
  readonly motion: MotionVector;
  /** Always {@link EMG_CHANNEL_COUNT} entries. */
  readonly emg: readonly number[];
  readonly eeg: EegBandPowers;
}
