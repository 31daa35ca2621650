import { EMG_CHANNEL_COUNT } from '@biostream/domain';
import type { EegBand, RandomSourcePort, TelemetrySample } from '@biostream/domain';

/** Baselines, amplitudes and periods (seconds) of the synthetic signal. */
export const TELEMETRY_PROFILE = Object.freeze({
  heartRate: { baseline: 55, amplitude: 25, period: 0.5, jitter: 5 },
  oxygenSaturation: { baseline: 96, jitter: 3 },
  lactateThreshold: { baseline: 3.8, jitter: 0.6 },
  motion: { amplitude: 0.5, periods: { x: 0.4, y: 0.5, z: 0.7 } },
  emg: { amplitude: 0.5, basePeriod: 0.08, periodStep: 0.01, jitter: 0.2 },
  eegPeriods: { alpha: 0.9, beta: 0.7, gamma: 0.5, theta: 1.2, delta: 1.5 },
} as const);

/**
 * Builds one sample for `ts` seconds past the session epoch.
 *
 * Pure apart from the draws taken from `random`, which happen in a fixed
 * order: heart rate, oxygen, lactate, then EMG channels 0..7. A seeded
 * source therefore reproduces a sample exactly.
 */
export function generateSample(ts: number, random: RandomSourcePort): TelemetrySample {
  const { heartRate, oxygenSaturation, lactateThreshold, motion, emg, eegPeriods } =
    TELEMETRY_PROFILE;

  const hr =
    heartRate.baseline +
    Math.round(heartRate.amplitude * Math.sin(ts / heartRate.period)) +
    Math.round(random.next() * heartRate.jitter);
  const spo2 = oxygenSaturation.baseline + Math.round(random.next() * oxygenSaturation.jitter);
  const lactate = lactateThreshold.baseline + random.next() * lactateThreshold.jitter;

  const emgChannels: number[] = [];
  for (let i = 0; i < EMG_CHANNEL_COUNT; i++) {
    const period = emg.basePeriod + i * emg.periodStep;
    emgChannels.push(
      emg.amplitude * Math.sin(ts / period) + (random.next() - 0.5) * emg.jitter,
    );
  }

  const bandPower = (band: EegBand): number => Math.abs(Math.sin(ts / eegPeriods[band]));

  return {
    timestamp: Math.round(ts * 1000),
    heartRate: hr,
    oxygenSaturation: spo2,
    lactateThreshold: lactate,
    motion: {
      x: Math.sin(ts / motion.periods.x) * motion.amplitude,
      y: Math.cos(ts / motion.periods.y) * motion.amplitude,
      z: Math.sin(ts / motion.periods.z) * motion.amplitude,
    },
    emg: emgChannels,
    eeg: {
      alpha: bandPower('alpha'),
      beta: bandPower('beta'),
      gamma: bandPower('gamma'),
      theta: bandPower('theta'),
      delta: bandPower('delta'),
    },
  };
}
