import { describe, it, expect } from '@jest/globals';
import { EMG_CHANNEL_COUNT } from '@biostream/domain';
import type { RandomSourcePort } from '@biostream/domain';
import { SeededRng, constantRandom, mathRandom } from '@biostream/adapters';
import { generateSample, TELEMETRY_PROFILE } from '../sample-generator.js';

function countingRandom(value: number): RandomSourcePort & { draws: number } {
  const source = {
    draws: 0,
    next() {
      source.draws++;
      return value;
    },
  };
  return source;
}

describe('generateSample', () => {
  it('produces the baseline sample at ts=0 with a zero random source', () => {
    const sample = generateSample(0, constantRandom(0));

    expect(sample.timestamp).toBe(0);
    expect(sample.heartRate).toBe(55);
    expect(sample.oxygenSaturation).toBe(96);
    expect(sample.lactateThreshold).toBe(3.8);
    expect(sample.motion).toEqual({ x: 0, y: 0.5, z: 0 });
    expect(sample.emg).toHaveLength(8);
    expect(sample.emg[0]).toBeCloseTo(-0.1, 12);
    expect(sample.eeg).toEqual({ alpha: 0, beta: 0, gamma: 0, theta: 0, delta: 0 });
  });

  it('follows the oscillation formulas at a non-zero time', () => {
    const ts = 1.25;
    const sample = generateSample(ts, constantRandom(0.5));

    expect(sample.timestamp).toBe(1250);
    expect(sample.heartRate).toBe(55 + Math.round(25 * Math.sin(ts / 0.5)) + Math.round(2.5));
    expect(sample.oxygenSaturation).toBe(96 + Math.round(1.5));
    expect(sample.lactateThreshold).toBeCloseTo(4.1, 12);
    expect(sample.motion.x).toBeCloseTo(Math.sin(ts / 0.4) * 0.5, 12);
    expect(sample.motion.y).toBeCloseTo(Math.cos(ts / 0.5) * 0.5, 12);
    expect(sample.motion.z).toBeCloseTo(Math.sin(ts / 0.7) * 0.5, 12);
    sample.emg.forEach((value, i) => {
      expect(value).toBeCloseTo(0.5 * Math.sin(ts / (0.08 + i * 0.01)), 12);
    });
    expect(sample.eeg.theta).toBeCloseTo(Math.abs(Math.sin(ts / 1.2)), 12);
    expect(sample.eeg.delta).toBeCloseTo(Math.abs(Math.sin(ts / 1.5)), 12);
  });

  it('is bit-identical for the same time and seed', () => {
    const a = generateSample(3.7, new SeededRng(42));
    const b = generateSample(3.7, new SeededRng(42));
    expect(a).toEqual(b);
    expect(JSON.stringify(a)).toBe(JSON.stringify(b));
  });

  it('differs between seeds only in the jittered fields', () => {
    const a = generateSample(2, new SeededRng(1));
    const b = generateSample(2, new SeededRng(2));
    expect(a.motion).toEqual(b.motion);
    expect(a.eeg).toEqual(b.eeg);
    expect(a.timestamp).toBe(b.timestamp);
    expect(a.emg).not.toEqual(b.emg);
  });

  it('draws exactly 3 + one per EMG channel values from the random source', () => {
    const random = countingRandom(0.25);
    generateSample(0.4, random);
    expect(random.draws).toBe(3 + EMG_CHANNEL_COUNT);
  });

  it('tops out at the maximum jitter', () => {
    const sample = generateSample(0, constantRandom(0.999999));
    expect(sample.heartRate).toBe(60);
    expect(sample.oxygenSaturation).toBe(99);
    expect(sample.lactateThreshold).toBeLessThan(4.4);
    expect(sample.emg[0]).toBeLessThan(0.1);
  });

  it('keeps every field within its bounds over a long run', () => {
    const { heartRate } = TELEMETRY_PROFILE;
    for (let ts = 0; ts < 120; ts += 0.037) {
      const sample = generateSample(ts, mathRandom);

      expect(Number.isInteger(sample.heartRate)).toBe(true);
      expect(sample.heartRate).toBeGreaterThanOrEqual(heartRate.baseline - heartRate.amplitude);
      expect(sample.heartRate).toBeLessThanOrEqual(
        heartRate.baseline + heartRate.amplitude + heartRate.jitter,
      );
      expect(Number.isInteger(sample.oxygenSaturation)).toBe(true);
      expect(sample.oxygenSaturation).toBeGreaterThanOrEqual(96);
      expect(sample.oxygenSaturation).toBeLessThanOrEqual(99);
      expect(sample.lactateThreshold).toBeGreaterThanOrEqual(3.8);
      expect(sample.lactateThreshold).toBeLessThanOrEqual(4.4);
      expect(sample.emg).toHaveLength(8);
      for (const value of sample.emg) {
        expect(Math.abs(value)).toBeLessThanOrEqual(0.6);
      }
      for (const value of Object.values(sample.motion)) {
        expect(Math.abs(value)).toBeLessThanOrEqual(0.5);
      }
      for (const value of Object.values(sample.eeg)) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(1);
      }
    }
  });

  it('serializes with the wire field names and nesting', () => {
    const parsed: Record<string, unknown> = JSON.parse(JSON.stringify(generateSample(0.3, new SeededRng(7))));
    expect(parsed).toEqual({
      timestamp: 300,
      heartRate: expect.any(Number),
      oxygenSaturation: expect.any(Number),
      lactateThreshold: expect.any(Number),
      motion: { x: expect.any(Number), y: expect.any(Number), z: expect.any(Number) },
      emg: expect.arrayContaining([expect.any(Number)]),
      eeg: {
        alpha: expect.any(Number),
        beta: expect.any(Number),
        gamma: expect.any(Number),
        theta: expect.any(Number),
        delta: expect.any(Number),
      },
    });
    expect(Object.keys(parsed)).toEqual([
      'timestamp',
      'heartRate',
      'oxygenSaturation',
      'lactateThreshold',
      'motion',
      'emg',
      'eeg',
    ]);
  });
});
