import * as THREE from 'three';
import { SimplexNoise } from 'three/examples/jsm/math/SimplexNoise.js';
import { RandomSource, clamp } from '@/utils/math';
import { NOISE_DEFAULTS } from '@/data/particles.config';
import type { ValidationIssue } from './errors';

export interface NoiseFieldConfig {
  seed: number;
  /** Spatial frequency applied to the sample position */
  frequency: number;
  octaves: number;
  /** Frequency multiplier between octaves */
  lacunarity: number;
  /** Amplitude multiplier between octaves */
  persistence: number;
  /** How fast the field evolves; time is the fourth noise coordinate */
  timeScale: number;
}

// Decorrelates the three output channels so x, y, z are not the same value
const CHANNEL_OFFSETS: readonly (readonly [number, number, number])[] = [
  [0, 0, 0],
  [31.416, 47.853, 12.793],
  [-71.137, 19.231, 53.977],
];

/** Fill unset fields from NOISE_DEFAULTS */
export function resolveNoiseFieldConfig(config: Partial<NoiseFieldConfig> = {}): NoiseFieldConfig {
  return {
    seed: config.seed ?? 0,
    frequency: config.frequency ?? NOISE_DEFAULTS.FREQUENCY,
    octaves: config.octaves ?? NOISE_DEFAULTS.OCTAVES,
    lacunarity: config.lacunarity ?? NOISE_DEFAULTS.LACUNARITY,
    persistence: config.persistence ?? NOISE_DEFAULTS.PERSISTENCE,
    timeScale: config.timeScale ?? NOISE_DEFAULTS.TIME_SCALE,
  };
}

export function validateNoiseFieldConfig(config: NoiseFieldConfig, path: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  if (!Number.isFinite(config.seed)) {
    issues.push({ path: `${path}.seed`, message: 'Must be a finite number' });
  }
  if (!Number.isFinite(config.frequency) || config.frequency <= 0) {
    issues.push({ path: `${path}.frequency`, message: 'Must be a positive number' });
  }
  if (!Number.isInteger(config.octaves) || config.octaves < 1 || config.octaves > NOISE_DEFAULTS.MAX_OCTAVES) {
    issues.push({ path: `${path}.octaves`, message: `Must be an integer in [1, ${NOISE_DEFAULTS.MAX_OCTAVES}]` });
  }
  if (!Number.isFinite(config.lacunarity) || config.lacunarity <= 0) {
    issues.push({ path: `${path}.lacunarity`, message: 'Must be a positive number' });
  }
  if (!Number.isFinite(config.persistence) || config.persistence <= 0) {
    issues.push({ path: `${path}.persistence`, message: 'Must be a positive number' });
  }
  if (!Number.isFinite(config.timeScale)) {
    issues.push({ path: `${path}.timeScale`, message: 'Must be a finite number' });
  }
  return issues;
}

/**
 * Coherent vector noise: fractal 4D simplex noise over (position, time).
 *
 * The permutation table is drawn once from a seeded RandomSource, after which
 * sampling reads no mutable state; any number of particles (or systems) can
 * share one field. Each output component lies in [-1, 1].
 */
export class NoiseField {
  public readonly config: Readonly<NoiseFieldConfig>;
  private readonly simplex: SimplexNoise;
  private readonly amplitudeSum: number;

  constructor(config: Partial<NoiseFieldConfig> = {}) {
    this.config = Object.freeze(resolveNoiseFieldConfig(config));

    this.simplex = new SimplexNoise(new RandomSource(this.config.seed));

    let sum = 0;
    let amplitude = 1;
    for (let octave = 0; octave < this.config.octaves; octave++) {
      sum += amplitude;
      amplitude *= this.config.persistence;
    }
    this.amplitudeSum = sum;
  }

  /**
   * Scalar fractal noise in [-1, 1].
   */
  public sampleScalar(x: number, y: number, z: number, time: number): number {
    const { frequency, octaves, lacunarity, persistence, timeScale } = this.config;
    const w = time * timeScale;

    let total = 0;
    let amplitude = 1;
    let f = frequency;
    for (let octave = 0; octave < octaves; octave++) {
      total += this.simplex.noise4d(x * f, y * f, z * f, w * f) * amplitude;
      amplitude *= persistence;
      f *= lacunarity;
    }

    return clamp(total / this.amplitudeSum, -1, 1);
  }

  public sample(
    position: THREE.Vector3,
    time: number,
    out: THREE.Vector3 = new THREE.Vector3()
  ): THREE.Vector3 {
    const [ox, oy, oz] = CHANNEL_OFFSETS;
    return out.set(
      this.sampleScalar(position.x + ox[0], position.y + ox[1], position.z + ox[2], time),
      this.sampleScalar(position.x + oy[0], position.y + oy[1], position.z + oy[2], time),
      this.sampleScalar(position.x + oz[0], position.y + oz[1], position.z + oz[2], time)
    );
  }
}
