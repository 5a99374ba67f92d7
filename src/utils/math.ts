import * as THREE from 'three';

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/** Hermite ease of t in [0, 1] */
export function smoothstep(t: number): number {
  return t * t * (3 - 2 * t);
}

/** Inclusive [min, max] pair used by emitter ranges */
export type Range = readonly [number, number];

/**
 * Seeded random source for deterministic simulation.
 *
 * mulberry32 over a 32-bit state: every draw is exact integer math, so two
 * sources with the same seed produce the same stream on any platform.
 */
export class RandomSource {
  private state: number;
  private readonly initialSeed: number;

  constructor(seed: number) {
    this.initialSeed = seed >>> 0;
    this.state = this.initialSeed;
  }

  public get seed(): number {
    return this.initialSeed;
  }

  /**
   * PERF: Reseed without allocating new object.
   * Restarts the stream from the beginning for the given seed.
   */
  public reseed(seed: number = this.initialSeed): void {
    this.state = seed >>> 0;
  }

  /** Uniform in [0, 1) */
  public next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Same as next(); lets the source stand in for Math when seeding noise tables */
  public random(): number {
    return this.next();
  }

  public nextRange(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  /** Uniform integer in [min, max] */
  public nextInt(min: number, max: number): number {
    return Math.floor(this.nextRange(min, max + 1));
  }

  public nextInRange(range: Range): number {
    return this.nextRange(range[0], range[1]);
  }

  /**
   * Uniform direction on the unit sphere (Archimedes: z uniform in [-1, 1],
   * azimuth uniform in [0, 2π)).
   */
  public nextUnitVector(out: THREE.Vector3 = new THREE.Vector3()): THREE.Vector3 {
    const z = this.nextRange(-1, 1);
    const phi = this.next() * Math.PI * 2;
    const r = Math.sqrt(1 - z * z);
    return out.set(r * Math.cos(phi), r * Math.sin(phi), z);
  }
}
