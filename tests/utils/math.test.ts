import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import { clamp, lerp, smoothstep, RandomSource } from '@/utils/math';

describe('math utilities', () => {
  it('clamps values within bounds', () => {
    expect(clamp(5, 0, 10)).toBe(5);
    expect(clamp(-2, 0, 10)).toBe(0);
    expect(clamp(20, 0, 10)).toBe(10);
  });

  it('interpolates linearly', () => {
    expect(lerp(0, 10, 0)).toBe(0);
    expect(lerp(0, 10, 1)).toBe(10);
    expect(lerp(0, 10, 0.5)).toBe(5);
  });

  it('eases with smoothstep', () => {
    expect(smoothstep(0)).toBe(0);
    expect(smoothstep(0.5)).toBe(0.5);
    expect(smoothstep(1)).toBe(1);
    expect(smoothstep(0.25)).toBe(0.15625);
  });
});

describe('RandomSource', () => {
  it('produces the same stream for the same seed', () => {
    const a = new RandomSource(1234);
    const b = new RandomSource(1234);
    for (let i = 0; i < 100; i++) {
      expect(a.next()).toBe(b.next());
    }
  });

  it('produces different streams for different seeds', () => {
    const a = new RandomSource(1);
    const b = new RandomSource(2);
    const same = Array.from({ length: 10 }, () => a.next() === b.next()).every(Boolean);
    expect(same).toBe(false);
  });

  it('stays within [0, 1)', () => {
    const rng = new RandomSource(99);
    for (let i = 0; i < 1000; i++) {
      const value = rng.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('restarts the stream on reseed', () => {
    const rng = new RandomSource(7);
    const first = [rng.next(), rng.next(), rng.next()];
    rng.reseed();
    expect([rng.next(), rng.next(), rng.next()]).toEqual(first);
    expect(rng.seed).toBe(7);
  });

  it('aliases random() to next()', () => {
    const a = new RandomSource(5);
    const b = new RandomSource(5);
    expect(a.random()).toBe(b.next());
  });

  it('draws inclusive integers', () => {
    const rng = new RandomSource(11);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      const value = rng.nextInt(2, 4);
      expect(Number.isInteger(value)).toBe(true);
      seen.add(value);
    }
    expect([...seen].sort()).toEqual([2, 3, 4]);
  });

  it('draws within a range pair', () => {
    const rng = new RandomSource(3);
    for (let i = 0; i < 200; i++) {
      const value = rng.nextInRange([-2, 5]);
      expect(value).toBeGreaterThanOrEqual(-2);
      expect(value).toBeLessThan(5);
    }
    expect(rng.nextInRange([4, 4])).toBe(4);
  });

  it('returns unit vectors into the provided target', () => {
    const rng = new RandomSource(21);
    const out = new THREE.Vector3();
    for (let i = 0; i < 100; i++) {
      const v = rng.nextUnitVector(out);
      expect(v).toBe(out);
      expect(v.length()).toBeCloseTo(1, 10);
    }
  });
});
