import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import { NOISE_DEFAULTS } from '@/data/particles.config';
import { NoiseField, resolveNoiseFieldConfig, validateNoiseFieldConfig } from '@/engine/particles/NoiseField';

describe('NoiseField', () => {
  it('fills unset fields from the defaults', () => {
    expect(resolveNoiseFieldConfig({ seed: 4, octaves: 3 })).toEqual({
      seed: 4,
      frequency: NOISE_DEFAULTS.FREQUENCY,
      octaves: 3,
      lacunarity: NOISE_DEFAULTS.LACUNARITY,
      persistence: NOISE_DEFAULTS.PERSISTENCE,
      timeScale: NOISE_DEFAULTS.TIME_SCALE,
    });
  });

  it('is a pure function of position and time', () => {
    const field = new NoiseField({ seed: 8 });
    const position = new THREE.Vector3(1.3, -0.7, 2.1);
    const a = field.sample(position, 0.5);
    const b = field.sample(position, 0.5);
    expect(a.equals(b)).toBe(true);
  });

  it('is reproducible across instances with the same seed', () => {
    const a = new NoiseField({ seed: 42, octaves: 4 });
    const b = new NoiseField({ seed: 42, octaves: 4 });
    const position = new THREE.Vector3(0.25, 3.5, -1.75);
    expect(a.sample(position, 1.25).equals(b.sample(position, 1.25))).toBe(true);
  });

  it('differs between seeds', () => {
    const a = new NoiseField({ seed: 1 });
    const b = new NoiseField({ seed: 2 });
    let differs = false;
    for (let i = 0; i < 10; i++) {
      const p = new THREE.Vector3(i * 0.37, i * 0.11, i * 0.53);
      if (!a.sample(p, 0).equals(b.sample(p, 0))) differs = true;
    }
    expect(differs).toBe(true);
  });

  it('keeps every component within [-1, 1]', () => {
    const field = new NoiseField({ seed: 3, octaves: 5, persistence: 0.9 });
    const out = new THREE.Vector3();
    for (let i = 0; i < 200; i++) {
      field.sample(new THREE.Vector3(i * 0.77, -i * 0.31, i * 1.13), i * 0.05, out);
      for (const c of [out.x, out.y, out.z]) {
        expect(c).toBeGreaterThanOrEqual(-1);
        expect(c).toBeLessThanOrEqual(1);
      }
    }
  });

  it('decorrelates the three channels', () => {
    const field = new NoiseField({ seed: 5 });
    const out = field.sample(new THREE.Vector3(0.4, 0.9, 1.6), 0.3);
    expect(out.x === out.y && out.y === out.z).toBe(false);
  });

  it('reports invalid parameters by path', () => {
    const issues = validateNoiseFieldConfig(
      resolveNoiseFieldConfig({ frequency: 0, octaves: NOISE_DEFAULTS.MAX_OCTAVES + 1 }),
      'modifiers[0].noise'
    );
    expect(issues.map((issue) => issue.path)).toEqual(['modifiers[0].noise.frequency', 'modifiers[0].noise.octaves']);
  });
});
