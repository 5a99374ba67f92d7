import { describe, it, expect } from 'vitest';
import { DEFAULT_EMITTER_CONFIG, GEOMETRY, NOISE_DEFAULTS, POOL, SIMULATION } from '@/data/particles.config';

describe('particles.config', () => {
  it('packs handles into 32 bits', () => {
    expect(POOL.MAX_CAPACITY).toBe(1 << POOL.GENERATION_SHIFT);
    expect(Math.log2(POOL.MAX_GENERATION + 1) + POOL.GENERATION_SHIFT).toBe(32);
    expect(POOL.DEFAULT_CAPACITY).toBeLessThanOrEqual(POOL.MAX_CAPACITY);
  });

  it('has a usable default emitter', () => {
    expect(DEFAULT_EMITTER_CONFIG.rate).toBeGreaterThanOrEqual(0);
    expect(DEFAULT_EMITTER_CONFIG.duration).toBeGreaterThan(0);
    expect(DEFAULT_EMITTER_CONFIG.lifetime[0]).toBeGreaterThan(0);
    expect(DEFAULT_EMITTER_CONFIG.lifetime[0]).toBeLessThanOrEqual(DEFAULT_EMITTER_CONFIG.lifetime[1]);
    expect(DEFAULT_EMITTER_CONFIG.autoStart).toBe(true);
  });

  it('keeps noise defaults inside their own limits', () => {
    expect(NOISE_DEFAULTS.OCTAVES).toBeGreaterThanOrEqual(1);
    expect(NOISE_DEFAULTS.OCTAVES).toBeLessThanOrEqual(NOISE_DEFAULTS.MAX_OCTAVES);
    expect(SIMULATION.MAX_BURST_REPEATS_PER_FRAME).toBeGreaterThan(0);
  });

  it('documents a consistent geometry layout', () => {
    // position(3) corner(2) color(4) size(1) rotation(1)
    expect(GEOMETRY.QUAD_FLOATS_PER_VERTEX).toBe(11);
    expect(GEOMETRY.QUAD_FLOATS_PER_VERTEX * GEOMETRY.BYTES_PER_FLOAT).toBe(44);
    // position(3) color(4) size(1) rotation(1)
    expect(GEOMETRY.INSTANCE_FLOATS_PER_PARTICLE * GEOMETRY.BYTES_PER_FLOAT).toBe(36);
    expect(GEOMETRY.QUAD_CORNERS).toHaveLength(GEOMETRY.QUAD_VERTICES_PER_PARTICLE);
    expect(GEOMETRY.QUAD_INDEX_PATTERN).toHaveLength(GEOMETRY.QUAD_INDICES_PER_PARTICLE);
  });
});
