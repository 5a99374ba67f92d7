/**
 * ParticlesConfig - Centralized particle simulation configuration
 *
 * Defaults for emitters, pools and noise fields, plus the geometry layout
 * constants host renderers bind against.
 *
 * IMPORTANT: GEOMETRY is a wire contract. Changing a stride or attribute
 * offset breaks every host binding built against it.
 */

import type { EmitterConfig } from '@/engine/particles/types';

// =============================================================================
// POOL
// =============================================================================

export const POOL = {
  /** Capacity used when a host does not pick one */
  DEFAULT_CAPACITY: 1000,
  /** Slot index uses the low 20 bits of a particle handle */
  MAX_CAPACITY: 0x100000,
  /** Generation uses the upper 12 bits and wraps */
  MAX_GENERATION: 0xfff,
  /** Bit shift for generation in a packed handle */
  GENERATION_SHIFT: 20,
} as const;

// =============================================================================
// SIMULATION
// =============================================================================

export const SIMULATION = {
  DEFAULT_SEED: 1,
  /** Upper bound on how often one burst can repeat inside a single frame */
  MAX_BURST_REPEATS_PER_FRAME: 64,
} as const;

// =============================================================================
// NOISE
// =============================================================================

export const NOISE_DEFAULTS = {
  FREQUENCY: 0.5,
  OCTAVES: 2,
  LACUNARITY: 2,
  PERSISTENCE: 0.5,
  TIME_SCALE: 0.25,
  MAX_OCTAVES: 8,
} as const;

// =============================================================================
// EMITTER
// =============================================================================

/**
 * Defaults every emitter config is overlaid on.
 * Continuous emission from a point, white particles fading nowhere.
 */
export const DEFAULT_EMITTER_CONFIG: Readonly<EmitterConfig> = {
  rate: 10,
  duration: 5,
  // Looping: bursts added on top refire every `duration` seconds
  looping: true,
  bursts: [],
  shape: { type: 'point' },
  direction: { mode: 'automatic', randomize: 0, spherize: 0 },
  emission: { type: 'random' },
  speed: [1, 1],
  size: [1, 1],
  lifetime: [1, 1],
  rotation: [0, 0],
  angularVelocity: [0, 0],
  alpha: [1, 1],
  colorA: 0xffffff,
  colorB: 0xffffff,
  preserveAccumulator: false,
  autoStart: true,
};

// =============================================================================
// GEOMETRY LAYOUT
// =============================================================================

/**
 * Quad layout, one vertex (44 bytes):
 *   offset  0  position  float32 x3
 *   offset 12  corner    float32 x2   (billboard corner, doubles as UV - 0.5)
 *   offset 20  color     float32 x4   (linear RGBA)
 *   offset 36  size      float32 x1
 *   offset 40  rotation  float32 x1   (radians, around the view axis)
 *
 * Instanced layout, one record per particle (36 bytes):
 *   offset  0  position  float32 x3
 *   offset 12  color     float32 x4
 *   offset 28  size      float32 x1
 *   offset 32  rotation  float32 x1
 */
export const GEOMETRY = {
  BYTES_PER_FLOAT: 4,
  QUAD_VERTICES_PER_PARTICLE: 4,
  QUAD_INDICES_PER_PARTICLE: 6,
  QUAD_FLOATS_PER_VERTEX: 11,
  INSTANCE_FLOATS_PER_PARTICLE: 9,
  /** Counter-clockwise when viewed from +Z */
  QUAD_CORNERS: [
    [-0.5, -0.5],
    [0.5, -0.5],
    [0.5, 0.5],
    [-0.5, 0.5],
  ],
  /** Two triangles per quad, offset by 4 * particle */
  QUAD_INDEX_PATTERN: [0, 1, 2, 0, 2, 3],
} as const;
