import type * as THREE from 'three';
import type { Range } from '@/utils/math';
import type { CurveDefinition, GradientDefinition } from './Curve';
import type { NoiseFieldConfig } from './NoiseField';

export type Vec3Tuple = readonly [number, number, number];

// ============================================
// SPAWN SHAPES
// ============================================

/**
 * `thickness` is the proportion of the region that emits: 0 emits from the
 * outer surface only, 1 from the whole volume/area.
 */
export type SpawnShapeConfig =
  | { type: 'point' }
  | { type: 'sphere'; radius: number; thickness?: number }
  | { type: 'box'; halfExtents: Vec3Tuple; thickness?: number }
  | { type: 'cone'; angle: number; height: number; thickness?: number }
  | { type: 'circle'; radius: number; thickness?: number }
  | { type: 'vertices'; points: readonly Vec3Tuple[]; center?: Vec3Tuple; thickness?: number };

export type SpawnShapeType = SpawnShapeConfig['type'];

export interface DirectionConfig {
  /** automatic: direction comes from the shape; fixed: every particle uses `fixed` */
  mode: 'automatic' | 'fixed';
  fixed?: Vec3Tuple;
  /** Blend toward a random direction, 0-1 */
  randomize?: number;
  /** Blend toward the direction of the spawn position, 0-1 */
  spherize?: number;
}

export type SpreadLoopMode = 'loop' | 'pingPong';

export type EmissionModeConfig =
  | { type: 'random' }
  | { type: 'spread'; amount: number; loop?: SpreadLoopMode };

// ============================================
// EMITTER
// ============================================

/**
 * A looping emitter fires every burst once per cycle, so a burst at time 0
 * fires again at `duration`, `2 * duration`, ... Set `looping: false` for
 * a one-shot burst.
 */
export interface BurstConfig {
  /** Seconds from the start of the emitter cycle */
  time: number;
  count: number;
}

export interface EmitterConfig {
  /** Particles per second */
  rate: number;
  /** Name of a curve in the curve set; multiplies `rate` over the emitter cycle */
  rateCurve?: string;
  /** Length of one emitter cycle in seconds */
  duration: number;
  /** Restart the cycle at `duration`; bursts refire each cycle */
  looping: boolean;
  bursts: readonly BurstConfig[];
  shape: SpawnShapeConfig;
  direction: DirectionConfig;
  emission: EmissionModeConfig;
  speed: Range;
  size: Range;
  /** Seconds; the lower bound must be > 0 */
  lifetime: Range;
  /** Radians */
  rotation: Range;
  /** Radians per second */
  angularVelocity: Range;
  alpha: Range;
  /** Start color is picked uniformly between these two */
  colorA: THREE.ColorRepresentation;
  colorB: THREE.ColorRepresentation;
  /** Keep the fractional spawn debt across stop/start instead of zeroing it */
  preserveAccumulator: boolean;
  autoStart: boolean;
}

export type EmitterState = 'stopped' | 'emitting' | 'paused';

// ============================================
// MODIFIERS
// ============================================

export type ModifierConfig =
  | { type: 'gravity'; acceleration: Vec3Tuple }
  | { type: 'drag'; coefficient: number }
  | { type: 'noiseForce'; strength: number; strengthCurve?: string; noise?: Partial<NoiseFieldConfig> }
  | { type: 'sizeOverLife'; curve: string }
  | { type: 'colorOverLife'; gradient: string }
  | { type: 'opacityOverLife'; curve: string }
  | { type: 'integrate' };

export type ModifierType = ModifierConfig['type'];

// ============================================
// SYSTEM
// ============================================

export interface CurveSetConfig {
  curves?: Readonly<Record<string, CurveDefinition>>;
  gradients?: Readonly<Record<string, GradientDefinition>>;
}

export interface ParticleSystemConfig {
  /** Pool size; POOL.DEFAULT_CAPACITY when omitted */
  capacity?: number;
  /** Overlaid on DEFAULT_EMITTER_CONFIG */
  emitter?: Partial<EmitterConfig>;
  modifiers?: readonly ModifierConfig[];
  curves?: CurveSetConfig;
  seed?: number;
}
