export { ParticleSystem, mergeEmitterConfig } from './ParticleSystem';
export type { ParticleSystemStats } from './ParticleSystem';
export { ParticlePool, Particle, packParticleHandle, getHandleIndex, getHandleGeneration } from './ParticlePool';
export type { ParticleHandle, ParticlePoolStats } from './ParticlePool';
export { Emitter } from './Emitter';
export type { EmitterStats } from './Emitter';
export { Curve, Gradient } from './Curve';
export type {
  CurveDefinition,
  CurveKeyframe,
  GradientDefinition,
  GradientKeyframe,
  GradientSample,
  Interpolation,
} from './Curve';
export { NoiseField, resolveNoiseFieldConfig } from './NoiseField';
export type { NoiseFieldConfig } from './NoiseField';
export { sampleSpawnShape, validateSpawnShape } from './SpawnShape';
export type { SpawnSample } from './SpawnShape';
export { applyModifier, resolveModifiers, validateModifier } from './Modifier';
export type { CurveLookup, Modifier, ModifierContext } from './Modifier';
export { ConfigValidator } from './ConfigValidator';
export type { ConfigValidationResult } from './ConfigValidator';
export { ConfigError, InvalidCurveError, InvalidTimestepError } from './errors';
export type { ValidationIssue } from './errors';
export type * from './types';
