export * from './engine/particles';
export * from './rendering/particles';
export { RandomSource, clamp, lerp, smoothstep } from './utils/math';
export type { Range } from './utils/math';
export {
  setDebugSettings,
  getDebugSettings,
  resetDebugSettings,
  DEFAULT_DEBUG_SETTINGS,
} from './utils/debugLogger';
export type { DebugCategory, DebugSettings } from './utils/debugLogger';
export { POOL, SIMULATION, NOISE_DEFAULTS, DEFAULT_EMITTER_CONFIG, GEOMETRY } from './data/particles.config';
