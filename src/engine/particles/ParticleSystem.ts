import { DEFAULT_EMITTER_CONFIG, POOL, SIMULATION } from '@/data/particles.config';
import { buildGeometry, type GeometryBuffer, type GeometryLayout } from '@/rendering/particles/GeometryBuffer';
import { debugConfig, debugSimulation } from '@/utils/debugLogger';
import { RandomSource } from '@/utils/math';
import { ConfigValidator } from './ConfigValidator';
import { Emitter, type EmitterStats } from './Emitter';
import { ConfigError, InvalidTimestepError } from './errors';
import { applyModifier, resolveModifiers, type Modifier, type ModifierContext } from './Modifier';
import { ParticlePool, type Particle, type ParticlePoolStats } from './ParticlePool';
import type { EmitterConfig, EmitterState, ParticleSystemConfig } from './types';

export interface ParticleSystemStats {
  pool: ParticlePoolStats;
  emitter: EmitterStats;
  /** update() calls since construction or the last reset() */
  frames: number;
  elapsedTime: number;
  /** Particles freed by expiry */
  reaped: number;
}

/** Overlay a partial emitter config on the defaults */
export function mergeEmitterConfig(partial: Partial<EmitterConfig> = {}): EmitterConfig {
  return {
    ...DEFAULT_EMITTER_CONFIG,
    ...partial,
    direction: { ...DEFAULT_EMITTER_CONFIG.direction, ...partial.direction },
  };
}

/**
 * ParticleSystem - owns one pool, one emitter and one modifier pipeline.
 *
 * Frame order: spawn → modifiers (in configured order) → age → reap.
 * Particles spawned this frame are simulated this frame, so they leave
 * update() with age == dt. Geometry extraction is a separate read-only pass.
 *
 * All randomness comes from one seeded RandomSource drawn only while
 * spawning; the same seed and dt sequence reproduce the same states.
 */
export class ParticleSystem {
  public readonly emitterConfig: Readonly<EmitterConfig>;

  private readonly pool: ParticlePool;
  private readonly emitter: Emitter;
  private readonly modifiers: readonly Modifier[];
  private readonly rng: RandomSource;
  private readonly context: ModifierContext = { time: 0 };

  private time = 0;
  private frames = 0;
  private reapedTotal = 0;
  private frameDt = 0;

  constructor(config: ParticleSystemConfig = {}) {
    const emitterConfig = mergeEmitterConfig(config.emitter);

    const validation = new ConfigValidator().validateSystemConfig(config, emitterConfig);
    if (!validation.valid) {
      debugConfig.error(`ParticleSystem: ${validation.issues.length} config issue(s)`, validation.issues);
      throw new ConfigError(validation.issues);
    }

    const seed = config.seed ?? SIMULATION.DEFAULT_SEED;
    const capacity = config.capacity ?? POOL.DEFAULT_CAPACITY;
    const rateCurve =
      emitterConfig.rateCurve !== undefined ? validation.curves.get(emitterConfig.rateCurve) ?? null : null;

    this.emitterConfig = emitterConfig;
    this.rng = new RandomSource(seed);
    this.pool = new ParticlePool(capacity);
    this.modifiers = resolveModifiers(config.modifiers ?? [], validation, seed);
    this.emitter = new Emitter(emitterConfig, rateCurve);

    debugSimulation.log(
      `ParticleSystem: capacity ${capacity}, ${this.modifiers.length} modifier(s), seed ${seed}`
    );
  }

  // ============================================
  // FRAME
  // ============================================

  /**
   * Advance the simulation by dt seconds.
   * @throws InvalidTimestepError when dt is negative or not finite; nothing changes
   */
  public update(dt: number): void {
    if (!Number.isFinite(dt) || dt < 0) {
      throw new InvalidTimestepError(dt);
    }

    this.emitter.update(dt, this.pool, this.rng);

    this.context.time = this.time;
    this.frameDt = dt;
    this.pool.forEachLive(this.stepParticle);

    this.time += dt;
    this.frames++;
  }

  // Bound once so the per-frame walk does not allocate a closure
  private readonly stepParticle = (particle: Particle): void => {
    const dt = this.frameDt;
    for (const modifier of this.modifiers) {
      applyModifier(modifier, particle, dt, this.context);
    }

    particle.age += dt;
    if (particle.age > particle.lifetime) {
      this.pool.freeAt(particle.index);
      this.reapedTotal++;
    }
  };

  /**
   * Vertex data for the current live set. Read-only; may be called any
   * number of times per frame.
   */
  public extractGeometry(layout: GeometryLayout = 'quad'): GeometryBuffer {
    return buildGeometry(this.pool, layout);
  }

  // ============================================
  // CONTROL
  // ============================================

  public start(): void {
    this.emitter.start();
  }

  /** Stops spawning; live particles keep aging and expire normally */
  public stop(): void {
    this.emitter.stop();
  }

  public pause(): void {
    this.emitter.pause();
  }

  public resume(): void {
    this.emitter.resume();
  }

  /**
   * Kill every particle and stop the emitter. The clock and the random
   * stream rewind too, so a reset system replays like a new one.
   */
  public reset(): void {
    this.pool.clear();
    this.emitter.stop();
    this.rng.reseed();
    this.time = 0;
    this.frames = 0;
    this.reapedTotal = 0;
    debugSimulation.log('ParticleSystem: reset');
  }

  // ============================================
  // INTROSPECTION
  // ============================================

  public get liveCount(): number {
    return this.pool.liveCount;
  }

  public get capacity(): number {
    return this.pool.capacity;
  }

  public get emitterState(): EmitterState {
    return this.emitter.state;
  }

  public get elapsedTime(): number {
    return this.time;
  }

  /** Live particles in slot order, for inspectors */
  public particles(): Generator<Readonly<Particle>, void, undefined> {
    return this.pool.live();
  }

  public getStats(): ParticleSystemStats {
    return {
      pool: this.pool.getStats(),
      emitter: this.emitter.getStats(),
      frames: this.frames,
      elapsedTime: this.time,
      reaped: this.reapedTotal,
    };
  }
}
