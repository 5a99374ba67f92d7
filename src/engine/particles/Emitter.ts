import * as THREE from 'three';
import { SIMULATION } from '@/data/particles.config';
import { debugEmitter, debugPool } from '@/utils/debugLogger';
import type { RandomSource } from '@/utils/math';
import type { Curve } from './Curve';
import { getHandleIndex, type Particle, type ParticlePool } from './ParticlePool';
import { sampleSpawnShape, type SpawnSample } from './SpawnShape';
import type { EmitterConfig, EmitterState } from './types';

export interface EmitterStats {
  state: EmitterState;
  /** Seconds emitted since the last start from stopped */
  elapsed: number;
  accumulator: number;
  spawned: number;
  /** Spawns denied by a saturated pool */
  dropped: number;
}

/**
 * Spawn controller.
 *
 * stopped ──start──▶ emitting ◀──resume── paused
 *    ▲                  │ ──pause──────────▲
 *    └──────stop────────┴──────────────────┘
 *
 * While emitting, rate spawns come from a fractional accumulator
 * (whole particles spawned, remainder carried) so the long-run count is
 * independent of frame-time jitter. Bursts fire when their scheduled time
 * falls in [time, time + dt) and bypass the accumulator.
 */
export class Emitter {
  public readonly config: Readonly<EmitterConfig>;

  private _state: EmitterState = 'stopped';
  private accumulator = 0;
  private time = 0;
  private spreadStep = 0;
  private spawnedTotal = 0;
  private droppedTotal = 0;

  private readonly rateCurve: Curve | null;
  private readonly colorA: THREE.Color;
  private readonly colorB: THREE.Color;
  private readonly fixedDirection: THREE.Vector3 | null;

  // Scratch objects reused for every spawn
  private readonly sample: SpawnSample = {
    position: new THREE.Vector3(),
    direction: new THREE.Vector3(),
  };
  private readonly _tempVec = new THREE.Vector3();

  constructor(config: EmitterConfig, rateCurve: Curve | null = null) {
    this.config = config;
    this.rateCurve = rateCurve;
    this.colorA = new THREE.Color(config.colorA);
    this.colorB = new THREE.Color(config.colorB);

    const fixed = config.direction.fixed;
    this.fixedDirection =
      config.direction.mode === 'fixed' && fixed ? new THREE.Vector3(...fixed).normalize() : null;

    if (config.autoStart) {
      this.start();
    }
  }

  public get state(): EmitterState {
    return this._state;
  }

  public get elapsed(): number {
    return this.time;
  }

  // ============================================
  // STATE MACHINE
  // ============================================

  /**
   * stopped/paused → emitting. Zeroes the spawn debt unless the config
   * asks to preserve it.
   */
  public start(): void {
    if (this._state === 'emitting') return;
    if (!this.config.preserveAccumulator) {
      this.accumulator = 0;
    }
    debugEmitter.log(`Emitter: ${this._state} -> emitting`);
    this._state = 'emitting';
  }

  /**
   * → stopped. Clears the spawn debt and rewinds the cycle, which re-arms
   * every burst. Live particles are untouched.
   */
  public stop(): void {
    if (this._state !== 'stopped') {
      debugEmitter.log(`Emitter: ${this._state} -> stopped`);
    }
    this._state = 'stopped';
    this.accumulator = 0;
    this.time = 0;
    this.spreadStep = 0;
  }

  public pause(): void {
    if (this._state !== 'emitting') return;
    debugEmitter.log('Emitter: emitting -> paused');
    this._state = 'paused';
  }

  public resume(): void {
    if (this._state !== 'paused') return;
    debugEmitter.log('Emitter: paused -> emitting');
    this._state = 'emitting';
  }

  // ============================================
  // SCHEDULING
  // ============================================

  /** Spawn rate at a point of the emitter timeline */
  public rateAt(time: number): number {
    if (!this.rateCurve) return this.config.rate;
    // A curve dipping below zero would eat into later spawns
    return Math.max(0, this.config.rate * this.rateCurve.evaluate(this.cycleProgress(time)));
  }

  private cycleProgress(time: number): number {
    const { duration, looping } = this.config;
    if (duration <= 0) return 0;
    if (looping) return (time % duration) / duration;
    return Math.min(time / duration, 1);
  }

  /**
   * Burst particles scheduled in [from, to). Looping emitters repeat every
   * burst once per cycle.
   */
  private countBursts(from: number, to: number): number {
    const { bursts, duration, looping } = this.config;
    let total = 0;

    for (const burst of bursts) {
      if (!looping || duration <= 0) {
        if (burst.time >= from && burst.time < to) {
          total += burst.count;
        }
        continue;
      }

      let cycle = Math.max(0, Math.floor((from - burst.time) / duration));
      for (let repeats = 0; repeats < SIMULATION.MAX_BURST_REPEATS_PER_FRAME; repeats++) {
        const at = cycle * duration + burst.time;
        if (at >= to) break;
        if (at >= from) {
          total += burst.count;
        }
        cycle++;
      }
    }

    return total;
  }

  /**
   * Advance the timeline by dt and return how many particles are due.
   */
  private schedule(dt: number): number {
    this.accumulator += this.rateAt(this.time) * dt;
    const fromRate = Math.floor(this.accumulator);
    this.accumulator -= fromRate;

    const fromBursts = this.countBursts(this.time, this.time + dt);
    this.time += dt;
    return fromRate + fromBursts;
  }

  // ============================================
  // SPAWNING
  // ============================================

  /**
   * Run one frame of emission into `pool`. Returns the number spawned.
   * The first denied allocation ends spawning for the frame; the rest of
   * the frame's due particles are dropped, never queued.
   */
  public update(dt: number, pool: ParticlePool, rng: RandomSource): number {
    if (this._state !== 'emitting') return 0;

    if (!this.config.looping && this.time >= this.config.duration) {
      this.stop();
      return 0;
    }

    const due = this.schedule(dt);
    let spawned = 0;

    while (spawned < due) {
      const handle = pool.allocate();
      if (handle === null) break;
      this.initializeParticle(pool.particleAt(getHandleIndex(handle)), rng);
      spawned++;
    }

    const dropped = due - spawned;
    if (dropped > 0) {
      this.droppedTotal += dropped;
      debugPool.warn(`Emitter: pool saturated at ${pool.capacity}, dropped ${dropped} spawn(s)`);
    }
    this.spawnedTotal += spawned;

    return spawned;
  }

  /**
   * Next spread coordinate in [0, 1], or null in random emission mode.
   * Counter based, so long runs do not accumulate float drift.
   */
  private nextSpread(): number | null {
    const emission = this.config.emission;
    if (emission.type !== 'spread') return null;

    const phase = this.spreadStep * emission.amount;
    this.spreadStep++;

    if (emission.loop === 'pingPong') {
      const p = phase % 2;
      return p <= 1 ? p : 2 - p;
    }
    return phase % 1;
  }

  private applyDirectionParams(sample: SpawnSample, rng: RandomSource): void {
    const { randomize = 0, spherize = 0 } = this.config.direction;
    const direction = sample.direction;

    if (this.fixedDirection) {
      direction.copy(this.fixedDirection);
    }

    if (randomize > 0) {
      const random = rng.nextUnitVector(this._tempVec);
      direction.multiplyScalar(1 - randomize).addScaledVector(random, randomize);
      normalizeOrUp(direction);
    }

    if (spherize > 0) {
      direction.multiplyScalar(1 - spherize).addScaledVector(sample.position, spherize);
      normalizeOrUp(direction);
    }
  }

  private initializeParticle(particle: Particle, rng: RandomSource): void {
    const config = this.config;
    const sample = sampleSpawnShape(config.shape, rng, this.sample, this.nextSpread());
    this.applyDirectionParams(sample, rng);

    const speed = rng.nextInRange(config.speed);
    particle.position.copy(sample.position);
    particle.velocity.copy(sample.direction).multiplyScalar(speed);

    particle.age = 0;
    particle.lifetime = rng.nextInRange(config.lifetime);

    particle.size = rng.nextInRange(config.size);
    particle.startSize = particle.size;

    particle.rotation = rng.nextInRange(config.rotation);
    particle.angularVelocity = rng.nextInRange(config.angularVelocity);

    particle.color.lerpColors(this.colorA, this.colorB, rng.next());
    particle.startColor.copy(particle.color);
    particle.alpha = rng.nextInRange(config.alpha);
    particle.startAlpha = particle.alpha;
  }

  public getStats(): EmitterStats {
    return {
      state: this._state,
      elapsed: this.time,
      accumulator: this.accumulator,
      spawned: this.spawnedTotal,
      dropped: this.droppedTotal,
    };
  }
}

function normalizeOrUp(v: THREE.Vector3): void {
  if (v.lengthSq() === 0) {
    v.set(0, 1, 0);
  } else {
    v.normalize();
  }
}
