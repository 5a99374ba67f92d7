/**
 * Fixed-capacity particle arena
 *
 * Every Particle record is allocated once in the constructor and recycled
 * through a LIFO free list of slot indices; nothing is allocated while the
 * simulation runs. Handles pack the slot index with a per-slot generation:
 *
 * Encoding (32-bit):
 * - Bits 0-19 (20 bits): slot index → max 1,048,576 slots
 * - Bits 20-31 (12 bits): generation → wraps at 4096
 *
 * Freeing a slot bumps its generation, so a stale handle (or a second free
 * of the same handle) fails validation instead of killing a recycled particle.
 */

import * as THREE from 'three';
import { POOL } from '@/data/particles.config';
import { debugPool } from '@/utils/debugLogger';

/** Branded type for particle slot handles */
export type ParticleHandle = number & { readonly __brand: 'ParticleHandle' };

const INDEX_MASK = POOL.MAX_CAPACITY - 1;

export function packParticleHandle(index: number, generation: number): ParticleHandle {
  return ((((generation & POOL.MAX_GENERATION) << POOL.GENERATION_SHIFT) | (index & INDEX_MASK)) >>>
    0) as ParticleHandle;
}

export function getHandleIndex(handle: ParticleHandle): number {
  return handle & INDEX_MASK;
}

export function getHandleGeneration(handle: ParticleHandle): number {
  return (handle >>> POOL.GENERATION_SHIFT) & POOL.MAX_GENERATION;
}

export class Particle {
  public readonly index: number;
  public readonly position = new THREE.Vector3();
  public readonly velocity = new THREE.Vector3();
  /** Linear RGB; alpha is kept alongside */
  public readonly color = new THREE.Color(1, 1, 1);
  public alpha = 1;
  public size = 0;
  /** Seconds since spawn */
  public age = 0;
  /** Total seconds to live, fixed at spawn */
  public lifetime = 0;
  public rotation = 0;
  public angularVelocity = 0;
  public generation = 0;
  public alive = false;

  // Values sampled at spawn, for host tooling
  public readonly startColor = new THREE.Color(1, 1, 1);
  public startAlpha = 1;
  public startSize = 0;

  constructor(index: number) {
    this.index = index;
  }

  /** age / lifetime, clamped to [0, 1]; lifetime > 0 is enforced at spawn */
  public get normalizedAge(): number {
    const t = this.age / this.lifetime;
    return t > 1 ? 1 : t;
  }

  /** Zero every field; generation and index survive */
  public reset(): void {
    this.position.set(0, 0, 0);
    this.velocity.set(0, 0, 0);
    this.color.setRGB(1, 1, 1);
    this.alpha = 1;
    this.size = 0;
    this.age = 0;
    this.lifetime = 0;
    this.rotation = 0;
    this.angularVelocity = 0;
    this.startColor.setRGB(1, 1, 1);
    this.startAlpha = 1;
    this.startSize = 0;
  }
}

export interface ParticlePoolStats {
  live: number;
  free: number;
  capacity: number;
  highWaterMark: number;
}

export class ParticlePool {
  public readonly capacity: number;

  private readonly particles: readonly Particle[];
  private readonly generations: Uint16Array;

  /** Free list of recycled indices (LIFO stack for cache locality) */
  private readonly freeList: number[];

  /** Next never-used index (used when the free list is empty) */
  private nextFreshIndex = 0;
  private allocatedCount = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0 || capacity > POOL.MAX_CAPACITY) {
      throw new RangeError(`ParticlePool: capacity must be an integer in [1, ${POOL.MAX_CAPACITY}], got ${capacity}`);
    }

    this.capacity = capacity;
    this.generations = new Uint16Array(capacity);
    this.freeList = [];

    const particles: Particle[] = [];
    for (let i = 0; i < capacity; i++) {
      particles.push(new Particle(i));
    }
    this.particles = particles;
  }

  public get liveCount(): number {
    return this.allocatedCount;
  }

  public get isFull(): boolean {
    return this.allocatedCount >= this.capacity;
  }

  /**
   * Claim a slot. Returns null when the pool is saturated; that is
   * backpressure, not an error, and callers drop the spawn.
   */
  public allocate(): ParticleHandle | null {
    let index: number;

    const recycled = this.freeList.pop();
    if (recycled !== undefined) {
      index = recycled;
    } else if (this.nextFreshIndex < this.capacity) {
      index = this.nextFreshIndex++;
    } else {
      return null;
    }

    this.allocatedCount++;
    const particle = this.particles[index];
    particle.reset();
    particle.alive = true;
    particle.generation = this.generations[index];
    return packParticleHandle(index, particle.generation);
  }

  /**
   * Return a slot to the free list. Stale handles are rejected.
   */
  public free(handle: ParticleHandle): boolean {
    if (!this.isValid(handle)) {
      debugPool.warn(`ParticlePool: Attempted to free stale handle ${handle}`);
      return false;
    }
    this.release(getHandleIndex(handle));
    return true;
  }

  /**
   * Free the particle in slot `index`. Used by the reaper while it walks
   * slots, so no handle has to be rebuilt per particle.
   */
  public freeAt(index: number): boolean {
    if (index < 0 || index >= this.capacity || !this.particles[index].alive) {
      debugPool.warn(`ParticlePool: Attempted to free dead slot ${index}`);
      return false;
    }
    this.release(index);
    return true;
  }

  public isValid(handle: ParticleHandle): boolean {
    const index = getHandleIndex(handle);
    if (index >= this.capacity) return false;
    const particle = this.particles[index];
    return particle.alive && this.generations[index] === getHandleGeneration(handle);
  }

  /** The live particle behind a handle, or null if the handle is stale */
  public get(handle: ParticleHandle): Particle | null {
    return this.isValid(handle) ? this.particles[getHandleIndex(handle)] : null;
  }

  public handleOf(particle: Particle): ParticleHandle {
    return packParticleHandle(particle.index, particle.generation);
  }

  /** Raw slot access; the record may be dead */
  public particleAt(index: number): Particle {
    return this.particles[index];
  }

  public isAlive(index: number): boolean {
    return index >= 0 && index < this.capacity && this.particles[index].alive;
  }

  /**
   * Slots past this index have never been used; iteration stops here.
   */
  public get highWaterMark(): number {
    return this.nextFreshIndex;
  }

  /**
   * Live particles in slot order. Freeing the current particle while
   * iterating is allowed; the walk reads liveness slot by slot.
   */
  public *live(): Generator<Particle, void, undefined> {
    const end = this.nextFreshIndex;
    for (let i = 0; i < end; i++) {
      const particle = this.particles[i];
      if (particle.alive) {
        yield particle;
      }
    }
  }

  /** Allocation-free variant of live() for hot loops */
  public forEachLive(callback: (particle: Particle) => void): void {
    const end = this.nextFreshIndex;
    for (let i = 0; i < end; i++) {
      const particle = this.particles[i];
      if (particle.alive) {
        callback(particle);
      }
    }
  }

  /**
   * Free every slot. All outstanding handles become stale.
   */
  public clear(): void {
    for (let i = 0; i < this.nextFreshIndex; i++) {
      const particle = this.particles[i];
      if (particle.alive) {
        particle.alive = false;
        this.generations[i] = (this.generations[i] + 1) & POOL.MAX_GENERATION;
      }
      particle.reset();
    }
    this.freeList.length = 0;
    this.nextFreshIndex = 0;
    this.allocatedCount = 0;
  }

  public getStats(): ParticlePoolStats {
    return {
      live: this.allocatedCount,
      free: this.capacity - this.allocatedCount,
      capacity: this.capacity,
      highWaterMark: this.nextFreshIndex,
    };
  }

  private release(index: number): void {
    const particle = this.particles[index];
    particle.alive = false;
    // Increment generation (wraps at MAX_GENERATION)
    this.generations[index] = (this.generations[index] + 1) & POOL.MAX_GENERATION;
    this.freeList.push(index);
    this.allocatedCount--;
  }
}
