/**
 * Config Validator
 *
 * Validation for particle system configs supplied by the host.
 * Collects every problem with its path instead of stopping at the first,
 * and builds the named curve set along the way (a curve that constructs is
 * a curve that validated).
 */

import { POOL } from '@/data/particles.config';
import type { Range } from '@/utils/math';
import { Curve, Gradient } from './Curve';
import { InvalidCurveError, type ValidationIssue } from './errors';
import { validateModifier, type CurveLookup } from './Modifier';
import { validateSpawnShape } from './SpawnShape';
import type { EmitterConfig, ParticleSystemConfig, Vec3Tuple } from './types';

const VALID_DIRECTION_MODES = ['automatic', 'fixed'] as const;
const VALID_SPREAD_LOOPS = ['loop', 'pingPong'] as const;

export interface ConfigValidationResult extends CurveLookup {
  valid: boolean;
  issues: ValidationIssue[];
}

export class ConfigValidator {
  private issues: ValidationIssue[] = [];

  /**
   * Validate a system config. `emitter` is the config after defaults were
   * overlaid, so every field is present.
   */
  public validateSystemConfig(config: ParticleSystemConfig, emitter: EmitterConfig): ConfigValidationResult {
    this.reset();

    const capacity = config.capacity ?? POOL.DEFAULT_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1 || capacity > POOL.MAX_CAPACITY) {
      this.addError('capacity', `Must be an integer in [1, ${POOL.MAX_CAPACITY}]`);
    }
    if (config.seed !== undefined && !Number.isFinite(config.seed)) {
      this.addError('seed', 'Must be a finite number');
    }

    const lookup = this.buildCurveSet(config);
    this.validateEmitter(emitter, lookup, 'emitter');

    (config.modifiers ?? []).forEach((modifier, i) => {
      this.issues.push(...validateModifier(modifier, lookup, `modifiers[${i}]`));
    });

    return { ...this.result(), ...lookup };
  }

  public validateEmitter(emitter: EmitterConfig, lookup: CurveLookup, path: string): void {
    if (!Number.isFinite(emitter.rate) || emitter.rate < 0) {
      this.addError(`${path}.rate`, 'Must be a non-negative number');
    }
    if (emitter.rateCurve !== undefined) {
      const rateCurve = lookup.curves.get(emitter.rateCurve);
      if (!rateCurve) {
        this.addError(`${path}.rateCurve`, `Unknown curve "${emitter.rateCurve}"`);
      } else if (rateCurve.keyframes.some((k) => k.value < 0)) {
        this.addError(`${path}.rateCurve`, `Curve "${emitter.rateCurve}" must not go below zero`);
      }
    }
    if (!Number.isFinite(emitter.duration) || emitter.duration <= 0) {
      this.addError(`${path}.duration`, 'Must be a positive number');
    }

    emitter.bursts.forEach((burst, i) => {
      if (!Number.isFinite(burst.time) || burst.time < 0) {
        this.addError(`${path}.bursts[${i}].time`, 'Must be a non-negative number');
      }
      if (!Number.isInteger(burst.count) || burst.count < 0) {
        this.addError(`${path}.bursts[${i}].count`, 'Must be a non-negative integer');
      }
    });

    this.issues.push(...validateSpawnShape(emitter.shape, `${path}.shape`));

    // Direction
    const direction = emitter.direction;
    if (!VALID_DIRECTION_MODES.includes(direction.mode)) {
      this.addError(`${path}.direction.mode`, `Must be one of ${VALID_DIRECTION_MODES.join(', ')}`);
    }
    if (direction.mode === 'fixed') {
      if (direction.fixed === undefined || !isNonZeroVec3(direction.fixed)) {
        this.addError(`${path}.direction.fixed`, 'Fixed mode needs a finite, non-zero vector');
      }
    }
    this.optionalUnit(direction.randomize, `${path}.direction.randomize`);
    this.optionalUnit(direction.spherize, `${path}.direction.spherize`);

    // Emission mode
    const emission = emitter.emission;
    if (emission.type === 'spread') {
      if (!Number.isFinite(emission.amount) || emission.amount <= 0 || emission.amount > 1) {
        this.addError(`${path}.emission.amount`, 'Must be in (0, 1]');
      }
      if (emission.loop !== undefined && !VALID_SPREAD_LOOPS.includes(emission.loop)) {
        this.addError(`${path}.emission.loop`, `Must be one of ${VALID_SPREAD_LOOPS.join(', ')}`);
      }
    } else if (emission.type !== 'random') {
      this.addError(`${path}.emission.type`, 'Must be random or spread');
    }

    // Spawn ranges
    this.requireRange(emitter.speed, `${path}.speed`);
    this.requireRange(emitter.rotation, `${path}.rotation`);
    this.requireRange(emitter.angularVelocity, `${path}.angularVelocity`);
    if (this.requireRange(emitter.size, `${path}.size`) && emitter.size[0] < 0) {
      this.addError(`${path}.size`, 'Sizes must be non-negative');
    }
    if (this.requireRange(emitter.alpha, `${path}.alpha`) && (emitter.alpha[0] < 0 || emitter.alpha[1] > 1)) {
      this.addError(`${path}.alpha`, 'Alpha must be within [0, 1]');
    }
    // age / lifetime is divided every frame; zero has to be unreachable
    if (this.requireRange(emitter.lifetime, `${path}.lifetime`) && emitter.lifetime[0] <= 0) {
      this.addError(`${path}.lifetime`, 'Lifetime must be positive');
    }
  }

  private buildCurveSet(config: ParticleSystemConfig): CurveLookup {
    const curves = new Map<string, Curve>();
    const gradients = new Map<string, Gradient>();

    for (const [name, definition] of Object.entries(config.curves?.curves ?? {})) {
      const curve = this.collectCurveIssues(() => new Curve(definition, `curves.curves.${name}`));
      if (curve) curves.set(name, curve);
    }
    for (const [name, definition] of Object.entries(config.curves?.gradients ?? {})) {
      const gradient = this.collectCurveIssues(() => new Gradient(definition, `curves.gradients.${name}`));
      if (gradient) gradients.set(name, gradient);
    }

    return { curves, gradients };
  }

  private collectCurveIssues<T>(build: () => T): T | null {
    try {
      return build();
    } catch (error) {
      if (error instanceof InvalidCurveError) {
        this.issues.push(...error.issues);
        return null;
      }
      throw error;
    }
  }

  // ============================================
  // HELPERS
  // ============================================

  private reset(): void {
    this.issues = [];
  }

  private result(): { valid: boolean; issues: ValidationIssue[] } {
    return {
      valid: this.issues.length === 0,
      issues: [...this.issues],
    };
  }

  private addError(path: string, message: string): void {
    this.issues.push({ path, message });
  }

  /** Returns true when the range is usable for further checks */
  private requireRange(range: Range, path: string): boolean {
    if (range.length !== 2 || !Number.isFinite(range[0]) || !Number.isFinite(range[1])) {
      this.addError(path, 'Must be a [min, max] pair of finite numbers');
      return false;
    }
    if (range[0] > range[1]) {
      this.addError(path, 'min must not exceed max');
      return false;
    }
    return true;
  }

  private optionalUnit(value: number | undefined, path: string): void {
    if (value === undefined) return;
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      this.addError(path, 'Must be a number in [0, 1]');
    }
  }
}

function isNonZeroVec3(value: Vec3Tuple): boolean {
  return value.length === 3 && value.every((c) => Number.isFinite(c)) && value.some((c) => c !== 0);
}
