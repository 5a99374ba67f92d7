/**
 * Per-particle, per-frame modifiers
 *
 * Configs name curves by key; resolveModifiers() swaps the names for the
 * built Curve/Gradient/NoiseField objects once, so the hot loop is a plain
 * switch over a closed union with no lookups.
 *
 * Order is the caller's. The only thing added is a trailing `integrate`
 * when the list has none, so positions always move with the velocity the
 * earlier modifiers produced this frame.
 */

import * as THREE from 'three';
import type { Curve, Gradient } from './Curve';
import { NoiseField, resolveNoiseFieldConfig, validateNoiseFieldConfig } from './NoiseField';
import type { Particle } from './ParticlePool';
import type { ValidationIssue } from './errors';
import type { ModifierConfig, Vec3Tuple } from './types';

export type Modifier =
  | { type: 'gravity'; acceleration: THREE.Vector3 }
  | { type: 'drag'; coefficient: number }
  | { type: 'noiseForce'; field: NoiseField; strength: number; strengthCurve: Curve | null }
  | { type: 'sizeOverLife'; curve: Curve }
  | { type: 'colorOverLife'; gradient: Gradient }
  | { type: 'opacityOverLife'; curve: Curve }
  | { type: 'integrate' };

export interface ModifierContext {
  /** Seconds the system has been simulated */
  time: number;
}

// Temp vectors
const _noise = new THREE.Vector3();

export function applyModifier(modifier: Modifier, particle: Particle, dt: number, context: ModifierContext): void {
  switch (modifier.type) {
    case 'gravity':
      particle.velocity.addScaledVector(modifier.acceleration, dt);
      return;

    case 'drag': {
      // Clamped so a long frame can stop a particle but never reverse it
      const factor = 1 - modifier.coefficient * dt;
      particle.velocity.multiplyScalar(factor < 0 ? 0 : factor > 1 ? 1 : factor);
      return;
    }

    case 'noiseForce': {
      const scale = modifier.strengthCurve ? modifier.strengthCurve.evaluate(particle.normalizedAge) : 1;
      modifier.field.sample(particle.position, context.time, _noise);
      particle.velocity.addScaledVector(_noise, modifier.strength * scale * dt);
      return;
    }

    case 'sizeOverLife':
      particle.size = modifier.curve.evaluate(particle.normalizedAge);
      return;

    case 'colorOverLife':
      modifier.gradient.evaluate(particle.normalizedAge, particle);
      return;

    case 'opacityOverLife':
      particle.alpha = modifier.curve.evaluate(particle.normalizedAge);
      return;

    case 'integrate':
      // Explicit Euler: first order, fine at frame-sized steps
      particle.position.addScaledVector(particle.velocity, dt);
      particle.rotation += particle.angularVelocity * dt;
      return;
  }
}

export interface CurveLookup {
  curves: ReadonlyMap<string, Curve>;
  gradients: ReadonlyMap<string, Gradient>;
}

function isFiniteVec3(value: Vec3Tuple): boolean {
  return value.length === 3 && value.every((c) => Number.isFinite(c));
}

function requireCurve(name: string, lookup: CurveLookup, path: string, issues: ValidationIssue[]): void {
  if (!lookup.curves.has(name)) {
    issues.push({ path, message: `Unknown curve "${name}"` });
  }
}

export function validateModifier(config: ModifierConfig, lookup: CurveLookup, path: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  switch (config.type) {
    case 'gravity':
      if (!isFiniteVec3(config.acceleration)) {
        issues.push({ path: `${path}.acceleration`, message: 'Must be three finite numbers' });
      }
      break;

    case 'drag':
      if (!Number.isFinite(config.coefficient) || config.coefficient < 0) {
        issues.push({ path: `${path}.coefficient`, message: 'Must be a non-negative number' });
      }
      break;

    case 'noiseForce':
      if (!Number.isFinite(config.strength)) {
        issues.push({ path: `${path}.strength`, message: 'Must be a finite number' });
      }
      if (config.strengthCurve !== undefined) {
        requireCurve(config.strengthCurve, lookup, `${path}.strengthCurve`, issues);
      }
      issues.push(...validateNoiseFieldConfig(resolveNoiseFieldConfig(config.noise), `${path}.noise`));
      break;

    case 'sizeOverLife':
    case 'opacityOverLife':
      requireCurve(config.curve, lookup, `${path}.curve`, issues);
      break;

    case 'colorOverLife':
      if (!lookup.gradients.has(config.gradient)) {
        issues.push({ path: `${path}.gradient`, message: `Unknown gradient "${config.gradient}"` });
      }
      break;

    case 'integrate':
      break;

    default:
      issues.push({ path: `${path}.type`, message: 'Unknown modifier' });
  }

  return issues;
}

/**
 * Build runtime modifiers from validated configs.
 *
 * @param seed - base seed; noise modifier i without its own seed uses seed + i
 */
export function resolveModifiers(configs: readonly ModifierConfig[], lookup: CurveLookup, seed: number): Modifier[] {
  const modifiers: Modifier[] = configs.map((config, i): Modifier => {
    switch (config.type) {
      case 'gravity':
        return { type: 'gravity', acceleration: new THREE.Vector3(...config.acceleration) };
      case 'drag':
        return { type: 'drag', coefficient: config.coefficient };
      case 'noiseForce':
        return {
          type: 'noiseForce',
          field: new NoiseField({ seed: seed + i, ...config.noise }),
          strength: config.strength,
          strengthCurve: config.strengthCurve !== undefined ? lookupCurve(lookup, config.strengthCurve) : null,
        };
      case 'sizeOverLife':
        return { type: 'sizeOverLife', curve: lookupCurve(lookup, config.curve) };
      case 'colorOverLife':
        return { type: 'colorOverLife', gradient: lookupGradient(lookup, config.gradient) };
      case 'opacityOverLife':
        return { type: 'opacityOverLife', curve: lookupCurve(lookup, config.curve) };
      case 'integrate':
        return { type: 'integrate' };
    }
  });

  if (!modifiers.some((m) => m.type === 'integrate')) {
    modifiers.push({ type: 'integrate' });
  }

  return modifiers;
}

function lookupCurve(lookup: CurveLookup, name: string): Curve {
  const curve = lookup.curves.get(name);
  if (!curve) {
    throw new Error(`Modifier references unknown curve "${name}"; validate before resolving`);
  }
  return curve;
}

function lookupGradient(lookup: CurveLookup, name: string): Gradient {
  const gradient = lookup.gradients.get(name);
  if (!gradient) {
    throw new Error(`Modifier references unknown gradient "${name}"; validate before resolving`);
  }
  return gradient;
}
