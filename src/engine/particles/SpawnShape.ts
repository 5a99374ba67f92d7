/**
 * Spawn shapes
 *
 * Closed set of emission regions, dispatched with a switch on `type`.
 * Conventions: +Y is up, circles lie on the XZ plane, cones open along +Y.
 *
 * Every shape samples uniformly over its region. Shells use the same trick
 * throughout: pick a uniform point on the outer boundary, then pull it
 * toward the center by s = (lerp(inner^d, 1, u))^(1/d), where d is the
 * dimension and inner = 1 - thickness. The density of s is proportional to
 * s^(d-1), which is what a uniform fill of the shell needs. Boxes are the
 * exception on the first step: see sampleBoxSurface.
 *
 * All entropy comes from the RandomSource passed in.
 */

import * as THREE from 'three';
import { clamp, lerp, type RandomSource } from '@/utils/math';
import type { ValidationIssue } from './errors';
import type { SpawnShapeConfig, Vec3Tuple } from './types';

export interface SpawnSample {
  position: THREE.Vector3;
  direction: THREE.Vector3;
}

const UP = new THREE.Vector3(0, 1, 0);

/**
 * Radial scale for a uniform fill of a d-dimensional shell.
 */
function shellScale(rng: RandomSource, thickness: number, dimension: 2 | 3): number {
  const inner = 1 - thickness;
  if (dimension === 2) {
    return Math.sqrt(lerp(inner * inner, 1, rng.next()));
  }
  return Math.cbrt(lerp(inner * inner * inner, 1, rng.next()));
}

/** Direction from a Y coordinate (cosine of the polar angle) and an azimuth */
function setFromPolar(out: THREE.Vector3, y: number, azimuth: number): THREE.Vector3 {
  const r = Math.sqrt(Math.max(0, 1 - y * y));
  return out.set(r * Math.cos(azimuth), y, r * Math.sin(azimuth));
}

/**
 * Point on the surface of a box centered at the origin.
 *
 * byArea: faces weighted by area, uniform over the surface. Otherwise each
 * axis gets 1/3: the six pyramids from the center to the faces all hold
 * the same volume, so a shell-scaled fill needs equal face odds.
 */
function sampleBoxSurface(
  rng: RandomSource,
  hx: number,
  hy: number,
  hz: number,
  byArea: boolean,
  out: THREE.Vector3
): void {
  const weightX = byArea ? hy * hz : 1;
  const weightY = byArea ? hx * hz : 1;
  const weightZ = byArea ? hx * hy : 1;
  const total = weightX + weightY + weightZ;

  const pick = rng.next() * total;
  const side = rng.next() < 0.5 ? -1 : 1;
  const a = rng.nextRange(-1, 1);
  const b = rng.nextRange(-1, 1);

  if (total === 0 || pick < weightX) {
    out.set(side * hx, a * hy, b * hz);
  } else if (pick < weightX + weightY) {
    out.set(a * hx, side * hy, b * hz);
  } else {
    out.set(a * hx, b * hy, side * hz);
  }
}

/**
 * Sample a spawn position and direction.
 *
 * @param spread - when set (spread emission), replaces the random azimuth of
 *   circles, spheres and cones, or the random vertex pick, with this value in [0, 1]
 */
export function sampleSpawnShape(
  shape: SpawnShapeConfig,
  rng: RandomSource,
  out: SpawnSample,
  spread: number | null = null
): SpawnSample {
  switch (shape.type) {
    case 'point': {
      out.position.set(0, 0, 0);
      rng.nextUnitVector(out.direction);
      return out;
    }

    case 'sphere': {
      const y = rng.nextRange(-1, 1);
      const azimuth = spread !== null ? spread * Math.PI * 2 : rng.next() * Math.PI * 2;
      setFromPolar(out.direction, y, azimuth);
      const r = shape.radius * shellScale(rng, shape.thickness ?? 1, 3);
      out.position.copy(out.direction).multiplyScalar(r);
      return out;
    }

    case 'box': {
      const [hx, hy, hz] = shape.halfExtents;
      const thickness = shape.thickness ?? 1;
      sampleBoxSurface(rng, hx, hy, hz, thickness === 0, out.position);
      out.position.multiplyScalar(shellScale(rng, thickness, 3));
      out.direction.copy(UP);
      return out;
    }

    case 'cone': {
      // Spherical sector: cos(theta) uniform gives a uniform solid angle
      const y = lerp(Math.cos(shape.angle), 1, rng.next());
      const azimuth = spread !== null ? spread * Math.PI * 2 : rng.next() * Math.PI * 2;
      setFromPolar(out.direction, y, azimuth);
      const distance = shape.height * shellScale(rng, shape.thickness ?? 1, 3);
      out.position.copy(out.direction).multiplyScalar(distance);
      return out;
    }

    case 'circle': {
      const azimuth = spread !== null ? spread * Math.PI * 2 : rng.next() * Math.PI * 2;
      out.direction.set(Math.cos(azimuth), 0, Math.sin(azimuth));
      const r = shape.radius * shellScale(rng, shape.thickness ?? 1, 2);
      out.position.copy(out.direction).multiplyScalar(r);
      return out;
    }

    case 'vertices': {
      const count = shape.points.length;
      const index =
        spread !== null ? clamp(Math.floor(spread * count), 0, count - 1) : rng.nextInt(0, count - 1);
      const [vx, vy, vz] = shape.points[index];
      const [cx, cy, cz] = shape.center ?? [0, 0, 0];
      const thickness = shape.thickness ?? 1;
      const coef = rng.nextRange(1 - thickness, 1);

      out.position.set(vx * coef, vy * coef, vz * coef);
      out.direction.set(vx - cx, vy - cy, vz - cz);
      if (out.direction.lengthSq() === 0) {
        out.direction.copy(UP);
      } else {
        out.direction.normalize();
      }
      return out;
    }
  }
}

function isFiniteVec3(value: Vec3Tuple): boolean {
  return value.length === 3 && value.every((c) => Number.isFinite(c));
}

function validateThickness(value: number | undefined, path: string, issues: ValidationIssue[]): void {
  if (value === undefined) return;
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    issues.push({ path: `${path}.thickness`, message: 'Must be a number in [0, 1]' });
  }
}

export function validateSpawnShape(shape: SpawnShapeConfig, path: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  switch (shape.type) {
    case 'point':
      break;

    case 'sphere':
    case 'circle':
      if (!Number.isFinite(shape.radius) || shape.radius < 0) {
        issues.push({ path: `${path}.radius`, message: 'Must be a non-negative number' });
      }
      validateThickness(shape.thickness, path, issues);
      break;

    case 'box':
      if (!isFiniteVec3(shape.halfExtents) || shape.halfExtents.some((c) => c < 0)) {
        issues.push({ path: `${path}.halfExtents`, message: 'Must be three non-negative numbers' });
      }
      validateThickness(shape.thickness, path, issues);
      break;

    case 'cone':
      if (!Number.isFinite(shape.angle) || shape.angle <= 0 || shape.angle > Math.PI) {
        issues.push({ path: `${path}.angle`, message: 'Must be in (0, PI] radians' });
      }
      if (!Number.isFinite(shape.height) || shape.height < 0) {
        issues.push({ path: `${path}.height`, message: 'Must be a non-negative number' });
      }
      validateThickness(shape.thickness, path, issues);
      break;

    case 'vertices':
      if (shape.points.length === 0) {
        issues.push({ path: `${path}.points`, message: 'At least one vertex is required' });
      }
      shape.points.forEach((point, i) => {
        if (!isFiniteVec3(point)) {
          issues.push({ path: `${path}.points[${i}]`, message: 'Must be three finite numbers' });
        }
      });
      if (shape.center !== undefined && !isFiniteVec3(shape.center)) {
        issues.push({ path: `${path}.center`, message: 'Must be three finite numbers' });
      }
      validateThickness(shape.thickness, path, issues);
      break;

    default:
      issues.push({ path: `${path}.type`, message: 'Unknown spawn shape' });
  }

  return issues;
}
