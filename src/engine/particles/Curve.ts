/**
 * Keyframed functions of normalized lifetime progress.
 *
 * Curve maps t in [0, 1] to a scalar (size, opacity, rate multipliers);
 * Gradient maps it to an RGBA color. Both are immutable once built and are
 * sampled on the hot path for every live particle, so lookup is a binary
 * search over the keyframe times (O(log n)) with no allocation.
 */

import * as THREE from 'three';
import { clamp, lerp, smoothstep } from '@/utils/math';
import { InvalidCurveError, type ValidationIssue } from './errors';

/**
 * - linear: straight blend between bracketing keyframes
 * - step: hold the earlier keyframe until the next one is reached
 * - smooth: smoothstep-eased blend; eases in and out of every keyframe
 *
 * All three stay inside the convex hull of the keyframe values.
 */
export type Interpolation = 'linear' | 'step' | 'smooth';

export interface CurveKeyframe {
  time: number;
  value: number;
}

export interface CurveDefinition {
  keyframes: readonly CurveKeyframe[];
  interpolation?: Interpolation;
}

export interface GradientKeyframe {
  time: number;
  color: THREE.ColorRepresentation;
  alpha?: number;
}

export interface GradientDefinition {
  keyframes: readonly GradientKeyframe[];
  interpolation?: Interpolation;
}

/** Anything holding an RGB color and an alpha; particles satisfy this directly */
export interface GradientSample {
  color: THREE.Color;
  alpha: number;
}

const INTERPOLATIONS: readonly Interpolation[] = ['linear', 'step', 'smooth'];

/**
 * Validate keyframe times: non-empty, finite, inside [0, 1], strictly increasing.
 */
export function validateKeyframeTimes(times: readonly number[], path: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (times.length === 0) {
    issues.push({ path: `${path}.keyframes`, message: 'At least one keyframe is required' });
    return issues;
  }

  for (let i = 0; i < times.length; i++) {
    const time = times[i];
    if (!Number.isFinite(time) || time < 0 || time > 1) {
      issues.push({ path: `${path}.keyframes[${i}].time`, message: 'Must be a finite number in [0, 1]' });
    } else if (i > 0 && !(time > times[i - 1])) {
      issues.push({ path: `${path}.keyframes[${i}].time`, message: 'Keyframe times must be strictly increasing' });
    }
  }

  return issues;
}

function validateInterpolation(value: Interpolation | undefined, path: string): ValidationIssue[] {
  if (value === undefined || INTERPOLATIONS.includes(value)) return [];
  return [{ path: `${path}.interpolation`, message: `Must be one of ${INTERPOLATIONS.join(', ')}` }];
}

/**
 * Index of the last keyframe whose time is <= t.
 * Callers guarantee times[0] <= t < times[times.length - 1].
 */
function findSegment(times: readonly number[], t: number): number {
  let lo = 0;
  let hi = times.length - 1;
  while (hi - lo > 1) {
    const mid = (lo + hi) >>> 1;
    if (times[mid] <= t) {
      lo = mid;
    } else {
      hi = mid;
    }
  }
  return lo;
}

function segmentWeight(t: number, t0: number, t1: number, interpolation: Interpolation): number {
  if (interpolation === 'step') return 0;
  const w = (t - t0) / (t1 - t0);
  return interpolation === 'smooth' ? smoothstep(w) : w;
}

/** NaN collapses to the start of the curve */
function normalizeT(t: number): number {
  return Number.isNaN(t) ? 0 : clamp(t, 0, 1);
}

export class Curve {
  public readonly interpolation: Interpolation;
  private readonly times: readonly number[];
  private readonly values: readonly number[];

  constructor(definition: CurveDefinition, path: string = 'curve') {
    const times = definition.keyframes.map((k) => k.time);
    const issues = [
      ...validateKeyframeTimes(times, path),
      ...validateInterpolation(definition.interpolation, path),
    ];
    definition.keyframes.forEach((k, i) => {
      if (!Number.isFinite(k.value)) {
        issues.push({ path: `${path}.keyframes[${i}].value`, message: 'Must be a finite number' });
      }
    });
    if (issues.length > 0) {
      throw new InvalidCurveError(issues);
    }

    this.interpolation = definition.interpolation ?? 'linear';
    this.times = Object.freeze(times);
    this.values = Object.freeze(definition.keyframes.map((k) => k.value));
  }

  public static constant(value: number): Curve {
    return new Curve({ keyframes: [{ time: 0, value }] });
  }

  public static linear(from: number, to: number): Curve {
    return new Curve({ keyframes: [{ time: 0, value: from }, { time: 1, value: to }] });
  }

  public get keyframeCount(): number {
    return this.times.length;
  }

  public get keyframes(): CurveKeyframe[] {
    return this.times.map((time, i) => ({ time, value: this.values[i] }));
  }

  public evaluate(t: number): number {
    const x = normalizeT(t);
    const last = this.times.length - 1;

    if (x <= this.times[0]) return this.values[0];
    if (x >= this.times[last]) return this.values[last];

    const i = findSegment(this.times, x);
    const w = segmentWeight(x, this.times[i], this.times[i + 1], this.interpolation);
    return lerp(this.values[i], this.values[i + 1], w);
  }
}

export class Gradient {
  public readonly interpolation: Interpolation;
  private readonly times: readonly number[];
  private readonly colors: readonly THREE.Color[];
  private readonly alphas: readonly number[];

  constructor(definition: GradientDefinition, path: string = 'gradient') {
    const times = definition.keyframes.map((k) => k.time);
    const issues = [
      ...validateKeyframeTimes(times, path),
      ...validateInterpolation(definition.interpolation, path),
    ];
    definition.keyframes.forEach((k, i) => {
      const alpha = k.alpha ?? 1;
      if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
        issues.push({ path: `${path}.keyframes[${i}].alpha`, message: 'Must be a number in [0, 1]' });
      }
    });
    if (issues.length > 0) {
      throw new InvalidCurveError(issues);
    }

    this.interpolation = definition.interpolation ?? 'linear';
    this.times = Object.freeze(times);
    this.colors = Object.freeze(definition.keyframes.map((k) => new THREE.Color(k.color)));
    this.alphas = Object.freeze(definition.keyframes.map((k) => k.alpha ?? 1));
  }

  public static between(
    from: THREE.ColorRepresentation,
    to: THREE.ColorRepresentation,
    fromAlpha: number = 1,
    toAlpha: number = 1
  ): Gradient {
    return new Gradient({
      keyframes: [
        { time: 0, color: from, alpha: fromAlpha },
        { time: 1, color: to, alpha: toAlpha },
      ],
    });
  }

  public get keyframeCount(): number {
    return this.times.length;
  }

  /**
   * Write the color and alpha at t into `out` and return it.
   */
  public evaluate<T extends GradientSample>(t: number, out: T): T {
    const x = normalizeT(t);
    const last = this.times.length - 1;

    if (x <= this.times[0]) {
      out.color.copy(this.colors[0]);
      out.alpha = this.alphas[0];
      return out;
    }
    if (x >= this.times[last]) {
      out.color.copy(this.colors[last]);
      out.alpha = this.alphas[last];
      return out;
    }

    const i = findSegment(this.times, x);
    const w = segmentWeight(x, this.times[i], this.times[i + 1], this.interpolation);
    out.color.lerpColors(this.colors[i], this.colors[i + 1], w);
    out.alpha = lerp(this.alphas[i], this.alphas[i + 1], w);
    return out;
  }
}
