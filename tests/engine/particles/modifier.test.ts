import { describe, it, expect, beforeEach } from 'vitest';
import * as THREE from 'three';
import { Curve, Gradient } from '@/engine/particles/Curve';
import {
  applyModifier,
  resolveModifiers,
  validateModifier,
  type CurveLookup,
  type Modifier,
  type ModifierContext,
} from '@/engine/particles/Modifier';
import { NoiseField } from '@/engine/particles/NoiseField';
import { Particle } from '@/engine/particles/ParticlePool';
import type { ModifierConfig } from '@/engine/particles/types';

const context: ModifierContext = { time: 0.75 };

const lookup: CurveLookup = {
  curves: new Map([
    ['grow', Curve.linear(1, 3)],
    ['fade', Curve.linear(1, 0)],
    ['off', Curve.constant(0)],
  ]),
  gradients: new Map([['redToBlue', Gradient.between(new THREE.Color(1, 0, 0), new THREE.Color(0, 0, 1), 1, 0)]]),
};

function only(config: ModifierConfig): Modifier {
  return resolveModifiers([config], lookup, 1)[0];
}

describe('applyModifier', () => {
  let particle: Particle;

  beforeEach(() => {
    particle = new Particle(0);
    particle.alive = true;
    particle.lifetime = 1;
  });

  it('applies gravity to velocity', () => {
    applyModifier(only({ type: 'gravity', acceleration: [0, -10, 0] }), particle, 0.5, context);
    expect(particle.velocity.toArray()).toEqual([0, -5, 0]);
    expect(particle.position.toArray()).toEqual([0, 0, 0]);
  });

  it('decays velocity with drag', () => {
    particle.velocity.set(4, 0, -8);
    applyModifier(only({ type: 'drag', coefficient: 2 }), particle, 0.25, context);
    expect(particle.velocity.toArray()).toEqual([2, 0, -4]);
  });

  it('never reverses velocity with drag on a long frame', () => {
    particle.velocity.set(4, 1, 0);
    applyModifier(only({ type: 'drag', coefficient: 10 }), particle, 1, context);
    expect(particle.velocity.toArray()).toEqual([0, 0, 0]);
  });

  it('integrates position and rotation', () => {
    particle.position.set(1, 0, 0);
    particle.velocity.set(2, 0, -2);
    particle.angularVelocity = 4;
    applyModifier({ type: 'integrate' }, particle, 0.5, context);
    expect(particle.position.toArray()).toEqual([2, 0, -1]);
    expect(particle.rotation).toBe(2);
  });

  it('overwrites size from the curve at normalized age', () => {
    particle.age = 0.5;
    applyModifier(only({ type: 'sizeOverLife', curve: 'grow' }), particle, 0.1, context);
    expect(particle.size).toBe(2);
  });

  it('overwrites alpha from the curve at normalized age', () => {
    particle.age = 0.25;
    applyModifier(only({ type: 'opacityOverLife', curve: 'fade' }), particle, 0.1, context);
    expect(particle.alpha).toBe(0.75);
  });

  it('overwrites color and alpha from the gradient', () => {
    particle.lifetime = 2;
    particle.age = 1;
    applyModifier(only({ type: 'colorOverLife', gradient: 'redToBlue' }), particle, 0.1, context);
    expect(particle.color.r).toBe(0.5);
    expect(particle.color.g).toBe(0);
    expect(particle.color.b).toBe(0.5);
    expect(particle.alpha).toBe(0.5);
  });

  it('adds scaled noise to velocity', () => {
    particle.position.set(0.3, 1.2, -0.8);
    applyModifier(only({ type: 'noiseForce', strength: 2, noise: { seed: 5 } }), particle, 0.5, context);

    const expected = new NoiseField({ seed: 5 }).sample(new THREE.Vector3(0.3, 1.2, -0.8), 0.75);
    expect(particle.velocity.x).toBeCloseTo(expected.x, 12);
    expect(particle.velocity.y).toBeCloseTo(expected.y, 12);
    expect(particle.velocity.z).toBeCloseTo(expected.z, 12);
  });

  it('scales noise by the strength curve', () => {
    particle.velocity.set(1, 2, 3);
    applyModifier(only({ type: 'noiseForce', strength: 5, strengthCurve: 'off' }), particle, 0.5, context);
    expect(particle.velocity.toArray()).toEqual([1, 2, 3]);
  });
});

describe('resolveModifiers', () => {
  it('appends an integrator when none is configured', () => {
    const modifiers = resolveModifiers([{ type: 'gravity', acceleration: [0, -1, 0] }], lookup, 1);
    expect(modifiers.map((m) => m.type)).toEqual(['gravity', 'integrate']);
  });

  it('keeps the configured order, including an explicit integrator', () => {
    const modifiers = resolveModifiers(
      [{ type: 'integrate' }, { type: 'drag', coefficient: 1 }, { type: 'sizeOverLife', curve: 'grow' }],
      lookup,
      1
    );
    expect(modifiers.map((m) => m.type)).toEqual(['integrate', 'drag', 'sizeOverLife']);
  });

  it('derives noise seeds from the system seed and position', () => {
    const modifiers = resolveModifiers(
      [
        { type: 'noiseForce', strength: 1 },
        { type: 'noiseForce', strength: 1 },
        { type: 'noiseForce', strength: 1, noise: { seed: 77 } },
      ],
      lookup,
      10
    );
    const seeds = modifiers.flatMap((m) => (m.type === 'noiseForce' ? [m.field.config.seed] : []));
    expect(seeds).toEqual([10, 11, 77]);
  });
});

describe('validateModifier', () => {
  it('accepts valid modifiers', () => {
    expect(validateModifier({ type: 'colorOverLife', gradient: 'redToBlue' }, lookup, 'modifiers[0]')).toEqual([]);
  });

  it('reports unknown curve names', () => {
    expect(validateModifier({ type: 'sizeOverLife', curve: 'missing' }, lookup, 'modifiers[2]')).toEqual([
      { path: 'modifiers[2].curve', message: 'Unknown curve "missing"' },
    ]);
  });

  it('reports unknown gradient names', () => {
    expect(validateModifier({ type: 'colorOverLife', gradient: 'nope' }, lookup, 'modifiers[0]')).toEqual([
      { path: 'modifiers[0].gradient', message: 'Unknown gradient "nope"' },
    ]);
  });

  it('rejects negative drag', () => {
    expect(validateModifier({ type: 'drag', coefficient: -1 }, lookup, 'modifiers[1]')).toEqual([
      { path: 'modifiers[1].coefficient', message: 'Must be a non-negative number' },
    ]);
  });
});
