import { describe, it, expect } from 'vitest';
import { GEOMETRY } from '@/data/particles.config';
import { ParticlePool } from '@/engine/particles/ParticlePool';
import {
  buildGeometry,
  toBufferGeometry,
  INSTANCE_ATTRIBUTES,
  QUAD_ATTRIBUTES,
} from '@/rendering/particles/GeometryBuffer';

function fillPool(capacity: number, count: number): ParticlePool {
  const pool = new ParticlePool(capacity);
  for (let i = 0; i < count; i++) {
    const handle = pool.allocate();
    if (handle === null) throw new Error('pool unexpectedly saturated');
    const particle = pool.particleAt(i);
    particle.position.set(i + 1, 2, -3);
    particle.color.setRGB(1, 0.5, 0.25);
    particle.alpha = 0.75;
    particle.size = 2;
    particle.rotation = 0.5;
  }
  return pool;
}

describe('buildGeometry', () => {
  describe('quad layout', () => {
    it('emits four vertices and six indices per particle', () => {
      for (const count of [0, 1, 16]) {
        const buffer = buildGeometry(fillPool(16, count), 'quad');
        expect(buffer.particleCount).toBe(count);
        expect(buffer.vertexCount).toBe(count * 4);
        expect(buffer.indexCount).toBe(count * 6);
        expect(buffer.vertices.length).toBe(count * 4 * GEOMETRY.QUAD_FLOATS_PER_VERTEX);
        expect(buffer.indices.length).toBe(count * 6);
      }
    });

    it('writes the documented vertex layout', () => {
      const buffer = buildGeometry(fillPool(4, 1));

      expect(buffer.layout).toBe('quad');
      expect(buffer.stride).toBe(11);
      expect(buffer.byteStride).toBe(44);
      expect(Array.from(buffer.vertices.subarray(0, 11))).toEqual([1, 2, -3, -0.5, -0.5, 1, 0.5, 0.25, 0.75, 2, 0.5]);
      expect(Array.from(buffer.vertices.subarray(11, 16))).toEqual([1, 2, -3, 0.5, -0.5]);
      expect(Array.from(buffer.vertices.subarray(22, 27))).toEqual([1, 2, -3, 0.5, 0.5]);
      expect(Array.from(buffer.vertices.subarray(33, 38))).toEqual([1, 2, -3, -0.5, 0.5]);
    });

    it('offsets the index pattern per quad', () => {
      const buffer = buildGeometry(fillPool(4, 2));
      expect(Array.from(buffer.indices)).toEqual([0, 1, 2, 0, 2, 3, 4, 5, 6, 4, 6, 7]);
    });

    it('describes attribute offsets matching the data', () => {
      expect(QUAD_ATTRIBUTES.map((a) => [a.name, a.components, a.offset])).toEqual([
        ['position', 3, 0],
        ['corner', 2, 3],
        ['color', 4, 5],
        ['size', 1, 9],
        ['rotation', 1, 10],
      ]);
    });

    it('skips dead slots', () => {
      const pool = fillPool(4, 3);
      pool.freeAt(1);
      const buffer = buildGeometry(pool);

      expect(buffer.particleCount).toBe(2);
      expect(buffer.vertices[0]).toBe(1);
      expect(buffer.vertices[4 * GEOMETRY.QUAD_FLOATS_PER_VERTEX]).toBe(3);
    });
  });

  describe('instanced layout', () => {
    it('emits one record per particle and no indices', () => {
      for (const count of [0, 1, 8]) {
        const buffer = buildGeometry(fillPool(8, count), 'instanced');
        expect(buffer.vertexCount).toBe(count);
        expect(buffer.vertices.length).toBe(count * GEOMETRY.INSTANCE_FLOATS_PER_PARTICLE);
        expect(buffer.indexCount).toBe(0);
        expect(buffer.indices.length).toBe(0);
      }
    });

    it('writes the documented instance layout', () => {
      const buffer = buildGeometry(fillPool(4, 2), 'instanced');

      expect(buffer.byteStride).toBe(36);
      expect(Array.from(buffer.vertices)).toEqual([1, 2, -3, 1, 0.5, 0.25, 0.75, 2, 0.5, 2, 2, -3, 1, 0.5, 0.25, 0.75, 2, 0.5]);
      expect(INSTANCE_ATTRIBUTES.map((a) => a.offset)).toEqual([0, 3, 7, 8]);
    });
  });

  it('regenerates a fresh buffer on every call', () => {
    const pool = fillPool(4, 1);
    const first = buildGeometry(pool);
    pool.particleAt(0).position.x = 9;
    const second = buildGeometry(pool);

    expect(second.vertices).not.toBe(first.vertices);
    expect(first.vertices[0]).toBe(1);
    expect(second.vertices[0]).toBe(9);
  });
});

describe('toBufferGeometry', () => {
  it('wraps quads in an indexed interleaved geometry', () => {
    const geometry = toBufferGeometry(buildGeometry(fillPool(4, 2)));

    expect(geometry.getAttribute('position').count).toBe(8);
    expect(geometry.getAttribute('position').itemSize).toBe(3);
    expect(geometry.getAttribute('color').itemSize).toBe(4);
    expect(geometry.getIndex()?.count).toBe(12);
  });

  it('wraps instances as per-instance attributes', () => {
    const geometry = toBufferGeometry(buildGeometry(fillPool(4, 3), 'instanced'));

    expect(geometry.getAttribute('instancePosition').count).toBe(3);
    expect(geometry.getAttribute('instanceRotation').itemSize).toBe(1);
    expect(geometry.getIndex()).toBeNull();
  });
});
