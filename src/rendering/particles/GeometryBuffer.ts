/**
 * GeometryBuffer - renderer-ready vertex data for live particles
 *
 * Rebuilt from scratch on every call: counts and positions churn every
 * frame, so there is nothing worth patching incrementally. The layout
 * (attribute order, float offsets, stride) is the contract host binding
 * code is written against; see GEOMETRY in particles.config.
 */

import * as THREE from 'three';
import { GEOMETRY } from '@/data/particles.config';
import type { Particle, ParticlePool } from '@/engine/particles/ParticlePool';
import { debugGeometry } from '@/utils/debugLogger';

export type GeometryLayout = 'quad' | 'instanced';

export type GeometryAttributeName = 'position' | 'corner' | 'color' | 'size' | 'rotation';

export interface GeometryAttribute {
  name: GeometryAttributeName;
  /** Floats per element */
  components: number;
  /** Offset in floats from the start of a vertex/instance record */
  offset: number;
}

export interface GeometryBuffer {
  layout: GeometryLayout;
  vertices: Float32Array;
  /** Triangle list for quads; empty for instanced records */
  indices: Uint32Array;
  vertexCount: number;
  indexCount: number;
  particleCount: number;
  /** Floats per vertex/instance record */
  stride: number;
  byteStride: number;
  attributes: readonly GeometryAttribute[];
}

export const QUAD_ATTRIBUTES: readonly GeometryAttribute[] = [
  { name: 'position', components: 3, offset: 0 },
  { name: 'corner', components: 2, offset: 3 },
  { name: 'color', components: 4, offset: 5 },
  { name: 'size', components: 1, offset: 9 },
  { name: 'rotation', components: 1, offset: 10 },
];

export const INSTANCE_ATTRIBUTES: readonly GeometryAttribute[] = [
  { name: 'position', components: 3, offset: 0 },
  { name: 'color', components: 4, offset: 3 },
  { name: 'size', components: 1, offset: 7 },
  { name: 'rotation', components: 1, offset: 8 },
];

/** Writes color, size and rotation; shared by both layouts */
function writeAppearance(vertices: Float32Array, offset: number, particle: Particle): void {
  vertices[offset] = particle.color.r;
  vertices[offset + 1] = particle.color.g;
  vertices[offset + 2] = particle.color.b;
  vertices[offset + 3] = particle.alpha;
  vertices[offset + 4] = particle.size;
  vertices[offset + 5] = particle.rotation;
}

function buildQuads(pool: ParticlePool): GeometryBuffer {
  const particleCount = pool.liveCount;
  const stride = GEOMETRY.QUAD_FLOATS_PER_VERTEX;
  const vertexCount = particleCount * GEOMETRY.QUAD_VERTICES_PER_PARTICLE;
  const indexCount = particleCount * GEOMETRY.QUAD_INDICES_PER_PARTICLE;
  const vertices = new Float32Array(vertexCount * stride);
  const indices = new Uint32Array(indexCount);

  let quad = 0;
  pool.forEachLive((particle) => {
    const baseVertex = quad * GEOMETRY.QUAD_VERTICES_PER_PARTICLE;

    for (let c = 0; c < GEOMETRY.QUAD_VERTICES_PER_PARTICLE; c++) {
      const o = (baseVertex + c) * stride;
      const [cx, cy] = GEOMETRY.QUAD_CORNERS[c];
      vertices[o] = particle.position.x;
      vertices[o + 1] = particle.position.y;
      vertices[o + 2] = particle.position.z;
      vertices[o + 3] = cx;
      vertices[o + 4] = cy;
      writeAppearance(vertices, o + 5, particle);
    }

    const baseIndex = quad * GEOMETRY.QUAD_INDICES_PER_PARTICLE;
    for (let k = 0; k < GEOMETRY.QUAD_INDICES_PER_PARTICLE; k++) {
      indices[baseIndex + k] = baseVertex + GEOMETRY.QUAD_INDEX_PATTERN[k];
    }
    quad++;
  });

  return {
    layout: 'quad',
    vertices,
    indices,
    vertexCount,
    indexCount,
    particleCount,
    stride,
    byteStride: stride * GEOMETRY.BYTES_PER_FLOAT,
    attributes: QUAD_ATTRIBUTES,
  };
}

function buildInstances(pool: ParticlePool): GeometryBuffer {
  const particleCount = pool.liveCount;
  const stride = GEOMETRY.INSTANCE_FLOATS_PER_PARTICLE;
  const vertices = new Float32Array(particleCount * stride);

  let instance = 0;
  pool.forEachLive((particle) => {
    const o = instance * stride;
    vertices[o] = particle.position.x;
    vertices[o + 1] = particle.position.y;
    vertices[o + 2] = particle.position.z;
    writeAppearance(vertices, o + 3, particle);
    instance++;
  });

  return {
    layout: 'instanced',
    vertices,
    indices: new Uint32Array(0),
    vertexCount: particleCount,
    indexCount: 0,
    particleCount,
    stride,
    byteStride: stride * GEOMETRY.BYTES_PER_FLOAT,
    attributes: INSTANCE_ATTRIBUTES,
  };
}

/**
 * Read-only pass over the live particles of `pool`.
 */
export function buildGeometry(pool: ParticlePool, layout: GeometryLayout = 'quad'): GeometryBuffer {
  const buffer = layout === 'quad' ? buildQuads(pool) : buildInstances(pool);
  debugGeometry.log(`GeometryBuffer: ${buffer.particleCount} particles -> ${buffer.vertexCount} ${layout} records`);
  return buffer;
}

/**
 * Wrap a GeometryBuffer for three.js hosts. The vertex array is shared, not
 * copied. Instanced buffers come back as an InstancedBufferGeometry with
 * per-instance attributes; the host adds its own quad.
 */
export function toBufferGeometry(buffer: GeometryBuffer): THREE.BufferGeometry {
  if (buffer.layout === 'instanced') {
    const geometry = new THREE.InstancedBufferGeometry();
    const interleaved = new THREE.InstancedInterleavedBuffer(buffer.vertices, buffer.stride, 1);
    for (const attribute of buffer.attributes) {
      geometry.setAttribute(
        `instance${attribute.name[0].toUpperCase()}${attribute.name.slice(1)}`,
        new THREE.InterleavedBufferAttribute(interleaved, attribute.components, attribute.offset)
      );
    }
    geometry.instanceCount = buffer.particleCount;
    return geometry;
  }

  const geometry = new THREE.BufferGeometry();
  const interleaved = new THREE.InterleavedBuffer(buffer.vertices, buffer.stride);
  for (const attribute of buffer.attributes) {
    geometry.setAttribute(
      attribute.name,
      new THREE.InterleavedBufferAttribute(interleaved, attribute.components, attribute.offset)
    );
  }
  geometry.setIndex(new THREE.BufferAttribute(buffer.indices, 1));
  return geometry;
}
