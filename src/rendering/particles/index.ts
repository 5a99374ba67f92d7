export {
  buildGeometry,
  toBufferGeometry,
  QUAD_ATTRIBUTES,
  INSTANCE_ATTRIBUTES,
} from './GeometryBuffer';
export type {
  GeometryAttribute,
  GeometryAttributeName,
  GeometryBuffer,
  GeometryLayout,
} from './GeometryBuffer';
