/**
 * @shapekit/ir: Shape values, interchange messages and visualization markers.
 *
 * Everything here is plain data. Algorithms that build or convert these
 * values live in `@shapekit/engine` and `@shapekit/core`.
 */

/** 3D vector with f64 components. */
export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/** Create a vector with the same value on every axis. */
export function uniformVec3(value: number): Vec3 {
  return { x: value, y: value, z: value };
}

// --- Shape discriminated union ---

export interface Sphere {
  readonly type: "sphere";
  readonly radius: number;
}

export interface Box {
  readonly type: "box";
  /** Full length along X, Y and Z. */
  readonly size: readonly [number, number, number];
}

export interface Cylinder {
  readonly type: "cylinder";
  readonly radius: number;
  readonly length: number;
}

export interface Cone {
  readonly type: "cone";
  readonly radius: number;
  readonly length: number;
}

/** Infinite plane `a*x + b*y + c*z + d = 0`. */
export interface Plane {
  readonly type: "plane";
  readonly a: number;
  readonly b: number;
  readonly c: number;
  readonly d: number;
}

/**
 * Triangle mesh with flat, interleaved buffers.
 *
 * `vertices` holds `3 * vertexCount` coordinates (x, y, z per vertex) and
 * `triangles` holds `3 * triangleCount` vertex indices. Both are allocated
 * once at their final size.
 */
export interface Mesh {
  readonly type: "mesh";
  readonly vertexCount: number;
  readonly triangleCount: number;
  readonly vertices: Float64Array;
  readonly triangles: Uint32Array;
  /** Unit normal per triangle, `3 * triangleCount` entries. */
  readonly triangleNormals?: Float64Array;
  /** Unit normal per vertex, `3 * vertexCount` entries. */
  readonly vertexNormals?: Float64Array;
}

/** Volumetric occupancy tree. The payload is carried through untouched. */
export interface OcTree {
  readonly type: "octree";
  readonly octree: unknown;
}

/** A rigid geometric shape. */
export type Shape = Sphere | Box | Cylinder | Cone | Plane | Mesh | OcTree;

export type ShapeType = Shape["type"];

/** Case-sensitive string names, as written by the text encoding. */
export const SHAPE_TYPES: readonly ShapeType[] = [
  "sphere",
  "box",
  "cylinder",
  "cone",
  "plane",
  "mesh",
  "octree",
];

const SHAPE_TYPE_SET: ReadonlySet<string> = new Set(SHAPE_TYPES);

export function isShapeType(tag: string): tag is ShapeType {
  return SHAPE_TYPE_SET.has(tag);
}

/** String name of a shape, or `""` when there is no shape. */
export function shapeStringName(shape: Shape | null | undefined): string {
  return shape ? shape.type : "";
}

export function createSphere(radius: number): Sphere {
  return { type: "sphere", radius };
}

export function createBox(x: number, y: number, z: number): Box {
  return { type: "box", size: [x, y, z] };
}

export function createCylinder(radius: number, length: number): Cylinder {
  return { type: "cylinder", radius, length };
}

export function createCone(radius: number, length: number): Cone {
  return { type: "cone", radius, length };
}

export function createPlane(a: number, b: number, c: number, d: number): Plane {
  return { type: "plane", a, b, c, d };
}

export function createOcTree(octree: unknown): OcTree {
  return { type: "octree", octree };
}

/** Zero-filled buffers for a mesh of the given size. */
export interface MeshBuffers {
  vertices: Float64Array;
  triangles: Uint32Array;
}

export function allocateMeshBuffers(vertexCount: number, triangleCount: number): MeshBuffers {
  return {
    vertices: new Float64Array(vertexCount * 3),
    triangles: new Uint32Array(triangleCount * 3),
  };
}

// --- Interchange messages ---

/** Primitive kind tags carried by `SolidPrimitiveMsg.type`. */
export const SolidPrimitiveType = {
  BOX: 1,
  SPHERE: 2,
  CYLINDER: 3,
  CONE: 4,
} as const;

/** Indices into `SolidPrimitiveMsg.dimensions`, fixed per kind. */
export const SolidPrimitiveDim = {
  BOX_X: 0,
  BOX_Y: 1,
  BOX_Z: 2,
  SPHERE_RADIUS: 0,
  CYLINDER_HEIGHT: 0,
  CYLINDER_RADIUS: 1,
  CONE_HEIGHT: 0,
  CONE_RADIUS: 1,
} as const;

/** Number of dimensions a primitive kind carries; 0 for an unknown kind. */
export function solidPrimitiveDimCount(type: number): number {
  switch (type) {
    case SolidPrimitiveType.SPHERE:
      return 1;
    case SolidPrimitiveType.BOX:
      return 3;
    case SolidPrimitiveType.CYLINDER:
    case SolidPrimitiveType.CONE:
      return 2;
    default:
      return 0;
  }
}

export interface SolidPrimitiveMsg {
  kind: "SolidPrimitive";
  type: number;
  dimensions: number[];
}

export interface PlaneMsg {
  kind: "Plane";
  coef: [number, number, number, number];
}

export interface MeshTriangleMsg {
  vertex_indices: [number, number, number];
}

export interface MeshMsg {
  kind: "Mesh";
  triangles: MeshTriangleMsg[];
  vertices: Vec3[];
}

/** Tagged interchange message for a shape. */
export type ShapeMsg = SolidPrimitiveMsg | PlaneMsg | MeshMsg;

export type ShapeMsgKind = ShapeMsg["kind"];

// --- Visualization markers ---

export const MarkerType = {
  ARROW: 0,
  CUBE: 1,
  SPHERE: 2,
  CYLINDER: 3,
  LINE_STRIP: 4,
  LINE_LIST: 5,
  CUBE_LIST: 6,
  SPHERE_LIST: 7,
  POINTS: 8,
  TEXT_VIEW_FACING: 9,
  MESH_RESOURCE: 10,
  TRIANGLE_LIST: 11,
} as const;

export type MarkerTypeValue = (typeof MarkerType)[keyof typeof MarkerType];

/** Geometry part of a visualization marker. */
export interface Marker {
  type: MarkerTypeValue;
  scale: Vec3;
  points: Vec3[];
}

export function createMarker(): Marker {
  return { type: MarkerType.ARROW, scale: uniformVec3(0), points: [] };
}

/** Axis-aligned size of a shape along X, Y and Z. */
export type Extents = Vec3;

/** Outcome of an operation that can fail without throwing. */
export type Result<T> = { ok: true; value: T } | { ok: false; error: string };
