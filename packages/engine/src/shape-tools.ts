/**
 * Extents and visualization markers computed from interchange messages.
 */

import type { Extents, Marker, MeshMsg, Result, ShapeMsg, SolidPrimitiveMsg, Vec3 } from "@shapekit/ir";
import { MarkerType, SolidPrimitiveDim, SolidPrimitiveType, uniformVec3 } from "@shapekit/ir";

/** True when `dims` has an entry at every given index. */
function hasDims(msg: SolidPrimitiveMsg, ...indices: number[]): boolean {
  return indices.every((i) => msg.dimensions.length > i);
}

/** Axis-aligned size of a solid primitive; zero when under-specified. */
export function getSolidPrimitiveExtents(msg: SolidPrimitiveMsg): Extents {
  const d = msg.dimensions;
  switch (msg.type) {
    case SolidPrimitiveType.SPHERE:
      if (hasDims(msg, SolidPrimitiveDim.SPHERE_RADIUS)) {
        return uniformVec3(d[SolidPrimitiveDim.SPHERE_RADIUS] * 2);
      }
      break;
    case SolidPrimitiveType.BOX:
      if (hasDims(msg, SolidPrimitiveDim.BOX_X, SolidPrimitiveDim.BOX_Y, SolidPrimitiveDim.BOX_Z)) {
        return {
          x: d[SolidPrimitiveDim.BOX_X],
          y: d[SolidPrimitiveDim.BOX_Y],
          z: d[SolidPrimitiveDim.BOX_Z],
        };
      }
      break;
    case SolidPrimitiveType.CYLINDER:
      if (hasDims(msg, SolidPrimitiveDim.CYLINDER_RADIUS, SolidPrimitiveDim.CYLINDER_HEIGHT)) {
        const diameter = d[SolidPrimitiveDim.CYLINDER_RADIUS] * 2;
        return { x: diameter, y: diameter, z: d[SolidPrimitiveDim.CYLINDER_HEIGHT] };
      }
      break;
    case SolidPrimitiveType.CONE:
      if (hasDims(msg, SolidPrimitiveDim.CONE_RADIUS, SolidPrimitiveDim.CONE_HEIGHT)) {
        const diameter = d[SolidPrimitiveDim.CONE_RADIUS] * 2;
        return { x: diameter, y: diameter, z: d[SolidPrimitiveDim.CONE_HEIGHT] };
      }
      break;
  }
  return uniformVec3(0);
}

/** Per-axis `max - min` over the mesh vertices. */
export function getMeshMsgExtents(msg: MeshMsg): Extents {
  if (msg.vertices.length === 0) {
    return uniformVec3(0);
  }

  const min = { ...msg.vertices[0] };
  const max = { ...msg.vertices[0] };
  for (const v of msg.vertices) {
    min.x = Math.min(min.x, v.x);
    min.y = Math.min(min.y, v.y);
    min.z = Math.min(min.z, v.z);
    max.x = Math.max(max.x, v.x);
    max.y = Math.max(max.y, v.y);
    max.z = Math.max(max.z, v.z);
  }
  return { x: max.x - min.x, y: max.y - min.y, z: max.z - min.z };
}

/** Extents of any message kind. A plane has no finite size and reports zero. */
export function getShapeMsgExtents(msg: ShapeMsg): Extents {
  switch (msg.kind) {
    case "SolidPrimitive":
      return getSolidPrimitiveExtents(msg);
    case "Mesh":
      return getMeshMsgExtents(msg);
    case "Plane":
      return uniformVec3(0);
  }
}

/** Marker for a sphere, box or cylinder. */
export function constructMarkerFromSolidPrimitive(msg: SolidPrimitiveMsg): Result<Marker> {
  const d = msg.dimensions;
  switch (msg.type) {
    case SolidPrimitiveType.SPHERE:
      if (!hasDims(msg, SolidPrimitiveDim.SPHERE_RADIUS)) {
        return { ok: false, error: "Insufficient dimensions in sphere definition" };
      }
      return {
        ok: true,
        value: {
          type: MarkerType.SPHERE,
          scale: uniformVec3(d[SolidPrimitiveDim.SPHERE_RADIUS] * 2),
          points: [],
        },
      };

    case SolidPrimitiveType.BOX:
      if (!hasDims(msg, SolidPrimitiveDim.BOX_X, SolidPrimitiveDim.BOX_Y, SolidPrimitiveDim.BOX_Z)) {
        return { ok: false, error: "Insufficient dimensions in box definition" };
      }
      return {
        ok: true,
        value: {
          type: MarkerType.CUBE,
          scale: {
            x: d[SolidPrimitiveDim.BOX_X],
            y: d[SolidPrimitiveDim.BOX_Y],
            z: d[SolidPrimitiveDim.BOX_Z],
          },
          points: [],
        },
      };

    case SolidPrimitiveType.CYLINDER: {
      if (!hasDims(msg, SolidPrimitiveDim.CYLINDER_RADIUS, SolidPrimitiveDim.CYLINDER_HEIGHT)) {
        return { ok: false, error: "Insufficient dimensions in cylinder definition" };
      }
      const diameter = d[SolidPrimitiveDim.CYLINDER_RADIUS] * 2;
      return {
        ok: true,
        value: {
          type: MarkerType.CYLINDER,
          scale: { x: diameter, y: diameter, z: d[SolidPrimitiveDim.CYLINDER_HEIGHT] },
          points: [],
        },
      };
    }

    case SolidPrimitiveType.CONE:
      return { ok: false, error: "No visual markers can be constructed for cones" };

    default:
      return { ok: false, error: `Unknown solid primitive type: ${msg.type}` };
  }
}

/**
 * Marker for a mesh, either as a filled triangle list or as the wireframe
 * of its triangle edges. A mesh without vertices or triangles has no marker.
 */
export function constructMarkerFromMeshMsg(msg: MeshMsg, useTriangleList = false): Result<Marker> {
  if (msg.vertices.length === 0 || msg.triangles.length === 0) {
    return { ok: false, error: "Mesh definition is empty" };
  }

  const points: Vec3[] = [];
  const vertex = (index: number): Vec3 | null => {
    const v = msg.vertices[index];
    return v ? { x: v.x, y: v.y, z: v.z } : null;
  };

  for (const triangle of msg.triangles) {
    const [i0, i1, i2] = triangle.vertex_indices;
    const a = vertex(i0);
    const b = vertex(i1);
    const c = vertex(i2);
    if (!a || !b || !c) {
      return { ok: false, error: `Mesh triangle references a vertex outside 0..${msg.vertices.length - 1}` };
    }
    if (useTriangleList) {
      points.push(a, b, c);
    } else {
      points.push(a, b, b, c, c, a);
    }
  }

  return {
    ok: true,
    value: useTriangleList
      ? { type: MarkerType.TRIANGLE_LIST, scale: uniformVec3(1), points }
      : { type: MarkerType.LINE_LIST, scale: uniformVec3(0.01), points },
  };
}
