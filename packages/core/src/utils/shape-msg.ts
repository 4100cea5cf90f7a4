import type {
  MeshMsg,
  PlaneMsg,
  Shape,
  ShapeMsg,
  SolidPrimitiveMsg,
  Vec3,
} from "@shapekit/ir";
import {
  createBox,
  createCone,
  createCylinder,
  createPlane,
  createSphere,
  solidPrimitiveDimCount,
  SolidPrimitiveDim,
  SolidPrimitiveType,
} from "@shapekit/ir";
import { createMeshFromVertices, logger, LogSource } from "@shapekit/engine";

/** Dimension array of exactly the size the primitive kind requires. */
function dimensionsFor(type: number): number[] {
  return new Array<number>(solidPrimitiveDimCount(type)).fill(0);
}

/**
 * Construct the interchange message for a shape.
 * Returns null for shapes with no message form (octrees).
 */
export function constructMsgFromShape(shape: Shape): ShapeMsg | null {
  switch (shape.type) {
    case "sphere": {
      const dimensions = dimensionsFor(SolidPrimitiveType.SPHERE);
      dimensions[SolidPrimitiveDim.SPHERE_RADIUS] = shape.radius;
      return { kind: "SolidPrimitive", type: SolidPrimitiveType.SPHERE, dimensions };
    }

    case "box": {
      const dimensions = dimensionsFor(SolidPrimitiveType.BOX);
      dimensions[SolidPrimitiveDim.BOX_X] = shape.size[0];
      dimensions[SolidPrimitiveDim.BOX_Y] = shape.size[1];
      dimensions[SolidPrimitiveDim.BOX_Z] = shape.size[2];
      return { kind: "SolidPrimitive", type: SolidPrimitiveType.BOX, dimensions };
    }

    case "cylinder": {
      const dimensions = dimensionsFor(SolidPrimitiveType.CYLINDER);
      dimensions[SolidPrimitiveDim.CYLINDER_RADIUS] = shape.radius;
      dimensions[SolidPrimitiveDim.CYLINDER_HEIGHT] = shape.length;
      return { kind: "SolidPrimitive", type: SolidPrimitiveType.CYLINDER, dimensions };
    }

    case "cone": {
      const dimensions = dimensionsFor(SolidPrimitiveType.CONE);
      dimensions[SolidPrimitiveDim.CONE_RADIUS] = shape.radius;
      dimensions[SolidPrimitiveDim.CONE_HEIGHT] = shape.length;
      return { kind: "SolidPrimitive", type: SolidPrimitiveType.CONE, dimensions };
    }

    case "plane":
      return { kind: "Plane", coef: [shape.a, shape.b, shape.c, shape.d] };

    case "mesh": {
      const msg: MeshMsg = { kind: "Mesh", triangles: [], vertices: [] };
      for (let i = 0; i < shape.vertexCount; i++) {
        const i3 = i * 3;
        msg.vertices.push({
          x: shape.vertices[i3],
          y: shape.vertices[i3 + 1],
          z: shape.vertices[i3 + 2],
        });
      }
      for (let i = 0; i < shape.triangleCount; i++) {
        const i3 = i * 3;
        msg.triangles.push({
          vertex_indices: [shape.triangles[i3], shape.triangles[i3 + 1], shape.triangles[i3 + 2]],
        });
      }
      return msg;
    }

    case "octree":
      logger.error(LogSource.MSG, `Unable to construct shape message for shape of type ${shape.type}`);
      return null;
  }
}

/**
 * Construct the shape for a solid primitive message.
 *
 * Every dimension index the kind reads must be present; extra entries are
 * ignored. Returns null for an unknown kind or missing dimensions.
 */
export function constructShapeFromSolidPrimitive(msg: SolidPrimitiveMsg): Shape | null {
  const d = msg.dimensions;
  const has = (index: number) => d.length > index;
  let shape: Shape | null = null;

  switch (msg.type) {
    case SolidPrimitiveType.SPHERE:
      if (has(SolidPrimitiveDim.SPHERE_RADIUS)) {
        shape = createSphere(d[SolidPrimitiveDim.SPHERE_RADIUS]);
      }
      break;
    case SolidPrimitiveType.BOX:
      if (has(SolidPrimitiveDim.BOX_X) && has(SolidPrimitiveDim.BOX_Y) && has(SolidPrimitiveDim.BOX_Z)) {
        shape = createBox(d[SolidPrimitiveDim.BOX_X], d[SolidPrimitiveDim.BOX_Y], d[SolidPrimitiveDim.BOX_Z]);
      }
      break;
    case SolidPrimitiveType.CYLINDER:
      if (has(SolidPrimitiveDim.CYLINDER_RADIUS) && has(SolidPrimitiveDim.CYLINDER_HEIGHT)) {
        shape = createCylinder(d[SolidPrimitiveDim.CYLINDER_RADIUS], d[SolidPrimitiveDim.CYLINDER_HEIGHT]);
      }
      break;
    case SolidPrimitiveType.CONE:
      if (has(SolidPrimitiveDim.CONE_RADIUS) && has(SolidPrimitiveDim.CONE_HEIGHT)) {
        shape = createCone(d[SolidPrimitiveDim.CONE_RADIUS], d[SolidPrimitiveDim.CONE_HEIGHT]);
      }
      break;
  }

  if (shape === null) {
    logger.error(
      LogSource.MSG,
      `Unable to construct shape corresponding to solid primitive of type ${msg.type} ` +
        `with ${d.length} dimension(s)`,
    );
  }
  return shape;
}

export function constructShapeFromPlaneMsg(msg: PlaneMsg): Shape {
  return createPlane(msg.coef[0], msg.coef[1], msg.coef[2], msg.coef[3]);
}

/**
 * Construct a mesh from a mesh message. The message is taken as already
 * indexed, so vertices are not merged. Returns null when either list is empty.
 */
export function constructShapeFromMeshMsg(msg: MeshMsg): Shape | null {
  if (msg.triangles.length === 0 || msg.vertices.length === 0) {
    logger.warn(LogSource.MSG, "Mesh definition is empty");
    return null;
  }

  const vertices: Vec3[] = msg.vertices.map((v) => ({ x: v.x, y: v.y, z: v.z }));
  const triangles: number[] = [];
  for (const triangle of msg.triangles) {
    triangles.push(triangle.vertex_indices[0], triangle.vertex_indices[1], triangle.vertex_indices[2]);
  }
  return createMeshFromVertices(vertices, triangles);
}

/** Construct the shape that corresponds to any message kind. */
export function constructShapeFromMsg(msg: ShapeMsg): Shape | null {
  switch (msg.kind) {
    case "SolidPrimitive":
      return constructShapeFromSolidPrimitive(msg);
    case "Plane":
      return constructShapeFromPlaneMsg(msg);
    case "Mesh":
      return constructShapeFromMeshMsg(msg);
  }
}
