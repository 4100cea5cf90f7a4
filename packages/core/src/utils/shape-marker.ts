import type { Extents, Marker, Result, Shape, ShapeMsg } from "@shapekit/ir";
import { uniformVec3 } from "@shapekit/ir";
import {
  constructMarkerFromMeshMsg,
  constructMarkerFromSolidPrimitive,
  getShapeMsgExtents,
  logger,
  LogSource,
} from "@shapekit/engine";
import { constructMsgFromShape } from "./shape-msg.js";

function markerFromMsg(msg: ShapeMsg, useMeshTriangleList: boolean): Result<Marker> {
  switch (msg.kind) {
    case "Plane":
      return { ok: false, error: "No visual markers can be constructed for planes" };
    case "Mesh":
      return constructMarkerFromMeshMsg(msg, useMeshTriangleList);
    case "SolidPrimitive":
      return constructMarkerFromSolidPrimitive(msg);
  }
}

/**
 * Construct the visualization marker for a shape.
 *
 * The shape goes through its interchange message first. Planes, cones and
 * octrees have no marker and come back as a failed result.
 */
export function constructMarkerFromShape(shape: Shape, useMeshTriangleList = false): Result<Marker> {
  const msg = constructMsgFromShape(shape);
  if (!msg) {
    return { ok: false, error: `No shape message for shape of type ${shape.type}` };
  }

  const result = markerFromMsg(msg, useMeshTriangleList);
  if (!result.ok) {
    logger.error(LogSource.MARKER, result.error);
  }
  return result;
}

/** Extents of a message. Planes report zero. */
export function computeShapeMsgExtents(msg: ShapeMsg): Extents {
  return getShapeMsgExtents(msg);
}

/** Extents of a shape; zero when the shape has no message form. */
export function computeShapeExtents(shape: Shape): Extents {
  const msg = constructMsgFromShape(shape);
  return msg ? computeShapeMsgExtents(msg) : uniformVec3(0);
}
