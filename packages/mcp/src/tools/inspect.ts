/**
 * shape_extents / shape_marker tools: query geometry for display.
 */

import { computeShapeExtents, constructMarkerFromShape } from "@shapekit/core";
import { markerInput, shapeInput } from "./schema.js";
import { jsonResult, shapeFromJson, type ToolResult } from "./types.js";

export function shapeExtents(input: unknown): ToolResult {
  const { shape } = shapeInput.parse(input);
  return jsonResult(computeShapeExtents(shapeFromJson(shape)));
}

export function shapeMarker(input: unknown): ToolResult {
  const { shape, use_mesh_triangle_list } = markerInput.parse(input);
  const result = constructMarkerFromShape(shapeFromJson(shape), use_mesh_triangle_list);
  if (!result.ok) {
    throw new Error(result.error);
  }
  return jsonResult(result.value);
}
