/**
 * Shared tool result shape and Shape <-> JSON conversion.
 */

import type { Shape, Vec3 } from "@shapekit/ir";
import { createBox, createOcTree } from "@shapekit/ir";
import { createMeshFromVertices } from "@shapekit/core";
import type { ShapeJson } from "./schema.js";

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

export function jsonResult(value: unknown): ToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value) }] };
}

export function shapeToJson(shape: Shape): ShapeJson {
  switch (shape.type) {
    case "mesh":
      return {
        type: "mesh",
        vertices: Array.from(shape.vertices),
        triangles: Array.from(shape.triangles),
      };
    case "box":
      return { type: "box", size: [shape.size[0], shape.size[1], shape.size[2]] };
    default:
      return { ...shape };
  }
}

/**
 * Build a shape from validated JSON. Mesh buffers are checked here since,
 * unlike messages, tool input is not trusted to be well indexed.
 */
export function shapeFromJson(json: ShapeJson): Shape {
  switch (json.type) {
    case "mesh": {
      if (json.vertices.length % 3 !== 0 || json.triangles.length % 3 !== 0) {
        throw new Error("Mesh vertices and triangles must both have a multiple of 3 entries");
      }
      const vertexCount = json.vertices.length / 3;
      const bad = json.triangles.find((i) => i >= vertexCount);
      if (bad !== undefined) {
        throw new Error(`Triangle index ${bad} is out of range for ${vertexCount} vertices`);
      }
      const vertices: Vec3[] = [];
      for (let i = 0; i < json.vertices.length; i += 3) {
        vertices.push({ x: json.vertices[i], y: json.vertices[i + 1], z: json.vertices[i + 2] });
      }
      return createMeshFromVertices(vertices, json.triangles);
    }
    case "box":
      return createBox(json.size[0], json.size[1], json.size[2]);
    case "octree":
      return createOcTree(json.octree);
    default:
      return { ...json };
  }
}
