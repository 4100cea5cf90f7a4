/**
 * import_mesh tool: load a mesh file by URI.
 */

import type { ResourceRetriever } from "@shapekit/core";
import { createMeshFromResource } from "@shapekit/core";
import { uniformVec3 } from "@shapekit/ir";
import { importMeshInput } from "./schema.js";
import { jsonResult, shapeToJson, type ToolResult } from "./types.js";

export async function importMesh(input: unknown, retriever: ResourceRetriever): Promise<ToolResult> {
  const { uri, scale = uniformVec3(1) } = importMeshInput.parse(input);
  const mesh = await createMeshFromResource(uri, scale, retriever);
  if (!mesh) {
    throw new Error(`No mesh could be loaded from ${uri}`);
  }
  return jsonResult({
    vertex_count: mesh.vertexCount,
    triangle_count: mesh.triangleCount,
    shape: shapeToJson(mesh),
  });
}
