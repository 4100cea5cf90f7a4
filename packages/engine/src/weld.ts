import type { Mesh, Vec3 } from "@shapekit/ir";
import { allocateMeshBuffers } from "@shapekit/ir";
import { finalizeMesh } from "./mesh.js";
import { logger, LogSource } from "./logger.js";

/** A unique vertex and the output index it was assigned. */
interface LocalVertex {
  x: number;
  y: number;
  z: number;
  index: number;
}

/**
 * Build a mesh from vertices and explicit triangle indices.
 *
 * Triangle k uses `triangles[3k]`, `triangles[3k + 1]` and `triangles[3k + 2]`.
 * Indices are copied as given and must already be valid; a trailing partial
 * triangle is ignored.
 */
export function createMeshFromVertices(vertices: readonly Vec3[], triangles: readonly number[]): Mesh {
  const triangleCount = Math.floor(triangles.length / 3);
  const buffers = allocateMeshBuffers(vertices.length, triangleCount);

  for (let i = 0; i < vertices.length; i++) {
    const i3 = i * 3;
    buffers.vertices[i3] = vertices[i].x;
    buffers.vertices[i3 + 1] = vertices[i].y;
    buffers.vertices[i3 + 2] = vertices[i].z;
  }
  for (let i = 0; i < triangleCount * 3; i++) {
    buffers.triangles[i] = triangles[i];
  }

  return finalizeMesh(buffers.vertices, buffers.triangles);
}

/**
 * Build a mesh from an un-indexed vertex stream where every 3 consecutive
 * vertices form a triangle.
 *
 * Coincident vertices are merged on exact coordinate equality and numbered
 * in the order they are first seen. Returns null for fewer than 3 vertices.
 */
export function createMeshFromVertexStream(source: readonly Vec3[]): Mesh | null {
  if (source.length < 3) {
    return null;
  }

  if (source.length % 3 !== 0) {
    logger.warn(
      LogSource.WELD,
      `The number of vertices to construct a mesh from is not divisible by 3 (${source.length}); ` +
        `ignoring the trailing ${source.length % 3}`,
    );
  }

  const unique = new Map<string, LocalVertex>();
  const triangles: number[] = [];

  const n = Math.floor(source.length / 3);
  for (let i = 0; i < n * 3; i++) {
    const v = source[i];
    // Shortest round-trip text is unique per double, so the key is exact.
    // `${-0}` is "0", matching the ordering comparison where -0 == 0.
    const key = `${v.x},${v.y},${v.z}`;
    let vertex = unique.get(key);
    if (vertex === undefined) {
      vertex = { x: v.x, y: v.y, z: v.z, index: unique.size };
      unique.set(key, vertex);
    }
    triangles.push(vertex.index);
  }

  const ordered = Array.from(unique.values()).sort((a, b) => a.index - b.index);

  const buffers = allocateMeshBuffers(ordered.length, n);
  for (const vertex of ordered) {
    const i3 = vertex.index * 3;
    buffers.vertices[i3] = vertex.x;
    buffers.vertices[i3 + 1] = vertex.y;
    buffers.vertices[i3 + 2] = vertex.z;
  }
  buffers.triangles.set(triangles);

  return finalizeMesh(buffers.vertices, buffers.triangles);
}
