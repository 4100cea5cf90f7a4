import { BufferAttribute, BufferGeometry, Triangle, Vector3 } from "three";
import type { Mesh } from "@shapekit/ir";

/**
 * Build the immutable mesh value from filled buffers.
 *
 * Buffer sizes fix the counts: `vertices.length / 3` vertices and
 * `triangles.length / 3` triangles. Normals are derived here and never
 * recomputed afterwards.
 */
export function finalizeMesh(vertices: Float64Array, triangles: Uint32Array): Mesh {
  const vertexCount = Math.floor(vertices.length / 3);
  const triangleCount = Math.floor(triangles.length / 3);
  const triangleNormals = computeTriangleNormals(vertices, triangles, vertexCount, triangleCount);
  const vertexNormals = computeVertexNormals(vertices, triangles, vertexCount, triangleCount);

  return {
    type: "mesh",
    vertexCount,
    triangleCount,
    vertices,
    triangles,
    triangleNormals,
    vertexNormals,
  };
}

function readVertex(vertices: Float64Array, index: number, target: Vector3): Vector3 {
  const i3 = index * 3;
  return target.set(vertices[i3], vertices[i3 + 1], vertices[i3 + 2]);
}

/** Unit normal per triangle; zero for degenerate or out-of-range faces. */
function computeTriangleNormals(
  vertices: Float64Array,
  triangles: Uint32Array,
  vertexCount: number,
  triangleCount: number,
): Float64Array {
  const normals = new Float64Array(triangleCount * 3);
  const a = new Vector3();
  const b = new Vector3();
  const c = new Vector3();
  const n = new Vector3();

  for (let t = 0; t < triangleCount; t++) {
    const t3 = t * 3;
    const i0 = triangles[t3];
    const i1 = triangles[t3 + 1];
    const i2 = triangles[t3 + 2];
    if (i0 >= vertexCount || i1 >= vertexCount || i2 >= vertexCount) continue;

    Triangle.getNormal(
      readVertex(vertices, i0, a),
      readVertex(vertices, i1, b),
      readVertex(vertices, i2, c),
      n,
    );
    normals[t3] = n.x;
    normals[t3 + 1] = n.y;
    normals[t3 + 2] = n.z;
  }

  return normals;
}

/** Area-weighted vertex normals; vertices without faces keep a zero normal. */
function computeVertexNormals(
  vertices: Float64Array,
  triangles: Uint32Array,
  vertexCount: number,
  triangleCount: number,
): Float64Array {
  const normals = new Float64Array(vertexCount * 3);

  const valid: number[] = [];
  for (let t = 0; t < triangleCount; t++) {
    const t3 = t * 3;
    const i0 = triangles[t3];
    const i1 = triangles[t3 + 1];
    const i2 = triangles[t3 + 2];
    if (i0 < vertexCount && i1 < vertexCount && i2 < vertexCount) {
      valid.push(i0, i1, i2);
    }
  }
  if (valid.length === 0) {
    return normals;
  }

  const geometry = new BufferGeometry();
  geometry.setAttribute(
    "position",
    new BufferAttribute(new Float32Array(vertices.subarray(0, vertexCount * 3)), 3),
  );
  geometry.setIndex(new BufferAttribute(new Uint32Array(valid), 1));
  geometry.computeVertexNormals();

  const attr = geometry.getAttribute("normal");
  for (let i = 0; i < vertexCount; i++) {
    const i3 = i * 3;
    normals[i3] = attr.getX(i);
    normals[i3 + 1] = attr.getY(i);
    normals[i3 + 2] = attr.getZ(i);
  }
  geometry.dispose();

  return normals;
}
