import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import type { Vec3 } from "@shapekit/ir";
import { createMeshFromVertexStream, createMeshFromVertices } from "../weld.js";
import { logger, type LogEntry } from "../logger.js";

const v = (x: number, y: number, z: number): Vec3 => ({ x, y, z });

let entries: LogEntry[];
let unsubscribe: () => void;

beforeAll(() => {
  logger.setConsoleEnabled(false);
});

beforeEach(() => {
  entries = [];
  unsubscribe = logger.subscribe((entry) => entries.push(entry));
});

afterEach(() => {
  unsubscribe();
});

describe("createMeshFromVertexStream", () => {
  it("merges coincident vertices in first-seen order", () => {
    const mesh = createMeshFromVertexStream([
      v(0, 0, 0), v(1, 0, 0), v(1, 1, 0),
      v(0, 0, 0), v(1, 1, 0), v(0, 1, 0),
    ]);

    expect(mesh).not.toBeNull();
    if (!mesh) return;
    expect(mesh.vertexCount).toBe(4);
    expect(mesh.triangleCount).toBe(2);
    expect(Array.from(mesh.vertices)).toEqual([0, 0, 0, 1, 0, 0, 1, 1, 0, 0, 1, 0]);
    expect(Array.from(mesh.triangles)).toEqual([0, 1, 2, 0, 2, 3]);
    expect(entries).toHaveLength(0);
  });

  it("derives unit normals for a flat mesh", () => {
    const mesh = createMeshFromVertexStream([
      v(0, 0, 0), v(1, 0, 0), v(1, 1, 0),
      v(0, 0, 0), v(1, 1, 0), v(0, 1, 0),
    ]);
    if (!mesh?.triangleNormals || !mesh.vertexNormals) {
      throw new Error("expected normals");
    }

    expect(mesh.triangleNormals).toHaveLength(6);
    for (let t = 0; t < 2; t++) {
      expect(mesh.triangleNormals[t * 3]).toBeCloseTo(0);
      expect(mesh.triangleNormals[t * 3 + 1]).toBeCloseTo(0);
      expect(mesh.triangleNormals[t * 3 + 2]).toBeCloseTo(1);
    }
    expect(mesh.vertexNormals).toHaveLength(12);
    for (let i = 0; i < 4; i++) {
      expect(mesh.vertexNormals[i * 3 + 2]).toBeCloseTo(1);
    }
  });

  it("only merges exactly equal coordinates", () => {
    const mesh = createMeshFromVertexStream([
      v(0, 0, 0), v(1, 0, 0), v(0, 1, 0),
      v(1e-12, 0, 0), v(1, 0, 0), v(0, 1, 0),
    ]);

    expect(mesh?.vertexCount).toBe(4);
    expect(Array.from(mesh?.triangles ?? [])).toEqual([0, 1, 2, 3, 1, 2]);
  });

  it("treats negative zero as zero", () => {
    const mesh = createMeshFromVertexStream([
      v(0, 0, 0), v(1, 0, 0), v(0, 1, 0),
      v(-0, 0, 0), v(0, 1, 0), v(0, 0, 1),
    ]);

    expect(mesh?.vertexCount).toBe(4);
  });

  it("returns null for fewer than three vertices", () => {
    expect(createMeshFromVertexStream([])).toBeNull();
    expect(createMeshFromVertexStream([v(0, 0, 0), v(1, 0, 0)])).toBeNull();
  });

  it("warns and drops a trailing partial triangle", () => {
    const mesh = createMeshFromVertexStream([
      v(0, 0, 0), v(1, 0, 0), v(0, 1, 0),
      v(0, 0, 1), v(1, 0, 1), v(0, 1, 1),
      v(5, 5, 5),
    ]);

    expect(mesh?.vertexCount).toBe(6);
    expect(mesh?.triangleCount).toBe(2);
    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe("WARN");
    expect(entries[0].source).toBe("weld");
    expect(entries[0].message).toBe(
      "The number of vertices to construct a mesh from is not divisible by 3 (7); ignoring the trailing 1",
    );
  });
});

describe("createMeshFromVertices", () => {
  it("copies vertices and indices without merging", () => {
    const mesh = createMeshFromVertices(
      [v(0, 0, 0), v(1, 0, 0), v(0, 1, 0), v(0, 0, 0)],
      [0, 1, 2, 3, 1, 2],
    );

    expect(mesh.vertexCount).toBe(4);
    expect(mesh.triangleCount).toBe(2);
    expect(Array.from(mesh.triangles)).toEqual([0, 1, 2, 3, 1, 2]);
  });

  it("ignores a trailing partial triangle", () => {
    const mesh = createMeshFromVertices([v(0, 0, 0), v(1, 0, 0), v(0, 1, 0)], [0, 1, 2, 0]);

    expect(mesh.triangleCount).toBe(1);
    expect(mesh.triangles).toHaveLength(3);
  });

  it("gives out-of-range faces a zero normal", () => {
    const mesh = createMeshFromVertices([v(0, 0, 0), v(1, 0, 0), v(0, 1, 0)], [0, 1, 7]);

    expect(Array.from(mesh.triangleNormals ?? [])).toEqual([0, 0, 0]);
    expect(Array.from(mesh.vertexNormals ?? [])).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0]);
  });
});
