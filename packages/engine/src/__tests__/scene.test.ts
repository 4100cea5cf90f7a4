import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { Matrix4 } from "three";
import type { Vec3 } from "@shapekit/ir";
import { createMeshFromAsset, extractMeshData, type AssetNode, type AssetScene } from "../scene.js";
import { logger, type LogEntry } from "../logger.js";

const v = (x: number, y: number, z: number): Vec3 => ({ x, y, z });

function node(name: string, transformation: Matrix4, meshes: number[], children: AssetNode[] = []): AssetNode {
  return { name, transformation, meshes, children };
}

/** Root translated by (1, 0, 0) holding mesh 0; child translated by (0, 0, 5) holding mesh 1. */
function twoLevelScene(): AssetScene {
  return {
    meshes: [
      { vertices: [v(0, 0, 0), v(1, 0, 0), v(0, 1, 0)], faces: [[0, 1, 2]] },
      { vertices: [v(0, 0, 0), v(0, 1, 0), v(0, 0, 1)], faces: [[0, 1, 2], [0, 1], [0, 1, 2, 0]] },
    ],
    rootNode: node("root", new Matrix4().makeTranslation(1, 0, 0), [0], [
      node("child", new Matrix4().makeTranslation(0, 0, 5), [1]),
    ]),
  };
}

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

describe("extractMeshData", () => {
  it("composes transforms down the tree and scales after transforming", () => {
    const { vertices, triangles } = extractMeshData(twoLevelScene(), v(2, 1, 1));

    expect(vertices).toEqual([
      v(2, 0, 0), v(4, 0, 0), v(2, 1, 0),
      v(2, 0, 5), v(2, 1, 5), v(2, 0, 6),
    ]);
    expect(triangles).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it("visits children in declaration order", () => {
    const scene: AssetScene = {
      meshes: [
        { vertices: [v(1, 1, 1)], faces: [] },
        { vertices: [v(2, 2, 2)], faces: [] },
        { vertices: [v(3, 3, 3)], faces: [] },
      ],
      rootNode: node("root", new Matrix4(), [], [
        node("a", new Matrix4(), [0], [node("a1", new Matrix4(), [2])]),
        node("b", new Matrix4(), [1]),
      ]),
    };

    const { vertices } = extractMeshData(scene, v(1, 1, 1));

    expect(vertices).toEqual([v(1, 1, 1), v(3, 3, 3), v(2, 2, 2)]);
  });

  it("skips references to missing meshes", () => {
    const scene: AssetScene = {
      meshes: [{ vertices: [v(0, 0, 0), v(1, 0, 0), v(0, 1, 0)], faces: [[0, 1, 2]] }],
      rootNode: node("root", new Matrix4(), [4, 0]),
    };

    const { vertices, triangles } = extractMeshData(scene, v(1, 1, 1));

    expect(vertices).toHaveLength(3);
    expect(triangles).toEqual([0, 1, 2]);
    expect(entries.map((e) => e.message)).toEqual(["Node 'root' references missing mesh 4"]);
  });
});

describe("createMeshFromAsset", () => {
  it("builds one mesh without merging across nodes", () => {
    const mesh = createMeshFromAsset(twoLevelScene(), v(2, 1, 1), "two-level.obj");

    expect(mesh?.vertexCount).toBe(6);
    expect(mesh?.triangleCount).toBe(2);
    expect(Array.from(mesh?.vertices ?? [])).toEqual([2, 0, 0, 4, 0, 0, 2, 1, 0, 2, 0, 5, 2, 1, 5, 2, 0, 6]);
    expect(entries).toHaveLength(0);
  });

  it("defaults to unit scale", () => {
    const mesh = createMeshFromAsset(twoLevelScene());

    expect(Array.from(mesh?.vertices ?? []).slice(0, 3)).toEqual([1, 0, 0]);
  });

  it("rejects a scene without meshes", () => {
    const scene: AssetScene = { meshes: [], rootNode: node("root", new Matrix4(), []) };

    expect(createMeshFromAsset(scene, v(1, 1, 1), "empty.stl")).toBeNull();
    expect(entries.map((e) => e.message)).toEqual(["Importer reports scene in empty.stl has no meshes"]);
  });

  it("rejects a scene whose nodes reference no vertices", () => {
    const scene: AssetScene = {
      meshes: [{ vertices: [], faces: [] }],
      rootNode: node("root", new Matrix4(), [0]),
    };

    expect(createMeshFromAsset(scene, v(1, 1, 1), "hollow.obj")).toBeNull();
    expect(entries.map((e) => e.message)).toEqual(["There are no vertices in the scene hollow.obj"]);
  });

  it("rejects a scene with only non-triangle faces", () => {
    const scene: AssetScene = {
      meshes: [{ vertices: [v(0, 0, 0), v(1, 0, 0)], faces: [[0, 1]] }],
      rootNode: node("root", new Matrix4(), [0]),
    };

    expect(createMeshFromAsset(scene, v(1, 1, 1), "lines.obj")).toBeNull();
    expect(entries.map((e) => e.message)).toEqual(["There are no triangles in the scene lines.obj"]);
  });
});
