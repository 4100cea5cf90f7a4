/**
 * Default asset importer backed by the three.js loaders (STL, OBJ, PLY).
 */

import { BufferGeometry, Line, LineSegments, Matrix4, Mesh, Object3D, Points } from "three";
import { STLLoader } from "three/addons/loaders/STLLoader.js";
import { OBJLoader } from "three/addons/loaders/OBJLoader.js";
import { PLYLoader } from "three/addons/loaders/PLYLoader.js";
import type { Vec3 } from "@shapekit/ir";
import type { AssetImporter, ImportPostProcess } from "./import.js";
import type { AssetMesh, AssetNode, AssetScene } from "./scene.js";

export type AssetFormat = "stl" | "obj" | "ply";

/** How consecutive indices of a primitive group into faces. */
interface FaceLayout {
  size: number;
  stride: number;
}

const TRIANGLES: FaceLayout = { size: 3, stride: 3 };
const SEGMENTS: FaceLayout = { size: 2, stride: 2 };
const STRIP: FaceLayout = { size: 2, stride: 1 };
const POINTS: FaceLayout = { size: 1, stride: 1 };

/**
 * Guess the format of an in-memory file.
 * ASCII STL is told apart from a binary header by the `facet` keyword.
 */
export function detectFormat(bytes: Uint8Array): AssetFormat {
  const head = new TextDecoder().decode(bytes.subarray(0, Math.min(bytes.length, 1024)));
  if (head.startsWith("ply")) {
    return "ply";
  }
  if (/^\s*solid/i.test(head) && /facet/i.test(head)) {
    return "stl";
  }
  if (/^\s*[vfog]\s/m.test(head)) {
    return "obj";
  }
  return "stl";
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

export class ThreeAssetImporter implements AssetImporter {
  readFromMemory(bytes: Uint8Array, hint: string, postProcess: ImportPostProcess): AssetScene | null {
    const format = hint === "" ? detectFormat(bytes) : hint;

    let root: Object3D;
    switch (format) {
      case "stl":
        root = new Mesh(new STLLoader().parse(toArrayBuffer(bytes)));
        break;
      case "ply": {
        const geometry = new PLYLoader().parse(toArrayBuffer(bytes));
        root = geometry.getIndex() ? new Mesh(geometry) : new Points(geometry);
        break;
      }
      case "obj":
        root = new OBJLoader().parse(new TextDecoder().decode(bytes));
        break;
      default:
        throw new Error(`Unsupported format hint '${format}'`);
    }

    const meshes: AssetMesh[] = [];
    const rootNode = convertNode(root, meshes, postProcess);
    const pruned = postProcess.optimizeGraph ? pruneEmptyNodes(rootNode) : rootNode;

    return { meshes, rootNode: pruned ?? { ...rootNode, children: [] } };
  }
}

function layoutOf(object: Object3D): FaceLayout | null {
  if (object instanceof Mesh) return TRIANGLES;
  // LineSegments extends Line, so it is checked first
  if (object instanceof LineSegments) return SEGMENTS;
  if (object instanceof Line) return STRIP;
  if (object instanceof Points) return POINTS;
  return null;
}

function convertNode(object: Object3D, meshes: AssetMesh[], postProcess: ImportPostProcess): AssetNode {
  object.updateMatrix();
  const node: AssetNode = {
    name: object.name,
    transformation: new Matrix4().copy(object.matrix),
    meshes: [],
    children: [],
  };

  const layout = layoutOf(object);
  if (layout && "geometry" in object && object.geometry instanceof BufferGeometry) {
    const join = postProcess.joinIdenticalVertices && layout === TRIANGLES;
    node.meshes.push(meshes.length);
    meshes.push(toAssetMesh(object.geometry, layout, join));
  }

  for (const child of object.children) {
    node.children.push(convertNode(child, meshes, postProcess));
  }
  return node;
}

function toAssetMesh(geometry: BufferGeometry, layout: FaceLayout, join: boolean): AssetMesh {
  const position = geometry.getAttribute("position");
  const vertices: Vec3[] = [];
  if (!position) {
    return { vertices, faces: [] };
  }

  // Positions are joined on exact equality; normals and UVs never split a corner
  const unique = new Map<string, number>();
  const remap: number[] = [];
  for (let i = 0; i < position.count; i++) {
    const v = { x: position.getX(i), y: position.getY(i), z: position.getZ(i) };
    if (!join) {
      remap.push(vertices.length);
      vertices.push(v);
      continue;
    }
    const key = `${v.x},${v.y},${v.z}`;
    let target = unique.get(key);
    if (target === undefined) {
      target = vertices.length;
      unique.set(key, target);
      vertices.push(v);
    }
    remap.push(target);
  }

  const index = geometry.getIndex();
  const count = index ? index.count : position.count;
  const at = (i: number): number => remap[index ? index.getX(i) : i];

  const faces: number[][] = [];
  for (let start = 0; start + layout.size <= count; start += layout.stride) {
    const face: number[] = [];
    for (let k = 0; k < layout.size; k++) {
      face.push(at(start + k));
    }
    faces.push(face);
  }

  return { vertices, faces };
}

/** Remove subtrees that reference no meshes. Returns null if nothing is left. */
function pruneEmptyNodes(node: AssetNode): AssetNode | null {
  const children: AssetNode[] = [];
  for (const child of node.children) {
    const kept = pruneEmptyNodes(child);
    if (kept) children.push(kept);
  }
  if (node.meshes.length === 0 && children.length === 0) {
    return null;
  }
  return { ...node, children };
}
