/**
 * Flattening of an imported asset's scene graph into one mesh.
 */

import { Matrix4, Vector3 } from "three";
import type { Mesh, Vec3 } from "@shapekit/ir";
import { uniformVec3 } from "@shapekit/ir";
import { createMeshFromVertices } from "./weld.js";
import { logger, LogSource } from "./logger.js";

/** Raw mesh buffer as produced by an importer. */
export interface AssetMesh {
  vertices: Vec3[];
  /** Vertex indices per face. Only 3-index faces become triangles. */
  faces: number[][];
}

/** Node of the scene hierarchy. */
export interface AssetNode {
  name: string;
  /** Transform relative to the parent node. */
  transformation: Matrix4;
  /** Indices into `AssetScene.meshes`. */
  meshes: number[];
  children: AssetNode[];
}

export interface AssetScene {
  meshes: AssetMesh[];
  rootNode: AssetNode;
}

/** Flat vertex and triangle lists extracted from a scene. */
export interface FlattenedScene {
  vertices: Vec3[];
  triangles: number[];
}

/**
 * Walk the scene pre-order, transforming every mesh vertex into the root
 * frame and scaling it per axis.
 *
 * Each node's transform is `parent * local`. Triangle indices are offset by
 * the number of vertices already emitted when their mesh was appended.
 */
export function extractMeshData(scene: AssetScene, scale: Vec3): FlattenedScene {
  const vertices: Vec3[] = [];
  const triangles: number[] = [];
  const point = new Vector3();

  // Children are pushed in reverse so they pop in declaration order.
  const stack: Array<{ node: AssetNode; parent: Matrix4 }> = [
    { node: scene.rootNode, parent: new Matrix4() },
  ];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    const { node, parent } = entry;
    const transform = parent.clone().multiply(node.transformation);

    for (const meshIndex of node.meshes) {
      const mesh = scene.meshes[meshIndex];
      if (!mesh) {
        logger.warn(LogSource.SCENE, `Node '${node.name}' references missing mesh ${meshIndex}`);
        continue;
      }

      const offset = vertices.length;
      for (const v of mesh.vertices) {
        point.set(v.x, v.y, v.z).applyMatrix4(transform);
        vertices.push({ x: point.x * scale.x, y: point.y * scale.y, z: point.z * scale.z });
      }
      for (const face of mesh.faces) {
        if (face.length === 3) {
          triangles.push(offset + face[0], offset + face[1], offset + face[2]);
        }
      }
    }

    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push({ node: node.children[i], parent: transform });
    }
  }

  return { vertices, triangles };
}

/**
 * Build a single mesh from an imported scene.
 *
 * `label` names the source in diagnostics. Returns null when the scene has
 * no meshes or yields no vertices or no triangles.
 */
export function createMeshFromAsset(
  scene: AssetScene,
  scale: Vec3 = uniformVec3(1),
  label = "",
): Mesh | null {
  if (scene.meshes.length === 0) {
    logger.warn(LogSource.SCENE, `Importer reports scene in ${label} has no meshes`);
    return null;
  }

  const { vertices, triangles } = extractMeshData(scene, scale);
  if (vertices.length === 0) {
    logger.warn(LogSource.SCENE, `There are no vertices in the scene ${label}`);
    return null;
  }
  if (triangles.length === 0) {
    logger.warn(LogSource.SCENE, `There are no triangles in the scene ${label}`);
    return null;
  }

  return createMeshFromVertices(vertices, triangles);
}
