import type { Mesh, Vec3 } from "@shapekit/ir";
import { uniformVec3 } from "@shapekit/ir";
import type { AssetScene } from "./scene.js";
import { createMeshFromAsset } from "./scene.js";
import { ThreeAssetImporter } from "./three-importer.js";
import { logger, LogSource } from "./logger.js";

/** Post-processing an importer applies before handing back the scene. */
export interface ImportPostProcess {
  /** Merge vertices that share a position within each mesh. */
  joinIdenticalVertices: boolean;
  /** Drop nodes that carry no meshes and have no children left. */
  optimizeGraph: boolean;
}

/** Policy used for every buffer import. */
export const IMPORT_POST_PROCESS: Readonly<ImportPostProcess> = {
  joinIdenticalVertices: true,
  optimizeGraph: true,
};

/** Parses a file held in memory into a scene graph. */
export interface AssetImporter {
  /**
   * @param hint lower-case file extension selecting the parser, or `""` to
   *   detect the format from the bytes
   * @returns the scene, or null when the bytes cannot be interpreted
   */
  readFromMemory(bytes: Uint8Array, hint: string, postProcess: ImportPostProcess): AssetScene | null;
}

const defaultImporter = new ThreeAssetImporter();

/**
 * Derive the importer's format hint from a file name or URI.
 *
 * Uses the text after the last `.`, lower-cased. Any extension mentioning
 * `stl` (for example `stlb`) becomes `stl`. No extension yields `""`.
 */
export function formatHintFromName(name: string): string {
  const pos = name.lastIndexOf(".");
  if (pos === -1) {
    return "";
  }
  const hint = name.slice(pos + 1).toLowerCase();
  return hint.includes("stl") ? "stl" : hint;
}

/**
 * Load a mesh from a file held in memory.
 *
 * `hintSource` is a file name or URI; its extension picks the parser and the
 * whole string labels diagnostics. Returns null for an empty buffer or when
 * the importer cannot read it.
 */
export function createMeshFromBinary(
  bytes: Uint8Array | null | undefined,
  scale: Vec3 = uniformVec3(1),
  hintSource = "",
  importer: AssetImporter = defaultImporter,
): Mesh | null {
  if (!bytes || bytes.length < 1) {
    logger.warn(LogSource.IMPORT, "Cannot construct mesh from empty binary buffer");
    return null;
  }

  const hint = formatHintFromName(hintSource);

  let scene: AssetScene | null;
  try {
    scene = importer.readFromMemory(bytes, hint, IMPORT_POST_PROCESS);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    logger.warn(LogSource.IMPORT, `Importer failed on ${hintSource || "buffer"}: ${message}`);
    return null;
  }

  if (!scene) {
    logger.warn(LogSource.IMPORT, `Importer reports no scene in ${hintSource || "buffer"}`);
    return null;
  }

  return createMeshFromAsset(scene, scale, hintSource);
}
