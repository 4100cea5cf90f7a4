// Mesh construction
export { finalizeMesh } from "./mesh.js";
export { createMeshFromVertices, createMeshFromVertexStream } from "./weld.js";
export { extractMeshData, createMeshFromAsset } from "./scene.js";
export type { AssetMesh, AssetNode, AssetScene, FlattenedScene } from "./scene.js";

// Import
export { createMeshFromBinary, formatHintFromName, IMPORT_POST_PROCESS } from "./import.js";
export type { AssetImporter, ImportPostProcess } from "./import.js";
export { ThreeAssetImporter, detectFormat } from "./three-importer.js";
export type { AssetFormat } from "./three-importer.js";
export {
  createMeshFromResource,
  DefaultResourceRetriever,
  ResourceRetrieverError,
} from "./resource.js";
export type { MemoryResource, ResourceRetriever, DefaultResourceRetrieverOptions } from "./resource.js";

// Shape tools
export {
  getShapeMsgExtents,
  getSolidPrimitiveExtents,
  getMeshMsgExtents,
  constructMarkerFromSolidPrimitive,
  constructMarkerFromMeshMsg,
} from "./shape-tools.js";

// Logger
export { logger, LogLevel, LogSource, parseLogLevel } from "./logger.js";
export type { LogEntry, LogLevelName, LogSourceName, LogSubscriber } from "./logger.js";
