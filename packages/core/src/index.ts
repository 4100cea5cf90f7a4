// Shape <-> message mapping
export {
  constructMsgFromShape,
  constructShapeFromMsg,
  constructShapeFromSolidPrimitive,
  constructShapeFromPlaneMsg,
  constructShapeFromMeshMsg,
} from "./utils/shape-msg.js";

// Text persistence
export { saveAsText, constructShapeFromText } from "./utils/shape-text.js";

// Markers and extents
export { constructMarkerFromShape, computeShapeExtents, computeShapeMsgExtents } from "./utils/shape-marker.js";

// Re-export mesh construction and import
export {
  createMeshFromVertices,
  createMeshFromVertexStream,
  createMeshFromAsset,
  createMeshFromBinary,
  createMeshFromResource,
  extractMeshData,
  formatHintFromName,
  DefaultResourceRetriever,
  ResourceRetrieverError,
  ThreeAssetImporter,
  IMPORT_POST_PROCESS,
} from "@shapekit/engine";
export type {
  AssetImporter,
  AssetMesh,
  AssetNode,
  AssetScene,
  ImportPostProcess,
  MemoryResource,
  ResourceRetriever,
} from "@shapekit/engine";

// Logger
export { logger, LogLevel, LogSource, parseLogLevel } from "@shapekit/engine";
export type { LogEntry, LogLevelName, LogSourceName, LogSubscriber } from "@shapekit/engine";
