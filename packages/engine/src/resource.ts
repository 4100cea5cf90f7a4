import { readFile, stat } from "node:fs/promises";
import { delimiter, isAbsolute, join, relative, sep } from "node:path";
import { fileURLToPath } from "node:url";
import type { Mesh, Vec3 } from "@shapekit/ir";
import { uniformVec3 } from "@shapekit/ir";
import { createMeshFromBinary } from "./import.js";
import { logger, LogSource } from "./logger.js";

/** Bytes retrieved for a URI. */
export interface MemoryResource {
  data: Uint8Array;
  size: number;
}

/** Fetches the bytes behind a resource URI. Rejects with ResourceRetrieverError. */
export interface ResourceRetriever {
  get(uri: string): Promise<MemoryResource>;
}

/** Error thrown when a resource cannot be retrieved. */
export class ResourceRetrieverError extends Error {
  uri: string;

  constructor(uri: string, message: string) {
    super(`Error retrieving ${uri}: ${message}`);
    this.name = "ResourceRetrieverError";
    this.uri = uri;
  }
}

export interface DefaultResourceRetrieverOptions {
  /**
   * Directories searched for `package://<name>/<path>` URIs, either as a
   * list or as one string joined with the platform path delimiter.
   */
  packagePath?: string[] | string;
}

/**
 * Retriever for `file://`, `package://`, `http://` and `https://` URIs.
 * Anything without a scheme is read as a local path.
 */
export class DefaultResourceRetriever implements ResourceRetriever {
  private packageDirs: string[];

  constructor(options: DefaultResourceRetrieverOptions = {}) {
    const { packagePath = [] } = options;
    this.packageDirs = (typeof packagePath === "string" ? packagePath.split(delimiter) : packagePath).filter(
      (dir) => dir.length > 0,
    );
  }

  async get(uri: string): Promise<MemoryResource> {
    const scheme = /^([a-z][a-z0-9+.-]*):\/\//i.exec(uri)?.[1]?.toLowerCase();

    switch (scheme) {
      case undefined:
        return this.readLocal(uri, uri);
      case "file":
        return this.readLocal(uri, fileURLToPath(uri));
      case "package":
        return this.readLocal(uri, await this.resolvePackage(uri));
      case "http":
      case "https":
        return this.fetchRemote(uri);
      default:
        throw new ResourceRetrieverError(uri, `unsupported scheme '${scheme}'`);
    }
  }

  private async resolvePackage(uri: string): Promise<string> {
    const rest = uri.slice("package://".length);
    const slash = rest.indexOf("/");
    if (slash <= 0) {
      throw new ResourceRetrieverError(uri, "missing package name");
    }
    const name = rest.slice(0, slash);
    const path = rest.slice(slash + 1);
    if (name === "." || name === "..") {
      throw new ResourceRetrieverError(uri, `invalid package name '${name}'`);
    }

    for (const dir of this.packageDirs) {
      const root = join(dir, name);
      const candidate = join(root, path);
      const inside = relative(root, candidate);
      if (inside === ".." || inside.startsWith(`..${sep}`) || isAbsolute(inside)) {
        throw new ResourceRetrieverError(uri, `path escapes package '${name}'`);
      }
      const info = await stat(candidate).catch(() => null);
      if (info?.isFile()) {
        return candidate;
      }
    }
    throw new ResourceRetrieverError(uri, `package '${name}' not found on the package path`);
  }

  private async readLocal(uri: string, path: string): Promise<MemoryResource> {
    try {
      const data = new Uint8Array(await readFile(path));
      return { data, size: data.byteLength };
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new ResourceRetrieverError(uri, message);
    }
  }

  private async fetchRemote(uri: string): Promise<MemoryResource> {
    let response: Response;
    try {
      response = await fetch(uri);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new ResourceRetrieverError(uri, message);
    }
    if (!response.ok) {
      throw new ResourceRetrieverError(uri, `HTTP ${response.status}`);
    }
    const data = new Uint8Array(await response.arrayBuffer());
    return { data, size: data.byteLength };
  }
}

const defaultRetriever = new DefaultResourceRetriever();

/**
 * Load a mesh from a resource URI.
 *
 * The URI's extension selects the parser. Resolves to null when the
 * resource cannot be retrieved, is empty, or holds no usable mesh.
 */
export async function createMeshFromResource(
  uri: string,
  scale: Vec3 = uniformVec3(1),
  retriever: ResourceRetriever = defaultRetriever,
): Promise<Mesh | null> {
  let resource: MemoryResource;
  try {
    resource = await retriever.get(uri);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    logger.error(LogSource.RESOURCE, message);
    return null;
  }

  if (resource.size === 0) {
    logger.warn(LogSource.RESOURCE, `Retrieved empty mesh for resource '${uri}'`);
    return null;
  }

  const mesh = createMeshFromBinary(resource.data.subarray(0, resource.size), scale, uri);
  if (!mesh) {
    logger.warn(LogSource.RESOURCE, `Importer reports no scene in ${uri}`);
  }
  return mesh;
}
