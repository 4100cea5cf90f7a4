/**
 * Plain-text persistence for shapes.
 *
 * The format is line-oriented and positional: a type tag line followed by
 * whitespace-separated numbers.
 *
 * @example
 * ```text
 * mesh
 * 3 1
 * 0 0 0
 * 1 0 0
 * 0 1 0
 * 0 1 2
 * ```
 */

import type { MeshBuffers, Shape } from "@shapekit/ir";
import {
  allocateMeshBuffers,
  createBox,
  createCone,
  createCylinder,
  createPlane,
  createSphere,
  isShapeType,
} from "@shapekit/ir";
import { finalizeMesh, logger, LogSource } from "@shapekit/engine";

/** Shortest text that reads back to the same double, keeping the sign of zero. */
function formatNumber(n: number): string {
  return Object.is(n, -0) ? "-0" : String(n);
}

function formatLine(...values: number[]): string {
  return values.map(formatNumber).join(" ");
}

/**
 * Encode a shape as text. Every line, including the last, ends in `\n`.
 * Octrees have no text form; they are reported and encode to `""`.
 */
export function saveAsText(shape: Shape): string {
  const lines: string[] = [shape.type];

  switch (shape.type) {
    case "sphere":
      lines.push(formatLine(shape.radius));
      break;

    case "box":
      lines.push(formatLine(shape.size[0], shape.size[1], shape.size[2]));
      break;

    case "cylinder":
    case "cone":
      lines.push(formatLine(shape.radius, shape.length));
      break;

    case "plane":
      lines.push(formatLine(shape.a, shape.b, shape.c, shape.d));
      break;

    case "mesh":
      lines.push(formatLine(shape.vertexCount, shape.triangleCount));
      for (let i = 0; i < shape.vertexCount; i++) {
        const i3 = i * 3;
        lines.push(formatLine(shape.vertices[i3], shape.vertices[i3 + 1], shape.vertices[i3 + 2]));
      }
      for (let i = 0; i < shape.triangleCount; i++) {
        const i3 = i * 3;
        lines.push(formatLine(shape.triangles[i3], shape.triangles[i3 + 1], shape.triangles[i3 + 2]));
      }
      break;

    case "octree":
      logger.error(LogSource.TEXT, `Unable to save shape of type ${shape.type}`);
      return "";
  }

  return lines.join("\n") + "\n";
}

/**
 * Decimal or exponent literal, or the `NaN` and `Infinity` tokens the encoder
 * writes. Hex, binary and other `Number()` forms are not numbers here.
 */
const NUMBER = /[+-]?(?:Infinity|NaN|(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)/y;

/**
 * Whitespace tokenizer with stream-like failure: once a read fails, every
 * later numeric read yields 0.
 *
 * A numeric read takes the longest number literal at the cursor and leaves
 * the rest of the token, so `1abc` reads `1` and the next read fails on `abc`.
 */
class TokenReader {
  private pos = 0;
  private failed = false;

  constructor(private readonly text: string) {}

  get atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) {
      this.pos++;
    }
  }

  next(): string | null {
    this.skipWhitespace();
    if (this.atEnd) {
      return null;
    }
    const start = this.pos;
    while (this.pos < this.text.length && !/\s/.test(this.text[this.pos])) {
      this.pos++;
    }
    return this.text.slice(start, this.pos);
  }

  number(): number {
    if (this.failed) return 0;
    this.skipWhitespace();
    NUMBER.lastIndex = this.pos;
    const match = NUMBER.exec(this.text);
    if (!match) {
      this.failed = true;
      return 0;
    }
    this.pos = NUMBER.lastIndex;
    return Number(match[0]);
  }

  /** Unsigned 32-bit integer. */
  index(): number {
    const value = this.number();
    if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
      this.failed = true;
      return 0;
    }
    return value;
  }
}

function readMesh(reader: TokenReader): Shape | null {
  const vertexCount = reader.index();
  const triangleCount = reader.index();

  let buffers: MeshBuffers;
  try {
    buffers = allocateMeshBuffers(vertexCount, triangleCount);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    logger.error(
      LogSource.TEXT,
      `Cannot allocate mesh of ${vertexCount} vertices and ${triangleCount} triangles: ${message}`,
    );
    return null;
  }

  for (let i = 0; i < vertexCount * 3; i++) {
    buffers.vertices[i] = reader.number();
  }
  for (let i = 0; i < triangleCount * 3; i++) {
    buffers.triangles[i] = reader.index();
  }
  return finalizeMesh(buffers.vertices, buffers.triangles);
}

/**
 * Decode a shape written by {@link saveAsText}.
 *
 * Returns null for empty input, input that ends right after the tag, an
 * unknown tag, or an octree. Missing or malformed numbers read as 0, so a
 * truncated stream yields a partially filled shape rather than an error.
 */
export function constructShapeFromText(input: string | Uint8Array): Shape | null {
  const text = typeof input === "string" ? input : new TextDecoder().decode(input);
  const reader = new TokenReader(text);

  const tag = reader.next();
  if (tag === null) {
    return null;
  }
  if (reader.atEnd) {
    logger.warn(LogSource.TEXT, `Unexpected end of input after shape type '${tag}'`);
    return null;
  }
  if (!isShapeType(tag)) {
    logger.error(LogSource.TEXT, `Unknown shape type: '${tag}'`);
    return null;
  }

  switch (tag) {
    case "sphere":
      return createSphere(reader.number());
    case "box": {
      const x = reader.number();
      const y = reader.number();
      const z = reader.number();
      return createBox(x, y, z);
    }
    case "cylinder": {
      const radius = reader.number();
      const length = reader.number();
      return createCylinder(radius, length);
    }
    case "cone": {
      const radius = reader.number();
      const length = reader.number();
      return createCone(radius, length);
    }
    case "plane": {
      const a = reader.number();
      const b = reader.number();
      const c = reader.number();
      const d = reader.number();
      return createPlane(a, b, c, d);
    }
    case "mesh":
      return readMesh(reader);
    case "octree":
      logger.error(LogSource.TEXT, `Unable to load shape of type ${tag} from text`);
      return null;
  }
}
