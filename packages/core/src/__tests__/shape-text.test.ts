import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import {
  createBox,
  createCone,
  createCylinder,
  createOcTree,
  createPlane,
  createSphere,
  type Shape,
} from "@shapekit/ir";
import { createMeshFromVertices, logger, type LogEntry } from "@shapekit/engine";
import { constructShapeFromText, saveAsText } from "../utils/shape-text.js";

const quad = () =>
  createMeshFromVertices(
    [
      { x: 0, y: 0, z: 0 },
      { x: 1, y: 0, z: 0 },
      { x: 1, y: 1, z: 0 },
      { x: 0, y: 1, z: 0 },
    ],
    [0, 1, 2, 0, 2, 3],
  );

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

describe("saveAsText", () => {
  it("writes the tag line then the numbers", () => {
    expect(saveAsText(createBox(1, 2, 3))).toBe("box\n1 2 3\n");
    expect(saveAsText(createSphere(0.5))).toBe("sphere\n0.5\n");
    expect(saveAsText(createCylinder(0.25, 2))).toBe("cylinder\n0.25 2\n");
    expect(saveAsText(createCone(1, 4))).toBe("cone\n1 4\n");
    expect(saveAsText(createPlane(-0, 0, 1, -2))).toBe("plane\n-0 0 1 -2\n");
  });

  it("writes mesh counts, vertex lines and triangle lines", () => {
    expect(saveAsText(quad())).toBe("mesh\n4 2\n0 0 0\n1 0 0\n1 1 0\n0 1 0\n0 1 2\n0 2 3\n");
  });

  it("has no text form for octrees", () => {
    expect(saveAsText(createOcTree(null))).toBe("");
    expect(entries.map((e) => e.message)).toEqual(["Unable to save shape of type octree"]);
  });
});

describe("constructShapeFromText", () => {
  it("round-trips primitives exactly", () => {
    const shapes: Shape[] = [
      createSphere(0.1 + 0.2),
      createBox(1e-300, 12345.678, 1 / 3),
      createCylinder(0.5, 2),
      createCone(3, 0.125),
      createPlane(0, -1, 0, 7.5),
    ];

    for (const shape of shapes) {
      expect(constructShapeFromText(saveAsText(shape))).toEqual(shape);
    }
  });

  it("keeps the sign of zero", () => {
    const plane = constructShapeFromText("plane\n-0 0 1 -2\n");

    expect(plane?.type).toBe("plane");
    if (plane?.type !== "plane") return;
    expect(Object.is(plane.a, -0)).toBe(true);
    expect(plane.d).toBe(-2);
  });

  it("round-trips meshes", () => {
    const mesh = quad();
    const back = constructShapeFromText(saveAsText(mesh));

    if (back?.type !== "mesh") throw new Error("expected a mesh");
    expect(back.vertexCount).toBe(4);
    expect(back.triangleCount).toBe(2);
    expect(Array.from(back.vertices)).toEqual(Array.from(mesh.vertices));
    expect(Array.from(back.triangles)).toEqual([0, 1, 2, 0, 2, 3]);
  });

  it("accepts bytes", () => {
    expect(constructShapeFromText(new TextEncoder().encode("cone\n1 2\n"))).toEqual(createCone(1, 2));
  });

  it("accepts any whitespace between numbers", () => {
    expect(constructShapeFromText("box 1\t2\r\n 3")).toEqual(createBox(1, 2, 3));
  });

  it("returns null for empty input", () => {
    expect(constructShapeFromText("")).toBeNull();
    expect(constructShapeFromText(" \n\t")).toBeNull();
    expect(entries).toHaveLength(0);
  });

  it("returns null when input ends after the tag", () => {
    expect(constructShapeFromText("sphere")).toBeNull();
    expect(entries.map((e) => `${e.level} ${e.message}`)).toEqual([
      "WARN Unexpected end of input after shape type 'sphere'",
    ]);
  });

  it("rejects unknown tags", () => {
    expect(constructShapeFromText("torus\n1 2\n")).toBeNull();
    expect(entries.map((e) => `${e.level} ${e.message}`)).toEqual(["ERROR Unknown shape type: 'torus'"]);
  });

  it("rejects octrees", () => {
    expect(constructShapeFromText("octree\n0\n")).toBeNull();
    expect(entries.map((e) => e.message)).toEqual(["Unable to load shape of type octree from text"]);
  });

  it("reads missing numbers as zero", () => {
    expect(constructShapeFromText("box\n1 2\n")).toEqual(createBox(1, 2, 0));
  });

  it("reads everything after a malformed number as zero", () => {
    expect(constructShapeFromText("box\n1 abc 3\n")).toEqual(createBox(1, 0, 0));
  });

  it("reads decimal and exponent literals", () => {
    expect(constructShapeFromText("cylinder\n.5 2.\n")).toEqual(createCylinder(0.5, 2));
    expect(constructShapeFromText("box\n1e2 +3 -2.5E-1\n")).toEqual(createBox(100, 3, -0.25));
  });

  it("reads the NaN and Infinity tokens", () => {
    const plane = constructShapeFromText("plane\nInfinity -Infinity 0 NaN\n");

    if (plane?.type !== "plane") throw new Error("expected a plane");
    expect(plane.a).toBe(Infinity);
    expect(plane.b).toBe(-Infinity);
    expect(plane.d).toBeNaN();
  });

  it("stops a number at the first character that cannot continue it", () => {
    expect(constructShapeFromText("box\n1abc 2 3\n")).toEqual(createBox(1, 0, 0));
    expect(constructShapeFromText("box\n0x10 2 3\n")).toEqual(createBox(0, 0, 0));
    expect(constructShapeFromText("cylinder\n2e 5\n")).toEqual(createCylinder(2, 0));
  });

  it("zero-fills a truncated mesh", () => {
    const mesh = constructShapeFromText("mesh\n2 1\n0 0 0\n1 0 0\n");

    if (mesh?.type !== "mesh") throw new Error("expected a mesh");
    expect(mesh.vertexCount).toBe(2);
    expect(mesh.triangleCount).toBe(1);
    expect(Array.from(mesh.vertices)).toEqual([0, 0, 0, 1, 0, 0]);
    expect(Array.from(mesh.triangles)).toEqual([0, 0, 0]);
  });
});
