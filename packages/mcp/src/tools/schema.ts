/**
 * Input schemas for the shape tools: zod for validation, JSON Schema for
 * the tool listing.
 */

import { z } from "zod";

const vec3 = z.object({ x: z.number(), y: z.number(), z: z.number() });
const index = z.number().int().nonnegative();

/** Shape as JSON. Mesh buffers are flat number arrays; normals are omitted. */
export const shapeJson = z.discriminatedUnion("type", [
  z.object({ type: z.literal("sphere"), radius: z.number() }),
  z.object({ type: z.literal("box"), size: z.tuple([z.number(), z.number(), z.number()]) }),
  z.object({ type: z.literal("cylinder"), radius: z.number(), length: z.number() }),
  z.object({ type: z.literal("cone"), radius: z.number(), length: z.number() }),
  z.object({ type: z.literal("plane"), a: z.number(), b: z.number(), c: z.number(), d: z.number() }),
  z.object({ type: z.literal("mesh"), vertices: z.array(z.number()), triangles: z.array(index) }),
  z.object({ type: z.literal("octree"), octree: z.unknown() }),
]);

export type ShapeJson = z.infer<typeof shapeJson>;

export const shapeMsgJson = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("SolidPrimitive"), type: z.number().int(), dimensions: z.array(z.number()) }),
  z.object({ kind: z.literal("Plane"), coef: z.tuple([z.number(), z.number(), z.number(), z.number()]) }),
  z.object({
    kind: z.literal("Mesh"),
    triangles: z.array(z.object({ vertex_indices: z.tuple([index, index, index]) })),
    vertices: z.array(vec3),
  }),
]);

export const shapeInput = z.object({ shape: shapeJson });
export const textInput = z.object({ text: z.string() });
export const msgInput = z.object({ msg: shapeMsgJson });
export const importMeshInput = z.object({ uri: z.string().min(1), scale: vec3.optional() });
export const markerInput = z.object({ shape: shapeJson, use_mesh_triangle_list: z.boolean().default(false) });

const shapeProperty = {
  type: "object" as const,
  description:
    "Shape with a 'type' of sphere (radius), box (size [x, y, z]), cylinder or cone (radius, length), " +
    "plane (a, b, c, d) or mesh (flat 'vertices' x,y,z list and flat 'triangles' index list).",
};

export const shapeToolSchema = {
  type: "object" as const,
  properties: { shape: shapeProperty },
  required: ["shape"],
};

export const textToolSchema = {
  type: "object" as const,
  properties: {
    text: { type: "string" as const, description: "Shape text: type tag line followed by its numbers" },
  },
  required: ["text"],
};

export const msgToolSchema = {
  type: "object" as const,
  properties: {
    msg: {
      type: "object" as const,
      description:
        "Interchange message with 'kind' SolidPrimitive (type 1=box 2=sphere 3=cylinder 4=cone, dimensions), " +
        "Plane (coef [a, b, c, d]) or Mesh (vertices [{x,y,z}], triangles [{vertex_indices}]).",
    },
  },
  required: ["msg"],
};

export const importMeshToolSchema = {
  type: "object" as const,
  properties: {
    uri: {
      type: "string" as const,
      description: "file://, package://, http(s):// URI or local path of an STL, OBJ or PLY file",
    },
    scale: {
      type: "object" as const,
      description: "Per-axis scale applied after the file's own transforms (default 1, 1, 1)",
      properties: {
        x: { type: "number" as const },
        y: { type: "number" as const },
        z: { type: "number" as const },
      },
    },
  },
  required: ["uri"],
};

export const markerToolSchema = {
  type: "object" as const,
  properties: {
    shape: shapeProperty,
    use_mesh_triangle_list: {
      type: "boolean" as const,
      description: "Render meshes as a triangle list instead of a wireframe line list",
    },
  },
  required: ["shape"],
};
