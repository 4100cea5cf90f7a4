/**
 * MCP server implementation with shape tools.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { DefaultResourceRetriever, logger, LogSource } from "@shapekit/core";
import type { ResourceRetriever } from "@shapekit/core";
import type { Config } from "./config.js";
import {
  importMeshToolSchema,
  markerToolSchema,
  msgToolSchema,
  shapeToolSchema,
  textToolSchema,
} from "./tools/schema.js";
import { shapeToText, textToShape } from "./tools/text.js";
import { msgToShape, shapeToMsg } from "./tools/msg.js";
import { shapeExtents, shapeMarker } from "./tools/inspect.js";
import { importMesh } from "./tools/import.js";

export function createServer(config: Config, retriever?: ResourceRetriever): Server {
  const resources = retriever ?? new DefaultResourceRetriever({ packagePath: config.packagePath });

  const server = new Server(
    {
      name: "shapekit",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: "shape_to_text",
        description: "Encode a shape in the plain-text format: a type tag line followed by its numbers.",
        inputSchema: shapeToolSchema,
      },
      {
        name: "text_to_shape",
        description:
          "Decode a shape from the plain-text format. Missing trailing numbers read as 0. " +
          "Fails for empty input, an unknown type tag or octrees.",
        inputSchema: textToolSchema,
      },
      {
        name: "shape_to_msg",
        description:
          "Convert a shape to its interchange message: SolidPrimitive for sphere, box, cylinder and cone, " +
          "Plane for planes, Mesh for meshes. Octrees have no message form.",
        inputSchema: shapeToolSchema,
      },
      {
        name: "msg_to_shape",
        description:
          "Convert an interchange message to a shape. Solid primitives must carry enough dimensions for their type.",
        inputSchema: msgToolSchema,
      },
      {
        name: "import_mesh",
        description:
          "Load a mesh file (STL, OBJ or PLY) by URI, flatten its scene graph with the given per-axis scale, " +
          "and weld identical vertices. Returns vertex and triangle counts plus the mesh.",
        inputSchema: importMeshToolSchema,
      },
      {
        name: "shape_extents",
        description: "Axis-aligned size of a shape around its own origin. Planes report zero.",
        inputSchema: shapeToolSchema,
      },
      {
        name: "shape_marker",
        description:
          "Build a visualization marker for a shape: sphere, cube, cylinder, or a line or triangle list for meshes. " +
          "Cones and planes have no marker.",
        inputSchema: markerToolSchema,
      },
    ],
  }));

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      switch (name) {
        case "shape_to_text":
          return shapeToText(args);

        case "text_to_shape":
          return textToShape(args);

        case "shape_to_msg":
          return shapeToMsg(args);

        case "msg_to_shape":
          return msgToShape(args);

        case "import_mesh":
          return await importMesh(args, resources);

        case "shape_extents":
          return shapeExtents(args);

        case "shape_marker":
          return shapeMarker(args);

        default:
          return {
            content: [{ type: "text", text: `Unknown tool: ${name}` }],
            isError: true,
          };
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.debug(LogSource.MCP, `${name} failed: ${message}`);
      return {
        content: [{ type: "text", text: `Error: ${message}` }],
        isError: true,
      };
    }
  });

  return server;
}
