/**
 * shape_to_msg / msg_to_shape tools: interchange message mapping.
 */

import { constructMsgFromShape, constructShapeFromMsg } from "@shapekit/core";
import { msgInput, shapeInput } from "./schema.js";
import { jsonResult, shapeFromJson, shapeToJson, type ToolResult } from "./types.js";

export function shapeToMsg(input: unknown): ToolResult {
  const { shape } = shapeInput.parse(input);
  const msg = constructMsgFromShape(shapeFromJson(shape));
  if (!msg) {
    throw new Error(`Shapes of type ${shape.type} have no message form`);
  }
  return jsonResult(msg);
}

export function msgToShape(input: unknown): ToolResult {
  const { msg } = msgInput.parse(input);
  const shape = constructShapeFromMsg(msg);
  if (!shape) {
    throw new Error(`Message of kind ${msg.kind} does not describe a valid shape`);
  }
  return jsonResult(shapeToJson(shape));
}
