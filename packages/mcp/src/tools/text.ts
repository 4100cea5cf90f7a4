/**
 * shape_to_text / text_to_shape tools: plain-text persistence.
 */

import { constructShapeFromText, saveAsText } from "@shapekit/core";
import { shapeInput, textInput } from "./schema.js";
import { jsonResult, shapeFromJson, shapeToJson, type ToolResult } from "./types.js";

export function shapeToText(input: unknown): ToolResult {
  const { shape } = shapeInput.parse(input);
  const text = saveAsText(shapeFromJson(shape));
  if (text === "") {
    throw new Error(`Shapes of type ${shape.type} have no text form`);
  }
  return { content: [{ type: "text", text }] };
}

export function textToShape(input: unknown): ToolResult {
  const { text } = textInput.parse(input);
  const shape = constructShapeFromText(text);
  if (!shape) {
    throw new Error("Text does not describe a shape");
  }
  return jsonResult(shapeToJson(shape));
}
