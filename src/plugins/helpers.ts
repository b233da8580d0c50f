import type { CallToolResult, ReadResourceResult } from "@modelcontextprotocol/sdk/types.js";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type { Variables } from "@modelcontextprotocol/sdk/shared/uriTemplate.js";
import { z } from "zod";
import { LimeSurveyError } from "../limesurvey/errors.js";

export const surveyIdArg = z.number().int().positive().describe("Survey ID");
export const base64Arg = z.string().min(1).describe("File content, base64 encoded");
export const propertiesArg = z.record(z.unknown()).describe("Properties to set, keyed by attribute name");

export const JSON_MIME = "application/json";

export function jsonResource(uri: URL, data: unknown): ReadResourceResult {
  return {
    contents: [{ uri: uri.href, mimeType: JSON_MIME, text: JSON.stringify(data, null, 2) }],
  };
}

function variable(variables: Variables, name: string): string {
  const value = variables[name];
  const first = Array.isArray(value) ? value[0] : value;
  if (first === undefined || first === "") {
    throw new McpError(ErrorCode.InvalidParams, `Missing ${name} in resource URI`);
  }
  try {
    return decodeURIComponent(first);
  } catch (err) {
    if (err instanceof URIError) {
      throw new McpError(ErrorCode.InvalidParams, `Malformed ${name} '${first}' in resource URI`);
    }
    throw err;
  }
}

export function stringVariable(variables: Variables, name: string): string {
  return variable(variables, name);
}

/** Reads a URI template variable that must be a positive integer id. */
export function idVariable(variables: Variables, name: string): number {
  const value = variable(variables, name);
  const id = /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new McpError(ErrorCode.InvalidParams, `Invalid ${name} '${value}': expected a positive integer`);
  }
  return id;
}

export function textResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}

export function jsonResult(data: unknown): CallToolResult {
  return textResult(JSON.stringify(data, null, 2));
}

/**
 * Runs a tool body, turning LimeSurvey failures into an error result the
 * model can read. Anything else is left to the SDK.
 */
export async function runTool(action: string, fn: () => Promise<CallToolResult>): Promise<CallToolResult> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof LimeSurveyError) {
      console.error(`Tool failed (${action}): ${err.message}`);
      return { content: [{ type: "text", text: `Failed to ${action}: ${err.message}` }], isError: true };
    }
    throw err;
  }
}
