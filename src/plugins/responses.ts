import { McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PluginContext } from "./index.js";
import { JSON_MIME, idVariable, jsonResource, jsonResult, runTool, surveyIdArg, textResult } from "./helpers.js";

const responseData = z
  .record(z.unknown())
  .describe("Answers keyed by fieldmap column (see fieldmap://{sid}), plus optional token, submitdate, etc.");
const responseIdArg = z.number().int().positive().describe("Response ID");

export function registerResponses(mcp: McpServer, { client, readOnly }: PluginContext): void {
  mcp.resource(
    "responses",
    new ResourceTemplate("responses://{sid}", { list: undefined }),
    { description: "IDs of all responses to a survey", mimeType: JSON_MIME },
    async (uri, variables) => {
      const sid = idVariable(variables, "sid");
      return jsonResource(uri, await client.session((s) => s.getResponseIds(sid)));
    }
  );

  // Exports change nothing and stay available in read-only mode.
  mcp.tool(
    "export_responses",
    "Export the responses of a survey as CSV or JSON text",
    {
      sid: surveyIdArg,
      format: z.enum(["csv", "json"]).optional().describe("Export format (default: csv)"),
      language: z.string().optional().describe("Language code for answer texts"),
      completionStatus: z.enum(["complete", "incomplete", "all"]).optional().describe("Default: all"),
      headingType: z.enum(["code", "full", "abbreviated"]).optional().describe("Default: code"),
      responseType: z.enum(["short", "long"]).optional().describe("Default: short"),
      fromResponseId: responseIdArg.optional().describe("First response ID to include"),
      toResponseId: responseIdArg.optional().describe("Last response ID to include"),
      fields: z.array(z.string()).optional().describe("Fieldmap columns to include (default: all)"),
    },
    async ({ sid, ...options }) =>
      runTool("export responses", async () =>
        textResult(await client.session((s) => s.exportResponses(sid, options)))
      )
  );

  if (readOnly) return;

  mcp.tool(
    "add_response",
    "Add a response to an active survey",
    { sid: surveyIdArg, response: responseData },
    async ({ sid, response }) =>
      runTool("add response", async () => {
        const id = await client.session((s) => s.addResponse(sid, response));
        return textResult(`Added response ${id} to survey ${sid}`);
      })
  );

  mcp.tool(
    "add_responses",
    "Add several responses to an active survey. Returns the new response IDs in order.",
    { sid: surveyIdArg, responses: z.array(responseData).min(1).describe("Responses to add") },
    async ({ sid, responses }) =>
      runTool("add responses", async () =>
        jsonResult({ ids: await client.session((s) => s.addResponses(sid, responses)) })
      )
  );

  mcp.tool(
    "update_response",
    "Update the answers of an existing response",
    { sid: surveyIdArg, responseId: responseIdArg, response: responseData },
    async ({ sid, responseId, response }) =>
      runTool("update response", async () => {
        const updated = await client.session((s) => s.updateResponse(sid, responseId, response));
        return textResult(updated ? `Updated response ${responseId}` : `Response ${responseId} was not updated`);
      })
  );

  mcp.tool(
    "delete_response",
    "Delete a response",
    { sid: surveyIdArg, responseId: responseIdArg },
    async ({ sid, responseId }) =>
      runTool("delete response", async () => {
        await client.session((s) => s.deleteResponse(sid, responseId));
        return textResult(`Deleted response ${responseId} from survey ${sid}`);
      })
  );
}
