import { McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PluginContext } from "./index.js";
import {
  JSON_MIME,
  idVariable,
  jsonResource,
  jsonResult,
  propertiesArg,
  runTool,
  surveyIdArg,
  textResult,
} from "./helpers.js";

const quotaIdArg = z.number().int().positive().describe("Quota ID");

export function registerQuotas(mcp: McpServer, { client, readOnly }: PluginContext): void {
  mcp.resource(
    "quota",
    new ResourceTemplate("quota://{id}", { list: undefined }),
    { description: "Quota properties", mimeType: JSON_MIME },
    async (uri, variables) => {
      const id = idVariable(variables, "id");
      return jsonResource(uri, await client.session((s) => s.getQuotaProperties(id)));
    }
  );

  mcp.resource(
    "quotas",
    new ResourceTemplate("quotas://{sid}", { list: undefined }),
    { description: "Quotas of a survey", mimeType: JSON_MIME },
    async (uri, variables) => {
      const sid = idVariable(variables, "sid");
      return jsonResource(uri, await client.session((s) => s.listQuotas(sid)));
    }
  );

  if (readOnly) return;

  mcp.tool(
    "add_quota",
    "Add a quota to a survey",
    {
      sid: surveyIdArg,
      name: z.string().min(1).describe("Quota name"),
      limit: z.number().int().min(0).describe("Maximum number of completed responses"),
      active: z.boolean().optional().describe("Whether the quota is enforced (default: true)"),
      action: z
        .enum(["terminate", "confirm_terminate"])
        .optional()
        .describe("What happens when the quota is full (default: terminate)"),
      message: z.string().optional().describe("Message shown when the quota is full"),
      url: z.string().optional().describe("URL to send respondents to when the quota is full"),
      urlDescription: z.string().optional().describe("Link text for the URL"),
      autoloadUrl: z.boolean().optional().describe("Redirect to the URL automatically"),
    },
    async ({ sid, ...quota }) =>
      runTool("add quota", async () => {
        const id = await client.session((s) => s.addQuota(sid, quota));
        return textResult(`Added quota "${quota.name}" to survey ${sid} (id: ${id})`);
      })
  );

  mcp.tool(
    "delete_quota",
    "Delete a quota",
    { id: quotaIdArg },
    async ({ id }) =>
      runTool("delete quota", async () => {
        await client.session((s) => s.deleteQuota(id));
        return textResult(`Deleted quota ${id}`);
      })
  );

  mcp.tool(
    "set_quota_properties",
    "Set quota properties",
    { id: quotaIdArg, properties: propertiesArg },
    async ({ id, properties }) =>
      runTool("set quota properties", async () =>
        jsonResult(await client.session((s) => s.setQuotaProperties(id, properties)))
      )
  );
}
