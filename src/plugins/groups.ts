import { McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PluginContext } from "./index.js";
import {
  JSON_MIME,
  base64Arg,
  idVariable,
  jsonResource,
  jsonResult,
  propertiesArg,
  runTool,
  surveyIdArg,
  textResult,
} from "./helpers.js";

const groupIdArg = z.number().int().positive().describe("Question group ID");

export function registerGroups(mcp: McpServer, { client, readOnly }: PluginContext): void {
  mcp.resource(
    "group",
    new ResourceTemplate("group://{gid}", { list: undefined }),
    { description: "Question group properties", mimeType: JSON_MIME },
    async (uri, variables) => {
      const gid = idVariable(variables, "gid");
      return jsonResource(uri, await client.session((s) => s.getGroupProperties(gid)));
    }
  );

  mcp.resource(
    "groups",
    new ResourceTemplate("groups://{sid}", { list: undefined }),
    { description: "Question groups of a survey", mimeType: JSON_MIME },
    async (uri, variables) => {
      const sid = idVariable(variables, "sid");
      return jsonResource(uri, await client.session((s) => s.listGroups(sid)));
    }
  );

  if (readOnly) return;

  mcp.tool(
    "add_group",
    "Add a question group to a survey",
    {
      sid: surveyIdArg,
      title: z.string().min(1).describe("Group title"),
      description: z.string().optional().describe("Group description"),
    },
    async ({ sid, title, description }) =>
      runTool("add group", async () => {
        const gid = await client.session((s) => s.addGroup(sid, title, description));
        return textResult(`Added group "${title}" to survey ${sid} (gid: ${gid})`);
      })
  );

  mcp.tool(
    "delete_group",
    "Delete a question group and its questions",
    { sid: surveyIdArg, gid: groupIdArg },
    async ({ sid, gid }) =>
      runTool("delete group", async () => {
        await client.session((s) => s.deleteGroup(sid, gid));
        return textResult(`Deleted group ${gid} from survey ${sid}`);
      })
  );

  mcp.tool(
    "set_group_properties",
    "Set question group properties. Returns which properties were updated.",
    { gid: groupIdArg, properties: propertiesArg },
    async ({ gid, properties }) =>
      runTool("set group properties", async () =>
        jsonResult(await client.session((s) => s.setGroupProperties(gid, properties)))
      )
  );

  mcp.tool(
    "import_group",
    "Import a question group into a survey",
    {
      sid: surveyIdArg,
      data: base64Arg,
      type: z.enum(["lsg", "csv"]).optional().describe("File type (default: lsg)"),
      name: z.string().optional().describe("Name for the imported group"),
      description: z.string().optional().describe("Description for the imported group"),
    },
    async ({ sid, data, type = "lsg", name, description }) =>
      runTool("import group", async () => {
        const gid = await client.session((s) => s.importGroup(sid, data, type, name, description));
        return textResult(`Imported group into survey ${sid} (gid: ${gid})`);
      })
  );
}
