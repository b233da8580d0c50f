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
  stringVariable,
  surveyIdArg,
  textResult,
} from "./helpers.js";

const participantData = z.record(z.unknown()).describe("Participant attributes, e.g. firstname, lastname, email");
const tokenIds = z.array(z.number().int().positive()).min(1);

function pageSize(value: unknown): number {
  const parsed = z.number().int().positive().safeParse(value);
  return parsed.success ? parsed.data : 1000;
}

export function registerParticipants(mcp: McpServer, { client, readOnly, config }: PluginContext): void {
  const limit = pageSize(config.pageSize);

  mcp.resource(
    "participant",
    new ResourceTemplate("participant://{token}/survey/{sid}", { list: undefined }),
    { description: "Properties of the participant with the given access token", mimeType: JSON_MIME },
    async (uri, variables) => {
      const token = stringVariable(variables, "token");
      const sid = idVariable(variables, "sid");
      return jsonResource(uri, await client.session((s) => s.getParticipantProperties(sid, { token })));
    }
  );

  mcp.resource(
    "participants",
    new ResourceTemplate("participants://{sid}", { list: undefined }),
    { description: "Participants of a survey", mimeType: JSON_MIME },
    async (uri, variables) => {
      const sid = idVariable(variables, "sid");
      return jsonResource(uri, await client.session((s) => s.listParticipants(sid, { limit })));
    }
  );

  if (readOnly) return;

  mcp.tool(
    "add_participants",
    "Add participants to a survey's participant table",
    {
      sid: surveyIdArg,
      participants: z.array(participantData).min(1).describe("Participants to add"),
      createTokens: z.boolean().optional().describe("Generate access tokens (default: true)"),
    },
    async ({ sid, participants, createTokens }) =>
      runTool("add participants", async () =>
        jsonResult(await client.session((s) => s.addParticipants(sid, participants, createTokens)))
      )
  );

  mcp.tool(
    "delete_participants",
    "Delete participants by their token IDs (tid)",
    { sid: surveyIdArg, tokenIds: tokenIds.describe("Participant token IDs (tid)") },
    async ({ sid, tokenIds }) =>
      runTool("delete participants", async () =>
        jsonResult(await client.session((s) => s.deleteParticipants(sid, tokenIds)))
      )
  );

  mcp.tool(
    "invite_participants",
    "Send invitation emails to participants",
    {
      sid: surveyIdArg,
      tokenIds: tokenIds.optional().describe("Participant token IDs to invite (default: all pending)"),
      email: z.boolean().optional().describe("Only invite participants with an email address (default: true)"),
    },
    async ({ sid, tokenIds, email }) =>
      runTool("invite participants", async () =>
        jsonResult(await client.session((s) => s.inviteParticipants(sid, tokenIds, email)))
      )
  );

  mcp.tool(
    "set_participant_properties",
    "Set properties of the participant with the given access token",
    {
      sid: surveyIdArg,
      token: z.string().min(1).describe("Participant access token"),
      properties: propertiesArg,
    },
    async ({ sid, token, properties }) =>
      runTool("set participant properties", async () =>
        jsonResult(await client.session((s) => s.setParticipantProperties(sid, { token }, properties)))
      )
  );

  mcp.tool(
    "import_cpdb_participants",
    "Import participants into the central participant database",
    {
      participants: z.array(participantData).min(1).describe("Participants to import"),
      update: z.boolean().optional().describe("Update participants that already exist (default: false)"),
    },
    async ({ participants, update }) =>
      runTool("import participants", async () =>
        jsonResult(await client.session((s) => s.importCpdbParticipants(participants, update)))
      )
  );

  mcp.tool(
    "activate_tokens",
    "Create the participant table for a survey",
    {
      sid: surveyIdArg,
      attributeFields: z.array(z.number().int().positive()).optional().describe("Attribute field numbers to create"),
    },
    async ({ sid, attributeFields }) =>
      runTool("activate tokens", async () => {
        await client.session((s) => s.activateTokens(sid, attributeFields));
        return textResult(`Activated participant table for survey ${sid}`);
      })
  );
}
