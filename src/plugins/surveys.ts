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

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

export function registerSurveys(mcp: McpServer, { client, readOnly }: PluginContext): void {
  mcp.resource(
    "surveys",
    "survey://",
    {
      description:
        "List all surveys. Each entry has sid, gsid (survey group), surveyls_title, startdate, expires and active.",
      mimeType: JSON_MIME,
    },
    async (uri) => jsonResource(uri, await client.session((s) => s.listSurveys()))
  );

  mcp.resource(
    "survey",
    new ResourceTemplate("survey://{sid}", { list: undefined }),
    { description: "Survey properties", mimeType: JSON_MIME },
    async (uri, variables) => {
      const sid = idVariable(variables, "sid");
      return jsonResource(uri, await client.session((s) => s.getSurveyProperties(sid)));
    }
  );

  mcp.resource(
    "survey-groups",
    "survey-group://",
    { description: "List all survey groups", mimeType: JSON_MIME },
    async (uri) => jsonResource(uri, await client.session((s) => s.listSurveyGroups()))
  );

  mcp.resource(
    "fieldmap",
    new ResourceTemplate("fieldmap://{sid}", { list: undefined }),
    { description: "Survey fieldmap: response column codes mapped to their questions", mimeType: JSON_MIME },
    async (uri, variables) => {
      const sid = idVariable(variables, "sid");
      return jsonResource(uri, await client.session((s) => s.getFieldmap(sid)));
    }
  );

  mcp.resource(
    "summary",
    new ResourceTemplate("summary://{sid}", { list: undefined }),
    { description: "Survey summary: response and participant counts", mimeType: JSON_MIME },
    async (uri, variables) => {
      const sid = idVariable(variables, "sid");
      return jsonResource(uri, await client.session((s) => s.getSummary(sid)));
    }
  );

  // Exports change nothing and stay available in read-only mode.
  mcp.tool(
    "export_statistics",
    "Export survey statistics. HTML is returned as text; PDF and XLS as base64.",
    {
      sid: surveyIdArg,
      documentType: z.enum(["pdf", "xls", "html"]).optional().describe("Document type (default: pdf)"),
      language: z.string().optional().describe("Language code"),
      graph: z.boolean().optional().describe("Include graphs (pdf only)"),
    },
    async ({ sid, documentType = "pdf", language, graph }) =>
      runTool("export statistics", async () =>
        textResult(await client.session((s) => s.exportStatistics(sid, documentType, language, graph)))
      )
  );

  mcp.tool(
    "export_timeline",
    "Count submitted responses per day or hour within a date range",
    {
      sid: surveyIdArg,
      period: z.enum(["day", "hour"]).optional().describe("Bucket size (default: day)"),
      startDate: isoDate.describe("Start date (YYYY-MM-DD)"),
      endDate: isoDate.optional().describe("End date (YYYY-MM-DD)"),
    },
    async ({ sid, period = "day", startDate, endDate }) =>
      runTool("export timeline", async () =>
        jsonResult(await client.session((s) => s.exportTimeline(sid, period, startDate, endDate)))
      )
  );

  if (readOnly) return;

  mcp.tool(
    "add_survey",
    "Create a new, empty survey",
    {
      title: z.string().min(1).describe("Survey title"),
      language: z.string().min(1).describe("Base language code, e.g. 'en'"),
      format: z.enum(["G", "S", "A"]).optional().describe("G=group by group (default), S=question by question, A=all in one"),
      sid: surveyIdArg.optional().describe("Desired survey ID (default: assigned by LimeSurvey)"),
    },
    async ({ title, language, format, sid }) =>
      runTool("add survey", async () => {
        const newSid = await client.session((s) => s.addSurvey({ title, language, format, surveyId: sid }));
        return textResult(`Created survey "${title}" (sid: ${newSid})`);
      })
  );

  mcp.tool(
    "copy_survey",
    "Copy an existing survey under a new name",
    {
      sid: surveyIdArg.describe("Source survey ID"),
      newName: z.string().min(1).describe("Name for the copy"),
      destinationSid: surveyIdArg.optional().describe("Desired ID for the copy"),
    },
    async ({ sid, newName, destinationSid }) =>
      runTool("copy survey", async () => {
        const newSid = await client.session((s) => s.copySurvey(sid, newName, destinationSid));
        return textResult(`Copied survey ${sid} to "${newName}" (sid: ${newSid})`);
      })
  );

  mcp.tool(
    "delete_survey",
    "Delete a survey and all of its responses",
    { sid: surveyIdArg },
    async ({ sid }) =>
      runTool("delete survey", async () => {
        await client.session((s) => s.deleteSurvey(sid));
        return textResult(`Deleted survey ${sid}`);
      })
  );

  mcp.tool(
    "activate_survey",
    "Activate a survey so it starts collecting responses",
    { sid: surveyIdArg },
    async ({ sid }) =>
      runTool("activate survey", async () => jsonResult(await client.session((s) => s.activateSurvey(sid))))
  );

  mcp.tool(
    "import_survey",
    "Import a survey from an export file",
    {
      data: base64Arg,
      type: z.enum(["lss", "csv", "txt", "lsa", "tsv"]).optional().describe("File type (default: lss)"),
      newName: z.string().optional().describe("Name for the imported survey"),
      destinationSid: surveyIdArg.optional().describe("Desired ID for the imported survey"),
    },
    async ({ data, type = "lss", newName, destinationSid }) =>
      runTool("import survey", async () => {
        const sid = await client.session((s) => s.importSurvey(data, type, newName, destinationSid));
        return textResult(`Imported survey (sid: ${sid})`);
      })
  );

  mcp.tool(
    "set_survey_properties",
    "Set survey properties. Returns which properties were updated.",
    { sid: surveyIdArg, properties: propertiesArg },
    async ({ sid, properties }) =>
      runTool("set survey properties", async () =>
        jsonResult(await client.session((s) => s.setSurveyProperties(sid, properties)))
      )
  );
}
