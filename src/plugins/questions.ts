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

const questionIdArg = z.number().int().positive().describe("Question ID");

export function registerQuestions(mcp: McpServer, { client, readOnly }: PluginContext): void {
  mcp.resource(
    "question",
    new ResourceTemplate("question://{qid}", { list: undefined }),
    { description: "Question properties, including answer options and subquestions", mimeType: JSON_MIME },
    async (uri, variables) => {
      const qid = idVariable(variables, "qid");
      return jsonResource(uri, await client.session((s) => s.getQuestionProperties(qid)));
    }
  );

  mcp.resource(
    "questions",
    new ResourceTemplate("questions://{sid}", { list: undefined }),
    { description: "All questions of a survey", mimeType: JSON_MIME },
    async (uri, variables) => {
      const sid = idVariable(variables, "sid");
      return jsonResource(uri, await client.session((s) => s.listQuestions(sid)));
    }
  );

  if (readOnly) return;

  mcp.tool(
    "delete_question",
    "Delete a question",
    { qid: questionIdArg },
    async ({ qid }) =>
      runTool("delete question", async () => {
        await client.session((s) => s.deleteQuestion(qid));
        return textResult(`Deleted question ${qid}`);
      })
  );

  mcp.tool(
    "set_question_properties",
    "Set question properties. Returns which properties were updated.",
    {
      qid: questionIdArg,
      properties: propertiesArg,
      language: z.string().optional().describe("Language of localized properties"),
    },
    async ({ qid, properties, language }) =>
      runTool("set question properties", async () =>
        jsonResult(await client.session((s) => s.setQuestionProperties(qid, properties, language)))
      )
  );

  mcp.tool(
    "import_question",
    "Import a question into a question group",
    {
      sid: surveyIdArg,
      gid: z.number().int().positive().describe("Target question group ID"),
      data: base64Arg,
      type: z.enum(["lsq", "csv"]).optional().describe("File type (default: lsq)"),
      mandatory: z.boolean().optional().describe("Make the question mandatory"),
    },
    async ({ sid, gid, data, type = "lsq", mandatory }) =>
      runTool("import question", async () => {
        const qid = await client.session((s) => s.importQuestion(sid, gid, data, type, mandatory));
        return textResult(`Imported question into group ${gid} (qid: ${qid})`);
      })
  );
}
