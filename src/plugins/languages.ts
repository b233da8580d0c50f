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

const languageArg = z.string().min(2).describe("Language code, e.g. 'de' or 'pt-BR'");

export function registerLanguages(mcp: McpServer, { client, readOnly }: PluginContext): void {
  mcp.resource(
    "available-languages",
    "language://",
    { description: "Languages enabled on the site. An empty list means all languages are allowed.", mimeType: JSON_MIME },
    async (uri) => jsonResource(uri, await client.session((s) => s.getAvailableLanguages()))
  );

  // Static URIs win over templates, so this never reaches language://{sid}.
  mcp.resource(
    "default-language",
    "language://default",
    { description: "Default language of the site", mimeType: JSON_MIME },
    async (uri) => jsonResource(uri, await client.session((s) => s.getDefaultLanguage()))
  );

  mcp.resource(
    "language",
    new ResourceTemplate("language://{sid}", { list: undefined }),
    { description: "Language-specific settings of a survey (title, welcome and end texts, ...)", mimeType: JSON_MIME },
    async (uri, variables) => {
      const sid = idVariable(variables, "sid");
      return jsonResource(uri, await client.session((s) => s.getLanguageProperties(sid)));
    }
  );

  if (readOnly) return;

  mcp.tool(
    "add_language",
    "Add a language to a survey",
    { sid: surveyIdArg, language: languageArg },
    async ({ sid, language }) =>
      runTool("add language", async () => {
        await client.session((s) => s.addLanguage(sid, language));
        return textResult(`Added language '${language}' to survey ${sid}`);
      })
  );

  mcp.tool(
    "delete_language",
    "Remove a language from a survey",
    { sid: surveyIdArg, language: languageArg },
    async ({ sid, language }) =>
      runTool("delete language", async () => {
        await client.session((s) => s.deleteLanguage(sid, language));
        return textResult(`Deleted language '${language}' from survey ${sid}`);
      })
  );

  mcp.tool(
    "set_language_properties",
    "Set language-specific survey settings, e.g. surveyls_title or surveyls_welcometext",
    {
      sid: surveyIdArg,
      properties: propertiesArg,
      language: languageArg.optional().describe("Language to update (default: the survey's base language)"),
    },
    async ({ sid, properties, language }) =>
      runTool("set language properties", async () =>
        jsonResult(await client.session((s) => s.setLanguageProperties(sid, properties, language)))
      )
  );
}
