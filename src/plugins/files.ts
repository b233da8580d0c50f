import { McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PluginContext } from "./index.js";
import { JSON_MIME, base64Arg, idVariable, jsonResource, jsonResult, runTool, surveyIdArg } from "./helpers.js";

export function registerFiles(mcp: McpServer, { client, readOnly }: PluginContext): void {
  mcp.resource(
    "uploaded-files",
    new ResourceTemplate("files://{sid}", { list: undefined }),
    { description: "Files uploaded by respondents, with metadata and base64 content", mimeType: JSON_MIME },
    async (uri, variables) => {
      const sid = idVariable(variables, "sid");
      return jsonResource(uri, await client.session((s) => s.getUploadedFiles(sid)));
    }
  );

  if (readOnly) return;

  mcp.tool(
    "upload_file",
    "Upload a file for a file-upload question. Attach it to a response by adding the returned metadata to the response data.",
    {
      sid: surveyIdArg,
      fieldName: z.string().min(1).describe("Fieldmap column of the file-upload question, e.g. '123456X1X2'"),
      fileName: z.string().min(1).describe("File name including extension"),
      content: base64Arg,
    },
    async ({ sid, fieldName, fileName, content }) =>
      runTool("upload file", async () =>
        jsonResult(await client.session((s) => s.uploadFile(sid, fieldName, fileName, content)))
      )
  );
}
