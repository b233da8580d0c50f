import { z } from "zod";
import type { LimeSurveyClient } from "./client.js";
import type {
  ExportResponsesOptions,
  ImportDataType,
  JsonObject,
  ListParticipantsOptions,
  NewQuota,
  NewSurvey,
  StatisticsDocumentType,
  TimelinePeriod,
} from "./types.js";

const jsonObject = z.record(z.unknown());
const jsonObjectList = z.array(jsonObject);
const id = z.coerce.number().int();
const statusReply = z.object({ status: z.string() }).passthrough();
const base64 = z.string();
const siteSetting = z
  .union([z.string(), z.number(), z.null()])
  .transform((value) => (value === null ? "" : String(value)));

function decodeBase64(data: string): string {
  return Buffer.from(data, "base64").toString("utf-8");
}

/**
 * Typed view of the RemoteControl methods, bound to one session key.
 * Obtained through {@link LimeSurveyClient.session}.
 */
export class LimeSurveySession {
  constructor(
    private readonly rpc: LimeSurveyClient,
    readonly key: string
  ) {}

  // ---------------------------------------------------------------------------
  // Surveys
  // ---------------------------------------------------------------------------

  getSurveyProperties(surveyId: number, settings?: string[]): Promise<JsonObject> {
    return this.rpc.invoke("get_survey_properties", [this.key, surveyId, settings ?? null], {
      schema: jsonObject,
    });
  }

  listSurveys(username?: string): Promise<JsonObject[]> {
    return this.rpc.invoke("list_surveys", [this.key, username ?? null], {
      schema: jsonObjectList,
      empty: { statuses: ["No surveys found"], value: [] },
    });
  }

  listSurveyGroups(username?: string): Promise<JsonObject[]> {
    return this.rpc.invoke("list_survey_groups", [this.key, username ?? null], {
      schema: jsonObjectList,
      empty: { statuses: ["No survey groups found"], value: [] },
    });
  }

  addSurvey(survey: NewSurvey): Promise<number> {
    return this.rpc.invoke(
      "add_survey",
      [this.key, survey.surveyId ?? null, survey.title, survey.language, survey.format ?? "G"],
      { schema: id }
    );
  }

  async copySurvey(surveyId: number, newName: string, destinationId?: number): Promise<number> {
    const reply = await this.rpc.invoke(
      "copy_survey",
      [this.key, surveyId, newName, destinationId ?? null],
      { schema: z.object({ newsid: id }) }
    );
    return reply.newsid;
  }

  async deleteSurvey(surveyId: number): Promise<true> {
    await this.rpc.invoke("delete_survey", [this.key, surveyId], { schema: statusReply });
    return true;
  }

  activateSurvey(surveyId: number, options?: JsonObject): Promise<JsonObject> {
    return this.rpc.invoke("activate_survey", [this.key, surveyId, options ?? null], {
      schema: statusReply,
    });
  }

  importSurvey(
    data: string,
    type: ImportDataType,
    newName?: string,
    destinationId?: number
  ): Promise<number> {
    return this.rpc.invoke(
      "import_survey",
      [this.key, data, type, newName ?? null, destinationId ?? null],
      { schema: id }
    );
  }

  setSurveyProperties(surveyId: number, properties: JsonObject): Promise<JsonObject> {
    return this.rpc.invoke("set_survey_properties", [this.key, surveyId, properties], {
      schema: jsonObject,
    });
  }

  getSummary(surveyId: number): Promise<JsonObject> {
    return this.rpc.invoke("get_summary", [this.key, surveyId, "all"], {
      schema: jsonObject,
      empty: { statuses: ["No available data"], value: {} },
    });
  }

  getFieldmap(surveyId: number): Promise<JsonObject> {
    return this.rpc.invoke("get_fieldmap", [this.key, surveyId], { schema: jsonObject });
  }

  /** PDF and XLS come back base64 encoded; HTML is decoded. */
  async exportStatistics(
    surveyId: number,
    documentType: StatisticsDocumentType,
    language?: string,
    graph = false
  ): Promise<string> {
    const data = await this.rpc.invoke(
      "export_statistics",
      [this.key, surveyId, documentType, language ?? null, graph ? "1" : "0"],
      { schema: base64 }
    );
    return documentType === "html" ? decodeBase64(data) : data;
  }

  exportTimeline(
    surveyId: number,
    period: TimelinePeriod,
    start: string,
    end?: string
  ): Promise<JsonObject | unknown[]> {
    return this.rpc.invoke("export_timeline", [this.key, surveyId, period, start, end ?? null], {
      schema: z.union([jsonObject, z.array(z.unknown())]),
    });
  }

  // ---------------------------------------------------------------------------
  // Question groups
  // ---------------------------------------------------------------------------

  getGroupProperties(groupId: number, settings?: string[], language?: string): Promise<JsonObject> {
    return this.rpc.invoke(
      "get_group_properties",
      [this.key, groupId, settings ?? null, language ?? null],
      { schema: jsonObject }
    );
  }

  listGroups(surveyId: number, language?: string): Promise<JsonObject[]> {
    return this.rpc.invoke("list_groups", [this.key, surveyId, language ?? null], {
      schema: jsonObjectList,
      empty: { statuses: ["No groups found"], value: [] },
    });
  }

  addGroup(surveyId: number, title: string, description = ""): Promise<number> {
    return this.rpc.invoke("add_group", [this.key, surveyId, title, description], { schema: id });
  }

  deleteGroup(surveyId: number, groupId: number): Promise<number> {
    return this.rpc.invoke("delete_group", [this.key, surveyId, groupId], { schema: id });
  }

  setGroupProperties(groupId: number, properties: JsonObject): Promise<JsonObject> {
    return this.rpc.invoke("set_group_properties", [this.key, groupId, properties], {
      schema: jsonObject,
    });
  }

  importGroup(
    surveyId: number,
    data: string,
    type: ImportDataType,
    name?: string,
    description?: string
  ): Promise<number> {
    return this.rpc.invoke(
      "import_group",
      [this.key, surveyId, data, type, name ?? null, description ?? null],
      { schema: id }
    );
  }

  // ---------------------------------------------------------------------------
  // Questions
  // ---------------------------------------------------------------------------

  getQuestionProperties(questionId: number, settings?: string[], language?: string): Promise<JsonObject> {
    return this.rpc.invoke(
      "get_question_properties",
      [this.key, questionId, settings ?? null, language ?? null],
      { schema: jsonObject }
    );
  }

  listQuestions(surveyId: number, groupId?: number, language?: string): Promise<JsonObject[]> {
    return this.rpc.invoke(
      "list_questions",
      [this.key, surveyId, groupId ?? null, language ?? null],
      { schema: jsonObjectList, empty: { statuses: ["No questions found"], value: [] } }
    );
  }

  deleteQuestion(questionId: number): Promise<number> {
    return this.rpc.invoke("delete_question", [this.key, questionId], { schema: id });
  }

  setQuestionProperties(questionId: number, properties: JsonObject, language?: string): Promise<JsonObject> {
    return this.rpc.invoke(
      "set_question_properties",
      [this.key, questionId, properties, language ?? null],
      { schema: jsonObject }
    );
  }

  importQuestion(
    surveyId: number,
    groupId: number,
    data: string,
    type: ImportDataType,
    mandatory = false
  ): Promise<number> {
    return this.rpc.invoke(
      "import_question",
      [this.key, surveyId, groupId, data, type, mandatory ? "Y" : "N"],
      { schema: id }
    );
  }

  // ---------------------------------------------------------------------------
  // Participants
  // ---------------------------------------------------------------------------

  getParticipantProperties(surveyId: number, query: JsonObject, properties?: string[]): Promise<JsonObject> {
    return this.rpc.invoke(
      "get_participant_properties",
      [this.key, surveyId, query, properties ?? null],
      { schema: jsonObject }
    );
  }

  listParticipants(surveyId: number, options: ListParticipantsOptions = {}): Promise<JsonObject[]> {
    return this.rpc.invoke(
      "list_participants",
      [
        this.key,
        surveyId,
        options.start ?? 0,
        options.limit ?? 10,
        options.unused ?? false,
        options.attributes ?? false,
        options.conditions ?? {},
      ],
      {
        schema: jsonObjectList,
        empty: { statuses: ["No survey participants found.", "No participants found."], value: [] },
      }
    );
  }

  addParticipants(surveyId: number, participants: JsonObject[], createTokens = true): Promise<JsonObject[]> {
    return this.rpc.invoke("add_participants", [this.key, surveyId, participants, createTokens], {
      schema: jsonObjectList,
    });
  }

  deleteParticipants(surveyId: number, tokenIds: number[]): Promise<JsonObject> {
    return this.rpc.invoke("delete_participants", [this.key, surveyId, tokenIds], { schema: jsonObject });
  }

  /** Without `tokenIds` every eligible participant is invited. */
  inviteParticipants(surveyId: number, tokenIds?: number[], email = true): Promise<JsonObject> {
    return this.rpc.invoke("invite_participants", [this.key, surveyId, tokenIds ?? false, email], {
      schema: jsonObject,
      acceptStatus: (status) => /left to send$/.test(status),
    });
  }

  setParticipantProperties(surveyId: number, query: JsonObject, data: JsonObject): Promise<JsonObject> {
    return this.rpc.invoke("set_participant_properties", [this.key, surveyId, query, data], {
      schema: jsonObject,
    });
  }

  async activateTokens(surveyId: number, attributeFields: number[] = []): Promise<true> {
    await this.rpc.invoke("activate_tokens", [this.key, surveyId, attributeFields], { schema: statusReply });
    return true;
  }

  importCpdbParticipants(participants: JsonObject[], update = false): Promise<JsonObject> {
    return this.rpc.invoke("cpd_importParticipants", [this.key, participants, update], {
      schema: jsonObject,
    });
  }

  // ---------------------------------------------------------------------------
  // Quotas
  // ---------------------------------------------------------------------------

  getQuotaProperties(quotaId: number, settings?: string[], language?: string): Promise<JsonObject> {
    return this.rpc.invoke(
      "get_quota_properties",
      [this.key, quotaId, settings ?? null, language ?? null],
      { schema: jsonObject }
    );
  }

  listQuotas(surveyId: number): Promise<JsonObject[]> {
    return this.rpc.invoke("list_quotas", [this.key, surveyId], {
      schema: jsonObjectList,
      empty: { statuses: ["No quotas found"], value: [] },
    });
  }

  addQuota(surveyId: number, quota: NewQuota): Promise<number> {
    return this.rpc.invoke(
      "add_quota",
      [
        this.key,
        surveyId,
        quota.name,
        quota.limit,
        quota.active ?? true,
        quota.action ?? "terminate",
        quota.autoloadUrl ?? false,
        quota.message ?? "",
        quota.url ?? "",
        quota.urlDescription ?? "",
      ],
      { schema: id }
    );
  }

  async deleteQuota(quotaId: number): Promise<true> {
    await this.rpc.invoke("delete_quota", [this.key, quotaId], { schema: statusReply });
    return true;
  }

  setQuotaProperties(quotaId: number, properties: JsonObject): Promise<JsonObject> {
    return this.rpc.invoke("set_quota_properties", [this.key, quotaId, properties], { schema: jsonObject });
  }

  // ---------------------------------------------------------------------------
  // Responses
  // ---------------------------------------------------------------------------

  getResponseIds(surveyId: number, token?: string): Promise<number[]> {
    return this.rpc.invoke("get_response_ids", [this.key, surveyId, token ?? null], {
      schema: z.array(id),
      empty: { statuses: ["No Response found for Token", "No responses found"], value: [] },
    });
  }

  addResponse(surveyId: number, response: JsonObject): Promise<number> {
    return this.rpc.invoke("add_response", [this.key, surveyId, response], { schema: id });
  }

  async addResponses(surveyId: number, responses: JsonObject[]): Promise<number[]> {
    const ids: number[] = [];
    for (const response of responses) {
      ids.push(await this.addResponse(surveyId, response));
    }
    return ids;
  }

  updateResponse(surveyId: number, responseId: number, response: JsonObject): Promise<boolean> {
    return this.rpc.invoke("update_response", [this.key, surveyId, { ...response, id: responseId }], {
      schema: z.boolean(),
    });
  }

  deleteResponse(surveyId: number, responseId: number): Promise<JsonObject> {
    return this.rpc.invoke("delete_response", [this.key, surveyId, responseId], { schema: jsonObject });
  }

  /** Returns the export decoded as UTF-8 text. */
  async exportResponses(surveyId: number, options: ExportResponsesOptions = {}): Promise<string> {
    const data = await this.rpc.invoke(
      "export_responses",
      [
        this.key,
        surveyId,
        options.format ?? "csv",
        options.language ?? null,
        options.completionStatus ?? "all",
        options.headingType ?? "code",
        options.responseType ?? "short",
        options.fromResponseId ?? null,
        options.toResponseId ?? null,
        options.fields ?? null,
      ],
      { schema: base64 }
    );
    return decodeBase64(data);
  }

  // ---------------------------------------------------------------------------
  // Languages
  // ---------------------------------------------------------------------------

  getLanguageProperties(surveyId: number, settings?: string[], language?: string): Promise<JsonObject> {
    return this.rpc.invoke(
      "get_language_properties",
      [this.key, surveyId, settings ?? null, language ?? null],
      { schema: jsonObject }
    );
  }

  async addLanguage(surveyId: number, language: string): Promise<true> {
    await this.rpc.invoke("add_language", [this.key, surveyId, language], { schema: statusReply });
    return true;
  }

  async deleteLanguage(surveyId: number, language: string): Promise<true> {
    await this.rpc.invoke("delete_language", [this.key, surveyId, language], { schema: statusReply });
    return true;
  }

  setLanguageProperties(surveyId: number, properties: JsonObject, language?: string): Promise<JsonObject> {
    return this.rpc.invoke(
      "set_language_properties",
      [this.key, surveyId, properties, language ?? null],
      { schema: jsonObject }
    );
  }

  /** An empty list means the site does not restrict languages. */
  async getAvailableLanguages(): Promise<string[]> {
    const value = await this.getSiteSetting("restrictToLanguages");
    return value.split(/\s+/).filter((lang) => lang.length > 0);
  }

  getDefaultLanguage(): Promise<string> {
    return this.getSiteSetting("defaultlang");
  }

  // ---------------------------------------------------------------------------
  // Site
  // ---------------------------------------------------------------------------

  getSiteSetting(name: string): Promise<string> {
    return this.rpc.invoke("get_site_settings", [this.key, name], { schema: siteSetting });
  }

  getSiteName(): Promise<string> {
    return this.getSiteSetting("sitename");
  }

  getServerVersion(): Promise<string> {
    return this.getSiteSetting("versionnumber");
  }

  getDbVersion(): Promise<string> {
    return this.getSiteSetting("dbversionnumber");
  }

  listUsers(userId?: number): Promise<JsonObject[]> {
    return this.rpc.invoke("list_users", [this.key, userId ?? null], { schema: jsonObjectList });
  }

  // ---------------------------------------------------------------------------
  // Files
  // ---------------------------------------------------------------------------

  getUploadedFiles(surveyId: number, token?: string, responseId?: number): Promise<JsonObject> {
    return this.rpc.invoke(
      "get_uploaded_files",
      [this.key, surveyId, token ?? null, responseId ?? null],
      { schema: jsonObject, empty: { statuses: ["No Response found"], value: {} } }
    );
  }

  uploadFile(surveyId: number, fieldName: string, fileName: string, content: string): Promise<JsonObject> {
    return this.rpc.invoke("upload_file", [this.key, surveyId, fieldName, fileName, content], {
      schema: jsonObject,
    });
  }
}
