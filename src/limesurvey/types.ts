export type JsonObject = Record<string, unknown>;

export type ImportDataType = "lss" | "csv" | "txt" | "lsa" | "tsv" | "lsg" | "lsq";

export type StatisticsDocumentType = "pdf" | "xls" | "html";

export type TimelinePeriod = "day" | "hour";

export type ResponseExportFormat = "csv" | "json";

export interface NewSurvey {
  title: string;
  language: string;
  /** G = group by group, S = single question, A = all in one */
  format?: "G" | "S" | "A";
  surveyId?: number;
}

export interface NewQuota {
  name: string;
  limit: number;
  active?: boolean;
  action?: "terminate" | "confirm_terminate";
  autoloadUrl?: boolean;
  message?: string;
  url?: string;
  urlDescription?: string;
}

export interface ListParticipantsOptions {
  start?: number;
  limit?: number;
  unused?: boolean;
  attributes?: string[] | false;
  conditions?: JsonObject;
}

export interface ExportResponsesOptions {
  format?: ResponseExportFormat;
  language?: string;
  completionStatus?: "complete" | "incomplete" | "all";
  headingType?: "code" | "full" | "abbreviated";
  responseType?: "short" | "long";
  fromResponseId?: number;
  toResponseId?: number;
  fields?: string[];
}
