import { readFileSync, existsSync } from "fs";
import yaml from "js-yaml";
import { z } from "zod";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const pluginConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
  })
  .passthrough();

const booleanish = z.union([
  z.boolean(),
  z
    .string()
    .transform((v) => v.trim().toLowerCase())
    .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
    .transform((v) => v === "true" || v === "1" || v === "yes"),
]);

const configSchema = z.object({
  server: z
    .object({
      name: z.string().min(1).default("limesurvey-mcp"),
      transport: z.enum(["stdio", "http"]).default("stdio"),
      port: z.coerce.number().int().min(0).max(65535).default(3000),
    })
    .default({}),
  limesurvey: z.object({
    url: z
      .string()
      .url()
      .refine((u) => /^https?:\/\//i.test(u), "must be an http(s) URL"),
    username: z.string().min(1),
    password: z.string().min(1),
    authPlugin: z.string().min(1).default("Authdb"),
    timeoutMs: z.coerce.number().int().positive().default(30000),
    readOnly: booleanish.default(false),
  }),
  auth: z
    .object({
      password: z.string().min(1).optional(),
      clientSecret: z.string().min(1).optional(),
    })
    .refine((a) => !a.password || a.clientSecret, {
      message: "CLIENT_SECRET is required when AUTH_PASSWORD is set",
      path: ["clientSecret"],
    })
    .default({}),
  plugins: z.record(pluginConfigSchema).default({}),
});

export type Config = z.infer<typeof configSchema>;
export type PluginConfig = z.infer<typeof pluginConfigSchema>;

type Env = Record<string, string | undefined>;

// Environment variable -> [section, key]
const ENV_OVERRIDES: Record<string, [string, string]> = {
  LIMESURVEY_URL: ["limesurvey", "url"],
  LIMESURVEY_USERNAME: ["limesurvey", "username"],
  LIMESURVEY_PASSWORD: ["limesurvey", "password"],
  LIMESURVEY_AUTH_PLUGIN: ["limesurvey", "authPlugin"],
  LIMESURVEY_TIMEOUT_MS: ["limesurvey", "timeoutMs"],
  LIMESURVEY_READ_ONLY: ["limesurvey", "readOnly"],
  MCP_SERVER_NAME: ["server", "name"],
  MCP_TRANSPORT: ["server", "transport"],
  PORT: ["server", "port"],
  AUTH_PASSWORD: ["auth", "password"],
  CLIENT_SECRET: ["auth", "clientSecret"],
};

const REQUIRED_ENV: Record<string, string> = {
  url: "LIMESURVEY_URL",
  username: "LIMESURVEY_USERNAME",
  password: "LIMESURVEY_PASSWORD",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function resolveConfigPath(env: Env): string | undefined {
  // Priority: CONFIG_PATH env > config.local.yaml > config.yaml
  if (env.CONFIG_PATH) {
    return env.CONFIG_PATH;
  }
  if (existsSync("config.local.yaml")) {
    return "config.local.yaml";
  }
  if (existsSync("config.yaml")) {
    return "config.yaml";
  }
  return undefined;
}

function readConfigFile(path: string): Record<string, unknown> {
  const raw = readFileSync(path, "utf-8");
  const parsed: unknown = yaml.load(raw);
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a mapping`);
  }
  return parsed;
}

function applyEnv(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const result: Record<string, unknown> = { ...raw };
  for (const [variable, [section, key]] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value === undefined || value === "") continue;
    const current = result[section];
    result[section] = { ...(isRecord(current) ? current : {}), [key]: value };
  }
  return result;
}

function describeIssues(error: z.ZodError): string {
  const missing: string[] = [];
  const other: string[] = [];

  for (const issue of error.issues) {
    const [section, key] = issue.path;
    const envName = section === "limesurvey" && typeof key === "string" ? REQUIRED_ENV[key] : undefined;
    const isMissing =
      issue.code === "invalid_type" ||
      (issue.code === "too_small" && issue.minimum === 1 && issue.type === "string");
    if (envName && isMissing) {
      missing.push(envName);
    } else if (section === "limesurvey" && issue.path.length === 1) {
      missing.push(...Object.values(REQUIRED_ENV));
    } else {
      other.push(`${issue.path.join(".")}: ${issue.message}`);
    }
  }

  const parts: string[] = [];
  if (missing.length > 0) {
    parts.push(`Missing required configuration: ${[...new Set(missing)].join(", ")}`);
  }
  parts.push(...other);
  return parts.join("; ");
}

/**
 * Loads the YAML config file (if any), applies environment overrides and
 * validates the result. Throws {@link ConfigError} when the LimeSurvey
 * credentials are missing or a value is invalid.
 */
export function loadConfig(configPath?: string, env: Env = process.env): Config {
  const path = configPath ?? resolveConfigPath(env);
  let raw: Record<string, unknown> = {};
  if (path) {
    console.error(`Loading config from: ${path}`);
    raw = readConfigFile(path);
  }

  const result = configSchema.safeParse(applyEnv(raw, env));
  if (!result.success) {
    throw new ConfigError(describeIssues(result.error));
  }
  return result.data;
}
