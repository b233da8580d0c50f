import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Config, PluginConfig } from "../config.js";
import type { LimeSurveyClient } from "../limesurvey/client.js";
import { registerSurveys } from "./surveys.js";
import { registerGroups } from "./groups.js";
import { registerQuestions } from "./questions.js";
import { registerParticipants } from "./participants.js";
import { registerQuotas } from "./quotas.js";
import { registerResponses } from "./responses.js";
import { registerLanguages } from "./languages.js";
import { registerSite } from "./site.js";
import { registerFiles } from "./files.js";

export interface PluginContext {
  client: LimeSurveyClient;
  /** When set, plugins register resources only. */
  readOnly: boolean;
  config: PluginConfig;
}

type PluginRegistrar = (mcp: McpServer, ctx: PluginContext) => void;

const plugins: Record<string, PluginRegistrar> = {
  surveys: registerSurveys,
  groups: registerGroups,
  questions: registerQuestions,
  participants: registerParticipants,
  quotas: registerQuotas,
  responses: registerResponses,
  languages: registerLanguages,
  site: registerSite,
  files: registerFiles,
};

export interface ResolvedPlugin {
  name: string;
  register: PluginRegistrar;
  config: PluginConfig;
}

/** Picks the enabled plugins. Plugins missing from the config are enabled. */
export function resolvePlugins(config: Config): ResolvedPlugin[] {
  for (const name of Object.keys(config.plugins)) {
    if (!(name in plugins)) {
      console.warn(`Unknown plugin '${name}', skipping`);
    }
  }

  const resolved: ResolvedPlugin[] = [];
  for (const [name, register] of Object.entries(plugins)) {
    const pluginConfig = config.plugins[name] ?? { enabled: true };
    if (!pluginConfig.enabled) {
      console.error(`Plugin '${name}' is disabled, skipping`);
      continue;
    }
    resolved.push({ name, register, config: pluginConfig });
  }
  return resolved;
}

export function loadPlugins(
  mcp: McpServer,
  plugins: ResolvedPlugin[],
  client: LimeSurveyClient,
  readOnly: boolean
): void {
  for (const plugin of plugins) {
    plugin.register(mcp, { client, readOnly, config: plugin.config });
  }
}
