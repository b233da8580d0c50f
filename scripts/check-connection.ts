import { loadConfig } from "../src/config.js";
import { LimeSurveyClient } from "../src/limesurvey/client.js";

async function main() {
  const config = loadConfig();
  const client = new LimeSurveyClient(config.limesurvey);

  console.log(`Connecting to: ${config.limesurvey.url} as ${config.limesurvey.username}`);
  const { siteName, version, surveys } = await client.session(async (s) => ({
    siteName: await s.getSiteName(),
    version: await s.getServerVersion(),
    surveys: await s.listSurveys(),
  }));

  console.log(`\n✓ Connected to "${siteName}" (LimeSurvey ${version})`);
  console.log(`  ${surveys.length} survey(s) visible to this account`);
}

main().catch((err: unknown) => {
  console.error(`\n✗ Connection failed: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
