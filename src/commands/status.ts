import { existsSync } from "fs";
import { loadConfig, getConfigPath } from "../config.js";
import { SqliteJobStore } from "../store/sqlite.js";

function mark(ok: boolean): string {
  return ok ? "✓" : "✗";
}

export async function statusCommand(): Promise<void> {
  const configPath = getConfigPath();

  console.log("Configuration:");
  if (existsSync(configPath)) {
    console.log(`  ✓ Config file: ${configPath}`);
  } else {
    console.log(`  ○ No config file, using defaults (run 'photobridge init')`);
  }

  const config = loadConfig(configPath);

  console.log("\nFlickr:");
  console.log(`  ${mark(Boolean(config.flickr.apiKey && config.flickr.apiSecret))} API key and secret`);
  console.log(`  ${mark(Boolean(config.flickr.oauthToken && config.flickr.oauthTokenSecret))} OAuth token`);

  console.log("\nGoogle Photos:");
  console.log(`  ${mark(Boolean(config.google.clientId && config.google.clientSecret))} Client id and secret`);
  console.log(`  ${mark(Boolean(config.google.accessToken || config.google.refreshToken))} OAuth tokens`);
  console.log(`  App name: ${config.google.appName}`);

  console.log("\nJob store:");
  console.log(`  Path: ${config.store.path}`);
  if (!existsSync(config.store.path)) {
    console.log(`  ○ Not created yet`);
  } else {
    const store = new SqliteJobStore(config.store.path);
    const jobs = store.listJobs();
    store.close();
    const staged = jobs.reduce((sum, job) => sum + job.blobCount, 0);
    console.log(`  ✓ Jobs: ${jobs.length}`);
    console.log(`  ✓ Staged photos: ${staged}`);
  }

  console.log("\nSettings:");
  console.log(`  Default service: ${config.import.defaultService}`);
}
