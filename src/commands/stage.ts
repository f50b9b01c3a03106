import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import ora from "ora";
import { loadConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { SqliteJobStore } from "../store/sqlite.js";

/**
 * stage - Copy a local file into the job store so photos marked inTempStore can reference it by key
 */
export async function stageCommand(jobId: string, key: string, file: string): Promise<void> {
  const config = loadConfig();
  const spinner = ora();
  const path = resolve(file);

  if (!existsSync(path)) {
    spinner.fail(`File not found: ${path}`);
    process.exit(1);
  }

  const store = new SqliteJobStore(config.store.path);
  try {
    const bytes = readFileSync(path);
    store.putBlob(jobId, key, bytes);
    spinner.succeed(`Staged ${path} as "${key}" for job ${jobId} (${bytes.length.toLocaleString()} bytes)`);
  } catch (error) {
    spinner.fail(`Failed to stage ${path}: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    store.close();
  }
}
