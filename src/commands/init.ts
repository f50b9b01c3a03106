import { writeFileSync, existsSync, mkdirSync } from "fs";
import { join } from "path";
import ora from "ora";
import { loadConfig, getDefaultConfig, getGlobalConfigDir } from "../config.js";
import { SqliteJobStore } from "../store/sqlite.js";

export interface InitOptions {
  local?: boolean;
}

export async function initCommand(options: InitOptions = {}): Promise<void> {
  const spinner = ora();

  // Determine config path based on --local flag
  let configPath: string;
  if (options.local) {
    configPath = join(process.cwd(), "config.yaml");
  } else {
    const globalDir = getGlobalConfigDir();
    if (!existsSync(globalDir)) {
      mkdirSync(globalDir, { recursive: true });
    }
    configPath = join(globalDir, "config.yaml");
  }

  if (!existsSync(configPath)) {
    spinner.start("Creating config file...");
    writeFileSync(configPath, getDefaultConfig());
    spinner.succeed(`Created config file: ${configPath}`);
  } else {
    spinner.info(`Config file already exists: ${configPath}`);
  }

  const config = loadConfig(configPath);

  spinner.start("Preparing job store...");
  try {
    const store = new SqliteJobStore(config.store.path);
    store.close();
    spinner.succeed(`Job store ready: ${config.store.path}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    spinner.fail(`Failed to open job store: ${message}`);
    process.exit(1);
  }

  console.log("\nInitialization complete!");
  console.log("\nNext steps:");
  console.log("1. Add Flickr or Google credentials to the config (or the FLICKR_*/GOOGLE_* env vars)");
  console.log("2. Run: photobridge import photos.json --to flickr");
}
