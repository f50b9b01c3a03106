#!/usr/bin/env node

import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { importCommand } from "./commands/import.js";
import { stageCommand } from "./commands/stage.js";
import { jobsListCommand, jobsShowCommand, jobsClearCommand } from "./commands/jobs.js";
import { statusCommand } from "./commands/status.js";

const program = new Command();

program
  .name("photobridge")
  .description("CLI tool for importing portable photo collections into Flickr and Google Photos")
  .version("0.1.0");

program
  .command("init")
  .description("Create a config file and the local job store")
  .option("--local", "Create config in current directory instead of global location")
  .action(initCommand);

program
  .command("import")
  .description("Import albums and photos from a JSON container file")
  .argument("<file>", "Photos container (JSON with albums and photos)")
  .option("--to <service>", "Destination service: flickr or google (default: from config)")
  .option("--job <id>", "Job id to create or resume (default: new id)")
  .option("--dry-run", "Validate and summarise the container without importing")
  .action(importCommand);

program
  .command("stage")
  .description("Stage a local photo in the job store for photos marked inTempStore")
  .argument("<job>", "Job id")
  .argument("<key>", "Key the photo's fetchableUrl refers to")
  .argument("<file>", "Local photo file")
  .action(stageCommand);

// Jobs command group
const jobs = program
  .command("jobs")
  .description("List and inspect import jobs")
  .option("--json", "Output as JSON")
  .action(jobsListCommand);

jobs
  .command("list")
  .description("List jobs in the store")
  .option("--json", "Output as JSON")
  .action(jobsListCommand);

jobs
  .command("show")
  .description("Show the album mapping of a job")
  .argument("<id>", "Job id")
  .option("--json", "Output as JSON")
  .action(jobsShowCommand);

jobs
  .command("clear")
  .description("Remove a job's album mappings and staged photos")
  .argument("<id>", "Job id")
  .option("-y, --yes", "Skip confirmation prompt")
  .action(jobsClearCommand);

program
  .command("status")
  .description("Show configuration and job store info")
  .action(statusCommand);

await program.parseAsync();
