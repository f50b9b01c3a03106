import { loadConfig } from "../config.js";
import { SqliteJobStore } from "../store/sqlite.js";
import { TEMP_PHOTOS_DATA } from "../store/temp-photos.js";
import { printAlbumTable } from "../utils/table.js";
import { confirm } from "../utils/confirm.js";

interface JsonOption {
  json?: boolean;
}

interface ClearOptions {
  yes?: boolean;
}

function openStore(): { store: SqliteJobStore; columns: { albumName: number; vendorId: number } } {
  const config = loadConfig();
  return { store: new SqliteJobStore(config.store.path), columns: config.display.columns };
}

export async function jobsListCommand(options: JsonOption = {}): Promise<void> {
  const { store } = openStore();
  const jobs = store.listJobs();
  store.close();

  if (options.json) {
    console.log(JSON.stringify(jobs, null, 2));
    return;
  }

  if (jobs.length === 0) {
    console.log("No jobs found.");
    return;
  }

  console.log(`${"Job".padEnd(38)} ${"Updated".padEnd(20)} Data`);
  for (const job of jobs) {
    const updated = new Date(job.updatedAt).toLocaleString();
    const data = [...job.dataTypes, job.blobCount > 0 ? `${job.blobCount} staged` : ""]
      .filter(Boolean)
      .join(", ");
    console.log(`${job.jobId.padEnd(38)} ${updated.padEnd(20)} ${data}`);
  }
}

export async function jobsShowCommand(jobId: string, options: JsonOption = {}): Promise<void> {
  const { store, columns } = openStore();
  const tempData = store.findData(TEMP_PHOTOS_DATA, jobId);
  store.close();

  if (!tempData) {
    console.log(`Job ${jobId} has no album data.`);
    process.exitCode = 1;
    return;
  }

  if (options.json) {
    console.log(JSON.stringify(tempData, null, 2));
    return;
  }

  console.log(`Job ${jobId}: ${tempData.createdCount} album(s) created, ${tempData.pendingCount} pending\n`);
  printAlbumTable(tempData.entries(), columns);
}

/**
 * jobs clear - Remove a job's album mappings and staged photos
 */
export async function jobsClearCommand(jobId: string, options: ClearOptions = {}): Promise<void> {
  const { store } = openStore();
  try {
    const job = store.listJobs().find((j) => j.jobId === jobId);
    if (!job) {
      console.log(`Job ${jobId} not found. Nothing to clear.`);
      return;
    }

    console.log("This removes the job's album mappings and staged photos.");
    console.log("Importing into the same job again will create its albums again.");
    console.log();

    if (!options.yes) {
      const confirmed = await confirm("Are you sure?");
      if (!confirmed) {
        console.log("Cancelled.");
        return;
      }
    }

    const result = store.removeJob(jobId);
    console.log(`Cleared ${result.dataRemoved} data record(s) and ${result.blobsRemoved} staged photo(s).`);
  } finally {
    store.close();
  }
}
