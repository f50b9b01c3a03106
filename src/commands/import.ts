import { randomUUID } from "crypto";
import { resolve } from "path";
import ora from "ora";
import cliProgress from "cli-progress";
import { loadConfig, type ServiceName } from "../config.js";
import { errorMessage } from "../errors.js";
import { createImporter, runImport, type ImportListener, type ImportResult } from "../import/index.js";
import { loadContainer, type PhotosContainerResource } from "../models/photos.js";
import { SqliteJobStore } from "../store/sqlite.js";

interface ImportOptions {
  to?: string;
  job?: string;
  dryRun?: boolean;
}

function parseService(value: string): ServiceName {
  if (value === "flickr" || value === "google") {
    return value;
  }
  throw new Error(`Unknown service: ${value}. Use "flickr" or "google".`);
}

function printSummary(container: PhotosContainerResource): void {
  const albums = container.albums ?? [];
  const photos = container.photos ?? [];
  const staged = photos.filter((p) => p.inTempStore).length;
  const withoutAlbum = photos.filter((p) => !p.albumId).length;

  console.log(`  Albums: ${albums.length}`);
  console.log(`  Photos: ${photos.length} (${staged} staged, ${withoutAlbum} without album)`);
  for (const album of albums) {
    const count = photos.filter((p) => p.albumId === album.id).length;
    console.log(`    - ${album.name}: ${count} photo(s)`);
  }
}

export async function importCommand(file: string, options: ImportOptions): Promise<void> {
  const config = loadConfig();
  const spinner = ora();

  let service: ServiceName;
  let container: PhotosContainerResource;
  try {
    service = parseService(options.to ?? config.import.defaultService);
    container = loadContainer(resolve(file));
  } catch (error) {
    spinner.fail(errorMessage(error));
    process.exit(1);
  }

  if (options.dryRun) {
    console.log(`Would import into ${service}:`);
    printSummary(container);
    return;
  }

  const jobId = options.job ?? randomUUID();
  const store = new SqliteJobStore(config.store.path);
  const configured = createImporter(service, config, store);

  const total = container.photos?.length ?? 0;
  const progressBar = new cliProgress.SingleBar(
    {
      format: "Importing |{bar}| {value}/{total} photos",
      barsize: config.display.progressBarWidth,
      hideCursor: true,
    },
    cliProgress.Presets.shades_classic
  );
  const albumsCreated: string[] = [];
  const listener: ImportListener = {
    onPhotoImported: () => progressBar.increment(),
    onAlbumCreated: (album) => albumsCreated.push(album.name),
  };

  console.log(`Job: ${jobId}`);
  if (total > 0) {
    progressBar.start(total, 0);
  }

  let result: ImportResult;
  try {
    result = await runImport(configured, jobId, container, listener);
  } catch (error) {
    progressBar.stop();
    spinner.fail(`Import rejected: ${errorMessage(error)}`);
    store.close();
    process.exit(1);
  }
  progressBar.stop();
  store.close();

  if (result.status === "error") {
    spinner.fail(`${result.message} (${result.kind})`);
    console.error(`\nRe-run with --job ${jobId} to continue; photos already uploaded will be uploaded again.`);
    process.exit(1);
  }

  spinner.succeed(`Imported ${result.photosImported} photo(s) into ${service}`);
  if (albumsCreated.length > 0) {
    console.log(`  Albums created: ${albumsCreated.join(", ")}`);
  }
}
