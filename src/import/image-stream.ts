import { FetchError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { PhotoModel } from "../models/photos.js";
import type { JobStore } from "../store/types.js";
import { readAll } from "../utils/stream.js";

const log = createLogger("image-stream");

type FetchFn = (url: string) => Promise<Response>;

/** Fetches photo bytes by URL with a plain GET; no auth headers are sent. */
export class ImageStreamProvider {
  private fetchImpl: FetchFn;

  constructor(fetchImpl: FetchFn = (url) => fetch(url)) {
    this.fetchImpl = fetchImpl;
  }

  async get(url: string): Promise<Buffer> {
    let response: Response;
    try {
      response = await this.fetchImpl(url);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FetchError(url, `Failed to fetch ${url}: ${message}`);
    }

    if (!response.ok) {
      throw new FetchError(
        url,
        `Failed to fetch ${url}: HTTP ${response.status}`,
        response.status
      );
    }

    const bytes = Buffer.from(await response.arrayBuffer());
    log.debug({ url, size: bytes.length }, "Fetched image");
    return bytes;
  }
}

/**
 * Reads a photo's bytes from the job store when it was staged there,
 * otherwise fetches them from its URL.
 */
export async function loadPhotoBytes(
  photo: PhotoModel,
  jobId: string,
  jobStore: JobStore,
  imageStreamProvider: ImageStreamProvider
): Promise<Buffer> {
  if (photo.inTempStore) {
    return readAll(jobStore.getStream(jobId, photo.fetchableUrl));
  }
  return imageStreamProvider.get(photo.fetchableUrl);
}
