import { createLogger } from "../logger.js";
import { ImageStreamProvider, loadPhotoBytes } from "../import/image-stream.js";
import { checkHasData, importOk, toImportFailure } from "../import/result.js";
import type { Importer, ImportListener, ImportResult } from "../import/types.js";
import type { TokensAndUrlAuthData } from "../models/auth.js";
import type { PhotoModel, PhotosContainerResource } from "../models/photos.js";
import type { JobStore } from "../store/types.js";
import { DEFAULT_ALBUM_ID } from "./client.js";
import type { PhotoEntry, PhotosService, PhotosServiceFactory } from "./types.js";

const log = createLogger("google-import");

export const COPY_PREFIX = "copy of ";
export const DEFAULT_MEDIA_TYPE = "image/jpeg";

export class GooglePhotosImporter implements Importer<TokensAndUrlAuthData> {
  readonly service = "google";
  private serviceFactory: PhotosServiceFactory;
  private jobStore: JobStore;
  private imageStreamProvider: ImageStreamProvider;
  private appName: string;
  // Shared by every job this importer runs; concurrent callers await the same construction
  private photosService: Promise<PhotosService> | null;

  constructor(
    serviceFactory: PhotosServiceFactory,
    jobStore: JobStore,
    options: {
      appName: string;
      imageStreamProvider?: ImageStreamProvider;
    }
  ) {
    this.serviceFactory = serviceFactory;
    this.jobStore = jobStore;
    this.appName = options.appName;
    this.photosService = null;
    this.imageStreamProvider = options.imageStreamProvider ?? new ImageStreamProvider();
  }

  async importItem(
    jobId: string,
    authData: TokensAndUrlAuthData,
    data: PhotosContainerResource,
    listener: ImportListener = {}
  ): Promise<ImportResult> {
    checkHasData(data);

    if (data.albums && data.albums.length > 0) {
      log.warn(
        { jobId, albums: data.albums.length },
        "Importing albums in Google Photos is not supported. Photos will be added to the default album."
      );
    }

    const photos = data.photos ?? [];
    if (photos.length === 0) {
      return importOk(0, 0);
    }

    let service: PhotosService;
    try {
      service = await this.getOrCreatePhotosService(authData);
    } catch (error) {
      return toImportFailure(error, "Error authorizing Google Photos: ");
    }

    let photosImported = 0;
    for (const photo of photos) {
      try {
        const mediaItemId = await this.importSinglePhoto(jobId, service, photo);
        listener.onPhotoImported?.(photo, mediaItemId);
        photosImported++;
      } catch (error) {
        log.error({ jobId, title: photo.title, err: error }, "Failed to import photo");
        return toImportFailure(error, "Error importing photo ");
      }
    }

    log.info({ jobId, photosImported }, "Google Photos import finished");
    return importOk(photosImported, 0);
  }

  async importSinglePhoto(
    jobId: string,
    service: PhotosService,
    inputPhoto: PhotoModel
  ): Promise<string> {
    const outputPhoto: PhotoEntry = {
      title: COPY_PREFIX + inputPhoto.title,
      description: inputPhoto.description,
      client: this.appName,
      mediaType: inputPhoto.mediaType ?? DEFAULT_MEDIA_TYPE,
      bytes: await loadPhotoBytes(inputPhoto, jobId, this.jobStore, this.imageStreamProvider),
    };

    return service.insert(DEFAULT_ALBUM_ID, outputPhoto);
  }

  private getOrCreatePhotosService(authData: TokensAndUrlAuthData): Promise<PhotosService> {
    if (!this.photosService) {
      const pending = this.serviceFactory.createService(authData);
      this.photosService = pending;
      void pending.catch(() => {
        // Let the next caller try again with fresh credentials
        if (this.photosService === pending) {
          this.photosService = null;
        }
      });
    }
    return this.photosService;
  }
}
