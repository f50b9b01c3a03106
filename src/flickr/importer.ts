import { createLogger } from "../logger.js";
import { ImportPreconditionError } from "../errors.js";
import { ImageStreamProvider, loadPhotoBytes } from "../import/image-stream.js";
import { checkHasData, importOk, toImportFailure } from "../import/result.js";
import type { Importer, ImportListener, ImportResult } from "../import/types.js";
import type { FlickrAuthData } from "../models/auth.js";
import type { PhotoAlbum, PhotoModel, PhotosContainerResource } from "../models/photos.js";
import { TEMP_PHOTOS_DATA, TempPhotosData } from "../store/temp-photos.js";
import type { JobStore } from "../store/types.js";
import type { FlickrApi, FlickrSession } from "./types.js";

const log = createLogger("flickr-import");

export const COPY_PREFIX = "Copy of - ";
export const DEFAULT_MEDIA_TYPE = "image/jpeg";

export class FlickrPhotosImporter implements Importer<FlickrAuthData> {
  readonly service = "flickr";
  private flickr: FlickrApi;
  private jobStore: JobStore;
  private imageStreamProvider: ImageStreamProvider;

  constructor(
    flickr: FlickrApi,
    jobStore: JobStore,
    imageStreamProvider: ImageStreamProvider = new ImageStreamProvider()
  ) {
    this.flickr = flickr;
    this.jobStore = jobStore;
    this.imageStreamProvider = imageStreamProvider;
  }

  async importItem(
    jobId: string,
    authData: FlickrAuthData,
    data: PhotosContainerResource,
    listener: ImportListener = {}
  ): Promise<ImportResult> {
    let session: FlickrSession;
    try {
      session = await this.flickr.authenticate(authData);
    } catch (error) {
      return toImportFailure(error, "Error authorizing Flickr Auth: ");
    }

    checkHasData(data);

    let tempData: TempPhotosData;
    try {
      tempData = this.loadTempData(jobId);
      if (data.albums) {
        this.importAlbums(data.albums, tempData);
        this.jobStore.update(jobId, TEMP_PHOTOS_DATA, tempData);
      }
    } catch (error) {
      log.error({ jobId, err: error }, "Failed to prepare album mappings");
      return toImportFailure(error, "Error importing albums ");
    }

    let photosImported = 0;
    let albumsCreated = 0;

    for (const photo of data.photos ?? []) {
      try {
        const created = await this.importSinglePhoto(jobId, session, photo, tempData, listener);
        photosImported++;
        if (created) albumsCreated++;
      } catch (error) {
        log.error({ jobId, title: photo.title, err: error }, "Failed to import photo");
        return toImportFailure(error, "Error importing photo ");
      }
    }

    log.info({ jobId, photosImported, albumsCreated }, "Flickr import finished");
    return importOk(photosImported, albumsCreated);
  }

  private loadTempData(jobId: string): TempPhotosData {
    const existing = this.jobStore.findData(TEMP_PHOTOS_DATA, jobId);
    if (existing) return existing;

    const created = new TempPhotosData(jobId);
    this.jobStore.create(jobId, TEMP_PHOTOS_DATA, created);
    return created;
  }

  // Flickr can only create a photoset around an existing photo, so albums wait
  // in the job store until their first photo arrives
  private importAlbums(albums: PhotoAlbum[], tempData: TempPhotosData): void {
    for (const album of albums) {
      if (!tempData.registerPending(album)) {
        log.debug({ albumId: album.id }, "Album already created for this job");
      }
    }
  }

  /** Returns true when the photo's upload also created its album. */
  private async importSinglePhoto(
    jobId: string,
    session: FlickrSession,
    photo: PhotoModel,
    tempData: TempPhotosData,
    listener: ImportListener
  ): Promise<boolean> {
    const albumId = photo.albumId;
    const albumState = albumId ? tempData.lookup(albumId) : undefined;

    // TODO: photos of an unknown album could go to a default album instead of failing the job
    if (albumState && albumState.state === "unregistered") {
      throw new ImportPreconditionError(`Album not found: ${albumId}`);
    }

    const photoId = await this.uploadPhoto(jobId, session, photo);

    // Without an album the photo just lives in the user's camera roll
    if (!albumId || !albumState) {
      listener.onPhotoImported?.(photo, photoId);
      return false;
    }

    let created = false;
    if (albumState.state === "created") {
      await session.addPhotoToSet(albumState.vendorAlbumId, photoId);
    } else if (albumState.state === "pending") {
      const album = albumState.album;
      const photosetId = await session.createPhotoset(
        COPY_PREFIX + album.name,
        album.description ?? "",
        photoId
      );
      tempData.promoteToCreated(albumId, photosetId);
      listener.onAlbumCreated?.(album, photosetId);
      log.info({ jobId, albumId, photosetId }, "Created Flickr photoset");
      created = true;
    }

    this.jobStore.update(jobId, TEMP_PHOTOS_DATA, tempData);
    listener.onPhotoImported?.(photo, photoId);
    return created;
  }

  private async uploadPhoto(
    jobId: string,
    session: FlickrSession,
    photo: PhotoModel
  ): Promise<string> {
    const bytes = await loadPhotoBytes(photo, jobId, this.jobStore, this.imageStreamProvider);
    return session.upload(bytes, {
      title: COPY_PREFIX + photo.title,
      description: photo.description,
      mediaType: photo.mediaType ?? DEFAULT_MEDIA_TYPE,
      publicFlag: false,
      friendFlag: false,
      familyFlag: false,
    });
  }
}
