import type { AuthData } from "../models/auth.js";
import type { PhotoAlbum, PhotoModel, PhotosContainerResource } from "../models/photos.js";
import type { ServiceName } from "../config.js";

export type ImportErrorKind = "auth" | "io" | "vendor";

export type ImportResult =
  | { status: "ok"; photosImported: number; albumsCreated: number }
  | { status: "error"; kind: ImportErrorKind; message: string };

export interface ImportListener {
  onPhotoImported?(photo: PhotoModel, vendorPhotoId: string): void;
  onAlbumCreated?(album: PhotoAlbum, vendorAlbumId: string): void;
}

export interface Importer<A extends AuthData> {
  readonly service: ServiceName;
  importItem(
    jobId: string,
    authData: A,
    data: PhotosContainerResource,
    listener?: ImportListener
  ): Promise<ImportResult>;
}
