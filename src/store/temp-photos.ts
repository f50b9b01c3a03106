import { z } from "zod";
import { photoAlbumSchema, type PhotoAlbum } from "../models/photos.js";
import { ImportPreconditionError } from "../errors.js";
import type { DataType } from "./types.js";

// Album ids are arbitrary strings, so the maps are stored as entry lists rather than objects
const tempPhotosJsonSchema = z.object({
  jobId: z.string(),
  pendingAlbums: z.array(z.tuple([z.string(), photoAlbumSchema])).default([]),
  createdAlbums: z.array(z.tuple([z.string(), z.string()])).default([]),
});

export type TempPhotosJson = z.infer<typeof tempPhotosJsonSchema>;

export type AlbumState =
  | { state: "unregistered" }
  | { state: "pending"; album: PhotoAlbum }
  | { state: "created"; vendorAlbumId: string };

/**
 * Job-scoped album bookkeeping for an import run.
 *
 * Each universal album id moves through unregistered -> pending -> created.
 * Pending albums carry the definition needed to create them on the vendor side;
 * created albums carry the vendor's id.
 */
export class TempPhotosData {
  readonly jobId: string;
  private pendingAlbums: Map<string, PhotoAlbum>;
  private createdAlbums: Map<string, string>;

  constructor(
    jobId: string,
    pendingAlbums: Map<string, PhotoAlbum> = new Map(),
    createdAlbums: Map<string, string> = new Map()
  ) {
    this.jobId = jobId;
    this.pendingAlbums = pendingAlbums;
    this.createdAlbums = createdAlbums;
  }

  static fromJSON(json: TempPhotosJson): TempPhotosData {
    return new TempPhotosData(
      json.jobId,
      new Map(json.pendingAlbums),
      new Map(json.createdAlbums)
    );
  }

  lookup(albumId: string): AlbumState {
    const vendorAlbumId = this.createdAlbums.get(albumId);
    if (vendorAlbumId !== undefined) {
      return { state: "created", vendorAlbumId };
    }
    const album = this.pendingAlbums.get(albumId);
    if (album) {
      return { state: "pending", album };
    }
    return { state: "unregistered" };
  }

  /** Returns false when the album already exists remotely and was left alone. */
  registerPending(album: PhotoAlbum): boolean {
    if (this.createdAlbums.has(album.id)) {
      return false;
    }
    this.pendingAlbums.set(album.id, album);
    return true;
  }

  promoteToCreated(albumId: string, vendorAlbumId: string): void {
    if (!this.pendingAlbums.has(albumId)) {
      throw new ImportPreconditionError(`Album not pending: ${albumId}`);
    }
    this.createdAlbums.set(albumId, vendorAlbumId);
    this.pendingAlbums.delete(albumId);
  }

  lookupNewAlbumId(albumId: string): string | undefined {
    return this.createdAlbums.get(albumId);
  }

  lookupTempAlbum(albumId: string): PhotoAlbum | undefined {
    return this.pendingAlbums.get(albumId);
  }

  get pendingCount(): number {
    return this.pendingAlbums.size;
  }

  get createdCount(): number {
    return this.createdAlbums.size;
  }

  entries(): Array<{ albumId: string } & AlbumState> {
    const rows: Array<{ albumId: string } & AlbumState> = [];
    for (const [albumId, album] of this.pendingAlbums) {
      rows.push({ albumId, state: "pending", album });
    }
    for (const [albumId, vendorAlbumId] of this.createdAlbums) {
      rows.push({ albumId, state: "created", vendorAlbumId });
    }
    return rows.sort((a, b) => a.albumId.localeCompare(b.albumId));
  }

  toJSON(): TempPhotosJson {
    return {
      jobId: this.jobId,
      pendingAlbums: [...this.pendingAlbums],
      createdAlbums: [...this.createdAlbums],
    };
  }
}

export const TEMP_PHOTOS_DATA: DataType<TempPhotosData> = {
  name: "temp-photos-data",
  schema: tempPhotosJsonSchema.transform((json) => TempPhotosData.fromJSON(json)),
};
