import type { TokensAndUrlAuthData } from "../models/auth.js";

export interface PhotoEntry {
  title: string;
  description?: string;
  client: string;
  mediaType: string;
  bytes: Buffer;
}

export interface PhotosService {
  /** Uploads the entry into the given album and returns the vendor media item id. */
  insert(albumId: string, entry: PhotoEntry): Promise<string>;
}

export interface PhotosServiceFactory {
  createService(authData: TokensAndUrlAuthData): Promise<PhotosService>;
}
