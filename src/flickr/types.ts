import type { FlickrAuthData } from "../models/auth.js";

export interface UploadMetaData {
  title: string;
  description?: string;
  mediaType: string;
  publicFlag: boolean;
  friendFlag: boolean;
  familyFlag: boolean;
}

/** An authenticated Flickr user: everything the importer calls on the vendor. */
export interface FlickrSession {
  userId: string;
  upload(bytes: Buffer, metaData: UploadMetaData): Promise<string>;
  createPhotoset(title: string, description: string, primaryPhotoId: string): Promise<string>;
  addPhotoToSet(photosetId: string, photoId: string): Promise<void>;
}

export interface FlickrApi {
  authenticate(authData: FlickrAuthData): Promise<FlickrSession>;
}

export interface AppCredentials {
  key: string;
  secret: string;
}
