import { createFlickr } from "flickr-sdk";
import { z } from "zod";
import { AuthError, VendorApiError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { FlickrAuthData } from "../models/auth.js";
import type { AppCredentials, FlickrApi, FlickrSession, UploadMetaData } from "./types.js";

const log = createLogger("flickr");

const loginResponseSchema = z.object({
  user: z.object({ id: z.string() }),
});

const photosetResponseSchema = z.object({
  photoset: z.object({ id: z.union([z.string(), z.number()]).transform(String) }),
});

// The uploader answers with the bare photo id or an object carrying it
const uploadResponseSchema = z.union([
  z.string(),
  z.number().transform(String),
  z.object({ id: z.union([z.string(), z.number()]).transform(String) }).transform((r) => r.id),
]);

function flag(value: boolean): "0" | "1" {
  return value ? "1" : "0";
}

function toVendorError(error: unknown, action: string): VendorApiError {
  if (error instanceof VendorApiError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new VendorApiError("flickr", `${action} failed: ${message}`);
}

function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, action: string): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new VendorApiError("flickr", `${action} returned an unexpected response`);
  }
  return parsed.data;
}

export class FlickrClient implements FlickrApi {
  private appCredentials: AppCredentials;

  constructor(appCredentials: AppCredentials) {
    this.appCredentials = appCredentials;
  }

  async authenticate(authData: FlickrAuthData): Promise<FlickrSession> {
    if (!this.appCredentials.key || !this.appCredentials.secret) {
      throw new AuthError("flickr", "Flickr API key and secret are not configured");
    }
    if (!authData.token || !authData.tokenSecret) {
      throw new AuthError("flickr", "Missing Flickr OAuth token");
    }

    const { flickr, upload } = createFlickr({
      consumerKey: this.appCredentials.key,
      consumerSecret: this.appCredentials.secret,
      oauthToken: authData.token,
      oauthTokenSecret: authData.tokenSecret,
    });

    let login: unknown;
    try {
      login = await flickr("flickr.test.login", {});
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AuthError("flickr", message);
    }
    const { user } = parseResponse(loginResponseSchema, login, "flickr.test.login");
    log.debug({ userId: user.id }, "Authenticated with Flickr");

    return {
      userId: user.id,

      async upload(bytes: Buffer, metaData: UploadMetaData): Promise<string> {
        let raw: unknown;
        try {
          raw = await upload(new Blob([bytes], { type: metaData.mediaType }), {
            title: metaData.title,
            description: metaData.description ?? "",
            is_public: flag(metaData.publicFlag),
            is_friend: flag(metaData.friendFlag),
            is_family: flag(metaData.familyFlag),
          });
        } catch (error) {
          throw toVendorError(error, "Upload");
        }
        const photoId = parseResponse(uploadResponseSchema, raw, "Upload");
        log.debug({ photoId, title: metaData.title }, "Uploaded photo");
        return photoId;
      },

      async createPhotoset(title: string, description: string, primaryPhotoId: string): Promise<string> {
        let raw: unknown;
        try {
          raw = await flickr("flickr.photosets.create", {
            title,
            description,
            primary_photo_id: primaryPhotoId,
          });
        } catch (error) {
          throw toVendorError(error, "flickr.photosets.create");
        }
        const { photoset } = parseResponse(photosetResponseSchema, raw, "flickr.photosets.create");
        log.debug({ photosetId: photoset.id, title }, "Created photoset");
        return photoset.id;
      },

      async addPhotoToSet(photosetId: string, photoId: string): Promise<void> {
        try {
          await flickr("flickr.photosets.addPhoto", {
            photoset_id: photosetId,
            photo_id: photoId,
          });
        } catch (error) {
          throw toVendorError(error, "flickr.photosets.addPhoto");
        }
      },
    };
  }
}
