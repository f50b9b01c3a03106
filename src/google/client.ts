import { OAuth2Client } from "google-auth-library";
import { z } from "zod";
import { AuthError, VendorApiError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { TokensAndUrlAuthData } from "../models/auth.js";
import type { PhotoEntry, PhotosService, PhotosServiceFactory } from "./types.js";

const log = createLogger("google");

export const UPLOAD_URL = "https://photoslibrary.googleapis.com/v1/uploads";
export const BATCH_CREATE_URL = "https://photoslibrary.googleapis.com/v1/mediaItems:batchCreate";
// Uploading to the default album leaves the photo in the account's library
export const DEFAULT_ALBUM_ID = "default";

const batchCreateResponseSchema = z.object({
  newMediaItemResults: z
    .array(
      z.object({
        status: z.object({ code: z.number().optional(), message: z.string().optional() }).optional(),
        mediaItem: z.object({ id: z.string() }).optional(),
      })
    )
    .min(1),
});

export interface GoogleAppCredentials {
  clientId: string;
  clientSecret: string;
}

export class GoogleCredentialFactory {
  private appCredentials: GoogleAppCredentials;

  constructor(appCredentials: GoogleAppCredentials) {
    this.appCredentials = appCredentials;
  }

  createCredential(authData: TokensAndUrlAuthData): OAuth2Client {
    if (!authData.accessToken && !authData.refreshToken) {
      throw new AuthError("google", "Missing Google OAuth tokens");
    }
    const client = new OAuth2Client({
      clientId: this.appCredentials.clientId,
      clientSecret: this.appCredentials.clientSecret,
      endpoints: { oauth2TokenUrl: authData.tokenServerUrl },
    });
    client.setCredentials({
      access_token: authData.accessToken || undefined,
      refresh_token: authData.refreshToken,
    });
    return client;
  }
}

export class GooglePhotosService implements PhotosService {
  private client: OAuth2Client;

  constructor(client: OAuth2Client) {
    this.client = client;
  }

  async insert(albumId: string, entry: PhotoEntry): Promise<string> {
    const uploadToken = await this.uploadBytes(entry);

    let raw: unknown;
    try {
      const response = await this.client.request<unknown>({
        url: BATCH_CREATE_URL,
        method: "POST",
        data: {
          albumId: albumId === DEFAULT_ALBUM_ID ? undefined : albumId,
          newMediaItems: [
            {
              description: entry.description ?? "",
              simpleMediaItem: { uploadToken, fileName: entry.title },
            },
          ],
        },
      });
      raw = response.data;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new VendorApiError("google", `mediaItems:batchCreate failed: ${message}`);
    }

    const parsed = batchCreateResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new VendorApiError("google", "mediaItems:batchCreate returned an unexpected response");
    }
    const [result] = parsed.data.newMediaItemResults;
    if (!result.mediaItem || (result.status?.code ?? 0) !== 0) {
      throw new VendorApiError(
        "google",
        `mediaItems:batchCreate rejected ${entry.title}: ${result.status?.message ?? "no media item"}`,
        result.status?.code
      );
    }

    log.debug({ mediaItemId: result.mediaItem.id, title: entry.title }, "Inserted media item");
    return result.mediaItem.id;
  }

  private async uploadBytes(entry: PhotoEntry): Promise<string> {
    try {
      const response = await this.client.request<string>({
        url: UPLOAD_URL,
        method: "POST",
        headers: {
          "Content-Type": "application/octet-stream",
          "X-Goog-Upload-Content-Type": entry.mediaType,
          "X-Goog-Upload-Protocol": "raw",
          "User-Agent": entry.client,
        },
        data: entry.bytes,
        responseType: "text",
      });
      return response.data;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new VendorApiError("google", `Upload of ${entry.title} failed: ${message}`);
    }
  }
}

/** Builds an authenticated Photos Library service from a user's tokens. */
export class GooglePhotosServiceFactory implements PhotosServiceFactory {
  private credentialFactory: GoogleCredentialFactory;

  constructor(credentialFactory: GoogleCredentialFactory) {
    this.credentialFactory = credentialFactory;
  }

  async createService(authData: TokensAndUrlAuthData): Promise<PhotosService> {
    const credential = this.credentialFactory.createCredential(authData);
    return new GooglePhotosService(credential);
  }
}
