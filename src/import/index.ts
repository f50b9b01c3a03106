import type { Config, ServiceName } from "../config.js";
import { FlickrClient } from "../flickr/client.js";
import { FlickrPhotosImporter } from "../flickr/importer.js";
import { GoogleCredentialFactory, GooglePhotosServiceFactory } from "../google/client.js";
import { GooglePhotosImporter } from "../google/importer.js";
import type { FlickrAuthData, TokensAndUrlAuthData } from "../models/auth.js";
import type { PhotosContainerResource } from "../models/photos.js";
import type { JobStore } from "../store/types.js";
import type { ImportListener, ImportResult } from "./types.js";

export type ConfiguredImporter =
  | { service: "flickr"; importer: FlickrPhotosImporter; authData: FlickrAuthData }
  | { service: "google"; importer: GooglePhotosImporter; authData: TokensAndUrlAuthData };

export function createImporter(
  service: ServiceName,
  config: Config,
  jobStore: JobStore
): ConfiguredImporter {
  switch (service) {
    case "flickr":
      return {
        service,
        importer: new FlickrPhotosImporter(
          new FlickrClient({ key: config.flickr.apiKey, secret: config.flickr.apiSecret }),
          jobStore
        ),
        authData: {
          kind: "oauth1",
          token: config.flickr.oauthToken,
          tokenSecret: config.flickr.oauthTokenSecret,
        },
      };
    case "google":
      return {
        service,
        importer: new GooglePhotosImporter(
          new GooglePhotosServiceFactory(
            new GoogleCredentialFactory({
              clientId: config.google.clientId,
              clientSecret: config.google.clientSecret,
            })
          ),
          jobStore,
          { appName: config.google.appName }
        ),
        authData: {
          kind: "oauth2",
          accessToken: config.google.accessToken,
          refreshToken: config.google.refreshToken || undefined,
          tokenServerUrl: config.google.tokenServerUrl,
        },
      };
  }
}

export function runImport(
  configured: ConfiguredImporter,
  jobId: string,
  data: PhotosContainerResource,
  listener?: ImportListener
): Promise<ImportResult> {
  switch (configured.service) {
    case "flickr":
      return configured.importer.importItem(jobId, configured.authData, data, listener);
    case "google":
      return configured.importer.importItem(jobId, configured.authData, data, listener);
  }
}

export * from "./types.js";
