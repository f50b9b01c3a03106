import assert from "node:assert/strict";
import { beforeEach, describe, it } from "node:test";

import { AuthError, ImportPreconditionError, VendorApiError } from "../errors.js";
import { ImageStreamProvider } from "../import/image-stream.js";
import type { TokensAndUrlAuthData } from "../models/auth.js";
import { parseContainer } from "../models/photos.js";
import { SqliteJobStore } from "../store/sqlite.js";
import { GoogleCredentialFactory, GooglePhotosServiceFactory } from "./client.js";
import { GooglePhotosImporter } from "./importer.js";
import type { PhotoEntry, PhotosService, PhotosServiceFactory } from "./types.js";

const AUTH: TokensAndUrlAuthData = {
  kind: "oauth2",
  accessToken: "test-access-token",
  tokenServerUrl: "https://oauth2.test/token",
};

class FakePhotosService implements PhotosService {
  inserts: Array<{ albumId: string; entry: PhotoEntry }> = [];
  failOnInsert?: number;

  async insert(albumId: string, entry: PhotoEntry): Promise<string> {
    this.inserts.push({ albumId, entry });
    if (this.inserts.length === this.failOnInsert) {
      throw new VendorApiError("google", `Upload of ${entry.title} failed: 503`);
    }
    return `media-${this.inserts.length}`;
  }
}

class FakeServiceFactory implements PhotosServiceFactory {
  calls = 0;
  failures = 0;
  service = new FakePhotosService();

  async createService(): Promise<PhotosService> {
    this.calls++;
    if (this.failures > 0) {
      this.failures--;
      throw new AuthError("google", "invalid_grant");
    }
    return this.service;
  }
}

function fakeImages(): ImageStreamProvider {
  return new ImageStreamProvider(async (url) => new Response(`bytes of ${url}`));
}

describe("GooglePhotosImporter", () => {
  let factory: FakeServiceFactory;
  let store: SqliteJobStore;
  let importer: GooglePhotosImporter;

  beforeEach(() => {
    factory = new FakeServiceFactory();
    store = new SqliteJobStore(":memory:");
    importer = new GooglePhotosImporter(factory, store, {
      appName: "photobridge-test",
      imageStreamProvider: fakeImages(),
    });
  });

  it("uploads each photo to the default album as a copy", async () => {
    const data = parseContainer({
      photos: [{ title: "Sunset", description: "Orange sky", fetchableUrl: "https://img.test/1.jpg" }],
    });

    const result = await importer.importItem("job-1", AUTH, data);

    assert.deepEqual(result, { status: "ok", photosImported: 1, albumsCreated: 0 });
    assert.equal(factory.service.inserts.length, 1);
    const [{ albumId, entry }] = factory.service.inserts;
    assert.equal(albumId, "default");
    assert.equal(entry.title, "copy of Sunset");
    assert.equal(entry.description, "Orange sky");
    assert.equal(entry.client, "photobridge-test");
    assert.equal(entry.mediaType, "image/jpeg");
    assert.equal(entry.bytes.toString(), "bytes of https://img.test/1.jpg");
  });

  it("drops the album structure and still imports the photos", async () => {
    const data = parseContainer({
      albums: [{ id: "album-1", name: "Holiday" }],
      photos: [
        { title: "One", fetchableUrl: "https://img.test/1.jpg", albumId: "album-1", mediaType: "image/png" },
        { title: "Two", fetchableUrl: "https://img.test/2.jpg", albumId: "album-1" },
      ],
    });
    const imported: string[] = [];

    const result = await importer.importItem("job-1", AUTH, data, {
      onPhotoImported: (_photo, id) => imported.push(id),
    });

    assert.deepEqual(result, { status: "ok", photosImported: 2, albumsCreated: 0 });
    assert.deepEqual(
      factory.service.inserts.map((i) => [i.albumId, i.entry.title, i.entry.mediaType]),
      [
        ["default", "copy of One", "image/png"],
        ["default", "copy of Two", "image/jpeg"],
      ]
    );
    assert.deepEqual(imported, ["media-1", "media-2"]);
  });

  it("reads staged photos from the job store", async () => {
    store.putBlob("job-1", "staged/1", Buffer.from("staged bytes"));
    const data = parseContainer({
      photos: [{ title: "Scan", fetchableUrl: "staged/1", inTempStore: true }],
    });

    await importer.importItem("job-1", AUTH, data);

    assert.equal(factory.service.inserts[0].entry.bytes.toString(), "staged bytes");
  });

  it("reports a missing staged photo as an io error", async () => {
    const data = parseContainer({
      photos: [{ title: "Scan", fetchableUrl: "staged/404", inTempStore: true }],
    });

    const result = await importer.importItem("job-1", AUTH, data);

    assert.deepEqual(result, {
      status: "error",
      kind: "io",
      message: "Error importing photo No staged data for key staged/404 in job job-1",
    });
  });

  it("creates the photos service once for concurrent jobs", async () => {
    const data = parseContainer({
      photos: [{ title: "One", fetchableUrl: "https://img.test/1.jpg" }],
    });

    const results = await Promise.all([
      importer.importItem("job-1", AUTH, data),
      importer.importItem("job-2", AUTH, data),
    ]);
    await importer.importItem("job-3", AUTH, data);

    assert.deepEqual(results.map((r) => r.status), ["ok", "ok"]);
    assert.equal(factory.calls, 1);
    assert.equal(factory.service.inserts.length, 3);
  });

  it("returns an auth error and retries the service on the next import", async () => {
    factory.failures = 1;
    const data = parseContainer({
      photos: [{ title: "One", fetchableUrl: "https://img.test/1.jpg" }],
    });

    const first = await importer.importItem("job-1", AUTH, data);
    const second = await importer.importItem("job-1", AUTH, data);

    assert.deepEqual(first, {
      status: "error",
      kind: "auth",
      message: "Error authorizing Google Photos: invalid_grant",
    });
    assert.deepEqual(second, { status: "ok", photosImported: 1, albumsCreated: 0 });
    assert.equal(factory.calls, 2);
  });

  it("stops the batch at the first failed upload", async () => {
    factory.service.failOnInsert = 2;
    const data = parseContainer({
      photos: [
        { title: "One", fetchableUrl: "https://img.test/1.jpg" },
        { title: "Two", fetchableUrl: "https://img.test/2.jpg" },
        { title: "Three", fetchableUrl: "https://img.test/3.jpg" },
      ],
    });

    const result = await importer.importItem("job-1", AUTH, data);

    assert.deepEqual(result, {
      status: "error",
      kind: "vendor",
      message: "Error importing photo Upload of copy of Two failed: 503",
    });
    assert.equal(factory.service.inserts.length, 2);
  });

  it("rejects a container with neither albums nor photos", async () => {
    await assert.rejects(importer.importItem("job-1", AUTH, parseContainer({})), ImportPreconditionError);
    assert.equal(factory.calls, 0);
  });

  it("accepts an albums-only container without building the photos service", async () => {
    factory.failures = 1;
    const data = parseContainer({ albums: [{ id: "album-1", name: "Holiday" }] });

    const result = await importer.importItem("job-1", AUTH, data);

    assert.deepEqual(result, { status: "ok", photosImported: 0, albumsCreated: 0 });
    assert.equal(factory.calls, 0);
  });

  it("fails authorization before any upload when the user has no tokens", async () => {
    const realFactory = new GooglePhotosServiceFactory(
      new GoogleCredentialFactory({ clientId: "test-client", clientSecret: "test-secret" })
    );
    const withRealFactory = new GooglePhotosImporter(realFactory, store, {
      appName: "photobridge-test",
      imageStreamProvider: fakeImages(),
    });
    const data = parseContainer({
      photos: [{ title: "One", fetchableUrl: "https://img.test/1.jpg" }],
    });

    const result = await withRealFactory.importItem(
      "job-1",
      { kind: "oauth2", accessToken: "", tokenServerUrl: "https://oauth2.test/token" },
      data
    );

    assert.deepEqual(result, {
      status: "error",
      kind: "auth",
      message: "Error authorizing Google Photos: Missing Google OAuth tokens",
    });
  });
});
