import assert from "node:assert/strict";
import { afterEach, beforeEach, describe, it } from "node:test";
import { z } from "zod";

import { JobStoreError } from "../errors.js";
import { readAll } from "../utils/stream.js";
import { SqliteJobStore } from "./sqlite.js";
import { TEMP_PHOTOS_DATA, TempPhotosData } from "./temp-photos.js";
import type { DataType } from "./types.js";

const COUNTER: DataType<{ count: number }> = {
  name: "counter",
  schema: z.object({ count: z.number() }),
};

describe("SqliteJobStore", () => {
  let store: SqliteJobStore;

  beforeEach(() => {
    store = new SqliteJobStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("returns null for data that was never created", () => {
    assert.equal(store.findData(COUNTER, "job-1"), null);
  });

  it("creates, updates and reads typed data", () => {
    store.create("job-1", COUNTER, { count: 1 });
    store.update("job-1", COUNTER, { count: 2 });

    assert.deepEqual(store.findData(COUNTER, "job-1"), { count: 2 });
    assert.equal(store.findData(COUNTER, "job-2"), null);
  });

  it("rejects a second create for the same job and type", () => {
    store.create("job-1", COUNTER, { count: 1 });
    assert.throws(() => store.create("job-1", COUNTER, { count: 5 }), JobStoreError);
  });

  it("rejects an update with nothing to update", () => {
    assert.throws(() => store.update("job-1", COUNTER, { count: 1 }), JobStoreError);
  });

  it("rejects malformed stored data", () => {
    const loose: DataType<unknown> = { name: "counter", schema: z.unknown() };
    store.create("job-1", loose, { count: "three" });
    assert.throws(() => store.findData(COUNTER, "job-1"), JobStoreError);
  });

  it("persists temp photos data as a TempPhotosData", () => {
    const data = new TempPhotosData("job-1");
    data.registerPending({ id: "album-1", name: "Holiday" });
    store.create("job-1", TEMP_PHOTOS_DATA, data);

    const found = store.findData(TEMP_PHOTOS_DATA, "job-1");
    assert.ok(found);
    assert.deepEqual(found.lookup("album-1"), {
      state: "pending",
      album: { id: "album-1", name: "Holiday" },
    });
  });

  it("streams staged blobs back", async () => {
    store.putBlob("job-1", "photo-1", Buffer.from("first"));
    store.putBlob("job-1", "photo-1", Buffer.from("jpeg-bytes"));

    const bytes = await readAll(store.getStream("job-1", "photo-1"));
    assert.equal(bytes.toString(), "jpeg-bytes");
  });

  it("fails to stream a missing blob", () => {
    assert.throws(() => store.getStream("job-1", "nope"), JobStoreError);
  });

  it("lists and removes jobs", () => {
    store.create("job-1", COUNTER, { count: 1 });
    store.create("job-1", TEMP_PHOTOS_DATA, new TempPhotosData("job-1"));
    store.putBlob("job-1", "photo-1", Buffer.from("a"));
    store.putBlob("job-2", "photo-1", Buffer.from("b"));

    const jobs = store.listJobs().sort((a, b) => a.jobId.localeCompare(b.jobId));
    assert.deepEqual(
      jobs.map(({ jobId, dataTypes, blobCount }) => ({ jobId, dataTypes, blobCount })),
      [
        { jobId: "job-1", dataTypes: ["counter", "temp-photos-data"], blobCount: 1 },
        { jobId: "job-2", dataTypes: [], blobCount: 1 },
      ]
    );

    assert.deepEqual(store.removeJob("job-1"), { dataRemoved: 2, blobsRemoved: 1 });
    assert.deepEqual(store.listJobs().map((j) => j.jobId), ["job-2"]);
  });
});
