import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";

import { createApp } from "../src/app";
import { FileDeleter } from "../src/services/fileDeleter";
import { UploadGateway } from "../src/services/uploadGateway";
import {
  MemoryBlobStore,
  MemoryStatusStore,
  MemoryVectorIndex,
  RecordingQueue,
} from "./fakes";

describe("file routes", () => {
  let statusStore: MemoryStatusStore;
  let queue: RecordingQueue;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    statusStore = new MemoryStatusStore();
    queue = new RecordingQueue();
    const blobStore = new MemoryBlobStore();
    const vectorIndex = new MemoryVectorIndex();
    let n = 0;
    const uploadGateway = new UploadGateway({
      statusStore,
      blobStore,
      queue,
      maxBytes: 1024,
      newId: () => `file-${++n}`,
    });
    const deleter = new FileDeleter({ statusStore, blobStore, vectorIndex, collection: "chunks" });
    app = createApp(
      { uploadGateway, statusStore, deleter },
      { corsOrigins: ["http://localhost:3000"], maxUploadBytes: 1024 }
    );
  });

  const upload = (name: string, body = "hello") =>
    request(app)
      .post("/upload/files")
      .set("x-user-id", "u1")
      .attach("file", Buffer.from(body), name);

  it("answers the health check", async () => {
    const res = await request(app).get("/");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: "App is working perfect" });
  });

  it("requires a user id", async () => {
    const res = await request(app).get("/upload/files");
    expect(res.status).toBe(401);
    expect(res.body.status).toBe(false);
  });

  it("uploads a file and queues it for indexing", async () => {
    const res = await upload("notes.txt");

    expect(res.status).toBe(200);
    expect(res.body.data.files).toEqual([
      { file_id: "file-1", file_path: "files/u1/file-1", filename: "notes.txt", status: "pending" },
    ]);
    expect(queue.jobs.map((j) => j.fileId)).toEqual(["file-1"]);
  });

  it("rejects a disallowed type with 400", async () => {
    const res = await upload("photo.png");

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ status: false, kind: "InvalidInput" });
    expect(statusStore.rows.size).toBe(0);
  });

  it("rejects a request without a file", async () => {
    const res = await request(app).post("/upload/files").set("x-user-id", "u1");
    expect(res.status).toBe(400);
    expect(res.body.message).toBe("Please provide a file");
  });

  it("lists, filters and reports status of the user's files", async () => {
    await upload("alpha.txt");
    await upload("beta.txt");

    const list = await request(app).get("/upload/files?q=alp").set("x-user-id", "u1");
    expect(list.status).toBe(200);
    expect(list.body.data.map((f: { file_name: string }) => f.file_name)).toEqual(["alpha.txt"]);
    expect(list.body.meta).toEqual({ page: 1, limit: 10, total: 1, totalPages: 1 });

    const status = await request(app).get("/upload/files/status").set("x-user-id", "u1");
    expect(status.body.data).toEqual([
      { file_id: "file-2", file_name: "beta.txt", status: "pending" },
      { file_id: "file-1", file_name: "alpha.txt", status: "pending" },
    ]);

    const other = await request(app).get("/upload/files").query({ user_id: "u2" });
    expect(other.body.data).toEqual([]);
  });

  it("reports the status of every file, past the first page", async () => {
    for (let i = 0; i < 150; i++) {
      await statusStore.insert({
        fileId: `bulk-${i}`,
        userId: "u1",
        fileName: `doc-${i}.txt`,
        blobKey: `files/u1/bulk-${i}`,
        contentType: "text/plain",
        size: 1,
        contentHash: "h",
      });
    }

    const res = await request(app).get("/upload/files/status").set("x-user-id", "u1");

    const ids: string[] = res.body.data.map((f: { file_id: string }) => f.file_id);
    expect(ids).toHaveLength(150);
    expect(new Set(ids).size).toBe(150);
    expect(ids[0]).toBe("bulk-149");
    expect(ids[149]).toBe("bulk-0");
  });

  it("returns one file, or 404 for someone else's", async () => {
    await upload("notes.txt");

    const mine = await request(app).get("/upload/files/file-1").set("x-user-id", "u1");
    expect(mine.status).toBe(200);
    expect(mine.body.data).toMatchObject({ file_id: "file-1", status: "pending", size: 5 });

    const theirs = await request(app).get("/upload/files/file-1").set("x-user-id", "u2");
    expect(theirs.status).toBe(404);
    expect(theirs.body.kind).toBe("NotFound");
  });

  it("removes files and reports the ones it could not find", async () => {
    await upload("notes.txt");

    const res = await request(app)
      .post("/upload/remove")
      .set("x-user-id", "u1")
      .send({ file_ids: ["file-1", "missing"] });

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({
      deleted: [{ file_id: "file-1", prior_status: "pending" }],
      not_found: ["missing"],
    });
    expect(statusStore.rows.size).toBe(0);
  });

  it("validates the remove body", async () => {
    const res = await request(app)
      .post("/upload/remove")
      .set("x-user-id", "u1")
      .send({ file_ids: [] });
    expect(res.status).toBe(400);
    expect(res.body.message).toBe("file_ids must be a non-empty list");
  });

  it("maps store outages to 503", async () => {
    statusStore.failing = true;
    const res = await request(app).get("/upload/files").set("x-user-id", "u1");
    expect(res.status).toBe(503);
    expect(res.body.kind).toBe("StorageUnavailable");
  });
});
