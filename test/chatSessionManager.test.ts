import { beforeEach, describe, expect, it } from "vitest";

import {
  ChatSessionManager,
  parseFileIds,
  SUPERSEDED_CLOSE_CODE,
} from "../src/services/chatSessionManager";
import type { FileStatus } from "../src/types/fileTypes";
import {
  HashEmbeddings,
  MemoryStatusStore,
  MemoryVectorIndex,
  RecordingTransport,
  ScriptedGeneration,
} from "./fakes";

describe("parseFileIds", () => {
  it("splits, trims and de-duplicates", () => {
    expect(parseFileIds("a, b,,a ")).toEqual(["a", "b"]);
    expect(parseFileIds(undefined)).toEqual([]);
    expect(parseFileIds("")).toEqual([]);
  });
});

describe("ChatSessionManager", () => {
  let statusStore: MemoryStatusStore;
  let manager: ChatSessionManager;

  const seed = async (fileId: string, userId: string, status: FileStatus) => {
    await statusStore.insert({
      fileId,
      userId,
      fileName: `${fileId}.pdf`,
      blobKey: `files/${userId}/${fileId}`,
      contentType: "application/pdf",
      size: 1,
      contentHash: "h",
    });
    if (status === "deleted") await statusStore.markDeleted(userId, [fileId]);
    else if (status !== "pending") await statusStore.transition(fileId, ["pending"], status);
  };

  beforeEach(async () => {
    statusStore = new MemoryStatusStore();
    manager = new ChatSessionManager({
      statusStore,
      vectorIndex: new MemoryVectorIndex(),
      embeddings: new HashEmbeddings(),
      generation: new ScriptedGeneration(),
      collection: "chunks",
      topK: 4,
      limits: { historyMaxTokens: 4000, contextMaxTokens: 8000 },
      maxTurns: 30,
    });
    await seed("own-indexed", "u1", "indexed");
    await seed("own-pending", "u1", "pending");
    await seed("own-deleted", "u1", "deleted");
    await seed("theirs", "u2", "indexed");
  });

  it("opens a session over the user's indexed files", async () => {
    const transport = new RecordingTransport();
    const session = await manager.open("u1", "chat-1", ["own-indexed"], transport);

    expect(session.state).toBe("open");
    expect(session.fileIds).toEqual(["own-indexed"]);
    expect(manager.size).toBe(1);
    expect(manager.get("u1", "chat-1")).toBe(session);
    expect(transport.closed).toBeNull();
  });

  it("opens a session with no files", async () => {
    const session = await manager.open("u1", "chat-1", [], new RecordingTransport());
    expect(session.state).toBe("open");
  });

  it("refuses another user's file even next to a file that is not ready", async () => {
    const transport = new RecordingTransport();

    await expect(
      manager.open("u1", "chat-1", ["own-pending", "theirs"], transport)
    ).rejects.toMatchObject({ kind: "Unauthorized" });

    expect(transport.frames).toEqual([
      {
        reporter: "output_message",
        type: "error",
        kind: "Unauthorized",
        message: "files not owned by user: theirs",
      },
    ]);
    expect(transport.closed).toEqual({ code: 4403, reason: "Unauthorized" });
    expect(manager.size).toBe(0);
  });

  it("refuses unknown and deleted files with NotFound", async () => {
    const transport = new RecordingTransport();

    await expect(
      manager.open("u1", "chat-1", ["nope", "own-deleted"], transport)
    ).rejects.toMatchObject({
      kind: "NotFound",
      message: "unknown files: nope, own-deleted",
    });
    expect(transport.closed).toEqual({ code: 4404, reason: "NotFound" });
  });

  it("refuses files that are not indexed yet", async () => {
    const transport = new RecordingTransport();

    await expect(
      manager.open("u1", "chat-1", ["own-indexed", "own-pending"], transport)
    ).rejects.toMatchObject({
      kind: "FileNotReady",
      message: "files not indexed yet: own-pending (pending)",
    });
    expect(transport.closed).toEqual({ code: 4409, reason: "FileNotReady" });
  });

  it("closes with 1011 when the store is down", async () => {
    statusStore.failing = true;
    const transport = new RecordingTransport();

    await expect(
      manager.open("u1", "chat-1", ["own-indexed"], transport)
    ).rejects.toMatchObject({ kind: "StorageUnavailable" });
    expect(transport.closed).toEqual({ code: 1011, reason: "StorageUnavailable" });
  });

  it("supersedes an existing session with the same name", async () => {
    const firstTransport = new RecordingTransport();
    const first = await manager.open("u1", "chat-1", [], firstTransport);
    const second = await manager.open("u1", "chat-1", [], new RecordingTransport());

    expect(first.state).toBe("closed");
    expect(firstTransport.closed).toEqual({ code: SUPERSEDED_CLOSE_CODE, reason: "superseded" });
    expect(manager.get("u1", "chat-1")).toBe(second);
    expect(manager.size).toBe(1);

    second.close();
    expect(manager.size).toBe(0);
  });

  it("does not replace the live session when the new connection is already gone", async () => {
    const liveTransport = new RecordingTransport();
    const live = await manager.open("u1", "chat-1", [], liveTransport);
    const gone = new AbortController();
    gone.abort();

    await expect(
      manager.open("u1", "chat-1", ["own-indexed"], new RecordingTransport(), {
        signal: gone.signal,
      })
    ).rejects.toThrow("connection closed before u1/chat-1 opened");

    expect(live.state).toBe("open");
    expect(liveTransport.closed).toBeNull();
    expect(manager.get("u1", "chat-1")).toBe(live);
    expect(manager.size).toBe(1);
  });

  it("keeps sessions of different names and users apart", async () => {
    await manager.open("u1", "chat-1", [], new RecordingTransport());
    await manager.open("u1", "chat-2", [], new RecordingTransport());
    await manager.open("u2", "chat-1", ["theirs"], new RecordingTransport());

    expect(manager.size).toBe(3);

    manager.closeAll();
    expect(manager.size).toBe(0);
  });
});
