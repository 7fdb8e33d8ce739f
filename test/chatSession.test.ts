import { beforeEach, describe, expect, it } from "vitest";

import { ChatSession, ChatSessionDeps, parseInbound } from "../src/services/chatSession";
import { FileDeleter } from "../src/services/fileDeleter";
import {
  flush,
  HashEmbeddings,
  MemoryBlobStore,
  MemoryStatusStore,
  MemoryVectorIndex,
  RecordingTransport,
  ScriptedGeneration,
} from "./fakes";

describe("parseInbound", () => {
  it("treats plain text as a question", () => {
    expect(parseInbound("  what is this?  ")).toEqual({
      type: "question",
      message: "what is this?",
    });
    expect(parseInbound("{not json")).toEqual({ type: "question", message: "{not json" });
  });

  it("reads start, stop and question frames", () => {
    expect(parseInbound('{"type":"start"}')).toEqual({ type: "start" });
    expect(parseInbound('{"type":"stop"}')).toEqual({ type: "stop" });
    expect(parseInbound('{"type":"question","message":" hi "}')).toEqual({
      type: "question",
      message: "hi",
    });
  });

  it("returns null for blank or unknown frames", () => {
    expect(parseInbound("   ")).toBeNull();
    expect(parseInbound('{"type":"dance"}')).toBeNull();
    expect(parseInbound('{"type":"question","message":""}')).toBeNull();
    expect(parseInbound('{"message":"no type"}')).toBeNull();
  });
});

describe("ChatSession", () => {
  let statusStore: MemoryStatusStore;
  let vectorIndex: MemoryVectorIndex;
  let embeddings: HashEmbeddings;
  let generation: ScriptedGeneration;
  let transport: RecordingTransport;
  let deps: ChatSessionDeps;

  const openSession = (fileIds: string[] = ["f1"]) => {
    const session = new ChatSession("u1", "chat-1", fileIds, transport, deps);
    session.activate();
    return session;
  };

  beforeEach(async () => {
    statusStore = new MemoryStatusStore();
    vectorIndex = new MemoryVectorIndex();
    embeddings = new HashEmbeddings();
    generation = new ScriptedGeneration();
    transport = new RecordingTransport();
    deps = {
      statusStore,
      vectorIndex,
      embeddings,
      generation,
      collection: "chunks",
      topK: 4,
      limits: { historyMaxTokens: 4000, contextMaxTokens: 8000 },
      maxTurns: 30,
    };

    const [vector] = await embeddings.embedDocuments(["the sky is blue"]);
    await vectorIndex.upsert("chunks", [
      {
        vector,
        fileId: "f1",
        userId: "u1",
        fileName: "notes.txt",
        chunkText: "the sky is blue",
        chunkOffset: 0,
        pageNumber: null,
      },
    ]);
    await statusStore.insert({
      fileId: "f1",
      userId: "u1",
      fileName: "notes.txt",
      blobKey: "files/u1/f1",
      contentType: "text/plain",
      size: 15,
      contentHash: "h",
    });
    await statusStore.transition("f1", ["pending"], "indexed");
  });

  it("echoes the question, streams the answer and cites its sources", async () => {
    const session = openSession();
    await session.receive("what colour is the sky?");

    expect(transport.frames).toEqual([
      { reporter: "input_message", type: "question", message: "what colour is the sky?" },
      { reporter: "output_message", type: "answer_chunk", message: "Hello" },
      { reporter: "output_message", type: "answer_chunk", message: " world" },
      {
        reporter: "output_message",
        type: "answer",
        message: "Hello world",
        sources: [
          expect.objectContaining({
            fileId: "f1",
            fileName: "notes.txt",
            chunkOffset: 0,
            pageNumber: null,
            snippet: "the sky is blue",
          }),
        ],
      },
    ]);
    expect(session.history).toHaveLength(1);
    expect(session.history[0]).toMatchObject({ question: "what colour is the sky?", answer: "Hello world" });
  });

  it("puts the retrieved chunks in the prompt with citations", async () => {
    await openSession().receive("sky?");

    const messages = generation.calls[0];
    expect(messages[messages.length - 1]).toEqual({ role: "user", content: "sky?" });
    expect(messages[messages.length - 2]).toEqual({
      role: "system",
      content: "Document contexts (only use them as facts):\n[Source 1, notes.txt]:\nthe sky is blue",
    });
  });

  it("answers without retrieval when no files are attached", async () => {
    await openSession([]).receive("hello?");

    expect(embeddings.queryCalls).toBe(0);
    const messages = generation.calls[0];
    expect(messages[messages.length - 2]).toEqual({
      role: "system",
      content: "Document contexts: none available for this question.",
    });
    expect(transport.frames[transport.frames.length - 1]).toEqual({
      reporter: "output_message",
      type: "answer",
      message: "Hello world",
      sources: [],
    });
  });

  it("answers questions one after another and carries the history forward", async () => {
    const session = openSession();
    const first = session.receive("first");
    const second = session.receive("second");
    await Promise.all([first, second]);

    expect(transport.types()).toEqual([
      "question",
      "question",
      "answer_chunk",
      "answer_chunk",
      "answer",
      "answer_chunk",
      "answer_chunk",
      "answer",
    ]);
    expect(generation.calls[1]).toContainEqual({ role: "user", content: "first" });
    expect(generation.calls[1]).toContainEqual({ role: "assistant", content: "Hello world" });
  });

  it("stops the answer in progress and drops the partial output", async () => {
    let release = () => {};
    generation.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const session = openSession();

    const pending = session.receive("long question");
    await flush();
    expect(generation.calls).toHaveLength(1);

    const stopped = session.receive('{"type":"stop"}');
    expect(transport.types()).toEqual(["question", "stop_message"]);
    release();
    await Promise.all([pending, stopped]);

    expect(transport.types()).toEqual(["question", "stop_message"]);
    expect(session.history).toHaveLength(0);
    expect(session.state).toBe("open");
  });

  it("reports embedding failures and keeps the session open", async () => {
    embeddings.failing = true;
    const session = openSession();
    await session.receive("anything");

    expect(transport.frames[1]).toEqual({
      reporter: "output_message",
      type: "error",
      kind: "ProviderError",
      message: "embedding failed: embedding quota exceeded",
    });
    expect(session.state).toBe("open");

    embeddings.failing = false;
    await session.receive("again");
    expect(transport.types().slice(-1)).toEqual(["answer"]);
  });

  it("reports retrieval failures as StorageUnavailable", async () => {
    vectorIndex.failQuery = true;
    await openSession().receive("anything");

    expect(transport.frames[1]).toMatchObject({
      type: "error",
      kind: "StorageUnavailable",
      message: "retrieval failed: query down",
    });
  });

  it("reports generation failures as ProviderError", async () => {
    generation.error = new Error("model overloaded");
    await openSession().receive("anything");

    expect(transport.frames[1]).toMatchObject({
      type: "error",
      kind: "ProviderError",
      message: "generation failed: model overloaded",
    });
  });

  it("replays the conversation on start", async () => {
    const session = openSession();
    await session.receive("first");
    transport.frames.length = 0;

    await session.receive('{"type":"start"}');

    expect(transport.frames).toEqual([
      { reporter: "output_message", type: "start_message" },
      { reporter: "input_message", type: "question", message: "first" },
      expect.objectContaining({ type: "answer", message: "Hello world" }),
    ]);
  });

  it("rejects unrecognised frames with InvalidInput", async () => {
    await openSession().receive('{"type":"dance"}');

    expect(transport.frames).toEqual([
      {
        reporter: "output_message",
        type: "error",
        kind: "InvalidInput",
        message: "empty or unrecognised message",
      },
    ]);
  });

  it("keeps only the most recent turns", async () => {
    deps.maxTurns = 2;
    const session = openSession();
    for (const q of ["q1", "q2", "q3"]) await session.receive(q);

    expect(session.history.map((t) => t.question)).toEqual(["q2", "q3"]);
  });

  it("forgets everything once the client goes away", async () => {
    const session = openSession();
    await session.receive("first");
    const sent = transport.frames.length;

    expect(session.detach()).toBe(true);
    await session.receive("after close");

    expect(session.state).toBe("closed");
    expect(session.history).toHaveLength(0);
    expect(transport.frames).toHaveLength(sent);
    expect(transport.closed).toBeNull();
    expect(session.detach()).toBe(false);
  });

  it("stops citing a file deleted while the session is open", async () => {
    const session = openSession();
    vectorIndex.failDelete = true;
    const deleter = new FileDeleter({
      statusStore,
      blobStore: new MemoryBlobStore(),
      vectorIndex,
      collection: "chunks",
    });
    await deleter.deleteFiles("u1", ["f1"]);
    expect(vectorIndex.count("f1")).toBe(1);

    await session.receive("what colour is the sky?");

    const messages = generation.calls[0];
    expect(messages[messages.length - 2]).toEqual({
      role: "system",
      content: "Document contexts: none available for this question.",
    });
    expect(transport.frames[transport.frames.length - 1]).toEqual({
      reporter: "output_message",
      type: "answer",
      message: "Hello world",
      sources: [],
    });
  });

  it("drops the answer in progress when the server closes the session", async () => {
    let release = () => {};
    generation.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const session = openSession();

    const pending = session.receive("long question");
    await flush();
    expect(generation.calls).toHaveLength(1);

    session.close(1000, "bye");
    release();
    await pending;

    expect(transport.frames).toEqual([
      { reporter: "input_message", type: "question", message: "long question" },
    ]);
    expect(transport.closed).toEqual({ code: 1000, reason: "bye" });
    expect(session.history).toHaveLength(0);
    expect(session.state).toBe("closed");
  });

  it("retrieves follow-up questions together with the previous question", async () => {
    const session = openSession();
    await session.receive("first");
    await session.receive("second");

    expect(embeddings.queries).toEqual(["first", "first\nsecond"]);
    expect(generation.calls[1][generation.calls[1].length - 1]).toEqual({
      role: "user",
      content: "second",
    });
  });
});
