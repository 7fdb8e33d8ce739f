import {
  AppError,
  asAppError,
  ErrorKind,
  errorMessage,
  isAppError,
} from "../helper/appError";
import { buildPromptMessages, PromptLimits } from "../utils/prompt";
import type { StatusStore } from "./statusStore";
import type {
  ChatSource,
  ChatTurn,
  InboundFrame,
  OutboundFrame,
  SessionState,
  SessionTransport,
} from "../types/chatSessionTypes";
import type { ScoredVectorEntry } from "../types/fileTypes";
import type {
  EmbeddingProvider,
  GenerationProvider,
  VectorIndex,
} from "../types/providerTypes";

export interface ChatSessionDeps {
  statusStore: StatusStore;
  vectorIndex: VectorIndex;
  embeddings: EmbeddingProvider;
  generation: GenerationProvider;
  collection: string;
  topK: number;
  limits: PromptLimits;
  maxTurns: number;
}

const SNIPPET_LENGTH = 200;

export function parseInbound(raw: string): InboundFrame | null {
  const text = raw.trim();
  if (!text.startsWith("{")) {
    return text ? { type: "question", message: text } : null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    // not JSON after all, treat as a question
    return { type: "question", message: text };
  }
  if (!parsed || typeof parsed !== "object" || !("type" in parsed)) return null;

  switch (parsed.type) {
    case "start":
      return { type: "start" };
    case "stop":
      return { type: "stop" };
    case "question": {
      const message =
        "message" in parsed && typeof parsed.message === "string"
          ? parsed.message.trim()
          : "";
      return message ? { type: "question", message } : null;
    }
    default:
      return null;
  }
}

const toSource = (entry: ScoredVectorEntry): ChatSource => ({
  fileId: entry.fileId,
  fileName: entry.fileName,
  chunkOffset: entry.chunkOffset,
  pageNumber: entry.pageNumber,
  score: entry.score,
  snippet: entry.chunkText.slice(0, SNIPPET_LENGTH),
});

/**
 * One live conversation over a fixed set of indexed files. Questions are
 * answered strictly one after another; the history lives only as long as
 * the connection.
 */
export class ChatSession {
  private _state: SessionState = "connecting";
  private readonly turns: ChatTurn[] = [];
  private tail: Promise<void> = Promise.resolve();
  private inflight: AbortController | null = null;
  private readonly closeListeners: Array<(session: ChatSession) => void> = [];

  constructor(
    readonly userId: string,
    readonly chatName: string,
    readonly fileIds: readonly string[],
    private readonly transport: SessionTransport,
    private readonly deps: ChatSessionDeps
  ) {}

  get state(): SessionState {
    return this._state;
  }

  get history(): readonly ChatTurn[] {
    return this.turns;
  }

  onClose(listener: (session: ChatSession) => void): void {
    this.closeListeners.push(listener);
  }

  activate(): void {
    if (this._state === "connecting") this._state = "open";
  }

  /**
   * Rejects the connection: reports the error and closes the transport.
   */
  reject(err: AppError): void {
    this.send({
      reporter: "output_message",
      type: "error",
      kind: err.kind,
      message: err.message,
    });
    this.close(err.closeCode, err.kind);
  }

  /**
   * Handles one raw client frame. Resolves when every question queued so
   * far has been answered.
   */
  receive(raw: string): Promise<void> {
    if (this._state === "closed") return this.tail;

    const frame = parseInbound(raw);
    if (!frame) {
      this.sendError(
        new AppError(ErrorKind.InvalidInput, "empty or unrecognised message")
      );
      return this.tail;
    }

    switch (frame.type) {
      case "stop":
        // immediate: cancels the answer being generated, partial output is dropped
        this.inflight?.abort();
        this.send({ reporter: "output_message", type: "stop_message" });
        return this.tail;
      case "start":
        return this.enqueue(async () => this.replayHistory());
      case "question":
        this.send({
          reporter: "input_message",
          type: "question",
          message: frame.message,
        });
        return this.enqueue(() => this.answer(frame.message));
    }
  }

  /**
   * Server-side close. Aborts any answer in progress.
   */
  close(code = 1000, reason = "closed"): void {
    if (!this.detach()) return;
    try {
      this.transport.close(code, reason);
    } catch (err) {
      console.warn("[Chat] transport close failed:", errorMessage(err));
    }
  }

  /**
   * The client went away: drop everything, nothing is persisted.
   * Returns false when the session was already closed.
   */
  detach(): boolean {
    if (this._state === "closed") return false;
    this._state = "closed";
    this.inflight?.abort();
    this.inflight = null;
    this.turns.length = 0;
    for (const listener of this.closeListeners) listener(this);
    return true;
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    this.tail = this.tail
      .then(() => (this._state === "open" ? task() : undefined))
      .catch((err) => {
        console.error("[Chat] task failed:", this.chatName, errorMessage(err));
      });
    return this.tail;
  }

  private replayHistory(): void {
    this.send({ reporter: "output_message", type: "start_message" });
    for (const turn of this.turns) {
      this.send({
        reporter: "input_message",
        type: "question",
        message: turn.question,
      });
      this.send({
        reporter: "output_message",
        type: "answer",
        message: turn.answer,
        sources: turn.sources,
      });
    }
  }

  private async answer(question: string): Promise<void> {
    const controller = new AbortController();
    this.inflight = controller;
    const { signal } = controller;

    try {
      const contexts = await this.retrieve(question);
      const messages = buildPromptMessages(
        question,
        contexts,
        this.turns,
        this.deps.limits
      );

      let answer = "";
      try {
        for await (const token of this.deps.generation.generate(messages, {
          signal,
        })) {
          if (signal.aborted) break;
          if (!token) continue;
          answer += token;
          this.send({
            reporter: "output_message",
            type: "answer_chunk",
            message: token,
          });
        }
      } catch (err) {
        if (signal.aborted) return;
        throw asAppError(err, ErrorKind.ProviderError, "generation failed");
      }
      if (signal.aborted) return;

      const sources = contexts.map(toSource);
      this.send({
        reporter: "output_message",
        type: "answer",
        message: answer,
        sources,
      });
      this.remember({ question, answer, sources, createdAt: new Date() });
    } catch (err) {
      if (signal.aborted) return;
      console.error("[Chat] answer failed:", this.chatName, errorMessage(err));
      this.sendError(err);
    } finally {
      if (this.inflight === controller) this.inflight = null;
    }
  }

  /**
   * Follow-up questions lean on the previous one ("and the second page?"),
   * so the last question is embedded along with the new one.
   */
  retrievalQuery(question: string): string {
    const last = this.turns[this.turns.length - 1];
    return last ? `${last.question}\n${question}` : question;
  }

  private async retrieve(question: string): Promise<ScoredVectorEntry[]> {
    if (this.fileIds.length === 0) return [];

    let vector: number[];
    try {
      vector = await this.deps.embeddings.embedQuery(this.retrievalQuery(question));
    } catch (err) {
      throw asAppError(err, ErrorKind.ProviderError, "embedding failed");
    }

    try {
      const hits = await this.deps.vectorIndex.query(
        this.deps.collection,
        vector,
        { userId: this.userId, fileIds: [...this.fileIds] },
        this.deps.topK
      );
      return await this.onlyIndexed(hits);
    } catch (err) {
      throw asAppError(err, ErrorKind.StorageUnavailable, "retrieval failed");
    }
  }

  // a file deleted after the session opened may still have vectors until cleanup finishes
  private async onlyIndexed(hits: ScoredVectorEntry[]): Promise<ScoredVectorEntry[]> {
    if (hits.length === 0) return hits;
    const ids = [...new Set(hits.map((h) => h.fileId))];
    const records = await this.deps.statusStore.findByIds(ids);
    const live = new Set(
      records
        .filter((r) => r.userId === this.userId && r.status === "indexed")
        .map((r) => r.fileId)
    );
    return hits.filter((h) => live.has(h.fileId));
  }

  private remember(turn: ChatTurn): void {
    this.turns.push(turn);
    if (this.turns.length > this.deps.maxTurns) {
      this.turns.splice(0, this.turns.length - this.deps.maxTurns);
    }
  }

  private sendError(err: unknown): void {
    const appErr = isAppError(err)
      ? err
      : new AppError(ErrorKind.ProviderError, errorMessage(err));
    this.send({
      reporter: "output_message",
      type: "error",
      kind: appErr.kind,
      message: appErr.message,
    });
  }

  private send(frame: OutboundFrame): void {
    if (this._state === "closed") return;
    try {
      this.transport.send(frame);
    } catch (err) {
      console.warn("[Chat] send failed:", errorMessage(err));
    }
  }
}
