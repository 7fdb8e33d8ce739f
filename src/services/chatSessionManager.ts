import { AppError, asAppError, ErrorKind } from "../helper/appError";
import { ChatSession, ChatSessionDeps } from "./chatSession";
import type { SessionTransport } from "../types/chatSessionTypes";

export const SUPERSEDED_CLOSE_CODE = 4000;

const sessionKey = (userId: string, chatName: string) =>
  `${userId}\u0000${chatName}`;

export function parseFileIds(raw: string | undefined | null): string[] {
  if (!raw) return [];
  const ids = raw
    .split(",")
    .map((id) => id.trim())
    .filter(Boolean);
  return [...new Set(ids)];
}

export class ChatSessionManager {
  private readonly sessions = new Map<string, ChatSession>();

  constructor(private readonly deps: ChatSessionDeps) {}

  get size(): number {
    return this.sessions.size;
  }

  get(userId: string, chatName: string): ChatSession | undefined {
    return this.sessions.get(sessionKey(userId, chatName));
  }

  /**
   * Connecting -> Open. Every referenced file must belong to the user and be
   * indexed; a single bad reference rejects the whole session and closes
   * the transport. When `signal` is aborted during the check (the client
   * hung up), nothing is registered and an existing session is left alone.
   */
  async open(
    userId: string,
    chatName: string,
    fileIds: string[],
    transport: SessionTransport,
    { signal }: { signal?: AbortSignal } = {}
  ): Promise<ChatSession> {
    const ids = [...new Set(fileIds.map((id) => id.trim()).filter(Boolean))];
    const session = new ChatSession(userId, chatName, ids, transport, this.deps);

    try {
      if (!userId.trim() || !chatName.trim()) {
        throw new AppError(ErrorKind.InvalidInput, "user id and chat name are required");
      }
      await this.validateFiles(userId, ids);
    } catch (err) {
      const appErr = asAppError(err, ErrorKind.StorageUnavailable, "validate files");
      console.warn(`[Chat] rejected ${userId}/${chatName}: ${appErr.kind} ${appErr.message}`);
      session.reject(appErr);
      throw appErr;
    }

    if (signal?.aborted) {
      session.detach();
      throw new Error(`connection closed before ${userId}/${chatName} opened`);
    }

    const key = sessionKey(userId, chatName);
    const previous = this.sessions.get(key);
    if (previous) {
      console.log(`[Chat] superseding ${userId}/${chatName}`);
      previous.close(SUPERSEDED_CLOSE_CODE, "superseded");
    }

    session.onClose((s) => {
      if (this.sessions.get(key) === s) this.sessions.delete(key);
    });
    this.sessions.set(key, session);
    session.activate();

    console.log(`[Chat] open ${userId}/${chatName} files=${ids.length}`);
    return session;
  }

  closeAll(code = 1001, reason = "server shutting down"): void {
    for (const session of [...this.sessions.values()]) {
      session.close(code, reason);
    }
  }

  private async validateFiles(userId: string, fileIds: string[]): Promise<void> {
    if (fileIds.length === 0) return;

    const records = await this.deps.statusStore.findByIds(fileIds);
    const byId = new Map(records.map((r) => [r.fileId, r]));

    const foreign: string[] = [];
    const missing: string[] = [];
    const notReady: string[] = [];
    for (const id of fileIds) {
      const record = byId.get(id);
      if (!record || record.status === "deleted") missing.push(id);
      else if (record.userId !== userId) foreign.push(id);
      else if (record.status !== "indexed") notReady.push(`${id} (${record.status})`);
    }

    if (foreign.length > 0) {
      throw new AppError(
        ErrorKind.Unauthorized,
        `files not owned by user: ${foreign.join(", ")}`
      );
    }
    if (missing.length > 0) {
      throw new AppError(ErrorKind.NotFound, `unknown files: ${missing.join(", ")}`);
    }
    if (notReady.length > 0) {
      throw new AppError(
        ErrorKind.FileNotReady,
        `files not indexed yet: ${notReady.join(", ")}`
      );
    }
  }
}
