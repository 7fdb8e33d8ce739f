import type { IncomingMessage, Server } from "http";
import type { Duplex } from "stream";
import { RawData, WebSocket, WebSocketServer } from "ws";

import { errorMessage } from "../helper/appError";
import type { ChatSession } from "../services/chatSession";
import {
  ChatSessionManager,
  parseFileIds,
} from "../services/chatSessionManager";
import type { SessionTransport } from "../types/chatSessionTypes";

export interface ChatRoute {
  userId: string;
  chatName: string;
  fileIds: string[];
}

/**
 * ws://host/chat/:userId/:chatName/:fileIds? where fileIds is a
 * comma-separated list. Returns null for any other path.
 */
export function parseChatPath(url: string): ChatRoute | null {
  let pathname: string;
  try {
    pathname = new URL(url, "http://localhost").pathname;
  } catch {
    return null;
  }

  const parts = pathname.split("/").filter(Boolean);
  if (parts[0] !== "chat" || parts.length < 3 || parts.length > 4) return null;

  try {
    const [userId, chatName, rawIds] = parts.slice(1).map(decodeURIComponent);
    if (!userId || !chatName) return null;
    return { userId, chatName, fileIds: parseFileIds(rawIds) };
  } catch {
    // malformed percent-encoding
    return null;
  }
}

const rawToString = (data: RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
};

/**
 * The parts of a ws connection a chat session uses.
 */
export interface ChatSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: "message", listener: (data: RawData) => void): this;
  on(event: "close", listener: () => void): this;
  on(event: "error", listener: (err: Error) => void): this;
}

export const wsTransport = (ws: ChatSocket): SessionTransport => ({
  send: (frame) => {
    if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify(frame));
  },
  close: (code, reason) => ws.close(code, reason),
});

export function handleChatConnection(
  ws: ChatSocket,
  route: ChatRoute,
  manager: ChatSessionManager
): void {
  let session: ChatSession | null = null;
  const hangup = new AbortController();
  // frames that arrive while the file check is still running
  const early: string[] = [];

  const deliver = (s: ChatSession, text: string) => {
    s.receive(text).catch((err) => {
      console.error("[ChatSocket] receive failed:", errorMessage(err));
    });
  };

  ws.on("message", (data: RawData) => {
    const text = rawToString(data);
    if (session) deliver(session, text);
    else early.push(text);
  });
  ws.on("close", () => {
    hangup.abort();
    session?.detach();
  });
  ws.on("error", (err) => {
    console.error("[ChatSocket] socket error:", err.message);
  });

  manager
    .open(route.userId, route.chatName, route.fileIds, wsTransport(ws), {
      signal: hangup.signal,
    })
    .then((opened) => {
      if (hangup.signal.aborted) {
        opened.detach();
        return;
      }
      session = opened;
      for (const text of early.splice(0)) deliver(opened, text);
    })
    .catch((err) => {
      // refusals were already reported on the socket before it closed
      console.warn("[ChatSocket] session not opened:", errorMessage(err));
    });
}

export function attachChatSocket(
  server: Server,
  manager: ChatSessionManager
): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const route = parseChatPath(req.url ?? "");
    if (!route) {
      socket.write("HTTP/1.1 404 Not Found\r\n\r\n");
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      handleChatConnection(ws, route, manager);
    });
  });

  return wss;
}
