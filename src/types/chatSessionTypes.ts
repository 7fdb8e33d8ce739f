import type { ErrorKind } from "../helper/appError";

/**
 * A source/citation from a file chunk
 */
export interface ChatSource {
  fileId: string;
  fileName: string;
  chunkOffset: number;
  pageNumber: number | null;
  score: number;
  snippet: string;
}

/**
 * One question/answer pair kept in memory for the session
 */
export interface ChatTurn {
  question: string;
  answer: string;
  sources: ChatSource[];
  createdAt: Date;
}

export type SessionState = "connecting" | "open" | "closed";

/**
 * Frames sent to the client
 */
export type OutboundFrame =
  | { reporter: "input_message"; type: "question"; message: string }
  | { reporter: "output_message"; type: "start_message" }
  | { reporter: "output_message"; type: "stop_message" }
  | { reporter: "output_message"; type: "answer_chunk"; message: string }
  | {
      reporter: "output_message";
      type: "answer";
      message: string;
      sources: ChatSource[];
    }
  | {
      reporter: "output_message";
      type: "error";
      kind: ErrorKind;
      message: string;
    };

/**
 * Frames accepted from the client. Plain text is a question.
 */
export type InboundFrame =
  | { type: "question"; message: string }
  | { type: "start" }
  | { type: "stop" };

/**
 * The live connection behind a session. Closing it must not throw.
 */
export interface SessionTransport {
  send(frame: OutboundFrame): void;
  close(code: number, reason: string): void;
}
