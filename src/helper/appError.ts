export const ErrorKind = {
  InvalidInput: "InvalidInput",
  Unauthorized: "Unauthorized",
  FileNotReady: "FileNotReady",
  StorageUnavailable: "StorageUnavailable",
  ProviderError: "ProviderError",
  NotFound: "NotFound",
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

const HTTP_STATUS: Record<ErrorKind, number> = {
  InvalidInput: 400,
  Unauthorized: 403,
  FileNotReady: 409,
  StorageUnavailable: 503,
  ProviderError: 502,
  NotFound: 404,
};

// 4xxx codes are free for applications; 1011 is "internal error"
const CLOSE_CODE: Record<ErrorKind, number> = {
  InvalidInput: 4400,
  Unauthorized: 4403,
  FileNotReady: 4409,
  StorageUnavailable: 1011,
  ProviderError: 1011,
  NotFound: 4404,
};

export class AppError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AppError";
    this.kind = kind;
  }

  get status(): number {
    return HTTP_STATUS[this.kind];
  }

  get closeCode(): number {
    return CLOSE_CODE[this.kind];
  }
}

export const isAppError = (err: unknown): err is AppError =>
  err instanceof AppError;

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

/**
 * Re-raise `err` as an AppError of `kind` unless it already is one.
 */
export const asAppError = (
  err: unknown,
  kind: ErrorKind,
  context: string
): AppError =>
  isAppError(err)
    ? err
    : new AppError(kind, `${context}: ${errorMessage(err)}`, { cause: err });
