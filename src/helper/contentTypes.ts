import path from "path";

const BY_EXTENSION: Record<string, string> = {
  ".pdf": "application/pdf",
  ".doc": "application/msword",
  ".docx":
    "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  ".xls": "application/vnd.ms-excel",
  ".xlsx": "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  ".txt": "text/plain",
  ".md": "text/markdown",
  ".markdown": "text/markdown",
  ".csv": "text/csv",
};

export const ALLOWED_CONTENT_TYPES = new Set(Object.values(BY_EXTENSION));

/**
 * Resolves the content type of an upload. Browsers often send
 * application/octet-stream (or nothing) for .md and .csv, so the extension
 * wins in that case.
 */
export function resolveContentType(
  fileName: string,
  declared?: string
): string {
  const base = (declared || "").split(";")[0].trim().toLowerCase();
  if (base && base !== "application/octet-stream") return base;
  return (
    BY_EXTENSION[path.extname(fileName).toLowerCase()] ||
    "application/octet-stream"
  );
}

export const isAllowedContentType = (contentType: string) =>
  ALLOWED_CONTENT_TYPES.has(contentType);

export const isPlainText = (contentType: string) =>
  contentType.startsWith("text/");
