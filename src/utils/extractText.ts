import { PDFLoader } from "@langchain/community/document_loaders/fs/pdf";

import { isPlainText } from "../helper/contentTypes";

export interface ExtractedPage {
  text: string;
  pageNumber: number | null;
}

export type TextExtractor = (
  bytes: Buffer,
  contentType: string
) => Promise<ExtractedPage[]>;

const pageNumberOf = (metadata: Record<string, unknown>): number | null => {
  const loc = metadata.loc;
  if (loc && typeof loc === "object" && "pageNumber" in loc) {
    const n = Number(loc.pageNumber);
    return Number.isFinite(n) ? n : null;
  }
  return null;
};

export const extractText: TextExtractor = async (bytes, contentType) => {
  if (contentType === "application/pdf") {
    // one document per page
    const loader = new PDFLoader(new Blob([new Uint8Array(bytes)]), {
      splitPages: true,
    });
    const docs = await loader.load();
    return docs.map((d) => ({
      text: d.pageContent,
      pageNumber: pageNumberOf(d.metadata),
    }));
  }

  if (isPlainText(contentType)) {
    return [{ text: bytes.toString("utf8"), pageNumber: null }];
  }

  throw new Error(`Unsupported file type for extraction: ${contentType}`);
};
