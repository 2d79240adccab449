import path from "node:path";

import { ErrorCode, KnowledgeBaseError, getErrorMessage } from "../errors";
import type { ContentUnit } from "../types/knowledge";

const TEXT_EXTENSIONS = new Set([".md", ".txt"]);
const IMAGE_EXTENSIONS = new Set([".png", ".jpg", ".jpeg", ".webp"]);

export const SUPPORTED_EXTENSIONS = [
  ...TEXT_EXTENSIONS,
  ".pdf",
  ...IMAGE_EXTENSIONS,
];

/**
 * Minimal stand-in for a layout-aware extraction service: plain text files,
 * PDF text per page and standalone images.
 */
export const extractContentUnits = async (
  filename: string,
  bytes: Uint8Array
): Promise<ContentUnit[]> => {
  const source = path.basename(filename);
  const extension = path.extname(source).toLowerCase();

  if (TEXT_EXTENSIONS.has(extension)) {
    const text = Buffer.from(bytes).toString("utf8");
    return text.trim()
      ? [{ type: "text", content: text, page: 1, source }]
      : [];
  }

  if (extension === ".pdf") {
    return (await readPdfPages(source, bytes)).flatMap(
      (text, index): ContentUnit[] => {
        const content = text.trim();
        return content
          ? [{ type: "text", content, page: index + 1, source }]
          : [];
      }
    );
  }

  if (IMAGE_EXTENSIONS.has(extension)) {
    return [{ type: "image", content: bytes, page: 1, source }];
  }

  throw new KnowledgeBaseError(
    ErrorCode.UNSUPPORTED_DOCUMENT,
    `Unsupported file type "${extension || source}". Supported: ${SUPPORTED_EXTENSIONS.join(", ")}`
  );
};

type PdfTextItem = { str: string; transform: number[] };

export type PdfPage = {
  getTextContent(options?: {
    normalizeWhitespace?: boolean;
    disableCombineTextItems?: boolean;
  }): Promise<{ items: PdfTextItem[] }>;
};

/** Items on the same baseline are joined; each new baseline starts a line. */
export const renderPageText = async (page: PdfPage): Promise<string> => {
  const { items } = await page.getTextContent({
    normalizeWhitespace: false,
    disableCombineTextItems: false,
  });
  let text = "";
  let lastY: number | undefined;

  for (const item of items) {
    const y = item.transform[5];
    text += lastY === undefined || lastY === y ? item.str : `\n${item.str}`;
    lastY = y;
  }

  return text;
};

/**
 * One entry per page, in page order. pdf-parse renders pages one at a time,
 * so the slot is taken before rendering starts; a page that fails to render
 * stays empty.
 */
export const readPdfPages = async (
  source: string,
  bytes: Uint8Array
): Promise<string[]> => {
  const { default: pdfParse } = await import("pdf-parse/lib/pdf-parse.js");
  const pages: string[] = [];

  try {
    await pdfParse(Buffer.from(bytes), {
      pagerender: async (page: PdfPage) => {
        const slot = pages.push("") - 1;
        pages[slot] = await renderPageText(page);
        return pages[slot];
      },
    });
  } catch (error) {
    throw new KnowledgeBaseError(
      ErrorCode.UNSUPPORTED_DOCUMENT,
      `Could not read "${source}" as a PDF: ${getErrorMessage(error)}`,
      error
    );
  }

  return pages;
};
