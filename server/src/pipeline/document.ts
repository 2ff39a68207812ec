import fs from "node:fs/promises";
import path from "node:path";
import { DocumentConversionError } from "./errors.js";

export const SUPPORTED_DOCUMENT_EXTENSIONS = [".pdf", ".md", ".markdown", ".txt"] as const;

export function isSupportedDocument(fileName: string): boolean {
  const ext = path.extname(fileName).toLowerCase();
  return SUPPORTED_DOCUMENT_EXTENSIONS.some((supported) => supported === ext);
}

async function pdfToMarkdown(data: Uint8Array): Promise<string> {
  // Loaded lazily: the legacy build is only needed for PDF uploads.
  const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
  const doc = await pdfjs.getDocument({ data, isEvalSupported: false, disableFontFace: true, useSystemFonts: false }).promise;

  const pages: string[] = [];
  try {
    for (let pageNo = 1; pageNo <= doc.numPages; pageNo++) {
      const page = await doc.getPage(pageNo);
      const content = await page.getTextContent();
      let text = "";
      for (const item of content.items) {
        if (!("str" in item)) continue;
        text += item.str;
        text += item.hasEOL ? "\n" : " ";
      }
      const body = text.replace(/[ \t]+\n/g, "\n").replace(/\n{3,}/g, "\n\n").trim();
      if (body.length > 0) pages.push(`## Page ${pageNo}\n\n${body}`);
    }
  } finally {
    await doc.destroy();
  }

  return pages.join("\n\n");
}

/** Convert a source document into markdown-ish text. Failures are fatal for the run. */
export async function convertDocument(sourcePath: string): Promise<string> {
  const ext = path.extname(sourcePath).toLowerCase();
  if (!isSupportedDocument(sourcePath)) {
    throw new DocumentConversionError(sourcePath, `unsupported document type "${ext || "(none)"}"`);
  }

  let bytes: Buffer;
  try {
    bytes = await fs.readFile(sourcePath);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new DocumentConversionError(sourcePath, msg, { cause: err });
  }

  let text: string;
  try {
    text = ext === ".pdf" ? await pdfToMarkdown(new Uint8Array(bytes)) : bytes.toString("utf8");
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new DocumentConversionError(sourcePath, msg, { cause: err });
  }

  if (text.trim().length === 0) {
    throw new DocumentConversionError(sourcePath, "document contains no extractable text");
  }
  return text;
}
