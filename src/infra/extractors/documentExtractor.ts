import { execFile } from "node:child_process";
import { promises as fs } from "node:fs";
import path from "node:path";
import { promisify } from "node:util";
import mammoth from "mammoth";
import { ExtractionError, errorMessage } from "../../domain/errors.js";
import { normalizeText } from "../../utils/text.js";
import { getLogger } from "../log/logger.js";
import { extractHtmlMetadata, htmlToText } from "./html.js";
import { ExtractedContent, ExtractionRequest, Extractor } from "./types.js";

const execFileAsync = promisify(execFile);
const log = getLogger({ module: "documentExtractor" });

const TEXT_EXTENSIONS = new Set([".md", ".markdown", ".txt", ".csv"]);
const HTML_EXTENSIONS = new Set([".html", ".htm"]);
const SUPPORTED_EXTENSIONS = new Set([
  ...TEXT_EXTENSIONS,
  ...HTML_EXTENSIONS,
  ".pdf",
  ".docx",
]);

export function getSupportedDocumentExtensions(): string[] {
  return [...SUPPORTED_EXTENSIONS];
}

export class DocumentExtractor implements Extractor {
  async extract(request: ExtractionRequest): Promise<ExtractedContent> {
    const displayName = path.basename(request.location);
    const ext = path.extname(request.location).toLowerCase();
    if (!SUPPORTED_EXTENSIONS.has(ext)) {
      throw new ExtractionError(
        `Unsupported extension: ${ext || "(none)"}. Allowed: ${getSupportedDocumentExtensions().join(", ")}`,
      );
    }

    const data = request.content ?? (await readDocument(request.location));
    const attributes: Record<string, string> = { format: ext.slice(1) };

    let text: string;
    if (TEXT_EXTENSIONS.has(ext)) {
      text = decodeUtf8(data);
    } else if (HTML_EXTENSIONS.has(ext)) {
      const html = decodeUtf8(data);
      const metadata = extractHtmlMetadata(html);
      if (metadata.title) {
        attributes.title = metadata.title;
      }
      text = htmlToText(html);
    } else if (ext === ".docx") {
      text = await loadDocxText(data);
    } else {
      text = await loadPdfText(data, request.content ? null : request.location);
    }

    return { text: normalizeText(text), displayName, attributes };
  }
}

async function readDocument(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    throw new ExtractionError(`Cannot read ${filePath}: ${errorMessage(error)}`);
  }
}

function decodeUtf8(data: Buffer): string {
  // strip a UTF-8 byte order mark
  return data.toString("utf-8").replace(/^\uFEFF/, "");
}

async function loadDocxText(data: Buffer): Promise<string> {
  try {
    const result = await mammoth.extractRawText({ buffer: data });
    return result.value;
  } catch (error) {
    throw new ExtractionError(`DOCX parsing failed: ${errorMessage(error)}`);
  }
}

async function loadPdfText(data: Buffer, filePathForFallback: string | null): Promise<string> {
  let libraryError: unknown;
  try {
    const text = await parsePdfWithLibrary(data);
    if (text) {
      return text;
    }
  } catch (error) {
    libraryError = error;
    log.warn({ err: error }, "pdf-parse failed");
  }

  if (filePathForFallback) {
    const viaPdftotext = await parsePdfWithPdftotext(filePathForFallback);
    if (viaPdftotext) {
      return viaPdftotext;
    }
  }

  throw new ExtractionError(
    libraryError
      ? `PDF parsing failed: ${errorMessage(libraryError)}`
      : "PDF contains no extractable text (scanned images are not supported).",
  );
}

async function parsePdfWithLibrary(data: Buffer): Promise<string> {
  const { PDFParse } = await import("pdf-parse");
  const parser = new PDFParse({ data });
  try {
    const parsed = await parser.getText();
    return normalizeText(parsed.text);
  } finally {
    await parser.destroy();
  }
}

async function parsePdfWithPdftotext(filePath: string): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync("pdftotext", ["-layout", filePath, "-"]);
    return normalizeText(stdout) || null;
  } catch (error) {
    log.debug({ err: error }, "pdftotext unavailable");
    return null;
  }
}
