import { OriginKind, SourceAttributes } from "../../domain/types.js";

export interface ExtractionRequest {
  sourceId: string;
  /** File name, file path or URL as submitted. */
  location: string;
  /** Uploaded bytes for documents; null when the location is read directly. */
  content: Buffer | null;
}

export interface ExtractedContent {
  text: string;
  displayName: string;
  attributes: SourceAttributes;
}

export interface Extractor {
  extract(request: ExtractionRequest): Promise<ExtractedContent>;
}

export type ExtractorRegistry = Record<OriginKind, Extractor>;
