import { DocumentExtractor } from "./documentExtractor.js";
import { ExtractorRegistry } from "./types.js";
import { VideoExtractor } from "./videoExtractor.js";
import { WebPageExtractor } from "./webPageExtractor.js";

export interface ExtractorOptions {
  fetchTimeoutMs: number;
}

// Record<OriginKind, Extractor> keeps the mapping total: a new origin kind fails to compile here.
export function createExtractors(options: ExtractorOptions): ExtractorRegistry {
  return {
    document: new DocumentExtractor(),
    web_page: new WebPageExtractor({ timeoutMs: options.fetchTimeoutMs }),
    video: new VideoExtractor({ timeoutMs: options.fetchTimeoutMs }),
  };
}
