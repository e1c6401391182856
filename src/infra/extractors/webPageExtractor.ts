import { ExtractionError } from "../../domain/errors.js";
import { fetchPage, parseHttpUrl } from "./fetchPage.js";
import { extractHtmlMetadata, htmlToText } from "./html.js";
import { ExtractedContent, ExtractionRequest, Extractor } from "./types.js";

export interface WebPageExtractorOptions {
  timeoutMs: number;
}

export class WebPageExtractor implements Extractor {
  constructor(private readonly options: WebPageExtractorOptions) {}

  async extract(request: ExtractionRequest): Promise<ExtractedContent> {
    const url = parseHttpUrl(request.location);
    const page = await fetchPage(url.toString(), { timeoutMs: this.options.timeoutMs });

    if (page.contentType.includes("text/plain")) {
      return {
        text: page.body,
        displayName: url.toString(),
        attributes: { domain: url.hostname },
      };
    }
    if (!page.contentType.includes("html")) {
      throw new ExtractionError(`Unsupported content type: ${page.contentType}`);
    }

    return htmlPageContent(page.body, url);
  }
}

export function htmlPageContent(html: string, url: URL): ExtractedContent {
  const metadata = extractHtmlMetadata(html);
  const attributes: Record<string, string> = { domain: url.hostname };
  if (metadata.siteName) {
    attributes.siteName = metadata.siteName;
  }
  if (metadata.author) {
    attributes.author = metadata.author;
  }
  if (metadata.description) {
    attributes.description = metadata.description;
  }
  if (metadata.publishedDate) {
    attributes.publishedDate = metadata.publishedDate;
  }

  return {
    text: htmlToText(html),
    displayName: metadata.title ?? url.toString(),
    attributes,
  };
}
