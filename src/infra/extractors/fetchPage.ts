import { ExtractionError, errorMessage } from "../../domain/errors.js";

export interface FetchPageOptions {
  timeoutMs: number;
  accept?: string;
  userAgent?: string;
}

export interface FetchedPage {
  url: string;
  body: string;
  contentType: string;
}

const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; grounded-kb/0.1)";

export function parseHttpUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ExtractionError(`Invalid URL: ${raw}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ExtractionError(`Unsupported URL scheme: ${url.protocol}`);
  }
  return url;
}

export async function fetchPage(url: string, options: FetchPageOptions): Promise<FetchedPage> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: {
        "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
        Accept: options.accept ?? "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "Accept-Language": "en-US,en;q=0.9",
      },
      redirect: "follow",
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    if (error instanceof Error && error.name === "TimeoutError") {
      throw new ExtractionError(`Request timeout after ${options.timeoutMs}ms: ${url}`);
    }
    throw new ExtractionError(`Failed to fetch ${url}: ${errorMessage(error)}`);
  }

  if (!response.ok) {
    throw new ExtractionError(`HTTP ${response.status} fetching ${url}`, {
      status: response.status,
    });
  }

  return {
    url: response.url || url,
    body: await response.text(),
    contentType: response.headers.get("content-type") ?? "text/html",
  };
}
