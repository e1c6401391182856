import { sha256Hex } from "../utils/text.js";
import { canonicalVideoUrl, parseVideoId } from "../utils/videoUrl.js";
import { ValidationError } from "./errors.js";
import { OriginKind } from "./types.js";

export function createSourceId(originKind: OriginKind, identity: string): string {
  return `src_${sha256Hex(`${originKind}:${identity}`).slice(0, 16)}`;
}

/** Identity of an uploaded document: its bytes, not its filename. */
export function documentIdentity(content: Buffer): string {
  return sha256Hex(content);
}

export function normalizeWebUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    throw new ValidationError(`Invalid URL: ${raw}`, [{ field: "url", message: "Invalid URL" }]);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ValidationError(`Unsupported URL scheme: ${url.protocol}`, [
      { field: "url", message: "Only http and https URLs are supported" },
    ]);
  }
  url.hash = "";
  url.hostname = url.hostname.toLowerCase();
  return url.toString();
}

export function normalizeVideoUrl(raw: string): string {
  const videoId = parseVideoId(raw.trim());
  if (!videoId) {
    throw new ValidationError(`Not a recognized video URL: ${raw}`, [
      { field: "url", message: "Expected a YouTube video URL" },
    ]);
  }
  return canonicalVideoUrl(videoId);
}
