import { z } from "zod";
import { ExtractionError } from "../../domain/errors.js";
import { decodeHtmlEntities } from "../../utils/text.js";
import { canonicalVideoUrl, parseVideoId } from "../../utils/videoUrl.js";
import { getLogger } from "../log/logger.js";
import { fetchPage, parseHttpUrl } from "./fetchPage.js";
import { ExtractedContent, ExtractionRequest, Extractor } from "./types.js";

const log = getLogger({ module: "videoExtractor" });

const MAX_DESCRIPTION_CHARS = 1000;

const oembedSchema = z.object({
  title: z.string(),
  author_name: z.string().optional(),
});

const captionTrackSchema = z.object({
  baseUrl: z.string(),
  languageCode: z.string(),
  kind: z.string().optional(),
});

export type CaptionTrack = z.infer<typeof captionTrackSchema>;

export function extractCaptionTracks(watchHtml: string): CaptionTrack[] {
  const match = watchHtml.match(/"captionTracks":(\[.*?\])(?=,"audioTracks"|,"translationLanguages"|\})/s);
  if (!match) {
    return [];
  }
  let raw: unknown;
  try {
    raw = JSON.parse(match[1]);
  } catch (error) {
    log.debug({ err: error }, "caption track list is not valid JSON");
    return [];
  }
  const parsed = z.array(captionTrackSchema).safeParse(raw);
  return parsed.success ? parsed.data : [];
}

/** Manual English captions, then generated English, then whatever exists. */
export function pickCaptionTrack(tracks: CaptionTrack[]): CaptionTrack | null {
  const english = tracks.filter((track) => track.languageCode.toLowerCase().startsWith("en"));
  return (
    english.find((track) => track.kind !== "asr") ??
    english[0] ??
    tracks.find((track) => track.kind !== "asr") ??
    tracks[0] ??
    null
  );
}

export function extractShortDescription(watchHtml: string): string | null {
  const match = watchHtml.match(/"shortDescription":("(?:[^"\\]|\\.)*")/);
  if (!match) {
    return null;
  }
  const parsed = z.string().safeParse(JSON.parse(match[1]));
  return parsed.success ? parsed.data : null;
}

/** Transcript text from a timedtext document (`<text>` cues or format-3 `<p>` cues). */
export function parseTimedText(xml: string): string {
  const cues: string[] = [];
  for (const match of xml.matchAll(/<(text|p)\b[^>]*>([\s\S]*?)<\/\1>/g)) {
    const inner = match[2].replace(/<[^>]+>/g, "");
    // cue bodies are XML-escaped HTML, so entities can be encoded twice
    const text = decodeHtmlEntities(decodeHtmlEntities(inner)).replace(/\s+/g, " ").trim();
    if (text) {
      cues.push(text);
    }
  }
  return cues.join(" ");
}

/** Transcript text from a WebVTT file: cue text only, no headers, timings or cue numbers. */
export function parseVtt(vtt: string): string {
  const lines: string[] = [];
  for (const rawLine of vtt.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (
      !line ||
      line.startsWith("WEBVTT") ||
      line.startsWith("Kind:") ||
      line.startsWith("Language:") ||
      line.startsWith("NOTE") ||
      line.includes("-->") ||
      /^\d+$/.test(line)
    ) {
      continue;
    }
    const text = decodeHtmlEntities(line.replace(/<[^>]+>/g, "")).trim();
    // rolling auto-captions repeat the previous line
    if (text && text !== lines[lines.length - 1]) {
      lines.push(text);
    }
  }
  return lines.join(" ");
}

export interface VideoTextParts {
  title: string;
  channel: string | null;
  description: string | null;
  transcript: string;
}

export function formatVideoText(parts: VideoTextParts): string {
  const sections = [`Title: ${parts.title}`];
  if (parts.channel) {
    sections.push(`Channel: ${parts.channel}`);
  }
  if (parts.description) {
    const description =
      parts.description.length > MAX_DESCRIPTION_CHARS
        ? `${parts.description.slice(0, MAX_DESCRIPTION_CHARS)}...`
        : parts.description;
    sections.push(`Description:\n${description}`);
  }
  sections.push(`Transcript:\n${parts.transcript}`);
  return sections.join("\n\n");
}

export interface VideoExtractorOptions {
  timeoutMs: number;
}

export class VideoExtractor implements Extractor {
  constructor(private readonly options: VideoExtractorOptions) {}

  async extract(request: ExtractionRequest): Promise<ExtractedContent> {
    parseHttpUrl(request.location);
    const videoId = parseVideoId(request.location);
    if (!videoId) {
      throw new ExtractionError(`Could not extract a video id from ${request.location}`);
    }
    const watchUrl = canonicalVideoUrl(videoId);

    const details = await this.fetchDetails(watchUrl);
    const page = await fetchPage(`${watchUrl}&hl=en`, { timeoutMs: this.options.timeoutMs });
    const track = pickCaptionTrack(extractCaptionTracks(page.body));
    if (!track) {
      throw new ExtractionError(`No transcript available for video ${videoId}.`);
    }

    const timedText = await fetchPage(track.baseUrl, {
      timeoutMs: this.options.timeoutMs,
      accept: "application/xml,text/xml;q=0.9,*/*;q=0.8",
    });
    const transcript = timedText.body.trimStart().startsWith("WEBVTT")
      ? parseVtt(timedText.body)
      : parseTimedText(timedText.body);
    if (!transcript) {
      throw new ExtractionError(`Transcript for video ${videoId} is empty.`);
    }

    const title = details?.title ?? watchUrl;
    const attributes: Record<string, string> = {
      videoId,
      transcriptLanguage: track.languageCode,
      transcriptKind: track.kind === "asr" ? "generated" : "manual",
    };
    if (details?.author_name) {
      attributes.channel = details.author_name;
    }

    return {
      text: formatVideoText({
        title,
        channel: details?.author_name ?? null,
        description: extractShortDescription(page.body),
        transcript,
      }),
      displayName: title,
      attributes,
    };
  }

  private async fetchDetails(watchUrl: string): Promise<z.infer<typeof oembedSchema> | null> {
    const endpoint = `https://www.youtube.com/oembed?format=json&url=${encodeURIComponent(watchUrl)}`;
    try {
      const page = await fetchPage(endpoint, {
        timeoutMs: this.options.timeoutMs,
        accept: "application/json",
      });
      const parsed = oembedSchema.safeParse(JSON.parse(page.body));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      // title is best-effort; the URL stands in for it
      log.warn({ err: error, watchUrl }, "video metadata lookup failed");
      return null;
    }
  }
}
