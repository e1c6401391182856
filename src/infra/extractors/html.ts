import { decodeHtmlEntities } from "../../utils/text.js";

export interface HtmlMetadata {
  title?: string;
  description?: string;
  author?: string;
  siteName?: string;
  publishedDate?: string;
}

export function extractHtmlMetadata(html: string): HtmlMetadata {
  const titleMatch = html.match(/<title[^>]*>([^<]+)<\/title>/i);
  const title = titleMatch ? decodeHtmlEntities(titleMatch[1].trim()) : undefined;

  return {
    title: extractMetaTag(html, "og:title") ?? extractMetaTag(html, "twitter:title") ?? title,
    description:
      extractMetaTag(html, "og:description") ?? extractMetaTag(html, "description"),
    author: extractMetaTag(html, "article:author") ?? extractMetaTag(html, "author"),
    siteName: extractMetaTag(html, "og:site_name"),
    publishedDate: extractMetaTag(html, "article:published_time"),
  };
}

export function extractMetaTag(html: string, name: string): string | undefined {
  const escaped = name.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const patterns = [
    new RegExp(`<meta[^>]+(?:property|name)=["']${escaped}["'][^>]+content=["']([^"']+)["']`, "i"),
    new RegExp(`<meta[^>]+content=["']([^"']+)["'][^>]+(?:property|name)=["']${escaped}["']`, "i"),
  ];
  for (const pattern of patterns) {
    const match = html.match(pattern);
    if (match) {
      return decodeHtmlEntities(match[1].trim());
    }
  }
  return undefined;
}

const BLOCK_TAGS =
  /<\/?(?:p|div|section|article|header|footer|main|aside|li|ul|ol|table|tr|h[1-6]|blockquote|pre|br|hr)\b[^>]*>/gi;

/** Plain text with block elements turned into line breaks. */
export function htmlToText(html: string): string {
  let text = html.replace(/<(script|style|noscript|template|svg)[^>]*>[\s\S]*?<\/\1>/gi, "");
  text = text.replace(/<!--[\s\S]*?-->/g, "");
  text = text.replace(/<head[^>]*>[\s\S]*?<\/head>/i, "");
  text = text.replace(/<(nav)[^>]*>[\s\S]*?<\/\1>/gi, "");
  text = text.replace(BLOCK_TAGS, "\n");
  text = text.replace(/<[^>]+>/g, " ");
  text = decodeHtmlEntities(text);

  return text
    .split("\n")
    .map((line) => line.replace(/[^\S\n]+/g, " ").trim())
    .filter((line, index, lines) => line !== "" || (index > 0 && lines[index - 1] !== ""))
    .join("\n")
    .trim();
}
