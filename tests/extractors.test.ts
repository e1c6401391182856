import { describe, expect, it } from "vitest";
import { ExtractionError } from "../src/domain/errors.js";
import { DocumentExtractor } from "../src/infra/extractors/documentExtractor.js";
import { extractHtmlMetadata, htmlToText } from "../src/infra/extractors/html.js";
import {
  extractCaptionTracks,
  extractShortDescription,
  formatVideoText,
  parseTimedText,
  parseVtt,
  pickCaptionTrack,
} from "../src/infra/extractors/videoExtractor.js";
import { htmlPageContent } from "../src/infra/extractors/webPageExtractor.js";

describe("htmlToText", () => {
  it("turns block elements into paragraphs", () => {
    const html = "<html><head><title>T</title></head><body><p>Hello</p><p>World</p></body></html>";
    expect(htmlToText(html)).toBe("Hello\n\nWorld");
  });

  it("drops scripts and decodes entities", () => {
    expect(htmlToText("<p>Fish<script>track()</script> &amp; Chips</p>")).toBe("Fish & Chips");
  });
});

describe("extractHtmlMetadata", () => {
  it("prefers Open Graph tags over the title element", () => {
    const html = [
      "<head>",
      "<title>Plain</title>",
      '<meta property="og:title" content="OG Title">',
      '<meta name="author" content="Ana Ruiz">',
      '<meta property="og:site_name" content="Docs">',
      "</head>",
    ].join("");

    expect(extractHtmlMetadata(html)).toEqual({
      title: "OG Title",
      author: "Ana Ruiz",
      siteName: "Docs",
    });
  });
});

describe("htmlPageContent", () => {
  it("uses the URL when the page has no title", () => {
    const content = htmlPageContent("<p>Only body</p>", new URL("https://example.com/a"));
    expect(content).toEqual({
      text: "Only body",
      displayName: "https://example.com/a",
      attributes: { domain: "example.com" },
    });
  });
});

describe("video transcripts", () => {
  it("reads timedtext cues", () => {
    const xml =
      '<transcript><text start="0" dur="1">Hello &amp;amp; welcome</text>' +
      '<text start="1">to the   show</text></transcript>';
    expect(parseTimedText(xml)).toBe("Hello & welcome to the show");
  });

  it("reads WebVTT cue text and drops rolling repeats", () => {
    const vtt = [
      "WEBVTT",
      "Kind: captions",
      "",
      "1",
      "00:00:00.000 --> 00:00:01.000",
      "<c>welcome</c> back",
      "",
      "2",
      "00:00:01.000 --> 00:00:02.000",
      "welcome back",
      "to the show",
    ].join("\n");
    expect(parseVtt(vtt)).toBe("welcome back to the show");
  });

  it("prefers manual English captions", () => {
    const tracks = [
      { baseUrl: "https://example.com/de", languageCode: "de" },
      { baseUrl: "https://example.com/en-asr", languageCode: "en", kind: "asr" },
      { baseUrl: "https://example.com/en-gb", languageCode: "en-GB" },
    ];
    expect(pickCaptionTrack(tracks)?.baseUrl).toBe("https://example.com/en-gb");
    expect(
      pickCaptionTrack([
        { baseUrl: "https://example.com/de-asr", languageCode: "de", kind: "asr" },
        { baseUrl: "https://example.com/fr", languageCode: "fr" },
      ])?.baseUrl,
    ).toBe("https://example.com/fr");
    expect(pickCaptionTrack([])).toBeNull();
  });

  it("finds caption tracks and the description in the watch page", () => {
    const page =
      'var data = {"captionTracks":[{"baseUrl":"https://example.com/tt","languageCode":"en","kind":"asr"}],' +
      '"audioTracks":[]}; var more = {"shortDescription":"Line one\\nLine two"};';

    expect(extractCaptionTracks(page)).toEqual([
      { baseUrl: "https://example.com/tt", languageCode: "en", kind: "asr" },
    ]);
    expect(extractShortDescription(page)).toBe("Line one\nLine two");
  });

  it("formats the indexed text", () => {
    expect(
      formatVideoText({ title: "Intro", channel: "Ops Team", description: null, transcript: "hello" }),
    ).toBe("Title: Intro\n\nChannel: Ops Team\n\nTranscript:\nhello");
  });
});

describe("DocumentExtractor", () => {
  const extractor = new DocumentExtractor();

  it("decodes text files and strips the byte order mark", async () => {
    const content = await extractor.extract({
      sourceId: "src_a",
      location: "notes.txt",
      content: Buffer.from("\uFEFFHello\r\nWorld\t!", "utf-8"),
    });
    expect(content).toEqual({
      text: "Hello\nWorld !",
      displayName: "notes.txt",
      attributes: { format: "txt" },
    });
  });

  it("extracts HTML documents with their title", async () => {
    const html =
      "<html><head><title>Page &amp; Co</title></head><body><h1>Top</h1><p>Body</p></body></html>";
    const content = await extractor.extract({
      sourceId: "src_b",
      location: "docs/page.html",
      content: Buffer.from(html, "utf-8"),
    });
    expect(content).toEqual({
      text: "Top\n\nBody",
      displayName: "page.html",
      attributes: { format: "html", title: "Page & Co" },
    });
  });

  it("rejects unsupported extensions", async () => {
    await expect(
      extractor.extract({ sourceId: "src_c", location: "a.zip", content: Buffer.from("x") }),
    ).rejects.toBeInstanceOf(ExtractionError);
  });

  it("reports unreadable paths", async () => {
    await expect(
      extractor.extract({ sourceId: "src_d", location: "/nonexistent/dir/x.md", content: null }),
    ).rejects.toThrow("Cannot read /nonexistent/dir/x.md");
  });
});
