import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/domain/errors.js";
import {
  createSourceId,
  documentIdentity,
  normalizeVideoUrl,
  normalizeWebUrl,
} from "../src/domain/sourceIdentity.js";
import { parseVideoId } from "../src/utils/videoUrl.js";

describe("source identity", () => {
  it("derives stable ids per origin kind", () => {
    const id = createSourceId("web_page", "https://example.com/");
    expect(id).toMatch(/^src_[0-9a-f]{16}$/);
    expect(createSourceId("web_page", "https://example.com/")).toBe(id);
    expect(createSourceId("video", "https://example.com/")).not.toBe(id);
  });

  it("identifies documents by their bytes", () => {
    expect(documentIdentity(Buffer.from("same"))).toBe(documentIdentity(Buffer.from("same")));
    expect(documentIdentity(Buffer.from("same"))).not.toBe(documentIdentity(Buffer.from("other")));
  });

  it("normalizes web URLs", () => {
    expect(normalizeWebUrl("  https://Docs.Example.com/deploy#intro ")).toBe(
      "https://docs.example.com/deploy",
    );
    expect(() => normalizeWebUrl("ftp://example.com/file")).toThrow(ValidationError);
    expect(() => normalizeWebUrl("not a url")).toThrow(ValidationError);
  });

  it("maps every video URL form to the watch URL", () => {
    const canonical = "https://www.youtube.com/watch?v=abcDEF12345";
    expect(normalizeVideoUrl("https://youtu.be/abcDEF12345?t=30")).toBe(canonical);
    expect(normalizeVideoUrl("https://www.youtube.com/shorts/abcDEF12345")).toBe(canonical);
    expect(normalizeVideoUrl("https://m.youtube.com/watch?v=abcDEF12345&list=x")).toBe(canonical);
    expect(() => normalizeVideoUrl("https://vimeo.com/12345")).toThrow(ValidationError);
  });

  it("rejects malformed video ids", () => {
    expect(parseVideoId("https://www.youtube.com/watch?v=short")).toBeNull();
    expect(parseVideoId("https://www.youtube.com/embed/abcDEF12345")).toBe("abcDEF12345");
  });
});
