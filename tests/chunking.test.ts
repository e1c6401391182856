import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/domain/errors.js";
import { TextChunk, chunkText, toSourceChunks } from "../src/pipelines/chunking.js";
import { countWords } from "./helpers/fakes.js";

function words(count: number): string {
  return Array.from({ length: count }, (_, index) => `w${index}`).join(" ");
}

const SEPARATORS = [" ", " ", ".\n\n", " ", "\n"];

/** Words separated by spaces, sentence ends, paragraph and line breaks. */
function prose(count: number): string {
  let text = "";
  for (let index = 0; index < count; index += 1) {
    text += `w${index}`;
    if (index < count - 1) {
      text += SEPARATORS[index % SEPARATORS.length];
    }
  }
  return text;
}

/** Concatenates chunks, skipping the part each one shares with its predecessor. */
function reassemble(chunks: TextChunk[]): string {
  let text = "";
  let covered = 0;
  for (const chunk of chunks) {
    text += chunk.text.slice(Math.max(0, covered - chunk.startOffset));
    covered = chunk.endOffset;
  }
  return text;
}

describe("chunkText", () => {
  it("windows long text with the configured overlap", () => {
    const text = words(1200);
    const chunks = chunkText(text, { maxTokens: 500, overlapTokens: 50, countTokens: countWords });

    expect(chunks.map((chunk) => chunk.tokenCount)).toEqual([500, 500, 300]);
    expect(chunks.map((chunk) => chunk.position)).toEqual([0, 1, 2]);
    expect(chunks[0].text.startsWith("w0 ")).toBe(true);
    expect(chunks[0].text.endsWith(" w499")).toBe(true);
    expect(chunks[1].text.startsWith("w450 ")).toBe(true);
    expect(chunks[2].text.startsWith("w900 ")).toBe(true);
    expect(chunks[2].text.endsWith(" w1199")).toBe(true);
  });

  it("keeps offsets that slice back to each chunk", () => {
    const text = words(1200);
    for (const chunk of chunkText(text, { maxTokens: 500, overlapTokens: 50, countTokens: countWords })) {
      expect(text.slice(chunk.startOffset, chunk.endOffset)).toBe(chunk.text);
    }
  });

  it("reassembles the input for every length and overlap", () => {
    for (const overlapTokens of [0, 1, 2]) {
      for (let count = 0; count <= 23; count += 1) {
        const text = prose(count);
        const chunks = chunkText(text, { maxTokens: 5, overlapTokens, countTokens: countWords });

        expect(reassemble(chunks)).toBe(text);
        expect(chunks.every((chunk) => chunk.tokenCount <= 5)).toBe(true);
      }
    }
  });

  it("reassembles the input with the default tokenizer", () => {
    const text = prose(300);
    for (const overlapTokens of [0, 10]) {
      expect(reassemble(chunkText(text, { maxTokens: 40, overlapTokens }))).toBe(text);
    }
  });

  it("keeps the gap between chunks that do not overlap", () => {
    const text = words(12);
    const chunks = chunkText(text, { maxTokens: 5, overlapTokens: 0, countTokens: countWords });

    expect(chunks.map((chunk) => chunk.text)).toEqual([
      "w0 w1 w2 w3 w4",
      " w5 w6 w7 w8 w9",
      " w10 w11",
    ]);
    expect(chunks.map((chunk) => chunk.startOffset)).toEqual([0, 14, 29]);
  });

  it("prefers paragraph breaks over filling the window", () => {
    const text = "a1 a2 a3 a4 a5 a6.\n\nb1 b2 b3 b4 b5 b6 b7 b8";
    const chunks = chunkText(text, { maxTokens: 10, overlapTokens: 2, countTokens: countWords });

    expect(chunks.map((chunk) => chunk.text)).toEqual([
      "a1 a2 a3 a4 a5 a6.",
      "a5 a6.\n\nb1 b2 b3 b4 b5 b6 b7 b8",
    ]);
    expect(chunks.map((chunk) => chunk.tokenCount)).toEqual([6, 10]);
  });

  it("splits a single oversized unit by characters", () => {
    const text = "abcdefghijklmnopqrstuvwxy";
    const chunks = chunkText(text, {
      maxTokens: 10,
      overlapTokens: 0,
      countTokens: (value) => value.length,
    });

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.every((chunk) => chunk.tokenCount <= 10)).toBe(true);
    expect(chunks.map((chunk) => chunk.text).join("")).toBe(text);
  });

  it("returns no chunks for blank text", () => {
    expect(chunkText("", { countTokens: countWords })).toEqual([]);
    expect(chunkText(" \n\t ", { countTokens: countWords })).toEqual([]);
  });

  it("counts model tokens by default", () => {
    const chunks = chunkText("Hello world.");
    expect(chunks).toHaveLength(1);
    expect(chunks[0].text).toBe("Hello world.");
    expect(chunks[0].tokenCount).toBeGreaterThan(0);
  });

  it("rejects an overlap that is not smaller than the window", () => {
    expect(() => chunkText("some text", { maxTokens: 50, overlapTokens: 50 })).toThrow(
      ConfigurationError,
    );
    expect(() => chunkText("some text", { maxTokens: 0, overlapTokens: 0 })).toThrow(
      ConfigurationError,
    );
  });
});

describe("toSourceChunks", () => {
  it("derives chunk ids from the source and position", () => {
    const chunks = toSourceChunks(
      "src_abc",
      chunkText("one two three", { maxTokens: 10, overlapTokens: 2, countTokens: countWords }),
    );
    expect(chunks).toEqual([
      {
        chunkId: "src_abc:0",
        sourceId: "src_abc",
        text: "one two three",
        tokenCount: 3,
        position: 0,
        startOffset: 0,
        endOffset: 13,
      },
    ]);
  });
});
