import { normalizeText } from "../utils/text.js";

const LINE_PATTERNS: Array<[RegExp, string]> = [
  // footers such as "Page 3 of 12"
  [/\bPage \d+ of \d+\b/gi, ""],
  [/©[^\n]*?\d{4}/g, ""],
  // leftover entities the extractors did not decode
  [/&[a-z]+;/gi, " "],
  [/\.{4,}/g, "..."],
  [/ {2,}/g, " "],
];

// pdftotext separates pages with a form feed, pdf-parse with "-- 2 of 9 --"
const PAGE_BREAK = /\f|^-- \d+ of \d+ --$/m;
const PAGE_NUMBER = /^\d{1,4}$/;

/**
 * Removes boilerplate and normalizes whitespace. Paragraph breaks survive as a
 * single blank line so the chunker can still prefer them.
 *
 * A line holding only a number is treated as a page number when it opens or
 * closes a page; anywhere else it is content.
 */
export function cleanText(text: string): string {
  const normalized = normalizeText(text).replace(/[\u00a0\u2000-\u200a]/g, " ");
  const pages = normalized.split(PAGE_BREAK);

  const lines = pages.flatMap((page) => {
    const pageLines = page.split("\n").map(cleanLine);
    if (pages.length < 2) {
      return pageLines;
    }
    const filled = pageLines.flatMap((line, index) => (line ? [index] : []));
    const edges = new Set([filled[0], filled[filled.length - 1]]);
    return pageLines.filter((line, index) => !(edges.has(index) && PAGE_NUMBER.test(line)));
  });

  const output: string[] = [];
  for (const line of lines) {
    if (line) {
      output.push(line);
    } else if (output.length > 0 && output[output.length - 1] !== "") {
      output.push("");
    }
  }

  return output.join("\n").trim();
}

function cleanLine(line: string): string {
  let cleaned = line;
  for (const [pattern, replacement] of LINE_PATTERNS) {
    cleaned = cleaned.replace(pattern, replacement);
  }
  return cleaned.trim();
}
