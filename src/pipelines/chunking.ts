import { encode } from "gpt-tokenizer";
import { ConfigurationError } from "../domain/errors.js";
import { Chunk } from "../domain/types.js";

export const DEFAULT_MAX_TOKENS = 500;
export const DEFAULT_OVERLAP_TOKENS = 50;

// A natural break is only taken when it keeps at least this share of the window.
const MIN_BOUNDARY_RATIO = 0.55;

export type TokenCounter = (text: string) => number;

export const countTokens: TokenCounter = (text) => encode(text).length;

export interface ChunkingOptions {
  maxTokens?: number;
  overlapTokens?: number;
  countTokens?: TokenCounter;
}

export interface TextChunk {
  text: string;
  tokenCount: number;
  position: number;
  startOffset: number;
  endOffset: number;
}

interface Unit {
  start: number;
  end: number;
  /** tokens of the unit together with the whitespace before it */
  cost: number;
}

type BreakKind = "paragraph" | "line" | "sentence";

const BREAK_PRIORITY: readonly BreakKind[] = ["paragraph", "line", "sentence"];

/**
 * Splits text into windows of at most `maxTokens` tokens, overlapping by up to
 * `overlapTokens`. Each chunk is an exact slice of the input and consecutive chunks
 * either overlap or meet, so offsets reassemble the text without gaps.
 */
export function chunkText(text: string, options: ChunkingOptions = {}): TextChunk[] {
  const maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
  const overlapTokens = options.overlapTokens ?? DEFAULT_OVERLAP_TOKENS;
  const count = options.countTokens ?? countTokens;
  validateChunkParams(maxTokens, overlapTokens);

  const units = splitUnits(text, maxTokens, count);
  if (units.length === 0) {
    return [];
  }

  const chunks: TextChunk[] = [];
  let start = 0;
  // end of the previous chunk when the next one shares no units with it
  let carryFrom: number | null = null;

  while (start < units.length) {
    let end = start;
    let tokens = 0;
    while (end < units.length && tokens + units[end].cost <= maxTokens) {
      tokens += units[end].cost;
      end += 1;
    }
    if (end === start) {
      end = start + 1;
    }

    if (end < units.length) {
      end = findBreak(text, units, start, end, maxTokens);
    }

    const startOffset = carryFrom ?? units[start].start;
    let slice = text.slice(startOffset, units[end - 1].end);
    let tokenCount = count(slice);
    // Unit costs are an estimate; the real count of the slice is authoritative.
    while (tokenCount > maxTokens && end - start > 1) {
      end -= 1;
      slice = text.slice(startOffset, units[end - 1].end);
      tokenCount = count(slice);
    }

    const endOffset = units[end - 1].end;
    chunks.push({ text: slice, tokenCount, position: chunks.length, startOffset, endOffset });

    if (end >= units.length) {
      break;
    }
    const next = overlapStart(units, start, end, overlapTokens);
    carryFrom = next === end ? endOffset : null;
    start = next;
  }

  return chunks;
}

export function toSourceChunks(sourceId: string, pieces: TextChunk[]): Chunk[] {
  return pieces.map((piece) => ({
    chunkId: `${sourceId}:${piece.position}`,
    sourceId,
    ...piece,
  }));
}

export function validateChunkParams(maxTokens: number, overlapTokens: number): void {
  if (!Number.isInteger(maxTokens) || maxTokens < 1) {
    throw new ConfigurationError(`maxTokens must be a positive integer, got ${maxTokens}.`);
  }
  if (!Number.isInteger(overlapTokens) || overlapTokens < 0) {
    throw new ConfigurationError(
      `overlapTokens must be a non-negative integer, got ${overlapTokens}.`,
    );
  }
  if (overlapTokens >= maxTokens) {
    throw new ConfigurationError(
      `overlapTokens (${overlapTokens}) must be smaller than maxTokens (${maxTokens}).`,
    );
  }
}

function splitUnits(text: string, maxTokens: number, count: TokenCounter): Unit[] {
  const units: Unit[] = [];
  let previousEnd = -1;

  for (const match of text.matchAll(/\S+/g)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    const costStart = previousEnd < 0 ? start : previousEnd;
    const cost = count(text.slice(costStart, end));

    if (cost > maxTokens) {
      units.push(...splitOversizedUnit(text, costStart, start, end, maxTokens, count));
    } else {
      units.push({ start, end, cost });
    }
    previousEnd = end;
  }

  return units;
}

function splitOversizedUnit(
  text: string,
  costStart: number,
  start: number,
  end: number,
  maxTokens: number,
  count: TokenCounter,
): Unit[] {
  const pieces: Unit[] = [];
  let cursor = start;
  // the first piece pays for the whitespace before the unit
  let countFrom = costStart;

  while (cursor < end) {
    let pieceEnd = end;
    let cost = count(text.slice(countFrom, pieceEnd));
    while (cost > maxTokens && pieceEnd - cursor > 1) {
      const ratio = maxTokens / cost;
      const shrunk = cursor + Math.floor((pieceEnd - cursor) * ratio);
      pieceEnd = Math.max(cursor + 1, Math.min(shrunk, pieceEnd - 1));
      cost = count(text.slice(countFrom, pieceEnd));
    }
    pieces.push({ start: cursor, end: pieceEnd, cost });
    cursor = pieceEnd;
    countFrom = pieceEnd;
  }

  return pieces;
}

function findBreak(
  text: string,
  units: Unit[],
  start: number,
  end: number,
  maxTokens: number,
): number {
  const minTokens = Math.floor(maxTokens * MIN_BOUNDARY_RATIO);

  // candidate cut positions: cutting before unit b keeps units [start, b)
  const tokensBefore: number[] = [];
  let running = 0;
  for (let b = start; b < end; b += 1) {
    tokensBefore.push(running);
    running += units[b].cost;
  }
  tokensBefore.push(running);

  for (const kind of BREAK_PRIORITY) {
    for (let b = end; b > start; b -= 1) {
      if (tokensBefore[b - start] < minTokens) {
        break;
      }
      if (breakKindAt(text, units, b) === kind) {
        return b;
      }
    }
  }

  return end;
}

function breakKindAt(text: string, units: Unit[], b: number): BreakKind | null {
  const gap = text.slice(units[b - 1].end, units[b].start);
  if (/\n[^\S\n]*\n/.test(gap)) {
    return "paragraph";
  }
  if (gap.includes("\n")) {
    return "line";
  }
  const previous = text.slice(units[b - 1].start, units[b - 1].end);
  if (/[.!?]["')\]]?$/.test(previous)) {
    return "sentence";
  }
  return null;
}

function overlapStart(
  units: Unit[],
  start: number,
  end: number,
  overlapTokens: number,
): number {
  let next = end;
  let tokens = 0;
  while (next - 1 > start && tokens + units[next - 1].cost <= overlapTokens) {
    tokens += units[next - 1].cost;
    next -= 1;
  }
  return next;
}
