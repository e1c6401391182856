import { ChatMessage } from "../infra/ai/types.js";
import {
  Citation,
  ContextBlock,
  OriginKind,
  QueryMatch,
} from "../domain/types.js";
import { preview } from "../utils/text.js";

export const INSUFFICIENT_CONTEXT_ANSWER =
  "I don't have enough information to answer your question. Please make sure relevant sources have been added and processed.";

export const DEGRADED_ANSWER =
  "The answer service is temporarily unable to generate a response. The sources retrieved for your question are listed below.";

const ORIGIN_LABELS: Record<OriginKind, string> = {
  document: "Document",
  web_page: "Web Page",
  video: "Video",
};

export interface SourceDetails {
  displayName: string;
  originKind: OriginKind;
  location: string | null;
}

export interface GroundedContext {
  citations: Citation[];
  contexts: ContextBlock[];
}

/**
 * Groups matches by source. Citation numbers follow the order in which each source
 * first appears in `matches`, so the best-scoring source is [1].
 */
export function aggregateCitations(
  matches: QueryMatch[],
  details: Map<string, SourceDetails>,
): GroundedContext {
  const groups = new Map<string, { details: SourceDetails; matches: QueryMatch[] }>();

  for (const match of matches) {
    const sourceId = match.metadata.sourceId;
    let group = groups.get(sourceId);
    if (!group) {
      group = {
        details: details.get(sourceId) ?? {
          displayName: match.metadata.displayName,
          originKind: match.metadata.originKind,
          location: null,
        },
        matches: [],
      };
      groups.set(sourceId, group);
    }
    group.matches.push(match);
  }

  const citations: Citation[] = [];
  const contexts: ContextBlock[] = [];
  let number = 1;

  for (const [sourceId, group] of groups) {
    const passages = group.matches
      .map((match) => ({
        chunkId: match.chunkId,
        position: match.metadata.position,
        text: match.text,
      }))
      .sort((a, b) => a.position - b.position);
    const maxScore = Math.max(...group.matches.map((match) => match.score));

    citations.push({
      number,
      sourceId,
      originKind: group.details.originKind,
      displayName: group.details.displayName,
      location: group.details.location,
      score: Number(maxScore.toFixed(4)),
      chunkCount: passages.length,
      chunkIds: passages.map((passage) => passage.chunkId),
      positions: passages.map((passage) => passage.position),
      preview: preview(passages.map((passage) => passage.text).join(" ")),
    });
    contexts.push({
      number,
      displayName: group.details.displayName,
      originKind: group.details.originKind,
      passages,
    });
    number += 1;
  }

  return { citations, contexts };
}

export function formatContextBlock(block: ContextBlock): string {
  const header = `[${block.number}] ${ORIGIN_LABELS[block.originKind]}: ${block.displayName}`;
  return `${header}\n${block.passages.map((passage) => passage.text).join("\n...\n")}`;
}

const SYSTEM_PROMPT = [
  "You are a knowledge base assistant. You answer questions using only the numbered context sources you are given.",
  "",
  "Rules:",
  "1. Use ONLY the provided context. Do not add outside knowledge.",
  "2. Cite the sources you rely on with their bracketed numbers, e.g. [1] or [2][3].",
  "3. If the context does not contain enough information to answer, say so explicitly.",
  "4. Reason step by step before giving the answer.",
  "",
  "Respond in exactly this format:",
  "Reasoning:",
  "Step 1: <the information in the context that is relevant to the question>",
  "Step 2: <how that information relates to the question>",
  "Step 3: <the conclusion you draw>",
  "Final Answer: <the answer, with citations>",
].join("\n");

export function buildGroundedPrompt(question: string, contexts: ContextBlock[]): ChatMessage[] {
  const context = contexts.map(formatContextBlock).join("\n\n");
  return [
    { role: "system", content: SYSTEM_PROMPT },
    {
      role: "user",
      content: `Context:\n${context}\n\nQuestion: ${question}\n\nReasoning:`,
    },
  ];
}

const ANSWER_MARKERS = [
  "final answer",
  "answer",
  "the answer is",
  "in conclusion",
  "therefore",
];

export interface ParsedAnswer {
  answer: string;
  reasoning: string | null;
}

/** Splits a model reply into its reasoning trace and final answer. */
export function parseGeneratedAnswer(raw: string): ParsedAnswer {
  const text = raw.trim();

  for (const marker of ANSWER_MARKERS) {
    const pattern = new RegExp(`^[ \\t*#_]*${marker}[ \\t*_]*:[ \\t*_]*`, "gim");
    let last: RegExpExecArray | null = null;
    for (let match = pattern.exec(text); match; match = pattern.exec(text)) {
      last = match;
    }
    if (!last) {
      continue;
    }
    const answer = text.slice(last.index + last[0].length).trim();
    if (!answer) {
      continue;
    }
    const reasoning = text
      .slice(0, last.index)
      .replace(/^[ \t*#_]*reasoning[ \t*_]*:[ \t*_]*/i, "")
      .trim();
    return { answer, reasoning: reasoning || null };
  }

  return { answer: text, reasoning: null };
}

/** Bracketed citation numbers in `answer` that do not name a citation. */
export function findUnknownCitations(answer: string, citationCount: number): number[] {
  const unknown = new Set<number>();
  for (const match of answer.matchAll(/\[(\d+(?:\s*,\s*\d+)*)\]/g)) {
    for (const part of match[1].split(",")) {
      const value = Number(part.trim());
      if (value < 1 || value > citationCount) {
        unknown.add(value);
      }
    }
  }
  return [...unknown].sort((a, b) => a - b);
}
