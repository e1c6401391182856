import { z } from "zod";
import { ValidationError } from "../domain/errors.js";
import { AnswerResult, Citation, ORIGIN_KINDS, Source } from "../domain/types.js";
import {
  QueryInput,
  SubmitSourceInput,
  queryInputSchema,
  submitSourceSchema,
} from "../services/knowledgeBaseService.js";

// Wire shapes shared by the MCP tools and the REST API. Field names are snake_case on the wire.

export const submitSourceFields = {
  origin_kind: z.enum(ORIGIN_KINDS).describe("document, web_page or video"),
  url: z.string().optional().describe("Page or video URL (web_page, video)"),
  path: z.string().optional().describe("Local file path (document)"),
  filename: z.string().optional().describe("File name of an uploaded document"),
  content_base64: z.string().optional().describe("Base64 file content of an uploaded document"),
};

export const queryFields = {
  question: z.string().describe("Question for the knowledge base"),
  top_k: z.number().int().optional().describe("Number of chunks to retrieve"),
  source_ids: z.array(z.string()).optional().describe("Limit retrieval to these sources"),
};

const submitRequestSchema = z.object(submitSourceFields);
const queryRequestSchema = z.object(queryFields);

export function parseSubmitRequest(body: unknown): SubmitSourceInput {
  const request = parseOrThrow(submitRequestSchema, body);
  const input = {
    originKind: request.origin_kind,
    url: request.url,
    path: request.path,
    filename: request.filename,
    contentBase64: request.content_base64,
  };
  return parseOrThrow(submitSourceSchema, stripUndefined(input));
}

export function parseQueryRequest(body: unknown): QueryInput {
  const request = parseOrThrow(queryRequestSchema, body);
  return parseOrThrow(queryInputSchema, {
    question: request.question,
    topK: request.top_k,
    sourceIds: request.source_ids,
  });
}

export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error);
  }
  return parsed.data;
}

function stripUndefined(value: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== undefined) {
      result[key] = entry;
    }
  }
  return result;
}

export function toSourceView(source: Source) {
  return {
    source_id: source.sourceId,
    origin_kind: source.originKind,
    display_name: source.displayName,
    location: source.location,
    status: source.status,
    error: source.error,
    chunk_count: source.chunkCount,
    content_hash: source.contentHash,
    attributes: source.attributes,
    created_at: source.createdAt,
    updated_at: source.updatedAt,
    completed_at: source.completedAt,
  };
}

function toCitationView(citation: Citation) {
  return {
    number: citation.number,
    source_id: citation.sourceId,
    origin_kind: citation.originKind,
    display_name: citation.displayName,
    location: citation.location,
    score: citation.score,
    chunk_count: citation.chunkCount,
    chunk_ids: citation.chunkIds,
    positions: citation.positions,
    preview: citation.preview,
  };
}

export function toAnswerView(result: AnswerResult) {
  return {
    answer: result.answer,
    reasoning: result.reasoning,
    status: result.status,
    citations: result.citations.map(toCitationView),
    unknown_citations: result.unknownCitations,
    latency_ms: result.latencyMs,
  };
}
