import { z } from "zod";
import {
  ConfigurationError,
  ProviderError,
  QueryCancelledError,
  TransientProviderError,
} from "../../domain/errors.js";

export interface ProviderRequest {
  provider: string;
  operation: string;
  url: string;
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Calls a provider endpoint and validates the JSON reply. Rate limits, server
 * errors, timeouts and network failures surface as TransientProviderError.
 */
export async function requestJson<T>(request: ProviderRequest, schema: z.ZodType<T>): Promise<T> {
  const label = `${request.provider} ${request.operation}`;
  const timeout = AbortSignal.timeout(request.timeoutMs);
  const signal = request.signal ? AbortSignal.any([request.signal, timeout]) : timeout;

  let response: Response;
  try {
    response = await fetch(request.url, {
      method: request.method ?? "POST",
      headers: {
        "Content-Type": "application/json",
        ...request.headers,
      },
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal,
    });
  } catch (error) {
    if (request.signal?.aborted) {
      throw new QueryCancelledError(`${label} was cancelled.`);
    }
    if (timeout.aborted) {
      throw new TransientProviderError(`${label} timed out after ${request.timeoutMs}ms.`);
    }
    throw new TransientProviderError(
      `${label} failed: ${error instanceof Error ? error.message : "network error"}`,
    );
  }

  if (!response.ok) {
    const detail = (await response.text()).slice(0, 500);
    const message = `${label} failed (${response.status}): ${detail}`;
    if (response.status === 408 || response.status === 429 || response.status >= 500) {
      throw new TransientProviderError(message, { status: response.status });
    }
    if (response.status === 401 || response.status === 403) {
      throw new ConfigurationError(message, { status: response.status });
    }
    throw new ProviderError(message, { status: response.status });
  }

  const parsed = schema.safeParse(await response.json());
  if (!parsed.success) {
    throw new ProviderError(`${label} returned an unexpected payload.`, {
      issues: parsed.error.issues.slice(0, 5).map((issue) => issue.message),
    });
  }
  return parsed.data;
}
