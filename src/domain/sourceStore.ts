import { SourceNotFoundError, StateError } from "./errors.js";
import { Source, SourceStatus, isTerminalStatus } from "./types.js";

export type SourcePatch = Partial<
  Pick<
    Source,
    | "displayName"
    | "contentHash"
    | "chunkCount"
    | "attributes"
    | "completedAt"
    | "error"
  >
>;

export interface SourceStore {
  /** Creates or fully replaces a record. */
  put(source: Source): Promise<void>;
  get(sourceId: string): Promise<Source | null>;
  /** Ordered by createdAt, then sourceId. */
  list(): Promise<Source[]>;
  updateStatus(
    sourceId: string,
    status: SourceStatus,
    patch?: SourcePatch,
  ): Promise<Source>;
  delete(sourceId: string): Promise<boolean>;
  ping(): Promise<void>;
}

const FORWARD_TRANSITIONS: Record<SourceStatus, readonly SourceStatus[]> = {
  pending: ["extracting"],
  // extracting -> completed is the unchanged-content path.
  extracting: ["chunking", "completed"],
  chunking: ["embedding"],
  embedding: ["completed"],
  completed: [],
  failed: [],
};

export function canTransition(from: SourceStatus, to: SourceStatus): boolean {
  if (to === "failed") {
    return !isTerminalStatus(from);
  }
  return FORWARD_TRANSITIONS[from].includes(to);
}

/**
 * Builds the replacement record for a status update. Shared by every store so the
 * transition rules and the error/status pairing stay identical across backends.
 */
export function applyStatusUpdate(
  current: Source | null,
  sourceId: string,
  status: SourceStatus,
  patch: SourcePatch = {},
  now: Date = new Date(),
): Source {
  if (!current) {
    throw new SourceNotFoundError(sourceId);
  }
  if (!canTransition(current.status, status)) {
    throw new StateError(
      `Illegal status transition ${current.status} -> ${status} for ${sourceId}.`,
      { sourceId, from: current.status, to: status },
    );
  }
  if (status === "failed" && !patch.error) {
    throw new StateError(`Failing ${sourceId} requires an error message.`, {
      sourceId,
    });
  }

  return {
    ...current,
    ...patch,
    status,
    error: status === "failed" ? (patch.error ?? null) : null,
    updatedAt: now.toISOString(),
  };
}

export function compareSources(a: Source, b: Source): number {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? -1 : 1;
  }
  return a.sourceId < b.sourceId ? -1 : a.sourceId > b.sourceId ? 1 : 0;
}
