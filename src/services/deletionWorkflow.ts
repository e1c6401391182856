import { ChunkArtifactStore, UploadStore } from "../domain/chunkArtifacts.js";
import { SourceStore } from "../domain/sourceStore.js";
import { VectorIndex } from "../domain/vectorIndex.js";
import { Logger, getLogger } from "../infra/log/logger.js";

export type DeletionResult =
  | { status: "deleted"; sourceId: string; vectorsRemoved: number }
  | { status: "not_found"; sourceId: string };

export interface DeletionWorkflowDeps {
  sourceStore: SourceStore;
  vectorIndex: VectorIndex;
  artifacts: ChunkArtifactStore;
  uploads: UploadStore;
}

export class DeletionWorkflow {
  private readonly log: Logger;

  constructor(
    private readonly deps: DeletionWorkflowDeps,
    logger: Logger = getLogger({ module: "deletion" }),
  ) {
    this.log = logger;
  }

  /**
   * Vectors go first so a partial failure leaves a record without vectors, never
   * vectors without a record. A run still in flight notices the missing record and
   * rolls its own writes back; the trailing sweep covers a run that finished in between.
   */
  async delete(sourceId: string): Promise<DeletionResult> {
    const source = await this.deps.sourceStore.get(sourceId);
    if (!source) {
      return { status: "not_found", sourceId };
    }

    let vectorsRemoved = await this.deps.vectorIndex.deleteBySource(sourceId);
    await this.deps.artifacts.delete(sourceId);
    await this.deps.uploads.delete(sourceId);
    const removed = await this.deps.sourceStore.delete(sourceId);
    vectorsRemoved += await this.deps.vectorIndex.deleteBySource(sourceId);

    if (!removed) {
      // a concurrent delete got there first
      return { status: "not_found", sourceId };
    }
    this.log.info({ sourceId, vectorsRemoved }, "source deleted");
    return { status: "deleted", sourceId, vectorsRemoved };
  }
}
