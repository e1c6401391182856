import { promises as fs } from "node:fs";
import path from "node:path";
import {
  ChunkArtifact,
  ChunkArtifactStore,
  UploadStore,
} from "../../domain/chunkArtifacts.js";
import { chunkArtifactSchema } from "./schemas.js";
import { isFileMissing, replaceFileSafely } from "./snapshotFile.js";

export class InMemoryChunkArtifactStore implements ChunkArtifactStore {
  private readonly artifacts = new Map<string, ChunkArtifact>();

  async save(artifact: ChunkArtifact): Promise<void> {
    this.artifacts.set(artifact.sourceId, structuredClone(artifact));
  }

  async load(sourceId: string): Promise<ChunkArtifact | null> {
    const artifact = this.artifacts.get(sourceId);
    return artifact ? structuredClone(artifact) : null;
  }

  async delete(sourceId: string): Promise<void> {
    this.artifacts.delete(sourceId);
  }
}

/** One JSON file per source under `<dir>/<sourceId>.json`. */
export class FileChunkArtifactStore implements ChunkArtifactStore {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = path.resolve(dir);
  }

  async save(artifact: ChunkArtifact): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const target = this.pathFor(artifact.sourceId);
    const serialized = JSON.stringify(artifact);
    const tempPath = `${target}.tmp`;
    await fs.writeFile(tempPath, serialized, "utf-8");
    await replaceFileSafely(tempPath, target, serialized);
  }

  async load(sourceId: string): Promise<ChunkArtifact | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.pathFor(sourceId), "utf-8");
    } catch (error) {
      if (isFileMissing(error)) {
        return null;
      }
      throw error;
    }
    // an unreadable artifact only costs a re-extraction
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      if (error instanceof SyntaxError) {
        return null;
      }
      throw error;
    }
    const parsed = chunkArtifactSchema.safeParse(json);
    return parsed.success ? parsed.data : null;
  }

  async delete(sourceId: string): Promise<void> {
    await fs.rm(this.pathFor(sourceId), { force: true });
  }

  private pathFor(sourceId: string): string {
    return path.join(this.dir, `${safeFileStem(sourceId)}.json`);
  }
}

export class InMemoryUploadStore implements UploadStore {
  private readonly uploads = new Map<string, Buffer>();

  async save(sourceId: string, content: Buffer): Promise<void> {
    this.uploads.set(sourceId, Buffer.from(content));
  }

  async load(sourceId: string): Promise<Buffer | null> {
    const content = this.uploads.get(sourceId);
    return content ? Buffer.from(content) : null;
  }

  async delete(sourceId: string): Promise<void> {
    this.uploads.delete(sourceId);
  }
}

export class FileUploadStore implements UploadStore {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = path.resolve(dir);
  }

  async save(sourceId: string, content: Buffer): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(this.pathFor(sourceId), content);
  }

  async load(sourceId: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(this.pathFor(sourceId));
    } catch (error) {
      if (isFileMissing(error)) {
        return null;
      }
      throw error;
    }
  }

  async delete(sourceId: string): Promise<void> {
    await fs.rm(this.pathFor(sourceId), { force: true });
  }

  private pathFor(sourceId: string): string {
    return path.join(this.dir, `${safeFileStem(sourceId)}.bin`);
  }
}

function safeFileStem(sourceId: string): string {
  if (!/^[A-Za-z0-9_-]+$/.test(sourceId)) {
    throw new Error(`Invalid source id for file path: ${sourceId}`);
  }
  return sourceId;
}
