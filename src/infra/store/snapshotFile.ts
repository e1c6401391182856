import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../../domain/errors.js";

const CURRENT_FORMAT_VERSION = 1;

const envelopeSchema = z.object({
  format_version: z.number().int(),
  saved_at: z.string(),
  snapshot: z.unknown(),
});

/**
 * Versioned JSON snapshot on disk. Writes are serialized through a promise chain
 * and land via temp file + rename so readers never see a partial file.
 */
export class SnapshotFile<T> {
  private writeChain: Promise<void> = Promise.resolve();

  readonly absolutePath: string;

  constructor(
    filePath: string,
    private readonly schema: z.ZodType<T>,
    private readonly maxBytes: number,
  ) {
    this.absolutePath = path.resolve(filePath);
  }

  async read(): Promise<T | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.absolutePath, "utf-8");
    } catch (error) {
      if (isFileMissing(error)) {
        return null;
      }
      throw error;
    }

    const envelope = envelopeSchema.safeParse(JSON.parse(raw));
    if (!envelope.success) {
      throw new ConfigurationError(`Invalid snapshot format in ${this.absolutePath}.`);
    }
    if (envelope.data.format_version !== CURRENT_FORMAT_VERSION) {
      throw new ConfigurationError(
        `Unsupported snapshot format version: ${envelope.data.format_version}. Expected ${CURRENT_FORMAT_VERSION}.`,
      );
    }
    const snapshot = this.schema.safeParse(envelope.data.snapshot);
    if (!snapshot.success) {
      throw new ConfigurationError(`Corrupt snapshot in ${this.absolutePath}.`, {
        issues: snapshot.error.issues.slice(0, 5).map((issue) => issue.message),
      });
    }
    return snapshot.data;
  }

  /** Queues a write of the snapshot produced by `capture` at the time the write runs. */
  write(capture: () => T): Promise<void> {
    const task = () => this.persistNow(capture());
    this.writeChain = this.writeChain.then(task, task);
    return this.writeChain;
  }

  async flush(): Promise<void> {
    await this.writeChain;
  }

  private async persistNow(snapshot: T): Promise<void> {
    const serialized = JSON.stringify({
      format_version: CURRENT_FORMAT_VERSION,
      saved_at: new Date().toISOString(),
      snapshot,
    });
    const bytes = Buffer.byteLength(serialized, "utf-8");
    if (bytes > this.maxBytes) {
      throw new ConfigurationError(
        `Snapshot exceeds size limit (${bytes} > ${this.maxBytes} bytes).`,
        { path: this.absolutePath },
      );
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });
    const tempPath = `${this.absolutePath}.tmp`;
    await fs.writeFile(tempPath, serialized, "utf-8");
    await replaceFileSafely(tempPath, this.absolutePath, serialized);
  }
}

export function isFileMissing(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

function errorCode(error: unknown): string | null {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

export async function replaceFileSafely(
  tempPath: string,
  targetPath: string,
  content: string,
): Promise<void> {
  try {
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  try {
    await fs.rm(targetPath, { force: true });
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  // Windows file locks
  await fs.writeFile(targetPath, content, "utf-8");
  await fs.rm(tempPath, { force: true });
}

function isReplaceableRenameError(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EPERM" || code === "EEXIST" || code === "EBUSY";
}
