/**
 * Chunk Writer
 *
 * Per-task file output: stages incoming buffers in a temp file, rotates to a
 * new chunk on request or when the per-task size limit is exceeded, and
 * uploads every closed chunk under a deterministic key.
 */

import { ChunkBuffer } from "../buffer";
import type { PluginTask } from "../config";
import { InvalidStateError } from "../error";
import { KeyNamer } from "../format";
import { ConsoleLogger, logSuppressed, type Logger } from "../observability/logging";
import type { Uploader } from "../upload";

/**
 * Completion marker returned per task on commit.
 */
export type TaskReport = Record<string, never>;

/**
 * Buffer borrowed from a pool; released once the writer is done with it.
 */
export interface PooledBuffer {
  readonly bytes: Uint8Array;
  release(): void;
}

export type WriterState = "no-chunk" | "chunk-open" | "closed";

/**
 * What a ChunkWriter needs to know about its task.
 */
export interface ChunkWriterOptions {
  taskIndex: number;
  task: Pick<
    PluginTask,
    "pathPrefix" | "sequenceFormat" | "fileExt" | "tmpPathPrefix" | "tmpDir" | "fileBufferChunkLimit"
  >;
  uploader: Pick<Uploader, "upload" | "bucket">;
  logger?: Logger;
}

function isPooled(buffer: Uint8Array | PooledBuffer): buffer is PooledBuffer {
  return !(buffer instanceof Uint8Array);
}

export class ChunkWriter {
  readonly taskIndex: number;
  private readonly keys: KeyNamer;
  private readonly uploader: Pick<Uploader, "upload" | "bucket">;
  private readonly logger: Logger;
  private readonly tmpPathPrefix: string;
  private readonly tmpDir?: string;
  private readonly chunkLimit: number;

  private _fileIndex = 0;
  private current: ChunkBuffer | null = null;
  private closed = false;

  constructor(options: ChunkWriterOptions) {
    this.taskIndex = options.taskIndex;
    this.keys = new KeyNamer(
      options.task.pathPrefix,
      options.task.sequenceFormat,
      options.task.fileExt
    );
    this.uploader = options.uploader;
    this.logger = options.logger ?? new ConsoleLogger();
    this.tmpPathPrefix = options.task.tmpPathPrefix;
    this.tmpDir = options.task.tmpDir;
    this.chunkLimit = options.task.fileBufferChunkLimit;
  }

  /**
   * Number of chunks uploaded so far; also the index of the next chunk.
   */
  get fileIndex(): number {
    return this._fileIndex;
  }

  get state(): WriterState {
    if (this.closed) {
      return "closed";
    }
    return this.current !== null ? "chunk-open" : "no-chunk";
  }

  /**
   * Local path of the open chunk, if any.
   */
  get currentPath(): string | undefined {
    return this.current?.path;
  }

  /**
   * Byte size of the open chunk; 0 when none is open.
   */
  async currentSize(): Promise<number> {
    return this.current !== null ? this.current.size() : 0;
  }

  /**
   * Close and upload the current chunk, if any, and open a new one.
   */
  async nextFile(): Promise<void> {
    if (this.closed) {
      throw new InvalidStateError("nextFile() called after the output was closed");
    }
    await this.closeCurrent();

    this.current = await ChunkBuffer.open({ prefix: this.tmpPathPrefix, dir: this.tmpDir });
    this.logger.debug("Opened chunk", {
      taskIndex: this.taskIndex,
      fileIndex: this._fileIndex,
      path: this.current.path,
    });
  }

  /**
   * Append a buffer to the current chunk. Pooled buffers are released
   * whether or not the write succeeds.
   */
  async add(buffer: Uint8Array | PooledBuffer): Promise<void> {
    try {
      const chunk = this.current;
      if (chunk === null) {
        throw new InvalidStateError("nextFile() must be called before add()");
      }
      await chunk.write(isPooled(buffer) ? buffer.bytes : buffer);

      if (this.chunkLimit > 0) {
        const size = await chunk.size();
        if (size > this.chunkLimit) {
          this.logger.debug("Chunk limit exceeded, rotating", {
            taskIndex: this.taskIndex,
            size,
            limit: this.chunkLimit,
          });
          await this.nextFile();
        }
      }
    } finally {
      if (isPooled(buffer)) {
        buffer.release();
      }
    }
  }

  /**
   * Upload the last chunk, even if it is under the limit, and close.
   */
  async finish(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.closeCurrent();
  }

  /**
   * Same as finish(); safe to call again after finish() or abort().
   */
  async close(): Promise<void> {
    await this.finish();
  }

  /**
   * Drop the pending chunk without uploading it.
   */
  async abort(): Promise<void> {
    this.closed = true;
    const chunk = this.current;
    this.current = null;
    if (chunk !== null) {
      this.logger.info("Aborting output; discarding pending chunk", {
        taskIndex: this.taskIndex,
        fileIndex: this._fileIndex,
        path: chunk.path,
      });
      await chunk.discard();
    }
  }

  commit(): TaskReport {
    return {};
  }

  /**
   * Upload the open chunk under (taskIndex, fileIndex), then delete it.
   *
   * The temp file is deleted whatever the upload outcome. fileIndex only
   * advances on success. An upload error wins over a delete error.
   */
  private async closeCurrent(): Promise<void> {
    const chunk = this.current;
    if (chunk === null) {
      return;
    }
    this.current = null;

    let failed = false;
    let failure: unknown;
    try {
      await chunk.close();
      const key = this.keys.buildKey(this.taskIndex, this._fileIndex);
      this.logger.info(`Uploading S3 file 's3://${this.uploader.bucket}/${key}'`, {
        taskIndex: this.taskIndex,
        fileIndex: this._fileIndex,
      });
      const result = await this.uploader.upload(chunk.path, key);
      this.logger.info("Uploaded S3 file", { key, bytes: result.bytes });
      this._fileIndex++;
    } catch (error) {
      failed = true;
      failure = error;
    }

    try {
      await chunk.discard();
    } catch (error) {
      if (!failed) {
        throw error;
      }
      logSuppressed(this.logger, "discard temp file", error);
    }

    if (failed) {
      throw failure;
    }
  }
}

/**
 * Drive one task the way the hosting pipeline does: run the body, finish
 * and commit on success, abort on failure, and always close.
 */
export async function runOutputTask(
  output: ChunkWriter,
  body: (output: ChunkWriter) => Promise<void>,
  logger: Logger = new ConsoleLogger()
): Promise<TaskReport> {
  let report: TaskReport;
  try {
    await body(output);
    await output.finish();
    report = output.commit();
  } catch (error) {
    try {
      await output.abort();
    } catch (abortError) {
      logSuppressed(logger, "abort output", abortError);
    }
    try {
      await output.close();
    } catch (closeError) {
      logSuppressed(logger, "close output", closeError);
    }
    throw error;
  }
  await output.close();
  return report;
}
