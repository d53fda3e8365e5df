/**
 * Chunk Buffer
 *
 * Local temp file holding the bytes of one chunk until it is uploaded.
 */

import { randomUUID } from "crypto";
import { open, stat, unlink, type FileHandle } from "fs/promises";
import { tmpdir } from "os";
import * as path from "path";
import { IOFailure } from "../error";

/**
 * Where and how temp files are created.
 */
export interface ChunkBufferOptions {
  /** File name prefix. */
  prefix: string;
  /** Directory; defaults to the OS temp directory. */
  dir?: string;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * One temp file and its write handle.
 *
 * `close()` keeps the file so it can be uploaded; `discard()` removes it.
 * Both are idempotent.
 */
export class ChunkBuffer {
  readonly path: string;
  private handle: FileHandle | null;
  private discarded = false;

  private constructor(filePath: string, handle: FileHandle) {
    this.path = filePath;
    this.handle = handle;
  }

  /**
   * Create a new uniquely named temp file, open for writing.
   */
  static async open(options: ChunkBufferOptions): Promise<ChunkBuffer> {
    const dir = options.dir ?? tmpdir();
    const filePath = path.join(dir, `${options.prefix}${randomUUID()}.tmp`);
    try {
      const handle = await open(filePath, "wx");
      return new ChunkBuffer(filePath, handle);
    } catch (error) {
      throw new IOFailure(`Failed to create temp file ${filePath}`, "Create", {
        path: filePath,
        cause: error,
      });
    }
  }

  get isOpen(): boolean {
    return this.handle !== null;
  }

  /**
   * Append bytes to the file.
   */
  async write(bytes: Uint8Array): Promise<void> {
    if (this.handle === null) {
      throw new IOFailure(`Temp file ${this.path} is not open`, "Write", { path: this.path });
    }
    try {
      let offset = 0;
      while (offset < bytes.length) {
        const { bytesWritten } = await this.handle.write(bytes, offset, bytes.length - offset);
        offset += bytesWritten;
      }
    } catch (error) {
      throw new IOFailure(`Failed to write temp file ${this.path}`, "Write", {
        path: this.path,
        cause: error,
      });
    }
  }

  /**
   * On-disk size in bytes; 0 once the file is gone.
   */
  async size(): Promise<number> {
    try {
      const stats = this.handle !== null ? await this.handle.stat() : await stat(this.path);
      return stats.size;
    } catch (error) {
      if (isNotFound(error)) {
        return 0;
      }
      throw new IOFailure(`Failed to stat temp file ${this.path}`, "Stat", {
        path: this.path,
        cause: error,
      });
    }
  }

  /**
   * Release the write handle and keep the file.
   */
  async close(): Promise<void> {
    const handle = this.handle;
    if (handle === null) {
      return;
    }
    this.handle = null;
    try {
      await handle.close();
    } catch (error) {
      throw new IOFailure(`Failed to close temp file ${this.path}`, "Close", {
        path: this.path,
        cause: error,
      });
    }
  }

  /**
   * Release the handle (if still open) and delete the file.
   *
   * The file is deleted even when closing the handle fails; the close
   * failure is reported afterwards.
   */
  async discard(): Promise<void> {
    if (this.discarded) {
      return;
    }
    let closeFailure: unknown;
    try {
      await this.close();
    } catch (error) {
      closeFailure = error;
    }

    try {
      await unlink(this.path);
    } catch (error) {
      if (!isNotFound(error)) {
        throw new IOFailure(`Failed to delete temp file ${this.path}`, "Delete", {
          path: this.path,
          cause: error,
        });
      }
    }
    this.discarded = true;

    if (closeFailure !== undefined) {
      throw closeFailure;
    }
  }
}
