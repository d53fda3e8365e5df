/**
 * Transaction Coordinator
 *
 * Validates the output configuration, splits the chunk size budget across
 * tasks, and runs the transaction/resume handshake with the hosting
 * pipeline.
 */

import { dumpTask, loadConfig, loadTask, type PluginTask, type TaskSource } from "../config";
import { ConfigurationError } from "../error";
import { ConsoleLogger, type Logger } from "../observability/logging";
import { ChunkWriter, type TaskReport } from "../output";
import { Uploader, type UploaderOptions } from "../upload";

/**
 * Opaque completion marker returned by transaction and resume.
 */
export type ConfigDiff = Record<string, never>;

/**
 * Runs one task of the pipeline against the saved task source.
 */
export type TaskControl = (taskSource: TaskSource, taskIndex: number) => Promise<TaskReport>;

export type TransactionCoordinatorOptions = UploaderOptions;

/**
 * Per-task chunk limit: an even integer share of the global limit.
 */
export function splitChunkLimit(totalLimit: number, taskCount: number): number {
  return Math.floor(totalLimit / taskCount);
}

export class TransactionCoordinator {
  private options: TransactionCoordinatorOptions;
  private logger: Logger;

  constructor(options: TransactionCoordinatorOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? new ConsoleLogger();
  }

  /**
   * Validate configuration and start a run of `taskCount` tasks.
   *
   * @throws ConfigurationError before any task runs
   */
  async transaction(config: unknown, taskCount: number, control: TaskControl): Promise<ConfigDiff> {
    const taskSource = this.prepare(config, taskCount);
    return this.resume(taskSource, taskCount, control);
  }

  /**
   * Load and validate the configuration, returning the task source shared
   * by every task.
   */
  prepare(config: unknown, taskCount: number): TaskSource {
    if (!Number.isInteger(taskCount) || taskCount < 1) {
      throw new ConfigurationError(`Task count must be a positive integer, got ${taskCount}`);
    }
    const task = loadConfig(config);

    const configured: PluginTask = {
      ...task,
      fileBufferChunkLimit: splitChunkLimit(task.totalFileBufferChunkLimit, taskCount),
    };
    this.logger.debug("Output transaction prepared", {
      bucket: configured.bucket,
      pathPrefix: configured.pathPrefix,
      taskCount,
      fileBufferChunkLimit: configured.fileBufferChunkLimit,
    });
    return dumpTask(configured);
  }

  /**
   * Run every task index against the saved task source.
   *
   * Re-invocable after a partial failure: each task derives the same keys
   * from the same task source, so re-uploads overwrite earlier attempts.
   * All tasks are awaited; the failure of the lowest task index is thrown.
   */
  async resume(taskSource: TaskSource, taskCount: number, control: TaskControl): Promise<ConfigDiff> {
    if (!Number.isInteger(taskCount) || taskCount < 1) {
      throw new ConfigurationError(`Task count must be a positive integer, got ${taskCount}`);
    }
    loadTask(taskSource);

    const indexes = Array.from({ length: taskCount }, (_, taskIndex) => taskIndex);
    const results = await Promise.allSettled(indexes.map(async (taskIndex) => control(taskSource, taskIndex)));

    const reports: TaskReport[] = [];
    const failures: unknown[] = [];
    for (let taskIndex = 0; taskIndex < results.length; taskIndex++) {
      const result = results[taskIndex];
      if (result.status === "fulfilled") {
        reports.push(result.value);
        continue;
      }
      this.logger.error("Output task failed", {
        taskIndex,
        error: result.reason instanceof Error ? result.reason.message : String(result.reason),
      });
      failures.push(result.reason);
    }

    if (failures.length > 0) {
      throw failures[0];
    }

    this.cleanup(taskSource, taskCount, reports);
    return {};
  }

  /**
   * Post-commit hook. Tasks share no state, so there is nothing to clean.
   */
  cleanup(_taskSource: TaskSource, _taskCount: number, _successTaskReports: TaskReport[]): void {
    // No-op
  }

  /**
   * Create the output for one task.
   */
  async open(taskSource: TaskSource, taskIndex: number): Promise<ChunkWriter> {
    const task = loadTask(taskSource);
    const uploader = await Uploader.create(task, this.options);
    return new ChunkWriter({ taskIndex, task, uploader, logger: this.logger });
  }
}
