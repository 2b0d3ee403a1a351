// src/polling-manager.ts

import Logger, { rootLogger } from './logger.js';
import type {
  LoggerInstance,
  PollingManagerConfig,
  PollingSystemStats,
  PollingTaskOptions,
  PollingTaskStats,
} from './types/nbe-types.js';
import {
  PollingManagerError,
  PollingTaskAlreadyExistsError,
  PollingTaskNotFoundError,
  PollingTaskValidationError,
} from './errors.js';

/**
 * Runs one task: call `fn`, wait `interval`, repeat. The next run is
 * scheduled only after the current one settled, so a task never overlaps
 * itself. A failed run is counted and logged; the next cycle tries again.
 */
class TaskController<T = unknown> {
  public readonly id: string;
  public readonly name: string | null;
  public readonly interval: number;
  public readonly taskTimeout: number;

  public stopped: boolean = true;
  public executionInProgress: boolean = false;

  public stats: PollingTaskStats;
  public logger: LoggerInstance;

  private readonly fn: () => Promise<T>;
  private timerId: NodeJS.Timeout | null = null;

  constructor(options: PollingTaskOptions<T>, loggerInstance: Logger) {
    this.id = options.id;
    this.name = options.name ?? null;
    this.interval = options.interval;
    this.taskTimeout = options.taskTimeout ?? 5000;
    this.fn = options.fn;

    this.stats = {
      totalRuns: 0,
      successes: 0,
      failures: 0,
      lastError: null,
      lastRunTime: null,
    };

    this.logger = loggerInstance.createLogger(`Task:${this.id}`);
    this.logger.debug('TaskController created', {
      id: this.id,
      interval: this.interval,
      taskTimeout: this.taskTimeout,
    });
  }

  start(): void {
    if (!this.stopped) {
      this.logger.debug('Task already running');
      return;
    }
    this.stopped = false;
    this.logger.debug('Task started', { id: this.id });
    // a run still in flight schedules the next one when it settles
    if (!this.executionInProgress) {
      this._scheduleNextRun(true);
    }
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    if (this.timerId) {
      clearTimeout(this.timerId);
      this.timerId = null;
    }
    this.logger.debug('Task stopped', { id: this.id });
  }

  private _scheduleNextRun(immediate: boolean = false): void {
    if (this.stopped) return;
    if (this.timerId) clearTimeout(this.timerId);

    this.timerId = setTimeout(
      () => {
        this.timerId = null;
        if (this.stopped) return;
        this.execute().catch((err: unknown) => {
          this.logger.error('Task execution crashed', err, { id: this.id });
        });
      },
      immediate ? 0 : this.interval
    );
  }

  async execute(): Promise<void> {
    if (this.stopped || this.executionInProgress) return;

    this.executionInProgress = true;
    this.stats.totalRuns++;
    try {
      await this._withTimeout(this.fn(), this.taskTimeout);
      this.stats.successes++;
      this.stats.lastError = null;
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new PollingManagerError(String(err));
      this.stats.failures++;
      this.stats.lastError = error;
      this.logger.warn(`Poll failed: ${error.message}`, { id: this.id });
    } finally {
      this.stats.lastRunTime = Date.now();
      this.executionInProgress = false;
      this._scheduleNextRun();
    }
  }

  public isRunning(): boolean {
    return !this.stopped;
  }

  public getStats(): PollingTaskStats {
    return { ...this.stats };
  }

  private _withTimeout<R>(promise: Promise<R>, timeout: number): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      const timer = setTimeout(
        () => reject(new PollingManagerError(`Task ${this.id} timed out after ${timeout}ms`)),
        timeout
      );
      promise
        .then(value => {
          clearTimeout(timer);
          resolve(value);
        })
        .catch((err: unknown) => {
          clearTimeout(timer);
          reject(err);
        });
    });
  }
}

/**
 * Owns a set of independent polling tasks. Tasks run concurrently, each on
 * its own timer chain.
 */
class PollingManager {
  private readonly defaultTaskTimeout: number;
  private tasks: Map<string, TaskController> = new Map();

  public loggerInstance: Logger;
  public logger: LoggerInstance;

  constructor(config: PollingManagerConfig = {}, loggerInstance: Logger = rootLogger) {
    this.defaultTaskTimeout = config.defaultTaskTimeout ?? 5000;
    this.loggerInstance = loggerInstance;
    this.logger = this.loggerInstance.createLogger('PollingManager');
  }

  private _validateTaskOptions<T>(options: PollingTaskOptions<T>): void {
    if (!options.id) throw new PollingTaskValidationError('Task must have an "id"');
    if (!Number.isFinite(options.interval) || options.interval <= 0)
      throw new PollingTaskValidationError('Interval must be a positive number');
    if (options.taskTimeout !== undefined && !(options.taskTimeout > 0))
      throw new PollingTaskValidationError('Task timeout must be a positive number');
  }

  /**
   * Registers a task and starts it; the first run happens on the next tick.
   */
  public addTask<T>(options: PollingTaskOptions<T>): void {
    this._validateTaskOptions(options);
    if (this.tasks.has(options.id)) throw new PollingTaskAlreadyExistsError(options.id);

    const task = new TaskController<T>(
      { ...options, taskTimeout: options.taskTimeout ?? this.defaultTaskTimeout },
      this.loggerInstance
    );
    this.tasks.set(options.id, task);
    task.start();
    this.logger.debug('Task added', { id: options.id });
  }

  private _getTask(id: string): TaskController {
    const task = this.tasks.get(id);
    if (!task) throw new PollingTaskNotFoundError(id);
    return task;
  }

  public startTask(id: string): void {
    this._getTask(id).start();
  }

  public stopTask(id: string): void {
    this._getTask(id).stop();
  }

  public hasTask(id: string): boolean {
    return this.tasks.has(id);
  }

  public getSystemStats(): PollingSystemStats {
    const tasks: Record<string, PollingTaskStats> = {};
    let runningTasks = 0;
    for (const [id, task] of this.tasks.entries()) {
      tasks[id] = task.getStats();
      if (task.isRunning()) runningTasks++;
    }
    return { totalTasks: this.tasks.size, runningTasks, tasks };
  }
}

export { TaskController };
export default PollingManager;
