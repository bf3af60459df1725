import type { IFlushManager, IFlushTask } from "../../domain/ports/IFlushManager";
import type { ILogger } from "../../domain/ports/ILogger";
import type { IMemoryPressureChecker } from "../../domain/ports/IMemoryPressureChecker";

/**
 * Runs registered write-behind tasks every `persistThresholdMs`, or earlier
 * once `maxPendingFlushes` commits piled up or the process is under memory
 * pressure. Whatever was committed since the last run is lost on a crash.
 */
export class FlushManager implements IFlushManager {
  static DEFAULT_PERSIST_THRESHOLD_MS = 1000;
  static DEFAULT_MAX_PENDING_FLUSHES = 100;

  private pendingCounter = 0;
  private timer?: NodeJS.Timeout;
  private running: Promise<void> = Promise.resolve();

  constructor(
    private memoryChecker: IMemoryPressureChecker,
    private taskRegistry = new Set<IFlushTask>(),
    private persistThresholdMs = FlushManager.DEFAULT_PERSIST_THRESHOLD_MS,
    private maxPendingFlushes = FlushManager.DEFAULT_MAX_PENDING_FLUSHES,
    private logger?: ILogger
  ) {
    this.init();
  }

  private init() {
    if (this.persistThresholdMs === Infinity) return;
    this.timer = setInterval(
      this.flushInBackground,
      Math.max(this.persistThresholdMs, 100)
    );
    this.timer.unref();
  }

  register(task: IFlushTask) {
    this.taskRegistry.add(task);
  }

  commit() {
    if (
      ++this.pendingCounter >= this.maxPendingFlushes ||
      this.memoryChecker.isPressured()
    ) {
      this.flushInBackground();
    }
  }

  flush(): Promise<void> {
    // runs are chained so two flushes never write the same batch twice
    this.running = this.running.then(this.runTasks, this.runTasks);
    return this.running;
  }

  async close() {
    clearInterval(this.timer);
    this.timer = undefined;
    this.pendingCounter = 1;
    await this.flush();
  }

  private flushInBackground = () => {
    if (!this.pendingCounter) return;
    this.flush().catch((error: unknown) => {
      this.logger?.log("Failed to flush counters", { error }, "error");
    });
  };

  private runTasks = async () => {
    const pending = this.pendingCounter;
    if (!pending) return;
    this.pendingCounter = 0;
    const tasks = Array.from(this.taskRegistry);
    try {
      await Promise.all(tasks.map((task) => task()));
    } catch (error) {
      // the next tick retries
      this.pendingCounter += pending;
      throw error;
    }
  };
}
