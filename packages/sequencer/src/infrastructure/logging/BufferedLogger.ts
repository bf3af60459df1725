import { clearImmediate, setImmediate } from "node:timers";
import type { ILogDriver } from "../../domain/ports/ILogDriver";
import type { ILogger } from "../../domain/ports/ILogger";

export class BufferedLogger implements ILogger {
  private flushId?: NodeJS.Immediate;
  private buffer: Array<[string, object, keyof ILogDriver]> = [];

  constructor(
    private driver: ILogDriver,
    private chunkSize = 50,
    private label?: string
  ) {}

  log(msg: string, extra?: object, level: keyof ILogDriver = "info") {
    this.buffer.push([msg, extra ?? {}, level]);
    this.scheduleFlush();
  }

  private scheduleFlush() {
    this.flushId ??= setImmediate(this.flushChunk);
  }

  /** Writes everything buffered so far. */
  flush = () => {
    clearImmediate(this.flushId);
    this.flushId = undefined;
    while (this.buffer.length > 0) this.write(this.buffer.length);
  };

  private flushChunk = () => {
    this.flushId = undefined;
    this.write(this.chunkSize);

    if (this.buffer.length > 0) {
      this.scheduleFlush();
    }
  };

  private write(count: number) {
    const ts = Date.now();
    const { label } = this;

    for (const [message, extra, level] of this.buffer.splice(0, count)) {
      this.driver[level]?.(message, { ...extra, label, ts });
    }
  }

  destroy() {
    clearImmediate(this.flushId);
    this.flushId = undefined;
    this.buffer = [];
  }
}
