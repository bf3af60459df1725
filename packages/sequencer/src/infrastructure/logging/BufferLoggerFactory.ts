import type { ILogDriver } from "../../domain/ports/ILogDriver";
import type { ILogger } from "../../domain/ports/ILogger";
import type { ILoggerFactory } from "../../domain/ports/ILoggerFactory";
import { BufferedLogger } from "./BufferedLogger";

/** Hands out labelled loggers and remembers them so they can be flushed together. */
export class BufferLoggerFactory implements ILoggerFactory {
  private loggers = new Map<string, ILogger>();

  constructor(
    private driver: ILogDriver = console,
    private chunkSize = 50
  ) {}

  create(label = "global"): ILogger {
    let logger = this.loggers.get(label);
    if (!logger) {
      logger = new BufferedLogger(this.driver, this.chunkSize, label);
      this.loggers.set(label, logger);
    }
    return logger;
  }

  flushAll() {
    this.loggers.forEach((logger) => logger.flush());
  }

  destroyAll() {
    this.loggers.forEach((logger) => logger.destroy());
    this.loggers.clear();
  }
}
