import type { IMemoryPressureChecker } from "../../domain/ports/IMemoryPressureChecker";

const MB = 1024 * 1024;

/** Resident set size above the threshold forces an early counter flush. */
export class MemoryPressureChecker implements IMemoryPressureChecker {
  static DEFAULT_THRESHOLD_MB = 1024;

  constructor(
    private thresholdMB = MemoryPressureChecker.DEFAULT_THRESHOLD_MB,
    private readRss: () => number = () => process.memoryUsage.rss()
  ) {}

  isPressured(): boolean {
    return this.readRss() > this.thresholdMB * MB;
  }
}
