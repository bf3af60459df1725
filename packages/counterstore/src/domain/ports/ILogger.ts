export interface ILogger {
  log(msg: string, extra?: object, level?: "info" | "warn" | "error" | "debug"): void;
}
