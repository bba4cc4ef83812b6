import { appendFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { format } from "util";

export interface Logger {
  debug(log: string, ...args: unknown[]): void;
  info(log: string, ...args: unknown[]): void;
  warn(log: string, ...args: unknown[]): void;
  error(log: string, ...args: unknown[]): void;
}

// The terminal is in raw mode while the viewer runs, so nothing may be
// written to stdout/stderr. Debug output goes to a file instead.
class FileLogger implements Logger {
  constructor(private readonly path: string) {}

  debug(log: string, ...args: unknown[]) {
    this.write("DEBUG", log, args);
  }
  info(log: string, ...args: unknown[]) {
    this.write("INFO", log, args);
  }
  warn(log: string, ...args: unknown[]) {
    this.write("WARN", log, args);
  }
  error(log: string, ...args: unknown[]) {
    this.write("ERROR", log, args);
  }

  private write(level: string, log: string, args: unknown[]) {
    const line = format(log, ...args);
    appendFileSync(this.path, `${new Date().toISOString()} ${level} ${line}\n`);
  }
}

class NullLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export const logger: Logger =
  process.env.DEBUG === "true"
    ? new FileLogger(
        process.env.JJ_FOLD_LOG_FILE ?? join(tmpdir(), "jj-fold.log"),
      )
    : new NullLogger();
