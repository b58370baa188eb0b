import { appendFileSync, mkdirSync, existsSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

export interface Logger {
  log(message: string): void;
}

/**
 * Debug log written to a file so it never interleaves with the output
 * of spawned commands. Disabled loggers are no-ops.
 */
export class FileLogger implements Logger {
  private readonly startTime = Date.now();

  constructor(
    private readonly logFile: string,
    private readonly enabled: boolean
  ) {
    if (!enabled) return;

    ensureDir(dirname(logFile));
    // Start fresh log file for each debug session
    writeFileSync(logFile, `=== Debug log started at ${new Date().toISOString()} ===\n`);
  }

  log(message: string): void {
    if (!this.enabled) return;

    const elapsed = Date.now() - this.startTime;
    const line = `[+${elapsed.toString().padStart(6)}ms] ${message}\n`;
    appendFileSync(this.logFile, line);
  }
}

export const silentLogger: Logger = {
  log() {},
};

function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}
