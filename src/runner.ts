import { spawn } from "node:child_process";
import { SpawnError } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

export interface RunOptions {
  cwd?: string;
}

/**
 * Everything projexts needs from the operating system's process table.
 * Swapped for a recording fake in tests.
 */
export interface ProcessRunner {
  /** Runs a command to completion with inherited stdio and resolves its exit code. */
  run(command: string, args: string[], options?: RunOptions): Promise<number>;
  /** Opens a file or folder with the platform's default handler. */
  open(target: string): Promise<void>;
}

/**
 * Platform command that hands a path to the desktop's default application.
 */
export function openCommandFor(
  target: string,
  platform: NodeJS.Platform = process.platform
): { command: string; args: string[] } {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [target] };
    case "win32":
      // Empty title argument so a quoted path is not taken as the window title
      return { command: "cmd", args: ["/c", "start", "", target] };
    default:
      return { command: "xdg-open", args: [target] };
  }
}

export class NodeProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger = silentLogger) {}

  run(command: string, args: string[], options: RunOptions = {}): Promise<number> {
    this.logger.log(`spawn: ${command} ${JSON.stringify(args)}${options.cwd ? ` in ${options.cwd}` : ""}`);

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        stdio: "inherit",
      });

      child.on("error", (err) => {
        this.logger.log(`spawn error: ${err.message}`);
        reject(new SpawnError(`Execution failed: ${err.message}`, { cause: err }));
      });

      child.on("close", (code, signal) => {
        this.logger.log(`exit: code=${code} signal=${signal}`);
        resolve(code ?? 1);
      });
    });
  }

  async open(target: string): Promise<void> {
    const { command, args } = openCommandFor(target);
    const code = await this.run(command, args);
    if (code !== 0) {
      throw new SpawnError(`Execution failed: ${command} exited with code ${code}`);
    }
  }
}
