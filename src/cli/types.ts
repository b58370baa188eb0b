import type { ShortcutStore } from "../shortcuts.js";
import type { ProcessRunner } from "../runner.js";
import type { Logger } from "../logger.js";
import type { Shortcut } from "../types.js";

export type Flags = Record<string, string | boolean>;

export interface ParsedArgs {
  command: string | null;
  positional: string[];
  /** Everything after a bare "--", untouched */
  rest: string[];
  flags: Flags;
}

export interface OutputFormatter {
  success(message: string, data?: Record<string, unknown>): void;
  notice(message: string): void;
  error(message: string): void;
  table(shortcuts: Shortcut[]): void;
  json(data: unknown): void;
}

export interface ShortcutRow {
  name: string;
  command: string;
  dir?: string;
}

export interface CommandContext {
  store: ShortcutStore;
  runner: ProcessRunner;
  logger: Logger;
  fmt: OutputFormatter;
  cwd: string;
}

export interface CommandInput {
  args: string[];
  rest: string[];
  flags: Flags;
}

/** Resolves to the process exit code. */
export type CommandHandler = (input: CommandInput, ctx: CommandContext) => Promise<number>;
