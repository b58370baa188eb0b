import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { Shortcut, ShortcutInput, ShortcutsData, ValidationResult } from "./types.js";
import { AlreadyExistsError, NotFoundError, StoreIOError, UsageError } from "./errors.js";

const shortcutSchema = z.object({
  name: z.string(),
  command: z.string(),
  args: z.array(z.string()).default([]),
  dir: z.string().optional(),
});

const shortcutsDataSchema = z.object({
  shortcuts: z.array(shortcutSchema),
});

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validates a shortcut name.
 */
export function validateName(name: string): ValidationResult {
  if (!name || name.trim() === "") {
    return { valid: false, error: "Name cannot be empty" };
  }

  if (/\s/.test(name)) {
    return { valid: false, error: "Name cannot contain spaces" };
  }

  if (name.startsWith("-")) {
    return { valid: false, error: "Name cannot start with '-'" };
  }

  return { valid: true };
}

/**
 * Validates a command string.
 */
export function validateCommand(command: string): ValidationResult {
  if (!command || command.trim() === "") {
    return { valid: false, error: "Command cannot be empty" };
  }

  return { valid: true };
}

/**
 * Builds a shortcut input from the words before and after "--". A lone
 * word before "--" with nothing after it is split on whitespace
 * ("npm run dev" -> npm [run, dev]); everything else is kept verbatim.
 */
export function toShortcutInput(positional: string[], rest: string[] = [], dir?: string): ShortcutInput {
  const [first = "", ...others] = positional;
  const splitLone = others.length === 0 && rest.length === 0;
  const parts = splitLone ? first.trim().split(/\s+/) : [...positional, ...rest];
  const [command = "", ...args] = parts;

  return dir === undefined ? { command, args } : { command, args, dir };
}

/**
 * Renders a shortcut's command line for display.
 */
export function formatCommandLine(shortcut: Pick<Shortcut, "command" | "args">): string {
  return [shortcut.command, ...shortcut.args].join(" ");
}

function assertValid(result: ValidationResult): void {
  if (!result.valid) {
    throw new UsageError(result.error ?? "Invalid shortcut");
  }
}

// ============================================================================
// Store
// ============================================================================

/**
 * Name -> shortcut mapping persisted as a single JSON file. Every operation
 * reads the file afresh; mutations rewrite it whole.
 */
export class ShortcutStore {
  constructor(readonly filePath: string) {}

  /**
   * Reads the file into an ordered map. A missing file is an empty store.
   */
  load(): Map<string, Shortcut> {
    const shortcuts = new Map<string, Shortcut>();
    if (!existsSync(this.filePath)) {
      return shortcuts;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, "utf-8"));
    } catch (err) {
      throw new StoreIOError(`Failed to read ${this.filePath}: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = shortcutsDataSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? ` at ${issue.path.join(".") || "root"}: ${issue.message}` : "";
      throw new StoreIOError(`Malformed shortcuts file ${this.filePath}${where}`);
    }

    for (const entry of parsed.data.shortcuts) {
      shortcuts.set(entry.name, toShortcut(entry));
    }
    return shortcuts;
  }

  /**
   * Overwrites the file with the given mapping.
   */
  save(shortcuts: Map<string, Shortcut>): void {
    const data: ShortcutsData = { shortcuts: [...shortcuts.values()] };
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(this.filePath, JSON.stringify(data, null, 2) + "\n");
    } catch (err) {
      throw new StoreIOError(`Failed to write ${this.filePath}: ${errorMessage(err)}`, { cause: err });
    }
  }

  list(): Shortcut[] {
    return [...this.load().values()];
  }

  get(name: string): Shortcut {
    const shortcut = this.load().get(name);
    if (!shortcut) {
      throw notFound(name);
    }
    return shortcut;
  }

  has(name: string): boolean {
    return this.load().has(name);
  }

  add(name: string, input: ShortcutInput): Shortcut {
    assertValid(validateName(name));
    assertValid(validateCommand(input.command));

    const shortcuts = this.load();
    if (shortcuts.has(name)) {
      throw new AlreadyExistsError(`Shortcut '${name}' already exists`);
    }

    const shortcut = toShortcut({ name, ...input });
    shortcuts.set(name, shortcut);
    this.save(shortcuts);

    return shortcut;
  }

  /**
   * Replaces the command and arguments of an existing shortcut, keeping its
   * position. An undefined dir keeps the stored one.
   */
  update(name: string, input: ShortcutInput): Shortcut {
    assertValid(validateCommand(input.command));

    const shortcuts = this.load();
    const existing = shortcuts.get(name);
    if (!existing) {
      throw notFound(name);
    }

    const updated = toShortcut({
      name,
      command: input.command,
      args: input.args,
      dir: input.dir ?? existing.dir,
    });
    shortcuts.set(name, updated);
    this.save(shortcuts);

    return updated;
  }

  remove(name: string): Shortcut {
    const shortcuts = this.load();
    const existing = shortcuts.get(name);
    if (!existing) {
      throw notFound(name);
    }

    shortcuts.delete(name);
    this.save(shortcuts);

    return existing;
  }

  /**
   * Deletes the file. Succeeds when it is already gone.
   */
  reset(): void {
    try {
      rmSync(this.filePath, { force: true });
    } catch (err) {
      throw new StoreIOError(`Failed to delete ${this.filePath}: ${errorMessage(err)}`, { cause: err });
    }
  }
}

function toShortcut(entry: Shortcut): Shortcut {
  const shortcut: Shortcut = {
    name: entry.name,
    command: entry.command,
    args: [...entry.args],
  };
  if (entry.dir !== undefined) {
    shortcut.dir = entry.dir;
  }
  return shortcut;
}

function notFound(name: string): NotFoundError {
  return new NotFoundError(`No shortcut found with name '${name}'`);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
