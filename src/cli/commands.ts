import { resolve } from "node:path";
import type { CommandContext, CommandHandler, CommandInput } from "./types.js";
import { formatCommandLine, toShortcutInput } from "../shortcuts.js";
import { findFirstFile, resolveProjectDir } from "../projects.js";
import { UsageError } from "../errors.js";

// ============================================================================
// Helpers
// ============================================================================

function requireName(input: CommandInput, usage: string): string {
  const name = input.args[0];
  if (!name) {
    throw new UsageError(`Usage: projexts ${usage}`);
  }
  return name;
}

function dirFlag(input: CommandInput, ctx: CommandContext): string | undefined {
  const dir = input.flags.dir;
  if (dir === undefined) return undefined;
  if (typeof dir !== "string") {
    throw new UsageError("--dir needs a path");
  }
  return resolve(ctx.cwd, dir);
}

// ============================================================================
// Command Handlers
// ============================================================================

/**
 * projexts add <name> [--dir <path>] -- <command> [args...]
 */
const handleAdd: CommandHandler = async (input, ctx) => {
  const usage = "add <name> [--dir <path>] -- <command> [args...]";
  const name = requireName(input, usage);
  const commandLine = [...input.args.slice(1), ...input.rest];
  if (commandLine.length === 0) {
    throw new UsageError(`Usage: projexts ${usage}`);
  }

  const shortcut = ctx.store.add(name, toShortcutInput(input.args.slice(1), input.rest, dirFlag(input, ctx)));
  ctx.logger.log(`added ${shortcut.name}`);

  ctx.fmt.success(`Added: ${shortcut.name} -> ${formatCommandLine(shortcut)}`, { shortcut });
  return 0;
};

/**
 * projexts list [--json]
 */
const handleList: CommandHandler = async (_input, ctx) => {
  ctx.fmt.table(ctx.store.list());
  return 0;
};

/**
 * projexts show <name> [--json]
 */
const handleShow: CommandHandler = async (input, ctx) => {
  const shortcut = ctx.store.get(requireName(input, "show <name>"));

  if (input.flags.json) {
    ctx.fmt.json({ shortcut });
    return 0;
  }

  console.log(`  Name:     ${shortcut.name}`);
  console.log(`  Command:  ${shortcut.command}`);
  console.log(`  Args:     ${shortcut.args.length > 0 ? shortcut.args.join(" ") : "(none)"}`);
  if (shortcut.dir) {
    console.log(`  Dir:      ${shortcut.dir}`);
  }
  return 0;
};

/**
 * projexts run <name> [-- extra args...]
 */
const handleRun: CommandHandler = async (input, ctx) => {
  const shortcut = ctx.store.get(requireName(input, "run <name> [-- args...]"));
  const args = [...shortcut.args, ...input.args.slice(1), ...input.rest];

  ctx.fmt.notice(`Running command: ${formatCommandLine({ command: shortcut.command, args })}`);
  const code = await ctx.runner.run(shortcut.command, args, shortcut.dir ? { cwd: shortcut.dir } : {});
  ctx.logger.log(`run ${shortcut.name} exited with ${code}`);

  return code;
};

/**
 * projexts update <name> [--dir <path>] -- <command> [args...]
 */
const handleUpdate: CommandHandler = async (input, ctx) => {
  const usage = "update <name> [--dir <path>] -- <command> [args...]";
  const name = requireName(input, usage);
  const commandLine = [...input.args.slice(1), ...input.rest];
  if (commandLine.length === 0) {
    throw new UsageError(`Usage: projexts ${usage}`);
  }

  const updated = ctx.store.update(name, toShortcutInput(input.args.slice(1), input.rest, dirFlag(input, ctx)));

  ctx.fmt.success(`Updated: ${updated.name} -> ${formatCommandLine(updated)}`, { shortcut: updated });
  return 0;
};

/**
 * projexts remove <name>
 */
const handleRemove: CommandHandler = async (input, ctx) => {
  const removed = ctx.store.remove(requireName(input, "remove <name>"));

  ctx.fmt.success(`Removed shortcut: ${removed.name}`, { name: removed.name });
  return 0;
};

/**
 * projexts reset
 */
const handleReset: CommandHandler = async (_input, ctx) => {
  ctx.store.reset();

  ctx.fmt.success("All shortcuts removed");
  return 0;
};

/**
 * projexts open <name>
 */
const handleOpen: CommandHandler = async (input, ctx) => {
  const shortcut = ctx.store.get(requireName(input, "open <name>"));
  const dir = resolveProjectDir(shortcut, ctx.cwd);

  await ctx.runner.open(dir);

  ctx.fmt.success(`Opened ${dir}`, { path: dir });
  return 0;
};

/**
 * projexts open-file <name>
 */
const handleOpenFile: CommandHandler = async (input, ctx) => {
  const shortcut = ctx.store.get(requireName(input, "open-file <name>"));
  const file = findFirstFile(resolveProjectDir(shortcut, ctx.cwd));

  await ctx.runner.open(file);

  ctx.fmt.success(`Opened ${file}`, { path: file });
  return 0;
};

/**
 * projexts git-push <name> <message>
 */
const handleGitPush: CommandHandler = async (input, ctx) => {
  const usage = "git-push <name> <message>";
  const shortcut = ctx.store.get(requireName(input, usage));
  const message = [...input.args.slice(1), ...input.rest].join(" ").trim();
  if (!message) {
    throw new UsageError(`Usage: projexts ${usage}`);
  }

  const cwd = resolveProjectDir(shortcut, ctx.cwd);
  const steps: string[][] = [
    ["add", "-A"],
    ["commit", "-m", message],
    ["push"],
  ];

  for (const step of steps) {
    ctx.fmt.notice(`git ${step.join(" ")}`);
    const code = await ctx.runner.run("git", step, { cwd });
    if (code !== 0) {
      ctx.fmt.error(`git ${step[0]} failed with exit code ${code}`);
      return code;
    }
  }

  ctx.fmt.success(`Pushed ${shortcut.name}`, { path: cwd });
  return 0;
};

// ============================================================================
// Command Registry
// ============================================================================

export const commands: Record<string, CommandHandler> = {
  add: handleAdd,
  list: handleList,
  show: handleShow,
  run: handleRun,
  update: handleUpdate,
  remove: handleRemove,
  rm: handleRemove,
  reset: handleReset,
  open: handleOpen,
  "open-file": handleOpenFile,
  "git-push": handleGitPush,
};

export function showHelp(): void {
  console.log(`Usage: projexts <command> [args] [flags]

Commands:
  add <name> -- <cmd> [args...]     Add shortcut (--dir <path>)
  list                              List all shortcuts (--json)
  show <name>                       Show shortcut details (--json)
  run <name> [-- args...]           Run shortcut, appending extra args
  update <name> -- <cmd> [args...]  Replace a shortcut's command (--dir <path>)
  remove <name>                     Remove shortcut (alias: rm)
  reset                             Remove all shortcuts
  open <name>                       Open the shortcut's project folder
  open-file <name>                  Open the first file in the project folder
  git-push <name> <message>         git add -A, commit and push in the project folder

Flags:
  --json                            Output in JSON format
  --dir <path>                      Project folder for add/update
  --debug                           Write a debug log to ~/.projexts/debug.log

Run without arguments to pick a shortcut interactively.

Examples:
  projexts add build -- npm run build
  projexts add web --dir ~/code/web "npm run dev"
  projexts run build -- --watch
  projexts git-push web "fix header"
  projexts rm web`);
}
