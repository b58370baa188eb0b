import { parseArgv } from "./parser.js";
import { createFormatter } from "./formatters.js";
import { commands, showHelp } from "./commands.js";
import type { CommandContext, OutputFormatter, ParsedArgs } from "./types.js";
import type { ShortcutStore } from "../shortcuts.js";
import type { ProcessRunner } from "../runner.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { normalizeError } from "../errors.js";

/**
 * Prints one error line through the formatter and returns its exit code.
 */
export function reportError(err: unknown, fmt: OutputFormatter, logger: Logger = silentLogger): number {
  const error = normalizeError(err);
  logger.log(`${error.name} (${error.code}): ${error.message}`);
  fmt.error(error.message);
  return error.exitCode;
}

export interface DispatchDeps {
  store: ShortcutStore;
  runner: ProcessRunner;
  logger?: Logger;
  cwd?: string;
}

/**
 * Main CLI dispatcher. Runs one subcommand and resolves the exit code;
 * every error is reported here and never escapes.
 */
export async function dispatch(argv: string[], deps: DispatchDeps): Promise<number> {
  const logger = deps.logger ?? silentLogger;

  let parsed: ParsedArgs;
  try {
    parsed = parseArgv(argv);
  } catch (err) {
    const separator = argv.indexOf("--");
    const head = separator === -1 ? argv : argv.slice(0, separator);
    return reportError(err, createFormatter(head.includes("--json")), logger);
  }

  const { command, positional, rest, flags } = parsed;
  const fmt = createFormatter(flags.json === true);

  // No command or help flag
  if (!command || command === "help" || flags.help) {
    showHelp();
    return 0;
  }

  // Find handler
  const handler = Object.hasOwn(commands, command) ? commands[command] : undefined;
  if (!handler) {
    fmt.error(`Unknown command: ${command}. Run "projexts help" for usage.`);
    return 2;
  }

  const ctx: CommandContext = {
    store: deps.store,
    runner: deps.runner,
    logger,
    fmt,
    cwd: deps.cwd ?? process.cwd(),
  };

  logger.log(`dispatch: ${command} ${JSON.stringify(positional)} rest=${JSON.stringify(rest)}`);

  try {
    return await handler({ args: positional, rest, flags }, ctx);
  } catch (err) {
    return reportError(err, fmt, logger);
  }
}
