import type { Flags, ParsedArgs } from "./types.js";
import { UsageError } from "../errors.js";

/** Flags that never consume the following argument. */
const BOOLEAN_FLAGS = new Set(["json", "help", "debug"]);
const VALUE_FLAGS = new Set(["dir"]);

/**
 * Pulls --debug out of the options part of argv. Anything after "--"
 * belongs to the shortcut's command and is left alone.
 */
export function extractDebugFlag(argv: string[]): { debug: boolean; argv: string[] } {
  const separator = argv.indexOf("--");
  const head = separator === -1 ? argv : argv.slice(0, separator);
  const tail = separator === -1 ? [] : argv.slice(separator);

  const kept = head.filter((arg) => arg !== "--debug");
  return { debug: kept.length !== head.length, argv: [...kept, ...tail] };
}

/**
 * Parse argv array into command, positional args, flags and the raw tail.
 * Throws UsageError for a flag projexts does not know.
 * Example: "add web --dir ~/web -- npm run dev --port 3000" ->
 *   {command:"add", positional:["web"], flags:{dir:"~/web"}, rest:["npm","run","dev","--port","3000"]}
 */
export function parseArgv(argv: string[]): ParsedArgs {
  const separator = argv.indexOf("--");
  const head = separator === -1 ? argv : argv.slice(0, separator);
  const rest = separator === -1 ? [] : argv.slice(separator + 1);

  const positional: string[] = [];
  const flags: Flags = {};
  let command: string | null = null;

  let i = 0;
  while (i < head.length) {
    const arg = head[i];

    if (arg.startsWith("--")) {
      const flagName = arg.slice(2);
      if (!BOOLEAN_FLAGS.has(flagName) && !VALUE_FLAGS.has(flagName)) {
        throw new UsageError(`Unknown flag: ${arg}. Pass command arguments after "--".`);
      }

      // Check if next arg is a value (not another flag)
      const nextArg = head[i + 1];
      if (!BOOLEAN_FLAGS.has(flagName) && nextArg !== undefined && !nextArg.startsWith("--")) {
        flags[flagName] = nextArg;
        i += 2;
      } else {
        flags[flagName] = true;
        i += 1;
      }
    } else if (command === null) {
      command = arg;
      i += 1;
    } else {
      positional.push(arg);
      i += 1;
    }
  }

  return { command, positional, rest, flags };
}
