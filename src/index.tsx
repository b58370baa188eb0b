#!/usr/bin/env node
import { dispatch } from "./cli/index.js";
import { extractDebugFlag } from "./cli/parser.js";
import { HumanFormatter } from "./cli/formatters.js";
import { pickAndRun } from "./interactive.js";
import { resolveConfigPaths } from "./config.js";
import { FileLogger } from "./logger.js";
import { ShortcutStore } from "./shortcuts.js";
import { NodeProcessRunner } from "./runner.js";
import { normalizeError } from "./errors.js";

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  // Check for --debug flag
  const { debug: debugMode, argv: filteredArgs } = extractDebugFlag(args);

  const paths = resolveConfigPaths();
  const logger = new FileLogger(paths.logFile, debugMode);
  logger.log("main() started");
  logger.log(`args: ${JSON.stringify(filteredArgs)}`);
  logger.log(`shortcuts file: ${paths.shortcutsFile}`);

  const deps = {
    store: new ShortcutStore(paths.shortcutsFile),
    runner: new NodeProcessRunner(logger),
    logger,
  };

  // Interactive picker when started bare on a terminal
  if (filteredArgs.length === 0 && process.stdin.isTTY && process.stdout.isTTY) {
    return pickAndRun(deps);
  }

  return dispatch(filteredArgs, deps);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    const error = normalizeError(err);
    new HumanFormatter().error(error.message);
    process.exit(error.exitCode);
  });
