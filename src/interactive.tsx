import React from "react";
import { render } from "ink";
import { Picker } from "./components/Picker.js";
import { dispatch, reportError } from "./cli/index.js";
import type { DispatchDeps } from "./cli/index.js";
import { HumanFormatter } from "./cli/formatters.js";
import type { Shortcut } from "./types.js";
import { silentLogger } from "./logger.js";

/**
 * Shows the shortcut picker and runs whatever gets selected.
 * Resolves the exit code, like dispatch.
 */
export async function pickAndRun(deps: DispatchDeps): Promise<number> {
  const logger = deps.logger ?? silentLogger;

  let shortcuts: Shortcut[];
  try {
    shortcuts = deps.store.list();
  } catch (err) {
    return reportError(err, new HumanFormatter(), logger);
  }

  const choice: { name: string | null } = { name: null };

  logger.log(`rendering picker with ${shortcuts.length} shortcuts`);
  const { waitUntilExit } = render(
    <Picker
      shortcuts={shortcuts}
      onSelect={(name) => {
        choice.name = name;
      }}
      onRemove={(name) => {
        deps.store.remove(name);
        logger.log(`removed ${name} from picker`);
      }}
    />,
    { exitOnCtrlC: true }
  );

  await waitUntilExit();
  logger.log(`picker exited, selected=${choice.name}`);

  if (choice.name === null) return 0;
  return dispatch(["run", choice.name], deps);
}
