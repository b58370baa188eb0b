import { join } from "node:path";
import { homedir } from "node:os";

export interface ConfigPaths {
  configDir: string;
  shortcutsFile: string;
  logFile: string;
}

/**
 * Resolves where projexts keeps its state.
 * PROJEXTS_HOME overrides the default ~/.projexts folder.
 */
export function resolveConfigPaths(env: NodeJS.ProcessEnv = process.env): ConfigPaths {
  const override = env.PROJEXTS_HOME?.trim();
  const configDir = override ? override : join(homedir(), ".projexts");

  return {
    configDir,
    shortcutsFile: join(configDir, "shortcuts.json"),
    logFile: join(configDir, "debug.log"),
  };
}
