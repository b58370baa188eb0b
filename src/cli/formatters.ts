import type { OutputFormatter, ShortcutRow } from "./types.js";
import type { Shortcut } from "../types.js";
import { formatCommandLine } from "../shortcuts.js";

function toRow(shortcut: Shortcut): ShortcutRow {
  const row: ShortcutRow = { name: shortcut.name, command: formatCommandLine(shortcut) };
  if (shortcut.dir) {
    row.dir = shortcut.dir;
  }
  return row;
}

export class HumanFormatter implements OutputFormatter {
  success(message: string, _data?: Record<string, unknown>): void {
    console.log(`✓ ${message}`);
  }

  // stderr, so it stays out of the way of a spawned command's stdout
  notice(message: string): void {
    console.error(`→ ${message}`);
  }

  error(message: string): void {
    console.error(`Error: ${message}`);
  }

  table(shortcuts: Shortcut[]): void {
    const rows = shortcuts.map(toRow);
    if (rows.length === 0) {
      console.log("No shortcuts found");
      return;
    }

    const nameWidth = Math.max(4, ...rows.map((r) => r.name.length));

    for (const row of rows) {
      const name = `${row.name}:`.padEnd(nameWidth + 1);
      const dir = row.dir ? `  (${row.dir})` : "";
      console.log(`${name} ${row.command}${dir}`);
    }
  }

  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }
}

export class JsonFormatter implements OutputFormatter {
  success(message: string, data?: Record<string, unknown>): void {
    console.log(JSON.stringify({ success: true, message, ...(data ?? {}) }));
  }

  notice(_message: string): void {
    // JSON consumers only get the final result
  }

  error(message: string): void {
    console.log(JSON.stringify({ error: message }));
  }

  table(shortcuts: Shortcut[]): void {
    console.log(JSON.stringify({ shortcuts }));
  }

  json(data: unknown): void {
    console.log(JSON.stringify(data));
  }
}

export function createFormatter(useJson: boolean): OutputFormatter {
  return useJson ? new JsonFormatter() : new HumanFormatter();
}
