import { statSync } from "node:fs";
import { dirname, resolve } from "node:path";
import fg from "fast-glob";
import type { Shortcut } from "./types.js";
import { NotFoundError } from "./errors.js";

type PathKind = "dir" | "file" | null;

function pathKind(path: string): PathKind {
  try {
    const stats = statSync(path);
    if (stats.isDirectory()) return "dir";
    if (stats.isFile()) return "file";
    return null;
  } catch {
    return null;
  }
}

/**
 * Works out which folder a shortcut belongs to.
 *
 * An explicit dir wins. Otherwise the stored arguments are searched (then the
 * command itself) for an existing directory, and failing that for an existing
 * file whose parent folder is used.
 */
export function resolveProjectDir(shortcut: Shortcut, cwd: string = process.cwd()): string {
  if (shortcut.dir) {
    const dir = resolve(cwd, shortcut.dir);
    if (pathKind(dir) !== "dir") {
      throw new NotFoundError(`Directory for shortcut '${shortcut.name}' does not exist: ${dir}`);
    }
    return dir;
  }

  const candidates = [...shortcut.args, shortcut.command].map((p) => resolve(cwd, p));

  const dir = candidates.find((p) => pathKind(p) === "dir");
  if (dir) return dir;

  const file = candidates.find((p) => pathKind(p) === "file");
  if (file) return dirname(file);

  throw new NotFoundError(`No directory associated with shortcut '${shortcut.name}'`);
}

/**
 * First regular file directly inside dir, by name. Hidden files are skipped.
 */
export function findFirstFile(dir: string): string {
  const files = fg.sync("*", { cwd: dir, onlyFiles: true, absolute: true, dot: false });
  files.sort();

  const first = files[0];
  if (!first) {
    throw new NotFoundError(`No files found in ${dir}`);
  }
  return first;
}
