import { basename, dirname, join } from "node:path";

/**
 * Insert `_<stamp>` before the last dot of the file name, or append it when
 * the name has none: `logs/app.log` → `logs/app_2024-01-01_12-00-00.log`,
 * `.log` → `_2024-01-01_12-00-00.log`.
 * Dots in directory names are never taken for an extension.
 */
export function resolveLogFilePath(filePath: string, stamp: string, addSuffix: boolean): string {
  if (!addSuffix) return filePath;

  const name = basename(filePath);
  const dot = name.lastIndexOf(".");
  const stamped =
    dot === -1 ? `${name}_${stamp}` : `${name.slice(0, dot)}_${stamp}${name.slice(dot)}`;
  return join(dirname(filePath), stamped);
}
