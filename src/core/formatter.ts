/**
 * Formatter — renders a LogMessage through a placeholder template.
 *
 * Placeholders: {t} timestamp, {L} level name, {f} source file, {l} source
 * line, {m} message text. The template is scanned once; substituted values are
 * never scanned again, so a literal "{t}" inside a message survives as-is.
 */

import { levelName } from "../types/log-level.js";
import type { LogMessage } from "../types/log-message.js";

export const DEFAULT_TEMPLATE = "{t} | {L} | {f}:{l} -> {m}";

export const PRESET_TEMPLATES = {
  default: DEFAULT_TEMPLATE,
  level: "[{L}] {m}",
  time: "{t} - {m}",
  source: "{m} ({f}:{l})",
} as const;

export type PresetTemplateName = keyof typeof PRESET_TEMPLATES;

const PLACEHOLDER = /\{([tLflm])\}/g;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(time: number): string {
  const d = new Date(time);
  return (
    `${pad(d.getFullYear(), 4)}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

/** Local time as `YYYY-MM-DD_HH-MM-SS`, safe for file names. */
export function formatFileStamp(time: number): string {
  const d = new Date(time);
  return (
    `${pad(d.getFullYear(), 4)}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}_` +
    `${pad(d.getHours())}-${pad(d.getMinutes())}-${pad(d.getSeconds())}`
  );
}

export function renderTemplate(template: string, message: LogMessage): string {
  return template.replace(PLACEHOLDER, (_match, key: string) => {
    switch (key) {
      case "t":
        return formatTimestamp(message.time);
      case "L":
        return levelName(message.level);
      case "f":
        return message.file;
      case "l":
        return String(message.line);
      default:
        return message.text;
    }
  });
}
