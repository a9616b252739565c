import { fileURLToPath } from "node:url";

export interface CallSite {
  file: string;
  line: number;
}

export const UNKNOWN_CALL_SITE: CallSite = { file: "<unknown>", line: 0 };

// "    at fn (/path/to/file.ts:10:5)" or "    at /path/to/file.ts:10:5"
const FRAME_PATTERN = /^\s*at (?:.*? \()?(.+?):(\d+):\d+\)?$/;

function toPath(location: string): string {
  if (!location.startsWith("file://")) return location;
  try {
    return fileURLToPath(location);
  } catch {
    return location;
  }
}

/** Parse one V8 stack frame line. */
export function parseStackFrame(frame: string): CallSite | undefined {
  const match = FRAME_PATTERN.exec(frame);
  if (!match) return undefined;
  return { file: toPath(match[1]), line: Number.parseInt(match[2], 10) };
}

/**
 * Locate the caller `depth` frames above the function that calls `captureCallSite`.
 * depth 0 is that function's own caller.
 */
export function captureCallSite(depth = 0): CallSite {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, captureCallSite);
  const frames = (holder.stack ?? "").split("\n").slice(1);
  const frame = frames[depth + 1];
  return (frame !== undefined && parseStackFrame(frame)) || UNKNOWN_CALL_SITE;
}
