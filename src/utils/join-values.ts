import { inspect } from "node:util";

export type Displayable = string | number | bigint | boolean | symbol | null | undefined | object;

function display(value: Displayable): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (typeof value === "object" && value !== null) {
    return inspect(value, { breakLength: Number.POSITIVE_INFINITY, depth: 4 });
  }
  return String(value);
}

/** Concatenate values with no separator, the way stream insertion would. */
export function joinValues(values: readonly Displayable[]): string {
  let out = "";
  for (const value of values) out += display(value);
  return out;
}
