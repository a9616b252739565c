/** Destination bit set. Flags combine with `|`. */
export enum OutputTarget {
  Console = 1,
  File = 2,
  Both = Console | File,
}

export function hasTarget(set: OutputTarget, flag: OutputTarget): boolean {
  return (set & flag) !== 0;
}

const TARGETS_BY_NAME: ReadonlyMap<string, OutputTarget> = new Map([
  ["console", OutputTarget.Console],
  ["file", OutputTarget.File],
  ["both", OutputTarget.Both],
]);

export function parseOutputTarget(name: string): OutputTarget | undefined {
  return TARGETS_BY_NAME.get(name.trim().toLowerCase());
}
