/**
 * Flag parsing shared by the CLI commands.
 *
 * Flags take the `--key=value` form; booleans are bare `--flag`.
 */

/**
 * Parse a flag value from args in --key=value format.
 */
export function parseFlag(args: string[], flag: string): string | undefined {
  const prefix = `--${flag}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  return arg ? arg.slice(prefix.length) : undefined;
}

/**
 * Check if a boolean flag is present.
 */
export function hasFlag(args: string[], longFlag: string, shortFlag?: string): boolean {
  return args.includes(longFlag) || (shortFlag ? args.includes(shortFlag) : false);
}

/**
 * Get non-flag arguments from args array.
 */
export function getNonFlagArgs(args: string[]): string[] {
  return args.filter((a) => !a.startsWith('-'));
}

/**
 * Parse a numeric flag. Returns undefined when absent and NaN when present
 * but empty or not a number, so config validation can report it.
 */
export function parseNumberFlag(args: string[], flag: string): number | undefined {
  const raw = parseFlag(args, flag);
  if (raw === undefined) return undefined;
  return raw.trim() === '' ? NaN : Number(raw);
}

/**
 * Split a comma-separated flag value, dropping empty entries.
 */
export function splitList(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
