/**
 * CLI Utilities: flag parsing.
 */

/** Extract a --flag value pair from argv, returning value and remaining args. */
export function extractFlag(
  argv: string[],
  flag: string,
  alias?: string
): { value: string | undefined; rest: string[] } {
  const rest: string[] = [];
  let value: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if ((arg === `--${flag}` || (alias && arg === `-${alias}`)) && i + 1 < argv.length) {
      value = argv[++i];
    } else if (arg !== undefined) {
      rest.push(arg);
    }
  }
  return { value, rest };
}

/** Extract a boolean --flag from argv. */
export function extractBoolFlag(
  argv: string[],
  flag: string,
  alias?: string
): { value: boolean; rest: string[] } {
  const rest: string[] = [];
  let value = false;
  for (const arg of argv) {
    if (arg === `--${flag}` || (alias && arg === `-${alias}`)) {
      value = true;
    } else {
      rest.push(arg);
    }
  }
  return { value, rest };
}
