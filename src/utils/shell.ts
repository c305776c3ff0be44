/**
 * POSIX shell quoting for the command strings handed to the timing engine
 */

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

export function shellQuote(value: string): string {
  if (value.length > 0 && SAFE_WORD.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Join shell steps so that each runs only if the previous one succeeded
 */
export function andThen(steps: string[]): string {
  return steps.filter(s => s.length > 0).join(' && ');
}
