/**
 * Shell-style rendering of argument lists for display only.
 * Commands are always launched from the argument array, never from this text.
 */

const SAFE_ARG = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a single argument so it can be pasted back into a POSIX shell
 */
export function quoteArg(arg: string): string {
  if (arg === '') {
    return "''";
  }
  if (SAFE_ARG.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render a command and its arguments as one shell line
 */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map(quoteArg).join(' ');
}
