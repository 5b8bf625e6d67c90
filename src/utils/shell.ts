const SAFE_ARG = /^[A-Za-z0-9_@%+=:,./-]+$/;

/** POSIX single-quote an argument unless it is made only of safe characters */
export function quoteArg(arg: string): string {
  if (arg === '') return "''";
  if (SAFE_ARG.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** Display form of an argv; every argument stays a single shell word */
export function renderCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args].map(quoteArg).join(' ');
}
