import { ActionLaunchError } from '@swiftlaunch/shared';

/** Values substituted for Exec field codes. */
export interface ExpandContext {
  /** Files or URLs handed to the action */
  args?: readonly string[];
  name: string;
  icon?: string;
  sourcePath: string;
}

/**
 * Splits an Exec line into arguments. Double quotes group, and a backslash
 * escapes the next character inside or outside quotes.
 */
export function tokenizeExec(exec: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quoted = false;

  for (let i = 0; i < exec.length; i++) {
    const ch = exec[i];
    if (ch === '\\' && i + 1 < exec.length) {
      current += exec[++i];
      inToken = true;
    } else if (ch === '"') {
      quoted = !quoted;
      inToken = true;
    } else if (!quoted && /\s/.test(ch)) {
      if (inToken) tokens.push(current);
      current = '';
      inToken = false;
    } else {
      current += ch;
      inToken = true;
    }
  }

  if (quoted) {
    throw new ActionLaunchError(`Unterminated quote in Exec line: ${exec}`);
  }
  if (inToken) tokens.push(current);
  return tokens;
}

/**
 * Turns an Exec template into argv.
 *
 * `%F`/`%U` and `%i` only expand when they stand alone as an argument.
 * Deprecated and unknown codes are removed, and an argument that held
 * nothing but removed codes disappears.
 */
export function expandExec(exec: string, ctx: ExpandContext): string[] {
  const args = ctx.args ?? [];
  const argv: string[] = [];

  for (const token of tokenizeExec(exec)) {
    if (token === '%F' || token === '%U') {
      argv.push(...args);
      continue;
    }
    if (token === '%i') {
      if (ctx.icon) argv.push('--icon', ctx.icon);
      continue;
    }

    const expanded = token.replace(/%(.)/g, (_match, code: string) => {
      switch (code) {
        case 'f':
        case 'u':
          return args[0] ?? '';
        case 'F':
        case 'U':
          return args.join(' ');
        case 'c':
          return ctx.name;
        case 'k':
          return ctx.sourcePath;
        case 'i':
          return ctx.icon ?? '';
        case '%':
          return '%';
        default:
          return '';
      }
    });
    if (expanded === '' && token.includes('%')) continue;
    argv.push(expanded);
  }

  if (argv.length === 0) {
    throw new ActionLaunchError(`Exec line has no command: ${exec}`);
  }
  return argv;
}
