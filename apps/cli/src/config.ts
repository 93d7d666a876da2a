/**
 * Resolves CLI configuration once, from flags first and the environment
 * second. Nothing below the command layer reads process.env.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

export const DEFAULT_EDITOR = 'vi';

/** Options shared by every command (set on the root program) */
export type GlobalOptions = {
  file?: string;
  users?: string;
  editor?: string;
};

export interface BragConfig {
  /** Absolute or cwd-relative path to the brag document */
  readonly file: string;
  readonly editor: string;
  /** Lower-cased user filter, or null for everyone */
  readonly users: readonly string[] | null;
}

export class ConfigError extends Error {}

/** Expand a leading `~` to the home directory */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

/** Split a comma separated `--users` value; blanks are dropped */
export function parseUserList(value: string | undefined): string[] | null {
  if (!value) return null;
  const names = value.split(',').map(n => n.trim().toLowerCase()).filter(Boolean);
  return names.length > 0 ? names : null;
}

export function resolveConfig(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
): BragConfig {
  const file = options.file || env['BRAG_FILE'];
  if (!file) {
    throw new ConfigError('No brag file given. Use --file <path> or set BRAG_FILE.');
  }

  return {
    file: expandHome(file, home),
    editor: options.editor || env['VISUAL'] || env['EDITOR'] || DEFAULT_EDITOR,
    users: parseUserList(options.users),
  };
}
