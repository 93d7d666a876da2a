/**
 * CLI helpers: config resolution from the command, user filtering, error handling.
 */

import type { Command } from 'commander';
import type { BragDocument } from '@brag/core';
import { filterUsers, ParseError } from '@brag/core';
import { resolveConfig } from './config.js';
import type { BragConfig, GlobalOptions } from './config.js';
import * as out from './output.js';

/** Resolve configuration from the root program's options */
export function configFrom(cmd: Command, env: NodeJS.ProcessEnv = process.env): BragConfig {
  return resolveConfig(cmd.optsWithGlobals<GlobalOptions>(), env);
}

/** Apply the `--users` filter, if any */
export function selectUsers(doc: BragDocument, config: BragConfig): BragDocument {
  return config.users ? filterUsers(doc, config.users) : doc;
}

/**
 * Run a command action, printing any error and setting a failing exit code.
 */
export async function $try(fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    if (err instanceof ParseError) {
      out.error(`Could not parse document. ${err.message}`);
    } else if (err instanceof Error) {
      out.error(err.message);
    } else {
      out.error(String(err));
    }
    process.exitCode = 1;
  }
}
