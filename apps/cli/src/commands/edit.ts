import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Command } from 'commander';
import type { BragDocument, SessionDate } from '@brag/core';
import { buildSessionTemplate, parseDocument, updateDocument } from '@brag/core';
import type { BragConfig } from '../config.js';
import { loadDocument, saveDocument } from '../brag-file.js';
import { openInEditor } from '../editor.js';
import type { EditorLauncher } from '../editor.js';
import * as out from '../output.js';
import { $try, configFrom, selectUsers } from '../helpers.js';

/** The edited session could not be merged. The edited text is left at `file`. */
export class UnmergedEditError extends Error {
  readonly file: string;

  constructor(file: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not merge the edited session (${reason}). Your edits were kept in ${file}`, { cause });
    this.name = 'UnmergedEditError';
    this.file = file;
  }
}

/**
 * Write a session template to a temp file, let the user edit it, then merge
 * the result into the brag file. The temp file is removed once the merge is
 * saved, or when the editor fails; a failed merge leaves it in place.
 */
export async function editSession(
  config: BragConfig,
  launch: EditorLauncher = openInEditor,
  today?: SessionDate,
): Promise<BragDocument> {
  const doc = loadDocument(config.file, { allowMissing: true });
  const template = buildSessionTemplate(selectUsers(doc, config), today);

  const dir = mkdtempSync(join(tmpdir(), 'brag-'));
  const file = join(dir, 'session.md');
  try {
    writeFileSync(file, template + '\n', 'utf8');
    await launch(config.editor, file);
  } catch (err: unknown) {
    rmSync(dir, { recursive: true, force: true });
    throw err;
  }

  try {
    updateDocument(doc, parseDocument(readFileSync(file, 'utf8')));
    saveDocument(config.file, doc);
  } catch (err: unknown) {
    throw new UnmergedEditError(file, err);
  }

  rmSync(dir, { recursive: true, force: true });
  return doc;
}

export function createEditCommand(): Command {
  return new Command('edit')
    .description('Open today\'s session template in your editor and merge it into the brag file')
    .action((_opts: unknown, cmd: Command) => $try(async () => {
      const config = configFrom(cmd);
      await editSession(config);
      out.success(`Updated ${config.file}`);
    }));
}
