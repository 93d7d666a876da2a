import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import type { BragDocument } from '@brag/core';
import { parseDocument, serializeDocument, updateDocument } from '@brag/core';
import { loadDocument, saveDocument, readStream } from '../brag-file.js';
import * as out from '../output.js';
import { $try, configFrom } from '../helpers.js';

interface UpdateOptions {
  input?: string;
  write?: boolean;
}

/**
 * Merge `incomingText` into the document at `file`. A missing file starts
 * from an empty document. The result is returned, not written.
 */
export function mergeIntoFile(file: string, incomingText: string): BragDocument {
  const doc = loadDocument(file, { allowMissing: true });
  return updateDocument(doc, parseDocument(incomingText));
}

export function createUpdateCommand(): Command {
  return new Command('update')
    .description('Merge sessions from a file or stdin into the brag file')
    .option('-i, --input <path>', 'Read the update from a file instead of stdin')
    .option('-w, --write', 'Write the merged document back to the brag file')
    .action((opts: UpdateOptions, cmd: Command) => $try(async () => {
      // --users only narrows what is shown; updates always keep every user
      const config = configFrom(cmd);
      const incoming = opts.input ? readFileSync(opts.input, 'utf8') : await readStream();
      const merged = mergeIntoFile(config.file, incoming);

      if (opts.write) {
        saveDocument(config.file, merged);
        out.success(`Updated ${config.file}`);
      } else {
        out.document(serializeDocument(merged));
      }
    }));
}
