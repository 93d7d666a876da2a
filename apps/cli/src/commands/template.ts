import { Command } from 'commander';
import { buildSessionTemplate, parseSessionDate } from '@brag/core';
import { loadDocument } from '../brag-file.js';
import * as out from '../output.js';
import { $try, configFrom, selectUsers } from '../helpers.js';

interface TemplateOptions {
  date?: string;
}

export function createTemplateCommand(): Command {
  return new Command('template')
    .description('Print a template for a new session: open goals, the latest session and an empty one for today')
    .option('-d, --date <yyyy-mm-dd>', 'Date of the new session (default: today)')
    .action((opts: TemplateOptions, cmd: Command) => $try(() => {
      const config = configFrom(cmd);
      const today = opts.date ? parseSessionDate(opts.date) : undefined;
      if (today === null) {
        out.error(`Invalid date: '${opts.date ?? ''}'. Use yyyy-mm-dd`);
        process.exitCode = 1;
        return;
      }
      const doc = selectUsers(loadDocument(config.file), config);
      out.document(buildSessionTemplate(doc, today));
    }));
}
