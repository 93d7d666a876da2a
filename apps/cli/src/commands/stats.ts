import { Command } from 'commander';
import { getDocumentStats, parseSessionDate } from '@brag/core';
import type { StatsOptions } from '@brag/core';
import { loadDocument } from '../brag-file.js';
import * as out from '../output.js';
import { $try, configFrom, selectUsers } from '../helpers.js';

interface StatsCommandOptions {
  date?: string;
}

export function createStatsCommand(): Command {
  return new Command('stats')
    .description('Show done, partial and missed task counts per user')
    .option('-d, --date <yyyy-mm-dd>', 'Only count the session on this date')
    .action((opts: StatsCommandOptions, cmd: Command) => $try(() => {
      const config = configFrom(cmd);
      const options: StatsOptions = {};
      if (opts.date) {
        const date = parseSessionDate(opts.date);
        if (date == null) {
          out.error(`Invalid date: '${opts.date}'. Use yyyy-mm-dd`);
          process.exitCode = 1;
          return;
        }
        options.date = date;
      }

      const entries = getDocumentStats(selectUsers(loadDocument(config.file), config), options);
      if (entries.length === 0) {
        out.info('No users found');
        return;
      }

      out.heading(options.date ? `Stats for ${options.date}` : 'Stats');
      out.info('');
      for (const { user, stats } of entries) {
        out.info(`  ${out.formatStatsLine(user.name, stats)}`);
      }
    }));
}
