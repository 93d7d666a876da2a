import { Command } from 'commander';
import { formatUserHeader } from '@brag/core';
import { loadDocument } from '../brag-file.js';
import * as out from '../output.js';
import { $try, configFrom, selectUsers } from '../helpers.js';

export function createUsersCommand(): Command {
  return new Command('users')
    .description('List users in the brag file')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const config = configFrom(cmd);
      const doc = selectUsers(loadDocument(config.file), config);
      if (doc.users.length === 0) {
        out.info('No users found');
        return;
      }
      out.info(doc.users.map(formatUserHeader).join(', '));
    }));
}
