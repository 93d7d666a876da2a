import { Command } from 'commander';
import type { BragDocument, SessionView } from '@brag/core';
import { getCurrentSession, getLastSession, serializeSessionView } from '@brag/core';
import { loadDocument } from '../brag-file.js';
import * as out from '../output.js';
import { $try, configFrom, selectUsers } from '../helpers.js';

function createSessionViewCommand(
  name: string,
  description: string,
  select: (doc: BragDocument) => SessionView,
): Command {
  return new Command(name)
    .description(description)
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const config = configFrom(cmd);
      const view = select(selectUsers(loadDocument(config.file), config));
      if (view.entries.length === 0) {
        out.warning(`No sessions on ${view.date}`);
        return;
      }
      out.document(serializeSessionView(view));
    }));
}

export function createCurrentCommand(): Command {
  return createSessionViewCommand('current', 'Show every user\'s latest session', getCurrentSession);
}

export function createLastCommand(): Command {
  return createSessionViewCommand('last', 'Show every user\'s previous session', getLastSession);
}
