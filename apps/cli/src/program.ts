import { Command, Option } from 'commander';
import { BACKEND_KINDS } from '@tasklane/core';
import type { CliSession, GlobalOptions } from './session.js';

import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createShowCommand } from './commands/show.js';
import { createStatusCommand } from './commands/status.js';
import { createRenameCommand } from './commands/rename.js';
import { createDeleteCommand, createRestoreCommand } from './commands/delete.js';
import { createClearCommand } from './commands/clear.js';
import { createSyncCommand } from './commands/sync.js';
import { createBackendCommand } from './commands/backend.js';

export function createProgram(session: CliSession): Command {
  const program = new Command()
    .name('tasklane')
    .description('Task list backed by SQLite or a Notion database')
    .version('1.0.0')
    .addOption(new Option('-b, --backend <kind>', 'Backend for this command').choices(BACKEND_KINDS))
    .option('--db <path>', 'SQLite database file')
    .option('-v, --verbose', 'Log debug output to stderr');

  program.hook('preAction', () => {
    session.configure(program.opts<GlobalOptions>());
  });

  const list = createListCommand(session);
  program.addCommand(createAddCommand(session));
  program.addCommand(list, { isDefault: true });
  program.addCommand(createShowCommand(session));
  program.addCommand(createStatusCommand(session));
  program.addCommand(createRenameCommand(session));
  program.addCommand(createDeleteCommand(session));
  program.addCommand(createRestoreCommand(session));
  program.addCommand(createClearCommand(session));
  program.addCommand(createSyncCommand(session));
  program.addCommand(createBackendCommand(session));

  return program;
}
