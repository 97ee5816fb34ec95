import { Command } from 'commander';
import type { CliSession } from '../session.js';
import * as out from '../output.js';
import { action } from '../helpers.js';

export function createDeleteCommand(session: CliSession): Command {
  return new Command('delete')
    .alias('rm')
    .description('Delete a task (it can be restored)')
    .argument('<id>', 'The task id')
    .action((id: string) => action(session, async () => {
      const { store } = session.activeBackend();
      const result = await store.delete(id);
      if (result.type !== 'success') {
        out.printFailure(result);
        return false;
      }
      out.success(`Deleted task ${result.data.id}`);
    }));
}

export function createRestoreCommand(session: CliSession): Command {
  return new Command('restore')
    .description('Restore a deleted task')
    .argument('<id>', 'The task id')
    .action((id: string) => action(session, async () => {
      const { store } = session.activeBackend();
      const result = await store.restore(id);
      if (result.type !== 'success') {
        out.printFailure(result);
        return false;
      }
      out.success(`Restored task ${result.data.id}`);
    }));
}
