import { Command } from 'commander';
import type { CliSession } from '../session.js';
import * as out from '../output.js';
import { action } from '../helpers.js';

export function createRenameCommand(session: CliSession): Command {
  return new Command('rename')
    .description('Rename a task')
    .argument('<id>', 'The task id')
    .argument('<name...>', 'The new name')
    .action((id: string, words: string[]) => action(session, async () => {
      const { store } = session.activeBackend();
      const result = await store.updateName(id, words.join(' '));
      if (result.type !== 'success') {
        out.printFailure(result);
        return false;
      }
      out.success(`Renamed task ${result.data.id} to '${result.data.name}'`);
    }));
}
