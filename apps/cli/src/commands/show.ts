import { Command } from 'commander';
import type { CliSession } from '../session.js';
import * as out from '../output.js';
import { action } from '../helpers.js';

export function createShowCommand(session: CliSession): Command {
  return new Command('show')
    .description('Show a single task, including deleted ones')
    .argument('<id>', 'The task id')
    .action((id: string) => action(session, async () => {
      const { store } = session.activeBackend();
      const result = await store.get(id);
      if (result.type !== 'success') {
        out.printFailure(result);
        return false;
      }
      for (const line of out.formatRecord(result.data)) {
        out.info(line);
      }
    }));
}
