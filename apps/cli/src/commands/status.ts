import { Command } from 'commander';
import type { CliSession } from '../session.js';
import * as out from '../output.js';
import { parseStatus, action, STATUS_HELP } from '../helpers.js';

export function createStatusCommand(session: CliSession): Command {
  return new Command('status')
    .description('Set the status of a task')
    .argument('<status>', `The status to set: ${STATUS_HELP}`)
    .argument('<id>', 'The task id')
    .action((statusStr: string, id: string) => action(session, async () => {
      const status = parseStatus(statusStr);
      if (status == null) {
        out.error(`Unknown status: '${statusStr}'. Use: ${STATUS_HELP}`);
        return false;
      }

      const { store } = session.activeBackend();
      const result = await store.updateStatus(id, status);
      if (result.type !== 'success') {
        out.printFailure(result);
        return false;
      }
      out.success(`Task ${result.data.id} is now ${out.formatStatus(result.data.status)}`);
    }));
}
