import { Command } from 'commander';
import type { TaskStatus } from '@tasklane/core';
import { summarizeTasks } from '@tasklane/core';
import type { CliSession } from '../session.js';
import * as out from '../output.js';
import { parseStatus, action, STATUS_HELP } from '../helpers.js';

export function createListCommand(session: CliSession): Command {
  return new Command('list')
    .alias('ls')
    .description('List tasks that are not deleted')
    .option('-s, --status <status>', `Only show tasks with this status: ${STATUS_HELP}`)
    .action((opts: { status?: string }) => action(session, async () => {
      let filter: TaskStatus | undefined;
      if (opts.status != null) {
        const parsed = parseStatus(opts.status);
        if (parsed == null) {
          out.error(`Unknown status: '${opts.status}'. Use: ${STATUS_HELP}`);
          return false;
        }
        filter = parsed;
      }

      const { store } = session.activeBackend();
      const result = await store.list(filter);
      if (result.type !== 'success') {
        out.printFailure(result);
        return false;
      }
      if (result.data.length === 0) {
        out.info('No tasks');
        return;
      }
      for (const task of result.data) {
        out.info(out.formatTask(task));
      }
      out.info('');
      out.info(out.formatSummary(summarizeTasks(result.data)));
    }));
}
