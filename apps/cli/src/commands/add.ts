import { Command } from 'commander';
import { TaskStatus } from '@tasklane/core';
import type { CliSession } from '../session.js';
import * as out from '../output.js';
import { parseStatus, action, STATUS_HELP } from '../helpers.js';

export function createAddCommand(session: CliSession): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<name...>', 'The task name')
    .option('-s, --status <status>', `Initial status: ${STATUS_HELP}`)
    .action((words: string[], opts: { status?: string }) => action(session, async () => {
      let status: TaskStatus = TaskStatus.NotStarted;
      if (opts.status != null) {
        const parsed = parseStatus(opts.status);
        if (parsed == null) {
          out.error(`Unknown status: '${opts.status}'. Use: ${STATUS_HELP}`);
          return false;
        }
        status = parsed;
      }

      const { store } = session.activeBackend();
      const result = await store.add(words.join(' '), status);
      if (result.type !== 'success') {
        out.printFailure(result);
        return false;
      }
      out.success(`Added task ${result.data.id}`);
      out.info(out.formatTask(result.data));
    }));
}
