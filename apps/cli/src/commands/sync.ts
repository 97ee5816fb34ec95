import { Command } from 'commander';
import { syncRemoteToLocal, setPreferredBackend, fixedDelay } from '@tasklane/core';
import type { CliSession } from '../session.js';
import * as out from '../output.js';
import { action } from '../helpers.js';

export function createSyncCommand(session: CliSession): Command {
  return new Command('sync')
    .description('Replace every SQLite task with the tasks from Notion')
    .option('-y, --yes', 'Confirm the replacement')
    .action((opts: { yes?: boolean }) => action(session, async () => {
      if (!opts.yes) {
        out.warning('This will replace all tasks in SQLite with tasks from Notion. Re-run with --yes to continue.');
        return false;
      }

      const registry = session.getRegistry();
      const target = registry.sqlite();
      const report = await syncRemoteToLocal({
        source: registry.notion(),
        target,
        delay: fixedDelay(session.getConfig().pacingMs),
      });
      const completed = out.printSyncReport(report);

      // Point later commands at the copy
      if (report.type === 'synced') {
        setPreferredBackend(target.db, 'sqlite');
      }
      return completed;
    }));
}
