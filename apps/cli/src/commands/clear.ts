import { Command } from 'commander';
import type { CliSession } from '../session.js';
import * as out from '../output.js';
import { parseStatus, action, STATUS_HELP } from '../helpers.js';

export function createClearCommand(session: CliSession): Command {
  return new Command('clear')
    .description('Permanently remove all tasks, or only those with a status')
    .option('-s, --status <status>', `Only clear non-deleted tasks with this status: ${STATUS_HELP}`)
    .option('-y, --yes', 'Confirm the removal')
    .action((opts: { status?: string; yes?: boolean }) => action(session, async () => {
      const status = opts.status != null ? parseStatus(opts.status) : null;
      if (opts.status != null && status == null) {
        out.error(`Unknown status: '${opts.status}'. Use: ${STATUS_HELP}`);
        return false;
      }

      const { store } = session.activeBackend();
      if (!opts.yes) {
        const scope = status != null ? `all '${status}' tasks` : 'all tasks, including deleted ones';
        out.warning(`This will permanently remove ${scope} from ${store.describe()}. Re-run with --yes to continue.`);
        return false;
      }

      const result = status != null ? await store.clearByStatus(status) : await store.clearAll();
      if (result.type !== 'success') {
        out.printFailure(result);
        return false;
      }
      out.printClearSummary(result.data);
      return result.data.failedIds.length === 0;
    }));
}
