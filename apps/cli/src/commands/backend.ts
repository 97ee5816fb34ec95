import { Command } from 'commander';
import { isBackendKind, setPreferredBackend, BACKEND_KINDS } from '@tasklane/core';
import type { CliSession } from '../session.js';
import * as out from '../output.js';
import { action } from '../helpers.js';

export function createBackendCommand(session: CliSession): Command {
  return new Command('backend')
    .description('Show the active backend, or store a preferred one')
    .argument('[kind]', `Backend to use from now on: ${BACKEND_KINDS.join(', ')}`)
    .action((kind: string | undefined) => action(session, async () => {
      if (kind == null) {
        const preferred = session.preferredBackend();
        const { store } = session.activeBackend();
        out.info(`Preferred: ${preferred}`);
        out.info(`Active:    ${store.kind} (${store.describe()})`);
        return;
      }

      const normalized = kind.trim().toLowerCase();
      if (!isBackendKind(normalized)) {
        out.error(`Unknown backend: '${kind}'. Use: ${BACKEND_KINDS.join(', ')}`);
        return false;
      }

      const registry = session.getRegistry();
      setPreferredBackend(registry.sqlite().db, normalized);
      out.success(`Preferred backend set to ${normalized}`);

      const resolution = registry.resolve(normalized);
      if (resolution.type === 'missing-credentials') {
        out.warning(resolution.suggestion);
      }
    }));
}
