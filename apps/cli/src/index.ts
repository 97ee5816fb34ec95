#!/usr/bin/env tsx

import { CliSession } from './session.js';
import { createProgram } from './program.js';

const session = new CliSession();

try {
  await createProgram(session).parseAsync();
} finally {
  session.close();
}
process.exitCode = session.exitCode;
