#!/usr/bin/env -S node --import tsx

/**
 * tabletalk CLI entrypoint.
 */

import { CommanderError } from 'commander';
import { normalizeArgv } from './argv.js';
import { EXIT_CODE_SUCCESS, EXIT_CODE_USAGE } from './errors.js';
import { buildProgram } from './program.js';

async function main(): Promise<void> {
  const program = buildProgram();
  try {
    await program.parseAsync(normalizeArgv(process.argv));
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // help and version exit through here with code 0
      process.exitCode = error.exitCode === 0 ? EXIT_CODE_SUCCESS : EXIT_CODE_USAGE;
      return;
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(2);
});
