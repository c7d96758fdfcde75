#!/usr/bin/env node

// src/cli/main.ts - CLI entry point

import { createProgram, CommanderError } from './program.js';
import { reportCommandError } from './commands/report-error.js';

async function main(): Promise<void> {
  const program = await createProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and version output end up here too, with exit code 0
      process.exitCode = error.exitCode;
      return;
    }
    throw error;
  }
}

main().catch(reportCommandError);
