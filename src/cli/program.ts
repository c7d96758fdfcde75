// src/cli/program.ts - Commander program factory

import { Command, CommanderError } from 'commander';
import * as fs from 'fs/promises';

import { groupsCommand } from './commands/groups.js';
import { checkCommand } from './commands/check.js';

interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

async function readVersion(): Promise<string> {
  const pkgPath = new URL('../../package.json', import.meta.url);
  const pkg: unknown = JSON.parse(await fs.readFile(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export async function createProgram(repoPath: string = process.cwd()): Promise<Command> {
  const version = await readVersion();
  const program = new Command();

  program
    .name('graph-validator')
    .version(`graph-validator v${version}`, '-v, --version')
    .description('Inspect validation groups and sequences')
    .option('-c, --config <path>', 'Config file (default: .graph-validator/config.yml)')
    .option('--verbose', 'Show debug output')
    .exitOverride();

  program
    .command('groups')
    .description('Show the group chain a validation call would execute')
    .argument('[groups...]', 'Requested groups or sequences (default: Default)')
    .action(async (groups: string[]) => {
      const opts = program.opts<GlobalOptions>();
      await groupsCommand(repoPath, groups, { config: opts.config, verbose: opts.verbose });
    });

  program
    .command('check')
    .description('Check group and sequence definitions for unknown groups and cycles')
    .action(async () => {
      const opts = program.opts<GlobalOptions>();
      await checkCommand(repoPath, { config: opts.config, verbose: opts.verbose });
    });

  return program;
}

export { CommanderError };
