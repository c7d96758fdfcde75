// src/cli/commands/check.ts

import { toGroupDefinitions } from '../../config/validator-config.js';
import { ValidatorConfigLoader } from '../../config/validator-config-loader.js';
import { GroupChainGenerator } from '../../core/groups/group-chain-generator.js';
import { Logger, LogLevel } from '../../utils/logger.js';
import { c } from '../theme.js';
import { reportCommandError } from './report-error.js';

export interface CheckCommandOptions {
  config?: string;
  verbose?: boolean;
}

/**
 * Load the configuration and check its group and sequence definitions.
 * Sets a failing exit code when any definition is invalid.
 */
export async function checkCommand(
  repoPath: string,
  options: CheckCommandOptions = {}
): Promise<void> {
  try {
    const config = await new ValidatorConfigLoader(repoPath).load(options.config);
    Logger.setLevel(options.verbose ? LogLevel.DEBUG : Logger.parseLevel(config.logLevel));
    const definitions = toGroupDefinitions(config);
    const validation = new GroupChainGenerator(definitions).validateDefinitions();

    console.log(c.title('\nChecking group definitions\n'));
    console.log(`  ${c.header('Groups:')}    ${definitions.getGroupNames().join(', ')}`);
    console.log(`  ${c.header('Sequences:')} ${definitions.getSequenceNames().join(', ') || c.muted('none')}\n`);

    for (const warning of validation.warnings) {
      console.log(c.warning(`  ⚠️  ${warning}`));
    }
    for (const error of validation.errors) {
      console.log(c.error(`  ❌ ${error}`));
    }

    if (validation.valid) {
      console.log('\n✅ Group definitions are valid\n');
    } else {
      console.log('\n❌ Group definitions have errors\n');
      process.exitCode = 1;
    }
  } catch (error) {
    reportCommandError(error);
  }
}
