// src/cli/commands/groups.ts

import { toGroupDefinitions } from '../../config/validator-config.js';
import { ValidatorConfigLoader } from '../../config/validator-config-loader.js';
import { DEFAULT_GROUP } from '../../core/groups/group.js';
import { GroupChainGenerator } from '../../core/groups/group-chain-generator.js';
import { Logger, LogLevel } from '../../utils/logger.js';
import { c } from '../theme.js';
import { reportCommandError } from './report-error.js';

export interface GroupsCommandOptions {
  config?: string;
  verbose?: boolean;
}

/**
 * Print the group chain a validation call with `groups` would execute.
 */
export async function groupsCommand(
  repoPath: string,
  groups: string[],
  options: GroupsCommandOptions = {}
): Promise<void> {
  try {
    const config = await new ValidatorConfigLoader(repoPath).load(options.config);
    Logger.setLevel(options.verbose ? LogLevel.DEBUG : Logger.parseLevel(config.logLevel));
    const generator = new GroupChainGenerator(toGroupDefinitions(config));
    const requested = groups.length > 0 ? groups : [DEFAULT_GROUP];
    const chain = generator.getGroupChainFor(requested).toArray();

    console.log(c.title(`\nGroup chain for ${requested.join(', ')}\n`));
    chain.forEach((group, i) => {
      const tag = group.sequence === undefined ? '' : c.sequence(`  (sequence: ${group.sequence})`);
      console.log(`  ${c.dim(`${i + 1}.`)} ${c.group(group.group)}${tag}`);
    });
    console.log('');
  } catch (error) {
    reportCommandError(error);
  }
}
