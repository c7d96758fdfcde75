// src/cli/theme.ts

import chalk from 'chalk';

export const c = {
  title: chalk.bold.cyan,
  header: chalk.bold.white,
  group: chalk.green,
  sequence: chalk.yellow,
  error: chalk.red,
  warning: chalk.yellow,
  dim: chalk.dim,
  muted: chalk.gray,
};
