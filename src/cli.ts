#!/usr/bin/env node

/**
 * ledger-fmt CLI
 * Canonical formatting for ledger journals
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { formatFiles } from './format-files.js';

const program = new Command();

program
  .name('ledger-fmt')
  .description('Rewrite ledger journals with consistent indentation and aligned amounts')
  .version('1.0.0')
  .argument('[files...]', 'Ledger files to format (standard input when omitted)')
  .option('-i, --inplace', 'Rewrite the files instead of printing the result')
  .action((files: string[], options: { inplace?: boolean }) => {
    const inplace = options.inplace ?? false;
    const result = formatFiles(files, { inplace });

    if (inplace) {
      for (const entry of result.results) {
        if (entry.status === 'formatted') {
          console.log(chalk.green(`Formatted: ${entry.file}`));
        } else if (entry.status === 'unchanged') {
          console.log(chalk.gray(`Unchanged: ${entry.file}`));
        }
      }
    }

    if (!result.success) {
      result.errors.forEach(e => console.error(chalk.red(e)));
      process.exit(1);
    }
  });

program.parse();
