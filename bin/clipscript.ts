#!/usr/bin/env node

import chalk from 'chalk';
import { createCLI } from '../src/cli/index.js';
import { errorMessage } from '../src/utils/errors.js';

const program = createCLI();

program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(chalk.red(`clipscript: ${errorMessage(err)}`));
    process.exit(1);
});
