import { Command } from 'commander';
import { createInitCommand } from './commands/init.js';
import { createItemsCommand } from './commands/items.js';
import { createPluginsCommand } from './commands/plugins.js';
import { createRunCommand } from './commands/run.js';

export const VERSION = '0.3.0';

export function createCLI(): Command {
    const program = new Command('clipscript')
        .description('Script plugin host for clipboard item pipelines')
        .version(VERSION);

    program.addCommand(createInitCommand());
    program.addCommand(createPluginsCommand());
    program.addCommand(createItemsCommand());
    program.addCommand(createRunCommand());

    return program;
}
