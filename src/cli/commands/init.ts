import { Command } from 'commander';
import { mkdir, writeFile, access } from 'node:fs/promises';
import path from 'node:path';
import chalk from 'chalk';
import { CONFIG_DIR, getConfigPath, getDefaultConfigYaml } from '../../config/loader.js';

const EXAMPLE_PLUGIN = `// Example clipscript plugin: trims surrounding whitespace from text items.
function createPlugin() {
    return {
        name: 'Trim text',
        author: 'clipscript',
        description: 'Removes leading and trailing whitespace from plain text',
        formatsToSave: ['text/plain'],
        transformItemData: function (data) {
            if (data['text/plain'] === undefined) return undefined;
            data['text/plain'] = str(data['text/plain']).trim();
            return data;
        },
    };
}
`;

async function exists(filePath: string): Promise<boolean> {
    try {
        await access(filePath);
        return true;
    } catch {
        return false;
    }
}

export function createInitCommand(): Command {
    return new Command('init')
        .description('Initialize clipscript configuration in the current project')
        .option('--example', 'Also write an example plugin script')
        .action(async (options: { example?: boolean }) => {
            console.log(chalk.bold.cyan('\n▶ Initializing clipscript\n'));

            const root = process.cwd();
            const scriptsDir = path.join(root, CONFIG_DIR, 'scripts');
            await mkdir(scriptsDir, { recursive: true });

            const configPath = getConfigPath(root);
            if (await exists(configPath)) {
                console.log(chalk.dim(`  ${path.relative(root, configPath)} already exists, left unchanged`));
            } else {
                await writeFile(configPath, getDefaultConfigYaml(), 'utf-8');
                console.log(chalk.green(`  ✓ Wrote ${path.relative(root, configPath)}`));
            }

            if (options.example) {
                const examplePath = path.join(scriptsDir, 'trim-text.js');
                if (!(await exists(examplePath))) {
                    await writeFile(examplePath, EXAMPLE_PLUGIN, 'utf-8');
                    console.log(chalk.green(`  ✓ Wrote ${path.relative(root, examplePath)}`));
                }
            }

            console.log(chalk.dim(`\n  Put plugin scripts in ${path.relative(root, scriptsDir)}/\n`));
        });
}
