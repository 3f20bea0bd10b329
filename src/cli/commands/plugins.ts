import { Command } from 'commander';
import chalk from 'chalk';
import path from 'node:path';
import { cpSync, mkdirSync, rmSync, existsSync } from 'node:fs';
import { ConfigLoader } from '../../config/loader.js';
import { createScriptPluginLoader } from '../../plugins/script-loader.js';
import { createHostContext } from '../context.js';
import { renderError, renderPlugin } from '../ui/render.js';
import { Spinner } from '../ui/spinner.js';

export function createPluginsCommand(): Command {
    const cmd = new Command('plugins')
        .description('Manage script plugins');

    // ─── List plugins ───
    cmd.command('list')
        .description('List script plugins that loaded successfully')
        .action(async () => {
            const host = await createHostContext();
            const spinner = new Spinner();
            spinner.start('Loading plugins...');
            const plugins = await host.plugins.loadAll(host.config.plugins.installPaths, host.projectRoot);
            spinner.success(`Loaded ${plugins.length} plugin(s)`);

            if (plugins.length === 0) {
                console.log(chalk.dim('\nNo plugins loaded.'));
                console.log(chalk.dim(`Install a plugin script:\n  ${chalk.white('clipscript plugins install <file.js>')}\n`));
            } else {
                console.log(chalk.bold(`\n🔌 Script Plugins (${plugins.length})\n`));
                for (const plugin of plugins) {
                    renderPlugin(plugin.info());
                }

                const formats = host.plugins.formatsToSave();
                if (formats.length > 0) {
                    console.log(chalk.dim(`  Formats to save: ${formats.join(', ')}\n`));
                }
            }

            await host.close();
        });

    // ─── Inspect one script ───
    cmd.command('inspect')
        .description('Load a single script and show what it provides')
        .argument('<file>', 'Path to the plugin script')
        .action(async (file: string) => {
            const host = await createHostContext();
            const loader = await createScriptPluginLoader(file, {
                engine: host.engine,
                logger: host.logger,
                limits: host.config.sandbox,
            });

            if (!loader) {
                await host.close();
                renderError(`"${file}" did not load as a plugin`);
                process.exit(1);
            }

            console.log();
            renderPlugin(loader.info());
            await loader.flushMessages();
            loader.dispose();
            await host.close();
        });

    // ─── Install a plugin ───
    cmd.command('install')
        .description('Copy a plugin script into the first install path')
        .argument('<file>', 'Path to the plugin script')
        .action(async (sourcePath: string) => {
            const absSource = path.resolve(sourcePath);
            const configLoader = new ConfigLoader();
            const config = await configLoader.load();

            if (!absSource.endsWith('.js') || !existsSync(absSource)) {
                renderError(`Not a plugin script: ${sourcePath}`);
                process.exit(1);
            }

            const targetDir = configLoader.resolve(config.plugins.installPaths[0] ?? '.clipscript/scripts');
            const targetPath = path.join(targetDir, path.basename(absSource));

            mkdirSync(targetDir, { recursive: true });
            cpSync(absSource, targetPath);

            console.log(chalk.green(`✓ Plugin installed to ${path.relative(process.cwd(), targetPath)}`));
            console.log(chalk.dim('  It will be loaded automatically on next run.'));
        });

    // ─── Remove a plugin ───
    cmd.command('remove')
        .description('Remove an installed plugin script')
        .argument('<file>', 'Script file name, e.g. trim.js')
        .action(async (name: string) => {
            const configLoader = new ConfigLoader();
            const config = await configLoader.load();

            for (const installPath of config.plugins.installPaths) {
                const pluginPath = path.join(configLoader.resolve(installPath), name);
                if (existsSync(pluginPath)) {
                    rmSync(pluginPath, { force: true });
                    console.log(chalk.green(`✓ Plugin "${name}" removed`));
                    return;
                }
            }

            renderError(`Plugin "${name}" not found`);
            process.exit(1);
        });

    return cmd;
}
