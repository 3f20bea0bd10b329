import { Command } from 'commander';
import chalk from 'chalk';
import { ScriptPluginLoader } from '../../plugins/script-loader.js';
import { createHostContext } from '../context.js';
import { renderError } from '../ui/render.js';

export function createRunCommand(): Command {
    return new Command('run')
        .description('Evaluate a script in a fresh per-item context and print its result')
        .argument('<file>', 'Path to the script')
        .option('-e, --eval <code>', 'Code to evaluate after the script')
        .action(async (file: string, options: { eval?: string }) => {
            const host = await createHostContext();
            const loader = await ScriptPluginLoader.open(file, {
                engine: host.engine,
                logger: host.logger,
                limits: host.config.sandbox,
            });

            const scriptable = loader.createItemScriptable();
            let result = scriptable.start();
            if (result.ok && options.eval) {
                result = scriptable.eval(options.eval);
            }

            scriptable.dispose();
            await loader.flushMessages();
            loader.dispose();
            await host.close();

            if (!result.ok) {
                renderError(result.error.description);
                process.exit(1);
            }
            if (result.value !== undefined) {
                console.log(chalk.white(JSON.stringify(result.value, null, 2)));
            }
        });
}
