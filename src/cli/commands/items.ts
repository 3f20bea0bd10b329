import { Command } from 'commander';
import chalk from 'chalk';
import { createItemModel, createItemRecord, filterFormats, MIME_TEXT } from '../../items/record.js';
import { createHostContext, openItemSaver } from '../context.js';
import { renderError, renderItem } from '../ui/render.js';

export function createItemsCommand(): Command {
    const cmd = new Command('items')
        .description('Add, list and copy items through the plugin save pipeline');

    // ─── Add an item ───
    cmd.command('add')
        .description('Add a text item to a tab, letting plugins transform it first')
        .argument('<tab>', 'Tab name')
        .argument('<text...>', 'Item text')
        .option('-f, --format <mime>', 'Format to store the text under', MIME_TEXT)
        .option('--keep-all-formats', 'Store every format, not only those plugins ask for')
        .action(async (tab: string, words: string[], options: { format: string; keepAllFormats?: boolean }) => {
            const host = await createHostContext();
            await host.plugins.loadAll(host.config.plugins.installPaths, host.projectRoot);
            const store = openItemSaver(host);

            const rows = store.loadItems(tab);
            const model = createItemModel(tab, rows);
            const saver = host.plugins.wrapSaver(store);

            const itemData = createItemRecord({ [options.format]: words.join(' ') });
            saver.transformItemData(model, itemData);

            const formats = options.keepAllFormats ? [] : [options.format, ...host.plugins.formatsToSave()];
            const saved = saver.saveItems(tab, createItemModel(tab, [filterFormats(itemData, formats), ...rows]));

            store.close();
            await host.close();

            if (!saved) {
                renderError(`Failed to save tab "${tab}"`);
                process.exit(1);
            }
            console.log(chalk.green(`✓ Added item to "${tab}" (${itemData.size} format(s))`));
        });

    // ─── List items ───
    cmd.command('list')
        .description('Show the items stored in a tab')
        .argument('[tab]', 'Tab name (omit to list tabs)')
        .action(async (tab: string | undefined) => {
            const host = await createHostContext();
            const store = openItemSaver(host);

            if (!tab) {
                const tabs = store.tabs();
                console.log(tabs.length > 0 ? tabs.join('\n') : chalk.dim('No tabs yet.'));
            } else {
                const rows = store.loadItems(tab);
                if (rows.length === 0) {
                    console.log(chalk.dim(`Tab "${tab}" is empty.`));
                }
                rows.forEach((record, row) => renderItem(row, record));
            }

            store.close();
            await host.close();
        });

    // ─── Copy an item ───
    cmd.command('copy')
        .description('Duplicate an item at the top of its tab, through plugin copy hooks')
        .argument('<tab>', 'Tab name')
        .argument('<row>', 'Row of the item to copy')
        .action(async (tab: string, rowArg: string) => {
            const host = await createHostContext();
            await host.plugins.loadAll(host.config.plugins.installPaths, host.projectRoot);
            const store = openItemSaver(host);

            const rows = store.loadItems(tab);
            const row = Number.parseInt(rowArg, 10);
            const source = rows[row];
            if (!source) {
                store.close();
                await host.close();
                renderError(`Tab "${tab}" has no row ${rowArg}`);
                process.exit(1);
            }

            const model = createItemModel(tab, rows);
            const saver = host.plugins.wrapSaver(store);
            const copy = saver.copyItem(model, source);
            const saved = saver.saveItems(tab, createItemModel(tab, [copy, ...rows]));

            store.close();
            await host.close();

            if (!saved) {
                renderError(`Failed to save tab "${tab}"`);
                process.exit(1);
            }
            console.log(chalk.green(`✓ Copied row ${row} of "${tab}"`));
        });

    // ─── Remove items ───
    cmd.command('remove')
        .description('Remove items from a tab')
        .argument('<tab>', 'Tab name')
        .argument('<rows...>', 'Rows to remove')
        .action(async (tab: string, rowArgs: string[]) => {
            const host = await createHostContext();
            await host.plugins.loadAll(host.config.plugins.installPaths, host.projectRoot);
            const store = openItemSaver(host);
            const saver = host.plugins.wrapSaver(store);

            const selected = rowArgs.map((arg) => Number.parseInt(arg, 10));
            const check = saver.canRemoveItems(selected);
            if (!check.allowed) {
                store.close();
                await host.close();
                renderError(check.reason ?? 'Items cannot be removed');
                process.exit(1);
            }

            const rows = store.loadItems(tab);
            const kept = rows.filter((_record, row) => !selected.includes(row));
            saver.saveItems(tab, createItemModel(tab, kept));
            saver.itemsRemovedByUser(selected);

            store.close();
            await host.close();
            console.log(chalk.green(`✓ Removed ${rows.length - kept.length} item(s) from "${tab}"`));
        });

    return cmd;
}
