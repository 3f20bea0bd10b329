import chalk from 'chalk';
import { itemText, MIME_TEXT } from '../../items/record.js';
import type { ItemRecord } from '../../items/types.js';
import type { PluginInfo } from '../../plugins/types.js';

/**
 * Render one plugin entry for `plugins list` / `plugins inspect`
 */
export function renderPlugin(info: PluginInfo): void {
    console.log(`  ${chalk.cyan.bold(info.name)} ${chalk.dim(`(${info.identity}, priority ${info.priority})`)}`);
    if (info.description) {
        console.log(`    ${info.description}`);
    }
    if (info.author) {
        console.log(chalk.dim(`    Author: ${info.author}`));
    }

    const parts: string[] = [];
    if (info.formatsToSave.length > 0) parts.push(`formats: ${info.formatsToSave.join(', ')}`);
    if (info.hooks.length > 0) parts.push(`hooks: ${info.hooks.join(', ')}`);
    if (parts.length > 0) {
        console.log(chalk.dim(`    Provides: ${parts.join(' │ ')}`));
    }
    console.log();
}

/**
 * Render an item as one line per format
 */
export function renderItem(row: number, record: ItemRecord): void {
    console.log(chalk.bold(`  #${row}`));
    for (const [format, payload] of record) {
        const preview = format.startsWith('text/') ? itemText(record, format) ?? '' : `${payload.length} bytes`;
        const line = preview.replace(/\n/g, '⏎');
        const truncated = line.length > 60 ? line.slice(0, 57) + '...' : line;
        const label = format === MIME_TEXT ? chalk.white(format) : chalk.dim(format);
        console.log(`    ${label}  ${truncated}`);
    }
}

export function renderError(message: string): void {
    console.error(chalk.red.bold(`  ✗ ${message}`));
}
