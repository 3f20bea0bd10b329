import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { createItemModel, createItemRecord, itemText } from '../items/record.js';
import { SqliteItemSaver } from '../items/sqlite-saver.js';
import { Logger, type LogEvent } from '../logging/logger.js';
import { loadScriptEngine, type ScriptEngine } from '../scripting/engine.js';
import { PluginManager } from './manager.js';

let engine: ScriptEngine;
let root: string;
let events: LogEvent[];
let manager: PluginManager;

beforeAll(async (): Promise<void> => {
    engine = await loadScriptEngine();
});

beforeEach(async (): Promise<void> => {
    root = await mkdtemp(path.join(tmpdir(), 'clipscript-manager-'));
    events = [];
    manager = new PluginManager({
        engine,
        logger: new Logger({ level: 'debug', sinks: [{ write: (event) => events.push(event) }] }),
    });
});

afterEach(async (): Promise<void> => {
    manager.disposeAll();
    await rm(root, { recursive: true, force: true });
});

function tagScript(tag: string, formats: string[]): string {
    return `function createPlugin() {
        return {
            formatsToSave: ${JSON.stringify(formats)},
            transformItemData: function (data) {
                data['text/plain'] = str(data['text/plain']) + ' [${tag}]';
                return data;
            }
        };
    }`;
}

async function writeScripts(relDir: string, scripts: Record<string, string>): Promise<void> {
    const dir = path.join(root, relDir);
    await mkdir(dir, { recursive: true });
    for (const [name, text] of Object.entries(scripts)) {
        await writeFile(path.join(dir, name), text, 'utf-8');
    }
}

describe('PluginManager', (): void => {
    it('loads scripts in identity order and skips failures', async (): Promise<void> => {
        await writeScripts('scripts', {
            'b.js': tagScript('b', ['text/html', 'text/plain']),
            'a.js': tagScript('a', ['text/plain']),
            'broken.js': 'function (',
            'notes.txt': 'not a script',
        });

        const loaded = await manager.loadAll(['scripts'], root);

        expect(loaded.map((plugin) => plugin.identity())).toEqual(['a', 'b']);
        expect(manager.size).toBe(2);
        expect(manager.get('broken')).toBeUndefined();
        expect(events.filter((event) => event.source === 'broken')).toHaveLength(1);
    });

    it('merges requested formats without duplicates', async (): Promise<void> => {
        await writeScripts('scripts', {
            'a.js': tagScript('a', ['text/plain']),
            'b.js': tagScript('b', ['text/html', 'text/plain']),
        });
        await manager.loadAll(['scripts'], root);

        expect(manager.formatsToSave()).toEqual(['text/plain', 'text/html']);
    });

    it('folds every plugin around the built-in saver', async (): Promise<void> => {
        await writeScripts('scripts', {
            'a.js': tagScript('a', []),
            'b.js': tagScript('b', []),
        });
        await manager.loadAll(['scripts'], root);
        const storage = new SqliteItemSaver(':memory:');
        const itemData = createItemRecord({ 'text/plain': 'x' });

        manager.wrapSaver(storage).transformItemData(createItemModel('clipboard'), itemData);

        expect(itemText(itemData)).toBe('x [a] [b]');
        storage.close();
    });

    it('skips install paths that do not exist', async (): Promise<void> => {
        const loaded = await manager.loadAll(['missing'], root);

        expect(loaded).toEqual([]);
        expect(events).toEqual([{
            text: `Plugin directory ${path.join(root, 'missing')} does not exist`,
            level: 'debug',
            source: 'host',
        }]);
    });

    it('replaces a plugin with the same identity', async (): Promise<void> => {
        await writeScripts('first', { 'dup.js': `({ name: 'First' })` });
        await writeScripts('second', { 'dup.js': `({ name: 'Second' })` });

        await manager.loadAll(['first', 'second'], root);

        expect(manager.size).toBe(1);
        expect(manager.get('dup')?.displayName()).toBe('Second');
        expect(events.map((event) => event.level)).toEqual(['warning']);
    });
});
