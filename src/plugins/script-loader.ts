import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { ItemSaver } from '../items/types.js';
import type { Logger } from '../logging/logger.js';
import type { ScriptEngine, SandboxLimits } from '../scripting/engine.js';
import { MessageBridge } from '../scripting/messages.js';
import type { LoadError } from '../scripting/result.js';
import { ItemScriptable, ScriptSandbox, type ScriptSource } from '../scripting/sandbox.js';
import { errorMessage } from '../utils/errors.js';
import { ITEM_HOOKS, composeSaver } from './saver-chain.js';
import type { ItemLoader, PluginIcon, PluginInfo } from './types.js';

/**
 * Script Plugin Loader: one user script as an item loader
 *
 * The script is read and evaluated once, when the loader is opened. A
 * script that fails to load leaves the loader in a failed state: the host
 * skips it, nothing is thrown.
 *
 * Plugin scripts look like:
 *
 * ```js
 * function createPlugin() {
 *     return {
 *         name: 'Trim text',
 *         formatsToSave: ['text/plain'],
 *         transformItemData: function (data) {
 *             data['text/plain'] = str(data['text/plain']).trim();
 *             return data;
 *         },
 *     };
 * }
 * ```
 */

export const SCRIPT_LOADER_PRIORITY = 20;
export const SCRIPT_PLUGIN_ICON: PluginIcon = 'cog';

export type LoaderState = 'loaded' | 'failed';

export interface ScriptLoaderOptions {
    engine: ScriptEngine;
    logger: Logger;
    limits?: SandboxLimits;
}

/**
 * File name up to the first dot
 */
export function scriptBaseName(filePath: string): string {
    return path.basename(filePath).split('.')[0];
}

/**
 * Identifier safe for labels and lookups: [A-Za-z0-9_] only
 */
export function pluginIdentity(filePath: string): string {
    return scriptBaseName(filePath).replace(/[^A-Za-z0-9_]/g, '_');
}

export class ScriptPluginLoader implements ItemLoader {
    readonly state: LoaderState;
    private readonly baseName: string;
    private readonly id: string;
    private readonly bridge: MessageBridge;
    /** Null when the file could not be read or the runtime failed to start */
    private readonly sandbox: ScriptSandbox | null;

    private constructor(
        readonly source: ScriptSource,
        private readonly options: ScriptLoaderOptions,
        readError?: string
    ) {
        this.baseName = scriptBaseName(source.path);
        this.id = pluginIdentity(source.path);
        this.bridge = new MessageBridge(this.id, options.logger);

        if (readError !== undefined) {
            this.bridge.log(`Failed to open "${source.path}": ${readError}`, 'error');
            this.sandbox = null;
            this.state = 'failed';
            return;
        }

        this.sandbox = this.startSandbox();
        if (!this.sandbox) {
            this.state = 'failed';
            return;
        }

        const loaded = this.sandbox.load(source);
        if (!loaded.ok) {
            this.reportLoadError(loaded.error);
        }
        this.state = this.sandbox.isLoaded() ? 'loaded' : 'failed';
    }

    /**
     * Read and evaluate a script file
     */
    static async open(filePath: string, options: ScriptLoaderOptions): Promise<ScriptPluginLoader> {
        const absPath = path.resolve(filePath);
        let text: string;
        try {
            text = await readFile(absPath, 'utf-8');
        } catch (err) {
            return new ScriptPluginLoader({ path: absPath, text: '' }, options, errorMessage(err));
        }
        return new ScriptPluginLoader({ path: absPath, text }, options);
    }

    /**
     * True only if the script produced a handler object
     */
    isLoaded(): boolean {
        return this.state === 'loaded';
    }

    priority(): number {
        return SCRIPT_LOADER_PRIORITY;
    }

    identity(): string {
        return this.id;
    }

    displayName(): string {
        return this.stringValue('name', this.baseName);
    }

    author(): string {
        return this.stringValue('author');
    }

    description(): string {
        return this.stringValue('description');
    }

    icon(): PluginIcon {
        return SCRIPT_PLUGIN_ICON;
    }

    formatsToSave(): string[] {
        if (!this.sandbox) return [];
        const resolved = this.sandbox.resolve('formatsToSave');
        if (!resolved.found) return [];

        const { value } = resolved;
        if (typeof value === 'string') return [value];
        if (!Array.isArray(value)) return [];

        const formats: string[] = [];
        for (const entry of value) {
            const text = textOf(entry);
            if (text) formats.push(text);
        }
        return formats;
    }

    wrapSaver(saver: ItemSaver): ItemSaver {
        if (!this.isLoaded() || !this.sandbox) return saver;
        return composeSaver(saver, this.sandbox);
    }

    /**
     * Fresh per-item instance over the same source, in a runtime of its own
     *
     * Its faults are returned from `start()` and `eval()`, not logged here.
     */
    createItemScriptable(): ItemScriptable {
        return new ItemScriptable(this.source, {
            engine: this.options.engine,
            limits: this.options.limits,
            onMessage: (text, kind) => this.bridge.send(text, kind),
        });
    }

    /**
     * Item hooks the handler object implements
     */
    hooks(): string[] {
        const sandbox = this.sandbox;
        if (!sandbox) return [];
        return ITEM_HOOKS.filter((name) => sandbox.hasFunction(name));
    }

    info(): PluginInfo {
        return {
            identity: this.id,
            name: this.displayName(),
            author: this.author(),
            description: this.description(),
            icon: this.icon(),
            priority: this.priority(),
            formatsToSave: this.formatsToSave(),
            hooks: this.hooks(),
            path: this.source.path,
        };
    }

    /**
     * Resolves once queued script messages reached the log
     */
    flushMessages(): Promise<void> {
        return this.bridge.flush();
    }

    dispose(): void {
        this.sandbox?.dispose();
    }

    private stringValue(name: string, defaultValue = ''): string {
        if (!this.sandbox) return defaultValue;
        const resolved = this.sandbox.resolve(name);
        if (!resolved.found) return defaultValue;
        return textOf(resolved.value) || defaultValue;
    }

    /**
     * Sandbox for this script, or null (logged) when its runtime cannot start
     */
    private startSandbox(): ScriptSandbox | null {
        try {
            return new ScriptSandbox({
                engine: this.options.engine,
                limits: this.options.limits,
                onFault: (fault) => this.bridge.log(fault.description, 'warning'),
                onMessage: (text, kind) => this.bridge.send(text, kind),
            });
        } catch (err) {
            this.bridge.log(`Failed to start script sandbox: ${errorMessage(err)}`, 'error');
            return null;
        }
    }

    private reportLoadError(error: LoadError): void {
        switch (error.kind) {
            case 'empty':
                this.bridge.log('Script is empty', 'note');
                break;
            case 'exception':
                this.bridge.log(error.fault.description, 'warning');
                break;
            case 'no-handler':
                this.bridge.log(`Script did not produce a plugin object (got ${error.valueType})`, 'warning');
                break;
        }
    }
}

function textOf(value: unknown): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    if (typeof value === 'boolean') return String(value);
    return '';
}

/**
 * Open a script plugin; `null` when it failed to load
 */
export async function createScriptPluginLoader(
    filePath: string,
    options: ScriptLoaderOptions
): Promise<ScriptPluginLoader | null> {
    const loader = await ScriptPluginLoader.open(filePath, options);
    if (loader.isLoaded()) return loader;

    loader.dispose();
    return null;
}
