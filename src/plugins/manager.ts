import { readdir, access } from 'node:fs/promises';
import path from 'node:path';
import type { ItemSaver } from '../items/types.js';
import type { Logger } from '../logging/logger.js';
import type { ScriptEngine, SandboxLimits } from '../scripting/engine.js';
import { createScriptPluginLoader, type ScriptPluginLoader } from './script-loader.js';

/**
 * Plugin Manager: discovers and holds script plugins
 *
 * Every `*.js` file in the configured install paths is opened as a
 * script plugin. Scripts that fail to load are logged by their loader and
 * left out. Loaders are kept in priority order (highest first), ties
 * broken by identity.
 *
 * Plugins are loaded from `.clipscript/scripts/` by default.
 */
export interface PluginManagerOptions {
    engine: ScriptEngine;
    logger: Logger;
    limits?: SandboxLimits;
}

export class PluginManager {
    private plugins: Map<string, ScriptPluginLoader> = new Map();

    constructor(private readonly options: PluginManagerOptions) { }

    /**
     * Load all plugins from configured install paths
     */
    async loadAll(installPaths: string[], projectRoot: string): Promise<ScriptPluginLoader[]> {
        this.disposeAll();

        for (const installPath of installPaths) {
            const absPath = path.resolve(projectRoot, installPath);
            await this.loadFromDirectory(absPath);
        }

        return this.list();
    }

    /**
     * Load plugins from a directory
     */
    private async loadFromDirectory(dirPath: string): Promise<void> {
        try {
            await access(dirPath);
        } catch {
            this.options.logger.debug(`Plugin directory ${dirPath} does not exist`);
            return;
        }

        const entries = await readdir(dirPath, { withFileTypes: true });
        const scripts = entries
            .filter((entry) => entry.isFile() && entry.name.endsWith('.js'))
            .map((entry) => entry.name)
            .sort();

        for (const name of scripts) {
            await this.loadPlugin(path.join(dirPath, name));
        }
    }

    /**
     * Load a single script plugin
     */
    async loadPlugin(filePath: string): Promise<ScriptPluginLoader | null> {
        const loader = await createScriptPluginLoader(filePath, this.options);
        if (!loader) return null;

        const id = loader.identity();
        const existing = this.plugins.get(id);
        if (existing) {
            this.options.logger.warn(
                `Plugin "${id}" from ${loader.source.path} replaces ${existing.source.path}`
            );
            existing.dispose();
        }

        this.plugins.set(id, loader);
        return loader;
    }

    /**
     * Loaded plugins, highest priority first
     */
    list(): ScriptPluginLoader[] {
        return Array.from(this.plugins.values()).sort((a, b) =>
            b.priority() - a.priority() || a.identity().localeCompare(b.identity())
        );
    }

    get(id: string): ScriptPluginLoader | undefined {
        return this.plugins.get(id);
    }

    get size(): number {
        return this.plugins.size;
    }

    /**
     * Formats requested by any plugin, in plugin order, without duplicates
     */
    formatsToSave(): string[] {
        const formats = new Set<string>();
        for (const plugin of this.list()) {
            for (const format of plugin.formatsToSave()) {
                formats.add(format);
            }
        }
        return Array.from(formats);
    }

    /**
     * Let every plugin wrap the saver in turn; the chain is rebuilt per call
     */
    wrapSaver(saver: ItemSaver): ItemSaver {
        return this.list().reduce<ItemSaver>((current, plugin) => plugin.wrapSaver(current), saver);
    }

    /**
     * Resolves once every plugin's queued messages reached the log
     */
    async flushMessages(): Promise<void> {
        await Promise.all(this.list().map((plugin) => plugin.flushMessages()));
    }

    disposeAll(): void {
        for (const plugin of this.plugins.values()) {
            plugin.dispose();
        }
        this.plugins.clear();
    }
}
