/**
 * Plugin System: Types
 *
 * An item loader contributes metadata and may decorate the saver the host
 * uses for a tab. Script plugins are one kind of loader: a single .js file
 * evaluated in its own sandbox.
 */
import type { ItemSaver } from '../items/types.js';
import type { ItemScriptable } from '../scripting/sandbox.js';

/** Symbolic icon names understood by the host UI */
export type PluginIcon = 'cog' | 'image' | 'text';

export interface ItemLoader {
    /** Higher-priority loaders are consulted first */
    priority(): number;
    /** Stable identifier derived from the plugin file */
    identity(): string;
    displayName(): string;
    author(): string;
    description(): string;
    icon(): PluginIcon;
    /** MIME-like formats the plugin wants stored with items */
    formatsToSave(): string[];
    /**
     * Decorate the active saver, or return it unchanged when there is
     * nothing to add
     */
    wrapSaver(saver: ItemSaver): ItemSaver;
    createItemScriptable(): ItemScriptable;
}

/**
 * Snapshot of a loaded plugin for listings
 */
export interface PluginInfo {
    identity: string;
    name: string;
    author: string;
    description: string;
    icon: PluginIcon;
    priority: number;
    formatsToSave: string[];
    /** Item hooks the script implements */
    hooks: string[];
    /** Absolute path to the script file */
    path: string;
}
