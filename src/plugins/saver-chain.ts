import type { ItemModel, ItemRecord, ItemSaver, RemovalCheck } from '../items/types.js';
import { replaceItemRecord } from '../items/record.js';

/**
 * Saver chain: script hooks layered over an existing saver
 *
 * The inner saver always runs first and its result stands unless the
 * script hook hands back a usable item. A missing, throwing or malformed
 * hook leaves the data exactly as the inner saver produced it.
 */

export const ITEM_HOOKS = ['copyItem', 'transformItemData'] as const;

export type ItemHookName = (typeof ITEM_HOOKS)[number];

/**
 * Item hooks a script handler may provide
 */
export interface ItemHooks {
    hasFunction(name: string): boolean;
    /** Replacement record, or null for "no change" */
    applyHook(name: ItemHookName, record: ItemRecord): ItemRecord | null;
}

export class ScriptSaver implements ItemSaver {
    constructor(
        private readonly inner: ItemSaver,
        private readonly hooks: ItemHooks
    ) { }

    saveItems(tabName: string, model: ItemModel): boolean {
        return this.inner.saveItems(tabName, model);
    }

    canRemoveItems(rows: readonly number[]): RemovalCheck {
        return this.inner.canRemoveItems(rows);
    }

    canMoveItems(rows: readonly number[]): boolean {
        return this.inner.canMoveItems(rows);
    }

    itemsRemovedByUser(rows: readonly number[]): void {
        this.inner.itemsRemovedByUser(rows);
    }

    copyItem(model: ItemModel, itemData: ItemRecord): ItemRecord {
        const copied = this.inner.copyItem(model, itemData);
        return this.hooks.applyHook('copyItem', copied) ?? copied;
    }

    transformItemData(model: ItemModel, itemData: ItemRecord): void {
        this.inner.transformItemData(model, itemData);

        const transformed = this.hooks.applyHook('transformItemData', itemData);
        if (transformed) {
            replaceItemRecord(itemData, transformed);
        }
    }
}

/**
 * Wrap `inner` only when the hooks implement an item hook
 */
export function composeSaver(inner: ItemSaver, hooks: ItemHooks): ItemSaver {
    const active = ITEM_HOOKS.some((name) => hooks.hasFunction(name));
    return active ? new ScriptSaver(inner, hooks) : inner;
}
