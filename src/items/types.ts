/**
 * Item System: Types
 *
 * An item is one clipboard-style entry: an ordered mapping from MIME-like
 * format names to raw payloads. Savers persist tabs of items and may
 * rewrite item data on its way into a tab.
 */

/**
 * Format → payload mapping (insertion order is significant)
 */
export type ItemRecord = Map<string, Uint8Array>;

/**
 * Read-only view of a tab handed to savers
 */
export interface ItemModel {
    tabName: string;
    rows: readonly ItemRecord[];
}

export interface RemovalCheck {
    allowed: boolean;
    /** Why removal was refused */
    reason?: string;
}

/**
 * Persistence capability for a tab of items
 *
 * Implemented by the built-in SQLite saver and decorated by script
 * plugins (see `ScriptSaver`).
 */
export interface ItemSaver {
    /** Persist every row of the model under the tab name */
    saveItems(tabName: string, model: ItemModel): boolean;
    canRemoveItems(rows: readonly number[]): RemovalCheck;
    canMoveItems(rows: readonly number[]): boolean;
    itemsRemovedByUser(rows: readonly number[]): void;
    /** Produce the data for a duplicate of an item */
    copyItem(model: ItemModel, itemData: ItemRecord): ItemRecord;
    /** Rewrite item data in place before it enters the tab */
    transformItemData(model: ItemModel, itemData: ItemRecord): void;
}
