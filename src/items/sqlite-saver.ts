import Database from 'better-sqlite3';
import path from 'node:path';
import { mkdirSync } from 'node:fs';
import type { Logger } from '../logging/logger.js';
import { errorMessage } from '../utils/errors.js';
import { cloneItemRecord } from './record.js';
import type { ItemModel, ItemRecord, ItemSaver, RemovalCheck } from './types.js';

/**
 * SQLite Item Saver: the built-in persistence layer
 *
 * Tabs are stored as ordered rows of items; each item keeps its formats
 * in their original order. Script plugins decorate this saver, they never
 * replace it.
 */

interface ItemRow {
    id: number;
    position: number;
}

interface FormatRow {
    item_id: number;
    format: string;
    data: Buffer;
}

export interface AuditEvent {
    id: number;
    event_type: string;
    tab: string | null;
    details: string | null;
    created_at: string;
}

export class SqliteItemSaver implements ItemSaver {
    private db: Database.Database;

    constructor(dbPath: string, private readonly logger?: Logger) {
        if (dbPath !== ':memory:') {
            mkdirSync(path.dirname(dbPath), { recursive: true });
        }

        this.db = new Database(dbPath);
        if (dbPath !== ':memory:') {
            this.db.pragma('journal_mode = WAL');
        }
        this.db.pragma('foreign_keys = ON');

        this.migrate();
    }

    private migrate(): void {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS items (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                tab TEXT NOT NULL,
                position INTEGER NOT NULL,
                created_at DATETIME DEFAULT (datetime('now'))
            );

            CREATE TABLE IF NOT EXISTS item_formats (
                item_id INTEGER NOT NULL REFERENCES items(id) ON DELETE CASCADE,
                ordinal INTEGER NOT NULL,
                format TEXT NOT NULL,
                data BLOB NOT NULL,
                PRIMARY KEY (item_id, ordinal)
            );

            CREATE TABLE IF NOT EXISTS audit_events (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                event_type TEXT NOT NULL,
                tab TEXT,
                details TEXT,
                created_at DATETIME DEFAULT (datetime('now'))
            );

            CREATE INDEX IF NOT EXISTS idx_items_tab ON items(tab, position);
        `);
    }

    // ─── ItemSaver ─────────────────────────────────────────────

    /**
     * Replace the stored rows of a tab with the model's rows
     */
    saveItems(tabName: string, model: ItemModel): boolean {
        const deleteTab = this.db.prepare('DELETE FROM items WHERE tab = ?');
        const insertItem = this.db.prepare('INSERT INTO items (tab, position) VALUES (?, ?)');
        const insertFormat = this.db.prepare(
            'INSERT INTO item_formats (item_id, ordinal, format, data) VALUES (?, ?, ?, ?)'
        );

        const write = this.db.transaction((rows: readonly ItemRecord[]) => {
            deleteTab.run(tabName);
            rows.forEach((record, position) => {
                const itemId = insertItem.run(tabName, position).lastInsertRowid;
                let ordinal = 0;
                for (const [format, payload] of record) {
                    insertFormat.run(itemId, ordinal++, format, Buffer.from(payload));
                }
            });
        });

        try {
            write(model.rows);
            this.logAudit('items.saved', tabName, `${model.rows.length} item(s)`);
            return true;
        } catch (err) {
            this.logger?.error(`Failed to save tab "${tabName}": ${errorMessage(err)}`);
            return false;
        }
    }

    canRemoveItems(_rows: readonly number[]): RemovalCheck {
        return { allowed: true };
    }

    canMoveItems(_rows: readonly number[]): boolean {
        return true;
    }

    itemsRemovedByUser(rows: readonly number[]): void {
        this.logAudit('items.removed', null, JSON.stringify(rows));
    }

    copyItem(_model: ItemModel, itemData: ItemRecord): ItemRecord {
        return cloneItemRecord(itemData);
    }

    transformItemData(_model: ItemModel, _itemData: ItemRecord): void {
        // Stored as given.
    }

    // ─── Queries ─────────────────────────────────────────────

    /**
     * Rows of a tab in position order
     */
    loadItems(tabName: string): ItemRecord[] {
        const items = this.db
            .prepare<[string], ItemRow>('SELECT id, position FROM items WHERE tab = ? ORDER BY position')
            .all(tabName);
        const formats = this.db
            .prepare<[string], FormatRow>(`
                SELECT f.item_id, f.format, f.data
                FROM item_formats f
                JOIN items i ON i.id = f.item_id
                WHERE i.tab = ?
                ORDER BY f.item_id, f.ordinal
            `)
            .all(tabName);

        const byItem = new Map<number, ItemRecord>(items.map((row) => [row.id, new Map()]));
        for (const row of formats) {
            byItem.get(row.item_id)?.set(row.format, new Uint8Array(row.data));
        }
        return items.map((row) => byItem.get(row.id) ?? new Map());
    }

    tabs(): string[] {
        return this.db
            .prepare<[], { tab: string }>('SELECT DISTINCT tab FROM items ORDER BY tab')
            .all()
            .map((row) => row.tab);
    }

    auditLog(limit = 20): AuditEvent[] {
        return this.db
            .prepare<[number], AuditEvent>('SELECT * FROM audit_events ORDER BY id DESC LIMIT ?')
            .all(limit);
    }

    private logAudit(eventType: string, tab: string | null, details: string): void {
        this.db.prepare(`
            INSERT INTO audit_events (event_type, tab, details)
            VALUES (?, ?, ?)
        `).run(eventType, tab, details);
    }

    close(): void {
        this.db.close();
    }
}
