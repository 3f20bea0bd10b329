import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Logger, type LogEvent } from '../logging/logger.js';
import { createItemModel, createItemRecord, itemRecordsEqual } from './record.js';
import { SqliteItemSaver } from './sqlite-saver.js';

describe('SqliteItemSaver', (): void => {
    let saver: SqliteItemSaver;
    let events: LogEvent[];

    beforeEach((): void => {
        events = [];
        saver = new SqliteItemSaver(
            ':memory:',
            new Logger({ level: 'debug', sinks: [{ write: (event) => events.push(event) }] })
        );
    });

    afterEach((): void => {
        saver.close();
    });

    it('stores rows with their formats in order', (): void => {
        const rows = [
            createItemRecord({ 'text/plain': 'first', 'text/html': '<p>first</p>' }),
            createItemRecord({ 'image/png': new Uint8Array([0x89, 0x50, 0x4e, 0x47]) }),
        ];

        expect(saver.saveItems('clipboard', createItemModel('clipboard', rows))).toBe(true);

        const loaded = saver.loadItems('clipboard');
        expect(loaded).toHaveLength(2);
        expect(itemRecordsEqual(loaded[0], rows[0])).toBe(true);
        expect(itemRecordsEqual(loaded[1], rows[1])).toBe(true);
        expect(events).toEqual([]);
    });

    it('replaces the previous rows of a tab', (): void => {
        saver.saveItems('notes', createItemModel('notes', [createItemRecord({ 'text/plain': 'old' })]));
        saver.saveItems('notes', createItemModel('notes', [createItemRecord({ 'text/plain': 'new' })]));
        saver.saveItems('clipboard', createItemModel('clipboard', [createItemRecord({ 'text/plain': 'other' })]));

        const loaded = saver.loadItems('notes');
        expect(loaded).toHaveLength(1);
        expect(itemRecordsEqual(loaded[0], createItemRecord({ 'text/plain': 'new' }))).toBe(true);
        expect(saver.tabs()).toEqual(['clipboard', 'notes']);
    });

    it('copies items as independent records', (): void => {
        const original = createItemRecord({ 'text/plain': 'abc' });
        const copy = saver.copyItem(createItemModel('clipboard'), original);

        expect(copy).not.toBe(original);
        expect(itemRecordsEqual(copy, original)).toBe(true);
    });

    it('allows removal and moves, and audits removals', (): void => {
        expect(saver.canRemoveItems([0])).toEqual({ allowed: true });
        expect(saver.canMoveItems([0, 1])).toBe(true);

        saver.itemsRemovedByUser([0, 2]);

        const [latest] = saver.auditLog(1);
        expect(latest.event_type).toBe('items.removed');
        expect(latest.details).toBe('[0,2]');
        expect(latest.tab).toBeNull();
    });

    it('audits saves with the row count', (): void => {
        saver.saveItems('clipboard', createItemModel('clipboard', [createItemRecord({ 'text/plain': 'a' })]));

        expect(saver.auditLog().map((event) => [event.event_type, event.tab, event.details])).toEqual([
            ['items.saved', 'clipboard', '1 item(s)'],
        ]);
    });
});
