import type { ItemModel, ItemRecord } from './types.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const MIME_TEXT = 'text/plain';

/**
 * Build a record from format → text-or-bytes pairs, in key order
 */
export function createItemRecord(entries: Record<string, string | Uint8Array>): ItemRecord {
    const record: ItemRecord = new Map();
    for (const [format, payload] of Object.entries(entries)) {
        record.set(format, typeof payload === 'string' ? encoder.encode(payload) : Uint8Array.from(payload));
    }
    return record;
}

export function cloneItemRecord(record: ItemRecord): ItemRecord {
    const copy: ItemRecord = new Map();
    for (const [format, payload] of record) {
        copy.set(format, Uint8Array.from(payload));
    }
    return copy;
}

/**
 * Same formats in the same order with byte-equal payloads
 */
export function itemRecordsEqual(a: ItemRecord, b: ItemRecord): boolean {
    if (a.size !== b.size) return false;

    const left = Array.from(a);
    const right = Array.from(b);
    for (let i = 0; i < left.length; i++) {
        const [formatA, payloadA] = left[i];
        const [formatB, payloadB] = right[i];
        if (formatA !== formatB || payloadA.length !== payloadB.length) return false;
        for (let j = 0; j < payloadA.length; j++) {
            if (payloadA[j] !== payloadB[j]) return false;
        }
    }
    return true;
}

/**
 * Overwrite the contents of `target` with `source`, keeping the same Map
 */
export function replaceItemRecord(target: ItemRecord, source: ItemRecord): void {
    target.clear();
    for (const [format, payload] of source) {
        target.set(format, payload);
    }
}

export function itemText(record: ItemRecord, format = MIME_TEXT): string | undefined {
    const payload = record.get(format);
    return payload ? decoder.decode(payload) : undefined;
}

/**
 * Keep only the listed formats (all formats when the list is empty)
 */
export function filterFormats(record: ItemRecord, formats: readonly string[]): ItemRecord {
    if (formats.length === 0) return cloneItemRecord(record);

    const allowed = new Set(formats);
    const filtered: ItemRecord = new Map();
    for (const [format, payload] of record) {
        if (allowed.has(format)) filtered.set(format, Uint8Array.from(payload));
    }
    return filtered;
}

export function createItemModel(tabName: string, rows: readonly ItemRecord[] = []): ItemModel {
    return { tabName, rows };
}
