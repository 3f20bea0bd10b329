import type { QuickJSContext, QuickJSHandle } from 'quickjs-emscripten';
import type { ItemRecord } from '../items/types.js';
import { callGuarded, compileHelper } from './resolver.js';
import { ok, type Result, type SandboxFault } from './result.js';

/**
 * Item marshaling between the host and a script context
 *
 * Into the script, an item is a plain object whose own properties are
 * `ArrayBuffer`s keyed by format. Back out, binary values keep their
 * bytes, strings become UTF-8 and any other non-null value is rendered
 * with `String()`. A result that is not a plain object is not an item.
 *
 * Payload bytes cross the boundary as array buffers in both directions;
 * they are never expanded into script values.
 */

const DEFINE_ENTRY = `(function (object, format, payload) {
    Object.defineProperty(object, format, {
        value: payload,
        writable: true,
        enumerable: true,
        configurable: true
    });
})`;

/** `[format, ArrayBuffer | string][]`, or undefined for a non-item */
const LIST_ENTRIES = `(function (data) {
    if (data === null || typeof data !== 'object' || Array.isArray(data)) return undefined;
    var entries = [];
    Object.keys(data).forEach(function (format) {
        var payload = data[format];
        if (payload instanceof ArrayBuffer) {
            entries.push([format, payload]);
        } else if (ArrayBuffer.isView(payload)) {
            var whole = payload.byteOffset === 0 && payload.byteLength === payload.buffer.byteLength;
            entries.push([format, whole
                ? payload.buffer
                : payload.buffer.slice(payload.byteOffset, payload.byteOffset + payload.byteLength)]);
        } else if (payload !== null && payload !== undefined) {
            entries.push([format, String(payload)]);
        }
    });
    return entries;
})`;

const encoder = new TextEncoder();

export class ItemMarshaler {
    private readonly defineEntry: QuickJSHandle;
    private readonly listEntries: QuickJSHandle;

    constructor(private readonly vm: QuickJSContext) {
        this.defineEntry = compileHelper(vm, DEFINE_ENTRY, 'host:item-define');
        this.listEntries = compileHelper(vm, LIST_ENTRIES, 'host:item-entries');
    }

    /**
     * New script object for the record; the caller owns the handle
     */
    toScript(record: ItemRecord): Result<QuickJSHandle, SandboxFault> {
        const object = this.vm.newObject();
        for (const [format, payload] of record) {
            const key = this.vm.newString(format);
            const buffer = this.vm.newArrayBuffer(payload.slice().buffer);
            const defined = callGuarded(this.vm, this.defineEntry, this.vm.undefined, object, key, buffer);
            buffer.dispose();
            key.dispose();

            if (!defined.ok) {
                object.dispose();
                return defined;
            }
            defined.value.dispose();
        }
        return ok(object);
    }

    /**
     * Read a script value back as a record (`null` when it is not one)
     */
    fromScript(value: QuickJSHandle): Result<ItemRecord | null, SandboxFault> {
        const listed = callGuarded(this.vm, this.listEntries, this.vm.undefined, value);
        if (!listed.ok) return listed;

        const record = this.readEntries(listed.value);
        listed.value.dispose();
        return ok(record);
    }

    dispose(): void {
        this.defineEntry.dispose();
        this.listEntries.dispose();
    }

    private readEntries(entries: QuickJSHandle): ItemRecord | null {
        if (this.vm.typeof(entries) !== 'object') return null;

        const lengthHandle = this.vm.getProp(entries, 'length');
        const length = this.vm.getNumber(lengthHandle);
        lengthHandle.dispose();

        const record: ItemRecord = new Map();
        for (let i = 0; i < length; i++) {
            const entry = this.vm.getProp(entries, i);
            const format = this.vm.getProp(entry, 0);
            const payload = this.vm.getProp(entry, 1);

            record.set(this.vm.getString(format), this.readPayload(payload));

            payload.dispose();
            format.dispose();
            entry.dispose();
        }
        return record;
    }

    private readPayload(payload: QuickJSHandle): Uint8Array {
        if (this.vm.typeof(payload) === 'string') {
            return encoder.encode(this.vm.getString(payload));
        }

        // View into the WASM heap; copied before the lifetime ends.
        const bytes = this.vm.getArrayBuffer(payload);
        const copy = bytes.value.slice();
        bytes.dispose();
        return copy;
    }
}
