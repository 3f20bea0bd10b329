import { describe, it, expect, beforeAll, afterEach, vi } from 'vitest';
import { createItemRecord, itemRecordsEqual, itemText } from '../items/record.js';
import { loadScriptEngine, type ScriptEngine } from './engine.js';
import { ItemScriptable, ScriptSandbox, type SandboxOptions } from './sandbox.js';

let engine: ScriptEngine;
const sandboxes: ScriptSandbox[] = [];

beforeAll(async (): Promise<void> => {
    engine = await loadScriptEngine();
});

afterEach((): void => {
    for (const sandbox of sandboxes.splice(0)) {
        sandbox.dispose();
    }
});

function sandboxFor(text: string, options: Partial<SandboxOptions> = {}): ScriptSandbox {
    const sandbox = new ScriptSandbox({ engine, ...options });
    sandboxes.push(sandbox);
    sandbox.load({ path: '/plugins/test.js', text });
    return sandbox;
}

describe('ScriptSandbox.load', (): void => {
    it('uses the object returned by createPlugin', (): void => {
        const sandbox = sandboxFor(`function createPlugin() { return { name: 'Factory' }; }`);

        expect(sandbox.isLoaded()).toBe(true);
        expect(sandbox.resolve('name')).toEqual({ found: true, value: 'Factory' });
    });

    it('falls back to an object completion value without a factory', (): void => {
        const sandbox = sandboxFor(`({ name: 'Completion' })`);

        expect(sandbox.isLoaded()).toBe(true);
        expect(sandbox.resolve('name')).toEqual({ found: true, value: 'Completion' });
    });

    it('leaves an empty script inert', (): void => {
        const sandbox = new ScriptSandbox({ engine });
        sandboxes.push(sandbox);

        expect(sandbox.load({ path: '/plugins/empty.js', text: '  \n' })).toEqual({ ok: false, error: { kind: 'empty' } });
        expect(sandbox.isLoaded()).toBe(false);
        expect(sandbox.resolve('name')).toEqual({ found: false });
    });

    it('returns syntax errors as exceptions', (): void => {
        const sandbox = new ScriptSandbox({ engine });
        sandboxes.push(sandbox);

        const loaded = sandbox.load({ path: '/plugins/broken.js', text: 'function createPlugin( {' });

        expect(loaded.ok).toBe(false);
        if (loaded.ok) return;
        expect(loaded.error.kind).toBe('exception');
        if (loaded.error.kind !== 'exception') return;
        expect(loaded.error.fault.name).toBe('SyntaxError');
        expect(sandbox.isLoaded()).toBe(false);
    });

    it('returns an exception thrown by the factory', (): void => {
        const sandbox = new ScriptSandbox({ engine });
        sandboxes.push(sandbox);

        const loaded = sandbox.load({
            path: '/plugins/throws.js',
            text: `function createPlugin() { throw new Error('factory failed'); }`,
        });

        expect(loaded).toEqual({
            ok: false,
            error: {
                kind: 'exception',
                fault: { name: 'Error', message: 'factory failed', description: 'Error: factory failed' },
            },
        });
        expect(sandbox.isLoaded()).toBe(false);
    });

    it('refuses a primitive returned by the factory', (): void => {
        const sandbox = new ScriptSandbox({ engine });
        sandboxes.push(sandbox);

        const loaded = sandbox.load({ path: '/plugins/number.js', text: `function createPlugin() { return 42; }` });

        expect(loaded).toEqual({ ok: false, error: { kind: 'no-handler', valueType: 'number' } });
        expect(sandbox.isLoaded()).toBe(false);
    });

    it('refuses a script that yields no object at all', (): void => {
        const sandbox = new ScriptSandbox({ engine });
        sandboxes.push(sandbox);

        const loaded = sandbox.load({ path: '/plugins/plain.js', text: `var total = 1 + 1;` });

        expect(loaded).toEqual({ ok: false, error: { kind: 'no-handler', valueType: 'undefined' } });
    });

    it('loads only once', (): void => {
        const sandbox = sandboxFor(`({})`);
        expect(() => sandbox.load({ path: '/plugins/test.js', text: '({})' })).toThrow(/already loaded/);
    });
});

describe('ScriptSandbox.applyHook', (): void => {
    const upperCase = `function createPlugin() {
        return {
            transformItemData: function (data) {
                data['text/plain'] = str(data['text/plain']).toUpperCase();
                return data;
            },
            copyItem: function (data) { return undefined; },
            broken: function (data) { throw new Error('bad data'); }
        };
    }`;

    it('replaces the record with the hook result', (): void => {
        const sandbox = sandboxFor(upperCase);

        const result = sandbox.applyHook('transformItemData', createItemRecord({
            'text/plain': 'abc',
            'text/html': '<b>abc</b>',
        }));

        expect(result).not.toBeNull();
        expect(itemRecordsEqual(result ?? new Map(), createItemRecord({
            'text/plain': 'ABC',
            'text/html': '<b>abc</b>',
        }))).toBe(true);
    });

    it('decodes UTF-8 payloads with str()', (): void => {
        const sandbox = sandboxFor(upperCase);

        const result = sandbox.applyHook('transformItemData', createItemRecord({ 'text/plain': 'grün' }));

        expect(itemText(result ?? new Map())).toBe('GRÜN');
    });

    it('gives null for an undefined result or a missing hook', (): void => {
        const onFault = vi.fn();
        const sandbox = sandboxFor(upperCase, { onFault });
        const record = createItemRecord({ 'text/plain': 'abc' });

        expect(sandbox.applyHook('copyItem', record)).toBeNull();
        expect(sandbox.applyHook('missing', record)).toBeNull();
        expect(onFault).not.toHaveBeenCalled();
    });

    it('reports a throwing hook once and gives null', (): void => {
        const onFault = vi.fn();
        const sandbox = sandboxFor(upperCase, { onFault });

        expect(sandbox.applyHook('broken', createItemRecord({ 'text/plain': 'abc' }))).toBeNull();
        expect(onFault).toHaveBeenCalledTimes(1);
        expect(onFault).toHaveBeenCalledWith(expect.objectContaining({ description: 'Error: bad data' }));
    });
});

describe('ScriptSandbox host API', (): void => {
    it('routes print and console output to the message callback', (): void => {
        const onMessage = vi.fn();
        sandboxFor(`
            print('loading', 1, { a: true });
            console.warn('careful');
            console.error('failed');
            ({})
        `, { onMessage });

        expect(onMessage.mock.calls).toEqual([
            ['loading 1 {"a":true}', 'output'],
            ['careful', 'warning'],
            ['failed', 'error'],
        ]);
    });
});

describe('ItemScriptable', (): void => {
    const counter = `var counter = 0;
        function createPlugin() {
            return { bump: function () { counter += 1; return counter; } };
        }`;

    it('runs the source again in a context of its own', (): void => {
        const sandbox = sandboxFor(counter);
        const scriptable = new ItemScriptable({ path: '/plugins/counter.js', text: counter }, { engine });

        expect(sandbox.resolve('bump')).toEqual({ found: true, value: 1 });

        expect(scriptable.start()).toEqual({ ok: true, value: undefined });
        expect(scriptable.eval('counter')).toEqual({ ok: true, value: 0 });

        expect(scriptable.eval('counter = 10')).toEqual({ ok: true, value: 10 });
        expect(sandbox.resolve('bump')).toEqual({ found: true, value: 2 });

        scriptable.dispose();
    });

    it('returns evaluation faults instead of reporting them', (): void => {
        const onFault = vi.fn();
        const scriptable = new ItemScriptable({ path: '/plugins/counter.js', text: counter }, { engine, onFault });
        scriptable.start();

        const result = scriptable.eval(`throw new RangeError('out of range')`);

        expect(result).toEqual({
            ok: false,
            error: { name: 'RangeError', message: 'out of range', description: 'RangeError: out of range' },
        });
        expect(onFault).not.toHaveBeenCalled();
        scriptable.dispose();
    });

    it('cannot be started twice', (): void => {
        const scriptable = new ItemScriptable({ path: '/plugins/counter.js', text: counter }, { engine });
        scriptable.start();

        expect(() => scriptable.start()).toThrow(/already started/);
        scriptable.dispose();
    });
});
