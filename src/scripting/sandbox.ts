import type { QuickJSContext, QuickJSHandle, QuickJSRuntime } from 'quickjs-emscripten';
import type { ItemRecord } from '../items/types.js';
import type { ScriptEngine, SandboxLimits } from './engine.js';
import { ItemMarshaler } from './marshal.js';
import type { ScriptMessageKind } from './messages.js';
import { PropertyResolver, callGuarded, consumeFault, type FaultReporter, type ResolvedProperty } from './resolver.js';
import { ok, err, type LoadError, type Result, type SandboxFault } from './result.js';

/**
 * Script Sandbox: one isolated QuickJS runtime per script
 *
 * A sandbox evaluates its script once and keeps the handler object the
 * script produced. Entry points never throw on script errors: faults are
 * handed to `onFault` (member resolution, hooks) or returned (load,
 * evaluate).
 */

/** Global function a script defines to build its handler object */
export const SCRIPT_FACTORY_NAME = 'createPlugin';

export interface ScriptSource {
    /** File the text was read from (used in stack traces) */
    path: string;
    text: string;
}

export interface SandboxOptions {
    engine: ScriptEngine;
    limits?: SandboxLimits;
    onFault?: FaultReporter;
    onMessage?: (text: string, kind: ScriptMessageKind) => void;
}

const CONSOLE_METHODS: ReadonlyArray<[string, ScriptMessageKind]> = [
    ['log', 'output'],
    ['info', 'info'],
    ['warn', 'warning'],
    ['error', 'error'],
];

/** UTF-8 decoding of item payloads for scripts */
const STR_FUNCTION = `function str(value) {
    if (value === undefined || value === null) return '';
    if (typeof value === 'string') return value;
    var bytes;
    if (value instanceof ArrayBuffer) {
        bytes = new Uint8Array(value);
    } else if (ArrayBuffer.isView(value)) {
        bytes = new Uint8Array(value.buffer, value.byteOffset, value.byteLength);
    } else {
        return String(value);
    }
    var binary = '';
    for (var i = 0; i < bytes.length; i++) binary += String.fromCharCode(bytes[i]);
    try {
        return decodeURIComponent(escape(binary));
    } catch (e) {
        return binary;
    }
}`;

export class ScriptSandbox {
    private readonly runtime: QuickJSRuntime;
    private readonly vm: QuickJSContext;
    private readonly resolver: PropertyResolver;
    private readonly marshaler: ItemMarshaler;
    private handler: QuickJSHandle | null = null;
    private attempted = false;
    private disposed = false;

    /**
     * Throws when the runtime cannot be bootstrapped, e.g. under a memory
     * limit too small for the host helpers.
     */
    constructor(private readonly options: SandboxOptions) {
        this.runtime = options.engine.newRuntime();
        const limits: SandboxLimits = options.limits ?? {};
        if (limits.memoryLimitBytes) this.runtime.setMemoryLimit(limits.memoryLimitBytes);
        if (limits.maxStackSizeBytes) this.runtime.setMaxStackSize(limits.maxStackSizeBytes);

        let vm: QuickJSContext | null = null;
        let resolver: PropertyResolver | null = null;
        let marshaler: ItemMarshaler | null = null;
        try {
            vm = this.runtime.newContext();
            resolver = new PropertyResolver(vm, (fault) => this.reportFault(fault));
            marshaler = new ItemMarshaler(vm);
            installHostApi(vm, options);
        } catch (error) {
            marshaler?.dispose();
            resolver?.dispose();
            vm?.dispose();
            this.runtime.dispose();
            throw error;
        }

        this.vm = vm;
        this.resolver = resolver;
        this.marshaler = marshaler;
    }

    /**
     * Evaluate the script and take its handler object
     *
     * The handler is what the global factory returns, or the script's
     * completion value when there is no factory. Either way it has to be
     * an object or a function.
     */
    load(source: ScriptSource): Result<void, LoadError> {
        if (this.attempted) {
            throw new Error(`Sandbox for ${source.path} was already loaded`);
        }
        this.attempted = true;

        if (source.text.trim() === '') {
            return err({ kind: 'empty' });
        }

        const evaluated = this.vm.evalCode(source.text, source.path);
        if (evaluated.error) {
            return err({ kind: 'exception', fault: consumeFault(this.vm, evaluated.error) });
        }

        const candidate = this.callFactory(evaluated.value);
        if (!candidate.ok) {
            return err({ kind: 'exception', fault: candidate.error });
        }

        const valueType = this.resolver.typeOf(candidate.value);
        if (valueType !== 'object' && valueType !== 'function' && valueType !== 'array') {
            candidate.value.dispose();
            return err({ kind: 'no-handler', valueType });
        }

        this.handler = candidate.value;
        return ok(undefined);
    }

    isLoaded(): boolean {
        return this.handler !== null;
    }

    /**
     * Resolve a handler member as a value or zero-argument call
     */
    resolve(name: string): ResolvedProperty {
        if (!this.handler) return { found: false };
        return this.resolver.resolve(this.handler, name);
    }

    hasFunction(name: string): boolean {
        if (!this.handler) return false;
        return this.resolver.hasFunction(this.handler, name);
    }

    /**
     * Run a handler hook on an item
     *
     * Returns the replacement record, or `null` when the hook is missing,
     * throws, or returns something that is not an item.
     */
    applyHook(name: string, record: ItemRecord): ItemRecord | null {
        if (!this.handler || !this.resolver.hasFunction(this.handler, name)) return null;

        const argument = this.marshaler.toScript(record);
        if (!argument.ok) {
            this.reportFault(argument.error);
            return null;
        }

        const hook = this.vm.getProp(this.handler, name);
        const called = callGuarded(this.vm, hook, this.handler, argument.value);
        hook.dispose();
        argument.value.dispose();

        if (!called.ok) {
            this.reportFault(called.error);
            return null;
        }

        const converted = this.marshaler.fromScript(called.value);
        called.value.dispose();
        if (!converted.ok) {
            this.reportFault(converted.error);
            return null;
        }
        return converted.value;
    }

    /**
     * Evaluate more code in this context and dump its completion value
     */
    evaluate(code: string, filename = 'eval.js'): Result<unknown, SandboxFault> {
        const evaluated = this.vm.evalCode(code, filename);
        if (evaluated.error) {
            return err(consumeFault(this.vm, evaluated.error));
        }

        const value: unknown = this.vm.dump(evaluated.value);
        evaluated.value.dispose();
        return ok(value);
    }

    dispose(): void {
        if (this.disposed) return;
        this.disposed = true;

        this.handler?.dispose();
        this.handler = null;
        this.resolver.dispose();
        this.marshaler.dispose();
        this.vm.dispose();
        this.runtime.dispose();
    }

    private callFactory(completion: QuickJSHandle): Result<QuickJSHandle, SandboxFault> {
        const factory = this.vm.getProp(this.vm.global, SCRIPT_FACTORY_NAME);
        if (this.vm.typeof(factory) !== 'function') {
            factory.dispose();
            return ok(completion);
        }

        completion.dispose();
        const called = callGuarded(this.vm, factory, this.vm.undefined);
        factory.dispose();
        return called;
    }

    private reportFault(fault: SandboxFault): void {
        this.options.onFault?.(fault);
    }
}

/**
 * `print`, `console.*` and `str` for scripts
 */
function installHostApi(vm: QuickJSContext, options: SandboxOptions): void {
    const print = newMessageFunction(vm, options, 'print', 'output');
    vm.setProp(vm.global, 'print', print);
    print.dispose();

    const consoleObject = vm.newObject();
    for (const [method, kind] of CONSOLE_METHODS) {
        const fn = newMessageFunction(vm, options, method, kind);
        vm.setProp(consoleObject, method, fn);
        fn.dispose();
    }
    vm.setProp(vm.global, 'console', consoleObject);
    consoleObject.dispose();

    vm.unwrapResult(vm.evalCode(STR_FUNCTION, 'host:str')).dispose();
}

function newMessageFunction(
    vm: QuickJSContext,
    options: SandboxOptions,
    name: string,
    kind: ScriptMessageKind
): QuickJSHandle {
    return vm.newFunction(name, (...args: QuickJSHandle[]) => {
        const text = args.map((arg) => display(vm, arg)).join(' ');
        options.onMessage?.(text, kind);
    });
}

function display(vm: QuickJSContext, value: QuickJSHandle): string {
    if (vm.typeof(value) === 'string') return vm.getString(value);

    const dumped: unknown = vm.dump(value);
    if (dumped === undefined) return 'undefined';
    return typeof dumped === 'string' ? dumped : JSON.stringify(dumped);
}

/**
 * Per-item scripting instance
 *
 * Re-evaluates a plugin's source in a sandbox of its own, so nothing the
 * script does here is visible to the plugin-level handler object (or the
 * other way round). Faults are returned to the caller, not logged.
 */
export class ItemScriptable {
    private sandbox: ScriptSandbox | null = null;

    constructor(
        readonly source: ScriptSource,
        private readonly options: SandboxOptions
    ) { }

    get started(): boolean {
        return this.sandbox !== null;
    }

    /**
     * Evaluate the script source; returns its completion value
     */
    start(): Result<unknown, SandboxFault> {
        if (this.sandbox) {
            throw new Error(`Item scriptable for ${this.source.path} was already started`);
        }
        this.sandbox = new ScriptSandbox(this.options);
        return this.sandbox.evaluate(this.source.text, this.source.path);
    }

    /**
     * Evaluate more code in the started context
     */
    eval(code: string): Result<unknown, SandboxFault> {
        if (!this.sandbox) {
            throw new Error('Item scriptable was not started');
        }
        return this.sandbox.evaluate(code);
    }

    dispose(): void {
        this.sandbox?.dispose();
        this.sandbox = null;
    }
}
