import type { QuickJSContext, QuickJSHandle } from 'quickjs-emscripten';
import { z } from 'zod';
import { errorMessage } from '../utils/errors.js';
import { ok, err, type Result, type SandboxFault } from './result.js';

/**
 * Property Resolver: reads optional members of a script object
 *
 * A member may be declared as a constant or as a zero-argument function;
 * callers get the value either way. Exceptions raised while reading or
 * calling are reported and the member counts as absent.
 */

const READ_MEMBER = `(function (object, name) {
    var member = object[name];
    if (typeof member === 'function') member = member.call(object);
    return member === undefined ? [false] : [true, member];
})`;

const PROBE_FUNCTION = `(function (object, name) {
    return typeof object[name] === 'function';
})`;

const DESCRIBE_TYPE = `(function (value) {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
})`;

export type ResolvedProperty =
    | { found: true; value: unknown }
    | { found: false };

export type FaultReporter = (fault: SandboxFault) => void;

const errorShape = z.object({
    name: z.string().optional(),
    message: z.string(),
});

/**
 * Convert a dumped exception value into a fault
 */
export function faultFromValue(thrown: unknown): SandboxFault {
    const parsed = errorShape.safeParse(thrown);
    if (parsed.success) {
        const { name, message } = parsed.data;
        return { name, message, description: name ? `${name}: ${message}` : message };
    }

    const message = thrown === undefined ? 'undefined' : errorMessage(thrown);
    return { message, description: message };
}

/**
 * Dump and release an exception handle
 */
export function consumeFault(vm: QuickJSContext, thrown: QuickJSHandle): SandboxFault {
    const value: unknown = vm.dump(thrown);
    thrown.dispose();
    return faultFromValue(value);
}

/**
 * Evaluate a host-owned helper function in the context
 */
export function compileHelper(vm: QuickJSContext, source: string, filename: string): QuickJSHandle {
    return vm.unwrapResult(vm.evalCode(source, filename));
}

/**
 * Call a function in the context; the returned handle belongs to the caller
 */
export function callGuarded(
    vm: QuickJSContext,
    fn: QuickJSHandle,
    thisArg: QuickJSHandle,
    ...args: QuickJSHandle[]
): Result<QuickJSHandle, SandboxFault> {
    const called = vm.callFunction(fn, thisArg, ...args);
    if (called.error) {
        return err(consumeFault(vm, called.error));
    }
    return ok(called.value);
}

export class PropertyResolver {
    private readonly readMember: QuickJSHandle;
    private readonly probeFunction: QuickJSHandle;
    private readonly describe: QuickJSHandle;

    constructor(
        private readonly vm: QuickJSContext,
        private readonly report: FaultReporter
    ) {
        this.readMember = compileHelper(vm, READ_MEMBER, 'host:read-member');
        this.probeFunction = compileHelper(vm, PROBE_FUNCTION, 'host:probe-function');
        this.describe = compileHelper(vm, DESCRIBE_TYPE, 'host:describe-type');
    }

    /**
     * Resolve `object[name]`, calling it when it is a function
     */
    resolve(object: QuickJSHandle, name: string): ResolvedProperty {
        const read = this.invoke(this.readMember, object, name);
        if (!read.ok) {
            this.report(read.error);
            return { found: false };
        }

        const entry = read.value;
        if (Array.isArray(entry) && entry[0] === true) {
            const value: unknown = entry[1];
            return { found: true, value };
        }
        return { found: false };
    }

    /**
     * Whether `object[name]` is callable (nothing is called)
     */
    hasFunction(object: QuickJSHandle, name: string): boolean {
        const probed = this.invoke(this.probeFunction, object, name);
        if (!probed.ok) {
            this.report(probed.error);
            return false;
        }
        return probed.value === true;
    }

    /**
     * `typeof`, with `null` and `array` told apart
     */
    typeOf(value: QuickJSHandle): string {
        const described = callGuarded(this.vm, this.describe, this.vm.undefined, value);
        if (!described.ok) return 'unknown';

        const type = this.vm.getString(described.value);
        described.value.dispose();
        return type;
    }

    dispose(): void {
        this.readMember.dispose();
        this.probeFunction.dispose();
        this.describe.dispose();
    }

    private invoke(helper: QuickJSHandle, object: QuickJSHandle, name: string): Result<unknown, SandboxFault> {
        const key = this.vm.newString(name);
        const called = callGuarded(this.vm, helper, this.vm.undefined, object, key);
        key.dispose();
        if (!called.ok) return called;

        const value: unknown = this.vm.dump(called.value);
        called.value.dispose();
        return ok(value);
    }
}
