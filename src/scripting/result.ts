/**
 * Scripting: Result and fault types
 *
 * Every entry point into a sandbox converts script exceptions into a
 * `SandboxFault` at the boundary; nothing thrown inside QuickJS reaches
 * the host as a JavaScript exception.
 */

export type Result<T, E> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}

/**
 * A script exception converted to host data
 */
export interface SandboxFault {
    /** Error constructor name when the thrown value was an Error */
    name?: string;
    message: string;
    /** One-line text used in log events, e.g. `TypeError: x is not a function` */
    description: string;
}

/** Why a sandbox did not end up holding a handler object */
export type LoadError =
    | { kind: 'empty' }
    | { kind: 'exception'; fault: SandboxFault }
    | { kind: 'no-handler'; valueType: string };
