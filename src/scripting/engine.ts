import { getQuickJS, type QuickJSWASMModule } from 'quickjs-emscripten';

/**
 * Script engine: the QuickJS WebAssembly module
 *
 * Loaded once per process; every sandbox creates its own runtime from it.
 */
export type ScriptEngine = QuickJSWASMModule;

export interface SandboxLimits {
    /** Heap limit for one sandbox runtime (0 or unset = unlimited) */
    memoryLimitBytes?: number;
    /** Stack limit for one sandbox runtime (0 or unset = engine default) */
    maxStackSizeBytes?: number;
}

export function loadScriptEngine(): Promise<ScriptEngine> {
    return getQuickJS();
}
