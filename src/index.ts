// clipscript: Public API Surface
export { createCLI } from './cli/index.js';
export { ConfigLoader, ConfigError, getDefaultConfigYaml } from './config/loader.js';
export { configSchema } from './config/schema.js';
export { Logger, consoleSink, fileSink } from './logging/logger.js';
export { SqliteItemSaver } from './items/sqlite-saver.js';
export {
    createItemRecord,
    cloneItemRecord,
    itemRecordsEqual,
    itemText,
    filterFormats,
    createItemModel,
} from './items/record.js';
export { loadScriptEngine } from './scripting/engine.js';
export { ScriptSandbox, ItemScriptable, SCRIPT_FACTORY_NAME } from './scripting/sandbox.js';
export { MessageBridge, messageLevel, prefixLines } from './scripting/messages.js';
export { PropertyResolver } from './scripting/resolver.js';
export { ScriptSaver, composeSaver } from './plugins/saver-chain.js';
export {
    ScriptPluginLoader,
    createScriptPluginLoader,
    pluginIdentity,
    SCRIPT_LOADER_PRIORITY,
} from './plugins/script-loader.js';
export { PluginManager } from './plugins/manager.js';

// Types
export type { ClipscriptConfig } from './config/schema.js';
export type { LogEvent, LogLevel, LogSink } from './logging/logger.js';
export type { ItemRecord, ItemModel, ItemSaver, RemovalCheck } from './items/types.js';
export type { ScriptEngine, SandboxLimits } from './scripting/engine.js';
export type { ScriptSource, SandboxOptions } from './scripting/sandbox.js';
export type { ScriptMessageKind } from './scripting/messages.js';
export type { Result, SandboxFault, LoadError } from './scripting/result.js';
export type { ItemHooks } from './plugins/saver-chain.js';
export type { ItemLoader, PluginInfo, PluginIcon } from './plugins/types.js';
