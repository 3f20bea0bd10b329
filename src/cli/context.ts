import { ConfigLoader } from '../config/loader.js';
import type { ClipscriptConfig } from '../config/schema.js';
import { SqliteItemSaver } from '../items/sqlite-saver.js';
import { Logger, consoleSink, fileSink, type LogSink } from '../logging/logger.js';
import { PluginManager } from '../plugins/manager.js';
import { loadScriptEngine, type ScriptEngine } from '../scripting/engine.js';

/**
 * Everything a CLI command needs, built from the project config
 */
export interface HostContext {
    projectRoot: string;
    config: ClipscriptConfig;
    logger: Logger;
    engine: ScriptEngine;
    plugins: PluginManager;
    /** Flush queued plugin messages and pending log writes, release sandboxes */
    close(): Promise<void>;
}

export async function createHostContext(projectRoot: string = process.cwd()): Promise<HostContext> {
    const configLoader = new ConfigLoader(projectRoot);
    const config = await configLoader.load();

    const sinks: LogSink[] = [consoleSink(config.logging.color)];
    const file = config.logging.file ? fileSink(configLoader.resolve(config.logging.file)) : null;
    if (file) sinks.push(file);
    const logger = new Logger({ level: config.logging.level, sinks });

    const engine = await loadScriptEngine();
    const plugins = new PluginManager({
        engine,
        logger,
        limits: config.sandbox,
    });

    return {
        projectRoot,
        config,
        logger,
        engine,
        plugins,
        async close() {
            await plugins.flushMessages();
            plugins.disposeAll();
            await file?.flush();
        },
    };
}

export function openItemSaver(host: HostContext): SqliteItemSaver {
    return new SqliteItemSaver(new ConfigLoader(host.projectRoot).resolve(host.config.storage.path), host.logger);
}
