import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ZodIssue } from 'zod';
import { isLogLevel } from '../logging/logger.js';
import { errorMessage } from '../utils/errors.js';
import { configSchema, type ClipscriptConfig } from './schema.js';

export const CONFIG_DIR = '.clipscript';
export const CONFIG_FILE = 'config.yaml';

export class ConfigError extends Error {
    constructor(
        message: string,
        readonly filePath: string,
        readonly issues: ZodIssue[] = []
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function getConfigPath(projectRoot: string): string {
    return path.join(projectRoot, CONFIG_DIR, CONFIG_FILE);
}

/**
 * Config Loader: reads `.clipscript/config.yaml`
 *
 * Precedence: environment (`CLIPSCRIPT_LOG_LEVEL`) > file > defaults.
 */
export class ConfigLoader {
    constructor(
        private readonly projectRoot: string = process.cwd(),
        private readonly env: NodeJS.ProcessEnv = process.env
    ) { }

    get configPath(): string {
        return getConfigPath(this.projectRoot);
    }

    async load(): Promise<ClipscriptConfig> {
        let raw: unknown = {};
        try {
            const content = await readFile(this.configPath, 'utf-8');
            raw = parseYaml(content) ?? {};
        } catch (err) {
            if (!isMissingFile(err)) {
                throw new ConfigError(`Cannot read ${this.configPath}: ${errorMessage(err)}`, this.configPath);
            }
        }

        const parsed = configSchema.safeParse(raw);
        if (!parsed.success) {
            const details = parsed.error.issues
                .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                .join('; ');
            throw new ConfigError(`Invalid config ${this.configPath}: ${details}`, this.configPath, parsed.error.issues);
        }

        const config = parsed.data;
        const envLevel = this.env['CLIPSCRIPT_LOG_LEVEL'];
        if (envLevel && isLogLevel(envLevel)) {
            config.logging.level = envLevel;
        }
        return config;
    }

    /**
     * Resolve a config path against the project root
     */
    resolve(relativePath: string): string {
        return path.resolve(this.projectRoot, relativePath);
    }
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Template written by `clipscript init`
 */
export function getDefaultConfigYaml(): string {
    return `# clipscript configuration

plugins:
  # Directories scanned for *.js plugin scripts
  installPaths:
    - .clipscript/scripts

storage:
  path: .clipscript/items.db

logging:
  # error | warning | note | debug
  level: note
  color: true
  # file: .clipscript/clipscript.log

sandbox:
  # Heap limit per script runtime (0 = unlimited)
  memoryLimitBytes: 67108864
  # Stack limit per script runtime (0 = engine default)
  maxStackSizeBytes: 0
`;
}
