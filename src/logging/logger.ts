import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import chalk from 'chalk';

/**
 * Host logging
 *
 * Events carry the text, a severity and the identity of whoever produced
 * them ("host" or a plugin id). A `Logger` filters by threshold and fans
 * events out to its sinks.
 */

export type LogLevel = 'error' | 'warning' | 'note' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warning', 'note', 'debug'];

export interface LogEvent {
    text: string;
    level: LogLevel;
    /** Producer identity: `host` or a plugin identity */
    source: string;
}

export interface LogSink {
    write(event: LogEvent): void;
}

export interface LoggerOptions {
    /** Finest level still written (default: note) */
    level?: LogLevel;
    sinks?: LogSink[];
}

const SEVERITY: Record<LogLevel, number> = {
    error: 0,
    warning: 1,
    note: 2,
    debug: 3,
};

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

export class Logger {
    private level: LogLevel;
    private sinks: LogSink[];

    constructor(options: LoggerOptions = {}) {
        this.level = options.level ?? 'note';
        this.sinks = options.sinks ?? [consoleSink()];
    }

    /**
     * Whether events of this level pass the threshold
     */
    enabled(level: LogLevel): boolean {
        return SEVERITY[level] <= SEVERITY[this.level];
    }

    write(event: LogEvent): void {
        if (!this.enabled(event.level)) return;
        for (const sink of this.sinks) {
            sink.write(event);
        }
    }

    log(text: string, level: LogLevel = 'note', source = 'host'): void {
        this.write({ text, level, source });
    }

    error(text: string): void {
        this.log(text, 'error');
    }

    warn(text: string): void {
        this.log(text, 'warning');
    }

    note(text: string): void {
        this.log(text, 'note');
    }

    debug(text: string): void {
        this.log(text, 'debug');
    }
}

const LABELS: Record<LogLevel, string> = {
    error: 'Error',
    warning: 'Warning',
    note: 'Note',
    debug: 'Debug',
};

/**
 * Write events to stderr with a coloured severity label
 */
export function consoleSink(color = true): LogSink {
    const paint: Record<LogLevel, (text: string) => string> = color
        ? {
            error: chalk.red.bold,
            warning: chalk.yellow,
            note: chalk.cyan,
            debug: chalk.dim,
        }
        : { error: plain, warning: plain, note: plain, debug: plain };

    return {
        write(event) {
            process.stderr.write(`${paint[event.level](LABELS[event.level] + ':')} ${event.text}\n`);
        },
    };
}

function plain(text: string): string {
    return text;
}

/**
 * Append timestamped lines to a log file
 *
 * Writes are chained so lines land in the order they were logged.
 */
export function fileSink(filePath: string): LogSink & { flush(): Promise<void> } {
    let pending: Promise<void> = mkdir(path.dirname(filePath), { recursive: true }).then(() => undefined);

    return {
        write(event) {
            const line = `[${new Date().toISOString()}] ${LABELS[event.level]}: ${event.text}\n`;
            pending = pending
                .then(() => appendFile(filePath, line, 'utf-8'))
                .catch((err: unknown) => {
                    process.emitWarning(`Failed to write log file ${filePath}: ${String(err)}`);
                });
        },
        flush() {
            return pending;
        },
    };
}
