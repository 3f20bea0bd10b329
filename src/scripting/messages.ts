import type { Logger, LogLevel } from '../logging/logger.js';

/**
 * Message Bridge: carries script diagnostics to the host log
 *
 * Messages are queued and delivered in order after the current call into
 * the sandbox returns; callers never wait on the logger. Every line is
 * labelled with the plugin identity so interleaved output stays
 * attributable.
 */

/**
 * Message kinds emitted by the script-side API
 */
export type ScriptMessageKind =
    | 'output'
    | 'info'
    | 'warning'
    | 'error'
    | 'bad-syntax'
    | 'exception';

/**
 * Host log level for a script message kind
 *
 * Anything signalling a problem becomes a warning: it is never dropped and
 * never escalated to a host error.
 */
export function messageLevel(kind: ScriptMessageKind): LogLevel {
    switch (kind) {
        case 'error':
        case 'bad-syntax':
        case 'exception':
        case 'warning':
            return 'warning';
        default:
            return 'note';
    }
}

export function pluginLabel(identity: string): string {
    return `scripts::${identity}: `;
}

/**
 * Prefix the text and every line following an embedded newline
 */
export function prefixLines(label: string, text: string): string {
    return label + text.split('\n').join('\n' + label);
}

export class MessageBridge {
    private readonly label: string;
    private pending: Promise<void> = Promise.resolve();

    constructor(
        readonly identity: string,
        private readonly logger: Logger
    ) {
        this.label = pluginLabel(identity);
    }

    /**
     * Queue a script message (fire-and-forget)
     */
    send(text: string, kind: ScriptMessageKind): void {
        if (!text) return;

        const level = messageLevel(kind);
        this.pending = this.pending
            .then(() => this.log(text, level))
            .catch((err: unknown) => {
                process.emitWarning(`${this.label}failed to deliver message: ${String(err)}`);
            });
    }

    /**
     * Write a labelled event right away
     */
    log(text: string, level: LogLevel = 'note'): void {
        this.logger.write({
            text: prefixLines(this.label, text),
            level,
            source: this.identity,
        });
    }

    /**
     * Resolves once every queued message reached the logger
     */
    flush(): Promise<void> {
        return this.pending;
    }
}
