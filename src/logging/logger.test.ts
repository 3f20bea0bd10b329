import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { Logger, consoleSink, fileSink, isLogLevel, type LogEvent } from './logger.js';

describe('Logger', (): void => {
    afterEach((): void => {
        vi.restoreAllMocks();
    });

    it('drops events finer than the threshold', (): void => {
        const events: LogEvent[] = [];
        const logger = new Logger({ level: 'warning', sinks: [{ write: (event) => events.push(event) }] });

        logger.note('not shown');
        logger.debug('not shown either');
        logger.warn('careful');
        logger.error('broken');

        expect(events).toEqual([
            { text: 'careful', level: 'warning', source: 'host' },
            { text: 'broken', level: 'error', source: 'host' },
        ]);
    });

    it('fans events out to every sink', (): void => {
        const first = vi.fn();
        const second = vi.fn();
        const logger = new Logger({ sinks: [{ write: first }, { write: second }] });

        logger.log('hello', 'note', 'plugin_a');

        expect(first).toHaveBeenCalledWith({ text: 'hello', level: 'note', source: 'plugin_a' });
        expect(second).toHaveBeenCalledWith({ text: 'hello', level: 'note', source: 'plugin_a' });
    });

    it('writes labelled lines to stderr', (): void => {
        const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

        consoleSink(false).write({ text: 'disk low', level: 'warning', source: 'host' });

        expect(write).toHaveBeenCalledWith('Warning: disk low\n');
    });

    it('appends timestamped lines to a log file in order', async (): Promise<void> => {
        const dir = await mkdtemp(path.join(tmpdir(), 'clipscript-log-'));
        const filePath = path.join(dir, 'logs', 'host.log');
        const sink = fileSink(filePath);

        sink.write({ text: 'first', level: 'note', source: 'host' });
        sink.write({ text: 'second', level: 'error', source: 'host' });
        await sink.flush();

        const lines = (await readFile(filePath, 'utf-8')).trimEnd().split('\n');
        expect(lines).toHaveLength(2);
        expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] Note: first$/);
        expect(lines[1]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] Error: second$/);

        await rm(dir, { recursive: true, force: true });
    });

    it('recognises log level names', (): void => {
        expect(isLogLevel('debug')).toBe(true);
        expect(isLogLevel('verbose')).toBe(false);
    });
});
