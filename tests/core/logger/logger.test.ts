import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Writable } from 'node:stream';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';

import { Logger } from '../../../src/core/logger/logger.js';
import { DEFAULT_LOGGER_CONFIG } from '../../../src/core/logger/types.js';
import { observer } from '../../../src/core/observer.js';
import type { EngineEvents } from '../../../src/core/observer.js';

/**
 * Writable that keeps every chunk as a string.
 */
function createSink() {

    const chunks: string[] = [];
    const stream = new Writable({
        write(chunk: Buffer | string, _encoding, callback) {

            chunks.push(chunk.toString());
            callback();

        },
    });

    return { stream, chunks };

}

/**
 * Read a JSON-lines file.
 */
function readEntries(filepath: string): Record<string, unknown>[] {

    return readFileSync(filepath, 'utf-8')
        .split('\n')
        .filter((line) => line.length > 0)
        .map((line): Record<string, unknown> => JSON.parse(line));

}

describe('logger: Logger class', () => {

    let testDir: string;
    let logger: Logger | null;

    beforeEach(() => {

        testDir = mkdtempSync(join(process.cwd(), 'tmp', 'engine-logger-test-'));
        logger = null;

    });

    afterEach(async () => {

        await logger?.stop();
        rmSync(testDir, { recursive: true, force: true });

    });

    describe('construction', () => {

        it('should create logger with default config', () => {

            logger = new Logger();

            expect(logger.level).toBe('info');
            expect(logger.isEnabled).toBe(true);
            expect(logger.state).toBe('idle');
            expect(logger.filepath).toBeNull();

        });

        it('should respect disabled config', () => {

            logger = new Logger({ config: { ...DEFAULT_LOGGER_CONFIG, enabled: false } });

            expect(logger.isEnabled).toBe(false);

        });

        it('should respect silent level', () => {

            logger = new Logger({ config: { level: 'silent' } });

            expect(logger.isEnabled).toBe(false);

        });

    });

    describe('start/stop', () => {

        it('should start and set state to running', () => {

            logger = new Logger();
            logger.start();

            expect(logger.state).toBe('running');

        });

        it('should not start if disabled', () => {

            logger = new Logger({ config: { enabled: false } });
            logger.start();

            expect(logger.state).toBe('idle');

        });

        it('should stop and set state to stopped', async () => {

            logger = new Logger();
            logger.start();
            await logger.stop();

            expect(logger.state).toBe('stopped');

        });

        it('should emit logger:started', () => {

            const events: unknown[] = [];
            const cleanup = observer.on('logger:started', (data) => events.push(data));

            logger = new Logger({ config: { level: 'warn' } });
            logger.start();
            cleanup();

            expect(events).toEqual([{ file: null, level: 'warn' }]);

        });

        it('should stop capturing events after stop', async () => {

            const sink = createSink();

            logger = new Logger({ console: sink.stream });
            logger.start();
            await logger.stop();

            observer.emit('option:changed', { name: 'Hash', kind: 'spin', value: '64' });

            expect(sink.chunks).toEqual([]);

        });

    });

    describe('console output', () => {

        it('should write a line for info events', () => {

            const sink = createSink();

            logger = new Logger({ console: sink.stream });
            logger.start();

            observer.emit('option:changed', { name: 'Hash', kind: 'spin', value: '64' });

            expect(sink.chunks).toHaveLength(1);
            expect(sink.chunks[0]).toMatch(/^\[\S+\] \[INFO \] \[option:changed\] Set Hash = 64\n$/);

        });

        it('should skip debug events at info level', () => {

            const sink = createSink();

            logger = new Logger({ console: sink.stream });
            logger.start();

            observer.emit('option:declared', { name: 'Hash', kind: 'spin', rank: 0 });

            expect(sink.chunks).toEqual([]);

        });

        it('should include data at verbose level', () => {

            const sink = createSink();

            logger = new Logger({ console: sink.stream, config: { level: 'verbose' } });
            logger.start();

            observer.emit('option:declared', { name: 'Hash', kind: 'spin', rank: 0 });

            expect(sink.chunks[0]).toMatch(
                /\[DEBUG\] \[option:declared\] Declared Hash \(spin, rank 0\) \{"name":"Hash","kind":"spin","rank":0\}\n$/,
            );

        });

        it('should write warnings for rejected writes at warn level', () => {

            const sink = createSink();

            logger = new Logger({ console: sink.stream, config: { level: 'warn' } });
            logger.start();

            observer.emit('option:changed', { name: 'Hash', kind: 'spin', value: '64' });
            observer.emit('option:rejected', { name: 'Hash', value: '0', reason: 'out-of-range' });

            expect(sink.chunks).toHaveLength(1);
            expect(sink.chunks[0]).toMatch(/\[WARN \] \[option:rejected\] Rejected '0' for Hash \(out-of-range\)\n$/);

        });

        it('should write direct messages', () => {

            const sink = createSink();

            logger = new Logger({ console: sink.stream });
            logger.start();

            logger.error('No such option: Hashh');
            logger.debug('hidden at info');

            expect(sink.chunks).toHaveLength(1);
            expect(sink.chunks[0]).toMatch(/^\[\S+\] \[ERROR\] No such option: Hashh\n$/);

        });

        it('should ignore direct messages before start', () => {

            const sink = createSink();

            logger = new Logger({ console: sink.stream });
            logger.info('too early');

            expect(sink.chunks).toEqual([]);

        });

    });

    describe('file output', () => {

        it('should write JSON entries to the configured file', async () => {

            const filepath = join(testDir, 'engine.log');

            logger = new Logger({ config: { file: filepath }, context: { session: 'test' } });
            logger.start();

            observer.emit('option:changed', { name: 'Threads', kind: 'spin', value: '4' });
            await logger.stop();

            const entries = readEntries(filepath);

            expect(entries).toHaveLength(1);
            expect(entries[0]).toMatchObject({
                level: 'info',
                event: 'option:changed',
                message: 'Set Threads = 4',
                context: { session: 'test' },
            });

        });

        it('should move output on redirect', async () => {

            const first = join(testDir, 'first.log');
            const second = join(testDir, 'second.log');

            logger = new Logger({ config: { file: first } });
            logger.start();

            observer.emit('option:changed', { name: 'Threads', kind: 'spin', value: '2' });
            logger.redirect(second);
            observer.emit('option:changed', { name: 'Threads', kind: 'spin', value: '3' });
            await logger.stop();

            expect(logger.filepath).toBe(second);
            expect(readEntries(first).map((e) => e['message'])).toEqual(['Set Threads = 2']);
            expect(readEntries(second).map((e) => e['message'])).toEqual(['Set Threads = 3']);

        });

        it('should open the redirected file on start', async () => {

            const filepath = join(testDir, 'late.log');

            logger = new Logger();
            logger.redirect(filepath);
            logger.start();

            observer.emit('option:reset', { count: 3 });
            await logger.stop();

            expect(readEntries(filepath).map((e) => e['message'])).toEqual(['Reset 3 options to defaults']);

        });

        it('should release previous files once they are flushed', async () => {

            logger = new Logger({ config: { file: join(testDir, 'first.log') } });
            logger.start();

            logger.redirect(join(testDir, 'second.log'));
            logger.redirect(join(testDir, 'third.log'));

            expect(logger.pendingCloses).toBe(2);

            await vi.waitFor(() => expect(logger?.pendingCloses).toBe(0));

        });

        it('should drop a file that cannot be opened and keep logging to the console', async () => {

            const sink = createSink();
            const filepath = join(testDir, 'missing', 'x.log');
            const errors: EngineEvents['error'][] = [];
            let cleanup = () => {};

            logger = new Logger({ console: sink.stream });
            logger.start();

            const reported = new Promise<void>((resolve) => {

                cleanup = observer.on('error', (data) => {

                    errors.push(data);
                    resolve();

                });

            });

            logger.redirect(filepath);
            observer.emit('option:changed', { name: 'Threads', kind: 'spin', value: '2' });

            await reported;
            cleanup();

            observer.emit('option:changed', { name: 'Threads', kind: 'spin', value: '3' });

            expect(errors).toHaveLength(1);
            expect(errors[0]?.source).toBe('logger');
            expect(errors[0]?.context).toEqual({ file: filepath });
            expect(sink.chunks).toHaveLength(3);
            expect(sink.chunks[0]).toMatch(/\[option:changed\] Set Threads = 2\n$/);
            expect(sink.chunks[1]).toMatch(/\[ERROR\] \[error\] Error in logger: ENOENT/);
            expect(sink.chunks[2]).toMatch(/\[option:changed\] Set Threads = 3\n$/);

        });

        it('should emit logger:redirected', () => {

            const events: unknown[] = [];
            const cleanup = observer.on('logger:redirected', (data) => events.push(data));

            logger = new Logger({ config: { file: join(testDir, 'a.log') } });
            logger.redirect(null);
            cleanup();

            expect(events).toEqual([{ file: null, previous: join(testDir, 'a.log') }]);

        });

    });

});
