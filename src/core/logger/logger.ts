/**
 * Logger
 *
 * Event-driven logger. Subscribes to every observer event and writes
 * compact lines to a console stream and JSON entries to the debug log
 * file. The file can be moved at runtime, which is how the
 * `Debug Log File` option drives it.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ console: process.stderr, config: { level: 'info' } })
 * logger.start()
 *
 * declareEngineOptions(registry, { debugLog: logger })
 * registry.set('Debug Log File', 'engine.log') // entries now also go to engine.log
 * ```
 */
import { createWriteStream } from 'node:fs';
import type { Writable } from 'node:stream';
import ansis from 'ansis';

import { observer } from '../observer.js';
import type { LogTarget } from '../options/capabilities.js';
import { isLevelEnabled, shouldLog } from './classifier.js';
import { formatEntry, formatLine, serializeEntry } from './formatter.js';
import type { EntryLevel, LogLevel, LoggerConfig, LoggerState } from './types.js';
import { DEFAULT_LOGGER_CONFIG } from './types.js';

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {
    /** Logger configuration */
    config?: Partial<LoggerConfig>;

    /** Context to include with every file entry */
    context?: Record<string, unknown>;

    /** Console stream to write to (none by default) */
    console?: Writable;

    /** Colorize console level labels */
    color?: boolean;
}

const LEVEL_COLORS: Record<EntryLevel, (text: string) => string> = {
    error: (text) => ansis.red(text),
    warn: (text) => ansis.yellow(text),
    info: (text) => ansis.cyan(text),
    debug: (text) => ansis.gray(text),
};

interface EventPayload {
    event: string;
    data: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {

    return typeof value === 'object' && value !== null;

}

function isEventPayload(payload: unknown): payload is EventPayload {

    return isRecord(payload)
        && typeof payload['event'] === 'string'
        && isRecord(payload['data']);

}

/**
 * End a stream, resolving once its buffered writes are flushed.
 */
function endStream(stream: Writable): Promise<void> {

    return new Promise<void>((resolve) => {

        stream.end(() => resolve());

    });

}

/**
 * Logger that captures observer events and writes to streams.
 */
export class Logger implements LogTarget {

    #config: LoggerConfig;
    #context: Record<string, unknown>;
    #console: Writable | null;
    #color: boolean;
    #file: Writable | null = null;
    #closing = new Set<Promise<void>>();
    #state: LoggerState = 'idle';
    #unsubscribe: (() => void) | null = null;

    constructor(options: LoggerOptions = {}) {

        this.#config = { ...DEFAULT_LOGGER_CONFIG, ...options.config };
        this.#context = options.context ?? {};
        this.#console = options.console ?? null;
        this.#color = options.color ?? false;

    }

    /**
     * Get the current logger state.
     */
    get state(): LoggerState {

        return this.#state;

    }

    /**
     * Get the current log level.
     */
    get level(): LogLevel {

        return this.#config.level;

    }

    /**
     * Get the debug log file path, if any.
     */
    get filepath(): string | null {

        return this.#config.file;

    }

    /**
     * Check if logging is enabled.
     */
    get isEnabled(): boolean {

        return this.#config.enabled && this.#config.level !== 'silent';

    }

    /**
     * Number of previous debug log files still flushing.
     */
    get pendingCloses(): number {

        return this.#closing.size;

    }

    /**
     * Start the logger.
     *
     * Opens the debug log file (if configured) and begins capturing events.
     */
    start(): void {

        if (this.#state !== 'idle' || !this.isEnabled) {

            return;

        }

        this.#openFile();

        this.#unsubscribe = observer.on(/./, (payload: unknown) => {

            if (isEventPayload(payload)) {

                this.#handleEvent(payload.event, payload.data);

            }

        });

        this.#state = 'running';

        observer.emit('logger:started', {
            file: this.#config.file,
            level: this.#config.level,
        });

    }

    /**
     * Move file output to a new path, or close it with null.
     *
     * Takes effect immediately when running, or on start otherwise.
     */
    redirect(path: string | null): void {

        const previous = this.#config.file;

        if (this.#file) {

            this.#close(this.#file);
            this.#file = null;

        }

        this.#config.file = path;

        if (this.#state === 'running') {

            this.#openFile();

        }

        observer.emit('logger:redirected', { file: path, previous });

    }

    /**
     * Stop the logger.
     *
     * Unsubscribes from the observer and flushes the debug log file.
     */
    async stop(): Promise<void> {

        if (this.#state !== 'running') {

            return;

        }

        this.#state = 'flushing';

        if (this.#unsubscribe) {

            this.#unsubscribe();
            this.#unsubscribe = null;

        }

        if (this.#file) {

            this.#close(this.#file);
            this.#file = null;

        }

        await Promise.all(this.#closing);

        this.#state = 'stopped';

    }

    /**
     * Open the configured debug log file.
     *
     * A file that cannot be opened or written is dropped and reported
     * as an `error` event; console output carries on.
     */
    #openFile(): void {

        const filepath = this.#config.file;

        if (!filepath) {

            return;

        }

        const file = createWriteStream(filepath, { flags: 'a' });

        file.on('error', (error) => {

            if (this.#file === file) {

                this.#file = null;

            }

            observer.emit('error', {
                source: 'logger',
                error,
                context: { file: filepath },
            });

        });

        this.#file = file;

    }

    #close(stream: Writable): void {

        const closing: Promise<void> = endStream(stream).then(() => {

            this.#closing.delete(closing);

        });

        this.#closing.add(closing);

    }

    /**
     * Handle an observer event.
     */
    #handleEvent(event: string, data: Record<string, unknown>): void {

        // Skip logger's own events to avoid loops
        if (event.startsWith('logger:')) {

            return;

        }

        if (!shouldLog(event, this.#config.level)) {

            return;

        }

        const verbose = this.#config.level === 'verbose';
        const entry = formatEntry(event, data, this.#context, verbose);

        if (this.#file) {

            this.#file.write(serializeEntry(entry));

        }

        let message = `[${event}] ${entry.message}`;

        if (verbose && entry.data) {

            message += ` ${JSON.stringify(entry.data)}`;

        }

        this.#writeConsole(entry.timestamp, entry.level, message);

    }

    #writeConsole(timestamp: string, level: EntryLevel, message: string): void {

        if (!this.#console) {

            return;

        }

        const line = formatLine(timestamp, level, message);

        if (this.#color) {

            const label = `[${level.toUpperCase().padEnd(5)}]`;

            this.#console.write(line.replace(label, LEVEL_COLORS[level](label)));

            return;

        }

        this.#console.write(line);

    }

    // ─────────────────────────────────────────────────────────────
    // Direct logging methods
    // ─────────────────────────────────────────────────────────────

    /**
     * Log an info message directly.
     */
    info(message: string, data?: Record<string, unknown>): void {

        this.#log('info', message, data);

    }

    /**
     * Log a warning message directly.
     */
    warn(message: string, data?: Record<string, unknown>): void {

        this.#log('warn', message, data);

    }

    /**
     * Log an error message directly.
     */
    error(message: string, data?: Record<string, unknown>): void {

        this.#log('error', message, data);

    }

    /**
     * Log a debug message directly.
     */
    debug(message: string, data?: Record<string, unknown>): void {

        this.#log('debug', message, data);

    }

    #log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {

        if (!this.isEnabled || this.#state !== 'running') {

            return;

        }

        if (!isLevelEnabled(level, this.#config.level)) {

            return;

        }

        const timestamp = new Date().toISOString();
        let text = message;

        if (this.#config.level === 'verbose' && data && Object.keys(data).length > 0) {

            text += ` ${JSON.stringify(data)}`;

        }

        if (this.#file) {

            this.#file.write(serializeEntry({ timestamp, level, event: 'log', message: text }));

        }

        this.#writeConsole(timestamp, level, text);

    }

}
