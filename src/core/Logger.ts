/**
 * Logger
 * Leveled logger used across the bot. Records go to a pluggable sink
 * (console by default) which is set once at startup and flushed on shutdown.
 * @module core/Logger
 */

import { logLevel } from '../config/bot.js';
// TYPES
export type LogLevel = 'debug' | 'info' | 'success' | 'warn' | 'error';

export type LogFields = Readonly<Record<string, unknown>>;

export interface LogRecord {
    timestamp: string;
    level: LogLevel;
    category: string;
    message: string;
    fields?: LogFields;
}

/**
 * Destination for log records
 */
export interface LogSink {
    write(record: LogRecord): void;
    flush?(): Promise<void>;
}
// CONSTANTS
const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    success: 20,
    warn: 30,
    error: 40,
};
// CONSOLE SINK
/**
 * Writes one line per record: `[ts] [LEVEL] [category] message {fields}`
 */
export class ConsoleSink implements LogSink {
    write(record: LogRecord): void {
        const line = formatRecord(record);

        switch (record.level) {
            case 'error':
                console.error(line);
                break;
            case 'warn':
                console.warn(line);
                break;
            case 'debug':
                console.debug(line);
                break;
            case 'info':
            case 'success':
                console.log(line);
                break;
        }
    }
}

export function formatRecord(record: LogRecord): string {
    const head = `[${record.timestamp}] [${record.level.toUpperCase()}] [${record.category}] ${record.message}`;
    return record.fields ? `${head} ${JSON.stringify(record.fields)}` : head;
}
// LOGGER CLASS
class Logger {
    private sink: LogSink;
    private threshold: LogLevel;
    private dropped = 0;

    constructor(sink: LogSink = new ConsoleSink(), level: LogLevel = 'info') {
        this.sink = sink;
        this.threshold = level;
    }

    setSink(sink: LogSink): void {
        this.sink = sink;
    }

    setLevel(level: LogLevel): void {
        this.threshold = level;
    }

    /**
     * Records lost because the sink threw
     */
    get droppedRecords(): number {
        return this.dropped;
    }

    debug(category: string, message: string, fields?: LogFields): void {
        this.log('debug', category, message, fields);
    }

    info(category: string, message: string, fields?: LogFields): void {
        this.log('info', category, message, fields);
    }

    success(category: string, message: string, fields?: LogFields): void {
        this.log('success', category, message, fields);
    }

    warn(category: string, message: string, fields?: LogFields): void {
        this.log('warn', category, message, fields);
    }

    error(category: string, message: string, fields?: LogFields): void {
        this.log('error', category, message, fields);
    }

    /**
     * Flush the sink on shutdown
     */
    async flush(): Promise<void> {
        await this.sink.flush?.();
    }

    private log(level: LogLevel, category: string, message: string, fields?: LogFields): void {
        if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.threshold]) return;

        const record: LogRecord = {
            timestamp: new Date().toISOString(),
            level,
            category,
            message,
            ...(fields ? { fields } : {}),
        };

        // A broken sink must never take the caller down with it
        try {
            this.sink.write(record);
        } catch {
            this.dropped++;
        }
    }
}

// Export singleton and class
const logger = new Logger(new ConsoleSink(), logLevel);

export { logger, Logger };
export default logger;
