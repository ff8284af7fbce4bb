/**
 * Diagnostics: level-filtered logging and timers for token-tally.
 *
 * Lines go to a `LogSink`; hosts hand in their own output channel, the
 * default writes to the console.
 */
import { LogLevel } from '../types/interfaces';

export interface LogSink {
    appendLine(line: string): void;
}

const PREFIX = '[token-tally]';

export const consoleSink: LogSink = {
    appendLine(line: string) {
        if (line.startsWith('[ERROR]')) {
            console.error(PREFIX, line);
        } else if (line.startsWith('[WARN]')) {
            console.warn(PREFIX, line);
        } else {
            console.info(PREFIX, line);
        }
    }
};

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export class Diagnostics {
    private sink: LogSink;
    private logLevel: LogLevel;

    constructor(logLevel: LogLevel = 'info', sink: LogSink = consoleSink) {
        this.sink = sink;
        this.logLevel = logLevel;
    }

    setLevel(level: LogLevel): void {
        this.logLevel = level;
    }

    debug(message: string, extra?: unknown) {
        this.write('debug', message, extra);
    }
    info(message: string, extra?: unknown) {
        this.write('info', message, extra);
    }
    warn(message: string, extra?: unknown) {
        this.write('warn', message, extra);
    }
    error(message: string, extra?: unknown) {
        this.write('error', message, extra);
    }

    private write(level: LogLevel, message: string, extra: unknown) {
        if (!this.shouldLog(level)) {
            return;
        }
        this.sink.appendLine(`[${level.toUpperCase()}] ${message}` + (extra !== undefined ? ` ${stringifyExtra(extra)}` : ''));
    }

    private shouldLog(level: LogLevel): boolean {
        return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
    }
}

function stringifyExtra(extra: unknown): string {
    if (extra instanceof Error) {
        return JSON.stringify(`${extra.name}: ${extra.message}`);
    }
    // JSON.stringify returns undefined for functions and symbols
    return JSON.stringify(extra) ?? String(extra);
}

export class Timer {
    private label: string;
    private startTime: number;
    private logger: Diagnostics;

    constructor(label: string, logger: Diagnostics) {
        this.label = label;
        this.logger = logger;
        this.startTime = Date.now();
    }
    stop(): number {
        const ms = Date.now() - this.startTime;
        this.logger.debug(`${this.label} took ${ms} ms`);
        return ms;
    }
}
