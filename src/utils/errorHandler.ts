import { Diagnostics } from './diagnostics';

export type ErrorReportLevel = 'warn' | 'error';

export interface ErrorReportOptions {
    level?: ErrorReportLevel;
}

function describeError(err: unknown): string {
    if (err instanceof Error) {
        return `${err.name}: ${err.message}`;
    }
    return String(err);
}

/** Write an error and its context to diagnostics. Never throws. */
export function reportError(err: unknown, context: string | undefined, diagnostics: Diagnostics, opts: ErrorReportOptions = {}): void {
    const details = describeError(err);
    const line = context ? `${context}: ${details}` : details;
    try {
        if (opts.level === 'warn') {
            diagnostics.warn(line);
        } else {
            diagnostics.error(line);
        }
    } catch (e) {
        console.error('reportError failed', e);
    }
}
