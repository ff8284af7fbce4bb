/**
 * Error classes for programmatic handling.
 *
 * Background paths never throw these: they travel inside a `ProcessResult`
 * or get logged. Only the administrative calls on `CountCache` throw
 * (`InvalidKeyError`, `ConfigValidationError`, `CacheDisposedError`).
 */

export class FileReadError extends Error {
    constructor(public filePath: string, message?: string) {
        super(message || `Failed to read file ${filePath}`);
        this.name = 'FileReadError';
    }
}

export class SizeLimitExceeded extends Error {
    constructor(public size: number, public limit: number, message?: string) {
        super(message || `Size ${size} exceeds limit ${limit}`);
        this.name = 'SizeLimitExceeded';
    }
}

export class ComputeError extends Error {
    constructor(public key: string, message?: string) {
        super(message || `Count computation failed for ${key}`);
        this.name = 'ComputeError';
    }
}

export class ConfigValidationError extends Error {
    constructor(public problems: string[], message?: string) {
        super(message || `Invalid configuration: ${problems.join('; ')}`);
        this.name = 'ConfigValidationError';
    }
}

export class InvalidKeyError extends Error {
    constructor(public key: string, message?: string) {
        super(message || `Invalid cache key: '${key}'`);
        this.name = 'InvalidKeyError';
    }
}

export class CacheDisposedError extends Error {
    constructor(public operation: string, message?: string) {
        super(message || `Cannot ${operation}: cache has been disposed`);
        this.name = 'CacheDisposedError';
    }
}

/** Coerce a thrown value into an Error without losing its message. */
export function toError(err: unknown): Error {
    if (err instanceof Error) {
        return err;
    }
    return new Error(typeof err === 'string' ? err : String(err));
}
