import { CacheConfig, LogLevel } from '../types/interfaces';
import { isBoolean, isIntegerAtLeast, isRecord, isStringArray } from './typeGuards';

const VALID_LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export type NumericKey = {
    [K in keyof CacheConfig]: CacheConfig[K] extends number ? K : never
}[keyof CacheConfig];

type BooleanKey = {
    [K in keyof CacheConfig]: CacheConfig[K] extends boolean ? K : never
}[keyof CacheConfig];

/** Minimum accepted value for each numeric setting. */
export const NUMERIC_MINIMUMS: Record<NumericKey, number> = {
    tickInterval: 1,
    maxTickInterval: 1,
    queueSizeThreshold: 0,
    idleCyclesBeforeSpeedup: 0,
    ttlFile: 0,
    ttlDirectory: 0,
    maxEntries: 1,
    sweepInterval: 1,
    maxBatchPerTick: 1,
    maxConcurrentJobs: 1,
    maxQueueLength: 1,
    maxFileSizeBytes: 0,
    sampleBytes: 1,
    debounceWindow: 0,
    notificationBatchWindow: 0,
};

export const NUMERIC_KEYS: NumericKey[] = [
    'tickInterval', 'maxTickInterval', 'queueSizeThreshold', 'idleCyclesBeforeSpeedup', 'ttlFile', 'ttlDirectory',
    'maxEntries', 'sweepInterval', 'maxBatchPerTick', 'maxConcurrentJobs', 'maxQueueLength', 'maxFileSizeBytes',
    'sampleBytes', 'debounceWindow', 'notificationBatchWindow',
];

export const BOOLEAN_KEYS: BooleanKey[] = ['enableFileCaching', 'enableDirectoryCaching', 'recursiveDirectories'];

export function isLogLevel(x: unknown): x is LogLevel {
    return typeof x === 'string' && (VALID_LOG_LEVELS as string[]).includes(x);
}

/**
 * Check a candidate configuration and return one message per problem.
 * An empty list means the candidate is usable as-is.
 */
export function validateConfig(candidate: unknown): string[] {
    if (!isRecord(candidate)) {
        return ['configuration must be an object'];
    }
    const problems: string[] = [];

    for (const key of NUMERIC_KEYS) {
        const min = NUMERIC_MINIMUMS[key];
        if (!isIntegerAtLeast(candidate[key], min)) {
            problems.push(`${key} must be an integer >= ${min}`);
        }
    }
    for (const key of BOOLEAN_KEYS) {
        if (!isBoolean(candidate[key])) {
            problems.push(`${key} must be a boolean`);
        }
    }
    if (typeof candidate.placeholderText !== 'string') {
        problems.push('placeholderText must be a string');
    }
    if (typeof candidate.encodingHint !== 'string' || candidate.encodingHint.trim() === '') {
        problems.push('encodingHint must be a non-empty string');
    }
    if (!isStringArray(candidate.includeExtensions)) {
        problems.push('includeExtensions must be an array of strings');
    }
    if (!isStringArray(candidate.excludePatterns)) {
        problems.push('excludePatterns must be an array of strings');
    }
    if (!isLogLevel(candidate.logLevel)) {
        problems.push(`logLevel must be one of ${VALID_LOG_LEVELS.join(', ')}`);
    }
    if (isIntegerAtLeast(candidate.tickInterval, 1) && isIntegerAtLeast(candidate.maxTickInterval, 1)
        && candidate.maxTickInterval < candidate.tickInterval) {
        problems.push('maxTickInterval must be >= tickInterval');
    }
    return problems;
}

// Runtime type guard to validate a plain object matches the CacheConfig shape
export function isCacheConfig(obj: unknown): obj is CacheConfig {
    return validateConfig(obj).length === 0;
}
