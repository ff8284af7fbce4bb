import { CacheConfig } from '../types/interfaces';
import { DEFAULT_CONFIG } from '../constants';
import { Diagnostics } from '../utils/diagnostics';
import { ConfigValidationError } from '../utils/errors';
import { isRecord, isStringArray } from '../utils/typeGuards';
import { BOOLEAN_KEYS, NUMERIC_KEYS, NUMERIC_MINIMUMS, isLogLevel, validateConfig } from '../utils/validateConfig';

/** Lowercase, strip a leading dot, reject anything path-like. */
export function normalizeExtension(ext: string): string | undefined {
    const trimmed = ext.trim().toLowerCase().replace(/^\./, '');
    if (!trimmed || !/^[a-z0-9_+-]+$/.test(trimmed)) {
        return undefined;
    }
    return trimmed;
}

export function normalizePattern(pattern: string): string {
    return pattern.replace(/\\/g, '/').trim();
}

function normalizeLists(cfg: CacheConfig): CacheConfig {
    const includeExtensions = Array.from(new Set(
        cfg.includeExtensions.map(normalizeExtension).filter((e): e is string => e !== undefined)
    ));
    const excludePatterns = Array.from(new Set(cfg.excludePatterns.map(normalizePattern).filter(Boolean)));
    return { ...cfg, includeExtensions, excludePatterns };
}

/**
 * Centralized configuration loading.
 *
 * `resolve` is the tolerant path used at construction: every invalid
 * override is reported and replaced by its default. `merge` is the strict
 * path behind `updateConfig`: any problem rejects the whole update.
 */
export class ConfigurationService {
    public static resolve(overrides: Partial<CacheConfig> | undefined, diagnostics: Diagnostics): CacheConfig {
        const merged: CacheConfig = { ...DEFAULT_CONFIG, ...(overrides || {}) };
        const snapshot: Record<string, unknown> = { ...merged };

        for (const key of NUMERIC_KEYS) {
            const value = snapshot[key];
            if (typeof value !== 'number' || !Number.isFinite(value) || value < NUMERIC_MINIMUMS[key]) {
                diagnostics.warn(`${key} is invalid or out of range. Coercing to ${DEFAULT_CONFIG[key]}.`);
                snapshot[key] = DEFAULT_CONFIG[key];
            } else if (!Number.isInteger(value)) {
                snapshot[key] = Math.floor(value);
            }
        }
        for (const key of BOOLEAN_KEYS) {
            if (typeof snapshot[key] !== 'boolean') {
                diagnostics.warn(`${key} is not a boolean. Coercing to ${String(DEFAULT_CONFIG[key])}.`);
                snapshot[key] = DEFAULT_CONFIG[key];
            }
        }
        if (typeof snapshot.placeholderText !== 'string') {
            diagnostics.warn('placeholderText must be a string. Using the default.');
            snapshot.placeholderText = DEFAULT_CONFIG.placeholderText;
        }
        if (typeof snapshot.encodingHint !== 'string' || snapshot.encodingHint.trim() === '') {
            diagnostics.warn('encodingHint must be a non-empty string. Using the default.');
            snapshot.encodingHint = DEFAULT_CONFIG.encodingHint;
        }
        if (!isStringArray(snapshot.includeExtensions)) {
            diagnostics.warn('includeExtensions must be an array of strings. Using the defaults.');
            snapshot.includeExtensions = DEFAULT_CONFIG.includeExtensions;
        }
        if (!isStringArray(snapshot.excludePatterns)) {
            diagnostics.warn('excludePatterns must be an array of strings. Using the defaults.');
            snapshot.excludePatterns = DEFAULT_CONFIG.excludePatterns;
        }
        if (!isLogLevel(snapshot.logLevel)) {
            diagnostics.warn(`logLevel '${String(snapshot.logLevel)}' is invalid. Coercing to 'info'.`);
            snapshot.logLevel = DEFAULT_CONFIG.logLevel;
        }
        if (typeof snapshot.maxTickInterval === 'number' && typeof snapshot.tickInterval === 'number'
            && snapshot.maxTickInterval < snapshot.tickInterval) {
            diagnostics.warn('maxTickInterval is below tickInterval. Raising it to tickInterval.');
            snapshot.maxTickInterval = snapshot.tickInterval;
        }

        const problems = validateConfig(snapshot);
        if (problems.length > 0) {
            // Only reachable if the defaults themselves are broken.
            throw new ConfigValidationError(problems);
        }
        return normalizeLists(ConfigurationService.assertConfig(snapshot));
    }

    /** Apply a partial update on top of `current`; throws instead of coercing. */
    public static merge(current: CacheConfig, update: unknown): CacheConfig {
        if (!isRecord(update)) {
            throw new ConfigValidationError(['configuration update must be an object']);
        }
        const candidate: Record<string, unknown> = { ...current, ...update };
        const problems = validateConfig(candidate);
        if (problems.length > 0) {
            throw new ConfigValidationError(problems);
        }
        return normalizeLists(ConfigurationService.assertConfig(candidate));
    }

    private static assertConfig(candidate: Record<string, unknown>): CacheConfig {
        const {
            tickInterval, maxTickInterval, queueSizeThreshold, idleCyclesBeforeSpeedup, ttlFile, ttlDirectory,
            maxEntries, sweepInterval, maxBatchPerTick, maxConcurrentJobs, maxQueueLength, maxFileSizeBytes,
            sampleBytes, debounceWindow, notificationBatchWindow, placeholderText, encodingHint, includeExtensions,
            excludePatterns, enableFileCaching, enableDirectoryCaching, recursiveDirectories, logLevel,
        } = candidate;
        if (
            typeof tickInterval !== 'number' || typeof maxTickInterval !== 'number'
            || typeof queueSizeThreshold !== 'number' || typeof idleCyclesBeforeSpeedup !== 'number'
            || typeof ttlFile !== 'number' || typeof ttlDirectory !== 'number'
            || typeof maxEntries !== 'number' || typeof sweepInterval !== 'number'
            || typeof maxBatchPerTick !== 'number' || typeof maxConcurrentJobs !== 'number'
            || typeof maxQueueLength !== 'number' || typeof maxFileSizeBytes !== 'number'
            || typeof sampleBytes !== 'number' || typeof debounceWindow !== 'number'
            || typeof notificationBatchWindow !== 'number'
            || typeof placeholderText !== 'string' || typeof encodingHint !== 'string'
            || !isStringArray(includeExtensions) || !isStringArray(excludePatterns)
            || typeof enableFileCaching !== 'boolean' || typeof enableDirectoryCaching !== 'boolean'
            || typeof recursiveDirectories !== 'boolean' || !isLogLevel(logLevel)
        ) {
            throw new ConfigValidationError(['configuration does not match the expected shape']);
        }
        return {
            tickInterval, maxTickInterval, queueSizeThreshold, idleCyclesBeforeSpeedup, ttlFile, ttlDirectory,
            maxEntries, sweepInterval, maxBatchPerTick, maxConcurrentJobs, maxQueueLength, maxFileSizeBytes,
            sampleBytes, debounceWindow, notificationBatchWindow, placeholderText, encodingHint,
            includeExtensions: [...includeExtensions], excludePatterns: [...excludePatterns],
            enableFileCaching, enableDirectoryCaching, recursiveDirectories, logLevel,
        };
    }
}

export default ConfigurationService;
