// Shared types and interfaces for token-tally

export type EntryKind = 'file' | 'directory';

export type EntryStatus = 'ready' | 'estimated' | 'oversized' | 'processing';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Cached result for one key. Entries are frozen when built, so a reader never
 * sees a `value` without the matching `displayText`.
 */
export interface CacheEntry {
    readonly key: string;
    readonly kind: EntryKind;
    readonly status: EntryStatus;
    readonly value: number | null;
    readonly displayText: string;
    /** Monotonic milliseconds from the cache clock. */
    readonly computedAt: number;
}

/** A count paired with its rendered form; sum `value`, show `displayText`. */
export interface CountValue {
    readonly value: number;
    readonly status: Exclude<EntryStatus, 'processing'>;
    readonly displayText: string;
}

export interface CacheConfig {
    tickInterval: number;
    maxTickInterval: number;
    queueSizeThreshold: number;
    idleCyclesBeforeSpeedup: number;
    ttlFile: number;
    ttlDirectory: number;
    maxEntries: number;
    sweepInterval: number;
    maxBatchPerTick: number;
    maxConcurrentJobs: number;
    maxQueueLength: number;
    maxFileSizeBytes: number;
    sampleBytes: number;
    debounceWindow: number;
    notificationBatchWindow: number;
    placeholderText: string;
    encodingHint: string;
    /** Lowercased extensions without the leading dot. */
    includeExtensions: string[];
    /** minimatch globs matched against the absolute POSIX path. */
    excludePatterns: string[];
    enableFileCaching: boolean;
    enableDirectoryCaching: boolean;
    recursiveDirectories: boolean;
    logLevel: LogLevel;
}

/** The external counting function. May be slow, may reject. */
export type ComputeFn = (content: string, encodingHint: string) => Promise<number>;

export type ActivePredicate = (key: string) => boolean;

export type BusyPredicate = () => boolean;

export type Clock = () => number;

export interface UpdateEvent {
    key: string;
    kind: EntryKind;
    at: number;
}

export type UpdateSubscriber = (key: string, kind: EntryKind, batch: readonly UpdateEvent[]) => void;

export interface FileStat {
    size: number;
    isFile: boolean;
    isDirectory: boolean;
}

export interface DirectoryChild {
    name: string;
    path: string;
    isFile: boolean;
    isDirectory: boolean;
}

/** The I/O surface the processor and aggregator read through. */
export interface FileSource {
    stat(filePath: string): Promise<FileStat>;
    /** Reads at most `limit` bytes as UTF-8. */
    readFile(filePath: string, limit: number): Promise<string>;
    readSample(filePath: string, bytes: number): Promise<string>;
    readDirectory(dirPath: string): Promise<DirectoryChild[]>;
}

export type SkipReason =
    | 'empty-path'
    | 'ignored'
    | 'invalid-extension'
    | 'not-file'
    | 'already-processing'
    | 'read-failed'
    | 'disposed'
    | 'superseded';

export type ProcessResult =
    | { ok: true; entry: CacheEntry }
    | { ok: false; reason: SkipReason; error?: Error };

export interface DirectoryTotal {
    total: number;
    files: number;
    estimated: boolean;
}

export interface CacheStats {
    cachedCount: number;
    cachedFiles: number;
    cachedDirectories: number;
    processingCount: number;
    queuedCount: number;
    activeJobs: number;
    schedulerActive: boolean;
    currentInterval: number;
}
