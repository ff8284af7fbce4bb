import { CacheConfig } from './types/interfaces';

/** Source and text extensions counted unless `includeExtensions` is overridden. */
export const DEFAULT_INCLUDED_EXTENSIONS = [
    'lua', 'py', 'js', 'ts', 'java', 'c', 'cpp', 'rs', 'go', 'rb', 'php', 'swift', 'kt', 'scala',
    'clj', 'hs', 'vim', 'sh', 'zsh', 'fish', 'ps1',
    'html', 'css', 'scss', 'sass', 'less', 'vue', 'svelte', 'jsx', 'tsx', 'json', 'xml', 'yaml', 'yml', 'toml',
    'md', 'txt', 'rst', 'org', 'tex', 'latex',
    'conf', 'config', 'ini', 'cfg', 'properties',
    'csv', 'tsv', 'sql', 'graphql', 'proto',
    'log', 'diff', 'patch',
];

/** Hidden files, lock and temp files, dependency and VCS folders. */
export const DEFAULT_EXCLUDE_PATTERNS = [
    '**/.*',
    '**/*.lock',
    '**/*.tmp',
    '**/node_modules/**',
    '**/.git/**',
];

export const DEFAULT_CONFIG: Readonly<CacheConfig> = {
    tickInterval: 2_000,
    maxTickInterval: 10_000,
    queueSizeThreshold: 20,
    idleCyclesBeforeSpeedup: 3,
    ttlFile: 300_000,
    ttlDirectory: 600_000,
    maxEntries: 2_000,
    sweepInterval: 600_000,
    maxBatchPerTick: 10,
    maxConcurrentJobs: 3,
    maxQueueLength: 50,
    maxFileSizeBytes: 512 * 1024,
    sampleBytes: 1024,
    debounceWindow: 100,
    notificationBatchWindow: 1_000,
    placeholderText: '⋯',
    encodingHint: 'cl100k_base',
    includeExtensions: DEFAULT_INCLUDED_EXTENSIONS,
    excludePatterns: DEFAULT_EXCLUDE_PATTERNS,
    enableFileCaching: true,
    enableDirectoryCaching: true,
    recursiveDirectories: false,
    logLevel: 'info',
};

/** Active files above this size are still counted, with a warning. */
export const LARGE_ACTIVE_FILE_BYTES = 10 * 1024 * 1024;

/** Listener ceiling for the update batcher. */
export const MAX_SUBSCRIBERS = 1000;
