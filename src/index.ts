export { CountCache, CountCacheOptions } from './services/countCache';
export { CacheStore } from './services/cacheStore';
export { ConfigurationService } from './services/configurationService';
export { DebounceController } from './services/debounceController';
export { DirectoryAggregator, DirectoryOptions } from './services/directoryAggregator';
export { NotificationBatcher, Unsubscribe } from './services/notificationBatcher';
export { EnqueueResult, ProcessQueue } from './services/processQueue';
export { Processor } from './services/processor';
export { ResourceGovernor } from './services/resourceGovernor';
export { Scheduler } from './services/scheduler';
export { TokenEstimator } from './services/tokenEstimator';
export { DEFAULT_CONFIG, DEFAULT_EXCLUDE_PATTERNS, DEFAULT_INCLUDED_EXTENSIONS } from './constants';
export { Diagnostics, LogSink, consoleSink } from './utils/diagnostics';
export * from './utils/errors';
export {
    ESTIMATED_MARKER, LARGE_COUNT_SENTINEL, LARGE_TEXT, OVERSIZED_MARKER, UNKNOWN_COUNT_SENTINEL,
    formatCount, parseCountDisplay,
} from './utils/formatters';
export { NodeFileSource, toKey } from './utils/fsUtils';
export { validateConfig, isCacheConfig } from './utils/validateConfig';
export * from './types/interfaces';
