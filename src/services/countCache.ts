import { performance } from 'perf_hooks';
import {
    ActivePredicate, BusyPredicate, CacheConfig, CacheEntry, CacheStats, Clock, ComputeFn, DirectoryTotal,
    EntryKind, FileSource, ProcessResult, UpdateSubscriber,
} from '../types/interfaces';
import { CacheStore } from './cacheStore';
import { ConfigurationService } from './configurationService';
import { DebounceController } from './debounceController';
import { DirectoryAggregator } from './directoryAggregator';
import { NotificationBatcher, Unsubscribe } from './notificationBatcher';
import { ProcessQueue } from './processQueue';
import { Processor } from './processor';
import { ResourceGovernor } from './resourceGovernor';
import { Scheduler } from './scheduler';
import { TokenEstimator } from './tokenEstimator';
import { Diagnostics, LogSink } from '../utils/diagnostics';
import { reportError } from '../utils/errorHandler';
import { CacheDisposedError, InvalidKeyError } from '../utils/errors';
import { createPlaceholder } from '../utils/formatters';
import { NodeFileSource, toKey } from '../utils/fsUtils';
import { TimerHandle, TimerRegistry } from '../utils/timers';

export interface CountCacheOptions {
    config?: Partial<CacheConfig>;
    /** The real counter. Without one every value is a local estimate. */
    compute?: ComputeFn;
    isActive?: ActivePredicate;
    isHostBusy?: BusyPredicate;
    fileSource?: FileSource;
    clock?: Clock;
    logSink?: LogSink;
}

/**
 * The background count cache.
 *
 * Construction wires the components together but starts nothing; call
 * `start()` to run the scheduler and the periodic sweep. Lookups never
 * block and never throw: they hand back a fresh entry, or a placeholder
 * while the value is computed in the background, and subscribers hear about
 * the result through `onCacheUpdated`.
 */
export class CountCache {
    private config: CacheConfig;
    private readonly diagnostics: Diagnostics;
    private readonly clock: Clock;
    private readonly timers = new TimerRegistry();
    private readonly store = new CacheStore();
    private readonly queue: ProcessQueue;
    private readonly governor: ResourceGovernor;
    private readonly notifier: NotificationBatcher;
    private readonly processor: Processor;
    private readonly scheduler: Scheduler;
    private readonly debounce: DebounceController;
    private readonly aggregator: DirectoryAggregator;
    private sweepTimer: TimerHandle | undefined;
    private started = false;
    private disposed = false;

    constructor(options: CountCacheOptions = {}) {
        this.diagnostics = new Diagnostics('info', options.logSink);
        this.config = ConfigurationService.resolve(options.config, this.diagnostics);
        this.diagnostics.setLevel(this.config.logLevel);
        this.clock = options.clock ?? (() => performance.now());

        const getConfig = () => this.config;
        const files = options.fileSource ?? new NodeFileSource();

        this.queue = new ProcessQueue(this.config.maxQueueLength);
        this.governor = new ResourceGovernor(this.config, options.isHostBusy);
        this.notifier = new NotificationBatcher(this.config.notificationBatchWindow, this.timers, this.diagnostics, this.clock);
        this.processor = new Processor({
            store: this.store,
            governor: this.governor,
            files,
            notifier: this.notifier,
            diagnostics: this.diagnostics,
            clock: this.clock,
            getConfig,
            compute: options.compute,
            isActive: options.isActive,
            estimator: new TokenEstimator(),
        });
        this.scheduler = new Scheduler({
            queue: this.queue,
            governor: this.governor,
            timers: this.timers,
            diagnostics: this.diagnostics,
            clock: this.clock,
            getConfig,
            processKey: key => this.processor.process(key),
            activeJobs: () => this.processor.activeJobs,
        });
        this.debounce = new DebounceController(this.config.debounceWindow, this.timers, key => this.fastTrack(key));
        this.aggregator = new DirectoryAggregator({
            store: this.store,
            governor: this.governor,
            files,
            processor: this.processor,
            queue: this.queue,
            notifier: this.notifier,
            diagnostics: this.diagnostics,
            clock: this.clock,
            getConfig,
        });
    }

    /** Start the scheduler loop and the periodic sweep. Idempotent. */
    start(): void {
        this.assertLive('start');
        if (this.started) {
            return;
        }
        this.started = true;
        this.scheduler.start();
        this.scheduleSweep();
        this.diagnostics.info('Count cache started');
    }

    /**
     * Entry for `filePath`: the cached one while fresh, otherwise a
     * placeholder with the work queued. Undefined for paths that will never
     * have a value (disabled kind, ineligible file, empty path).
     */
    getCount(filePath: string, kind: EntryKind): CacheEntry | undefined {
        if (this.disposed) {
            return undefined;
        }
        const key = toKey(filePath);
        if (!key) {
            return undefined;
        }
        return kind === 'directory' ? this.lookupDirectory(key) : this.lookupFile(key);
    }

    getFileCount(filePath: string): string | undefined {
        return this.getCount(filePath, 'file')?.displayText;
    }

    getDirectoryCount(dirPath: string): string | undefined {
        return this.getCount(dirPath, 'directory')?.displayText;
    }

    /** Debounced fast track: after `debounceWindow` of quiet the key jumps the queue. */
    requestImmediate(filePath: string): boolean {
        const key = toKey(filePath);
        if (this.disposed || !key || !this.governor.isPathEligible(key)) {
            return false;
        }
        this.debounce.requestImmediate(key);
        return true;
    }

    /** Process `filePath` now, outside the queue and the throttle. */
    processImmediate(filePath: string): Promise<ProcessResult> {
        const key = toKey(filePath);
        if (!key) {
            return Promise.resolve({ ok: false, reason: 'empty-path' });
        }
        this.queue.remove(key);
        this.debounce.cancel(key);
        return this.processor.process(key);
    }

    computeDirectory(dirPath: string, recursive?: boolean): Promise<DirectoryTotal> {
        return this.aggregator.computeDirectory(toKey(dirPath), { recursive });
    }

    /** Append the directory's stale eligible files to the back of the queue. */
    queueDirectoryFiles(dirPath: string, recursive = this.config.recursiveDirectories): Promise<number> {
        const key = toKey(dirPath);
        if (this.disposed || !key) {
            return Promise.resolve(0);
        }
        return this.aggregator.queueDirectoryFiles(key, recursive);
    }

    onCacheUpdated(cb: UpdateSubscriber): Unsubscribe {
        return this.notifier.subscribe(cb);
    }

    /**
     * Drop the entry for `filePath`. With `reprocess` the key goes back to the
     * front of the queue, after any run already in flight for it has settled;
     * without it any queued or debounced work is cancelled.
     */
    invalidate(filePath: string, reprocess = false): boolean {
        this.assertLive('invalidate');
        const key = toKey(filePath);
        if (!key) {
            throw new InvalidKeyError(filePath);
        }
        const removed = this.store.invalidate(key);
        if (reprocess && this.governor.isPathEligible(key)) {
            const running = this.processor.inFlight(key);
            if (running) {
                // the running read may predate the change; count again once it lands
                void running.then(
                    () => this.requeue(key),
                    err => reportError(err, `Reprocessing ${key} failed`, this.diagnostics),
                );
            } else {
                this.requeue(key);
            }
        } else {
            this.queue.remove(key);
            this.debounce.cancel(key);
        }
        return removed;
    }

    clearAll(): void {
        this.assertLive('clearAll');
        this.store.clear();
        this.queue.clear();
        this.debounce.cancelAll();
        this.diagnostics.info('Cache cleared');
    }

    /** Run a sweep now and return the number of entries removed. */
    sweep(): number {
        this.assertLive('sweep');
        const removed = this.store.sweep(this.clock(), this.config);
        if (removed > 0) {
            this.diagnostics.debug(`Swept ${removed} entries`);
        }
        return removed;
    }

    stats(): CacheStats {
        this.assertLive('stats');
        const byKind = this.store.countByKind();
        return {
            cachedCount: this.store.size,
            cachedFiles: byKind.file,
            cachedDirectories: byKind.directory,
            processingCount: this.store.processingCount,
            queuedCount: this.queue.length,
            activeJobs: this.processor.activeJobs,
            schedulerActive: this.scheduler.isActive,
            currentInterval: this.scheduler.currentInterval,
        };
    }

    /**
     * Replace the configuration with `update` merged over the current one.
     * Invalid values reject the whole update and leave the config unchanged.
     */
    updateConfig(update: Partial<CacheConfig>): Readonly<CacheConfig> {
        this.assertLive('updateConfig');
        const previous = this.config;
        const next = ConfigurationService.merge(previous, update);
        this.config = next;

        this.diagnostics.setLevel(next.logLevel);
        this.governor.updateConfig(next);
        this.queue.setMaxLength(next.maxQueueLength);
        this.processor.updateConcurrency(next.maxConcurrentJobs);
        this.debounce.setWindow(next.debounceWindow);
        this.notifier.setWindow(next.notificationBatchWindow);

        if (this.started && next.tickInterval !== previous.tickInterval) {
            this.scheduler.restart();
        }
        if (this.started && next.sweepInterval !== previous.sweepInterval) {
            this.timers.clear(this.sweepTimer);
            this.scheduleSweep();
        }
        this.diagnostics.debug('Configuration updated');
        return this.getConfig();
    }

    getConfig(): Readonly<CacheConfig> {
        return Object.freeze({
            ...this.config,
            includeExtensions: [...this.config.includeExtensions],
            excludePatterns: [...this.config.excludePatterns],
        });
    }

    get isDisposed(): boolean {
        return this.disposed;
    }

    /** Stop every timer and drop pending work. Runs already in flight still finish; nobody is notified. */
    dispose(): void {
        if (this.disposed) {
            return;
        }
        this.disposed = true;
        this.scheduler.stop();
        this.debounce.cancelAll();
        this.notifier.dispose();
        this.processor.dispose();
        this.queue.clear();
        this.timers.clearAll();
        this.sweepTimer = undefined;
        this.diagnostics.debug('Count cache disposed');
    }

    private lookupFile(key: string): CacheEntry | undefined {
        if (!this.config.enableFileCaching) {
            return undefined;
        }
        const fresh = this.store.getFresh(key, 'file', this.clock(), this.config);
        if (fresh) {
            return fresh;
        }
        if (!this.governor.isPathEligible(key)) {
            return undefined;
        }
        if (!this.store.isProcessing(key)) {
            this.queue.enqueue(key, true);
            this.debounce.requestImmediate(key);
        }
        return createPlaceholder(key, 'file', this.config.placeholderText, this.clock());
    }

    private lookupDirectory(key: string): CacheEntry | undefined {
        if (!this.config.enableDirectoryCaching) {
            return undefined;
        }
        const fresh = this.store.getFresh(key, 'directory', this.clock(), this.config);
        if (fresh) {
            return fresh;
        }
        if (!this.store.isProcessing(key)) {
            void this.aggregator.refreshDirectory(key);
        }
        return createPlaceholder(key, 'directory', this.config.placeholderText, this.clock());
    }

    private fastTrack(key: string): void {
        if (this.disposed || this.store.isProcessing(key) || this.store.getFresh(key, 'file', this.clock(), this.config)) {
            return;
        }
        this.queue.enqueue(key, true);
        this.drain();
    }

    private requeue(key: string): void {
        if (this.disposed) {
            return;
        }
        this.store.invalidate(key);
        this.queue.enqueue(key, true);
        this.drain();
    }

    private drain(): void {
        void this.scheduler.requestDrain().catch(err => reportError(err, 'Drain request failed', this.diagnostics));
    }

    private scheduleSweep(): void {
        this.sweepTimer = this.timers.schedule(() => {
            this.sweepTimer = undefined;
            if (this.disposed) {
                return;
            }
            try {
                this.sweep();
            } catch (err) {
                reportError(err, 'Periodic sweep failed', this.diagnostics);
            }
            this.scheduleSweep();
        }, this.config.sweepInterval);
    }

    private assertLive(operation: string): void {
        if (this.disposed) {
            throw new CacheDisposedError(operation);
        }
    }
}
