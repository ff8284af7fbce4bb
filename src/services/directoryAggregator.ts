import { CacheConfig, CacheEntry, Clock, DirectoryChild, DirectoryTotal, FileSource } from '../types/interfaces';
import { CacheStore } from './cacheStore';
import { NotificationBatcher } from './notificationBatcher';
import { ProcessQueue } from './processQueue';
import { Processor } from './processor';
import { ResourceGovernor } from './resourceGovernor';
import { runPool } from '../utils/asyncPool';
import { Diagnostics, Timer } from '../utils/diagnostics';
import { reportError } from '../utils/errorHandler';
import { createEntry, toCountValue } from '../utils/formatters';

export interface DirectoryAggregatorDeps {
    store: CacheStore;
    governor: ResourceGovernor;
    files: FileSource;
    processor: Processor;
    queue: ProcessQueue;
    notifier: NotificationBatcher;
    diagnostics: Diagnostics;
    clock: Clock;
    getConfig: () => CacheConfig;
}

export interface DirectoryOptions {
    recursive?: boolean;
}

interface ChildCount {
    value: number;
    estimated: boolean;
}

/**
 * Directory totals as the sum of their eligible files.
 *
 * Fresh cached file entries are reused; anything else goes through the
 * processor, joining a run already in flight rather than starting another.
 * Unreadable or ineligible children add zero.
 */
export class DirectoryAggregator {
    private readonly deps: DirectoryAggregatorDeps;

    constructor(deps: DirectoryAggregatorDeps) {
        this.deps = deps;
    }

    async computeDirectory(dirPath: string, opts: DirectoryOptions = {}): Promise<DirectoryTotal> {
        const config = this.deps.getConfig();
        const recursive = opts.recursive ?? config.recursiveDirectories;
        const timer = new Timer(`computeDirectory ${dirPath}`, this.deps.diagnostics);
        const files = await this.collectFiles(dirPath, recursive);
        const counts = await runPool(files.map(f => () => this.countFile(f)), config.maxConcurrentJobs);

        const total: DirectoryTotal = { total: 0, files: 0, estimated: false };
        for (const count of counts) {
            if (!count) {
                continue;
            }
            total.total += count.value;
            total.files++;
            total.estimated = total.estimated || count.estimated;
        }
        timer.stop();
        return total;
    }

    /**
     * Compute and store the entry for a directory, then notify. Resolves with
     * undefined when the directory is already being aggregated or the cache
     * was cleared meanwhile.
     */
    async refreshDirectory(dirPath: string): Promise<CacheEntry | undefined> {
        const { store, notifier, clock } = this.deps;
        if (!store.markProcessing(dirPath)) {
            return undefined;
        }
        const epoch = store.epoch;
        try {
            const result = await this.computeDirectory(dirPath);
            if (store.epoch !== epoch) {
                return undefined;
            }
            const entry = createEntry(dirPath, 'directory', toCountValue(result.total, result.estimated ? 'estimated' : 'ready'), clock());
            store.put(entry);
            notifier.notifyUpdated(dirPath, 'directory');
            return entry;
        } catch (err) {
            reportError(err, `Directory aggregation failed for ${dirPath}`, this.deps.diagnostics, { level: 'warn' });
            return undefined;
        } finally {
            store.releaseProcessing(dirPath);
        }
    }

    /**
     * Background discovery: append every eligible child file that is neither
     * fresh, queued nor in flight. Stops at the first key the full queue
     * drops. Resolves with the number of keys added.
     */
    async queueDirectoryFiles(dirPath: string, recursive: boolean): Promise<number> {
        const { store, queue, clock } = this.deps;
        const config = this.deps.getConfig();
        const files = await this.collectFiles(dirPath, recursive);
        let added = 0;
        for (const key of files) {
            if (store.isProcessing(key) || queue.has(key) || store.getFresh(key, 'file', clock(), config)) {
                continue;
            }
            const outcome = queue.enqueue(key, false);
            if (outcome === 'dropped') {
                this.deps.diagnostics.debug(`Queue full, stopped discovery in ${dirPath}`);
                break;
            }
            if (outcome === 'added') {
                added++;
            }
        }
        return added;
    }

    private async collectFiles(dirPath: string, recursive: boolean): Promise<string[]> {
        const { files, governor } = this.deps;
        let children: DirectoryChild[];
        try {
            children = await files.readDirectory(dirPath);
        } catch (err) {
            reportError(err, `Cannot read directory ${dirPath}`, this.deps.diagnostics, { level: 'warn' });
            return [];
        }
        const found: string[] = [];
        for (const child of children) {
            if (child.isFile) {
                if (governor.isPathEligible(child.path)) {
                    found.push(child.path);
                }
            } else if (child.isDirectory && recursive && governor.isTraversableDirectory(child.path)) {
                found.push(...await this.collectFiles(child.path, true));
            }
        }
        return found;
    }

    private async countFile(key: string): Promise<ChildCount | undefined> {
        const { store, processor, clock } = this.deps;
        const fresh = store.getFresh(key, 'file', clock(), this.deps.getConfig());
        if (fresh && fresh.value !== null) {
            return { value: fresh.value, estimated: fresh.status !== 'ready' };
        }
        try {
            const result = await (processor.inFlight(key) ?? processor.process(key));
            if (!result.ok || result.entry.value === null) {
                return undefined;
            }
            return { value: result.entry.value, estimated: result.entry.status !== 'ready' };
        } catch (err) {
            reportError(err, `Counting ${key} failed`, this.deps.diagnostics, { level: 'warn' });
            return undefined;
        }
    }
}
