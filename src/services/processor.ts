import {
    ActivePredicate, CacheConfig, Clock, ComputeFn, CountValue, FileSource, FileStat, ProcessResult,
} from '../types/interfaces';
import { LARGE_ACTIVE_FILE_BYTES } from '../constants';
import { CacheStore } from './cacheStore';
import { NotificationBatcher } from './notificationBatcher';
import { ResourceGovernor } from './resourceGovernor';
import { TokenEstimator } from './tokenEstimator';
import { ConcurrencyLimiter } from '../utils/concurrencyLimiter';
import { Diagnostics } from '../utils/diagnostics';
import { reportError } from '../utils/errorHandler';
import { ComputeError, FileReadError, SizeLimitExceeded, toError } from '../utils/errors';
import { createEntry, toCountValue } from '../utils/formatters';

export interface ProcessorDeps {
    store: CacheStore;
    governor: ResourceGovernor;
    files: FileSource;
    notifier: NotificationBatcher;
    diagnostics: Diagnostics;
    clock: Clock;
    getConfig: () => CacheConfig;
    compute?: ComputeFn;
    isActive?: ActivePredicate;
    estimator?: TokenEstimator;
}

/**
 * Runs one unit of work for one file: stat, read, count, write, notify.
 *
 * At most one run per key exists at a time (the store's processing set is
 * the lock). The only awaits are the file reads and the compute call; the
 * counter is untrusted, and any failure there degrades to a local estimate
 * instead of an error.
 */
export class Processor {
    private readonly deps: ProcessorDeps;
    private readonly estimator: TokenEstimator;
    private readonly limiter: ConcurrencyLimiter;
    private readonly runs = new Map<string, Promise<ProcessResult>>();
    private disposed = false;

    constructor(deps: ProcessorDeps) {
        this.deps = deps;
        this.estimator = deps.estimator ?? new TokenEstimator();
        this.limiter = new ConcurrencyLimiter(deps.getConfig().maxConcurrentJobs);
    }

    /** Runs that have started and not yet settled. */
    get activeJobs(): number {
        return this.runs.size;
    }

    updateConcurrency(maxConcurrentJobs: number): void {
        this.limiter.setLimit(maxConcurrentJobs);
    }

    /** The outstanding run for `key`, if any. */
    inFlight(key: string): Promise<ProcessResult> | undefined {
        return this.runs.get(key);
    }

    process(key: string): Promise<ProcessResult> {
        if (this.disposed) {
            return Promise.resolve({ ok: false, reason: 'disposed' });
        }
        if (!this.deps.store.markProcessing(key)) {
            return Promise.resolve({ ok: false, reason: 'already-processing' });
        }
        const run = this.execute(key);
        this.runs.set(key, run);
        return run;
    }

    dispose(): void {
        this.disposed = true;
    }

    private async execute(key: string): Promise<ProcessResult> {
        const { store, notifier, diagnostics } = this.deps;
        let result: ProcessResult;
        try {
            result = await this.run(key, store.epoch);
        } catch (err) {
            reportError(err, `Unexpected failure processing ${key}`, diagnostics);
            result = { ok: false, reason: 'read-failed', error: toError(err) };
        } finally {
            store.releaseProcessing(key);
            this.runs.delete(key);
        }
        if (result.ok) {
            notifier.notifyUpdated(key, 'file');
        }
        return result;
    }

    private async run(key: string, epoch: number): Promise<ProcessResult> {
        const { governor, files } = this.deps;
        const config = this.deps.getConfig();

        const pathVerdict = governor.checkPath(key);
        if (!pathVerdict.eligible) {
            return { ok: false, reason: pathVerdict.reason };
        }

        let stat: FileStat;
        try {
            stat = await files.stat(key);
        } catch (err) {
            return this.readFailure(key, err);
        }

        const active = this.isActive(key);
        const statVerdict = governor.checkStat(stat, active);
        if (!statVerdict.eligible) {
            if (statVerdict.reason === 'too-large') {
                return this.processOversized(key, new SizeLimitExceeded(statVerdict.size, statVerdict.limit), config, epoch);
            }
            return { ok: false, reason: statVerdict.reason };
        }
        if (active && stat.size > LARGE_ACTIVE_FILE_BYTES) {
            this.deps.diagnostics.warn(`Processing very large active file: ${key} (${(stat.size / (1024 * 1024)).toFixed(1)}MB)`);
        }

        const limit = active ? Infinity : config.maxFileSizeBytes;
        return this.limiter.run(async (): Promise<ProcessResult> => {
            let content: string;
            try {
                content = await files.readFile(key, limit);
            } catch (err) {
                return this.readFailure(key, err);
            }
            if (content.length === 0) {
                return this.write(key, toCountValue(0, 'ready'), epoch);
            }
            const count = await this.count(key, content, config);
            return this.write(key, count, epoch);
        });
    }

    private async processOversized(key: string, cause: SizeLimitExceeded, config: CacheConfig, epoch: number): Promise<ProcessResult> {
        this.deps.diagnostics.warn(`Estimating oversized file ${key}: ${cause.message}`);
        return this.limiter.run(async (): Promise<ProcessResult> => {
            let sample: string;
            try {
                sample = await this.deps.files.readSample(key, config.sampleBytes);
            } catch (err) {
                return this.readFailure(key, err);
            }
            const estimate = this.estimator.estimateFromSample(sample, config.sampleBytes, cause.size);
            return this.write(key, toCountValue(estimate, 'oversized'), epoch);
        });
    }

    private async count(key: string, content: string, config: CacheConfig): Promise<CountValue> {
        const compute = this.deps.compute;
        try {
            if (!compute) {
                throw new ComputeError(key, 'No counter configured');
            }
            const n = await compute(content, config.encodingHint);
            if (typeof n !== 'number' || !Number.isFinite(n) || n < 0) {
                throw new ComputeError(key, `Counter returned an invalid value: ${String(n)}`);
            }
            return toCountValue(n, 'ready');
        } catch (err) {
            reportError(err, `Counter failed for ${key}, using estimate`, this.deps.diagnostics, { level: 'warn' });
            return toCountValue(this.estimator.estimate(content), 'estimated');
        }
    }

    private write(key: string, count: CountValue, epoch: number): ProcessResult {
        const { store, clock } = this.deps;
        if (store.epoch !== epoch) {
            return { ok: false, reason: 'superseded' };
        }
        const entry = createEntry(key, 'file', count, clock());
        store.put(entry);
        return { ok: true, entry };
    }

    private readFailure(key: string, err: unknown): ProcessResult {
        const error = new FileReadError(key, `Failed to read file ${key}: ${toError(err).message}`);
        reportError(error, undefined, this.deps.diagnostics, { level: 'warn' });
        return { ok: false, reason: 'read-failed', error };
    }

    private isActive(key: string): boolean {
        const predicate = this.deps.isActive;
        if (!predicate) {
            return false;
        }
        try {
            return predicate(key) === true;
        } catch (err) {
            reportError(err, `isActive check failed for ${key}`, this.deps.diagnostics, { level: 'warn' });
            return false;
        }
    }
}
