import { CountCache, CountCacheOptions } from '../services/countCache';
import { CacheConfig, EntryKind, UpdateEvent } from '../types/interfaces';
import { CacheDisposedError, ConfigValidationError, InvalidKeyError } from '../utils/errors';
import { MemoryFileSource, memorySink } from './support/memoryFileSource';

const TEST_CONFIG: Partial<CacheConfig> = {
    tickInterval: 100,
    maxTickInterval: 1000,
    debounceWindow: 50,
    notificationBatchWindow: 200,
    ttlFile: 500,
    ttlDirectory: 500,
    sweepInterval: 1000,
    maxQueueLength: 2,
};

function createCache(files: Record<string, string>, options: CountCacheOptions = {}) {
    const source = new MemoryFileSource(files);
    const compute = jest.fn(async (content: string) => content.length);
    const sink = memorySink();
    const cache = new CountCache({
        compute,
        fileSource: source,
        clock: () => Date.now(),
        logSink: sink,
        ...options,
        config: { ...TEST_CONFIG, ...options.config },
    });
    return { cache, source, compute, sink };
}

// Let background runs started by fired timers finish.
const settle = () => jest.advanceTimersByTimeAsync(0);

describe('CountCache', () => {
    let cache: CountCache | undefined;

    beforeEach(() => {
        jest.useFakeTimers();
    });

    afterEach(() => {
        cache?.dispose();
        cache = undefined;
        jest.useRealTimers();
    });

    it('returns a placeholder, then the computed entry', async () => {
        const ctx = createCache({ '/proj/a.ts': 'hello' });
        cache = ctx.cache;

        const placeholder = cache.getCount('/proj/a.ts', 'file');
        expect(placeholder?.status).toBe('processing');
        expect(placeholder?.value).toBeNull();
        expect(placeholder?.displayText).toBe('⋯');

        await jest.advanceTimersByTimeAsync(50);
        await settle();

        const entry = cache.getCount('/proj/a.ts', 'file');
        expect(entry?.status).toBe('ready');
        expect(entry?.value).toBe(5);
        expect(cache.getCount('/proj/a.ts', 'file')).toBe(entry);
        expect(cache.getFileCount('/proj/a.ts')).toBe('5');
    });

    it('coalesces repeated lookups into one computation', async () => {
        const ctx = createCache({ '/proj/a.ts': 'hello' });
        cache = ctx.cache;

        for (let i = 0; i < 5; i++) {
            cache.getCount('/proj/a.ts', 'file');
        }
        await jest.advanceTimersByTimeAsync(50);
        await settle();
        for (let i = 0; i < 5; i++) {
            cache.getCount('/proj/a.ts', 'file');
        }
        await jest.advanceTimersByTimeAsync(200);

        expect(ctx.compute).toHaveBeenCalledTimes(1);
    });

    it('notifies subscribers once per batch window', async () => {
        const ctx = createCache({ '/proj/a.ts': 'hello', '/proj/b.ts': 'hi' });
        cache = ctx.cache;
        const calls: Array<[string, EntryKind, readonly UpdateEvent[]]> = [];
        cache.onCacheUpdated((key, kind, batch) => calls.push([key, kind, batch]));

        cache.getCount('/proj/a.ts', 'file');
        cache.getCount('/proj/b.ts', 'file');
        await jest.advanceTimersByTimeAsync(50);
        await settle();
        expect(calls).toHaveLength(0);

        await jest.advanceTimersByTimeAsync(200);
        expect(calls).toHaveLength(1);
        expect(calls[0][2].map(e => e.key).sort()).toEqual(['/proj/a.ts', '/proj/b.ts']);
    });

    it('treats entries past their TTL as stale and sweeps them', async () => {
        const ctx = createCache({ '/proj/a.ts': 'hello' });
        cache = ctx.cache;
        cache.getCount('/proj/a.ts', 'file');
        await jest.advanceTimersByTimeAsync(50);
        await settle();
        expect(cache.getCount('/proj/a.ts', 'file')?.status).toBe('ready');

        await jest.advanceTimersByTimeAsync(500);
        expect(cache.getCount('/proj/a.ts', 'file')?.status).toBe('processing');
        expect(cache.sweep()).toBe(1);
        expect(cache.stats().cachedCount).toBe(0);
    });

    it('drops background work at the queue ceiling but still serves priority requests', async () => {
        const ctx = createCache({
            '/proj/a.ts': 'a',
            '/proj/b.ts': 'bb',
            '/proj/c.ts': 'ccc',
            '/proj/d.ts': 'dddd',
        });
        cache = ctx.cache;

        expect(await cache.queueDirectoryFiles('/proj')).toBe(2);
        expect(cache.stats().queuedCount).toBe(2);

        expect(cache.getCount('/proj/d.ts', 'file')?.status).toBe('processing');
        expect(cache.stats().queuedCount).toBe(3);

        await jest.advanceTimersByTimeAsync(50);
        await settle();

        expect(cache.getCount('/proj/d.ts', 'file')?.value).toBe(4);
        expect(ctx.compute.mock.calls.map(c => c[0]).sort()).toEqual(['a', 'bb', 'dddd']);
    });

    it('returns undefined for paths that never get a value', () => {
        const ctx = createCache({ '/proj/logo.png': 'x' });
        cache = ctx.cache;
        expect(cache.getCount('/proj/logo.png', 'file')).toBeUndefined();
        expect(cache.getCount('', 'file')).toBeUndefined();
        expect(cache.stats().queuedCount).toBe(0);
    });

    it('returns undefined when the kind is disabled', () => {
        const ctx = createCache({ '/proj/a.ts': 'x' }, { config: { enableFileCaching: false, enableDirectoryCaching: false } });
        cache = ctx.cache;
        expect(cache.getCount('/proj/a.ts', 'file')).toBeUndefined();
        expect(cache.getDirectoryCount('/proj')).toBeUndefined();
    });

    it('aggregates directories in the background', async () => {
        const ctx = createCache({ '/proj/a.ts': 'hello', '/proj/b.ts': 'hi', '/proj/logo.png': 'ignored' });
        cache = ctx.cache;

        expect(cache.getCount('/proj', 'directory')?.status).toBe('processing');
        await settle();

        const entry = cache.getCount('/proj', 'directory');
        expect(entry?.kind).toBe('directory');
        expect(entry?.value).toBe(7);
        expect(cache.getDirectoryCount('/proj')).toBe('7');
        expect(await cache.computeDirectory('/proj')).toEqual({ total: 7, files: 2, estimated: false });
    });

    it('processImmediate bypasses the queue', async () => {
        const ctx = createCache({ '/proj/a.ts': 'hello' });
        cache = ctx.cache;
        cache.getCount('/proj/a.ts', 'file');

        const result = await cache.processImmediate('/proj/a.ts');

        expect(result.ok && result.entry.value).toBe(5);
        expect(cache.stats().queuedCount).toBe(0);
        await jest.advanceTimersByTimeAsync(100);
        expect(ctx.compute).toHaveBeenCalledTimes(1);
    });

    describe('invalidate', () => {
        it('requeues and recomputes when asked to reprocess', async () => {
            const ctx = createCache({ '/proj/a.ts': 'hello' });
            cache = ctx.cache;
            cache.getCount('/proj/a.ts', 'file');
            await jest.advanceTimersByTimeAsync(50);
            await settle();
            await jest.advanceTimersByTimeAsync(100);

            ctx.source.set('/proj/a.ts', 'hello world');
            expect(cache.invalidate('/proj/a.ts', true)).toBe(true);
            await settle();

            expect(ctx.compute).toHaveBeenCalledTimes(2);
            expect(cache.getCount('/proj/a.ts', 'file')?.value).toBe(11);
        });

        it('counts again after a run that was in flight when invalidated', async () => {
            let release: (n: number) => void = () => undefined;
            let calls = 0;
            const compute = jest.fn((content: string) => {
                calls++;
                return calls === 1 ? new Promise<number>(resolve => { release = resolve; }) : Promise.resolve(content.length);
            });
            const ctx = createCache({ '/proj/a.ts': 'hello' }, { compute });
            cache = ctx.cache;
            cache.start();

            const first = cache.processImmediate('/proj/a.ts');
            await settle();
            expect(compute).toHaveBeenCalledTimes(1);

            ctx.source.set('/proj/a.ts', 'hello world');
            expect(cache.invalidate('/proj/a.ts', true)).toBe(false);
            expect(cache.stats().queuedCount).toBe(0);

            release(5);
            const result = await first;
            expect(result.ok && result.entry.value).toBe(5);
            await settle();

            expect(compute).toHaveBeenCalledTimes(2);
            expect(cache.getCount('/proj/a.ts', 'file')?.value).toBe(11);
        });

        it('cancels queued and debounced work otherwise', async () => {
            const ctx = createCache({ '/proj/a.ts': 'hello' });
            cache = ctx.cache;
            cache.getCount('/proj/a.ts', 'file');

            expect(cache.invalidate('/proj/a.ts')).toBe(false);
            expect(cache.stats().queuedCount).toBe(0);
            await jest.advanceTimersByTimeAsync(200);
            expect(ctx.compute).not.toHaveBeenCalled();
        });

        it('rejects an empty key', () => {
            const ctx = createCache({});
            cache = ctx.cache;
            expect(() => ctx.cache.invalidate('')).toThrow(InvalidKeyError);
        });
    });

    it('clearAll drops entries and queued work', async () => {
        const ctx = createCache({ '/proj/a.ts': 'hello', '/proj/b.ts': 'hi' });
        cache = ctx.cache;
        await cache.processImmediate('/proj/a.ts');
        cache.getCount('/proj/b.ts', 'file');

        cache.clearAll();

        const stats = cache.stats();
        expect(stats.cachedCount).toBe(0);
        expect(stats.queuedCount).toBe(0);
        await jest.advanceTimersByTimeAsync(100);
        expect(ctx.compute).toHaveBeenCalledTimes(1);
    });

    describe('updateConfig', () => {
        it('restarts the scheduler when the tick interval changes', async () => {
            const ctx = createCache({ '/proj/a.ts': 'hello' });
            cache = ctx.cache;
            cache.start();
            expect(cache.stats()).toMatchObject({ schedulerActive: true, currentInterval: 100 });

            const next = cache.updateConfig({ tickInterval: 300, maxTickInterval: 3000 });
            expect(next.tickInterval).toBe(300);
            expect(cache.stats().currentInterval).toBe(300);

            expect(await cache.queueDirectoryFiles('/proj')).toBe(1);
            await jest.advanceTimersByTimeAsync(299);
            expect(ctx.compute).not.toHaveBeenCalled();
            await jest.advanceTimersByTimeAsync(1);
            await settle();
            expect(ctx.compute).toHaveBeenCalledTimes(1);
        });

        it('rejects invalid values and keeps the old config', () => {
            const ctx = createCache({});
            cache = ctx.cache;
            expect(() => ctx.cache.updateConfig({ tickInterval: 0 })).toThrow(ConfigValidationError);
            expect(ctx.cache.getConfig().tickInterval).toBe(100);
        });
    });

    it('coerces invalid construction options with a warning', () => {
        const sink = memorySink();
        cache = new CountCache({ config: { tickInterval: -1 }, fileSource: new MemoryFileSource(), logSink: sink });
        expect(cache.getConfig().tickInterval).toBe(2000);
        expect(sink.lines).toContain('[WARN] tickInterval is invalid or out of range. Coercing to 2000.');
    });

    it('reports stats', async () => {
        const ctx = createCache({ '/proj/a.ts': 'hello' });
        cache = ctx.cache;
        await cache.processImmediate('/proj/a.ts');
        await cache.computeDirectory('/proj');

        expect(cache.stats()).toEqual({
            cachedCount: 1,
            cachedFiles: 1,
            cachedDirectories: 0,
            processingCount: 0,
            queuedCount: 0,
            activeJobs: 0,
            schedulerActive: false,
            currentInterval: 100,
        });
    });

    describe('dispose', () => {
        it('leaves no timers running', async () => {
            const ctx = createCache({ '/proj/a.ts': 'hello', '/proj/b.ts': 'hi' });
            cache = ctx.cache;
            cache.start();
            await cache.processImmediate('/proj/a.ts');
            cache.getCount('/proj/b.ts', 'file');
            expect(jest.getTimerCount()).toBeGreaterThan(0);

            cache.dispose();

            expect(jest.getTimerCount()).toBe(0);
            expect(cache.isDisposed).toBe(true);
        });

        it('makes admin operations throw and lookups return nothing', () => {
            const ctx = createCache({ '/proj/a.ts': 'hello' });
            cache = ctx.cache;
            cache.dispose();
            cache.dispose();

            expect(() => ctx.cache.invalidate('/proj/a.ts')).toThrow(CacheDisposedError);
            expect(() => ctx.cache.clearAll()).toThrow(CacheDisposedError);
            expect(() => ctx.cache.updateConfig({ tickInterval: 200 })).toThrow(CacheDisposedError);
            expect(() => ctx.cache.stats()).toThrow(CacheDisposedError);
            expect(() => ctx.cache.start()).toThrow(CacheDisposedError);
            expect(ctx.cache.getCount('/proj/a.ts', 'file')).toBeUndefined();
            expect(ctx.cache.requestImmediate('/proj/a.ts')).toBe(false);
        });
    });
});
