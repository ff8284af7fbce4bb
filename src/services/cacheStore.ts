import { CacheConfig, CacheEntry, EntryKind } from '../types/interfaces';

/**
 * Key → entry map plus the set of keys currently being worked on.
 *
 * Reads never mutate and never touch the disk. Only the processor and the
 * directory aggregator write, and entries are frozen, so `put` swapping the
 * reference is the whole atomic update. The store never notifies anyone.
 */
export class CacheStore {
    private readonly entries = new Map<string, CacheEntry>();
    private readonly processing = new Set<string>();
    private generation = 0;

    get(key: string): CacheEntry | undefined {
        return this.entries.get(key);
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    put(entry: CacheEntry): void {
        this.entries.set(entry.key, entry);
    }

    invalidate(key: string): boolean {
        return this.entries.delete(key);
    }

    ttlFor(kind: EntryKind, config: CacheConfig): number {
        return kind === 'directory' ? config.ttlDirectory : config.ttlFile;
    }

    isFresh(entry: CacheEntry, now: number, config: CacheConfig): boolean {
        return now - entry.computedAt < this.ttlFor(entry.kind, config);
    }

    /** A stored entry of `kind` that is still within its TTL. */
    getFresh(key: string, kind: EntryKind, now: number, config: CacheConfig): CacheEntry | undefined {
        const entry = this.entries.get(key);
        if (entry && entry.kind === kind && this.isFresh(entry, now, config)) {
            return entry;
        }
        return undefined;
    }

    /**
     * Drop entries past their TTL, then evict by oldest `computedAt` until the
     * store is back under `maxEntries`. Returns how many entries were removed.
     */
    sweep(now: number, config: CacheConfig): number {
        let removed = 0;
        for (const [key, entry] of this.entries) {
            if (!this.isFresh(entry, now, config)) {
                this.entries.delete(key);
                removed++;
            }
        }
        const excess = this.entries.size - config.maxEntries;
        if (excess > 0) {
            const oldest = Array.from(this.entries.values())
                .sort((a, b) => a.computedAt - b.computedAt)
                .slice(0, excess);
            for (const entry of oldest) {
                this.entries.delete(entry.key);
                removed++;
            }
        }
        return removed;
    }

    /** Bumped by `clear`; runs that started under an older epoch must not write. */
    get epoch(): number {
        return this.generation;
    }

    /**
     * Drop every entry. Keys in flight stay claimed until their run releases
     * them, so a cleared key still cannot be processed twice at once.
     */
    clear(): void {
        this.entries.clear();
        this.generation++;
    }

    get size(): number {
        return this.entries.size;
    }

    countByKind(): Record<EntryKind, number> {
        const counts: Record<EntryKind, number> = { file: 0, directory: 0 };
        for (const entry of this.entries.values()) {
            counts[entry.kind]++;
        }
        return counts;
    }

    /** Claim `key` for processing. False when someone already holds it. */
    markProcessing(key: string): boolean {
        if (this.processing.has(key)) {
            return false;
        }
        this.processing.add(key);
        return true;
    }

    releaseProcessing(key: string): void {
        this.processing.delete(key);
    }

    isProcessing(key: string): boolean {
        return this.processing.has(key);
    }

    get processingCount(): number {
        return this.processing.size;
    }
}
