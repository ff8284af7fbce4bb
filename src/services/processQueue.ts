export type EnqueueResult = 'added' | 'moved' | 'duplicate' | 'dropped';

/**
 * Ordered, de-duplicated backlog of keys waiting for the processor.
 *
 * Priority inserts (user requests) go to the front, moving the key if it was
 * already waiting. Background inserts append and are dropped once the queue
 * holds `maxLength` keys; priority inserts are always accepted.
 */
export class ProcessQueue {
    private items: string[] = [];
    private readonly members = new Set<string>();

    constructor(private maxLength: number) {}

    setMaxLength(maxLength: number): void {
        this.maxLength = maxLength;
    }

    enqueue(key: string, priority = false): EnqueueResult {
        if (this.members.has(key)) {
            if (!priority || this.items[0] === key) {
                return 'duplicate';
            }
            this.items.splice(this.items.indexOf(key), 1);
            this.items.unshift(key);
            return 'moved';
        }
        if (priority) {
            this.items.unshift(key);
        } else {
            if (this.items.length >= this.maxLength) {
                return 'dropped';
            }
            this.items.push(key);
        }
        this.members.add(key);
        return 'added';
    }

    /** Take up to `count` keys from the front. */
    take(count: number): string[] {
        const batch = this.items.splice(0, Math.max(0, count));
        for (const key of batch) {
            this.members.delete(key);
        }
        return batch;
    }

    remove(key: string): boolean {
        if (!this.members.delete(key)) {
            return false;
        }
        this.items.splice(this.items.indexOf(key), 1);
        return true;
    }

    has(key: string): boolean {
        return this.members.has(key);
    }

    peek(): readonly string[] {
        return this.items.slice();
    }

    clear(): void {
        this.items = [];
        this.members.clear();
    }

    get length(): number {
        return this.items.length;
    }
}
