import { TimerHandle, TimerRegistry } from '../utils/timers';

/**
 * Per-key trailing debounce.
 *
 * `requestImmediate(key)` (re)starts that key's timer; only the last call in
 * a burst survives, so N calls inside one window fire `onFire(key)` once.
 */
export class DebounceController {
    private readonly pending = new Map<string, TimerHandle>();

    constructor(
        private windowMs: number,
        private readonly timers: TimerRegistry,
        private readonly onFire: (key: string) => void,
    ) {}

    setWindow(windowMs: number): void {
        this.windowMs = windowMs;
    }

    requestImmediate(key: string): void {
        this.timers.clear(this.pending.get(key));
        const timer = this.timers.schedule(() => {
            this.pending.delete(key);
            this.onFire(key);
        }, this.windowMs);
        this.pending.set(key, timer);
    }

    cancel(key: string): boolean {
        const timer = this.pending.get(key);
        if (!timer) {
            return false;
        }
        this.timers.clear(timer);
        this.pending.delete(key);
        return true;
    }

    cancelAll(): void {
        for (const timer of this.pending.values()) {
            this.timers.clear(timer);
        }
        this.pending.clear();
    }

    isPending(key: string): boolean {
        return this.pending.has(key);
    }

    get pendingCount(): number {
        return this.pending.size;
    }
}
