/**
 * Tracked timers.
 *
 * Every timeout created through a registry is remembered until it fires or
 * is cleared, so `clearAll` on dispose leaves nothing pending. Timers are
 * unref'd: a cache idling in the background never keeps the process alive.
 */
export type TimerHandle = ReturnType<typeof setTimeout>;

export class TimerRegistry {
    private readonly active = new Set<TimerHandle>();

    /** Schedule a tracked timeout. Negative delays are clamped to 0. */
    schedule(callback: () => void, delayMs: number): TimerHandle {
        const timer = setTimeout(() => {
            this.active.delete(timer);
            callback();
        }, Math.max(0, delayMs));
        if (typeof timer.unref === 'function') {
            timer.unref();
        }
        this.active.add(timer);
        return timer;
    }

    /** Cancel a single tracked timer (safe to call with undefined). */
    clear(timer: TimerHandle | undefined): void {
        if (!timer) {
            return;
        }
        clearTimeout(timer);
        this.active.delete(timer);
    }

    clearAll(): void {
        for (const timer of this.active) {
            clearTimeout(timer);
        }
        this.active.clear();
    }

    get size(): number {
        return this.active.size;
    }
}
