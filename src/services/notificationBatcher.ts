import { Clock, EntryKind, UpdateEvent, UpdateSubscriber } from '../types/interfaces';
import { MAX_SUBSCRIBERS } from '../constants';
import { Diagnostics } from '../utils/diagnostics';
import { reportError } from '../utils/errorHandler';
import { TimerHandle, TimerRegistry } from '../utils/timers';

export type Unsubscribe = (() => void) & { failed?: boolean; reason?: string };

/**
 * Collects "entry updated" events and delivers them once per window.
 *
 * The first event opens a window of `windowMs`; everything that arrives
 * before it closes goes out in the same flush. Subscribers get the first
 * event plus the whole batch and are expected to refresh in full. Delivery
 * always happens from the timer, never from the caller's stack.
 */
export class NotificationBatcher {
    private readonly subscribers: UpdateSubscriber[] = [];
    private pending: UpdateEvent[] = [];
    private timer: TimerHandle | undefined;
    private disposed = false;

    constructor(
        private windowMs: number,
        private readonly timers: TimerRegistry,
        private readonly diagnostics: Diagnostics,
        private readonly clock: Clock,
    ) {}

    setWindow(windowMs: number): void {
        this.windowMs = windowMs;
    }

    subscribe(cb: UpdateSubscriber): Unsubscribe {
        if (this.subscribers.length >= MAX_SUBSCRIBERS) {
            const reason = 'subscriber limit reached, rejecting new subscriber';
            this.diagnostics.warn(reason);
            const noop: Unsubscribe = () => undefined;
            noop.failed = true;
            noop.reason = reason;
            return noop;
        }
        this.subscribers.push(cb);
        let removed = false;
        return () => {
            if (removed) { return; }
            removed = true;
            const idx = this.subscribers.indexOf(cb);
            if (idx >= 0) { this.subscribers.splice(idx, 1); }
        };
    }

    notifyUpdated(key: string, kind: EntryKind): void {
        if (this.disposed) {
            return;
        }
        this.pending.push({ key, kind, at: this.clock() });
        if (this.timer === undefined) {
            this.timer = this.timers.schedule(() => {
                this.timer = undefined;
                this.flush();
            }, this.windowMs);
        }
    }

    /** Deliver whatever is pending right away and close the window. */
    flushNow(): void {
        this.timers.clear(this.timer);
        this.timer = undefined;
        this.flush();
    }

    private flush(): void {
        if (this.pending.length === 0) {
            return;
        }
        const batch = this.pending;
        this.pending = [];
        const first = batch[0];
        for (const cb of this.subscribers.slice()) {
            try {
                cb(first.key, first.kind, batch);
            } catch (err) {
                reportError(err, 'update subscriber threw', this.diagnostics);
            }
        }
    }

    get pendingCount(): number {
        return this.pending.length;
    }

    get subscriberCount(): number {
        return this.subscribers.length;
    }

    /** Drop pending events and subscribers; later events are ignored. */
    dispose(): void {
        this.disposed = true;
        this.timers.clear(this.timer);
        this.timer = undefined;
        this.pending = [];
        this.subscribers.length = 0;
    }
}
