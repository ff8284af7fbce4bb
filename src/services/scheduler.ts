import { CacheConfig, Clock, ProcessResult } from '../types/interfaces';
import { ProcessQueue } from './processQueue';
import { ResourceGovernor } from './resourceGovernor';
import { Diagnostics } from '../utils/diagnostics';
import { reportError } from '../utils/errorHandler';
import { TimerHandle, TimerRegistry } from '../utils/timers';

export interface SchedulerDeps {
    queue: ProcessQueue;
    governor: ResourceGovernor;
    timers: TimerRegistry;
    diagnostics: Diagnostics;
    clock: Clock;
    getConfig: () => CacheConfig;
    processKey: (key: string) => Promise<ProcessResult>;
    activeJobs: () => number;
}

const BACKLOG_FACTOR = 2;
const BUSY_FACTOR = 1.5;
const IDLE_FACTOR = 0.8;

/**
 * Periodic drain of the process queue.
 *
 * One chained timeout at a time. The interval adapts: it doubles while the
 * backlog is long, grows by half while the host is busy, and decays back
 * towards `tickInterval` after a few idle ticks. A tick never overlaps an
 * unfinished one, and ticks and `requestDrain` together drain at most once
 * per `tickInterval`.
 */
export class Scheduler {
    private readonly deps: SchedulerDeps;
    private timer: TimerHandle | undefined;
    private running = false;
    private ticking = false;
    private interval: number;
    private idleCycles = 0;
    private lastDrainAt: number | undefined;

    constructor(deps: SchedulerDeps) {
        this.deps = deps;
        this.interval = deps.getConfig().tickInterval;
    }

    get isActive(): boolean {
        return this.running;
    }

    get currentInterval(): number {
        return this.interval;
    }

    start(): void {
        if (this.running) {
            return;
        }
        this.running = true;
        this.interval = this.deps.getConfig().tickInterval;
        this.idleCycles = 0;
        this.scheduleNext();
        this.deps.diagnostics.debug(`Scheduler started (interval ${this.interval} ms)`);
    }

    stop(): void {
        this.running = false;
        this.deps.timers.clear(this.timer);
        this.timer = undefined;
    }

    /** Stop and start again with the interval reset to the configured tick. */
    restart(): void {
        this.stop();
        this.start();
    }

    /**
     * Drain now unless a tick is running or the host is busy. Resolves with
     * the number of keys taken from the queue.
     */
    async requestDrain(): Promise<number> {
        if (this.ticking || this.deps.governor.hostBusy()) {
            return 0;
        }
        return this.drain();
    }

    /**
     * One scheduler cycle: pick the next interval, then drain if there is
     * work. The interval is derived from `tickInterval` on every busy or
     * backlogged tick; only idle ticks decay the previous value.
     */
    async tick(): Promise<number> {
        if (this.ticking) {
            return 0;
        }
        const { queue, governor, diagnostics } = this.deps;
        const config = this.deps.getConfig();

        let next = config.tickInterval;
        if (queue.length > config.queueSizeThreshold) {
            next = Math.min(config.maxTickInterval, next * BACKLOG_FACTOR);
        }
        if (governor.hostBusy()) {
            this.interval = Math.min(config.maxTickInterval, Math.floor(next * BUSY_FACTOR));
            diagnostics.debug(`Host busy, skipping tick (next in ${this.interval} ms)`);
            return 0;
        }
        if (queue.length === 0) {
            this.idleCycles++;
            if (this.idleCycles > config.idleCyclesBeforeSpeedup) {
                this.interval = Math.max(config.tickInterval, Math.floor(this.interval * IDLE_FACTOR));
            }
            return 0;
        }
        this.idleCycles = 0;
        this.interval = next;
        return this.drain();
    }

    /** Throttled to one successful drain per `tickInterval`, whoever asks. */
    private async drain(): Promise<number> {
        const { queue, governor, diagnostics } = this.deps;
        const config = this.deps.getConfig();
        if (this.lastDrainAt !== undefined && this.deps.clock() - this.lastDrainAt < config.tickInterval) {
            return 0;
        }
        const size = Math.min(config.maxBatchPerTick, queue.length, governor.spareCapacity(this.deps.activeJobs()));
        if (size <= 0) {
            return 0;
        }
        this.ticking = true;
        try {
            const batch = queue.take(size);
            const settled = await Promise.allSettled(batch.map(key => this.deps.processKey(key)));
            settled.forEach((outcome, i) => {
                if (outcome.status === 'rejected') {
                    reportError(outcome.reason, `Processing ${batch[i]} failed`, diagnostics);
                }
            });
            this.lastDrainAt = this.deps.clock();
            diagnostics.debug(`Drained ${batch.length} key(s), ${queue.length} left`);
            return batch.length;
        } finally {
            this.ticking = false;
        }
    }

    private scheduleNext(): void {
        if (!this.running) {
            return;
        }
        this.timer = this.deps.timers.schedule(() => {
            this.timer = undefined;
            void this.runTick();
        }, this.interval);
    }

    private async runTick(): Promise<void> {
        try {
            await this.tick();
        } catch (err) {
            reportError(err, 'Scheduler tick failed', this.deps.diagnostics);
        } finally {
            this.scheduleNext();
        }
    }
}
