/**
 * Promise-based concurrency limiter.
 *
 * Up to `maxConcurrent` tasks run at once; the rest wait in a FIFO queue and
 * start as earlier tasks settle. A failing task does not block the queue.
 */
export class ConcurrencyLimiter {
    private maxConcurrent: number;
    private running = 0;
    private readonly queue: Array<() => void> = [];

    constructor(maxConcurrent: number) {
        this.maxConcurrent = Math.max(1, Math.floor(maxConcurrent));
    }

    /** Raising the limit starts waiting tasks immediately; lowering it lets running ones finish. */
    setLimit(maxConcurrent: number): void {
        this.maxConcurrent = Math.max(1, Math.floor(maxConcurrent));
        this.dequeue();
    }

    get activeCount(): number {
        return this.running;
    }

    get pendingCount(): number {
        return this.queue.length;
    }

    run<T>(fn: () => Promise<T>): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            const execute = () => {
                this.running++;
                let result: Promise<T>;
                try {
                    result = fn();
                } catch (err) {
                    this.running--;
                    this.dequeue();
                    reject(err);
                    return;
                }
                result.then(
                    (value) => {
                        this.running--;
                        this.dequeue();
                        resolve(value);
                    },
                    (err: unknown) => {
                        this.running--;
                        this.dequeue();
                        reject(err);
                    },
                );
            };

            if (this.running < this.maxConcurrent) {
                execute();
            } else {
                this.queue.push(execute);
            }
        });
    }

    private dequeue(): void {
        while (this.queue.length > 0 && this.running < this.maxConcurrent) {
            const next = this.queue.shift();
            if (next) {
                next();
            }
        }
    }
}
