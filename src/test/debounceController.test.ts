import { DebounceController } from '../services/debounceController';
import { TimerRegistry } from '../utils/timers';

describe('DebounceController', () => {
    const WINDOW = 100;
    let fired: string[];
    let timers: TimerRegistry;
    let debounce: DebounceController;

    beforeEach(() => {
        jest.useFakeTimers();
        fired = [];
        timers = new TimerRegistry();
        debounce = new DebounceController(WINDOW, timers, key => fired.push(key));
    });

    afterEach(() => {
        timers.clearAll();
        jest.useRealTimers();
    });

    it.each([1, 5, 100])('coalesces %i calls inside one window into a single fire', (m) => {
        for (let i = 0; i < m; i++) {
            debounce.requestImmediate('/p/a.ts');
        }
        jest.advanceTimersByTime(WINDOW - 1);
        expect(fired).toEqual([]);
        jest.advanceTimersByTime(1);
        expect(fired).toEqual(['/p/a.ts']);
        jest.advanceTimersByTime(WINDOW * 10);
        expect(fired).toHaveLength(1);
    });

    it.each([1, 5, 100])('%i calls spaced just under the window still fire once', (m) => {
        for (let i = 0; i < m; i++) {
            debounce.requestImmediate('/p/a.ts');
            jest.advanceTimersByTime(WINDOW - 1);
        }
        expect(fired).toEqual([]);
        jest.advanceTimersByTime(1);
        expect(fired).toEqual(['/p/a.ts']);
    });

    it.each([1, 5, 100])('%i calls spaced just over the window fire once each', (m) => {
        for (let i = 0; i < m; i++) {
            debounce.requestImmediate('/p/a.ts');
            jest.advanceTimersByTime(WINDOW + 1);
        }
        expect(fired).toHaveLength(m);
    });

    it('debounces each key independently', () => {
        debounce.requestImmediate('/p/a.ts');
        debounce.requestImmediate('/p/b.ts');
        debounce.requestImmediate('/p/a.ts');
        expect(debounce.pendingCount).toBe(2);
        jest.advanceTimersByTime(WINDOW);
        expect(fired.sort()).toEqual(['/p/a.ts', '/p/b.ts']);
        expect(debounce.pendingCount).toBe(0);
    });

    it('cancel drops a pending fire', () => {
        debounce.requestImmediate('/p/a.ts');
        expect(debounce.isPending('/p/a.ts')).toBe(true);
        expect(debounce.cancel('/p/a.ts')).toBe(true);
        expect(debounce.cancel('/p/a.ts')).toBe(false);
        jest.advanceTimersByTime(WINDOW);
        expect(fired).toEqual([]);
    });

    it('cancelAll leaves no timers behind', () => {
        debounce.requestImmediate('/p/a.ts');
        debounce.requestImmediate('/p/b.ts');
        debounce.cancelAll();
        expect(timers.size).toBe(0);
        jest.advanceTimersByTime(WINDOW);
        expect(fired).toEqual([]);
    });

    it('uses the new window after setWindow', () => {
        debounce.setWindow(500);
        debounce.requestImmediate('/p/a.ts');
        jest.advanceTimersByTime(499);
        expect(fired).toEqual([]);
        jest.advanceTimersByTime(1);
        expect(fired).toEqual(['/p/a.ts']);
    });
});
