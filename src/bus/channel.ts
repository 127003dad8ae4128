export type Received<T> = { kind: 'value'; value: T } | { kind: 'timeout' };

interface Waiter<T> {
    deliver: (value: T) => void;
}

/**
 * Unbounded many-producer queue with awaitable receives.
 *
 * A value sent while a receiver is waiting is handed straight to the oldest
 * waiter; otherwise it is buffered in send order.
 */
export class Channel<T> {
    private buffer: T[] = [];
    private waiters: Waiter<T>[] = [];

    send(value: T): void {
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter.deliver(value);
            return;
        }
        this.buffer.push(value);
    }

    receive(): Promise<T> {
        const buffered = this.take();
        if (buffered) {
            return Promise.resolve(buffered.value);
        }
        return new Promise<T>((resolve) => {
            this.waiters.push({ deliver: resolve });
        });
    }

    /**
     * Races a receive against a timer. When the timer wins the pending
     * receive is withdrawn, so a later send is buffered rather than lost.
     */
    receiveWithin(ms: number): Promise<Received<T>> {
        const buffered = this.take();
        if (buffered) {
            return Promise.resolve({ kind: 'value', value: buffered.value });
        }

        return new Promise<Received<T>>((resolve) => {
            const waiter: Waiter<T> = {
                deliver: (value) => {
                    clearTimeout(timer);
                    resolve({ kind: 'value', value });
                },
            };
            const timer = setTimeout(() => {
                const index = this.waiters.indexOf(waiter);
                if (index !== -1) this.waiters.splice(index, 1);
                resolve({ kind: 'timeout' });
            }, ms);
            this.waiters.push(waiter);
        });
    }

    /** Takes everything already buffered without waiting. */
    drain(): T[] {
        const values = this.buffer;
        this.buffer = [];
        return values;
    }

    private take(): { value: T } | undefined {
        if (this.buffer.length === 0) return undefined;
        return { value: this.buffer.splice(0, 1)[0] };
    }

    get pending(): number {
        return this.buffer.length;
    }
}
