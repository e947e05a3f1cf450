export type TakeResult<T> =
    | { kind: "item"; value: T }
    | { kind: "timeout" }
    | { kind: "closed" };

/**
 * Single-consumer FIFO with a fixed capacity. `offer` never blocks: it reports
 * false when the queue is full or closed. `take` waits for the next item, the
 * timeout or closure. Items buffered before `close` are still handed out.
 */
export class BoundedQueue<T> {
    private readonly items: T[] = [];
    private closed = false;
    private waiter: ((result: TakeResult<T>) => void) | null = null;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error(`BoundedQueue capacity must be a positive integer, got ${capacity}`);
        }
    }

    get size(): number {
        return this.items.length;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    offer(item: T): boolean {
        if (this.closed) {
            return false;
        }
        if (this.waiter) {
            const resolve = this.waiter;
            this.waiter = null;
            resolve({ kind: "item", value: item });
            return true;
        }
        if (this.items.length >= this.capacity) {
            return false;
        }
        this.items.push(item);
        return true;
    }

    take(timeoutMs?: number): Promise<TakeResult<T>> {
        if (this.waiter) {
            return Promise.reject(new Error("BoundedQueue supports a single consumer"));
        }
        if (this.items.length > 0) {
            const [value] = this.items.splice(0, 1);
            return Promise.resolve({ kind: "item", value });
        }
        if (this.closed) {
            return Promise.resolve({ kind: "closed" });
        }
        if (timeoutMs !== undefined && timeoutMs <= 0) {
            return Promise.resolve({ kind: "timeout" });
        }

        return new Promise<TakeResult<T>>((resolve) => {
            let timer: ReturnType<typeof setTimeout> | null = null;
            const settle = (result: TakeResult<T>) => {
                if (timer) {
                    clearTimeout(timer);
                }
                resolve(result);
            };
            this.waiter = settle;
            if (timeoutMs !== undefined) {
                timer = setTimeout(() => {
                    if (this.waiter === settle) {
                        this.waiter = null;
                        resolve({ kind: "timeout" });
                    }
                }, timeoutMs);
            }
        });
    }

    close(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        if (this.waiter) {
            const resolve = this.waiter;
            this.waiter = null;
            resolve({ kind: "closed" });
        }
    }
}
