/**
 * Unbounded single-consumer hand-off. Senders never wait; `receive()` waits
 * for the next value.
 */
export class Channel<T> {
    private buffer: T[] = [];
    private receivers: Array<(value: T) => void> = [];

    send(value: T): void {
        const receiver = this.receivers.shift();
        if (receiver) {
            receiver(value);
        } else {
            this.buffer.push(value);
        }
    }

    receive(): Promise<T> {
        if (this.buffer.length > 0) {
            const value = this.buffer.shift();
            if (value !== undefined) return Promise.resolve(value);
        }
        return new Promise(resolve => {
            this.receivers.push(resolve);
        });
    }

    get pending(): number {
        return this.buffer.length;
    }
}
