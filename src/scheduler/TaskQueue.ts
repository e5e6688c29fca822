import type { Task } from './types';

type Waiter = (task: Task | null) => void;

/**
 * Priority queue shared by the worker pool. Higher priority first, ties by
 * ascending id. `take()` waits while the queue is empty and resolves null once
 * it is closed.
 */
export class TaskQueue {
    private heap: Task[] = [];
    private waiters: Waiter[] = [];
    private closed = false;

    get size(): number {
        return this.heap.length;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    push(task: Task): void {
        if (this.closed) {
            throw new Error(`Queue is closed, cannot admit task ${task.id}`);
        }

        const waiter = this.waiters.shift();
        if (waiter) {
            waiter(task);
            return;
        }

        this.heap.push(task);
        this.siftUp(this.heap.length - 1);
    }

    take(): Promise<Task | null> {
        const next = this.pop();
        if (next) return Promise.resolve(next);
        if (this.closed) return Promise.resolve(null);

        return new Promise(resolve => {
            this.waiters.push(resolve);
        });
    }

    /**
     * Remove every queued task, in the order they would have been dispatched.
     */
    drain(): Task[] {
        const drained: Task[] = [];
        let next = this.pop();
        while (next) {
            drained.push(next);
            next = this.pop();
        }
        return drained;
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        const waiters = this.waiters;
        this.waiters = [];
        waiters.forEach(wake => wake(null));
    }

    private pop(): Task | undefined {
        const top = this.heap[0];
        const last = this.heap.pop();
        if (top === undefined || last === undefined) return undefined;

        if (this.heap.length > 0) {
            this.heap[0] = last;
            this.siftDown(0);
        }
        return top;
    }

    // a runs before b
    private before(a: Task, b: Task): boolean {
        if (a.priority !== b.priority) return a.priority > b.priority;
        return a.id < b.id;
    }

    private siftUp(index: number): void {
        let child = index;
        while (child > 0) {
            const parent = (child - 1) >> 1;
            if (!this.before(this.heap[child], this.heap[parent])) break;
            this.swap(child, parent);
            child = parent;
        }
    }

    private siftDown(index: number): void {
        let parent = index;
        const length = this.heap.length;
        while (true) {
            const left = parent * 2 + 1;
            const right = left + 1;
            let first = parent;

            if (left < length && this.before(this.heap[left], this.heap[first])) first = left;
            if (right < length && this.before(this.heap[right], this.heap[first])) first = right;
            if (first === parent) return;

            this.swap(parent, first);
            parent = first;
        }
    }

    private swap(i: number, j: number): void {
        const tmp = this.heap[i];
        this.heap[i] = this.heap[j];
        this.heap[j] = tmp;
    }
}
