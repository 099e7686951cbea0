/**
 * StreamReader
 *
 * Turns an event-emitting Readable (gRPC call) into a pull stream of
 * update / error / end items, preserving delivery order.
 *
 * - next() never rejects; errors arrive as { kind: 'error' }
 * - Buffered updates are drained before the terminal item
 * - Source is paused above highWaterMark and resumed below half of it
 */

import type { Readable } from 'node:stream';
import { StreamError, errorMessage } from '../errors.js';
import type { StreamItem, UpdateStream } from './types.js';

const DEFAULT_HIGH_WATER_MARK = 1024;

export class StreamReader<T> implements UpdateStream<T> {
    private readonly source: Readable;
    private readonly onClose: (() => void) | null;
    private readonly highWaterMark: number;

    private readonly buffer: Array<StreamItem<T>> = [];
    private readonly waiters: Array<(item: StreamItem<T>) => void> = [];
    private terminal: StreamItem<T> | null = null;
    private paused = false;
    private closed = false;

    constructor(source: Readable, options: { onClose?: () => void; highWaterMark?: number } = {}) {
        this.source = source;
        this.onClose = options.onClose ?? null;
        this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;

        source.on('data', (chunk: T) => this.push(chunk));
        source.on('error', (err: unknown) => {
            this.finish({
                kind: 'error',
                error: new StreamError(errorMessage(err), { cause: err }),
            });
        });
        source.on('end', () => this.finish({ kind: 'end' }));
        source.on('close', () => this.finish({ kind: 'end' }));
    }

    next(): Promise<StreamItem<T>> {
        const item = this.buffer.shift();
        if (item) {
            this.maybeResume();
            return Promise.resolve(item);
        }

        if (this.terminal) return Promise.resolve(this.terminal);

        return new Promise(resolve => {
            this.waiters.push(resolve);
        });
    }

    /**
     * Stop reading. Pending and later next() calls resolve to end.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.buffer.length = 0;
        this.finish({ kind: 'end' });
        this.onClose?.();
    }

    get buffered(): number {
        return this.buffer.length;
    }

    private push(update: T): void {
        if (this.closed || this.terminal) return;

        const waiter = this.waiters.shift();
        if (waiter) {
            waiter({ kind: 'update', update });
            return;
        }

        this.buffer.push({ kind: 'update', update });
        if (!this.paused && this.buffer.length >= this.highWaterMark) {
            this.paused = true;
            this.source.pause();
        }
    }

    private finish(item: StreamItem<T>): void {
        if (this.terminal) return;
        this.terminal = item;

        // Waiters only exist while the buffer is empty
        for (const waiter of this.waiters.splice(0)) waiter(item);
    }

    private maybeResume(): void {
        if (this.paused && this.buffer.length < this.highWaterMark / 2) {
            this.paused = false;
            this.source.resume();
        }
    }
}
