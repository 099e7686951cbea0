/**
 * Shutdown Coordinator + completion latch
 *
 * ShutdownCoordinator is a one-shot broadcast over an AbortSignal: any runner
 * (or the CLI on a signal) may trigger it, every runner listens on the signal.
 * Extra triggers are no-ops.
 *
 * CompletionLatch counts terminated runners and opens once all configured
 * endpoints have arrived, independent of which variants are running.
 */

export interface ShutdownNotice {
    source: string;
    at: number;
}

export class ShutdownCoordinator {
    private readonly controller = new AbortController();
    private notice: ShutdownNotice | null = null;

    /**
     * Returns true only for the call that actually fired the signal.
     */
    trigger(source: string): boolean {
        if (this.notice) return false;

        this.notice = { source, at: Date.now() };
        this.controller.abort(this.notice);
        return true;
    }

    get isTriggered(): boolean {
        return this.notice !== null;
    }

    get source(): string | null {
        return this.notice?.source ?? null;
    }

    /** Aborted with the ShutdownNotice as reason */
    get signal(): AbortSignal {
        return this.controller.signal;
    }
}

export class CompletionLatch {
    private readonly expected: number;
    private arrived = 0;
    private readonly done: Promise<void>;
    private readonly resolveDone: () => void;

    constructor(expected: number) {
        this.expected = expected;
        let resolveDone: () => void = () => undefined;
        this.done = new Promise<void>(resolve => {
            resolveDone = resolve;
        });
        this.resolveDone = resolveDone;
        if (expected <= 0) this.resolveDone();
    }

    /**
     * Returns true for the arrival that opens the latch.
     */
    arrive(): boolean {
        if (this.arrived >= this.expected) return false;
        this.arrived++;
        if (this.arrived === this.expected) {
            this.resolveDone();
            return true;
        }
        return false;
    }

    get count(): number {
        return this.arrived;
    }

    get isOpen(): boolean {
        return this.arrived >= this.expected;
    }

    wait(): Promise<void> {
        return this.done;
    }
}
