/**
 * Endpoint Runner
 *
 * Shared skeleton for every provider variant:
 *
 *   connecting -> subscribed -> streaming -> terminated
 *
 * Streaming waits on (next stream item | shutdown) and acts on whichever
 * settles first. A message already in hand is always finished before the
 * shutdown signal is checked again.
 *
 * Failure semantics:
 * - ConnectError / SubscribeError / LogWriteError reject run()
 * - StreamError or stream end: logged, loop exits, run() resolves
 * - DecodeError: logged at debug, message dropped, loop continues
 *
 * Variants implement connect(), subscribe() and handleUpdate() only.
 */

import { DecodeError, StreamError, SubscribeError, errorMessage } from '../errors.js';
import type { Comparator } from '../race/comparator.js';
import type { DualStreamTracker } from '../race/dualStream.js';
import type { ShutdownCoordinator } from '../race/shutdown.js';
import type { EndpointLog, LogWriter } from '../util/logFile.js';
import { logger as rootLogger, type Logger } from '../util/logger.js';
import type { Connectors, StreamItem, UpdateStream } from '../ingest/types.js';
import type {
    AddResult,
    Endpoint,
    ExitReason,
    RunConfig,
    RunnerState,
    RunnerSummary,
} from '../types.js';

// ============================================================================
// CONTEXT
// ============================================================================

/** Everything a runner shares with the rest of the run */
export interface RunnerContext {
    endpoint: Endpoint;
    config: RunConfig;
    comparator: Comparator;
    dualStream: DualStreamTracker;
    shutdown: ShutdownCoordinator;
    logs: LogWriter;
    connectors: Connectors;
    /** Run epoch, seconds */
    startTime: number;
    /** Wall-clock seconds; one clock for every runner */
    clock: () => number;
    connectTimeoutMs: number;
    logger?: Logger;
}

const SHUTDOWN = Symbol('shutdown');

// ============================================================================
// BASE RUNNER
// ============================================================================

export abstract class EndpointRunner<U> {
    protected readonly ctx: RunnerContext;
    protected readonly endpoint: Endpoint;
    protected readonly log: Logger;

    private runState: RunnerState = 'idle';
    private stopAfterMessage = false;
    private logFile: EndpointLog | null = null;

    protected transactionsSeen = 0;
    protected accountUpdatesSeen = 0;
    protected duplicatesDropped = 0;
    protected decodeFailures = 0;

    constructor(ctx: RunnerContext) {
        this.ctx = ctx;
        this.endpoint = ctx.endpoint;
        this.log = (ctx.logger ?? rootLogger).child(`[${ctx.endpoint.name}]`);
    }

    // ========================================================================
    // VARIANT HOOKS
    // ========================================================================

    /** Open the transport. Throws ConnectError. */
    protected abstract connect(): Promise<void>;

    /** Send the subscription and return the update stream. Throws SubscribeError. */
    protected abstract subscribe(): Promise<UpdateStream<U>>;

    /**
     * Act on one decoded message. DecodeError drops the message,
     * StreamError ends the loop, anything else is fatal.
     */
    protected abstract handleUpdate(update: U): Promise<void>;

    /** Release transport resources; called once on every exit path */
    protected abstract disconnect(): void;

    /** File name for this runner's arrival log */
    protected logName(): string {
        return this.endpoint.name;
    }

    /** Called after the loop exits, before resources are released */
    protected onStreamEnd(): void {
        // Variants may log local statistics
    }

    // ========================================================================
    // PUBLIC API
    // ========================================================================

    get state(): RunnerState {
        return this.runState;
    }

    async run(): Promise<RunnerSummary> {
        if (this.runState !== 'idle') {
            throw new Error(`Runner ${this.endpoint.name} already started`);
        }

        const logFile = this.ctx.logs.open(this.logName());
        this.logFile = logFile;
        let stream: UpdateStream<U> | null = null;

        try {
            this.runState = 'connecting';
            this.log.info(`Connecting to endpoint: ${this.endpoint.url}`);
            await this.connect();
            this.log.info('Connected successfully');

            this.runState = 'subscribed';
            try {
                stream = await this.subscribe();
            } catch (err) {
                if (err instanceof SubscribeError) throw err;
                throw new SubscribeError(`Subscribe failed: ${errorMessage(err)}`, {
                    endpoint: this.endpoint.name,
                    cause: err,
                });
            }

            this.runState = 'streaming';
            const exitReason = await this.streamLoop(stream);

            this.onStreamEnd();
            this.log.info(
                `Stream closed (${exitReason}). Total transactions: ${this.transactionsSeen}, ` +
                `Account updates: ${this.accountUpdatesSeen}`
            );

            return this.summary(exitReason);
        } finally {
            this.runState = 'terminated';
            stream?.close();
            this.disconnect();
            logFile.close();
        }
    }

    // ========================================================================
    // STREAM LOOP
    // ========================================================================

    /**
     * One wait on (next item | shutdown). The abort listener lives for this
     * wait only, so nothing keeps a settled item reachable afterwards.
     */
    private nextOrShutdown(stream: UpdateStream<U>): Promise<StreamItem<U> | typeof SHUTDOWN> {
        const signal = this.ctx.shutdown.signal;
        let onAbort = (): void => undefined;
        const stopped = new Promise<typeof SHUTDOWN>(resolve => {
            onAbort = () => resolve(SHUTDOWN);
            signal.addEventListener('abort', onAbort, { once: true });
        });

        return Promise.race([stopped, stream.next()]).finally(() => {
            signal.removeEventListener('abort', onAbort);
        });
    }

    private async streamLoop(stream: UpdateStream<U>): Promise<ExitReason> {
        for (;;) {
            if (this.ctx.shutdown.isTriggered) {
                this.log.info('Received stop signal...');
                return 'shutdown-requested';
            }

            const next = await this.nextOrShutdown(stream);

            if (next === SHUTDOWN) {
                this.log.info('Received stop signal...');
                return 'shutdown-requested';
            }

            if (next.kind === 'end') {
                this.log.info('Stream ended');
                return 'stream-closed';
            }

            if (next.kind === 'error') {
                this.log.error(`Error receiving message: ${next.error.message}`);
                return 'stream-error';
            }

            try {
                await this.handleUpdate(next.update);
            } catch (err) {
                if (err instanceof DecodeError) {
                    this.decodeFailures++;
                    this.log.debug(`Dropped undecodable message: ${err.message}`);
                    continue;
                }
                if (err instanceof StreamError) {
                    this.log.error(`Stream failure: ${err.message}`);
                    return 'stream-error';
                }
                throw err;
            }

            if (this.stopAfterMessage) {
                return 'target-reached';
            }
        }
    }

    // ========================================================================
    // OBSERVATIONS
    // ========================================================================

    protected now(): number {
        return this.ctx.clock();
    }

    protected writeLog(timestamp: number, label: string, signature: string): void {
        if (!this.logFile) throw new Error(`Runner ${this.endpoint.name} has no open log`);
        this.logFile.writeEntry(timestamp, label, signature);
    }

    /**
     * Fold a matching transaction into the race. The add that reaches the
     * target fires shutdown; the loop exits after the current message.
     */
    protected recordRace(signature: string, timestamp: number): AddResult {
        this.transactionsSeen++;

        const result = this.ctx.comparator.add(this.endpoint.name, {
            signature,
            timestamp,
            startTime: this.ctx.startTime,
        });

        if (!result.accepted) {
            this.duplicatesDropped++;
            this.log.trace(`Duplicate observation ignored: ${signature}`);
        }

        if (result.reachedTarget) {
            this.log.info(
                `Endpoint ${this.endpoint.name} shutting down after ${this.transactionsSeen} transactions seen ` +
                `and ${this.ctx.config.transactions} by all workers`
            );
            this.ctx.shutdown.trigger(this.endpoint.name);
            this.stopAfterMessage = true;
        }

        return result;
    }

    private summary(exitReason: ExitReason): RunnerSummary {
        return {
            endpoint: this.endpoint.name,
            kind: this.endpoint.kind,
            exitReason,
            transactionsSeen: this.transactionsSeen,
            accountUpdatesSeen: this.accountUpdatesSeen,
            duplicatesDropped: this.duplicatesDropped,
            decodeFailures: this.decodeFailures,
        };
    }
}
