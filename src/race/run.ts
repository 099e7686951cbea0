/**
 * Run coordinator
 *
 * Builds the shared trackers, starts one runner per endpoint and joins
 * them. The report is produced once the completion latch has seen every
 * configured endpoint terminate, whether it completed or failed.
 */

import { errorMessage } from '../errors.js';
import { connectYellowstone } from '../ingest/geyser.js';
import { connectShredstream } from '../ingest/shredstream.js';
import type { Connectors } from '../ingest/types.js';
import { createRunner } from '../providers/index.js';
import type { Endpoint, RunConfig, RunnerOutcome, RunnerSummary } from '../types.js';
import { nowSeconds, type Clock } from '../util/clock.js';
import { LogWriter } from '../util/logFile.js';
import { logger as rootLogger, type Logger } from '../util/logger.js';
import { Comparator } from './comparator.js';
import { DualStreamTracker } from './dualStream.js';
import { CompletionLatch, ShutdownCoordinator } from './shutdown.js';
import { summarizeDualStream, summarizeRaces, type RaceReport } from './stats.js';

export const DEFAULT_CONNECTORS: Connectors = {
    geyser: connectYellowstone,
    shredstream: connectShredstream,
};

export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

export interface RaceOptions {
    config: RunConfig;
    endpoints: Endpoint[];
    logDir: string;
    connectTimeoutMs?: number;
    connectors?: Connectors;
    clock?: Clock;
    /** Supply one to trigger shutdown from outside (signals, timers) */
    shutdown?: ShutdownCoordinator;
    logger?: Logger;
}

export interface RaceHandle {
    /** One promise per endpoint name; rejects on connect/subscribe/log failure */
    handles: Map<string, Promise<RunnerSummary>>;
    /** Resolves after every runner has settled */
    finished: Promise<RaceReport>;
    shutdown: ShutdownCoordinator;
    comparator: Comparator;
    dualStream: DualStreamTracker;
}

export function startRace(options: RaceOptions): RaceHandle {
    const log = options.logger ?? rootLogger;
    const clock = options.clock ?? nowSeconds;
    const comparator = new Comparator(options.config.transactions);
    const dualStream = new DualStreamTracker();
    const shutdown = options.shutdown ?? new ShutdownCoordinator();
    const logs = new LogWriter(options.logDir);
    const latch = new CompletionLatch(options.endpoints.length);
    const startTime = clock();

    const handles = new Map<string, Promise<RunnerSummary>>();
    const outcomes: Array<Promise<RunnerOutcome>> = [];

    for (const endpoint of options.endpoints) {
        const runner = createRunner({
            endpoint,
            config: options.config,
            comparator,
            dualStream,
            shutdown,
            logs,
            connectors: options.connectors ?? DEFAULT_CONNECTORS,
            startTime,
            clock,
            connectTimeoutMs: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
            logger: log,
        });

        const handle = runner.run();
        handles.set(endpoint.name, handle);

        outcomes.push(
            handle.then(
                (summary): RunnerOutcome => {
                    latch.arrive();
                    return { endpoint: endpoint.name, status: 'completed', summary };
                },
                (err: unknown): RunnerOutcome => {
                    latch.arrive();
                    log.error(`[${endpoint.name}] Runner failed: ${errorMessage(err)}`);
                    return { endpoint: endpoint.name, status: 'failed', error: errorMessage(err) };
                }
            )
        );
    }

    const names = options.endpoints.map(e => e.name);
    const finished = latch.wait().then(async (): Promise<RaceReport> => {
        const runners = await Promise.all(outcomes);
        log.debug(`All ${runners.length} runners terminated`);
        return {
            races: summarizeRaces(comparator.records(), names),
            dualStream: summarizeDualStream(dualStream.snapshot()),
            runners,
        };
    });

    return { handles, finished, shutdown, comparator, dualStream };
}
