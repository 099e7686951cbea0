#!/usr/bin/env node
/**
 * feed-race CLI
 *
 *   feed-race [config.json]
 *
 * Races the configured endpoints until the target number of distinct
 * transactions has been seen, a signal arrives, or maxDurationMs elapses.
 * Exit code 1 on bad config or when every runner failed.
 */

import { loadConfig, type RaceConfig } from './config.js';
import { ConfigError, errorMessage } from './errors.js';
import { startRace } from './race/run.js';
import { ShutdownCoordinator } from './race/shutdown.js';
import { formatReport } from './race/stats.js';
import { logger } from './util/logger.js';

async function main(): Promise<number> {
    let config: RaceConfig;
    try {
        config = loadConfig();
    } catch (err) {
        if (err instanceof ConfigError) {
            logger.error(err.message);
            return 1;
        }
        throw err;
    }

    logger.info(
        `Racing ${config.endpoints.length} endpoints on ${config.account} ` +
        `until ${config.transactions} transactions (${config.commitment})`
    );

    const shutdown = new ShutdownCoordinator();

    const onSignal = (signal: NodeJS.Signals) => {
        if (shutdown.trigger(signal)) logger.info(`Received ${signal}, shutting down...`);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    let timer: NodeJS.Timeout | undefined;
    if (config.maxDurationMs !== null) {
        const limit = config.maxDurationMs;
        timer = setTimeout(() => {
            if (shutdown.trigger('max-duration')) logger.info(`Run limit of ${limit}ms reached, shutting down...`);
        }, limit);
    }

    try {
        const race = startRace({
            config,
            endpoints: config.endpoints,
            logDir: config.logDir,
            connectTimeoutMs: config.connectTimeoutMs,
            shutdown,
        });

        const report = await race.finished;
        for (const line of formatReport(report)) logger.info(line);

        return report.runners.every(r => r.status === 'failed') ? 1 : 0;
    } finally {
        clearTimeout(timer);
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
    }
}

main()
    .then(code => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        logger.error('Fatal:', errorMessage(err));
        process.exitCode = 1;
    });
