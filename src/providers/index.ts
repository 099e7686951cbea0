/**
 * Runner factory: one variant per endpoint kind
 */

import { EndpointKind, type RunnerState, type RunnerSummary } from '../types.js';
import type { RunnerContext } from './runner.js';
import { ShredstreamProxyRunner } from './shredstreamProxy.js';
import { YellowstoneRunner } from './yellowstone.js';
import { YellowstoneAccountsRunner } from './yellowstoneAccounts.js';

/** What the run coordinator sees of a runner, whatever its update type */
export interface RaceRunner {
    readonly state: RunnerState;
    run(): Promise<RunnerSummary>;
}

export function createRunner(ctx: RunnerContext): RaceRunner {
    switch (ctx.endpoint.kind) {
        case EndpointKind.Yellowstone:
            return new YellowstoneRunner(ctx);
        case EndpointKind.YellowstoneAccounts:
            return new YellowstoneAccountsRunner(ctx);
        case EndpointKind.Shredstream:
            return new ShredstreamProxyRunner(ctx);
    }
}

export { EndpointRunner, type RunnerContext } from './runner.js';
export { YellowstoneRunner, YellowstoneAccountsRunner, ShredstreamProxyRunner };
