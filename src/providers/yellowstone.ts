/**
 * Transaction-only Yellowstone runner
 *
 * Subscribes to transactions that include the watched account and feeds
 * every match into the race.
 */

import { decodeGeyserTransaction } from '../decode/geyser.js';
import type { GeyserSubscribeRequest, GeyserUpdate } from '../ingest/types.js';
import { GeyserRunner, toWireCommitment } from './geyserRunner.js';

export class YellowstoneRunner extends GeyserRunner {
    protected buildRequest(): GeyserSubscribeRequest {
        return {
            transactions: {
                account: { account_include: [this.ctx.config.account] },
            },
            commitment: toWireCommitment(this.ctx.config.commitment),
        };
    }

    protected onTransaction(update: Extract<GeyserUpdate, { kind: 'transaction' }>): void {
        const tx = decodeGeyserTransaction(update.transaction);
        if (!tx.accountKeys.includes(this.ctx.config.account)) return;

        const timestamp = this.now();
        this.writeLog(timestamp, this.endpoint.name, tx.signature);
        this.log.debug(`Transaction at slot ${update.transaction.slot}: ${tx.signature}`);
        this.recordRace(tx.signature, timestamp);
    }
}
