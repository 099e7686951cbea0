/**
 * Dual-stream Yellowstone runner
 *
 * One subscription carries both the transaction filter and an account
 * filter on the watched account. Each channel is timed separately:
 *
 *   <name>_TX    transaction touching the account
 *   <name>_ACCT  account write, keyed by its txn_signature
 *
 * Only transactions enter the race. Both channels feed this runner's
 * LocalStreamTracker and the run-wide DualStreamTracker.
 */

import bs58 from 'bs58';
import { accountWriteSignature, decodeGeyserTransaction } from '../decode/geyser.js';
import type { GeyserSubscribeRequest, GeyserUpdate } from '../ingest/types.js';
import { LocalStreamTracker } from '../race/dualStream.js';
import { formatDualStream, summarizeLocalStreams } from '../race/stats.js';
import type { DualStreamRecord, StreamPairing } from '../types.js';
import type { RunnerContext } from './runner.js';
import { GeyserRunner, toWireCommitment } from './geyserRunner.js';

/** Account updates logged at info before going quiet */
const ACCOUNT_LOG_LIMIT = 10;

const short = (s: string) => s.slice(0, 8);

export class YellowstoneAccountsRunner extends GeyserRunner {
    private readonly local: LocalStreamTracker;

    constructor(ctx: RunnerContext) {
        super(ctx);
        this.local = new LocalStreamTracker(ctx.endpoint.name);
    }

    /** This runner's first-sighting records */
    localRecords(): DualStreamRecord[] {
        return this.local.snapshot();
    }

    protected logName(): string {
        return `${this.endpoint.name}_dual_stream`;
    }

    protected buildRequest(): GeyserSubscribeRequest {
        const account = this.ctx.config.account;
        return {
            transactions: {
                account: { account_include: [account] },
            },
            accounts: {
                account: { account: [account] },
            },
            commitment: toWireCommitment(this.ctx.config.commitment),
        };
    }

    protected onTransaction(update: Extract<GeyserUpdate, { kind: 'transaction' }>): void {
        const tx = decodeGeyserTransaction(update.transaction);
        if (!tx.accountKeys.includes(this.ctx.config.account)) return;

        const timestamp = this.now();
        const signature = tx.signature;
        const name = this.endpoint.name;

        this.writeLog(timestamp, `${name}_TX`, signature);

        const pairing = this.local.recordTransaction(signature, timestamp);
        this.ctx.dualStream.observeTransaction(name, signature, timestamp);
        if (pairing) this.logPairing(pairing);

        this.recordRace(signature, timestamp);
    }

    protected onAccount(update: Extract<GeyserUpdate, { kind: 'account' }>): void {
        this.accountUpdatesSeen++;

        const signature = accountWriteSignature(update.txnSignature);
        if (!signature) {
            this.log.trace(`Account update at slot ${update.slot} without txn_signature`);
            return;
        }

        const timestamp = this.now();
        const name = this.endpoint.name;

        if (this.accountUpdatesSeen <= ACCOUNT_LOG_LIMIT) {
            this.log.info(
                `Account update #${this.accountUpdatesSeen} for ${short(bs58.encode(update.pubkey))} ` +
                `with sig ${short(signature)} at ${timestamp.toFixed(3)} (slot ${update.slot})`
            );
        }

        this.writeLog(timestamp, `${name}_ACCT`, signature);

        const pairing = this.local.recordAccount(signature, timestamp);
        this.ctx.dualStream.observeAccount(name, signature, timestamp);
        if (pairing) this.logPairing(pairing);
    }

    protected onStreamEnd(): void {
        const lines = formatDualStream(
            summarizeLocalStreams(this.localRecords()),
            `STREAM STATISTICS FOR ${this.endpoint.name}`,
            false
        );
        for (const line of lines) this.log.info(line);
    }

    private logPairing(pairing: StreamPairing): void {
        const order = pairing.leader === 'account' ? 'later' : 'earlier';
        this.log.info(
            `Dual stream matched! Acct: ${pairing.accountTimestamp.toFixed(3)}, ` +
            `TX: ${pairing.transactionTimestamp.toFixed(3)}, ` +
            `TX was ${Math.abs(pairing.deltaMs).toFixed(3)}ms ${order} - sig: ${short(pairing.signature)}`
        );
    }
}
