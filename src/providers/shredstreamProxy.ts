/**
 * ShredStream proxy runner
 *
 * The proxy pushes every entry batch unfiltered. Each batch is decoded and
 * scanned for transactions touching the watched account; every match in
 * the batch is timed and raced, then the loop checks for shutdown.
 */

import { ConnectError } from '../errors.js';
import { decodeEntries, filterByAccount } from '../decode/entries.js';
import type { ShredEntry, ShredstreamConnection, UpdateStream } from '../ingest/types.js';
import { EndpointRunner } from './runner.js';

export class ShredstreamProxyRunner extends EndpointRunner<ShredEntry> {
    private connection: ShredstreamConnection | null = null;

    protected async connect(): Promise<void> {
        this.connection = await this.ctx.connectors.shredstream(this.endpoint, {
            connectTimeoutMs: this.ctx.connectTimeoutMs,
        });
    }

    protected async subscribe(): Promise<UpdateStream<ShredEntry>> {
        if (!this.connection) {
            throw new ConnectError('Subscribe called before connect', { endpoint: this.endpoint.name });
        }
        return this.connection.subscribeEntries();
    }

    protected async handleUpdate(entry: ShredEntry): Promise<void> {
        const matches = filterByAccount(decodeEntries(entry.entries), this.ctx.config.account);

        for (const tx of matches) {
            const timestamp = this.now();
            this.writeLog(timestamp, this.endpoint.name, tx.signature);
            this.recordRace(tx.signature, timestamp);
            this.log.info(`[${timestamp.toFixed(3)}] Slot: ${entry.slot} Signature: ${tx.signature}`);
        }
    }

    protected disconnect(): void {
        this.connection?.close();
        this.connection = null;
    }
}
