/**
 * Yellowstone runner base
 *
 * Owns the duplex: connect, send the subscription built by the variant,
 * reply to pings on the same call. Variants only build the request and
 * handle transaction/account updates.
 */

import { StreamError, SubscribeError, errorMessage } from '../errors.js';
import { describeUpdate } from '../ingest/geyser.js';
import type {
    GeyserConnection,
    GeyserSubscribeRequest,
    GeyserSubscription,
    GeyserUpdate,
    UpdateStream,
    WireCommitment,
} from '../ingest/types.js';
import type { Commitment } from '../types.js';
import { EndpointRunner } from './runner.js';

const WIRE_COMMITMENT: Record<Commitment, WireCommitment> = {
    processed: 'PROCESSED',
    confirmed: 'CONFIRMED',
    finalized: 'FINALIZED',
};

export function toWireCommitment(commitment: Commitment): WireCommitment {
    return WIRE_COMMITMENT[commitment];
}

/** Keepalive reply sent for every server ping */
export const PING_REPLY: GeyserSubscribeRequest = { ping: { id: 1 } };

type TransactionUpdate = Extract<GeyserUpdate, { kind: 'transaction' }>;
type AccountUpdate = Extract<GeyserUpdate, { kind: 'account' }>;

export abstract class GeyserRunner extends EndpointRunner<GeyserUpdate> {
    private connection: GeyserConnection | null = null;
    private subscription: GeyserSubscription | null = null;

    protected abstract buildRequest(): GeyserSubscribeRequest;

    protected abstract onTransaction(update: TransactionUpdate): void;

    protected onAccount(_update: AccountUpdate): void {
        // Transaction-only variants never subscribe to accounts
    }

    protected async connect(): Promise<void> {
        this.connection = await this.ctx.connectors.geyser(this.endpoint, {
            connectTimeoutMs: this.ctx.connectTimeoutMs,
        });
    }

    protected async subscribe(): Promise<UpdateStream<GeyserUpdate>> {
        if (!this.connection) {
            throw new SubscribeError('Subscribe called before connect', { endpoint: this.endpoint.name });
        }

        const subscription = this.connection.subscribe();
        this.subscription = subscription;

        const request = this.buildRequest();
        this.log.info(
            `Subscribing to account ${this.ctx.config.account} with commitment ${request.commitment ?? 'default'}`
        );
        this.log.debug(
            `Sending subscribe request with ${Object.keys(request.accounts ?? {}).length} account filters ` +
            `and ${Object.keys(request.transactions ?? {}).length} transaction filters`
        );

        try {
            await subscription.send(request);
        } catch (err) {
            throw new SubscribeError(`Failed to send subscribe request: ${errorMessage(err)}`, {
                endpoint: this.endpoint.name,
                cause: err,
            });
        }

        return subscription.updates;
    }

    protected async handleUpdate(update: GeyserUpdate): Promise<void> {
        switch (update.kind) {
            case 'transaction':
                this.onTransaction(update);
                return;

            case 'account':
                this.onAccount(update);
                return;

            case 'ping':
                await this.replyToPing();
                return;

            case 'empty':
                this.log.trace('Received empty update');
                return;

            default:
                this.log.debug(`Received other update type: ${describeUpdate(update)}`);
        }
    }

    protected disconnect(): void {
        this.subscription?.close();
        this.subscription = null;
        this.connection?.close();
        this.connection = null;
    }

    private async replyToPing(): Promise<void> {
        if (!this.subscription) return;
        try {
            await this.subscription.send(PING_REPLY);
        } catch (err) {
            throw new StreamError(`Failed to answer ping: ${errorMessage(err)}`, {
                endpoint: this.endpoint.name,
                cause: err,
            });
        }
    }
}
