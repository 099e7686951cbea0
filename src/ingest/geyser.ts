/**
 * Yellowstone gRPC client
 *
 * One bidirectional Subscribe call per connection. Requests go out on the
 * same duplex (initial subscription, ping replies); responses are narrowed
 * into GeyserUpdate inside the call's deserializer so runners never see
 * untyped protobuf objects.
 */

import type { Client, ClientDuplexStream, Metadata } from '@grpc/grpc-js';
import { StreamReader } from './streamReader.js';
import { loadMethod, openClient, tokenMetadata } from './grpc.js';
import type {
    ConnectOptions,
    GeyserConnection,
    GeyserSubscribeRequest,
    GeyserSubscription,
    GeyserTransaction,
    GeyserUpdate,
    UpdateStream,
} from './types.js';
import type { Endpoint } from '../types.js';

// ============================================================================
// RESPONSE NARROWING
// ============================================================================

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null;
}

function fields(v: unknown): Record<string, unknown> {
    return isRecord(v) ? v : {};
}

function asBytes(v: unknown): Uint8Array | null {
    return v instanceof Uint8Array ? v : null;
}

function asSlot(v: unknown): number {
    if (typeof v !== 'string' && typeof v !== 'number') return 0;
    const n = Number(v);
    return Number.isFinite(n) ? n : 0;
}

function bytesList(v: unknown): Uint8Array[] | null {
    if (!Array.isArray(v)) return null;
    const out: Uint8Array[] = [];
    for (const item of v) {
        const bytes = asBytes(item);
        if (!bytes) return null;
        out.push(bytes);
    }
    return out;
}

function toTransaction(raw: unknown): GeyserTransaction {
    const update = fields(raw);
    const info = fields(update.transaction);
    const tx = fields(info.transaction);
    const message = isRecord(tx.message) ? tx.message : null;
    const signatures = bytesList(tx.signatures) ?? [];

    return {
        slot: asSlot(update.slot),
        signature: asBytes(info.signature) ?? signatures[0] ?? null,
        accountKeys: message ? bytesList(message.account_keys) : null,
    };
}

/**
 * Narrow a SubscribeUpdate (proto-loader object, keepCase + oneofs) into
 * the update union. Never throws: malformed payloads surface later as
 * decode failures.
 */
export function toGeyserUpdate(raw: unknown): GeyserUpdate {
    if (!isRecord(raw)) return { kind: 'empty' };

    const kind = raw.update_oneof;
    switch (kind) {
        case 'transaction':
            return { kind: 'transaction', transaction: toTransaction(raw.transaction) };

        case 'account': {
            const update = fields(raw.account);
            const info = fields(update.account);
            return {
                kind: 'account',
                slot: asSlot(update.slot),
                pubkey: asBytes(info.pubkey) ?? new Uint8Array(0),
                txnSignature: asBytes(info.txn_signature),
            };
        }

        case 'ping':
            return { kind: 'ping' };

        case 'pong': {
            return { kind: 'pong', id: asSlot(fields(raw.pong).id) };
        }

        case undefined:
            return { kind: 'empty' };

        default:
            return { kind: 'other', type: String(kind) };
    }
}

// ============================================================================
// SUBSCRIPTION
// ============================================================================

class YellowstoneSubscription implements GeyserSubscription {
    readonly updates: UpdateStream<GeyserUpdate>;
    private readonly call: ClientDuplexStream<GeyserSubscribeRequest, GeyserUpdate>;

    constructor(call: ClientDuplexStream<GeyserSubscribeRequest, GeyserUpdate>) {
        this.call = call;
        this.updates = new StreamReader<GeyserUpdate>(call, { onClose: () => call.cancel() });
    }

    send(request: GeyserSubscribeRequest): Promise<void> {
        return new Promise((resolve, reject) => {
            this.call.write(request, (err: Error | null | undefined) => {
                if (err) reject(err);
                else resolve();
            });
        });
    }

    close(): void {
        this.updates.close();
    }
}

// ============================================================================
// CONNECTION
// ============================================================================

const SUBSCRIBE = () => loadMethod('geyser.proto', 'geyser.Geyser', 'Subscribe');

export class YellowstoneConnection implements GeyserConnection {
    private readonly client: Client;
    private readonly metadata: Metadata;

    private constructor(client: Client, metadata: Metadata) {
        this.client = client;
        this.metadata = metadata;
    }

    static async connect(endpoint: Endpoint, options: ConnectOptions): Promise<YellowstoneConnection> {
        const client = await openClient(endpoint, options.connectTimeoutMs);
        return new YellowstoneConnection(client, tokenMetadata(endpoint.xToken));
    }

    subscribe(): GeyserSubscription {
        const method = SUBSCRIBE();
        const call = this.client.makeBidiStreamRequest<GeyserSubscribeRequest, GeyserUpdate>(
            method.path,
            request => method.requestSerialize(request),
            bytes => toGeyserUpdate(method.responseDeserialize(bytes)),
            this.metadata
        );
        return new YellowstoneSubscription(call);
    }

    close(): void {
        this.client.close();
    }
}

export const connectYellowstone = (endpoint: Endpoint, options: ConnectOptions): Promise<GeyserConnection> =>
    YellowstoneConnection.connect(endpoint, options);

export function describeUpdate(update: GeyserUpdate): string {
    switch (update.kind) {
        case 'other':
            return update.type;
        case 'pong':
            return `pong(${update.id})`;
        default:
            return update.kind;
    }
}
