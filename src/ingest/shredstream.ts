/**
 * ShredStream proxy client
 *
 * SubscribeEntries is server-streaming with an empty request: the proxy
 * sends every entry and filtering happens client-side after decode.
 */

import type { Client, Metadata } from '@grpc/grpc-js';
import { StreamReader } from './streamReader.js';
import { loadMethod, openClient, tokenMetadata } from './grpc.js';
import type { ConnectOptions, ShredEntry, ShredstreamConnection, UpdateStream } from './types.js';
import type { Endpoint } from '../types.js';

export function toShredEntry(raw: unknown): ShredEntry {
    if (typeof raw !== 'object' || raw === null) {
        return { slot: 0, entries: new Uint8Array(0) };
    }

    const slot = 'slot' in raw ? Number(raw.slot) : 0;
    const entries = 'entries' in raw && raw.entries instanceof Uint8Array ? raw.entries : new Uint8Array(0);

    return { slot: Number.isFinite(slot) ? slot : 0, entries };
}

const SUBSCRIBE_ENTRIES = () => loadMethod('shredstream.proto', 'shredstream.ShredstreamProxy', 'SubscribeEntries');

export class ShredstreamProxyConnection implements ShredstreamConnection {
    private readonly client: Client;
    private readonly metadata: Metadata;

    private constructor(client: Client, metadata: Metadata) {
        this.client = client;
        this.metadata = metadata;
    }

    static async connect(endpoint: Endpoint, options: ConnectOptions): Promise<ShredstreamProxyConnection> {
        const client = await openClient(endpoint, options.connectTimeoutMs);
        return new ShredstreamProxyConnection(client, tokenMetadata(endpoint.xToken));
    }

    subscribeEntries(): UpdateStream<ShredEntry> {
        const method = SUBSCRIBE_ENTRIES();
        const call = this.client.makeServerStreamRequest<object, ShredEntry>(
            method.path,
            request => method.requestSerialize(request),
            bytes => toShredEntry(method.responseDeserialize(bytes)),
            {},
            this.metadata
        );
        return new StreamReader<ShredEntry>(call, { onClose: () => call.cancel() });
    }

    close(): void {
        this.client.close();
    }
}

export const connectShredstream = (endpoint: Endpoint, options: ConnectOptions): Promise<ShredstreamConnection> =>
    ShredstreamProxyConnection.connect(endpoint, options);
