/**
 * Ingest module types
 * Defines the contract between streaming clients and endpoint runners
 */

import type { StreamError } from '../errors.js';
import type { Endpoint } from '../types.js';

// ============================================================================
// STREAM
// ============================================================================

export type StreamItem<T> =
    | { kind: 'update'; update: T }
    | { kind: 'error'; error: StreamError }
    | { kind: 'end' };

/** Pull-side view of a provider stream. next() never rejects. */
export interface UpdateStream<T> {
    next(): Promise<StreamItem<T>>;
    close(): void;
}

export interface ConnectOptions {
    connectTimeoutMs: number;
}

// ============================================================================
// YELLOWSTONE
// ============================================================================

export type WireCommitment = 'PROCESSED' | 'CONFIRMED' | 'FINALIZED';

export interface AccountsFilter {
    account?: string[];
    owner?: string[];
    nonempty_txn_signature?: boolean;
}

export interface TransactionsFilter {
    vote?: boolean;
    failed?: boolean;
    account_include?: string[];
    account_exclude?: string[];
    account_required?: string[];
}

/** SubscribeRequest as proto-loader takes it (keepCase, enums as strings) */
export interface GeyserSubscribeRequest {
    accounts?: Record<string, AccountsFilter>;
    transactions?: Record<string, TransactionsFilter>;
    commitment?: WireCommitment;
    ping?: { id: number };
}

export interface GeyserTransaction {
    slot: number;
    signature: Uint8Array | null;
    /** Static keys from the message; null when the message is missing */
    accountKeys: Uint8Array[] | null;
}

export type GeyserUpdate =
    | { kind: 'transaction'; transaction: GeyserTransaction }
    | { kind: 'account'; slot: number; pubkey: Uint8Array; txnSignature: Uint8Array | null }
    | { kind: 'ping' }
    | { kind: 'pong'; id: number }
    | { kind: 'other'; type: string }
    | { kind: 'empty' };

export interface GeyserSubscription {
    readonly updates: UpdateStream<GeyserUpdate>;
    /** Resolves once the request has been handed to the transport */
    send(request: GeyserSubscribeRequest): Promise<void>;
    close(): void;
}

export interface GeyserConnection {
    subscribe(): GeyserSubscription;
    close(): void;
}

export type GeyserConnector = (endpoint: Endpoint, options: ConnectOptions) => Promise<GeyserConnection>;

// ============================================================================
// SHREDSTREAM
// ============================================================================

export interface ShredEntry {
    slot: number;
    /** bincode Vec<Entry> */
    entries: Uint8Array;
}

export interface ShredstreamConnection {
    subscribeEntries(): UpdateStream<ShredEntry>;
    close(): void;
}

export type ShredstreamConnector = (endpoint: Endpoint, options: ConnectOptions) => Promise<ShredstreamConnection>;

export interface Connectors {
    geyser: GeyserConnector;
    shredstream: ShredstreamConnector;
}
