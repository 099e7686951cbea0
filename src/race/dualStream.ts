/**
 * Dual-Stream Tracker
 *
 * Measures account-write vs transaction notification timing for endpoints
 * that carry both channels.
 *
 * Two scopes:
 * - LocalStreamTracker: one per dual-stream runner, single writer. First
 *   local sighting of each slot wins, timestamp is never revised.
 * - DualStreamTracker: one per run, written by every dual-stream runner.
 *   Minimum-wins per slot, so the stored value converges to the fastest
 *   observer regardless of interleaving.
 */

import type { DualStreamRecord, StreamPairing } from '../types.js';

type Slot = 'account' | 'transaction';

function emptyRecord(signature: string): DualStreamRecord {
    return {
        signature,
        accountTimestamp: null,
        accountEndpoint: null,
        transactionTimestamp: null,
        transactionEndpoint: null,
    };
}

function pairingOf(record: DualStreamRecord): StreamPairing | null {
    if (record.accountTimestamp === null || record.transactionTimestamp === null) return null;
    return {
        signature: record.signature,
        accountTimestamp: record.accountTimestamp,
        transactionTimestamp: record.transactionTimestamp,
        deltaMs: (record.transactionTimestamp - record.accountTimestamp) * 1000,
        leader: record.accountTimestamp < record.transactionTimestamp ? 'account' : 'transaction',
    };
}

// ============================================================================
// LOCAL (PER ENDPOINT)
// ============================================================================

export class LocalStreamTracker {
    private readonly records: Map<string, DualStreamRecord> = new Map();
    readonly endpoint: string;

    constructor(endpoint: string) {
        this.endpoint = endpoint;
    }

    /**
     * Returns the pairing once both channels have been seen for the signature.
     */
    recordAccount(signature: string, timestamp: number): StreamPairing | null {
        return this.record('account', signature, timestamp);
    }

    recordTransaction(signature: string, timestamp: number): StreamPairing | null {
        return this.record('transaction', signature, timestamp);
    }

    get(signature: string): DualStreamRecord | undefined {
        return this.records.get(signature);
    }

    snapshot(): DualStreamRecord[] {
        return Array.from(this.records.values(), r => ({ ...r }));
    }

    get size(): number {
        return this.records.size;
    }

    private record(slot: Slot, signature: string, timestamp: number): StreamPairing | null {
        let record = this.records.get(signature);
        if (!record) {
            record = emptyRecord(signature);
            this.records.set(signature, record);
        }

        if (slot === 'account' && record.accountTimestamp === null) {
            record.accountTimestamp = timestamp;
            record.accountEndpoint = this.endpoint;
        } else if (slot === 'transaction' && record.transactionTimestamp === null) {
            record.transactionTimestamp = timestamp;
            record.transactionEndpoint = this.endpoint;
        }

        return pairingOf(record);
    }
}

// ============================================================================
// GLOBAL (CROSS ENDPOINT)
// ============================================================================

export class DualStreamTracker {
    private readonly records: Map<string, DualStreamRecord> = new Map();

    observeAccount(endpoint: string, signature: string, timestamp: number): void {
        const record = this.entry(signature);
        if (record.accountTimestamp === null || timestamp < record.accountTimestamp) {
            record.accountTimestamp = timestamp;
            record.accountEndpoint = endpoint;
        }
    }

    observeTransaction(endpoint: string, signature: string, timestamp: number): void {
        const record = this.entry(signature);
        if (record.transactionTimestamp === null || timestamp < record.transactionTimestamp) {
            record.transactionTimestamp = timestamp;
            record.transactionEndpoint = endpoint;
        }
    }

    get(signature: string): DualStreamRecord | undefined {
        return this.records.get(signature);
    }

    /**
     * Copies, so a late writer cannot change what the reporter is reading.
     */
    snapshot(): DualStreamRecord[] {
        return Array.from(this.records.values(), r => ({ ...r }));
    }

    get size(): number {
        return this.records.size;
    }

    private entry(signature: string): DualStreamRecord {
        let record = this.records.get(signature);
        if (!record) {
            record = emptyRecord(signature);
            this.records.set(signature, record);
        }
        return record;
    }
}
