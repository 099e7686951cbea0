/**
 * Core type definitions for feed-race
 * These interfaces define the boundary between runners, trackers and the reporter
 */

// ============================================================================
// CONFIGURATION TYPES
// ============================================================================

export const EndpointKind = {
    /** Yellowstone transaction stream filtered on the watched account */
    Yellowstone: 'yellowstone',
    /** Yellowstone transaction + account-write streams on one subscription */
    YellowstoneAccounts: 'yellowstone-accounts',
    /** Jito ShredStream proxy bundled entries, filtered client-side */
    Shredstream: 'shredstream',
} as const;

export type EndpointKind = (typeof EndpointKind)[keyof typeof EndpointKind];

export const ENDPOINT_KINDS: readonly EndpointKind[] = Object.values(EndpointKind);

export const Commitment = {
    Processed: 'processed',
    Confirmed: 'confirmed',
    Finalized: 'finalized',
} as const;

export type Commitment = (typeof Commitment)[keyof typeof Commitment];

export const COMMITMENTS: readonly Commitment[] = Object.values(Commitment);

export interface Endpoint {
    readonly name: string;
    readonly url: string;
    readonly xToken?: string;
    readonly kind: EndpointKind;
}

/** Shared read-only run parameters */
export interface RunConfig {
    /** Watched account, base58 */
    readonly account: string;
    /** Target race count N */
    readonly transactions: number;
    readonly commitment: Commitment;
}

// ============================================================================
// RACE TYPES
// ============================================================================

/** Single arrival of a signature at one endpoint */
export interface Observation {
    signature: string;
    /** Wall-clock seconds, fractional */
    timestamp: number;
    /** Run epoch, seconds */
    startTime: number;
}

export interface Arrival {
    endpoint: string;
    timestamp: number;
}

export interface RaceRecord {
    signature: string;
    startTime: number;
    /** Insertion order = arrival order; one entry per endpoint */
    arrivals: Arrival[];
}

export interface AddResult {
    /** False when this endpoint already reported the signature */
    accepted: boolean;
    validCount: number;
    /** True for exactly one call per tracker: the one that made validCount reach the target */
    reachedTarget: boolean;
}

export interface DualStreamRecord {
    signature: string;
    accountTimestamp: number | null;
    accountEndpoint: string | null;
    transactionTimestamp: number | null;
    transactionEndpoint: string | null;
}

export type StreamLeader = 'account' | 'transaction';

/** Both observation channels seen for one signature on one endpoint */
export interface StreamPairing {
    signature: string;
    accountTimestamp: number;
    transactionTimestamp: number;
    /** (transaction - account) in ms; positive = transaction later */
    deltaMs: number;
    leader: StreamLeader;
}

// ============================================================================
// DECODE TYPES
// ============================================================================

export interface DecodedTransaction {
    /** First signature, base58 */
    signature: string;
    /** Static account keys, base58 */
    accountKeys: string[];
}

// ============================================================================
// RUNNER TYPES
// ============================================================================

export type RunnerState =
    | 'idle'
    | 'connecting'
    | 'subscribed'
    | 'streaming'
    | 'terminated';

export type ExitReason =
    | 'target-reached'
    | 'shutdown-requested'
    | 'stream-closed'
    | 'stream-error';

export interface RunnerSummary {
    endpoint: string;
    kind: EndpointKind;
    exitReason: ExitReason;
    /** Matching transactions observed (duplicates included) */
    transactionsSeen: number;
    accountUpdatesSeen: number;
    duplicatesDropped: number;
    decodeFailures: number;
}

export type RunnerOutcome =
    | { endpoint: string; status: 'completed'; summary: RunnerSummary }
    | { endpoint: string; status: 'failed'; error: string };
