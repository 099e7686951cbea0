/**
 * Yellowstone transaction decoder
 *
 * Turns the narrowed SubscribeUpdateTransaction into signature + static
 * account keys (base58). Missing signature or message is a DecodeError.
 */

import bs58 from 'bs58';
import { DecodeError } from '../errors.js';
import type { GeyserTransaction } from '../ingest/types.js';
import type { DecodedTransaction } from '../types.js';

export function decodeGeyserTransaction(tx: GeyserTransaction): DecodedTransaction {
    if (!tx.signature || tx.signature.length === 0) {
        throw new DecodeError(`Transaction update at slot ${tx.slot} carries no signature`);
    }
    if (!tx.accountKeys) {
        throw new DecodeError(`Transaction update at slot ${tx.slot} carries no message`);
    }

    return {
        signature: bs58.encode(tx.signature),
        accountKeys: tx.accountKeys.map(key => bs58.encode(key)),
    };
}

/** txn_signature on an account write, base58; null when the write has none */
export function accountWriteSignature(txnSignature: Uint8Array | null): string | null {
    if (!txnSignature || txnSignature.length === 0) return null;
    return bs58.encode(txnSignature);
}
