/**
 * ShredStream Entry Decoder
 *
 * Payload is bincode Vec<Entry>:
 *   u64 LE entry count
 *   per entry:
 *     num_hashes  u64 LE
 *     hash        32 bytes
 *     tx count    u64 LE
 *     transactions (VersionedTransaction, NOT length-prefixed):
 *       signatures   short_vec<[u8; 64]>
 *       message      legacy | 0x80|version prefix + v0 body
 *
 * Only the first signature and the static account keys are extracted.
 * Lookup-table addresses are not resolved.
 */

import bs58 from 'bs58';
import { DecodeError } from '../errors.js';
import type { DecodedTransaction } from '../types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

const SIGNATURE_LEN = 64;
const PUBKEY_LEN = 32;
const HASH_LEN = 32;

// Sanity bounds; real entries are far below these
const MAX_ENTRIES = 10_000;
const MAX_TXS_PER_ENTRY = 10_000;
const MAX_SIGNATURES = 127;

// ============================================================================
// READER
// ============================================================================

class ByteReader {
    private offset = 0;
    private readonly view: DataView;

    constructor(private readonly bytes: Uint8Array) {
        this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    }

    get position(): number {
        return this.offset;
    }

    get remaining(): number {
        return this.bytes.length - this.offset;
    }

    u8(): number {
        this.ensure(1, 'u8');
        return this.view.getUint8(this.offset++);
    }

    u64(): number {
        this.ensure(8, 'u64');
        const value = this.view.getBigUint64(this.offset, true);
        this.offset += 8;
        if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
            throw new DecodeError(`u64 at offset ${this.offset - 8} out of range: ${value}`);
        }
        return Number(value);
    }

    /** Solana short_vec length (compact-u16) */
    compactU16(): number {
        let value = 0;
        for (let i = 0; i < 3; i++) {
            const byte = this.u8();
            value |= (byte & 0x7f) << (7 * i);
            if ((byte & 0x80) === 0) return value;
        }
        throw new DecodeError(`compact-u16 overflow at offset ${this.offset}`);
    }

    take(len: number, what: string): Uint8Array {
        this.ensure(len, what);
        const out = this.bytes.subarray(this.offset, this.offset + len);
        this.offset += len;
        return out;
    }

    skip(len: number, what: string): void {
        this.ensure(len, what);
        this.offset += len;
    }

    peek(): number {
        this.ensure(1, 'u8');
        return this.view.getUint8(this.offset);
    }

    private ensure(len: number, what: string): void {
        if (this.offset + len > this.bytes.length) {
            throw new DecodeError(
                `Truncated payload reading ${what} at offset ${this.offset} (need ${len}, have ${this.remaining})`
            );
        }
    }
}

// ============================================================================
// TRANSACTION PARSING
// ============================================================================

function readTransaction(reader: ByteReader): DecodedTransaction {
    const sigCount = reader.compactU16();
    if (sigCount === 0 || sigCount > MAX_SIGNATURES) {
        throw new DecodeError(`Invalid signature count ${sigCount} at offset ${reader.position}`);
    }

    const firstSignature = reader.take(SIGNATURE_LEN, 'signature');
    reader.skip((sigCount - 1) * SIGNATURE_LEN, 'signatures');

    const isVersioned = (reader.peek() & 0x80) !== 0;
    if (isVersioned) {
        const version = reader.u8() & 0x7f;
        if (version !== 0) throw new DecodeError(`Unsupported message version ${version}`);
    }

    // Header: num_required_signatures, num_readonly_signed, num_readonly_unsigned
    reader.skip(3, 'message header');

    const keyCount = reader.compactU16();
    const accountKeys: string[] = [];
    for (let i = 0; i < keyCount; i++) {
        accountKeys.push(bs58.encode(reader.take(PUBKEY_LEN, 'account key')));
    }

    reader.skip(HASH_LEN, 'recent blockhash');

    const ixCount = reader.compactU16();
    for (let i = 0; i < ixCount; i++) {
        reader.u8(); // program_id_index
        reader.skip(reader.compactU16(), 'instruction accounts');
        reader.skip(reader.compactU16(), 'instruction data');
    }

    if (isVersioned) {
        const lookupCount = reader.compactU16();
        for (let i = 0; i < lookupCount; i++) {
            reader.skip(PUBKEY_LEN, 'lookup table key');
            reader.skip(reader.compactU16(), 'writable indexes');
            reader.skip(reader.compactU16(), 'readonly indexes');
        }
    }

    return { signature: bs58.encode(firstSignature), accountKeys };
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Decode every transaction in a serialized Vec<Entry>.
 * Throws DecodeError on any malformed or truncated payload.
 */
export function decodeEntries(payload: Uint8Array): DecodedTransaction[] {
    const reader = new ByteReader(payload);
    const txs: DecodedTransaction[] = [];

    const entryCount = reader.u64();
    if (entryCount > MAX_ENTRIES) throw new DecodeError(`Implausible entry count ${entryCount}`);

    for (let i = 0; i < entryCount; i++) {
        reader.skip(8 + HASH_LEN, 'entry header');

        const txCount = reader.u64();
        if (txCount > MAX_TXS_PER_ENTRY) {
            throw new DecodeError(`Implausible transaction count ${txCount} in entry ${i}`);
        }

        for (let j = 0; j < txCount; j++) {
            txs.push(readTransaction(reader));
        }
    }

    if (reader.remaining !== 0) {
        throw new DecodeError(`${reader.remaining} trailing bytes after ${entryCount} entries`);
    }

    return txs;
}

/**
 * Transactions touching the watched account, in payload order.
 */
export function filterByAccount(txs: DecodedTransaction[], account: string): DecodedTransaction[] {
    return txs.filter(tx => tx.accountKeys.includes(account));
}
