import test from 'node:test';
import assert from 'node:assert/strict';

import { OTHER_KEY, WATCHED_KEY, sig } from '../testing/fakes.js';
import { describeUpdate, toGeyserUpdate } from './geyser.js';
import { toShredEntry } from './shredstream.js';

test('toGeyserUpdate narrows a transaction update', () => {
    const update = toGeyserUpdate({
        update_oneof: 'transaction',
        transaction: {
            slot: '42',
            transaction: {
                signature: sig(1),
                transaction: {
                    signatures: [sig(1)],
                    message: { account_keys: [OTHER_KEY, WATCHED_KEY] },
                },
            },
        },
    });

    assert.deepEqual(update, {
        kind: 'transaction',
        transaction: { slot: 42, signature: sig(1), accountKeys: [OTHER_KEY, WATCHED_KEY] },
    });
});

test('toGeyserUpdate falls back to the first signature and flags a missing message', () => {
    const update = toGeyserUpdate({
        update_oneof: 'transaction',
        transaction: { slot: '7', transaction: { transaction: { signatures: [sig(3)] } } },
    });

    assert.deepEqual(update, {
        kind: 'transaction',
        transaction: { slot: 7, signature: sig(3), accountKeys: null },
    });
});

test('toGeyserUpdate narrows an account write with its transaction signature', () => {
    const update = toGeyserUpdate({
        update_oneof: 'account',
        account: { slot: '11', account: { pubkey: WATCHED_KEY, txn_signature: sig(2) } },
    });

    assert.deepEqual(update, { kind: 'account', slot: 11, pubkey: WATCHED_KEY, txnSignature: sig(2) });
});

test('toGeyserUpdate maps keepalives, other kinds and empty updates', () => {
    assert.deepEqual(toGeyserUpdate({ update_oneof: 'ping', ping: {} }), { kind: 'ping' });
    assert.deepEqual(toGeyserUpdate({ update_oneof: 'pong', pong: { id: 3 } }), { kind: 'pong', id: 3 });
    assert.deepEqual(toGeyserUpdate({ update_oneof: 'block_meta' }), { kind: 'other', type: 'block_meta' });
    assert.deepEqual(toGeyserUpdate({ filters: [] }), { kind: 'empty' });
    assert.deepEqual(toGeyserUpdate(null), { kind: 'empty' });
});

test('describeUpdate names the update kind', () => {
    assert.equal(describeUpdate({ kind: 'other', type: 'slot' }), 'slot');
    assert.equal(describeUpdate({ kind: 'pong', id: 1 }), 'pong(1)');
    assert.equal(describeUpdate({ kind: 'ping' }), 'ping');
});

test('toShredEntry keeps slot and payload', () => {
    const entries = Uint8Array.of(1, 2, 3);

    assert.deepEqual(toShredEntry({ slot: '77', entries }), { slot: 77, entries });
    assert.deepEqual(toShredEntry({ slot: 'x' }), { slot: 0, entries: new Uint8Array(0) });
    assert.deepEqual(toShredEntry(undefined), { slot: 0, entries: new Uint8Array(0) });
});
