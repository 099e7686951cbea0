import test from 'node:test';
import assert from 'node:assert/strict';
import { getEventListeners } from 'node:events';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { setImmediate as flush } from 'node:timers/promises';

import { ConnectError } from '../errors.js';
import { ShutdownCoordinator } from '../race/shutdown.js';
import {
    FakeShredFeed,
    OTHER_KEY,
    WATCHED_KEY,
    b58,
    encodeEntries,
    endpoint,
    fakeConnectors,
    recordingLogger,
    runnerContext,
    sig,
    tempLogDir,
} from '../testing/fakes.js';
import { EndpointKind } from '../types.js';
import { ShredstreamProxyRunner } from './shredstreamProxy.js';

const SHRED = endpoint('shred-a', EndpointKind.Shredstream);

function setup(feed: FakeShredFeed, transactions = 10) {
    const logDir = tempLogDir();
    const logger = recordingLogger();
    const shutdown = new ShutdownCoordinator();
    const ctx = runnerContext({
        endpoint: SHRED,
        connectors: fakeConnectors({}, { 'shred-a': feed }),
        transactions,
        logDir,
        logger,
        shutdown,
    });
    return { ctx, logDir, logger, shutdown, runner: new ShredstreamProxyRunner(ctx) };
}

test('ShredstreamProxyRunner races every matching transaction in an entry batch', async () => {
    const feed = new FakeShredFeed();
    feed.push({
        slot: 55,
        entries: encodeEntries([
            [
                { signatures: [sig(1)], keys: [OTHER_KEY, WATCHED_KEY] },
                { signatures: [sig(2)], keys: [OTHER_KEY] },
            ],
            [{ signatures: [sig(3)], keys: [WATCHED_KEY], versioned: true }],
        ]),
    });
    feed.end();

    const { runner, ctx, logDir, logger } = setup(feed);
    const summary = await runner.run();

    assert.equal(summary.exitReason, 'stream-closed');
    assert.equal(summary.transactionsSeen, 2);
    assert.equal(ctx.comparator.getValidCount(), 2);
    assert.equal(
        readFileSync(join(logDir, 'shred-a.log'), 'utf8'),
        `1000.000000 shred-a ${b58(sig(1))}\n1000.001000 shred-a ${b58(sig(3))}\n`
    );
    assert.ok(logger.lines.includes(`[INFO] [shred-a] [1000.001] Slot: 55 Signature: ${b58(sig(3))}`));
});

test('ShredstreamProxyRunner drops a malformed batch and decodes the next', async () => {
    const feed = new FakeShredFeed();
    feed.push(
        { slot: 1, entries: Uint8Array.of(1, 2, 3) },
        { slot: 2, entries: encodeEntries([[{ signatures: [sig(4)], keys: [WATCHED_KEY] }]]) }
    );
    feed.end();

    const { runner, ctx } = setup(feed);
    const summary = await runner.run();

    assert.equal(summary.decodeFailures, 1);
    assert.equal(summary.transactionsSeen, 1);
    assert.ok(ctx.comparator.getRecord(b58(sig(4))));
});

test('ShredstreamProxyRunner holds one shutdown listener however many batches it has read', async () => {
    const feed = new FakeShredFeed();
    const batches = 200;
    for (let i = 0; i < batches; i++) {
        feed.push({ slot: i, entries: Uint8Array.of(1, 2, 3) });
    }

    const { runner, logger, shutdown } = setup(feed);
    const running = runner.run();

    const dropped = () => logger.lines.filter(l => l.startsWith('[DEBUG] [shred-a] Dropped undecodable')).length;
    for (let i = 0; i < 1_000 && dropped() < batches; i++) await flush();

    assert.equal(dropped(), batches);
    assert.equal(getEventListeners(shutdown.signal, 'abort').length, 1);

    shutdown.trigger('SIGINT');
    const summary = await running;

    assert.equal(summary.exitReason, 'shutdown-requested');
    assert.equal(summary.decodeFailures, batches);
    assert.equal(getEventListeners(shutdown.signal, 'abort').length, 0);
});

test('ShredstreamProxyRunner finishes the batch that reaches the target, then stops', async () => {
    const feed = new FakeShredFeed();
    const batch = (a: number, b: number) => ({
        slot: a,
        entries: encodeEntries([
            [
                { signatures: [sig(a)], keys: [WATCHED_KEY] },
                { signatures: [sig(b)], keys: [WATCHED_KEY] },
            ],
        ]),
    });
    feed.push(batch(1, 2), batch(3, 4));

    const { runner, ctx, shutdown } = setup(feed, 1);
    const summary = await runner.run();

    assert.equal(summary.exitReason, 'target-reached');
    assert.equal(summary.transactionsSeen, 2);
    assert.equal(ctx.comparator.getValidCount(), 2);
    assert.equal(ctx.comparator.getRecord(b58(sig(3))), undefined);
    assert.equal(shutdown.source, 'shred-a');
});

test('ShredstreamProxyRunner rejects when the proxy is unreachable', async () => {
    const feed = new FakeShredFeed();
    feed.connectError = new ConnectError('Failed to connect to https://shred-a.example.test', { endpoint: 'shred-a' });

    const { runner } = setup(feed);

    await assert.rejects(runner.run(), /Failed to connect/);
    assert.equal(feed.connectionClosed, false);
});
