import test from 'node:test';
import assert from 'node:assert/strict';

import { CompletionLatch, ShutdownCoordinator } from './shutdown.js';

test('ShutdownCoordinator fires once and remembers the first source', () => {
    const shutdown = new ShutdownCoordinator();

    assert.equal(shutdown.isTriggered, false);
    assert.equal(shutdown.source, null);

    assert.equal(shutdown.trigger('a'), true);
    assert.equal(shutdown.trigger('b'), false);

    assert.equal(shutdown.isTriggered, true);
    assert.equal(shutdown.source, 'a');
    assert.equal(shutdown.signal.aborted, true);
});

test('ShutdownCoordinator signal carries the notice as abort reason', () => {
    const shutdown = new ShutdownCoordinator();
    let aborts = 0;
    shutdown.signal.addEventListener('abort', () => {
        aborts++;
    });

    shutdown.trigger('max-duration');
    shutdown.trigger('SIGTERM');

    const reason: unknown = shutdown.signal.reason;
    assert.equal(aborts, 1);
    assert.ok(typeof reason === 'object' && reason !== null && 'source' in reason);
    assert.equal(reason.source, 'max-duration');
});

test('CompletionLatch opens on the configured count, not before', async () => {
    const latch = new CompletionLatch(3);
    let opened = false;
    const waiting = latch.wait().then(() => {
        opened = true;
    });

    assert.equal(latch.arrive(), false);
    assert.equal(latch.arrive(), false);
    await Promise.resolve();
    assert.equal(opened, false);
    assert.equal(latch.isOpen, false);

    assert.equal(latch.arrive(), true);
    await waiting;
    assert.equal(opened, true);
    assert.equal(latch.count, 3);

    assert.equal(latch.arrive(), false);
    assert.equal(latch.count, 3);
});

test('CompletionLatch with nothing to wait for is already open', async () => {
    const latch = new CompletionLatch(0);
    assert.equal(latch.isOpen, true);
    await latch.wait();
});
