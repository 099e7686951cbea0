import test from 'node:test';
import assert from 'node:assert/strict';
import { setImmediate as flush } from 'node:timers/promises';

import { Comparator } from './comparator.js';
import { ShutdownCoordinator } from './shutdown.js';

const obs = (signature: string, timestamp: number) => ({ signature, timestamp, startTime: 0 });

test('Comparator counts distinct signatures, not observations', () => {
    const c = new Comparator(10);

    c.add('a', obs('s1', 1.0));
    c.add('b', obs('s1', 1.1));
    c.add('a', obs('s2', 2.0));

    assert.equal(c.getValidCount(), 2);
    assert.equal(c.size, 2);
});

test('Comparator ignores a repeat from the same endpoint without overwriting', () => {
    const c = new Comparator(10);

    const first = c.add('a', obs('s1', 10.0));
    const repeat = c.add('a', obs('s1', 9.0));

    assert.deepEqual(first, { accepted: true, validCount: 1, reachedTarget: false });
    assert.deepEqual(repeat, { accepted: false, validCount: 1, reachedTarget: false });
    assert.deepEqual(c.getRecord('s1')?.arrivals, [{ endpoint: 'a', timestamp: 10.0 }]);
});

test('Comparator keeps one record per signature with every endpoint (two endpoints, one signature)', () => {
    const c = new Comparator(10);

    c.add('A', obs('S1', 10.0));
    const second = c.add('B', obs('S1', 10.005));

    assert.equal(second.accepted, true);
    assert.equal(second.validCount, 1);
    assert.equal(c.getValidCount(), 1);
    assert.deepEqual(c.getRecord('S1')?.arrivals, [
        { endpoint: 'A', timestamp: 10.0 },
        { endpoint: 'B', timestamp: 10.005 },
    ]);
});

test('Comparator reaches the target on the third of three signatures', () => {
    const c = new Comparator(3);
    const shutdown = new ShutdownCoordinator();
    const counts: number[] = [];

    for (const s of ['S1', 'S2', 'S3']) {
        const result = c.add('A', obs(s, 1));
        counts.push(result.validCount);
        if (result.reachedTarget) shutdown.trigger('A');
        assert.equal(shutdown.isTriggered, s === 'S3');
    }

    assert.deepEqual(counts, [1, 2, 3]);
});

test('Comparator valid count never decreases', () => {
    const c = new Comparator(5);
    let last = 0;

    const sequence: Array<[string, string]> = [
        ['a', 's1'], ['a', 's1'], ['b', 's1'], ['b', 's2'], ['a', 's2'], ['c', 's3'], ['c', 's3'],
    ];
    for (const [endpoint, signature] of sequence) {
        const { validCount } = c.add(endpoint, obs(signature, 1));
        assert.ok(validCount >= last);
        assert.equal(validCount, c.getValidCount());
        last = validCount;
    }

    assert.equal(last, 3);
});

test('Comparator reports the target crossing exactly once under many concurrent callers', async () => {
    const c = new Comparator(25);
    const shutdown = new ShutdownCoordinator();
    let crossings = 0;
    let fired = 0;

    const caller = async (endpoint: string) => {
        for (let i = 0; i < 40; i++) {
            await flush();
            const result = c.add(endpoint, obs(`sig-${i}`, i));
            if (result.reachedTarget) {
                crossings++;
                if (shutdown.trigger(endpoint)) fired++;
            }
        }
    };

    await Promise.all(['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'].map(caller));

    assert.equal(crossings, 1);
    assert.equal(fired, 1);
    assert.equal(c.getValidCount(), 40);
});

test('Comparator only reports the crossing for the add that makes the count equal the target', () => {
    const c = new Comparator(2);

    assert.equal(c.add('a', obs('s1', 1)).reachedTarget, false);
    assert.equal(c.add('b', obs('s1', 1)).reachedTarget, false);
    assert.equal(c.add('b', obs('s2', 1)).reachedTarget, true);
    assert.equal(c.add('a', obs('s2', 1)).reachedTarget, false);
    assert.equal(c.add('a', obs('s3', 1)).reachedTarget, false);
});

test('Comparator rejects a target that is not a positive integer', () => {
    assert.throws(() => new Comparator(0), RangeError);
    assert.throws(() => new Comparator(1.5), RangeError);
});
