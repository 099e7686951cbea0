import test from 'node:test';
import assert from 'node:assert/strict';
import { PassThrough } from 'node:stream';
import { setImmediate as flush } from 'node:timers/promises';

import { StreamError } from '../errors.js';
import { StreamReader } from './streamReader.js';

const source = () => new PassThrough({ objectMode: true });

test('StreamReader yields updates in delivery order, then end', async () => {
    const input = source();
    const reader = new StreamReader<string>(input);

    input.write('a');
    input.write('b');
    input.end();

    assert.deepEqual(await reader.next(), { kind: 'update', update: 'a' });
    assert.deepEqual(await reader.next(), { kind: 'update', update: 'b' });
    assert.deepEqual(await reader.next(), { kind: 'end' });
    assert.deepEqual(await reader.next(), { kind: 'end' });
});

test('StreamReader hands a later update to a pending next()', async () => {
    const input = source();
    const reader = new StreamReader<string>(input);

    const pending = reader.next();
    input.write('late');

    assert.deepEqual(await pending, { kind: 'update', update: 'late' });
});

test('StreamReader drains buffered updates before reporting an error', async () => {
    const input = source();
    const reader = new StreamReader<string>(input);

    input.write('a');
    await flush();
    input.destroy(new Error('connection reset'));
    await flush();

    assert.deepEqual(await reader.next(), { kind: 'update', update: 'a' });

    const item = await reader.next();
    assert.equal(item.kind, 'error');
    if (item.kind === 'error') {
        assert.ok(item.error instanceof StreamError);
        assert.equal(item.error.message, 'connection reset');
    }
});

test('StreamReader.close ends pending reads and runs onClose once', async () => {
    const input = source();
    let closes = 0;
    const reader = new StreamReader<string>(input, {
        onClose: () => {
            closes++;
        },
    });

    const pending = reader.next();
    reader.close();
    reader.close();

    assert.deepEqual(await pending, { kind: 'end' });
    assert.equal(closes, 1);

    input.write('ignored');
    await flush();
    assert.deepEqual(await reader.next(), { kind: 'end' });
});

test('StreamReader pauses the source at the high-water mark and resumes below half', async () => {
    const input = source();
    const reader = new StreamReader<number>(input, { highWaterMark: 4 });

    for (let i = 0; i < 4; i++) input.write(i);
    await flush();

    assert.equal(reader.buffered, 4);
    assert.equal(input.isPaused(), true);

    await reader.next();
    await reader.next();
    assert.equal(input.isPaused(), true);

    await reader.next();
    assert.equal(reader.buffered, 1);
    assert.equal(input.isPaused(), false);
});
