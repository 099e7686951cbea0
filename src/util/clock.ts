// src/util/clock.ts
// Process-wide wall clock in fractional seconds.
// timeOrigin + now() is monotonic within the process and sub-millisecond,
// so every runner's timestamps are directly comparable.

import { performance } from 'node:perf_hooks';

export type Clock = () => number;

export const nowSeconds: Clock = () => (performance.timeOrigin + performance.now()) / 1000;
