/**
 * Race Tracker (Comparator)
 *
 * Shared registry: signature -> first arrival per endpoint.
 *
 * Every mutation runs synchronously between await points, so on the event
 * loop each add() is one exclusive critical section. The target crossing is
 * detected inside that same section, which is what makes reachedTarget true
 * for exactly one caller.
 *
 * Completion policy: a record is complete once any endpoint reported it, so
 * a slow or dead endpoint never blocks termination.
 */

import type { AddResult, Observation, RaceRecord } from '../types.js';

export class Comparator {
    private readonly races: Map<string, RaceRecord> = new Map();
    private readonly target: number;
    private validCount = 0;

    constructor(target: number) {
        if (!Number.isInteger(target) || target < 1) {
            throw new RangeError(`Race target must be a positive integer, got ${target}`);
        }
        this.target = target;
    }

    /**
     * Record an endpoint's arrival. A repeat from the same endpoint is
     * dropped and never overwrites the stored timestamp.
     */
    add(endpoint: string, observation: Observation): AddResult {
        let record = this.races.get(observation.signature);

        if (!record) {
            record = {
                signature: observation.signature,
                startTime: observation.startTime,
                arrivals: [],
            };
            this.races.set(observation.signature, record);
        } else if (record.arrivals.some(a => a.endpoint === endpoint)) {
            return { accepted: false, validCount: this.validCount, reachedTarget: false };
        }

        const wasComplete = record.arrivals.length > 0;
        record.arrivals.push({ endpoint, timestamp: observation.timestamp });

        let reachedTarget = false;
        if (!wasComplete) {
            this.validCount++;
            reachedTarget = this.validCount === this.target;
        }

        return { accepted: true, validCount: this.validCount, reachedTarget };
    }

    getValidCount(): number {
        return this.validCount;
    }

    getTarget(): number {
        return this.target;
    }

    getRecord(signature: string): RaceRecord | undefined {
        return this.races.get(signature);
    }

    records(): RaceRecord[] {
        return Array.from(this.races.values());
    }

    get size(): number {
        return this.races.size;
    }
}
