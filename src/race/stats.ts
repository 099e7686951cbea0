/**
 * Statistics Reporter
 *
 * Read-only aggregation over final tracker contents. Runs after every
 * runner has terminated. Empty inputs yield null ("no data") instead of
 * percentages over zero.
 */

import type { DualStreamRecord, RaceRecord, RunnerOutcome } from '../types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface TimingSummary {
    samples: number;
    averageMs: number;
    medianMs: number;
    minMs: number;
    maxMs: number;
}

export interface EndpointWins {
    endpoint: string;
    wins: number;
    percentage: number;
}

export interface DualStreamSummary {
    totalSignatures: number;
    accountWins: EndpointWins[];
    transactionWins: EndpointWins[];
    bothReceived: number;
    accountFirst: number;
    accountFirstPercentage: number;
    transactionFirst: number;
    transactionFirstPercentage: number;
    /** Signed (tx - account) unless summarized with absolute deltas */
    timing: TimingSummary | null;
}

export interface EndpointRaceStats {
    endpoint: string;
    wins: number;
    winPercentage: number;
    reported: number;
    /** Delay behind the fastest arrival, over contested races this endpoint reported */
    lag: TimingSummary | null;
}

export interface RaceSummary {
    totalRaces: number;
    seenByAll: number;
    endpoints: EndpointRaceStats[];
}

export interface RaceReport {
    races: RaceSummary | null;
    dualStream: DualStreamSummary | null;
    runners: RunnerOutcome[];
}

// ============================================================================
// HELPERS
// ============================================================================

export function summarizeTiming(values: number[]): TimingSummary | null {
    if (values.length === 0) return null;

    const sorted = [...values].sort((a, b) => a - b);
    const sum = sorted.reduce((acc, v) => acc + v, 0);

    return {
        samples: sorted.length,
        averageMs: sum / sorted.length,
        // Upper-middle element for even counts
        medianMs: sorted[Math.floor(sorted.length / 2)] ?? 0,
        minMs: sorted[0] ?? 0,
        maxMs: sorted[sorted.length - 1] ?? 0,
    };
}

function percent(part: number, whole: number): number {
    return whole === 0 ? 0 : (part / whole) * 100;
}

function rankWins(counts: Map<string, number>, total: number): EndpointWins[] {
    return Array.from(counts, ([endpoint, wins]) => ({
        endpoint,
        wins,
        percentage: percent(wins, total),
    })).sort((a, b) => b.wins - a.wins || a.endpoint.localeCompare(b.endpoint));
}

function bump(counts: Map<string, number>, key: string): void {
    counts.set(key, (counts.get(key) ?? 0) + 1);
}

// ============================================================================
// DUAL STREAM
// ============================================================================

export function summarizeDualStream(
    records: DualStreamRecord[],
    options: { absolute?: boolean } = {}
): DualStreamSummary | null {
    if (records.length === 0) return null;

    const accountWins = new Map<string, number>();
    const transactionWins = new Map<string, number>();
    const deltas: number[] = [];
    let accountFirst = 0;
    let transactionFirst = 0;

    for (const record of records) {
        if (record.accountEndpoint !== null) bump(accountWins, record.accountEndpoint);
        if (record.transactionEndpoint !== null) bump(transactionWins, record.transactionEndpoint);

        if (record.accountTimestamp === null || record.transactionTimestamp === null) continue;

        const deltaMs = (record.transactionTimestamp - record.accountTimestamp) * 1000;
        deltas.push(options.absolute ? Math.abs(deltaMs) : deltaMs);

        if (record.accountTimestamp < record.transactionTimestamp) accountFirst++;
        else transactionFirst++;
    }

    const total = records.length;
    const both = deltas.length;

    return {
        totalSignatures: total,
        accountWins: rankWins(accountWins, total),
        transactionWins: rankWins(transactionWins, total),
        bothReceived: both,
        accountFirst,
        accountFirstPercentage: percent(accountFirst, both),
        transactionFirst,
        transactionFirstPercentage: percent(transactionFirst, both),
        timing: summarizeTiming(deltas),
    };
}

/** One runner's own view: lead/lag magnitude rather than direction */
export function summarizeLocalStreams(records: DualStreamRecord[]): DualStreamSummary | null {
    return summarizeDualStream(records, { absolute: true });
}

// ============================================================================
// CROSS-ENDPOINT RACES
// ============================================================================

export function summarizeRaces(records: RaceRecord[], endpoints: string[]): RaceSummary | null {
    if (records.length === 0) return null;

    const wins = new Map<string, number>();
    const reported = new Map<string, number>();
    const lags = new Map<string, number[]>();
    for (const endpoint of endpoints) {
        wins.set(endpoint, 0);
        reported.set(endpoint, 0);
        lags.set(endpoint, []);
    }

    let seenByAll = 0;

    for (const record of records) {
        let fastest = record.arrivals[0];
        if (!fastest) continue;
        for (const arrival of record.arrivals) {
            if (arrival.timestamp < fastest.timestamp) fastest = arrival;
        }

        bump(wins, fastest.endpoint);

        const reporters = new Set<string>();
        for (const arrival of record.arrivals) {
            reporters.add(arrival.endpoint);
            bump(reported, arrival.endpoint);

            if (record.arrivals.length > 1) {
                let list = lags.get(arrival.endpoint);
                if (!list) {
                    list = [];
                    lags.set(arrival.endpoint, list);
                }
                list.push((arrival.timestamp - fastest.timestamp) * 1000);
            }
        }

        if (endpoints.length > 0 && endpoints.every(e => reporters.has(e))) seenByAll++;
    }

    const total = records.length;
    const stats: EndpointRaceStats[] = Array.from(reported.keys(), endpoint => {
        const endpointWins = wins.get(endpoint) ?? 0;
        return {
            endpoint,
            wins: endpointWins,
            winPercentage: percent(endpointWins, total),
            reported: reported.get(endpoint) ?? 0,
            lag: summarizeTiming(lags.get(endpoint) ?? []),
        };
    }).sort((a, b) => b.wins - a.wins || a.endpoint.localeCompare(b.endpoint));

    return { totalRaces: total, seenByAll, endpoints: stats };
}

// ============================================================================
// FORMATTING
// ============================================================================

const pct = (v: number) => `${v.toFixed(1)}%`;
const ms = (v: number) => `${v.toFixed(2)}ms`;

export function formatDualStream(summary: DualStreamSummary | null, title: string, signedNote = true): string[] {
    const lines = [`=== ${title} ===`];
    if (!summary) {
        lines.push('No data');
        return lines;
    }

    lines.push(`Total unique signatures tracked: ${summary.totalSignatures}`);

    lines.push('--- Account Stream First by Endpoint ---');
    for (const w of summary.accountWins) lines.push(`${w.endpoint}: ${w.wins} wins (${pct(w.percentage)})`);

    lines.push('--- Transaction Stream First by Endpoint ---');
    for (const w of summary.transactionWins) lines.push(`${w.endpoint}: ${w.wins} wins (${pct(w.percentage)})`);

    if (summary.bothReceived === 0 || !summary.timing) {
        lines.push('No signatures with both streams');
        return lines;
    }

    const t = summary.timing;
    lines.push('--- Account vs Transaction Stream Timing ---');
    lines.push(`Signatures with both streams: ${summary.bothReceived}`);
    lines.push(`Account stream faster: ${summary.accountFirst} (${pct(summary.accountFirstPercentage)})`);
    lines.push(`Transaction stream faster: ${summary.transactionFirst} (${pct(summary.transactionFirstPercentage)})`);
    lines.push(`Average timing difference: ${ms(t.averageMs)}${signedNote ? ' (positive = TX later)' : ''}`);
    lines.push(`Median timing difference: ${ms(t.medianMs)}`);
    lines.push(`Min difference: ${ms(t.minMs)}`);
    lines.push(`Max difference: ${ms(t.maxMs)}`);
    return lines;
}

export function formatRaces(summary: RaceSummary | null): string[] {
    const lines = ['=== CROSS-ENDPOINT RACE RESULTS ==='];
    if (!summary) {
        lines.push('No data');
        return lines;
    }

    lines.push(`Races observed: ${summary.totalRaces} (seen by every endpoint: ${summary.seenByAll})`);
    for (const e of summary.endpoints) {
        const lag = e.lag
            ? ` | behind fastest avg ${ms(e.lag.averageMs)} median ${ms(e.lag.medianMs)} max ${ms(e.lag.maxMs)}`
            : '';
        lines.push(`${e.endpoint}: ${e.wins} first (${pct(e.winPercentage)}), reported ${e.reported}${lag}`);
    }
    return lines;
}

export function formatReport(report: RaceReport): string[] {
    const lines = formatRaces(report.races);

    if (report.dualStream) {
        lines.push(...formatDualStream(report.dualStream, 'GLOBAL CROSS-ENDPOINT STATISTICS'));
    }

    lines.push('=== RUNNERS ===');
    for (const r of report.runners) {
        if (r.status === 'failed') {
            lines.push(`${r.endpoint}: failed - ${r.error}`);
        } else {
            const s = r.summary;
            lines.push(
                `${r.endpoint}: ${s.exitReason}, ${s.transactionsSeen} transactions, ` +
                `${s.accountUpdatesSeen} account updates, ${s.duplicatesDropped} duplicates, ` +
                `${s.decodeFailures} decode failures`
            );
        }
    }
    return lines;
}
