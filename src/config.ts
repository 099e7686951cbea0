/**
 * Run configuration
 *
 * Sources, later wins:
 *   1. JSON file (argv path, else RACE_CONFIG, else ./race.config.json)
 *   2. .env via dotenv, then the RACE_* environment overrides
 *
 * Every problem is collected before throwing so one ConfigError lists them all.
 */

import { readFileSync } from 'node:fs';
import bs58 from 'bs58';
import dotenv from 'dotenv';
import { ConfigError, errorMessage } from './errors.js';
import { COMMITMENTS, ENDPOINT_KINDS, type Commitment, type Endpoint, type EndpointKind, type RunConfig } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface RaceConfig extends RunConfig {
    endpoints: Endpoint[];
    logDir: string;
    connectTimeoutMs: number;
    /** Overall run limit; null runs until the target is reached */
    maxDurationMs: number | null;
}

export const DEFAULT_CONFIG_PATH = 'race.config.json';

const DEFAULTS = {
    commitment: 'processed',
    logDir: 'logs',
    connectTimeoutMs: 10_000,
} as const;

type Env = Record<string, string | undefined>;

// ============================================================================
// NARROWING
// ============================================================================

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isCommitment(v: unknown): v is Commitment {
    return COMMITMENTS.some(c => c === v);
}

function isEndpointKind(v: unknown): v is EndpointKind {
    return ENDPOINT_KINDS.some(k => k === v);
}

/** Accepts numbers and numeric strings (env overrides are strings) */
function toNumber(v: unknown): number | null {
    if (typeof v === 'number') return v;
    if (typeof v === 'string' && v.trim() !== '') return Number(v);
    return null;
}

export function isAccountAddress(value: string): boolean {
    try {
        return bs58.decode(value).length === 32;
    } catch {
        return false;
    }
}

function isStreamUrl(value: string): boolean {
    try {
        const url = new URL(value);
        return url.protocol === 'http:' || url.protocol === 'https:';
    } catch {
        return false;
    }
}

// ============================================================================
// VALIDATION
// ============================================================================

function parseEndpoints(raw: unknown, problems: string[]): Endpoint[] {
    if (!Array.isArray(raw) || raw.length === 0) {
        problems.push('endpoints must be a non-empty array');
        return [];
    }

    const endpoints: Endpoint[] = [];
    const seen = new Set<string>();

    raw.forEach((item: unknown, i: number) => {
        const at = `endpoints[${i}]`;
        if (!isRecord(item)) {
            problems.push(`${at} must be an object`);
            return;
        }

        const { name, url, xToken, kind } = item;
        let ok = true;

        if (typeof name !== 'string' || name.trim() === '') {
            problems.push(`${at}.name must be a non-empty string`);
            ok = false;
        } else if (seen.has(name)) {
            problems.push(`${at}.name "${name}" is used by another endpoint`);
            ok = false;
        } else {
            seen.add(name);
        }

        if (typeof url !== 'string' || !isStreamUrl(url)) {
            problems.push(`${at}.url must be an http(s) URL`);
            ok = false;
        }

        if (xToken !== undefined && typeof xToken !== 'string') {
            problems.push(`${at}.xToken must be a string`);
            ok = false;
        }

        if (!isEndpointKind(kind)) {
            problems.push(`${at}.kind must be one of ${ENDPOINT_KINDS.join(', ')}`);
            ok = false;
        }

        if (ok && typeof name === 'string' && typeof url === 'string' && isEndpointKind(kind)) {
            endpoints.push({
                name,
                url,
                kind,
                ...(typeof xToken === 'string' && xToken !== '' ? { xToken } : {}),
            });
        }
    });

    return endpoints;
}

/**
 * Validate a raw config object (file contents with env overrides applied).
 * Throws ConfigError listing every problem found.
 */
export function parseConfig(raw: unknown): RaceConfig {
    if (!isRecord(raw)) {
        throw new ConfigError(['config must be a JSON object']);
    }

    const problems: string[] = [];

    const account = raw.account;
    if (typeof account !== 'string' || !isAccountAddress(account)) {
        problems.push('account must be a base58 public key (32 bytes)');
    }

    const transactions = toNumber(raw.transactions);
    if (transactions === null || !Number.isInteger(transactions) || transactions < 1) {
        problems.push('transactions must be a positive integer');
    }

    const commitment = raw.commitment ?? DEFAULTS.commitment;
    if (!isCommitment(commitment)) {
        problems.push(`commitment must be one of ${COMMITMENTS.join(', ')}`);
    }

    const logDir = raw.logDir ?? DEFAULTS.logDir;
    if (typeof logDir !== 'string' || logDir === '') {
        problems.push('logDir must be a non-empty string');
    }

    const connectTimeoutMs = toNumber(raw.connectTimeoutMs ?? DEFAULTS.connectTimeoutMs);
    if (connectTimeoutMs === null || !Number.isFinite(connectTimeoutMs) || connectTimeoutMs <= 0) {
        problems.push('connectTimeoutMs must be a positive number');
    }

    const maxDurationMs = raw.maxDurationMs === undefined ? null : toNumber(raw.maxDurationMs);
    if (raw.maxDurationMs !== undefined && (maxDurationMs === null || !Number.isFinite(maxDurationMs) || maxDurationMs <= 0)) {
        problems.push('maxDurationMs must be a positive number');
    }

    const endpoints = parseEndpoints(raw.endpoints, problems);

    if (
        problems.length > 0 ||
        typeof account !== 'string' ||
        transactions === null ||
        !isCommitment(commitment) ||
        typeof logDir !== 'string' ||
        connectTimeoutMs === null
    ) {
        throw new ConfigError(problems);
    }

    return {
        account,
        transactions,
        commitment,
        endpoints,
        logDir,
        connectTimeoutMs,
        maxDurationMs,
    };
}

// ============================================================================
// LOADING
// ============================================================================

const ENV_OVERRIDES = {
    RACE_ACCOUNT: 'account',
    RACE_TRANSACTIONS: 'transactions',
    RACE_COMMITMENT: 'commitment',
    RACE_LOG_DIR: 'logDir',
    RACE_MAX_DURATION_MS: 'maxDurationMs',
} as const;

export function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
    const merged: Record<string, unknown> = { ...raw };
    for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
        const value = env[variable];
        if (value !== undefined && value !== '') merged[key] = value;
    }
    return merged;
}

export function resolveConfigPath(argv: string[], env: Env): string {
    return argv[2] ?? env.RACE_CONFIG ?? DEFAULT_CONFIG_PATH;
}

export function readConfigFile(path: string): Record<string, unknown> {
    let text: string;
    try {
        text = readFileSync(path, 'utf8');
    } catch (err) {
        throw new ConfigError([`cannot read ${path}: ${errorMessage(err)}`]);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (err) {
        throw new ConfigError([`${path} is not valid JSON: ${errorMessage(err)}`]);
    }

    if (!isRecord(parsed)) {
        throw new ConfigError([`${path} must contain a JSON object`]);
    }
    return parsed;
}

/**
 * Load .env, the config file and the environment overrides.
 */
export function loadConfig(argv: string[] = process.argv, env: Env = process.env): RaceConfig {
    dotenv.config();
    const path = resolveConfigPath(argv, env);
    return parseConfig(applyEnvOverrides(readConfigFile(path), env));
}
