/**
 * Shared gRPC plumbing for provider clients
 *
 * Protos are loaded at run time from ./proto with @grpc/proto-loader and
 * calls are made on a plain grpc-js Client, so no generated stubs exist.
 */

import { Client, Metadata, credentials } from '@grpc/grpc-js';
import { loadSync, type MethodDefinition } from '@grpc/proto-loader';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { ConnectError, errorMessage } from '../errors.js';
import type { Endpoint } from '../types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
export const PROTO_DIR = join(__dirname, 'proto');

const PROTO_LOADER_OPTS = {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: false,
    oneofs: true,
    includeDirs: [PROTO_DIR],
};

// Geyser updates for busy accounts exceed the 4MB default
const CHANNEL_OPTIONS = {
    'grpc.max_receive_message_length': 64 * 1024 * 1024,
    'grpc.keepalive_time_ms': 10_000,
    'grpc.keepalive_timeout_ms': 5_000,
};

export type RpcMethod = MethodDefinition<object, object>;

// ============================================================================
// PROTO LOADING
// ============================================================================

const methodCache = new Map<string, RpcMethod>();

export function loadMethod(protoFile: string, service: string, method: string): RpcMethod {
    const key = `${protoFile}:${service}/${method}`;
    const cached = methodCache.get(key);
    if (cached) return cached;

    const protoPath = join(PROTO_DIR, protoFile);
    const pkgDef = loadSync(protoPath, PROTO_LOADER_OPTS);
    const svc = pkgDef[service];

    if (!svc || 'format' in svc) {
        throw new Error(`${service} not found in proto at ${protoPath}`);
    }

    const def = svc[method];
    if (!def) {
        throw new Error(`${service}.${method} not found in proto at ${protoPath}`);
    }

    methodCache.set(key, def);
    return def;
}

// ============================================================================
// CHANNEL
// ============================================================================

export interface ChannelTarget {
    address: string;
    secure: boolean;
}

/**
 * "https://host" -> host:443 over TLS, "http://host:10000" -> host:10000 insecure.
 * A bare "host:port" is taken as insecure.
 */
export function parseTarget(url: string): ChannelTarget {
    if (!/^[a-z]+:\/\//i.test(url)) {
        return { address: url, secure: false };
    }

    const parsed = new URL(url);
    const secure = parsed.protocol === 'https:';
    const port = parsed.port || (secure ? '443' : '80');
    return { address: `${parsed.hostname}:${port}`, secure };
}

export function tokenMetadata(xToken: string | undefined): Metadata {
    const metadata = new Metadata();
    if (xToken) metadata.set('x-token', xToken);
    return metadata;
}

/**
 * Open a channel and wait until it is ready. Failure is final: no retry.
 */
export async function openClient(endpoint: Endpoint, connectTimeoutMs: number): Promise<Client> {
    let client: Client;
    try {
        const target = parseTarget(endpoint.url);
        client = new Client(
            target.address,
            target.secure ? credentials.createSsl() : credentials.createInsecure(),
            CHANNEL_OPTIONS
        );
    } catch (err) {
        throw new ConnectError(`Invalid endpoint url ${endpoint.url}: ${errorMessage(err)}`, {
            endpoint: endpoint.name,
            cause: err,
        });
    }

    await new Promise<void>((resolve, reject) => {
        client.waitForReady(Date.now() + connectTimeoutMs, err => {
            if (!err) {
                resolve();
                return;
            }
            client.close();
            reject(
                new ConnectError(`Failed to connect to ${endpoint.url}: ${err.message}`, {
                    endpoint: endpoint.name,
                    cause: err,
                })
            );
        });
    });

    return client;
}
