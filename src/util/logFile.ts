// src/util/logFile.ts
// Per-endpoint arrival log
//
// One file per runner under the run's log directory:
//   <logDir>/<name>.log
// Each line: "<seconds, 6 decimals> <label> <signature>"
//
// Writes are synchronous so a failed write surfaces at the call site and
// the line is on disk before the observation reaches the tracker.

import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { join } from 'node:path';
import { LogWriteError, errorMessage } from '../errors.js';

export function formatEntry(timestamp: number, label: string, signature: string): string {
    return `${timestamp.toFixed(6)} ${label} ${signature}\n`;
}

export class EndpointLog {
    readonly path: string;
    private fd: number | null;

    constructor(path: string, fd: number) {
        this.path = path;
        this.fd = fd;
    }

    writeEntry(timestamp: number, label: string, signature: string): void {
        if (this.fd === null) {
            throw new LogWriteError(`Log ${this.path} is closed`);
        }
        try {
            writeSync(this.fd, formatEntry(timestamp, label, signature));
        } catch (err) {
            throw new LogWriteError(`Failed to write ${this.path}: ${errorMessage(err)}`, { cause: err });
        }
    }

    close(): void {
        if (this.fd === null) return;
        const fd = this.fd;
        this.fd = null;
        closeSync(fd);
    }
}

export class LogWriter {
    readonly dir: string;

    constructor(dir: string) {
        this.dir = dir;
    }

    open(name: string): EndpointLog {
        const path = join(this.dir, `${name}.log`);
        try {
            mkdirSync(this.dir, { recursive: true });
            return new EndpointLog(path, openSync(path, 'a'));
        } catch (err) {
            throw new LogWriteError(`Failed to open ${path}: ${errorMessage(err)}`, { cause: err });
        }
    }
}
