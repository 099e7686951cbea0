/**
 * Error taxonomy
 *
 * Fatal to one runner:     ConnectError, SubscribeError, LogWriteError
 * Ends one runner's loop:  StreamError
 * Drops one message:       DecodeError
 * Fatal before start:      ConfigError
 */

export class FeedRaceError extends Error {
    readonly endpoint?: string;

    constructor(message: string, options: { endpoint?: string; cause?: unknown } = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = new.target.name;
        this.endpoint = options.endpoint;
    }
}

export class ConnectError extends FeedRaceError {}

export class SubscribeError extends FeedRaceError {}

export class StreamError extends FeedRaceError {}

export class DecodeError extends FeedRaceError {}

export class LogWriteError extends FeedRaceError {}

export class ConfigError extends FeedRaceError {
    readonly problems: string[];

    constructor(problems: string[]) {
        super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
        this.problems = problems;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
