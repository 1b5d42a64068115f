import { zone } from '../logging/zone';
import { decodeLogBuffer } from '../docker/logs';
import { ContainerDetails, ContainerRuntime } from '../docker/runtime';
import { Credential } from '../types/setup';

const log = zone('setup.credentials');

export const ROOT_CREDENTIALS_MARKER = 'root principal credentials';

const CREDENTIALS_PATTERN = /root principal credentials\s*:([^\n]*)/i;

/**
 * Engine timestamps are RFC 3339 with nanoseconds; the first 26 characters
 * keep microsecond precision.
 */
const TIMESTAMP_PREFIX_LENGTH = 26;
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{1,6})Z$/;

/**
 * Microseconds since the epoch for the line's timestamp prefix, or
 * -Infinity when the prefix is not a valid timestamp.
 */
export function parseLogTimestamp(line: string): number {
    const match = TIMESTAMP_PATTERN.exec(line.slice(0, TIMESTAMP_PREFIX_LENGTH) + 'Z');
    if (!match) {
        log.error({ message: 'Error parsing timestamp from log line', data: { line: line.slice(0, 80) } });
        return Number.NEGATIVE_INFINITY;
    }

    const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
    const micros = Number(match[7].padEnd(6, '0'));

    // setUTCFullYear keeps years below 100 literal, unlike Date.UTC; out-of-range
    // fields (month 13, Feb 30) roll over and are rejected below
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    date.setUTCHours(hour, minute, second, 0);
    if (
        year < 1 ||
        date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day ||
        date.getUTCHours() !== hour ||
        date.getUTCMinutes() !== minute ||
        date.getUTCSeconds() !== second
    ) {
        log.error({ message: 'Error parsing timestamp from log line', data: { line: line.slice(0, 80) } });
        return Number.NEGATIVE_INFINITY;
    }

    return date.getTime() * 1000 + micros;
}

/**
 * Lines mentioning the root credentials, most recent first.
 * Ordering is by the line's own timestamp, not its position in the log.
 */
export function selectCredentialLines(logText: string): string[] {
    const candidates = logText
        .split(/\r?\n/)
        .filter(line => line.toLowerCase().includes(ROOT_CREDENTIALS_MARKER))
        .map(line => ({ line, time: parseLogTimestamp(line) }));

    // Array.prototype.sort is stable: equal timestamps keep log order
    candidates.sort((a, b) => {
        if (a.time === b.time) return 0;
        return a.time > b.time ? -1 : 1;
    });

    return candidates.map(c => c.line);
}

/**
 * Split "id:secret" captured after the marker. The secret may itself contain colons.
 */
export function parseCredentialLine(line: string): Credential | undefined {
    const match = CREDENTIALS_PATTERN.exec(line);
    if (!match) {
        return undefined;
    }

    const captured = match[1].trim();
    const separator = captured.indexOf(':');
    if (separator < 0) {
        return undefined;
    }

    return {
        clientId: captured.slice(0, separator),
        clientSecret: captured.slice(separator + 1)
    };
}

/**
 * Root credentials from a log transcript: the most recent marker line wins
 */
export function extractRootCredentials(logText: string): Credential | undefined {
    const [latest] = selectCredentialLines(logText);
    if (latest === undefined) {
        log.warn({ message: 'No root credentials line found in container logs' });
        return undefined;
    }

    const credential = parseCredentialLine(latest);
    if (!credential) {
        log.warn({ message: 'Root credentials line is malformed', data: { line: latest }, private: true });
    }
    return credential;
}

/**
 * Read a container's full log and extract the root credentials from it
 */
export async function readRootCredentials(
    runtime: ContainerRuntime,
    container: Pick<ContainerDetails, 'id' | 'tty'>
): Promise<Credential | undefined> {
    const buffer = await runtime.readLogs(container.id);
    const text = decodeLogBuffer(buffer, container.tty);

    log.debug({ message: 'Read container logs', data: { containerId: container.id, bytes: buffer.length, tty: container.tty } });

    return extractRootCredentials(text);
}
