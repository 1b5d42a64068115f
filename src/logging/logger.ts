import * as winston from 'winston';
import type { Logform } from 'winston';
import fs from 'fs';
import path from 'path';
import util from 'util';

export const OVERSIZE_THRESHOLD = 100_000; // bytes
export const CONSOLE_TRUNCATE_LENGTH = 1_000; // characters
const LOG_FILE = process.env.LOG_FILE || path.join(process.cwd(), 'logs', 'setup.log');

const levelColors: Record<string, string> = {
    info: 'cyan',
    debug: 'gray',
    error: 'red',
    warn: 'yellow'
};

winston.addColors(levelColors);

// The file transport fails on first write if the directory is missing;
// the console transport keeps working either way.
try {
    const logDir = path.dirname(LOG_FILE);
    if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
    }
} catch (err) {
    console.error('[Logger] Failed to ensure log directory exists:', err);
}

// Type-aware serialization for log data. Exported for testing.
export function serializeLogData(data: unknown): string {
    if (typeof data === 'string') return data;
    if (data === null) return 'null';
    if (data === undefined) return '';

    if (typeof data === 'number') {
        if (Number.isNaN(data)) return 'NaN';
        if (!Number.isFinite(data)) return data > 0 ? 'Infinity' : '-Infinity';
        return String(data);
    }

    if (typeof data === 'boolean') return data ? 'true' : 'false';
    if (typeof data === 'bigint') return `${data}n`;
    if (typeof data === 'symbol') return data.toString();
    if (typeof data === 'function') return `<function:${data.name || 'anonymous'}>`;

    if (Buffer.isBuffer(data)) {
        return `<Buffer base64:${data.toString('base64')}>`;
    }

    if (data instanceof Error) {
        return JSON.stringify({ name: data.name, message: data.message });
    }

    try {
        return JSON.stringify(data);
    } catch {
        // circular references
        return util.inspect(data, { depth: 2, breakLength: Infinity });
    }
}

function hasData(info: Logform.TransformableInfo): boolean {
    return Object.prototype.hasOwnProperty.call(info, 'data') && info.data !== undefined;
}

function zoneOf(info: Logform.TransformableInfo): string {
    return typeof info.zone === 'string' ? info.zone : 'core';
}

function serializedOf(info: Logform.TransformableInfo): string | undefined {
    return typeof info.__serializedData === 'string' ? info.__serializedData : undefined;
}

function replaceWithOversizeError(info: Logform.TransformableInfo, stack: string, bytes: number): Logform.TransformableInfo {
    info.zone = 'logger';
    info.message = 'an oversized/invalid log message was received.';
    info.data = { stack, bytes };
    info.level = 'error';
    delete info.__serializedData;
    return info;
}

// Replaces payloads that cannot be serialized or exceed OVERSIZE_THRESHOLD
export const overflowGuard = winston.format((info) => {
    if (!hasData(info)) {
        return info;
    }

    let serialized: string;
    try {
        serialized = serializeLogData(info.data);
    } catch (err) {
        const stack = err instanceof Error && err.stack ? err.stack : String(err);
        return replaceWithOversizeError(info, stack, 0);
    }

    info.__serializedData = serialized;

    const bytes = Buffer.byteLength(serialized, 'utf8');
    if (bytes > OVERSIZE_THRESHOLD) {
        const stack = new Error('Oversized log message').stack ?? 'Oversized log message';
        return replaceWithOversizeError(info, stack, bytes);
    }

    return info;
});

export function formatDataForConsole(data: unknown): string {
    if (data === undefined) return '';

    let s: string;
    try {
        s = typeof data === 'string' ? data : JSON.stringify(data, null, 2);
    } catch {
        s = String(data);
    }

    if (s.length > CONSOLE_TRUNCATE_LENGTH) {
        const bytes = Buffer.byteLength(s, 'utf8');
        return s.slice(0, CONSOLE_TRUNCATE_LENGTH) + ` ... <truncated ${bytes} bytes>`;
    }

    return s;
}

export const lowerCaseLevel = winston.format((info) => {
    if (info.level) info.level = String(info.level).toLowerCase();
    return info;
});

export function formatConsoleLine(info: Logform.TransformableInfo): string {
    const dataSource = serializedOf(info) ?? (hasData(info) ? info.data : undefined);
    const dataPart = dataSource !== undefined ? ' ' + formatDataForConsole(dataSource) : '';
    return `[${info.level}][${zoneOf(info)}] ${String(info.message)}${dataPart}`;
}

export function formatFileLine(info: Logform.TransformableInfo): string {
    const ts = typeof info.timestamp === 'string' ? info.timestamp : new Date().toISOString();
    const level = String(info.level).toUpperCase();
    const serialized = serializedOf(info);
    const dataPart = serialized !== undefined ? ' ' + serialized : '';

    // TIMESTAMP ZONE LEVEL: MESSAGE DATA
    return `${ts} ${zoneOf(info)} ${level}: ${String(info.message)}${dataPart}`;
}

export const consoleFormat = winston.format.combine(
    overflowGuard(),
    lowerCaseLevel(),
    winston.format.colorize({ all: false }),
    winston.format.printf(formatConsoleLine)
);

const fileFormat = winston.format.combine(
    overflowGuard(),
    winston.format.timestamp(),
    winston.format.printf(formatFileLine)
);

// Unit tests must not print to the console
const isTestEnv = process.env.NODE_ENV === 'test';

export const baseLogger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'debug',
    transports: [
        new winston.transports.Console({ format: consoleFormat, silent: isTestEnv }),
        new winston.transports.File({ filename: LOG_FILE, format: fileFormat, silent: isTestEnv })
    ]
});
