import { describe, it, expect } from 'vitest';
import type { Logform } from 'winston';
import {
    CONSOLE_TRUNCATE_LENGTH,
    formatConsoleLine,
    formatDataForConsole,
    formatFileLine,
    overflowGuard,
    OVERSIZE_THRESHOLD,
    serializeLogData
} from '../../../src/logging/logger';

function guard(info: Logform.TransformableInfo): Logform.TransformableInfo {
    return overflowGuard().transform(info) as Logform.TransformableInfo;
}

describe('logging/logger - serializeLogData', () => {
    it('serializes primitives by type', () => {
        expect(serializeLogData('text')).toBe('text');
        expect(serializeLogData(null)).toBe('null');
        expect(serializeLogData(undefined)).toBe('');
        expect(serializeLogData(NaN)).toBe('NaN');
        expect(serializeLogData(-Infinity)).toBe('-Infinity');
        expect(serializeLogData(8181)).toBe('8181');
        expect(serializeLogData(false)).toBe('false');
        expect(serializeLogData(10n)).toBe('10n');
        expect(serializeLogData(Symbol('s'))).toBe('Symbol(s)');
    });

    it('serializes errors by name and message', () => {
        expect(serializeLogData(new TypeError('boom'))).toBe('{"name":"TypeError","message":"boom"}');
    });

    it('serializes buffers as base64', () => {
        expect(serializeLogData(Buffer.from('abc'))).toBe('<Buffer base64:YWJj>');
    });

    it('falls back to inspection for circular objects', () => {
        const looped: Record<string, unknown> = { name: 'loop' };
        looped.self = looped;

        expect(serializeLogData(looped)).toContain('[Circular *1]');
    });
});

describe('logging/logger - overflowGuard', () => {
    it('stores the serialized payload for the formatters', () => {
        const info = guard({ level: 'info', message: 'm', data: { catalog: 'my_catalog' } });
        expect(info.__serializedData).toBe('{"catalog":"my_catalog"}');
    });

    it('leaves entries without data untouched', () => {
        const info = guard({ level: 'info', message: 'm', data: undefined });
        expect(info.message).toBe('m');
        expect(info.__serializedData).toBeUndefined();
    });

    it('replaces an oversized payload with an error entry', () => {
        const info = guard({ level: 'info', message: 'm', zone: 'setup', data: 'x'.repeat(OVERSIZE_THRESHOLD + 1) });

        expect(info.level).toBe('error');
        expect(info.zone).toBe('logger');
        expect(info.message).toBe('an oversized/invalid log message was received.');
        expect(info.data).toMatchObject({ bytes: OVERSIZE_THRESHOLD + 1 });
        expect(info.__serializedData).toBeUndefined();
    });
});

describe('logging/logger - line formats', () => {
    it('prints level and zone bracketed before the message', () => {
        expect(formatConsoleLine({ level: 'info', message: 'Catalog created', zone: 'api.management' }))
            .toBe('[info][api.management] Catalog created');
    });

    it('prefers the serialized payload on the console', () => {
        const line = formatConsoleLine({
            level: 'info',
            message: 'Catalog created',
            zone: 'api.management',
            data: { catalog: 'my_catalog' },
            __serializedData: '{"catalog":"my_catalog"}',
        });

        expect(line).toBe('[info][api.management] Catalog created {"catalog":"my_catalog"}');
    });

    it('falls back to the core zone', () => {
        expect(formatConsoleLine({ level: 'warn', message: 'w' })).toBe('[warn][core] w');
    });

    it('prints timestamp, zone and upper-case level in the file', () => {
        const line = formatFileLine({
            level: 'warn',
            message: 'Step skipped',
            zone: 'setup.steps',
            timestamp: '2024-01-01T00:00:00.000Z',
            __serializedData: '{"step":"grant-privilege"}',
        });

        expect(line).toBe('2024-01-01T00:00:00.000Z setup.steps WARN: Step skipped {"step":"grant-privilege"}');
    });

    it('truncates long console payloads and reports their size', () => {
        const formatted = formatDataForConsole('a'.repeat(5_000));
        expect(formatted).toBe('a'.repeat(CONSOLE_TRUNCATE_LENGTH) + ' ... <truncated 5000 bytes>');
    });
});
