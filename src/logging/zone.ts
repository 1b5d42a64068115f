import { baseLogger } from './logger';

/* Usage:
 * const log = zone("setup.orchestrator");
 * log.info({ message: "Catalog created", data: { catalog: "my_catalog" } });
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogPayload = {
    message: string;
    data?: unknown;
    /** When true, data will be replaced with "<private>" */
    private?: boolean;
};

export type ZoneLogger = Record<LogLevel, (payload: string | LogPayload) => void>;

export function zone(name: string): ZoneLogger {
    function createLogFn(level: LogLevel) {
        return (payload: string | LogPayload): void => {
            if (typeof payload === 'string') {
                baseLogger[level](payload, { zone: name });
                return;
            }

            const { message, data, private: isPrivate } = payload;
            if (data === undefined) {
                baseLogger[level](message, { zone: name });
                return;
            }

            baseLogger[level](message, { zone: name, data: isPrivate ? '<private>' : data });
        };
    }

    return {
        error: createLogFn('error'),
        warn: createLogFn('warn'),
        info: createLogFn('info'),
        debug: createLogFn('debug')
    };
}
