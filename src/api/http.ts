import axios, { AxiosInstance, CreateAxiosDefaults } from 'axios';
import { ApiErrorBodySchema } from './schemas';

export const MANAGEMENT_API_PATH = '/api/management/v1';
export const TOKEN_ENDPOINT_PATH = '/api/catalog/v1/oauth/tokens';

/**
 * Axios instance for the catalog server. Every status resolves; the calling
 * operation decides what counts as success. No retries and the transport's
 * default timeout.
 */
export function createHttpClient(config: CreateAxiosDefaults = {}): AxiosInstance {
    return axios.create({
        validateStatus: () => true,
        ...config,
    });
}

export function serverOrigin(host: string, port: string | number): string {
    return `http://${host}:${port}`;
}

export function managementBaseUri(host: string, port: string | number): string {
    return serverOrigin(host, port) + MANAGEMENT_API_PATH;
}

export function tokenEndpoint(host: string, port: string | number): string {
    return serverOrigin(host, port) + TOKEN_ENDPOINT_PATH;
}

export function jsonHeaders(token: string): Record<string, string> {
    return {
        'Authorization': `Bearer ${token}`,
        'Accept': 'application/json',
        'Content-Type': 'application/json',
    };
}

export function getErrorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * A management call that did not return its success status
 */
export class ManagementApiError extends Error {
    /** Name of the failed operation, e.g. "createCatalog" */
    readonly operation: string;
    /** HTTP status, absent when the request never got a response */
    readonly status?: number;
    /** Response body as returned by the server */
    readonly body?: unknown;

    constructor(operation: string, message: string, status?: number, body?: unknown) {
        super(message);
        this.name = 'ManagementApiError';
        this.operation = operation;
        this.status = status;
        this.body = body;
    }

    get isConflict(): boolean {
        return this.status === 409;
    }
}

/**
 * Message for a failed response, preferring the server's own error message
 */
export function describeFailedResponse(status: number, body: unknown): string {
    const parsed = ApiErrorBodySchema.safeParse(body);
    if (parsed.success) {
        return `HTTP ${status}: ${parsed.data.error.message}`;
    }
    if (typeof body === 'string' && body.trim() !== '') {
        return `HTTP ${status}: ${body.trim().slice(0, 200)}`;
    }
    return `HTTP ${status}`;
}
