import { AxiosInstance, AxiosResponse } from 'axios';
import { zone } from '../logging/zone';
import { Credential } from '../types/setup';
import {
    describeFailedResponse,
    getErrorMessage,
    jsonHeaders,
    ManagementApiError
} from './http';
import {
    AddGrantRequest,
    CatalogDescriptor,
    CatalogPrivilege,
    CatalogRoleRequest,
    CreateCatalogRequest,
    CreatePrincipalRequest,
    CreatePrincipalRoleRequest,
    GrantPrincipalRoleRequest,
    PrincipalWithCredentialsSchema,
    TokenResponseSchema
} from './schemas';

const log = zone('api.management');

/**
 * Where and as whom management calls are made
 */
export type ManagementTarget = {
    http: AxiosInstance;
    /** e.g. http://localhost:8181/api/management/v1 */
    baseUri: string;
    token: string;
};

const CREATED = 201;

/**
 * Exchange a client credential for a bearer token.
 * Returns undefined for any failure; the caller decides whether that is fatal.
 */
export async function exchangeToken(http: AxiosInstance, endpoint: string, credential: Credential): Promise<string | undefined> {
    const form = new URLSearchParams({
        grant_type: 'client_credentials',
        client_id: credential.clientId,
        client_secret: credential.clientSecret,
        scope: 'PRINCIPAL_ROLE:ALL',
    });

    let response: AxiosResponse<unknown>;
    try {
        response = await http.post<unknown>(endpoint, form.toString(), {
            headers: {
                'Authorization': `Bearer ${credential.clientId}:${credential.clientSecret}`,
                'Accept': 'application/json',
                'Content-Type': 'application/x-www-form-urlencoded',
            },
        });
    } catch (err) {
        log.error({ message: 'Token request failed', data: { endpoint, error: getErrorMessage(err) } });
        return undefined;
    }

    if (response.status !== 200) {
        log.error({
            message: 'Token request rejected',
            data: { endpoint, status: response.status, body: response.data }
        });
        return undefined;
    }

    const parsed = TokenResponseSchema.safeParse(response.data);
    if (!parsed.success) {
        log.error({ message: 'Token response has no access_token', data: { endpoint } });
        return undefined;
    }

    return parsed.data.access_token;
}

/**
 * Issue one management call and require a 201.
 * Non-201 responses and transport failures throw ManagementApiError.
 */
async function send(
    target: ManagementTarget,
    operation: string,
    method: 'post' | 'put',
    path: string,
    body: object
): Promise<AxiosResponse<unknown>> {
    const url = target.baseUri + path;
    log.debug({ message: `${operation} request`, data: { method: method.toUpperCase(), url, body } });

    let response: AxiosResponse<unknown>;
    try {
        response = await target.http.request<unknown>({
            method,
            url,
            data: body,
            headers: jsonHeaders(target.token),
        });
    } catch (err) {
        throw new ManagementApiError(operation, `${operation} failed: ${getErrorMessage(err)}`);
    }

    if (response.status !== CREATED) {
        throw new ManagementApiError(
            operation,
            `${operation} failed: ${describeFailedResponse(response.status, response.data)}`,
            response.status,
            response.data
        );
    }

    return response;
}

function segment(name: string): string {
    return encodeURIComponent(name);
}

export async function createCatalog(target: ManagementTarget, descriptor: CatalogDescriptor): Promise<void> {
    const allowedLocations = descriptor.allowedLocations && descriptor.allowedLocations.length > 0
        ? [...descriptor.allowedLocations]
        : [descriptor.defaultBaseLocation];

    const payload: CreateCatalogRequest = {
        catalog: {
            name: descriptor.name,
            type: 'INTERNAL',
            readOnly: false,
            properties: { 'default-base-location': descriptor.defaultBaseLocation },
            storageConfigInfo: {
                storageType: descriptor.storageType,
                allowedLocations,
            },
        },
    };

    await send(target, 'createCatalog', 'post', '/catalogs', payload);
    log.info({ message: 'Catalog created', data: { catalog: descriptor.name } });
}

/**
 * Create a principal and return the credential the server generated for it
 */
export async function createPrincipal(
    target: ManagementTarget,
    principalName: string,
    type: CreatePrincipalRequest['type'] = 'user'
): Promise<Credential> {
    const payload: CreatePrincipalRequest = { name: principalName, type };
    const response = await send(target, 'createPrincipal', 'post', '/principals', payload);

    const parsed = PrincipalWithCredentialsSchema.safeParse(response.data);
    if (!parsed.success) {
        throw new ManagementApiError(
            'createPrincipal',
            'createPrincipal failed: response has no credentials',
            response.status,
            response.data
        );
    }

    log.info({ message: 'Principal created', data: { principal: principalName } });
    return {
        clientId: parsed.data.credentials.clientId,
        clientSecret: parsed.data.credentials.clientSecret,
    };
}

export async function createPrincipalRole(target: ManagementTarget, roleName: string): Promise<void> {
    const payload: CreatePrincipalRoleRequest = { name: roleName };
    await send(target, 'createPrincipalRole', 'post', '/principal-roles', payload);
    log.info({ message: 'Principal role created', data: { principalRole: roleName } });
}

export async function assignPrincipalRole(target: ManagementTarget, principalName: string, roleName: string): Promise<void> {
    const payload: GrantPrincipalRoleRequest = { principalRole: { name: roleName } };
    await send(target, 'assignPrincipalRole', 'put', `/principals/${segment(principalName)}/principal-roles`, payload);
    log.info({ message: 'Principal role assigned', data: { principal: principalName, principalRole: roleName } });
}

export async function createCatalogRole(target: ManagementTarget, catalogName: string, roleName: string): Promise<void> {
    const payload: CatalogRoleRequest = { catalogRole: { name: roleName } };
    await send(target, 'createCatalogRole', 'post', `/catalogs/${segment(catalogName)}/catalog-roles`, payload);
    log.info({ message: 'Catalog role created', data: { catalog: catalogName, catalogRole: roleName } });
}

export async function assignCatalogRoleToPrincipalRole(
    target: ManagementTarget,
    principalRoleName: string,
    catalogName: string,
    catalogRoleName: string
): Promise<void> {
    const payload: CatalogRoleRequest = { catalogRole: { name: catalogRoleName } };
    await send(
        target,
        'assignCatalogRoleToPrincipalRole',
        'put',
        `/principal-roles/${segment(principalRoleName)}/catalog-roles/${segment(catalogName)}`,
        payload
    );
    log.info({
        message: 'Catalog role assigned to principal role',
        data: { catalogRole: catalogRoleName, principalRole: principalRoleName }
    });
}

export async function grantCatalogPrivilege(
    target: ManagementTarget,
    catalogName: string,
    catalogRoleName: string,
    privilege: CatalogPrivilege
): Promise<void> {
    const payload: AddGrantRequest = { grant: { type: 'catalog', privilege } };
    await send(
        target,
        'grantCatalogPrivilege',
        'put',
        `/catalogs/${segment(catalogName)}/catalog-roles/${segment(catalogRoleName)}/grants`,
        payload
    );
    log.info({
        message: 'Privilege granted to catalog role',
        data: { privilege, catalog: catalogName, catalogRole: catalogRoleName }
    });
}
