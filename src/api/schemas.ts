import { z } from 'zod';

export const TokenResponseSchema = z.object({
    access_token: z.string().min(1),
    token_type: z.string().optional(),
    expires_in: z.number().optional(),
});

export const PrincipalWithCredentialsSchema = z.object({
    principal: z.object({
        name: z.string(),
        clientId: z.string().optional(),
    }).passthrough().optional(),
    credentials: z.object({
        clientId: z.string().min(1),
        clientSecret: z.string().min(1),
    }),
});

// Management API failures carry { error: { message, type, code } }
export const ApiErrorBodySchema = z.object({
    error: z.object({
        message: z.string(),
        type: z.string().optional(),
        code: z.number().optional(),
    }),
});

export const CATALOG_PRIVILEGES = [
    'CATALOG_MANAGE_ACCESS',
    'CATALOG_MANAGE_CONTENT',
    'CATALOG_MANAGE_METADATA',
    'CATALOG_READ_PROPERTIES',
    'CATALOG_WRITE_PROPERTIES',
    'NAMESPACE_CREATE',
    'NAMESPACE_LIST',
    'TABLE_CREATE',
    'TABLE_LIST',
    'TABLE_READ_DATA',
    'TABLE_WRITE_DATA',
    'VIEW_CREATE',
    'VIEW_LIST',
] as const;

export type CatalogPrivilege = typeof CATALOG_PRIVILEGES[number];

export type CatalogDescriptor = {
    name: string;
    defaultBaseLocation: string;
    storageType: string;
    allowedLocations?: string[];
};

export type CreateCatalogRequest = {
    catalog: {
        name: string;
        type: 'INTERNAL';
        readOnly: boolean;
        properties: { 'default-base-location': string };
        storageConfigInfo: { storageType: string; allowedLocations: string[] };
    };
};

export type CreatePrincipalRequest = { name: string; type: 'user' | 'service' };
export type CreatePrincipalRoleRequest = { name: string };
export type GrantPrincipalRoleRequest = { principalRole: { name: string } };
export type CatalogRoleRequest = { catalogRole: { name: string } };
export type AddGrantRequest = { grant: { type: 'catalog'; privilege: CatalogPrivilege } };
