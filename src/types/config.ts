import { z } from 'zod';

export const STORAGE_TYPES = ['FILE', 'S3', 'GCS', 'AZURE'] as const;

const portNumber = z.coerce.number().int().min(1).max(65535);

// Values arriving from the environment are strings; the YAML file may
// carry numbers, booleans and arrays. Both go through the same schema.
const booleanish = z.union([
    z.boolean(),
    z.enum(['true', 'false', '1', '0', 'yes', 'no']).transform(v => v === 'true' || v === '1' || v === 'yes')
]);

const locationList = z.union([
    z.array(z.string().min(1)),
    z.string().transform(v => v.split(',').map(s => s.trim()).filter(s => s.length > 0))
]);

/**
 * Every setting the setup run reads. Defaults are applied here and nowhere
 * else; steps receive the parsed value.
 */
export const SetupSettingsSchema = z.object({
    // Container lookup
    composeProject: z.string().min(1).optional(),
    containerName: z.string().min(1).default('polaris'),
    containerPort: portNumber.default(8181),

    // Management API endpoint; apiPort falls back to the container's published port
    apiHost: z.string().min(1).default('localhost'),
    apiPort: portNumber.optional(),

    // Provisioning names
    catalogName: z.string().min(1).default('my_catalog'),
    defaultBaseLocation: z.string().min(1).default('file:///data/polaris'),
    storageType: z.enum(STORAGE_TYPES).default('FILE'),
    allowedLocations: locationList.optional(),
    principalName: z.string().min(1).default('polarisuser'),
    principalRoleName: z.string().min(1).default('polarisuser_role'),
    catalogRoleName: z.string().min(1).default('my_catalog_role'),

    // Artifacts
    templatesDir: z.string().min(1).default('./templates'),
    outputDir: z.string().min(1).default('.'),

    failFast: booleanish.default(false),
});

export type SetupSettingsInput = z.input<typeof SetupSettingsSchema>;
export type SetupSettings = z.output<typeof SetupSettingsSchema>;

/** Environment variable consulted for each setting. */
export const ENV_KEYS = {
    composeProject: 'COMPOSE_PROJECT_NAME',
    containerName: 'POLARIS_CONTAINER_NAME',
    containerPort: 'POLARIS_CONTAINER_PORT',
    apiHost: 'POLARIS_API_HOST',
    apiPort: 'POLARIS_API_PORT',
    catalogName: 'POLARIS_CATALOG_NAME',
    defaultBaseLocation: 'POLARIS_DEFAULT_BASE_LOCATION',
    storageType: 'POLARIS_STORAGE_TYPE',
    allowedLocations: 'POLARIS_ALLOWED_LOCATIONS',
    principalName: 'POLARIS_PRINCIPAL_NAME',
    principalRoleName: 'POLARIS_PRINCIPAL_ROLE_NAME',
    catalogRoleName: 'POLARIS_CATALOG_ROLE_NAME',
    templatesDir: 'SETUP_TEMPLATES_DIR',
    outputDir: 'SETUP_OUTPUT_DIR',
    failFast: 'SETUP_FAIL_FAST',
} as const satisfies Record<keyof SetupSettings, string>;

export type SettingKey = keyof typeof ENV_KEYS;
