import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigError, loadConfigFile, loadSettings, parseSettings, settingsFromEnv } from '../../../src/config';

describe('config - settingsFromEnv', () => {
    it('maps environment variables to settings, trimming values', () => {
        expect(settingsFromEnv({
            POLARIS_CATALOG_NAME: ' lake ',
            POLARIS_API_PORT: '9000',
            COMPOSE_PROJECT_NAME: 'devbox',
            UNRELATED: 'x',
        })).toEqual({ catalogName: 'lake', apiPort: '9000', composeProject: 'devbox' });
    });

    it('treats empty values as unset', () => {
        expect(settingsFromEnv({ POLARIS_CATALOG_NAME: '   ', SETUP_FAIL_FAST: '' })).toEqual({});
    });
});

describe('config - parseSettings', () => {
    it('applies defaults', () => {
        expect(parseSettings({})).toEqual({
            containerName: 'polaris',
            containerPort: 8181,
            apiHost: 'localhost',
            catalogName: 'my_catalog',
            defaultBaseLocation: 'file:///data/polaris',
            storageType: 'FILE',
            principalName: 'polarisuser',
            principalRoleName: 'polarisuser_role',
            catalogRoleName: 'my_catalog_role',
            templatesDir: './templates',
            outputDir: '.',
            failFast: false,
        });
    });

    it('coerces string values from the environment', () => {
        const settings = parseSettings({
            apiPort: '9000',
            failFast: 'yes',
            allowedLocations: 's3://a/, s3://b/,',
        });

        expect(settings.apiPort).toBe(9000);
        expect(settings.failFast).toBe(true);
        expect(settings.allowedLocations).toEqual(['s3://a/', 's3://b/']);
    });

    it('names the field and its variable when a value is invalid', () => {
        expect(() => parseSettings({ apiPort: '70000' })).toThrow(ConfigError);
        expect(() => parseSettings({ apiPort: '70000' })).toThrow('Invalid settings: apiPort (POLARIS_API_PORT)');
    });

    it('rejects an unknown storage type', () => {
        expect(() => parseSettings({ storageType: 'FTP' })).toThrow('storageType (POLARIS_STORAGE_TYPE)');
    });
});

describe('config - settings file', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'devbox-config-'));
    });

    afterEach(async () => {
        await fs.promises.rm(dir, { recursive: true, force: true });
    });

    async function writeConfig(content: string): Promise<string> {
        const file = path.join(dir, 'devbox.yml');
        await fs.promises.writeFile(file, content, 'utf-8');
        return file;
    }

    it('keeps known keys and drops unknown ones', async () => {
        const file = await writeConfig('catalogName: from_file\napiPort: 9000\nsomethingElse: 1\n');

        await expect(loadConfigFile(file, true)).resolves.toEqual({ catalogName: 'from_file', apiPort: 9000 });
    });

    it('treats an empty file as no settings', async () => {
        const file = await writeConfig('');
        await expect(loadConfigFile(file, true)).resolves.toEqual({});
    });

    it('ignores a missing file unless it was asked for', async () => {
        const missing = path.join(dir, 'absent.yml');

        await expect(loadConfigFile(missing, false)).resolves.toEqual({});
        await expect(loadConfigFile(missing, true)).rejects.toThrow(ConfigError);
    });

    it('rejects a file that is not a mapping', async () => {
        const file = await writeConfig('- one\n- two\n');
        await expect(loadConfigFile(file, true)).rejects.toThrow(`Config file at ${file} must contain a mapping`);
    });

    it('rejects malformed YAML', async () => {
        const file = await writeConfig('catalogName: [unclosed\n');
        await expect(loadConfigFile(file, true)).rejects.toThrow(`Error parsing config file at ${file}`);
    });

    it('lets the environment override the file, and the file override defaults', async () => {
        const file = await writeConfig([
            'catalogName: from_file',
            'principalName: file_user',
            'allowedLocations:',
            '  - file:///data/a',
            '  - file:///data/b',
            'failFast: true',
            '',
        ].join('\n'));

        const settings = await loadSettings({
            env: { SETUP_CONFIG_FILE: file, POLARIS_CATALOG_NAME: 'from_env' },
        });

        expect(settings.catalogName).toBe('from_env');
        expect(settings.principalName).toBe('file_user');
        expect(settings.allowedLocations).toEqual(['file:///data/a', 'file:///data/b']);
        expect(settings.failFast).toBe(true);
        expect(settings.containerName).toBe('polaris');
    });

    it('fails when the named settings file does not exist', async () => {
        await expect(loadSettings({ env: { SETUP_CONFIG_FILE: path.join(dir, 'absent.yml') } }))
            .rejects.toThrow(ConfigError);
    });

    it('fails before anything else when a setting is invalid', async () => {
        const file = await writeConfig('');

        await expect(loadSettings({ env: { SETUP_CONFIG_FILE: file, POLARIS_CONTAINER_PORT: 'abc' } }))
            .rejects.toThrow('containerPort (POLARIS_CONTAINER_PORT)');
    });
});
