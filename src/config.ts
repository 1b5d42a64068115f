import fs from 'fs';
import yaml from 'js-yaml';
import isDocker from 'is-docker';
import dotenv from 'dotenv';
import { zone } from './logging/zone';
import { ENV_KEYS, SettingKey, SetupSettings, SetupSettingsSchema } from './types/config';

const log = zone('config');

// Configuration directory - use environment variable or sensible default
export const CONFIG_DIRECTORY = process.env.CONFIG_DIRECTORY || (isDocker() ? '/var/config/' : './config/');
export const CONFIG_FILE_ENV = 'SETUP_CONFIG_FILE';

export function getDefaultConfigFile(): string {
    return CONFIG_DIRECTORY + 'devbox.yml';
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

type RawSettings = Partial<Record<SettingKey, unknown>>;

function isSettingKey(key: string): key is SettingKey {
    return Object.prototype.hasOwnProperty.call(ENV_KEYS, key);
}

const SETTING_KEYS: SettingKey[] = Object.keys(ENV_KEYS).filter(isSettingKey);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the optional YAML settings file.
 * A missing default file yields no settings; a missing explicit file is an error.
 */
export async function loadConfigFile(path: string, required: boolean): Promise<RawSettings> {
    let content: string;
    try {
        content = await fs.promises.readFile(path, 'utf-8');
    } catch (error) {
        if (!required && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            log.debug({ message: 'No settings file found, using environment and defaults', data: { path } });
            return {};
        }
        throw new ConfigError(`Error loading config file at ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }

    let parsed: unknown;
    try {
        parsed = yaml.load(content);
    } catch (error) {
        throw new ConfigError(`Error parsing config file at ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (parsed === undefined || parsed === null) {
        return {};
    }
    if (!isRecord(parsed)) {
        throw new ConfigError(`Config file at ${path} must contain a mapping`);
    }

    const settings: RawSettings = {};
    for (const key of SETTING_KEYS) {
        if (parsed[key] !== undefined && parsed[key] !== null) {
            settings[key] = parsed[key];
        }
    }

    const unknownKeys = Object.keys(parsed).filter(k => !isSettingKey(k));
    if (unknownKeys.length > 0) {
        log.warn({ message: 'Ignoring unknown keys in config file', data: { path, keys: unknownKeys } });
    }

    return settings;
}

/**
 * Pick the settings present in an environment map. Empty values count as unset.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv): RawSettings {
    const settings: RawSettings = {};
    for (const key of SETTING_KEYS) {
        const value = env[ENV_KEYS[key]];
        if (value !== undefined && value.trim() !== '') {
            settings[key] = value.trim();
        }
    }
    return settings;
}

/**
 * Validate merged raw settings and apply defaults.
 * Throws ConfigError listing every invalid field.
 */
export function parseSettings(raw: RawSettings): SetupSettings {
    const result = SetupSettingsSchema.safeParse(raw);
    if (result.success) {
        return result.data;
    }

    const reason = result.error.issues
        .map((issue) => {
            const path = issue.path.length ? issue.path.join('.') : 'value';
            const field = issue.path[0];
            const envKey = typeof field === 'string' && isSettingKey(field) ? ` (${ENV_KEYS[field]})` : '';
            return `${path}${envKey} ${issue.message}`;
        })
        .join('; ');

    throw new ConfigError(`Invalid settings: ${reason}`);
}

export type LoadSettingsOptions = {
    env?: NodeJS.ProcessEnv;
    /** Load a .env file into process.env first (default: only when env is not given) */
    loadDotEnv?: boolean;
};

/**
 * Resolve every setting once, before any container or API access.
 * Precedence: environment (including .env), then the YAML file, then defaults.
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<SetupSettings> {
    const env = options.env ?? process.env;

    if (options.loadDotEnv ?? options.env === undefined) {
        // dotenv never overrides variables that are already set
        dotenv.config();
    }

    const explicitFile = env[CONFIG_FILE_ENV];
    const configPath = explicitFile && explicitFile.trim() !== '' ? explicitFile : getDefaultConfigFile();
    const fromFile = await loadConfigFile(configPath, configPath === explicitFile);
    const fromEnv = settingsFromEnv(env);

    const settings = parseSettings({ ...fromFile, ...fromEnv });

    log.debug({
        message: 'Settings resolved',
        data: { ...settings, configFile: configPath }
    });

    return settings;
}
