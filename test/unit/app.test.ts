import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { EXIT_OK, EXIT_PARTIAL, exitCodeFor, runApp } from '../../src/app';
import { SetupResult } from '../../src/types/setup';
import {
    createFakeHttp,
    createFakeRuntime,
    createSettings,
    happyPathRoutes,
    MGMT,
    ROOT_LOG
} from '../helpers/mockHelpers';

const TEMPLATES_DIR = path.resolve(__dirname, '../../templates');

function resultWith(statuses: SetupResult['steps']): SetupResult {
    return {
        root: { clientId: 'root-id', clientSecret: 'test-secret' },
        apiHost: 'localhost',
        apiPort: '8181',
        catalogName: 'my_catalog',
        steps: statuses,
    };
}

describe('app - exitCodeFor', () => {
    it('is 0 only when every step succeeded and artifacts were written', () => {
        const result = resultWith([{ step: 'create-catalog', status: 'ok' }]);

        expect(exitCodeFor(result, true)).toBe(EXIT_OK);
        expect(exitCodeFor(result, false)).toBe(EXIT_PARTIAL);
    });

    it('is 2 when a step failed or was skipped', () => {
        expect(exitCodeFor(resultWith([{ step: 'create-catalog', status: 'recoverable', reason: 'HTTP 500' }]), true))
            .toBe(EXIT_PARTIAL);
        expect(exitCodeFor(resultWith([{ step: 'grant-privilege', status: 'skipped', reason: 'requires create-catalog-role' }]), true))
            .toBe(EXIT_PARTIAL);
    });
});

describe('app - runApp', () => {
    let outputDir: string;

    beforeEach(async () => {
        outputDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'devbox-app-'));
    });

    afterEach(async () => {
        await fs.promises.rm(outputDir, { recursive: true, force: true });
    });

    it('provisions and writes both artifacts', async () => {
        const runtime = createFakeRuntime({ logs: ROOT_LOG });
        const { http } = createFakeHttp(happyPathRoutes());

        const run = await runApp(createSettings({ templatesDir: TEMPLATES_DIR, outputDir }), { runtime, http });

        expect(run.exitCode).toBe(EXIT_OK);
        expect(run.artifacts).toEqual([
            path.join(outputDir, 'notebooks', 'setup_verify.ipynb'),
            path.join(outputDir, 'http', 'setup_verify.http'),
        ]);
        const script = await fs.promises.readFile(path.join(outputDir, 'http', 'setup_verify.http'), 'utf-8');
        expect(script.split('\n')).toContain('@port = 10081');
    });

    it('writes artifacts but reports a partial run when the catalog fails', async () => {
        const runtime = createFakeRuntime({ logs: ROOT_LOG });
        const { http } = createFakeHttp(happyPathRoutes([
            { method: 'post', url: `${MGMT}/catalogs`, status: 500, data: { error: { message: 'storage rejected' } } },
        ]));

        const run = await runApp(createSettings({ templatesDir: TEMPLATES_DIR, outputDir }), { runtime, http });

        expect(run.exitCode).toBe(EXIT_PARTIAL);
        expect(run.artifacts).toHaveLength(2);
    });

    it('skips artifacts when no principal credentials were issued', async () => {
        const runtime = createFakeRuntime({ logs: ROOT_LOG });
        const { http } = createFakeHttp(happyPathRoutes([
            { method: 'post', url: `${MGMT}/principals`, status: 409, data: { error: { message: 'already exists' } } },
        ]));

        const run = await runApp(createSettings({ templatesDir: TEMPLATES_DIR, outputDir }), { runtime, http });

        expect(run.exitCode).toBe(EXIT_PARTIAL);
        expect(run.artifacts).toEqual([]);
        await expect(fs.promises.readdir(outputDir)).resolves.toEqual([]);
    });
});
