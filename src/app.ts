import { zone } from './logging/zone';
import { loadSettings } from './config';
import { DockerRuntime } from './docker/runtime';
import { createHttpClient } from './api/http';
import { runSetup, SetupDependencies } from './setup/orchestrator';
import { buildTemplateContext, generateArtifacts } from './artifacts/generator';
import { SetupSettings } from './types/config';
import { SetupResult } from './types/setup';

const log = zone('app');

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL = 2;

export type AppRun = {
    result: SetupResult;
    artifacts: string[];
    exitCode: number;
};

/**
 * 0 when every step succeeded and the artifacts were written, 2 otherwise
 */
export function exitCodeFor(result: SetupResult, artifactsWritten: boolean): number {
    const allOk = result.steps.every(s => s.status === 'ok');
    return allOk && artifactsWritten ? EXIT_OK : EXIT_PARTIAL;
}

/**
 * One complete run: provision, then render the verification artifacts.
 * SetupAbortedError and template or filesystem errors propagate.
 */
export async function runApp(settings: SetupSettings, deps: SetupDependencies): Promise<AppRun> {
    log.info({ message: 'Running devbox setup' });
    const result = await runSetup(settings, deps);

    if (!result.principal) {
        log.warn({ message: 'No principal credentials were issued; skipping verification artifacts' });
        return { result, artifacts: [], exitCode: exitCodeFor(result, false) };
    }

    log.info({ message: 'Generating setup verification artifacts' });
    const artifacts = await generateArtifacts(
        buildTemplateContext({
            root: result.root,
            principal: result.principal,
            apiHost: result.apiHost,
            apiPort: result.apiPort,
            catalogName: result.catalogName,
        }),
        { templatesDir: settings.templatesDir, outputDir: settings.outputDir }
    );

    return { result, artifacts, exitCode: exitCodeFor(result, true) };
}

/**
 * Resolve settings from the environment and run against the local Docker Engine
 */
export async function startApp(): Promise<number> {
    const settings = await loadSettings();
    const { exitCode } = await runApp(settings, {
        runtime: new DockerRuntime(),
        http: createHttpClient(),
    });
    return exitCode;
}
