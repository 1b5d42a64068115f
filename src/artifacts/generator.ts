import fs from 'fs';
import path from 'path';
import { zone } from '../logging/zone';
import { Credential } from '../types/setup';
import { renderTemplateFile, TemplateContext } from './templateRenderer';

const log = zone('artifacts.generator');

export type ArtifactDefinition = {
    /** Template file name inside the templates directory */
    template: string;
    /** Output path relative to the output directory */
    output: string;
};

export const VERIFY_NOTEBOOK: ArtifactDefinition = {
    template: 'setup_verify_notebook.ipynb.tmpl',
    output: path.join('notebooks', 'setup_verify.ipynb'),
};

export const VERIFY_HTTP_SCRIPT: ArtifactDefinition = {
    template: 'setup_verify.http.tmpl',
    output: path.join('http', 'setup_verify.http'),
};

export const VERIFY_ARTIFACTS: readonly ArtifactDefinition[] = [VERIFY_NOTEBOOK, VERIFY_HTTP_SCRIPT];

export type ArtifactInputs = {
    root: Credential;
    principal: Credential;
    apiHost: string;
    apiPort: string;
    catalogName: string;
};

export function buildTemplateContext(inputs: ArtifactInputs): TemplateContext {
    return {
        root_client_id: inputs.root.clientId,
        root_client_secret: inputs.root.clientSecret,
        api_host: inputs.apiHost,
        api_port: inputs.apiPort,
        principal_client_id: inputs.principal.clientId,
        principal_client_secret: inputs.principal.clientSecret,
        catalog_name: inputs.catalogName,
    };
}

export type GenerateOptions = {
    templatesDir: string;
    outputDir: string;
    artifacts?: readonly ArtifactDefinition[];
};

/**
 * Render every artifact from the same context, overwriting earlier output.
 * Returns the written paths.
 */
export async function generateArtifacts(context: TemplateContext, options: GenerateOptions): Promise<string[]> {
    const written: string[] = [];

    for (const artifact of options.artifacts ?? VERIFY_ARTIFACTS) {
        const templatePath = path.join(options.templatesDir, artifact.template);
        const outputPath = path.join(options.outputDir, artifact.output);

        const content = await renderTemplateFile(templatePath, context);

        await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
        await fs.promises.writeFile(outputPath, content, 'utf-8');

        log.info({ message: 'Wrote verification artifact', data: { path: outputPath } });
        written.push(outputPath);
    }

    return written;
}
