import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { renderTemplate, renderTemplateFile, TemplateRenderError } from '../../../src/artifacts/templateRenderer';

describe('artifacts/templateRenderer - renderTemplate', () => {
    it('substitutes variables with or without inner whitespace', () => {
        expect(renderTemplate('{{ api_host }}:{{api_port}}', { api_host: 'localhost', api_port: '8181' }))
            .toBe('localhost:8181');
    });

    it('substitutes every occurrence of a variable', () => {
        expect(renderTemplate('{{ a }}-{{ a }}', { a: 'x' })).toBe('x-x');
    });

    it('inserts values verbatim', () => {
        expect(renderTemplate('secret={{ s }}', { s: 'a$&b{{ c }}' })).toBe('secret=a$&b{{ c }}');
    });

    it('keeps escaped placeholders as literal braces', () => {
        expect(renderTemplate('@baseUri = http://\\{{host}}:{{ port }}', { port: '8181' }))
            .toBe('@baseUri = http://{{host}}:8181');
    });

    it('leaves text without placeholders unchanged', () => {
        expect(renderTemplate('f"{catalog_name}"', {})).toBe('f"{catalog_name}"');
    });

    it('throws listing each unknown variable once', () => {
        let caught: unknown;
        try {
            renderTemplate('{{ a }} {{ missing }} {{ other }} {{ missing }}', { a: '1' });
        } catch (err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(TemplateRenderError);
        expect((caught as TemplateRenderError).message).toBe('Template contains unknown variables: missing, other');
        expect((caught as TemplateRenderError).unknownVariables).toEqual(['missing', 'other']);
    });

    it('rejects context keys that could never match a placeholder', () => {
        expect(() => renderTemplate('{{ a }}', { a: '1', 'bad key': '2' }))
            .toThrow('Template context has invalid keys: bad key');
    });
});

describe('artifacts/templateRenderer - renderTemplateFile', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'devbox-template-'));
    });

    afterEach(async () => {
        await fs.promises.rm(dir, { recursive: true, force: true });
    });

    it('reads and renders a template file', async () => {
        const file = path.join(dir, 'greeting.tmpl');
        await fs.promises.writeFile(file, 'catalog {{ catalog_name }}\n', 'utf-8');

        await expect(renderTemplateFile(file, { catalog_name: 'my_catalog' })).resolves.toBe('catalog my_catalog\n');
    });

    it('propagates a missing file', async () => {
        await expect(renderTemplateFile(path.join(dir, 'absent.tmpl'), {})).rejects.toMatchObject({ code: 'ENOENT' });
    });
});
