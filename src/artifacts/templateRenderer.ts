import fs from 'fs';
import { zone } from '../logging/zone';

const log = zone('artifacts.template');

/** Pattern for template variables: {{ variable_name }}; a leading backslash keeps the braces literal */
const VARIABLE_PATTERN = /(\\?){{\s*([a-zA-Z0-9_.]+)\s*}}/g;

/** Valid context key names (alphanumeric and underscores, dots allowed) */
const VALID_KEY_PATTERN = /^[a-zA-Z0-9_.]+$/;

export type TemplateContext = Record<string, string>;

export class TemplateRenderError extends Error {
    readonly unknownVariables: string[];

    constructor(message: string, unknownVariables: string[] = []) {
        super(message);
        this.name = 'TemplateRenderError';
        this.unknownVariables = unknownVariables;
    }
}

/**
 * Render a template string by replacing {{ variable }} placeholders from a flat context.
 * \{{ name }} is emitted as {{ name }} without lookup.
 *
 * Throws TemplateRenderError if any placeholder has no value in the context.
 */
export function renderTemplate(template: string, context: TemplateContext): string {
    const invalidKeys = Object.keys(context).filter(k => !VALID_KEY_PATTERN.test(k));
    if (invalidKeys.length > 0) {
        throw new TemplateRenderError(`Template context has invalid keys: ${invalidKeys.join(', ')}`);
    }

    const unknownVariables: string[] = [];

    const rendered = template.replace(VARIABLE_PATTERN, (match, escape: string, key: string) => {
        if (escape) {
            return match.slice(1);
        }
        if (Object.prototype.hasOwnProperty.call(context, key)) {
            return context[key];
        }
        unknownVariables.push(key);
        return match;
    });

    if (unknownVariables.length > 0) {
        const uniqueVars = [...new Set(unknownVariables)];
        const message = `Template contains unknown variables: ${uniqueVars.join(', ')}`;
        log.error({ message, data: { unknownVariables: uniqueVars } });
        throw new TemplateRenderError(message, uniqueVars);
    }

    return rendered;
}

/**
 * Read a template file and render it. File errors propagate unchanged.
 */
export async function renderTemplateFile(path: string, context: TemplateContext): Promise<string> {
    const template = await fs.promises.readFile(path, 'utf-8');
    log.debug({ message: 'Rendering template', data: { path, keys: Object.keys(context) } });
    return renderTemplate(template, context);
}
