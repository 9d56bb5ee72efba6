/**
 * Structure Template Registry
 *
 * Templates are looked up by id. Each part declares the fields it needs;
 * a placeholder that is not declared rejects the whole registry at load.
 */

import { z } from 'zod';
import structureData from '../../templates/structures.json';
import { ConfigError } from '../errors';
import { formatIssues, ruleConflicts, ValidationRulesSchema } from './runConfig';
import { SEGMENT_TYPES } from './types';

const PLACEHOLDER_PATTERN = /\{\{\s*([a-zA-Z][a-zA-Z0-9]*)\s*\}\}/g;

const TemplatePartSchema = z.object({
    text: z.string(),
    required: z.array(z.string()).default([]),
    optional: z.array(z.string()).default([]),
});

const StructureTemplateSchema = z.object({
    id: z.string().min(1),
    description: z.string().default(''),
    title: TemplatePartSchema,
    intro: TemplatePartSchema,
    bridge: TemplatePartSchema,
    segments: z.object({
        news: TemplatePartSchema,
        funding: TemplatePartSchema,
        research: TemplatePartSchema,
        policy: TemplatePartSchema,
    }),
    synthesis: TemplatePartSchema,
    closing: TemplatePartSchema,
    validation: ValidationRulesSchema,
});

const RegistrySchema = z.object({
    templates: z.array(StructureTemplateSchema).min(1),
});

export type TemplatePart = z.infer<typeof TemplatePartSchema>;
export type StructureTemplate = z.infer<typeof StructureTemplateSchema>;
export type TemplateFields = Record<string, string | number | undefined>;

export function placeholdersOf(text: string): string[] {
    return [...text.matchAll(PLACEHOLDER_PATTERN)].map(match => match[1]);
}

function partsOf(template: StructureTemplate): Array<[string, TemplatePart]> {
    const segmentParts = SEGMENT_TYPES
        .map((type): [string, TemplatePart] => [`segments.${type}`, template.segments[type]]);
    return [
        ['title', template.title],
        ['intro', template.intro],
        ['bridge', template.bridge],
        ...segmentParts,
        ['synthesis', template.synthesis],
        ['closing', template.closing],
    ];
}

/**
 * Every placeholder must be declared as required or optional
 */
export function checkTemplate(template: StructureTemplate): string[] {
    const issues: string[] = [];
    for (const [name, part] of partsOf(template)) {
        const declared = new Set([...part.required, ...part.optional]);
        for (const placeholder of placeholdersOf(part.text)) {
            if (!declared.has(placeholder)) {
                issues.push(`${template.id}.${name}: undeclared placeholder {{${placeholder}}}`);
            }
        }
    }
    for (const conflict of ruleConflicts(template.validation)) {
        issues.push(`${template.id}.validation: ${conflict}`);
    }
    return issues;
}

export class TemplateRegistry {
    private readonly templates = new Map<string, StructureTemplate>();

    constructor(input: unknown) {
        const result = RegistrySchema.safeParse(input);
        if (!result.success) {
            const issues = formatIssues(result.error);
            throw new ConfigError(`Invalid template registry: ${issues.join('; ')}`, issues);
        }

        const issues: string[] = [];
        for (const template of result.data.templates) {
            if (this.templates.has(template.id)) {
                issues.push(`Duplicate template id "${template.id}"`);
            }
            issues.push(...checkTemplate(template));
            this.templates.set(template.id, template);
        }
        if (issues.length > 0) {
            throw new ConfigError(`Invalid template registry: ${issues.join('; ')}`, issues);
        }
    }

    ids(): string[] {
        return [...this.templates.keys()];
    }

    has(id: string): boolean {
        return this.templates.has(id);
    }

    get(id: string): StructureTemplate {
        const template = this.templates.get(id);
        if (!template) {
            throw new ConfigError(`Unknown structure template "${id}"`, [
                `known templates: ${this.ids().join(', ')}`,
            ]);
        }
        return template;
    }
}

let defaultRegistry: TemplateRegistry | null = null;

/**
 * Registry built from templates/structures.json
 */
export function getTemplateRegistry(): TemplateRegistry {
    if (!defaultRegistry) {
        defaultRegistry = new TemplateRegistry(structureData);
    }
    return defaultRegistry;
}

function isFilled(value: string | number | undefined): value is string | number {
    return value !== undefined && String(value).trim().length > 0;
}

/**
 * Render a part. Missing required fields raise ConfigError before anything
 * is rendered; missing optional fields render as nothing.
 */
export function renderPart(part: TemplatePart, fields: TemplateFields, label: string): string {
    const missing = part.required.filter(field => !isFilled(fields[field]));
    if (missing.length > 0) {
        throw new ConfigError(`Template part "${label}" is missing required fields: ${missing.join(', ')}`, missing);
    }

    return part.text
        .replace(PLACEHOLDER_PATTERN, (_match, name: string) => {
            const value = fields[name];
            return isFilled(value) ? String(value) : '';
        })
        .replace(/\s+/g, ' ')
        .replace(/\s+([,.!?;:])/g, '$1')
        .trim();
}

export default { getTemplateRegistry, renderPart, TemplateRegistry };
