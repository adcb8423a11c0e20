import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ModelCatalog, ModelDefinition } from '../../types';
import { logger } from '../../utils/logger';
import { errorMessage } from '../llm/errors';

export const DEFAULT_SUMMARY_PROMPT = 'Summarize the following assistant conversations in concise bullet points.';

const parameterSchema = z.object({
    name: z.string().min(1),
    description: z.string().default(''),
    default: z.union([z.number(), z.string(), z.boolean()]).optional(),
});

const modelSchema = z.object({
    name: z.string().min(1),
    provider: z.string().min(1),
    modelId: z.string().min(1),
    description: z.string().default(''),
    endpoint: z.string().optional(),
    parameters: z.array(parameterSchema).default([]),
});

const catalogSchema = z.object({
    summary: z
        .object({
            systemPrompt: z.string().default(DEFAULT_SUMMARY_PROMPT),
        })
        .default({}),
    models: z.array(modelSchema).default([]),
});

export class CatalogError extends Error {
    constructor(message: string, public readonly filePath: string) {
        super(message);
        this.name = 'CatalogError';
    }
}

function freezeModel(model: z.infer<typeof modelSchema>): ModelDefinition {
    return Object.freeze({
        ...model,
        parameters: Object.freeze(model.parameters.map((p) => Object.freeze({ ...p }))),
    });
}

/**
 * Validate a parsed catalog document. Model definitions come back frozen.
 */
export function parseModelCatalog(raw: unknown, filePath = '<inline>'): ModelCatalog {
    const parsed = catalogSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        throw new CatalogError(`Invalid model catalog ${filePath}: ${where}: ${issue.message}`, filePath);
    }

    return Object.freeze({
        summary: Object.freeze({ ...parsed.data.summary }),
        models: Object.freeze(parsed.data.models.map(freezeModel)),
    });
}

/**
 * Load and validate the model catalog JSON file.
 */
export async function loadModelCatalog(filePath: string): Promise<ModelCatalog> {
    const resolved = path.resolve(filePath);

    let text: string;
    try {
        text = await readFile(resolved, 'utf8');
    } catch (error) {
        throw new CatalogError(`Cannot read model catalog ${resolved}: ${errorMessage(error)}`, resolved);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch {
        throw new CatalogError(`Model catalog ${resolved} is not valid JSON`, resolved);
    }

    const catalog = parseModelCatalog(raw, resolved);
    logger.info({ path: resolved, models: catalog.models.length }, 'Model catalog loaded');
    return catalog;
}
