import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { AppConfig } from '../../config';
import { normalizeProvider } from '../llm/gateway';
import { logger } from '../../utils/logger';

/** Key files looked up in the key directory, in order, per provider. */
export const KEY_FILES: Record<string, readonly string[]> = {
    openai: ['.OPENAI_API_KEY'],
    anthropic: ['.CLAUDE_API_KEY', '.ANTHROPIC_API_KEY'],
    huggingface: ['.HUGGINGFACE_API_KEY'],
    grok: ['.GROK_API_KEY'],
};

export type CredentialResolver = (provider: string) => string | undefined;

export interface CredentialResolverOptions {
    keyDir: string;
    /** Keys from the environment, per provider key. */
    env: Partial<Record<string, string>>;
    /** Applies to every provider when non-blank (command line or request body). */
    override?: string;
}

export function envCredentials(cfg: Pick<AppConfig, 'openaiApiKey' | 'anthropicApiKey' | 'huggingfaceApiKey' | 'grokApiKey'>) {
    return {
        openai: cfg.openaiApiKey,
        anthropic: cfg.anthropicApiKey,
        huggingface: cfg.huggingfaceApiKey,
        grok: cfg.grokApiKey,
    };
}

function readKeyFile(filePath: string): string | undefined {
    if (!existsSync(filePath)) return undefined;
    try {
        const key = readFileSync(filePath, 'utf8').trim();
        if (key) {
            logger.debug({ filePath }, 'Loaded API key from key file');
            return key;
        }
    } catch (err) {
        logger.warn({ err, filePath }, 'Failed to read key file');
    }
    return undefined;
}

/**
 * Precedence: override → key file in keyDir → environment.
 */
export function createCredentialResolver(options: CredentialResolverOptions): CredentialResolver {
    return (provider: string) => {
        if (options.override?.trim()) {
            return options.override.trim();
        }

        const key = normalizeProvider(provider);
        for (const fileName of KEY_FILES[key] ?? []) {
            const fromFile = readKeyFile(path.join(options.keyDir, fileName));
            if (fromFile) return fromFile;
        }

        const fromEnv = options.env[key]?.trim();
        return fromEnv ? fromEnv : undefined;
    };
}
