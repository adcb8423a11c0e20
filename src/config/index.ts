import os from 'os';
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const booleanFromEnv = z
    .enum(['true', 'false', '1', '0'])
    .transform((v) => v === 'true' || v === '1');

const configSchema = z.object({
    port: z.number().int().positive().default(3000),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

    // Model catalog
    modelsPath: z.string().default('config/models.json'),

    // Provider endpoints
    openaiBaseUrl: z.string().url().default('https://api.openai.com'),
    anthropicBaseUrl: z.string().url().default('https://api.anthropic.com'),
    huggingfaceBaseUrl: z.string().url().default('https://api-inference.huggingface.co'),
    grokBaseUrl: z.string().url().default('https://api.x.ai'),

    // Handshake probes
    openaiHandshakeModel: z.string().default('gpt-3.5-turbo'),
    anthropicHandshakeModel: z.string().default('claude-3-haiku-20240307'),
    huggingfaceHandshakeModel: z.string().default('microsoft/DialoGPT-medium'),
    grokHandshakeModel: z.string().default('grok-beta'),

    // Timeouts
    requestTimeoutMs: z.number().int().positive().default(30000),
    handshakeTimeoutMs: z.number().int().positive().default(10000),
    autoHandshakeOnStartup: booleanFromEnv.default('true'),

    // Credentials
    keyDir: z.string().default(os.homedir()),
    openaiApiKey: z.string().optional(),
    anthropicApiKey: z.string().optional(),
    huggingfaceApiKey: z.string().optional(),
    grokApiKey: z.string().optional(),
});

export type AppConfig = z.infer<typeof configSchema>;

function optionalInt(value: string | undefined): number | undefined {
    return value ? parseInt(value, 10) : undefined;
}

function loadConfig(): AppConfig {
    return configSchema.parse({
        port: optionalInt(process.env.PORT),
        host: process.env.HOST,
        nodeEnv: process.env.NODE_ENV,
        logLevel: process.env.LOG_LEVEL,
        modelsPath: process.env.MODELS_PATH,
        openaiBaseUrl: process.env.OPENAI_BASE_URL,
        anthropicBaseUrl: process.env.ANTHROPIC_BASE_URL,
        huggingfaceBaseUrl: process.env.HUGGINGFACE_BASE_URL,
        grokBaseUrl: process.env.GROK_BASE_URL,
        openaiHandshakeModel: process.env.OPENAI_HANDSHAKE_MODEL,
        anthropicHandshakeModel: process.env.ANTHROPIC_HANDSHAKE_MODEL,
        huggingfaceHandshakeModel: process.env.HUGGINGFACE_HANDSHAKE_MODEL,
        grokHandshakeModel: process.env.GROK_HANDSHAKE_MODEL,
        requestTimeoutMs: optionalInt(process.env.REQUEST_TIMEOUT_MS),
        handshakeTimeoutMs: optionalInt(process.env.HANDSHAKE_TIMEOUT_MS),
        autoHandshakeOnStartup: process.env.AUTO_HANDSHAKE_ON_STARTUP,
        keyDir: process.env.KEY_DIR,
        openaiApiKey: process.env.OPENAI_API_KEY || undefined,
        anthropicApiKey: process.env.ANTHROPIC_API_KEY || process.env.CLAUDE_API_KEY || undefined,
        huggingfaceApiKey: process.env.HUGGINGFACE_API_KEY || undefined,
        grokApiKey: process.env.GROK_API_KEY || undefined,
    });
}

export const config = Object.freeze(loadConfig());
