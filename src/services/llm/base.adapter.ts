import type { Logger } from 'pino';
import { v4 as uuid } from 'uuid';
import { ChatMessage, HandshakeResult, ModelDefinition } from '../../types';
import { createChildLogger } from '../../utils/logger';
import { ChatCompletionAdapter, ConnectionTracker } from './llm.interface';
import { HandshakeError, ProtocolError, TransportError, ValidationError } from './errors';
import { postJson } from './http';

export const HANDSHAKE_MESSAGE = 'hello';

export interface AdapterOptions {
    /** Provider key, lowercase. */
    name: string;
    /** Human-readable provider name used in handshake messages. */
    label: string;
    baseUrl: string;
    handshakeModel: string;
    handshakeIdPrefix: string;
    requestTimeoutMs: number;
    handshakeTimeoutMs: number;
}

export interface ProviderRequest {
    url: string;
    headers: Record<string, string>;
    body: unknown;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Text of a JSON string-or-null field. null reads as empty text; anything
 * else is not the shape we expect.
 */
export function textField(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (value === null) return '';
    return undefined;
}

function compactTimestamp(date: Date): string {
    return date.toISOString().replace(/[-:T]/g, '').slice(0, 14);
}

export function createHandshakeId(prefix: string, now = new Date()): string {
    return `${prefix}${compactTimestamp(now)}_${uuid().replace(/-/g, '')}`;
}

/**
 * Shared request lifecycle for every HTTP provider:
 * validate → handshake if needed → build payload → send → parse (raw body on unknown shape).
 */
export abstract class BaseChatAdapter implements ChatCompletionAdapter {
    readonly name: string;
    protected readonly log: Logger;

    constructor(
        protected readonly registry: ConnectionTracker,
        protected readonly options: AdapterOptions,
    ) {
        this.name = options.name;
        this.log = createChildLogger({ component: 'adapter', provider: options.name });
    }

    async complete(
        model: ModelDefinition,
        messages: readonly ChatMessage[],
        credential: string,
        signal?: AbortSignal,
    ): Promise<string> {
        if (!credential.trim()) {
            throw new ValidationError(`An API key is required for ${this.options.label}`);
        }

        await this.ensureConnected(credential, signal);

        const startTime = Date.now();
        const request = this.buildRequest(model, messages, credential);
        const response = await postJson(request.url, {
            provider: this.name,
            headers: request.headers,
            body: request.body,
            timeoutMs: this.options.requestTimeoutMs,
            signal,
        });

        if (!response.ok) {
            this.log.warn({ status: response.status, body: response.body, model: model.modelId }, 'LLM call failed');
            if (response.status === 401 || response.status === 403) {
                this.registry.updateStatus(this.name, `Credential rejected with status ${response.status}`, false);
            }
            throw new TransportError(this.name, response.status, response.body);
        }

        this.log.info({ latency: Date.now() - startTime, model: model.modelId }, 'LLM call completed');
        return this.extractOrFallback(response.body);
    }

    async handshake(credential: string, signal?: AbortSignal): Promise<HandshakeResult> {
        const request = this.buildHandshakeRequest(credential);
        const response = await postJson(request.url, {
            provider: this.name,
            headers: request.headers,
            body: request.body,
            timeoutMs: this.options.handshakeTimeoutMs,
            signal,
        });

        if (response.ok) {
            return Object.freeze({
                success: true,
                message: `${this.options.label} connection established. Response: ${response.body}`,
                handshakeId: createHandshakeId(this.options.handshakeIdPrefix),
            });
        }

        return Object.freeze({
            success: false,
            message: `${this.options.label} handshake failed: ${response.status} - ${response.body}`,
            handshakeId: '',
        });
    }

    protected abstract buildRequest(
        model: ModelDefinition,
        messages: readonly ChatMessage[],
        credential: string,
    ): ProviderRequest;

    protected abstract buildHandshakeRequest(credential: string): ProviderRequest;

    /** Generated text from a parsed success payload, or undefined when the shape is unknown. */
    protected abstract extractText(payload: unknown): string | undefined;

    private async ensureConnected(credential: string, signal?: AbortSignal): Promise<void> {
        if (this.registry.isConnected(this.name)) return;

        this.log.info('Connection not established, performing handshake');
        const result = await this.registry.performHandshake(this.name, credential, signal);
        if (!result.success) {
            throw new HandshakeError(this.name, result);
        }
    }

    private extractOrFallback(body: string): string {
        try {
            return this.parseBody(body);
        } catch (error) {
            if (error instanceof ProtocolError) {
                this.log.warn({ body: error.body }, error.message);
                return error.body;
            }
            throw error;
        }
    }

    private parseBody(body: string): string {
        let payload: unknown;
        try {
            payload = JSON.parse(body);
        } catch {
            throw new ProtocolError(`Non-JSON ${this.options.label} response`, body);
        }

        const text = this.extractText(payload);
        if (text === undefined) {
            throw new ProtocolError(`Unknown ${this.options.label} response shape`, body);
        }
        return text;
    }
}
