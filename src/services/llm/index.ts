import { AdapterOptions } from './base.adapter';
import { OpenAIAdapter } from './openai.adapter';
import { AnthropicAdapter } from './anthropic.adapter';
import { HuggingFaceAdapter } from './huggingface.adapter';
import { CompletionGateway, ProbeRegistry } from './gateway';
import type { ConnectionTracker } from './llm.interface';
import { config } from '../../config';

export type { ChatCompletionAdapter, ConnectionTracker, HandshakeProbe } from './llm.interface';
export { BaseChatAdapter } from './base.adapter';
export { OpenAIAdapter } from './openai.adapter';
export { AnthropicAdapter } from './anthropic.adapter';
export { HuggingFaceAdapter } from './huggingface.adapter';
export { CompletionGateway, normalizeProvider } from './gateway';
export * from './errors';
export { buildSummaryMessages, renderTranscript } from './prompt-builder';

export interface GatewayOptions {
    openaiBaseUrl: string;
    anthropicBaseUrl: string;
    huggingfaceBaseUrl: string;
    grokBaseUrl: string;
    openaiHandshakeModel: string;
    anthropicHandshakeModel: string;
    huggingfaceHandshakeModel: string;
    grokHandshakeModel: string;
    requestTimeoutMs: number;
    handshakeTimeoutMs: number;
}

/**
 * Factory: build the gateway with every supported provider registered, and
 * register each adapter as its provider's handshake probe.
 */
export function createCompletionGateway(
    registry: ConnectionTracker & ProbeRegistry,
    options: GatewayOptions = config,
): CompletionGateway {
    const common = {
        requestTimeoutMs: options.requestTimeoutMs,
        handshakeTimeoutMs: options.handshakeTimeoutMs,
    };
    const adapterOptions = (o: Omit<AdapterOptions, keyof typeof common>): AdapterOptions => ({ ...o, ...common });

    return new CompletionGateway(registry)
        .register('openai', new OpenAIAdapter(registry, adapterOptions({
            name: 'openai',
            label: 'OpenAI',
            baseUrl: options.openaiBaseUrl,
            handshakeModel: options.openaiHandshakeModel,
            handshakeIdPrefix: 'oai_',
        })))
        .register('anthropic', new AnthropicAdapter(registry, adapterOptions({
            name: 'anthropic',
            label: 'Anthropic',
            baseUrl: options.anthropicBaseUrl,
            handshakeModel: options.anthropicHandshakeModel,
            handshakeIdPrefix: 'ant_',
        })))
        .register('huggingface', new HuggingFaceAdapter(registry, adapterOptions({
            name: 'huggingface',
            label: 'HuggingFace',
            baseUrl: options.huggingfaceBaseUrl,
            handshakeModel: options.huggingfaceHandshakeModel,
            handshakeIdPrefix: 'hf_',
        })))
        // Grok uses the OpenAI-compatible API
        .register('grok', new OpenAIAdapter(registry, adapterOptions({
            name: 'grok',
            label: 'Grok',
            baseUrl: options.grokBaseUrl,
            handshakeModel: options.grokHandshakeModel,
            handshakeIdPrefix: 'grok_',
        })));
}
