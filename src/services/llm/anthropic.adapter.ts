import { ChatMessage, ModelDefinition } from '../../types';
import { BaseChatAdapter, HANDSHAKE_MESSAGE, ProviderRequest, isRecord, textField } from './base.adapter';
import { joinUrl } from './http';
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, resolveInteger, resolveNumber } from './parameters';

const MESSAGES_PATH = '/v1/messages';
export const ANTHROPIC_API_VERSION = '2023-06-01';

interface AnthropicMessage {
    role: 'user' | 'assistant';
    content: string;
}

/**
 * Pull the first system message out into its own field. Every other message
 * stays in order; roles other than assistant are sent as user.
 */
export function splitSystemMessage(messages: readonly ChatMessage[]): {
    system: string | undefined;
    conversation: AnthropicMessage[];
} {
    const systemIndex = messages.findIndex((m) => m.role === 'system');
    const system = systemIndex >= 0 ? messages[systemIndex].content : undefined;

    const conversation = messages
        .filter((_, i) => i !== systemIndex)
        .map((m): AnthropicMessage => ({
            role: m.role === 'assistant' ? 'assistant' : 'user',
            content: m.content,
        }));

    return { system: system ? system : undefined, conversation };
}

export class AnthropicAdapter extends BaseChatAdapter {
    protected buildRequest(
        model: ModelDefinition,
        messages: readonly ChatMessage[],
        credential: string,
    ): ProviderRequest {
        const { system, conversation } = splitSystemMessage(messages);

        const body: Record<string, unknown> = {
            model: model.modelId,
            max_tokens: resolveInteger(model.parameters, 'max_tokens', DEFAULT_MAX_TOKENS),
            temperature: resolveNumber(model.parameters, 'temperature', DEFAULT_TEMPERATURE),
        };
        if (system) body['system'] = system;
        body['messages'] = conversation;

        return {
            url: joinUrl(this.options.baseUrl, MESSAGES_PATH),
            headers: this.authHeaders(credential),
            body,
        };
    }

    protected buildHandshakeRequest(credential: string): ProviderRequest {
        return {
            url: joinUrl(this.options.baseUrl, MESSAGES_PATH),
            headers: this.authHeaders(credential),
            body: {
                model: this.options.handshakeModel,
                max_tokens: 50,
                messages: [{ role: 'user', content: HANDSHAKE_MESSAGE }],
            },
        };
    }

    // content[0].text
    protected extractText(payload: unknown): string | undefined {
        if (!isRecord(payload) || !Array.isArray(payload.content) || payload.content.length === 0) {
            return undefined;
        }
        const first: unknown = payload.content[0];
        if (!isRecord(first) || !('text' in first)) {
            return undefined;
        }
        return textField(first.text);
    }

    private authHeaders(credential: string): Record<string, string> {
        return {
            'x-api-key': credential,
            'anthropic-version': ANTHROPIC_API_VERSION,
        };
    }
}
