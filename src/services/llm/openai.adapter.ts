import { ChatMessage, ModelDefinition } from '../../types';
import { BaseChatAdapter, HANDSHAKE_MESSAGE, ProviderRequest, isRecord, textField } from './base.adapter';
import { joinUrl } from './http';
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, resolveInteger, resolveNumber } from './parameters';

const CHAT_COMPLETIONS_PATH = '/v1/chat/completions';

/**
 * OpenAI chat completions wire format. Also serves OpenAI-compatible
 * providers (e.g. Grok) registered under their own key and base URL.
 */
export class OpenAIAdapter extends BaseChatAdapter {
    protected buildRequest(
        model: ModelDefinition,
        messages: readonly ChatMessage[],
        credential: string,
    ): ProviderRequest {
        return {
            url: joinUrl(this.options.baseUrl, CHAT_COMPLETIONS_PATH),
            headers: { Authorization: `Bearer ${credential}` },
            body: {
                model: model.modelId,
                messages: messages.map((m) => ({ role: m.role.toLowerCase(), content: m.content })),
                max_tokens: resolveInteger(model.parameters, 'max_tokens', DEFAULT_MAX_TOKENS),
                temperature: resolveNumber(model.parameters, 'temperature', DEFAULT_TEMPERATURE),
            },
        };
    }

    protected buildHandshakeRequest(credential: string): ProviderRequest {
        return {
            url: joinUrl(this.options.baseUrl, CHAT_COMPLETIONS_PATH),
            headers: { Authorization: `Bearer ${credential}` },
            body: {
                model: this.options.handshakeModel,
                messages: [{ role: 'user', content: HANDSHAKE_MESSAGE }],
                max_tokens: 50,
            },
        };
    }

    // choices[0].message.content
    protected extractText(payload: unknown): string | undefined {
        if (!isRecord(payload) || !Array.isArray(payload.choices) || payload.choices.length === 0) {
            return undefined;
        }
        const first: unknown = payload.choices[0];
        if (!isRecord(first) || !isRecord(first.message) || !('content' in first.message)) {
            return undefined;
        }
        return textField(first.message.content);
    }
}
