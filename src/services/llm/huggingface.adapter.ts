import { ChatMessage, ChatRole, ModelDefinition } from '../../types';
import { BaseChatAdapter, HANDSHAKE_MESSAGE, ProviderRequest, isRecord, textField } from './base.adapter';
import { joinUrl } from './http';
import { collectDefaults } from './parameters';

const ROLE_PREFIX: Record<ChatRole, string> = {
    system: 'System:',
    user: 'User:',
    assistant: 'Assistant:',
};

/**
 * Render a conversation as one text-generation prompt, ending with an
 * `Assistant:` cue so the model continues as the assistant.
 */
export function renderPrompt(messages: readonly ChatMessage[]): string {
    const lines = messages.map((m) => `${ROLE_PREFIX[m.role]} ${m.content.trim()}\n`);
    return `${lines.join('')}Assistant:`;
}

/** models/{modelId} under the base URL, unless the model names its own endpoint. */
export function resolveEndpoint(baseUrl: string, model: ModelDefinition): string {
    const endpoint = model.endpoint?.trim();
    return joinUrl(baseUrl, endpoint ? endpoint : `models/${model.modelId}`);
}

export class HuggingFaceAdapter extends BaseChatAdapter {
    protected buildRequest(
        model: ModelDefinition,
        messages: readonly ChatMessage[],
        credential: string,
    ): ProviderRequest {
        return {
            url: resolveEndpoint(this.options.baseUrl, model),
            headers: { Authorization: `Bearer ${credential}` },
            body: {
                inputs: renderPrompt(messages),
                parameters: collectDefaults(model.parameters),
            },
        };
    }

    protected buildHandshakeRequest(credential: string): ProviderRequest {
        return {
            url: joinUrl(this.options.baseUrl, `models/${this.options.handshakeModel}`),
            headers: { Authorization: `Bearer ${credential}` },
            body: {
                inputs: HANDSHAKE_MESSAGE,
                parameters: { max_new_tokens: 50, temperature: 0.1 },
            },
        };
    }

    // { generated_text } or [{ generated_text }] or [{ generated_texts: [..] }]
    protected extractText(payload: unknown): string | undefined {
        if (Array.isArray(payload)) {
            if (payload.length === 0) return undefined;
            const first: unknown = payload[0];
            if (!isRecord(first)) return undefined;
            if ('generated_text' in first) {
                return textField(first.generated_text);
            }
            if (Array.isArray(first.generated_texts) && first.generated_texts.length > 0) {
                return textField(first.generated_texts[0]);
            }
            return undefined;
        }

        if (isRecord(payload) && 'generated_text' in payload) {
            return textField(payload.generated_text);
        }
        return undefined;
    }
}
