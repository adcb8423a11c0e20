import { ChatMessage, HandshakeResult, ModelDefinition } from '../../types';

/**
 * One lightweight verification exchange that proves a credential works for a provider.
 */
export interface HandshakeProbe {
    handshake(credential: string, signal?: AbortSignal): Promise<HandshakeResult>;
}

/**
 * Provider adapter interface.
 * Implement this for each wire protocol (OpenAI-style, Anthropic-style, HuggingFace-style).
 */
export interface ChatCompletionAdapter extends HandshakeProbe {
    /** Normalized provider key the adapter handshakes and tracks state under. */
    readonly name: string;

    /**
     * Send the conversation and return the single generated text.
     */
    complete(
        model: ModelDefinition,
        messages: readonly ChatMessage[],
        credential: string,
        signal?: AbortSignal,
    ): Promise<string>;
}

/**
 * The slice of the connection registry an adapter consults before each call.
 */
export interface ConnectionTracker {
    isConnected(provider: string): boolean;
    performHandshake(provider: string, credential: string, signal?: AbortSignal): Promise<HandshakeResult>;
    updateStatus(provider: string, message: string, connected: boolean): void;
}
