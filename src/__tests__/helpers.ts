import type { Mock } from 'vitest';
import { ChatMessage, HandshakeResult, ModelDefinition, ParameterDefinition } from '../types';
import { ChatCompletionAdapter } from '../services/llm/llm.interface';
import { CancelledError } from '../services/llm/errors';
import { GatewayOptions } from '../services/llm';

export const TEST_GATEWAY_OPTIONS: GatewayOptions = {
    openaiBaseUrl: 'https://openai.test',
    anthropicBaseUrl: 'https://anthropic.test',
    huggingfaceBaseUrl: 'https://hf.test',
    grokBaseUrl: 'https://grok.test',
    openaiHandshakeModel: 'gpt-3.5-turbo',
    anthropicHandshakeModel: 'claude-3-haiku-20240307',
    huggingfaceHandshakeModel: 'microsoft/DialoGPT-medium',
    grokHandshakeModel: 'grok-beta',
    requestTimeoutMs: 5000,
    handshakeTimeoutMs: 5000,
};

export function makeModel(overrides: Partial<ModelDefinition> = {}): ModelDefinition {
    return {
        name: 'Test Model',
        provider: 'openai',
        modelId: 'test-model-1',
        description: '',
        parameters: [],
        ...overrides,
    };
}

export function param(name: string, value?: ParameterDefinition['default']): ParameterDefinition {
    return { name, description: `${name} parameter`, default: value };
}

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(typeof body === 'string' ? body : JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

export interface CapturedRequest {
    url: string;
    headers: Headers;
    rawBody: string;
    body: unknown;
}

export function requestAt(fetchMock: Mock<typeof fetch>, index: number): CapturedRequest {
    const [input, init] = fetchMock.mock.calls[index];
    const rawBody = String(init?.body);
    return {
        url: String(input),
        headers: new Headers(init?.headers),
        rawBody,
        body: JSON.parse(rawBody),
    };
}

/** fetch stand-in that only settles when its signal aborts. */
export function hangingFetch(): typeof fetch {
    return (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
                reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
            });
        });
}

export interface Deferred<T> {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
    let resolve: (value: T) => void = () => undefined;
    let reject: (reason: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

export interface RecordedCall {
    model: ModelDefinition;
    messages: ChatMessage[];
    credential: string;
}

type Responder = (messages: ChatMessage[], model: ModelDefinition) => string | Promise<string>;

/**
 * In-process adapter: records calls and answers through a responder.
 */
export class FakeAdapter implements ChatCompletionAdapter {
    readonly calls: RecordedCall[] = [];
    handshakeResult: HandshakeResult = { success: true, message: 'ready', handshakeId: 'fake_1' };
    handshakes = 0;

    constructor(readonly name: string, private responder: Responder = () => 'ok') {}

    respondWith(responder: Responder): void {
        this.responder = responder;
    }

    async handshake(): Promise<HandshakeResult> {
        this.handshakes += 1;
        return this.handshakeResult;
    }

    async complete(
        model: ModelDefinition,
        messages: readonly ChatMessage[],
        credential: string,
        signal?: AbortSignal,
    ): Promise<string> {
        this.calls.push({ model, messages: [...messages], credential });
        if (signal?.aborted) {
            throw new CancelledError();
        }
        return this.responder([...messages], model);
    }
}
