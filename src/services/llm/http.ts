import { CancelledError, TransportError, errorMessage } from './errors';

export interface HttpResponse {
    status: number;
    ok: boolean;
    body: string;
}

export interface PostJsonOptions {
    provider: string;
    headers: Record<string, string>;
    body: unknown;
    timeoutMs: number;
    signal?: AbortSignal;
}

/**
 * POST a JSON payload and read the whole response body as text.
 * The caller's signal maps to CancelledError; our own timeout maps to a
 * TransportError with status 0, as does any failure to get a response.
 */
export async function postJson(url: string, options: PostJsonOptions): Promise<HttpResponse> {
    const { provider, headers, body, timeoutMs, signal } = options;
    if (signal?.aborted) {
        throw new CancelledError();
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
        const response = await fetch(url, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                ...headers,
            },
            body: JSON.stringify(body),
            signal: controller.signal,
        });
        const text = await response.text();
        return { status: response.status, ok: response.ok, body: text };
    } catch (error) {
        if (signal?.aborted) {
            throw new CancelledError();
        }
        if (controller.signal.aborted) {
            throw new TransportError(provider, 0, `no response within ${timeoutMs}ms`);
        }
        // DNS failure, refused connection, reset socket
        throw new TransportError(provider, 0, errorMessage(error));
    } finally {
        clearTimeout(timeout);
        signal?.removeEventListener('abort', forwardAbort);
    }
}

/** Join a base URL and a path without doubling or dropping the slash. */
export function joinUrl(base: string, path: string): string {
    if (/^https?:\/\//i.test(path)) return path;
    return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
