import { ChatCompletionAdapter, HandshakeProbe } from './llm.interface';
import { UnsupportedProviderError } from './errors';

export function normalizeProvider(provider: string): string {
    return provider.trim().toLowerCase();
}

/** Anything that accepts a handshake probe per provider key. */
export interface ProbeRegistry {
    registerProbe(provider: string, probe: HandshakeProbe): void;
}

/**
 * Completion Gateway.
 * Fixed table of provider key → adapter, built once at startup. Adding a provider
 * means registering another adapter, never editing a dispatch function.
 */
export class CompletionGateway {
    private adapters: Map<string, ChatCompletionAdapter> = new Map();

    constructor(private probes?: ProbeRegistry) {}

    /**
     * Register an adapter under a provider key; the adapter also becomes that
     * key's handshake probe.
     */
    register(provider: string, adapter: ChatCompletionAdapter): this {
        const key = normalizeProvider(provider);
        this.adapters.set(key, adapter);
        this.probes?.registerProbe(key, adapter);
        return this;
    }

    /**
     * Case-insensitive lookup. Unknown keys are a configuration fault.
     */
    resolve(provider: string): ChatCompletionAdapter {
        const adapter = this.adapters.get(normalizeProvider(provider));
        if (!adapter) {
            throw new UnsupportedProviderError(provider);
        }
        return adapter;
    }

    has(provider: string): boolean {
        return this.adapters.has(normalizeProvider(provider));
    }

    providers(): string[] {
        return Array.from(this.adapters.keys());
    }
}
