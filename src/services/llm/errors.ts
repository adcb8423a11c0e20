import { HandshakeResult } from '../../types';

// ─── Error Classes ───

/** Caller input rejected before any network activity (e.g. blank credential). */
export class ValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

/** The provider handshake reported failure; the enclosing completion is aborted. */
export class HandshakeError extends Error {
    public readonly provider: string;
    public readonly handshake: HandshakeResult;

    constructor(provider: string, handshake: HandshakeResult) {
        super(`Handshake failed: ${handshake.message}`);
        this.name = 'HandshakeError';
        this.provider = provider;
        this.handshake = handshake;
    }
}

/**
 * Non-success HTTP status from a provider. Status 0 means no response arrived
 * before the request timeout.
 */
export class TransportError extends Error {
    public readonly provider: string;
    public readonly status: number;
    public readonly body: string;

    constructor(provider: string, status: number, body: string) {
        super(status === 0
            ? `${provider} request failed: ${body}`
            : `${provider} request failed with status ${status}: ${body}`);
        this.name = 'TransportError';
        this.provider = provider;
        this.status = status;
        this.body = body;
    }
}

/** Success response whose shape the adapter does not recognize. Never leaves an adapter. */
export class ProtocolError extends Error {
    public readonly body: string;

    constructor(message: string, body: string) {
        super(message);
        this.name = 'ProtocolError';
        this.body = body;
    }
}

export class UnsupportedProviderError extends Error {
    public readonly provider: string;

    constructor(provider: string) {
        super(`Unsupported provider: ${provider}`);
        this.name = 'UnsupportedProviderError';
        this.provider = provider;
    }
}

export class CancelledError extends Error {
    constructor(message = 'Request cancelled') {
        super(message);
        this.name = 'CancelledError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
