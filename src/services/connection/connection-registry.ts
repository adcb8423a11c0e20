import {
    ConnectionState,
    ConnectionStatusEvent,
    ConnectionStatusListener,
    HandshakeResult,
} from '../../types';
import { CancelledError, ValidationError, errorMessage } from '../llm/errors';
import { normalizeProvider } from '../llm/gateway';
import type { ConnectionTracker, HandshakeProbe } from '../llm/llm.interface';
import { createChildLogger } from '../../utils/logger';

interface MutableConnectionState {
    provider: string;
    connected: boolean;
    lastHandshakeTime: Date | null;
    lastMessage: string;
}

const log = createChildLogger({ component: 'connection-registry' });

/**
 * Connection Registry.
 * One state entry per normalized provider key, shared by every session using
 * that provider. Network calls are awaited before any state is touched; the
 * mutation and the listener dispatch then run in one synchronous block, so no
 * other mutation can land between them and nothing is held across the call.
 */
export class ConnectionRegistry implements ConnectionTracker {
    private states: Map<string, MutableConnectionState> = new Map();
    private probes: Map<string, HandshakeProbe> = new Map();
    private listeners: ConnectionStatusListener[] = [];

    registerProbe(provider: string, probe: HandshakeProbe): void {
        this.probes.set(normalizeProvider(provider), probe);
    }

    /**
     * Run one handshake and record its outcome.
     * Blank credentials throw ValidationError and cancellation throws
     * CancelledError; neither touches state. Any other failure is folded into
     * an unsuccessful result.
     */
    async performHandshake(provider: string, credential: string, signal?: AbortSignal): Promise<HandshakeResult> {
        const key = normalizeProvider(provider);
        if (!credential.trim()) {
            throw new ValidationError(`An API key is required to connect to ${provider}`);
        }

        log.info({ provider: key }, 'Performing handshake');
        const result = await this.runProbe(key, credential, signal);
        if (signal?.aborted) {
            log.info({ provider: key }, 'Handshake cancelled');
            throw new CancelledError();
        }
        this.applyUpdate(key, result.message, result.success);

        if (result.success) {
            log.info({ provider: key, handshakeId: result.handshakeId }, 'Handshake succeeded');
        } else {
            log.warn({ provider: key, message: result.message }, 'Handshake failed');
        }
        return result;
    }

    isConnected(provider: string): boolean {
        return this.states.get(normalizeProvider(provider))?.connected ?? false;
    }

    getLastHandshakeTime(provider: string): Date | null {
        const time = this.states.get(normalizeProvider(provider))?.lastHandshakeTime;
        return time ? new Date(time.getTime()) : null;
    }

    getState(provider: string): ConnectionState | undefined {
        const state = this.states.get(normalizeProvider(provider));
        return state ? snapshot(state) : undefined;
    }

    listStates(): ConnectionState[] {
        return Array.from(this.states.values()).map(snapshot);
    }

    /**
     * Record connectivity learned outside a handshake (e.g. a rejected credential).
     */
    updateStatus(provider: string, message: string, connected: boolean): void {
        this.applyUpdate(normalizeProvider(provider), message, connected);
    }

    /**
     * Subscribe to status changes. Returns an unsubscribe function.
     */
    onStatusChange(listener: ConnectionStatusListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter((l) => l !== listener);
        };
    }

    private async runProbe(key: string, credential: string, signal?: AbortSignal): Promise<HandshakeResult> {
        const probe = this.probes.get(key);
        if (!probe) {
            return Object.freeze({
                success: false,
                message: `No handshake probe registered for provider '${key}'`,
                handshakeId: '',
            });
        }

        try {
            return await probe.handshake(credential, signal);
        } catch (error) {
            if (error instanceof CancelledError) {
                log.info({ provider: key }, 'Handshake cancelled');
                throw error;
            }
            log.error({ err: error, provider: key }, 'Handshake threw');
            return Object.freeze({
                success: false,
                message: `Handshake failed: ${errorMessage(error)}`,
                handshakeId: '',
            });
        }
    }

    private applyUpdate(key: string, message: string, connected: boolean): void {
        const now = new Date();
        let state = this.states.get(key);
        if (!state) {
            state = { provider: key, connected: false, lastHandshakeTime: null, lastMessage: '' };
            this.states.set(key, state);
        }

        state.connected = connected;
        state.lastMessage = message;
        if (connected) {
            state.lastHandshakeTime = now;
        }

        this.notify(Object.freeze({ provider: key, connected, message, timestamp: now }));
    }

    private notify(event: ConnectionStatusEvent): void {
        for (const listener of [...this.listeners]) {
            try {
                listener(event);
            } catch (err) {
                log.error({ err, provider: event.provider }, 'Connection status listener failed');
            }
        }
    }
}

function snapshot(state: MutableConnectionState): ConnectionState {
    return Object.freeze({
        provider: state.provider,
        connected: state.connected,
        lastHandshakeTime: state.lastHandshakeTime ? new Date(state.lastHandshakeTime.getTime()) : null,
        lastMessage: state.lastMessage,
    });
}
