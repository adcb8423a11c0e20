import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { ConnectionRegistry } from '../services/connection';
import { CancelledError, ValidationError } from '../services/llm/errors';
import { HandshakeProbe } from '../services/llm/llm.interface';
import { ConnectionStatusEvent, HandshakeResult } from '../types';
import { deferred } from './helpers';

// ─── Probe stand-ins ───
function probeReturning(result: HandshakeResult): { handshake: Mock<HandshakeProbe['handshake']> } {
    return { handshake: vi.fn<HandshakeProbe['handshake']>(async () => result) };
}

const OK: HandshakeResult = { success: true, message: 'OpenAI connection established. Response: {}', handshakeId: 'oai_1' };
const REJECTED: HandshakeResult = { success: false, message: 'OpenAI handshake failed: 401 - bad key', handshakeId: '' };

describe('ConnectionRegistry', () => {
    let registry: ConnectionRegistry;
    let events: ConnectionStatusEvent[];

    beforeEach(() => {
        registry = new ConnectionRegistry();
        events = [];
        registry.onStatusChange((e) => events.push(e));
    });

    describe('reads', () => {
        it('should report unknown providers as disconnected', () => {
            expect(registry.isConnected('nobody')).toBe(false);
            expect(registry.getLastHandshakeTime('nobody')).toBeNull();
            expect(registry.getState('nobody')).toBeUndefined();
            expect(registry.listStates()).toEqual([]);
        });

        it('should treat provider keys case-insensitively', () => {
            registry.updateStatus('OpenAI', 'ok', true);
            expect(registry.isConnected('openai')).toBe(true);
            expect(registry.isConnected(' OPENAI ')).toBe(true);
            expect(registry.listStates()).toHaveLength(1);
        });

        it('should hand out frozen snapshots', () => {
            registry.updateStatus('openai', 'ok', true);
            const state = registry.getState('openai');
            expect(state).toBeDefined();
            expect(Object.isFrozen(state)).toBe(true);
        });

        it('should return a copy of the handshake time', () => {
            registry.updateStatus('openai', 'ok', true);
            const first = registry.getLastHandshakeTime('openai');
            first?.setFullYear(1999);
            expect(registry.getLastHandshakeTime('openai')?.getFullYear()).not.toBe(1999);
        });
    });

    describe('performHandshake', () => {
        it('should mark the provider connected on success', async () => {
            const probe = probeReturning(OK);
            registry.registerProbe('openai', probe);

            const result = await registry.performHandshake('OpenAI', 'test-secret');

            expect(result).toEqual(OK);
            expect(probe.handshake).toHaveBeenCalledWith('test-secret', undefined);
            expect(registry.isConnected('openai')).toBe(true);
            expect(registry.getLastHandshakeTime('openai')).toBeInstanceOf(Date);
            expect(registry.getState('openai')?.lastMessage).toBe(OK.message);
        });

        it('should emit exactly one event per handshake', async () => {
            registry.registerProbe('openai', probeReturning(OK));
            await registry.performHandshake('openai', 'test-secret');

            expect(events).toHaveLength(1);
            expect(events[0]).toMatchObject({ provider: 'openai', connected: true, message: OK.message });
            expect(events[0].timestamp).toBeInstanceOf(Date);
        });

        it('should record a failed handshake without a handshake time', async () => {
            registry.registerProbe('openai', probeReturning(REJECTED));

            const result = await registry.performHandshake('openai', 'test-secret');

            expect(result.success).toBe(false);
            expect(registry.isConnected('openai')).toBe(false);
            expect(registry.getLastHandshakeTime('openai')).toBeNull();
            expect(events).toHaveLength(1);
            expect(events[0].connected).toBe(false);
        });

        it('should keep the last successful time after a later failure', async () => {
            const probe = probeReturning(OK);
            registry.registerProbe('openai', probe);
            await registry.performHandshake('openai', 'test-secret');
            const connectedAt = registry.getLastHandshakeTime('openai');

            probe.handshake.mockResolvedValueOnce(REJECTED);
            await registry.performHandshake('openai', 'test-secret');

            expect(registry.isConnected('openai')).toBe(false);
            expect(registry.getLastHandshakeTime('openai')).toEqual(connectedAt);
        });

        it('should reject a blank credential without probing or notifying', async () => {
            const probe = probeReturning(OK);
            registry.registerProbe('openai', probe);

            await expect(registry.performHandshake('openai', '   ')).rejects.toBeInstanceOf(ValidationError);
            expect(probe.handshake).not.toHaveBeenCalled();
            expect(events).toHaveLength(0);
            expect(registry.getState('openai')).toBeUndefined();
        });

        it('should fail providers that have no probe', async () => {
            const result = await registry.performHandshake('Mystery', 'test-secret');

            expect(result).toEqual({
                success: false,
                message: "No handshake probe registered for provider 'mystery'",
                handshakeId: '',
            });
            expect(events).toHaveLength(1);
        });

        it('should fold a thrown probe error into a failed result', async () => {
            registry.registerProbe('openai', { handshake: vi.fn(async () => { throw new Error('socket hang up'); }) });

            const result = await registry.performHandshake('openai', 'test-secret');

            expect(result).toEqual({ success: false, message: 'Handshake failed: socket hang up', handshakeId: '' });
            expect(registry.isConnected('openai')).toBe(false);
        });

        it('should leave state untouched when cancelled', async () => {
            const probe = probeReturning(OK);
            registry.registerProbe('openai', probe);
            await registry.performHandshake('openai', 'test-secret');

            probe.handshake.mockRejectedValueOnce(new CancelledError());
            await expect(registry.performHandshake('openai', 'test-secret')).rejects.toBeInstanceOf(CancelledError);

            expect(registry.isConnected('openai')).toBe(true);
            expect(events).toHaveLength(1);
        });

        it('should discard a result that arrives after cancellation', async () => {
            const slow = deferred<HandshakeResult>();
            registry.registerProbe('openai', { handshake: () => slow.promise });
            const controller = new AbortController();

            const pending = registry.performHandshake('openai', 'test-secret', controller.signal);
            controller.abort();
            slow.resolve(OK);

            await expect(pending).rejects.toBeInstanceOf(CancelledError);
            expect(registry.isConnected('openai')).toBe(false);
            expect(registry.getState('openai')).toBeUndefined();
            expect(events).toHaveLength(0);
        });

        it('should not block other providers while a handshake is in flight', async () => {
            const slow = deferred<HandshakeResult>();
            registry.registerProbe('anthropic', { handshake: () => slow.promise });
            registry.registerProbe('openai', probeReturning(OK));

            const pending = registry.performHandshake('anthropic', 'test-secret');
            await registry.performHandshake('openai', 'test-secret');

            expect(registry.isConnected('openai')).toBe(true);
            expect(registry.isConnected('anthropic')).toBe(false);

            slow.resolve({ success: true, message: 'late', handshakeId: 'ant_1' });
            await pending;
            expect(registry.isConnected('anthropic')).toBe(true);
            expect(events.map((e) => e.provider)).toEqual(['openai', 'anthropic']);
        });
    });

    describe('updateStatus', () => {
        it('should stamp the time only when connected', () => {
            registry.updateStatus('openai', 'Credential rejected with status 401', false);
            expect(registry.getLastHandshakeTime('openai')).toBeNull();

            registry.updateStatus('openai', 'ok', true);
            expect(registry.getLastHandshakeTime('openai')).toBeInstanceOf(Date);
        });

        it('should keep the handshake time when marking disconnected', () => {
            registry.updateStatus('openai', 'ok', true);
            const connectedAt = registry.getLastHandshakeTime('openai');

            registry.updateStatus('openai', 'Credential rejected with status 401', false);

            expect(registry.isConnected('openai')).toBe(false);
            expect(registry.getLastHandshakeTime('openai')).toEqual(connectedAt);
        });
    });

    describe('listeners', () => {
        it('should notify listeners in registration order', () => {
            const order: string[] = [];
            registry.onStatusChange(() => order.push('second'));
            registry.onStatusChange(() => order.push('third'));
            registry.onStatusChange(() => order.push('fourth'));

            registry.updateStatus('openai', 'ok', true);

            expect(events).toHaveLength(1);
            expect(order).toEqual(['second', 'third', 'fourth']);
        });

        it('should keep notifying when one listener throws', () => {
            const after = vi.fn();
            registry.onStatusChange(() => { throw new Error('listener broke'); });
            registry.onStatusChange(after);

            registry.updateStatus('openai', 'ok', true);

            expect(after).toHaveBeenCalledTimes(1);
            expect(registry.isConnected('openai')).toBe(true);
        });

        it('should stop notifying after unsubscribe', () => {
            const listener = vi.fn();
            const unsubscribe = registry.onStatusChange(listener);

            registry.updateStatus('openai', 'ok', true);
            unsubscribe();
            registry.updateStatus('openai', 'again', true);

            expect(listener).toHaveBeenCalledTimes(1);
        });

        it('should see the new state from inside the listener', () => {
            let seen: boolean | undefined;
            registry.onStatusChange((e) => { seen = registry.isConnected(e.provider); });

            registry.updateStatus('grok', 'ok', true);

            expect(seen).toBe(true);
        });
    });
});
