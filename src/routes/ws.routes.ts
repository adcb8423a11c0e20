import { FastifyPluginAsync } from 'fastify';
import websocket from '@fastify/websocket';
import { ConnectionRegistry } from '../services/connection';
import { logger } from '../utils/logger';

export interface WsRouteOptions {
    registry: ConnectionRegistry;
}

export const wsRoutes: FastifyPluginAsync<WsRouteOptions> = async (fastify, opts) => {
    await fastify.register(websocket);

    // ─── Live connection status push ───
    fastify.get('/ws/status', { websocket: true }, (socket) => {
        socket.send(JSON.stringify({ type: 'snapshot', data: opts.registry.listStates() }));

        const unsubscribe = opts.registry.onStatusChange((event) => {
            socket.send(JSON.stringify({ type: 'status', data: event }));
        });

        socket.on('error', (err) => {
            logger.warn({ err }, 'Status socket error');
        });
        socket.on('close', unsubscribe);
    });
};
