import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ConnectionRegistry } from './services/connection';
import { CompletionGateway } from './services/llm';
import { SessionOrchestrator } from './services/sessions';
import { sessionRoutes, CredentialFactory } from './routes/session.routes';
import { connectionRoutes } from './routes/connection.routes';
import { wsRoutes } from './routes/ws.routes';

export interface AppServices {
    registry: ConnectionRegistry;
    gateway: CompletionGateway;
    orchestrator: SessionOrchestrator;
    credentials: CredentialFactory;
    summaryPrompt: string;
    corsOrigin?: string;
}

/**
 * Build the HTTP surface over already-wired services. Does not listen.
 */
export async function buildApp(services: AppServices): Promise<FastifyInstance> {
    const { registry, gateway, orchestrator, credentials, summaryPrompt } = services;

    const app = Fastify({
        logger: false, // We use pino directly
    });

    await app.register(cors, {
        origin: services.corsOrigin ? [services.corsOrigin] : true,
    });

    await app.register(sessionRoutes, { orchestrator, credentials, summaryPrompt });
    await app.register(connectionRoutes, { registry, credentials });
    await app.register(wsRoutes, { registry });

    // ─── Health Check ───
    app.get('/health', async () => {
        return {
            status: 'ok',
            timestamp: new Date().toISOString(),
            providers: gateway.providers().map((provider) => ({
                provider,
                connected: registry.isConnected(provider),
            })),
            sessions: orchestrator.sessions.length,
        };
    });

    return app;
}
