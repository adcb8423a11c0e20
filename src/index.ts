import { config } from './config';
import { logger } from './utils/logger';
import { buildApp } from './app';
import { ConnectionRegistry } from './services/connection';
import { createCompletionGateway } from './services/llm';
import { SessionOrchestrator } from './services/sessions';
import { loadModelCatalog } from './services/catalog';
import { createCredentialResolver, envCredentials } from './services/credentials';

async function main() {
    // ─── Initialize Services ───
    logger.info('Initializing services...');

    const catalog = await loadModelCatalog(config.modelsPath);
    const registry = new ConnectionRegistry();
    const gateway = createCompletionGateway(registry);

    for (const model of catalog.models) {
        if (!gateway.has(model.provider)) {
            logger.warn({ model: model.name, provider: model.provider }, 'No adapter registered for model provider');
        }
    }

    const orchestrator = new SessionOrchestrator(catalog.models, gateway, registry);
    const credentials = (override?: string) =>
        createCredentialResolver({ keyDir: config.keyDir, env: envCredentials(config), override });

    registry.onStatusChange((event) => {
        logger.info({ provider: event.provider, connected: event.connected }, 'Connection status changed');
    });

    const app = await buildApp({
        registry,
        gateway,
        orchestrator,
        credentials,
        summaryPrompt: catalog.summary.systemPrompt,
        corsOrigin: process.env.FRONTEND_URL,
    });

    // ─── Start Server ───
    try {
        await app.listen({ port: config.port, host: config.host });
        logger.info({ port: config.port, env: config.nodeEnv, sessions: orchestrator.sessions.length }, 'LLM relay server started');
    } catch (err) {
        logger.error({ err }, 'Failed to start server');
        process.exit(1);
    }

    // ─── Startup handshakes (one per session, all concurrent) ───
    if (config.autoHandshakeOnStartup) {
        orchestrator.initializeAll(credentials()).catch((err) => {
            logger.error({ err }, 'Failed to auto-initialize connections');
        });
    }

    // ─── Graceful Shutdown ───
    const shutdown = async () => {
        logger.info('Shutting down...');
        await app.close();
        process.exit(0);
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

main().catch((err) => {
    logger.error({ err }, 'Fatal error');
    process.exit(1);
});
