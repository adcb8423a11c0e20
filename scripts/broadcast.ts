#!/usr/bin/env tsx
/**
 * Broadcast Script
 *
 * Usage:
 *   npx tsx scripts/broadcast.ts --message "What is a monad?"
 *   npx tsx scripts/broadcast.ts --message "Hi" --models ./config/models.json --key sk-... --summary
 */

import { config } from '../src/config';
import { ConnectionRegistry } from '../src/services/connection';
import { createCompletionGateway } from '../src/services/llm';
import { SessionOrchestrator } from '../src/services/sessions';
import { loadModelCatalog } from '../src/services/catalog';
import { createCredentialResolver, envCredentials } from '../src/services/credentials';

async function main() {
    const args = process.argv.slice(2);
    const message = getArg(args, '--message');
    const modelsPath = getArg(args, '--models') ?? config.modelsPath;
    const override = getArg(args, '--key');
    const withSummary = args.includes('--summary');

    if (!message || !message.trim()) {
        console.error('Usage: npx tsx scripts/broadcast.ts --message "text" [--models path] [--key apiKey] [--summary]');
        process.exit(1);
    }

    const catalog = await loadModelCatalog(modelsPath);
    const registry = new ConnectionRegistry();
    const gateway = createCompletionGateway(registry);
    const orchestrator = new SessionOrchestrator(catalog.models, gateway, registry);
    const credentials = createCredentialResolver({ keyDir: config.keyDir, env: envCredentials(config), override });

    console.log(`Connecting ${orchestrator.sessions.length} sessions...`);
    await orchestrator.initializeAll(credentials);

    for (const state of registry.listStates()) {
        console.log(`  ${state.connected ? '✅' : '❌'} ${state.provider}`);
    }

    console.log(`\nBroadcasting: "${message.trim()}"\n`);
    const results = await orchestrator.broadcast(orchestrator.sessions, message, credentials);

    for (const result of results) {
        const body = result.status === 'ok' ? result.reply : `[${result.status}] ${result.error ?? ''}`;
        console.log(`── ${result.modelName} ──\n${body}\n`);
    }

    if (withSummary) {
        const summary = await orchestrator.summarizeAll(credentials, catalog.summary.systemPrompt);
        console.log(`── Summary ──\n${summary}`);
    }
}

function getArg(args: string[], flag: string): string | undefined {
    const idx = args.indexOf(flag);
    return idx >= 0 ? args[idx + 1] : undefined;
}

main().catch((err) => {
    console.error(err);
    process.exit(1);
});
