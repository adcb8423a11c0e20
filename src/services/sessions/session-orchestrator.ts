import {
    BroadcastResult,
    CredentialInput,
    ModelDefinition,
    SendOutcome,
} from '../../types';
import { CompletionGateway } from '../llm/gateway';
import type { ConnectionTracker } from '../llm/llm.interface';
import { HANDSHAKE_MESSAGE } from '../llm/base.adapter';
import { CancelledError, errorMessage } from '../llm/errors';
import { NO_CONVERSATION_YET, buildSummaryMessages } from '../llm/prompt-builder';
import { logger } from '../../utils/logger';
import { Session } from './chat-session';

export const NO_RESPONSE = '(no response)';
export const CANCELLED_NOTICE = 'Request cancelled';

export function resolveCredential(credential: CredentialInput, provider: string): string {
    if (typeof credential === 'string') return credential;
    return credential(provider) ?? '';
}

/**
 * Session Orchestrator: one session per configured model.
 *
 * Every public operation is queued on its session, so two operations never
 * interleave on one transcript. Failures end up in the transcript (or the
 * returned summary); nothing thrown by an adapter or the registry escapes.
 */
export class SessionOrchestrator {
    readonly sessions: readonly Session[];

    constructor(
        models: readonly ModelDefinition[],
        private gateway: CompletionGateway,
        private registry: ConnectionTracker,
    ) {
        this.sessions = models.map((model) => new Session(model));
    }

    getSession(id: string): Session | undefined {
        return this.sessions.find((s) => s.id === id);
    }

    /**
     * Handshake for the session's provider, then say hello.
     */
    initializeConnection(session: Session, credential: CredentialInput, signal?: AbortSignal): Promise<void> {
        return session.run(() => this.connect(session, credential, signal));
    }

    send(session: Session, userText: string, credential: CredentialInput, signal?: AbortSignal): Promise<SendOutcome> {
        return session.run(() => this.exchange(session, userText, credential, signal));
    }

    summarize(
        session: Session,
        credential: CredentialInput,
        systemPrompt: string,
        signal?: AbortSignal,
    ): Promise<string> {
        return session.run(() => this.summarizeTranscript(session, credential, systemPrompt, signal));
    }

    /**
     * Send the same text to every given session concurrently and wait for all of them.
     */
    async broadcast(
        sessions: readonly Session[],
        userText: string,
        credential: CredentialInput,
        signal?: AbortSignal,
    ): Promise<BroadcastResult[]> {
        const settled = await Promise.allSettled(
            sessions.map((session) => this.send(session, userText, credential, signal)),
        );

        return settled.map((outcome, i): BroadcastResult => {
            const session = sessions[i];
            if (outcome.status === 'fulfilled') {
                return { ...outcome.value, modelName: session.displayName };
            }
            return {
                sessionId: session.id,
                modelName: session.displayName,
                status: 'error',
                error: errorMessage(outcome.reason),
            };
        });
    }

    /**
     * Startup fan-out: initialize every session that has a credential, record
     * the missing key on the rest.
     */
    async initializeAll(credential: CredentialInput, signal?: AbortSignal): Promise<void> {
        const tasks = this.sessions.map((session) =>
            session.run(async () => {
                const provider = session.model.provider;
                let key: string;
                try {
                    key = resolveCredential(credential, provider);
                } catch (error) {
                    logger.error({ err: error, provider, model: session.displayName }, 'Failed to look up API key');
                    session.append('system', `Connection error: ${errorMessage(error)}`, 'error');
                    return;
                }
                if (!key.trim()) {
                    logger.warn({ provider, model: session.displayName }, 'No API key found, session will not be initialized');
                    session.append('system', `No API key configured for ${provider}.`, 'error');
                    return;
                }
                logger.info({ provider, model: session.displayName }, 'Auto-initializing connection');
                await this.connect(session, key, signal);
            }),
        );

        await Promise.allSettled(tasks);
        logger.info({ sessions: this.sessions.length }, 'Session initialization finished');
    }

    async summarizeAll(credential: CredentialInput, systemPrompt: string, signal?: AbortSignal): Promise<string> {
        if (this.sessions.length === 0) {
            return 'No sessions to summarize.';
        }
        const summaries = await Promise.all(
            this.sessions.map((session) => this.summarize(session, credential, systemPrompt, signal)),
        );
        return summaries.join('\n\n');
    }

    // ─── Operations (run while holding the session) ───

    private async connect(session: Session, credential: CredentialInput, signal?: AbortSignal): Promise<void> {
        const log = logger.child({ session: session.id, model: session.displayName });
        try {
            const key = resolveCredential(credential, session.model.provider);
            const result = await this.registry.performHandshake(session.model.provider, key, signal);
            if (!result.success) {
                session.append('system', `Connection failed: ${result.message}`, 'error');
                return;
            }
            await this.exchange(session, HANDSHAKE_MESSAGE, key, signal);
        } catch (error) {
            if (error instanceof CancelledError) {
                session.append('system', 'Connection cancelled', 'cancelled');
                return;
            }
            log.error({ err: error }, 'Failed to initialize connection');
            session.append('system', `Connection error: ${errorMessage(error)}`, 'error');
        }
    }

    private async exchange(
        session: Session,
        userText: string,
        credential: CredentialInput,
        signal?: AbortSignal,
    ): Promise<SendOutcome> {
        const text = userText.trim();
        if (!text) {
            return { sessionId: session.id, status: 'skipped' };
        }

        const history = session.history();
        history.push({ role: 'user', content: text });
        session.append('user', text);

        try {
            const key = resolveCredential(credential, session.model.provider);
            const adapter = this.gateway.resolve(session.model.provider);
            const response = await adapter.complete(session.model, history, key, signal);
            const reply = response.trim() ? response.trim() : NO_RESPONSE;
            session.append('assistant', reply);
            return { sessionId: session.id, status: 'ok', reply };
        } catch (error) {
            if (error instanceof CancelledError) {
                session.append('assistant', CANCELLED_NOTICE, 'cancelled');
                return { sessionId: session.id, status: 'cancelled', error: error.message };
            }
            logger.error({ err: error, session: session.id, model: session.displayName }, 'Failed to complete chat');
            session.append('assistant', `Warning: ${errorMessage(error)}`, 'error');
            return { sessionId: session.id, status: 'error', error: errorMessage(error) };
        }
    }

    private async summarizeTranscript(
        session: Session,
        credential: CredentialInput,
        systemPrompt: string,
        signal?: AbortSignal,
    ): Promise<string> {
        const name = session.displayName;
        // Failed and cancelled entries are not rendered, so they do not count as conversation.
        if (session.history().length === 0) {
            return `${name}: ${NO_CONVERSATION_YET}`;
        }

        try {
            const key = resolveCredential(credential, session.model.provider);
            const adapter = this.gateway.resolve(session.model.provider);
            const messages = buildSummaryMessages(name, systemPrompt, session.transcript);
            const summary = await adapter.complete(session.model, messages, key, signal);
            return `${name}: ${summary.trim()}`;
        } catch (error) {
            if (error instanceof CancelledError) {
                return `${name}: ${CANCELLED_NOTICE}`;
            }
            logger.error({ err: error, session: session.id, model: name }, 'Failed to summarize conversation');
            return `${name}: Warning: ${errorMessage(error)}`;
        }
    }
}
