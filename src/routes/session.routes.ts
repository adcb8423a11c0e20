import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { CredentialInput } from '../types';
import { SessionOrchestrator } from '../services/sessions';

export type CredentialFactory = (override?: string) => CredentialInput;

export interface SessionRouteOptions {
    orchestrator: SessionOrchestrator;
    credentials: CredentialFactory;
    summaryPrompt: string;
}

const keyBodySchema = z.object({ apiKey: z.string().optional() }).default({});

const messageBodySchema = z.object({
    text: z.string(),
    apiKey: z.string().optional(),
});

export function formatZodError(error: z.ZodError): string {
    return error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
}

export const sessionRoutes: FastifyPluginAsync<SessionRouteOptions> = async (fastify, opts) => {
    const { orchestrator, credentials, summaryPrompt } = opts;

    // ─── List sessions ───
    fastify.get('/api/sessions', async () => {
        return orchestrator.sessions.map((s) => s.toView());
    });

    // ─── Single session ───
    fastify.get<{ Params: { id: string } }>('/api/sessions/:id', async (request, reply) => {
        const session = orchestrator.getSession(request.params.id);
        if (!session) {
            return reply.code(404).send({ error: 'Session not found' });
        }
        return session.toView();
    });

    // ─── Handshake + hello for one session ───
    fastify.post<{ Params: { id: string } }>('/api/sessions/:id/initialize', async (request, reply) => {
        const session = orchestrator.getSession(request.params.id);
        if (!session) {
            return reply.code(404).send({ error: 'Session not found' });
        }
        const body = keyBodySchema.safeParse(request.body);
        if (!body.success) {
            return reply.code(400).send({ error: formatZodError(body.error) });
        }

        await orchestrator.initializeConnection(session, credentials(body.data.apiKey));
        return session.toView();
    });

    // ─── Send to one session ───
    fastify.post<{ Params: { id: string } }>('/api/sessions/:id/messages', async (request, reply) => {
        const session = orchestrator.getSession(request.params.id);
        if (!session) {
            return reply.code(404).send({ error: 'Session not found' });
        }
        const body = messageBodySchema.safeParse(request.body);
        if (!body.success) {
            return reply.code(400).send({ error: formatZodError(body.error) });
        }

        return orchestrator.send(session, body.data.text, credentials(body.data.apiKey));
    });

    // ─── Send to every session ───
    fastify.post('/api/broadcast', async (request, reply) => {
        const body = messageBodySchema.safeParse(request.body);
        if (!body.success) {
            return reply.code(400).send({ error: formatZodError(body.error) });
        }
        if (!body.data.text.trim()) {
            return reply.code(400).send({ error: 'text: must not be blank' });
        }

        return orchestrator.broadcast(orchestrator.sessions, body.data.text, credentials(body.data.apiKey));
    });

    // ─── Cross-session summary ───
    fastify.post('/api/summaries', async (request, reply) => {
        const body = keyBodySchema.safeParse(request.body);
        if (!body.success) {
            return reply.code(400).send({ error: formatZodError(body.error) });
        }

        const summary = await orchestrator.summarizeAll(credentials(body.data.apiKey), summaryPrompt);
        return { summary };
    });
};
