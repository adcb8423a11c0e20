import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { ConnectionRegistry } from '../services/connection';
import { ValidationError } from '../services/llm/errors';
import { resolveCredential } from '../services/sessions';
import { CredentialFactory, formatZodError } from './session.routes';

export interface ConnectionRouteOptions {
    registry: ConnectionRegistry;
    credentials: CredentialFactory;
}

const handshakeBodySchema = z.object({ apiKey: z.string().optional() }).default({});

export const connectionRoutes: FastifyPluginAsync<ConnectionRouteOptions> = async (fastify, opts) => {
    const { registry, credentials } = opts;

    fastify.get('/api/connections', async () => {
        return registry.listStates();
    });

    // ─── Manual connection test ───
    fastify.post<{ Params: { provider: string } }>(
        '/api/connections/:provider/handshake',
        async (request, reply) => {
            const body = handshakeBodySchema.safeParse(request.body);
            if (!body.success) {
                return reply.code(400).send({ error: formatZodError(body.error) });
            }

            const { provider } = request.params;
            const credential = resolveCredential(credentials(body.data.apiKey), provider);
            try {
                return await registry.performHandshake(provider, credential);
            } catch (err) {
                if (err instanceof ValidationError) {
                    return reply.code(400).send({ error: err.message });
                }
                throw err;
            }
        },
    );
};
