import type { FastifyInstance } from 'fastify';
import { generateTokenBodySchema, verifyTokenBodySchema } from '../schemas/tokenSchemas.js';
import type { TokenService } from '../../services/tokenService.js';

export function tokenRoutes(service: TokenService) {
  return async (app: FastifyInstance) => {
    app.post('/v1/tokens', async (req, reply) => {
      const parsed = generateTokenBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return reply
          .status(400)
          .send({ error: { code: 'VALIDATION_ERROR', message: parsed.error.message } });
      }
      const issued = service.issue(parsed.data.entropyBytes);
      return reply.status(201).send(issued);
    });

    // Unknown or already-consumed tokens are a normal outcome: 200 with valid=false
    app.post('/v1/tokens/verify', async (req, reply) => {
      const parsed = verifyTokenBodySchema.safeParse(req.body);
      if (!parsed.success) {
        return reply
          .status(400)
          .send({ error: { code: 'VALIDATION_ERROR', message: parsed.error.message } });
      }
      return service.check(parsed.data.token, parsed.data.remove);
    });

    app.get('/v1/tokens/stats', async () => service.stats());

    app.delete('/v1/tokens', async () => service.reset());
  };
}
