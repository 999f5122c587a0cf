import { FastifyInstance } from 'fastify';
import { ReviewService } from '../reviews/review-service';

export function registerHealthRoutes(app: FastifyInstance, service: ReviewService): void {
  /** Liveness probe — the client also uses it to decide between server and local mode */
  app.get('/health', async (_req, reply) => {
    return reply.send({ ok: true });
  });

  /** Readiness probe — checks the reviews database */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: string; latencyMs?: number }> = {};

    const start = Date.now();
    try {
      checks.database = { status: service.isHealthy() ? 'ok' : 'error', latencyMs: Date.now() - start };
    } catch {
      checks.database = { status: 'error', latencyMs: Date.now() - start };
    }

    const allOk = Object.values(checks).every((c) => c.status === 'ok');
    const statusCode = allOk ? 200 : 503;

    return reply.status(statusCode).send({
      status: allOk ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });
}
