import { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { BreakerRegistry } from '../resilience/breaker-registry';
import { getMetrics, getContentType } from '../observability/metrics';

export interface HealthRouteOptions {
  redis?: Redis;
  breakers: BreakerRegistry;
  enableMetrics: boolean;
}

export function registerHealthRoutes(app: FastifyInstance, opts: HealthRouteOptions): void {
  /** Liveness probe: always returns 200 if the process is running */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness probe: Redis reachable and no dependency breaker open */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: string; latencyMs?: number; failures?: number }> = {};

    if (opts.redis) {
      const start = Date.now();
      try {
        await opts.redis.ping();
        checks.redis = { status: 'ok', latencyMs: Date.now() - start };
      } catch {
        checks.redis = { status: 'error', latencyMs: Date.now() - start };
      }
    } else {
      checks.redis = { status: 'skipped' };
    }

    for (const [name, breaker] of Object.entries(opts.breakers.getHealthSummary())) {
      checks[`dep_${name}`] = {
        status: breaker.state === 'open' ? 'error' : 'ok',
        failures: breaker.failures,
      };
    }

    const allOk = Object.values(checks).every((c) => c.status === 'ok' || c.status === 'skipped');
    const statusCode = allOk ? 200 : 503;

    return reply.status(statusCode).send({
      status: allOk ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  /** Prometheus metrics endpoint */
  if (opts.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
