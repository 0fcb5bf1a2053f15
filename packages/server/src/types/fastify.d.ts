import 'fastify';
import type { DependencyOrchestrator } from '../dependencies/orchestrator.js';
import type { ReadinessController } from '../readiness.js';

declare module 'fastify' {
  interface FastifyInstance {
    readiness: ReadinessController;
    dependencies: DependencyOrchestrator;
  }
}
