import 'dotenv/config';
import Fastify from 'fastify';
import { registerErrorHandler } from '@/api/error-handler.js';
import { registerRoutes } from '@/api/routes/index.js';
import type { RouteDependencies } from '@/api/types.js';
import { loadOrchestratorConfig } from '@/config/loader.js';
import { createMultiAgentManager } from '@/manager/multi-agent-manager.js';
import { createLogger } from '@/observability/logger.js';
import { createModelBackend } from '@/providers/factory.js';
import { createMathTool } from '@/tools/definitions/index.js';
import { createToolRegistry } from '@/tools/registry/tool-registry.js';

const logger = createLogger();

const server = Fastify({
  logger: false,
});

async function start(): Promise<void> {
  try {
    const configResult = await loadOrchestratorConfig(process.env['CONFIG_PATH']);
    if (!configResult.ok) {
      throw configResult.error;
    }
    const config = configResult.value;

    const port = Number(process.env['PORT'] ?? config.server.port);
    const host = process.env['HOST'] ?? config.server.host;

    // Tools
    const toolRegistry = createToolRegistry({ logger });
    toolRegistry.register(createMathTool());

    // Agents
    const manager = createMultiAgentManager({
      config,
      logger,
      modelBackend: createModelBackend(config.modelBackend),
      toolProvider: toolRegistry,
    });

    if (!(await manager.start())) {
      throw new Error('Multi-agent system failed to start');
    }

    const deps: RouteDependencies = { manager, logger };

    registerErrorHandler(server, logger);
    await server.register(
      async (prefixed) => {
        await prefixed.register(registerRoutes, deps);
      },
      { prefix: '/api/v1' },
    );

    // Graceful shutdown
    const shutdown = async (): Promise<void> => {
      logger.info('Shutting down...', { component: 'main' });
      await server.close();
      await manager.shutdown();
      process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown());
    process.on('SIGINT', () => void shutdown());

    await server.listen({ port, host });
    logger.info(`Server listening on ${host}:${port}`, { component: 'main' });
  } catch (err: unknown) {
    logger.fatal('Failed to start server', {
      component: 'main',
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }
}

void start();
